import type { ServerConfig } from "./config/serverConfig";

/**
 * 配置文件中的单个服务器条目（解析后、校验前）
 */
export interface ServerEntry {
  url?: unknown;
  name?: unknown; // 本地别名
  version?: unknown;
  api_key?: unknown;
}

/**
 * 缓存配置
 */
export interface CacheEntry {
  path?: unknown; // 下载资源的存放目录
}

/**
 * 配置文件顶层结构，其余键忽略
 */
export interface ConfigDocument {
  servers?: unknown;
  cache?: unknown;
}

/**
 * 校验通过、等待提交的配置
 * 字段缺省表示文件中未出现该部分，提交时保持原值
 */
export interface StagedConfig {
  servers?: ServerConfig[];
  cacheLocation?: string;
}
