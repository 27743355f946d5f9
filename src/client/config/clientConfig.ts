import { defaultCacheLocation } from "../../utils/env";
import { logger } from "../../utils/logger";
import { PRODUCT_NAME, VERSION } from "../../version";
import { ConfigError, isConfigError } from "./errors";
import { plainLine, prettyHeading, prettyLine } from "./format";
import { loadConfigFile } from "./loader";
import type { StagedConfig } from "../types";
import type { ServerConfig } from "./serverConfig";

export type LoadConfigResult =
  | { ok: true }
  | { ok: false; error: ConfigError };

export function defaultUserAgent(): string {
  return `${PRODUCT_NAME}-${VERSION}`;
}

/**
 * 客户端配置：服务器列表、缓存目录、配置文件路径和 User-Agent
 * 每个会话一个实例，不支持并发修改
 */
export class ClientConfig {
  private _configPath = "";
  private _cacheLocation: string;
  private _userAgent = defaultUserAgent();
  private _servers: ServerConfig[] = [];

  constructor() {
    this._cacheLocation = defaultCacheLocation();
  }

  get configPath(): string {
    return this._configPath;
  }

  setConfigPath(configPath: string): void {
    this._configPath = configPath;
  }

  get cacheLocation(): string {
    return this._cacheLocation;
  }

  setCacheLocation(cacheLocation: string): void {
    this._cacheLocation = cacheLocation;
  }

  get userAgent(): string {
    return this._userAgent;
  }

  setUserAgent(userAgent: string): void {
    this._userAgent = userAgent;
  }

  /** 按添加顺序排列的服务器列表 */
  get servers(): readonly ServerConfig[] {
    return this._servers;
  }

  /**
   * 直接追加服务器，不做去重或 URL 校验
   */
  addServer(server: ServerConfig): void {
    this._servers.push(server);
  }

  clear(): void {
    this._servers = [];
    this._configPath = "";
    this._cacheLocation = defaultCacheLocation();
    this._userAgent = defaultUserAgent();
  }

  /**
   * 加载 configPath 指向的配置文件
   * 全部校验通过才提交；失败时保持原状态并返回错误，不抛出
   */
  loadConfigResult(): LoadConfigResult {
    const configPath = this._configPath;
    let staged: StagedConfig;
    try {
      staged = loadConfigFile(configPath);
    } catch (error) {
      if (!isConfigError(error)) throw error;
      logger.error(`❌ Failed to load config from ${configPath}: ${error.message}`);
      return { ok: false, error };
    }

    if (staged.servers) {
      this._servers = staged.servers;
    }
    if (staged.cacheLocation !== undefined) {
      this._cacheLocation = staged.cacheLocation;
    }

    logger.info(
      `✅ Loaded config from ${configPath} (${this._servers.length} server(s))`
    );
    return { ok: true };
  }

  loadConfig(): boolean {
    return this.loadConfigResult().ok;
  }

  asString(): string {
    let out =
      plainLine("Config path", this._configPath) +
      plainLine("Cache location", this._cacheLocation) +
      "Servers:\n";
    for (const server of this._servers) {
      out += server.asString();
    }
    return out;
  }

  asPrettyString(): string {
    let out =
      prettyLine("Config path", this._configPath) +
      prettyLine("Cache location", this._cacheLocation) +
      `${prettyHeading("Servers:")}\n`;
    for (const server of this._servers) {
      out += server.asPrettyString();
    }
    return out;
  }
}
