import yaml from "js-yaml";
import { readFileSync } from "fs";
import type { CacheEntry, ConfigDocument, ServerEntry, StagedConfig } from "../types";
import { ConfigError } from "./errors";
import { ServerConfig } from "./serverConfig";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasKey(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * 读取配置文件文本
 */
export function readConfigFile(configPath: string): string {
  if (!configPath) {
    throw new ConfigError("io", "Config path is empty");
  }
  try {
    return readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError("io", `Cannot read config file ${configPath}`, {
      cause: error,
    });
  }
}

/**
 * 解析 YAML 文本，空文档视为空对象
 */
export function parseConfigDocument(
  text: string,
  filename?: string
): ConfigDocument {
  let doc: unknown;
  try {
    doc = yaml.load(text, { filename });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError("parse", `Invalid YAML: ${reason}`, { cause: error });
  }

  if (doc === undefined || doc === null) {
    return {};
  }
  if (!isRecord(doc)) {
    throw new ConfigError("parse", "Invalid config: top level must be a map");
  }
  return doc;
}

// 可选的标量字段，null 视为未设置
function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  throw new ConfigError("parse", `Invalid config: '${field}' must be a scalar`);
}

/**
 * 校验单个服务器条目并构建 ServerConfig
 */
export function stageServer(entry: unknown, index: number): ServerConfig {
  if (!isRecord(entry) || !hasKey(entry, "url")) {
    throw new ConfigError(
      "missing-field",
      `Missing 'url' for server #${index + 1}`
    );
  }

  const fields: ServerEntry = entry;
  const rawUrl = fields.url;
  if (
    rawUrl === null ||
    rawUrl === undefined ||
    (typeof rawUrl === "string" && rawUrl.trim() === "")
  ) {
    throw new ConfigError("empty-field", `Empty 'url' for server #${index + 1}`);
  }

  // 与 ServerConfig.setUrl 相同的规范化规则，但这里失败即报错
  const server = new ServerConfig();
  if (typeof rawUrl === "string") {
    server.setUrl(rawUrl);
  }
  if (!server.url) {
    throw new ConfigError(
      "invalid-url",
      `Invalid 'url' for server #${index + 1}: ${String(rawUrl)}`
    );
  }

  const name = optionalString(fields.name, `servers[${index}].name`);
  if (name !== undefined) server.setLocalName(name);

  const version = optionalString(fields.version, `servers[${index}].version`);
  if (version !== undefined) server.setVersion(version);

  const apiKey = optionalString(fields.api_key, `servers[${index}].api_key`);
  if (apiKey !== undefined) server.setApiKey(apiKey);

  return server;
}

/**
 * 校验 servers 列表，任意两个条目 URL 相同即失败
 */
export function stageServers(value: unknown): ServerConfig[] {
  if (value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError("parse", "Invalid config: 'servers' must be a list");
  }

  const staged = value.map((entry, index) => stageServer(entry, index));

  const seen = new Set<string>();
  for (const server of staged) {
    if (seen.has(server.url)) {
      throw new ConfigError(
        "duplicate-server",
        `URL already in use: ${server.url}`
      );
    }
    seen.add(server.url);
  }

  return staged;
}

/**
 * 校验 cache 部分，返回缓存目录
 */
export function stageCacheLocation(value: unknown): string {
  if (value === null) {
    throw new ConfigError("missing-field", "Missing 'path' in 'cache'");
  }
  if (!isRecord(value)) {
    throw new ConfigError("parse", "Invalid config: 'cache' must be a map");
  }
  if (!hasKey(value, "path")) {
    throw new ConfigError("missing-field", "Missing 'path' in 'cache'");
  }

  const fields: CacheEntry = value;
  const path = optionalString(fields.path, "cache.path");
  if (path === undefined || path.trim() === "") {
    throw new ConfigError("empty-field", "Empty 'path' in 'cache'");
  }
  return path;
}

/**
 * 校验整个配置文档，全部通过才返回结果，不修改任何已有状态
 */
export function stageConfig(doc: ConfigDocument): StagedConfig {
  const staged: StagedConfig = {};

  if (doc.servers !== undefined) {
    staged.servers = stageServers(doc.servers);
  }

  if (doc.cache !== undefined) {
    staged.cacheLocation = stageCacheLocation(doc.cache);
  }

  return staged;
}

/**
 * 读取、解析并校验配置文件
 */
export function loadConfigFile(configPath: string): StagedConfig {
  const text = readConfigFile(configPath);
  return stageConfig(parseConfigDocument(text, configPath));
}
