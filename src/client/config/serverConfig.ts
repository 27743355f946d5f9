import { logger } from "../../utils/logger";
import { plainLine, prettyLine } from "./format";
import { normalizeUrl } from "./url";

export const DEFAULT_SERVER_VERSION = "1.0";

/**
 * 单个远程服务器的连接信息
 */
export class ServerConfig {
  private _url = "";
  private _version = DEFAULT_SERVER_VERSION;
  private _apiKey = "";
  private _localName = "";

  /** 规范化后的 URL，未设置或设置失败时为空字符串 */
  get url(): string {
    return this._url;
  }

  /**
   * 设置服务器 URL
   * 非法 URL 不报错，只把已保存的 URL 清空；调用方需检查 url 判断是否成功
   */
  setUrl(raw: string): void {
    const normalized = normalizeUrl(raw);
    if (normalized === undefined) {
      logger.debug(`Ignoring invalid server URL: "${raw}"`);
    }
    this._url = normalized ?? "";
  }

  get version(): string {
    return this._version;
  }

  setVersion(version: string): void {
    this._version = version;
  }

  get apiKey(): string {
    return this._apiKey;
  }

  setApiKey(apiKey: string): void {
    this._apiKey = apiKey;
  }

  /** 本地别名，不出现在 asString / asPrettyString 中 */
  get localName(): string {
    return this._localName;
  }

  setLocalName(localName: string): void {
    this._localName = localName;
  }

  clear(): void {
    this._url = "";
    this._version = DEFAULT_SERVER_VERSION;
    this._apiKey = "";
    this._localName = "";
  }

  clone(): ServerConfig {
    const copy = new ServerConfig();
    copy._url = this._url;
    copy._version = this._version;
    copy._apiKey = this._apiKey;
    copy._localName = this._localName;
    return copy;
  }

  asString(): string {
    return (
      plainLine("URL", this._url) +
      plainLine("Version", this._version) +
      plainLine("API key", this._apiKey)
    );
  }

  /**
   * 彩色输出，URL 和 API key 为空时省略该行
   */
  asPrettyString(): string {
    let out = "";
    if (this._url) {
      out += prettyLine("URL", this._url);
    }
    out += prettyLine("Version", this._version);
    if (this._apiKey) {
      out += prettyLine("API key", this._apiKey);
    }
    return out;
  }
}
