export { ClientConfig, defaultUserAgent } from "./client/config/clientConfig";
export type { LoadConfigResult } from "./client/config/clientConfig";
export { ServerConfig, DEFAULT_SERVER_VERSION } from "./client/config/serverConfig";
export { ConfigError, isConfigError } from "./client/config/errors";
export type { ConfigErrorKind } from "./client/config/errors";
export {
  loadConfigFile,
  parseConfigDocument,
  readConfigFile,
  stageConfig,
} from "./client/config/loader";
export { normalizeUrl } from "./client/config/url";
export type { ConfigDocument, StagedConfig } from "./client/types";
export { Logger, logger } from "./utils/logger";
export type { Verbosity } from "./utils/logger";
export { defaultCacheLocation, homePath } from "./utils/env";
export { PRODUCT_NAME, VERSION } from "./version";
