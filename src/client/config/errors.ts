/**
 * 配置加载失败的类别
 */
export type ConfigErrorKind =
  | "io"
  | "parse"
  | "missing-field"
  | "empty-field"
  | "invalid-url"
  | "duplicate-server";

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;

  constructor(kind: ConfigErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
    this.kind = kind;
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
