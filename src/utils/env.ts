import { join } from "path";

/**
 * 获取用户主目录
 * 未设置时返回空字符串，由调用方决定如何拼接
 */
export function homePath(): string {
  const key = process.platform === "win32" ? "USERPROFILE" : "HOME";
  return process.env[key] ?? "";
}

/**
 * 默认的资源缓存目录：<home>/.ignition/fuel
 */
export function defaultCacheLocation(): string {
  return join(homePath(), ".ignition", "fuel");
}
