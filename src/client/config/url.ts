/**
 * 规范化服务器 URL
 * 要求是带 scheme 和 host 的绝对 URL，去掉路径末尾的一个 "/"
 * 无法解析时返回 undefined，由调用方决定是静默清空还是报错
 */
export function normalizeUrl(raw: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    return undefined;
  }

  // "mailto:x"、"file:///x" 之类没有 host 的 URL 不接受
  const scheme = parsed.protocol.replace(/:$/, "");
  if (!scheme || !parsed.host) {
    return undefined;
  }

  let userInfo = "";
  if (parsed.username) {
    userInfo = parsed.password
      ? `${parsed.username}:${parsed.password}@`
      : `${parsed.username}@`;
  }

  const path = parsed.pathname.endsWith("/")
    ? parsed.pathname.slice(0, -1)
    : parsed.pathname;

  return `${scheme}://${userInfo}${parsed.host}${path}${parsed.search}${parsed.hash}`;
}
