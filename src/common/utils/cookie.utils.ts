import type { CookieMap } from "../types/gateway";

/**
 * Parse a `Cookie` header style string ("a=1; b=2") into a map.
 * Segments without "=" are skipped; the first "=" splits name from value.
 */
export function parseCookieString(header: string): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const segment of header.split(";")) {
    const index = segment.indexOf("=");
    if (index <= 0) continue;
    const name = segment.slice(0, index).trim();
    if (name) cookies[name] = segment.slice(index + 1).trim();
  }
  return cookies;
}

export function serializeCookies(cookies: CookieMap): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

/**
 * Later maps win on name clashes
 */
export function mergeCookies(...maps: CookieMap[]): CookieMap {
  const merged: Record<string, string> = {};
  for (const map of maps) Object.assign(merged, map);
  return Object.freeze(merged);
}

export function maskSecret(secret: string | undefined, visible = 8): string {
  if (!secret) return "<none>";
  return secret.length <= visible ? `${secret.slice(0, 2)}...` : `${secret.slice(0, visible)}...`;
}
