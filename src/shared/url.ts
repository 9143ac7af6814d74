/**
 * Split a URL into the host and path+query the store indexes on.
 * Unparseable input keeps the raw value as the path.
 */
export function parseRequestUrl(url: string): { host: string; path: string } {
  try {
    const parsed = new URL(url);
    return { host: parsed.hostname.toLowerCase(), path: parsed.pathname + parsed.search };
  } catch {
    return { host: "", path: url };
  }
}
