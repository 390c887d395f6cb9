/**
 * True when the URL is http(s) and its host equals an allowed domain or is
 * a subdomain of one.
 */
export function isAllowedUrl(value: string, allowedDomains: readonly string[]): boolean {
  let host: string;
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return false;
    host = url.hostname.toLowerCase().replace(/\.$/, '');
  } catch {
    return false;
  }
  return allowedDomains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

/** Allowed URLs in first-seen order, fragment-insensitive duplicates removed, capped. */
export function selectAllowedUrls(
  urls: readonly string[],
  allowedDomains: readonly string[],
  limit: number,
): string[] {
  const seen = new Set<string>();
  const out: string[] = [];

  for (const url of urls) {
    if (out.length >= limit) break;
    if (!isAllowedUrl(url, allowedDomains)) continue;
    const key = url.split('#')[0];
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(url);
  }

  return out;
}
