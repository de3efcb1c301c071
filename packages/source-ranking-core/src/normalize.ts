/**
 * URL normalization.
 *
 * Drops query string and fragment (UTM params, anchors) so the same article
 * reached through different links collapses to one key.
 */

/**
 * Strip query and fragment, keep scheme, host and path.
 *
 * `normalizeUrl(normalizeUrl(u)) === normalizeUrl(u)` for every input:
 * WHATWG serialization is a fixed point, and the string fallback for
 * unparseable input only ever removes a suffix.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return stripSuffixes(trimmed);
  }

  // Opaque URLs (mailto:, data:) have no host; keep what precedes ?/#
  if (!parsed.host) {
    return stripSuffixes(trimmed);
  }

  return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
}

/** Lower-cased host of a URL, or '' when it has none. */
export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * True when `host` is `domain` or one of its subdomains.
 * `matchesDomain('www.reddit.com', 'reddit.com')` → true.
 */
export function matchesDomain(host: string, domain: string): boolean {
  const d = domain.toLowerCase();
  return host === d || host.endsWith(`.${d}`);
}

function stripSuffixes(value: string): string {
  const beforeHash = value.split('#')[0] ?? '';
  return beforeHash.split('?')[0] ?? '';
}
