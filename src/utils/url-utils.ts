/**
 * URL Utilities
 *
 * Normalization and same-site checks shared by discovery, prioritization
 * and the MCP handlers.
 */

// ============================================
// CONSTANTS
// ============================================

/** File extensions that never hold page content */
const ASSET_EXTENSIONS = new Set([
  'jpg', 'jpeg', 'png', 'gif', 'svg', 'webp', 'ico', 'bmp', 'avif',
  'css', 'js', 'mjs', 'map', 'json', 'xml', 'rss', 'atom', 'txt',
  'pdf', 'zip', 'gz', 'tar', 'rar', '7z', 'dmg', 'exe',
  'mp3', 'mp4', 'mov', 'avi', 'webm', 'wav', 'ogg',
  'woff', 'woff2', 'ttf', 'eot', 'otf',
]);

// ============================================
// NORMALIZATION
// ============================================

/**
 * Parse a string as an absolute http(s) URL, resolving it against `base`
 * when relative. Returns null for anything else.
 */
export function resolveHttpUrl(href: string, base?: string): URL | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }
  try {
    const url = base ? new URL(trimmed, base) : new URL(trimmed);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : null;
  } catch {
    return null;
  }
}

/**
 * Canonical form used as the dedupe key and as the stored link URL:
 * scheme + lower-cased host + path, with query, fragment and trailing
 * slash removed. The root path stays `/`.
 */
export function normalizeUrl(href: string, base?: string): string | null {
  const url = resolveHttpUrl(href, base);
  if (!url) {
    return null;
  }
  let path = url.pathname.replace(/\/{2,}/g, '/');
  while (path.length > 1 && path.endsWith('/')) {
    path = path.slice(0, -1);
  }
  return `${url.protocol}//${url.host.toLowerCase()}${path || '/'}`;
}

/**
 * Accepts a bare domain (`acme.com`) or a URL and returns the base URL
 * the pipeline starts from.
 */
export function toBaseUrl(domainOrUrl: string): string | null {
  const value = domainOrUrl.trim();
  const withScheme = /^https?:\/\//i.test(value) ? value : `https://${value}`;
  return normalizeUrl(withScheme);
}

// ============================================
// CLASSIFICATION
// ============================================

/**
 * Host without a leading `www.`
 */
export function siteHost(href: string): string | null {
  const url = resolveHttpUrl(href);
  return url ? url.hostname.toLowerCase().replace(/^www\./, '') : null;
}

export function isSameSite(href: string, baseUrl: string): boolean {
  const host = siteHost(href);
  return host !== null && host === siteHost(baseUrl);
}

export function isAssetUrl(href: string): boolean {
  const url = resolveHttpUrl(href);
  if (!url) {
    return false;
  }
  const lastSegment = url.pathname.split('/').pop() ?? '';
  const dot = lastSegment.lastIndexOf('.');
  if (dot === -1) {
    return false;
  }
  return ASSET_EXTENSIONS.has(lastSegment.slice(dot + 1).toLowerCase());
}

/**
 * Path component of an absolute URL, lower-cased (`/` when unparsable)
 */
export function urlPath(href: string): string {
  const url = resolveHttpUrl(href);
  return url ? url.pathname.toLowerCase() : '/';
}
