/**
 * Central Timeout Configuration
 *
 * All timeout values should be imported from this module so every stage
 * agrees on the same defaults.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Whole-page extraction (fetch + strategy chain) for one prioritized page
   */
  PAGE_EXTRACTION: 15000,

  /**
   * robots.txt and sitemap requests
   */
  DISCOVERY_FETCH: 10000,

  /**
   * Pages fetched during the link crawl (links only, no content)
   */
  CRAWL_FETCH: 10000,

  /**
   * Script rendering through an injected renderer
   */
  RENDER: 30000,

  /**
   * Single language-model call
   */
  PROVIDER_CALL: 120000,

  /**
   * Domain probe when the target has no URL
   */
  DOMAIN_PROBE: 5000,

  /**
   * Initial backoff when a provider reports rate limiting
   */
  RATE_LIMIT_BACKOFF: 2000,
} as const;

export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 */
export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}
