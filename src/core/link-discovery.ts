/**
 * Link Discovery Engine
 *
 * Collects candidate pages for a site from three independent sources:
 * robots.txt directives, sitemap XML and a bounded breadth-first crawl of
 * on-site anchors. Each source runs inside its own error boundary; a
 * failing source contributes nothing and is reported, never thrown.
 *
 * Merge precedence is robots > sitemap > crawl, first-discovered order
 * within a source. When the link cap is reached the lower-precedence
 * sources are the ones cut.
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/abort.js';
import { isAssetUrl, isSameSite, normalizeUrl } from '../utils/url-utils.js';
import { getTimeout } from '../utils/timeouts.js';
import {
  collectSitemapUrls,
  fetchRobotsTxt,
  fetchText,
  robotsPathsToUrls,
  type FetchFn,
  type ParsedRobotsTxt,
} from './robots-sitemap-discovery.js';
import {
  DISCOVERY_SOURCES,
  type DiscoveredLink,
  type DiscoveryReport,
  type DiscoverySource,
  type DiscoverySourceReport,
} from '../types/research.js';
import type { PipelineConfig } from '../utils/config-schemas.js';

const log = logger.discovery;

// ============================================
// TYPES
// ============================================

export type LinkDiscoveryOptions = Pick<
  PipelineConfig,
  'maxLinks' | 'maxCrawlDepth' | 'maxCrawlPages' | 'crawlLinksPerPage' | 'maxSitemaps' | 'userAgent'
> & {
  /** Per-request timeout for robots, sitemap and crawl fetches */
  requestTimeoutMs?: number;
  signal?: AbortSignal;
};

interface SourceOutcome {
  links: DiscoveredLink[];
  error?: string;
}

// ============================================
// HELPERS
// ============================================

/**
 * Same-site, non-asset page links of an HTML document, normalized, in
 * document order without duplicates.
 */
export function extractPageLinks(html: string, pageUrl: string, siteUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    if (!href) return;
    const url = normalizeUrl(href, pageUrl);
    if (!url || seen.has(url) || !isSameSite(url, siteUrl) || isAssetUrl(url)) return;
    seen.add(url);
    links.push(url);
  });

  return links;
}

/**
 * Merge per-source links in precedence order, dedupe by normalized URL
 * and stop at `maxLinks`.
 */
export function mergeDiscoveredLinks(
  bySource: Record<DiscoverySource, DiscoveredLink[]>,
  maxLinks: number
): DiscoveredLink[] {
  const merged: DiscoveredLink[] = [];
  const seen = new Set<string>();

  for (const source of DISCOVERY_SOURCES) {
    for (const link of bySource[source]) {
      if (merged.length >= maxLinks) return merged;
      const url = normalizeUrl(link.url) ?? link.url;
      if (seen.has(url)) continue;
      seen.add(url);
      merged.push({ ...link, url });
    }
  }

  return merged;
}

function toSourceReport(outcome: SourceOutcome): DiscoverySourceReport {
  return {
    count: outcome.links.length,
    ...(outcome.error !== undefined && { error: outcome.error }),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================
// ENGINE
// ============================================

export class LinkDiscoveryEngine {
  private readonly fetchFn?: FetchFn;

  constructor(deps: { fetchFn?: FetchFn } = {}) {
    this.fetchFn = deps.fetchFn;
  }

  async discover(baseUrl: string, options: LinkDiscoveryOptions): Promise<DiscoveryReport> {
    const startTime = Date.now();
    const { signal } = options;

    log.debug('Starting link discovery', { url: baseUrl, maxLinks: options.maxLinks });

    const robotsTxt: { parsed: ParsedRobotsTxt | null } = { parsed: null };
    const robots = await this.boundary('robots', baseUrl, signal, async () => {
      robotsTxt.parsed = await fetchRobotsTxt(baseUrl, this.fetchOptions(options));
      return robotsTxt.parsed ? this.robotsLinks(robotsTxt.parsed, baseUrl, options.maxLinks) : [];
    });

    const [sitemap, crawl] = await Promise.all([
      this.boundary('sitemap', baseUrl, signal, () =>
        this.sitemapLinks(baseUrl, robotsTxt.parsed?.sitemapUrls ?? [], options)
      ),
      this.boundary('crawl', baseUrl, signal, () => this.crawlLinks(baseUrl, options)),
    ]);

    throwIfAborted(signal);

    const links = mergeDiscoveredLinks(
      { robots: robots.links, sitemap: sitemap.links, crawl: crawl.links },
      options.maxLinks
    );
    const sources: Record<DiscoverySource, DiscoverySourceReport> = {
      robots: toSourceReport(robots),
      sitemap: toSourceReport(sitemap),
      crawl: toSourceReport(crawl),
    };

    const durationMs = Date.now() - startTime;
    log.info('Link discovery complete', {
      url: baseUrl,
      links: links.length,
      robots: robots.links.length,
      sitemap: sitemap.links.length,
      crawl: crawl.links.length,
      durationMs,
    });

    return { links, sources, durationMs };
  }

  /**
   * Runs one source; its failure becomes an empty contribution plus an
   * error string. Cancellation is not a source failure and propagates.
   */
  private async boundary(
    source: DiscoverySource,
    baseUrl: string,
    signal: AbortSignal | undefined,
    run: () => Promise<DiscoveredLink[]>
  ): Promise<SourceOutcome> {
    try {
      return { links: await run() };
    } catch (error) {
      if (signal?.aborted) {
        return { links: [], error: 'cancelled' };
      }
      const message = errorMessage(error);
      log.warn('Discovery source failed', { source, url: baseUrl, error: message });
      return { links: [], error: message };
    }
  }

  private fetchOptions(options: LinkDiscoveryOptions, timeoutKey: 'DISCOVERY_FETCH' | 'CRAWL_FETCH' = 'DISCOVERY_FETCH') {
    return {
      timeout: getTimeout(timeoutKey, options.requestTimeoutMs),
      userAgent: options.userAgent,
      fetchFn: this.fetchFn,
      signal: options.signal,
    };
  }

  private robotsLinks(robotsTxt: ParsedRobotsTxt, baseUrl: string, maxLinks: number): DiscoveredLink[] {
    return robotsPathsToUrls(robotsTxt, baseUrl)
      .slice(0, maxLinks)
      .map((url): DiscoveredLink => ({ url, source: 'robots', depth: 0 }));
  }

  private async sitemapLinks(
    baseUrl: string,
    declaredSitemaps: string[],
    options: LinkDiscoveryOptions
  ): Promise<DiscoveredLink[]> {
    const collection = await collectSitemapUrls(baseUrl, declaredSitemaps, {
      ...this.fetchOptions(options),
      maxSitemaps: options.maxSitemaps,
      maxUrls: options.maxLinks,
    });

    if (collection.urls.length === 0 && collection.sitemapsRead.length === 0 && collection.errors.length > 0) {
      throw new Error(`No sitemap could be read: ${collection.errors.join('; ')}`);
    }

    return collection.urls.map((url): DiscoveredLink => ({ url, source: 'sitemap', depth: 0 }));
  }

  /**
   * Breadth-first crawl. Pages are fetched only for their anchors; at most
   * `crawlLinksPerPage` new links per page are queued for the next level.
   */
  private async crawlLinks(baseUrl: string, options: LinkDiscoveryOptions): Promise<DiscoveredLink[]> {
    const { maxLinks, maxCrawlDepth, maxCrawlPages, crawlLinksPerPage, signal } = options;
    const fetchOptions = this.fetchOptions(options, 'CRAWL_FETCH');

    // Base page failure fails the whole source
    const base = await fetchText(baseUrl, fetchOptions);
    if (!base.ok) {
      throw new Error(`Base page returned HTTP ${base.status}`);
    }

    const siteUrl = isSameSite(base.finalUrl, baseUrl) ? baseUrl : base.finalUrl;
    const links: DiscoveredLink[] = [{ url: baseUrl, source: 'crawl', depth: 0 }];
    const seen = new Set<string>([baseUrl]);
    const pages = new Map<string, string>([[baseUrl, base.body]]);
    let pagesFetched = 1;
    let frontier = [baseUrl];

    for (let depth = 0; depth < maxCrawlDepth && frontier.length > 0; depth++) {
      const next: string[] = [];

      for (const pageUrl of frontier) {
        if (links.length >= maxLinks) return links;

        let html = pages.get(pageUrl);
        if (html === undefined) {
          if (pagesFetched >= maxCrawlPages) return links;
          throwIfAborted(signal);
          pagesFetched++;
          try {
            const page = await fetchText(pageUrl, fetchOptions);
            if (!page.ok || !page.contentType.includes('html')) continue;
            html = page.body;
          } catch (error) {
            if (signal?.aborted) throw error;
            log.debug('Crawl fetch failed', { url: pageUrl, error: errorMessage(error) });
            continue;
          }
        }

        let followed = 0;
        for (const url of extractPageLinks(html, pageUrl, siteUrl)) {
          if (seen.has(url)) continue;
          seen.add(url);
          links.push({ url, source: 'crawl', depth: depth + 1 });
          if (links.length >= maxLinks) return links;
          if (followed < crawlLinksPerPage) {
            next.push(url);
            followed++;
          }
        }
      }

      frontier = next;
    }

    return links;
  }
}
