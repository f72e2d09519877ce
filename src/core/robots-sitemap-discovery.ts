/**
 * Robots.txt & Sitemap Parsing
 *
 * Turns robots.txt directives and sitemap XML into candidate page URLs
 * for the link discovery engine.
 */

import { logger } from '../utils/logger.js';
import { linkSignals } from '../utils/abort.js';
import { isAssetUrl, isSameSite, normalizeUrl, resolveHttpUrl } from '../utils/url-utils.js';
import { getTimeout } from '../utils/timeouts.js';

const robotsLogger = logger.create('RobotsSitemapDiscovery');

// ============================================
// TYPES
// ============================================

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Parsed robots.txt directives
 */
export interface ParsedRobotsTxt {
  /** Disallow directives for user-agent * or all user agents */
  disallowPaths: string[];
  /** Allow directives for user-agent * or all user agents */
  allowPaths: string[];
  /** Sitemap URLs referenced */
  sitemapUrls: string[];
}

export type ChangeFrequency = 'always' | 'hourly' | 'daily' | 'weekly' | 'monthly' | 'yearly' | 'never';

export interface SitemapEntry {
  loc: string;
  lastmod?: string;
  changefreq?: ChangeFrequency;
  priority?: number;
}

/**
 * Parsed sitemap (can be sitemap or sitemap index)
 */
export interface ParsedSitemap {
  type: 'sitemap' | 'sitemapindex';
  /** URL entries (for sitemap) */
  entries: SitemapEntry[];
  /** Child sitemap URLs (for sitemapindex) */
  sitemapUrls: string[];
}

export interface TextFetchOptions {
  timeout?: number;
  headers?: Record<string, string>;
  userAgent?: string;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
}

export interface TextFetchResult {
  ok: boolean;
  status: number;
  body: string;
  contentType: string;
  finalUrl: string;
}

export interface SitemapCollection {
  /** Normalized page URLs in document order */
  urls: string[];
  /** Sitemap documents that were read */
  sitemapsRead: string[];
  /** Per-document failures */
  errors: string[];
}

// ============================================
// CONSTANTS
// ============================================

const CHANGE_FREQUENCIES: readonly ChangeFrequency[] = [
  'always', 'hourly', 'daily', 'weekly', 'monthly', 'yearly', 'never',
];

/** Locale segments that mark a translated sitemap (`/de/`, `sitemap-fr.xml`) */
const LOCALIZED_SITEMAP = /(^|[/_.-])(de|fr|es|it|nl|pt|br|ja|jp|zh|cn|tw|ko|kr|ru|pl|sv|se|da|dk|fi|no|tr|ar|he|cs|hu)([/_.-]|$)/i;

/** Main sitemap file names, preferred over any other candidate */
const MAIN_SITEMAP = /\/(sitemap|sitemap[_-]index|sitemapindex)\.xml$/i;

/** English or US variants, preferred after the main files */
const ENGLISH_SITEMAP = /(^|[/_.-])(en|us|en-us|en_us)([/_.-]|$)/i;

// ============================================
// ROBOTS.TXT PARSING
// ============================================

/**
 * Parse robots.txt content into structured format
 */
export function parseRobotsTxt(content: string): ParsedRobotsTxt {
  const result: ParsedRobotsTxt = {
    disallowPaths: [],
    allowPaths: [],
    sitemapUrls: [],
  };

  let currentUserAgent = '';
  let isRelevantAgent = false;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    switch (directive) {
      case 'user-agent':
        currentUserAgent = value.toLowerCase();
        isRelevantAgent = currentUserAgent === '*';
        break;

      case 'disallow':
        if (value && (isRelevantAgent || !currentUserAgent)) {
          result.disallowPaths.push(value);
        }
        break;

      case 'allow':
        if (value && (isRelevantAgent || !currentUserAgent)) {
          result.allowPaths.push(value);
        }
        break;

      case 'sitemap':
        if (value) {
          result.sitemapUrls.push(value);
        }
        break;
    }
  }

  result.disallowPaths = [...new Set(result.disallowPaths)];
  result.allowPaths = [...new Set(result.allowPaths)];
  result.sitemapUrls = [...new Set(result.sitemapUrls)];

  return result;
}

/**
 * Candidate page URLs named by Allow and Disallow directives, Allow first.
 * Wildcard patterns are not URLs and are skipped.
 */
export function robotsPathsToUrls(robotsTxt: ParsedRobotsTxt, baseUrl: string): string[] {
  const urls: string[] = [];
  const seen = new Set<string>();

  for (const path of [...robotsTxt.allowPaths, ...robotsTxt.disallowPaths]) {
    if (path.includes('*') || path.includes('$') || !path.startsWith('/')) continue;

    const url = normalizeUrl(path, baseUrl);
    if (!url || seen.has(url) || isAssetUrl(url)) continue;

    seen.add(url);
    urls.push(url);
  }

  return urls;
}

// ============================================
// SITEMAP PARSING
// ============================================

function isChangeFrequency(value: string): value is ChangeFrequency {
  return CHANGE_FREQUENCIES.some((freq) => freq === value);
}

/**
 * Parse sitemap XML content
 */
export function parseSitemap(content: string): ParsedSitemap {
  const result: ParsedSitemap = {
    type: 'sitemap',
    entries: [],
    sitemapUrls: [],
  };

  if (content.includes('<sitemapindex')) {
    result.type = 'sitemapindex';

    for (const match of content.matchAll(/<sitemap>\s*<loc>([^<]+)<\/loc>/gi)) {
      result.sitemapUrls.push(decodeXmlEntities(match[1].trim()));
    }

    return result;
  }

  for (const urlMatch of content.matchAll(/<url>([\s\S]*?)<\/url>/gi)) {
    const urlBlock = urlMatch[1];

    const locMatch = /<loc>([^<]+)<\/loc>/i.exec(urlBlock);
    if (!locMatch) continue;

    const entry: SitemapEntry = {
      loc: decodeXmlEntities(locMatch[1].trim()),
    };

    const lastmodMatch = /<lastmod>([^<]+)<\/lastmod>/i.exec(urlBlock);
    if (lastmodMatch) {
      entry.lastmod = lastmodMatch[1].trim();
    }

    const changefreqMatch = /<changefreq>([^<]+)<\/changefreq>/i.exec(urlBlock);
    if (changefreqMatch) {
      const freq = changefreqMatch[1].trim().toLowerCase();
      if (isChangeFrequency(freq)) {
        entry.changefreq = freq;
      }
    }

    const priorityMatch = /<priority>([^<]+)<\/priority>/i.exec(urlBlock);
    if (priorityMatch) {
      const priority = parseFloat(priorityMatch[1].trim());
      if (!Number.isNaN(priority)) {
        entry.priority = priority;
      }
    }

    result.entries.push(entry);
  }

  return result;
}

function decodeXmlEntities(str: string): string {
  return str
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Drop translated variants when a non-translated candidate exists, put
 * the main sitemap files first, then English/US variants, and cap.
 */
export function selectSitemapCandidates(urls: string[], maxSitemaps: number): string[] {
  const unique = [...new Set(urls)];
  const withPaths = unique.map((url) => ({ url, path: resolveHttpUrl(url)?.pathname ?? url }));

  const unlocalized = withPaths.filter(({ path }) => !LOCALIZED_SITEMAP.test(path));
  const pool = unlocalized.length > 0 ? unlocalized : withPaths;

  const rank = (path: string): number => {
    if (MAIN_SITEMAP.test(path)) return 0;
    if (ENGLISH_SITEMAP.test(path)) return 1;
    return 2;
  };

  return pool
    .map((candidate, index) => ({ ...candidate, index, rank: rank(candidate.path) }))
    .sort((a, b) => a.rank - b.rank || a.index - b.index)
    .slice(0, maxSitemaps)
    .map(({ url }) => url);
}

// ============================================
// FETCH HELPERS
// ============================================

/**
 * Fetch a URL and read its body within one timeout
 */
export async function fetchText(url: string, options: TextFetchOptions = {}): Promise<TextFetchResult> {
  const {
    timeout = getTimeout('DISCOVERY_FETCH'),
    headers = {},
    fetchFn = fetch,
    userAgent,
  } = options;

  const linked = linkSignals([options.signal], timeout, `Request to ${url} timed out after ${timeout}ms`);

  try {
    const response = await fetchFn(url, {
      signal: linked.signal,
      redirect: 'follow',
      headers: {
        ...(userAgent ? { 'User-Agent': userAgent } : {}),
        Accept: 'text/html, text/plain, application/xml;q=0.9, */*;q=0.8',
        ...headers,
      },
    });
    const body = await response.text();
    return {
      ok: response.ok,
      status: response.status,
      body,
      contentType: response.headers.get('content-type') ?? '',
      finalUrl: response.url || url,
    };
  } finally {
    linked.dispose();
  }
}

// ============================================
// SOURCES
// ============================================

/**
 * Fetch and parse `<origin>/robots.txt`. A missing file (non-2xx) yields
 * null; network failures propagate.
 */
export async function fetchRobotsTxt(baseUrl: string, options: TextFetchOptions = {}): Promise<ParsedRobotsTxt | null> {
  const robotsUrl = `${new URL(baseUrl).origin}/robots.txt`;
  const response = await fetchText(robotsUrl, options);

  if (!response.ok) {
    robotsLogger.debug('No robots.txt', { url: robotsUrl, status: response.status });
    return null;
  }

  const robotsTxt = parseRobotsTxt(response.body);
  robotsLogger.debug('Parsed robots.txt', {
    url: robotsUrl,
    disallowPaths: robotsTxt.disallowPaths.length,
    allowPaths: robotsTxt.allowPaths.length,
    sitemapUrls: robotsTxt.sitemapUrls.length,
  });
  return robotsTxt;
}

/**
 * Read the selected sitemaps, following sitemap indexes one level, and
 * collect same-site page URLs up to `maxUrls`.
 */
export async function collectSitemapUrls(
  baseUrl: string,
  declaredSitemaps: string[],
  options: TextFetchOptions & { maxSitemaps: number; maxUrls: number }
): Promise<SitemapCollection> {
  const origin = new URL(baseUrl).origin;
  const candidates = declaredSitemaps.length > 0
    ? declaredSitemaps
    : [`${origin}/sitemap.xml`, `${origin}/sitemap_index.xml`];

  const collection: SitemapCollection = { urls: [], sitemapsRead: [], errors: [] };
  const seen = new Set<string>();

  const addEntries = (entries: SitemapEntry[]): void => {
    for (const entry of entries) {
      if (collection.urls.length >= options.maxUrls) return;
      const url = normalizeUrl(entry.loc);
      if (!url || seen.has(url) || !isSameSite(url, baseUrl) || isAssetUrl(url)) continue;
      seen.add(url);
      collection.urls.push(url);
    }
  };

  const readSitemap = async (sitemapUrl: string): Promise<ParsedSitemap | null> => {
    try {
      const response = await fetchText(sitemapUrl, options);
      if (!response.ok) {
        robotsLogger.debug('Sitemap not available', { url: sitemapUrl, status: response.status });
        return null;
      }
      const parsed = parseSitemap(response.body);
      collection.sitemapsRead.push(sitemapUrl);
      robotsLogger.debug('Parsed sitemap', {
        url: sitemapUrl,
        type: parsed.type,
        entries: parsed.entries.length,
        childSitemaps: parsed.sitemapUrls.length,
      });
      return parsed;
    } catch (error) {
      if (options.signal?.aborted) throw error;
      const message = error instanceof Error ? error.message : String(error);
      collection.errors.push(`${sitemapUrl}: ${message}`);
      robotsLogger.debug('Failed to fetch sitemap', { url: sitemapUrl, error: message });
      return null;
    }
  };

  for (const sitemapUrl of selectSitemapCandidates(candidates, options.maxSitemaps)) {
    if (collection.urls.length >= options.maxUrls) break;

    const parsed = await readSitemap(sitemapUrl);
    if (!parsed) continue;

    if (parsed.type === 'sitemap') {
      addEntries(parsed.entries);
      continue;
    }

    // Index: one level of children, nested indexes are not followed
    for (const childUrl of selectSitemapCandidates(parsed.sitemapUrls, options.maxSitemaps)) {
      if (collection.urls.length >= options.maxUrls) break;
      const child = await readSitemap(childUrl);
      if (child?.type === 'sitemap') {
        addEntries(child.entries);
      }
    }
  }

  return collection;
}
