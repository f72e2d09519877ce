/**
 * Page Fetcher
 *
 * Single-page HTTP(S) retrieval for extraction: timeout, browser-like
 * headers, cookies kept for the lifetime of the fetcher, and optional
 * script rendering through an injected renderer.
 */

import * as cheerio from 'cheerio';
import { CookieJar } from 'tough-cookie';
import { logger } from '../utils/logger.js';
import { abortError, linkSignals } from '../utils/abort.js';
import { getTimeout } from '../utils/timeouts.js';
import { DEFAULT_USER_AGENT, type RenderMode } from '../utils/config-schemas.js';
import { PageFetchError, PageTimeoutError, describeFetchFailure } from '../types/errors.js';
import type { FetchFn } from './robots-sitemap-discovery.js';

const log = logger.create('PageFetcher');

// ============================================
// TYPES
// ============================================

export interface FetchedPage {
  url: string;
  finalUrl: string;
  status: number;
  html: string;
  byteLength: number;
  contentType: string;
  rendered: boolean;
}

export interface PageFetchOptions {
  signal?: AbortSignal;
  timeoutMs: number;
}

export interface PageFetcher {
  fetchPage(url: string, options: PageFetchOptions): Promise<FetchedPage>;
}

/**
 * Script-capable renderer (headless browser, remote rendering service)
 * supplied by the caller. Returns the rendered document HTML.
 */
export interface PageRenderer {
  render(url: string, options: PageFetchOptions): Promise<string>;
}

export interface HttpPageFetcherOptions {
  userAgent?: string;
  renderMode?: RenderMode;
  renderer?: PageRenderer;
  fetchFn?: FetchFn;
  headers?: Record<string, string>;
}

// ============================================
// HELPERS
// ============================================

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml', 'text/plain'];

/** Static pages with less visible text than this are rendered in auto mode */
const SCRIPT_SHELL_TEXT_LIMIT = 200;

/**
 * Decode a response body with the charset its content type declares.
 * A missing or unknown label falls back to UTF-8.
 */
export function decodeBody(body: Uint8Array, contentType: string): string {
  const charset = /charset\s*=\s*["']?([\w.:-]+)/i.exec(contentType)?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset).decode(body);
    } catch (error) {
      log.debug('Unknown charset, decoding as UTF-8', { charset, error: String(error) });
    }
  }
  return new TextDecoder('utf-8').decode(body);
}

/**
 * True for a page that looks like a client-rendered shell: little visible
 * text but scripts present.
 */
export function needsScriptRendering(html: string): boolean {
  const $ = cheerio.load(html);
  const scripts = $('script').length;
  $('script, style, noscript, template').remove();
  const text = $('body').text().replace(/\s+/g, ' ').trim();
  return scripts > 0 && text.length < SCRIPT_SHELL_TEXT_LIMIT;
}

// ============================================
// FETCHER
// ============================================

export class HttpPageFetcher implements PageFetcher {
  private readonly cookieJar = new CookieJar();
  private readonly userAgent: string;
  private readonly renderMode: RenderMode;
  private readonly renderer?: PageRenderer;
  private readonly fetchFn: FetchFn;
  private readonly headers: Record<string, string>;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.renderMode = options.renderMode ?? 'never';
    this.renderer = options.renderer;
    this.fetchFn = options.fetchFn ?? fetch;
    this.headers = options.headers ?? {};

    if (this.renderMode !== 'never' && !this.renderer) {
      log.warn('Render mode set without a renderer; pages will be fetched statically', {
        renderMode: this.renderMode,
      });
    }
  }

  async fetchPage(url: string, options: PageFetchOptions): Promise<FetchedPage> {
    if (this.renderMode === 'always' && this.renderer) {
      return this.render(url, options);
    }

    const page = await this.fetchStatic(url, options);

    if (this.renderMode === 'auto' && this.renderer && needsScriptRendering(page.html)) {
      try {
        log.debug('Static page looks script-rendered, rendering', { url });
        return await this.render(url, options);
      } catch (error) {
        if (options.signal?.aborted) throw error;
        log.warn('Rendering failed, keeping static page', { url, error: describeFetchFailure(error) });
      }
    }

    return page;
  }

  private async render(url: string, options: PageFetchOptions): Promise<FetchedPage> {
    const renderer = this.renderer;
    if (!renderer) {
      throw new PageFetchError('No renderer configured', url);
    }
    const timeoutMs = Math.min(options.timeoutMs, getTimeout('RENDER'));
    const html = await renderer.render(url, { signal: options.signal, timeoutMs });
    return {
      url,
      finalUrl: url,
      status: 200,
      html,
      byteLength: Buffer.byteLength(html),
      contentType: 'text/html',
      rendered: true,
    };
  }

  private async fetchStatic(url: string, options: PageFetchOptions): Promise<FetchedPage> {
    const linked = linkSignals([options.signal], options.timeoutMs, `Fetch of ${url} timed out`);

    try {
      const headers: Record<string, string> = {
        'User-Agent': this.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        ...this.headers,
      };
      const cookieString = await this.cookieJar.getCookieString(url);
      if (cookieString) {
        headers.Cookie = cookieString;
      }

      const response = await this.fetchFn(url, {
        headers,
        signal: linked.signal,
        redirect: 'follow',
      });

      await this.storeCookies(response, url);

      if (!response.ok) {
        throw new PageFetchError(`HTTP ${response.status}`, url, response.status);
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (contentType && !HTML_CONTENT_TYPES.some((type) => contentType.includes(type))) {
        throw new PageFetchError(`Unsupported content type ${contentType}`, url, response.status);
      }

      const body = new Uint8Array(await response.arrayBuffer());
      return {
        url,
        finalUrl: response.url || url,
        status: response.status,
        html: decodeBody(body, contentType),
        byteLength: body.byteLength,
        contentType,
        rendered: false,
      };
    } catch (error) {
      if (options.signal?.aborted) {
        throw abortError(options.signal);
      }
      if (linked.signal.aborted) {
        throw new PageTimeoutError(url, options.timeoutMs);
      }
      if (error instanceof PageFetchError) {
        throw error;
      }
      throw new PageFetchError(describeFetchFailure(error), url, undefined, { cause: error });
    } finally {
      linked.dispose();
    }
  }

  private async storeCookies(response: Response, url: string): Promise<void> {
    for (const setCookie of response.headers.getSetCookie()) {
      try {
        await this.cookieJar.setCookie(setCookie, url);
      } catch (error) {
        log.debug('Ignoring invalid cookie', { url, error: describeFetchFailure(error) });
      }
    }
  }
}
