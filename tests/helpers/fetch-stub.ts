/**
 * In-process stand-in for fetch: serves canned responses by exact URL
 */

import { vi } from 'vitest';
import type { FetchFn } from '../../src/core/robots-sitemap-discovery.js';

export interface StubPage {
  status?: number;
  body?: string;
  contentType?: string;
  headers?: Record<string, string>;
  error?: Error;
}

export function createFetchStub(pages: Record<string, StubPage>) {
  return vi.fn<FetchFn>(async (url) => {
    const page = pages[url];
    if (!page) {
      return new Response('Not found', { status: 404, headers: { 'content-type': 'text/plain' } });
    }
    if (page.error) {
      throw page.error;
    }
    return new Response(page.body ?? '', {
      status: page.status ?? 200,
      headers: { 'content-type': page.contentType ?? 'text/html; charset=utf-8', ...page.headers },
    });
  });
}

export function htmlPage(body: string, title = 'Test page'): string {
  return `<!doctype html><html><head><title>${title}</title></head><body>${body}</body></html>`;
}

export function sitemapXml(urls: string[]): string {
  const entries = urls.map((url) => `  <url><loc>${url}</loc></url>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>\n<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n${entries}\n</urlset>`;
}

export function sitemapIndexXml(urls: string[]): string {
  const entries = urls.map((url) => `  <sitemap><loc>${url}</loc></sitemap>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>\n<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n${entries}\n</sitemapindex>`;
}
