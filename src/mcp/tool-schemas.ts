/**
 * MCP Tool Schemas
 *
 * JSON Schema descriptions advertised by ListTools. The handlers validate
 * the same arguments with zod.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const researchCompanySchema: Tool = {
  name: 'research_company',
  description: `Research a company from its public website.

Discovers the site's pages (robots.txt, sitemaps, crawl), has a language model pick the pages most likely to describe the company, extracts them concurrently and synthesizes a structured profile.

Returns: narrative profile, structured fields (industry, business model, target market, services, leadership, ...), per-page extraction status, warnings for degraded stages and the provider calls made.

Omit url to have the website guessed from the company name.`,
  inputSchema: {
    type: 'object',
    properties: {
      companyName: { type: 'string', description: 'Company to research' },
      url: { type: 'string', description: 'Company website (domain or URL)' },
      context: { type: 'string', description: 'Hints for page selection and synthesis, e.g. what the profile is for' },
      maxLinks: { type: 'number', description: 'Cap on discovered links (default: 1000)' },
      maxCrawlDepth: { type: 'number', description: 'Crawl depth from the home page (default: 3)' },
      maxPrioritizedPages: { type: 'number', description: 'Pages to extract (default: 25)' },
      concurrency: { type: 'number', description: 'Parallel page fetches (default: 10)' },
      perPageTimeoutMs: { type: 'number', description: 'Timeout per page in ms (default: 15000)' },
      globalTimeoutMs: { type: 'number', description: 'Timeout for the whole run in ms, 0 for none (default: 0)' },
      minSubstantialContentLength: {
        type: 'number',
        description: 'Characters a page needs to count as content (default: 500)',
      },
      includePageText: { type: 'boolean', description: 'Include extracted page text in the result (default: false)' },
    },
    required: ['companyName'],
  },
};

export const discoverLinksSchema: Tool = {
  name: 'discover_links',
  description: `List the pages of a website from robots.txt, its sitemaps and a shallow crawl.

Returns: deduplicated links with their discovery source and depth, plus per-source counts and errors.`,
  inputSchema: {
    type: 'object',
    properties: {
      url: { type: 'string', description: 'Website (domain or URL)' },
      maxLinks: { type: 'number', description: 'Cap on links returned (default: 1000)' },
      maxCrawlDepth: { type: 'number', description: 'Crawl depth from the home page (default: 3)' },
    },
    required: ['url'],
  },
};

export function getAllToolSchemas(): Tool[] {
  return [researchCompanySchema, discoverLinksSchema];
}
