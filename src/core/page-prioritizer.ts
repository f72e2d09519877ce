/**
 * Page Prioritizer
 *
 * One model call ranks the discovered links; the reply is held to the
 * discovered set so no invented URL survives. Provider failures, malformed
 * replies and empty selections all fall back to a path-keyword heuristic.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { normalizeUrl, urlPath } from '../utils/url-utils.js';
import { parseWithFixers } from '../utils/json-response.js';
import type { ProviderRouter, RouteCallOptions } from '../providers/provider-router.js';
import type { CompletionRequest } from '../providers/types.js';
import type {
  DiscoveredLink,
  PrioritizationResult,
  PrioritizedPage,
  ResearchTarget,
} from '../types/research.js';

const log = logger.prioritizer;

// ============================================
// HEURISTIC
// ============================================

/** Path fragments and their weights; the highest matching weight wins */
export const HEURISTIC_KEYWORDS: ReadonlyArray<readonly [string, number]> = [
  ['contact', 10],
  ['about', 9],
  ['team', 8],
  ['leadership', 7],
  ['career', 7],
  ['management', 6],
  ['company', 6],
  ['service', 5],
  ['product', 5],
  ['pricing', 5],
  ['history', 4],
  ['our-story', 4],
];

export function heuristicScore(url: string): number {
  const path = urlPath(url).toLowerCase();
  let best = 0;
  for (const [keyword, weight] of HEURISTIC_KEYWORDS) {
    if (path.includes(keyword) && weight > best) {
      best = weight;
    }
  }
  return best;
}

/**
 * Keyword-scored links first (ties in discovery order), then the rest in
 * discovery order, up to `maxPages`.
 */
export function heuristicSelect(links: DiscoveredLink[], maxPages: number): PrioritizedPage[] {
  const scored = links
    .map((link, index) => ({ link, index, score: heuristicScore(link.url) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index);

  const chosen = new Set<string>();
  const ordered: Array<{ link: DiscoveredLink; rationale: string }> = [];

  for (const { link, score } of scored) {
    if (ordered.length >= maxPages) break;
    chosen.add(link.url);
    ordered.push({ link, rationale: `Path keyword match (score ${score})` });
  }
  for (const link of links) {
    if (ordered.length >= maxPages) break;
    if (chosen.has(link.url)) continue;
    chosen.add(link.url);
    ordered.push({ link, rationale: 'Discovery order fill' });
  }

  return ordered.map(({ link, rationale }, index) => ({ ...link, rank: index + 1, rationale }));
}

// ============================================
// SAMPLING
// ============================================

function listLineLength(link: DiscoveredLink, position: number): number {
  return `${position}. ${link.url}\n`.length;
}

/**
 * Deterministic subset of `links` whose numbered listing fits in
 * `budgetChars`: keyword-matching links first, then evenly spaced links
 * from the remainder. Returned in discovery order.
 */
export function sampleLinks(links: DiscoveredLink[], budgetChars: number): DiscoveredLink[] {
  const total = links.reduce((sum, link, index) => sum + listLineLength(link, index + 1), 0);
  if (total <= budgetChars) {
    return links;
  }

  const chosen = new Set<number>();
  let used = 0;
  const take = (index: number): boolean => {
    const cost = listLineLength(links[index], links.length);
    if (used + cost > budgetChars) return false;
    chosen.add(index);
    used += cost;
    return true;
  };

  links.forEach((link, index) => {
    if (heuristicScore(link.url) > 0) take(index);
  });

  const rest = links.map((_, index) => index).filter((index) => !chosen.has(index));
  if (rest.length > 0) {
    const averageCost = rest.reduce((sum, index) => sum + listLineLength(links[index], links.length), 0) / rest.length;
    const slots = Math.floor((budgetChars - used) / averageCost);
    if (slots > 0) {
      const step = rest.length / Math.min(slots, rest.length);
      for (let position = 0; position < rest.length; position += step) {
        take(rest[Math.floor(position)]);
      }
    }
  }

  return [...chosen].sort((a, b) => a - b).map((index) => links[index]);
}

// ============================================
// PROMPT
// ============================================

const selectionReplySchema = z.object({
  pages: z.array(
    z.union([
      z.string().min(1),
      z.object({
        url: z.string().min(1),
        reason: z.string().optional(),
      }),
    ])
  ),
});

type SelectionReply = z.infer<typeof selectionReplySchema>;

const SYSTEM_PROMPT =
  'You choose which pages of a company website to read in order to profile the company. ' +
  'Answer with a single JSON object and nothing else. Only use URLs from the list you are given.';

export function buildSelectionPrompt(
  links: DiscoveredLink[],
  target: ResearchTarget,
  baseUrl: string,
  maxPages: number
): string {
  const listing = links.map((link, index) => `${index + 1}. ${link.url}`).join('\n');
  const context = target.context ? `Context: ${target.context}\n` : '';

  return (
    `Company: ${target.companyName}\n` +
    `Website: ${baseUrl}\n` +
    context +
    '\n' +
    `Select at most ${maxPages} URLs from the list below that are most likely to describe ` +
    "the company's founding and history, leadership and team, products and services, pricing, " +
    'customers and business model. Prefer overview pages over individual blog posts, news items ' +
    'or legal pages. Order them from most to least useful.\n\n' +
    'Reply in this format:\n' +
    '{"pages":[{"url":"<url from the list>","reason":"<one short sentence>"}]}\n\n' +
    `URLs:\n${listing}`
  );
}

// ============================================
// PRIORITIZER
// ============================================

export interface PrioritizeOptions extends RouteCallOptions {
  maxPages: number;
}

export class PagePrioritizer {
  constructor(private readonly router: ProviderRouter) {}

  async prioritize(
    links: DiscoveredLink[],
    target: ResearchTarget,
    baseUrl: string,
    options: PrioritizeOptions
  ): Promise<PrioritizationResult> {
    const { maxPages, signal } = options;
    if (links.length === 0) {
      return { pages: [], degraded: false };
    }

    let reply: SelectionReply;
    try {
      reply = await this.requestSelection(links, target, baseUrl, options);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      log.warn('Page selection failed, using heuristic', { error: reason });
      return this.fallback(links, maxPages, reason);
    }

    const pages = this.applySelection(reply, links, baseUrl, maxPages);
    if (pages.length === 0) {
      log.warn('Model returned no usable URLs, using heuristic', { returned: reply.pages.length });
      return this.fallback(links, maxPages, 'Model returned no usable URLs');
    }

    log.info('Pages prioritized', { candidates: links.length, selected: pages.length });
    return { pages, degraded: false };
  }

  private async requestSelection(
    links: DiscoveredLink[],
    target: ResearchTarget,
    baseUrl: string,
    options: PrioritizeOptions
  ): Promise<SelectionReply> {
    const frame = buildSelectionPrompt([], target, baseUrl, options.maxPages);
    const budget = this.router.contextBudgetChars('page-selection') - frame.length;
    const sample = sampleLinks(links, Math.max(0, budget));
    if (sample.length < links.length) {
      log.info('Link list sampled to fit context budget', { total: links.length, sampled: sample.length });
    }

    const request: CompletionRequest = {
      kind: 'completion',
      purpose: 'page-selection',
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildSelectionPrompt(sample, target, baseUrl, options.maxPages) }],
      maxOutputTokens: Math.min(4096, 256 + options.maxPages * 64),
      temperature: 0,
      json: true,
    };

    const { value } = await this.router.complete(request, options);
    const parsed = parseWithFixers(value.text, selectionReplySchema);
    if (!parsed.success) {
      throw new Error(`Malformed page selection reply: ${parsed.error}`);
    }
    return parsed.data;
  }

  /**
   * Hold the reply to the discovered set, dedupe and cap
   */
  private applySelection(
    reply: SelectionReply,
    links: DiscoveredLink[],
    baseUrl: string,
    maxPages: number
  ): PrioritizedPage[] {
    const known = new Map(links.map((link) => [link.url, link]));
    const seen = new Set<string>();
    const pages: PrioritizedPage[] = [];
    let rejected = 0;

    for (const entry of reply.pages) {
      if (pages.length >= maxPages) break;
      const href = typeof entry === 'string' ? entry : entry.url;
      const reason = typeof entry === 'string' ? undefined : entry.reason;
      const normalized = normalizeUrl(href.trim(), baseUrl);
      const link = normalized ? known.get(normalized) : undefined;

      if (!link) {
        rejected++;
        continue;
      }
      if (seen.has(link.url)) continue;
      seen.add(link.url);
      pages.push({ ...link, rank: pages.length + 1, rationale: reason?.trim() || 'Selected by model' });
    }

    if (rejected > 0) {
      log.debug('Dropped URLs outside the discovered set', { rejected });
    }
    return pages;
  }

  private fallback(links: DiscoveredLink[], maxPages: number, reason: string): PrioritizationResult {
    return { pages: heuristicSelect(links, maxPages), degraded: true, degradedReason: reason };
  }
}
