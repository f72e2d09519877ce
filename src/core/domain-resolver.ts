/**
 * Domain resolution for targets that arrive without a website.
 */

import { logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/abort.js';
import { getTimeout } from '../utils/timeouts.js';
import { normalizeUrl } from '../utils/url-utils.js';
import { DomainResolutionError, describeFetchFailure } from '../types/errors.js';
import { fetchText, type FetchFn } from './robots-sitemap-discovery.js';

const log = logger.create('DomainResolver');

export interface DomainResolver {
  /** Base URL of the company's site; throws DomainResolutionError */
  resolve(companyName: string, options?: { signal?: AbortSignal }): Promise<string>;
}

const LEGAL_SUFFIXES = new Set([
  'inc', 'incorporated', 'llc', 'ltd', 'limited', 'corp', 'corporation', 'co', 'company',
  'gmbh', 'ag', 'sa', 'sas', 'sarl', 'bv', 'nv', 'plc', 'pty', 'srl', 'spa', 'oy', 'ab', 'as', 'kg',
]);

const PROBE_TLDS = ['com', 'io', 'co', 'ai'];

/**
 * `Acme Widgets, Inc.` -> `acmewidgets`
 */
export function companySlug(companyName: string): string {
  const words = companyName
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/&/g, ' and ')
    .split(/[^a-z0-9]+/)
    .filter(Boolean);

  while (words.length > 1 && LEGAL_SUFFIXES.has(words[words.length - 1])) {
    words.pop();
  }
  return words.join('');
}

export interface HeuristicDomainResolverOptions {
  fetchFn?: FetchFn;
  userAgent?: string;
  timeoutMs?: number;
}

/**
 * Probes `https://<slug>.<tld>` for each candidate TLD in order and takes
 * the first that answers.
 */
export class HeuristicDomainResolver implements DomainResolver {
  constructor(private readonly options: HeuristicDomainResolverOptions = {}) {}

  async resolve(companyName: string, options: { signal?: AbortSignal } = {}): Promise<string> {
    const slug = companySlug(companyName);
    if (!slug) {
      throw new DomainResolutionError(companyName, []);
    }

    const probed: string[] = [];
    for (const tld of PROBE_TLDS) {
      throwIfAborted(options.signal);
      const candidate = `https://${slug}.${tld}/`;
      probed.push(candidate);

      try {
        const response = await fetchText(candidate, {
          timeout: getTimeout('DOMAIN_PROBE', this.options.timeoutMs),
          ...(this.options.fetchFn && { fetchFn: this.options.fetchFn }),
          ...(this.options.userAgent !== undefined && { userAgent: this.options.userAgent }),
          signal: options.signal,
        });
        if (response.ok) {
          const resolved = normalizeUrl(new URL(response.finalUrl).origin) ?? candidate;
          log.info('Resolved company website', { companyName, url: resolved });
          return resolved;
        }
        log.debug('Domain probe rejected', { url: candidate, status: response.status });
      } catch (error) {
        throwIfAborted(options.signal);
        log.debug('Domain probe failed', { url: candidate, error: describeFetchFailure(error) });
      }
    }

    log.warn('Could not resolve company website', { companyName, probed });
    throw new DomainResolutionError(companyName, probed);
  }
}
