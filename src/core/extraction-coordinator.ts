/**
 * Concurrent Extraction Coordinator
 *
 * Fetches prioritized pages through a bounded worker pool and records one
 * PageExtractionResult per page. Workers never throw across the pool
 * boundary: every failure becomes a status on that page's result. Only
 * cancellation ends the batch early, and then only completed results are
 * kept.
 */

import { logger } from '../utils/logger.js';
import { abortedByTimeout, linkSignals, raceAbort, throwIfAborted } from '../utils/abort.js';
import { InvalidArgumentsError, PageFetchError, PageTimeoutError, PipelineCancelledError, describeFetchFailure } from '../types/errors.js';
import type {
  ExtractionBatch,
  PageExtractionResult,
  PageStatus,
  PrioritizedPage,
} from '../types/research.js';
import type { PageFetcher } from './page-fetcher.js';
import type { ExtractionStrategyChain } from './extraction-strategies.js';

const log = logger.coordinator;

export interface ExtractionOptions {
  concurrency: number;
  perPageTimeoutMs: number;
  signal?: AbortSignal;
  /** Called once per finished page, in completion order */
  onPageComplete?: (result: PageExtractionResult, completed: number, total: number) => void;
  /** Called when a worker picks a page up, in rank order */
  onPageStart?: (page: PrioritizedPage) => void;
}

// ============================================
// BATCH ASSEMBLY
// ============================================

/**
 * Re-sort completed results to rank order and compute the aggregates
 */
export function buildExtractionBatch(results: PageExtractionResult[]): ExtractionBatch {
  const ordered = [...results].sort((a, b) => a.rank - b.rank);
  const statusCounts: Record<PageStatus, number> = {
    success: 0,
    empty: 0,
    fetch_error: 0,
    extract_error: 0,
    timeout: 0,
  };
  let totalChars = 0;

  for (const result of ordered) {
    statusCounts[result.status]++;
    if (result.status === 'success') {
      totalChars += result.charLength;
    }
  }

  return {
    results: ordered,
    attempted: ordered.length,
    succeeded: statusCounts.success,
    totalChars,
    statusCounts,
  };
}

// ============================================
// COORDINATOR
// ============================================

export class ExtractionCoordinator {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly chain: ExtractionStrategyChain
  ) {}

  async extractAll(pages: PrioritizedPage[], options: ExtractionOptions): Promise<ExtractionBatch> {
    const { signal, concurrency } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidArgumentsError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    const startTime = Date.now();
    const completed: PageExtractionResult[] = [];
    const pending = new Set<Promise<void>>();
    let cancelled = false;

    const runWorker = async (page: PrioritizedPage): Promise<void> => {
      const result = Object.freeze(await this.extractPage(page, options));
      if (cancelled) return;
      completed.push(result);
      log.debug('Page extracted', {
        url: page.url,
        rank: page.rank,
        status: result.status,
        chars: result.charLength,
        durationMs: result.elapsedMs,
      });
      options.onPageComplete?.(result, completed.length, pages.length);
    };

    const runAll = async (): Promise<void> => {
      for (const page of pages) {
        while (pending.size >= concurrency) {
          await Promise.race(pending);
        }
        if (signal?.aborted) break;

        options.onPageStart?.(page);
        const task: Promise<void> = runWorker(page)
          .catch((error: unknown) => {
            // Reached only by cancellation; the batch error reports it
            log.debug('Worker abandoned', { url: page.url, error: describeFetchFailure(error) });
          })
          .finally(() => {
            pending.delete(task);
          });
        pending.add(task);
      }

      await Promise.all(pending);
    };

    try {
      throwIfAborted(signal);
      await raceAbort(runAll(), signal);
    } catch (error) {
      if (signal?.aborted) {
        cancelled = true;
        const partial = buildExtractionBatch(completed);
        log.warn('Extraction cancelled', {
          completed: partial.attempted,
          total: pages.length,
          inFlight: pending.size,
        });
        throw new PipelineCancelledError(
          abortedByTimeout(signal) ? 'timeout' : 'aborted',
          { batch: partial, providerCalls: [] },
          error
        );
      }
      throw error;
    }

    const batch = buildExtractionBatch(completed);
    log.info('Extraction complete', {
      attempted: batch.attempted,
      succeeded: batch.succeeded,
      totalChars: batch.totalChars,
      statusCounts: batch.statusCounts,
      durationMs: Date.now() - startTime,
    });
    return batch;
  }

  /**
   * One worker: fetch, then run the strategy chain, all under the page
   * timeout. A fetcher that ignores its signal is abandoned at the deadline.
   */
  private async extractPage(page: PrioritizedPage, options: ExtractionOptions): Promise<PageExtractionResult> {
    const startTime = Date.now();
    const { perPageTimeoutMs, signal } = options;
    const linked = linkSignals([signal], perPageTimeoutMs, `Page extraction exceeded ${perPageTimeoutMs}ms`);
    const base = { url: page.url, rank: page.rank };

    try {
      const fetched = await raceAbort(
        this.fetcher.fetchPage(page.url, { signal: linked.signal, timeoutMs: perPageTimeoutMs }),
        linked.signal
      );
      throwIfAborted(linked.signal);

      const outcome = this.chain.extract({ html: fetched.html, url: fetched.finalUrl });
      const elapsedMs = Date.now() - startTime;
      const measured = { byteLength: fetched.byteLength, elapsedMs };

      switch (outcome.kind) {
        case 'substantial':
          return {
            ...base,
            ...measured,
            status: 'success',
            strategy: outcome.strategy,
            text: outcome.text,
            charLength: outcome.text.length,
          };
        case 'insufficient':
          return {
            ...base,
            ...measured,
            status: 'empty',
            strategy: null,
            text: outcome.text,
            charLength: outcome.text.length,
          };
        case 'failed':
          return {
            ...base,
            ...measured,
            status: 'extract_error',
            error: outcome.error,
            text: '',
            charLength: 0,
          };
      }
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const elapsedMs = Date.now() - startTime;
      const empty = { ...base, text: '', charLength: 0, byteLength: 0, elapsedMs };

      if (error instanceof PageTimeoutError || (linked.signal.aborted && abortedByTimeout(linked.signal))) {
        return { ...empty, status: 'timeout', error: `Timed out after ${perPageTimeoutMs}ms` };
      }
      if (error instanceof PageFetchError) {
        return {
          ...empty,
          status: 'fetch_error',
          error: error.message,
          ...(error.httpStatus !== undefined && { httpStatus: error.httpStatus }),
        };
      }
      return { ...empty, status: 'fetch_error', error: describeFetchFailure(error) };
    } finally {
      linked.dispose();
    }
  }
}
