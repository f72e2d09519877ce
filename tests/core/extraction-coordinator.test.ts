/**
 * Tests for the Concurrent Extraction Coordinator
 */

import { describe, it, expect } from 'vitest';
import { ExtractionCoordinator, buildExtractionBatch } from '../../src/core/extraction-coordinator.js';
import { ExtractionStrategyChain } from '../../src/core/extraction-strategies.js';
import type { FetchedPage, PageFetcher, PageFetchOptions } from '../../src/core/page-fetcher.js';
import { InvalidArgumentsError, PageFetchError, PipelineCancelledError } from '../../src/types/errors.js';
import type { PageExtractionResult, PrioritizedPage } from '../../src/types/research.js';
import { sleep } from '../../src/utils/abort.js';

const SUBSTANTIAL = 'Company overview text. '.repeat(5);

type PageBehavior = (options: PageFetchOptions) => Promise<string>;

/** Serves page bodies by URL; the body doubles as the extracted text */
class ScriptedFetcher implements PageFetcher {
  inFlight = 0;
  maxInFlight = 0;
  readonly requested: string[] = [];

  constructor(private readonly behaviors: Record<string, PageBehavior>, private readonly fallback: PageBehavior) {}

  async fetchPage(url: string, options: PageFetchOptions): Promise<FetchedPage> {
    this.requested.push(url);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const html = await (this.behaviors[url] ?? this.fallback)(options);
      return {
        url,
        finalUrl: url,
        status: 200,
        html,
        byteLength: html.length,
        contentType: 'text/html',
        rendered: false,
      };
    } finally {
      this.inFlight--;
    }
  }
}

const passthroughChain = new ExtractionStrategyChain(50, [
  {
    name: 'selectors',
    extract: ({ html }) => {
      if (html === 'unparseable') throw new Error('markup rejected');
      return html;
    },
  },
]);

function pages(count: number): PrioritizedPage[] {
  return Array.from({ length: count }, (_, i) => ({
    url: `https://example.com/p${i + 1}`,
    source: 'crawl' as const,
    depth: 1,
    rank: i + 1,
    rationale: 'test',
  }));
}

const respond =
  (body: string, delayMs = 0): PageBehavior =>
  async () => {
    await sleep(delayMs);
    return body;
  };

/** Never settles and ignores its signal */
const hang: PageBehavior = () => new Promise<string>(() => undefined);

/** Settles only by rejecting when its signal fires */
const waitForAbort: PageBehavior = (options) =>
  new Promise<string>((_resolve, reject) => {
    options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('buildExtractionBatch', () => {
  it('should sort by rank and count statuses', () => {
    const results: PageExtractionResult[] = [
      { url: 'b', rank: 2, status: 'empty', strategy: null, text: 'x', charLength: 1, byteLength: 5, elapsedMs: 1 },
      {
        url: 'a',
        rank: 1,
        status: 'success',
        strategy: 'readability',
        text: 'hello',
        charLength: 5,
        byteLength: 9,
        elapsedMs: 1,
      },
      { url: 'c', rank: 3, status: 'timeout', error: 'late', text: '', charLength: 0, byteLength: 0, elapsedMs: 1 },
    ];

    const batch = buildExtractionBatch(results);

    expect(batch.results.map((r) => r.rank)).toEqual([1, 2, 3]);
    expect(batch.attempted).toBe(3);
    expect(batch.succeeded).toBe(1);
    expect(batch.totalChars).toBe(5);
    expect(batch.statusCounts).toEqual({ success: 1, empty: 1, fetch_error: 0, extract_error: 0, timeout: 1 });
  });
});

describe('ExtractionCoordinator', () => {
  it('should never exceed the concurrency limit', async () => {
    const fetcher = new ScriptedFetcher({}, respond(SUBSTANTIAL, 10));
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const batch = await coordinator.extractAll(pages(8), { concurrency: 3, perPageTimeoutMs: 1000 });

    expect(fetcher.maxInFlight).toBe(3);
    expect(batch.attempted).toBe(8);
    expect(batch.succeeded).toBe(8);
  });

  it('should return results in rank order regardless of completion order', async () => {
    const fetcher = new ScriptedFetcher(
      {
        'https://example.com/p1': respond(SUBSTANTIAL, 40),
        'https://example.com/p2': respond(SUBSTANTIAL, 20),
      },
      respond(SUBSTANTIAL, 0)
    );
    const completionOrder: number[] = [];
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const batch = await coordinator.extractAll(pages(3), {
      concurrency: 3,
      perPageTimeoutMs: 1000,
      onPageComplete: (result) => completionOrder.push(result.rank),
    });

    expect(completionOrder).toEqual([3, 2, 1]);
    expect(batch.results.map((r) => r.rank)).toEqual([1, 2, 3]);
  });

  it('should not let a hung page block the others', async () => {
    const fetcher = new ScriptedFetcher({ 'https://example.com/p1': hang }, respond(SUBSTANTIAL, 5));
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const batch = await coordinator.extractAll(pages(4), { concurrency: 2, perPageTimeoutMs: 50 });

    expect(batch.attempted).toBe(4);
    expect(batch.succeeded).toBe(3);
    expect(batch.results[0]).toMatchObject({
      url: 'https://example.com/p1',
      status: 'timeout',
      error: 'Timed out after 50ms',
      text: '',
      charLength: 0,
    });
  });

  it('should map each failure to a page status', async () => {
    const fetcher = new ScriptedFetcher(
      {
        'https://example.com/p1': respond(SUBSTANTIAL),
        'https://example.com/p2': respond('Too short'),
        'https://example.com/p3': async () => {
          throw new PageFetchError('HTTP 404', 'https://example.com/p3', 404);
        },
        'https://example.com/p4': async () => {
          throw new Error('socket hang up');
        },
        'https://example.com/p5': respond('unparseable'),
      },
      respond(SUBSTANTIAL)
    );
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const batch = await coordinator.extractAll(pages(5), { concurrency: 5, perPageTimeoutMs: 1000 });

    expect(batch.results[0]).toMatchObject({ status: 'success', strategy: 'selectors', charLength: SUBSTANTIAL.length });
    expect(batch.results[1]).toMatchObject({ status: 'empty', strategy: null, text: 'Too short', charLength: 9 });
    expect(batch.results[2]).toMatchObject({ status: 'fetch_error', error: 'HTTP 404', httpStatus: 404 });
    expect(batch.results[3]).toMatchObject({ status: 'fetch_error', error: 'socket hang up' });
    expect(batch.results[3]).not.toHaveProperty('httpStatus');
    expect(batch.results[4]).toMatchObject({ status: 'extract_error', error: 'selectors: markup rejected' });
    expect(batch.succeeded).toBe(1);
    expect(batch.totalChars).toBe(SUBSTANTIAL.length);
  });

  it('should keep only completed pages when cancelled', async () => {
    const controller = new AbortController();
    const fetcher = new ScriptedFetcher(
      {
        'https://example.com/p1': respond(SUBSTANTIAL),
        'https://example.com/p2': respond(SUBSTANTIAL),
        'https://example.com/p3': respond(SUBSTANTIAL, 10),
      },
      waitForAbort
    );
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const error = await captureError(
      coordinator.extractAll(pages(10), {
        concurrency: 2,
        perPageTimeoutMs: 5000,
        signal: controller.signal,
        onPageComplete: (_result, completed) => {
          if (completed === 3) controller.abort();
        },
      })
    );

    expect(error).toBeInstanceOf(PipelineCancelledError);
    if (!(error instanceof PipelineCancelledError)) return;
    expect(error.reason).toBe('aborted');
    expect(error.partial.batch?.attempted).toBe(3);
    expect(error.partial.batch?.results.map((r) => r.rank)).toEqual([1, 2, 3]);
    expect(fetcher.requested).toHaveLength(4);
  });

  it('should report a deadline abort as a timeout', async () => {
    const fetcher = new ScriptedFetcher({}, waitForAbort);
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const error = await captureError(
      coordinator.extractAll(pages(2), {
        concurrency: 2,
        perPageTimeoutMs: 5000,
        signal: AbortSignal.timeout(20),
      })
    );

    expect(error).toBeInstanceOf(PipelineCancelledError);
    expect(error).toMatchObject({ reason: 'timeout' });
  });

  it('should reject immediately when already cancelled', async () => {
    const fetcher = new ScriptedFetcher({}, respond(SUBSTANTIAL));
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const error = await captureError(
      coordinator.extractAll(pages(2), { concurrency: 2, perPageTimeoutMs: 1000, signal: AbortSignal.abort() })
    );

    expect(error).toBeInstanceOf(PipelineCancelledError);
    expect(error).toMatchObject({ partial: { batch: { attempted: 0 } } });
    expect(fetcher.requested).toHaveLength(0);
  });

  it('should freeze every page result', async () => {
    const fetcher = new ScriptedFetcher({}, respond(SUBSTANTIAL));
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    const batch = await coordinator.extractAll(pages(2), { concurrency: 2, perPageTimeoutMs: 1000 });

    expect(batch.results).toHaveLength(2);
    for (const result of batch.results) {
      expect(Object.isFrozen(result)).toBe(true);
    }
  });

  it.each([0, -1, 1.5, Number.NaN])('should reject a concurrency of %s before fetching', async (concurrency) => {
    const fetcher = new ScriptedFetcher({}, respond(SUBSTANTIAL));
    const coordinator = new ExtractionCoordinator(fetcher, passthroughChain);

    await expect(coordinator.extractAll(pages(3), { concurrency, perPageTimeoutMs: 1000 })).rejects.toBeInstanceOf(
      InvalidArgumentsError
    );
    expect(fetcher.requested).toHaveLength(0);
  });
});
