/**
 * Abort helpers shared by the fetcher, the coordinator and the router.
 */

import { logger } from './logger.js';

const log = logger.create('Abort');

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * The error a fired signal stands for: its reason when that is an Error,
 * otherwise a generic AbortError.
 */
export function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(typeof reason === 'string' ? reason : 'The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortError(signal);
  }
}

/**
 * Resolves after `ms`, or rejects as soon as the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles with `promise`, or rejects when the signal fires first. The
 * abandoned promise keeps running; its late failure is only logged.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    promise.catch((error: unknown) => log.debug('Abandoned operation failed', { error: String(error) }));
    return Promise.reject(abortError(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      promise.catch((error: unknown) => log.debug('Abandoned operation failed', { error: String(error) }));
      reject(abortError(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach from the parent signals and clear the timer, if any */
  dispose(): void;
}

/**
 * A signal that fires when any parent fires, or after `timeoutMs` with a
 * TimeoutError reason.
 */
export function linkSignals(
  parents: Array<AbortSignal | undefined>,
  timeoutMs?: number,
  timeoutMessage = 'Operation timed out'
): LinkedSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  if (timeoutMs !== undefined && timeoutMs > 0 && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      const reason = new Error(timeoutMessage);
      reason.name = 'TimeoutError';
      controller.abort(reason);
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

/**
 * True when the signal fired because a linkSignals() deadline passed
 */
export function abortedByTimeout(signal: AbortSignal): boolean {
  const reason: unknown = signal.reason;
  return reason instanceof Error && reason.name === 'TimeoutError';
}
