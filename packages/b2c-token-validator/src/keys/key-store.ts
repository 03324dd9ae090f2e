import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { KeyFetchError, KeySet } from '../types.js';
import {
  createKeyFetchError,
  createRefreshCancelledError,
  createRefreshThrottledError,
} from '../validation/errors.js';
import { createSilentLogger } from '../logger.js';

/**
 * Fetches a fresh key set. Should stop work when `signal` aborts.
 */
export type KeySetFetcher = (signal: AbortSignal) => Promise<Result<KeySet, KeyFetchError>>;

/**
 * Options for creating a key store.
 */
export interface KeyStoreOptions {
  /** Snapshot active until the first successful refresh */
  readonly initial: KeySet;
  /** Fetches replacement snapshots */
  readonly fetchKeySet: KeySetFetcher;
  /**
   * Minimum age of the active snapshot before a refresh may fetch (default: 0, no limit).
   */
  readonly minRefreshIntervalMs?: number;
  readonly logger?: Logger;
  /** Clock returning milliseconds since epoch (default: Date.now) */
  readonly now?: () => number;
}

/**
 * Holder of the active key set with single-flight refresh.
 */
export interface KeyStore {
  /** Returns the active snapshot. Never blocks. */
  readonly current: () => KeySet;

  /**
   * Fetches a new snapshot and swaps it in on success.
   * Concurrent calls share one fetch and resolve with the same outcome.
   * On failure the active snapshot is left as it was.
   */
  readonly refresh: () => Promise<Result<void, KeyFetchError>>;

  /**
   * Cancels the in-flight refresh, resolving every waiter with REFRESH_CANCELLED.
   * @returns true if a refresh was in flight
   */
  readonly cancel: (reason?: unknown) => boolean;

  /** Whether a refresh is currently in flight */
  readonly isRefreshing: () => boolean;
}

interface InFlightRefresh {
  readonly promise: Promise<Result<void, KeyFetchError>>;
  readonly controller: AbortController;
}

const diffKids = (
  previous: KeySet,
  next: KeySet
): { readonly added: string[]; readonly removed: string[] } => ({
  added: [...next.keys.keys()].filter((kid) => !previous.keys.has(kid)),
  removed: [...previous.keys.keys()].filter((kid) => !next.keys.has(kid)),
});

/**
 * Creates a key store owning one key-set snapshot.
 *
 * Each validator gets its own store, so tenants configured side by side in one
 * process never share keys or refresh state.
 *
 * @example
 * ```typescript
 * const store = createKeyStore({
 *   initial: keySet,
 *   fetchKeySet: (signal) => fetchKeySet(httpClient, jwksUri, { signal }),
 * });
 *
 * const result = await store.refresh();
 * if (result.isErr()) {
 *   console.error(result.error.message); // store.current() is unchanged
 * }
 * ```
 */
export const createKeyStore = (options: KeyStoreOptions): KeyStore => {
  const {
    initial,
    fetchKeySet,
    minRefreshIntervalMs = 0,
    logger = createSilentLogger(),
    now = Date.now,
  } = options;

  let active = initial;
  let inFlight: InFlightRefresh | undefined;

  const fetchSafely = async (signal: AbortSignal): Promise<Result<KeySet, KeyFetchError>> => {
    try {
      return await fetchKeySet(signal);
    } catch (error) {
      return err(createKeyFetchError('Signing key fetch failed unexpectedly', error));
    }
  };

  const runRefresh = async (
    controller: AbortController
  ): Promise<Result<void, KeyFetchError>> => {
    const { signal } = controller;
    const cancelled = new Promise<Result<KeySet, KeyFetchError>>((resolve) => {
      signal.addEventListener(
        'abort',
        () => {
          resolve(err(createRefreshCancelledError(signal.reason)));
        },
        { once: true }
      );
    });

    try {
      const result = await Promise.race([fetchSafely(signal), cancelled]);

      // A fetch that settles after cancellation must not replace the snapshot.
      if (signal.aborted) {
        logger.info('signing key refresh cancelled');
        return err(createRefreshCancelledError(signal.reason));
      }

      if (result.isErr()) {
        logger.warn({ err: result.error }, 'signing key refresh failed; keeping previous keys');
        return err(result.error);
      }

      const previous = active;
      active = result.value;
      logger.info(diffKids(previous, active), 'signing keys replaced');

      return ok(undefined);
    } finally {
      if (inFlight?.controller === controller) {
        inFlight = undefined;
      }
    }
  };

  const refresh = (): Promise<Result<void, KeyFetchError>> => {
    if (inFlight !== undefined) {
      logger.debug('joining in-flight signing key refresh');
      return inFlight.promise;
    }

    if (minRefreshIntervalMs > 0) {
      const age = now() - active.fetchedAt;
      if (age < minRefreshIntervalMs) {
        logger.warn({ ageMs: age, minRefreshIntervalMs }, 'signing key refresh throttled');
        return Promise.resolve(err(createRefreshThrottledError(minRefreshIntervalMs - age)));
      }
    }

    const controller = new AbortController();
    inFlight = { promise: runRefresh(controller), controller };

    return inFlight.promise;
  };

  const cancel = (reason?: unknown): boolean => {
    if (inFlight === undefined) {
      return false;
    }

    const { controller } = inFlight;
    inFlight = undefined;
    controller.abort(reason);

    return true;
  };

  return {
    current: () => active,
    refresh,
    cancel,
    isRefreshing: () => inFlight !== undefined,
  };
};
