import { RateLimiter } from '../compliance/rate-limiter.js';
import type { BatchOutcome } from '../types/batch.js';
import { describeFailure, type FetchResult } from '../types/fetch.js';
import type { JsonObject } from '../types/json.js';
import type { Logger } from '../utils/logger.js';
import { normalize } from './normalizer.js';

/** Takes a rate-limit slot; a fetcher that retries awaits it before each request. */
export type Pace = () => Promise<void>;

export type PerIdentifierFetch<Id> = (id: Id, pace: Pace) => Promise<FetchResult<JsonObject[]>>;

export interface BatchFetchOptions {
  requestsPerMin: number;
  /** Shared with other callers of the same API account; built from `requestsPerMin` when omitted. */
  limiter?: RateLimiter;
  limiterKey?: string;
  /** Field added to every record, holding the identifier it was fetched for. */
  tagField: string;
  /** Natural key used to drop records seen under an earlier identifier. */
  dedupeKey?: string;
  /** Noun for progress lines, e.g. "teams". */
  label?: string;
}

/**
 * Fetches one resource per identifier, strictly one after another and in
 * input order, with consecutive calls spaced by `60 / requestsPerMin`
 * seconds. There is no wait after the last identifier. The first request for
 * an identifier uses the slot taken before `fetchOne` is called; each further
 * `pace()` takes a new one, so retries count against the same budget.
 *
 * A failed, empty or throwing fetch only marks its identifier as failed; the
 * remaining identifiers are still processed.
 */
export async function fetchAll<Id extends string | number>(
  identifiers: readonly Id[],
  fetchOne: PerIdentifierFetch<Id>,
  options: BatchFetchOptions,
  log: Logger,
): Promise<BatchOutcome<Id>> {
  if (!Number.isFinite(options.requestsPerMin) || options.requestsPerMin <= 0) {
    throw new RangeError(`requestsPerMin must be a positive number, got ${options.requestsPerMin}`);
  }
  const limiter = options.limiter ?? RateLimiter.perMinute(options.requestsPerMin);
  const label = options.label ?? 'items';
  const total = identifiers.length;

  const records: JsonObject[] = [];
  const succeeded: Id[] = [];
  const failed: Id[] = [];

  for (const [index, id] of identifiers.entries()) {
    await limiter.acquire(options.limiterKey);
    let slotUnused = true;
    const pace: Pace = async () => {
      if (slotUnused) {
        slotUnused = false;
        return;
      }
      await limiter.acquire(options.limiterKey);
    };

    let result: FetchResult<JsonObject[]>;
    try {
      result = await fetchOne(id, pace);
    } catch (err) {
      log.error({ err, id }, 'Fetch threw unexpectedly');
      result = { ok: false, failure: { kind: 'network', message: err instanceof Error ? err.message : String(err) } };
    }

    if (result.ok && result.payload.length > 0) {
      for (const record of result.payload) {
        records.push({ ...record, [options.tagField]: id });
      }
      succeeded.push(id);
    } else {
      if (result.ok) {
        log.warn({ id }, 'Fetch returned no records');
      } else {
        log.warn({ id, reason: describeFailure(result.failure) }, 'All attempts failed');
      }
      failed.push(id);
    }

    log.info({ processed: index + 1, total }, `Processed ${index + 1}/${total} ${label}`);
  }

  const rows = normalize(records, { dedupeKey: options.dedupeKey, log });

  if (failed.length > 0) {
    log.warn({ failed }, `${failed.length} of ${total} ${label} returned nothing this run`);
  }

  return { rows, succeeded, failed };
}
