import { request, type Dispatcher } from 'undici';
import type { AttemptFailure, FetchResult } from '../types/fetch.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import type { Logger } from '../utils/logger.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'football-etl/0.1',
  Accept: 'application/json',
};

export interface FetchJsonOptions {
  headers?: Record<string, string>;
  /** Total attempts, at least 1. */
  retries: number;
  /** Fixed pause between attempts, in seconds. */
  delaySeconds: number;
  dispatcher?: Dispatcher;
  sleep?: Sleep;
  /** Awaited before every attempt, retries included; used to take a rate-limit slot. */
  beforeAttempt?: () => Promise<unknown>;
}

export type FetchJson = (
  url: string,
  options: FetchJsonOptions,
  log: Logger,
) => Promise<FetchResult<unknown>>;

async function attempt(
  url: string,
  headers: Record<string, string>,
  dispatcher: Dispatcher | undefined,
): Promise<{ ok: true; payload: unknown } | AttemptFailure> {
  try {
    const { statusCode, body } = await request(url, {
      method: 'GET',
      headers: { ...DEFAULT_HEADERS, ...headers },
      headersTimeout: 15000,
      bodyTimeout: 30000,
      dispatcher,
    });

    if (statusCode !== 200) {
      await body.dump();
      return { kind: 'http', status: statusCode };
    }

    return { ok: true, payload: await body.json() };
  } catch (err) {
    return { kind: 'network', message: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * GET a JSON document, retrying any non-200 status or transport error up to
 * `retries` attempts with a fixed delay in between. Never throws for
 * network or HTTP failures; they come back as `{ ok: false }`.
 */
export const fetchJson: FetchJson = async (url, options, log) => {
  const { retries, delaySeconds } = options;
  if (!Number.isInteger(retries) || retries < 1) {
    throw new RangeError(`retries must be an integer >= 1, got ${retries}`);
  }
  if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
    throw new RangeError(`delaySeconds must be >= 0, got ${delaySeconds}`);
  }

  const pause = options.sleep ?? defaultSleep;
  let last: AttemptFailure = { kind: 'network', message: 'no attempt made' };

  for (let n = 1; n <= retries; n++) {
    await options.beforeAttempt?.();
    const result = await attempt(url, options.headers ?? {}, options.dispatcher);

    if ('ok' in result) {
      return { ok: true, payload: result.payload, attempts: n };
    }

    last = result;
    if (result.kind === 'http') {
      log.warn({ attempt: n, status: result.status, url }, `Attempt ${n} failed: HTTP ${result.status}`);
    } else {
      log.error({ attempt: n, err: result.message, url }, `Attempt ${n} request error`);
    }

    if (n < retries) {
      await pause(delaySeconds * 1000);
    }
  }

  log.error({ url, attempts: retries }, 'Failed to fetch');
  return { ok: false, failure: { kind: 'exhausted', attempts: retries, last } };
};
