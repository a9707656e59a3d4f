import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from '../../src/compliance/rate-limiter.js';
import type { OpenStore } from '../../src/db/store.js';
import { runEtl } from '../../src/etl/orchestrator.js';
import { resolveRunConfig } from '../../src/etl/run-config.js';
import type { FetchResult } from '../../src/types/fetch.js';
import { silentLogger } from '../../src/utils/logger.js';
import type { FetchJson } from '../../src/workers/http-client.js';
import { FakeClock } from '../helpers/fake-clock.js';
import { captureLogger, LEVELS } from '../helpers/logger.js';
import { MemoryStore } from '../helpers/memory-store.js';

const BASE = 'https://api.test/v4';
const TEAMS = `${BASE}/competitions/PL/teams`;
const MATCHES = `${BASE}/competitions/PL/matches?season=2025`;

const config = resolveRunConfig({
  api: { token: 'test-token', base_url: BASE },
  database: { type: 'sqlite', path: ':memory:' },
});

const exhausted: FetchResult<unknown> = {
  ok: false,
  failure: { kind: 'exhausted', attempts: 3, last: { kind: 'http', status: 500 } },
};

function ok(payload: unknown): FetchResult<unknown> {
  return { ok: true, payload, attempts: 1 };
}

/** Serves fixed results per URL after one paced attempt; anything unlisted is exhausted. */
function fakeApi(routes: Record<string, FetchResult<unknown>>) {
  return vi.fn<FetchJson>(async (url, options) => {
    await options.beforeAttempt?.();
    return routes[url] ?? exhausted;
  });
}

/**
 * Plays every attempt the way the HTTP client does: paced, with the retry
 * delay slept on `clock` in between. Squads always fail.
 */
function retryingApi(routes: Record<string, FetchResult<unknown>>, clock: FakeClock, attemptsAt: number[]) {
  return vi.fn<FetchJson>(async (url, options) => {
    for (let n = 1; n <= options.retries; n++) {
      await options.beforeAttempt?.();
      attemptsAt.push(clock.now());
      const served = routes[url];
      if (served) return served;
      if (n < options.retries) await clock.sleep(options.delaySeconds * 1000);
    }
    return exhausted;
  });
}

function setup(routes: Record<string, FetchResult<unknown>>, store = new MemoryStore()) {
  const fetchJson = fakeApi(routes);
  const openStore = vi.fn<OpenStore>(async () => store);
  return {
    store,
    fetchJson,
    openStore,
    deps: { openStore, fetchJson, log: silentLogger(), limiter: new RateLimiter(0) },
  };
}

function requestedUrls(fetchJson: ReturnType<typeof fakeApi>): string[] {
  return fetchJson.mock.calls.map(([url]) => url);
}

describe('runEtl', () => {
  it('should abort without touching matches or players when no teams come back', async () => {
    const { store, fetchJson, deps } = setup({ [TEAMS]: ok({ count: 0, teams: [] }) });

    const report = await runEtl(config, deps);

    expect(report).toEqual({ state: 'aborted', tables: {}, failedTeams: [] });
    expect(requestedUrls(fetchJson)).toEqual([TEAMS]);
    expect(store.writes).toEqual([]);
    expect(store.closeCalls).toBe(1);
  });

  it('should abort when the teams fetch fails outright', async () => {
    const { fetchJson, deps } = setup({});

    const report = await runEtl(config, deps);

    expect(report.state).toBe('aborted');
    expect(requestedUrls(fetchJson)).toEqual([TEAMS]);
  });

  it('should abort when the teams payload has no teams list', async () => {
    const { deps } = setup({ [TEAMS]: ok({ message: 'The resource you are looking for is restricted.' }) });

    const report = await runEtl(config, deps);

    expect(report.state).toBe('aborted');
  });

  it('should finish with partial players when matches fail and one team exhausts its retries', async () => {
    const { store, fetchJson, deps } = setup({
      [TEAMS]: ok({ teams: [{ id: 1 }, { id: 2 }] }),
      [`${BASE}/teams/1`]: ok({ id: 1, squad: [{ id: 101, name: 'Keeper' }, { id: 102, name: 'Striker' }] }),
    });

    const report = await runEtl(config, deps);

    expect(report).toEqual({
      state: 'done',
      tables: { teams: 2, players: 2 },
      failedTeams: [{ id: 2, name: null }],
    });
    expect(requestedUrls(fetchJson)).toEqual([TEAMS, MATCHES, `${BASE}/teams/1`, `${BASE}/teams/2`]);

    expect(store.tables.get('teams')?.rows).toEqual([{ id: 1 }, { id: 2 }]);
    expect(store.tables.has('matches')).toBe(false);
    expect(store.tables.get('players')?.rows).toEqual([
      { id: 101, name: 'Keeper', team_id: 1 },
      { id: 102, name: 'Striker', team_id: 1 },
    ]);
    expect(store.closeCalls).toBe(1);
  });

  it('should write matches and name the teams that are missing players', async () => {
    const { store, deps } = setup({
      [TEAMS]: ok({ teams: [{ id: 1, name: 'Alpha FC' }, { id: 2, name: 'Beta FC' }] }),
      [MATCHES]: ok({
        matches: [{ id: 9001, homeTeam: { id: 1 }, awayTeam: { id: 2 }, score: { fullTime: { home: 2, away: 1 } } }],
      }),
      [`${BASE}/teams/1`]: ok({ squad: [{ id: 101 }] }),
      [`${BASE}/teams/2`]: ok({ squad: [] }),
    });

    const report = await runEtl(config, deps);

    expect(report.state).toBe('done');
    expect(report.tables).toEqual({ teams: 2, matches: 1, players: 1 });
    expect(report.failedTeams).toEqual([{ id: 2, name: 'Beta FC' }]);
    expect(store.writes).toEqual(['teams', 'matches', 'players']);
    expect(store.tables.get('matches')?.rows).toEqual([
      { id: 9001, homeTeam_id: 1, awayTeam_id: 2, score_fullTime_home: 2, score_fullTime_away: 1 },
    ]);
  });

  it('should leave the players table alone when every squad fetch fails', async () => {
    const { store, deps } = setup({ [TEAMS]: ok({ teams: [{ id: 1 }] }) });

    const report = await runEtl(config, deps);

    expect(report.state).toBe('done');
    expect(report.tables).toEqual({ teams: 1 });
    expect(report.failedTeams).toEqual([{ id: 1, name: null }]);
    expect(store.writes).toEqual(['teams']);
  });

  it('should pass auth headers and retry settings to every request', async () => {
    const { fetchJson, deps } = setup({ [TEAMS]: ok({ teams: [] }) });

    await runEtl(config, deps);

    expect(fetchJson).toHaveBeenCalledWith(
      TEAMS,
      {
        headers: { 'X-Auth-Token': 'test-token', Accept: 'application/json' },
        retries: 3,
        delaySeconds: 2,
        beforeAttempt: expect.any(Function),
      },
      expect.anything(),
    );
  });

  it('should pace every API call through one shared limiter', async () => {
    const clock = new FakeClock();
    const { deps } = setup({
      [TEAMS]: ok({ teams: [{ id: 1 }, { id: 2 }] }),
      [MATCHES]: ok({ matches: [{ id: 1 }] }),
      [`${BASE}/teams/1`]: ok({ squad: [{ id: 101 }] }),
      [`${BASE}/teams/2`]: ok({ squad: [{ id: 201 }] }),
    });

    const report = await runEtl(config, { ...deps, limiter: RateLimiter.perMinute(60, clock) });

    expect(report.state).toBe('done');
    expect(clock.sleeps).toEqual([1000, 1000, 1000]);
  });

  it('should keep retries of failing squads within the per-minute budget', async () => {
    const clock = new FakeClock();
    const attemptsAt: number[] = [];
    const teams = Array.from({ length: 20 }, (_, i) => ({ id: i + 1 }));
    const fetchJson = retryingApi(
      { [TEAMS]: ok({ teams }), [MATCHES]: ok({ matches: [{ id: 1 }] }) },
      clock,
      attemptsAt,
    );
    const { deps } = setup({});

    const report = await runEtl(config, { ...deps, fetchJson, limiter: RateLimiter.perMinute(10, clock) });

    expect(report.state).toBe('done');
    expect(report.failedTeams).toHaveLength(20);
    expect(attemptsAt).toHaveLength(2 + 20 * 3);

    const busiestMinute = Math.max(
      ...attemptsAt.map((start) => attemptsAt.filter((t) => t >= start && t < start + 60_000).length),
    );
    expect(busiestMinute).toBe(10);
  });

  it('should end as failed and still close the store when a write throws', async () => {
    const store = new MemoryStore({ failOnReplace: 'teams' });
    const { lines, log } = captureLogger();
    const { deps } = setup({ [TEAMS]: ok({ teams: [{ id: 1 }] }) }, store);

    const report = await runEtl(config, { ...deps, log });

    expect(report).toEqual({ state: 'failed', tables: {}, failedTeams: [], error: 'cannot write teams' });
    expect(store.closeCalls).toBe(1);

    const failure = lines.find((l) => l.msg === 'ETL failed');
    expect(failure?.level).toBe(LEVELS.error);
    expect(failure?.['state']).toBe('init');
  });

  it('should end as failed without closing anything when the store cannot be opened', async () => {
    const { fetchJson, deps } = setup({});
    const openStore = vi.fn<OpenStore>(async () => {
      throw new Error('unable to open database file');
    });

    const report = await runEtl(config, { ...deps, openStore });

    expect(report.state).toBe('failed');
    expect(report.error).toBe('unable to open database file');
    expect(fetchJson).not.toHaveBeenCalled();
  });

  it('should keep the run state when closing the store fails', async () => {
    const store = new MemoryStore({ failOnClose: true });
    const { lines, log } = captureLogger();
    const { deps } = setup({ [TEAMS]: ok({ teams: [] }) }, store);

    const report = await runEtl(config, { ...deps, log });

    expect(report.state).toBe('aborted');
    expect(store.closeCalls).toBe(1);
    expect(lines.find((l) => l.msg === 'Failed to close store connection')?.level).toBe(LEVELS.warn);
  });

  it('should open the store from the configured database', async () => {
    const { openStore, deps } = setup({ [TEAMS]: ok({ teams: [] }) });

    await runEtl(config, deps);

    expect(openStore).toHaveBeenCalledWith({ type: 'sqlite', path: ':memory:' }, expect.anything());
  });
});
