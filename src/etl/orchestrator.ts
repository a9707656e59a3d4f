import { RateLimiter } from '../compliance/rate-limiter.js';
import type { OpenStore, Store } from '../db/store.js';
import { fetchAll, type Pace } from '../pipeline/batch-fetcher.js';
import { normalize } from '../pipeline/normalizer.js';
import {
  buildHeaders,
  extractList,
  matchesUrl,
  teamsUrl,
  teamUrl,
} from '../sources/football-data.js';
import type { FetchResult } from '../types/fetch.js';
import type { JsonObject } from '../types/json.js';
import type { EtlRunReport, EtlState, MissingTeam } from '../types/run.js';
import type { TabularRowSet } from '../types/table.js';
import type { Logger } from '../utils/logger.js';
import { fetchJson as defaultFetchJson, type FetchJson, type FetchJsonOptions } from '../workers/http-client.js';
import type { RunConfig } from './run-config.js';

/** Every call against the API account shares this limiter key. */
const API_LIMITER_KEY = 'football-data';

export interface EtlDeps {
  openStore: OpenStore;
  log: Logger;
  fetchJson?: FetchJson;
  /** Defaults to one built from `etl.requestsPerMin`. */
  limiter?: RateLimiter;
}

function teamIndex(teams: TabularRowSet, log: Logger): { ids: number[]; names: Map<number, string> } {
  const ids: number[] = [];
  const names = new Map<number, string>();

  for (const row of teams.rows) {
    const id = row['id'];
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      log.warn({ id }, 'Team row without an integer id, skipping its players');
      continue;
    }
    ids.push(id);
    const name = row['name'];
    if (typeof name === 'string') names.set(id, name);
  }

  return { ids, names };
}

/**
 * Runs one load: teams, then the season's matches, then every team's squad.
 *
 * Teams gate the run (no teams means `aborted`); a missing matches payload is
 * logged and skipped. Unexpected errors end the run as `failed` and are never
 * rethrown. The store is closed on every path once it was opened.
 */
export async function runEtl(config: RunConfig, deps: EtlDeps): Promise<EtlRunReport> {
  const { api, etl } = config;
  const log = deps.log.child({ competition: api.competition, season: etl.season });
  const fetchJson = deps.fetchJson ?? defaultFetchJson;
  const limiter = deps.limiter ?? RateLimiter.perMinute(etl.requestsPerMin);
  const fetchOptions: FetchJsonOptions = {
    headers: buildHeaders(api.token),
    retries: etl.retries,
    delaySeconds: etl.retryDelaySeconds,
  };

  const tables: EtlRunReport['tables'] = {};
  let failedTeams: MissingTeam[] = [];
  let state: EtlState = 'init';
  let store: Store | null = null;

  const transition = (next: EtlState) => {
    log.debug({ from: state, to: next }, 'ETL state changed');
    state = next;
  };

  const fetchList = async (url: string, field: string): Promise<JsonObject[] | null> => {
    const result = await fetchJson(
      url,
      { ...fetchOptions, beforeAttempt: () => limiter.acquire(API_LIMITER_KEY) },
      log,
    );
    if (!result.ok) return null;

    const list = extractList(result.payload, field);
    if (list === null) log.error({ url, field }, `Response has no ${field} list`);
    return list;
  };

  const fetchSquad = async (teamId: number, pace: Pace): Promise<FetchResult<JsonObject[]>> => {
    const result = await fetchJson(
      teamUrl(api.baseUrl, teamId),
      { ...fetchOptions, beforeAttempt: pace },
      log.child({ teamId }),
    );
    if (!result.ok) return result;
    return { ok: true, payload: extractList(result.payload, 'squad') ?? [], attempts: result.attempts };
  };

  try {
    store = await deps.openStore(config.database, log);

    const teamRecords = await fetchList(teamsUrl(api.baseUrl, api.competition), 'teams');
    if (!teamRecords || teamRecords.length === 0) {
      log.error('No teams fetched. Aborting ETL.');
      transition('aborted');
      return { state: 'aborted', tables, failedTeams };
    }

    const teams = normalize(teamRecords, { log });
    await store.replaceTable('teams', teams);
    tables.teams = teams.rows.length;
    transition('teams_fetched');

    const matchRecords = await fetchList(matchesUrl(api.baseUrl, api.competition, etl.season), 'matches');
    if (matchRecords && matchRecords.length > 0) {
      const matches = normalize(matchRecords, { log });
      await store.replaceTable('matches', matches);
      tables.matches = matches.rows.length;
    } else {
      log.error('Matches data not available, continuing with players');
    }
    transition('matches_fetched');

    const { ids, names } = teamIndex(teams, log);
    const outcome = await fetchAll(
      ids,
      fetchSquad,
      {
        requestsPerMin: etl.requestsPerMin,
        limiter,
        limiterKey: API_LIMITER_KEY,
        tagField: 'team_id',
        dedupeKey: 'id',
        label: 'teams',
      },
      log,
    );

    if (outcome.rows.rows.length > 0) {
      await store.replaceTable('players', outcome.rows);
      tables.players = outcome.rows.rows.length;
    } else {
      log.error('No players fetched, players table left unchanged');
    }

    failedTeams = outcome.failed.map((id) => ({ id, name: names.get(id) ?? null }));
    if (failedTeams.length > 0) {
      log.warn({ teams: failedTeams }, 'Teams missing players this run');
    }
    transition('players_fetched');

    transition('done');
    log.info({ tables }, 'ETL run complete');
    return { state: 'done', tables, failedTeams };
  } catch (err) {
    log.error({ err, state }, 'ETL failed');
    transition('failed');
    return {
      state: 'failed',
      tables,
      failedTeams,
      error: err instanceof Error ? err.message : String(err),
    };
  } finally {
    if (store) {
      try {
        await store.close();
        log.info('Store connection closed');
      } catch (err) {
        log.warn({ err }, 'Failed to close store connection');
      }
    }
  }
}
