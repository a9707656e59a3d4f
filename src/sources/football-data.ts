import { z } from 'zod';
import type { JsonObject, JsonValue } from '../types/json.js';

export const DEFAULT_BASE_URL = 'https://api.football-data.org/v4';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

const jsonObject: z.ZodType<JsonObject> = z.record(jsonValue);

function trimSlash(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

export function buildHeaders(token: string): Record<string, string> {
  return { 'X-Auth-Token': token, Accept: 'application/json' };
}

export function teamsUrl(baseUrl: string, competition: string): string {
  return `${trimSlash(baseUrl)}/competitions/${encodeURIComponent(competition)}/teams`;
}

export function matchesUrl(baseUrl: string, competition: string, season: number): string {
  return `${trimSlash(baseUrl)}/competitions/${encodeURIComponent(competition)}/matches?season=${season}`;
}

export function teamUrl(baseUrl: string, teamId: number): string {
  return `${trimSlash(baseUrl)}/teams/${teamId}`;
}

/**
 * Pulls the record list out of a response envelope such as `{ teams: [...] }`
 * or `{ squad: [...] }`. Returns null when the field is missing or is not a
 * list of objects.
 */
export function extractList(payload: unknown, field: string): JsonObject[] | null {
  const parsed = z.object({ [field]: z.array(jsonObject) }).safeParse(payload);
  if (!parsed.success) return null;
  return parsed.data[field] ?? null;
}
