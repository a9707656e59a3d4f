import fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_BASE_URL } from '../sources/football-data.js';

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

const databaseSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('sqlite'),
    path: z.string().min(1),
  }),
  z.object({
    type: z.literal('postgres'),
    url: z.string().min(1),
    schema: z.string().min(1).optional(),
  }),
]);

const fileSchema = z.object({
  api: z.object({
    token: z.string().min(1).optional(),
    base_url: z.string().url().default(DEFAULT_BASE_URL),
    competition: z.string().min(1).default('PL'),
  }),
  etl: z
    .object({
      season: z.number().int().default(2025),
      requests_per_min: z.number().positive().default(10),
      retries_per_team: z.number().int().min(1).default(3),
      sleep_between_retries: z.number().min(0).default(2),
    })
    .default({}),
  database: z.preprocess(
    (v) =>
      typeof v === 'object' && v !== null && 'type' in v && typeof v.type === 'string'
        ? { ...v, type: v.type.toLowerCase() }
        : v,
    databaseSchema,
  ),
});

export type DatabaseConfig = Readonly<z.infer<typeof databaseSchema>>;

export interface RunConfig {
  readonly api: Readonly<{ baseUrl: string; token: string; competition: string }>;
  readonly etl: Readonly<{
    season: number;
    requestsPerMin: number;
    retries: number;
    retryDelaySeconds: number;
  }>;
  readonly database: DatabaseConfig;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validates a parsed configuration document. `tokenOverride` (from the
 * environment) wins over `api.token`; one of the two must be present.
 */
export function resolveRunConfig(document: unknown, tokenOverride?: string): RunConfig {
  const parsed = fileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }

  const { api, etl, database } = parsed.data;
  const token = tokenOverride ?? api.token;
  if (!token) {
    throw new ConfigError('Missing API token', ['api.token: set it or FOOTBALL_DATA_TOKEN']);
  }

  return Object.freeze({
    api: Object.freeze({ baseUrl: api.base_url, token, competition: api.competition }),
    etl: Object.freeze({
      season: etl.season,
      requestsPerMin: etl.requests_per_min,
      retries: etl.retries_per_team,
      retryDelaySeconds: etl.sleep_between_retries,
    }),
    database: Object.freeze(database),
  });
}

export function loadRunConfig(configPath: string, tokenOverride?: string): RunConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid YAML`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  return resolveRunConfig(document, tokenOverride);
}
