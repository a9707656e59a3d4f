export type EtlState =
  | 'init'
  | 'teams_fetched'
  | 'matches_fetched'
  | 'players_fetched'
  | 'done'
  | 'aborted'
  | 'failed';

export type TerminalState = Extract<EtlState, 'done' | 'aborted' | 'failed'>;

export type TableName = 'teams' | 'matches' | 'players';

export interface MissingTeam {
  id: number;
  name: string | null;
}

export interface EtlRunReport {
  state: TerminalState;
  /** Rows written per table; a table absent here was not replaced this run. */
  tables: Partial<Record<TableName, number>>;
  failedTeams: MissingTeam[];
  error?: string;
}
