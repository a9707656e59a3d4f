/** Why a single attempt failed. */
export type AttemptFailure =
  | { kind: 'http'; status: number }
  | { kind: 'network'; message: string };

export type FetchFailure =
  | AttemptFailure
  | { kind: 'exhausted'; attempts: number; last: AttemptFailure };

export type FetchResult<T> =
  | { ok: true; payload: T; attempts: number }
  | { ok: false; failure: FetchFailure };

export function describeFailure(failure: FetchFailure): string {
  switch (failure.kind) {
    case 'http':
      return `HTTP ${failure.status}`;
    case 'network':
      return failure.message;
    case 'exhausted':
      return `gave up after ${failure.attempts} attempt(s): ${describeFailure(failure.last)}`;
  }
}
