import type { StateRecord } from './data-flow';

export type StageStatus = 'ok' | 'skipped' | 'failed';

/**
 * Result of one stage. Failure is carried as data: the `failed` variant
 * holds the sentinel output for downstream stages plus the error message.
 */
export type StageOutcome<S> =
  | { status: 'ok'; update: Partial<S> }
  | { status: 'skipped'; update: Partial<S>; reason: string }
  | { status: 'failed'; update: Partial<S>; error: string };

/**
 * A unit of work in a pipeline. Reads fields written by earlier stages and
 * resolves with the fields to merge back. Implementations must not reject.
 */
export interface Stage<S extends StateRecord> {
  run(state: Readonly<S>): Promise<StageOutcome<S>>;
}

export function ok<S>(update: Partial<S>): StageOutcome<S> {
  return { status: 'ok', update };
}

export function skipped<S>(update: Partial<S>, reason: string): StageOutcome<S> {
  return { status: 'skipped', update, reason };
}

export function failed<S>(update: Partial<S>, error: string): StageOutcome<S> {
  return { status: 'failed', update, error };
}

/** The partial mapping the executor merges for an outcome */
export function toPartial<S extends StateRecord>(outcome: StageOutcome<S>): Partial<S> {
  if (outcome.status === 'failed') {
    return { ...outcome.update, error: outcome.error };
  }
  return outcome.update;
}

/** Non-empty message for anything thrown or rejected */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown error';
  }
  const text = String(error);
  return text.length > 0 ? text : 'Unknown error';
}
