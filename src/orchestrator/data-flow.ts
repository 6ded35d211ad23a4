import type { SearchResult } from '../agents/types';
import type { StageStatus } from './stage';

// ── State Record ────────────────────────────────────────────────────────

/** Keys every state record may carry; `error` holds the latest stage failure */
export type StateRecord = {
  error?: string;
};

/**
 * State threaded through the research pipeline.
 * Each field is populated by the stage named in its comment.
 */
export type ResearchState = StateRecord & {
  query: string;
  /** research; `null` when the search failed */
  research_data?: SearchResult[] | null;
  /** draft_answer */
  answer?: string;
  /** review_answer */
  reviewed_answer?: string;
  feedback?: string;
  /** refine_answer */
  final_answer?: string;
};

/**
 * Overwrite (or insert) every key of `partial` into a copy of `record`.
 * Keys missing from `partial` keep their value; an empty partial is a no-op.
 */
export function merge<S extends object>(record: S, partial: Partial<S>): S {
  return { ...record, ...partial };
}

// ── Sentinels ───────────────────────────────────────────────────────────

export const NO_RESEARCH_DATA = 'No research data available to draft an answer.';
export const DRAFT_FAILED = 'Failed to draft an answer due to an error.';
export const NO_ANSWER_TO_REVIEW = 'No answer to review.';
export const REVIEW_FAILED = 'Failed to review the answer due to an error.';

/** Values of `answer` that mean no usable draft exists */
export const DRAFT_SENTINELS: readonly string[] = [NO_RESEARCH_DATA, DRAFT_FAILED];

/** Values of `feedback` that mean no usable review exists */
export const REVIEW_SENTINELS: readonly string[] = [NO_ANSWER_TO_REVIEW, REVIEW_FAILED];

// ── Topology ────────────────────────────────────────────────────────────

export type ResearchStageName = 'research' | 'draft_answer' | 'review_answer' | 'refine_answer';

export const RESEARCH_CHAIN: readonly ResearchStageName[] = ['research', 'draft_answer', 'review_answer', 'refine_answer'];

// ── Run Result ──────────────────────────────────────────────────────────

/** What happened to a single stage during a run */
export interface StageReport {
  stage: string;
  status: StageStatus;
  durationMs: number;
  error?: string;
  reason?: string;
}

/** A stage failure surfaced to the caller */
export interface Diagnostic {
  stage: string;
  message: string;
}

/** Returned once the finish stage has been merged */
export interface PipelineRunResult<S> {
  runId: string;
  status: 'completed';
  state: S;
  stages: StageReport[];
  diagnostics: Diagnostic[];
  durationMs: number;
}
