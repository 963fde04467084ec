import type {
  DisposalError,
  MarkerLabelError,
  RetentionError,
} from '../errors/RetentionErrors.js';

export const DisposalAction = {
  TRASH: 'trash',
  DELETE: 'delete',
} as const;
export type DisposalAction = typeof DisposalAction[keyof typeof DisposalAction];

export const RunMode = {
  DRY_RUN: 'dry-run',
  EXECUTE: 'execute',
} as const;
export type RunMode = typeof RunMode[keyof typeof RunMode];

/**
 * Day counts used when a retention age is rendered into a day-granular
 * search predicate.
 */
export interface AgeConversion {
  daysPerWeek: number;
  daysPerMonth: number;
  daysPerYear: number;
}

export const DEFAULT_AGE_CONVERSION: AgeConversion = {
  daysPerWeek: 7,
  daysPerMonth: 30,
  daysPerYear: 365,
};

export interface MailLabel {
  id: string;
  name: string;
  type?: 'system' | 'user';
}

/** Header fields shown when listing messages; absent when Gmail returns none. */
export interface MessageSummary {
  id: string;
  subject?: string;
  date?: string;
}

export interface SearchPage {
  ids: string[];
  nextPageToken?: string;
}

export interface FailedId {
  id: string;
  reason: string;
}

export interface DisposeResult {
  succeeded: string[];
  failed: FailedId[];
}

interface OutcomeBase {
  ruleId: number;
  label: string;
  action: DisposalAction;
}

/** Dry-run result for one chunk: what would have been disposed. */
export interface PreviewOutcome extends OutcomeBase {
  kind: 'preview';
  chunkIndex: number;
  attempted: string[];
}

export interface DisposalOutcome extends OutcomeBase {
  kind: 'disposal';
  chunkIndex: number;
  attempted: string[];
  succeeded: string[];
  /** message id → failure reason */
  failed: Record<string, string>;
  /** Set when the whole chunk call failed. */
  error?: DisposalError;
  markerError?: MarkerLabelError;
}

export interface PairFailedOutcome extends OutcomeBase {
  kind: 'pair-failed';
  error: RetentionError;
  /** Ids gathered before enumeration failed; never disposed. */
  partialIds: string[];
}

export interface CancelledOutcome {
  kind: 'cancelled';
  completedChunks: number;
}

export type ChunkOutcome = PreviewOutcome | DisposalOutcome;
export type RunOutcome = ChunkOutcome | PairFailedOutcome | CancelledOutcome;

export interface RuleSelection {
  skipTrash?: boolean;
  skipDelete?: boolean;
  /**
   * Restrict the run to these rule ids; unknown ids are a configuration error.
   * An empty list selects every rule, like leaving it out.
   */
  ruleIds?: number[];
}

export interface RunOptions extends RuleSelection {
  mode?: RunMode;
  signal?: AbortSignal;
}

export interface RunTotals {
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface RunReport {
  mode: RunMode;
  outcomes: RunOutcome[];
  cancelled: boolean;
  totals: RunTotals;
}

export interface RuleQuery {
  ruleId: number;
  label: string;
  action: DisposalAction;
  predicate: string;
}
