import type { AccountId, AccountStore } from '../account_store';
import type { LogSink } from '../operation_log';
import type { Logger } from '../logger';

/**
 * Reference to the account a decision targets. Dry runs never create
 * anything, so new accounts get a per-run sequence number instead of an id.
 */
export type StoreRef =
  | { kind: 'real'; id: AccountId }
  | { kind: 'pending'; sequence: number };

export type SkipReason = 'MISSING_KEY' | 'MISSING_CREDENTIAL' | 'STORE_ERROR';

export type MetadataError = {
  key: string;
  detail: string;
};

export type AppliedDecision = {
  outcome: 'created' | 'updated';
  /** 0-based position in the archive */
  index: number;
  /** Normalized key */
  key: string;
  ref: StoreRef;
  /** Metadata keys written (or, in a dry run, that would be written) */
  metadataKeys: string[];
  metadataErrors: MetadataError[];
};

export type SkippedDecision = {
  outcome: 'skipped';
  index: number;
  /** Normalized key, null when the record had none */
  key: string | null;
  reason: SkipReason;
  /** Store error message for STORE_ERROR */
  detail?: string;
};

export type Decision = AppliedDecision | SkippedDecision;

export type ReconcileSummary = {
  created: number;
  updated: number;
  skipped: number;
};

export type ReconcileResult = {
  summary: ReconcileSummary;
  decisions: Decision[];
};

export type ReconcileOptions = {
  dryRun: boolean;
};

export type ReconcilerDependencies = {
  store: AccountStore;
  log: LogSink;
  /** Metadata key holding the role set, default `capabilities` */
  roleMetadataKey?: string;
  /** Source of the default registration date */
  clock?: () => Date;
  logger?: Logger;
};
