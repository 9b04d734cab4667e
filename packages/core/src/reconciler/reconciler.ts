import type { AccountId, AccountStore } from '../account_store';
import { DEFAULT_ROLE_METADATA_KEY } from '../account_store';
import type { LogSink } from '../operation_log';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { ArchiveRecord } from '../record_types';
import { buildCreateRequest, buildUpdateRequest } from './account_request';
import { normalizeKey } from './sanitize';
import type {
  AppliedDecision,
  Decision,
  MetadataError,
  ReconcileOptions,
  ReconcileResult,
  ReconcileSummary,
  ReconcilerDependencies,
  SkipReason,
  SkippedDecision,
  StoreRef,
} from './reconciler.types';

export function formatRef(ref: StoreRef): string {
  return ref.kind === 'real' ? `ID ${ref.id}` : `pending #${ref.sequence}`;
}

/** Per-run state. */
type RunContext = {
  dryRun: boolean;
  pendingSequence: number;
  /** Keys a dry run has already planned to create, so a repeat reports as an update */
  pendingKeys: Map<string, StoreRef>;
};

/**
 * Reconciler - decides, per archive record, whether to create, update or
 * skip an account, and applies the decision to the AccountStore
 *
 * Records are processed strictly in archive order, one store call at a
 * time. A failing record becomes a `skipped` decision and the loop goes on;
 * `apply` itself only rejects if the log sink throws.
 *
 * Roles are replaced, other metadata is merged: when a record's metadata
 * holds the role key, the account's roles are cleared before the keys are
 * written.
 *
 * In a dry run every lookup still happens, but nothing is written: new
 * accounts get `pending #n` references and metadata actions are only logged.
 */
export class Reconciler {
  private readonly store: AccountStore;
  private readonly log: LogSink;
  private readonly roleMetadataKey: string;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(dependencies: ReconcilerDependencies) {
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.roleMetadataKey = dependencies.roleMetadataKey ?? DEFAULT_ROLE_METADATA_KEY;
    this.clock = dependencies.clock ?? (() => new Date());
    this.logger = dependencies.logger ?? createLogger('[Reconciler] ');
  }

  async apply(records: readonly ArchiveRecord[], options: ReconcileOptions): Promise<ReconcileResult> {
    const context: RunContext = { dryRun: options.dryRun, pendingSequence: 0, pendingKeys: new Map() };
    const decisions: Decision[] = [];
    const summary: ReconcileSummary = { created: 0, updated: 0, skipped: 0 };

    this.logger.debug(`Reconciling ${records.length} record(s), dryRun=${options.dryRun}`);

    for (const [index, record] of records.entries()) {
      const decision = await this.processRecord(record, index, context);
      decisions.push(decision);
      summary[decision.outcome]++;
    }

    this.logger.debug(
      `Reconciled: ${summary.created} created, ${summary.updated} updated, ${summary.skipped} skipped`
    );
    return { summary, decisions };
  }

  private async processRecord(record: ArchiveRecord, index: number, context: RunContext): Promise<Decision> {
    const entry = `Entry #${index + 1}`;

    const key = normalizeKey(record.key ?? '');
    if (key === '') {
      this.log.append(`${entry}: skipped, missing or invalid key.`, 'WARNING');
      return this.skip(index, null, 'MISSING_KEY');
    }
    const prefix = `${entry} (${key})`;

    if (record.credentialHash === undefined && !context.dryRun) {
      this.log.append(`${prefix}: skipped, no credential hash in archive.`, 'WARNING');
      return this.skip(index, key, 'MISSING_CREDENTIAL');
    }

    let existingId: AccountId | null;
    try {
      existingId = (await this.store.findByKey(key))?.id ?? null;
    } catch (error) {
      return this.storeFailure(index, key, `${prefix}: error looking up account`, error);
    }

    let decision: AppliedDecision;
    const pendingRef = context.pendingKeys.get(key);
    if (existingId === null && pendingRef !== undefined) {
      this.log.append(`${prefix}: [dry run] would update ${formatRef(pendingRef)}.`, 'INFO');
      decision = this.applied('updated', index, key, pendingRef);
    } else if (existingId !== null) {
      const ref: StoreRef = { kind: 'real', id: existingId };
      if (context.dryRun) {
        this.log.append(`${prefix}: [dry run] would update ${formatRef(ref)}.`, 'INFO');
      } else {
        try {
          await this.store.update(existingId, buildUpdateRequest(record, key));
        } catch (error) {
          return this.storeFailure(index, key, `${prefix}: error updating account`, error);
        }
        this.log.append(`${prefix}: updated ${formatRef(ref)}.`, 'SUCCESS');
      }
      decision = this.applied('updated', index, key, ref);
    } else {
      let ref: StoreRef;
      if (context.dryRun) {
        context.pendingSequence++;
        ref = { kind: 'pending', sequence: context.pendingSequence };
        context.pendingKeys.set(key, ref);
        this.log.append(`${prefix}: [dry run] would create a new account as ${formatRef(ref)}.`, 'INFO');
      } else {
        try {
          const id = await this.store.create(buildCreateRequest(record, key, this.clock()));
          ref = { kind: 'real', id };
        } catch (error) {
          return this.storeFailure(index, key, `${prefix}: error creating account`, error);
        }
        this.log.append(`${prefix}: created ${formatRef(ref)}.`, 'SUCCESS');
      }
      decision = this.applied('created', index, key, ref);
    }

    await this.applyMetadata(record, decision, prefix, context);
    return decision;
  }

  private async applyMetadata(
    record: ArchiveRecord,
    decision: AppliedDecision,
    prefix: string,
    context: RunContext
  ): Promise<void> {
    const entries = Object.entries(record.metadata);
    if (entries.length === 0) {
      return;
    }
    const { ref } = decision;
    const hasRoles = Object.prototype.hasOwnProperty.call(record.metadata, this.roleMetadataKey);

    if (context.dryRun || ref.kind === 'pending') {
      if (hasRoles) {
        this.log.append(`${prefix}: [dry run] would clear roles of ${formatRef(ref)}.`, 'INFO_DETAIL');
      }
      for (const [metaKey] of entries) {
        this.log.append(`${prefix}: [dry run] would set metadata "${metaKey}".`, 'INFO_DETAIL');
        decision.metadataKeys.push(metaKey);
      }
      return;
    }

    this.log.append(`${prefix}: applying ${entries.length} metadata key(s) to ${formatRef(ref)}.`, 'INFO_DETAIL');

    if (hasRoles) {
      try {
        await this.store.clearRoles(ref.id);
        this.log.append(`${prefix}: cleared existing roles before applying imported ones.`, 'INFO_DETAIL');
      } catch (error) {
        this.metadataFailure(decision, this.roleMetadataKey, `${prefix}: error clearing roles`, error);
      }
    }

    for (const [metaKey, value] of entries) {
      try {
        await this.store.setMetadata(ref.id, metaKey, value);
        decision.metadataKeys.push(metaKey);
      } catch (error) {
        this.metadataFailure(decision, metaKey, `${prefix}: error setting metadata "${metaKey}"`, error);
      }
    }
  }

  private applied(outcome: AppliedDecision['outcome'], index: number, key: string, ref: StoreRef): AppliedDecision {
    return { outcome, index, key, ref, metadataKeys: [], metadataErrors: [] };
  }

  private skip(index: number, key: string | null, reason: SkipReason, detail?: string): SkippedDecision {
    const decision: SkippedDecision = { outcome: 'skipped', index, key, reason };
    if (detail !== undefined) {
      decision.detail = detail;
    }
    return decision;
  }

  private storeFailure(index: number, key: string, context: string, error: unknown): SkippedDecision {
    const detail = describe(error);
    this.log.append(`${context}: ${detail}`, 'ERROR');
    return this.skip(index, key, 'STORE_ERROR', detail);
  }

  private metadataFailure(decision: AppliedDecision, key: string, context: string, error: unknown): void {
    const failure: MetadataError = { key, detail: describe(error) };
    this.log.append(`${context}: ${failure.detail}`, 'ERROR');
    decision.metadataErrors.push(failure);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
