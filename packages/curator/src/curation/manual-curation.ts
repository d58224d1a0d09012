/**
 * Manual Curation
 *
 * The human path into the record store: MANUAL_OVERRIDE values, field locks,
 * and clearing a known value (the only way a stored value becomes null).
 * Every action runs under the partition lock, commits once, and is appended
 * to the curation audit log.
 */

import { TrustLevel, type FieldValue } from '@museum-curation/types';
import { createLogger } from '../core/utils/logger.js';
import { createManualOverride } from '../provenance/trust-model.js';
import { PartitionSession } from '../persistence/partition-session.js';
import type { PartitionStore } from '../persistence/partition-store.js';
import type { CurationAuditLog, CurationAuditInput } from './curation-audit.js';
import { RecordUpdater, type ApplySummary } from './record-updater.js';

const log = createLogger({ module: 'manual-curation' });

export interface ManualActionTarget {
  readonly partition: string;
  readonly recordId: string;
  readonly field: string;
  readonly curator: string;
  readonly reason?: string;
}

export interface OverrideRequest extends ManualActionTarget {
  readonly value: FieldValue;
  /** Lock the field after a successful override */
  readonly lock?: boolean;
}

export type ClearOutcome = 'cleared' | 'already_empty' | 'unknown_field';

export interface ManualCurationOptions {
  readonly dryRun?: boolean;
  readonly now?: () => Date;
}

export class ManualCuration {
  private readonly now: () => Date;
  private readonly dryRun: boolean;

  constructor(
    private readonly store: PartitionStore,
    private readonly audit: CurationAuditLog | null,
    private readonly updater: RecordUpdater = new RecordUpdater(),
    options: ManualCurationOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Apply a MANUAL_OVERRIDE value. Passes the lock; an empty value is
   * rejected like any other (see `clear`), and normalization, the field
   * catalog and domain eligibility still apply.
   */
  async override(request: OverrideRequest): Promise<ApplySummary> {
    const candidate = createManualOverride(
      { value: request.value, curator: request.curator, retrievedAt: this.now() },
      this.now
    );

    return this.withSession(request.partition, (session) => {
      const before = session.getField(request.recordId, request.field) ?? null;
      const summary = this.updater.applyBatch(
        session,
        request.recordId,
        { [request.field]: candidate },
        { allowManualOverride: true }
      );
      const applied = summary.applied_fields.length > 0;
      if (applied && request.lock) {
        session.lockField(request.recordId, request.field);
      }

      const audit: CurationAuditInput = {
        action: 'override',
        partition: request.partition,
        record_id: request.recordId,
        field: request.field,
        actor: request.curator,
        reason: request.reason,
        before,
        after: session.getField(request.recordId, request.field) ?? null,
        outcome: applied
          ? summary.applied_fields[0]?.reason ?? 'applied'
          : summary.rejected_fields[0]?.reason ?? 'rejected',
      };
      return { result: summary, audit };
    });
  }

  async lock(target: ManualActionTarget): Promise<boolean> {
    return this.withSession(target.partition, (session) => {
      const changed = session.lockField(target.recordId, target.field);
      const audit: CurationAuditInput = {
        action: 'lock',
        partition: target.partition,
        record_id: target.recordId,
        field: target.field,
        actor: target.curator,
        reason: target.reason,
        outcome: changed ? 'locked' : 'already_locked',
      };
      return { result: changed, audit };
    });
  }

  async unlock(target: ManualActionTarget): Promise<boolean> {
    return this.withSession(target.partition, (session) => {
      const changed = session.unlockField(target.recordId, target.field);
      const audit: CurationAuditInput = {
        action: 'unlock',
        partition: target.partition,
        record_id: target.recordId,
        field: target.field,
        actor: target.curator,
        reason: target.reason,
        outcome: changed ? 'unlocked' : 'not_locked',
      };
      return { result: changed, audit };
    });
  }

  /**
   * Remove a field's value under MANUAL_OVERRIDE provenance.
   */
  async clear(target: ManualActionTarget): Promise<ClearOutcome> {
    return this.withSession(target.partition, (session) => {
      const before = session.getField(target.recordId, target.field) ?? null;
      let outcome: ClearOutcome;

      if (!this.updater.fieldPolicy.isKnownField(target.field)) {
        outcome = 'unknown_field';
      } else if (before === null) {
        outcome = 'already_empty';
      } else {
        const at = this.now();
        session.setField(target.recordId, target.field, null, {
          source: `manual:${target.curator}`,
          trust_level: TrustLevel.MANUAL_OVERRIDE,
          retrieved_at: at.toISOString(),
          confidence: 5,
        });
        session.addDataSource(target.recordId, `manual:${target.curator}`);
        session.touch(target.recordId, at);
        outcome = 'cleared';
      }

      const audit: CurationAuditInput = {
        action: 'clear',
        partition: target.partition,
        record_id: target.recordId,
        field: target.field,
        actor: target.curator,
        reason: target.reason,
        before,
        after: session.getField(target.recordId, target.field) ?? null,
        outcome,
      };
      return { result: outcome, audit };
    });
  }

  /**
   * Lock, load, mutate, commit, then audit. The audit entry is only written
   * once the partition write has succeeded.
   */
  private async withSession<T>(
    partition: string,
    action: (session: PartitionSession) => { result: T; audit: CurationAuditInput }
  ): Promise<T> {
    const lock = await this.store.acquireLock(partition);
    try {
      const session = await PartitionSession.open(this.store, partition, {
        dryRun: this.dryRun,
        now: this.now,
      });
      const { result, audit } = action(session);
      await session.commit();
      await this.record(audit);
      return result;
    } finally {
      await lock.release();
    }
  }

  private async record(input: CurationAuditInput): Promise<void> {
    log.info('Manual curation action', {
      action: input.action,
      partition: input.partition,
      recordId: input.record_id,
      field: input.field,
      outcome: input.outcome,
      dryRun: this.dryRun,
    });
    if (this.audit && !this.dryRun) {
      await this.audit.append(input);
    }
  }
}
