/**
 * Run Artifacts
 *
 * Append-only, run-scoped audit trail. Entries accumulate in memory during the
 * run; `close()` writes them once under `<runsDir>/<run_id>/`:
 *
 *   changes.json        per-record applied/rejected field lists
 *   review_queue.json   low-confidence recommendations and stage failures
 *   metrics.json        counts, failure rate, budget, per-stage timings
 *   drift_report.json   when the drift gate ran
 *   summary.json        run id, terminal state, partitions, timestamps
 *
 * Artifacts are written regardless of terminal state and under dry-run.
 */

import { join } from 'node:path';
import type { Recommendation } from '@museum-curation/types';
import { ArtifactsClosedError } from '../core/errors.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import type { AppliedField, ApplySummary, FieldRejection } from '../curation/record-updater.js';
import type { DriftReport } from '../validators/drift-gate.js';
import type { BudgetSnapshot } from './budget.js';
import type { GateSignal, RunState } from './gates.js';
import type { StageMetrics } from './stages.js';

// ============================================================================
// Types
// ============================================================================

export interface ChangeEntry {
  readonly partition: string;
  readonly stage: string;
  readonly record_id: string;
  readonly applied_fields: readonly AppliedField[];
  readonly rejected_fields: readonly FieldRejection[];
}

export type ReviewItem =
  | ({ readonly kind: 'recommendation'; readonly partition: string; readonly stage: string } & Recommendation)
  | {
      readonly kind: 'stage_failure';
      readonly partition: string;
      readonly stage: string;
      readonly record_id: string | null;
      readonly reason: string;
    };

export type StageOutcome = 'succeeded' | 'failed' | 'skipped_prerequisite' | 'skipped_run_aborted';

export interface StageRunRecord {
  readonly partition: string | null;
  readonly stage: string;
  readonly outcome: StageOutcome;
  readonly duration_ms: number;
  readonly error?: string;
  readonly metrics: StageMetrics;
}

export interface RunMetrics {
  readonly processed: number;
  readonly failed: number;
  readonly failure_rate: number;
  readonly budget_total: number;
  readonly budget_spent: number;
  readonly budget_remaining: number;
  readonly duration_ms: number;
  readonly stages: readonly StageRunRecord[];
}

export interface RunSummary {
  readonly run_id: string;
  readonly state: RunState;
  readonly dry_run: boolean;
  readonly partitions: readonly string[];
  readonly started_at: string;
  readonly finished_at: string;
  readonly abort_signal: GateSignal | null;
  readonly budget: BudgetSnapshot;
}

export interface RunArtifacts {
  readonly changes: readonly ChangeEntry[];
  readonly review_queue: readonly ReviewItem[];
  readonly stages: readonly StageRunRecord[];
  readonly drift_report: DriftReport | null;
}

// ============================================================================
// Recorder
// ============================================================================

export class RunArtifactRecorder {
  private readonly changes: ChangeEntry[] = [];
  private readonly reviewQueue: ReviewItem[] = [];
  private readonly stages: StageRunRecord[] = [];
  private driftReport: DriftReport | null = null;
  private closed = false;

  /**
   * @param runsDir - Parent directory for run folders; `null` keeps the
   *   artifacts in memory only
   */
  constructor(
    readonly runId: string,
    private readonly runsDir: string | null
  ) {}

  get runDir(): string | null {
    return this.runsDir === null ? null : join(this.runsDir, this.runId);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Record an apply summary; summaries with nothing applied or rejected are
   * dropped. Recommendations go to the review queue.
   */
  recordApply(partition: string, stage: string, summary: ApplySummary): void {
    this.assertOpen();
    if (summary.applied_fields.length > 0 || summary.rejected_fields.length > 0) {
      this.changes.push({
        partition,
        stage,
        record_id: summary.record_id,
        applied_fields: summary.applied_fields,
        rejected_fields: summary.rejected_fields,
      });
    }
    for (const recommendation of summary.recommendations) {
      this.addRecommendation(partition, stage, recommendation);
    }
  }

  addRecommendation(partition: string, stage: string, recommendation: Recommendation): void {
    this.assertOpen();
    this.reviewQueue.push({ kind: 'recommendation', partition, stage, ...recommendation });
  }

  addFailure(partition: string, stage: string, recordId: string | null, reason: string): void {
    this.assertOpen();
    this.reviewQueue.push({ kind: 'stage_failure', partition, stage, record_id: recordId, reason });
  }

  recordStage(entry: StageRunRecord): void {
    this.assertOpen();
    this.stages.push(entry);
  }

  setDriftReport(report: DriftReport): void {
    this.assertOpen();
    this.driftReport = report;
  }

  snapshot(): RunArtifacts {
    return {
      changes: [...this.changes],
      review_queue: [...this.reviewQueue],
      stages: [...this.stages],
      drift_report: this.driftReport,
    };
  }

  /**
   * Write every artifact once. Further writes throw ArtifactsClosedError.
   */
  async close(summary: RunSummary, metrics: Omit<RunMetrics, 'stages'>): Promise<RunArtifacts> {
    this.assertOpen();
    this.closed = true;
    const artifacts = this.snapshot();

    const dir = this.runDir;
    if (dir !== null) {
      await atomicWriteJSON(join(dir, 'changes.json'), artifacts.changes);
      await atomicWriteJSON(join(dir, 'review_queue.json'), artifacts.review_queue);
      await atomicWriteJSON(join(dir, 'metrics.json'), { ...metrics, stages: artifacts.stages });
      if (artifacts.drift_report !== null) {
        await atomicWriteJSON(join(dir, 'drift_report.json'), artifacts.drift_report);
      }
      await atomicWriteJSON(join(dir, 'summary.json'), summary);
    }
    return artifacts;
  }

  private assertOpen(): void {
    if (this.closed) throw new ArtifactsClosedError(this.runId);
  }
}
