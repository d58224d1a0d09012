/**
 * Pipeline Orchestrator
 *
 * Runs an ordered list of stages over every partition of a run:
 *
 *   acquire lock -> load session -> for each stage: prerequisite -> run
 *   -> commit (one write per stage) -> release lock
 *
 * then finalize stages once, then the drift gate.
 *
 * DESIGN:
 * - Budget and failure-rate gates return `GateSignal` values; the first
 *   non-ok signal stops the loop and becomes the terminal state
 * - On abort the open session is still committed and artifacts still flushed
 * - An unmet prerequisite, a failed stage or an unreadable/locked partition
 *   skips that partition's remaining stages; the next partition proceeds
 * - Finalize stages run only when every partition completed every stage
 * - Target selection and the drift lookup leave unreadable partitions out,
 *   so a bad partition never keeps the run from flushing its artifacts
 * - Under dry-run the drift gate reads the sessions' would-be records
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { randomBytes } from 'node:crypto';
import type { CuratedRecord } from '@museum-curation/types';
import {
  StagePrerequisiteError,
  errorMessage,
  isCuratorError,
} from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { InMemoryAdapterCache, type AdapterCache } from '../cache/adapter-cache.js';
import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_ELIGIBLE_DOMAIN,
  DEFAULT_VOLATILE_FIELDS,
  DOMAIN_CONDITIONAL_FIELDS,
  FieldPolicy,
} from '../curation/field-policy.js';
import { RecordUpdater, type ApplySummary } from '../curation/record-updater.js';
import { PartitionSession } from '../persistence/partition-session.js';
import type { PartitionLock } from '../persistence/partition-lock.js';
import type { PartitionStore } from '../persistence/partition-store.js';
import {
  DEFAULT_DRIFT_THRESHOLD,
  buildRecordLookup,
  checkDrift,
  loadGoldSet,
  type DriftReport,
  type GoldSet,
} from '../validators/drift-gate.js';
import { BudgetState, DEFAULT_BUDGET_USD, DEFAULT_RESERVE_RATIO } from './budget.js';
import {
  DEFAULT_FAILURE_RATE_THRESHOLD,
  FailureRateTracker,
  GATE_OK,
  checkBudget,
  checkDriftSignal,
  terminalStateFor,
  type GateSignal,
  type RunState,
} from './gates.js';
import {
  RunArtifactRecorder,
  type RunArtifacts,
  type RunMetrics,
  type RunSummary,
  type StageOutcome,
} from './run-artifacts.js';
import {
  checkPrerequisite,
  type CandidateBatch,
  type FinalizeStage,
  type PartitionStage,
  type RecordStage,
  type Stage,
  type StageContext,
  type StageMetrics,
  type StageResult,
} from './stages.js';
import { DEFAULT_TOP_N, selectTargetsFromStore, targetKey } from './target-selection.js';

const log = createLogger({ module: 'orchestrator' });

// ============================================================================
// Types
// ============================================================================

/**
 * Run parameters consumed by the orchestrator
 */
export interface RunParameters {
  readonly budgetUsd: number;
  readonly reserveRatio: number;
  readonly confidenceThreshold: number;
  readonly volatileFields: readonly string[];
  readonly domainFields: readonly string[];
  readonly eligibleDomain: string;
  /** Top-N records for expensive stages */
  readonly topN: number;
  readonly failureRateThreshold: number;
  /** Records processed before the failure-rate gate may trip */
  readonly failureMinSample: number;
  readonly driftThreshold: number;
  readonly goldSetPath: string | null;
  readonly dryRun: boolean;
  /** `null` keeps run artifacts in memory */
  readonly runsDir: string | null;
}

export const DEFAULT_RUN_PARAMETERS: RunParameters = {
  budgetUsd: DEFAULT_BUDGET_USD,
  reserveRatio: DEFAULT_RESERVE_RATIO,
  confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
  volatileFields: DEFAULT_VOLATILE_FIELDS,
  domainFields: DOMAIN_CONDITIONAL_FIELDS,
  eligibleDomain: DEFAULT_ELIGIBLE_DOMAIN,
  topN: DEFAULT_TOP_N,
  failureRateThreshold: DEFAULT_FAILURE_RATE_THRESHOLD,
  failureMinSample: 1,
  driftThreshold: DEFAULT_DRIFT_THRESHOLD,
  goldSetPath: null,
  dryRun: false,
  runsDir: null,
};

export interface PipelineOrchestratorOptions {
  readonly store: PartitionStore;
  readonly stages: readonly Stage[];
  readonly params?: Partial<RunParameters>;
  /** Shared adapter cache; an in-memory cache is created when omitted */
  readonly cache?: AdapterCache;
  /** Gold set supplied directly instead of through `goldSetPath` */
  readonly goldSet?: GoldSet;
  readonly runId?: string;
  readonly now?: () => Date;
}

export interface RunResult {
  readonly runId: string;
  readonly state: RunState;
  readonly signal: GateSignal;
  readonly partitions: readonly string[];
  readonly failedPartitions: readonly string[];
  readonly summary: RunSummary;
  readonly metrics: RunMetrics;
  readonly artifacts: RunArtifacts;
  readonly driftReport: DriftReport | null;
}

interface PartitionOutcome {
  /** Every stage ran and succeeded */
  readonly completed: boolean;
  readonly signal: GateSignal;
}

interface StageRunOutcome {
  readonly result: StageResult;
  readonly signal: GateSignal;
}

export function generateRunId(at: Date): string {
  const stamp = at.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
  return `run-${stamp}-${randomBytes(3).toString('hex')}`;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class PipelineOrchestrator {
  private readonly params: RunParameters;
  private readonly store: PartitionStore;
  private readonly stages: readonly Stage[];
  private readonly cache: AdapterCache;
  private readonly now: () => Date;

  constructor(private readonly options: PipelineOrchestratorOptions) {
    this.params = { ...DEFAULT_RUN_PARAMETERS, ...options.params };
    this.store = options.store;
    this.stages = options.stages;
    this.cache = options.cache ?? new InMemoryAdapterCache();
    this.now = options.now ?? (() => new Date());
  }

  get parameters(): RunParameters {
    return this.params;
  }

  /**
   * Run every stage over `partitions` (all partitions in the store when
   * omitted)
   */
  async run(partitions?: readonly string[]): Promise<RunResult> {
    const startedAt = this.now();
    const runId = this.options.runId ?? generateRunId(startedAt);
    const params = this.params;

    // Fail fast on a bad gold set before anything is written
    const goldSet =
      this.options.goldSet ??
      (params.goldSetPath !== null ? await loadGoldSet(params.goldSetPath) : null);

    const policy = new FieldPolicy({
      volatileFields: params.volatileFields,
      domainFields: params.domainFields,
      eligibleDomain: params.eligibleDomain,
      confidenceThreshold: params.confidenceThreshold,
    });
    const updater = new RecordUpdater(policy, this.now);
    const budget = new BudgetState(params.budgetUsd, params.reserveRatio);
    const failures = new FailureRateTracker(params.failureRateThreshold, params.failureMinSample);
    const recorder = new RunArtifactRecorder(runId, params.runsDir);
    const context: StageContext = {
      runId,
      dryRun: params.dryRun,
      cache: this.cache,
      budget,
      policy,
      now: this.now,
    };

    const partitionList = partitions ? [...partitions] : await this.store.listPartitions();
    const targets = this.stages.some((stage) => stage.kind === 'record' && stage.expensive)
      ? await selectTargetsFromStore(this.store, partitionList, policy, params.topN)
      : new Set<string>();
    const runLog = log.child({ runId });

    runLog.info('Run started', {
      partitions: partitionList.length,
      stages: this.stages.map((stage) => stage.name),
      dryRun: params.dryRun,
      targets: targets.size,
    });

    const run: RunContext = {
      context,
      updater,
      budget,
      failures,
      recorder,
      targets,
      sessionRecords: new Map(),
    };

    let signal: GateSignal = GATE_OK;
    const failedPartitions: string[] = [];

    for (const partition of partitionList) {
      const outcome = await this.runPartition(partition, run);
      if (!outcome.completed) failedPartitions.push(partition);
      signal = outcome.signal;
      if (signal.kind !== 'ok') break;
    }

    const finalizeStages = this.stages.filter(
      (stage): stage is FinalizeStage => stage.kind === 'finalize'
    );
    if (signal.kind === 'ok' && failedPartitions.length === 0) {
      for (const stage of finalizeStages) {
        await this.runFinalizeStage(stage, partitionList, run);
      }
    } else {
      const outcome: StageOutcome =
        signal.kind === 'ok' ? 'skipped_prerequisite' : 'skipped_run_aborted';
      for (const stage of finalizeStages) {
        recorder.recordStage({ partition: null, stage: stage.name, outcome, duration_ms: 0, metrics: {} });
      }
    }

    let driftReport: DriftReport | null = null;
    if (signal.kind === 'ok' && goldSet !== null) {
      // Under dry-run the store still holds the pre-run data; read what the
      // run would have written instead
      const lookup = await buildRecordLookup(this.store, {
        skipUnreadable: true,
        ...(params.dryRun ? { overlay: run.sessionRecords } : {}),
      });
      driftReport = checkDrift(goldSet, lookup, params.driftThreshold);
      recorder.setDriftReport(driftReport);
      signal = checkDriftSignal(driftReport);
    }

    const state = terminalStateFor(signal);
    const finishedAt = this.now();
    const summary: RunSummary = {
      run_id: runId,
      state,
      dry_run: params.dryRun,
      partitions: partitionList,
      started_at: startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      abort_signal: signal.kind === 'ok' ? null : signal,
      budget: budget.snapshot(),
    };
    const baseMetrics = {
      processed: failures.processed,
      failed: failures.failed,
      failure_rate: failures.failureRate,
      budget_total: budget.totalUsd,
      budget_spent: budget.spentUsd,
      budget_remaining: budget.remainingUsd,
      duration_ms: finishedAt.getTime() - startedAt.getTime(),
    };
    const artifacts = await recorder.close(summary, baseMetrics);

    const logMeta = { state, processed: failures.processed, failed: failures.failed };
    if (state === 'completed') {
      runLog.info('Run completed', logMeta);
    } else {
      runLog.warn('Run aborted', { ...logMeta, signal: signal.kind });
    }

    return {
      runId,
      state,
      signal,
      partitions: partitionList,
      failedPartitions,
      summary,
      metrics: { ...baseMetrics, stages: artifacts.stages },
      artifacts,
      driftReport,
    };
  }

  // ==========================================================================
  // Partition loop
  // ==========================================================================

  private async runPartition(partition: string, run: RunContext): Promise<PartitionOutcome> {
    const partitionStages = this.stages.filter(
      (stage): stage is RecordStage | PartitionStage => stage.kind !== 'finalize'
    );
    const { recorder } = run;

    const skipRemaining = (from: number, outcome: StageOutcome): void => {
      for (const stage of partitionStages.slice(from)) {
        recorder.recordStage({ partition, stage: stage.name, outcome, duration_ms: 0, metrics: {} });
      }
    };

    let lock: PartitionLock;
    try {
      lock = await this.store.acquireLock(partition);
    } catch (error) {
      if (!isCuratorError(error)) throw error;
      log.error('Partition unavailable', { partition, error: error.message });
      recorder.addFailure(partition, '(lock)', null, error.message);
      skipRemaining(0, 'skipped_prerequisite');
      return { completed: false, signal: GATE_OK };
    }

    try {
      // One session per partition: later stages see earlier stages' writes,
      // including under dry-run where nothing reaches the store
      let session: PartitionSession;
      try {
        session = await PartitionSession.open(this.store, partition, {
          dryRun: this.params.dryRun,
          now: this.now,
        });
      } catch (error) {
        if (!isCuratorError(error)) throw error;
        log.error('Partition could not be loaded', { partition, error: error.message });
        recorder.addFailure(partition, '(load)', null, error.message);
        skipRemaining(0, 'skipped_prerequisite');
        return { completed: false, signal: GATE_OK };
      }

      try {
        return await this.runStages(partition, partitionStages, session, run, skipRemaining);
      } finally {
        run.sessionRecords.set(partition, session.listRecords());
      }
    } finally {
      await lock.release();
    }
  }

  private async runStages(
    partition: string,
    partitionStages: readonly (RecordStage | PartitionStage)[],
    session: PartitionSession,
    run: RunContext,
    skipRemaining: (from: number, outcome: StageOutcome) => void
  ): Promise<PartitionOutcome> {
    const { recorder } = run;
    for (const [index, stage] of partitionStages.entries()) {
      if (stage.prerequisite) {
        const check = checkPrerequisite(stage.prerequisite, session.listRecords());
        if (!check.met) {
          const error = new StagePrerequisiteError(stage.name, partition, check.ratio, check.required);
          log.warn('Stage prerequisite unmet', {
            partition,
            stage: stage.name,
            prerequisite: stage.prerequisite.description,
            ratio: check.ratio,
          });
          recorder.addFailure(partition, stage.name, null, error.message);
          skipRemaining(index, 'skipped_prerequisite');
          return { completed: false, signal: GATE_OK };
        }
      }

      const started = this.now().getTime();
      const outcome =
        stage.kind === 'record'
          ? await this.runRecordStage(stage, partition, session, run)
          : await this.runPartitionStage(stage, partition, session, run);

      // Written once per stage, aborted or not
      const commit = await session.commit();

      const { result, signal } = outcome;
      recorder.recordStage({
        partition,
        stage: stage.name,
        outcome: result.success ? 'succeeded' : 'failed',
        duration_ms: this.now().getTime() - started,
        ...(result.error !== undefined ? { error: result.error } : {}),
        metrics: { ...result.metrics, dirty_records: commit.dirtyRecords },
      });

      if (signal.kind !== 'ok') {
        skipRemaining(index + 1, 'skipped_run_aborted');
        return { completed: false, signal };
      }
      if (!result.success) {
        recorder.addFailure(partition, stage.name, null, result.error ?? 'stage failed');
        skipRemaining(index + 1, 'skipped_prerequisite');
        return { completed: false, signal: GATE_OK };
      }
    }
    return { completed: true, signal: GATE_OK };
  }

  // ==========================================================================
  // Stage runners
  // ==========================================================================

  private async runRecordStage(
    stage: RecordStage,
    partition: string,
    session: PartitionSession,
    run: RunContext
  ): Promise<StageRunOutcome> {
    const { budget, failures, recorder, updater, context, targets } = run;
    let processed = 0;
    let failed = 0;
    let skipped = 0;
    let applied = 0;
    let rejected = 0;

    const metrics = (): StageMetrics => ({
      processed,
      failed,
      skipped_not_target: skipped,
      applied_fields: applied,
      rejected_fields: rejected,
    });

    for (const recordId of session.recordIds()) {
      const record = session.getRecord(recordId);

      if (stage.expensive && !targets.has(targetKey(partition, recordId))) {
        skipped++;
        continue;
      }

      if (stage.estimateCost) {
        const gate = checkBudget(budget, stage.estimateCost(record), stage.name, recordId);
        if (gate.kind !== 'ok') {
          log.warn('Budget exceeded, aborting run', { partition, stage: stage.name, recordId });
          return { result: { success: true, metrics: metrics() }, signal: gate };
        }
      }

      let batch: CandidateBatch;
      try {
        batch = await stage.enrich(record, context);
      } catch (error) {
        processed++;
        failed++;
        failures.recordFailure();
        const reason = errorMessage(error);
        log.warn('Record enrichment failed', { partition, stage: stage.name, recordId, reason });
        recorder.addFailure(partition, stage.name, recordId, reason);

        const gate = failures.check();
        if (gate.kind !== 'ok') {
          return { result: { success: true, metrics: metrics() }, signal: gate };
        }
        continue;
      }

      budget.record(batch.cost_usd ?? 0);
      const summary = updater.applyBatch(session, recordId, batch.fields, {
        derived: stage.derived ?? false,
      });
      recorder.recordApply(partition, stage.name, summary);
      for (const recommendation of batch.recommendations ?? []) {
        recorder.addRecommendation(partition, stage.name, recommendation);
      }
      applied += summary.applied_fields.length;
      rejected += summary.rejected_fields.length;

      processed++;
      failures.recordSuccess();
      const gate = failures.check();
      if (gate.kind !== 'ok') {
        return { result: { success: true, metrics: metrics() }, signal: gate };
      }
    }

    return { result: { success: true, metrics: metrics() }, signal: GATE_OK };
  }

  private async runPartitionStage(
    stage: PartitionStage,
    partition: string,
    session: PartitionSession,
    run: RunContext
  ): Promise<StageRunOutcome> {
    const { recorder, updater, context } = run;
    try {
      const result = await stage.run({
        partition,
        session,
        context,
        apply: (recordId, candidates, options): ApplySummary => {
          const summary = updater.applyBatch(session, recordId, candidates, options);
          recorder.recordApply(partition, stage.name, summary);
          return summary;
        },
      });
      return { result, signal: GATE_OK };
    } catch (error) {
      const message = errorMessage(error);
      log.error('Partition stage threw', { partition, stage: stage.name, error: message });
      return { result: { success: false, error: message, metrics: {} }, signal: GATE_OK };
    }
  }

  private async runFinalizeStage(
    stage: FinalizeStage,
    partitions: readonly string[],
    run: RunContext
  ): Promise<void> {
    const started = this.now().getTime();
    let result: StageResult;
    try {
      result = await stage.run({ store: this.store, partitions, context: run.context });
    } catch (error) {
      result = { success: false, error: errorMessage(error), metrics: {} };
    }
    if (!result.success) {
      log.error('Finalize stage failed', { stage: stage.name, error: result.error });
      run.recorder.addFailure('*', stage.name, null, result.error ?? 'stage failed');
    }
    run.recorder.recordStage({
      partition: null,
      stage: stage.name,
      outcome: result.success ? 'succeeded' : 'failed',
      duration_ms: this.now().getTime() - started,
      ...(result.error !== undefined ? { error: result.error } : {}),
      metrics: result.metrics,
    });
  }
}

/**
 * Per-run collaborators shared by the stage runners
 */
interface RunContext {
  readonly context: StageContext;
  readonly updater: RecordUpdater;
  readonly budget: BudgetState;
  readonly failures: FailureRateTracker;
  readonly recorder: RunArtifactRecorder;
  readonly targets: ReadonlySet<string>;
  /** Each loaded partition's records as the run left them */
  readonly sessionRecords: Map<string, readonly CuratedRecord[]>;
}
