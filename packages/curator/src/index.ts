/**
 * Museum Curator
 *
 * @museum-curation/curator provides:
 * - Trust model and provenance envelopes for candidate field values
 * - Merge engine deciding between stored and candidate values
 * - Record update applier with lock, volatility and domain gates
 * - Deterministic priority scoring and ranking
 * - Budget-governed pipeline orchestration over record partitions
 * - Drift gate against a curated gold set
 *
 * @packageDocumentation
 */

// Trust model and merge engine
export {
  compareTrust,
  isAtLeast,
  coerceTrustLevel,
  trustLevelName,
  createEnrichedField,
  createManualOverride,
  withNormalizedValue,
  toProvenanceEntry,
  type EnrichedField,
  type EnrichedFieldInput,
  type ManualOverrideInput,
} from './provenance/trust-model.js';
export {
  PLACEHOLDER_TOKENS,
  isEmptyValue,
  isMeaningful,
  isPlaceholder,
  decide,
  merge,
  type AcceptReason,
  type RejectReason,
  type MergeReason,
  type MergeDecision,
  type MergeResult,
} from './provenance/merge-engine.js';
export { parseTimestamp, toIsoTimestamp } from './provenance/timestamps.js';

// Record updates
export {
  CORE_FIELDS,
  DOMAIN_CONDITIONAL_FIELDS,
  DERIVED_FIELDS,
  DEFAULT_VOLATILE_FIELDS,
  DOMAIN_FIELD,
  DEFAULT_ELIGIBLE_DOMAIN,
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_FIELD_POLICY_CONFIG,
  FieldPolicy,
  type FieldPolicyConfig,
} from './curation/field-policy.js';
export { normalizeField, normalizeMuseumType, loadMuseumTypes } from './curation/normalizers.js';
export {
  RecordUpdater,
  applyAndPersist,
  type AppliedField,
  type ApplyOptions,
  type ApplySummary,
  type CandidateFields,
  type FieldRejection,
  type RejectionReason,
} from './curation/record-updater.js';
export {
  ManualCuration,
  type ManualActionTarget,
  type OverrideRequest,
  type ClearOutcome,
} from './curation/manual-curation.js';
export {
  CurationAuditLog,
  getCurationAuditPath,
  type CurationAuditEntry,
} from './curation/curation-audit.js';

// Scoring
export {
  explainPriorityScore,
  computePriorityScore,
  scoringInputsFromRecord,
  scoreRecord,
  rankRecords,
  type PriorityInputs,
  type PriorityBreakdown,
  type PrimaryArt,
  type RankedRecord,
} from './scoring/priority-scorer.js';

// Persistence and cache
export {
  FilePartitionStore,
  InMemoryPartitionStore,
  type PartitionData,
  type PartitionStore,
  type RecordIndexDocument,
  type RecordIndexEntry,
} from './persistence/partition-store.js';
export { PartitionSession } from './persistence/partition-session.js';
export {
  InMemoryAdapterCache,
  SqliteAdapterCache,
  cachedCall,
  cacheKey,
  type AdapterCache,
  type JsonValue,
} from './cache/adapter-cache.js';
export { callWithResilience, type ResilienceOptions, type RetryPolicy } from './resilience/retry.js';

// Orchestration
export {
  PipelineOrchestrator,
  DEFAULT_RUN_PARAMETERS,
  type PipelineOrchestratorOptions,
  type RunParameters,
  type RunResult,
} from './orchestration/pipeline-orchestrator.js';
export { BudgetState, estimateCallCost, estimateTokens } from './orchestration/budget.js';
export type { GateSignal, RunState } from './orchestration/gates.js';
export type {
  CandidateBatch,
  FinalizeStage,
  PartitionStage,
  RecordStage,
  Stage,
  StageContext,
  StageResult,
} from './orchestration/stages.js';
export type { RunArtifacts, RunMetrics, RunSummary, ReviewItem } from './orchestration/run-artifacts.js';

// Stages
export { AdapterStage, type SourceAdapter, type SourceResponse } from './stages/adapter-stage.js';
export { BackboneStage } from './stages/backbone-stage.js';
export { PriorityStage } from './stages/priority-stage.js';
export { IndexRebuildStage } from './stages/index-rebuild-stage.js';

// Drift gate
export {
  checkDrift,
  loadGoldSet,
  parseGoldSet,
  type DriftReport,
  type GoldSet,
} from './validators/drift-gate.js';

export * from './core/errors.js';
