/**
 * Adapter Stage
 *
 * Record stage wrapping an external source adapter (knowledge base,
 * encyclopedia, LLM judge, ...). The adapter returns a JSON payload; the
 * stage caches it by request parameters, calls through the resilience
 * helper, and turns each field into a validated candidate envelope.
 *
 * Concrete adapters live outside the core and plug in through
 * `SourceAdapter`.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { z } from 'zod';
import { TrustLevel, type CuratedRecord } from '@museum-curation/types';
import { cachedCall, type JsonValue } from '../cache/adapter-cache.js';
import type { CandidateFields } from '../curation/record-updater.js';
import { createEnrichedField, type EnrichedField } from '../provenance/trust-model.js';
import { callWithResilience, type ResilienceOptions } from '../resilience/retry.js';
import type {
  CandidateBatch,
  RecordStage,
  StageContext,
  StagePrerequisite,
} from '../orchestration/stages.js';

// ============================================================================
// Adapter contract
// ============================================================================

const sourceFieldSchema = z.object({
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  trust_level: z.nativeEnum(TrustLevel),
  confidence: z.number(),
  retrieved_at: z.string().nullable().optional(),
});

const sourceResponseSchema = z.object({
  fields: z.record(sourceFieldSchema),
  cost_usd: z.number().nonnegative().optional(),
});

export type SourceField = z.infer<typeof sourceFieldSchema>;
export type SourceResponse = z.infer<typeof sourceResponseSchema>;

export interface SourceAdapter {
  /** Recorded as the provenance source of every candidate */
  readonly name: string;
  /** Cache key parameters identifying the request for this record */
  requestParams(record: CuratedRecord): JsonValue;
  fetch(record: CuratedRecord): Promise<SourceResponse>;
  /** Pre-call cost estimate in USD (paid adapters) */
  estimateCost?(record: CuratedRecord): number;
}

export interface AdapterStageOptions {
  readonly name?: string;
  /** Restrict to the run's top-N targets */
  readonly expensive?: boolean;
  readonly prerequisite?: StagePrerequisite;
  /** Cache TTL, default 30 days */
  readonly ttlMs?: number;
  readonly resilience?: ResilienceOptions;
}

export const DEFAULT_ADAPTER_TTL_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * Cacheable form of a response. Fields the adapter did not timestamp are
 * stamped with the fetch time, so a cache hit replays the original time.
 */
function toJson(response: SourceResponse, fetchedAt: string): JsonValue {
  const fields: Record<string, JsonValue> = {};
  for (const [field, entry] of Object.entries(response.fields)) {
    fields[field] = {
      value: entry.value,
      trust_level: entry.trust_level,
      confidence: entry.confidence,
      retrieved_at: entry.retrieved_at ?? fetchedAt,
    };
  }
  return response.cost_usd === undefined
    ? { fields }
    : { fields, cost_usd: response.cost_usd };
}

// ============================================================================
// Stage
// ============================================================================

export class AdapterStage implements RecordStage {
  readonly kind = 'record';
  readonly name: string;
  readonly expensive: boolean;
  readonly prerequisite?: StagePrerequisite;
  readonly estimateCost?: (record: CuratedRecord) => number;
  private readonly ttlMs: number;

  constructor(
    private readonly adapter: SourceAdapter,
    private readonly options: AdapterStageOptions = {}
  ) {
    this.name = options.name ?? adapter.name;
    this.expensive = options.expensive ?? false;
    this.ttlMs = options.ttlMs ?? DEFAULT_ADAPTER_TTL_MS;
    if (options.prerequisite) this.prerequisite = options.prerequisite;
    const estimate = adapter.estimateCost;
    if (estimate) {
      this.estimateCost = (record) => estimate.call(adapter, record);
    }
  }

  async enrich(record: CuratedRecord, context: StageContext): Promise<CandidateBatch> {
    const { value: payload, hit } = await cachedCall(
      context.cache,
      this.adapter.name,
      this.adapter.requestParams(record),
      this.ttlMs,
      async () => {
        const response = await callWithResilience(() => this.adapter.fetch(record), {
          operation: `${this.adapter.name}:${record.record_id}`,
          ...this.options.resilience,
        });
        return toJson(response, context.now().toISOString());
      },
      (cached) => (sourceResponseSchema.safeParse(cached).success ? cached : undefined)
    );

    const response = sourceResponseSchema.parse(payload);
    const fields: Record<string, EnrichedField> = {};
    for (const [field, entry] of Object.entries(response.fields)) {
      fields[field] = createEnrichedField(
        {
          value: entry.value,
          source: this.adapter.name,
          trust_level: entry.trust_level,
          confidence: entry.confidence,
          ...(entry.retrieved_at ? { retrieved_at: entry.retrieved_at } : {}),
        },
        context.now
      );
    }

    const candidates: CandidateFields = fields;
    return {
      fields: candidates,
      // Cached responses cost nothing
      cost_usd: hit ? 0 : response.cost_usd ?? 0,
    };
  }
}
