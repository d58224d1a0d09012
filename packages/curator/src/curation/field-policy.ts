/**
 * Field Policy
 *
 * Closed catalog of record fields plus the two business rules layered on top
 * of the merge engine:
 *
 * - VOLATILITY: high-churn fields (subjective scores, tier labels, visit
 *   duration) auto-apply only from trusted, confident sources.
 * - DOMAIN ELIGIBILITY: a closed set of fields is legal only when the record's
 *   domain tag matches the eligible domain. The predicate is an explicit
 *   function of the domain value, evaluated once per field at merge time.
 *
 * Fields outside the catalog are rejected (`unknown_field`).
 */

import { TrustLevel, type FieldValue } from '@museum-curation/types';
import { isAtLeast, type EnrichedField } from '../provenance/trust-model.js';

// ============================================================================
// Catalog
// ============================================================================

/**
 * Fields every record may carry regardless of domain
 */
export const CORE_FIELDS = [
  'museum_name',
  'alternate_names',
  'city',
  'state_province',
  'street_address',
  'postal_code',
  'website',
  'phone',
  'latitude',
  'longitude',
  'primary_domain',
  'museum_type',
  'audience_focus',
  'city_tier',
  'reputation',
  'collection_tier',
  'time_needed',
  'nearby_record_count',
  'notes',
] as const;

/**
 * Fields only valid on records in the eligible domain (art scoring)
 */
export const DOMAIN_CONDITIONAL_FIELDS = [
  'impressionist_strength',
  'modern_contemporary_strength',
  'historical_context_score',
] as const;

/**
 * Written by deterministic stages only; never accepted from adapters
 */
export const DERIVED_FIELDS = ['priority_score', 'primary_art', 'overall_quality_score'] as const;

export const DEFAULT_VOLATILE_FIELDS = [
  'reputation',
  'collection_tier',
  'time_needed',
  'city_tier',
  'impressionist_strength',
  'modern_contemporary_strength',
  'historical_context_score',
] as const;

export const DOMAIN_FIELD = 'primary_domain';
export const DEFAULT_ELIGIBLE_DOMAIN = 'Art';

/**
 * Minimum trust for a volatile field to auto-apply
 */
export const VOLATILE_TRUST_FLOOR = TrustLevel.ENCYCLOPEDIA_SUMMARY;
export const DEFAULT_CONFIDENCE_THRESHOLD = 4;

// ============================================================================
// Policy
// ============================================================================

export interface FieldPolicyConfig {
  readonly volatileFields: readonly string[];
  readonly domainFields: readonly string[];
  readonly eligibleDomain: string;
  readonly confidenceThreshold: number;
}

export const DEFAULT_FIELD_POLICY_CONFIG: FieldPolicyConfig = {
  volatileFields: DEFAULT_VOLATILE_FIELDS,
  domainFields: DOMAIN_CONDITIONAL_FIELDS,
  eligibleDomain: DEFAULT_ELIGIBLE_DOMAIN,
  confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
};

export class FieldPolicy {
  private readonly catalog: ReadonlySet<string>;
  private readonly volatile: ReadonlySet<string>;
  private readonly domainConditional: ReadonlySet<string>;

  constructor(private readonly config: FieldPolicyConfig = DEFAULT_FIELD_POLICY_CONFIG) {
    this.domainConditional = new Set(config.domainFields);
    this.volatile = new Set(config.volatileFields);
    this.catalog = new Set<string>([...CORE_FIELDS, ...config.domainFields]);
  }

  get confidenceThreshold(): number {
    return this.config.confidenceThreshold;
  }

  get eligibleDomain(): string {
    return this.config.eligibleDomain;
  }

  isKnownField(field: string): boolean {
    return this.catalog.has(field);
  }

  isVolatile(field: string): boolean {
    return this.volatile.has(field);
  }

  isDomainConditional(field: string): boolean {
    return this.domainConditional.has(field);
  }

  /**
   * Domain predicate: does a record with this domain tag accept
   * domain-conditional fields?
   */
  isEligibleDomain(domain: FieldValue | undefined): boolean {
    return typeof domain === 'string' && domain.trim() === this.config.eligibleDomain;
  }

  /**
   * Volatility gate. MANUAL_OVERRIDE always passes.
   */
  passesVolatilityGate(candidate: EnrichedField): boolean {
    if (candidate.trust_level === TrustLevel.MANUAL_OVERRIDE) return true;
    return (
      isAtLeast(candidate.trust_level, VOLATILE_TRUST_FLOOR) &&
      candidate.confidence >= this.config.confidenceThreshold
    );
  }

  /**
   * Copy with a different confidence threshold (run parameter)
   */
  withConfidenceThreshold(confidenceThreshold: number): FieldPolicy {
    return new FieldPolicy({ ...this.config, confidenceThreshold });
  }
}
