/**
 * Priority Stage
 *
 * Writes the derived scoring fields (`priority_score`, `primary_art`,
 * `overall_quality_score`) on domain-eligible records. Records outside the
 * eligible domain, and eligible records missing a required score input, carry
 * none of them.
 */

import { DERIVED_FIELDS, DOMAIN_FIELD } from '../curation/field-policy.js';
import type {
  PartitionStage,
  PartitionStageInput,
  StagePrerequisite,
  StageResult,
} from '../orchestration/stages.js';
import { explainPriorityScore, scoringInputsFromRecord } from '../scoring/priority-scorer.js';

export class PriorityStage implements PartitionStage {
  readonly kind = 'partition';
  readonly name = 'priority';
  readonly prerequisite: StagePrerequisite = {
    description: 'city_tier present',
    satisfied: (record) => typeof record.fields.city_tier === 'number',
  };

  async run(input: PartitionStageInput): Promise<StageResult> {
    const { session, context } = input;
    let scored = 0;
    let unscored = 0;
    let ineligible = 0;
    let changed = 0;

    for (const record of session.listRecords()) {
      const id = record.record_id;
      let wrote = false;

      if (!context.policy.isEligibleDomain(record.fields[DOMAIN_FIELD])) {
        ineligible++;
        for (const field of DERIVED_FIELDS) {
          wrote = session.setDerivedField(id, field, undefined) || wrote;
        }
      } else {
        const breakdown = explainPriorityScore(scoringInputsFromRecord(record));
        if (breakdown === null) {
          unscored++;
        } else {
          scored++;
        }
        wrote = session.setDerivedField(id, 'priority_score', breakdown?.score) || wrote;
        wrote = session.setDerivedField(id, 'primary_art', breakdown?.primary_art ?? undefined) || wrote;
        wrote =
          session.setDerivedField(id, 'overall_quality_score', breakdown?.overall_quality_score) ||
          wrote;
      }

      if (wrote) {
        session.touch(id, context.now());
        changed++;
      }
    }

    return {
      success: true,
      metrics: { scored, unscored, ineligible, records_updated: changed },
    };
  }
}
