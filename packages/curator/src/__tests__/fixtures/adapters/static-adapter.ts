/**
 * Adapter module used by the CLI tests: answers every record with the
 * configured `notes` value.
 */

import { TrustLevel } from '@museum-curation/types';
import type { SourceAdapter } from '../../../stages/adapter-stage.js';

export default function createStaticAdapter(options: Readonly<Record<string, unknown>>): SourceAdapter {
  const notes = typeof options.notes === 'string' ? options.notes : 'static';
  return {
    name: 'static-notes',
    requestParams: (record) => ({ record_id: record.record_id }),
    fetch: async () => ({
      fields: {
        notes: { value: notes, trust_level: TrustLevel.KNOWLEDGE_BASE, confidence: 0.9 },
      },
    }),
  };
}
