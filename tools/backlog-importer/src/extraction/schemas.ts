import { z } from 'zod';

const optionalText = z.string().nullable().optional();

/**
 * One record as emitted by the fallback extractor. Field names are part of
 * the prompt contract and must not change.
 *
 * Enum-like fields are plain strings here; they are normalized with the same
 * mapping the structured parser uses.
 */
export const fallbackRecordSchema = z.object({
  title: optionalText,
  description: optionalText,
  issue_type: optionalText,
  priority: optionalText,
  story_key: optionalText,
  acceptance_criteria: z.array(z.string()).nullable().optional(),
  business_outcome: optionalText,
  epic_name: optionalText,
  parent: optionalText,
  dependencies: optionalText,
  estimated_effort: optionalText,
  labels: optionalText,
});

export type FallbackRecord = z.infer<typeof fallbackRecordSchema>;
