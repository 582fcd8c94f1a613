import { z } from 'zod';

// ─── Stdin schemas ──────────────────────────────────────────────────────────

export const searchEpicsInputSchema = z.object({
  operation: z.literal('search-epics'),
  project: z.string(),
  max_results: z.number().optional().default(100),
});

export const createIssueInputSchema = z.object({
  operation: z.literal('create-issue'),
  project: z.string(),
  summary: z.string(),
  description: z.string(),
  issue_type: z.string(),
  priority: z.string(),
  labels: z.array(z.string()),
  epic_link: z.string().nullable(),
  /** Field that carries the epic link; the writer discovers it when absent. */
  epic_link_field: z.string().nullable().optional(),
});

export const epicLinkFieldInputSchema = z.object({
  operation: z.literal('epic-link-field'),
  project: z.string(),
});

export const createLinkInputSchema = z.object({
  operation: z.literal('create-link'),
  blocking_key: z.string(),
  blocked_key: z.string(),
  link_type: z.string().optional().default('Blocks'),
});

// ─── Stdout schemas ─────────────────────────────────────────────────────────

export const jiraEpicSearchResultSchema = z.object({
  epics: z.array(z.object({
    key: z.string(),
    summary: z.string(),
  })),
});

export const jiraCreateIssueResultSchema = z.object({
  key: z.string(),
  success: z.boolean(),
});

export const jiraEpicLinkFieldResultSchema = z.object({
  field: z.string(),
});

export const jiraCreateLinkResultSchema = z.object({
  blocking_key: z.string(),
  blocked_key: z.string(),
  success: z.boolean(),
});

// ─── Stderr ─────────────────────────────────────────────────────────────────

/** Structured error a script may print on stderr before exiting non-zero. */
export const jiraScriptErrorSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  code: z.string().optional(),
});
