import { z } from 'zod';
import {
  searchEpicsInputSchema,
  createIssueInputSchema,
  createLinkInputSchema,
  epicLinkFieldInputSchema,
  jiraEpicSearchResultSchema,
  jiraEpicLinkFieldResultSchema,
  jiraCreateIssueResultSchema,
  jiraCreateLinkResultSchema,
} from './schemas.js';

// ─── Input types (inferred from stdin schemas) ─────────────────────────────

export type SearchEpicsInput = z.infer<typeof searchEpicsInputSchema>;
export type CreateIssueInput = z.infer<typeof createIssueInputSchema>;
export type CreateLinkInput = z.infer<typeof createLinkInputSchema>;
export type EpicLinkFieldInput = z.infer<typeof epicLinkFieldInputSchema>;

/** create-issue fields supplied by callers; the executor adds `operation`. */
export type CreateIssueRequest = Omit<CreateIssueInput, 'operation'>;

// ─── Output types (inferred from stdout schemas) ───────────────────────────

export type JiraEpicSearchResult = z.infer<typeof jiraEpicSearchResultSchema>;
export type JiraCreateIssueResult = z.infer<typeof jiraCreateIssueResultSchema>;
export type JiraCreateLinkResult = z.infer<typeof jiraCreateLinkResultSchema>;
export type JiraEpicLinkFieldResult = z.infer<typeof jiraEpicLinkFieldResultSchema>;

// ─── Executor interface ────────────────────────────────────────────────────

export interface JiraExecutor {
  searchEpics(project: string, maxResults?: number): Promise<JiraEpicSearchResult>;
  /** Ask the writing script which field links a work item to its epic. */
  epicLinkField(project: string): Promise<JiraEpicLinkFieldResult>;
  createIssue(request: CreateIssueRequest): Promise<JiraCreateIssueResult>;
  createLink(blockingKey: string, blockedKey: string): Promise<JiraCreateLinkResult>;
  canRead(): boolean;
  canWrite(): boolean;
}
