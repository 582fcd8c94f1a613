// Schemas
export {
  searchEpicsInputSchema,
  createIssueInputSchema,
  createLinkInputSchema,
  jiraEpicSearchResultSchema,
  jiraCreateIssueResultSchema,
  jiraCreateLinkResultSchema,
} from './schemas.js';

// Types
export type {
  SearchEpicsInput,
  CreateIssueInput,
  CreateIssueRequest,
  CreateLinkInput,
  JiraEpicSearchResult,
  JiraCreateIssueResult,
  JiraCreateLinkResult,
  JiraExecutor,
} from './types.js';

// Executor
export { createJiraExecutor, JiraScriptError, JiraTimeoutError, JiraValidationError } from './executor.js';
export type { JiraExecutorOptions } from './executor.js';

// Tracker adapter
export { createJiraIssueTracker } from './tracker.js';
export { buildCreateIssueInput, formatIssueDescription } from './payload.js';
export { parseLabels } from './labels.js';
