// Issue model
export {
  ISSUE_TYPES,
  PRIORITIES,
  DEFAULT_PRIORITY,
  DEFAULT_ISSUE_TYPE,
  createIssue,
  withIssueChanges,
  parsePriority,
  parseIssueType,
  partitionIssues,
} from './types/issues.js';
export type {
  AcceptanceCriterion,
  Issue,
  IssueFields,
  IssueType,
  Priority,
  PartitionedIssues,
} from './types/issues.js';
export type { ImporterConfig, JiraConfig, ClaudeConfig, GateConfig } from './types/config.js';

// Parsing
export { detectFormat, DOCUMENT_FORMATS } from './parser/format-detector.js';
export type { DocumentFormat } from './parser/format-detector.js';
export { parseDocument } from './parser/parse-document.js';
export {
  DEFAULT_GATE_THRESHOLDS,
  evaluateExtraction,
  shouldUseFallback,
  countEmptyIssues,
} from './parser/quality-gate.js';
export type { QualityGateThresholds, GateDecision, GateReason } from './parser/quality-gate.js';

// Extraction
export { extractIssues, extractIssuesFromFile } from './extraction/extract-issues.js';
export type { ExtractOptions, ExtractionResult } from './extraction/extract-issues.js';
export {
  buildExtractionPrompt,
  parseFallbackResponse,
  createClaudeFallbackExtractor,
} from './extraction/fallback-extractor.js';
export type { FallbackExtractor } from './extraction/fallback-extractor.js';
export { InputReadError } from './extraction/errors.js';

// Resolution and creation
export * from './resolver/index.js';
export * from './jira/index.js';
export { enhanceIssue, enhanceIssues } from './enhance/enhance-issue.js';

// Config
export { loadConfig, mergeConfigs, CONFIG_PATHS } from './config/loader.js';
export { ConfigError } from './config/errors.js';
export { validateImporterConfig } from './validators/config-validator.js';

// Utilities
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export { createClaudeExecutor, ClaudeCliError } from './utils/claude-executor.js';
export type { ClaudeExecutor } from './utils/claude-executor.js';
