export { IssueKeyMapping } from './issue-key-mapping.js';
export { extractEpicPrefix, epicNamePrefix, buildEpicMapping } from './epic-prefix.js';
export { synthesizePlaceholderEpics, placeholderEpicTitle, epicMappingTokens } from './placeholders.js';
export type { PlaceholderEpic } from './placeholders.js';
export {
  ISSUE_KEY_PATTERN,
  parseDependencies,
  resolveDependency,
  resolveDependencies,
} from './dependencies.js';
export type { DependencyResolution, ResolvedKind, ResolvedDependencies } from './dependencies.js';
export { createIssuesBatch, planIssueCreation } from './batch-creator.js';
export type { BatchOptions, CreationPlan } from './batch-creator.js';
export type * from './types.js';
