import * as path from 'node:path';
import { loadConfig } from '../../config/loader.js';
import { enhanceIssues } from '../../enhance/enhance-issue.js';
import { createJiraExecutor } from '../../jira/executor.js';
import { createJiraIssueTracker } from '../../jira/tracker.js';
import { createIssuesBatch, planIssueCreation } from '../../resolver/batch-creator.js';
import type { CreationPlan } from '../../resolver/batch-creator.js';
import type { BatchResult, IssueTracker } from '../../resolver/types.js';
import type { Issue } from '../../types/issues.js';
import { createClaudeExecutor } from '../../utils/claude-executor.js';
import { createLogger } from '../../utils/logger.js';
import { parseBacklog } from './parse.js';
import type { ParseBacklogDeps, ParseBacklogOptions, ParseBacklogResult } from './parse.js';

/**
 * Raised when a backlog document yields nothing to create.
 */
export class NoIssuesFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`No issues found in ${filePath}`);
    this.name = 'NoIssuesFoundError';
  }
}

export interface CreateBacklogOptions extends ParseBacklogOptions {
  /** Overrides `jira.project` from config. */
  project?: string;
  enhance: boolean;
  dryRun: boolean;
}

export interface CreateBacklogDeps extends ParseBacklogDeps {
  tracker?: IssueTracker;
  env?: NodeJS.ProcessEnv;
}

export type CreateBacklogResult =
  | { mode: 'dry-run'; parsed: ParseBacklogResult; issues: Issue[]; plan: CreationPlan }
  | { mode: 'created'; parsed: ParseBacklogResult; issues: Issue[]; project: string; result: BatchResult };

/**
 * Parse a backlog document and create its issues in Jira.
 *
 * With `dryRun` nothing outside the process is touched and the creation
 * plan is returned instead (no epic discovery, so placeholders are listed
 * for every parent no document epic covers).
 */
export async function createBacklog(
  options: CreateBacklogOptions,
  deps: CreateBacklogDeps = {},
): Promise<CreateBacklogResult> {
  const logger = deps.logger ?? createLogger(options.verbose ?? false);
  const config =
    deps.config ?? loadConfig({ repoPath: options.repoPath, globalConfigPath: options.globalConfigPath });
  const claude = deps.claude ?? createClaudeExecutor(config.claude);

  const parsed = parseBacklog(options, { config, claude, logger });
  if (parsed.issues.length === 0) {
    throw new NoIssuesFoundError(parsed.file);
  }

  const issues = options.enhance
    ? enhanceIssues(parsed.issues, { claude, logger })
    : parsed.issues;

  if (options.dryRun) {
    return { mode: 'dry-run', parsed, issues, plan: planIssueCreation(issues) };
  }

  const env = deps.env ?? process.env;
  const project = options.project ?? config.jira.project ?? env.JIRA_PROJECT_KEY;
  if (!project) {
    throw new Error('Jira project not configured: pass --project or set jira.project in config');
  }

  let tracker = deps.tracker;
  if (!tracker) {
    const executor = createJiraExecutor(config.jira, path.resolve(options.repoPath));
    if (!executor.canWrite()) {
      throw new Error('Jira writing not configured: writing_script is not set in config');
    }
    tracker = createJiraIssueTracker(executor);
  }

  const result = await createIssuesBatch(issues, { tracker, project, logger });
  logger.info('Creation run complete', {
    project,
    created: result.created.length,
    failed: result.failed.length,
    links: result.links.length,
  });

  return { mode: 'created', parsed, issues, project, result };
}
