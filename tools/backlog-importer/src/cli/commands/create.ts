import { Command } from 'commander';
import { createBacklog, NoIssuesFoundError } from '../logic/create.js';
import {
  batchResultToJson,
  creationPlanToJson,
  formatBatchResult,
  formatCreationPlan,
} from '../formatters/issue-summary.js';
import { emitResult, reportError } from '../utils/output.js';
import type { CommandResult } from '../utils/output.js';

interface CreateCommandOptions {
  repo: string;
  globalConfig?: string;
  project?: string;
  enhance: boolean;
  dryRun: boolean;
  fallback: boolean;
  verbose: boolean;
  pretty: boolean;
  output?: string;
}

export const createCommand = new Command('create')
  .description('Create the issues of a backlog document in Jira')
  .argument('<file>', 'Backlog document to import')
  .option('--repo <path>', 'Path to repository', process.cwd())
  .option('--global-config <path>', 'Path to global config file')
  .option('--project <key>', 'Jira project key (overrides config)')
  .option('--enhance', 'Enhance descriptions with the LLM before creating', false)
  .option('--dry-run', 'Show what would be created without touching Jira', false)
  .option('--no-fallback', 'Never fall back to LLM extraction')
  .option('--verbose', 'Log debug output to stderr', false)
  .option('--pretty', 'Human-readable output', false)
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .action(async (file: string, options: CreateCommandOptions) => {
    try {
      const outcome = await createBacklog({
        filePath: file,
        repoPath: options.repo,
        globalConfigPath: options.globalConfig,
        project: options.project,
        enhance: options.enhance,
        dryRun: options.dryRun,
        fallback: options.fallback,
        verbose: options.verbose,
      });

      const result: CommandResult =
        outcome.mode === 'dry-run'
          ? {
              json: creationPlanToJson(outcome.plan),
              text: formatCreationPlan(outcome.plan),
              exitCode: 0,
            }
          : {
              json: batchResultToJson(outcome.project, outcome.result),
              text: formatBatchResult(outcome.result),
              exitCode: outcome.result.failed.length > 0 ? 1 : 0,
            };

      process.exit(emitResult(result, options));
    } catch (err) {
      process.exit(reportError(err, err instanceof NoIssuesFoundError ? 1 : 2));
    }
  });
