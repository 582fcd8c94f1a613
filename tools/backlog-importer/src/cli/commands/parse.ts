import { Command } from 'commander';
import { parseBacklog } from '../logic/parse.js';
import { formatIssueSummary, parseResultToJson } from '../formatters/issue-summary.js';
import { emitResult, reportError } from '../utils/output.js';

interface ParseCommandOptions {
  repo: string;
  globalConfig?: string;
  fallback: boolean;
  verbose: boolean;
  pretty: boolean;
  output?: string;
}

export const parseCommand = new Command('parse')
  .description('Extract epics, stories and tasks from a backlog document')
  .argument('<file>', 'Backlog document to parse')
  .option('--repo <path>', 'Path to repository', process.cwd())
  .option('--global-config <path>', 'Path to global config file')
  .option('--no-fallback', 'Never fall back to LLM extraction')
  .option('--verbose', 'Log debug output to stderr', false)
  .option('--pretty', 'Human-readable output', false)
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .action((file: string, options: ParseCommandOptions) => {
    try {
      const result = parseBacklog({
        filePath: file,
        repoPath: options.repo,
        globalConfigPath: options.globalConfig,
        fallback: options.fallback,
        verbose: options.verbose,
      });

      const exitCode = emitResult(
        {
          json: parseResultToJson(result),
          text: formatIssueSummary(result.issues),
          exitCode: result.issues.length > 0 ? 0 : 1,
        },
        options,
      );
      process.exit(exitCode);
    } catch (err) {
      process.exit(reportError(err));
    }
  });
