import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateImporterConfig } from '../../validators/config-validator.js';
import { emitResult, reportError } from '../utils/output.js';

interface ValidateConfigCommandOptions {
  repo?: string;
  globalConfig?: string;
  pretty: boolean;
  output?: string;
}

export const validateConfigCommand = new Command('validate-config')
  .description('Validate importer config and Jira environment')
  .option('--repo <path>', 'Path to repo (default: current directory)')
  .option('--global-config <path>', 'Path to global config file')
  .option('--pretty', 'Pretty-print JSON output', false)
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .action((options: ValidateConfigCommandOptions) => {
    try {
      const config = loadConfig({
        globalConfigPath: options.globalConfig,
        repoPath: options.repo,
      });

      const { errors, warnings } = validateImporterConfig(config);
      const valid = errors.length === 0;
      process.exit(emitResult({ json: { valid, errors, warnings }, exitCode: valid ? 0 : 1 }, options));
    } catch (err) {
      process.exit(reportError(err));
    }
  });
