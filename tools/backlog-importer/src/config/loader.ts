import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { importerConfigSchema, importerConfigOverrideSchema } from './schema.js';
import type { ImporterConfigOverride } from './schema.js';
import { defaultImporterConfig } from './defaults.js';
import { ConfigError } from './errors.js';
import type { ImporterConfig } from '../types/config.js';

export const CONFIG_PATHS = {
  globalConfig: path.join(
    process.env.HOME || process.env.USERPROFILE || '~',
    '.config',
    'backlog-importer',
    'config.yaml'
  ),
  repoConfigName: '.backlog-importer.yaml',
} as const;

export interface LoadConfigOptions {
  globalConfigPath?: string;
  repoPath?: string;
}

/**
 * Merge an override file over a base config.
 *
 * Every section is merged key by key: keys the override sets replace the
 * base value (an explicit `null` included), unset keys are preserved.
 */
export function mergeConfigs(
  base: ImporterConfig,
  override: ImporterConfigOverride | undefined
): ImporterConfig {
  if (!override) {
    return base;
  }

  return {
    jira: {
      ...base.jira,
      ...override.jira,
    },
    claude: {
      ...base.claude,
      ...override.claude,
    },
    parser: {
      gate: {
        ...base.parser.gate,
        ...override.parser?.gate,
      },
    },
  };
}

/**
 * Read and validate one override file. Returns undefined when it does not
 * exist; an empty file is an empty override.
 */
function readOverride(configPath: string, label: string): ImporterConfigOverride | undefined {
  if (!fs.existsSync(configPath)) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not read ${label} config at ${configPath}: ${reason}`, configPath);
  }

  const result = importerConfigOverrideSchema.safeParse(parsed ?? null);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${label} config at ${configPath}: ${result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join(', ')}`,
      configPath
    );
  }
  return result.data ?? undefined;
}

/**
 * Load and merge config from global and repo locations.
 *
 * Priority: repo config > global config > embedded default.
 * Validates the final merged result against the Zod schema.
 */
export function loadConfig(options: LoadConfigOptions = {}): ImporterConfig {
  const globalPath = options.globalConfigPath ?? CONFIG_PATHS.globalConfig;
  const repoPath = options.repoPath ?? process.cwd();
  const repoConfigPath = path.join(repoPath, CONFIG_PATHS.repoConfigName);

  const globalConfig = mergeConfigs(defaultImporterConfig, readOverride(globalPath, 'global'));
  const merged = mergeConfigs(globalConfig, readOverride(repoConfigPath, 'repo'));

  const result = importerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid merged config: ${result.error.issues.map((i) => i.message).join(', ')}`,
      repoConfigPath
    );
  }

  return result.data;
}
