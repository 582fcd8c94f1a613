import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { importerConfigSchema } from './schema.js';
import { ConfigError } from './errors.js';
import type { ImporterConfig } from '../types/config.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Root of the backlog-importer package. */
export const PACKAGE_ROOT = path.resolve(__dirname, '../..');

const defaultYamlPath = path.join(PACKAGE_ROOT, 'config/default-config.yaml');

function resolveBundledScript(script: string | null | undefined): string | null {
  if (script == null) {
    return null;
  }
  return path.isAbsolute(script) ? script : path.resolve(PACKAGE_ROOT, script);
}

function loadDefaultConfig(): ImporterConfig {
  const raw = fs.readFileSync(defaultYamlPath, 'utf-8');
  const parsed: unknown = parseYaml(raw);
  const result = importerConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Invalid default config: ${result.error.issues.map((i) => i.message).join(', ')}`,
      defaultYamlPath,
    );
  }

  // Bundled scripts live beside this package, not in the user's repo.
  const { jira } = result.data;
  return {
    ...result.data,
    jira: {
      ...jira,
      reading_script: resolveBundledScript(jira.reading_script),
      writing_script: resolveBundledScript(jira.writing_script),
    },
  };
}

export const defaultImporterConfig: ImporterConfig = loadDefaultConfig();
