import type { ImporterConfig } from '../types/config.js';

export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/** Environment variables read by the bundled Jira scripts. */
export const JIRA_ENV_VARS = ['JIRA_BASE_URL', 'JIRA_EMAIL', 'JIRA_TOKEN'] as const;

const PROJECT_KEY_CHARS = /^[A-Za-z0-9-]+$/;

function validateProjectKey(project: string, warnings: string[]): void {
  if (project !== project.toUpperCase()) {
    warnings.push(`jira.project "${project}" should typically be uppercase`);
  }
  if (project.length < 2 || project.length > 10) {
    warnings.push(`jira.project "${project}" should be 2-10 characters long`);
  }
  if (!PROJECT_KEY_CHARS.test(project)) {
    warnings.push(`jira.project "${project}" should contain only letters, numbers, and hyphens`);
  }
}

function validateBaseUrl(url: string, errors: string[], warnings: string[]): void {
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    errors.push('JIRA_BASE_URL must start with http:// or https://');
  }
  if (!url.includes('atlassian')) {
    warnings.push("JIRA_BASE_URL doesn't look like an Atlassian URL");
  }
}

/**
 * Check that a loaded config can drive a full import.
 *
 * Checks:
 * - A Jira project key is configured, and looks like one
 * - Both Jira scripts are configured
 * - The Jira environment the bundled scripts need is present
 * - Gate thresholds are usable
 */
export function validateImporterConfig(
  config: ImporterConfig,
  env: NodeJS.ProcessEnv = process.env,
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { jira, parser } = config;

  const project = jira.project ?? env.JIRA_PROJECT_KEY;
  if (!project) {
    errors.push('Missing Jira project key: set jira.project or JIRA_PROJECT_KEY');
  } else {
    validateProjectKey(project, warnings);
  }

  if (!jira.reading_script) {
    warnings.push('jira.reading_script is not set: existing epics will not be discovered');
  }
  if (!jira.writing_script) {
    errors.push('jira.writing_script is not set: issues cannot be created');
  }

  for (const name of JIRA_ENV_VARS) {
    if (!env[name]) {
      warnings.push(`Missing environment variable: ${name} (needed by the bundled Jira scripts)`);
    }
  }
  const baseUrl = env.JIRA_BASE_URL;
  if (baseUrl) {
    validateBaseUrl(baseUrl, errors, warnings);
  }

  if (parser.gate.min_issues === 0) {
    warnings.push('parser.gate.min_issues is 0: the issue-count check never triggers fallback');
  }
  if (parser.gate.min_lines === 0) {
    warnings.push('parser.gate.min_lines is 0: every document is checked for issue count');
  }

  return { errors, warnings };
}
