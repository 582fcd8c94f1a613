/**
 * Jira integration settings. Script paths are resolved against the repo
 * root unless absolute.
 */
export interface JiraConfig {
  reading_script?: string | null;
  writing_script?: string | null;
  project?: string | null;
}

export interface ClaudeConfig {
  /** Model alias passed to `claude --model`. */
  model: string;
  /** Use the LLM fallback extractor when structured parsing looks incomplete. */
  fallback: boolean;
}

export interface GateConfig {
  min_lines: number;
  min_issues: number;
  min_description_length: number;
}

export interface ParserConfig {
  gate: GateConfig;
}

export interface ImporterConfig {
  jira: JiraConfig;
  claude: ClaudeConfig;
  parser: ParserConfig;
}
