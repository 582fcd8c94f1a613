import * as path from 'node:path';
import { loadConfig } from '../../config/loader.js';
import { extractIssuesFromFile } from '../../extraction/extract-issues.js';
import type { ExtractionResult } from '../../extraction/extract-issues.js';
import { createClaudeFallbackExtractor } from '../../extraction/fallback-extractor.js';
import type { QualityGateThresholds } from '../../parser/quality-gate.js';
import type { GateConfig, ImporterConfig } from '../../types/config.js';
import type { Issue } from '../../types/issues.js';
import { createClaudeExecutor } from '../../utils/claude-executor.js';
import type { ClaudeExecutor } from '../../utils/claude-executor.js';
import { createLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';

export interface ParseBacklogOptions {
  filePath: string;
  repoPath: string;
  globalConfigPath?: string;
  /** Allow LLM fallback extraction; also requires `claude.fallback` in config. */
  fallback: boolean;
  verbose?: boolean;
}

/**
 * Collaborators a command may override. Tests inject these; the CLI uses
 * the defaults.
 */
export interface ParseBacklogDeps {
  config?: ImporterConfig;
  claude?: ClaudeExecutor;
  logger?: Logger;
}

export interface IssueCounts {
  epics: number;
  stories: number;
  tasks: number;
  total: number;
}

export interface ParseBacklogResult extends ExtractionResult {
  file: string;
  counts: IssueCounts;
}

export function gateThresholdsFromConfig(gate: GateConfig): QualityGateThresholds {
  return {
    minLinesForCoverageCheck: gate.min_lines,
    minIssues: gate.min_issues,
    minDescriptionLength: gate.min_description_length,
  };
}

export function countIssues(issues: readonly Issue[]): IssueCounts {
  return {
    epics: issues.filter((i) => i.type === 'Epic').length,
    stories: issues.filter((i) => i.type === 'Story').length,
    tasks: issues.filter((i) => i.type === 'Task').length,
    total: issues.length,
  };
}

/**
 * Load config and extract the issues of one backlog document.
 */
export function parseBacklog(
  options: ParseBacklogOptions,
  deps: ParseBacklogDeps = {},
): ParseBacklogResult {
  const logger = deps.logger ?? createLogger(options.verbose ?? false);
  const config =
    deps.config ?? loadConfig({ repoPath: options.repoPath, globalConfigPath: options.globalConfigPath });
  const filePath = path.resolve(options.filePath);

  const useFallback = options.fallback && config.claude.fallback;
  const fallback = useFallback
    ? createClaudeFallbackExtractor({
        claude: deps.claude ?? createClaudeExecutor(config.claude),
        logger,
      })
    : undefined;

  const extraction = extractIssuesFromFile(filePath, {
    fallback,
    thresholds: gateThresholdsFromConfig(config.parser.gate),
    logger,
  });

  logger.info('Parsed backlog', {
    file: filePath,
    format: extraction.format,
    issues: extraction.issues.length,
    usedFallback: extraction.usedFallback,
  });

  return { ...extraction, file: filePath, counts: countIssues(extraction.issues) };
}
