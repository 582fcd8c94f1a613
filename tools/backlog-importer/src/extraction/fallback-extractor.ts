import { createIssue, parseIssueType, parsePriority, ISSUE_TYPES, PRIORITIES } from '../types/issues.js';
import type { Issue } from '../types/issues.js';
import type { ClaudeExecutor } from '../utils/claude-executor.js';
import type { Logger } from '../utils/logger.js';
import { fallbackRecordSchema } from './schemas.js';
import type { FallbackRecord } from './schemas.js';

/**
 * Free-text extraction used when structured parsing is not trustworthy.
 * An empty result means "no fallback issues"; implementations do not throw.
 */
export interface FallbackExtractor {
  extract(text: string): Issue[];
}

/**
 * Build the extraction prompt. The JSON shape and the allowed enum strings
 * are the contract checked by {@link parseFallbackResponse}.
 */
export function buildExtractionPrompt(text: string): string {
  return `You are an expert at extracting Jira issues from text.
Given text content, extract all Epics, Stories, and Tasks with their details.

Return the result as a JSON array of objects with this exact structure:
[
  {
    "title": "Issue title",
    "description": "Full description",
    "issue_type": "${ISSUE_TYPES.join('|')}",
    "priority": "${PRIORITIES.join('|')}",
    "story_key": "optional story key",
    "acceptance_criteria": ["criterion 1", "criterion 2"],
    "business_outcome": "optional business outcome",
    "epic_name": "optional epic name",
    "parent": "optional parent reference",
    "dependencies": "optional dependencies",
    "estimated_effort": "optional effort estimate",
    "labels": "optional labels"
  }
]

Guidelines:
- Extract all issues you can find
- Use "Story" as default issue type if unclear
- Use "Medium" as default priority if unclear
- Combine multi-line content appropriately
- Extract acceptance criteria as separate items

Please extract all Jira issues from this text:

${text}

Return only the JSON array, no other text.`;
}

const FENCED_BLOCK = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\s*```/;

/**
 * Remove a surrounding Markdown code fence, if any.
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  if (fenced) {
    return fenced[1].trim();
  }
  if (trimmed.startsWith('```')) {
    return trimmed.replace(/^```[a-zA-Z]*/, '').trim();
  }
  return trimmed;
}

export function recordToIssue(record: FallbackRecord): Issue {
  return createIssue({
    title: record.title?.trim() || 'Untitled',
    type: parseIssueType(record.issue_type),
    description: record.description ?? '',
    priority: parsePriority(record.priority),
    storyKey: record.story_key,
    acceptanceCriteria: record.acceptance_criteria ?? [],
    businessOutcome: record.business_outcome,
    epicName: record.epic_name,
    parent: record.parent,
    dependencies: record.dependencies,
    estimatedEffort: record.estimated_effort,
    labels: record.labels,
  });
}

/**
 * Turn the extractor's raw response into issues.
 *
 * Malformed records are skipped one by one; a response that is not a JSON
 * array yields no issues at all.
 */
export function parseFallbackResponse(content: string, logger: Logger): Issue[] {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(content));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('Fallback response is not valid JSON', { error: message });
    return [];
  }

  if (!Array.isArray(data)) {
    logger.warn('Fallback response is not a list');
    return [];
  }

  const issues: Issue[] = [];
  data.forEach((item: unknown, index) => {
    const result = fallbackRecordSchema.safeParse(item);
    if (!result.success) {
      logger.warn('Skipping malformed fallback record', {
        index,
        error: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      });
      return;
    }
    issues.push(recordToIssue(result.data));
  });
  return issues;
}

export interface ClaudeFallbackOptions {
  claude: ClaudeExecutor;
  logger: Logger;
}

/**
 * Fallback extractor backed by the Claude CLI.
 */
export function createClaudeFallbackExtractor(options: ClaudeFallbackOptions): FallbackExtractor {
  const { claude, logger } = options;

  return {
    extract(text: string): Issue[] {
      let response: string;
      try {
        response = claude.complete(buildExtractionPrompt(text));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn('Fallback extraction failed', { model: claude.model, error: message });
        return [];
      }
      return parseFallbackResponse(response, logger);
    },
  };
}
