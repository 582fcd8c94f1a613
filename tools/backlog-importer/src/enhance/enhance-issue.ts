import { withIssueChanges } from '../types/issues.js';
import type { Issue } from '../types/issues.js';
import type { ClaudeExecutor } from '../utils/claude-executor.js';
import type { Logger } from '../utils/logger.js';

export const ENHANCEMENT_MARKER = '--- AI Enhanced ---';

export interface EnhanceOptions {
  claude: ClaudeExecutor;
  logger: Logger;
}

export function buildEnhancementPrompt(issue: Issue): string {
  const criteria = issue.acceptanceCriteria.map((c) => `- ${c.description}`).join('\n');

  return `You are an expert at writing Jira tickets. Given a basic issue description,
enhance it with:
1. Clear, actionable acceptance criteria
2. Improved description with technical details
3. Better formatting for Jira

Keep the original intent but make it more professional and detailed.

Please enhance this Jira ${issue.type}:

Title: ${issue.title}
Description: ${issue.description}

Current Acceptance Criteria:
${criteria || '(none)'}

Please provide an enhanced version with better formatting and
more detailed acceptance criteria.`;
}

/**
 * Ask the LLM for an improved write-up and append it to the description.
 *
 * Returns a new issue; every other field is carried forward. On failure the
 * original issue is returned unchanged.
 */
export function enhanceIssue(issue: Issue, options: EnhanceOptions): Issue {
  const { claude, logger } = options;

  let response: string;
  try {
    response = claude.complete(buildEnhancementPrompt(issue));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('Could not enhance issue', { title: issue.title, error: message });
    return issue;
  }

  if (!response) {
    logger.warn('Enhancement returned no text', { title: issue.title });
    return issue;
  }

  return withIssueChanges(issue, {
    description: `${issue.description}\n\n${ENHANCEMENT_MARKER}\n${response}`,
  });
}

export function enhanceIssues(issues: readonly Issue[], options: EnhanceOptions): Issue[] {
  return issues.map((issue) => {
    options.logger.debug('Enhancing issue', { title: issue.title });
    return enhanceIssue(issue, options);
  });
}
