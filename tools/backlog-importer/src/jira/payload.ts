import type { Issue } from '../types/issues.js';
import { parseLabels } from './labels.js';
import type { CreateIssueRequest } from './types.js';

/**
 * Render an issue's body as Jira markdown: epic name first (epics only),
 * then the description, business outcome and numbered acceptance criteria.
 */
export function formatIssueDescription(issue: Issue): string {
  const parts: string[] = [];

  if (issue.type === 'Epic' && issue.epicName) {
    parts.push(`**Epic Name:** ${issue.epicName}`, '');
  }

  parts.push(issue.description);

  if (issue.businessOutcome) {
    parts.push(`\n**Business Outcome:** ${issue.businessOutcome}`);
  }

  if (issue.acceptanceCriteria.length > 0) {
    parts.push('\n**Acceptance Criteria:**');
    issue.acceptanceCriteria.forEach((criterion, index) => {
      parts.push(`${index + 1}. ${criterion.description}`);
    });
  }

  return parts.join('\n');
}

export function buildCreateIssueInput(
  issue: Issue,
  project: string,
  epicLink?: string,
  epicLinkField?: string,
): CreateIssueRequest {
  return {
    project,
    summary: issue.title,
    description: formatIssueDescription(issue),
    issue_type: issue.type,
    priority: issue.priority,
    labels: parseLabels(issue.labels),
    epic_link: epicLink ?? null,
    ...(epicLinkField !== undefined ? { epic_link_field: epicLinkField } : {}),
  };
}
