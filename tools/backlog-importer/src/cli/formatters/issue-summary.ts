import type { Issue } from '../../types/issues.js';
import type { CreationPlan } from '../../resolver/batch-creator.js';
import type { BatchResult } from '../../resolver/types.js';
import type { ParseBacklogResult } from '../logic/parse.js';

const PREVIEW_LENGTH = 100;

/** JSON shape of an issue in command output. */
export interface IssueJson {
  type: string;
  title: string;
  priority: string;
  description: string;
  story_key: string | null;
  epic_name: string | null;
  parent: string | null;
  dependencies: string | null;
  estimated_effort: string | null;
  labels: string | null;
  business_outcome: string | null;
  acceptance_criteria: string[];
}

export function issueToJson(issue: Issue): IssueJson {
  return {
    type: issue.type,
    title: issue.title,
    priority: issue.priority,
    description: issue.description,
    story_key: issue.storyKey ?? null,
    epic_name: issue.epicName ?? null,
    parent: issue.parent ?? null,
    dependencies: issue.dependencies ?? null,
    estimated_effort: issue.estimatedEffort ?? null,
    labels: issue.labels ?? null,
    business_outcome: issue.businessOutcome ?? null,
    acceptance_criteria: issue.acceptanceCriteria.map((c) => c.description),
  };
}

export function parseResultToJson(result: ParseBacklogResult) {
  return {
    file: result.file,
    format: result.format,
    used_fallback: result.usedFallback,
    gate_reason: result.gateReason,
    counts: result.counts,
    issues: result.issues.map(issueToJson),
  };
}

export function creationPlanToJson(plan: CreationPlan) {
  return {
    dry_run: true,
    epics: plan.epics.map(issueToJson),
    placeholders: plan.placeholders.map((p) => p.title),
    work_items: plan.workItems.map(issueToJson),
  };
}

export function batchResultToJson(project: string, result: BatchResult) {
  return {
    project,
    discovered_epics: result.discoveredEpics,
    created: result.created.map((c) => ({
      key: c.key,
      type: c.issue.type,
      title: c.issue.title,
      epic_link: c.epicLink,
      placeholder: c.placeholder,
    })),
    failed: result.failed.map((f) => ({ title: f.issue.title, error: f.error })),
    links: result.links.map((l) => ({
      blocking_key: l.blockingKey,
      blocked_key: l.blockedKey,
      success: l.success,
      ...(l.error !== undefined ? { error: l.error } : {}),
    })),
    unresolved_parents: result.unresolvedParents,
    unresolved_dependencies: result.unresolvedDependencies,
  };
}

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Human-readable listing of parsed issues, one numbered block per issue.
 */
export function formatIssueSummary(issues: readonly Issue[]): string {
  const lines: string[] = ['Parsed Issues:', '='.repeat(50)];

  issues.forEach((issue, index) => {
    lines.push('', `${index + 1}. ${issue.type}: ${issue.title}`);
    lines.push(`   Priority: ${issue.priority}`);
    if (issue.epicName) lines.push(`   Epic Name: ${issue.epicName}`);
    if (issue.parent) lines.push(`   Parent Epic: ${issue.parent}`);
    if (issue.storyKey) lines.push(`   Story Key: ${issue.storyKey}`);
    if (issue.dependencies) lines.push(`   Dependencies: ${issue.dependencies}`);
    if (issue.estimatedEffort) lines.push(`   Estimated Effort: ${issue.estimatedEffort}`);
    if (issue.labels) lines.push(`   Labels: ${issue.labels}`);
    if (issue.description) lines.push(`   Description: ${preview(issue.description)}`);
    if (issue.businessOutcome) lines.push(`   Business Outcome: ${preview(issue.businessOutcome)}`);
    if (issue.acceptanceCriteria.length > 0) {
      lines.push(`   Acceptance Criteria: ${issue.acceptanceCriteria.length} items`);
    }
  });

  return lines.join('\n') + '\n';
}

export function formatCreationPlan(plan: CreationPlan): string {
  const lines: string[] = ['Dry run: no issues will be created', ''];

  lines.push(`Epics (${plan.epics.length}):`);
  for (const epic of plan.epics) {
    const marker = plan.placeholderParents.has(epic) ? ' (placeholder)' : '';
    lines.push(`  - ${epic.title}${marker}`);
  }

  lines.push('', `Work items (${plan.workItems.length}):`);
  for (const item of plan.workItems) {
    lines.push(`  - ${item.type}: ${item.title}`);
    if (item.parent) lines.push(`      parent: ${item.parent}`);
    if (item.dependencies) lines.push(`      depends on: ${item.dependencies}`);
  }

  return lines.join('\n') + '\n';
}

export function formatBatchResult(result: BatchResult): string {
  const lines: string[] = [`Created ${result.created.length} issues:`];

  for (const created of result.created) {
    const epic = created.epicLink ? ` (epic ${created.epicLink})` : '';
    const marker = created.placeholder ? ' [placeholder]' : '';
    lines.push(`  ${created.key}: ${created.issue.title}${epic}${marker}`);
  }

  const linked = result.links.filter((link) => link.success);
  if (linked.length > 0) {
    lines.push('', `Linked ${linked.length} dependencies:`);
    for (const link of linked) {
      lines.push(`  ${link.blockingKey} blocks ${link.blockedKey}`);
    }
  }

  const problems: string[] = [
    ...result.failed.map((f) => `  failed: ${f.issue.title}: ${f.error}`),
    ...result.links
      .filter((link) => !link.success)
      .map((link) => `  link failed: ${link.blockingKey} blocks ${link.blockedKey}: ${link.error ?? 'unknown error'}`),
    ...result.unresolvedParents.map((p) => `  unresolved parent: ${p.title} -> ${p.parent}`),
    ...result.unresolvedDependencies.map((d) => `  unresolved dependency: ${d.title} -> ${d.reference}`),
  ];
  if (problems.length > 0) {
    lines.push('', 'Problems:', ...problems);
  }

  return lines.join('\n') + '\n';
}
