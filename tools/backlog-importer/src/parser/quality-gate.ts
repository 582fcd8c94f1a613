import type { Issue } from '../types/issues.js';

/**
 * Tunable thresholds for deciding whether structured output can be trusted.
 */
export interface QualityGateThresholds {
  /** Documents with more non-blank lines than this must yield `minIssues`. */
  minLinesForCoverageCheck: number;
  minIssues: number;
  /** Descriptions shorter than this (trimmed) count as missing. */
  minDescriptionLength: number;
}

export const DEFAULT_GATE_THRESHOLDS: QualityGateThresholds = {
  minLinesForCoverageCheck: 20,
  minIssues: 3,
  minDescriptionLength: 10,
};

export type GateReason = 'no-issues' | 'low-coverage' | 'mostly-empty';

export interface GateDecision {
  useFallback: boolean;
  reason: GateReason | null;
}

function countNonBlankLines(text: string): number {
  let count = 0;
  for (const line of text.split('\n')) {
    if (line.trim()) count++;
  }
  return count;
}

/**
 * An issue is empty when it has neither a meaningful description nor any
 * acceptance criteria.
 */
export function isEmptyIssue(issue: Issue, minDescriptionLength: number): boolean {
  const description = issue.description.trim();
  return description.length < minDescriptionLength && issue.acceptanceCriteria.length === 0;
}

export function countEmptyIssues(issues: readonly Issue[], minDescriptionLength: number): number {
  return issues.filter((issue) => isEmptyIssue(issue, minDescriptionLength)).length;
}

/**
 * Evaluate the structured parser's output. Rules are checked in order and the
 * first one that fires decides:
 *
 * 1. nothing was extracted
 * 2. a long document produced too few issues
 * 3. more than half of the issues are empty
 */
export function evaluateExtraction(
  text: string,
  issues: readonly Issue[],
  thresholds: QualityGateThresholds = DEFAULT_GATE_THRESHOLDS,
): GateDecision {
  if (issues.length === 0) {
    return { useFallback: true, reason: 'no-issues' };
  }

  if (
    countNonBlankLines(text) > thresholds.minLinesForCoverageCheck &&
    issues.length < thresholds.minIssues
  ) {
    return { useFallback: true, reason: 'low-coverage' };
  }

  const empty = countEmptyIssues(issues, thresholds.minDescriptionLength);
  if (empty > issues.length / 2) {
    return { useFallback: true, reason: 'mostly-empty' };
  }

  return { useFallback: false, reason: null };
}

export function shouldUseFallback(
  text: string,
  issues: readonly Issue[],
  thresholds: QualityGateThresholds = DEFAULT_GATE_THRESHOLDS,
): boolean {
  return evaluateExtraction(text, issues, thresholds).useFallback;
}
