import type { Issue } from '../types/issues.js';

/**
 * An epic that already exists in the tracker.
 */
export interface DiscoveredEpic {
  key: string;
  summary: string;
}

/**
 * The tracker operations a creation run needs. Implementations throw on
 * failure; the batch creator decides which failures are fatal.
 */
export interface IssueTracker {
  searchEpics(project: string): Promise<DiscoveredEpic[]>;
  /** Returns the key of the created issue. */
  createIssue(issue: Issue, project: string, epicLink?: string): Promise<string>;
  /** Record that `blockingKey` blocks `blockedKey`. */
  createLink(blockingKey: string, blockedKey: string): Promise<void>;
}

export interface CreatedIssue {
  issue: Issue;
  key: string;
  /** Epic the work item was linked under, if any. */
  epicLink: string | null;
  placeholder: boolean;
}

export interface FailedIssue {
  issue: Issue;
  error: string;
}

export interface LinkResult {
  blockingKey: string;
  blockedKey: string;
  success: boolean;
  error?: string;
}

export interface UnresolvedParent {
  title: string;
  parent: string;
}

export interface UnresolvedDependency {
  title: string;
  reference: string;
}

export interface BatchResult {
  discoveredEpics: number;
  created: CreatedIssue[];
  failed: FailedIssue[];
  links: LinkResult[];
  placeholders: Issue[];
  unresolvedParents: UnresolvedParent[];
  unresolvedDependencies: UnresolvedDependency[];
}
