import type { Issue } from '../../src/types/issues.js';
import type { DiscoveredEpic, IssueTracker } from '../../src/resolver/types.js';

export interface CreateCall {
  title: string;
  type: Issue['type'];
  project: string;
  epicLink?: string;
}

export interface FakeTrackerOptions {
  existingEpics?: DiscoveredEpic[];
  /** Key numbers start after this value. */
  startAt?: number;
  failSearch?: boolean;
  /** Titles whose creation fails. */
  failTitles?: string[];
  /** Blocking keys whose link creation fails. */
  failLinksFrom?: string[];
}

/**
 * In-memory IssueTracker that hands out sequential keys and records every call.
 */
export class FakeTracker implements IssueTracker {
  readonly creates: CreateCall[] = [];
  readonly links: Array<[string, string]> = [];
  readonly searches: string[] = [];
  private next: number;

  constructor(private readonly options: FakeTrackerOptions = {}) {
    this.next = options.startAt ?? 100;
  }

  async searchEpics(project: string): Promise<DiscoveredEpic[]> {
    this.searches.push(project);
    if (this.options.failSearch) {
      throw new Error('search unavailable');
    }
    return this.options.existingEpics ?? [];
  }

  async createIssue(issue: Issue, project: string, epicLink?: string): Promise<string> {
    if (this.options.failTitles?.includes(issue.title)) {
      throw new Error(`cannot create ${issue.title}`);
    }
    this.next += 1;
    this.creates.push({ title: issue.title, type: issue.type, project, epicLink });
    return `${project}-${this.next}`;
  }

  async createLink(blockingKey: string, blockedKey: string): Promise<void> {
    if (this.options.failLinksFrom?.includes(blockingKey)) {
      throw new Error(`link from ${blockingKey} rejected`);
    }
    this.links.push([blockingKey, blockedKey]);
  }
}
