import type { Issue } from '../types/issues.js';
import type { DiscoveredEpic, IssueTracker } from '../resolver/types.js';
import { buildCreateIssueInput } from './payload.js';
import type { JiraExecutor } from './types.js';

/**
 * Adapt a JiraExecutor to the resolver's IssueTracker port.
 *
 * The epic-link field is looked up once per project, on the first work item
 * created under an epic, and sent with every later create-issue request.
 */
export function createJiraIssueTracker(executor: JiraExecutor): IssueTracker {
  const epicLinkFields = new Map<string, string>();

  async function epicLinkFieldFor(project: string): Promise<string> {
    const cached = epicLinkFields.get(project);
    if (cached !== undefined) {
      return cached;
    }
    const { field } = await executor.epicLinkField(project);
    epicLinkFields.set(project, field);
    return field;
  }

  return {
    async searchEpics(project: string): Promise<DiscoveredEpic[]> {
      const result = await executor.searchEpics(project);
      return result.epics;
    },

    async createIssue(issue: Issue, project: string, epicLink?: string): Promise<string> {
      const epicLinkField = epicLink === undefined ? undefined : await epicLinkFieldFor(project);
      const result = await executor.createIssue(
        buildCreateIssueInput(issue, project, epicLink, epicLinkField),
      );
      if (!result.success) {
        throw new Error(`Jira rejected issue "${issue.title}"`);
      }
      return result.key;
    },

    async createLink(blockingKey: string, blockedKey: string): Promise<void> {
      const result = await executor.createLink(blockingKey, blockedKey);
      if (!result.success) {
        throw new Error(`Jira rejected link ${blockingKey} blocks ${blockedKey}`);
      }
    },
  };
}
