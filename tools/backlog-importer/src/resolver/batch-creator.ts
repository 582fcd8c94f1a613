import { partitionIssues } from '../types/issues.js';
import type { Issue } from '../types/issues.js';
import type { Logger } from '../utils/logger.js';
import { resolveDependencies } from './dependencies.js';
import { buildEpicMapping } from './epic-prefix.js';
import { IssueKeyMapping } from './issue-key-mapping.js';
import { epicMappingTokens, synthesizePlaceholderEpics } from './placeholders.js';
import type { BatchResult, DiscoveredEpic, IssueTracker } from './types.js';

export interface BatchOptions {
  tracker: IssueTracker;
  project: string;
  logger: Logger;
}

export interface CreationPlan {
  /** Document epics followed by placeholders, in creation order. */
  epics: Issue[];
  placeholders: Issue[];
  /** Parent reference each placeholder stands in for. */
  placeholderParents: ReadonlyMap<Issue, string>;
  workItems: Issue[];
}

/**
 * Order a parsed document for creation: epics first so that work items can
 * be linked under them.
 */
export function planIssueCreation(
  issues: readonly Issue[],
  epicMapping: IssueKeyMapping = new IssueKeyMapping(),
): CreationPlan {
  const { epics, workItems } = partitionIssues(issues);
  const synthesized = synthesizePlaceholderEpics(workItems, epics, epicMapping);
  const placeholders = synthesized.map((p) => p.epic);
  return {
    epics: [...epics, ...placeholders],
    placeholders,
    placeholderParents: new Map(synthesized.map((p) => [p.epic, p.parent])),
    workItems,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function discoverEpics(options: BatchOptions): Promise<DiscoveredEpic[]> {
  const { tracker, project, logger } = options;
  try {
    const epics = await tracker.searchEpics(project);
    logger.info('Discovered existing epics', { project, count: epics.length });
    return epics;
  } catch (err) {
    logger.warn('Epic discovery failed, continuing without existing epics', {
      project,
      error: errorMessage(err),
    });
    return [];
  }
}

/**
 * Create every issue of a document in the tracker.
 *
 * Existing epics are discovered first and indexed by prefix. Epics (document
 * epics, then placeholders for parents nothing else satisfies) are created
 * before work items, and each work item is linked under its parent epic.
 * Dependencies are resolved against everything created so far and become
 * "blocks" links.
 *
 * Only discovery, creation and linking of single items can fail, and each
 * such failure is recorded in the result; the run always completes.
 */
export async function createIssuesBatch(
  issues: readonly Issue[],
  options: BatchOptions,
): Promise<BatchResult> {
  const { tracker, project, logger } = options;

  const discovered = await discoverEpics(options);
  // Parents resolve only through epics; dependencies through everything.
  const epicMapping = buildEpicMapping(discovered, logger);
  const issueMapping = new IssueKeyMapping(epicMapping.entries());

  const plan = planIssueCreation(issues, epicMapping);
  const result: BatchResult = {
    discoveredEpics: discovered.length,
    created: [],
    failed: [],
    links: [],
    placeholders: plan.placeholders,
    unresolvedParents: [],
    unresolvedDependencies: [],
  };

  for (const placeholder of plan.placeholders) {
    logger.info('Adding placeholder epic', { title: placeholder.title });
  }

  for (const epic of plan.epics) {
    let key: string;
    try {
      key = await tracker.createIssue(epic, project);
    } catch (err) {
      logger.warn('Failed to create epic', { title: epic.title, error: errorMessage(err) });
      result.failed.push({ issue: epic, error: errorMessage(err) });
      continue;
    }

    result.created.push({
      issue: epic,
      key,
      epicLink: null,
      placeholder: plan.placeholderParents.has(epic),
    });
    issueMapping.set(key, key);
    const parent = plan.placeholderParents.get(epic);
    const tokens = parent === undefined ? epicMappingTokens(epic) : [...epicMappingTokens(epic), parent];
    for (const token of tokens) {
      epicMapping.set(token, key);
      issueMapping.set(token, key);
    }
    logger.info('Created epic', { key, title: epic.title });
  }

  for (const item of plan.workItems) {
    let epicLink: string | undefined;
    if (item.parent) {
      epicLink = epicMapping.get(item.parent);
      if (epicLink === undefined) {
        logger.warn('Could not resolve parent epic', { title: item.title, parent: item.parent });
        result.unresolvedParents.push({ title: item.title, parent: item.parent });
      }
    }

    let key: string;
    try {
      key = await tracker.createIssue(item, project, epicLink);
    } catch (err) {
      logger.warn('Failed to create issue', { title: item.title, error: errorMessage(err) });
      result.failed.push({ issue: item, error: errorMessage(err) });
      continue;
    }

    result.created.push({ issue: item, key, epicLink: epicLink ?? null, placeholder: false });
    issueMapping.set(key, key);
    issueMapping.set(item.title, key);
    logger.info('Created issue', { key, type: item.type, title: item.title });

    const { keys, unresolved } = resolveDependencies(item.dependencies, issueMapping);
    for (const reference of unresolved) {
      logger.warn('Could not resolve dependency', { title: item.title, reference });
      result.unresolvedDependencies.push({ title: item.title, reference });
    }

    for (const blockingKey of keys) {
      // A partial title match can land on the item itself.
      if (blockingKey === key) continue;
      try {
        await tracker.createLink(blockingKey, key);
        result.links.push({ blockingKey, blockedKey: key, success: true });
        logger.info('Linked dependency', { blocking: blockingKey, blocked: key });
      } catch (err) {
        logger.warn('Failed to link dependency', {
          blocking: blockingKey,
          blocked: key,
          error: errorMessage(err),
        });
        result.links.push({ blockingKey, blockedKey: key, success: false, error: errorMessage(err) });
      }
    }
  }

  return result;
}
