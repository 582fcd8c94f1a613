import { createIssue } from '../types/issues.js';
import type { Issue } from '../types/issues.js';
import { epicNamePrefix } from './epic-prefix.js';
import type { IssueKeyMapping } from './issue-key-mapping.js';

/** A synthesized epic and the parent reference it stands in for. */
export interface PlaceholderEpic {
  parent: string;
  epic: Issue;
}

export function placeholderEpicTitle(parent: string): string {
  return `${parent} - Epic`;
}

/**
 * Tokens a created epic is registered under in the epic mapping: the prefix
 * of its epic name, and the full epic name.
 */
export function epicMappingTokens(epic: Issue): string[] {
  if (!epic.epicName) return [];
  const prefix = epicNamePrefix(epic.epicName);
  return prefix === epic.epicName ? [prefix] : [prefix, epic.epicName];
}

/**
 * Build an epic for every parent reference that neither an existing epic nor
 * a document epic will satisfy. One placeholder per distinct parent, in the
 * order the parents first appear.
 *
 * A document epic satisfies a parent only when the parent is one of its
 * mapping tokens, so every parent resolves once the epics are created.
 */
export function synthesizePlaceholderEpics(
  workItems: readonly Issue[],
  documentEpics: readonly Issue[],
  epicMapping: IssueKeyMapping,
): PlaceholderEpic[] {
  const seen = new Set<string>();
  const placeholders: PlaceholderEpic[] = [];

  for (const item of workItems) {
    const parent = item.parent;
    if (!parent || seen.has(parent)) continue;
    seen.add(parent);

    if (epicMapping.has(parent)) continue;
    if (documentEpics.some((epic) => epicMappingTokens(epic).includes(parent))) continue;

    const title = placeholderEpicTitle(parent);
    placeholders.push({
      parent,
      epic: createIssue({
        title,
        type: 'Epic',
        description: `Epic for ${parent} related stories`,
        epicName: title,
      }),
    });
  }

  return placeholders;
}
