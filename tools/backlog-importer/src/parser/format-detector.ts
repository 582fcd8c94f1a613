/**
 * The two document conventions the structured parser understands.
 *
 * - `epic-block`: numbered `Epic 1:` / `Story 1:` sections with bulleted criteria
 * - `story-list`: flat `Story:` entries with `Parent:` and `Dependencies:` fields
 */
export const DOCUMENT_FORMATS = ['epic-block', 'story-list'] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

/** Matches a numbered epic header such as `Epic 3:`. */
export const EPIC_HEADER_PATTERN = /^Epic \d+:/;

export const STORY_LIST_HEADER = 'Story: ';

/**
 * Choose the grammar for a document.
 *
 * Any numbered epic header wins; otherwise the story-list grammar is used,
 * including for empty or unrecognized text (which then yields no issues).
 */
export function detectFormat(text: string): DocumentFormat {
  const lines = text.split('\n').map((line) => line.trim());

  if (lines.some((line) => EPIC_HEADER_PATTERN.test(line))) {
    return 'epic-block';
  }
  if (lines.some((line) => line.startsWith(STORY_LIST_HEADER))) {
    return 'story-list';
  }
  return 'story-list';
}
