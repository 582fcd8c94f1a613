import { createIssue, parsePriority } from '../types/issues.js';
import type { Issue, Priority } from '../types/issues.js';
import type { DocumentParser } from './document-parser.js';
import { STORY_LIST_HEADER } from './format-detector.js';
import { contentLines, fieldValue } from './line-utils.js';

const FIELD = {
  parent: 'Parent:',
  storyKey: 'Story Key:',
  acceptanceCriteria: 'Acceptance Criteria:',
  priority: 'Priority:',
  dependencies: 'Dependencies:',
  estimatedEffort: 'Estimated Effort:',
  labels: 'Labels:',
} as const;

const USER_STORY_PREFIXES = ['As a ', 'I want ', 'So that '] as const;

/** Headers that end a criterion run instead of being read as a criterion. */
const TRAILING_FIELDS = [
  FIELD.priority,
  FIELD.dependencies,
  FIELD.estimatedEffort,
  FIELD.labels,
] as const;

interface StoryState {
  title: string;
  parent?: string;
  storyKey?: string;
  priority?: Priority;
  dependencies?: string;
  estimatedEffort?: string;
  labels?: string;
  userStory: string[];
  description: string | null;
  inCriteria: boolean;
  criteria: string[];
}

function openStory(title: string): StoryState {
  return {
    title,
    userStory: [],
    description: null,
    inCriteria: false,
    criteria: [],
  };
}

function isUserStoryLine(line: string): boolean {
  return USER_STORY_PREFIXES.some((prefix) => line.startsWith(prefix));
}

function isTrailingField(line: string): boolean {
  return TRAILING_FIELDS.some((field) => line.startsWith(field));
}

function finalize(story: StoryState): Issue {
  // A story without a criteria header still keeps its user-story text.
  const description = story.description ?? story.userStory.join('\n');

  return createIssue({
    title: story.title || 'Untitled Story',
    type: 'Story',
    description,
    priority: story.priority,
    storyKey: story.storyKey,
    parent: story.parent,
    dependencies: story.dependencies,
    estimatedEffort: story.estimatedEffort,
    labels: story.labels,
    acceptanceCriteria: story.criteria,
  });
}

/**
 * Parser for flat story lists:
 *
 * ```
 * Story: [PREP] Buy cleaning supplies
 * Parent: PREP
 * As a manager
 * I want supplies on hand
 * So that cleaning can start
 * Acceptance Criteria:
 * Supplies purchased
 * Receipts filed
 * Priority: High
 * Dependencies: [KITCH] Stock the pantry, OPS-12
 * Estimated Effort: 2 days
 * Labels: purchasing, urgent
 * ```
 *
 * Titles are kept verbatim, bracketed prefix included; the resolver interprets
 * the prefix later. User-story lines keep their line breaks.
 */
export class StoryListParser implements DocumentParser {
  readonly format = 'story-list' as const;

  parse(lines: readonly string[]): Issue[] {
    const issues: Issue[] = [];
    let story: StoryState | null = null;

    for (const line of contentLines(lines)) {
      if (line.startsWith(STORY_LIST_HEADER)) {
        if (story) issues.push(finalize(story));
        story = openStory(fieldValue(line, STORY_LIST_HEADER));
        continue;
      }

      if (!story) continue;

      this.applyLine(story, line);
    }

    if (story) issues.push(finalize(story));
    return issues;
  }

  private applyLine(story: StoryState, line: string): void {
    if (line.startsWith(FIELD.parent)) {
      story.parent = fieldValue(line, FIELD.parent);
      return;
    }

    if (line.startsWith(FIELD.storyKey)) {
      story.storyKey = fieldValue(line, FIELD.storyKey);
      return;
    }

    if (isUserStoryLine(line)) {
      story.userStory.push(line);
      return;
    }

    if (line.startsWith(FIELD.acceptanceCriteria)) {
      story.inCriteria = true;
      if (story.userStory.length > 0) {
        story.description = story.userStory.join('\n');
      }
      return;
    }

    if (story.inCriteria && !isTrailingField(line)) {
      story.criteria.push(line);
      return;
    }

    if (line.startsWith(FIELD.priority)) {
      story.priority = parsePriority(fieldValue(line, FIELD.priority));
      story.inCriteria = false;
      return;
    }

    if (line.startsWith(FIELD.dependencies)) {
      story.dependencies = fieldValue(line, FIELD.dependencies);
      return;
    }

    if (line.startsWith(FIELD.estimatedEffort)) {
      story.estimatedEffort = fieldValue(line, FIELD.estimatedEffort);
      return;
    }

    if (line.startsWith(FIELD.labels)) {
      story.labels = fieldValue(line, FIELD.labels);
    }
  }
}
