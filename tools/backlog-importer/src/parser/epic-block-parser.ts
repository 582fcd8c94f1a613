import { createIssue, parsePriority } from '../types/issues.js';
import type { Issue, Priority } from '../types/issues.js';
import type { DocumentParser } from './document-parser.js';
import { contentLines, fieldValue } from './line-utils.js';

const EPIC_HEADER = /^Epic \d+:\s*(.*)$/;
const STORY_HEADER = /^Story \d+:\s*(.*)$/;

const FIELD = {
  epicName: 'Epic Name:',
  description: 'Description:',
  businessOutcome: 'Business Outcome:',
  priority: 'Priority:',
  storyKey: 'Story Key:',
  acceptanceCriteria: 'Acceptance Criteria:',
} as const;

const USER_STORY_PREFIX = 'As a ';
const CRITERION_BULLET = '*';

type Collector = 'description' | 'businessOutcome';

interface EpicBuilder {
  kind: 'epic';
  title: string;
  epicName?: string;
  priority?: Priority;
}

interface StoryBuilder {
  kind: 'story';
  title: string;
  storyKey?: string;
  priority?: Priority;
  userStory?: string;
}

type Builder = EpicBuilder | StoryBuilder;

/**
 * Per-issue state. Replaced wholesale whenever a section header is seen.
 */
interface SectionState {
  builder: Builder;
  description: string[] | null;
  businessOutcome: string[] | null;
  active: Collector | null;
  inCriteria: boolean;
  criteria: string[];
}

function openSection(builder: Builder): SectionState {
  return {
    builder,
    description: null,
    businessOutcome: null,
    active: null,
    inCriteria: false,
    criteria: [],
  };
}

function seed(inline: string): string[] {
  return inline ? [inline] : [];
}

function joinCollected(lines: string[] | null): string | undefined {
  if (lines === null || lines.length === 0) {
    return undefined;
  }
  return lines.join(' ');
}

function finalize(section: SectionState): Issue {
  const { builder } = section;
  const collectedDescription = joinCollected(section.description);
  const businessOutcome = joinCollected(section.businessOutcome);

  if (builder.kind === 'epic') {
    return createIssue({
      // Epic Name wins over the numbered header title.
      title: builder.epicName || builder.title || 'Untitled Epic',
      type: 'Epic',
      description: collectedDescription ?? '',
      priority: builder.priority,
      epicName: builder.epicName,
      businessOutcome,
      acceptanceCriteria: section.criteria,
    });
  }

  return createIssue({
    title: builder.title || 'Untitled Story',
    type: 'Story',
    description: collectedDescription ?? builder.userStory ?? '',
    priority: builder.priority,
    storyKey: builder.storyKey,
    businessOutcome,
    acceptanceCriteria: section.criteria,
  });
}

/**
 * Parser for documents made of numbered sections:
 *
 * ```
 * Epic 1: Kitchen readiness
 * Epic Name: KITCH - Kitchen Readiness
 * Description: Get the kitchen ready
 * Priority: High
 *
 * Story 1: Stock the pantry
 * Story Key: KITCH-1
 * As a cook I want a full pantry so that I can cook
 * Acceptance Criteria:
 * * Pantry inventory recorded
 * ```
 *
 * Each `Epic n:` or `Story n:` header closes the section before it, so issues
 * come out in document order. Multi-line description and business outcome
 * text is joined with single spaces.
 */
export class EpicBlockParser implements DocumentParser {
  readonly format = 'epic-block' as const;

  parse(lines: readonly string[]): Issue[] {
    const issues: Issue[] = [];
    let section: SectionState | null = null;

    for (const line of contentLines(lines)) {
      const epicHeader = EPIC_HEADER.exec(line);
      if (epicHeader) {
        if (section) issues.push(finalize(section));
        section = openSection({ kind: 'epic', title: epicHeader[1].trim() });
        continue;
      }

      const storyHeader = STORY_HEADER.exec(line);
      if (storyHeader) {
        if (section) issues.push(finalize(section));
        section = openSection({ kind: 'story', title: storyHeader[1].trim() });
        continue;
      }

      // Preamble before the first header carries no issue data.
      if (!section) continue;

      this.applyLine(section, line);
    }

    if (section) issues.push(finalize(section));
    return issues;
  }

  private applyLine(section: SectionState, line: string): void {
    const { builder } = section;

    if (line.startsWith(FIELD.epicName)) {
      if (builder.kind === 'epic') {
        builder.epicName = fieldValue(line, FIELD.epicName);
      }
      return;
    }

    if (line.startsWith(FIELD.description)) {
      section.active = 'description';
      section.description = seed(fieldValue(line, FIELD.description));
      return;
    }

    if (line.startsWith(FIELD.businessOutcome)) {
      section.active = 'businessOutcome';
      section.businessOutcome = seed(fieldValue(line, FIELD.businessOutcome));
      return;
    }

    if (line.startsWith(FIELD.priority)) {
      builder.priority = parsePriority(fieldValue(line, FIELD.priority));
      section.active = null;
      return;
    }

    if (line.startsWith(FIELD.storyKey)) {
      if (builder.kind === 'story') {
        builder.storyKey = fieldValue(line, FIELD.storyKey);
      }
      return;
    }

    if (builder.kind === 'story' && line.startsWith(USER_STORY_PREFIX)) {
      builder.userStory = line;
      return;
    }

    if (line.startsWith(FIELD.acceptanceCriteria)) {
      section.inCriteria = true;
      section.active = null;
      return;
    }

    if (section.inCriteria && line.startsWith(CRITERION_BULLET)) {
      const criterion = line.slice(CRITERION_BULLET.length).trim();
      if (criterion) {
        section.criteria.push(criterion);
      }
      return;
    }

    if (section.active === 'description') {
      (section.description ??= []).push(line);
    } else if (section.active === 'businessOutcome') {
      (section.businessOutcome ??= []).push(line);
    }
  }
}
