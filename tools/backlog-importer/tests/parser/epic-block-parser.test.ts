import { describe, it, expect } from 'vitest';
import { EpicBlockParser } from '../../src/parser/epic-block-parser.js';

function parse(text: string) {
  return new EpicBlockParser().parse(text.split('\n'));
}

const DOCUMENT = `Project backlog for the new site

Epic 1: Kitchen readiness
Epic Name: KITCH - Kitchen Readiness
Description: Get the kitchen
ready for opening
Business Outcome: Faster service
Priority: High
Acceptance Criteria:
* Equipment installed
*

Story 1: Stock the pantry
Story Key: KITCH-1
As a cook I want a full pantry so that I can cook
Priority: low
Acceptance Criteria:
* Inventory recorded
* Shelves labelled

Story 2: Train staff
Description: Run two training sessions
`;

describe('EpicBlockParser', () => {
  it('emits issues in document order', () => {
    const issues = parse(DOCUMENT);
    expect(issues.map((i) => `${i.type}:${i.title}`)).toEqual([
      'Epic:KITCH - Kitchen Readiness',
      'Story:Stock the pantry',
      'Story:Train staff',
    ]);
  });

  it('reads epic fields and joins multi-line descriptions with spaces', () => {
    const [epic] = parse(DOCUMENT);

    expect(epic.epicName).toBe('KITCH - Kitchen Readiness');
    expect(epic.description).toBe('Get the kitchen ready for opening');
    expect(epic.businessOutcome).toBe('Faster service');
    expect(epic.priority).toBe('High');
    expect(epic.acceptanceCriteria).toEqual([{ description: 'Equipment installed' }]);
  });

  it('uses the user-story line as a story description', () => {
    const story = parse(DOCUMENT)[1];

    expect(story.storyKey).toBe('KITCH-1');
    expect(story.description).toBe('As a cook I want a full pantry so that I can cook');
    expect(story.priority).toBe('Low');
    expect(story.acceptanceCriteria).toEqual([
      { description: 'Inventory recorded' },
      { description: 'Shelves labelled' },
    ]);
  });

  it('defaults priority to Medium', () => {
    const story = parse(DOCUMENT)[2];
    expect(story.description).toBe('Run two training sessions');
    expect(story.priority).toBe('Medium');
    expect(story.acceptanceCriteria).toEqual([]);
  });

  it('titles an epic from its header when it has no epic name', () => {
    const [epic] = parse('Epic 3: Dining room\nDescription: Tables and chairs');
    expect(epic.title).toBe('Dining room');
    expect(epic.epicName).toBeUndefined();
  });

  it('prefers a Description field over the user-story line', () => {
    const [story] = parse(
      'Story 1: Mop floors\nAs a cleaner I want clean floors\nDescription: Mop twice daily',
    );
    expect(story.description).toBe('Mop twice daily');
  });

  it('does not read Story Key as a story header', () => {
    const issues = parse('Story 1: Wash dishes\nStory Key: OPS-7\nDescription: Every night');
    expect(issues).toHaveLength(1);
    expect(issues[0].storyKey).toBe('OPS-7');
  });

  it('ignores bullets outside an acceptance criteria block', () => {
    const [story] = parse('Story 1: Sweep\nDescription: Sweep the hall\nPriority: Low\n* stray bullet');
    expect(story.acceptanceCriteria).toEqual([]);
    expect(story.description).toBe('Sweep the hall');
  });

  it('ignores text before the first header', () => {
    expect(parse('Notes only\nDescription: orphan')).toEqual([]);
  });

  it('names untitled sections', () => {
    const issues = parse('Epic 1:\nStory 1:');
    expect(issues.map((i) => i.title)).toEqual(['Untitled Epic', 'Untitled Story']);
  });
});
