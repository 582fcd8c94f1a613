import { describe, it, expect } from 'vitest';
import { createIssue } from '../../src/types/issues.js';
import { buildEnhancementPrompt, enhanceIssue, enhanceIssues } from '../../src/enhance/enhance-issue.js';
import type { ClaudeExecutor } from '../../src/utils/claude-executor.js';
import { createRecordingLogger } from '../helpers/recording-logger.js';

const STORY = createIssue({
  title: '[PREP] Buy supplies',
  type: 'Story',
  description: 'Buy cleaning supplies',
  priority: 'High',
  parent: 'PREP',
  dependencies: 'OPS-1',
  labels: 'purchasing',
  acceptanceCriteria: ['Receipts filed'],
});

function replying(text: string): ClaudeExecutor {
  return { model: 'sonnet', complete: () => text };
}

describe('buildEnhancementPrompt', () => {
  it('includes type, title, description and criteria', () => {
    const prompt = buildEnhancementPrompt(STORY);
    expect(prompt).toContain('Please enhance this Jira Story:');
    expect(prompt).toContain('Title: [PREP] Buy supplies');
    expect(prompt).toContain('Description: Buy cleaning supplies');
    expect(prompt).toContain('Current Acceptance Criteria:\n- Receipts filed\n');
  });
});

describe('enhanceIssue', () => {
  it('appends the enhancement and carries every other field forward', () => {
    const enhanced = enhanceIssue(STORY, {
      claude: replying('Detailed plan'),
      logger: createRecordingLogger(),
    });

    expect(enhanced).not.toBe(STORY);
    expect(enhanced).toEqual({
      ...STORY,
      description: 'Buy cleaning supplies\n\n--- AI Enhanced ---\nDetailed plan',
    });
    expect(STORY.description).toBe('Buy cleaning supplies');
  });

  it('returns the original issue when the LLM fails', () => {
    const logger = createRecordingLogger();
    const failing: ClaudeExecutor = {
      model: 'sonnet',
      complete() {
        throw new Error('rate limited');
      },
    };

    expect(enhanceIssue(STORY, { claude: failing, logger })).toBe(STORY);
    expect(logger.entries).toEqual([
      { level: 'warn', message: 'Could not enhance issue', context: { title: '[PREP] Buy supplies', error: 'rate limited' } },
    ]);
  });

  it('returns the original issue for an empty response', () => {
    expect(enhanceIssue(STORY, { claude: replying(''), logger: createRecordingLogger() })).toBe(STORY);
  });
});

describe('enhanceIssues', () => {
  it('sends one enhancement prompt per issue', () => {
    const prompts: string[] = [];
    const claude: ClaudeExecutor = {
      model: 'haiku',
      complete(prompt) {
        prompts.push(prompt);
        return 'More';
      },
    };
    const issues = [STORY, createIssue({ title: 'Mop', type: 'Task', description: 'Mop floors' })];

    const enhanced = enhanceIssues(issues, { claude, logger: createRecordingLogger() });

    expect(prompts).toEqual(issues.map(buildEnhancementPrompt));
    expect(enhanced.map((i) => i.description)).toEqual([
      'Buy cleaning supplies\n\n--- AI Enhanced ---\nMore',
      'Mop floors\n\n--- AI Enhanced ---\nMore',
    ]);
  });
});
