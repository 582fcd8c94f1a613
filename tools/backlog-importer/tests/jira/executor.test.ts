import { describe, it, expect, vi } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createJiraExecutor, JiraScriptError, JiraTimeoutError, JiraValidationError } from '../../src/jira/executor.js';
import type { CreateIssueRequest } from '../../src/jira/types.js';
import type { JiraConfig } from '../../src/types/config.js';

// Process-spawning tests can be slow under concurrent load
vi.setConfig({ testTimeout: 15_000 });

const TEST_DIR = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = path.resolve(TEST_DIR, '../fixtures/jira');
const REPO_ROOT = path.resolve(TEST_DIR, '../..');

/** Helper: create a config pointing to fixture scripts */
function fixtureConfig(overrides: Partial<JiraConfig> = {}): JiraConfig {
  return {
    reading_script: path.join(FIXTURES_DIR, 'mock-reader.ts'),
    writing_script: path.join(FIXTURES_DIR, 'mock-writer.ts'),
    ...overrides,
  };
}

function fixture(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

const REQUEST: CreateIssueRequest = {
  project: 'OPS',
  summary: 'Sweep the hall',
  description: '',
  issue_type: 'Task',
  priority: 'Medium',
  labels: [],
  epic_link: null,
};

describe('createJiraExecutor', () => {
  // ─── canRead / canWrite ───────────────────────────────────────────────

  describe('canRead / canWrite', () => {
    it('reflect which scripts are configured', () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      expect(executor.canRead()).toBe(true);
      expect(executor.canWrite()).toBe(true);
    });

    it('are false for null or missing scripts', () => {
      const executor = createJiraExecutor({ reading_script: null }, REPO_ROOT);
      expect(executor.canRead()).toBe(false);
      expect(executor.canWrite()).toBe(false);
    });
  });

  // ─── Missing scripts ──────────────────────────────────────────────────

  describe('calling a method whose script is not configured', () => {
    it('searchEpics throws descriptive error', async () => {
      const executor = createJiraExecutor(fixtureConfig({ reading_script: null }), REPO_ROOT);
      await expect(executor.searchEpics('OPS')).rejects.toThrow(
        'Jira reading not configured: reading_script is not set in config',
      );
    });

    it('createIssue throws descriptive error', async () => {
      const executor = createJiraExecutor(fixtureConfig({ writing_script: null }), REPO_ROOT);
      await expect(executor.createIssue(REQUEST)).rejects.toThrow(
        'Jira writing not configured: writing_script is not set in config',
      );
    });

    it('createLink throws descriptive error', async () => {
      const executor = createJiraExecutor(fixtureConfig({ writing_script: undefined }), REPO_ROOT);
      await expect(executor.createLink('OPS-1', 'OPS-2')).rejects.toThrow(
        'Jira writing not configured: writing_script is not set in config',
      );
    });
  });

  // ─── Script path resolution ───────────────────────────────────────────

  describe('script path resolution', () => {
    it('relative path is resolved from repoRoot', async () => {
      const relativePath = path.relative(REPO_ROOT, fixture('mock-reader.ts'));
      const executor = createJiraExecutor({ reading_script: relativePath }, REPO_ROOT);
      const result = await executor.searchEpics('REL');
      expect(result.epics[0].key).toBe('REL-1');
    });
  });

  // ─── Operations ───────────────────────────────────────────────────────

  describe('searchEpics', () => {
    it('sends the project and default limit', async () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      const result = await executor.searchEpics('OPS');

      expect(result.epics).toEqual([
        { key: 'OPS-1', summary: '[PREP] Preparation' },
        { key: 'OPS-2', summary: 'Limit 100' },
      ]);
    });

    it('sends a custom limit', async () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      const result = await executor.searchEpics('OPS', 5);
      expect(result.epics[1].summary).toBe('Limit 5');
    });
  });

  describe('createIssue', () => {
    it('returns the created key', async () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      expect(await executor.createIssue(REQUEST)).toEqual({ key: 'OPS-100', success: true });
    });

    it('passes the epic link through', async () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      const result = await executor.createIssue({ ...REQUEST, epic_link: 'OPS-1' });
      expect(result.key).toBe('OPS-200');
    });

    it('passes a known epic-link field through', async () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      const result = await executor.createIssue({
        ...REQUEST,
        epic_link: 'OPS-1',
        epic_link_field: 'customfield_OPS',
      });
      expect(result.key).toBe('OPS-300');
    });
  });

  describe('epicLinkField', () => {
    it('asks the writing script for the epic-link field', async () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      expect(await executor.epicLinkField('OPS')).toEqual({ field: 'customfield_OPS' });
    });
  });

  describe('createLink', () => {
    it('requests a Blocks link', async () => {
      const executor = createJiraExecutor(fixtureConfig(), REPO_ROOT);
      expect(await executor.createLink('OPS-1', 'OPS-2')).toEqual({
        blocking_key: 'OPS-1',
        blocked_key: 'OPS-2',
        success: true,
      });
    });
  });

  // ─── Failures ─────────────────────────────────────────────────────────

  describe('script failures', () => {
    it('surfaces the JSON error message of a failing script', async () => {
      const executor = createJiraExecutor({ reading_script: fixture('mock-error.ts') }, REPO_ROOT);
      const error = await executor.searchEpics('OPS').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(JiraScriptError);
      expect(error).toMatchObject({
        message: 'Authentication failed: invalid API token',
        exitCode: 1,
      });
    });

    it('falls back to plain stderr text', async () => {
      const executor = createJiraExecutor({ reading_script: fixture('mock-plain-error.ts') }, REPO_ROOT);
      const error = await executor.searchEpics('OPS').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(JiraScriptError);
      expect(error).toMatchObject({ message: 'something went wrong', exitCode: 3 });
    });

    it('rejects output that is not JSON', async () => {
      const executor = createJiraExecutor({ reading_script: fixture('mock-not-json.ts') }, REPO_ROOT);
      await expect(executor.searchEpics('OPS')).rejects.toThrow(JiraValidationError);
    });

    it('rejects output that does not match the contract', async () => {
      const executor = createJiraExecutor({ reading_script: fixture('mock-invalid-output.ts') }, REPO_ROOT);
      await expect(executor.searchEpics('OPS')).rejects.toThrow(/Script output failed schema validation/);
    });

    it('times out slow scripts', async () => {
      const executor = createJiraExecutor({ reading_script: fixture('mock-slow.ts') }, REPO_ROOT, {
        timeoutMs: 2_000,
      });
      await expect(executor.searchEpics('OPS')).rejects.toThrow(JiraTimeoutError);
    });
  });
});
