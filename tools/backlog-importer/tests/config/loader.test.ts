import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { loadConfig, mergeConfigs } from '../../src/config/loader.js';
import { ConfigError } from '../../src/config/errors.js';
import type { ImporterConfig } from '../../src/types/config.js';

const BASE: ImporterConfig = {
  jira: { reading_script: '/opt/reader.ts', writing_script: '/opt/writer.ts', project: null },
  claude: { model: 'sonnet', fallback: true },
  parser: { gate: { min_lines: 20, min_issues: 3, min_description_length: 10 } },
};

describe('mergeConfigs', () => {
  it('returns the base config when there is no override', () => {
    expect(mergeConfigs(BASE, null)).toBe(BASE);
    expect(mergeConfigs(BASE, undefined)).toBe(BASE);
  });

  it('replaces only the keys the override sets', () => {
    const result = mergeConfigs(BASE, {
      jira: { project: 'OPS' },
      parser: { gate: { min_issues: 5 } },
    });

    expect(result).toEqual({
      jira: { reading_script: '/opt/reader.ts', writing_script: '/opt/writer.ts', project: 'OPS' },
      claude: { model: 'sonnet', fallback: true },
      parser: { gate: { min_lines: 20, min_issues: 5, min_description_length: 10 } },
    });
  });

  it('lets an explicit null disable a script', () => {
    const result = mergeConfigs(BASE, { jira: { reading_script: null } });
    expect(result.jira.reading_script).toBeNull();
    expect(result.jira.writing_script).toBe('/opt/writer.ts');
  });

  it('tolerates null sections', () => {
    expect(mergeConfigs(BASE, { jira: null, claude: null, parser: null })).toEqual(BASE);
  });
});

describe('loadConfig', () => {
  let tmpDir: string;
  let repoDir: string;
  let globalPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'backlog-config-'));
    repoDir = path.join(tmpDir, 'repo');
    fs.mkdirSync(repoDir);
    globalPath = path.join(tmpDir, 'global.yaml');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns the embedded defaults when no config files exist', () => {
    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.jira.project).toBeNull();
    expect(config.claude).toEqual({ model: 'sonnet', fallback: true });
    expect(config.parser.gate).toEqual({ min_lines: 20, min_issues: 3, min_description_length: 10 });
  });

  it('resolves the bundled Jira scripts to absolute paths', () => {
    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.jira.reading_script).toBeDefined();
    expect(path.isAbsolute(config.jira.reading_script ?? '')).toBe(true);
    expect(config.jira.reading_script?.endsWith(path.join('scripts', 'jira', 'default-jira-reader.ts'))).toBe(true);
    expect(config.jira.writing_script?.endsWith(path.join('scripts', 'jira', 'default-jira-writer.ts'))).toBe(true);
  });

  it('applies the global config over the defaults', () => {
    fs.writeFileSync(globalPath, 'claude:\n  model: haiku\n');

    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.claude).toEqual({ model: 'haiku', fallback: true });
  });

  it('gives the repo config priority over the global config', () => {
    fs.writeFileSync(globalPath, 'jira:\n  project: GLOB\nclaude:\n  model: haiku\n');
    fs.writeFileSync(
      path.join(repoDir, '.backlog-importer.yaml'),
      'jira:\n  project: OPS\nclaude:\n  fallback: false\n',
    );

    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.jira.project).toBe('OPS');
    expect(config.claude).toEqual({ model: 'haiku', fallback: false });
  });

  it('treats an empty file as no override', () => {
    fs.writeFileSync(path.join(repoDir, '.backlog-importer.yaml'), '');

    const config = loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });

    expect(config.claude.model).toBe('sonnet');
  });

  it('throws ConfigError for malformed YAML', () => {
    fs.writeFileSync(globalPath, 'jira: [unclosed\n');

    expect(() => loadConfig({ globalConfigPath: globalPath, repoPath: repoDir })).toThrow(ConfigError);
  });

  it('throws ConfigError naming the invalid key', () => {
    const repoConfig = path.join(repoDir, '.backlog-importer.yaml');
    fs.writeFileSync(repoConfig, 'parser:\n  gate:\n    min_lines: -1\n');

    let caught: unknown;
    try {
      loadConfig({ globalConfigPath: globalPath, repoPath: repoDir });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.configPath).toBe(repoConfig);
      expect(caught.message).toContain('parser.gate.min_lines');
    }
  });
});
