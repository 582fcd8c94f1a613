import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { emitResult, renderResult, reportError, writeOutput } from '../../../src/cli/utils/output.js';

describe('renderResult', () => {
  const result = { json: { valid: true, errors: [] }, exitCode: 0 };

  it('renders one JSON line by default', () => {
    expect(renderResult({ ...result, text: 'ignored\n' }, false)).toBe('{"valid":true,"errors":[]}\n');
  });

  it('renders the text form under pretty', () => {
    expect(renderResult({ ...result, text: 'Found 2 issues\n' }, true)).toBe('Found 2 issues\n');
  });

  it('indents the JSON under pretty when there is no text form', () => {
    expect(renderResult(result, true)).toBe('{\n  "valid": true,\n  "errors": []\n}\n');
  });
});

describe('writeOutput and emitResult', () => {
  let tmpDir: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'backlog-output-'));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes to stdout without an output path', () => {
    writeOutput('hello\n');
    expect(stdout).toEqual(['hello\n']);
    expect(stderr).toEqual([]);
  });

  it('writes to a file in a new directory and reports the path on stderr', () => {
    const target = path.join(tmpDir, 'out', 'issues.json');
    writeOutput('{}\n', target);

    expect(fs.readFileSync(target, 'utf-8')).toBe('{}\n');
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([`Written to ${target}\n`]);
  });

  it('returns the exit code of the result it wrote', () => {
    const code = emitResult({ json: { valid: false }, exitCode: 1 }, { pretty: false });
    expect(code).toBe(1);
    expect(stdout).toEqual(['{"valid":false}\n']);
  });

  it('reports errors on stderr with exit code 2 unless told otherwise', () => {
    expect(reportError(new Error('Backlog file not found'))).toBe(2);
    expect(reportError('no issues', 1)).toBe(1);
    expect(stderr).toEqual(['Error: Backlog file not found\n', 'Error: no issues\n']);
  });
});
