import { describe, it, expect } from 'vitest';
import { ClaudeCliError, createClaudeExecutor } from '../../src/utils/claude-executor.js';

describe('createClaudeExecutor', () => {
  it('calls claude CLI with the configured model and pipes the prompt via stdin', () => {
    const calls: Array<{ command: string; args: string[]; input: string }> = [];
    const executor = createClaudeExecutor(
      { model: 'sonnet' },
      {
        execFn: (command, args, input) => {
          calls.push({ command, args, input });
          return 'mock response';
        },
      },
    );

    executor.complete('Extract issues from this text');

    expect(executor.model).toBe('sonnet');
    expect(calls).toEqual([
      { command: 'claude', args: ['-p', '--model', 'sonnet'], input: 'Extract issues from this text' },
    ]);
  });

  it('returns trimmed response from claude CLI', () => {
    const executor = createClaudeExecutor({ model: 'haiku' }, { execFn: () => '  [{"title": "Sweep"}]\n\n' });

    expect(executor.complete('prompt')).toBe('[{"title": "Sweep"}]');
  });

  it('wraps CLI failures with the model name', () => {
    const executor = createClaudeExecutor(
      { model: 'haiku' },
      {
        execFn: () => {
          throw new Error('spawn claude ENOENT');
        },
      },
    );

    expect(() => executor.complete('prompt')).toThrow(ClaudeCliError);
    expect(() => executor.complete('prompt')).toThrow('Claude CLI failed (model haiku): spawn claude ENOENT');
  });

  it('reports the CLI stderr when there is one', () => {
    const executor = createClaudeExecutor(
      { model: 'opus' },
      {
        execFn: () => {
          throw Object.assign(new Error('Command failed: claude -p --model opus'), {
            stderr: 'Unknown model: opus\n',
          });
        },
      },
    );

    expect(() => executor.complete('prompt')).toThrow('Claude CLI failed (model opus): Unknown model: opus');
  });
});
