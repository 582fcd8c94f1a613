import { execFileSync } from 'node:child_process';
import type { ClaudeConfig } from '../types/config.js';

/**
 * The LLM as the importer sees it: one configured model that turns a prompt
 * into response text. Used by the fallback extractor and by enhancement.
 */
export interface ClaudeExecutor {
  readonly model: string;
  /**
   * Send a prompt and return the trimmed response text.
   * @throws ClaudeCliError if the CLI call fails
   */
  complete(prompt: string): string;
}

export interface ClaudeExecutorOptions {
  /** Runs the `claude` binary. Defaults to execFileSync; injected in tests. */
  execFn?: (command: string, args: string[], input: string) => string;
  /** Timeout for one CLI call in milliseconds. Defaults to 120000. */
  timeoutMs?: number;
}

/**
 * Error thrown when the `claude` CLI cannot answer a prompt.
 */
export class ClaudeCliError extends Error {
  constructor(
    message: string,
    public readonly model: string,
  ) {
    super(message);
    this.name = 'ClaudeCliError';
  }
}

const DEFAULT_TIMEOUT_MS = 120_000;

/** Prefer the CLI's own stderr over the generic "Command failed" message. */
function failureDetail(err: unknown): string {
  if (err instanceof Error) {
    if ('stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
      return err.stderr.trim();
    }
    return err.message;
  }
  return String(err);
}

/**
 * Create a ClaudeExecutor for the configured model. Prompts are piped to
 * `claude -p --model <model>` through stdin.
 */
export function createClaudeExecutor(
  config: Pick<ClaudeConfig, 'model'>,
  options: ClaudeExecutorOptions = {},
): ClaudeExecutor {
  const { model } = config;
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const exec =
    options.execFn ??
    ((command: string, args: string[], input: string): string =>
      execFileSync(command, args, {
        encoding: 'utf-8',
        timeout,
        stdio: ['pipe', 'pipe', 'pipe'],
        maxBuffer: 1024 * 1024 * 10, // 10MB
        input,
      }));

  return {
    model,

    complete(prompt: string): string {
      let response: string;
      try {
        response = exec('claude', ['-p', '--model', model], prompt);
      } catch (err) {
        throw new ClaudeCliError(`Claude CLI failed (model ${model}): ${failureDetail(err)}`, model);
      }
      return response.trim();
    },
  };
}
