import { spawn } from 'node:child_process';
import path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import type { JiraConfig } from '../types/config.js';
import type {
  CreateIssueRequest,
  JiraExecutor,
  JiraEpicSearchResult,
  JiraCreateIssueResult,
  JiraCreateLinkResult,
  JiraEpicLinkFieldResult,
} from './types.js';
import {
  jiraEpicSearchResultSchema,
  jiraCreateIssueResultSchema,
  jiraCreateLinkResultSchema,
  jiraEpicLinkFieldResultSchema,
  jiraScriptErrorSchema,
} from './schemas.js';

/** Default timeout for script execution in milliseconds. */
const DEFAULT_TIMEOUT_MS = 30_000;

/** Epics fetched per discovery call. */
const DEFAULT_EPIC_SEARCH_LIMIT = 100;

/**
 * Error thrown when a Jira script fails.
 */
export class JiraScriptError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = 'JiraScriptError';
  }
}

/**
 * Error thrown when a Jira script times out.
 */
export class JiraTimeoutError extends Error {
  constructor(
    public readonly scriptPath: string,
    public readonly timeoutMs: number,
  ) {
    super(`Jira script timed out after ${timeoutMs}ms: ${scriptPath}`);
    this.name = 'JiraTimeoutError';
  }
}

/**
 * Error thrown when a Jira script's stdout fails schema validation.
 */
export class JiraValidationError extends Error {
  constructor(
    message: string,
    public readonly rawOutput: string,
  ) {
    super(message);
    this.name = 'JiraValidationError';
  }
}

/**
 * Resolve a script path: absolute paths are used as-is,
 * relative paths are resolved from the repoRoot.
 */
function resolveScriptPath(scriptPath: string, repoRoot: string): string {
  if (path.isAbsolute(scriptPath)) {
    return scriptPath;
  }
  return path.resolve(repoRoot, scriptPath);
}

/**
 * Pull a readable message out of a failed script's stderr, which is either
 * `{ "error": "...", "code": "..." }` or plain text.
 */
function scriptErrorMessage(stderr: string, exitCode: number | null): string {
  const fallback = stderr.trim() || `Script exited with code ${exitCode}`;
  let parsed: unknown;
  try {
    parsed = JSON.parse(stderr);
  } catch {
    return fallback;
  }
  const structured = jiraScriptErrorSchema.safeParse(parsed);
  if (!structured.success) {
    return fallback;
  }
  return structured.data.error || structured.data.message || fallback;
}

/**
 * Execute a script by spawning `npx tsx <scriptPath>`, writing JSON to stdin,
 * collecting stdout/stderr, and validating the output against a Zod schema.
 */
function executeScript<T>(
  scriptPath: string,
  input: unknown,
  outputSchema: ZodType<T, ZodTypeDef, unknown>,
  repoRoot: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<T> {
  const resolved = resolveScriptPath(scriptPath, repoRoot);

  return new Promise<T>((resolve, reject) => {
    const child = spawn('npx', ['tsx', resolved], {
      stdio: ['pipe', 'pipe', 'pipe'],
      cwd: repoRoot,
    });

    let stdout = '';
    let stderr = '';
    let killed = false;

    const timer = setTimeout(() => {
      killed = true;
      child.kill('SIGKILL');
      reject(new JiraTimeoutError(resolved, timeoutMs));
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on('close', (exitCode) => {
      clearTimeout(timer);

      if (killed) {
        // Already rejected by timeout handler
        return;
      }

      if (exitCode !== 0) {
        reject(new JiraScriptError(scriptErrorMessage(stderr, exitCode), exitCode, stderr));
        return;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(stdout);
      } catch {
        reject(
          new JiraValidationError(
            `Script output is not valid JSON: ${stdout.slice(0, 200)}`,
            stdout,
          ),
        );
        return;
      }

      const result = outputSchema.safeParse(parsed);
      if (!result.success) {
        reject(
          new JiraValidationError(
            `Script output failed schema validation: ${result.error.message}`,
            stdout,
          ),
        );
        return;
      }

      resolve(result.data);
    });

    // The child may exit before reading all of stdin; its exit code is
    // reported by the 'close' handler.
    child.stdin.on('error', () => undefined);

    child.stdin.write(JSON.stringify(input));
    child.stdin.end();
  });
}

/**
 * Options for creating a JiraExecutor.
 */
export interface JiraExecutorOptions {
  /** Timeout in milliseconds for script execution. Defaults to 30000. */
  timeoutMs?: number;
}

/**
 * Create a JiraExecutor that spawns configured scripts with JSON stdin/stdout.
 *
 * The executor does NOT make Jira API calls directly — it delegates to
 * external scripts specified in the JiraConfig. Discovery uses the reading
 * script; issue and link creation use the writing script.
 */
export function createJiraExecutor(
  config: JiraConfig,
  repoRoot: string,
  options: JiraExecutorOptions = {},
): JiraExecutor {
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const readingScript = config.reading_script ?? null;
  const writingScript = config.writing_script ?? null;

  function requireReadScript(): string {
    if (readingScript == null) {
      throw new Error('Jira reading not configured: reading_script is not set in config');
    }
    return readingScript;
  }

  function requireWriteScript(): string {
    if (writingScript == null) {
      throw new Error('Jira writing not configured: writing_script is not set in config');
    }
    return writingScript;
  }

  return {
    async searchEpics(project: string, maxResults?: number): Promise<JiraEpicSearchResult> {
      const script = requireReadScript();
      return executeScript(
        script,
        { operation: 'search-epics', project, max_results: maxResults ?? DEFAULT_EPIC_SEARCH_LIMIT },
        jiraEpicSearchResultSchema,
        repoRoot,
        timeout,
      );
    },

    async epicLinkField(project: string): Promise<JiraEpicLinkFieldResult> {
      const script = requireWriteScript();
      return executeScript(
        script,
        { operation: 'epic-link-field', project },
        jiraEpicLinkFieldResultSchema,
        repoRoot,
        timeout,
      );
    },

    async createIssue(request: CreateIssueRequest): Promise<JiraCreateIssueResult> {
      const script = requireWriteScript();
      return executeScript(
        script,
        { operation: 'create-issue', ...request },
        jiraCreateIssueResultSchema,
        repoRoot,
        timeout,
      );
    },

    async createLink(blockingKey: string, blockedKey: string): Promise<JiraCreateLinkResult> {
      const script = requireWriteScript();
      return executeScript(
        script,
        { operation: 'create-link', blocking_key: blockingKey, blocked_key: blockedKey, link_type: 'Blocks' },
        jiraCreateLinkResultSchema,
        repoRoot,
        timeout,
      );
    },

    canRead(): boolean {
      return readingScript != null;
    },

    canWrite(): boolean {
      return writingScript != null;
    },
  };
}
