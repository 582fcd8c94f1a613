#!/usr/bin/env tsx

/**
 * Default Jira reader script.
 *
 * Reads JSON from stdin, validates it, and queries the Jira REST API (v2).
 *
 * Supported operations:
 *   - search-epics: list the epics of a project
 *
 * Credentials come from JIRA_EMAIL, JIRA_TOKEN and JIRA_BASE_URL.
 * Error output: JSON on stderr with { error, code } fields.
 */

import { z } from 'zod';

const inputSchema = z.object({
  operation: z.literal('search-epics'),
  project: z.string().min(1),
  max_results: z.number().int().positive().optional().default(100),
});

const searchResponseSchema = z.object({
  issues: z.array(z.object({
    key: z.string(),
    fields: z.object({
      summary: z.string().nullable().optional(),
    }),
  })),
});

// ─── Stdin helpers ────────────────────────────────────────────────────────────

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    process.stdin.on('data', (chunk: Buffer) => chunks.push(chunk));
    process.stdin.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    process.stdin.on('error', reject);
  });
}

// ─── Error helpers ────────────────────────────────────────────────────────────

function exitWithError(message: string, code: string): never {
  process.stderr.write(JSON.stringify({ error: message, code }));
  process.exit(1);
}

// ─── Auth helper ──────────────────────────────────────────────────────────────

interface JiraCredentials {
  email: string;
  token: string;
  baseUrl: string;
}

function getCredentials(): JiraCredentials {
  const email = process.env.JIRA_EMAIL;
  const token = process.env.JIRA_TOKEN;
  const baseUrl = process.env.JIRA_BASE_URL;

  if (!email || !token || !baseUrl) {
    exitWithError(
      'Missing Jira credentials. Set JIRA_EMAIL, JIRA_TOKEN, and JIRA_BASE_URL environment variables.',
      'AUTH_FAILED',
    );
  }
  return { email, token, baseUrl: baseUrl.replace(/\/+$/, '') };
}

function encodeAuth(email: string, token: string): string {
  return Buffer.from(`${email}:${token}`).toString('base64');
}

async function jiraGet(creds: JiraCredentials, apiPath: string): Promise<{ status: number; data: unknown }> {
  const response = await fetch(`${creds.baseUrl}${apiPath}`, {
    method: 'GET',
    headers: {
      'Authorization': `Basic ${encodeAuth(creds.email, creds.token)}`,
      'Accept': 'application/json',
    },
  });

  const text = await response.text();
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    data = text;
  }
  return { status: response.status, data };
}

// ─── Operations ───────────────────────────────────────────────────────────────

async function searchEpics(project: string, maxResults: number): Promise<void> {
  const creds = getCredentials();
  const jql = `project = ${project} AND issuetype = Epic`;
  const query = new URLSearchParams({
    jql,
    maxResults: String(maxResults),
    fields: 'summary',
  });

  const result = await jiraGet(creds, `/rest/api/2/search?${query.toString()}`);
  if (result.status === 401 || result.status === 403) {
    exitWithError(`Authentication failed searching project ${project}`, 'AUTH_FAILED');
  }
  if (result.status < 200 || result.status >= 300) {
    exitWithError(`Failed to search epics in ${project}: HTTP ${result.status}`, 'UNKNOWN');
  }

  const parsed = searchResponseSchema.safeParse(result.data);
  if (!parsed.success) {
    exitWithError(`Unexpected search response: ${parsed.error.message}`, 'UNKNOWN');
  }

  const epics = parsed.data.issues.map((issue) => ({
    key: issue.key,
    summary: issue.fields.summary ?? '',
  }));
  console.log(JSON.stringify({ epics }));
}

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let raw: string;
  try {
    raw = await readStdin();
  } catch {
    exitWithError('Failed to read stdin', 'INVALID_INPUT');
  }

  if (!raw.trim()) {
    exitWithError('Empty stdin: expected JSON input', 'INVALID_INPUT');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    exitWithError('Invalid JSON on stdin', 'INVALID_INPUT');
  }

  const input = inputSchema.safeParse(json);
  if (!input.success) {
    exitWithError(`Invalid input: ${input.error.message}`, 'INVALID_INPUT');
  }

  await searchEpics(input.data.project, input.data.max_results);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  exitWithError(`Unhandled error: ${message}`, 'UNKNOWN');
});
