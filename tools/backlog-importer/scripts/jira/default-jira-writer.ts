#!/usr/bin/env tsx

/**
 * Default Jira writer script.
 *
 * Reads JSON from stdin, validates the operation field, and calls the Jira
 * REST API (v2) directly.
 *
 * Supported operations:
 *   - epic-link-field: name the field that links a work item to its epic
 *   - create-issue:    create an epic, story or task, optionally under an epic
 *   - create-link:     record that one issue blocks another
 *
 * Credentials come from JIRA_EMAIL, JIRA_TOKEN and JIRA_BASE_URL.
 * Error output: JSON on stderr with { error, code } fields.
 */

import { z } from 'zod';

const createIssueSchema = z.object({
  operation: z.literal('create-issue'),
  project: z.string().min(1),
  summary: z.string().min(1),
  description: z.string(),
  issue_type: z.string().min(1),
  priority: z.string().min(1),
  labels: z.array(z.string()),
  epic_link: z.string().nullable(),
  epic_link_field: z.string().min(1).nullable().optional(),
});

const epicLinkFieldSchema = z.object({
  operation: z.literal('epic-link-field'),
  project: z.string().min(1),
});

const createLinkSchema = z.object({
  operation: z.literal('create-link'),
  blocking_key: z.string().min(1),
  blocked_key: z.string().min(1),
  link_type: z.string().optional().default('Blocks'),
});

const inputSchema = z.discriminatedUnion('operation', [
  epicLinkFieldSchema,
  createIssueSchema,
  createLinkSchema,
]);

const createMetaSchema = z.object({
  projects: z.array(z.object({
    issuetypes: z.array(z.object({
      fields: z.record(z.object({ name: z.string().optional() }).passthrough()).optional(),
    })),
  })),
});

const createdIssueSchema = z.object({ key: z.string() });

/** The Epic Link field on most Jira Cloud sites. */
const DEFAULT_EPIC_LINK_FIELD = 'customfield_10014';

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

// ─── Auth helper for direct API calls ─────────────────────────────────────────

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

async function jiraFetch(
  creds: JiraCredentials,
  method: string,
  apiPath: string,
  body?: unknown,
): Promise<{ status: number; data: unknown }> {
  const url = `${creds.baseUrl}${apiPath}`;
  const headers: Record<string, string> = {
    'Authorization': `Basic ${encodeAuth(creds.email, creds.token)}`,
    'Accept': 'application/json',
  };
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  const response = await fetch(url, {
    method,
    headers,
    ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
  });

  const status = response.status;

  if (status === 204) {
    return { status, data: undefined };
  }

  const text = await response.text();
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    data = text;
  }

  return { status, data };
}

function failOnStatus(status: number, data: unknown, action: string): void {
  if (status === 401 || status === 403) {
    exitWithError(`Authentication failed: could not ${action}`, 'AUTH_FAILED');
  }
  if (status < 200 || status >= 300) {
    const detail = typeof data === 'string' ? data : JSON.stringify(data);
    exitWithError(`Failed to ${action}: HTTP ${status} ${detail}`, 'UNKNOWN');
  }
}

// ─── Epic link field discovery ────────────────────────────────────────────────

/**
 * Find the field that links a work item to its epic. Company-managed
 * projects use an "Epic Link" custom field; team-managed ones use `parent`.
 */
async function discoverEpicLinkField(creds: JiraCredentials, project: string): Promise<string> {
  const query = new URLSearchParams({
    projectKeys: project,
    issuetypeNames: 'Story',
    expand: 'projects.issuetypes.fields',
  });
  const result = await jiraFetch(creds, 'GET', `/rest/api/2/issue/createmeta?${query.toString()}`);
  if (result.status < 200 || result.status >= 300) {
    return DEFAULT_EPIC_LINK_FIELD;
  }

  const meta = createMetaSchema.safeParse(result.data);
  if (!meta.success) {
    return DEFAULT_EPIC_LINK_FIELD;
  }

  const fields = new Map<string, string>();
  for (const projectMeta of meta.data.projects) {
    for (const issueType of projectMeta.issuetypes) {
      for (const [id, field] of Object.entries(issueType.fields ?? {})) {
        fields.set(id, (field.name ?? '').toLowerCase());
      }
    }
  }

  for (const [id, name] of fields) {
    if (name.includes('epic') && name.includes('link')) return id;
  }
  if (fields.has('parent')) return 'parent';
  for (const [id, name] of fields) {
    if (id.startsWith('customfield_') && name.includes('epic')) return id;
  }
  return DEFAULT_EPIC_LINK_FIELD;
}

// ─── Operations ───────────────────────────────────────────────────────────────

async function epicLinkField(input: z.infer<typeof epicLinkFieldSchema>): Promise<void> {
  const field = await discoverEpicLinkField(getCredentials(), input.project);
  console.log(JSON.stringify({ field }));
}

async function createIssue(input: z.infer<typeof createIssueSchema>): Promise<void> {
  const creds = getCredentials();

  const fields: Record<string, unknown> = {
    project: { key: input.project },
    summary: input.summary,
    description: input.description,
    issuetype: { name: input.issue_type },
    priority: { name: input.priority },
  };
  if (input.labels.length > 0) {
    fields.labels = input.labels;
  }
  if (input.epic_link) {
    const linkField = input.epic_link_field ?? (await discoverEpicLinkField(creds, input.project));
    fields[linkField] = linkField === 'parent' ? { key: input.epic_link } : input.epic_link;
  }

  const result = await jiraFetch(creds, 'POST', '/rest/api/2/issue', { fields });
  failOnStatus(result.status, result.data, `create ${input.issue_type} "${input.summary}"`);

  const created = createdIssueSchema.safeParse(result.data);
  if (!created.success) {
    exitWithError('Jira did not return the new issue key', 'UNKNOWN');
  }
  console.log(JSON.stringify({ key: created.data.key, success: true }));
}

async function createLink(input: z.infer<typeof createLinkSchema>): Promise<void> {
  const creds = getCredentials();

  const result = await jiraFetch(creds, 'POST', '/rest/api/2/issueLink', {
    type: { name: input.link_type },
    inwardIssue: { key: input.blocked_key },
    outwardIssue: { key: input.blocking_key },
  });
  failOnStatus(result.status, result.data, `link ${input.blocking_key} to ${input.blocked_key}`);

  console.log(JSON.stringify({
    blocking_key: input.blocking_key,
    blocked_key: input.blocked_key,
    success: true,
  }));
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

  switch (input.data.operation) {
    case 'epic-link-field':
      await epicLinkField(input.data);
      break;

    case 'create-issue':
      await createIssue(input.data);
      break;

    case 'create-link':
      await createLink(input.data);
      break;
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  exitWithError(`Unhandled error: ${message}`, 'UNKNOWN');
});
