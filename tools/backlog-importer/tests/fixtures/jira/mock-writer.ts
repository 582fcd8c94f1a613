/**
 * Mock Jira writing script for tests. Echoes request details back through
 * the fields the output contract allows.
 */
import { z } from 'zod';
import { readStdin } from './read-stdin.js';

const inputSchema = z.object({
  operation: z.string(),
  project: z.string().optional(),
  summary: z.string().optional(),
  epic_link: z.string().nullable().optional(),
  epic_link_field: z.string().nullable().optional(),
  blocking_key: z.string().optional(),
  blocked_key: z.string().optional(),
  link_type: z.string().optional(),
});

async function main() {
  const input = inputSchema.parse(JSON.parse(await readStdin()));

  switch (input.operation) {
    case 'epic-link-field':
      console.log(JSON.stringify({ field: `customfield_${input.project}` }));
      break;

    case 'create-issue':
      // The key number encodes whether an epic link, and its field, were sent.
      console.log(JSON.stringify({
        key: `${input.project}-${input.epic_link ? (input.epic_link_field ? 300 : 200) : 100}`,
        success: true,
      }));
      break;

    case 'create-link':
      console.log(JSON.stringify({
        blocking_key: input.blocking_key,
        blocked_key: input.blocked_key,
        success: input.link_type === 'Blocks',
      }));
      break;

    default:
      process.stderr.write(JSON.stringify({ error: `Unknown operation: ${input.operation}` }));
      process.exit(1);
  }
}

main();
