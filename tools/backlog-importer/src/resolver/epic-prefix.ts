import type { Logger } from '../utils/logger.js';
import { IssueKeyMapping } from './issue-key-mapping.js';
import type { DiscoveredEpic } from './types.js';

const BRACKETED_PREFIX = /^\[([A-Z]+)\]/;
const DASH_SEPARATOR = ' - ';
const MAX_PREFIX_LENGTH = 10;

/**
 * True when the token has at least one letter and no lower-case letters.
 */
function isUpperCase(token: string): boolean {
  return token !== token.toLowerCase() && token === token.toUpperCase();
}

function isPrefixToken(token: string): boolean {
  return token.length > 0 && token.length <= MAX_PREFIX_LENGTH && isUpperCase(token);
}

/**
 * Derive the short prefix identifying an existing epic from its summary.
 *
 * Conventions, first match wins:
 * 1. `[PREP] Emergency supplies`
 * 2. `PREP - Emergency supplies` (upper-case prefix of at most 10 characters)
 * 3. `PREP Emergency supplies` (first word, same constraints)
 *
 * Returns null when no convention applies.
 */
export function extractEpicPrefix(summary: string): string | null {
  const trimmed = summary.trim();

  const bracketed = BRACKETED_PREFIX.exec(trimmed);
  if (bracketed) {
    return bracketed[1];
  }

  if (trimmed.includes(DASH_SEPARATOR)) {
    const candidate = trimmed.split(DASH_SEPARATOR)[0].trim();
    if (isPrefixToken(candidate)) {
      return candidate;
    }
  }

  const firstWord = trimmed.split(/\s+/)[0];
  if (isPrefixToken(firstWord)) {
    return firstWord;
  }

  return null;
}

/**
 * Prefix of a document epic's name: the part before ` - `, or else its
 * first word. `PREP - Emergency Supplies` → `PREP`.
 */
export function epicNamePrefix(epicName: string): string {
  const trimmed = epicName.trim();
  if (trimmed.includes(DASH_SEPARATOR)) {
    return trimmed.split(DASH_SEPARATOR)[0].trim();
  }
  return trimmed.split(/\s+/)[0];
}

/**
 * Map the prefixes of already existing epics to their keys. Epics whose
 * summary follows none of the prefix conventions are skipped.
 */
export function buildEpicMapping(
  epics: readonly DiscoveredEpic[],
  logger: Logger,
): IssueKeyMapping {
  const mapping = new IssueKeyMapping();
  for (const epic of epics) {
    const prefix = extractEpicPrefix(epic.summary);
    if (prefix === null) {
      logger.debug('No prefix in existing epic summary', { key: epic.key, summary: epic.summary });
      continue;
    }
    mapping.set(prefix, epic.key);
  }
  return mapping;
}
