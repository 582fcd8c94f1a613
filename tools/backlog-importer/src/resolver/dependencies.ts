import type { IssueKeyMapping } from './issue-key-mapping.js';

/** A fully formed issue key such as `OPS-42`. */
export const ISSUE_KEY_PATTERN = /^[A-Z]+-\d+$/;

const BRACKETED_REFERENCE = /^\[([A-Z]+)\]\s*(.+)$/;

const NO_DEPENDENCY = 'none';

export type ResolvedKind =
  /** Token was already an issue key. */
  | 'key'
  /** `[PREFIX] Name` where `Name` is a known token. */
  | 'exact'
  /** `[PREFIX] Name` matched part of a `[PREFIX] …` title. */
  | 'partial'
  /** `[PREFIX] Name` fell back to the epic for `PREFIX`. */
  | 'epic'
  /** Bare token found in the mapping. */
  | 'title';

export type DependencyResolution =
  | { token: string; kind: ResolvedKind; key: string }
  | { token: string; kind: 'none' }
  | { token: string; kind: 'unresolved' };

/**
 * Split a raw `Dependencies:` value into trimmed, non-empty references.
 */
export function parseDependencies(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }
  return text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function resolveBracketed(
  token: string,
  prefix: string,
  name: string,
  mapping: IssueKeyMapping,
): DependencyResolution {
  const exact = mapping.get(name);
  if (exact !== undefined) {
    return { token, kind: 'exact', key: exact };
  }

  const marker = `[${prefix}]`;
  const needle = name.toLowerCase();
  for (const [title, key] of mapping.entries()) {
    if (title.startsWith(marker) && title.toLowerCase().includes(needle)) {
      return { token, kind: 'partial', key };
    }
  }

  const epicKey = mapping.get(prefix);
  if (epicKey !== undefined) {
    return { token, kind: 'epic', key: epicKey };
  }

  return { token, kind: 'unresolved' };
}

/**
 * Resolve one dependency reference against the mapping, trying the most
 * specific interpretation first.
 */
export function resolveDependency(token: string, mapping: IssueKeyMapping): DependencyResolution {
  if (ISSUE_KEY_PATTERN.test(token)) {
    return { token, kind: 'key', key: token };
  }

  if (token.toLowerCase().startsWith(NO_DEPENDENCY)) {
    return { token, kind: 'none' };
  }

  const bracketed = BRACKETED_REFERENCE.exec(token);
  if (bracketed) {
    return resolveBracketed(token, bracketed[1], bracketed[2].trim(), mapping);
  }

  const key = mapping.get(token);
  if (key !== undefined) {
    return { token, kind: 'title', key };
  }
  return { token, kind: 'unresolved' };
}

export interface ResolvedDependencies {
  /** Distinct keys, in reference order. */
  keys: string[];
  resolutions: DependencyResolution[];
  /** References that matched nothing. */
  unresolved: string[];
}

/**
 * Resolve every reference in a raw dependencies value. Unresolvable
 * references are reported, never thrown.
 */
export function resolveDependencies(
  text: string | null | undefined,
  mapping: IssueKeyMapping,
): ResolvedDependencies {
  const keys: string[] = [];
  const unresolved: string[] = [];
  const resolutions = parseDependencies(text).map((token) => resolveDependency(token, mapping));

  for (const resolution of resolutions) {
    if (resolution.kind === 'unresolved') {
      unresolved.push(resolution.token);
    } else if (resolution.kind !== 'none' && !keys.includes(resolution.key)) {
      keys.push(resolution.key);
    }
  }

  return { keys, resolutions, unresolved };
}
