import type { Issue } from '../types/issues.js';
import type { DocumentFormat } from './format-detector.js';
import { EpicBlockParser } from './epic-block-parser.js';
import { StoryListParser } from './story-list-parser.js';

/**
 * One grammar of the structured parser.
 *
 * Implementations are line-oriented state machines; `parse` keeps all state
 * local to the call so a parser instance can be reused.
 */
export interface DocumentParser {
  readonly format: DocumentFormat;
  parse(lines: readonly string[]): Issue[];
}

const PARSERS: Record<DocumentFormat, DocumentParser> = {
  'epic-block': new EpicBlockParser(),
  'story-list': new StoryListParser(),
};

export function getDocumentParser(format: DocumentFormat): DocumentParser {
  return PARSERS[format];
}
