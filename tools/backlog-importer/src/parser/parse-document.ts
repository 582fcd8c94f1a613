import type { Issue } from '../types/issues.js';
import { detectFormat } from './format-detector.js';
import type { DocumentFormat } from './format-detector.js';
import { getDocumentParser } from './document-parser.js';

export interface ParsedDocument {
  format: DocumentFormat;
  issues: Issue[];
}

/**
 * Run the structured parser over a whole document: detect the grammar, then
 * parse every line with it.
 */
export function parseDocument(text: string): ParsedDocument {
  const format = detectFormat(text);
  const issues = getDocumentParser(format).parse(text.split('\n'));
  return { format, issues };
}
