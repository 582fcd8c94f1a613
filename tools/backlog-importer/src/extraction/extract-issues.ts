import * as fs from 'node:fs';
import type { Issue } from '../types/issues.js';
import type { DocumentFormat } from '../parser/format-detector.js';
import { parseDocument } from '../parser/parse-document.js';
import { evaluateExtraction, DEFAULT_GATE_THRESHOLDS } from '../parser/quality-gate.js';
import type { GateReason, QualityGateThresholds } from '../parser/quality-gate.js';
import type { Logger } from '../utils/logger.js';
import type { FallbackExtractor } from './fallback-extractor.js';
import { InputReadError } from './errors.js';

export interface ExtractOptions {
  /** When omitted, structured output is always used as-is. */
  fallback?: FallbackExtractor;
  thresholds?: QualityGateThresholds;
  logger: Logger;
}

export interface ExtractionResult {
  format: DocumentFormat;
  issues: Issue[];
  usedFallback: boolean;
  /** Why the gate rejected structured output, or null when it accepted it. */
  gateReason: GateReason | null;
}

/**
 * Extract issues from raw text.
 *
 * Structured parsing runs first. If the quality gate rejects its output and a
 * fallback extractor is available, the fallback's issues replace it; if the
 * fallback comes back empty the structured output is kept.
 */
export function extractIssues(text: string, options: ExtractOptions): ExtractionResult {
  const { fallback, logger } = options;
  const thresholds = options.thresholds ?? DEFAULT_GATE_THRESHOLDS;

  const { format, issues } = parseDocument(text);
  logger.debug('Structured parse complete', { format, issues: issues.length });

  const decision = evaluateExtraction(text, issues, thresholds);
  if (!decision.useFallback) {
    return { format, issues, usedFallback: false, gateReason: null };
  }

  if (!fallback) {
    logger.debug('Structured output rejected but no fallback is configured', {
      reason: decision.reason,
    });
    return { format, issues, usedFallback: false, gateReason: decision.reason };
  }

  logger.info('Structured parsing incomplete, trying fallback extraction', {
    reason: decision.reason,
  });
  const fallbackIssues = fallback.extract(text);

  if (fallbackIssues.length === 0) {
    logger.warn('Fallback extraction returned no issues, using structured output', {
      issues: issues.length,
    });
    return { format, issues, usedFallback: false, gateReason: decision.reason };
  }

  logger.info('Fallback extraction succeeded', { issues: fallbackIssues.length });
  return { format, issues: fallbackIssues, usedFallback: true, gateReason: decision.reason };
}

/**
 * Read a document from disk and extract its issues.
 * @throws InputReadError if the file cannot be read
 */
export function extractIssuesFromFile(filePath: string, options: ExtractOptions): ExtractionResult {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputReadError(filePath, err);
  }
  return extractIssues(text, options);
}
