// engine/index.ts — Top-level orchestrator: source -> tree -> facts + scores -> total

import type {
  AnalysisResult,
  FactSets,
  MetricName,
  ModuleNode,
  ScoreRecord,
  StructscoreConfig,
  SyntaxNode,
} from './types.js';

import { DEFAULT_CONFIG } from './config.js';
import { parseSource } from './scanner/tree-sitter.js';
import { assertWellFormed, ParseError } from './scanner/parse-guard.js';
import { buildSyntaxTree } from './scanner/syntax-tree.js';
import { readSourceFile } from './scanner/source-reader.js';
import { scoreTree } from './quality/score-aggregator.js';

export { ParseError } from './scanner/parse-guard.js';
export { InvalidPathError } from './scanner/source-reader.js';
export { extractFacts } from './scanner/fact-extractor.js';
export { METRIC_RULES } from './quality/metric-rules.js';
export { computeTotal, scoreTree } from './quality/score-aggregator.js';
export { formatReport } from './context/report-formatter.js';
export { METRIC_NAMES } from './types.js';

// Re-export types that callers need
export type {
  AnalysisResult,
  FactSets,
  MetricName,
  ModuleNode,
  ScoreRecord,
  StructscoreConfig,
  SyntaxNode,
};

export interface AnalyzeOptions {
  language?: string;
  /** Reported in parse errors; defaults to `<source>` */
  file?: string;
}

/**
 * Parse source text into the scoring tree.
 *
 * @throws {ParseError} if the source is not well-formed or nests too deeply
 */
export function parseToSyntaxTree(source: string, options: AnalyzeOptions = {}): ModuleNode {
  const language = options.language ?? DEFAULT_CONFIG.language;
  const file = options.file ?? '<source>';
  const tree = parseSource(source, language);
  assertWellFormed(tree, file);

  try {
    return buildSyntaxTree(tree.rootNode);
  } catch (err) {
    // Expression nesting deeper than the converter's call stack
    if (err instanceof RangeError) throw new ParseError(file, 1, 1, 'too deeply nested');
    throw err;
  }
}

/**
 * Full pipeline over in-memory source: parse -> facts -> eleven rules -> mean.
 */
export function analyzeSource(source: string, options: AnalyzeOptions = {}): AnalysisResult {
  return scoreTree(parseToSyntaxTree(source, options));
}

/**
 * Read a file and analyze it.
 *
 * @throws {InvalidPathError} if the path is missing or not a regular file
 * @throws {ParseError} if the file is not well-formed
 */
export function analyzeFile(filePath: string, options: Omit<AnalyzeOptions, 'file'> = {}): AnalysisResult {
  const source = readSourceFile(filePath);
  return analyzeSource(source, { ...options, file: filePath });
}
