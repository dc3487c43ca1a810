// engine/context/report-formatter.ts — Renders an analysis result for the terminal

import type { AnalysisResult, StructscoreConfig } from '../types.js';
import { METRIC_NAMES } from '../types.js';

/**
 * Render a result in the configured format.
 *
 * JSON output is the bare score record unless `includeTotal` is set, in which
 * case the record moves under `scores` next to `total`.
 */
export function formatReport(
  result: AnalysisResult,
  options: StructscoreConfig['report'],
): string {
  if (options.format === 'markdown') {
    return formatMarkdown(result, options.includeTotal);
  }
  return formatJson(result, options.includeTotal);
}

/**
 * Hand-rendered so whole values keep their float form (`1.0`, not `1`).
 * Keys always follow canonical metric order.
 */
export function formatJson(result: AnalysisResult, includeTotal: boolean): string {
  if (!includeTotal) {
    return ['{', ...scoreLines(result, '  '), '}'].join('\n');
  }
  return [
    '{',
    '  "scores": {',
    ...scoreLines(result, '    '),
    '  },',
    `  "total": ${formatFloat(result.total)}`,
    '}',
  ].join('\n');
}

export function formatMarkdown(result: AnalysisResult, includeTotal: boolean): string {
  const lines: string[] = ['| Metric | Score |', '|---|---|'];

  for (const name of METRIC_NAMES) {
    lines.push(`| ${name} | ${result.scores[name].toFixed(4)} |`);
  }

  if (includeTotal) {
    lines.push(`| **Total** | ${result.total.toFixed(4)} |`);
  }

  return lines.join('\n');
}

export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function scoreLines(result: AnalysisResult, indent: string): string[] {
  const last = METRIC_NAMES.length - 1;
  return METRIC_NAMES.map(
    (name, i) => `${indent}"${name}": ${formatFloat(result.scores[name])}${i < last ? ',' : ''}`,
  );
}
