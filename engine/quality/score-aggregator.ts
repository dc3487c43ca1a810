// engine/quality/score-aggregator.ts — Runs the rule registry and averages the results

import type { AnalysisResult, ScoreRecord, SyntaxNode } from '../types.js';
import { extractFacts } from '../scanner/fact-extractor.js';
import { METRIC_RULES } from './metric-rules.js';

/**
 * Unweighted mean of every score in the record. Not capped: summed metrics
 * can push it above 1.0.
 */
export function computeTotal(scores: ScoreRecord): number {
  const values = Object.values(scores);
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Score a syntax tree: fact pre-pass, then every rule in registry order.
 * Nothing is cached between calls.
 */
export function scoreTree(tree: SyntaxNode): AnalysisResult {
  const facts = extractFacts(tree);

  const entries = METRIC_RULES.map((rule) => [rule.name, rule.score(tree, facts)] as const);
  const scores: ScoreRecord = {
    cyclomatic_complexity: 0,
    nesting_depth: 0,
    function_length: 0,
    parameter_count: 0,
    class_coupling: 0,
    cohesion: 0,
    global_variable_usage: 0,
    inheritance_depth: 0,
    number_of_interfaces: 0,
    polymorphism: 0,
    import_complexity: 0,
  };
  for (const [name, value] of entries) {
    scores[name] = value;
  }

  return { scores, total: computeTotal(scores) };
}
