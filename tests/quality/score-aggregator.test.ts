import { describe, it, expect } from 'vitest';
import { computeTotal, scoreTree } from '../../engine/quality/score-aggregator.js';
import { METRIC_NAMES } from '../../engine/types.js';
import type { ScoreRecord, SyntaxNode } from '../../engine/types.js';

function record(overrides: Partial<ScoreRecord> = {}): ScoreRecord {
  return {
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
    ...overrides,
  };
}

describe('computeTotal', () => {
  it('is 0 for an all-zero record', () => {
    expect(computeTotal(record())).toBe(0);
  });

  it('divides the sum by eleven', () => {
    expect(computeTotal(record({ cyclomatic_complexity: 1, cohesion: 1.2 }))).toBeCloseTo(2.2 / 11, 12);
  });

  it('is not capped', () => {
    const scores = record({ function_length: 11, cohesion: 11 });
    expect(computeTotal(scores)).toBe(2);
  });
});

describe('scoreTree', () => {
  const empty: SyntaxNode = { kind: 'Module', children: [] };

  it('scores an empty module as all zeros', () => {
    const result = scoreTree(empty);
    expect(result.scores).toEqual(record());
    expect(result.total).toBe(0);
  });

  it('emits keys in registry order', () => {
    expect(Object.keys(scoreTree(empty).scores)).toEqual([...METRIC_NAMES]);
  });

  it('feeds fact sets to the rules that need them', () => {
    const ref: SyntaxNode = { kind: 'NameReference', id: 'Widget', children: [] };
    const tree: SyntaxNode = {
      kind: 'Module',
      children: [
        { kind: 'ClassDefinition', name: 'Widget', baseCount: 0, body: [], children: [ref] },
        { kind: 'GlobalDeclaration', names: ['Widget'], children: [] },
      ],
    };
    const { scores } = scoreTree(tree);
    expect(scores.class_coupling).toBe(0.1);
    expect(scores.global_variable_usage).toBe(0.1);
  });

  it('returns identical results for repeated calls', () => {
    const tree: SyntaxNode = {
      kind: 'Module',
      children: [{ kind: 'Conditional', children: [{ kind: 'Loop', children: [] }] }],
    };
    expect(scoreTree(tree)).toEqual(scoreTree(tree));
  });
});
