import { describe, it, expect } from 'vitest';
import {
  METRIC_RULES,
  scoreCyclomaticComplexity,
  scoreNestingDepth,
  scoreFunctionLength,
  scoreParameterCount,
  scoreClassCoupling,
  scoreCohesion,
  scoreGlobalVariableUsage,
  scoreInheritanceDepth,
  scoreNumberOfInterfaces,
  scorePolymorphism,
  scoreImportComplexity,
  sumOverTree,
} from '../../engine/quality/metric-rules.js';
import { METRIC_NAMES } from '../../engine/types.js';
import type { SyntaxNode } from '../../engine/types.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const mod = (...children: SyntaxNode[]): SyntaxNode => ({ kind: 'Module', children });
const cond = (...children: SyntaxNode[]): SyntaxNode => ({ kind: 'Conditional', children });
const loop = (...children: SyntaxNode[]): SyntaxNode => ({ kind: 'Loop', children });
const withBlock = (...children: SyntaxNode[]): SyntaxNode => ({ kind: 'WithBlock', children });
const tryBlock = (...children: SyntaxNode[]): SyntaxNode => ({ kind: 'TryBlock', children });
const handler = (...children: SyntaxNode[]): SyntaxNode => ({ kind: 'ExceptionHandler', children });
const name = (id: string): SyntaxNode => ({ kind: 'NameReference', id, children: [] });
const attr = (a: string, ...children: SyntaxNode[]): SyntaxNode => ({ kind: 'AttributeAccess', attr: a, children });
const stmt = (...children: SyntaxNode[]): SyntaxNode => ({ kind: 'Opaque', type: 'expression_statement', children });
const imp = (form: 'import' | 'from' = 'import'): SyntaxNode => ({ kind: 'ImportStatement', form, children: [] });

function fn(fnName: string, body: SyntaxNode[], positionalParams = 0): SyntaxNode {
  return { kind: 'FunctionDefinition', name: fnName, positionalParams, body, children: [...body] };
}

function cls(clsName: string, body: SyntaxNode[], baseCount = 0, bases: SyntaxNode[] = []): SyntaxNode {
  return { kind: 'ClassDefinition', name: clsName, baseCount, body, children: [...bases, ...body] };
}

function statements(count: number): SyntaxNode[] {
  return Array.from({ length: count }, () => stmt());
}

// ─── Whole-Tree Rules ────────────────────────────────────────────────────────

describe('scoreCyclomaticComplexity', () => {
  it('is 1.0 for exactly ten top-level conditionals', () => {
    const tree = mod(...Array.from({ length: 10 }, () => cond()));
    expect(scoreCyclomaticComplexity(tree)).toBe(1.0);
  });

  it('counts loops, with blocks, try blocks and handlers', () => {
    const tree = mod(loop(), withBlock(), tryBlock(handler(), handler()));
    expect(scoreCyclomaticComplexity(tree)).toBe(0.5);
  });

  it('caps at 1.0', () => {
    const tree = mod(...Array.from({ length: 14 }, () => loop()));
    expect(scoreCyclomaticComplexity(tree)).toBe(1.0);
  });

  it('ignores nodes of other kinds', () => {
    expect(scoreCyclomaticComplexity(mod(stmt(name('x')), imp()))).toBe(0);
  });
});

describe('scoreNestingDepth', () => {
  it('increments on each nested control block', () => {
    const tree = mod(cond(loop(withBlock(stmt()))));
    expect(scoreNestingDepth(tree)).toBe(0.6);
  });

  it('does not add sibling blocks together', () => {
    expect(scoreNestingDepth(mod(cond(), cond(), loop()))).toBe(0.2);
  });

  it('does not count exception handlers as a level', () => {
    const tree = mod(tryBlock(handler(cond())));
    expect(scoreNestingDepth(tree)).toBe(0.4);
  });

  it('caps at 1.0', () => {
    const tree = mod(cond(cond(cond(cond(cond(cond(cond())))))));
    expect(scoreNestingDepth(tree)).toBe(1.0);
  });
});

describe('scoreGlobalVariableUsage', () => {
  it('counts name references to global-declared identifiers', () => {
    const tree = mod(stmt(name('counter'), name('counter')), stmt(name('counter'), name('other')));
    expect(scoreGlobalVariableUsage(tree, new Set(['counter']))).toBe(0.3);
  });

  it('is 0 with no global declarations', () => {
    expect(scoreGlobalVariableUsage(mod(stmt(name('counter'))), new Set())).toBe(0);
  });

  it('caps at 1.0', () => {
    const tree = mod(...Array.from({ length: 12 }, () => stmt(name('g'))));
    expect(scoreGlobalVariableUsage(tree, new Set(['g']))).toBe(1.0);
  });
});

describe('scoreInheritanceDepth', () => {
  it('accumulates base counts along nested class definitions', () => {
    const tree = mod(cls('Outer', [cls('Inner', [], 2)], 1));
    expect(scoreInheritanceDepth(tree)).toBe(0.6);
  });

  it('takes the deepest path, not the sum of siblings', () => {
    const tree = mod(cls('A', [], 2), cls('B', [], 1));
    expect(scoreInheritanceDepth(tree)).toBe(0.4);
  });

  it('carries depth through non-class nodes', () => {
    const tree = mod(cls('A', [fn('make', [cls('Local', [], 1)])], 1));
    expect(scoreInheritanceDepth(tree)).toBe(0.4);
  });

  it('caps at 1.0', () => {
    const tree = mod(cls('A', [cls('B', [cls('C', [], 2)], 2)], 2));
    expect(scoreInheritanceDepth(tree)).toBe(1.0);
  });
});

describe('scoreImportComplexity', () => {
  it('counts plain and from imports', () => {
    const tree = mod(imp(), imp('from'), imp(), imp('from'), fn('f', [imp()]));
    expect(scoreImportComplexity(tree)).toBe(0.25);
  });

  it('caps at 1.0', () => {
    const tree = mod(...Array.from({ length: 25 }, () => imp()));
    expect(scoreImportComplexity(tree)).toBe(1.0);
  });
});

// ─── Per-Node Rules ──────────────────────────────────────────────────────────

describe('scoreFunctionLength', () => {
  it('scores direct body statements per 50', () => {
    expect(scoreFunctionLength(fn('f', statements(10)))).toBe(0.2);
  });

  it('caps a single function at 1.0', () => {
    expect(scoreFunctionLength(fn('f', statements(51)))).toBe(1.0);
  });

  it('is 0 for non-function nodes', () => {
    expect(scoreFunctionLength(cls('A', statements(60)))).toBe(0);
  });

  it('sums across functions instead of taking the maximum', () => {
    const tree = mod(fn('long', statements(51)), fn('short', statements(10)));
    expect(sumOverTree(tree, scoreFunctionLength)).toBeCloseTo(1.2, 10);
  });
});

describe('scoreParameterCount', () => {
  it('scores positional parameters per 10', () => {
    expect(scoreParameterCount(fn('f', [], 3))).toBe(0.3);
  });

  it('caps each function before summing', () => {
    const tree = mod(fn('f', [], 12), fn('g', [], 5));
    expect(sumOverTree(tree, scoreParameterCount)).toBe(1.5);
  });
});

describe('scoreClassCoupling', () => {
  const classNames = new Set(['A', 'B']);

  it('counts references to known classes, including its own name', () => {
    const a = cls('A', [stmt(name('B'), name('A'), name('x'))]);
    expect(scoreClassCoupling(a, classNames)).toBe(0.2);
  });

  it('counts references in base expressions', () => {
    const b = cls('B', [], 1, [name('A')]);
    expect(scoreClassCoupling(b, classNames)).toBe(0.1);
  });

  it('counts a nested class reference for both enclosing and nested class', () => {
    const names = new Set(['Outer', 'Inner']);
    const tree = mod(cls('Outer', [cls('Inner', [stmt(name('Outer'))])]));
    expect(sumOverTree(tree, (node) => scoreClassCoupling(node, names))).toBeCloseTo(0.2, 10);
  });

  it('ignores attribute names that match a class name', () => {
    const a = cls('A', [stmt(attr('B', name('self')))]);
    expect(scoreClassCoupling(a, classNames)).toBe(0);
  });
});

describe('scoreCohesion', () => {
  it('is 1.0 when no method touches an attribute', () => {
    const tree = cls('A', [fn('a', [stmt(name('x'))]), fn('b', [stmt(name('y'))])]);
    expect(scoreCohesion(tree)).toBe(1.0);
  });

  it('is 0.0 when every method accesses a shared attribute', () => {
    const tree = cls('A', [
      fn('a', [stmt(attr('value', name('self')))]),
      fn('b', [stmt(attr('value', name('self')))]),
    ]);
    expect(scoreCohesion(tree)).toBe(0.0);
  });

  it('is 0.5 when one of two methods touches an attribute', () => {
    const tree = cls('A', [fn('a', [stmt(attr('value', name('self')))]), fn('b', [stmt()])]);
    expect(scoreCohesion(tree)).toBe(0.5);
  });

  it('is 0 for a class without methods', () => {
    expect(scoreCohesion(cls('A', [stmt(attr('value', name('self')))]))).toBe(0);
  });

  it('ignores methods nested deeper than the class body', () => {
    const tree = cls('A', [cond(fn('hidden', [stmt(attr('v', name('self')))])), fn('plain', [stmt()])]);
    expect(scoreCohesion(tree)).toBe(1.0);
  });

  it('is not capped when summed over classes', () => {
    const tree = mod(cls('A', [fn('a', [])]), cls('B', [fn('b', [])]));
    expect(sumOverTree(tree, scoreCohesion)).toBe(2.0);
  });
});

describe('scoreNumberOfInterfaces', () => {
  it('scores base count per 5', () => {
    expect(scoreNumberOfInterfaces(cls('A', [], 3))).toBe(0.6);
  });

  it('sums capped per-class values', () => {
    const tree = mod(cls('A', [], 7), cls('B', [], 3));
    expect(sumOverTree(tree, scoreNumberOfInterfaces)).toBeCloseTo(1.6, 10);
  });
});

describe('scorePolymorphism', () => {
  const classMethods = new Set(['__init__', 'run']);

  it('counts direct methods whose name is in the flat method set', () => {
    const a = cls('A', [fn('__init__', []), fn('run', []), stmt()]);
    expect(scorePolymorphism(a, classMethods)).toBe(0.4);
  });

  it('ignores methods not in the set', () => {
    const a = cls('A', [fn('helper', [])]);
    expect(scorePolymorphism(a, classMethods)).toBe(0);
  });

  it('matches a name shared by unrelated classes', () => {
    const tree = mod(cls('A', [fn('__init__', []), fn('run', [])]), cls('B', [fn('__init__', [])]));
    expect(sumOverTree(tree, (node) => scorePolymorphism(node, classMethods))).toBeCloseTo(0.6, 10);
  });
});

// ─── Registry ────────────────────────────────────────────────────────────────

describe('METRIC_RULES', () => {
  it('lists the eleven metrics in report order', () => {
    expect(METRIC_RULES.map((rule) => rule.name)).toEqual([...METRIC_NAMES]);
  });

  it('every rule scores an empty module as 0', () => {
    const facts = { classNames: new Set<string>(), globalVars: new Set<string>(), classMethods: new Set<string>() };
    for (const rule of METRIC_RULES) {
      expect(rule.score(mod(), facts)).toBe(0);
    }
  });
});
