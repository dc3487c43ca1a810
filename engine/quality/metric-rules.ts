// engine/quality/metric-rules.ts — The eleven structural scoring rules

import type {
  ClassDefinitionNode,
  FactSets,
  FunctionDefinitionNode,
  MetricName,
  SyntaxKind,
  SyntaxNode,
} from '../types.js';
import { countNodes, maxPathDepth, someNode, walk } from './traversal.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MetricRule {
  name: MetricName;
  score: (tree: SyntaxNode, facts: FactSets) => number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

const BRANCH_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  'Conditional',
  'Loop',
  'WithBlock',
  'TryBlock',
  'ExceptionHandler',
]);

// Handlers add a branch but not a nesting level.
const NESTING_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  'Conditional',
  'Loop',
  'WithBlock',
  'TryBlock',
]);

function cap(value: number): number {
  return Math.min(value, 1.0);
}

function isClass(node: SyntaxNode): node is ClassDefinitionNode {
  return node.kind === 'ClassDefinition';
}

function isFunction(node: SyntaxNode): node is FunctionDefinitionNode {
  return node.kind === 'FunctionDefinition';
}

function methodsOf(cls: ClassDefinitionNode): FunctionDefinitionNode[] {
  return cls.body.filter(isFunction);
}

/**
 * Apply a per-node score to every node in the tree and add the results.
 * Each term is already capped; the sum is not.
 */
export function sumOverTree(tree: SyntaxNode, perNode: (node: SyntaxNode) => number): number {
  let total = 0;
  walk(tree, (node) => {
    total += perNode(node);
  });
  return total;
}

// ─── Whole-Tree Rules ────────────────────────────────────────────────────────

/** Branch points across the file, /10, capped. */
export function scoreCyclomaticComplexity(tree: SyntaxNode): number {
  const branches = countNodes(tree, (node) => BRANCH_KINDS.has(node.kind));
  return cap(branches / 10.0);
}

/** Deepest stack of nested control blocks, /5, capped. */
export function scoreNestingDepth(tree: SyntaxNode): number {
  const depth = maxPathDepth(tree, (node) => (NESTING_KINDS.has(node.kind) ? 1 : 0));
  return cap(depth / 5.0);
}

/** Name references to identifiers declared `global` anywhere, /10, capped. */
export function scoreGlobalVariableUsage(tree: SyntaxNode, globalVars: ReadonlySet<string>): number {
  const uses = countNodes(tree, (node) => node.kind === 'NameReference' && globalVars.has(node.id));
  return cap(uses / 10.0);
}

/**
 * Base counts accumulated along the lexical nesting path of class
 * definitions; the deepest path wins. /5, capped.
 */
export function scoreInheritanceDepth(tree: SyntaxNode): number {
  const depth = maxPathDepth(tree, (node) => (isClass(node) ? node.baseCount : 0));
  return cap(depth / 5.0);
}

/** `import` and `from … import` statements, /20, capped. */
export function scoreImportComplexity(tree: SyntaxNode): number {
  const imports = countNodes(tree, (node) => node.kind === 'ImportStatement');
  return cap(imports / 20.0);
}

// ─── Per-Node Rules ──────────────────────────────────────────────────────────

export function scoreFunctionLength(node: SyntaxNode): number {
  if (!isFunction(node)) return 0.0;
  return cap(node.body.length / 50.0);
}

export function scoreParameterCount(node: SyntaxNode): number {
  if (!isFunction(node)) return 0.0;
  return cap(node.positionalParams / 10.0);
}

/** References inside the class to any class of the file, its own name included. */
export function scoreClassCoupling(node: SyntaxNode, classNames: ReadonlySet<string>): number {
  if (!isClass(node)) return 0.0;
  const references = countNodes(node, (n) => n.kind === 'NameReference' && classNames.has(n.id));
  return cap(references / 10.0);
}

/**
 * `1 - shared / methods`, where a method is "shared" when it touches any
 * attribute name used anywhere in the class. Higher means less sharing.
 * Classes without methods score 0. Not capped.
 */
export function scoreCohesion(node: SyntaxNode): number {
  if (!isClass(node)) return 0.0;

  const methods = methodsOf(node);
  if (methods.length === 0) return 0.0;

  const attributes = new Set<string>();
  walk(node, (n) => {
    if (n.kind === 'AttributeAccess') attributes.add(n.attr);
  });

  const shared = methods.filter((method) =>
    someNode(method, (n) => n.kind === 'AttributeAccess' && attributes.has(n.attr)),
  ).length;

  return 1.0 - shared / methods.length;
}

export function scoreNumberOfInterfaces(node: SyntaxNode): number {
  if (!isClass(node)) return 0.0;
  return cap(node.baseCount / 5.0);
}

/**
 * Direct methods whose name appears among the methods of any class in the
 * file. The set is flat, so a class always matches its own methods.
 */
export function scorePolymorphism(node: SyntaxNode, classMethods: ReadonlySet<string>): number {
  if (!isClass(node)) return 0.0;
  const overridden = methodsOf(node).filter((method) => classMethods.has(method.name)).length;
  return cap(overridden / 5.0);
}

// ─── Registry ────────────────────────────────────────────────────────────────

/**
 * Every rule in report order. The order is part of the output contract:
 * formatted reports list metrics exactly as they appear here.
 */
export const METRIC_RULES: readonly MetricRule[] = [
  {
    name: 'cyclomatic_complexity',
    score: (tree) => scoreCyclomaticComplexity(tree),
  },
  {
    name: 'nesting_depth',
    score: (tree) => scoreNestingDepth(tree),
  },
  {
    name: 'function_length',
    score: (tree) => sumOverTree(tree, scoreFunctionLength),
  },
  {
    name: 'parameter_count',
    score: (tree) => sumOverTree(tree, scoreParameterCount),
  },
  {
    name: 'class_coupling',
    score: (tree, facts) => sumOverTree(tree, (node) => scoreClassCoupling(node, facts.classNames)),
  },
  {
    name: 'cohesion',
    score: (tree) => sumOverTree(tree, scoreCohesion),
  },
  {
    name: 'global_variable_usage',
    score: (tree, facts) => scoreGlobalVariableUsage(tree, facts.globalVars),
  },
  {
    name: 'inheritance_depth',
    score: (tree) => scoreInheritanceDepth(tree),
  },
  {
    name: 'number_of_interfaces',
    score: (tree) => sumOverTree(tree, scoreNumberOfInterfaces),
  },
  {
    name: 'polymorphism',
    score: (tree, facts) => sumOverTree(tree, (node) => scorePolymorphism(node, facts.classMethods)),
  },
  {
    name: 'import_complexity',
    score: (tree) => scoreImportComplexity(tree),
  },
];
