// engine/scanner/fact-extractor.ts — Whole-file facts shared by several scoring rules

import type { FactSets, SyntaxNode } from '../types.js';
import { walk } from '../quality/traversal.js';

/**
 * One pass over the tree collecting:
 * - every class name
 * - every identifier named in a `global` statement
 * - every method name declared directly in any class body, as one flat set
 */
export function extractFacts(root: SyntaxNode): FactSets {
  const classNames = new Set<string>();
  const globalVars = new Set<string>();
  const classMethods = new Set<string>();

  walk(root, (node) => {
    switch (node.kind) {
      case 'ClassDefinition':
        classNames.add(node.name);
        for (const stmt of node.body) {
          if (stmt.kind === 'FunctionDefinition') classMethods.add(stmt.name);
        }
        break;
      case 'GlobalDeclaration':
        for (const name of node.names) globalVars.add(name);
        break;
      default:
        break;
    }
  });

  return { classNames, globalVars, classMethods };
}
