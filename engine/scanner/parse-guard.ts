// engine/scanner/parse-guard.ts — Rejects source that did not parse cleanly

/**
 * Thrown when source text is not well-formed. No partial scores are produced.
 */
export class ParseError extends Error {
  readonly file: string;
  readonly line: number;
  readonly column: number;

  constructor(file: string, line: number, column: number, detail: string) {
    super(`${file}:${line}:${column}: invalid syntax (${detail})`);
    this.name = 'ParseError';
    this.file = file;
    this.line = line;
    this.column = column;
  }
}

/** The parts of a tree-sitter node the guard reads. */
export interface GuardNode {
  type: string;
  startIndex: number;
  endIndex: number;
  startPosition: { row: number; column: number };
  parent: GuardNode | null;
  children: GuardNode[];
  toString(): string;
}

/**
 * Finds the first ERROR or MISSING node in document order, or null when the
 * tree is clean. Walks with an explicit stack.
 */
export function findSyntaxError(root: GuardNode): GuardNode | null {
  const stack: GuardNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === 'ERROR' || isMissing(node)) return node;

    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }

  return null;
}

/**
 * Assert that the parsed tree has no syntax errors before it is scored.
 *
 * @throws {ParseError} at the position of the first malformed node
 */
export function assertWellFormed(tree: { rootNode: GuardNode }, file: string): void {
  const bad = findSyntaxError(tree.rootNode);
  if (!bad) return;

  const detail = bad.type === 'ERROR' ? 'unexpected input' : `missing ${bad.type}`;
  throw new ParseError(file, bad.startPosition.row + 1, bad.startPosition.column + 1, detail);
}

// MISSING nodes are zero-width tokens tree-sitter inserts during recovery; the
// S-expression rendering is the one place both binding generations expose them
// the same way.
function isMissing(node: GuardNode): boolean {
  return node.startIndex === node.endIndex && node.parent !== null && node.toString().startsWith('(MISSING');
}
