// engine/scanner/syntax-tree.ts — Converts a tree-sitter Python CST into the SyntaxNode union

import type Parser from 'tree-sitter';
import type {
  ClassDefinitionNode,
  ModuleNode,
  SyntaxNode,
} from '../types.js';

type CstNode = Parser.SyntaxNode;

// ─── Entry Point ─────────────────────────────────────────────────────────────

/**
 * Build the scoring tree for a parsed Python module.
 *
 * The CST is shaped by the grammar, not by Python's abstract syntax, so a few
 * constructs are reshaped on the way:
 * - each `elif` becomes a Conditional nested inside the previous link
 * - `async for` / `async with` / `async def` and `try … except*` stay Opaque
 * - decorators become children of the definition they decorate
 * - identifiers that are not expressions (definition, parameter and type
 *   parameter names, keyword names, import aliases, pattern captures) are dropped
 */
export function buildSyntaxTree(root: CstNode): ModuleNode {
  return { kind: 'Module', children: convertAll(root.namedChildren) };
}

// ─── Dispatch ────────────────────────────────────────────────────────────────

function convertAll(nodes: CstNode[]): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (const node of nodes) {
    if (node.type === 'comment') continue;
    const converted = convert(node);
    if (converted) out.push(converted);
  }
  return out;
}

function convert(node: CstNode): SyntaxNode | null {
  switch (node.type) {
    case 'identifier':
      return { kind: 'NameReference', id: node.text, children: [] };

    case 'if_statement':
      return convertIf(node);

    case 'for_statement':
    case 'while_statement':
      return isAsync(node)
        ? opaque(node.type, convertAll(node.namedChildren))
        : { kind: 'Loop', children: convertAll(node.namedChildren) };

    case 'with_statement':
      return isAsync(node)
        ? opaque(node.type, convertAll(node.namedChildren))
        : { kind: 'WithBlock', children: convertAll(node.namedChildren) };

    case 'try_statement':
      // `try … except*` is a separate statement kind that is not counted
      return node.namedChildren.some((c) => c.type === 'except_group_clause')
        ? opaque(node.type, convertAll(node.namedChildren))
        : { kind: 'TryBlock', children: convertAll(node.namedChildren) };

    case 'except_clause':
    case 'except_group_clause':
      return { kind: 'ExceptionHandler', children: convertExceptClause(node) };

    case 'class_definition':
      return convertClass(node, []);

    case 'function_definition':
      return convertFunction(node, []);

    case 'decorated_definition':
      return convertDecorated(node);

    case 'attribute': {
      const object = node.childForFieldName('object');
      const attribute = node.childForFieldName('attribute');
      return {
        kind: 'AttributeAccess',
        attr: attribute?.text ?? '',
        children: object ? convertAll([object]) : [],
      };
    }

    case 'keyword_argument': {
      const value = node.childForFieldName('value');
      return opaque(node.type, value ? convertAll([value]) : []);
    }

    case 'global_statement':
      return {
        kind: 'GlobalDeclaration',
        names: node.namedChildren.filter((c) => c.type === 'identifier').map((c) => c.text),
        children: [],
      };

    case 'nonlocal_statement':
      return opaque(node.type, []);

    case 'import_statement':
      return { kind: 'ImportStatement', form: 'import', children: [] };

    case 'import_from_statement':
    case 'future_import_statement':
      return { kind: 'ImportStatement', form: 'from', children: [] };

    case 'lambda': {
      const params = node.childForFieldName('parameters');
      const body = node.childForFieldName('body');
      const children: SyntaxNode[] = params ? readParameters(params).expressions : [];
      if (body) children.push(...convertAll([body]));
      return opaque(node.type, children);
    }

    case 'case_pattern':
      return convertPattern(node);

    default:
      return opaque(node.type, convertAll(node.namedChildren));
  }
}

function opaque(type: string, children: SyntaxNode[]): SyntaxNode {
  return { kind: 'Opaque', type, children };
}

function isAsync(node: CstNode): boolean {
  return node.children.some((c) => c.type === 'async');
}

// ─── Conditionals ────────────────────────────────────────────────────────────

function convertIf(node: CstNode): SyntaxNode {
  const own: CstNode[] = [];
  const alternatives: CstNode[] = [];
  for (const child of node.namedChildren) {
    if (child.type === 'elif_clause' || child.type === 'else_clause') alternatives.push(child);
    else own.push(child);
  }

  // Fold right-to-left so every link owns the rest of the chain.
  let tail: SyntaxNode | null = null;
  for (let i = alternatives.length - 1; i >= 0; i--) {
    const alt = alternatives[i];
    const parts = convertAll(alt.namedChildren);
    if (tail) parts.push(tail);
    tail = alt.type === 'elif_clause'
      ? { kind: 'Conditional', children: parts }
      : opaque(alt.type, parts);
  }

  const children = convertAll(own);
  if (tail) children.push(tail);
  return { kind: 'Conditional', children };
}

// ─── Exception Handlers ──────────────────────────────────────────────────────

function convertExceptClause(node: CstNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  let aliasNext = false;

  for (const child of node.children) {
    switch (child.type) {
      case 'as':
      case ',':
        aliasNext = true;
        continue;
      case 'except':
      case 'except*':
      case '*':
      case ':':
      case 'comment':
        continue;
      case 'as_pattern': {
        // The bound name is a plain string, only the caught type is an expression
        const [caught] = child.namedChildren;
        if (caught) children.push(...convertAll([caught]));
        continue;
      }
      default:
        if (aliasNext) {
          aliasNext = false;
          continue;
        }
        children.push(...convertAll([child]));
    }
  }

  return children;
}

// ─── Definitions ─────────────────────────────────────────────────────────────

function convertDecorated(node: CstNode): SyntaxNode {
  const decorators: SyntaxNode[] = [];
  for (const child of node.namedChildren) {
    if (child.type === 'decorator') decorators.push(...convertAll(child.namedChildren));
  }

  const definition = node.childForFieldName('definition');
  if (definition?.type === 'class_definition') return convertClass(definition, decorators);
  if (definition?.type === 'function_definition') return convertFunction(definition, decorators);

  return opaque(node.type, [...decorators, ...(definition ? convertAll([definition]) : [])]);
}

function convertClass(node: CstNode, decorators: SyntaxNode[]): ClassDefinitionNode {
  const children = [...decorators];
  let baseCount = 0;

  const superclasses = node.childForFieldName('superclasses');
  if (superclasses) {
    for (const arg of superclasses.namedChildren) {
      if (arg.type === 'comment') continue;
      if (arg.type !== 'keyword_argument' && arg.type !== 'dictionary_splat') baseCount++;
      children.push(...convertAll([arg]));
    }
  }

  children.push(...readTypeParameters(node));

  const body = readBody(node);
  children.push(...body);

  return {
    kind: 'ClassDefinition',
    name: node.childForFieldName('name')?.text ?? '',
    baseCount,
    body,
    children,
  };
}

function convertFunction(node: CstNode, decorators: SyntaxNode[]): SyntaxNode {
  const children = [...decorators];

  const params = node.childForFieldName('parameters');
  const { positional, expressions }: ParameterInfo = params
    ? readParameters(params)
    : { positional: 0, expressions: [] };
  children.push(...readTypeParameters(node));
  children.push(...expressions);

  const returnType = node.childForFieldName('return_type');
  if (returnType) children.push(...convertAll([returnType]));

  const body = readBody(node);
  children.push(...body);

  if (isAsync(node)) return opaque('async_function_definition', children);

  return {
    kind: 'FunctionDefinition',
    name: node.childForFieldName('name')?.text ?? '',
    positionalParams: positional,
    body,
    children,
  };
}

function readBody(node: CstNode): SyntaxNode[] {
  const block = node.childForFieldName('body');
  return block ? convertAll(block.namedChildren) : [];
}

// ─── Parameters ──────────────────────────────────────────────────────────────

interface ParameterInfo {
  /** Regular positional parameters: not positional-only, not keyword-only, no splats */
  positional: number;
  /** Defaults and annotations; parameter names are not expressions */
  expressions: SyntaxNode[];
}

function readParameters(params: CstNode): ParameterInfo {
  let positional = 0;
  let keywordOnly = false;
  const expressions: SyntaxNode[] = [];

  const field = (node: CstNode, name: string) => {
    const child = node.childForFieldName(name);
    if (child) expressions.push(...convertAll([child]));
  };

  for (const param of params.children) {
    switch (param.type) {
      case '/':
      case 'positional_separator':
        // everything so far was positional-only
        if (!keywordOnly) positional = 0;
        break;
      case '*':
      case 'keyword_separator':
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
        keywordOnly = true;
        break;
      case 'identifier':
      case 'tuple_pattern':
        if (!keywordOnly) positional++;
        break;
      case 'default_parameter':
        if (!keywordOnly) positional++;
        field(param, 'value');
        break;
      case 'typed_parameter': {
        const [target] = param.namedChildren;
        if (target?.type === 'list_splat_pattern' || target?.type === 'dictionary_splat_pattern') {
          keywordOnly = true;
        } else if (!keywordOnly) {
          positional++;
        }
        field(param, 'type');
        break;
      }
      case 'typed_default_parameter':
        if (!keywordOnly) positional++;
        field(param, 'type');
        field(param, 'value');
        break;
      default:
        break;
    }
  }

  return { positional, expressions };
}

// ─── Type Parameters ─────────────────────────────────────────────────────────

/**
 * `[T, U: Bound, *Ts]`: the parameter names are plain strings, only bounds are
 * expressions.
 */
function readTypeParameters(node: CstNode): SyntaxNode[] {
  const list = node.childForFieldName('type_parameters');
  if (!list) return [];

  const out: SyntaxNode[] = [];
  for (const param of list.namedChildren) {
    const [inner] = param.type === 'type' ? param.namedChildren : [param];
    if (!inner || inner.type === 'identifier' || inner.type === 'splat_type') continue;
    if (inner.type === 'constrained_type') {
      const [, ...bounds] = inner.namedChildren;
      out.push(...convertAll(bounds));
      continue;
    }
    out.push(...convertAll([inner]));
  }
  return out;
}

// ─── Match Patterns ──────────────────────────────────────────────────────────

function convertPattern(node: CstNode): SyntaxNode | null {
  switch (node.type) {
    case 'identifier':
      // capture target
      return null;
    case 'dotted_name':
      return dottedChain(node, false);
    case 'class_pattern': {
      const children: SyntaxNode[] = [];
      for (const child of node.namedChildren) {
        const converted = child.type === 'dotted_name' && children.length === 0
          ? dottedChain(child, true)
          : convertPattern(child);
        if (converted) children.push(converted);
      }
      return opaque(node.type, children);
    }
    case 'keyword_pattern': {
      // the keyword itself is a plain string
      const [, ...rest] = node.namedChildren;
      return opaque(node.type, convertPatterns(rest));
    }
    case 'comment':
      return null;
    default:
      return opaque(node.type, convertPatterns(node.namedChildren));
  }
}

function convertPatterns(nodes: CstNode[]): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (const node of nodes) {
    const converted = convertPattern(node);
    if (converted) out.push(converted);
  }
  return out;
}

/**
 * `a.b.c` in a pattern is a value lookup: Name(a) then one attribute access per
 * further segment. A lone name is a capture unless it names a class pattern.
 */
function dottedChain(node: CstNode, singleIsName: boolean): SyntaxNode | null {
  const parts = node.namedChildren.filter((c) => c.type === 'identifier').map((c) => c.text);
  if (parts.length === 0) return null;
  if (parts.length === 1 && !singleIsName) return null;

  let chain: SyntaxNode = { kind: 'NameReference', id: parts[0], children: [] };
  for (const attr of parts.slice(1)) {
    chain = { kind: 'AttributeAccess', attr, children: [chain] };
  }
  return chain;
}
