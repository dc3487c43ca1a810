// engine/types.ts — Core type definitions for structscore

// --- Configuration ---
export type ReportFormat = 'json' | 'markdown';

export interface StructscoreConfig {
  language: string;
  report: {
    format: ReportFormat;
    includeTotal: boolean;
  };
}

// --- Syntax Tree ---

interface NodeBase {
  children: SyntaxNode[];
}

export interface ModuleNode extends NodeBase {
  kind: 'Module';
}

export interface ConditionalNode extends NodeBase {
  kind: 'Conditional';
}

export interface LoopNode extends NodeBase {
  kind: 'Loop';
}

export interface WithBlockNode extends NodeBase {
  kind: 'WithBlock';
}

export interface TryBlockNode extends NodeBase {
  kind: 'TryBlock';
}

export interface ExceptionHandlerNode extends NodeBase {
  kind: 'ExceptionHandler';
}

export interface ClassDefinitionNode extends NodeBase {
  kind: 'ClassDefinition';
  name: string;
  /** Positional base expressions, `*bases` included, keywords excluded */
  baseCount: number;
  /** Direct body statements; the same objects also appear in `children` */
  body: SyntaxNode[];
}

export interface FunctionDefinitionNode extends NodeBase {
  kind: 'FunctionDefinition';
  name: string;
  positionalParams: number;
  body: SyntaxNode[];
}

export interface NameReferenceNode extends NodeBase {
  kind: 'NameReference';
  id: string;
}

export interface AttributeAccessNode extends NodeBase {
  kind: 'AttributeAccess';
  attr: string;
}

export interface GlobalDeclarationNode extends NodeBase {
  kind: 'GlobalDeclaration';
  names: string[];
}

export interface ImportStatementNode extends NodeBase {
  kind: 'ImportStatement';
  form: 'import' | 'from';
}

/** Any construct no rule distinguishes; its children are still traversed. */
export interface OpaqueNode extends NodeBase {
  kind: 'Opaque';
  type: string;
}

export type SyntaxNode =
  | ModuleNode
  | ConditionalNode
  | LoopNode
  | WithBlockNode
  | TryBlockNode
  | ExceptionHandlerNode
  | ClassDefinitionNode
  | FunctionDefinitionNode
  | NameReferenceNode
  | AttributeAccessNode
  | GlobalDeclarationNode
  | ImportStatementNode
  | OpaqueNode;

export type SyntaxKind = SyntaxNode['kind'];

// --- Fact Sets ---
export interface FactSets {
  classNames: ReadonlySet<string>;
  globalVars: ReadonlySet<string>;
  /** Flat across every class in the file, not partitioned per class */
  classMethods: ReadonlySet<string>;
}

// --- Scores ---
export const METRIC_NAMES = [
  'cyclomatic_complexity',
  'nesting_depth',
  'function_length',
  'parameter_count',
  'class_coupling',
  'cohesion',
  'global_variable_usage',
  'inheritance_depth',
  'number_of_interfaces',
  'polymorphism',
  'import_complexity',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type ScoreRecord = Record<MetricName, number>;

export interface AnalysisResult {
  scores: ScoreRecord;
  /** Unweighted mean of the eleven scores; not capped */
  total: number;
}
