import type Parser from 'tree-sitter';
import type { TreeSitterContext } from '../../parsers/tree-sitter/index.js';
import type { PatternKnowledgeBase } from '../knowledge/index.js';
import type { PatternOpportunityInput } from '../opportunities/index.js';

/** Node kinds the analyzer dispatches on. */
export type NodeKind =
  | 'class_definition'
  | 'function_definition'
  | 'if_statement'
  | 'for_statement'
  | 'import_statement'
  | 'import_from_statement';

const NODE_KINDS: ReadonlySet<string> = new Set<NodeKind>([
  'class_definition',
  'function_definition',
  'if_statement',
  'for_statement',
  'import_statement',
  'import_from_statement',
]);

export function isNodeKind(type: string): type is NodeKind {
  return NODE_KINDS.has(type);
}

/**
 * Scope information threaded through the walk of one file.
 */
export interface AnalyzerState {
  /** Name of the innermost enclosing class */
  readonly currentClass: string | null;
  /** Name of the innermost enclosing function */
  readonly currentFunction: string | null;
  /** Local names bound by the imports seen so far */
  readonly imports: ReadonlySet<string>;
}

export interface DetectionContext {
  readonly filePath: string;
  readonly source: TreeSitterContext;
  readonly knowledge: PatternKnowledgeBase;
  readonly state: AnalyzerState;
}

/** A detector result before the file path is attached. */
export type Finding = Omit<PatternOpportunityInput, 'filePath'>;

export type Detector = (node: Parser.SyntaxNode, ctx: DetectionContext) => Finding[];

/** Node kind to the detectors that run on it. */
export type DetectorTable = Readonly<Partial<Record<NodeKind, readonly Detector[]>>>;
