import type Parser from 'tree-sitter';
import { findNodesOfType, getNodeLines } from '../../../parsers/tree-sitter/index.js';
import { isCommandName } from '../naming.js';
import { PyNodes, assignmentsIn, attributeOn, nameOf, snippetOf } from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'command';

const SELF: ReadonlySet<string> = new Set(['self']);

function mutatesInstanceState(functionNode: Parser.SyntaxNode, sourceCode: string): boolean {
  return assignmentsIn(functionNode).some((assignment) => {
    const left = assignment.childForFieldName('left');
    if (!left) return false;
    // covers `self.a = ...`, `self.a.b = ...` and `self.a, self.b = ...`
    return findNodesOfType(left, [PyNodes.ATTRIBUTE]).some(
      (attribute) => attributeOn(attribute, SELF, sourceCode) !== null
    );
  });
}

/**
 * Execution-style functions that store state on the instance.
 */
export function detectCommand(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const functionName = nameOf(node, sourceCode);
  if (!isCommandName(functionName) || !mutatesInstanceState(node, sourceCode)) return [];

  const { startLine, endLine } = getNodeLines(node);
  return [
    {
      patternName: PATTERN,
      opportunityType: 'optimization_opportunity',
      confidence: 'low',
      lineNumber: startLine,
      lineEnd: endLine,
      description: `Function ${functionName} stores state - consider Command pattern`,
      currentCodeSnippet: snippetOf(node, sourceCode),
      suggestedImprovement: 'Consider Command pattern if undo/redo or queuing needed',
      reasoning: 'Function stores state and has an execution-like name - possible command',
      effortEstimate: 'medium',
      impactEstimate: 'low',
    },
  ];
}
