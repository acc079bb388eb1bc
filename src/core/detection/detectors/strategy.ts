import type Parser from 'tree-sitter';
import { findNodesOfType, getNodeLines } from '../../../parsers/tree-sitter/index.js';
import { PyNodes, callTargetName, conditionalChain, snippetOf } from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'strategy';

/**
 * Long if/elif chains that pick between different call targets look like
 * algorithm selection.
 */
export function detectStrategy(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const chainLength = conditionalChain(node).branches.length;
  const minimum = ctx.knowledge.threshold(PATTERN, 'algorithms');
  if (chainLength < minimum) return [];

  const targets = new Set<string>();
  for (const call of findNodesOfType(node, [PyNodes.CALL])) {
    const target = callTargetName(call, sourceCode);
    if (target) targets.add(target);
  }
  if (targets.size < chainLength) return [];

  const highConfidence = chainLength >= ctx.knowledge.threshold(PATTERN, 'high_confidence_chain');
  const { startLine, endLine } = getNodeLines(node);

  return [
    {
      patternName: PATTERN,
      opportunityType: 'refactor_to_pattern',
      confidence: highConfidence ? 'high' : 'medium',
      lineNumber: startLine,
      lineEnd: endLine,
      description: `Long if/elif chain (${chainLength} conditions) suggests Strategy pattern`,
      currentCodeSnippet: snippetOf(node, sourceCode),
      suggestedImprovement: 'Replace with Strategy pattern for better maintainability',
      reasoning: `Chain length ${chainLength} meets the threshold of ${minimum} and its branches call ${targets.size} different targets`,
      effortEstimate: 'medium',
      impactEstimate: 'medium',
    },
  ];
}
