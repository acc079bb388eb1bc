import type Parser from 'tree-sitter';
import { getNodeLines } from '../../../parsers/tree-sitter/index.js';
import { findMethod, methodParameters, snippetOf } from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'builder';

/**
 * Constructors with many parameters are builder candidates.
 */
export function detectBuilder(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const init = findMethod(node, '__init__', sourceCode);
  if (!init) return [];

  const params = methodParameters(init, sourceCode);
  const count = params.length;
  const minimum = ctx.knowledge.threshold(PATTERN, 'constructor_parameters');
  if (count < minimum) return [];

  const optional = params.filter((param) => param.hasDefault).length;
  const highConfidence = count >= ctx.knowledge.threshold(PATTERN, 'high_confidence_parameters');
  const highEffort = count >= ctx.knowledge.threshold(PATTERN, 'high_effort_parameters');
  const { startLine, endLine } = getNodeLines(init);

  return [
    {
      patternName: PATTERN,
      opportunityType: 'refactor_to_pattern',
      confidence: highConfidence ? 'high' : 'medium',
      lineNumber: startLine,
      lineEnd: endLine,
      description: `Constructor with ${count} parameters could benefit from Builder pattern`,
      currentCodeSnippet: snippetOf(init, sourceCode),
      suggestedImprovement: 'Implement Builder pattern for more readable object construction',
      reasoning: `Constructor has ${count} parameters (${optional} optional). Builder pattern threshold: ${minimum}+ parameters`,
      effortEstimate: highEffort ? 'high' : 'medium',
      impactEstimate: 'medium',
    },
  ];
}
