import type Parser from 'tree-sitter';
import { findNodesOfType, getNodeLines, getNodeText } from '../../../parsers/tree-sitter/index.js';
import { isCreationName } from '../naming.js';
import { PyNodes, conditionalChain, nameOf, returnedCalls, snippetOf } from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'factory';

const TYPE_CHECK_FUNCTIONS: ReadonlySet<string> = new Set(['isinstance', 'issubclass']);

function hasTypeCheck(condition: Parser.SyntaxNode, sourceCode: string): boolean {
  return findNodesOfType(condition, [PyNodes.CALL]).some((call) => {
    const fn = call.childForFieldName('function');
    return fn?.type === PyNodes.IDENTIFIER && TYPE_CHECK_FUNCTIONS.has(getNodeText(fn, sourceCode));
  });
}

/**
 * if/elif chains that branch on isinstance() checks.
 */
export function detectTypeCheckFactory(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const { branches } = conditionalChain(node);
  if (branches.length < ctx.knowledge.threshold(PATTERN, 'type_check_chain')) return [];
  if (!branches.some((branch) => hasTypeCheck(branch.condition, sourceCode))) return [];

  const { startLine, endLine } = getNodeLines(node);
  return [
    {
      patternName: PATTERN,
      opportunityType: 'refactor_to_pattern',
      confidence: 'medium',
      lineNumber: startLine,
      lineEnd: endLine,
      description: 'Type-based conditionals suggest Factory pattern',
      currentCodeSnippet: snippetOf(node, sourceCode),
      suggestedImprovement: 'Use Factory pattern to encapsulate object creation logic',
      reasoning: `${branches.length} chained branches with isinstance() checks indicate creation or dispatch based on type`,
      effortEstimate: 'medium',
      impactEstimate: 'medium',
    },
  ];
}

/**
 * Functions that return freshly built objects from several places.
 */
export function detectCreationFactory(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const functionName = nameOf(node, sourceCode);
  const calls = returnedCalls(node);
  const minimum = ctx.knowledge.threshold(PATTERN, 'creation_returns');
  const { startLine, endLine } = getNodeLines(node);

  if (isCreationName(functionName) && calls.length >= minimum) {
    return [
      {
        patternName: PATTERN,
        opportunityType: 'optimization_opportunity',
        confidence: 'medium',
        lineNumber: startLine,
        lineEnd: endLine,
        description: `Function ${functionName} returns multiple types - consider Factory pattern`,
        currentCodeSnippet: snippetOf(node, sourceCode),
        suggestedImprovement: 'Formalize as Factory pattern with clear interface',
        reasoning: `Function returns ${calls.length} constructed values and is named as a creation point`,
        effortEstimate: 'low',
        impactEstimate: 'low',
      },
    ];
  }

  const callees = new Set(
    calls.flatMap((call) => {
      const fn = call.childForFieldName('function');
      return fn ? [getNodeText(fn, sourceCode)] : [];
    })
  );
  if (callees.size < minimum) return [];

  return [
    {
      patternName: PATTERN,
      opportunityType: 'optimization_opportunity',
      confidence: 'low',
      lineNumber: startLine,
      lineEnd: endLine,
      description: `Function ${functionName} returns ${callees.size} different kinds of object - possible factory`,
      currentCodeSnippet: snippetOf(node, sourceCode),
      suggestedImprovement: 'Consider a Factory if callers should not know which class they get',
      reasoning: `Function returns results of ${[...callees].join(', ')}`,
      effortEstimate: 'low',
      impactEstimate: 'low',
    },
  ];
}
