import type Parser from 'tree-sitter';
import { findNodesOfType, getNodeLines, getNodeText } from '../../../parsers/tree-sitter/index.js';
import { isNotificationMethodName, isObserverCollectionName } from '../naming.js';
import { PyNodes, calledMethodName, snippetOf } from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'observer';

/** `observers` -> observers, `self._listeners` -> _listeners */
function collectionName(iterable: Parser.SyntaxNode, sourceCode: string): string | null {
  if (iterable.type === PyNodes.IDENTIFIER) return getNodeText(iterable, sourceCode);
  if (iterable.type === PyNodes.ATTRIBUTE) {
    const attr = iterable.childForFieldName('attribute');
    return attr ? getNodeText(attr, sourceCode) : null;
  }
  return null;
}

/**
 * Hand-written notification loops: `for o in self.observers: o.update(...)`.
 */
export function detectObserver(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const iterable = node.childForFieldName('right');
  const body = node.childForFieldName('body');
  if (!iterable || !body) return [];

  const collection = collectionName(iterable, sourceCode);
  if (!collection || !isObserverCollectionName(collection)) return [];

  const notifies = findNodesOfType(body, [PyNodes.CALL]).some((call) => {
    const method = calledMethodName(call, sourceCode);
    return method !== null && isNotificationMethodName(method);
  });
  if (!notifies) return [];

  const { startLine, endLine } = getNodeLines(node);
  return [
    {
      patternName: PATTERN,
      opportunityType: 'refactor_to_pattern',
      confidence: 'medium',
      lineNumber: startLine,
      lineEnd: endLine,
      description: 'Manual observer notification loop detected',
      currentCodeSnippet: snippetOf(node, sourceCode),
      suggestedImprovement: 'Implement formal Observer pattern with subscription management',
      reasoning: `Loop over ${collection} calls notification methods on each element`,
      effortEstimate: 'low',
      impactEstimate: 'medium',
    },
  ];
}
