import type Parser from 'tree-sitter';
import { getNodeLines, getNodeText } from '../../../parsers/tree-sitter/index.js';
import { INSTANCE_FIELD_NAMES, isDataModelName, isSharedResourceName } from '../naming.js';
import {
  PyNodes,
  assignmentsIn,
  attributeOn,
  classMembers,
  classMethods,
  nameOf,
  snippetOf,
} from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'singleton';

/**
 * True when the class stores a conventional single-instance field, either as
 * a class attribute or through `cls.` / `ClassName.` inside a method.
 */
function hasInstanceField(classNode: Parser.SyntaxNode, className: string, sourceCode: string): boolean {
  for (const member of classMembers(classNode)) {
    if (member.type !== PyNodes.EXPRESSION_STATEMENT) continue;
    const assignment = member.namedChildren[0];
    const left = assignment?.type === PyNodes.ASSIGNMENT ? assignment.childForFieldName('left') : null;
    if (left?.type === PyNodes.IDENTIFIER && INSTANCE_FIELD_NAMES.has(getNodeText(left, sourceCode))) {
      return true;
    }
  }

  const receivers = new Set(['cls', className]);
  return classMethods(classNode).some((method) =>
    assignmentsIn(method).some((assignment) => {
      const left = assignment.childForFieldName('left');
      const field = left ? attributeOn(left, receivers, sourceCode) : null;
      return field !== null && INSTANCE_FIELD_NAMES.has(field);
    })
  );
}

export function detectSingleton(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const className = nameOf(node, sourceCode);
  if (!className) return [];

  const hasNew = classMethods(node).some((method) => nameOf(method, sourceCode) === '__new__');
  const { startLine, endLine } = getNodeLines(node);

  if (hasNew && hasInstanceField(node, className, sourceCode) && isDataModelName(className)) {
    return [
      {
        patternName: PATTERN,
        opportunityType: 'anti_pattern_detected',
        confidence: 'critical',
        lineNumber: startLine,
        lineEnd: endLine,
        description: `Anti-pattern: ${className} should not be a singleton`,
        currentCodeSnippet: snippetOf(node, sourceCode),
        suggestedImprovement: 'Convert to a regular class; data models need multiple instances',
        reasoning: 'Data models (User, Product, Order, etc.) should not be singletons because each record is its own instance',
        effortEstimate: 'low',
        impactEstimate: 'high',
      },
    ];
  }

  if (!hasNew && isSharedResourceName(className)) {
    return [
      {
        patternName: PATTERN,
        opportunityType: 'refactor_to_pattern',
        confidence: 'medium',
        lineNumber: startLine,
        lineEnd: endLine,
        description: `${className} could benefit from singleton pattern`,
        currentCodeSnippet: snippetOf(node, sourceCode),
        suggestedImprovement: 'Implement singleton pattern with thread-safe instance control',
        reasoning: 'Classes like DatabaseConnection, ConfigManager and Logger often hold one shared resource',
        effortEstimate: 'medium',
        impactEstimate: 'medium',
      },
    ];
  }

  return [];
}
