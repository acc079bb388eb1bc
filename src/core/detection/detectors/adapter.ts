import type Parser from 'tree-sitter';
import { findNodesOfType, getNodeLines, getNodeText } from '../../../parsers/tree-sitter/index.js';
import {
  PyNodes,
  assignmentsIn,
  attributeOn,
  classMethods,
  findMethod,
  methodParameters,
  nameOf,
  snippetOf,
} from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'adapter';

const SELF: ReadonlySet<string> = new Set(['self']);
const RECEIVERS: ReadonlySet<string> = new Set(['self', 'cls']);

/**
 * Fields the constructor fills straight from a parameter: `self.x = param`.
 */
function fieldsFromParameters(init: Parser.SyntaxNode, sourceCode: string): Set<string> {
  const params = new Set(methodParameters(init, sourceCode).map((param) => param.name));
  const fields = new Set<string>();

  for (const assignment of assignmentsIn(init)) {
    const left = assignment.childForFieldName('left');
    const right = assignment.childForFieldName('right');
    const field = left ? attributeOn(left, SELF, sourceCode) : null;
    if (field && right?.type === PyNodes.IDENTIFIER && params.has(getNodeText(right, sourceCode))) {
      fields.add(field);
    }
  }
  return fields;
}

/**
 * `self.<held>.member`, or `name.member` where name is not the receiver or
 * an imported module.
 */
function delegates(
  method: Parser.SyntaxNode,
  heldFields: ReadonlySet<string>,
  imports: ReadonlySet<string>,
  sourceCode: string
): boolean {
  return findNodesOfType(method, [PyNodes.ATTRIBUTE]).some((attribute) => {
    const object = attribute.childForFieldName('object');
    if (!object) return false;
    if (object.type === PyNodes.IDENTIFIER) {
      const name = getNodeText(object, sourceCode);
      return !RECEIVERS.has(name) && !imports.has(name);
    }
    const held = attributeOn(object, SELF, sourceCode);
    return held !== null && heldFields.has(held);
  });
}

/**
 * Classes that take an object in the constructor and forward calls to it.
 */
export function detectAdapter(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { sourceCode } = ctx.source;
  const init = findMethod(node, '__init__', sourceCode);
  if (!init || methodParameters(init, sourceCode).length === 0) return [];

  const heldFields = fieldsFromParameters(init, sourceCode);
  const delegating = classMethods(node)
    .filter((method) => method !== init)
    .some((method) => delegates(method, heldFields, ctx.state.imports, sourceCode));
  if (!delegating) return [];

  const className = nameOf(node, sourceCode);
  const { startLine, endLine } = getNodeLines(node);
  return [
    {
      patternName: PATTERN,
      opportunityType: 'optimization_opportunity',
      confidence: 'low',
      lineNumber: startLine,
      lineEnd: endLine,
      description: `Class ${className} shows adapter-like behavior`,
      currentCodeSnippet: snippetOf(node, sourceCode),
      suggestedImprovement: 'Consider formalizing as Adapter pattern if interfacing incompatible classes',
      reasoning: 'Class takes an object in its constructor and delegates calls to another object',
      effortEstimate: 'low',
      impactEstimate: 'low',
    },
  ];
}
