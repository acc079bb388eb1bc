/**
 * Python syntax-tree helpers shared by the detectors.
 */
import type Parser from 'tree-sitter';
import { getNodeText, walkTree } from '../../parsers/tree-sitter/index.js';

/** Python tree-sitter node types the detectors look at */
export const PyNodes = {
  CLASS_DEFINITION: 'class_definition',
  FUNCTION_DEFINITION: 'function_definition',
  DECORATED_DEFINITION: 'decorated_definition',
  LAMBDA: 'lambda',
  IF_STATEMENT: 'if_statement',
  ELIF_CLAUSE: 'elif_clause',
  ELSE_CLAUSE: 'else_clause',
  FOR_STATEMENT: 'for_statement',
  RETURN_STATEMENT: 'return_statement',
  EXPRESSION_STATEMENT: 'expression_statement',
  ASSIGNMENT: 'assignment',
  AUGMENTED_ASSIGNMENT: 'augmented_assignment',
  CALL: 'call',
  ATTRIBUTE: 'attribute',
  IDENTIFIER: 'identifier',
  STRING: 'string',
  CONCATENATED_STRING: 'concatenated_string',
  IMPORT_STATEMENT: 'import_statement',
  IMPORT_FROM_STATEMENT: 'import_from_statement',
  ALIASED_IMPORT: 'aliased_import',
  DOTTED_NAME: 'dotted_name',
  WILDCARD_IMPORT: 'wildcard_import',
  COMMENT: 'comment',
} as const;

/** Parameter node types that bind a single named parameter */
const PyParameterNodes = {
  IDENTIFIER: 'identifier',
  TYPED_PARAMETER: 'typed_parameter',
  DEFAULT_PARAMETER: 'default_parameter',
  TYPED_DEFAULT_PARAMETER: 'typed_default_parameter',
} as const;

/** Nodes that open a new scope; scope walks stop at them */
const NESTED_SCOPE_TYPES: ReadonlySet<string> = new Set([
  PyNodes.CLASS_DEFINITION,
  PyNodes.FUNCTION_DEFINITION,
  PyNodes.LAMBDA,
]);

const SNIPPET_MAX_LENGTH = 120;

export interface ParameterInfo {
  name: string;
  hasDefault: boolean;
}

export interface ConditionalBranch {
  condition: Parser.SyntaxNode;
  body: Parser.SyntaxNode | null;
}

/** An if statement with its elif clauses, in source order. */
export interface ConditionalChain {
  branches: ConditionalBranch[];
  alternative: Parser.SyntaxNode | null;
}

export function nameOf(node: Parser.SyntaxNode, sourceCode: string): string {
  const nameNode = node.childForFieldName('name');
  return nameNode ? getNodeText(nameNode, sourceCode) : '';
}

/**
 * First line of a node's text, trimmed, for use as a code snippet.
 */
export function snippetOf(node: Parser.SyntaxNode, sourceCode: string): string {
  const firstLine = getNodeText(node, sourceCode).split('\n')[0].trim();
  return firstLine.length > SNIPPET_MAX_LENGTH
    ? `${firstLine.slice(0, SNIPPET_MAX_LENGTH - 3)}...`
    : firstLine;
}

/**
 * Walks a subtree without entering nested functions, classes or lambdas.
 */
export function walkScope(
  root: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => void
): void {
  walkTree(root, (node) => {
    if (node !== root && NESTED_SCOPE_TYPES.has(node.type)) return false;
    callback(node);
  });
}

/**
 * Direct statements of a class body, with decorated definitions unwrapped.
 */
export function classMembers(classNode: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const body = classNode.childForFieldName('body');
  if (!body) return [];

  return body.namedChildren.map((child) => {
    if (child.type === PyNodes.DECORATED_DEFINITION) {
      return child.childForFieldName('definition') ?? child;
    }
    return child;
  });
}

export function classMethods(classNode: Parser.SyntaxNode): Parser.SyntaxNode[] {
  return classMembers(classNode).filter((member) => member.type === PyNodes.FUNCTION_DEFINITION);
}

export function findMethod(
  classNode: Parser.SyntaxNode,
  name: string,
  sourceCode: string
): Parser.SyntaxNode | undefined {
  return classMethods(classNode).find((method) => nameOf(method, sourceCode) === name);
}

/**
 * Named parameters of a function. Splats and the bare `*` and `/`
 * separators are not counted.
 */
export function parameterList(
  functionNode: Parser.SyntaxNode,
  sourceCode: string
): ParameterInfo[] {
  const paramsNode = functionNode.childForFieldName('parameters');
  if (!paramsNode) return [];

  const params: ParameterInfo[] = [];
  for (const child of paramsNode.namedChildren) {
    switch (child.type) {
      case PyParameterNodes.IDENTIFIER:
        params.push({ name: getNodeText(child, sourceCode), hasDefault: false });
        break;
      case PyParameterNodes.TYPED_PARAMETER: {
        // `*args: int` is a typed splat, not a named parameter
        const inner = child.namedChildren[0];
        if (inner?.type === PyParameterNodes.IDENTIFIER) {
          params.push({ name: getNodeText(inner, sourceCode), hasDefault: false });
        }
        break;
      }
      case PyParameterNodes.DEFAULT_PARAMETER:
      case PyParameterNodes.TYPED_DEFAULT_PARAMETER:
        params.push({ name: nameOf(child, sourceCode), hasDefault: true });
        break;
      default:
        break;
    }
  }
  return params;
}

/**
 * Parameters of a method, without the receiver.
 */
export function methodParameters(
  functionNode: Parser.SyntaxNode,
  sourceCode: string
): ParameterInfo[] {
  return parameterList(functionNode, sourceCode).slice(1);
}

export function conditionalChain(ifNode: Parser.SyntaxNode): ConditionalChain {
  const branches: ConditionalBranch[] = [];
  let alternative: Parser.SyntaxNode | null = null;

  const condition = ifNode.childForFieldName('condition');
  if (condition) {
    branches.push({ condition, body: ifNode.childForFieldName('consequence') });
  }

  for (const child of ifNode.namedChildren) {
    if (child.type === PyNodes.ELIF_CLAUSE) {
      const elifCondition = child.childForFieldName('condition');
      if (elifCondition) {
        branches.push({ condition: elifCondition, body: child.childForFieldName('consequence') });
      }
    } else if (child.type === PyNodes.ELSE_CLAUSE) {
      alternative = child.childForFieldName('body');
    }
  }

  // `else:` holding only an `if` continues the chain like `elif`
  const statements = alternative
    ? alternative.namedChildren.filter((statement) => statement.type !== PyNodes.COMMENT)
    : [];
  if (statements.length === 1 && statements[0].type === PyNodes.IF_STATEMENT) {
    const nested = conditionalChain(statements[0]);
    branches.push(...nested.branches);
    alternative = nested.alternative;
  }

  return { branches, alternative };
}

/**
 * Name a call dispatches to: `sort(x)` -> sort, `self.engine.sort(x)` -> sort.
 */
export function callTargetName(call: Parser.SyntaxNode, sourceCode: string): string | null {
  const fn = call.childForFieldName('function');
  if (!fn) return null;
  if (fn.type === PyNodes.IDENTIFIER) return getNodeText(fn, sourceCode);
  if (fn.type === PyNodes.ATTRIBUTE) {
    const attr = fn.childForFieldName('attribute');
    return attr ? getNodeText(attr, sourceCode) : null;
  }
  return null;
}

/**
 * Method name of an attribute call (`obj.method(...)`), or null for plain calls.
 */
export function calledMethodName(call: Parser.SyntaxNode, sourceCode: string): string | null {
  const fn = call.childForFieldName('function');
  if (fn?.type !== PyNodes.ATTRIBUTE) return null;
  const attr = fn.childForFieldName('attribute');
  return attr ? getNodeText(attr, sourceCode) : null;
}

/**
 * `receiver.field` -> field, when the attribute's object is the given identifier.
 */
export function attributeOn(
  node: Parser.SyntaxNode,
  receivers: ReadonlySet<string>,
  sourceCode: string
): string | null {
  if (node.type !== PyNodes.ATTRIBUTE) return null;
  const object = node.childForFieldName('object');
  const attr = node.childForFieldName('attribute');
  if (object?.type !== PyNodes.IDENTIFIER || !attr) return null;
  return receivers.has(getNodeText(object, sourceCode)) ? getNodeText(attr, sourceCode) : null;
}

/**
 * Assignments and augmented assignments in a scope, nested scopes excluded.
 */
export function assignmentsIn(root: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const assignments: Parser.SyntaxNode[] = [];
  walkScope(root, (node) => {
    if (node.type === PyNodes.ASSIGNMENT || node.type === PyNodes.AUGMENTED_ASSIGNMENT) {
      assignments.push(node);
    }
  });
  return assignments;
}

/**
 * Calls returned directly by `return <call>` in a function body.
 */
export function returnedCalls(functionNode: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const body = functionNode.childForFieldName('body');
  if (!body) return [];

  const calls: Parser.SyntaxNode[] = [];
  walkScope(body, (node) => {
    if (node.type !== PyNodes.RETURN_STATEMENT) return;
    const value = node.namedChildren[0];
    if (value?.type === PyNodes.CALL) {
      calls.push(value);
    }
  });
  return calls;
}

/**
 * Text of a string literal without its prefix and quotes, or null when the
 * node is not a string. Interpolations in f-strings are kept as written.
 */
export function stringLiteralValue(node: Parser.SyntaxNode, sourceCode: string): string | null {
  if (node.type === PyNodes.CONCATENATED_STRING) {
    const parts = node.namedChildren.map((part) => stringLiteralValue(part, sourceCode));
    return parts.every((part): part is string => part !== null) ? parts.join('') : null;
  }
  if (node.type !== PyNodes.STRING) return null;

  const match = getNodeText(node, sourceCode).match(/^[A-Za-z]*("""|'''|"|')([\s\S]*)\1$/);
  return match ? match[2] : null;
}

/**
 * Local names bound by an import statement: `import a.b` binds `a`,
 * `import a.b as c` binds `c`, `from m import x as y` binds `y`.
 */
export function importedNames(node: Parser.SyntaxNode, sourceCode: string): string[] {
  const names: string[] = [];
  let afterImportKeyword = node.type === PyNodes.IMPORT_STATEMENT;

  for (const child of node.children) {
    if (child.type === 'import') {
      afterImportKeyword = true;
      continue;
    }
    if (!afterImportKeyword) continue;

    if (child.type === PyNodes.ALIASED_IMPORT) {
      const alias = child.childForFieldName('alias');
      if (alias) names.push(getNodeText(alias, sourceCode));
    } else if (child.type === PyNodes.DOTTED_NAME) {
      const head = child.namedChildren[0];
      if (head) names.push(getNodeText(head, sourceCode));
    }
  }
  return names;
}
