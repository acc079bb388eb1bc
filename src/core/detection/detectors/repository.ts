import type Parser from 'tree-sitter';
import { getNodeLines } from '../../../parsers/tree-sitter/index.js';
import { isRepositoryName } from '../naming.js';
import { PyNodes, calledMethodName, nameOf, snippetOf, stringLiteralValue, walkScope } from '../syntax.js';
import type { DetectionContext, Finding } from '../types.js';

const PATTERN = 'repository';

const QUERY_METHODS: ReadonlySet<string> = new Set(['execute', 'executemany', 'query']);

const SQL_STATEMENT = /^(select|insert|update|delete)\b/i;

function isRawQuery(call: Parser.SyntaxNode, sourceCode: string): boolean {
  const method = calledMethodName(call, sourceCode);
  if (method === null || !QUERY_METHODS.has(method)) return false;

  const firstArg = call.childForFieldName('arguments')?.namedChildren[0];
  if (!firstArg) return false;
  const sql = stringLiteralValue(firstArg, sourceCode);
  return sql !== null && SQL_STATEMENT.test(sql.trimStart());
}

/**
 * SQL written inline in code that is not part of a data-access class.
 */
export function detectRepository(node: Parser.SyntaxNode, ctx: DetectionContext): Finding[] {
  const { currentClass } = ctx.state;
  if (currentClass !== null && isRepositoryName(currentClass)) return [];

  const { sourceCode } = ctx.source;
  const body = node.childForFieldName('body');
  if (!body) return [];

  let queries = 0;
  walkScope(body, (child) => {
    if (child.type === PyNodes.CALL && isRawQuery(child, sourceCode)) queries++;
  });
  if (queries === 0 || queries < ctx.knowledge.threshold(PATTERN, 'raw_queries')) return [];

  const functionName = nameOf(node, sourceCode);
  const { startLine, endLine } = getNodeLines(node);
  return [
    {
      patternName: PATTERN,
      opportunityType: 'refactor_to_pattern',
      confidence: 'low',
      lineNumber: startLine,
      lineEnd: endLine,
      description: `Function ${functionName} runs ${queries} raw SQL ${queries === 1 ? 'query' : 'queries'} outside a repository`,
      currentCodeSnippet: snippetOf(node, sourceCode),
      suggestedImprovement: 'Move data access behind a Repository interface',
      reasoning: 'Raw SQL mixed into business logic couples it to the storage schema and is hard to test',
      effortEstimate: 'high',
      impactEstimate: 'high',
    },
  ];
}
