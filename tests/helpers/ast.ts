/**
 * Test helpers for walking parser output without casts
 */

import {
  parse,
  type ASTNode,
  type ExpressionNode,
  type NodeType,
  type ParseOptions,
  type SourceSpan,
  type StatementNode,
} from '../../src/index.js';

export type NodeOf<K extends NodeType> = Extract<ASTNode, { type: K }>;

function isNode<K extends NodeType>(node: ASTNode, type: K): node is NodeOf<K> {
  return node.type === type;
}

/**
 * Narrow a node to the given type. Throws (failing the test) on a
 * missing node or a different type.
 */
export function expectNode<K extends NodeType>(
  node: ASTNode | null | undefined,
  type: K
): NodeOf<K> {
  if (node === null || node === undefined) {
    throw new Error(`Expected ${type} node, got ${String(node)}`);
  }
  if (!isNode(node, type)) {
    throw new Error(`Expected ${type} node, got ${node.type}`);
  }
  return node;
}

/** Top-level items of a module parse */
export function parseItems(
  source: string,
  options?: ParseOptions
): StatementNode[] {
  return expectNode(parse(source, options), 'Program').items;
}

/** First top-level item of a module parse */
export function parseItem(source: string): StatementNode {
  const [first] = parseItems(source);
  if (!first) throw new Error(`No items parsed from: ${source}`);
  return first;
}

/** Parse in expression context */
export function parseExpr(source: string): ExpressionNode {
  const root = expectNode(
    parse(source, { context: 'expression' }),
    'ExpressionRoot'
  );
  const { expression } = root;
  if (expression.type === 'Error') {
    throw new Error(`Expression did not parse: ${expression.message}`);
  }
  return expression;
}

/** Expression carried by an expression statement */
export function statementExpr(node: StatementNode | undefined): ExpressionNode {
  return expectNode(node, 'ExpressionStatement').expression;
}

/** Source text covered by a span */
export function textOf(source: string, span: SourceSpan): string {
  return source.slice(span.start.offset, span.end.offset);
}

// ============================================================
// S-EXPRESSION RENDERING
// ============================================================

function form(head: string, ...parts: string[]): string {
  return `(${[head, ...parts].join(' ')})`;
}

function typeArgs(args: readonly ASTNode[] | null): string {
  return args && args.length > 0 ? `<${args.map(sexp).join(', ')}>` : '';
}

/**
 * Compact rendering of expression and type structure, e.g.
 * `1 + 2 * 3` renders as `(+ 1 (* 2 3))`. Nodes without a rendering
 * show their type name.
 */
export function sexp(node: ASTNode): string {
  switch (node.type) {
    case 'Identifier':
      return node.name;
    case 'IntegerLiteral':
    case 'FloatLiteral':
      return node.raw;
    case 'StringLiteral':
      return JSON.stringify(node.value);
    case 'BoolLiteral':
      return String(node.value);
    case 'BinaryExpr':
      return form(node.op, sexp(node.left), sexp(node.right));
    case 'UnaryExpr':
      return form(node.postfix ? `.${node.op}` : node.op, sexp(node.operand));
    case 'Assign':
      return form(node.op, sexp(node.target), sexp(node.value));
    case 'Range':
      return form(
        node.inclusive ? '..=' : '..',
        node.start ? sexp(node.start) : '_',
        node.end ? sexp(node.end) : '_'
      );
    case 'Cast':
      return form('as', sexp(node.expression), sexp(node.targetType));
    case 'GroupedExpr':
      return form('group', sexp(node.expression));
    case 'Call':
      return form('call', sexp(node.callee), ...node.args.map(sexp));
    case 'MethodCall':
      return form(
        `${node.optional ? '?' : ''}.${node.method}${typeArgs(node.typeArgs)}`,
        sexp(node.receiver),
        ...node.args.map(sexp)
      );
    case 'FieldAccess':
      return form(node.optional ? '?.' : '.', sexp(node.object), node.field);
    case 'Index':
      return form('index', sexp(node.object), sexp(node.index));
    case 'TryOperator':
      return form('?', sexp(node.expression));
    case 'Path':
      return node.segments
        .map((segment) => `${segment.name}${typeArgs(segment.typeArgs)}`)
        .join('::');
    case 'NamedType':
      return `${node.path.join('::')}${typeArgs(node.args)}`;
    case 'Tuple':
      return form('tuple', ...node.elements.map(sexp));
    case 'List':
      return form('list', ...node.elements.map(sexp));
    default:
      return node.type;
  }
}
