/**
 * Parser Extension: Program Parsing
 * Start contexts, statement lists, statement dispatch and recovery
 */

import { Parser } from './parser.js';
import type {
  AttributeNode,
  DeclarationNode,
  ErrorNode,
  ExpressionNode,
  ExpressionRootNode,
  ExpressionStatementNode,
  LetNode,
  ProgramNode,
  RootNode,
  StatementNode,
  Visibility,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  advance,
  canRecover,
  check,
  checkAt,
  current,
  expectedError,
  isAtEnd,
  makeSpan,
  match,
  report,
  spanFrom,
} from './state.js';
import { isBlockLikeStart } from './helpers.js';
import { makeErrorNode, synchronize } from './recovery.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseRoot(): RootNode;
    parseProgram(): ProgramNode;
    parseReplInput(): ProgramNode;
    parseExpressionRoot(): ExpressionRootNode;
    parseItems(close: TokenType | null): StatementNode[];
    parseStatementWithRecovery(): StatementNode;
    parseStatement(): StatementNode;
    parseDeclaration(
      start: SourceLocation,
      attributes: AttributeNode[],
      visibility: Visibility
    ): DeclarationNode | LetNode | null;
    parseExpressionStatement(): ExpressionStatementNode;
    expectEndOfInput(start: SourceLocation): StatementNode | null;
  }
}

const SOURCE_START: SourceLocation = Object.freeze({
  line: 1,
  column: 1,
  offset: 0,
});

// ============================================================
// START CONTEXTS
// ============================================================

Parser.prototype.parseRoot = function (this: Parser): RootNode {
  switch (this.state.options.context) {
    case 'module':
      return this.parseProgram();
    case 'repl':
      return this.parseReplInput();
    case 'expression':
      return this.parseExpressionRoot();
  }
};

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const items = this.parseItems(null);
  return {
    type: 'Program',
    items,
    span: makeSpan(SOURCE_START, current(this.state).span.end),
  };
};

/** Exactly one statement; anything after it is an error */
Parser.prototype.parseReplInput = function (this: Parser): ProgramNode {
  while (match(this.state, TOKEN_TYPES.SEMICOLON)) {
    // leading empty statements
  }

  const items: StatementNode[] = [];
  if (!isAtEnd(this.state)) {
    items.push(this.parseStatementWithRecovery());
    while (match(this.state, TOKEN_TYPES.SEMICOLON)) {
      // trailing empty statements
    }
    const trailing = this.expectEndOfInput(current(this.state).span.start);
    if (trailing) items.push(trailing);
  }

  return {
    type: 'Program',
    items,
    span: makeSpan(SOURCE_START, current(this.state).span.end),
  };
};

Parser.prototype.parseExpressionRoot = function (
  this: Parser
): ExpressionRootNode {
  const start = current(this.state).span.start;
  let expression: ExpressionNode | ErrorNode;

  try {
    expression = this.parseExpression();
  } catch (err) {
    if (!canRecover(this.state, err)) throw err;
    err.recovery = 'synchronized';
    report(this.state, err);
    while (!isAtEnd(this.state)) advance(this.state);
    expression = makeErrorNode(this.state, start, err.text);
  }

  this.expectEndOfInput(current(this.state).span.start);

  return {
    type: 'ExpressionRoot',
    expression,
    span: makeSpan(SOURCE_START, current(this.state).span.end),
  };
};

/**
 * Report leftover input after a REPL statement or an expression and
 * skip it. Returns an ErrorNode covering the skipped text, if any.
 */
Parser.prototype.expectEndOfInput = function (
  this: Parser,
  start: SourceLocation
): StatementNode | null {
  if (isAtEnd(this.state)) return null;

  const error = expectedError(this.state, 'Expected end of input');
  error.recovery = 'synchronized';
  report(this.state, error);
  while (!isAtEnd(this.state)) advance(this.state);
  this.state.syncCount++;
  return makeErrorNode(this.state, start, error.text);
};

// ============================================================
// STATEMENT LISTS
// ============================================================

/**
 * Statements up to `close` (not consumed) or end of input.
 * Each statement recovers on its own.
 */
Parser.prototype.parseItems = function (
  this: Parser,
  close: TokenType | null
): StatementNode[] {
  const items: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    if (close !== null && check(this.state, close)) break;
    if (match(this.state, TOKEN_TYPES.SEMICOLON)) continue;
    // A lexer error between statements needs no node
    if (match(this.state, TOKEN_TYPES.ERROR)) continue;

    const before = this.state.pos;
    items.push(this.parseStatementWithRecovery());
    if (this.state.pos === before && !isAtEnd(this.state)) {
      throw new Error(
        `Parser made no progress at offset ${current(this.state).span.start.offset}`
      );
    }
  }

  return items;
};

Parser.prototype.parseStatementWithRecovery = function (
  this: Parser
): StatementNode {
  const start = current(this.state).span.start;
  const startPos = this.state.pos;
  this.state.panicMode = false;

  try {
    return this.parseStatement();
  } catch (err) {
    if (!canRecover(this.state, err)) throw err;
    err.recovery = 'synchronized';
    report(this.state, err);
    synchronize(this.state, startPos);
    return makeErrorNode(this.state, start, err.text);
  }
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const start = current(this.state).span.start;
  const attributes = this.parseAttributes();
  const visibility = this.parseVisibility();

  const declaration = this.parseDeclaration(start, attributes, visibility);
  if (declaration) return declaration;

  if (attributes.length > 0 || visibility !== null) {
    throw expectedError(this.state, 'Expected declaration');
  }
  return this.parseExpressionStatement();
};

Parser.prototype.parseDeclaration = function (
  this: Parser,
  start: SourceLocation,
  attributes: AttributeNode[],
  visibility: Visibility
): DeclarationNode | LetNode | null {
  const { state } = this;

  switch (current(state).type) {
    case TOKEN_TYPES.LET:
    case TOKEN_TYPES.VAR:
    case TOKEN_TYPES.CONST:
      return this.parseLet();

    case TOKEN_TYPES.FN:
    case TOKEN_TYPES.FUN:
      if (!checkAt(state, 1, TOKEN_TYPES.IDENTIFIER)) return null;
      return this.parseFunction({
        start,
        attributes,
        visibility,
        isAsync: false,
        requireBody: true,
      });

    case TOKEN_TYPES.ASYNC:
      if (
        !checkAt(state, 1, TOKEN_TYPES.FN, TOKEN_TYPES.FUN) ||
        !checkAt(state, 2, TOKEN_TYPES.IDENTIFIER)
      ) {
        return null;
      }
      advance(state);
      return this.parseFunction({
        start,
        attributes,
        visibility,
        isAsync: true,
        requireBody: true,
      });

    case TOKEN_TYPES.STRUCT:
      return this.parseStruct(start, attributes, visibility);
    case TOKEN_TYPES.ENUM:
      return this.parseEnum(start, attributes, visibility);
    case TOKEN_TYPES.ACTOR:
      return this.parseActor(start, attributes, visibility);
    case TOKEN_TYPES.CLASS:
      return this.parseClass(start, attributes, visibility);
    case TOKEN_TYPES.TRAIT:
    case TOKEN_TYPES.INTERFACE:
      return this.parseTrait(start, attributes, visibility);
    case TOKEN_TYPES.IMPL:
      return this.parseImpl(start, attributes);

    case TOKEN_TYPES.TYPE:
      if (!checkAt(state, 1, TOKEN_TYPES.IDENTIFIER)) return null;
      return this.parseTypeAlias(start, visibility);

    case TOKEN_TYPES.MOD:
    case TOKEN_TYPES.MODULE:
      return this.parseModule(start, visibility);

    case TOKEN_TYPES.USE:
    case TOKEN_TYPES.IMPORT:
    case TOKEN_TYPES.FROM:
      return this.parseUse(start, visibility);

    case TOKEN_TYPES.EXPORT:
      return this.parseExport(start);

    default:
      return null;
  }
};

/**
 * Expression statement. A block-like expression (`if`, `match`, loops,
 * blocks) ends the statement at its closing brace, so a following `(`
 * or `[` starts a new statement; only `.` chains continue it.
 */
Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStatementNode {
  const start = current(this.state).span.start;

  const expression = isBlockLikeStart(current(this.state).type)
    ? this.parsePostfix(this.parsePrimary(), start, false)
    : this.parseExpression();

  const terminated = match(this.state, TOKEN_TYPES.SEMICOLON) !== null;

  return {
    type: 'ExpressionStatement',
    expression,
    terminated,
    span: spanFrom(this.state, start),
  };
};
