/**
 * Parser Extension: Error Handling Constructs
 * try/catch/finally and throw
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  CatchClauseNode,
  PatternNode,
  ThrowNode,
  TryCatchNode,
} from '../ast-nodes.js';
import { createError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  current,
  expectClose,
  match,
  report,
  spanFrom,
  withRestrictions,
} from './state.js';
import { synchronizeHere } from './recovery.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseTry(): TryCatchNode;
    parseCatchClause(): CatchClauseNode;
    parseThrow(): ThrowNode;
  }
}

/**
 * `try { } catch (e) { } catch { } finally { }`
 *
 * A try with neither catch nor finally reports TERN-P005 and keeps the
 * node; parsing resumes right after the try block.
 */
Parser.prototype.parseTry = function (this: Parser): TryCatchNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume try

  const body = this.parseBlock(null, current(this.state).span.start);

  const catches: CatchClauseNode[] = [];
  while (check(this.state, TOKEN_TYPES.CATCH)) {
    catches.push(this.parseCatchClause());
  }

  let finallyBlock: BlockNode | null = null;
  if (match(this.state, TOKEN_TYPES.FINALLY)) {
    finallyBlock = this.parseBlock(null, current(this.state).span.start);
  }

  const span = spanFrom(this.state, start);
  if (catches.length === 0 && finallyBlock === null) {
    const error = createError('TERN-P005', {}, span);
    error.recovery = 'synchronized';
    report(this.state, error);
    synchronizeHere(this.state);
  }

  return { type: 'TryCatch', body, catches, finallyBlock, span };
};

/** `catch (pattern) { }`, `catch pattern { }` or `catch { }` */
Parser.prototype.parseCatchClause = function (this: Parser): CatchClauseNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume catch

  let pattern: PatternNode | null = null;
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    const open = advance(this.state);
    pattern = this.parsePattern();
    expectClose(this.state, TOKEN_TYPES.RPAREN, open);
  } else if (!check(this.state, TOKEN_TYPES.LBRACE)) {
    // `catch e {`: the brace opens the handler
    pattern = withRestrictions(this.state, { noStructLiteral: true }, () =>
      this.parsePattern()
    );
  }

  const body = this.parseBlock(null, current(this.state).span.start);
  return {
    type: 'CatchClause',
    pattern,
    body,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseThrow = function (this: Parser): ThrowNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume throw
  const value = this.parseExpression();
  return { type: 'Throw', value, span: spanFrom(this.state, start) };
};
