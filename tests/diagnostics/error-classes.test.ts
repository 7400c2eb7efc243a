/**
 * Error Class Tests
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  createLexerError,
  LexerError,
  ParseError,
  TernError,
  type SourceSpan,
} from '../../src/index.js';

const SPAN: SourceSpan = {
  start: { line: 1, column: 3, offset: 2 },
  end: { line: 1, column: 4, offset: 3 },
};

describe('TernError', () => {
  it('appends the location to the message', () => {
    const err = new TernError({
      errorId: 'TERN-P001',
      message: "Unexpected token: ';'",
      location: SPAN.start,
    });
    expect(err.message).toBe("Unexpected token: ';' at 1:3");
    expect(err.name).toBe('TernError');
  });

  it('strips the location from structured data', () => {
    const err = new TernError({
      errorId: 'TERN-P001',
      message: 'Unexpected token: x',
      location: SPAN.start,
      context: { found: 'x' },
    });
    expect(err.toData()).toEqual({
      errorId: 'TERN-P001',
      message: 'Unexpected token: x',
      location: SPAN.start,
      context: { found: 'x' },
    });
  });

  it('formats through a host formatter', () => {
    const err = new TernError({ errorId: 'TERN-P005', message: 'bare try' });
    expect(err.format()).toBe('bare try');
    expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[TERN-P005] bare try'
    );
  });

  it('rejects unknown and empty IDs', () => {
    expect(() => new TernError({ errorId: 'TERN-X999', message: 'x' })).toThrow(
      new TypeError('Unknown error ID: TERN-X999')
    );
    expect(() => new TernError({ errorId: '', message: 'x' })).toThrow(
      new TypeError('errorId is required')
    );
  });
});

describe('createError', () => {
  it('renders the registry template', () => {
    const err = createError('TERN-P003', { operator: '+' }, SPAN);
    expect(err).toBeInstanceOf(ParseError);
    expect(err.message).toBe("Expected expression after '+' at 1:3");
    expect(err.text).toBe("Expected expression after '+'");
    expect(err.kind).toBe('ExpectedExpressionAfterOperator');
    expect(err.severity).toBe('error');
    expect(err.recovery).toBe('none');
    expect(err.span).toBe(SPAN);
    expect(err.context).toEqual({ operator: '+' });
  });

  it('takes severity from the registry', () => {
    const err = createError('TERN-P006', { name: 'a', limit: 2 }, SPAN);
    expect(err.severity).toBe('warning');
    expect(err.text).toBe(
      "Could not resolve '<' after 'a' within 2 tokens; treated as comparison"
    );
  });

  it('throws on unknown IDs', () => {
    expect(() => createError('TERN-P999', {}, SPAN)).toThrow(
      new TypeError('Unknown error ID: TERN-P999')
    );
  });
});

describe('LexerError', () => {
  it('carries the span and location', () => {
    const err = createLexerError('TERN-L002', { char: '`' }, SPAN);
    expect(err).toBeInstanceOf(LexerError);
    expect(err.name).toBe('LexerError');
    expect(err.message).toBe('Unexpected character: ` at 1:3');
    expect(err.location).toEqual(SPAN.start);
  });

  it('only accepts lexer IDs', () => {
    expect(() => new LexerError('TERN-P001', 'x', SPAN)).toThrow(
      new TypeError('Expected lexer error ID, got: TERN-P001')
    );
  });

  it('converts to a skipped parse diagnostic', () => {
    const converted = ParseError.fromLexerError(
      createLexerError('TERN-L005', { sequence: 'q' }, SPAN)
    );
    expect(converted.errorId).toBe('TERN-L005');
    expect(converted.kind).toBe('LexError');
    expect(converted.recovery).toBe('skipped');
    expect(converted.text).toBe('Invalid escape sequence: \\q');
    expect(converted.context).toEqual({ sequence: 'q' });
  });
});
