/**
 * Control Flow Parsing Tests
 * Conditionals, match, loops, labels, jumps and try/catch
 */

import { describe, expect, it } from 'vitest';
import { ParseError, parse } from '../../src/index.js';
import {
  expectNode,
  parseExpr,
  parseItem,
  parseItems,
  sexp,
  statementExpr,
} from '../helpers/ast.js';

describe('Control flow', () => {
  describe('if', () => {
    it('parses an else-if chain', () => {
      const node = expectNode(
        parseExpr('if a { 1 } else if b { 2 } else { 3 }'),
        'If'
      );
      expect(sexp(node.condition)).toBe('a');
      const elseIf = expectNode(node.elseBranch, 'If');
      expect(sexp(elseIf.condition)).toBe('b');
      expect(expectNode(elseIf.elseBranch, 'Block').statements).toHaveLength(1);
    });

    it('leaves elseBranch null without else', () => {
      expect(expectNode(parseExpr('if a { 1 }'), 'If').elseBranch).toBeNull();
    });

    it('parses if let with a destructuring pattern', () => {
      const node = expectNode(
        parseExpr('if let Some(v) = opt { v } else { 0 }'),
        'IfLet'
      );
      const pattern = expectNode(node.pattern, 'TupleStructPattern');
      expect(pattern.path).toEqual(['Some']);
      expect(pattern.elements).toHaveLength(1);
      expect(sexp(node.value)).toBe('opt');
      expect(node.elseBranch?.type).toBe('Block');
    });
  });

  describe('match', () => {
    it('parses arms with guards', () => {
      const node = expectNode(
        parseExpr('match n { 0 => "zero", n if n < 0 => "neg", _ => "pos" }'),
        'Match'
      );
      expect(sexp(node.subject)).toBe('n');
      expect(node.arms).toHaveLength(3);
      const guarded = expectNode(node.arms[1], 'MatchArm');
      expect(guarded.guard && sexp(guarded.guard)).toBe('(< n 0)');
      expect(sexp(guarded.body)).toBe('"neg"');
      expect(expectNode(node.arms[2], 'MatchArm').pattern.type).toBe(
        'WildcardPattern'
      );
    });

    it('needs no comma after a block-bodied arm', () => {
      const node = expectNode(parseExpr('match x { 1 => { a } 2 => b }'), 'Match');
      expect(node.arms).toHaveLength(2);
      expect(expectNode(node.arms[0], 'MatchArm').body.type).toBe('Block');
    });

    it('accepts a trailing comma', () => {
      const node = expectNode(parseExpr('match x { _ => 1, }'), 'Match');
      expect(node.arms).toHaveLength(1);
    });

    it('rejects arms run together without a comma', () => {
      expect(() => parse('match x { 1 => a 2 => b }')).toThrow(
        "Expected ',' or '}' after match arm, found '2'"
      );
    });
  });

  describe('loops', () => {
    it('parses while with a terminated statement body', () => {
      const node = expectNode(parseExpr('while i < 10 { i += 1; }'), 'While');
      expect(sexp(node.condition)).toBe('(< i 10)');
      const stmt = expectNode(node.body.statements[0], 'ExpressionStatement');
      expect(stmt.terminated).toBe(true);
      expect(sexp(stmt.expression)).toBe('(+= i 1)');
    });

    it('parses while let', () => {
      const node = expectNode(
        parseExpr('while let Some(x) = stack.pop() { x }'),
        'WhileLet'
      );
      expect(node.pattern.type).toBe('TupleStructPattern');
      expect(sexp(node.value)).toBe('(.pop stack)');
    });

    it('parses for with a tuple pattern', () => {
      const node = expectNode(parseExpr('for (k, v) in map {}'), 'For');
      expect(expectNode(node.pattern, 'TuplePattern').elements).toHaveLength(2);
      expect(sexp(node.iterable)).toBe('map');
    });

    it('parses a range as the iterable', () => {
      const node = expectNode(parseExpr('for i in 0..n {}'), 'For');
      expect(sexp(node.iterable)).toBe('(.. 0 n)');
    });

    it('parses loop with break', () => {
      const node = expectNode(parseExpr('loop { break; }'), 'Loop');
      const stmt = expectNode(node.body.statements[0], 'ExpressionStatement');
      const jump = expectNode(stmt.expression, 'Break');
      expect(jump.label).toBeNull();
      expect(jump.value).toBeNull();
    });
  });

  describe('labels and jumps', () => {
    it('attaches a label to a loop and to continue', () => {
      const node = expectNode(
        parseExpr("'outer: for x in xs { continue 'outer; }"),
        'For'
      );
      expect(node.label).toBe('outer');
      const stmt = statementExpr(node.body.statements[0]);
      expect(expectNode(stmt, 'Continue').label).toBe('outer');
    });

    it('attaches a label to a block and reads a break value', () => {
      const node = expectNode(parseExpr("'a: { break 'a 1 }"), 'Block');
      expect(node.label).toBe('a');
      const jump = expectNode(statementExpr(node.statements[0]), 'Break');
      expect(jump.label).toBe('a');
      expect(jump.value && sexp(jump.value)).toBe('1');
    });

    it('spans a labeled loop from the label', () => {
      const node = parseExpr("'l: loop {}");
      expect(node.span.start.offset).toBe(0);
      expect(node.span.end.offset).toBe(11);
    });

    it('takes a return value only from the same line', () => {
      const fn = expectNode(parseItem('fn f() {\n  return\n  g()\n}'), 'Function');
      const body = expectNode(fn.body, 'Block');
      expect(body.statements).toHaveLength(2);
      expect(expectNode(statementExpr(body.statements[0]), 'Return').value).toBeNull();
      expect(sexp(statementExpr(body.statements[1]))).toBe('(call g)');
    });

    it('reads a return value on the same line', () => {
      const node = expectNode(parseExpr('return a + b'), 'Return');
      expect(node.value && sexp(node.value)).toBe('(+ a b)');
    });
  });

  describe('try and throw', () => {
    it('parses catch with a parenthesized pattern and finally', () => {
      const node = expectNode(
        parseExpr('try { risky() } catch (e) { log(e) } finally { close() }'),
        'TryCatch'
      );
      expect(node.catches).toHaveLength(1);
      const pattern = node.catches[0]?.pattern;
      expect(expectNode(pattern, 'IdentifierPattern').name).toBe('e');
      expect(node.finallyBlock?.statements).toHaveLength(1);
    });

    it('parses catch without a pattern', () => {
      const node = expectNode(parseExpr('try { a() } catch { b() }'), 'TryCatch');
      expect(node.catches[0]?.pattern).toBeNull();
      expect(node.finallyBlock).toBeNull();
    });

    it('parses a bare catch pattern before the handler block', () => {
      const node = expectNode(parseExpr('try { a() } catch e { b(e) }'), 'TryCatch');
      expect(expectNode(node.catches[0]?.pattern, 'IdentifierPattern').name).toBe('e');
      expect(node.catches[0]?.body.statements).toHaveLength(1);
    });

    it('parses several catch clauses', () => {
      const node = expectNode(
        parseExpr('try { a() } catch (IoError(e)) { 1 } catch (e) { 2 }'),
        'TryCatch'
      );
      expect(node.catches.map((c) => c.pattern?.type)).toEqual([
        'TupleStructPattern',
        'IdentifierPattern',
      ]);
    });

    it('rejects try with neither catch nor finally', () => {
      expect(() => parse('try { risky() }')).toThrow(ParseError);
      try {
        parse('try { risky() }');
      } catch (err) {
        expect(err instanceof ParseError && err.errorId).toBe('TERN-P005');
      }
    });

    it('parses throw', () => {
      const node = expectNode(parseExpr('throw Error("bad")'), 'Throw');
      expect(sexp(node.value)).toBe('(call Error "bad")');
    });
  });

  describe('statements', () => {
    it('separates block-like statements without semicolons', () => {
      const items = parseItems('if a { b }\nwhile c { d }\nx');
      expect(items.map((item) => statementExpr(item).type)).toEqual([
        'If',
        'While',
        'Identifier',
      ]);
    });

    it('records whether a statement ends with a semicolon', () => {
      const items = parseItems('a; b');
      expect(items.map((item) => expectNode(item, 'ExpressionStatement').terminated)).toEqual([
        true,
        false,
      ]);
    });
  });
});
