/**
 * Function and Lambda Parsing Tests
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/index.js';
import { expectNode, parseExpr, parseItem, sexp } from '../helpers/ast.js';

describe('Functions', () => {
  describe('declarations', () => {
    it('parses typed parameters and a return type', () => {
      const fn = expectNode(
        parseItem('fn add(x: i32, y: i32) -> i32 { x + y }'),
        'Function'
      );
      expect(fn.name).toBe('add');
      expect(fn.keyword).toBe('fn');
      expect(fn.params.map((p) => expectNode(p.pattern, 'IdentifierPattern').name)).toEqual([
        'x',
        'y',
      ]);
      expect(fn.params.map((p) => p.typeAnnotation && sexp(p.typeAnnotation))).toEqual([
        'i32',
        'i32',
      ]);
      expect(fn.returnType && sexp(fn.returnType)).toBe('i32');
      const body = expectNode(fn.body, 'Block');
      expect(sexp(expectNode(body.statements[0], 'ExpressionStatement').expression)).toBe(
        '(+ x y)'
      );
    });

    it('parses the fun spelling with a default and an expression body', () => {
      const fn = expectNode(parseItem('fun greet(name = "world") = "hi"'), 'Function');
      expect(fn.keyword).toBe('fun');
      expect(fn.params[0]?.defaultValue && sexp(fn.params[0].defaultValue)).toBe(
        '"world"'
      );
      expect(fn.body && sexp(fn.body)).toBe('"hi"');
    });

    it('parses a => body', () => {
      const fn = expectNode(parseItem('fn double(x) => x * 2'), 'Function');
      expect(fn.body && sexp(fn.body)).toBe('(* x 2)');
    });

    it('parses generic bounds and a where clause', () => {
      const fn = expectNode(
        parseItem('fn largest<T: Ord + Copy>(xs: &[T]) -> T where T: Clone { xs[0] }'),
        'Function'
      );
      expect(fn.generics).toHaveLength(1);
      expect(fn.generics[0]?.name).toBe('T');
      expect(fn.generics[0]?.bounds.map(sexp)).toEqual(['Ord', 'Copy']);
      expect(fn.params[0]?.typeAnnotation?.type).toBe('ReferenceType');
      expect(fn.whereClause).toHaveLength(1);
      expect(fn.whereClause[0]?.bounds.map(sexp)).toEqual(['Clone']);
    });

    it('parses self parameters', () => {
      const impl = expectNode(
        parseItem(
          'impl Counter { fn get(&self) {} fn add(&mut self, x: i32) {} fn take(self) {} fn own(mut self) {} }'
        ),
        'Impl'
      );
      const fns = impl.members.map((m) => expectNode(m, 'Function'));
      expect(fns.map((f) => f.selfParam)).toEqual(['ref', 'mutRef', 'value', 'mutValue']);
      expect(fns[1]?.params).toHaveLength(1);
      expect(fns[0]?.params).toEqual([]);
    });

    it('parses async functions', () => {
      const fn = expectNode(parseItem('async fn fetch(url) { await get(url) }'), 'Function');
      expect(fn.isAsync).toBe(true);
      expect(fn.name).toBe('fetch');
    });

    it('requires a body at statement level', () => {
      expect(() => parse('fn f()')).toThrow(
        'Expected function body, found end of input'
      );
    });
  });

  describe('function expressions', () => {
    it('parses an anonymous function with an expression body', () => {
      const binding = expectNode(parseItem('let f = fn(x) x + 1'), 'Let');
      const fn = expectNode(binding.initializer, 'Function');
      expect(fn.name).toBeNull();
      expect(fn.body && sexp(fn.body)).toBe('(+ x 1)');
    });

    it('parses async function expressions', () => {
      const fn = expectNode(parseExpr('async fn(x) { x }'), 'Function');
      expect(fn.isAsync).toBe(true);
      expect(fn.name).toBeNull();
    });
  });

  describe('closures', () => {
    it('parses pipe closures', () => {
      const lambda = expectNode(parseExpr('|a, b| a + b'), 'Lambda');
      expect(lambda.form).toBe('pipe');
      expect(lambda.params).toHaveLength(2);
      expect(sexp(lambda.body)).toBe('(+ a b)');
    });

    it('parses a closure with no parameters', () => {
      const lambda = expectNode(parseExpr('|| 42'), 'Lambda');
      expect(lambda.params).toEqual([]);
      expect(sexp(lambda.body)).toBe('42');
    });

    it('parses typed closure parameters', () => {
      const lambda = expectNode(parseExpr('|x: i32| x'), 'Lambda');
      expect(lambda.params[0]?.typeAnnotation && sexp(lambda.params[0].typeAnnotation)).toBe(
        'i32'
      );
    });

    it('parses arrow lambdas with defaults', () => {
      const lambda = expectNode(parseExpr('(a, b = 2) => a'), 'Lambda');
      expect(lambda.params).toHaveLength(2);
      expect(lambda.params[1]?.defaultValue && sexp(lambda.params[1].defaultValue)).toBe('2');
    });

    it('parses an arrow lambda as a call argument', () => {
      const call = expectNode(parseExpr('xs.map(x => x + 1)'), 'MethodCall');
      const lambda = expectNode(call.args[0], 'Lambda');
      expect(sexp(lambda.body)).toBe('(+ x 1)');
    });

    it('parses async closures, arrow lambdas and blocks', () => {
      expect(expectNode(parseExpr('async |x| x'), 'Lambda').isAsync).toBe(true);
      const arrow = expectNode(parseExpr('async (x) => x'), 'Lambda');
      expect(arrow.isAsync).toBe(true);
      expect(arrow.span.start.offset).toBe(0);
      expect(expectNode(parseExpr('async x => x'), 'Lambda').isAsync).toBe(true);
      expect(expectNode(parseExpr('async { 1 }'), 'AsyncBlock').body.statements).toHaveLength(1);
    });

    it('rejects async before anything else', () => {
      expect(() => parse('async 1', { context: 'expression' })).toThrow(
        "Expected block, function or closure after 'async', found '1'"
      );
    });
  });
});
