/**
 * Expression Parsing Tests
 * Precedence, associativity, unary and postfix operators, literals
 */

import { describe, expect, it } from 'vitest';
import { expectNode, parseExpr, parseItems, sexp, statementExpr } from '../helpers/ast.js';

const tree = (source: string): string => sexp(parseExpr(source));

describe('Expressions', () => {
  describe('binary precedence', () => {
    it.each([
      ['1 + 2 * 3', '(+ 1 (* 2 3))'],
      ['a * b + c', '(+ (* a b) c)'],
      ['a - b - c', '(- (- a b) c)'],
      ['a ** b ** c', '(** a (** b c))'],
      ['a || b && c', '(|| a (&& b c))'],
      ['a == b < c', '(== a (< b c))'],
      ['a |> f |> g', '(|> (|> a f) g)'],
      ['a ?? b ?? c', '(?? a (?? b c))'],
      ['a | b ^ c & d << 1', '(| a (^ b (& c (<< d 1))))'],
      ['a < b && c > d', '(&& (< a b) (> c d))'],
      ['x in xs && y is T', '(&& (in x xs) (is y T))'],
      ['counter ! Increment', '(! counter Increment)'],
      ['a ! b ?? c', '(! a (?? b c))'],
      ['a |> b ! c', '(|> a (! b c))'],
    ])('%s', (source, expected) => {
      expect(tree(source)).toBe(expected);
    });
  });

  describe('assignment', () => {
    it('is right-associative', () => {
      expect(tree('a = b = c')).toBe('(= a (= b c))');
    });

    it('parses compound assignment', () => {
      expect(tree('x += 1')).toBe('(+= x 1)');
      expect(tree('x <<= 2')).toBe('(<<= x 2)');
    });

    it('binds looser than everything else', () => {
      expect(tree('x = a ?? b |> f')).toBe('(= x (|> (?? a b) f))');
    });
  });

  describe('ranges', () => {
    it.each([
      ['1..10', '(.. 1 10)'],
      ['a..=b', '(..= a b)'],
      ['..5', '(.. _ 5)'],
      ['a..', '(.. a _)'],
      ['a + 1..b * 2', '(.. (+ a 1) (* b 2))'],
    ])('%s', (source, expected) => {
      expect(tree(source)).toBe(expected);
    });
  });

  describe('casts', () => {
    it('binds tighter than arithmetic', () => {
      expect(tree('x as i64 + 1')).toBe('(+ (as x i64) 1)');
      expect(tree('a + b as f64')).toBe('(+ a (as b f64))');
    });
  });

  describe('unary operators', () => {
    it('binds unary minus tighter than power', () => {
      expect(tree('-2 ** 2')).toBe('(** (- 2) 2)');
    });

    it('applies postfix operators before prefix ones', () => {
      expect(tree('-x?')).toBe('(- (? x))');
      expect(tree('!a.b()')).toBe('(! (.b a))');
    });

    it('parses references and dereference', () => {
      expect(tree('&mut x')).toBe('(&mut x)');
      expect(tree('*p = 1')).toBe('(= (* p) 1)');
    });

    it('splits && in prefix position into two references', () => {
      const outer = expectNode(parseExpr('&&x'), 'UnaryExpr');
      const inner = expectNode(outer.operand, 'UnaryExpr');
      expect(outer.op).toBe('&');
      expect(inner.op).toBe('&');
      expect(inner.span.start.offset).toBe(1);
      expect(inner.span.end.offset).toBe(3);
    });

    it('parses prefix and postfix await', () => {
      expect(tree('await f()')).toBe('(await (call f))');
      expect(tree('x.await')).toBe('(.await x)');
    });
  });

  describe('postfix chains', () => {
    it.each([
      ['a.b.c', '(. (. a b) c)'],
      ['t.0.1', '(. (. t 0) 1)'],
      ['a?.b', '(?. a b)'],
      ['a?.m(1)', '(?.m a 1)'],
      ['f(1)(2)', '(call (call f 1) 2)'],
      ['a[0][1]', '(index (index a 0) 1)'],
      ['v.iter::<i32>()', '(.iter<i32> v)'],
      ['read()?.len()', '(?.len (call read))'],
      ['read()?', '(? (call read))'],
    ])('%s', (source, expected) => {
      expect(tree(source)).toBe(expected);
    });
  });

  describe('literals', () => {
    it('keeps integer values exact with suffix and raw text', () => {
      const literal = expectNode(parseExpr('0xff_u8'), 'IntegerLiteral');
      expect(literal.value).toBe(255n);
      expect(literal.suffix).toBe('u8');
      expect(literal.raw).toBe('0xff_u8');
    });

    it('parses floats, chars, booleans and null', () => {
      expect(expectNode(parseExpr('2.5'), 'FloatLiteral').value).toBe(2.5);
      expect(expectNode(parseExpr("b'x'"), 'CharLiteral').byte).toBe(true);
      expect(expectNode(parseExpr('false'), 'BoolLiteral').value).toBe(false);
      expect(parseExpr('null').type).toBe('NullLiteral');
    });

    it('tags string kinds', () => {
      expect(expectNode(parseExpr('"a"'), 'StringLiteral').kind).toBe('plain');
      expect(expectNode(parseExpr('r"a"'), 'StringLiteral').kind).toBe('raw');
      expect(expectNode(parseExpr('b"a"'), 'StringLiteral').kind).toBe('byte');
    });
  });

  describe('interpolation', () => {
    it('alternates fragments and expressions', () => {
      const node = expectNode(parseExpr('f"Hello {name}!"'), 'Interpolation');
      expect(node.parts.map((p) => p.type)).toEqual([
        'StringFragment',
        'Identifier',
        'StringFragment',
      ]);
      expect(expectNode(node.parts[0], 'StringFragment').value).toBe('Hello ');
      expect(expectNode(node.parts[2], 'StringFragment').value).toBe('!');
    });

    it('parses full expressions inside braces', () => {
      const node = expectNode(parseExpr('f"{a + b}"'), 'Interpolation');
      expect(node.parts).toHaveLength(1);
      expect(node.parts[0] && sexp(node.parts[0])).toBe('(+ a b)');
    });

    it('parses a nested string literal as one part', () => {
      const node = expectNode(parseExpr('f"outer {"{inner}"} tail"'), 'Interpolation');
      expect(node.parts.map((p) => p.type)).toEqual([
        'StringFragment',
        'StringLiteral',
        'StringFragment',
      ]);
      expect(expectNode(node.parts[0], 'StringFragment').value).toBe('outer ');
      expect(expectNode(node.parts[1], 'StringLiteral').value).toBe('{inner}');
      expect(expectNode(node.parts[2], 'StringFragment').value).toBe(' tail');
    });

    it('attaches a format spec to its expression', () => {
      const node = expectNode(parseExpr('f"{pi:.2}"'), 'Interpolation');
      const value = expectNode(node.parts[0], 'FormattedValue');
      expect(value.spec).toBe('.2');
      expect(expectNode(value.expression, 'Identifier').name).toBe('pi');
      expect(value.span.start.offset).toBe(3);
      expect(value.span.end.offset).toBe(8);
    });

    it('leaves plain strings with braces uninterpolated', () => {
      const node = expectNode(parseExpr('"{}"'), 'StringLiteral');
      expect(node.value).toBe('{}');
    });
  });

  describe('collections', () => {
    it('parses tuples, unit and grouping', () => {
      expect(parseExpr('()').type).toBe('UnitLiteral');
      expect(tree('(1,)')).toBe('(tuple 1)');
      expect(tree('(1, 2)')).toBe('(tuple 1 2)');
      expect(tree('(a + b) * c')).toBe('(* (group (+ a b)) c)');
    });

    it('parses lists and spreads', () => {
      expect(tree('[1, 2, 3,]')).toBe('(list 1 2 3)');
      const list = expectNode(parseExpr('[...a, b]'), 'List');
      expect(expectNode(list.elements[0], 'Spread').expression.type).toBe('Identifier');
    });

    it('parses repeat arrays', () => {
      const node = expectNode(parseExpr('[0; 4]'), 'ArrayRepeat');
      expect(sexp(node.value)).toBe('0');
      expect(sexp(node.count)).toBe('4');
    });

    it('parses list comprehensions', () => {
      const node = expectNode(
        parseExpr('[x * 2 for x in xs if x > 0]'),
        'ListComprehension'
      );
      expect(sexp(node.element)).toBe('(* x 2)');
      expect(expectNode(node.pattern, 'IdentifierPattern').name).toBe('x');
      expect(sexp(node.iterable)).toBe('xs');
      expect(node.condition && sexp(node.condition)).toBe('(> x 0)');
    });
  });

  describe('struct literals', () => {
    it('parses named and shorthand fields', () => {
      const node = expectNode(parseExpr('Point { x: 1, y }'), 'StructLiteral');
      expect(sexp(node.path)).toBe('Point');
      expect(node.fields.map((f) => f.name)).toEqual(['x', 'y']);
      expect(node.fields[0]?.value && sexp(node.fields[0].value)).toBe('1');
      expect(node.fields[1]?.value).toBeNull();
      expect(node.base).toBeNull();
    });

    it('parses a base expression', () => {
      const node = expectNode(parseExpr('Point { x: 1, ..base }'), 'StructLiteral');
      expect(node.base && sexp(node.base)).toBe('base');
    });

    it('parses an empty body for capitalized names', () => {
      const node = expectNode(parseExpr('Unit {}'), 'StructLiteral');
      expect(node.fields).toEqual([]);
    });

    it('keeps a lowercase name followed by a block as two statements', () => {
      const items = parseItems('foo {}');
      expect(items.map((item) => statementExpr(item).type)).toEqual([
        'Identifier',
        'Block',
      ]);
    });
  });

  describe('macros', () => {
    it('parses bracket-delimited macro calls', () => {
      const node = expectNode(parseExpr('vec![1, 2]'), 'MacroCall');
      expect(node.name).toBe('vec');
      expect(node.delimiter).toBe('bracket');
      expect(node.args).toHaveLength(2);
    });
  });
});
