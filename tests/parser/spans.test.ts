/**
 * Source Span Tests
 * Node spans, nesting and code-point columns
 */

import { describe, expect, it } from 'vitest';
import {
  buildNodeIndex,
  parse,
  parseWithRecovery,
  spanContains,
} from '../../src/index.js';
import { expectNode, parseExpr, parseItem, textOf } from '../helpers/ast.js';

const PROGRAM = `#[inline]
pub fn total(items: &[Item], rate: f64) -> f64 {
    let mut sum = 0.0;
    for item in items {
        if item.price > 0.0 { sum += item.price * rate; }
    }
    match sum { 0.0 => 1.0, n if n > 100.0 => n / 2.0, _ => sum }
}

struct Item { price: f64 }

let cheap = Item { price: 1.5 };
let doubled = [1, 2, 3].map(|x| x * 2);
`;

describe('Spans', () => {
  it('covers a let statement through its semicolon', () => {
    const source = 'let x = 1; f()';
    const node = expectNode(parseItem(source), 'Let');
    expect(textOf(source, node.span)).toBe('let x = 1;');
  });

  it('starts a declaration at its attributes', () => {
    const node = expectNode(parseItem('#[test]\nfn check() {}'), 'Function');
    expect(node.span.start.offset).toBe(0);
    expect(node.span.end.offset).toBe(21);
  });

  it('covers a binary expression from left to right operand', () => {
    const source = '(a + b) * c';
    const node = expectNode(parseExpr(source), 'BinaryExpr');
    expect(textOf(source, node.span)).toBe(source);
    expect(textOf(source, node.left.span)).toBe('(a + b)');
  });

  it('keeps every child span inside its parent', () => {
    const index = buildNodeIndex(parse(PROGRAM));
    expect(index.nodes.length).toBeGreaterThan(50);

    const escaped = index.nodes.filter((node) => {
      const parent = index.parentOf(node);
      return parent !== null && !spanContains(parent.span, node.span);
    });
    expect(escaped.map((node) => node.type)).toEqual([]);
  });

  it('keeps Error nodes inside the program span', () => {
    const { ast } = parseWithRecovery('let a = ;\nlet b = 2;\nlet c = 3 +;');
    const index = buildNodeIndex(ast);
    for (const node of index.nodes) {
      const parent = index.parentOf(node);
      if (parent) expect(spanContains(parent.span, node.span)).toBe(true);
    }
  });

  it('counts columns in code points and offsets in UTF-16 units', () => {
    const node = expectNode(parseExpr('"😀😀" + x'), 'BinaryExpr');
    expect(node.right.span.start).toEqual({ line: 1, column: 8, offset: 9 });
  });

  it('restarts columns on each line', () => {
    const source = 'let a = 1\n  let b = 2';
    const second = parse(source);
    const items = expectNode(second, 'Program').items;
    expect(items[1]?.span.start).toEqual({ line: 2, column: 3, offset: 12 });
  });
});
