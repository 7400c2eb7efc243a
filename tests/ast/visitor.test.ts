/**
 * AST Visitor Tests
 */

import { describe, expect, it } from 'vitest';
import { childNodes, visitNode, type ASTNode } from '../../src/index.js';
import { expectNode, parseExpr, parseItem, parseItems } from '../helpers/ast.js';

function label(node: ASTNode): string {
  return node.type === 'Identifier' ? `Identifier:${node.name}` : node.type;
}

describe('childNodes', () => {
  it('lists operands in source order', () => {
    const node = parseExpr('a + b * c');
    expect(childNodes(node).map(label)).toEqual(['Identifier:a', 'BinaryExpr']);
  });

  it('lists the callee before the arguments', () => {
    expect(childNodes(parseExpr('f(x, 1)')).map(label)).toEqual([
      'Identifier:f',
      'Identifier:x',
      'IntegerLiteral',
    ]);
  });

  it('skips absent optional children', () => {
    const binding = expectNode(parseItem('let x = 1'), 'Let');
    expect(childNodes(binding).map(label)).toEqual([
      'IdentifierPattern',
      'IntegerLiteral',
    ]);
  });

  it('interleaves actor state and handlers by position', () => {
    const actor = parseItem('actor A { on Ping { } count: i32 on Pong { } }');
    expect(childNodes(actor).map(label)).toEqual([
      'ActorHandler',
      'StructField',
      'ActorHandler',
    ]);
  });

  it('returns no children for leaves', () => {
    expect(childNodes(parseExpr('42'))).toEqual([]);
  });
});

describe('visitNode', () => {
  it('calls enter before and exit after the children', () => {
    const events: string[] = [];
    visitNode(parseExpr('f(x)'), {
      enter: (node) => {
        events.push(`enter ${label(node)}`);
      },
      exit: (node) => {
        events.push(`exit ${label(node)}`);
      },
    });
    expect(events).toEqual([
      'enter Call',
      'enter Identifier:f',
      'exit Identifier:f',
      'enter Identifier:x',
      'exit Identifier:x',
      'exit Call',
    ]);
  });

  it('passes the parent of each node', () => {
    const parents: (string | null)[] = [];
    visitNode(parseExpr('-x'), {
      enter: (node, parent) => {
        parents.push(parent ? `${parent.type}>${label(node)}` : null);
      },
    });
    expect(parents).toEqual([null, 'UnaryExpr>Identifier:x']);
  });

  it('skips children when enter returns false', () => {
    const entered: string[] = [];
    const exited: string[] = [];
    visitNode(parseExpr('[a, [b, c]]'), {
      enter: (node) => {
        entered.push(label(node));
        return !(node.type === 'List' && node.elements.length === 2 && entered.length > 1);
      },
      exit: (node) => {
        exited.push(label(node));
      },
    });
    expect(entered).toEqual(['List', 'Identifier:a', 'List']);
    expect(exited).toEqual(['Identifier:a', 'List', 'List']);
  });

  it('reaches every identifier in a program', () => {
    const names: string[] = [];
    for (const item of parseItems('fn f(a) { a + b }\nlet c = f(d);')) {
      visitNode(item, {
        enter: (node) => {
          if (node.type === 'Identifier') names.push(node.name);
        },
      });
    }
    expect(names).toEqual(['a', 'b', 'f', 'd']);
  });
});
