/**
 * Declaration Parsing Tests
 * Structs, enums, classes, traits, impls, modules, imports and exports
 */

import { describe, expect, it } from 'vitest';
import { parse, parseWithRecovery } from '../../src/index.js';
import { expectNode, parseItem, parseItems, sexp, statementExpr } from '../helpers/ast.js';

const CLASS_SOURCE = `@Entity("users")
class User : Model + Serializable {
  pub name: String
  mut age: i32 = 0
  new(name: String) { self.name = name }
  pub fn greet(&self) -> String { "hi" }
  abstract fn save(&self);
  const MAX: i32 = 100
  property label: String { get => self.name, set(v) { self.name = v } }
  operator+(self, other: User) -> User { other }
}`;

describe('Declarations', () => {
  describe('structs', () => {
    it('parses attributes, generics, where clause and field defaults', () => {
      const node = expectNode(
        parseItem(
          '#[derive(Debug, Clone)]\npub struct Config<T> where T: Default { pub name: String = "x", mut count: T }'
        ),
        'Struct'
      );
      expect(node.name).toBe('Config');
      expect(node.visibility).toBe('public');
      expect(node.form).toBe('named');
      expect(node.attributes).toHaveLength(1);
      expect(node.attributes[0]?.style).toBe('hash');
      expect(node.attributes[0]?.name).toBe('derive');
      expect(node.attributes[0]?.args.map(sexp)).toEqual(['Debug', 'Clone']);
      expect(node.generics.map((g) => g.name)).toEqual(['T']);
      expect(node.whereClause).toHaveLength(1);

      const [name, count] = node.fields;
      expect(name?.name).toBe('name');
      expect(name?.visibility).toBe('public');
      expect(name?.defaultValue && sexp(name.defaultValue)).toBe('"x"');
      expect(count?.mutable).toBe(true);
      expect(count?.fieldType && sexp(count.fieldType)).toBe('T');
    });

    it('parses tuple structs', () => {
      const node = expectNode(parseItem('struct Pair(i32, String);'), 'Struct');
      expect(node.form).toBe('tuple');
      expect(node.fields.map((f) => f.name)).toEqual([null, null]);
      expect(node.fields.map((f) => sexp(f.fieldType))).toEqual(['i32', 'String']);
    });

    it('parses unit structs with scoped visibility', () => {
      const node = expectNode(parseItem('pub(crate) struct Marker;'), 'Struct');
      expect(node.form).toBe('unit');
      expect(node.fields).toEqual([]);
      expect(node.visibility).toBe('crate');
    });
  });

  describe('enums', () => {
    it('parses unit, tuple, struct and valued variants', () => {
      const node = expectNode(
        parseItem('enum Shape { Circle(f64), Rect { w: f64, h: f64 }, Empty, Code = 4 }'),
        'Enum'
      );
      expect(node.variants.map((v) => [v.name, v.form])).toEqual([
        ['Circle', 'tuple'],
        ['Rect', 'struct'],
        ['Empty', 'unit'],
        ['Code', 'unit'],
      ]);
      expect(node.variants[1]?.fields.map((f) => f.name)).toEqual(['w', 'h']);
      const code = node.variants[3];
      expect(code?.discriminant && sexp(code.discriminant)).toBe('4');
    });
  });

  describe('actors', () => {
    it('parses an actor with a state field', () => {
      const node = expectNode(parseItem('actor Counter { count: i32 }'), 'Actor');
      expect(node.name).toBe('Counter');
      expect(node.state.map((f) => f.name)).toEqual(['count']);
      expect(node.handlers).toEqual([]);
    });

    it('parses state and handlers in any order', () => {
      const node = expectNode(
        parseItem(`actor Counter {
  count: i32,
  on Increment { count += 1 }
  step: i32;
  on Add(amount: i32) { count += amount * step }
}`),
        'Actor'
      );
      expect(node.state.map((f) => f.name)).toEqual(['count', 'step']);
      expect(node.handlers.map((h) => h.message)).toEqual(['Increment', 'Add']);

      const [increment, add] = node.handlers;
      expect(increment?.params).toEqual([]);
      expect(add?.params.map((p) => expectNode(p.pattern, 'IdentifierPattern').name)).toEqual([
        'amount',
      ]);
      const assign = statementExpr(add?.body.statements[0]);
      expect(sexp(assign)).toBe('(+= count (* amount step))');
    });

    it('treats a field named on as state', () => {
      const node = expectNode(parseItem('actor Switch { on: bool }'), 'Actor');
      expect(node.state.map((f) => f.name)).toEqual(['on']);
      expect(node.handlers).toEqual([]);
    });

    it('keeps later fields after a malformed one', () => {
      const result = parseWithRecovery('actor A { x, y: i32 }');
      expect(result.errors.map((e) => e.text)).toEqual([
        "Expected ':' after field name, found ','",
      ]);
      const node = expectNode(expectNode(result.ast, 'Program').items[0], 'Actor');
      expect(node.state.map((f) => f.name)).toEqual(['y']);
    });
  });

  describe('classes', () => {
    it('parses the header with decorators, superclass and traits', () => {
      const node = expectNode(parseItem(CLASS_SOURCE), 'Class');
      expect(node.name).toBe('User');
      expect(node.decorators.map((d) => [d.style, d.name])).toEqual([
        ['decorator', 'Entity'],
      ]);
      expect(node.superclass && sexp(node.superclass)).toBe('Model');
      expect(node.traits.map(sexp)).toEqual(['Serializable']);
    });

    it('parses every member kind', () => {
      const node = expectNode(parseItem(CLASS_SOURCE), 'Class');
      expect(node.members.map((m) => m.type)).toEqual([
        'ClassField',
        'ClassField',
        'Constructor',
        'Method',
        'Method',
        'Constant',
        'Property',
        'OperatorOverload',
      ]);

      const name = expectNode(node.members[0], 'ClassField');
      expect([name.name, name.visibility, name.mutable]).toEqual(['name', 'public', false]);
      const age = expectNode(node.members[1], 'ClassField');
      expect(age.mutable).toBe(true);
      expect(age.defaultValue && sexp(age.defaultValue)).toBe('0');

      const ctor = expectNode(node.members[2], 'Constructor');
      expect(ctor.name).toBeNull();
      expect(ctor.params).toHaveLength(1);

      const greet = expectNode(node.members[3], 'Method');
      expect(greet.function.name).toBe('greet');
      expect(greet.function.visibility).toBe('public');
      expect(greet.function.selfParam).toBe('ref');

      const save = expectNode(node.members[4], 'Method');
      expect(save.modifiers.isAbstract).toBe(true);
      expect(save.function.body).toBeNull();

      const property = expectNode(node.members[6], 'Property');
      expect(property.accessors.map((a) => [a.kind, a.param])).toEqual([
        ['get', null],
        ['set', 'v'],
      ]);

      const overload = expectNode(node.members[7], 'OperatorOverload');
      expect(overload.operator).toBe('+');
      expect(overload.selfParam).toBe('value');
      expect(overload.params).toHaveLength(1);
    });

    it('parses named constructors and static methods', () => {
      const node = expectNode(
        parseItem('class Shape { new square(size: f64) { } static fn unit() { } }'),
        'Class'
      );
      expect(expectNode(node.members[0], 'Constructor').name).toBe('square');
      expect(expectNode(node.members[1], 'Method').modifiers.isStatic).toBe(true);
    });

    it('parses an index operator overload', () => {
      const node = expectNode(
        parseItem('class Grid { operator[](self, i: usize) -> i32 { 0 } }'),
        'Class'
      );
      expect(expectNode(node.members[0], 'OperatorOverload').operator).toBe('[]');
    });
  });

  describe('traits and impls', () => {
    it('parses trait members with and without defaults', () => {
      const node = expectNode(
        parseItem(
          'pub trait Shape: Debug + Clone { type Unit: Copy = f64; const SIDES: i32; fn area(&self) -> f64; fn name(&self) -> String { "shape" } }'
        ),
        'Trait'
      );
      expect(node.keyword).toBe('trait');
      expect(node.supertraits.map(sexp)).toEqual(['Debug', 'Clone']);
      expect(node.members.map((m) => m.type)).toEqual([
        'AssociatedType',
        'Constant',
        'Function',
        'Function',
      ]);

      const assoc = expectNode(node.members[0], 'AssociatedType');
      expect(assoc.bounds.map(sexp)).toEqual(['Copy']);
      expect(assoc.defaultType && sexp(assoc.defaultType)).toBe('f64');
      expect(expectNode(node.members[1], 'Constant').value).toBeNull();
      expect(expectNode(node.members[2], 'Function').body).toBeNull();
      expect(expectNode(node.members[3], 'Function').body?.type).toBe('Block');
    });

    it('accepts interface as a spelling of trait', () => {
      const node = expectNode(parseItem('interface Named { fn name(&self) -> String; }'), 'Trait');
      expect(node.keyword).toBe('interface');
    });

    it('parses trait impls with generics', () => {
      const node = expectNode(
        parseItem('impl<T> Display for Wrapper<T> { fn fmt(&self) -> String { "w" } }'),
        'Impl'
      );
      expect(node.generics.map((g) => g.name)).toEqual(['T']);
      expect(node.trait && sexp(node.trait)).toBe('Display');
      expect(sexp(node.target)).toBe('Wrapper<T>');
      expect(node.members).toHaveLength(1);
    });

    it('parses inherent impls', () => {
      const node = expectNode(parseItem('impl Point { }'), 'Impl');
      expect(node.trait).toBeNull();
      expect(sexp(node.target)).toBe('Point');
    });
  });

  describe('modules', () => {
    it('parses inline and external modules', () => {
      const [inline, external] = parseItems('mod utils { fn helper() {} }\nmod net;');
      expect(expectNode(inline, 'Module').items).toHaveLength(1);
      expect(expectNode(external, 'Module').items).toBeNull();
    });

    it('accepts module as a spelling of mod', () => {
      expect(expectNode(parseItem('module m {}'), 'Module').name).toBe('m');
    });

    it('parses grouped use trees with aliases', () => {
      const node = expectNode(
        parseItem('use std::collections::{HashMap, HashSet as Set};'),
        'Use'
      );
      expect(node.keyword).toBe('use');
      expect(node.tree.kind).toBe('group');
      expect(node.tree.path).toEqual(['std', 'collections']);
      expect(node.tree.children.map((c) => [c.path, c.alias])).toEqual([
        [['HashMap'], null],
        [['HashSet'], 'Set'],
      ]);
    });

    it('parses glob imports', () => {
      const node = expectNode(parseItem('import std::io::*;'), 'Use');
      expect(node.keyword).toBe('import');
      expect(node.tree.kind).toBe('glob');
      expect(node.tree.path).toEqual(['std', 'io']);
    });

    it('parses nested groups with a glob member', () => {
      const node = expectNode(parseItem('use a::{b, c::{d, e as f}, *}'), 'Use');
      expect(node.tree.kind).toBe('group');
      expect(node.tree.path).toEqual(['a']);

      const [b, c, glob] = node.tree.children;
      expect(b?.kind).toBe('simple');
      expect(b?.path).toEqual(['b']);
      expect(c?.kind).toBe('group');
      expect(c?.path).toEqual(['c']);
      expect(c?.children.map((child) => [child.path, child.alias])).toEqual([
        [['d'], null],
        [['e'], 'f'],
      ]);
      expect(glob?.kind).toBe('glob');
      expect(glob?.path).toEqual([]);
    });

    it('parses from-imports as a group', () => {
      const node = expectNode(parseItem('from math import sqrt, pow as power'), 'Use');
      expect(node.keyword).toBe('from');
      expect(node.tree.path).toEqual(['math']);
      expect(node.tree.children.map((c) => [c.path, c.alias])).toEqual([
        [['sqrt'], null],
        [['pow'], 'power'],
      ]);
    });

    it('parses exports of declarations', () => {
      const node = expectNode(parseItem('export fn main() {}'), 'Export');
      expect(node.declaration.type).toBe('Function');
    });

    it('rejects export without a declaration', () => {
      expect(() => parse('export 1')).toThrow(
        "Expected declaration after 'export', found '1'"
      );
    });
  });
});
