/**
 * Parser Extension: Modules
 * mod, use/import trees, from-import, export and type aliases
 */

import { Parser } from './parser.js';
import type {
  ExportNode,
  ModuleNode,
  StatementNode,
  TypeAliasNode,
  UseNode,
  UseTreeNode,
  Visibility,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  advance,
  check,
  checkAt,
  current,
  expect,
  expectClose,
  expectedError,
  match,
  spanFrom,
  unrestricted,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseModule(start: SourceLocation, visibility: Visibility): ModuleNode;
    parseUse(start: SourceLocation, visibility: Visibility): UseNode;
    parseUseTree(): UseTreeNode;
    parseUsePath(): string[];
    parseFromImport(start: SourceLocation): UseTreeNode;
    parseExport(start: SourceLocation): ExportNode;
    parseTypeAlias(start: SourceLocation, visibility: Visibility): TypeAliasNode;
  }
}

const PATH_TOKENS: readonly TokenType[] = [
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.SELF,
  TOKEN_TYPES.SUPER,
  TOKEN_TYPES.CRATE,
];

const USE_TREE_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  ...PATH_TOKENS,
  TOKEN_TYPES.STAR,
  TOKEN_TYPES.LBRACE,
]);

/** `mod name { items }` or `mod name;` */
Parser.prototype.parseModule = function (
  this: Parser,
  start: SourceLocation,
  visibility: Visibility
): ModuleNode {
  advance(this.state); // consume mod / module
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected module name');

  let items: StatementNode[] | null = null;
  if (!match(this.state, TOKEN_TYPES.SEMICOLON)) {
    const open = expect(
      this.state,
      TOKEN_TYPES.LBRACE,
      "Expected '{' or ';' after module name"
    );
    items = unrestricted(this.state, () => this.parseItems(TOKEN_TYPES.RBRACE));
    expectClose(this.state, TOKEN_TYPES.RBRACE, open);
  }

  return {
    type: 'Module',
    name: name.value,
    visibility,
    items,
    span: spanFrom(this.state, start),
  };
};

/** `use a::b::{c, d as e};`, `import a::*;`, `from a::b import c, d` */
Parser.prototype.parseUse = function (
  this: Parser,
  start: SourceLocation,
  visibility: Visibility
): UseNode {
  const keyword = advance(this.state);

  let tree: UseTreeNode;
  let spelling: UseNode['keyword'];
  if (keyword.type === TOKEN_TYPES.FROM) {
    spelling = 'from';
    tree = this.parseFromImport(current(this.state).span.start);
  } else {
    spelling = keyword.type === TOKEN_TYPES.IMPORT ? 'import' : 'use';
    tree = this.parseUseTree();
  }
  match(this.state, TOKEN_TYPES.SEMICOLON);

  return {
    type: 'Use',
    keyword: spelling,
    visibility,
    tree,
    span: spanFrom(this.state, start),
  };
};

/** `a::b`, `a::b as c`, `a::*`, `a::{...}`, `{...}` or a bare `*` inside a group */
Parser.prototype.parseUseTree = function (this: Parser): UseTreeNode {
  const start = current(this.state).span.start;
  const path: string[] = [];

  if (match(this.state, TOKEN_TYPES.STAR)) {
    return {
      type: 'UseTree',
      path,
      kind: 'glob',
      alias: null,
      children: [],
      span: spanFrom(this.state, start),
    };
  }

  if (!check(this.state, TOKEN_TYPES.LBRACE)) {
    path.push(...this.parseUsePath());
    if (!match(this.state, TOKEN_TYPES.DOUBLE_COLON)) {
      const alias = match(this.state, TOKEN_TYPES.AS)
        ? expect(this.state, TOKEN_TYPES.IDENTIFIER, "Expected name after 'as'").value
        : null;
      return {
        type: 'UseTree',
        path,
        kind: 'simple',
        alias,
        children: [],
        span: spanFrom(this.state, start),
      };
    }

    if (match(this.state, TOKEN_TYPES.STAR)) {
      return {
        type: 'UseTree',
        path,
        kind: 'glob',
        alias: null,
        children: [],
        span: spanFrom(this.state, start),
      };
    }
  }

  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected name, '*' or '{'");
  const children = this.parseDelimitedList(
    TOKEN_TYPES.RBRACE,
    USE_TREE_STARTS,
    () => this.parseUseTree(),
    true
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);

  return {
    type: 'UseTree',
    path,
    kind: 'group',
    alias: null,
    children,
    span: spanFrom(this.state, start),
  };
};

/** Segments joined by `::`, stopping before a `::` that is not followed by a name */
Parser.prototype.parseUsePath = function (this: Parser): string[] {
  const first = current(this.state);
  if (!PATH_TOKENS.includes(first.type)) {
    throw expectedError(this.state, 'Expected module path');
  }
  advance(this.state);

  const path = [first.value];
  while (
    check(this.state, TOKEN_TYPES.DOUBLE_COLON) &&
    checkAt(this.state, 1, ...PATH_TOKENS)
  ) {
    advance(this.state); // consume ::
    path.push(advance(this.state).value);
  }
  return path;
};

/** `from a::b import c, d as e` or `from a import *`; builds a group tree */
Parser.prototype.parseFromImport = function (
  this: Parser,
  start: SourceLocation
): UseTreeNode {
  const path = this.parseUsePath();
  expect(this.state, TOKEN_TYPES.IMPORT, "Expected 'import'");

  if (match(this.state, TOKEN_TYPES.STAR)) {
    return {
      type: 'UseTree',
      path,
      kind: 'glob',
      alias: null,
      children: [],
      span: spanFrom(this.state, start),
    };
  }

  const children: UseTreeNode[] = [];
  do {
    const childStart = current(this.state).span.start;
    const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected imported name');
    const alias = match(this.state, TOKEN_TYPES.AS)
      ? expect(this.state, TOKEN_TYPES.IDENTIFIER, "Expected name after 'as'").value
      : null;
    children.push({
      type: 'UseTree',
      path: [name.value],
      kind: 'simple',
      alias,
      children: [],
      span: spanFrom(this.state, childStart),
    });
  } while (match(this.state, TOKEN_TYPES.COMMA));

  return {
    type: 'UseTree',
    path,
    kind: 'group',
    alias: null,
    children,
    span: spanFrom(this.state, start),
  };
};

/** `export <declaration>` */
Parser.prototype.parseExport = function (
  this: Parser,
  start: SourceLocation
): ExportNode {
  advance(this.state); // consume export

  const declStart = current(this.state).span.start;
  const attributes = this.parseAttributes();
  const visibility = this.parseVisibility();
  const declaration = this.parseDeclaration(declStart, attributes, visibility);
  if (!declaration || declaration.type === 'Export') {
    throw expectedError(this.state, "Expected declaration after 'export'");
  }

  return {
    type: 'Export',
    declaration,
    span: spanFrom(this.state, start),
  };
};

/** `type Name<T> = Type;` */
Parser.prototype.parseTypeAlias = function (
  this: Parser,
  start: SourceLocation,
  visibility: Visibility
): TypeAliasNode {
  advance(this.state); // consume type
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected type name');
  const generics = check(this.state, TOKEN_TYPES.LT)
    ? this.parseGenericParams()
    : [];
  expect(this.state, TOKEN_TYPES.ASSIGN, "Expected '='");
  const aliased = this.parseType();
  match(this.state, TOKEN_TYPES.SEMICOLON);

  return {
    type: 'TypeAlias',
    name: name.value,
    visibility,
    generics,
    aliased,
    span: spanFrom(this.state, start),
  };
};
