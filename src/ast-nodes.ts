/**
 * Tern AST Types
 * Tagged-union nodes with spans. The tree is strict: no node is shared
 * and no node points back at its parent (see ast/node-index.ts).
 */

import type { SourceSpan } from './source-location.js';
import type { ParseError } from './error-classes.js';
import type { Token } from './token-types.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// ROOTS
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  /** Items in source order. May include ErrorNode when parsed with recovery. */
  readonly items: StatementNode[];
}

/** Root produced by the `expression` start context */
export interface ExpressionRootNode extends BaseNode {
  readonly type: 'ExpressionRoot';
  readonly expression: ExpressionNode | ErrorNode;
}

export type RootNode = ProgramNode | ExpressionRootNode;

/** Skipped source region left behind by error recovery */
export interface ErrorNode extends BaseNode {
  readonly type: 'Error';
  readonly message: string;
  readonly text: string;
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | ExpressionStatementNode
  | LetNode
  | DeclarationNode
  | ErrorNode;

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
  /** Terminated with `;` (a block's value is its last unterminated statement) */
  readonly terminated: boolean;
}

export type BindingKind = 'let' | 'var' | 'const';

export interface LetNode extends BaseNode {
  readonly type: 'Let';
  readonly kind: BindingKind;
  readonly pattern: PatternNode;
  readonly typeAnnotation: TypeNode | null;
  readonly initializer: ExpressionNode | null;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | ErrorNode
  | IntegerLiteralNode
  | FloatLiteralNode
  | StringLiteralNode
  | CharLiteralNode
  | BoolLiteralNode
  | NullLiteralNode
  | UnitLiteralNode
  | InterpolationNode
  | IdentifierNode
  | PathNode
  | BinaryExprNode
  | UnaryExprNode
  | AssignNode
  | RangeNode
  | CastNode
  | CallNode
  | MethodCallNode
  | FieldAccessNode
  | IndexNode
  | TryOperatorNode
  | MacroCallNode
  | ListNode
  | ArrayRepeatNode
  | ListComprehensionNode
  | TupleNode
  | StructLiteralNode
  | SpreadNode
  | GroupedExprNode
  | BlockNode
  | AsyncBlockNode
  | LambdaNode
  | FunctionNode
  | IfNode
  | IfLetNode
  | MatchNode
  | ForNode
  | WhileNode
  | WhileLetNode
  | LoopNode
  | BreakNode
  | ContinueNode
  | ReturnNode
  | TryCatchNode
  | ThrowNode;

// ------------------------------------------------------------
// Literals
// ------------------------------------------------------------

export interface IntegerLiteralNode extends BaseNode {
  readonly type: 'IntegerLiteral';
  readonly value: bigint;
  readonly suffix: string | null;
  readonly raw: string;
}

export interface FloatLiteralNode extends BaseNode {
  readonly type: 'FloatLiteral';
  readonly value: number;
  readonly suffix: string | null;
  readonly raw: string;
}

export type StringKind = 'plain' | 'raw' | 'byte';

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
  readonly kind: StringKind;
}

export interface CharLiteralNode extends BaseNode {
  readonly type: 'CharLiteral';
  readonly value: string;
  readonly byte: boolean;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NullLiteralNode extends BaseNode {
  readonly type: 'NullLiteral';
}

/** `()` */
export interface UnitLiteralNode extends BaseNode {
  readonly type: 'UnitLiteral';
}

/** Literal text between interpolations */
export interface StringFragmentNode extends BaseNode {
  readonly type: 'StringFragment';
  readonly value: string;
}

/** `{expr:spec}` inside an interpolated string; `spec` excludes the colon */
export interface FormattedValueNode extends BaseNode {
  readonly type: 'FormattedValue';
  readonly expression: ExpressionNode;
  readonly spec: string;
}

export type InterpolationPart =
  | StringFragmentNode
  | FormattedValueNode
  | ExpressionNode;

/** f"text {expr} text {expr:spec}" */
export interface InterpolationNode extends BaseNode {
  readonly type: 'Interpolation';
  readonly parts: InterpolationPart[];
}

export type LiteralNode =
  | IntegerLiteralNode
  | FloatLiteralNode
  | StringLiteralNode
  | CharLiteralNode
  | BoolLiteralNode
  | NullLiteralNode;

// ------------------------------------------------------------
// Names and paths
// ------------------------------------------------------------

/** Bare name, including `self` and `super` */
export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface PathSegmentNode extends BaseNode {
  readonly type: 'PathSegment';
  readonly name: string;
  /** Generic arguments attached to this segment (`Vec<i32>` or `parse::<i32>`) */
  readonly typeArgs: TypeNode[] | null;
}

/** Qualified or generic name: `a::b`, `Vec<i32>::new`, `parse::<i32>` */
export interface PathNode extends BaseNode {
  readonly type: 'Path';
  readonly segments: PathSegmentNode[];
}

// ------------------------------------------------------------
// Operators
// ------------------------------------------------------------

export type BinaryOp =
  | '|>'
  | '??'
  | '||'
  | '&&'
  | 'in'
  | 'is'
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='
  | '|'
  | '^'
  | '&'
  | '<<'
  | '>>'
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '**'
  /** actor send: `counter ! Increment` */
  | '!';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export type UnaryOp =
  | '-'
  | '!'
  | '~'
  | '&'
  | '&mut'
  | '*'
  | 'spawn'
  | 'await';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
  /** `expr.await` rather than `await expr` */
  readonly postfix: boolean;
}

export type AssignOp =
  | '='
  | '+='
  | '-='
  | '*='
  | '/='
  | '%='
  | '**='
  | '&='
  | '|='
  | '^='
  | '<<='
  | '>>=';

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly op: AssignOp;
  readonly target: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface RangeNode extends BaseNode {
  readonly type: 'Range';
  readonly start: ExpressionNode | null;
  readonly end: ExpressionNode | null;
  readonly inclusive: boolean;
}

export interface CastNode extends BaseNode {
  readonly type: 'Cast';
  readonly expression: ExpressionNode;
  readonly targetType: TypeNode;
}

// ------------------------------------------------------------
// Postfix
// ------------------------------------------------------------

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export interface MethodCallNode extends BaseNode {
  readonly type: 'MethodCall';
  readonly receiver: ExpressionNode;
  readonly method: string;
  readonly typeArgs: TypeNode[] | null;
  readonly args: ExpressionNode[];
  /** `a?.m()` */
  readonly optional: boolean;
}

export interface FieldAccessNode extends BaseNode {
  readonly type: 'FieldAccess';
  readonly object: ExpressionNode;
  /** Field name, or the decimal index for tuple access (`t.0`) */
  readonly field: string;
  readonly optional: boolean;
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

/** Postfix `expr?` */
export interface TryOperatorNode extends BaseNode {
  readonly type: 'TryOperator';
  readonly expression: ExpressionNode;
}

/** `println!(...)`, `vec![...]` */
export interface MacroCallNode extends BaseNode {
  readonly type: 'MacroCall';
  readonly name: string;
  readonly delimiter: 'paren' | 'bracket' | 'brace';
  readonly args: ExpressionNode[];
}

// ------------------------------------------------------------
// Collections
// ------------------------------------------------------------

export interface ListNode extends BaseNode {
  readonly type: 'List';
  readonly elements: ExpressionNode[];
}

/** `[value; count]` */
export interface ArrayRepeatNode extends BaseNode {
  readonly type: 'ArrayRepeat';
  readonly value: ExpressionNode;
  readonly count: ExpressionNode;
}

/** `[expr for pattern in iterable if condition]` */
export interface ListComprehensionNode extends BaseNode {
  readonly type: 'ListComprehension';
  readonly element: ExpressionNode;
  readonly pattern: PatternNode;
  readonly iterable: ExpressionNode;
  readonly condition: ExpressionNode | null;
}

export interface TupleNode extends BaseNode {
  readonly type: 'Tuple';
  readonly elements: ExpressionNode[];
}

export interface StructLiteralFieldNode extends BaseNode {
  readonly type: 'StructLiteralField';
  readonly name: string;
  /** `null` for shorthand `Point { x }` */
  readonly value: ExpressionNode | null;
}

export interface StructLiteralNode extends BaseNode {
  readonly type: 'StructLiteral';
  readonly path: PathNode | IdentifierNode;
  readonly fields: StructLiteralFieldNode[];
  /** `..base` */
  readonly base: ExpressionNode | null;
}

/** `...expr` inside lists and call arguments */
export interface SpreadNode extends BaseNode {
  readonly type: 'Spread';
  readonly expression: ExpressionNode;
}

export interface GroupedExprNode extends BaseNode {
  readonly type: 'GroupedExpr';
  readonly expression: ExpressionNode;
}

// ------------------------------------------------------------
// Blocks and functions
// ------------------------------------------------------------

export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly label: string | null;
  readonly statements: StatementNode[];
}

export interface AsyncBlockNode extends BaseNode {
  readonly type: 'AsyncBlock';
  readonly body: BlockNode;
}

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly pattern: PatternNode;
  readonly typeAnnotation: TypeNode | null;
  readonly defaultValue: ExpressionNode | null;
}

/** `|a, b| body`, `(a, b) => body`, `x => body` */
export interface LambdaNode extends BaseNode {
  readonly type: 'Lambda';
  readonly params: ParamNode[];
  readonly body: ExpressionNode;
  readonly isAsync: boolean;
  readonly form: 'pipe' | 'arrow';
}

export type SelfParamKind = 'value' | 'mutValue' | 'ref' | 'mutRef';

export interface FunctionNode extends BaseNode {
  readonly type: 'Function';
  /** `null` for anonymous `fn(x) ...` expressions */
  readonly name: string | null;
  readonly keyword: 'fn' | 'fun';
  readonly visibility: Visibility;
  readonly isAsync: boolean;
  readonly attributes: AttributeNode[];
  readonly generics: GenericParamNode[];
  readonly selfParam: SelfParamKind | null;
  readonly params: ParamNode[];
  readonly returnType: TypeNode | null;
  readonly whereClause: WherePredicateNode[];
  /** `null` for signatures without a body (trait methods, abstract methods) */
  readonly body: ExpressionNode | null;
}

// ------------------------------------------------------------
// Control flow
// ------------------------------------------------------------

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: BlockNode;
  readonly elseBranch: BlockNode | IfNode | IfLetNode | null;
}

export interface IfLetNode extends BaseNode {
  readonly type: 'IfLet';
  readonly pattern: PatternNode;
  readonly value: ExpressionNode;
  readonly thenBranch: BlockNode;
  readonly elseBranch: BlockNode | IfNode | IfLetNode | null;
}

export interface MatchArmNode extends BaseNode {
  readonly type: 'MatchArm';
  readonly pattern: PatternNode;
  readonly guard: ExpressionNode | null;
  readonly body: ExpressionNode;
}

export interface MatchNode extends BaseNode {
  readonly type: 'Match';
  readonly subject: ExpressionNode;
  /** May include ErrorNode for arms that failed to parse */
  readonly arms: (MatchArmNode | ErrorNode)[];
}

export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly label: string | null;
  readonly pattern: PatternNode;
  readonly iterable: ExpressionNode;
  readonly body: BlockNode;
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly label: string | null;
  readonly condition: ExpressionNode;
  readonly body: BlockNode;
}

/** Loop continues while `value` matches `pattern` */
export interface WhileLetNode extends BaseNode {
  readonly type: 'WhileLet';
  readonly label: string | null;
  readonly pattern: PatternNode;
  readonly value: ExpressionNode;
  readonly body: BlockNode;
}

export interface LoopNode extends BaseNode {
  readonly type: 'Loop';
  readonly label: string | null;
  readonly body: BlockNode;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
  readonly label: string | null;
  readonly value: ExpressionNode | null;
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
  readonly label: string | null;
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

// ------------------------------------------------------------
// Error handling
// ------------------------------------------------------------

export interface CatchClauseNode extends BaseNode {
  readonly type: 'CatchClause';
  readonly pattern: PatternNode | null;
  readonly body: BlockNode;
}

export interface TryCatchNode extends BaseNode {
  readonly type: 'TryCatch';
  readonly body: BlockNode;
  readonly catches: CatchClauseNode[];
  readonly finallyBlock: BlockNode | null;
}

export interface ThrowNode extends BaseNode {
  readonly type: 'Throw';
  readonly value: ExpressionNode;
}

// ============================================================
// PATTERNS
// ============================================================

export type PatternNode =
  | WildcardPatternNode
  | IdentifierPatternNode
  | LiteralPatternNode
  | RangePatternNode
  | RestPatternNode
  | TuplePatternNode
  | ListPatternNode
  | StructPatternNode
  | TupleStructPatternNode
  | PathPatternNode
  | OrPatternNode;

export interface WildcardPatternNode extends BaseNode {
  readonly type: 'WildcardPattern';
}

export interface IdentifierPatternNode extends BaseNode {
  readonly type: 'IdentifierPattern';
  readonly name: string;
  readonly mutable: boolean;
  readonly byRef: boolean;
  /** `name @ subpattern` */
  readonly subpattern: PatternNode | null;
}

export interface LiteralPatternNode extends BaseNode {
  readonly type: 'LiteralPattern';
  readonly literal: LiteralNode;
  readonly negative: boolean;
}

export interface RangePatternNode extends BaseNode {
  readonly type: 'RangePattern';
  readonly start: LiteralPatternNode | null;
  readonly end: LiteralPatternNode | null;
  readonly inclusive: boolean;
}

/** `..` or `..name` inside tuple and list patterns */
export interface RestPatternNode extends BaseNode {
  readonly type: 'RestPattern';
  readonly name: string | null;
}

export interface TuplePatternNode extends BaseNode {
  readonly type: 'TuplePattern';
  readonly elements: PatternNode[];
}

export interface ListPatternNode extends BaseNode {
  readonly type: 'ListPattern';
  readonly elements: PatternNode[];
}

export interface StructPatternFieldNode extends BaseNode {
  readonly type: 'StructPatternField';
  readonly name: string;
  /** `null` for shorthand `{ x }` */
  readonly pattern: PatternNode | null;
}

export interface StructPatternNode extends BaseNode {
  readonly type: 'StructPattern';
  readonly path: string[];
  readonly fields: StructPatternFieldNode[];
  /** `{ x, .. }` */
  readonly hasRest: boolean;
}

/** Enum variant with positional sub-patterns: `Some(x)`, `Shape::Rect(w, h)` */
export interface TupleStructPatternNode extends BaseNode {
  readonly type: 'TupleStructPattern';
  readonly path: string[];
  readonly elements: PatternNode[];
}

/** Unit variant or constant: `Ordering::Less` */
export interface PathPatternNode extends BaseNode {
  readonly type: 'PathPattern';
  readonly path: string[];
}

export interface OrPatternNode extends BaseNode {
  readonly type: 'OrPattern';
  readonly alternatives: PatternNode[];
}

// ============================================================
// TYPE EXPRESSIONS
// ============================================================

export type TypeNode =
  | NamedTypeNode
  | TupleTypeNode
  | ListTypeNode
  | ArrayTypeNode
  | FunctionTypeNode
  | ReferenceTypeNode
  | OptionalTypeNode
  | ImplTraitTypeNode
  | InferTypeNode;

export interface NamedTypeNode extends BaseNode {
  readonly type: 'NamedType';
  readonly path: string[];
  readonly args: TypeNode[];
}

export interface TupleTypeNode extends BaseNode {
  readonly type: 'TupleType';
  readonly elements: TypeNode[];
}

/** `[T]` */
export interface ListTypeNode extends BaseNode {
  readonly type: 'ListType';
  readonly element: TypeNode;
}

/** `[T; N]` */
export interface ArrayTypeNode extends BaseNode {
  readonly type: 'ArrayType';
  readonly element: TypeNode;
  readonly size: ExpressionNode;
}

/** `fn(A, B) -> C` */
export interface FunctionTypeNode extends BaseNode {
  readonly type: 'FunctionType';
  readonly params: TypeNode[];
  readonly returnType: TypeNode | null;
}

export interface ReferenceTypeNode extends BaseNode {
  readonly type: 'ReferenceType';
  readonly mutable: boolean;
  readonly inner: TypeNode;
}

/** `T?` */
export interface OptionalTypeNode extends BaseNode {
  readonly type: 'OptionalType';
  readonly inner: TypeNode;
}

/** `impl Trait + Other` */
export interface ImplTraitTypeNode extends BaseNode {
  readonly type: 'ImplTraitType';
  readonly bounds: TypeNode[];
}

/** `_` */
export interface InferTypeNode extends BaseNode {
  readonly type: 'InferType';
}

// ============================================================
// DECLARATIONS
// ============================================================

export type DeclarationNode =
  | FunctionNode
  | StructNode
  | EnumNode
  | ActorNode
  | ClassNode
  | TraitNode
  | ImplNode
  | TypeAliasNode
  | ModuleNode
  | UseNode
  | ExportNode;

export type Visibility =
  | 'public'
  | 'crate'
  | 'super'
  | 'self'
  | 'private'
  | 'protected'
  | null;

/** `#[name(args)]` or `@Name(args)` */
export interface AttributeNode extends BaseNode {
  readonly type: 'Attribute';
  readonly style: 'hash' | 'decorator';
  readonly name: string;
  readonly args: ExpressionNode[];
}

export interface GenericParamNode extends BaseNode {
  readonly type: 'GenericParam';
  readonly name: string;
  readonly bounds: TypeNode[];
  readonly defaultType: TypeNode | null;
}

export interface WherePredicateNode extends BaseNode {
  readonly type: 'WherePredicate';
  readonly target: TypeNode;
  readonly bounds: TypeNode[];
}

// ------------------------------------------------------------
// Structs and enums
// ------------------------------------------------------------

export interface StructFieldNode extends BaseNode {
  readonly type: 'StructField';
  /** `null` for tuple-struct fields */
  readonly name: string | null;
  readonly visibility: Visibility;
  readonly mutable: boolean;
  readonly attributes: AttributeNode[];
  readonly fieldType: TypeNode;
  readonly defaultValue: ExpressionNode | null;
}

export interface StructNode extends BaseNode {
  readonly type: 'Struct';
  readonly name: string;
  readonly visibility: Visibility;
  readonly attributes: AttributeNode[];
  readonly generics: GenericParamNode[];
  readonly whereClause: WherePredicateNode[];
  readonly form: 'named' | 'tuple' | 'unit';
  readonly fields: StructFieldNode[];
}

export interface EnumVariantNode extends BaseNode {
  readonly type: 'EnumVariant';
  readonly name: string;
  readonly attributes: AttributeNode[];
  readonly form: 'unit' | 'tuple' | 'struct';
  readonly fields: StructFieldNode[];
  readonly discriminant: ExpressionNode | null;
}

export interface EnumNode extends BaseNode {
  readonly type: 'Enum';
  readonly name: string;
  readonly visibility: Visibility;
  readonly attributes: AttributeNode[];
  readonly generics: GenericParamNode[];
  readonly whereClause: WherePredicateNode[];
  readonly variants: EnumVariantNode[];
}

// ------------------------------------------------------------
// Actors
// ------------------------------------------------------------

/** `on Message(params) { body }` */
export interface ActorHandlerNode extends BaseNode {
  readonly type: 'ActorHandler';
  readonly message: string;
  readonly params: ParamNode[];
  readonly body: BlockNode;
}

/** `actor Name { state: Type, on Message { } }` */
export interface ActorNode extends BaseNode {
  readonly type: 'Actor';
  readonly name: string;
  readonly visibility: Visibility;
  readonly attributes: AttributeNode[];
  readonly state: StructFieldNode[];
  readonly handlers: ActorHandlerNode[];
}

// ------------------------------------------------------------
// Classes
// ------------------------------------------------------------

export interface MemberModifiers {
  readonly isStatic: boolean;
  readonly isOverride: boolean;
  readonly isFinal: boolean;
  readonly isAbstract: boolean;
}

export interface ClassFieldNode extends BaseNode {
  readonly type: 'ClassField';
  readonly name: string;
  readonly visibility: Visibility;
  readonly mutable: boolean;
  readonly isStatic: boolean;
  readonly decorators: AttributeNode[];
  readonly fieldType: TypeNode | null;
  readonly defaultValue: ExpressionNode | null;
}

export interface ConstructorNode extends BaseNode {
  readonly type: 'Constructor';
  /** Named constructors: `new square(size)` */
  readonly name: string | null;
  readonly visibility: Visibility;
  readonly decorators: AttributeNode[];
  readonly params: ParamNode[];
  readonly body: BlockNode;
}

export interface MethodNode extends BaseNode {
  readonly type: 'Method';
  readonly decorators: AttributeNode[];
  readonly modifiers: MemberModifiers;
  readonly function: FunctionNode;
}

export interface ConstantNode extends BaseNode {
  readonly type: 'Constant';
  readonly name: string;
  readonly visibility: Visibility;
  readonly constType: TypeNode | null;
  /** `null` for trait constants without a value */
  readonly value: ExpressionNode | null;
}

export interface PropertyAccessorNode extends BaseNode {
  readonly type: 'PropertyAccessor';
  readonly kind: 'get' | 'set';
  /** Setter parameter name */
  readonly param: string | null;
  readonly body: ExpressionNode;
}

export interface PropertyNode extends BaseNode {
  readonly type: 'Property';
  readonly name: string;
  readonly visibility: Visibility;
  readonly propertyType: TypeNode;
  readonly accessors: PropertyAccessorNode[];
}

export interface OperatorOverloadNode extends BaseNode {
  readonly type: 'OperatorOverload';
  readonly operator: string;
  readonly selfParam: SelfParamKind | null;
  readonly params: ParamNode[];
  readonly returnType: TypeNode | null;
  readonly body: BlockNode;
}

export type ClassMemberNode =
  | ClassFieldNode
  | ConstructorNode
  | MethodNode
  | ConstantNode
  | PropertyNode
  | OperatorOverloadNode;

export interface ClassNode extends BaseNode {
  readonly type: 'Class';
  readonly name: string;
  readonly visibility: Visibility;
  readonly decorators: AttributeNode[];
  readonly generics: GenericParamNode[];
  readonly superclass: TypeNode | null;
  readonly traits: TypeNode[];
  readonly members: ClassMemberNode[];
}

// ------------------------------------------------------------
// Traits and impls
// ------------------------------------------------------------

/** `type Item: Bound = Default;` in traits, `type Item = T;` in impls */
export interface AssociatedTypeNode extends BaseNode {
  readonly type: 'AssociatedType';
  readonly name: string;
  readonly bounds: TypeNode[];
  readonly defaultType: TypeNode | null;
}

export type TraitMemberNode = FunctionNode | AssociatedTypeNode | ConstantNode;

export interface TraitNode extends BaseNode {
  readonly type: 'Trait';
  readonly name: string;
  /** Spelling used in source; the two are interchangeable */
  readonly keyword: 'trait' | 'interface';
  readonly visibility: Visibility;
  readonly attributes: AttributeNode[];
  readonly generics: GenericParamNode[];
  readonly supertraits: TypeNode[];
  readonly whereClause: WherePredicateNode[];
  readonly members: TraitMemberNode[];
}

export interface ImplNode extends BaseNode {
  readonly type: 'Impl';
  readonly attributes: AttributeNode[];
  readonly generics: GenericParamNode[];
  readonly trait: TypeNode | null;
  readonly target: TypeNode;
  readonly whereClause: WherePredicateNode[];
  readonly members: TraitMemberNode[];
}

// ------------------------------------------------------------
// Aliases and modules
// ------------------------------------------------------------

export interface TypeAliasNode extends BaseNode {
  readonly type: 'TypeAlias';
  readonly name: string;
  readonly visibility: Visibility;
  readonly generics: GenericParamNode[];
  readonly aliased: TypeNode;
}

export interface ModuleNode extends BaseNode {
  readonly type: 'Module';
  readonly name: string;
  readonly visibility: Visibility;
  /** `null` for `mod name;` (body in another file) */
  readonly items: StatementNode[] | null;
}

/**
 * One node of a use tree:
 * - simple: `a::b` or `a::b as c`
 * - glob: `a::*`
 * - group: `a::{...}`
 */
export interface UseTreeNode extends BaseNode {
  readonly type: 'UseTree';
  readonly path: string[];
  readonly kind: 'simple' | 'glob' | 'group';
  readonly alias: string | null;
  readonly children: UseTreeNode[];
}

export interface UseNode extends BaseNode {
  readonly type: 'Use';
  readonly keyword: 'use' | 'import' | 'from';
  readonly visibility: Visibility;
  readonly tree: UseTreeNode;
}

export interface ExportNode extends BaseNode {
  readonly type: 'Export';
  readonly declaration: DeclarationNode | LetNode;
}

// ============================================================
// NODE UNION
// ============================================================

/** Nodes that are neither statements, expressions, patterns nor types */
export type AuxiliaryNode =
  | StringFragmentNode
  | FormattedValueNode
  | PathSegmentNode
  | StructLiteralFieldNode
  | ParamNode
  | MatchArmNode
  | CatchClauseNode
  | StructPatternFieldNode
  | AttributeNode
  | GenericParamNode
  | WherePredicateNode
  | StructFieldNode
  | EnumVariantNode
  | ActorHandlerNode
  | ClassMemberNode
  | PropertyAccessorNode
  | AssociatedTypeNode
  | UseTreeNode;

export type ASTNode =
  | RootNode
  | StatementNode
  | ExpressionNode
  | PatternNode
  | TypeNode
  | AuxiliaryNode;

export type NodeType = ASTNode['type'];

// ============================================================
// PARSE RESULT
// ============================================================

export interface ParseResult {
  readonly ast: RootNode;
  /** Diagnostics in the order they were reported */
  readonly errors: ParseError[];
  /** Full token stream, comments included */
  readonly tokens: Token[];
  /** True when no error-severity diagnostics were reported */
  readonly success: boolean;
  /** Every error is one that more input could fix (unclosed delimiter, end of input) */
  readonly incomplete: boolean;
  /** Number of resynchronization events */
  readonly syncCount: number;
}
