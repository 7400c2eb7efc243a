/**
 * AST Visitor
 * Child enumeration and recursive traversal with enter/exit callbacks.
 */

import type {
  ASTNode,
  ActorHandlerNode,
  StructFieldNode,
} from '../ast-nodes.js';
import { assertNever } from '../parser/helpers.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/**
 * Visitor pattern interface for AST traversal.
 * Provides enter/exit callbacks invoked before and after visiting children.
 */
export interface NodeVisitor {
  /**
   * Called before visiting node's children.
   * Return `false` to skip the children (exit is still called).
   */
  enter?(node: ASTNode, parent: ASTNode | null): boolean | void;

  /**
   * Called after visiting node's children.
   */
  exit?(node: ASTNode, parent: ASTNode | null): void;
}

// ============================================================
// CHILDREN
// ============================================================

/**
 * Direct children of a node, in source order.
 * Handles every node type in the ASTNode union.
 */
export function childNodes(node: ASTNode): ASTNode[] {
  const out: ASTNode[] = [];
  const add = (...children: (ASTNode | null)[]): void => {
    for (const child of children) {
      if (child !== null) out.push(child);
    }
  };

  switch (node.type) {
    // Roots and statements
    case 'Program':
      add(...node.items);
      break;
    case 'ExpressionRoot':
      add(node.expression);
      break;
    case 'ExpressionStatement':
      add(node.expression);
      break;
    case 'Let':
      add(node.pattern, node.typeAnnotation, node.initializer);
      break;

    // Leaves
    case 'Error':
    case 'IntegerLiteral':
    case 'FloatLiteral':
    case 'StringLiteral':
    case 'CharLiteral':
    case 'BoolLiteral':
    case 'NullLiteral':
    case 'UnitLiteral':
    case 'StringFragment':
    case 'Identifier':
    case 'Continue':
    case 'WildcardPattern':
    case 'RestPattern':
    case 'PathPattern':
    case 'InferType':
      break;

    // Expressions
    case 'Interpolation':
      add(...node.parts);
      break;
    case 'FormattedValue':
      add(node.expression);
      break;
    case 'PathSegment':
      add(...(node.typeArgs ?? []));
      break;
    case 'Path':
      add(...node.segments);
      break;
    case 'BinaryExpr':
      add(node.left, node.right);
      break;
    case 'UnaryExpr':
      add(node.operand);
      break;
    case 'Assign':
      add(node.target, node.value);
      break;
    case 'Range':
      add(node.start, node.end);
      break;
    case 'Cast':
      add(node.expression, node.targetType);
      break;
    case 'Call':
      add(node.callee, ...node.args);
      break;
    case 'MethodCall':
      add(node.receiver, ...(node.typeArgs ?? []), ...node.args);
      break;
    case 'FieldAccess':
      add(node.object);
      break;
    case 'Index':
      add(node.object, node.index);
      break;
    case 'TryOperator':
    case 'Spread':
    case 'GroupedExpr':
      add(node.expression);
      break;
    case 'MacroCall':
      add(...node.args);
      break;
    case 'List':
    case 'Tuple':
      add(...node.elements);
      break;
    case 'ArrayRepeat':
      add(node.value, node.count);
      break;
    case 'ListComprehension':
      add(node.element, node.pattern, node.iterable, node.condition);
      break;
    case 'StructLiteralField':
      add(node.value);
      break;
    case 'StructLiteral':
      add(node.path, ...node.fields, node.base);
      break;
    case 'Block':
      add(...node.statements);
      break;
    case 'AsyncBlock':
      add(node.body);
      break;
    case 'Param':
      add(node.pattern, node.typeAnnotation, node.defaultValue);
      break;
    case 'Lambda':
      add(...node.params, node.body);
      break;
    case 'Function':
      add(
        ...node.attributes,
        ...node.generics,
        ...node.params,
        node.returnType,
        ...node.whereClause,
        node.body
      );
      break;
    case 'If':
      add(node.condition, node.thenBranch, node.elseBranch);
      break;
    case 'IfLet':
      add(node.pattern, node.value, node.thenBranch, node.elseBranch);
      break;
    case 'MatchArm':
      add(node.pattern, node.guard, node.body);
      break;
    case 'Match':
      add(node.subject, ...node.arms);
      break;
    case 'For':
      add(node.pattern, node.iterable, node.body);
      break;
    case 'While':
      add(node.condition, node.body);
      break;
    case 'WhileLet':
      add(node.pattern, node.value, node.body);
      break;
    case 'Loop':
      add(node.body);
      break;
    case 'Break':
    case 'Return':
      add(node.value);
      break;
    case 'CatchClause':
      add(node.pattern, node.body);
      break;
    case 'TryCatch':
      add(node.body, ...node.catches, node.finallyBlock);
      break;
    case 'Throw':
      add(node.value);
      break;

    // Patterns
    case 'IdentifierPattern':
      add(node.subpattern);
      break;
    case 'LiteralPattern':
      add(node.literal);
      break;
    case 'RangePattern':
      add(node.start, node.end);
      break;
    case 'TuplePattern':
    case 'ListPattern':
    case 'TupleStructPattern':
      add(...node.elements);
      break;
    case 'StructPatternField':
      add(node.pattern);
      break;
    case 'StructPattern':
      add(...node.fields);
      break;
    case 'OrPattern':
      add(...node.alternatives);
      break;

    // Types
    case 'NamedType':
      add(...node.args);
      break;
    case 'TupleType':
      add(...node.elements);
      break;
    case 'ListType':
      add(node.element);
      break;
    case 'ArrayType':
      add(node.element, node.size);
      break;
    case 'FunctionType':
      add(...node.params, node.returnType);
      break;
    case 'ReferenceType':
    case 'OptionalType':
      add(node.inner);
      break;
    case 'ImplTraitType':
      add(...node.bounds);
      break;

    // Declarations
    case 'Attribute':
      add(...node.args);
      break;
    case 'GenericParam':
      add(...node.bounds, node.defaultType);
      break;
    case 'WherePredicate':
      add(node.target, ...node.bounds);
      break;
    case 'StructField':
      add(...node.attributes, node.fieldType, node.defaultValue);
      break;
    case 'Struct':
      add(
        ...node.attributes,
        ...node.generics,
        ...node.whereClause,
        ...node.fields
      );
      break;
    case 'EnumVariant':
      add(...node.attributes, ...node.fields, node.discriminant);
      break;
    case 'Enum':
      add(
        ...node.attributes,
        ...node.generics,
        ...node.whereClause,
        ...node.variants
      );
      break;
    case 'ActorHandler':
      add(...node.params, node.body);
      break;
    case 'Actor': {
      const members: (StructFieldNode | ActorHandlerNode)[] = [
        ...node.state,
        ...node.handlers,
      ];
      members.sort((a, b) => a.span.start.offset - b.span.start.offset);
      add(...node.attributes, ...members);
      break;
    }
    case 'ClassField':
      add(...node.decorators, node.fieldType, node.defaultValue);
      break;
    case 'Constructor':
      add(...node.decorators, ...node.params, node.body);
      break;
    case 'Method':
      add(...node.decorators, node.function);
      break;
    case 'Constant':
      add(node.constType, node.value);
      break;
    case 'PropertyAccessor':
      add(node.body);
      break;
    case 'Property':
      add(node.propertyType, ...node.accessors);
      break;
    case 'OperatorOverload':
      add(...node.params, node.returnType, node.body);
      break;
    case 'Class':
      add(
        ...node.decorators,
        ...node.generics,
        node.superclass,
        ...node.traits,
        ...node.members
      );
      break;
    case 'AssociatedType':
      add(...node.bounds, node.defaultType);
      break;
    case 'Trait':
      add(
        ...node.attributes,
        ...node.generics,
        ...node.supertraits,
        ...node.whereClause,
        ...node.members
      );
      break;
    case 'Impl':
      add(
        ...node.attributes,
        ...node.generics,
        node.trait,
        node.target,
        ...node.whereClause,
        ...node.members
      );
      break;
    case 'TypeAlias':
      add(...node.generics, node.aliased);
      break;
    case 'Module':
      add(...(node.items ?? []));
      break;
    case 'UseTree':
      add(...node.children);
      break;
    case 'Use':
      add(node.tree);
      break;
    case 'Export':
      add(node.declaration);
      break;

    default:
      return assertNever(node);
  }

  return out;
}

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Recursively visit AST nodes with enter/exit callbacks.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children (unless enter returned false)
 * 3. visitor.exit(node)
 */
export function visitNode(
  node: ASTNode,
  visitor: NodeVisitor,
  parent: ASTNode | null = null
): void {
  const descend = visitor.enter?.(node, parent);
  if (descend !== false) {
    for (const child of childNodes(node)) {
      visitNode(child, visitor, node);
    }
  }
  visitor.exit?.(node, parent);
}
