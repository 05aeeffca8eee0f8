/**
 * Kind-dispatched AST traversal.
 *
 * A visitor supplies optional `visit<Kind>` (enter) and `leave<Kind>`
 * methods. Enter returns `true` to descend into the node's children; the
 * matching leave runs afterwards either way. Kinds without a specific
 * method fall back to `visitNode` / `leaveNode`, and with neither present a
 * node is simply descended into.
 *
 * Children are visited in insertion order. Attributes are not children and
 * are never visited.
 */

import { NodeKind } from "./kinds.ts";
import type { AstNode, NodeId, NodeOf } from "./nodes.ts";
import type { ReadonlySyntaxTree, SyntaxTree } from "./tree.ts";

type EnterMethods = {
  [K in NodeKind as `visit${K}`]?: (node: NodeOf<K>) => boolean;
};

type LeaveMethods = {
  [K in NodeKind as `leave${K}`]?: (node: NodeOf<K>) => void;
};

type ReadonlyEnterMethods = {
  [K in NodeKind as `visit${K}`]?: (node: Readonly<NodeOf<K>>) => boolean;
};

type ReadonlyLeaveMethods = {
  [K in NodeKind as `leave${K}`]?: (node: Readonly<NodeOf<K>>) => void;
};

/** Fallbacks for kinds without a specific method. */
export interface GenericVisitor {
  visitNode?(node: AstNode): boolean;
  leaveNode?(node: AstNode): void;
}

export interface ReadonlyGenericVisitor {
  visitNode?(node: Readonly<AstNode>): boolean;
  leaveNode?(node: Readonly<AstNode>): void;
}

/** Visitor that may mutate the nodes it is handed. */
export type AstVisitor = GenericVisitor & EnterMethods & LeaveMethods;

/** Visitor over read-only nodes; same method set as `AstVisitor`. */
export type ReadonlyAstVisitor = ReadonlyGenericVisitor & ReadonlyEnterMethods & ReadonlyLeaveMethods;

interface NodeHooks {
  enter(): boolean;
  leave(): void;
}

function hooks<N extends AstNode>(
  visitor: AstVisitor,
  node: N,
  enter: ((node: N) => boolean) | undefined,
  leave: ((node: N) => void) | undefined,
): NodeHooks {
  return {
    enter: () => (enter ? enter.call(visitor, node) : (visitor.visitNode?.(node) ?? true)),
    leave: () => {
      if (leave) {
        leave.call(visitor, node);
      } else {
        visitor.leaveNode?.(node);
      }
    },
  };
}

function dispatch(visitor: AstVisitor, node: AstNode): NodeHooks {
  switch (node.kind) {
    case NodeKind.Program:
      return hooks(visitor, node, visitor.visitProgram, visitor.leaveProgram);
    case NodeKind.Noop:
      return hooks(visitor, node, visitor.visitNoop, visitor.leaveNoop);
    case NodeKind.BoolLiteral:
      return hooks(visitor, node, visitor.visitBoolLiteral, visitor.leaveBoolLiteral);
    case NodeKind.IntLiteral:
      return hooks(visitor, node, visitor.visitIntLiteral, visitor.leaveIntLiteral);
    case NodeKind.FloatLiteral:
      return hooks(visitor, node, visitor.visitFloatLiteral, visitor.leaveFloatLiteral);
    case NodeKind.StringLiteral:
      return hooks(visitor, node, visitor.visitStringLiteral, visitor.leaveStringLiteral);
    case NodeKind.CharLiteral:
      return hooks(visitor, node, visitor.visitCharLiteral, visitor.leaveCharLiteral);
    case NodeKind.NullLiteral:
      return hooks(visitor, node, visitor.visitNullLiteral, visitor.leaveNullLiteral);
    case NodeKind.Identifier:
      return hooks(visitor, node, visitor.visitIdentifier, visitor.leaveIdentifier);
    case NodeKind.QualifiedPath:
      return hooks(visitor, node, visitor.visitQualifiedPath, visitor.leaveQualifiedPath);
    case NodeKind.PathSegment:
      return hooks(visitor, node, visitor.visitPathSegment, visitor.leavePathSegment);
    case NodeKind.PrimitiveType:
      return hooks(visitor, node, visitor.visitPrimitiveType, visitor.leavePrimitiveType);
    case NodeKind.ArrayType:
      return hooks(visitor, node, visitor.visitArrayType, visitor.leaveArrayType);
    case NodeKind.TupleType:
      return hooks(visitor, node, visitor.visitTupleType, visitor.leaveTupleType);
    case NodeKind.UnionType:
      return hooks(visitor, node, visitor.visitUnionType, visitor.leaveUnionType);
    case NodeKind.FunctionType:
      return hooks(visitor, node, visitor.visitFunctionType, visitor.leaveFunctionType);
    case NodeKind.PointerType:
      return hooks(visitor, node, visitor.visitPointerType, visitor.leavePointerType);
    case NodeKind.ReferenceType:
      return hooks(visitor, node, visitor.visitReferenceType, visitor.leaveReferenceType);
    case NodeKind.OptionalType:
      return hooks(visitor, node, visitor.visitOptionalType, visitor.leaveOptionalType);
    case NodeKind.ResultType:
      return hooks(visitor, node, visitor.visitResultType, visitor.leaveResultType);
    case NodeKind.UnaryExpr:
      return hooks(visitor, node, visitor.visitUnaryExpr, visitor.leaveUnaryExpr);
    case NodeKind.BinaryExpr:
      return hooks(visitor, node, visitor.visitBinaryExpr, visitor.leaveBinaryExpr);
    case NodeKind.TernaryExpr:
      return hooks(visitor, node, visitor.visitTernaryExpr, visitor.leaveTernaryExpr);
    case NodeKind.AssignmentExpr:
      return hooks(visitor, node, visitor.visitAssignmentExpr, visitor.leaveAssignmentExpr);
    case NodeKind.GroupExpr:
      return hooks(visitor, node, visitor.visitGroupExpr, visitor.leaveGroupExpr);
    case NodeKind.StmtExpr:
      return hooks(visitor, node, visitor.visitStmtExpr, visitor.leaveStmtExpr);
    case NodeKind.StringExpr:
      return hooks(visitor, node, visitor.visitStringExpr, visitor.leaveStringExpr);
    case NodeKind.CastExpr:
      return hooks(visitor, node, visitor.visitCastExpr, visitor.leaveCastExpr);
    case NodeKind.CallExpr:
      return hooks(visitor, node, visitor.visitCallExpr, visitor.leaveCallExpr);
    case NodeKind.IndexExpr:
      return hooks(visitor, node, visitor.visitIndexExpr, visitor.leaveIndexExpr);
    case NodeKind.ArrayExpr:
      return hooks(visitor, node, visitor.visitArrayExpr, visitor.leaveArrayExpr);
    case NodeKind.TupleExpr:
      return hooks(visitor, node, visitor.visitTupleExpr, visitor.leaveTupleExpr);
    case NodeKind.FieldExpr:
      return hooks(visitor, node, visitor.visitFieldExpr, visitor.leaveFieldExpr);
    case NodeKind.StructExpr:
      return hooks(visitor, node, visitor.visitStructExpr, visitor.leaveStructExpr);
    case NodeKind.MemberExpr:
      return hooks(visitor, node, visitor.visitMemberExpr, visitor.leaveMemberExpr);
    case NodeKind.MacroCallExpr:
      return hooks(visitor, node, visitor.visitMacroCallExpr, visitor.leaveMacroCallExpr);
    case NodeKind.ClosureExpr:
      return hooks(visitor, node, visitor.visitClosureExpr, visitor.leaveClosureExpr);
    case NodeKind.RangeExpr:
      return hooks(visitor, node, visitor.visitRangeExpr, visitor.leaveRangeExpr);
    case NodeKind.SpreadExpr:
      return hooks(visitor, node, visitor.visitSpreadExpr, visitor.leaveSpreadExpr);
    case NodeKind.ExprStmt:
      return hooks(visitor, node, visitor.visitExprStmt, visitor.leaveExprStmt);
    case NodeKind.BreakStmt:
      return hooks(visitor, node, visitor.visitBreakStmt, visitor.leaveBreakStmt);
    case NodeKind.ContinueStmt:
      return hooks(visitor, node, visitor.visitContinueStmt, visitor.leaveContinueStmt);
    case NodeKind.DeferStmt:
      return hooks(visitor, node, visitor.visitDeferStmt, visitor.leaveDeferStmt);
    case NodeKind.ReturnStmt:
      return hooks(visitor, node, visitor.visitReturnStmt, visitor.leaveReturnStmt);
    case NodeKind.YieldStmt:
      return hooks(visitor, node, visitor.visitYieldStmt, visitor.leaveYieldStmt);
    case NodeKind.BlockStmt:
      return hooks(visitor, node, visitor.visitBlockStmt, visitor.leaveBlockStmt);
    case NodeKind.IfStmt:
      return hooks(visitor, node, visitor.visitIfStmt, visitor.leaveIfStmt);
    case NodeKind.ForStmt:
      return hooks(visitor, node, visitor.visitForStmt, visitor.leaveForStmt);
    case NodeKind.WhileStmt:
      return hooks(visitor, node, visitor.visitWhileStmt, visitor.leaveWhileStmt);
    case NodeKind.SwitchStmt:
      return hooks(visitor, node, visitor.visitSwitchStmt, visitor.leaveSwitchStmt);
    case NodeKind.MatchStmt:
      return hooks(visitor, node, visitor.visitMatchStmt, visitor.leaveMatchStmt);
    case NodeKind.CaseStmt:
      return hooks(visitor, node, visitor.visitCaseStmt, visitor.leaveCaseStmt);
    case NodeKind.MatchCase:
      return hooks(visitor, node, visitor.visitMatchCase, visitor.leaveMatchCase);
    case NodeKind.VariableDeclaration:
      return hooks(visitor, node, visitor.visitVariableDeclaration, visitor.leaveVariableDeclaration);
    case NodeKind.FuncDeclaration:
      return hooks(visitor, node, visitor.visitFuncDeclaration, visitor.leaveFuncDeclaration);
    case NodeKind.FuncParamDeclaration:
      return hooks(visitor, node, visitor.visitFuncParamDeclaration, visitor.leaveFuncParamDeclaration);
    case NodeKind.StructDeclaration:
      return hooks(visitor, node, visitor.visitStructDeclaration, visitor.leaveStructDeclaration);
    case NodeKind.ClassDeclaration:
      return hooks(visitor, node, visitor.visitClassDeclaration, visitor.leaveClassDeclaration);
    case NodeKind.FieldDeclaration:
      return hooks(visitor, node, visitor.visitFieldDeclaration, visitor.leaveFieldDeclaration);
    case NodeKind.MethodDeclaration:
      return hooks(visitor, node, visitor.visitMethodDeclaration, visitor.leaveMethodDeclaration);
    case NodeKind.EnumDeclaration:
      return hooks(visitor, node, visitor.visitEnumDeclaration, visitor.leaveEnumDeclaration);
    case NodeKind.EnumOptionDeclaration:
      return hooks(visitor, node, visitor.visitEnumOptionDeclaration, visitor.leaveEnumOptionDeclaration);
    case NodeKind.TypeDeclaration:
      return hooks(visitor, node, visitor.visitTypeDeclaration, visitor.leaveTypeDeclaration);
    case NodeKind.ImportDeclaration:
      return hooks(visitor, node, visitor.visitImportDeclaration, visitor.leaveImportDeclaration);
    case NodeKind.ImportItem:
      return hooks(visitor, node, visitor.visitImportItem, visitor.leaveImportItem);
    case NodeKind.ModuleDeclaration:
      return hooks(visitor, node, visitor.visitModuleDeclaration, visitor.leaveModuleDeclaration);
    case NodeKind.GenericDeclaration:
      return hooks(visitor, node, visitor.visitGenericDeclaration, visitor.leaveGenericDeclaration);
    case NodeKind.TypeParameterDeclaration:
      return hooks(visitor, node, visitor.visitTypeParameterDeclaration, visitor.leaveTypeParameterDeclaration);
    case NodeKind.ExternDeclaration:
      return hooks(visitor, node, visitor.visitExternDeclaration, visitor.leaveExternDeclaration);
    case NodeKind.MacroDeclaration:
      return hooks(visitor, node, visitor.visitMacroDeclaration, visitor.leaveMacroDeclaration);
    case NodeKind.TestDeclaration:
      return hooks(visitor, node, visitor.visitTestDeclaration, visitor.leaveTestDeclaration);
    case NodeKind.Attribute:
      return hooks(visitor, node, visitor.visitAttribute, visitor.leaveAttribute);
    case NodeKind.Annotation:
      return hooks(visitor, node, visitor.visitAnnotation, visitor.leaveAnnotation);
    default:
      return hooks<AstNode>(visitor, node, undefined, undefined);
  }
}

function traverse(lookup: (id: NodeId) => AstNode, id: NodeId, visitor: AstVisitor): void {
  const node = lookup(id);
  const { enter, leave } = dispatch(visitor, node);
  if (enter()) {
    for (const child of [...node.children]) {
      traverse(lookup, child, visitor);
    }
  }
  leave();
}

/** Visit `id` and its subtree with `visitor`. */
export function visit(tree: SyntaxTree, id: NodeId, visitor: AstVisitor): void {
  traverse((n) => tree.node(n), id, visitor);
}

/** Read-only traversal; identical order and dispatch to `visit`. */
export function visitReadonly(
  tree: ReadonlySyntaxTree,
  id: NodeId,
  visitor: ReadonlyAstVisitor,
): void {
  traverse((n) => tree.node(n), id, visitor);
}
