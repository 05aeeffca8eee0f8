/**
 * Node construction helpers.
 *
 * These are the entry points a parser uses to build trees: each creates a
 * node in the tree's arena and links the given children in order.
 */

import { type SourceLocation, UNKNOWN_LOCATION } from "../errors/diagnostic.ts";
import type { InternedString } from "../strings/interner.ts";
import { type Flags, NodeFlags } from "./flags.ts";
import { NodeKind } from "./kinds.ts";
import type {
  ArrayTypeNode,
  AssignmentExprNode,
  AssignmentOperator,
  AstNode,
  BaseNode,
  BinaryExprNode,
  BinaryOperator,
  BoolLiteralNode,
  CharLiteralNode,
  FloatLiteralNode,
  ImportDeclarationNode,
  ImportItemNode,
  IntLiteralNode,
  NamedKind,
  NamedNode,
  PlainKind,
  PlainNode,
  RangeExprNode,
  StringLiteralNode,
  UnaryExprNode,
  UnaryOperator,
} from "./nodes.ts";
import type { SyntaxTree } from "./tree.ts";

type Child = AstNode | null | undefined;

export class AstBuilder {
  constructor(
    readonly tree: SyntaxTree,
    private readonly defaultLocation: SourceLocation = UNKNOWN_LOCATION,
  ) {}

  // ─── Generic ──────────────────────────────────────────────────────────────

  plain<K extends PlainKind>(kind: K, children: Child[] = [], loc?: SourceLocation): PlainNode<K> {
    const node = this.tree.create<PlainNode<K>>(this.at(loc), (base) => ({ ...base, kind }));
    return this.attach(node, children);
  }

  named<K extends NamedKind>(
    kind: K,
    name: InternedString,
    children: Child[] = [],
    loc?: SourceLocation,
  ): NamedNode<K> {
    const node = this.tree.create<NamedNode<K>>(this.at(loc), (base) => ({ ...base, kind, name }));
    return this.attach(node, children);
  }

  program(items: Child[], loc?: SourceLocation): PlainNode<NodeKind.Program> {
    return this.plain(NodeKind.Program, items, loc);
  }

  noop(loc?: SourceLocation): PlainNode<NodeKind.Noop> {
    return this.plain(NodeKind.Noop, [], loc);
  }

  // ─── Literals ─────────────────────────────────────────────────────────────

  boolLiteral(value: boolean, loc?: SourceLocation): BoolLiteralNode {
    return this.tree.create<BoolLiteralNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.BoolLiteral,
      value,
    }));
  }

  intLiteral(value: bigint | number, loc?: SourceLocation): IntLiteralNode {
    return this.tree.create<IntLiteralNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.IntLiteral,
      value: BigInt(value),
    }));
  }

  floatLiteral(value: number, loc?: SourceLocation): FloatLiteralNode {
    return this.tree.create<FloatLiteralNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.FloatLiteral,
      value,
    }));
  }

  stringLiteral(value: InternedString, loc?: SourceLocation): StringLiteralNode {
    return this.tree.create<StringLiteralNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.StringLiteral,
      value,
    }));
  }

  /** Accepts a code point or a one-character string. */
  charLiteral(value: number | string, loc?: SourceLocation): CharLiteralNode {
    const codePoint = typeof value === "number" ? value : (value.codePointAt(0) ?? 0);
    return this.tree.create<CharLiteralNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.CharLiteral,
      value: codePoint,
    }));
  }

  nullLiteral(loc?: SourceLocation): PlainNode<NodeKind.NullLiteral> {
    return this.plain(NodeKind.NullLiteral, [], loc);
  }

  // ─── Names ────────────────────────────────────────────────────────────────

  identifier(name: InternedString, loc?: SourceLocation): NamedNode<NodeKind.Identifier> {
    return this.named(NodeKind.Identifier, name, [], loc);
  }

  path(segments: InternedString[], loc?: SourceLocation): PlainNode<NodeKind.QualifiedPath> {
    const parts = segments.map((s) => this.named(NodeKind.PathSegment, s, [], loc));
    return this.plain(NodeKind.QualifiedPath, parts, loc);
  }

  // ─── Type Expressions ─────────────────────────────────────────────────────

  primitiveType(name: InternedString, loc?: SourceLocation): NamedNode<NodeKind.PrimitiveType> {
    return this.named(NodeKind.PrimitiveType, name, [], loc);
  }

  arrayType(element: AstNode, size = 0, loc?: SourceLocation): ArrayTypeNode {
    const node = this.tree.create<ArrayTypeNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.ArrayType,
      size,
    }));
    return this.attach(node, [element]);
  }

  tupleType(elements: AstNode[], loc?: SourceLocation): PlainNode<NodeKind.TupleType> {
    return this.plain(NodeKind.TupleType, elements, loc);
  }

  unionType(variants: AstNode[], loc?: SourceLocation): PlainNode<NodeKind.UnionType> {
    return this.plain(NodeKind.UnionType, variants, loc);
  }

  /** Children: parameter types, then the return type. */
  functionType(
    params: AstNode[],
    returnType: AstNode,
    loc?: SourceLocation,
  ): PlainNode<NodeKind.FunctionType> {
    return this.plain(NodeKind.FunctionType, [...params, returnType], loc);
  }

  pointerType(pointee: AstNode, loc?: SourceLocation): PlainNode<NodeKind.PointerType> {
    return this.plain(NodeKind.PointerType, [pointee], loc);
  }

  referenceType(referent: AstNode, loc?: SourceLocation): PlainNode<NodeKind.ReferenceType> {
    return this.plain(NodeKind.ReferenceType, [referent], loc);
  }

  optionalType(inner: AstNode, loc?: SourceLocation): PlainNode<NodeKind.OptionalType> {
    return this.plain(NodeKind.OptionalType, [inner], loc);
  }

  // ─── Expressions ──────────────────────────────────────────────────────────

  unary(
    operator: UnaryOperator,
    operand: AstNode,
    prefix = true,
    loc?: SourceLocation,
  ): UnaryExprNode {
    const node = this.tree.create<UnaryExprNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.UnaryExpr,
      operator,
      prefix,
    }));
    return this.attach(node, [operand]);
  }

  binary(
    operator: BinaryOperator,
    left: AstNode,
    right: AstNode,
    loc?: SourceLocation,
  ): BinaryExprNode {
    const node = this.tree.create<BinaryExprNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.BinaryExpr,
      operator,
    }));
    return this.attach(node, [left, right]);
  }

  ternary(
    condition: AstNode,
    whenTrue: AstNode,
    whenFalse: AstNode,
    loc?: SourceLocation,
  ): PlainNode<NodeKind.TernaryExpr> {
    return this.plain(NodeKind.TernaryExpr, [condition, whenTrue, whenFalse], loc);
  }

  assign(
    operator: AssignmentOperator,
    target: AstNode,
    value: AstNode,
    loc?: SourceLocation,
  ): AssignmentExprNode {
    const node = this.tree.create<AssignmentExprNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.AssignmentExpr,
      operator,
    }));
    return this.attach(node, [target, value]);
  }

  group(inner: AstNode, loc?: SourceLocation): PlainNode<NodeKind.GroupExpr> {
    return this.plain(NodeKind.GroupExpr, [inner], loc);
  }

  cast(value: AstNode, target: AstNode, loc?: SourceLocation): PlainNode<NodeKind.CastExpr> {
    return this.plain(NodeKind.CastExpr, [value, target], loc);
  }

  /** Children: callee, then arguments. */
  call(callee: AstNode, args: AstNode[], loc?: SourceLocation): PlainNode<NodeKind.CallExpr> {
    return this.plain(NodeKind.CallExpr, [callee, ...args], loc);
  }

  index(target: AstNode, index: AstNode, loc?: SourceLocation): PlainNode<NodeKind.IndexExpr> {
    return this.plain(NodeKind.IndexExpr, [target, index], loc);
  }

  arrayExpr(elements: AstNode[], loc?: SourceLocation): PlainNode<NodeKind.ArrayExpr> {
    return this.plain(NodeKind.ArrayExpr, elements, loc);
  }

  tupleExpr(elements: AstNode[], loc?: SourceLocation): PlainNode<NodeKind.TupleExpr> {
    return this.plain(NodeKind.TupleExpr, elements, loc);
  }

  member(
    target: AstNode,
    name: InternedString,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.MemberExpr> {
    return this.named(NodeKind.MemberExpr, name, [target], loc);
  }

  /** `name: value` inside a struct expression. */
  fieldExpr(
    name: InternedString,
    value: AstNode,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.FieldExpr> {
    return this.named(NodeKind.FieldExpr, name, [value], loc);
  }

  structExpr(
    type: AstNode | null,
    fields: AstNode[],
    loc?: SourceLocation,
  ): PlainNode<NodeKind.StructExpr> {
    return this.plain(NodeKind.StructExpr, [this.slot(type, loc), ...fields], loc);
  }

  range(start: Child, end: Child, inclusive = false, loc?: SourceLocation): RangeExprNode {
    const node = this.tree.create<RangeExprNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.RangeExpr,
      inclusive,
    }));
    return this.attach(node, [this.slot(start, loc), this.slot(end, loc)]);
  }

  closure(
    params: AstNode[],
    body: AstNode,
    loc?: SourceLocation,
  ): PlainNode<NodeKind.ClosureExpr> {
    return this.plain(NodeKind.ClosureExpr, [...params, body], loc);
  }

  spread(inner: AstNode, loc?: SourceLocation): PlainNode<NodeKind.SpreadExpr> {
    return this.plain(NodeKind.SpreadExpr, [inner], loc);
  }

  // ─── Statements ───────────────────────────────────────────────────────────

  exprStmt(expr: AstNode, loc?: SourceLocation): PlainNode<NodeKind.ExprStmt> {
    return this.plain(NodeKind.ExprStmt, [expr], loc);
  }

  returnStmt(value: Child = null, loc?: SourceLocation): PlainNode<NodeKind.ReturnStmt> {
    return this.plain(NodeKind.ReturnStmt, [value], loc);
  }

  breakStmt(loc?: SourceLocation): PlainNode<NodeKind.BreakStmt> {
    return this.plain(NodeKind.BreakStmt, [], loc);
  }

  continueStmt(loc?: SourceLocation): PlainNode<NodeKind.ContinueStmt> {
    return this.plain(NodeKind.ContinueStmt, [], loc);
  }

  deferStmt(body: AstNode, loc?: SourceLocation): PlainNode<NodeKind.DeferStmt> {
    return this.plain(NodeKind.DeferStmt, [body], loc);
  }

  block(statements: Child[], loc?: SourceLocation): PlainNode<NodeKind.BlockStmt> {
    return this.plain(NodeKind.BlockStmt, statements, loc);
  }

  ifStmt(
    condition: AstNode,
    then: AstNode,
    otherwise: Child = null,
    loc?: SourceLocation,
  ): PlainNode<NodeKind.IfStmt> {
    return this.plain(NodeKind.IfStmt, [condition, then, this.slot(otherwise, loc)], loc);
  }

  whileStmt(condition: AstNode, body: AstNode, loc?: SourceLocation): PlainNode<NodeKind.WhileStmt> {
    return this.plain(NodeKind.WhileStmt, [condition, body], loc);
  }

  /** Children: loop variable declaration, iterable, body. */
  forStmt(
    variable: AstNode,
    iterable: AstNode,
    body: AstNode,
    loc?: SourceLocation,
  ): PlainNode<NodeKind.ForStmt> {
    return this.plain(NodeKind.ForStmt, [variable, iterable, body], loc);
  }

  // ─── Declarations ─────────────────────────────────────────────────────────

  /** Children: type annotation, initializer; `Noop` where absent. */
  variableDecl(
    name: InternedString,
    type: Child = null,
    init: Child = null,
    flags: Flags = NodeFlags.None,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.VariableDeclaration> {
    const node = this.named(
      NodeKind.VariableDeclaration,
      name,
      [this.slot(type, loc), this.slot(init, loc)],
      loc,
    );
    node.flags = flags;
    return node;
  }

  funcParam(
    name: InternedString,
    type: Child,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.FuncParamDeclaration> {
    return this.named(NodeKind.FuncParamDeclaration, name, [type], loc);
  }

  /** Children: parameters, return type, body; `Noop` where absent. */
  funcDecl(
    name: InternedString,
    params: AstNode[],
    returnType: Child = null,
    body: Child = null,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.FuncDeclaration> {
    return this.named(
      NodeKind.FuncDeclaration,
      name,
      [...params, this.slot(returnType, loc), this.slot(body, loc)],
      loc,
    );
  }

  fieldDecl(
    name: InternedString,
    type: Child,
    init: Child = null,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.FieldDeclaration> {
    return this.named(
      NodeKind.FieldDeclaration,
      name,
      [this.slot(type, loc), this.slot(init, loc)],
      loc,
    );
  }

  structDecl(
    name: InternedString,
    members: AstNode[],
    loc?: SourceLocation,
  ): NamedNode<NodeKind.StructDeclaration> {
    return this.named(NodeKind.StructDeclaration, name, members, loc);
  }

  /** Children: base type (`Noop` when none), then members. */
  classDecl(
    name: InternedString,
    base: Child,
    members: AstNode[],
    loc?: SourceLocation,
  ): NamedNode<NodeKind.ClassDeclaration> {
    return this.named(NodeKind.ClassDeclaration, name, [this.slot(base, loc), ...members], loc);
  }

  methodDecl(
    name: InternedString,
    params: AstNode[],
    returnType: Child = null,
    body: Child = null,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.MethodDeclaration> {
    return this.named(
      NodeKind.MethodDeclaration,
      name,
      [...params, this.slot(returnType, loc), this.slot(body, loc)],
      loc,
    );
  }

  enumDecl(
    name: InternedString,
    options: AstNode[],
    loc?: SourceLocation,
  ): NamedNode<NodeKind.EnumDeclaration> {
    return this.named(NodeKind.EnumDeclaration, name, options, loc);
  }

  enumOption(
    name: InternedString,
    value: Child = null,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.EnumOptionDeclaration> {
    return this.named(NodeKind.EnumOptionDeclaration, name, [value], loc);
  }

  typeDecl(
    name: InternedString,
    aliased: AstNode,
    loc?: SourceLocation,
  ): NamedNode<NodeKind.TypeDeclaration> {
    return this.named(NodeKind.TypeDeclaration, name, [aliased], loc);
  }

  importDecl(
    path: InternedString,
    alias: InternedString | null,
    items: AstNode[] = [],
    loc?: SourceLocation,
  ): ImportDeclarationNode {
    const node = this.tree.create<ImportDeclarationNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.ImportDeclaration,
      path,
      alias,
    }));
    return this.attach(node, items);
  }

  importItem(
    name: InternedString,
    alias: InternedString | null = null,
    loc?: SourceLocation,
  ): ImportItemNode {
    return this.tree.create<ImportItemNode>(this.at(loc), (base) => ({
      ...base,
      kind: NodeKind.ImportItem,
      name,
      alias,
    }));
  }

  moduleDecl(name: InternedString, loc?: SourceLocation): NamedNode<NodeKind.ModuleDeclaration> {
    return this.named(NodeKind.ModuleDeclaration, name, [], loc);
  }

  // ─── Attributes ───────────────────────────────────────────────────────────

  /** Attribute node with argument children; attach it with `SyntaxTree.addAttribute`. */
  attribute(
    name: InternedString,
    args: AstNode[] = [],
    loc?: SourceLocation,
  ): NamedNode<NodeKind.Attribute> {
    return this.named(NodeKind.Attribute, name, args, loc);
  }

  private at(loc: SourceLocation | undefined): SourceLocation {
    return loc ?? { ...this.defaultLocation };
  }

  /** Positional optional child; an absent one becomes a `Noop` so later slots keep their index. */
  private slot(child: Child, loc: SourceLocation | undefined): AstNode {
    return child ?? this.noop(loc);
  }

  private attach<N extends BaseNode>(node: N, children: Child[]): N {
    for (const child of children) {
      if (child) this.tree.addChild(node.id, child.id);
    }
    return node;
  }
}
