/**
 * Syntax node definitions.
 *
 * Every node shares the structural fields of `BaseNode`: graph links are
 * arena handles (`NodeId`), never object references. Kind-specific data
 * sits on the node next to them. The union `AstNode` is closed over
 * `NodeKind`, so a `switch (node.kind)` narrows to the exact node shape.
 */

import type { SourceLocation } from "../errors/diagnostic.ts";
import type { Handle } from "../memory/arena.ts";
import type { InternedString } from "../strings/interner.ts";
import type { Type } from "../types/definitions.ts";
import type { Flags } from "./flags.ts";
import { NodeKind } from "./kinds.ts";

export type NodeId = Handle;

/** Value type stored under each metadata kind. */
export interface MetadataTypes {
  bool: boolean;
  int: number;
  string: string;
  name: InternedString;
  node: NodeId;
  type: Type;
}

/** Typed value stored in a node's metadata map. */
export type MetadataValue = {
  [K in keyof MetadataTypes]: { kind: K; value: MetadataTypes[K] };
}[keyof MetadataTypes];

export type MetadataKind = MetadataValue["kind"];

/** Common fields shared by all AST nodes. */
export interface BaseNode {
  readonly id: NodeId;
  readonly kind: NodeKind;
  location: SourceLocation;
  parent: NodeId | null;
  /** Syntax children, in source order. */
  children: NodeId[];
  /** Attribute and annotation nodes; never visited as children. */
  attributes: NodeId[];
  /** Resolved type, filled in by semantic analysis. */
  type: Type | null;
  flags: Flags;
  metadata: Map<string, MetadataValue>;
}

/** Structural fields a node is created with; `kind` and payload come from the builder. */
export type NodeBase = Omit<BaseNode, "kind">;

// ─── Operators ──────────────────────────────────────────────────────────────

export type UnaryOperator = "-" | "+" | "!" | "~" | "&" | "*" | "++" | "--";

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>"
  | "&&"
  | "||"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "??";

export type AssignmentOperator =
  | "="
  | "+="
  | "-="
  | "*="
  | "/="
  | "%="
  | "&="
  | "|="
  | "^="
  | "<<="
  | ">>=";

// ─── Kinds With a Payload ───────────────────────────────────────────────────

/** Kinds whose only payload is a name. */
export type NamedKind =
  | NodeKind.Identifier
  | NodeKind.PathSegment
  | NodeKind.PrimitiveType
  | NodeKind.FieldExpr
  | NodeKind.MemberExpr
  | NodeKind.MacroCallExpr
  | NodeKind.VariableDeclaration
  | NodeKind.FuncDeclaration
  | NodeKind.FuncParamDeclaration
  | NodeKind.StructDeclaration
  | NodeKind.ClassDeclaration
  | NodeKind.FieldDeclaration
  | NodeKind.MethodDeclaration
  | NodeKind.EnumDeclaration
  | NodeKind.EnumOptionDeclaration
  | NodeKind.TypeDeclaration
  | NodeKind.ModuleDeclaration
  | NodeKind.TypeParameterDeclaration
  | NodeKind.MacroDeclaration
  | NodeKind.TestDeclaration
  | NodeKind.Attribute
  | NodeKind.Annotation;

/** Kinds defined with their own payload interface below. */
export type PayloadKind =
  | NodeKind.BoolLiteral
  | NodeKind.IntLiteral
  | NodeKind.FloatLiteral
  | NodeKind.StringLiteral
  | NodeKind.CharLiteral
  | NodeKind.ArrayType
  | NodeKind.UnaryExpr
  | NodeKind.BinaryExpr
  | NodeKind.AssignmentExpr
  | NodeKind.RangeExpr
  | NodeKind.ImportDeclaration
  | NodeKind.ImportItem;

/** Kinds whose meaning is carried entirely by their children. */
export type PlainKind = Exclude<NodeKind, NamedKind | PayloadKind>;

export interface NamedNode<K extends NamedKind = NamedKind> extends BaseNode {
  kind: K;
  name: InternedString;
}

export interface PlainNode<K extends PlainKind = PlainKind> extends BaseNode {
  kind: K;
}

// ─── Literals ───────────────────────────────────────────────────────────────

export interface BoolLiteralNode extends BaseNode {
  kind: NodeKind.BoolLiteral;
  value: boolean;
}

/** Integer literal; `bigint` keeps 64- and 128-bit values exact. */
export interface IntLiteralNode extends BaseNode {
  kind: NodeKind.IntLiteral;
  value: bigint;
}

export interface FloatLiteralNode extends BaseNode {
  kind: NodeKind.FloatLiteral;
  value: number;
}

export interface StringLiteralNode extends BaseNode {
  kind: NodeKind.StringLiteral;
  value: InternedString;
}

/** Character literal holding a Unicode code point. */
export interface CharLiteralNode extends BaseNode {
  kind: NodeKind.CharLiteral;
  value: number;
}

// ─── Types, Expressions, Declarations ───────────────────────────────────────

/** `[N]T`; `size` 0 denotes a dynamic array. Element type is the only child. */
export interface ArrayTypeNode extends BaseNode {
  kind: NodeKind.ArrayType;
  size: number;
}

export interface UnaryExprNode extends BaseNode {
  kind: NodeKind.UnaryExpr;
  operator: UnaryOperator;
  prefix: boolean;
}

/** Children: left operand, right operand. */
export interface BinaryExprNode extends BaseNode {
  kind: NodeKind.BinaryExpr;
  operator: BinaryOperator;
}

/** Children: target, value. */
export interface AssignmentExprNode extends BaseNode {
  kind: NodeKind.AssignmentExpr;
  operator: AssignmentOperator;
}

export interface RangeExprNode extends BaseNode {
  kind: NodeKind.RangeExpr;
  inclusive: boolean;
}

export interface ImportDeclarationNode extends BaseNode {
  kind: NodeKind.ImportDeclaration;
  path: InternedString;
  alias: InternedString | null;
}

export interface ImportItemNode extends BaseNode {
  kind: NodeKind.ImportItem;
  name: InternedString;
  alias: InternedString | null;
}

// ─── Unions ─────────────────────────────────────────────────────────────────

type NamedNodes = { [K in NamedKind]: NamedNode<K> }[NamedKind];
type PlainNodes = { [K in PlainKind]: PlainNode<K> }[PlainKind];

export type AstNode =
  | BoolLiteralNode
  | IntLiteralNode
  | FloatLiteralNode
  | StringLiteralNode
  | CharLiteralNode
  | ArrayTypeNode
  | UnaryExprNode
  | BinaryExprNode
  | AssignmentExprNode
  | RangeExprNode
  | ImportDeclarationNode
  | ImportItemNode
  | NamedNodes
  | PlainNodes;

/** The node shape for one kind. */
export type NodeOf<K extends NodeKind> = Extract<AstNode, { kind: K }>;

export type IdentifierNode = NamedNode<NodeKind.Identifier>;
export type VariableDeclarationNode = NamedNode<NodeKind.VariableDeclaration>;
export type FuncDeclarationNode = NamedNode<NodeKind.FuncDeclaration>;
export type FuncParamDeclarationNode = NamedNode<NodeKind.FuncParamDeclaration>;
export type StructDeclarationNode = NamedNode<NodeKind.StructDeclaration>;
export type FieldDeclarationNode = NamedNode<NodeKind.FieldDeclaration>;
export type AttributeNode = NamedNode<NodeKind.Attribute>;

// ─── Downcasts ──────────────────────────────────────────────────────────────

export function isKind<K extends NodeKind>(node: AstNode, kind: K): node is NodeOf<K> {
  return node.kind === kind;
}

/** Narrow `node` to `kind`, or `null` when it is some other kind. */
export function asKind<K extends NodeKind>(node: AstNode, kind: K): NodeOf<K> | null {
  return isKind(node, kind) ? node : null;
}

const NODE_KINDS: ReadonlySet<string> = new Set<string>(Object.values(NodeKind));

/** Whether `node` carries one of the closed set of kinds. */
export function isAstNode(node: BaseNode): node is AstNode {
  return NODE_KINDS.has(node.kind);
}

/** Name carried by a node, if its kind has one. */
export function nodeName(node: AstNode): InternedString | null {
  if ("name" in node) return node.name;
  return null;
}
