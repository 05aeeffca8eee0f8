/**
 * S-expression dump of a syntax tree, for tests and debugging.
 *
 * Each node prints as `(Kind payload : type [Flags] @attribute ...)` with
 * its children on the following lines, indented two spaces per level. The
 * type, flags and attributes are only printed when present, so trees that
 * have not been through semantic analysis print too. The printer never
 * modifies the tree.
 */

import { typeToString } from "../types/format.ts";
import { flagsToString, NodeFlags } from "./flags.ts";
import { NodeKind } from "./kinds.ts";
import { type AstNode, type NodeId, nodeName } from "./nodes.ts";
import type { ReadonlySyntaxTree } from "./tree.ts";
import { type ReadonlyAstVisitor, visitReadonly } from "./visitor.ts";

export function printTree(tree: ReadonlySyntaxTree, root: NodeId): string {
  const lines: string[] = [];
  let depth = 0;

  const visitor: ReadonlyAstVisitor = {
    visitNode(node) {
      lines.push(`${"  ".repeat(depth)}(${header(tree, node)}`);
      depth++;
      return true;
    },
    leaveNode() {
      depth--;
      const last = lines.length - 1;
      lines[last] = `${lines[last] ?? ""})`;
    },
  };

  visitReadonly(tree, root, visitor);
  return lines.join("\n");
}

function header(tree: ReadonlySyntaxTree, node: Readonly<AstNode>): string {
  let text: string = node.kind;
  const value = payload(node);
  if (value !== "") text += ` ${value}`;
  if (node.type) text += ` : ${typeToString(node.type)}`;
  if (node.flags !== NodeFlags.None) text += ` [${flagsToString(node.flags)}]`;
  for (const id of node.attributes) {
    const attribute = tree.tryNode(id);
    const name = attribute ? nodeName(attribute) : null;
    if (name) text += ` @${name.text}`;
  }
  return text;
}

function payload(node: Readonly<AstNode>): string {
  switch (node.kind) {
    case NodeKind.BoolLiteral:
      return String(node.value);
    case NodeKind.IntLiteral:
      return node.value.toString();
    case NodeKind.FloatLiteral:
      return String(node.value);
    case NodeKind.StringLiteral:
      return JSON.stringify(node.value.text);
    case NodeKind.CharLiteral:
      return `'${String.fromCodePoint(node.value)}'`;
    case NodeKind.ArrayType:
      return node.size > 0 ? String(node.size) : "";
    case NodeKind.UnaryExpr:
      return node.prefix ? node.operator : `${node.operator} postfix`;
    case NodeKind.BinaryExpr:
    case NodeKind.AssignmentExpr:
      return node.operator;
    case NodeKind.RangeExpr:
      return node.inclusive ? "..=" : "..";
    case NodeKind.ImportDeclaration:
      return node.alias
        ? `${JSON.stringify(node.path.text)} as ${node.alias.text}`
        : JSON.stringify(node.path.text);
    case NodeKind.ImportItem:
      return node.alias ? `${node.name.text} as ${node.alias.text}` : node.name.text;
    default:
      return "name" in node ? node.name.text : "";
  }
}
