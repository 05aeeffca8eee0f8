import { isKind, type AstNode, type NodeId, type NodeOf } from "./nodes.ts";
import type { NodeKind } from "./kinds.ts";
import type { SyntaxTree } from "./tree.ts";
import { visit } from "./visitor.ts";

/** Pre-order walk. Returning `false` from `fn` skips that node's children. */
export function walkAst(tree: SyntaxTree, root: NodeId, fn: (node: AstNode) => boolean): void {
  visit(tree, root, { visitNode: fn });
}

/** Every node of `kind` under (and including) `root`, in pre-order. */
export function collectNodes<K extends NodeKind>(
  tree: SyntaxTree,
  root: NodeId,
  kind: K,
): NodeOf<K>[] {
  const found: NodeOf<K>[] = [];
  walkAst(tree, root, (node) => {
    if (isKind(node, kind)) found.push(node);
    return true;
  });
  return found;
}

/** First node of `kind` in pre-order, or `null`. Stops at the first match. */
export function findNode<K extends NodeKind>(
  tree: SyntaxTree,
  root: NodeId,
  kind: K,
): NodeOf<K> | null {
  const node = tree.node(root);
  if (isKind(node, kind)) return node;
  for (const child of node.children) {
    const match = findNode(tree, child, kind);
    if (match) return match;
  }
  return null;
}

export function countNodes(tree: SyntaxTree, root: NodeId): number {
  let count = 0;
  walkAst(tree, root, () => {
    count++;
    return true;
  });
  return count;
}
