/**
 * Arena-owned syntax tree.
 *
 * The tree is the only place nodes are created and the only code that
 * rewires parent/child links. Nodes are never freed individually: removing
 * a child clears its parent link and leaves it in the arena until the arena
 * is reset. The arena is shared with the interner, so only the owning
 * `CompilationContext` resets it.
 */

import type { SourceLocation } from "../errors/diagnostic.ts";
import type { Arena, ArenaPool } from "../memory/arena.ts";
import type { InternedString } from "../strings/interner.ts";
import type { Type } from "../types/definitions.ts";
import { type Flags, hasAllFlags, hasAnyFlag, hasFlag, NodeFlags } from "./flags.ts";
import {
  type AstNode,
  type BaseNode,
  isAstNode,
  type MetadataKind,
  type MetadataTypes,
  type MetadataValue,
  type NodeBase,
  type NodeId,
  nodeName,
} from "./nodes.ts";

type MetadataReaders = {
  [K in MetadataKind]: (value: MetadataValue) => MetadataTypes[K] | undefined;
};

const METADATA_READERS: MetadataReaders = {
  bool: (v) => (v.kind === "bool" ? v.value : undefined),
  int: (v) => (v.kind === "int" ? v.value : undefined),
  string: (v) => (v.kind === "string" ? v.value : undefined),
  name: (v) => (v.kind === "name" ? v.value : undefined),
  node: (v) => (v.kind === "node" ? v.value : undefined),
  type: (v) => (v.kind === "type" ? v.value : undefined),
};

/** Query surface of a tree, for passes that only read. */
export interface ReadonlySyntaxTree {
  readonly size: number;
  node(id: NodeId): Readonly<AstNode>;
  tryNode(id: NodeId): Readonly<AstNode> | undefined;
  child(parent: NodeId, index: number): Readonly<AstNode> | null;
  childCount(parent: NodeId): number;
  childNodes(parent: NodeId): readonly Readonly<AstNode>[];
  attribute(owner: NodeId, index: number): Readonly<AstNode> | null;
  hasFlag(id: NodeId, flag: Flags): boolean;
  typeOf(id: NodeId): Type | null;
  getMetadata(id: NodeId, key: string): MetadataValue | undefined;
  ancestors(id: NodeId): readonly Readonly<AstNode>[];
  depth(id: NodeId): number;
}

export class SyntaxTree implements ReadonlySyntaxTree {
  private readonly pool: ArenaPool<AstNode>;

  constructor(arena: Arena) {
    this.pool = arena.pool<AstNode>();
  }


  /**
   * Create a node. `make` receives the structural fields (with the id
   * already assigned) and adds the kind and payload.
   */
  create<N extends BaseNode>(location: SourceLocation, make: (base: NodeBase) => N): N {
    const base: NodeBase = {
      id: this.pool.nextHandle(),
      location,
      parent: null,
      children: [],
      attributes: [],
      type: null,
      flags: NodeFlags.None,
      metadata: new Map(),
    };
    const node = make(base);
    if (!isAstNode(node)) {
      throw new Error(`unknown node kind '${node.kind}'`);
    }
    this.pool.construct(node);
    return node;
  }

  /** Resolve a node id. Throws on an id that is unknown or predates an arena reset. */
  node(id: NodeId): AstNode {
    const node = this.pool.get(id);
    if (!node) {
      throw new Error(`unknown or stale node id ${id}`);
    }
    return node;
  }

  tryNode(id: NodeId): AstNode | undefined {
    return this.pool.get(id);
  }

  get size(): number {
    return this.pool.size;
  }

  nodes(): IterableIterator<AstNode> {
    return this.pool.values();
  }

  // ─── Children ─────────────────────────────────────────────────────────────

  /** Append `child` to `parent`. A `null` child is ignored; a child is moved from any previous parent. */
  addChild(parent: NodeId, child: NodeId | null): void {
    if (child === null) return;
    const parentNode = this.node(parent);
    const childNode = this.adopt(parentNode, child);
    parentNode.children.push(childNode.id);
  }

  insertChild(parent: NodeId, index: number, child: NodeId): void {
    const parentNode = this.node(parent);
    const childNode = this.adopt(parentNode, child);
    const at = Math.max(0, Math.min(index, parentNode.children.length));
    parentNode.children.splice(at, 0, childNode.id);
  }

  /** Detach `child` from `parent`. Returns `false` if it was not a child. */
  removeChild(parent: NodeId, child: NodeId): boolean {
    const parentNode = this.node(parent);
    const index = parentNode.children.indexOf(child);
    if (index === -1) return false;
    parentNode.children.splice(index, 1);
    this.node(child).parent = null;
    return true;
  }

  /** Put `next` where `old` was. Returns `false` if `old` is not a child of `parent`. */
  replaceChild(parent: NodeId, old: NodeId, next: NodeId): boolean {
    const parentNode = this.node(parent);
    if (!parentNode.children.includes(old)) return false;
    if (old === next) return true;
    const nextNode = this.adopt(parentNode, next);
    const index = parentNode.children.indexOf(old);
    parentNode.children[index] = nextNode.id;
    this.node(old).parent = null;
    return true;
  }

  /** Child at `index`, or `null` when out of range. */
  child(parent: NodeId, index: number): AstNode | null {
    const id = this.node(parent).children[index];
    return id === undefined ? null : this.node(id);
  }

  firstChild(parent: NodeId): AstNode | null {
    return this.child(parent, 0);
  }

  lastChild(parent: NodeId): AstNode | null {
    return this.child(parent, this.node(parent).children.length - 1);
  }

  childCount(parent: NodeId): number {
    return this.node(parent).children.length;
  }

  hasChildren(parent: NodeId): boolean {
    return this.node(parent).children.length > 0;
  }

  childNodes(parent: NodeId): AstNode[] {
    return this.node(parent).children.map((id) => this.node(id));
  }

  // ─── Attributes ───────────────────────────────────────────────────────────

  addAttribute(owner: NodeId, attribute: NodeId | null): void {
    if (attribute === null) return;
    const ownerNode = this.node(owner);
    const attrNode = this.node(attribute);
    attrNode.parent = owner;
    ownerNode.attributes.push(attrNode.id);
  }

  removeAttribute(owner: NodeId, attribute: NodeId): boolean {
    const ownerNode = this.node(owner);
    const index = ownerNode.attributes.indexOf(attribute);
    if (index === -1) return false;
    ownerNode.attributes.splice(index, 1);
    this.node(attribute).parent = null;
    return true;
  }

  attribute(owner: NodeId, index: number): AstNode | null {
    const id = this.node(owner).attributes[index];
    return id === undefined ? null : this.node(id);
  }

  attributeCount(owner: NodeId): number {
    return this.node(owner).attributes.length;
  }

  /** First attribute named `name`. */
  findAttribute(owner: NodeId, name: InternedString): AstNode | null {
    for (const id of this.node(owner).attributes) {
      const attr = this.node(id);
      if (nodeName(attr) === name) return attr;
    }
    return null;
  }

  // ─── Flags ────────────────────────────────────────────────────────────────

  hasFlag(id: NodeId, flag: Flags): boolean {
    return hasFlag(this.node(id).flags, flag);
  }

  hasAnyFlag(id: NodeId, mask: Flags): boolean {
    return hasAnyFlag(this.node(id).flags, mask);
  }

  hasAllFlags(id: NodeId, mask: Flags): boolean {
    return hasAllFlags(this.node(id).flags, mask);
  }

  setFlag(id: NodeId, flag: Flags): void {
    this.node(id).flags |= flag;
  }

  clearFlag(id: NodeId, flag: Flags): void {
    this.node(id).flags &= ~flag;
  }

  toggleFlag(id: NodeId, flag: Flags): void {
    this.node(id).flags ^= flag;
  }

  clearAllFlags(id: NodeId): void {
    this.node(id).flags = NodeFlags.None;
  }

  // ─── Resolved Types ───────────────────────────────────────────────────────

  setType(id: NodeId, type: Type | null): void {
    this.node(id).type = type;
  }

  typeOf(id: NodeId): Type | null {
    return this.node(id).type;
  }

  // ─── Metadata ─────────────────────────────────────────────────────────────

  setMetadata(id: NodeId, key: string, value: MetadataValue): void {
    this.node(id).metadata.set(key, value);
  }

  getMetadata(id: NodeId, key: string): MetadataValue | undefined {
    return this.node(id).metadata.get(key);
  }

  /** Metadata value under `key` if it has the requested kind. */
  getMetadataAs<K extends MetadataKind>(
    id: NodeId,
    key: string,
    kind: K,
  ): MetadataTypes[K] | undefined {
    const value = this.node(id).metadata.get(key);
    if (value === undefined) return undefined;
    const read = METADATA_READERS[kind];
    return read(value);
  }

  hasMetadata(id: NodeId, key: string): boolean {
    return this.node(id).metadata.has(key);
  }

  removeMetadata(id: NodeId, key: string): boolean {
    return this.node(id).metadata.delete(key);
  }

  // ─── Ancestry ─────────────────────────────────────────────────────────────

  /** Parent chain of `id`, nearest first. */
  ancestors(id: NodeId): AstNode[] {
    const result: AstNode[] = [];
    let current = this.node(id).parent;
    while (current !== null) {
      const node = this.node(current);
      result.push(node);
      current = node.parent;
    }
    return result;
  }

  depth(id: NodeId): number {
    return this.ancestors(id).length;
  }

  root(id: NodeId): AstNode {
    const chain = this.ancestors(id);
    return chain[chain.length - 1] ?? this.node(id);
  }

  private adopt(parent: AstNode, child: NodeId): AstNode {
    if (child === parent.id || this.ancestors(parent.id).some((n) => n.id === child)) {
      throw new Error(`adding node ${child} under ${parent.id} would create a cycle`);
    }
    const childNode = this.node(child);
    if (childNode.parent !== null) {
      const previous = this.node(childNode.parent);
      const index = previous.children.indexOf(child);
      if (index !== -1) previous.children.splice(index, 1);
    }
    childNode.parent = parent.id;
    return childNode;
  }
}
