import type { NodeId } from "./nodes.ts";

/**
 * Per-pass typed annotations keyed by node id.
 *
 * A pass that needs to remember something about nodes (a resolved symbol,
 * a constant value, a lowering slot) owns one of these instead of writing
 * untyped entries onto the nodes themselves.
 */
export class SideTable<V> {
  private readonly entries = new Map<NodeId, V>();

  constructor(readonly name: string) {}

  get(id: NodeId): V | undefined {
    return this.entries.get(id);
  }

  set(id: NodeId, value: V): this {
    this.entries.set(id, value);
    return this;
  }

  has(id: NodeId): boolean {
    return this.entries.has(id);
  }

  delete(id: NodeId): boolean {
    return this.entries.delete(id);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  [Symbol.iterator](): IterableIterator<[NodeId, V]> {
    return this.entries.entries();
  }
}
