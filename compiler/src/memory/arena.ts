/**
 * Arena allocator backing one compilation unit.
 *
 * Raw bytes are bump-allocated from a chain of fixed-size blocks. Objects
 * (nodes, symbols) live in typed pools registered with the arena and are
 * addressed through numeric handles, so nothing outside the arena holds an
 * owning reference. `reset()` reclaims everything for reuse without
 * releasing blocks; `clear()` releases them as well. Both invalidate every
 * handle issued before the call.
 */

export const DEFAULT_BLOCK_SIZE = 64 * 1024;

/** Index bits reserved in a handle; the generation occupies the rest. */
const HANDLE_INDEX_SPAN = 2 ** 24;

/** Generation-checked index into an arena pool. */
export type Handle = number;

export interface MemoryBlock {
  readonly data: ArrayBuffer;
  readonly size: number;
  used: number;
}

export interface ArenaAllocation {
  /** Index of the block in the arena's chain. */
  block: number;
  offset: number;
  size: number;
  bytes: Uint8Array;
}

export interface ArenaOptions {
  blockSize?: number;
}

export function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

export function handleIndex(handle: Handle): number {
  return handle % HANDLE_INDEX_SPAN;
}

export function handleGeneration(handle: Handle): number {
  return Math.floor(handle / HANDLE_INDEX_SPAN);
}

export class Arena {
  readonly blockSize: number;
  private blocks: MemoryBlock[] = [];
  private current = 0;
  private pools: ArenaPool<unknown>[] = [];
  private gen = 0;

  constructor(options: ArenaOptions = {}) {
    const blockSize = options.blockSize ?? DEFAULT_BLOCK_SIZE;
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
      throw new Error(`invalid arena block size: ${blockSize}`);
    }
    this.blockSize = blockSize;
  }

  /** Bumped by every `reset()` and `clear()`; handles carry it. */
  get generation(): number {
    return this.gen;
  }

  /**
   * Allocate `size` bytes aligned to `alignment`.
   * Returns `null` for a zero-sized request.
   */
  allocate(size: number, alignment = 8): ArenaAllocation | null {
    if (!Number.isInteger(size) || size < 0) {
      throw new Error(`invalid allocation size: ${size}`);
    }
    if (!isPowerOfTwo(alignment)) {
      throw new Error(`alignment must be a power of two, got ${alignment}`);
    }
    if (size === 0) return null;

    // Blocks after the cursor are only present after a reset; reuse them first.
    while (this.current < this.blocks.length) {
      const block = this.blocks[this.current];
      if (block) {
        const offset = alignUp(block.used, alignment);
        if (offset + size <= block.size) {
          return this.take(this.current, block, offset, size);
        }
      }
      if (this.current + 1 >= this.blocks.length) break;
      this.current++;
    }

    const block = this.appendBlock(Math.max(size + alignment, this.blockSize));
    return this.take(this.current, block, 0, size);
  }

  /** Create a typed object pool whose handles follow this arena's lifetime. */
  pool<T>(): ArenaPool<T> {
    const pool = new ArenaPool<T>(this);
    this.pools.push(pool);
    return pool;
  }

  reset(): void {
    for (const block of this.blocks) {
      block.used = 0;
    }
    this.current = 0;
    this.releaseObjects();
  }

  clear(): void {
    this.blocks = [];
    this.current = 0;
    this.releaseObjects();
  }

  get blockCount(): number {
    return this.blocks.length;
  }

  get totalAllocated(): number {
    return this.blocks.reduce((sum, b) => sum + b.size, 0);
  }

  get totalUsed(): number {
    return this.blocks.reduce((sum, b) => sum + b.used, 0);
  }

  /** Share of reserved bytes not handed out, as a percentage. */
  get wastePercentage(): number {
    const allocated = this.totalAllocated;
    if (allocated === 0) return 0;
    return ((allocated - this.totalUsed) * 100) / allocated;
  }

  private appendBlock(size: number): MemoryBlock {
    const block: MemoryBlock = { data: new ArrayBuffer(size), size, used: 0 };
    this.blocks.push(block);
    this.current = this.blocks.length - 1;
    return block;
  }

  private take(index: number, block: MemoryBlock, offset: number, size: number): ArenaAllocation {
    block.used = offset + size;
    return { block: index, offset, size, bytes: new Uint8Array(block.data, offset, size) };
  }

  private releaseObjects(): void {
    this.gen++;
    for (const pool of this.pools) {
      pool.release();
    }
  }
}

/** Objects of one type owned by an arena and addressed by handle. */
export class ArenaPool<T> {
  private items: T[] = [];

  constructor(private readonly arena: Arena) {}

  construct(value: T): Handle {
    const index = this.items.length;
    if (index >= HANDLE_INDEX_SPAN) {
      throw new Error("arena pool exhausted");
    }
    this.items.push(value);
    return this.arena.generation * HANDLE_INDEX_SPAN + index;
  }

  /** Handle the next `construct` call will return. */
  nextHandle(): Handle {
    return this.arena.generation * HANDLE_INDEX_SPAN + this.items.length;
  }

  /** Resolve a handle; `undefined` if it is unknown or predates a reset. */
  get(handle: Handle): T | undefined {
    if (!Number.isInteger(handle) || handle < 0) return undefined;
    if (handleGeneration(handle) !== this.arena.generation) return undefined;
    return this.items[handleIndex(handle)];
  }

  has(handle: Handle): boolean {
    return this.get(handle) !== undefined;
  }

  get size(): number {
    return this.items.length;
  }

  values(): IterableIterator<T> {
    return this.items.values();
  }

  /** @internal called by the owning arena */
  release(): void {
    this.items = [];
  }
}
