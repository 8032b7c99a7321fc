/**
 * Region allocator backing parser-owned AST storage.
 *
 * Allocation bumps an offset inside the current block; nothing is freed individually. The whole
 * region is reclaimed by `reset()` (blocks kept for reuse) or `release()` (arena unusable afterwards).
 */

export const DEFAULT_ARENA_BLOCK_SIZE = 65536;

export interface ArenaOptions {
  /** Size of each block in bytes. */
  blockSize?: number;
  /**
   * Upper bound on total block bytes. Defaults to one block when the arena is not growable and to
   * unbounded when it is.
   */
  capacity?: number;
  /** Chain further blocks when the current one is full (default `true`). */
  growable?: boolean;
}

/**
 * An allocated region. `block` and `offset` never change for the life of the arena.
 */
export interface ArenaBlock {
  block: number;
  offset: number;
  size: number;
}

export class ArenaCapacityError extends Error {
  readonly requested: number;
  readonly used: number;
  readonly capacity: number;

  constructor(requested: number, used: number, capacity: number) {
    super(`Arena capacity exceeded: requested ${requested} bytes with ${used}/${capacity} in use`);
    this.name = 'ArenaCapacityError';
    this.requested = requested;
    this.used = used;
    this.capacity = capacity;
  }
}

export class ArenaReleasedError extends Error {
  constructor() {
    super('Arena has been released');
    this.name = 'ArenaReleasedError';
  }
}

function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

function utf8Length(text: string): number {
  let bytes = 0;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp < 0x80) bytes += 1;
    else if (cp < 0x800) bytes += 2;
    else if (cp < 0x10000) bytes += 3;
    else bytes += 4;
  }
  return bytes;
}

export class Arena {
  readonly blockSize: number;
  readonly capacity: number;
  readonly growable: boolean;

  /** Bytes in use per block; `blocks.length` is the number of blocks allocated so far. */
  private blocks: number[] = [0];
  private current = 0;
  private usedBytes = 0;
  private peak = 0;
  private readonly pool = new Map<string, string>();
  private isReleased = false;

  constructor(options: ArenaOptions = {}) {
    const blockSize = options.blockSize ?? DEFAULT_ARENA_BLOCK_SIZE;
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
      throw new RangeError(`Arena block size must be a positive integer, got ${blockSize}`);
    }
    this.blockSize = blockSize;
    this.growable = options.growable ?? true;
    this.capacity =
      options.capacity ?? (this.growable ? Number.POSITIVE_INFINITY : this.blockSize);
    if (this.capacity < this.blockSize) {
      throw new RangeError(
        `Arena capacity (${this.capacity}) must be at least one block (${this.blockSize})`,
      );
    }
  }

  /** Bytes handed out since the last reset, alignment padding included. */
  get used(): number {
    return this.usedBytes;
  }

  get peakUsed(): number {
    return this.peak;
  }

  get blockCount(): number {
    return this.blocks.length;
  }

  get released(): boolean {
    return this.isReleased;
  }

  /**
   * Reserve `size` bytes aligned to `alignment`.
   *
   * @throws ArenaCapacityError when neither the current block nor a newly chained one can hold it.
   * @throws ArenaReleasedError after {@link release}.
   */
  allocate(size: number, alignment = 8): ArenaBlock {
    if (this.isReleased) throw new ArenaReleasedError();
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Arena allocation size must be a positive integer, got ${size}`);
    }
    if (!isPowerOfTwo(alignment)) {
      throw new RangeError(`Arena alignment must be a power of two, got ${alignment}`);
    }

    const inBlock = this.blocks[this.current] ?? 0;
    const offset = alignUp(inBlock, alignment);
    if (offset + size <= this.blockSize) {
      return this.commit(this.current, inBlock, offset, size);
    }

    if (!this.growable || size > this.blockSize) {
      throw new ArenaCapacityError(size, this.usedBytes, this.capacity);
    }
    const next = this.current + 1;
    if (next >= this.blocks.length) {
      if ((next + 1) * this.blockSize > this.capacity) {
        throw new ArenaCapacityError(size, this.usedBytes, this.capacity);
      }
      this.blocks.push(0);
    }
    this.current = next;
    return this.commit(next, 0, 0, size);
  }

  /**
   * Copy `text` into arena storage and return the stored copy. Repeated text shares one copy.
   */
  intern(text: string): string {
    if (this.isReleased) throw new ArenaReleasedError();
    const existing = this.pool.get(text);
    if (existing !== undefined) return existing;
    this.allocate(utf8Length(text) + 1, 1);
    const copy = text.slice(0);
    this.pool.set(copy, copy);
    return copy;
  }

  /**
   * Reclaim every allocation. Blocks stay allocated and are reused from the first one.
   */
  reset(): void {
    if (this.isReleased) throw new ArenaReleasedError();
    this.blocks = this.blocks.map(() => 0);
    this.current = 0;
    this.usedBytes = 0;
    this.pool.clear();
  }

  /**
   * Give up the whole region. Objects allocated from the arena must not be used afterwards.
   */
  release(): void {
    this.isReleased = true;
    this.blocks = [];
    this.current = 0;
    this.usedBytes = 0;
    this.pool.clear();
  }

  private commit(block: number, before: number, offset: number, size: number): ArenaBlock {
    const after = offset + size;
    this.blocks[block] = after;
    this.usedBytes += after - before;
    if (this.usedBytes > this.peak) this.peak = this.usedBytes;
    return { block, offset, size };
  }
}
