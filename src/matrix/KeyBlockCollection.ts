/**
 * Ordered buckets of key indices, used for matrix rows and columns.
 *
 * Bucket `i` comes into existence the first time index `i` is referenced;
 * any missing buckets before it are created empty. Buckets are never removed.
 */
export class KeyBlockCollection {
  private _blocks: number[][] = [];

  /** Append a key to a bucket, growing the collection as needed. */
  add(blockIndex: number, keyIndex: number): void {
    if (!Number.isInteger(blockIndex) || blockIndex < 0) {
      throw new RangeError(`Block index must be a non-negative integer, got ${blockIndex}`);
    }
    while (this._blocks.length <= blockIndex) {
      this._blocks.push([]);
    }
    this._blocks[blockIndex].push(keyIndex);
  }

  /** Key indices of one bucket; empty for buckets that were never created. */
  get(blockIndex: number): ReadonlyArray<number> {
    return this._blocks[blockIndex] ?? [];
  }

  get length(): number {
    return this._blocks.length;
  }

  get blocks(): ReadonlyArray<ReadonlyArray<number>> {
    return this._blocks;
  }
}
