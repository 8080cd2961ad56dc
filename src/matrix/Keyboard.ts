import { Key, KeyboardMeta } from "./types";
import { KeyBlockCollection } from "./KeyBlockCollection";

/**
 * A parsed keyboard layout: its keys, their matrix grouping and the
 * layout metadata.
 *
 * One instance is created per generation run and handed from stage to stage.
 */
export class Keyboard {
  readonly keys: Key[] = [];
  readonly rows = new KeyBlockCollection();
  readonly columns = new KeyBlockCollection();
  name: string;
  author: string;

  constructor(meta: Partial<KeyboardMeta> = {}) {
    this.name = meta.name ?? "";
    this.author = meta.author ?? "";
  }

  addKeyToRow(rowIndex: number, keyIndex: number): void {
    this.rows.add(rowIndex, keyIndex);
  }

  addKeyToColumn(colIndex: number, keyIndex: number): void {
    this.columns.add(colIndex, keyIndex);
  }

  /** Resolve a key by its parse index. */
  key(index: number): Key {
    const key = this.keys[index];
    if (!key) {
      throw new RangeError(`No key with index ${index} (keyboard has ${this.keys.length} keys)`);
    }
    return key;
  }

  /** Keys of one row bucket, in stored order. */
  rowKeys(rowIndex: number): Key[] {
    return this.rows.get(rowIndex).map(i => this.key(i));
  }

  /** Keys of one column bucket, in stored order. */
  columnKeys(colIndex: number): Key[] {
    return this.columns.get(colIndex).map(i => this.key(i));
  }

  /** Human readable summary lines, as printed after a run. */
  describe(): string[] {
    return [
      `Name: ${this.name}`,
      `Author: ${this.author}`,
      `Contains: ${this.keys.length} keys, grouped into ${this.rows.length} rows and ${this.columns.length} columns`,
    ];
  }
}
