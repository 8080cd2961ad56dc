import { GroupingPolicy, Key, MAX_COLS, MAX_ROWS } from "./types";
import { Keyboard } from "./Keyboard";
import { LayoutParseError, MatrixCapacityError } from "./errors";

/** Matrix row of a key: the grid cell its centre falls in. */
export function rowOf(key: Key): number {
  return Math.floor(key.yUnit - 0.5);
}

/** Column of a key under the positional policy. */
export function positionalColumnOf(key: Key): number {
  return Math.floor(key.xUnit - 0.5);
}

function describeKey(key: Key): string {
  return `key ${key.index} "${key.label}"`;
}

/**
 * Assign every key a matrix row and column and fill the keyboard's row and
 * column collections.
 *
 * Rows are walked top to bottom and each row's keys left to right, so both
 * collections receive key indices in x-sorted order per row. Under the
 * sequential policy a key's column is its position in that order; under the
 * positional policy it comes from the key's x coordinate.
 *
 * All capacity checks run before any key is touched.
 */
export function groupKeys(keyboard: Keyboard, policy: GroupingPolicy): void {
  const byRow: Key[][] = [];

  for (const key of keyboard.keys) {
    const row = rowOf(key);
    if (row < 0) {
      throw new LayoutParseError(`${describeKey(key)} lies above the top edge of the layout (row ${row})`);
    }
    if (row >= MAX_ROWS) {
      throw new MatrixCapacityError("row", row, MAX_ROWS, `${describeKey(key)} falls in row ${row}`);
    }
    if (!byRow[row]) byRow[row] = [];
    byRow[row].push(key);
  }

  const assignments: { key: Key; row: number; col: number }[] = [];

  for (let row = 0; row < byRow.length; row++) {
    const keys = byRow[row];
    if (!keys) continue;

    if (policy === "sequential" && keys.length >= MAX_COLS) {
      throw new MatrixCapacityError("column", keys.length, MAX_COLS, `row ${row} holds ${keys.length} keys`);
    }

    const sorted = [...keys].sort((a, b) => a.xUnit - b.xUnit);
    sorted.forEach((key, position) => {
      const col = policy === "sequential" ? position : positionalColumnOf(key);
      if (col < 0) {
        throw new LayoutParseError(`${describeKey(key)} lies left of the layout's left edge (column ${col})`);
      }
      if (col >= MAX_COLS) {
        throw new MatrixCapacityError("column", col, MAX_COLS, `${describeKey(key)} falls in column ${col}`);
      }
      assignments.push({ key, row, col });
    });
  }

  for (const { key, row, col } of assignments) {
    key.row = row;
    key.col = col;
    keyboard.addKeyToRow(row, key.index);
    keyboard.addKeyToColumn(col, key.index);
  }
}
