import { describe, it, expect } from "vitest";
import { parseKle } from "../matrix/KleParser";
import { groupKeys, positionalColumnOf, rowOf } from "../matrix/MatrixGrouper";
import { KeyBlockCollection } from "../matrix/KeyBlockCollection";
import { Keyboard } from "../matrix/Keyboard";
import { LayoutParseError, MatrixCapacityError } from "../matrix/errors";
import { MAX_COLS, MAX_ROWS } from "../matrix/types";

function rowOfKeys(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `K${i}`);
}

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("KeyBlockCollection", () => {
  it("creates missing buckets on demand", () => {
    const blocks = new KeyBlockCollection();
    blocks.add(2, 5);

    expect(blocks.length).toBe(3);
    expect(blocks.get(0)).toEqual([]);
    expect(blocks.get(2)).toEqual([5]);
    expect(blocks.get(10)).toEqual([]);
  });

  it("keeps insertion order inside a bucket", () => {
    const blocks = new KeyBlockCollection();
    blocks.add(0, 3);
    blocks.add(0, 1);
    expect(blocks.blocks).toEqual([[3, 1]]);
  });

  it("rejects negative indices", () => {
    expect(() => new KeyBlockCollection().add(-1, 0)).toThrow(RangeError);
  });
});

describe("Keyboard", () => {
  it("summarises keys, rows and columns", () => {
    const keyboard = parseKle([{ name: "Pad", author: "test-author" }, ["A", "B"], ["C"]]);
    groupKeys(keyboard, "sequential");

    expect(keyboard.describe()).toEqual([
      "Name: Pad",
      "Author: test-author",
      "Contains: 3 keys, grouped into 2 rows and 2 columns",
    ]);
  });

  it("throws on unknown key indices", () => {
    expect(() => new Keyboard().key(0)).toThrow(RangeError);
  });
});

describe("groupKeys", () => {
  it("numbers columns by position in the row under the sequential policy", () => {
    const keyboard = parseKle([["Q", "W", "E"]]);
    groupKeys(keyboard, "sequential");

    expect(keyboard.keys.map(k => k.row)).toEqual([0, 0, 0]);
    expect(keyboard.keys.map(k => k.col)).toEqual([0, 1, 2]);
    expect(keyboard.rows.blocks).toEqual([[0, 1, 2]]);
    expect(keyboard.columns.blocks).toEqual([[0], [1], [2]]);
  });

  it("derives columns from x under the positional policy", () => {
    const keyboard = parseKle([["A", { x: 2 }, "B"]]);
    groupKeys(keyboard, "positional");

    expect(keyboard.keys.map(k => k.col)).toEqual([0, 3]);
    expect(keyboard.columns.length).toBe(4);
    expect(keyboard.columns.get(1)).toEqual([]);
  });

  it("joins keys of different rows that share a positional column", () => {
    const keyboard = parseKle([["A", "B"], ["C"]]);
    groupKeys(keyboard, "positional");
    expect(keyboard.columnKeys(0).map(k => k.label)).toEqual(["A", "C"]);
  });

  it("orders each row by x, not by parse order", () => {
    const keyboard = parseKle([["A", { x: -2 }, "B"]]);
    groupKeys(keyboard, "sequential");

    expect(keyboard.rows.get(0)).toEqual([1, 0]);
    expect(keyboard.key(1).col).toBe(0);
    expect(keyboard.key(0).col).toBe(1);
  });

  it("fails on the eighth row", () => {
    const layout = Array.from({ length: MAX_ROWS + 1 }, () => ["K"]);
    const err = captureError(() => groupKeys(parseKle(layout), "sequential"));

    expect(err).toBeInstanceOf(MatrixCapacityError);
    if (err instanceof MatrixCapacityError) {
      expect(err.axis).toBe("row");
      expect(err.value).toBe(7);
      expect(err.limit).toBe(MAX_ROWS);
    }
  });

  it("accepts a sequential row just below the column limit", () => {
    const keyboard = parseKle([rowOfKeys(MAX_COLS - 1)]);
    groupKeys(keyboard, "sequential");
    expect(keyboard.columns.length).toBe(MAX_COLS - 1);
  });

  it("fails when a sequential row reaches the column limit", () => {
    const err = captureError(() => groupKeys(parseKle([rowOfKeys(MAX_COLS)]), "sequential"));

    expect(err).toBeInstanceOf(MatrixCapacityError);
    if (err instanceof MatrixCapacityError) {
      expect(err.axis).toBe("column");
      expect(err.value).toBe(18);
    }
  });

  it("fails when a positional column is out of range", () => {
    const err = captureError(() => groupKeys(parseKle([[{ x: 18 }, "A"]]), "positional"));

    expect(err).toBeInstanceOf(MatrixCapacityError);
    if (err instanceof MatrixCapacityError) {
      expect(err.axis).toBe("column");
      expect(err.value).toBe(18);
    }
  });

  it("rejects keys left of the layout under the positional policy", () => {
    expect(() => groupKeys(parseKle([[{ x: -1 }, "A"]]), "positional")).toThrow(LayoutParseError);
  });

  it("rejects keys above the layout", () => {
    expect(() => groupKeys(parseKle([[{ y: -1 }, "A"]]), "sequential")).toThrow(LayoutParseError);
  });

  it("leaves the keyboard untouched when grouping fails", () => {
    const keyboard = parseKle([["A"], rowOfKeys(MAX_COLS)]);

    expect(() => groupKeys(keyboard, "sequential")).toThrow(MatrixCapacityError);
    expect(keyboard.key(0).row).toBe(-1);
    expect(keyboard.rows.length).toBe(0);
    expect(keyboard.columns.length).toBe(0);
  });

  it("keeps every row within bounds", () => {
    const keyboard = parseKle([["A", "B"], [{ y: 0.75 }, "C"], ["D", "E", "F"]]);
    groupKeys(keyboard, "sequential");

    for (const key of keyboard.keys) {
      expect(key.row).toBeGreaterThanOrEqual(0);
      expect(key.row).toBeLessThan(MAX_ROWS);
      expect(key.row).toBe(rowOf(key));
    }
  });
});

describe("row and column helpers", () => {
  it("floor the key centre minus half a unit", () => {
    const [key] = parseKle([[{ x: 1.25, y: 2 }, "A"]]).keys;
    expect(rowOf(key)).toBe(2);
    expect(positionalColumnOf(key)).toBe(1);
  });
});
