import { describe, it, expect } from "vitest";
import { parseKle } from "../matrix/KleParser";
import { groupKeys } from "../matrix/MatrixGrouper";
import { NetTable, UNKNOWN_NET, annotateKeyNets, defineMatrixNets, diodeNetName } from "../matrix/NetTable";
import { UnresolvedNetError } from "../matrix/errors";
import { controlLabel, controlPins } from "../kicad/ControlCircuit";

function matrixTable(keyCount: number): NetTable {
  const nets = new NetTable();
  defineMatrixNets(nets, keyCount);
  return nets;
}

describe("NetTable", () => {
  it("numbers nets from 1 in insertion order", () => {
    const nets = new NetTable();
    expect(nets.addNet("A")).toBe(1);
    expect(nets.addNet("B")).toBe(2);
    expect(nets.names()).toEqual(["A", "B"]);
  });

  it("ignores names it already knows", () => {
    const nets = new NetTable();
    nets.addNet("A");
    nets.addNet("B");
    expect(nets.addNet("A")).toBe(1);
    expect(nets.size).toBe(2);
  });

  it("grows by at most one entry per call", () => {
    const nets = new NetTable();
    for (const name of ["A", "B", "A", "C", "B", "C", "D"]) {
      const before = nets.size;
      nets.addNet(name);
      expect(nets.size - before).toBeLessThanOrEqual(1);
    }
    expect(nets.size).toBe(4);
  });

  it("answers 0 and UNKNOWN for missing entries", () => {
    const nets = new NetTable();
    nets.addNet("A");
    expect(nets.numberOf("Z")).toBe(0);
    expect(nets.nameOf(0)).toBe(UNKNOWN_NET);
    expect(nets.nameOf(2)).toBe(UNKNOWN_NET);
    expect(nets.nameOf(1.5)).toBe(UNKNOWN_NET);
  });

  it("round-trips every registered number", () => {
    const nets = matrixTable(5);
    for (let n = 1; n <= nets.size; n++) {
      expect(nets.numberOf(nets.nameOf(n))).toBe(n);
    }
  });

  it("throws for required nets that are missing", () => {
    expect(() => new NetTable().require("/Row0", "row of key 0")).toThrow(UnresolvedNetError);
  });
});

describe("defineMatrixNets", () => {
  it("declares control, row, column and diode nets in a fixed order", () => {
    const nets = matrixTable(3);

    expect(nets.size).toBe(14 + 7 + 18 + 3);
    expect(nets.numberOf("GND")).toBe(1);
    expect(nets.numberOf("VCC")).toBe(2);
    expect(nets.numberOf("/Reset")).toBe(14);
    expect(nets.numberOf("/Row0")).toBe(15);
    expect(nets.numberOf("/Row6")).toBe(21);
    expect(nets.numberOf("/Col0")).toBe(22);
    expect(nets.numberOf("/Col17")).toBe(39);
    expect(nets.numberOf("Net-(D1-Pad2)")).toBe(40);
    expect(nets.numberOf(diodeNetName(2))).toBe(42);
  });

  it("builds identical tables for identical input", () => {
    expect(matrixTable(4).names()).toEqual(matrixTable(4).names());
  });
});

describe("annotateKeyNets", () => {
  it("records row, column and diode nets on each key", () => {
    const keyboard = parseKle([["Q", "W", "E"]]);
    groupKeys(keyboard, "sequential");
    const nets = matrixTable(keyboard.keys.length);
    annotateKeyNets(keyboard, nets);

    const w = keyboard.key(1);
    expect(w.rowNet).toBe(15);
    expect(w.colNet).toBe(23);
    expect(w.diodeNet).toBe(41);
  });

  it("fails for keys that were never grouped", () => {
    const keyboard = parseKle([["Q"]]);
    expect(() => annotateKeyNets(keyboard, matrixTable(1))).toThrow(UnresolvedNetError);
  });
});

describe("control header", () => {
  it("resolves power, reset and matrix nets by offset", () => {
    const pins = controlPins(matrixTable(1), 0);

    expect(pins).toHaveLength(28);
    expect(pins[0]).toEqual({ pin: "1", netNumber: 1, netName: "GND" });
    expect(pins[1]).toEqual({ pin: "2", netNumber: 2, netName: "VCC" });
    expect(pins[2]).toEqual({ pin: "3", netNumber: 14, netName: "/Reset" });
    expect(pins[3]).toEqual({ pin: "4", netNumber: 15, netName: "/Row0" });
    expect(pins[10]).toEqual({ pin: "11", netNumber: 22, netName: "/Col0" });
    expect(pins[27]).toEqual({ pin: "28", netNumber: 39, netName: "/Col17" });
  });

  it("fails when an offset runs past the table", () => {
    expect(() => controlPins(matrixTable(1), 5)).toThrow(UnresolvedNetError);
  });

  it("labels power nets globally and matrix nets locally", () => {
    expect(controlLabel("GND")).toEqual({ text: "GND", global: true });
    expect(controlLabel("/Row3")).toEqual({ text: "Row3", global: false });
  });
});
