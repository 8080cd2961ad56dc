import { describe, it, expect } from "vitest";
import { parseKle } from "../matrix/KleParser";
import { groupKeys } from "../matrix/MatrixGrouper";
import { NetTable, annotateKeyNets, defineMatrixNets } from "../matrix/NetTable";
import { Keyboard } from "../matrix/Keyboard";
import { GroupingPolicy } from "../matrix/types";
import { UnresolvedNetError } from "../matrix/errors";
import { GEOMETRY, clampToFootprint, columnPath, placeKeyboard, switchReference } from "../kicad/Placement";

function prepared(layout: unknown[], policy: GroupingPolicy = "sequential"): Keyboard {
  const keyboard = parseKle(layout);
  groupKeys(keyboard, policy);
  const nets = new NetTable();
  defineMatrixNets(nets, keyboard.keys.length);
  annotateKeyNets(keyboard, nets);
  return keyboard;
}

describe("switchReference", () => {
  it("scales unit coordinates by the key pitch from the origin", () => {
    const keyboard = prepared([["A", "B"]]);
    const b = switchReference(keyboard.key(1));
    expect(b.x).toBeCloseTo(53.975);
    expect(b.y).toBeCloseTo(34.925);
  });
});

describe("clampToFootprint", () => {
  it("limits x to the switch footprint", () => {
    const center = { x: 50, y: 0 };
    expect(clampToFootprint(100, center)).toBe(57);
    expect(clampToFootprint(40, center)).toBe(43);
    expect(clampToFootprint(50, center)).toBe(50);
  });
});

describe("placeKeyboard", () => {
  const keyboard = prepared([["A", "B"], ["C"]]);
  const result = placeKeyboard(keyboard, { routing: true });

  it("places a switch and a diode per key", () => {
    expect(result.switches.map(s => s.ref)).toEqual(["SW1", "SW2", "SW3"]);
    expect(result.diodes.map(d => d.ref)).toEqual(["D1", "D2", "D3"]);

    const d1 = result.diodes[0];
    expect(d1.at.x).toBeCloseTo(41.275);
    expect(d1.at.y).toBeCloseTo(37.465);
    expect(d1.rowNet).toBe(15);
    expect(d1.diodeNet).toBe(40);
  });

  it("carries nets and legends on the switch records", () => {
    expect(result.switches[2]).toMatchObject({ keyIndex: 2, legend: "C", colNet: 22, diodeNet: 42, widthUnits: 1 });
  });

  it("emits diode, row and column traces in that order", () => {
    expect(result.traces.map(t => t.kind)).toEqual([
      "diode", "diode", "diode", "row", "column", "column", "column",
    ]);
  });

  it("routes the diode trace on the back copper", () => {
    const trace = result.traces[0];
    expect(trace.layer).toBe("B.Cu");
    expect(trace.net).toBe(40);
    expect(trace.width).toBe(GEOMETRY.traceWidth);
    expect(trace.start.x).toBeCloseTo(37.465);
    expect(trace.start.y).toBeCloseTo(29.845);
    expect(trace.end.x).toBeCloseTo(41.275);
    expect(trace.end.y).toBeCloseTo(35.815);
  });

  it("joins row contacts with a single back-copper segment", () => {
    const row = result.traces[3];
    expect(row.layer).toBe("B.Cu");
    expect(row.net).toBe(15);
    expect(row.target).toBe(1);
    expect(row.start.x).toBeCloseTo(41.275);
    expect(row.start.y).toBeCloseTo(39.115);
    expect(row.end.x).toBeCloseTo(60.325);
    expect(row.end.y).toBeCloseTo(39.115);
  });

  it("routes columns in three front-copper segments", () => {
    const [out, across, into] = result.traces.slice(4);

    for (const seg of [out, across, into]) {
      expect(seg.layer).toBe("F.Cu");
      expect(seg.net).toBe(22);
    }
    expect([out.target, across.target, into.target]).toEqual([0, 2, 2]);

    expect(out.start.x).toBeCloseTo(31.115);
    expect(out.start.y).toBeCloseTo(32.385);
    expect(out.end.y).toBeCloseTo(42.545);
    expect(across.start).toEqual(out.end);
    expect(across.end.y).toBeCloseTo(46.355);
    expect(into.start).toEqual(across.end);
    expect(into.end.x).toBeCloseTo(31.115);
    expect(into.end.y).toBeCloseTo(51.435);
  });

  it("emits only diode traces when routing is disabled", () => {
    const unrouted = placeKeyboard(keyboard, { routing: false });
    expect(unrouted.traces).toHaveLength(3);
    expect(unrouted.traces.every(t => t.kind === "diode")).toBe(true);
  });

  it("refuses keys whose nets were never resolved", () => {
    const bare = parseKle([["A"]]);
    groupKeys(bare, "sequential");
    expect(() => placeKeyboard(bare, { routing: true })).toThrow(UnresolvedNetError);
  });
});

describe("columnPath", () => {
  it("clamps the bends into the lower footprint when the keys are offset", () => {
    const keyboard = prepared([["A"], [{ x: 0.75 }, "C"]], "positional");
    const [upper, lower] = keyboard.columnKeys(0);
    const [, across, into] = columnPath(upper, lower);

    expect(across.end.x).toBeCloseTo(42.2125);
    expect(into.end.x).toBeCloseTo(45.4025);
  });

  it("ends every segment within the footprint it terminates in", () => {
    const keyboard = prepared([
      ["A", "B", "C"],
      [{ x: 0.75 }, "D", { x: 0.5 }, "E"],
      [{ w: 2.25 }, "F", "G"],
    ], "positional");
    const { traces } = placeKeyboard(keyboard, { routing: true });

    const columnSegments = traces.filter(t => t.kind === "column");
    expect(columnSegments.length).toBeGreaterThan(0);
    for (const seg of columnSegments) {
      const center = switchReference(keyboard.key(seg.target));
      expect(seg.end.x).toBeGreaterThanOrEqual(center.x + GEOMETRY.switchLeft - 1e-9);
      expect(seg.end.x).toBeLessThanOrEqual(center.x + GEOMETRY.switchRight + 1e-9);
    }
  });
});
