import { Key, MatrixOptions, Point } from "../matrix/types";
import { Keyboard } from "../matrix/Keyboard";
import { UnresolvedNetError } from "../matrix/errors";
import { diodeRef, switchRef } from "../matrix/NetTable";

export type CopperLayer = "F.Cu" | "B.Cu";
export type TraceKind = "diode" | "row" | "column";

/**
 * Fixed board geometry, in millimetres. Offsets are relative to the switch
 * reference point (the centre of the switch footprint).
 */
export const GEOMETRY = {
  /** Distance between neighbouring 1u keys */
  pitch: 19.05,
  /** Board position of keyboard unit (0, 0) */
  origin: { x: 25.4, y: 25.4 },
  diodeOffset: { x: 6.35, y: 2.54 },
  /** Switch pad wired to the diode anode */
  switchDiodeContact: { x: 2.54, y: -5.08 },
  diodeAnode: { x: 6.35, y: 0.89 },
  /** Diode cathode, where row traces attach */
  rowContact: { x: 6.35, y: 4.19 },
  /** Switch pad carrying the column net */
  columnContact: { x: -3.81, y: -2.54 },
  /** Where a column trace leaves the key above */
  columnExitDy: 7.62,
  /** Where a column trace enters the key below */
  columnEntryDy: -7.62,
  /** Horizontal extent of a switch footprint */
  switchLeft: -7,
  switchRight: 7,
  traceWidth: 0.25,
} as const;

export interface SwitchPlacement {
  kind: "switch";
  keyIndex: number;
  ref: string;
  at: Point;
  /** Key width in keyboard units, selects the footprint */
  widthUnits: number;
  legend: string;
  colNet: number;
  diodeNet: number;
}

export interface DiodePlacement {
  kind: "diode";
  keyIndex: number;
  ref: string;
  at: Point;
  rowNet: number;
  diodeNet: number;
}

export interface TraceSegment {
  kind: TraceKind;
  start: Point;
  end: Point;
  layer: CopperLayer;
  net: number;
  width: number;
  /** Index of the key whose footprint the segment ends in */
  target: number;
}

export interface PlacementResult {
  switches: SwitchPlacement[];
  diodes: DiodePlacement[];
  traces: TraceSegment[];
}

function offset(p: Point, d: Point): Point {
  return { x: p.x + d.x, y: p.y + d.y };
}

/** Board position of a key's switch centre. */
export function switchReference(key: Key): Point {
  return {
    x: GEOMETRY.origin.x + key.xUnit * GEOMETRY.pitch,
    y: GEOMETRY.origin.y + key.yUnit * GEOMETRY.pitch,
  };
}

/** Keep an x coordinate within the horizontal bounds of a switch footprint. */
export function clampToFootprint(x: number, center: Point): number {
  const min = center.x + GEOMETRY.switchLeft;
  const max = center.x + GEOMETRY.switchRight;
  return Math.min(max, Math.max(min, x));
}

function assertResolved(key: Key): void {
  if (key.rowNet === 0) throw new UnresolvedNetError(`row of key ${key.index}`);
  if (key.colNet === 0) throw new UnresolvedNetError(`column of key ${key.index}`);
  if (key.diodeNet === 0) throw new UnresolvedNetError(`diode of key ${key.index}`);
}

function segment(kind: TraceKind, layer: CopperLayer, start: Point, end: Point, net: number, target: number): TraceSegment {
  return { kind, start, end, layer, net, width: GEOMETRY.traceWidth, target };
}

function rowTraces(keyboard: Keyboard): TraceSegment[] {
  const traces: TraceSegment[] = [];
  for (let row = 0; row < keyboard.rows.length; row++) {
    const keys = keyboard.rowKeys(row);
    for (let i = 0; i + 1 < keys.length; i++) {
      const from = keys[i];
      const to = keys[i + 1];
      traces.push(segment(
        "row",
        "B.Cu",
        offset(switchReference(from), GEOMETRY.rowContact),
        offset(switchReference(to), GEOMETRY.rowContact),
        from.rowNet,
        to.index,
      ));
    }
  }
  return traces;
}

/**
 * Three segments from the column pad of `upper` to the column pad of
 * `lower`: down out of the upper footprint, across to the top of the lower
 * footprint, then into the pad. The end of each segment is clamped to the
 * horizontal bounds of the footprint it ends in.
 */
export function columnPath(upper: Key, lower: Key): TraceSegment[] {
  const upperRef = switchReference(upper);
  const lowerRef = switchReference(lower);
  const net = upper.colNet;

  const start = offset(upperRef, GEOMETRY.columnContact);
  const exit = {
    x: clampToFootprint(start.x, upperRef),
    y: upperRef.y + GEOMETRY.columnExitDy,
  };
  const entry = {
    x: clampToFootprint(exit.x, lowerRef),
    y: lowerRef.y + GEOMETRY.columnEntryDy,
  };
  const contact = offset(lowerRef, GEOMETRY.columnContact);
  const end = { x: clampToFootprint(contact.x, lowerRef), y: contact.y };

  return [
    segment("column", "F.Cu", start, exit, net, upper.index),
    segment("column", "F.Cu", exit, entry, net, lower.index),
    segment("column", "F.Cu", entry, end, net, lower.index),
  ];
}

function columnTraces(keyboard: Keyboard): TraceSegment[] {
  const traces: TraceSegment[] = [];
  for (let col = 0; col < keyboard.columns.length; col++) {
    const keys = keyboard.columnKeys(col);
    for (let i = 0; i + 1 < keys.length; i++) {
      traces.push(...columnPath(keys[i], keys[i + 1]));
    }
  }
  return traces;
}

/**
 * Compute board positions for every switch and diode, the switch-to-diode
 * trace of each key and, when routing is enabled, the row and column traces
 * between neighbouring keys.
 *
 * Keys must be grouped and their nets annotated first.
 */
export function placeKeyboard(keyboard: Keyboard, options: Pick<MatrixOptions, "routing">): PlacementResult {
  const result: PlacementResult = { switches: [], diodes: [], traces: [] };

  for (const key of keyboard.keys) {
    assertResolved(key);
    const center = switchReference(key);

    result.switches.push({
      kind: "switch",
      keyIndex: key.index,
      ref: switchRef(key.index),
      at: center,
      widthUnits: key.width,
      legend: key.legend,
      colNet: key.colNet,
      diodeNet: key.diodeNet,
    });

    result.diodes.push({
      kind: "diode",
      keyIndex: key.index,
      ref: diodeRef(key.index),
      at: offset(center, GEOMETRY.diodeOffset),
      rowNet: key.rowNet,
      diodeNet: key.diodeNet,
    });

    result.traces.push(segment(
      "diode",
      "B.Cu",
      offset(center, GEOMETRY.switchDiodeContact),
      offset(center, GEOMETRY.diodeAnode),
      key.diodeNet,
      key.index,
    ));
  }

  if (options.routing) {
    result.traces.push(...rowTraces(keyboard));
    result.traces.push(...columnTraces(keyboard));
  }

  return result;
}
