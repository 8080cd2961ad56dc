import { Key, MAX_COLS, MAX_ROWS } from "./types";
import { Keyboard } from "./Keyboard";
import { UnresolvedNetError } from "./errors";

/** Name returned for a net number that is not in the table. */
export const UNKNOWN_NET = "UNKNOWN";

/**
 * Nets of the fixed control circuit. They are declared first, in this
 * order, because the control block addresses nets by position.
 */
export const CONTROL_NETS: ReadonlyArray<string> = [
  "GND",
  "VCC",
  "Net-(C6-Pad1)",
  "Net-(C7-Pad1)",
  "Net-(C8-Pad1)",
  "Net-(J1-Pad4)",
  "Net-(J1-Pad3)",
  "Net-(J1-Pad2)",
  "Net-(R1-Pad1)",
  "Net-(R2-Pad1)",
  "Net-(R3-Pad1)",
  "Net-(R4-Pad2)",
  "Net-(U1-Pad42)",
  "/Reset",
];

export function rowNetName(row: number): string {
  return `/Row${row}`;
}

export function colNetName(col: number): string {
  return `/Col${col}`;
}

export function diodeRef(keyIndex: number): string {
  return `D${keyIndex + 1}`;
}

export function switchRef(keyIndex: number): string {
  return `SW${keyIndex + 1}`;
}

/** The net between a key's switch and the anode of its diode. */
export function diodeNetName(keyIndex: number): string {
  return `Net-(${diodeRef(keyIndex)}-Pad2)`;
}

/**
 * Insertion-ordered registry of net names.
 *
 * A net's number is its 1-based position in the table; numbers are never
 * reused or reassigned while the table lives.
 */
export class NetTable {
  private _names: string[] = [];
  private _numbers = new Map<string, number>();

  /** Register a net and return its number. Registering a known name is a no-op. */
  addNet(name: string): number {
    const existing = this._numbers.get(name);
    if (existing !== undefined) return existing;

    this._names.push(name);
    const num = this._names.length;
    this._numbers.set(name, num);
    return num;
  }

  /** Number of a net, or 0 if the name is not registered. */
  numberOf(name: string): number {
    return this._numbers.get(name) ?? 0;
  }

  /** Name of a net, or {@link UNKNOWN_NET} if the number is out of range. */
  nameOf(num: number): string {
    if (!Number.isInteger(num) || num < 1 || num > this._names.length) {
      return UNKNOWN_NET;
    }
    return this._names[num - 1];
  }

  /** Number of a net that must exist. */
  require(name: string, what: string): number {
    const num = this.numberOf(name);
    if (num === 0) {
      throw new UnresolvedNetError(`${what} ("${name}")`);
    }
    return num;
  }

  get size(): number {
    return this._names.length;
  }

  /** Net names in number order. */
  names(): ReadonlyArray<string> {
    return this._names;
  }
}

/**
 * Populate a table with every net of a keyboard: control nets, then all
 * row and column nets the controller supports, whether or not the layout
 * uses them, then one diode net per key.
 */
export function defineMatrixNets(nets: NetTable, keyCount: number): void {
  for (const name of CONTROL_NETS) {
    nets.addNet(name);
  }
  for (let row = 0; row < MAX_ROWS; row++) {
    nets.addNet(rowNetName(row));
  }
  for (let col = 0; col < MAX_COLS; col++) {
    nets.addNet(colNetName(col));
  }
  for (let index = 0; index < keyCount; index++) {
    nets.addNet(diodeNetName(index));
  }
}

function annotateKey(nets: NetTable, key: Key): void {
  key.rowNet = nets.require(rowNetName(key.row), `row of key ${key.index}`);
  key.colNet = nets.require(colNetName(key.col), `column of key ${key.index}`);
  key.diodeNet = nets.require(diodeNetName(key.index), `diode of key ${key.index}`);
}

/** Record on every key which row, column and diode net it belongs to. */
export function annotateKeyNets(keyboard: Keyboard, nets: NetTable): void {
  for (const key of keyboard.keys) {
    annotateKey(nets, key);
  }
}
