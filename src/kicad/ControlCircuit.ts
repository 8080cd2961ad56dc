import { MAX_COLS, MAX_ROWS, Point } from "../matrix/types";
import { CONTROL_NETS, NetTable, UNKNOWN_NET } from "../matrix/NetTable";
import { UnresolvedNetError } from "../matrix/errors";
import { KicadFootprint } from "./KicadFootprint";
import { KicadSymbol } from "./KicadSymbol";
import { UuidManager } from "./UuidManager";

export const CONTROL_REF = "J1";
export const CONTROL_FOOTPRINT = "Connector_PinHeader_2.54mm:PinHeader_2x14_P2.54mm_Vertical";
const PIN_COUNT = 28;
const PIN_PITCH = 2.54;

/** Position of the first row net, counted from the start of the table. */
const ROW_NET_OFFSET = CONTROL_NETS.length + 1;
const COL_NET_OFFSET = ROW_NET_OFFSET + MAX_ROWS;

/**
 * Header pin → net offset. The connector only knows where in the table its
 * nets live, not their names.
 */
function netOffsets(): number[] {
  const offsets = [
    CONTROL_NETS.indexOf("GND") + 1,
    CONTROL_NETS.indexOf("VCC") + 1,
    CONTROL_NETS.indexOf("/Reset") + 1,
  ];
  for (let row = 0; row < MAX_ROWS; row++) offsets.push(ROW_NET_OFFSET + row);
  for (let col = 0; col < MAX_COLS; col++) offsets.push(COL_NET_OFFSET + col);
  return offsets;
}

export interface ControlPin {
  /** Pin number on the connector, "1" to "28" */
  pin: string;
  netNumber: number;
  netName: string;
}

/**
 * Resolve the connector pins against a populated net table. `startNet` is
 * the number preceding the first control net, 0 when the table starts with
 * them.
 */
export function controlPins(nets: NetTable, startNet: number): ControlPin[] {
  const offsets = netOffsets();
  if (offsets.length !== PIN_COUNT) {
    throw new Error(`Control header needs ${offsets.length} pins but has ${PIN_COUNT}`);
  }
  return offsets.map((offset, i) => {
    const netNumber = startNet + offset;
    const netName = nets.nameOf(netNumber);
    if (netName === UNKNOWN_NET) {
      throw new UnresolvedNetError(`control header pin ${i + 1} (net ${netNumber})`);
    }
    return { pin: String(i + 1), netNumber, netName };
  });
}

/** The 2×14 header carrying power, reset and every matrix line. */
export function controlFootprint(pins: ControlPin[], at: Point, uuids: UuidManager): KicadFootprint {
  const rows = PIN_COUNT / 2;
  const fp = new KicadFootprint({
    libId: CONTROL_FOOTPRINT,
    ref: CONTROL_REF,
    value: "Matrix",
    at,
    attr: "through_hole",
  }, uuids)
    .addRect({ x1: -1.33, y1: -1.33, x2: PIN_PITCH + 1.33, y2: (rows - 1) * PIN_PITCH + 1.33 });

  pins.forEach((p, i) => {
    fp.addPad({
      number: p.pin,
      type: "thru_hole",
      shape: i === 0 ? "rect" : "oval",
      x: (i % 2) * PIN_PITCH,
      y: Math.floor(i / 2) * PIN_PITCH,
      width: 1.7,
      height: 1.7,
      drill: 1,
      net: { number: p.netNumber, name: p.netName },
    });
  });
  return fp;
}

/** Schematic symbol of the header: one column of pins on the left. */
export function controlSymbol(): KicadSymbol {
  const bottom = -(PIN_COUNT - 1) * PIN_PITCH - PIN_PITCH;
  const sym = new KicadSymbol({ libId: "Keyboard:Conn_Matrix", reference: "J", value: "Matrix", footprint: CONTROL_FOOTPRINT })
    .addRect(-2.54, PIN_PITCH, 2.54, bottom);
  for (let i = 0; i < PIN_COUNT; i++) {
    sym.addPin({ name: `P${i + 1}`, number: String(i + 1), x: -5.08, y: -i * PIN_PITCH, side: "left" });
  }
  return sym;
}

/**
 * Schematic label for a header pin. Power nets get global labels; matrix
 * nets get local labels whose sheet path reproduces the board net name.
 */
export function controlLabel(netName: string): { text: string; global: boolean } {
  if (netName.startsWith("/")) {
    return { text: netName.slice(1), global: false };
  }
  return { text: netName, global: true };
}
