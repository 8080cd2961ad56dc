import { NetTable } from "../matrix/NetTable";
import { UnresolvedNetError } from "../matrix/errors";
import { DiodePlacement, GEOMETRY, SwitchPlacement } from "./Placement";
import { KicadFootprint, PadNet } from "./KicadFootprint";
import { KicadSymbol } from "./KicadSymbol";
import { UuidManager } from "./UuidManager";

/** Switch footprint sizes available in the keyswitch library, in keyboard units. */
export type FootprintSize = "1.00" | "1.25" | "1.50" | "1.75" | "2.00" | "2.25" | "2.75" | "6.25";

/**
 * Pick the switch footprint for a key width. Widths between the available
 * sizes fall back to the next smaller one.
 */
export function footprintSizeFor(widthUnits: number): FootprintSize {
  if (widthUnits < 1.25) return "1.00";
  if (widthUnits < 1.5) return "1.25";
  if (widthUnits < 1.75) return "1.50";
  if (widthUnits < 2) return "1.75";
  if (widthUnits < 2.25) return "2.00";
  if (widthUnits < 2.75) return "2.25";
  if (widthUnits < 6.25) return "2.75";
  return "6.25";
}

export function switchFootprintName(widthUnits: number): string {
  return `Keyswitch:MX-${footprintSizeFor(widthUnits)}U`;
}

export const DIODE_FOOTPRINT = "Diode_SMD:D_SOD-123";
export const DIODE_VALUE = "1N4148W";

/** Table entry for a net number that must exist. */
export function padNet(nets: NetTable, num: number, what: string): PadNet {
  const name = nets.nameOf(num);
  if (num === 0 || nets.numberOf(name) !== num) {
    throw new UnresolvedNetError(what);
  }
  return { number: num, name };
}

/** MX-style plate switch with its keycap outline. */
export function switchFootprint(placement: SwitchPlacement, nets: NetTable, uuids: UuidManager): KicadFootprint {
  const size = footprintSizeFor(placement.widthUnits);
  const halfCap = (Number(size) * GEOMETRY.pitch) / 2;
  const halfPitch = GEOMETRY.pitch / 2;
  const col = GEOMETRY.columnContact;
  const diode = GEOMETRY.switchDiodeContact;

  return new KicadFootprint({
    libId: switchFootprintName(placement.widthUnits),
    ref: placement.ref,
    value: placement.legend,
    at: placement.at,
    attr: "through_hole",
  }, uuids)
    .addRect({ x1: GEOMETRY.switchLeft, y1: -7, x2: GEOMETRY.switchRight, y2: 7 })
    .addRect({ x1: -halfCap, y1: -halfPitch, x2: halfCap, y2: halfPitch, layer: "Fab", width: 0.1 })
    .addPad({
      number: "1", type: "thru_hole", shape: "circle", x: col.x, y: col.y, width: 2.25, height: 2.25, drill: 1.47,
      net: padNet(nets, placement.colNet, `column pad of ${placement.ref}`),
    })
    .addPad({
      number: "2", type: "thru_hole", shape: "circle", x: diode.x, y: diode.y, width: 2.25, height: 2.25, drill: 1.47,
      net: padNet(nets, placement.diodeNet, `diode pad of ${placement.ref}`),
    })
    .addPad({ number: "", type: "np_thru_hole", shape: "circle", x: 0, y: 0, width: 3.9878, height: 3.9878, drill: 3.9878 })
    .addPad({ number: "", type: "np_thru_hole", shape: "circle", x: -5.08, y: 0, width: 1.7018, height: 1.7018, drill: 1.7018 })
    .addPad({ number: "", type: "np_thru_hole", shape: "circle", x: 5.08, y: 0, width: 1.7018, height: 1.7018, drill: 1.7018 });
}

/** SOD-123 diode on the back, cathode towards the row trace. */
export function diodeFootprint(placement: DiodePlacement, nets: NetTable, uuids: UuidManager): KicadFootprint {
  const cathodeY = GEOMETRY.rowContact.y - GEOMETRY.diodeOffset.y;
  const anodeY = GEOMETRY.diodeAnode.y - GEOMETRY.diodeOffset.y;

  return new KicadFootprint({
    libId: DIODE_FOOTPRINT,
    ref: placement.ref,
    value: DIODE_VALUE,
    at: placement.at,
    side: "B",
    attr: "smd",
  }, uuids)
    .addLine({ x1: -0.9, y1: 0.9, x2: 0.9, y2: 0.9 })
    .addPad({
      number: "1", type: "smd", shape: "roundrect", x: 0, y: cathodeY, width: 0.9, height: 1.2,
      net: padNet(nets, placement.rowNet, `cathode of ${placement.ref}`),
    })
    .addPad({
      number: "2", type: "smd", shape: "roundrect", x: 0, y: anodeY, width: 0.9, height: 1.2,
      net: padNet(nets, placement.diodeNet, `anode of ${placement.ref}`),
    });
}

/** Schematic symbol of a keyswitch: pin 1 to the column, pin 2 to the diode. */
export function switchSymbol(): KicadSymbol {
  return new KicadSymbol({ libId: "Keyboard:SW_Push", reference: "SW", footprint: switchFootprintName(1) })
    .addPolyline({ points: [{ x: -2.54, y: 0 }, { x: -1.27, y: 0 }, { x: 1.27, y: 1.27 }] })
    .addPolyline({ points: [{ x: 1.27, y: 0 }, { x: 2.54, y: 0 }] })
    .addPin({ name: "1", number: "1", x: -5.08, y: 0, side: "left" })
    .addPin({ name: "2", number: "2", x: 5.08, y: 0, side: "right" });
}

/** Schematic symbol of a diode drawn upright: anode on top, cathode below. */
export function diodeSymbol(): KicadSymbol {
  return new KicadSymbol({ libId: "Keyboard:D", reference: "D", value: DIODE_VALUE, footprint: DIODE_FOOTPRINT })
    .addPolyline({
      points: [{ x: -1.27, y: 1.27 }, { x: 1.27, y: 1.27 }, { x: 0, y: -1.27 }, { x: -1.27, y: 1.27 }],
      fill: "outline",
    })
    .addPolyline({ points: [{ x: -1.27, y: -1.27 }, { x: 1.27, y: -1.27 }] })
    .addPin({ name: "K", number: "1", x: 0, y: -3.81, side: "bottom" })
    .addPin({ name: "A", number: "2", x: 0, y: 3.81, side: "top" });
}
