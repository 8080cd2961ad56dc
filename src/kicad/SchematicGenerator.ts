import { Key, Point } from "../matrix/types";
import { Keyboard } from "../matrix/Keyboard";
import { NetTable, colNetName, diodeRef, rowNetName, switchRef } from "../matrix/NetTable";
import { SExpr, SExpression } from "./SExpression";
import { UuidManager } from "./UuidManager";
import { KicadSymbol } from "./KicadSymbol";
import { diodeSymbol, switchFootprintName, switchSymbol } from "./parts";
import { CONTROL_REF, controlLabel, controlPins, controlSymbol } from "./ControlCircuit";

/** Schematic grid, in millimetres. Every connection point sits on it. */
const GRID = 1.27;

export const SCHEMATIC_LAYOUT = {
  keyOrigin: { x: 50.8, y: 25.4 },
  /** Schematic distance per keyboard unit */
  stepX: 20.32,
  stepY: 12.7,
  diodeOffset: { x: 5.08, y: 5.08 },
  controlAt: { x: 20.32, y: 25.4 },
} as const;

export interface SchematicOptions {
  projectName: string;
  /** Title block date, e.g. "2026-10-19 14:02" */
  date: string;
  comment: string;
}

export interface SchematicPlacement {
  key: Key;
  switchAt: Point;
  diodeAt: Point;
}

const q = SExpression.quote;
const n = SExpression.num;

function snap(v: number): number {
  return Math.round(v / GRID) * GRID;
}

function font(): SExpr {
  return ["effects", ["font", ["size", "1.27", "1.27"]]];
}

/** Where a key's switch and diode go on the schematic sheet. */
export function schematicPlacement(key: Key): SchematicPlacement {
  const switchAt = {
    x: snap(SCHEMATIC_LAYOUT.keyOrigin.x + key.xUnit * SCHEMATIC_LAYOUT.stepX),
    y: snap(SCHEMATIC_LAYOUT.keyOrigin.y + key.yUnit * SCHEMATIC_LAYOUT.stepY),
  };
  return {
    key,
    switchAt,
    diodeAt: {
      x: switchAt.x + SCHEMATIC_LAYOUT.diodeOffset.x,
      y: switchAt.y + SCHEMATIC_LAYOUT.diodeOffset.y,
    },
  };
}

/**
 * Emits the `.kicad_sch` of a keyboard matrix: a switch and a diode per key,
 * wired together and labelled with their row and column, plus the control
 * header.
 */
export class SchematicGenerator {
  private keyboard: Keyboard;
  private nets: NetTable;
  private uuids: UuidManager;
  private options: SchematicOptions;
  private rootUuid: string;

  private readonly switchSym = switchSymbol();
  private readonly diodeSym = diodeSymbol();
  private readonly controlSym = controlSymbol();

  constructor(keyboard: Keyboard, nets: NetTable, uuids: UuidManager, options: SchematicOptions) {
    this.keyboard = keyboard;
    this.nets = nets;
    this.uuids = uuids;
    this.options = options;
    this.rootUuid = uuids.getOrGenerate("ROOT");
  }

  generate(): string {
    const schematic: SExpr[] = [
      "kicad_sch",
      ["version", "20250114"],
      ["generator", q("kbmatrix")],
      ["generator_version", q("9.0")],
      ["uuid", q(this.rootUuid)],
      ["paper", q("A3")],
      this.titleBlock(),
      ["lib_symbols", this.switchSym.toSExpr(), this.diodeSym.toSExpr(), this.controlSym.toSExpr()],
    ];

    for (const key of this.keyboard.keys) {
      schematic.push(...this.keyElements(schematicPlacement(key)));
    }
    schematic.push(...this.controlElements());
    schematic.push(["sheet_instances", ["path", q("/"), ["page", q("1")]]]);

    return SExpression.serialize(schematic) + "\n";
  }

  private titleBlock(): SExpr {
    const block: SExpr[] = [
      "title_block",
      ["title", q(this.keyboard.name)],
      ["date", q(this.options.date)],
      ["comment", "1", q(this.options.comment)],
    ];
    if (this.keyboard.author) {
      block.push(["comment", "2", q(`Author: ${this.keyboard.author}`)]);
    }
    return block;
  }

  private keyElements(placement: SchematicPlacement): SExpr[] {
    const { key, switchAt, diodeAt } = placement;
    const swRef = switchRef(key.index);
    const dRef = diodeRef(key.index);

    const switchPin2 = this.switchSym.pinPosition("2", switchAt);
    const diodeAnode = this.diodeSym.pinPosition("2", diodeAt);

    return [
      this.symbolInstance(this.switchSym, swRef, SExpression.literal(key.legend), switchFootprintName(key.width), switchAt),
      this.symbolInstance(this.diodeSym, dRef, q(this.diodeSym.value), this.diodeSym.footprint, diodeAt),
      this.wire(switchPin2, diodeAnode, `${swRef}_wire`),
      this.label(colNetName(key.col).slice(1), this.switchSym.pinPosition("1", switchAt), `${swRef}_col`),
      this.label(rowNetName(key.row).slice(1), this.diodeSym.pinPosition("1", diodeAt), `${dRef}_row`),
    ];
  }

  private controlElements(): SExpr[] {
    const at = SCHEMATIC_LAYOUT.controlAt;
    const elements: SExpr[] = [
      this.symbolInstance(this.controlSym, CONTROL_REF, q(this.controlSym.value), this.controlSym.footprint, at),
    ];
    for (const pin of controlPins(this.nets, 0)) {
      const { text, global } = controlLabel(pin.netName);
      const pos = this.controlSym.pinPosition(pin.pin, at);
      const id = `${CONTROL_REF}_label_${pin.pin}`;
      elements.push(global ? this.globalLabel(text, pos, id) : this.label(text, pos, id, true));
    }
    return elements;
  }

  private symbolInstance(sym: KicadSymbol, ref: string, value: string, footprint: string, at: Point): SExpr {
    const x = n(at.x);
    const y = n(at.y);
    return [
      "symbol",
      ["lib_id", q(sym.libId)],
      ["at", x, y, "0"],
      ["unit", "1"],
      ["exclude_from_sim", "no"],
      ["in_bom", "yes"],
      ["on_board", "yes"],
      ["dnp", "no"],
      ["uuid", q(this.uuids.getOrGenerate(ref))],
      ["property", q("Reference"), q(ref), ["at", x, n(at.y - 2.54), "0"], font()],
      ["property", q("Value"), value, ["at", x, n(at.y + 2.54), "0"], font()],
      ["property", q("Footprint"), q(footprint), ["at", x, y, "0"], ["effects", ["font", ["size", "1.27", "1.27"]], ["hide", "yes"]]],
      ...sym.pinNumbers.map((pin): SExpr => ["pin", q(pin), ["uuid", q(this.uuids.getOrGenerate(`${ref}_pin_${pin}`))]]),
      [
        "instances",
        ["project", q(this.options.projectName), ["path", q(`/${this.rootUuid}`), ["reference", q(ref)], ["unit", "1"]]],
      ],
    ];
  }

  private wire(p1: Point, p2: Point, id: string): SExpr {
    return [
      "wire",
      ["pts", ["xy", n(p1.x), n(p1.y)], ["xy", n(p2.x), n(p2.y)]],
      ["stroke", ["width", "0"], ["type", "default"]],
      ["uuid", q(this.uuids.getOrGenerate(id))],
    ];
  }

  private label(text: string, at: Point, id: string, alignRight = false): SExpr {
    return [
      "label",
      q(text),
      ["at", n(at.x), n(at.y), alignRight ? "180" : "0"],
      ["effects", ["font", ["size", "1.27", "1.27"]], ["justify", alignRight ? "right" : "left", "bottom"]],
      ["uuid", q(this.uuids.getOrGenerate(id))],
    ];
  }

  private globalLabel(text: string, at: Point, id: string): SExpr {
    return [
      "global_label",
      q(text),
      ["shape", "passive"],
      ["at", n(at.x), n(at.y), "180"],
      ["effects", ["font", ["size", "1.27", "1.27"]], ["justify", "right"]],
      ["uuid", q(this.uuids.getOrGenerate(id))],
    ];
  }
}
