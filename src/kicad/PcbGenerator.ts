import { Point } from "../matrix/types";
import { NetTable } from "../matrix/NetTable";
import { SExpr, SExpression } from "./SExpression";
import { UuidManager } from "./UuidManager";
import { PlacementResult, TraceSegment } from "./Placement";
import { diodeFootprint, switchFootprint } from "./parts";
import { controlFootprint, controlPins } from "./ControlCircuit";

/** Where the control header sits, left of the key field. */
export const CONTROL_HEADER_AT: Point = { x: 10.16, y: 30.48 };

export interface PcbOptions {
  /** Title block date */
  date: string;
  comment: string;
  title: string;
}

const q = SExpression.quote;
const n = SExpression.num;

const LAYERS: SExpr[] = [
  ["0", q("F.Cu"), "signal"],
  ["2", q("B.Cu"), "signal"],
  ["13", q("F.Paste"), "user"],
  ["15", q("B.Paste"), "user"],
  ["5", q("F.SilkS"), "user", q("F.Silkscreen")],
  ["7", q("B.SilkS"), "user", q("B.Silkscreen")],
  ["1", q("F.Mask"), "user"],
  ["3", q("B.Mask"), "user"],
  ["25", q("Edge.Cuts"), "user"],
  ["31", q("F.CrtYd"), "user", q("F.Courtyard")],
  ["29", q("B.CrtYd"), "user", q("B.Courtyard")],
  ["35", q("F.Fab"), "user"],
  ["33", q("B.Fab"), "user"],
];

/**
 * Emits the `.kicad_pcb`: every net of the table, the switch, diode and
 * control-header footprints, and the traces of a placement.
 */
export class PcbGenerator {
  private nets: NetTable;
  private placement: PlacementResult;
  private uuids: UuidManager;
  private options: PcbOptions;

  constructor(nets: NetTable, placement: PlacementResult, uuids: UuidManager, options: PcbOptions) {
    this.nets = nets;
    this.placement = placement;
    this.uuids = uuids;
    this.options = options;
  }

  generate(): string {
    const board: SExpr[] = [
      "kicad_pcb",
      ["version", "20241229"],
      ["generator", q("kbmatrix")],
      ["generator_version", q("9.0")],
      ["general", ["thickness", "1.6"], ["legacy_teardrops", "no"]],
      ["paper", q("A3")],
      [
        "title_block",
        ["title", q(this.options.title)],
        ["date", q(this.options.date)],
        ["comment", "1", q(this.options.comment)],
      ],
      ["layers", ...LAYERS],
      ["setup", ["pad_to_mask_clearance", "0"], ["allow_soldermask_bridges_in_footprints", "no"]],
      ...this.netDeclarations(),
    ];

    for (const sw of this.placement.switches) {
      board.push(switchFootprint(sw, this.nets, this.uuids).toSExpr());
    }
    for (const d of this.placement.diodes) {
      board.push(diodeFootprint(d, this.nets, this.uuids).toSExpr());
    }
    board.push(controlFootprint(controlPins(this.nets, 0), CONTROL_HEADER_AT, this.uuids).toSExpr());

    this.placement.traces.forEach((trace, i) => {
      board.push(this.segment(trace, i));
    });

    board.push(["embedded_fonts", "no"]);
    return SExpression.serialize(board) + "\n";
  }

  /** `(net 0 "")` followed by every table net in number order. */
  private netDeclarations(): SExpr[] {
    const decls: SExpr[] = [["net", "0", q("")]];
    this.nets.names().forEach((name, i) => {
      decls.push(["net", String(i + 1), q(name)]);
    });
    return decls;
  }

  private segment(trace: TraceSegment, index: number): SExpr {
    return [
      "segment",
      ["start", n(trace.start.x), n(trace.start.y)],
      ["end", n(trace.end.x), n(trace.end.y)],
      ["width", n(trace.width)],
      ["layer", q(trace.layer)],
      ["net", String(trace.net)],
      ["uuid", q(this.uuids.getOrGenerate(`segment_${index}`))],
    ];
  }
}
