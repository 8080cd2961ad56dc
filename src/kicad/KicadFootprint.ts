import { Point } from "../matrix/types";
import { SExpr, SExpression } from "./SExpression";
import { UuidManager } from "./UuidManager";

// ─── Types ───────────────────────────────────────────────────────────

export type PadType = "smd" | "thru_hole" | "np_thru_hole";
export type PadShape = "roundrect" | "circle" | "rect" | "oval";
export type BoardSide = "F" | "B";

export interface PadNet {
    number: number;
    name: string;
}

export interface FootprintPadOptions {
    number: string;
    type: PadType;
    shape: PadShape;
    x: number;
    y: number;
    width: number;
    height: number;
    /** Drill diameter for through-hole pads */
    drill?: number;
    /** Defaults to the copper, mask and paste layers of the footprint's side */
    layers?: string[];
    net?: PadNet;
}

export interface FootprintLineOptions {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
    /** Layer name without side prefix, e.g. "SilkS" or "Fab" */
    layer?: string;
    width?: number;
}

interface FpPad extends FootprintPadOptions {
    layers: string[];
}

interface FpLine {
    x1: number; y1: number;
    x2: number; y2: number;
    layer: string;
    width: number;
}

// ─── Default pad layers ──────────────────────────────────────────────

function defaultLayers(type: PadType, side: BoardSide): string[] {
    switch (type) {
        case "smd":
            return [`${side}.Cu`, `${side}.Mask`, `${side}.Paste`];
        case "thru_hole":
            return ["*.Cu", "*.Mask"];
        case "np_thru_hole":
            return ["*.Cu", "*.Mask"];
    }
}

const q = SExpression.quote;
const n = SExpression.num;

// ─── Class ───────────────────────────────────────────────────────────

/**
 * Builds a footprint instance placed on a board, with its pads already
 * assigned to nets.
 *
 * @example
 * ```ts
 * const fp = new KicadFootprint({ libId: "Diode_SMD:D_SOD-123", ref: "D1", value: "1N4148W", at: { x: 40, y: 30 }, side: "B" }, uuids);
 * fp.addPad({ number: "1", type: "smd", shape: "roundrect", x: 0, y: 1.65, width: 0.9, height: 1.2, net: { number: 15, name: "/Row0" } });
 * const expr = fp.toSExpr();
 * ```
 */
export class KicadFootprint {
    public readonly libId: string;
    public readonly ref: string;
    public readonly at: Point;
    public readonly side: BoardSide;
    public readonly attr: "through_hole" | "smd";

    /** Already escaped for a quoted string */
    private readonly value: string;
    private readonly uuids: UuidManager;
    private _pads: FpPad[] = [];
    private _lines: FpLine[] = [];

    constructor(options: {
        libId: string;
        ref: string;
        value: string;
        at: Point;
        side?: BoardSide;
        attr?: "through_hole" | "smd";
    }, uuids: UuidManager) {
        this.libId = options.libId;
        this.ref = options.ref;
        this.value = options.value;
        this.at = options.at;
        this.side = options.side ?? "F";
        this.attr = options.attr ?? "smd";
        this.uuids = uuids;
    }

    // ── Builder methods ────────────────────────────────────────────────

    public addPad(options: FootprintPadOptions): this {
        this._pads.push({ ...options, layers: options.layers ?? defaultLayers(options.type, this.side) });
        return this;
    }

    public addLine(options: FootprintLineOptions): this {
        this._lines.push({
            x1: options.x1,
            y1: options.y1,
            x2: options.x2,
            y2: options.y2,
            layer: `${this.side}.${options.layer ?? "SilkS"}`,
            width: options.width ?? 0.12,
        });
        return this;
    }

    /** Closed rectangle drawn as four lines. */
    public addRect(options: FootprintLineOptions): this {
        const { x1, y1, x2, y2 } = options;
        return this
            .addLine({ ...options, x1, y1, x2, y2: y1 })
            .addLine({ ...options, x1: x2, y1, x2, y2 })
            .addLine({ ...options, x1: x2, y1: y2, x2: x1, y2 })
            .addLine({ ...options, x1, y1: y2, x2: x1, y2: y1 });
    }

    // ── Serialization ──────────────────────────────────────────────────

    public toSExpr(): SExpr {
        const expr: SExpr[] = [
            "footprint",
            q(this.libId),
            ["layer", q(`${this.side}.Cu`)],
            ["uuid", q(this.uuids.getOrGenerate(this.ref))],
            ["at", n(this.at.x), n(this.at.y)],
            this.property("Reference", q(this.ref), -8.5, "SilkS"),
            this.property("Value", SExpression.literal(this.value), 8.5, "Fab"),
            ["attr", this.attr],
        ];

        this._lines.forEach((line, i) => {
            expr.push([
                "fp_line",
                ["start", n(line.x1), n(line.y1)],
                ["end", n(line.x2), n(line.y2)],
                ["stroke", ["width", n(line.width)], ["type", "solid"]],
                ["layer", q(line.layer)],
                ["uuid", q(this.uuids.getOrGenerate(`${this.ref}_line_${i}`))],
            ]);
        });

        this._pads.forEach((pad, i) => {
            expr.push(this.serializePad(pad, i));
        });

        return expr;
    }

    // ── Private serialization helpers ──────────────────────────────────

    private property(key: string, value: string, y: number, layer: string): SExpr {
        const effects: SExpr[] = ["effects", ["font", ["size", "1", "1"], ["thickness", "0.15"]]];
        if (this.side === "B") {
            effects.push(["justify", "mirror"]);
        }
        return [
            "property",
            q(key),
            value,
            ["at", "0", n(y), "0"],
            ["layer", q(`${this.side}.${layer}`)],
            ["uuid", q(this.uuids.getOrGenerate(`${this.ref}_${key}`))],
            effects,
        ];
    }

    private serializePad(pad: FpPad, index: number): SExpr {
        const expr: SExpr[] = [
            "pad",
            q(pad.number),
            pad.type,
            pad.shape,
            ["at", n(pad.x), n(pad.y)],
            ["size", n(pad.width), n(pad.height)],
        ];
        if (pad.drill !== undefined) {
            expr.push(["drill", n(pad.drill)]);
        }
        expr.push(["layers", ...pad.layers.map(l => q(l))]);
        if (pad.shape === "roundrect") {
            expr.push(["roundrect_rratio", "0.25"]);
        }
        if (pad.net) {
            expr.push(["net", String(pad.net.number), q(pad.net.name)]);
        }
        expr.push(["uuid", q(this.uuids.getOrGenerate(`${this.ref}_pad_${index}`))]);
        return expr;
    }
}
