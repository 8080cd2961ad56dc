import { Point } from "../matrix/types";
import { SExpr, SExpression } from "./SExpression";

// ─── Types ───────────────────────────────────────────────────────────

export type SymbolPinType = "input" | "output" | "power_in" | "passive" | "bidirectional";
export type SymbolPinSide = "left" | "right" | "top" | "bottom";

export interface SymbolPinOptions {
    name: string;
    number: string;
    /** Connection point, in symbol coordinates (y grows upwards) */
    x: number;
    y: number;
    side: SymbolPinSide;
    type?: SymbolPinType;
    length?: number;
}

export interface SymbolPolylineOptions {
    points: Point[];
    fill?: "none" | "outline" | "background";
}

interface SymPin {
    name: string;
    number: string;
    x: number;
    y: number;
    rotation: number;
    type: SymbolPinType;
    length: number;
}

// ─── Pin side → rotation angle ───────────────────────────────────────

/** Pins point from their connection point towards the body. */
function sideToAngle(side: SymbolPinSide): number {
    switch (side) {
        case "left": return 0;
        case "right": return 180;
        case "top": return 270;
        case "bottom": return 90;
    }
}

const q = SExpression.quote;
const n = SExpression.num;

function font(): SExpr {
    return ["effects", ["font", ["size", "1.27", "1.27"]]];
}

function hiddenFont(): SExpr {
    return ["effects", ["font", ["size", "1.27", "1.27"]], ["hide", "yes"]];
}

// ─── Class ───────────────────────────────────────────────────────────

/**
 * A library symbol embedded in the `lib_symbols` section of a schematic.
 *
 * @example
 * ```ts
 * const sym = new KicadSymbol({ libId: "Keyboard:D", reference: "D" });
 * sym.addPin({ name: "A", number: "2", x: 0, y: 3.81, side: "top" });
 * sym.pinPosition("2", { x: 100, y: 50 }); // → { x: 100, y: 46.19 }
 * ```
 */
export class KicadSymbol {
    public readonly libId: string;
    public readonly reference: string;
    public readonly value: string;
    public readonly footprint: string;

    private _pins: SymPin[] = [];
    private _rects: { x1: number; y1: number; x2: number; y2: number }[] = [];
    private _polylines: SymbolPolylineOptions[] = [];

    constructor(options: {
        libId: string;
        reference: string;
        value?: string;
        footprint?: string;
    }) {
        this.libId = options.libId;
        this.reference = options.reference;
        this.value = options.value ?? options.libId.split(":").pop() ?? options.libId;
        this.footprint = options.footprint ?? "";
    }

    // ── Builder methods ────────────────────────────────────────────────

    public addPin(options: SymbolPinOptions): this {
        this._pins.push({
            name: options.name,
            number: options.number,
            x: options.x,
            y: options.y,
            rotation: sideToAngle(options.side),
            type: options.type ?? "passive",
            length: options.length ?? 2.54,
        });
        return this;
    }

    public addRect(x1: number, y1: number, x2: number, y2: number): this {
        this._rects.push({ x1, y1, x2, y2 });
        return this;
    }

    public addPolyline(options: SymbolPolylineOptions): this {
        this._polylines.push(options);
        return this;
    }

    get pinNumbers(): string[] {
        return this._pins.map(p => p.number);
    }

    /**
     * Schematic position of a pin's connection point for a symbol placed
     * unrotated at `at`. Schematic y grows downwards, symbol y upwards.
     */
    public pinPosition(number: string, at: Point): Point {
        const pin = this._pins.find(p => p.number === number);
        if (!pin) {
            throw new Error(`Symbol ${this.libId} has no pin ${number}`);
        }
        return { x: at.x + pin.x, y: at.y - pin.y };
    }

    // ── Serialization ──────────────────────────────────────────────────

    /** The `(symbol "Lib:Name" ...)` block for `lib_symbols`. */
    public toSExpr(): SExpr {
        const name = this.libId.split(":").pop() ?? this.libId;

        const body: SExpr[] = ["symbol", q(`${name}_0_1`)];
        for (const r of this._rects) {
            body.push([
                "rectangle",
                ["start", n(r.x1), n(r.y1)],
                ["end", n(r.x2), n(r.y2)],
                ["stroke", ["width", "0.254"], ["type", "default"]],
                ["fill", ["type", "background"]],
            ]);
        }
        for (const line of this._polylines) {
            body.push([
                "polyline",
                ["pts", ...line.points.map((p): SExpr => ["xy", n(p.x), n(p.y)])],
                ["stroke", ["width", "0.254"], ["type", "default"]],
                ["fill", ["type", line.fill ?? "none"]],
            ]);
        }

        const pins: SExpr[] = ["symbol", q(`${name}_1_1`)];
        for (const pin of this._pins) {
            pins.push([
                "pin",
                pin.type,
                "line",
                ["at", n(pin.x), n(pin.y), String(pin.rotation)],
                ["length", n(pin.length)],
                ["name", q(pin.name), font()],
                ["number", q(pin.number), font()],
            ]);
        }

        return [
            "symbol",
            q(this.libId),
            ["pin_names", ["offset", "1.016"]],
            ["exclude_from_sim", "no"],
            ["in_bom", "yes"],
            ["on_board", "yes"],
            ["property", q("Reference"), q(this.reference), ["at", "0", "2.54", "0"], font()],
            ["property", q("Value"), q(this.value), ["at", "0", "-2.54", "0"], font()],
            ["property", q("Footprint"), q(this.footprint), ["at", "0", "0", "0"], hiddenFont()],
            ["property", q("Datasheet"), q(""), ["at", "0", "0", "0"], hiddenFont()],
            body,
            pins,
        ];
    }
}
