import { CopperLayer } from "../../../kicad/Placement";

export const COLORS = {
  keycap: "#000000",
  diode: "#555555",
  text: "#000000",
  reference: "#888888",
};

/** Trace colours, as KiCad shows the copper layers. */
export const LAYER_COLORS: Record<CopperLayer, string> = {
  "F.Cu": "#C83434",
  "B.Cu": "#4D7FC4",
};

export const STYLES = {
  keycapStroke: 1,
  diodeStroke: 0.75,
  /** Keycap outline inset from the key pitch, in mm */
  keycapInset: 0.5,
  diodeSize: { width: 1.6, height: 3.6 },
};

export interface BBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * The drawing calls the renderer makes. `PDFKit.PDFDocument` satisfies it;
 * tests pass a recorder.
 */
export interface Canvas {
  save(): this;
  restore(): this;
  moveTo(x: number, y: number): this;
  lineTo(x: number, y: number): this;
  rect(x: number, y: number, w: number, h: number): this;
  stroke(): this;
  lineWidth(w: number): this;
  strokeColor(color: string): this;
  fillColor(color: string): this;
  fontSize(size: number): this;
  text(text: string, x: number, y: number, options?: { width?: number; align?: "left" | "center" | "right" }): this;
}

export interface RenderContext {
  doc: Canvas;
  /** Points per millimetre */
  scale: number;
  offsetX: number;
  offsetY: number;
  marginX: number;
  marginY: number;
}
