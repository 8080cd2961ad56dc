import { Keyboard } from "../../../matrix/Keyboard";
import { DiodePlacement, SwitchPlacement, TraceSegment } from "../../../kicad/Placement";
import { COLORS, LAYER_COLORS, RenderContext, STYLES } from "./types";
import { keycapHalfSize, transform } from "./layout";

export function renderSwitch(ctx: RenderContext, sw: SwitchPlacement, keyboard: Keyboard): void {
  const half = keycapHalfSize(sw.widthUnits);
  const inset = STYLES.keycapInset;
  const topLeft = transform(ctx, { x: sw.at.x - half.w + inset, y: sw.at.y - half.h + inset });
  const width = (2 * (half.w - inset)) * ctx.scale;
  const height = (2 * (half.h - inset)) * ctx.scale;

  ctx.doc.save();
  ctx.doc.rect(topLeft.x, topLeft.y, width, height)
    .lineWidth(STYLES.keycapStroke)
    .strokeColor(COLORS.keycap)
    .stroke();

  const label = keyboard.key(sw.keyIndex).label.replace(/\r\n|\r|\n/g, " ");
  ctx.doc.fontSize(2.5 * ctx.scale)
    .fillColor(COLORS.text)
    .text(label, topLeft.x, topLeft.y + height / 2 - 1.5 * ctx.scale, { width, align: "center" });
  ctx.doc.fontSize(1.5 * ctx.scale)
    .fillColor(COLORS.reference)
    .text(sw.ref, topLeft.x + 0.5 * ctx.scale, topLeft.y + 0.5 * ctx.scale);
  ctx.doc.restore();
}

export function renderDiode(ctx: RenderContext, diode: DiodePlacement): void {
  const { width, height } = STYLES.diodeSize;
  const topLeft = transform(ctx, { x: diode.at.x - width / 2, y: diode.at.y - height / 2 });

  ctx.doc.save();
  ctx.doc.rect(topLeft.x, topLeft.y, width * ctx.scale, height * ctx.scale)
    .lineWidth(STYLES.diodeStroke)
    .strokeColor(COLORS.diode)
    .stroke();
  ctx.doc.restore();
}

export function renderTrace(ctx: RenderContext, trace: TraceSegment): void {
  const start = transform(ctx, trace.start);
  const end = transform(ctx, trace.end);

  ctx.doc.save();
  ctx.doc.lineWidth(Math.max(trace.width * ctx.scale, 0.5)).strokeColor(LAYER_COLORS[trace.layer]);
  ctx.doc.moveTo(start.x, start.y).lineTo(end.x, end.y).stroke();
  ctx.doc.restore();
}
