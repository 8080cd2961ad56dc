import { Keyboard } from "../../../matrix/Keyboard";
import { GroupingPolicy } from "../../../matrix/types";
import { COLORS, RenderContext } from "./types";

export function renderMetadata(ctx: RenderContext, keyboard: Keyboard, grouping: GroupingPolicy, pageWidth: number, pageHeight: number): void {
  const boxWidth = 200;
  const boxHeight = 60;
  const x = pageWidth - ctx.marginX - boxWidth;
  const y = pageHeight - ctx.marginY - boxHeight;

  ctx.doc.save();
  ctx.doc.rect(x, y, boxWidth, boxHeight).strokeColor(COLORS.keycap).lineWidth(1).stroke();

  const padding = 5;
  let currentY = y + padding;

  ctx.doc.fontSize(12).fillColor(COLORS.text).text(keyboard.name || "Untitled keyboard", x + padding, currentY);
  currentY += 15;

  ctx.doc.fontSize(8);
  ctx.doc.text(`Author: ${keyboard.author}`, x + padding, currentY);
  currentY += 10;
  ctx.doc.text(`Matrix: ${keyboard.rows.length} × ${keyboard.columns.length} (${grouping})`, x + padding, currentY);
  currentY += 10;
  ctx.doc.text(`Date: ${new Date().toLocaleDateString()}`, x + padding, currentY);

  ctx.doc.restore();
}
