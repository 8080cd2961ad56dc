import { Point } from "../../../matrix/types";
import { GEOMETRY, PlacementResult } from "../../../kicad/Placement";
import { footprintSizeFor } from "../../../kicad/parts";
import { BBox, RenderContext } from "./types";

export function transform(ctx: RenderContext, p: Point): Point {
  return {
    x: p.x * ctx.scale + ctx.offsetX,
    y: p.y * ctx.scale + ctx.offsetY,
  };
}

/** Half the keycap outline of a switch, in mm. */
export function keycapHalfSize(widthUnits: number): { w: number; h: number } {
  return {
    w: (Number(footprintSizeFor(widthUnits)) * GEOMETRY.pitch) / 2,
    h: GEOMETRY.pitch / 2,
  };
}

/** Extent of every keycap and trace, in board millimetres. */
export function calculateBBox(placement: PlacementResult): BBox {
  if (placement.switches.length === 0) {
    return { minX: 0, minY: 0, maxX: 100, maxY: 100 };
  }

  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const sw of placement.switches) {
    const half = keycapHalfSize(sw.widthUnits);
    minX = Math.min(minX, sw.at.x - half.w);
    maxX = Math.max(maxX, sw.at.x + half.w);
    minY = Math.min(minY, sw.at.y - half.h);
    maxY = Math.max(maxY, sw.at.y + half.h);
  }
  for (const trace of placement.traces) {
    for (const p of [trace.start, trace.end]) {
      minX = Math.min(minX, p.x);
      maxX = Math.max(maxX, p.x);
      minY = Math.min(minY, p.y);
      maxY = Math.max(maxY, p.y);
    }
  }
  return { minX, minY, maxX, maxY };
}

/** Scale and centre a bounding box on a page, keeping the aspect ratio. */
export function fitToPage(bbox: BBox, pageWidth: number, pageHeight: number, margin: number): Pick<RenderContext, "scale" | "offsetX" | "offsetY"> {
  const width = pageWidth - 2 * margin;
  const height = pageHeight - 2 * margin;
  const contentWidth = bbox.maxX - bbox.minX;
  const contentHeight = bbox.maxY - bbox.minY;

  const scale = Math.min(width / contentWidth, height / contentHeight);
  return {
    scale,
    offsetX: margin - bbox.minX * scale + (width - contentWidth * scale) / 2,
    offsetY: margin - bbox.minY * scale + (height - contentHeight * scale) / 2,
  };
}
