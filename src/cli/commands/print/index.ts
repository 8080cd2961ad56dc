import * as path from "path";
import * as fs from "fs";
import PDFDocument from "pdfkit";
import { readKleDocument } from "../../../matrix/KleParser";
import { Keyboard } from "../../../matrix/Keyboard";
import { GroupingPolicy } from "../../../matrix/types";
import { PlacementResult } from "../../../kicad/Placement";
import { buildMatrix } from "../../../kicad/KicadGenerator";
import { loadConfig } from "../../config";
import { configFlags, parseArgs, requireLayoutPath, requireOutput } from "../../utils";
import { Canvas, RenderContext } from "./types";
import { calculateBBox, fitToPage } from "./layout";
import { renderDiode, renderSwitch, renderTrace } from "./components";
import { renderMetadata } from "./metadata";

const MARGIN = 40;

/** Draw a whole placement onto a page of the given size. */
export function renderPlacement(
  doc: Canvas,
  placement: PlacementResult,
  keyboard: Keyboard,
  grouping: GroupingPolicy,
  pageWidth: number,
  pageHeight: number,
): RenderContext {
  const fit = fitToPage(calculateBBox(placement), pageWidth, pageHeight, MARGIN);
  const ctx: RenderContext = { doc, ...fit, marginX: MARGIN, marginY: MARGIN };

  for (const sw of placement.switches) {
    renderSwitch(ctx, sw, keyboard);
  }
  for (const diode of placement.diodes) {
    renderDiode(ctx, diode);
  }
  for (const trace of placement.traces) {
    renderTrace(ctx, trace);
  }
  renderMetadata(ctx, keyboard, grouping, pageWidth, pageHeight);
  return ctx;
}

/**
 * print: render a PDF preview of the board placement.
 */
export async function cmdPrint(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  const layoutPath = requireLayoutPath(parsed);
  const outputPath = requireOutput(parsed);
  const config = loadConfig(configFlags(parsed));

  console.log(`\n🖨️  Printing layout: ${path.basename(layoutPath)}\n`);

  const { keyboard, placement } = buildMatrix(readKleDocument(layoutPath), config);
  console.log(`  → Placed ${placement.switches.length} switches, ${placement.traces.length} trace segments`);

  const doc = new PDFDocument({
    size: "A4",
    layout: "landscape",
    autoFirstPage: false,
    info: {
      Title: keyboard.name || "Untitled keyboard",
      Author: keyboard.author,
      Subject: "Keyboard matrix placement",
      CreationDate: new Date(),
    },
  });

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const stream = fs.createWriteStream(outputPath);
  doc.pipe(stream);

  doc.addPage();
  renderPlacement(doc, placement, keyboard, config.grouping, doc.page.width, doc.page.height);
  doc.end();

  await new Promise<void>((resolve, reject) => {
    stream.on("finish", () => resolve());
    stream.on("error", reject);
  });
  console.log(`\n✅  PDF generated: ${outputPath}`);
}
