import { readKleDocument, parseKle } from "../../matrix/KleParser";
import { groupKeys } from "../../matrix/MatrixGrouper";
import { Keyboard } from "../../matrix/Keyboard";
import { loadConfig } from "../config";
import { configFlags, parseArgs, requireLayoutPath } from "../utils";

/** One line per matrix row: `Row 0: Esc | F1 | F2`. */
export function rowTable(keyboard: Keyboard): string[] {
  const lines: string[] = [];
  for (let row = 0; row < keyboard.rows.length; row++) {
    const legends = keyboard.rowKeys(row).map(k => k.label.replace(/\r\n|\r|\n/g, " ") || "(blank)");
    lines.push(`Row ${row}: ${legends.join(" | ")}`);
  }
  return lines;
}

/**
 * info: parse and group a layout, print what was found.
 */
export async function cmdInfo(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  const layoutPath = requireLayoutPath(parsed);
  const config = loadConfig(configFlags(parsed));

  const keyboard = parseKle(readKleDocument(layoutPath));
  groupKeys(keyboard, config.grouping);

  console.log(`\n🔍  ${layoutPath} (${config.grouping} grouping)\n`);
  for (const line of keyboard.describe()) {
    console.log(`  ${line}`);
  }
  console.log("─".repeat(30));
  for (const line of rowTable(keyboard)) {
    console.log(`  ${line}`);
  }
}
