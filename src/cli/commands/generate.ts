import * as path from "path";
import { readKleDocument } from "../../matrix/KleParser";
import { Keyboard } from "../../matrix/Keyboard";
import { switchRef } from "../../matrix/NetTable";
import { formatDate, generateProject, writeProject } from "../../kicad/KicadGenerator";
import { loadConfig } from "../config";
import { configFlags, parseArgs, readVersion, requireLayoutPath, requireOutput } from "../utils";

function logAssignments(keyboard: Keyboard): void {
  for (const key of keyboard.keys) {
    console.log(`     ${switchRef(key.index)} "${key.legend}" → row ${key.row}, col ${key.col}`);
  }
}

/**
 * generate: KLE layout → KiCad schematic, board and project files.
 *
 * The files are named after the output directory.
 */
export async function cmdGenerate(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  const layoutPath = requireLayoutPath(parsed);
  const outputDir = requireOutput(parsed);
  const config = loadConfig(configFlags(parsed));
  const projectName = path.basename(outputDir);

  console.log(`\n🚀  Generating: ${projectName}\n`);
  if (config.verbose) {
    if (config.configFile) console.log(`  → Config: ${config.configFile}`);
    console.log(`  → Grouping: ${config.grouping}, routing ${config.routing ? "on" : "off"}`);
    console.log(`  → Reading layout: ${layoutPath}...`);
  }

  const document = readKleDocument(layoutPath);
  const project = generateProject(document, {
    grouping: config.grouping,
    routing: config.routing,
    projectName,
    date: formatDate(new Date()),
    generatorVersion: readVersion(),
  });

  if (config.verbose) {
    console.log(`  → Grouped ${project.keyboard.keys.length} keys:`);
    logAssignments(project.keyboard);
    console.log(`  → ${project.nets.size} nets, ${project.placement.traces.length} trace segments`);
  }

  writeProject(project.files, outputDir);

  console.log(`  ✅ Generation successful!`);
  for (const line of project.keyboard.describe()) {
    console.log(`     ${line}`);
  }
  console.log(`  📂 Output: ${outputDir}`);
}
