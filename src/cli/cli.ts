#!/usr/bin/env node

/**
 * kbmatrix CLI
 */

import { KbMatrixError } from "../matrix/errors";
import { cmdGenerate } from "./commands/generate";
import { cmdInfo } from "./commands/info";
import { cmdPrint } from "./commands/print";
import { UsageError, die, readVersion } from "./utils";

function printHelp(): void {
  console.log(`
kbmatrix: keyboard matrix schematic and PCB generator

Usage:
  kbmatrix <command> [options]

Commands:
  generate <layout.json> -o <outdir>
                                 Write <outdir>/<outdir>.kicad_sch, .kicad_pcb and .kicad_pro
  info <layout.json>             Show the keys and matrix rows of a layout
  print <layout.json> -o <file.pdf>
                                 Render a PDF preview of the board placement
  help                           Show this help

Options:
  -c, --grouping <seq|pos>       Column grouping: sequential (default) or positional
  -n, --no-routing               Place parts without row and column traces
  -V, --verbose                  Log every stage and key assignment
  --config <file>                Read settings from a YAML file (default: ./kbmatrix.yml)
  -v, --version                  Print the version

Environment:
  KBMATRIX_GROUPING, KBMATRIX_ROUTING, KBMATRIX_CONFIG

Examples:
  kbmatrix generate ./layouts/macropad.json -o ./out/macropad
  kbmatrix generate ./layouts/macropad.json -o ./out/macropad -c pos -n
  kbmatrix info ./layouts/macropad.json
  kbmatrix print ./layouts/macropad.json -o ./out/macropad.pdf
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "generate":
      return cmdGenerate(commandArgs);
    case "info":
      return cmdInfo(commandArgs);
    case "print":
      return cmdPrint(commandArgs);
    case "--version":
    case "-v":
      console.log(readVersion());
      break;
    case "--help":
    case "-h":
    case "help":
      printHelp();
      break;
    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      printHelp();
      process.exit(command ? 1 : 0);
  }
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`❌  ${err.message}\n`);
    printHelp();
    process.exit(1);
  }
  if (err instanceof KbMatrixError) {
    die(err.message);
  }
  if (err instanceof Error) {
    die(`${err.name}: ${err.message}`);
  }
  die(String(err));
});
