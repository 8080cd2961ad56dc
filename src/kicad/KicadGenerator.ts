import * as fs from "fs";
import * as path from "path";
import { MatrixOptions } from "../matrix/types";
import { KbMatrixError } from "../matrix/errors";
import { Keyboard } from "../matrix/Keyboard";
import { parseKle } from "../matrix/KleParser";
import { groupKeys } from "../matrix/MatrixGrouper";
import { NetTable, annotateKeyNets, defineMatrixNets } from "../matrix/NetTable";
import { PlacementResult, placeKeyboard } from "./Placement";
import { UuidManager } from "./UuidManager";
import { SchematicGenerator } from "./SchematicGenerator";
import { PcbGenerator } from "./PcbGenerator";
import { ProjectGenerator } from "./ProjectGenerator";

export interface GenerateOptions extends MatrixOptions {
  /** Base name of the output files */
  projectName: string;
  /** Title block date */
  date: string;
  /** Version written into the title block comment */
  generatorVersion: string;
}

export interface MatrixBuild {
  keyboard: Keyboard;
  nets: NetTable;
  placement: PlacementResult;
}

export interface GeneratedFile {
  fileName: string;
  content: string;
}

export interface GeneratedProject extends MatrixBuild {
  files: GeneratedFile[];
}

/** `YYYY-MM-DD` in local time. */
export function formatDate(date: Date): string {
  const pad = (v: number) => String(v).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Run the matrix pipeline on a decoded KLE document: parse, group, build
 * the net table, annotate keys and place them.
 */
export function buildMatrix(document: unknown, options: MatrixOptions): MatrixBuild {
  const keyboard = parseKle(document);
  groupKeys(keyboard, options.grouping);

  const nets = new NetTable();
  defineMatrixNets(nets, keyboard.keys.length);
  annotateKeyNets(keyboard, nets);

  const placement = placeKeyboard(keyboard, options);
  return { keyboard, nets, placement };
}

/**
 * Produce the contents of every project file. Nothing touches the disk
 * here; see {@link writeProject}.
 */
export function generateProject(document: unknown, options: GenerateOptions): GeneratedProject {
  const build = buildMatrix(document, options);
  const { keyboard, nets, placement } = build;
  const uuids = new UuidManager(`kbmatrix:${options.projectName}`);
  const comment = `Generated by kbmatrix v${options.generatorVersion}`;

  const schematic = new SchematicGenerator(keyboard, nets, uuids, {
    projectName: options.projectName,
    date: options.date,
    comment,
  }).generate();
  const pcb = new PcbGenerator(nets, placement, uuids, {
    title: keyboard.name,
    date: options.date,
    comment,
  }).generate();
  const project = new ProjectGenerator(options.projectName).generate();

  return {
    ...build,
    files: [
      { fileName: `${options.projectName}.kicad_sch`, content: schematic },
      { fileName: `${options.projectName}.kicad_pcb`, content: pcb },
      { fileName: `${options.projectName}.kicad_pro`, content: project },
    ],
  };
}

/**
 * Write generated files into `outputDir`, creating it if needed.
 *
 * Each file is first written to `<name>.tmp` beside its target. The temp
 * files are renamed into place only once every write has succeeded, so a
 * failed run leaves an earlier output set untouched and no temp files
 * behind. A target that exists but is not a regular file is rejected
 * before anything is written.
 */
export function writeProject(files: GeneratedFile[], outputDir: string): string[] {
  fs.mkdirSync(outputDir, { recursive: true });

  const targets = files.map(file => path.join(outputDir, file.fileName));
  for (const target of targets) {
    if (fs.existsSync(target) && !fs.statSync(target).isFile()) {
      throw new KbMatrixError(`Cannot write ${target}: it exists and is not a regular file`);
    }
  }

  const pending: string[] = [];
  try {
    files.forEach((file, i) => {
      const tempPath = `${targets[i]}.tmp`;
      console.log(`  → Writing ${targets[i]}...`);
      pending.push(tempPath);
      fs.writeFileSync(tempPath, file.content, "utf-8");
    });
    while (pending.length > 0) {
      const tempPath = pending[0];
      fs.renameSync(tempPath, tempPath.slice(0, -".tmp".length));
      pending.shift();
    }
  } catch (err) {
    for (const tempPath of pending) {
      fs.rmSync(tempPath, { force: true });
    }
    throw err;
  }
  return targets;
}
