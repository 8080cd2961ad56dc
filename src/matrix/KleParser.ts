import * as fs from "fs";
import { Key } from "./types";
import { Keyboard } from "./Keyboard";
import { LayoutParseError } from "./errors";
import { escapeLegend } from "./legend";

/** A top-level element of a KLE document, classified before use. */
export type KleElement =
  | { kind: "row"; items: unknown[] }
  | { kind: "meta"; name?: string; author?: string };

/** Key modifier properties the matrix generator cares about. */
interface KleModifier {
  x?: number;
  y?: number;
  w?: number;
  h?: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return `${typeof value} ${JSON.stringify(value)}`;
}

/**
 * Classify one top-level element. Rows are arrays; any plain object is the
 * metadata block. Everything else is rejected.
 */
export function decodeElement(element: unknown, position: number): KleElement {
  if (Array.isArray(element)) {
    return { kind: "row", items: element };
  }
  if (isPlainObject(element)) {
    const meta: Extract<KleElement, { kind: "meta" }> = { kind: "meta" };
    if (typeof element.name === "string") meta.name = element.name;
    if (typeof element.author === "string") meta.author = element.author;
    return meta;
  }
  throw new LayoutParseError(`Found unexpected JSON element at position ${position} (${describeValue(element)})`);
}

function readModifier(item: Record<string, unknown>, where: string): KleModifier {
  const modifier: KleModifier = {};
  for (const prop of ["x", "y", "w", "h"] as const) {
    if (!(prop in item)) continue;
    const value = item[prop];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new LayoutParseError(`Property "${prop}" at ${where} must be a number, got ${describeValue(value)}`);
    }
    modifier[prop] = value;
  }
  return modifier;
}

/**
 * Decode a KLE layout into a keyboard with a flat, ordered key list.
 *
 * Keys are positioned by their centre in keyboard units. Matrix rows and
 * columns are left unassigned; see {@link groupKeys}.
 */
export function parseKle(document: unknown): Keyboard {
  if (!Array.isArray(document)) {
    throw new LayoutParseError(`A KLE layout must be a JSON array, got ${describeValue(document)}`);
  }

  const keyboard = new Keyboard();
  let cursorX = 0;
  let cursorY = 0;
  let rowNumber = 0;

  document.forEach((raw, position) => {
    const element = decodeElement(raw, position);

    if (element.kind === "meta") {
      if (element.name !== undefined) keyboard.name = element.name;
      if (element.author !== undefined) keyboard.author = element.author;
      return;
    }

    let width = 1;
    let height = 1;

    element.items.forEach((item, itemPosition) => {
      const where = `row ${rowNumber}, item ${itemPosition}`;

      if (typeof item === "string") {
        const key: Key = {
          index: keyboard.keys.length,
          xUnit: cursorX + width / 2,
          yUnit: cursorY + height / 2,
          width,
          height,
          label: item,
          legend: escapeLegend(item),
          row: -1,
          col: -1,
          rowNet: 0,
          colNet: 0,
          diodeNet: 0,
        };
        keyboard.keys.push(key);

        cursorX += width;
        width = 1;
        height = 1;
      } else if (isPlainObject(item)) {
        const modifier = readModifier(item, where);
        if (modifier.x !== undefined) cursorX += modifier.x;
        if (modifier.y !== undefined) cursorY += modifier.y;
        if (modifier.w !== undefined) width = modifier.w;
        if (modifier.h !== undefined) height = modifier.h;
      } else {
        throw new LayoutParseError(`Found unexpected JSON element at ${where} (${describeValue(item)})`);
      }
    });

    cursorY += 1;
    cursorX = 0;
    rowNumber++;
  });

  return keyboard;
}

/** Read a KLE JSON file without interpreting it. */
export function readKleDocument(filePath: string): unknown {
  const content = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LayoutParseError(`${filePath} is not valid JSON: ${reason}`);
  }
}

/** Read and parse a KLE JSON file. */
export function loadKleFile(filePath: string): Keyboard {
  return parseKle(readKleDocument(filePath));
}
