import * as fs from "fs";
import * as path from "path";
import { ConfigFlags, parseGrouping } from "./config";

export function die(msg: string): never {
  console.error(`❌  ${msg}`);
  process.exit(1);
}

/** Bad command line. The CLI prints the message and exits 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ParsedArgs {
  positionals: string[];
  /** Options that take a value, keyed by their long name */
  values: Map<string, string>;
  /** Options without a value, by long name */
  switches: Set<string>;
}

/** Short and long spellings of every option the commands accept. */
const OPTIONS: Record<string, { name: string; takesValue: boolean }> = {
  "-o": { name: "output", takesValue: true },
  "--output": { name: "output", takesValue: true },
  "-c": { name: "grouping", takesValue: true },
  "--grouping": { name: "grouping", takesValue: true },
  "--config": { name: "config", takesValue: true },
  "-n": { name: "no-routing", takesValue: false },
  "--no-routing": { name: "no-routing", takesValue: false },
  "-V": { name: "verbose", takesValue: false },
  "--verbose": { name: "verbose", takesValue: false },
};

export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], values: new Map(), switches: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("-") || arg === "-") {
      parsed.positionals.push(arg);
      continue;
    }
    const option = OPTIONS[arg];
    if (!option) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    if (!option.takesValue) {
      parsed.switches.add(option.name);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`Option ${arg} needs a value`);
    }
    parsed.values.set(option.name, value);
    i++;
  }
  return parsed;
}

/** Map parsed options onto config flags; absent options stay unset. */
export function configFlags(parsed: ParsedArgs): ConfigFlags {
  const flags: ConfigFlags = {};
  const grouping = parsed.values.get("grouping");
  if (grouping !== undefined) flags.grouping = parseGrouping(grouping, "-c");
  if (parsed.switches.has("no-routing")) flags.routing = false;
  if (parsed.switches.has("verbose")) flags.verbose = true;
  const config = parsed.values.get("config");
  if (config !== undefined) flags.config = config;
  return flags;
}

/** The one positional argument every command takes. */
export function requireLayoutPath(parsed: ParsedArgs): string {
  const [layout, ...extra] = parsed.positionals;
  if (!layout) {
    throw new UsageError("Missing layout file argument");
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra[0]}`);
  }
  const resolved = path.resolve(layout);
  if (!fs.existsSync(resolved)) {
    throw new UsageError(`Layout file not found: ${layout}`);
  }
  return resolved;
}

export function requireOutput(parsed: ParsedArgs): string {
  const output = parsed.values.get("output");
  if (!output) {
    throw new UsageError("Missing output path (-o)");
  }
  return path.resolve(output);
}

/** Package version, read from the package.json next to src/ or dist/. */
export function readVersion(): string {
  const pkgPath = path.resolve(__dirname, "../../package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}
