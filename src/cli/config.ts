import * as path from "path";
import * as fs from "fs";
import * as yaml from "js-yaml";
import { DEFAULT_MATRIX_OPTIONS, GroupingPolicy, MatrixOptions } from "../matrix/types";
import { KbMatrixError } from "../matrix/errors";

export const CONFIG_FILE_NAME = "kbmatrix.yml";

export interface Config extends MatrixOptions {
    verbose: boolean;
    /** The YAML file the settings were read from, if any */
    configFile: string | null;
}

/** Settings given on the command line. Unset fields fall through. */
export interface ConfigFlags {
    grouping?: GroupingPolicy;
    routing?: boolean;
    verbose?: boolean;
    config?: string;
}

type Env = Record<string, string | undefined>;

/** A setting from the environment or the YAML file has an invalid value. */
export class ConfigError extends KbMatrixError {}

/** Accepts the long names and the `seq` / `pos` shorthands. */
export function parseGrouping(value: string, source: string): GroupingPolicy {
    switch (value.trim().toLowerCase()) {
        case "seq":
        case "sequential":
            return "sequential";
        case "pos":
        case "positional":
            return "positional";
        default:
            throw new ConfigError(`${source}: unknown grouping "${value}" (expected seq or pos)`);
    }
}

export function parseBoolean(value: string, source: string): boolean {
    switch (value.trim().toLowerCase()) {
        case "1": case "true": case "yes": case "on":
            return true;
        case "0": case "false": case "no": case "off":
            return false;
        default:
            throw new ConfigError(`${source}: expected a boolean, got "${value}"`);
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Settings found in a YAML config file. */
export function readConfigFile(filePath: string): Partial<Omit<Config, "configFile">> {
    const content = fs.readFileSync(filePath, "utf-8");
    let doc: unknown;
    try {
        doc = yaml.load(content);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`${filePath} is not valid YAML: ${reason}`);
    }
    if (doc === undefined || doc === null) return {};
    if (!isPlainObject(doc)) {
        throw new ConfigError(`${filePath}: expected a mapping at the top level`);
    }

    const result: Partial<Omit<Config, "configFile">> = {};
    if (doc.grouping !== undefined) {
        if (typeof doc.grouping !== "string") {
            throw new ConfigError(`${filePath}: "grouping" must be a string`);
        }
        result.grouping = parseGrouping(doc.grouping, filePath);
    }
    for (const key of ["routing", "verbose"] as const) {
        const value = doc[key];
        if (value === undefined) continue;
        if (typeof value !== "boolean") {
            throw new ConfigError(`${filePath}: "${key}" must be true or false`);
        }
        result[key] = value;
    }
    return result;
}

/**
 * Resolve the effective configuration. Priority: flags, environment,
 * config file, defaults.
 *
 * The config file is the `--config` path, else `KBMATRIX_CONFIG`, else
 * `kbmatrix.yml` in `cwd` when it exists. An explicitly named file must
 * exist.
 */
export function loadConfig(flags: ConfigFlags = {}, env: Env = process.env, cwd: string = process.cwd()): Config {
    let configFile: string | null = null;
    const explicit = flags.config ?? env.KBMATRIX_CONFIG;
    if (explicit) {
        configFile = path.resolve(cwd, explicit);
        if (!fs.existsSync(configFile)) {
            throw new ConfigError(`Config file not found: ${configFile}`);
        }
    } else if (fs.existsSync(path.join(cwd, CONFIG_FILE_NAME))) {
        configFile = path.join(cwd, CONFIG_FILE_NAME);
    }

    const fromFile = configFile ? readConfigFile(configFile) : {};

    const envGrouping = env.KBMATRIX_GROUPING
        ? parseGrouping(env.KBMATRIX_GROUPING, "KBMATRIX_GROUPING")
        : undefined;
    const envRouting = env.KBMATRIX_ROUTING
        ? parseBoolean(env.KBMATRIX_ROUTING, "KBMATRIX_ROUTING")
        : undefined;

    return {
        grouping: flags.grouping ?? envGrouping ?? fromFile.grouping ?? DEFAULT_MATRIX_OPTIONS.grouping,
        routing: flags.routing ?? envRouting ?? fromFile.routing ?? DEFAULT_MATRIX_OPTIONS.routing,
        verbose: flags.verbose ?? fromFile.verbose ?? false,
        configFile,
    };
}
