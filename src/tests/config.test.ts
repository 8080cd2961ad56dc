import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CONFIG_FILE_NAME, ConfigError, loadConfig, parseBoolean, parseGrouping } from "../cli/config";
import { UsageError, configFlags, parseArgs, readVersion, requireOutput } from "../cli/utils";

function tempDir(yamlContent?: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "kbmatrix-config-"));
  if (yamlContent !== undefined) {
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), yamlContent);
  }
  return dir;
}

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({}, {}, tempDir())).toEqual({
      grouping: "sequential",
      routing: true,
      verbose: false,
      configFile: null,
    });
  });

  it("reads kbmatrix.yml from the working directory", () => {
    const dir = tempDir("grouping: pos\nrouting: false\nverbose: true\n");
    expect(loadConfig({}, {}, dir)).toEqual({
      grouping: "positional",
      routing: false,
      verbose: true,
      configFile: path.join(dir, CONFIG_FILE_NAME),
    });
  });

  it("treats an empty file as no settings", () => {
    expect(loadConfig({}, {}, tempDir("")).grouping).toBe("sequential");
  });

  it("lets the environment override the file", () => {
    const dir = tempDir("grouping: pos\nrouting: false\n");
    const config = loadConfig({}, { KBMATRIX_GROUPING: "seq", KBMATRIX_ROUTING: "on" }, dir);
    expect(config.grouping).toBe("sequential");
    expect(config.routing).toBe(true);
  });

  it("lets flags override the environment", () => {
    const config = loadConfig({ grouping: "positional", routing: false }, { KBMATRIX_GROUPING: "seq" }, tempDir());
    expect(config.grouping).toBe("positional");
    expect(config.routing).toBe(false);
  });

  it("resolves each call from its own flags", () => {
    const dir = tempDir();
    const first = loadConfig({ grouping: "positional" }, {}, dir);
    const second = loadConfig({ grouping: "sequential", routing: false, verbose: true }, {}, dir);
    expect(first).toEqual({ grouping: "positional", routing: true, verbose: false, configFile: null });
    expect(second).toEqual({ grouping: "sequential", routing: false, verbose: true, configFile: null });
  });

  it("picks up a config file written after an earlier call", () => {
    const dir = tempDir();
    expect(loadConfig({}, {}, dir).grouping).toBe("sequential");
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), "grouping: pos\n");
    expect(loadConfig({}, {}, dir).grouping).toBe("positional");
  });

  it("reads the file named by KBMATRIX_CONFIG relative to the working directory", () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, "custom.yml"), "grouping: positional\n");
    const config = loadConfig({}, { KBMATRIX_CONFIG: "custom.yml" }, dir);
    expect(config.grouping).toBe("positional");
    expect(config.configFile).toBe(path.join(dir, "custom.yml"));
  });

  it("fails when a named config file is missing", () => {
    expect(() => loadConfig({ config: "nope.yml" }, {}, tempDir())).toThrow(ConfigError);
  });

  it("reports invalid values in the file", () => {
    const dir = tempDir("grouping: diagonal\n");
    const file = path.join(dir, CONFIG_FILE_NAME);
    expect(() => loadConfig({}, {}, dir)).toThrow(`${file}: unknown grouping "diagonal" (expected seq or pos)`);
    expect(() => loadConfig({}, {}, tempDir("routing: maybe\n"))).toThrow('"routing" must be true or false');
    expect(() => loadConfig({}, {}, tempDir("- a\n- b\n"))).toThrow("expected a mapping at the top level");
  });

  it("reports invalid values in the environment", () => {
    expect(() => loadConfig({}, { KBMATRIX_ROUTING: "sometimes" }, tempDir()))
      .toThrow('KBMATRIX_ROUTING: expected a boolean, got "sometimes"');
  });
});

describe("value parsers", () => {
  it("accept short and long spellings", () => {
    expect(parseGrouping("seq", "test")).toBe("sequential");
    expect(parseGrouping("Positional", "test")).toBe("positional");
    expect(parseBoolean("0", "test")).toBe(false);
    expect(parseBoolean("YES", "test")).toBe(true);
  });
});

describe("parseArgs", () => {
  it("splits positionals, valued options and switches", () => {
    const parsed = parseArgs(["layout.json", "-o", "out", "-c", "pos", "-n", "-V"]);

    expect(parsed.positionals).toEqual(["layout.json"]);
    expect(parsed.values.get("output")).toBe("out");
    expect(configFlags(parsed)).toEqual({ grouping: "positional", routing: false, verbose: true });
  });

  it("accepts long option names", () => {
    const parsed = parseArgs(["--output", "out", "--config", "k.yml", "--no-routing"]);
    expect(configFlags(parsed)).toEqual({ routing: false, config: "k.yml" });
  });

  it("rejects unknown options and missing values", () => {
    expect(() => parseArgs(["--bogus"])).toThrow(UsageError);
    expect(() => parseArgs(["-o"])).toThrow("Option -o needs a value");
  });

  it("requires an output path where one is needed", () => {
    expect(() => requireOutput(parseArgs(["layout.json"]))).toThrow("Missing output path (-o)");
  });
});

describe("readVersion", () => {
  it("reads the package version", () => {
    expect(readVersion()).toBe("1.0.0");
  });
});
