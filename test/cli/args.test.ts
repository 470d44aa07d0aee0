import { describe, it, expect } from "vitest";
import { parseArgs } from "../../src/cli/args.js";

describe("parseArgs", () => {
  it("defaults to help with the export file names", () => {
    expect(parseArgs([])).toEqual({
      command: "help",
      options: {
        schemaFile: "table_schema.json",
        dataFile: "batch_items.json",
        outDir: ".",
        verbose: false,
      },
      unknown: [],
    });
  });

  it("reads a command with its flags", () => {
    const args = parseArgs(["seed", "-d", "items.jsonl", "--schema", "schema.json", "-v"]);

    expect(args.command).toBe("seed");
    expect(args.options).toMatchObject({
      dataFile: "items.jsonl",
      schemaFile: "schema.json",
      verbose: true,
    });
  });

  it("collects arguments it does not know", () => {
    const args = parseArgs(["export", "--out", "backup", "--force", "extra"]);

    expect(args.command).toBe("export");
    expect(args.options.outDir).toBe("backup");
    expect(args.unknown).toEqual(["--force", "extra"]);
  });

  it("keeps the default when a flag has no value", () => {
    expect(parseArgs(["export", "-o"]).options.outDir).toBe(".");
  });
});
