/**
 * Command line parsing for the blogstore CLI
 */

export const COMMANDS = ["create-table", "seed", "export", "reset", "ping", "help"] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  options: {
    schemaFile: string;
    dataFile: string;
    outDir: string;
    verbose: boolean;
  };
  /** Arguments that matched nothing */
  unknown: string[];
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: string[]): CliArgs {
  // Defaults mirror the file names the export writes
  const result: CliArgs = {
    command: "help",
    options: {
      schemaFile: "table_schema.json",
      dataFile: "batch_items.json",
      outDir: ".",
      verbose: false,
    },
    unknown: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (isCommand(arg)) {
      result.command = arg;
    } else if (arg === "--schema" || arg === "-s") {
      result.options.schemaFile = argv[++i] ?? result.options.schemaFile;
    } else if (arg === "--data" || arg === "-d") {
      result.options.dataFile = argv[++i] ?? result.options.dataFile;
    } else if (arg === "--out" || arg === "-o") {
      result.options.outDir = argv[++i] ?? result.options.outDir;
    } else if (arg === "--verbose" || arg === "-v") {
      result.options.verbose = true;
    } else {
      result.unknown.push(arg);
    }
  }

  return result;
}
