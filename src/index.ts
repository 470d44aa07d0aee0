#!/usr/bin/env node
/**
 * blogstore CLI - Entry Point
 * Creates, seeds, exports and resets the BlogContent table
 *
 * USAGE:
 *   npm run cli -- create-table
 *   npm run cli -- seed --schema table_schema.json --data batch_items.json
 *   npm run cli -- export --out ./backup
 *   npm run cli -- reset
 */

import "dotenv/config";

import fs from "fs/promises";
import { getConfig, logger, toHttpStatus, wrapError, type AppConfig } from "@blogstore/core";
import {
  TableAdmin,
  buildCreateTableInput,
  createDynamoClient,
  parseTableSchema,
  splitBatchFile,
} from "@blogstore/db";
import { parseArgs } from "./cli/args.js";

function printHelp(): void {
  console.log(`
blogstore - single-table blog data tooling

USAGE:
  npm run cli -- <command> [options]

COMMANDS:
  create-table        Create the table with its type and owner indexes
  seed                Create the table from a schema file, then load a batch file
  export              Write table_schema.json and batch_items.json for the table
  reset               Delete the table
  ping                Check that the table is reachable
  help                Show this help message

OPTIONS:
  -s, --schema <file>   Schema file for seed (default: table_schema.json)
  -d, --data <file>     Batch file for seed (default: batch_items.json)
  -o, --out <dir>       Output directory for export (default: .)
  -v, --verbose         Enable debug logging

ENVIRONMENT:
  TABLE_NAME          Table to operate on (default: BlogContent)
  DYNAMODB_ENDPOINT   Store endpoint (default: http://localhost:8000)
  AWS_REGION          Region (default: us-east-1)
`);
}

async function main(): Promise<void> {
  const { command, options, unknown } = parseArgs(process.argv.slice(2));

  if (command === "help" || unknown.length > 0) {
    if (unknown.length > 0) console.error(`Unknown arguments: ${unknown.join(" ")}`);
    printHelp();
    process.exit(command === "help" && unknown.length === 0 ? 0 : 1);
  }

  let config: AppConfig;
  try {
    config = getConfig();
  } catch (error) {
    console.error("Configuration error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }

  logger.configure({
    logLevel: options.verbose ? "debug" : config.env.logLevel,
    logFormat: config.env.logFormat,
  });

  const { tableName } = config.store;
  const admin = new TableAdmin(createDynamoClient(config.store), tableName);

  try {
    switch (command) {
      case "create-table":
        await admin.createTable(buildCreateTableInput(tableName));
        console.log(`Created table: ${tableName}`);
        break;

      case "seed": {
        const schema = parseTableSchema(JSON.parse(await fs.readFile(options.schemaFile, "utf-8")));
        const lines = splitBatchFile(await fs.readFile(options.dataFile, "utf-8"));
        console.log(`Creating table: ${schema.TableName}`);
        await admin.ensureTable(schema);
        console.log(`Seeding table: ${schema.TableName}`);
        const written = await admin.seed(lines, (current, total) => {
          console.log(`Processing line ${current} of ${total}`);
        });
        console.log(`Seeded ${written} item(s)`);
        break;
      }

      case "export": {
        const result = await admin.exportTo(options.outDir);
        console.log(`Exported schema: ${result.schemaPath}`);
        console.log(`Exported ${result.items} item(s): ${result.dataPath}`);
        break;
      }

      case "reset":
        await admin.deleteTable();
        console.log(`Deleted table: ${tableName}`);
        break;

      case "ping": {
        const table = await admin.describe();
        console.log(`${tableName}: ${table.TableStatus ?? "UNKNOWN"}, ${table.ItemCount ?? 0} item(s)`);
        break;
      }
    }
  } catch (error) {
    const wrapped = wrapError(error);
    logger.error(`${command} failed`, wrapped, { status: toHttpStatus(wrapped) });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
