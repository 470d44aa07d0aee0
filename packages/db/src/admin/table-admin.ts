/**
 * Table Admin
 * Create, delete, describe, seed and export the table
 *
 * SEED FLOW:
 * ==========
 * ensureTable(schema)
 *   └─ CreateTable; an existing table is kept with a warning
 *
 * seed(lines)
 *   ├─ parse every line first (ValidationError names the bad line; nothing is written)
 *   └─ for each line: BatchWriteItem
 *        └─ unprocessed items are resent with exponential backoff, up to MAX_ATTEMPTS
 */

import fs from "fs/promises";
import path from "path";
import {
  BatchWriteItemCommand,
  CreateTableCommand,
  DeleteTableCommand,
  DescribeTableCommand,
  ScanCommand,
  waitUntilTableExists,
  type AttributeValue,
  type CreateTableCommandInput,
  type DynamoDBClient,
  type TableDescription,
} from "@aws-sdk/client-dynamodb";
import {
  StoreUnavailableError,
  isErrorKind,
  logger as rootLogger,
  type Logger,
} from "@blogstore/core";
import { mapStoreError } from "../store/dynamo.js";
import { parseBatchLine, toBatchLines, toImportableSchema, type BatchLine } from "./schema.js";

export const SCHEMA_FILE = "table_schema.json";
export const DATA_FILE = "batch_items.json";

const MAX_ATTEMPTS = 3;
const BACKOFF_MS = 100;

export type SeedProgress = (current: number, total: number) => void;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Split a batch file into its non-empty lines
 */
export function splitBatchFile(content: string): string[] {
  return content.split("\n").filter((line) => line.trim().length > 0);
}

export class TableAdmin {
  private readonly log: Logger;

  constructor(
    private readonly client: DynamoDBClient,
    private readonly tableName: string,
    logger?: Logger
  ) {
    this.log = logger ?? rootLogger.child({ component: "table-admin", table: tableName });
  }

  async createTable(schema: CreateTableCommandInput): Promise<void> {
    this.log.info("Creating table", { table: schema.TableName });
    try {
      await this.client.send(new CreateTableCommand(schema));
      await waitUntilTableExists(
        { client: this.client, maxWaitTime: 60 },
        { TableName: schema.TableName }
      );
    } catch (error) {
      throw mapStoreError(error, schema.TableName ?? this.tableName);
    }
  }

  /**
   * Create the table unless it is already there; true when it was created
   */
  async ensureTable(schema: CreateTableCommandInput): Promise<boolean> {
    try {
      await this.createTable(schema);
      return true;
    } catch (error) {
      if (!isErrorKind(error, "Conflict")) throw error;
      this.log.warn("Table already exists, keeping it", { table: schema.TableName });
      return false;
    }
  }

  async deleteTable(): Promise<void> {
    this.log.info("Deleting table", { table: this.tableName });
    try {
      await this.client.send(new DeleteTableCommand({ TableName: this.tableName }));
    } catch (error) {
      throw mapStoreError(error, this.tableName);
    }
  }

  async describe(): Promise<TableDescription> {
    try {
      const output = await this.client.send(
        new DescribeTableCommand({ TableName: this.tableName })
      );
      if (!output.Table) {
        throw new StoreUnavailableError(`No description returned for ${this.tableName}`);
      }
      return output.Table;
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      throw mapStoreError(error);
    }
  }

  /**
   * Every raw item in the table, following pagination
   */
  async scanAll(): Promise<Array<Record<string, AttributeValue>>> {
    const items: Array<Record<string, AttributeValue>> = [];
    let startKey: Record<string, AttributeValue> | undefined;

    try {
      do {
        const output = await this.client.send(
          new ScanCommand({ TableName: this.tableName, ExclusiveStartKey: startKey })
        );
        items.push(...(output.Items ?? []));
        startKey = output.LastEvaluatedKey;
      } while (startKey);
    } catch (error) {
      throw mapStoreError(error);
    }

    return items;
  }

  async seed(lines: string[], onProgress?: SeedProgress): Promise<number> {
    const batches = lines.map((line, i) => parseBatchLine(line, i + 1));

    let written = 0;
    for (const [i, batch] of batches.entries()) {
      onProgress?.(i + 1, batches.length);
      written += await this.writeBatch(batch);
    }

    this.log.info("Seed completed", { lines: batches.length, items: written });
    return written;
  }

  private async writeBatch(batch: BatchLine): Promise<number> {
    let pending: BatchLine = batch;
    let attempt = 0;
    const total = countRequests(batch);

    while (countRequests(pending) > 0) {
      attempt++;
      if (attempt > MAX_ATTEMPTS) {
        throw new StoreUnavailableError(
          `${countRequests(pending)} item(s) still unprocessed after ${MAX_ATTEMPTS} attempts`
        );
      }
      if (attempt > 1) {
        const backoffMs = BACKOFF_MS * Math.pow(2, attempt - 2);
        this.log.debug(`Retrying unprocessed items in ${backoffMs}ms`, { attempt });
        await sleep(backoffMs);
      }

      try {
        const output = await this.client.send(
          new BatchWriteItemCommand({ RequestItems: pending })
        );
        pending = output.UnprocessedItems ?? {};
      } catch (error) {
        throw mapStoreError(error);
      }
    }

    return total;
  }

  /**
   * Write the importable schema and the batch file into a directory
   */
  async exportTo(dir: string): Promise<{ schemaPath: string; dataPath: string; items: number }> {
    await fs.mkdir(dir, { recursive: true });

    this.log.info("Exporting schema", { table: this.tableName });
    const schema = toImportableSchema(await this.describe());
    const schemaPath = path.join(dir, SCHEMA_FILE);
    await fs.writeFile(schemaPath, JSON.stringify(schema, null, 2));

    this.log.info("Exporting data", { table: this.tableName });
    const items = await this.scanAll();
    const dataPath = path.join(dir, DATA_FILE);
    const lines = toBatchLines(this.tableName, items);
    await fs.writeFile(dataPath, lines.length > 0 ? `${lines.join("\n")}\n` : "");

    return { schemaPath, dataPath, items: items.length };
  }
}

function countRequests(batch: BatchLine): number {
  return Object.values(batch).reduce((sum, requests) => sum + requests.length, 0);
}
