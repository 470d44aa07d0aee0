/**
 * Table Schema and Batch Files
 * Table definition plus the import/export file formats used to move data
 * between tables: a create-table schema and one BatchWriteItem request per line.
 */

import type {
  AttributeValue,
  CreateTableCommandInput,
  GlobalSecondaryIndex,
  KeySchemaElement,
  Projection,
  TableDescription,
  WriteRequest,
} from "@aws-sdk/client-dynamodb";
import { z } from "zod";
import { ValidationError } from "@blogstore/core";
import { GSI } from "../keys.js";

/**
 * The single table with its type and owner indexes
 */
export function buildCreateTableInput(tableName: string): CreateTableCommandInput {
  const stringAttr = (name: string) => ({ AttributeName: name, AttributeType: "S" as const });

  return {
    TableName: tableName,
    KeySchema: [
      { AttributeName: "PK", KeyType: "HASH" },
      { AttributeName: "SK", KeyType: "RANGE" },
    ],
    AttributeDefinitions: [
      stringAttr("PK"),
      stringAttr("SK"),
      stringAttr("GSI1PK"),
      stringAttr("GSI1SK"),
      stringAttr("GSI2PK"),
      stringAttr("GSI2SK"),
    ],
    GlobalSecondaryIndexes: [GSI.TYPE, GSI.OWNER].map((index): GlobalSecondaryIndex => ({
      IndexName: index,
      KeySchema: [
        { AttributeName: `${index}PK`, KeyType: "HASH" },
        { AttributeName: `${index}SK`, KeyType: "RANGE" },
      ],
      Projection: { ProjectionType: "ALL" },
    })),
    BillingMode: "PAY_PER_REQUEST",
  };
}

interface IndexDefinition {
  IndexName: string;
  KeySchema: KeySchemaElement[];
  Projection: Projection;
}

function toIndex(description: {
  IndexName?: string;
  KeySchema?: KeySchemaElement[];
  Projection?: Projection;
}): IndexDefinition {
  if (!description.IndexName || !description.KeySchema || !description.Projection) {
    throw new ValidationError("Index description is incomplete", {
      field: "IndexName",
      issues: [`index ${description.IndexName ?? "(unnamed)"} lacks a name, key schema or projection`],
    });
  }
  return {
    IndexName: description.IndexName,
    KeySchema: description.KeySchema,
    Projection: description.Projection,
  };
}

/**
 * Reduce a DescribeTable result to an input CreateTable accepts, billed on demand
 */
export function toImportableSchema(table: TableDescription): CreateTableCommandInput {
  if (!table.TableName || !table.KeySchema || !table.AttributeDefinitions) {
    throw new ValidationError("Table description is incomplete", {
      issues: ["TableName, KeySchema and AttributeDefinitions are required"],
    });
  }

  const schema: CreateTableCommandInput = {
    TableName: table.TableName,
    KeySchema: table.KeySchema,
    AttributeDefinitions: table.AttributeDefinitions,
  };

  if (table.LocalSecondaryIndexes?.length) {
    schema.LocalSecondaryIndexes = table.LocalSecondaryIndexes.map(toIndex);
  }
  if (table.GlobalSecondaryIndexes?.length) {
    schema.GlobalSecondaryIndexes = table.GlobalSecondaryIndexes.map(toIndex);
  }
  schema.BillingMode = "PAY_PER_REQUEST";

  return schema;
}

const keySchemaSchema = z.array(
  z.object({
    AttributeName: z.string().min(1),
    KeyType: z.enum(["HASH", "RANGE"]),
  })
);

const indexSchema = z.object({
  IndexName: z.string().min(1),
  KeySchema: keySchemaSchema,
  Projection: z.object({
    ProjectionType: z.enum(["ALL", "KEYS_ONLY", "INCLUDE"]),
    NonKeyAttributes: z.array(z.string()).optional(),
  }),
});

const tableSchemaSchema = z.object({
  TableName: z.string().min(1),
  KeySchema: keySchemaSchema.min(1),
  AttributeDefinitions: z.array(
    z.object({
      AttributeName: z.string().min(1),
      AttributeType: z.enum(["S", "N", "B"]),
    })
  ),
  LocalSecondaryIndexes: z.array(indexSchema).optional(),
  GlobalSecondaryIndexes: z.array(indexSchema).optional(),
  BillingMode: z.enum(["PAY_PER_REQUEST", "PROVISIONED"]).optional(),
});

/**
 * Validate the contents of a schema file written by `toImportableSchema`
 */
export function parseTableSchema(json: unknown): CreateTableCommandInput {
  const result = tableSchemaSchema.safeParse(json);
  if (!result.success) {
    throw new ValidationError("Invalid table schema", {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return result.data;
}

// ============================================================
// Batch lines
// ============================================================

const attributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.object({ S: z.string() }).strict(),
    z.object({ N: z.string() }).strict(),
    z.object({ BOOL: z.boolean() }).strict(),
    z.object({ NULL: z.literal(true) }).strict(),
    z.object({ SS: z.array(z.string()) }).strict(),
    z.object({ NS: z.array(z.string()) }).strict(),
    z.object({ L: z.array(attributeValueSchema) }).strict(),
    z.object({ M: z.record(attributeValueSchema) }).strict(),
  ])
);

const batchLineSchema = z
  .record(
    z
      .array(
        z.object({
          PutRequest: z.object({ Item: z.record(attributeValueSchema) }),
        })
      )
      .min(1)
  )
  .refine((line) => Object.keys(line).length === 1, {
    message: "A batch line names exactly one table",
  });

export type BatchLine = Record<string, WriteRequest[]>;

export function toBatchLines(
  tableName: string,
  items: Array<Record<string, AttributeValue>>
): string[] {
  return items.map((item) => JSON.stringify({ [tableName]: [{ PutRequest: { Item: item } }] }));
}

/**
 * Parse one line of a batch file into BatchWriteItem request items
 */
export function parseBatchLine(line: string, lineNumber: number): BatchLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new ValidationError(`Line ${lineNumber} is not valid JSON`, {
      issues: [error instanceof Error ? error.message : String(error)],
      context: { lineNumber },
    });
  }

  const result = batchLineSchema.safeParse(json);
  if (!result.success) {
    throw new ValidationError(`Line ${lineNumber} is not a batch write request`, {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      context: { lineNumber },
    });
  }
  return result.data;
}
