/**
 * DynamoDB Store
 * EntityStore over the DynamoDB document client
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  type PutCommandInput,
  type QueryCommandInput,
} from "@aws-sdk/lib-dynamodb";
import {
  ConflictError,
  StoreUnavailableError,
  logger as rootLogger,
  type Logger,
  type StoreConfig,
} from "@blogstore/core";
import { keyToString } from "../keys.js";
import type {
  AttributeMap,
  EntityStore,
  ItemKey,
  PutOptions,
  QueryRequest,
  StoreCallOptions,
} from "./types.js";

/**
 * Create the low-level client. Local endpoints get placeholder credentials,
 * which DynamoDB Local accepts.
 */
export function createDynamoClient(config: StoreConfig): DynamoDBClient {
  if (config.endpoint) {
    return new DynamoDBClient({
      region: config.region,
      endpoint: config.endpoint,
      credentials: { accessKeyId: "local", secretAccessKey: "local" },
    });
  }
  return new DynamoDBClient({ region: config.region });
}

export function createDocumentClient(client: DynamoDBClient): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: { removeUndefinedValues: true },
  });
}

// ============================================================
// Command builders
// ============================================================

export function buildPutInput(
  tableName: string,
  item: AttributeMap & ItemKey,
  condition?: PutOptions["condition"]
): PutCommandInput {
  const input: PutCommandInput = { TableName: tableName, Item: item };
  if (condition === "absent") {
    input.ConditionExpression = "attribute_not_exists(PK)";
  } else if (condition === "present") {
    input.ConditionExpression = "attribute_exists(PK)";
  }
  return input;
}

export function buildQueryInput(
  tableName: string,
  request: QueryRequest,
  exclusiveStartKey?: Record<string, unknown>
): QueryCommandInput {
  const names: Record<string, string> = {
    "#pk": request.index ? `${request.index}PK` : "PK",
  };
  const values: Record<string, unknown> = { ":pk": request.partition };
  let keyCondition = "#pk = :pk";

  if (request.sortKey) {
    names["#sk"] = request.index ? `${request.index}SK` : "SK";
    if ("eq" in request.sortKey) {
      values[":sk"] = request.sortKey.eq;
      keyCondition += " AND #sk = :sk";
    } else {
      values[":sk"] = request.sortKey.beginsWith;
      keyCondition += " AND begins_with(#sk, :sk)";
    }
  }

  const filters: string[] = [];
  Object.entries(request.filter ?? {}).forEach(([attribute, value], i) => {
    names[`#f${i}`] = attribute;
    values[`:f${i}`] = value;
    filters.push(`#f${i} = :f${i}`);
  });

  const input: QueryCommandInput = {
    TableName: tableName,
    KeyConditionExpression: keyCondition,
    ExpressionAttributeNames: names,
    ExpressionAttributeValues: values,
  };
  if (request.index) input.IndexName = request.index;
  if (filters.length > 0) input.FilterExpression = filters.join(" AND ");
  if (exclusiveStartKey) input.ExclusiveStartKey = exclusiveStartKey;
  return input;
}

/**
 * Translate an SDK failure into the store error taxonomy. `target` is the item
 * key of a data call or the table name of a table call.
 */
export function mapStoreError(error: unknown, target?: ItemKey | string): Error {
  const name = error instanceof Error ? error.name : "";
  const id = target === undefined ? "unknown" : typeof target === "string" ? target : keyToString(target);

  if (name === "ConditionalCheckFailedException") {
    return new ConflictError(`Conditional write failed for ${id}`, id, error);
  }
  // Table already exists or is mid-transition; retrying the same call cannot succeed
  if (name === "ResourceInUseException") {
    return new ConflictError(`Table in use: ${id}`, id, error);
  }
  if (name === "AbortError" || name === "TimeoutError") {
    return new StoreUnavailableError("Store call aborted", error);
  }
  if (name === "ResourceNotFoundException") {
    return new StoreUnavailableError("Table not found", error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new StoreUnavailableError(`Store request failed: ${message}`, error);
}

// ============================================================
// Store
// ============================================================

export interface DynamoStoreOptions {
  tableName: string;
  /** Applied to calls made without a signal */
  timeoutMs: number;
  logger?: Logger;
}

export class DynamoEntityStore implements EntityStore {
  private readonly tableName: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(
    private readonly client: DynamoDBDocumentClient,
    options: DynamoStoreOptions
  ) {
    this.tableName = options.tableName;
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger ?? rootLogger.child({ component: "dynamo-store" });
  }

  private signalFor(options?: StoreCallOptions): AbortSignal {
    return options?.signal ?? AbortSignal.timeout(this.timeoutMs);
  }

  async get(key: ItemKey, options?: StoreCallOptions): Promise<AttributeMap | null> {
    try {
      const output = await this.client.send(
        new GetCommand({ TableName: this.tableName, Key: { PK: key.PK, SK: key.SK } }),
        { abortSignal: this.signalFor(options) }
      );
      return output.Item ?? null;
    } catch (error) {
      this.log.debug("Get failed", { key: keyToString(key) });
      throw mapStoreError(error, key);
    }
  }

  async put(item: AttributeMap & ItemKey, options?: PutOptions): Promise<void> {
    try {
      await this.client.send(
        new PutCommand(buildPutInput(this.tableName, item, options?.condition)),
        { abortSignal: this.signalFor(options) }
      );
    } catch (error) {
      this.log.debug("Put failed", { key: keyToString(item), condition: options?.condition });
      throw mapStoreError(error, item);
    }
  }

  async delete(key: ItemKey, options?: StoreCallOptions): Promise<boolean> {
    try {
      const output = await this.client.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { PK: key.PK, SK: key.SK },
          ReturnValues: "ALL_OLD",
        }),
        { abortSignal: this.signalFor(options) }
      );
      return output.Attributes !== undefined;
    } catch (error) {
      this.log.debug("Delete failed", { key: keyToString(key) });
      throw mapStoreError(error, key);
    }
  }

  async query(request: QueryRequest, options?: StoreCallOptions): Promise<AttributeMap[]> {
    const signal = this.signalFor(options);
    const items: AttributeMap[] = [];
    let startKey: Record<string, unknown> | undefined;

    try {
      do {
        const output = await this.client.send(
          new QueryCommand(buildQueryInput(this.tableName, request, startKey)),
          { abortSignal: signal }
        );
        items.push(...(output.Items ?? []));
        startKey = output.LastEvaluatedKey;
      } while (startKey);
    } catch (error) {
      this.log.debug("Query failed", { index: request.index, partition: request.partition });
      throw mapStoreError(error);
    }

    return items;
  }
}
