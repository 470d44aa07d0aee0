import { describe, it, expect, vi } from "vitest";
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { ConflictError, StoreUnavailableError } from "@blogstore/core";
import {
  DynamoEntityStore,
  buildPutInput,
  buildQueryInput,
  createDocumentClient,
  mapStoreError,
} from "../src/index.js";

function sdkError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe("buildPutInput", () => {
  const item = { PK: "USER#u1", SK: "USER#u1", name: "Ada" };

  it("writes unconditionally by default", () => {
    expect(buildPutInput("BlogContent", item)).toEqual({ TableName: "BlogContent", Item: item });
  });

  it("maps the absent and present conditions", () => {
    expect(buildPutInput("BlogContent", item, "absent").ConditionExpression).toBe(
      "attribute_not_exists(PK)"
    );
    expect(buildPutInput("BlogContent", item, "present").ConditionExpression).toBe(
      "attribute_exists(PK)"
    );
  });
});

describe("buildQueryInput", () => {
  it("queries a table partition by exact sort key", () => {
    const input = buildQueryInput("BlogContent", {
      partition: "BLOG#b1",
      sortKey: { eq: "COMMENT#u1" },
    });

    expect(input).toEqual({
      TableName: "BlogContent",
      KeyConditionExpression: "#pk = :pk AND #sk = :sk",
      ExpressionAttributeNames: { "#pk": "PK", "#sk": "SK" },
      ExpressionAttributeValues: { ":pk": "BLOG#b1", ":sk": "COMMENT#u1" },
    });
  });

  it("targets an index with a prefix and equality filters", () => {
    const input = buildQueryInput("BlogContent", {
      index: "GSI2",
      partition: "USER#u1",
      sortKey: { beginsWith: "BLOG#" },
      filter: { title: "First", score: 3 },
    });

    expect(input).toEqual({
      TableName: "BlogContent",
      IndexName: "GSI2",
      KeyConditionExpression: "#pk = :pk AND begins_with(#sk, :sk)",
      FilterExpression: "#f0 = :f0 AND #f1 = :f1",
      ExpressionAttributeNames: {
        "#pk": "GSI2PK",
        "#sk": "GSI2SK",
        "#f0": "title",
        "#f1": "score",
      },
      ExpressionAttributeValues: {
        ":pk": "USER#u1",
        ":sk": "BLOG#",
        ":f0": "First",
        ":f1": 3,
      },
    });
  });

  it("continues from a start key", () => {
    const startKey = { PK: "USER#u1", SK: "USER#u1", GSI1PK: "USER", GSI1SK: "USER#u1" };
    const input = buildQueryInput("BlogContent", { index: "GSI1", partition: "USER" }, startKey);

    expect(input.ExclusiveStartKey).toEqual(startKey);
    expect(input.KeyConditionExpression).toBe("#pk = :pk");
  });
});

describe("mapStoreError", () => {
  it("turns a failed condition into a conflict on the key", () => {
    const error = mapStoreError(sdkError("ConditionalCheckFailedException"), {
      PK: "USER#u1",
      SK: "USER#u1",
    });

    expect(error).toBeInstanceOf(ConflictError);
    expect(error.message).toBe("Conditional write failed for USER#u1|USER#u1");
  });

  it("turns a table that already exists into a conflict that is not retried", () => {
    const error = mapStoreError(sdkError("ResourceInUseException"), "BlogContent");

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ message: "Table in use: BlogContent", retryable: false });
  });

  it("treats aborts and timeouts as an unavailable store", () => {
    for (const name of ["AbortError", "TimeoutError"]) {
      const error = mapStoreError(sdkError(name));
      expect(error).toBeInstanceOf(StoreUnavailableError);
      expect(error.message).toBe("Store call aborted");
    }
  });

  it("reports a missing table", () => {
    expect(mapStoreError(sdkError("ResourceNotFoundException")).message).toBe("Table not found");
  });

  it("wraps anything else as retryable", () => {
    const error = mapStoreError(new Error("socket hang up"));

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({
      message: "Store request failed: socket hang up",
      kind: "StoreUnavailable",
      retryable: true,
      httpStatus: 503,
    });
  });
});

describe("DynamoEntityStore.query", () => {
  it("follows LastEvaluatedKey across pages", async () => {
    const client = createDocumentClient(
      new DynamoDBClient({
        region: "us-east-1",
        credentials: { accessKeyId: "test", secretAccessKey: "test-secret" },
      })
    );
    const store = new DynamoEntityStore(client, { tableName: "BlogContent", timeoutMs: 1000 });
    const lastKey = { PK: "USER#u1", SK: "USER#u1", GSI1PK: "USER", GSI1SK: "USER#u1" };
    let calls = 0;
    const send = vi.spyOn(client, "send").mockImplementation(async () => {
      calls++;
      return calls === 1
        ? { Items: [{ PK: "USER#u1" }], LastEvaluatedKey: lastKey }
        : { Items: [{ PK: "USER#u2" }] };
    });

    const items = await store.query({ index: "GSI1", partition: "USER" });

    expect(items).toEqual([{ PK: "USER#u1" }, { PK: "USER#u2" }]);
    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[1]?.[0]).toMatchObject({ input: { ExclusiveStartKey: lastKey } });
  });

  it("maps a failed page to an unavailable store", async () => {
    const client = createDocumentClient(
      new DynamoDBClient({
        region: "us-east-1",
        credentials: { accessKeyId: "test", secretAccessKey: "test-secret" },
      })
    );
    const store = new DynamoEntityStore(client, { tableName: "BlogContent", timeoutMs: 1000 });
    vi.spyOn(client, "send").mockImplementation(async () => {
      throw sdkError("ResourceNotFoundException");
    });

    await expect(store.query({ partition: "BLOG#b1" })).rejects.toThrow("Table not found");
  });
});
