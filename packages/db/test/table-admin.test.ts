import { describe, it, expect, vi } from "vitest";
import { CreateTableCommand, DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { StoreUnavailableError } from "@blogstore/core";
import { TableAdmin, buildCreateTableInput, toBatchLines } from "../src/index.js";

const item = { PK: { S: "USER#u1" }, SK: { S: "USER#u1" } };
const leftover = { BlogContent: [{ PutRequest: { Item: item } }] };

function admin() {
  const client = new DynamoDBClient({
    region: "us-east-1",
    credentials: { accessKeyId: "test", secretAccessKey: "test-secret" },
  });
  return { client, admin: new TableAdmin(client, "BlogContent") };
}

function sdkError(name: string): Error {
  const error = new Error(name);
  error.name = name;
  return error;
}

describe("TableAdmin.ensureTable", () => {
  it("keeps an existing table and lets the seed go on", async () => {
    const { client, admin: tables } = admin();
    let calls = 0;
    const send = vi.spyOn(client, "send").mockImplementation(async () => {
      calls++;
      if (calls === 1) throw sdkError("ResourceInUseException");
      return { UnprocessedItems: {} };
    });

    expect(await tables.ensureTable(buildCreateTableInput("BlogContent"))).toBe(false);
    expect(await tables.seed(toBatchLines("BlogContent", [item]))).toBe(1);

    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[0]?.[0]).toBeInstanceOf(CreateTableCommand);
  });

  it("reports an existing table as a non-retryable conflict from createTable", async () => {
    const { client, admin: tables } = admin();
    vi.spyOn(client, "send").mockImplementation(async () => {
      throw sdkError("ResourceInUseException");
    });

    await expect(tables.createTable(buildCreateTableInput("BlogContent"))).rejects.toMatchObject({
      kind: "Conflict",
      retryable: false,
      message: "Table in use: BlogContent",
    });
  });

  it("passes other failures through", async () => {
    const { client, admin: tables } = admin();
    vi.spyOn(client, "send").mockImplementation(async () => {
      throw new Error("socket hang up");
    });

    await expect(tables.ensureTable(buildCreateTableInput("BlogContent"))).rejects.toBeInstanceOf(
      StoreUnavailableError
    );
  });
});

describe("TableAdmin.seed", () => {
  it("resends unprocessed items until the batch is written", async () => {
    const { client, admin: tables } = admin();
    let calls = 0;
    const send = vi.spyOn(client, "send").mockImplementation(async () => {
      calls++;
      return { UnprocessedItems: calls === 1 ? leftover : {} };
    });
    const progress: string[] = [];

    const written = await tables.seed(toBatchLines("BlogContent", [item]), (current, total) => {
      progress.push(`${current}/${total}`);
    });

    expect(written).toBe(1);
    expect(progress).toEqual(["1/1"]);
    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[1]?.[0]).toMatchObject({ input: { RequestItems: leftover } });
  });

  it("gives up after three attempts", async () => {
    const { client, admin: tables } = admin();
    const send = vi.spyOn(client, "send").mockImplementation(async () => ({
      UnprocessedItems: leftover,
    }));

    await expect(tables.seed(toBatchLines("BlogContent", [item]))).rejects.toThrow(
      "1 item(s) still unprocessed after 3 attempts"
    );
    expect(send).toHaveBeenCalledTimes(3);
  });
});
