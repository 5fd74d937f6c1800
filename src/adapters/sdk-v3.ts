/**
 * AWS SDK v3 raw DynamoDB client transport.
 *
 * Sends requests through `DynamoDBClient` from `@aws-sdk/client-dynamodb`,
 * which owns credentials, signing, retries and connections. The SDK is
 * typed structurally here and never imported, so callers bring their own.
 */

import type { DynamoOperation, RequestPayload, Transport } from "./adapter.js";

/** Minimal interface for the AWS SDK v3 DynamoDBClient. */
interface DynamoDBClientV3 {
  send(command: unknown): Promise<unknown>;
}

/** Minimal command constructor shape. */
interface CommandConstructor {
  new (input: unknown): unknown;
}

/** The command constructors the transport dispatches to. */
export interface SDKv3Commands {
  readonly GetItemCommand: CommandConstructor;
  readonly PutItemCommand: CommandConstructor;
  readonly DeleteItemCommand: CommandConstructor;
  readonly UpdateItemCommand: CommandConstructor;
  readonly BatchWriteItemCommand: CommandConstructor;
  readonly BatchGetItemCommand: CommandConstructor;
}

const COMMAND_FOR: Readonly<Record<DynamoOperation, keyof SDKv3Commands>> = {
  GetItem: "GetItemCommand",
  PutItem: "PutItemCommand",
  DeleteItem: "DeleteItemCommand",
  UpdateItem: "UpdateItemCommand",
  BatchWriteItem: "BatchWriteItemCommand",
  BatchGetItem: "BatchGetItemCommand",
};

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Uint8Array);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

const fromBase64 = (text: string): Uint8Array =>
  new Uint8Array(Buffer.from(text, "base64"));

const toBase64 = (bytes: Uint8Array): string =>
  Buffer.from(bytes).toString("base64");

/**
 * Rewrites a request document for the SDK: the SDK wants bytes where the
 * JSON protocol carries base64 text, i.e. in `{ B }` and `{ BS }` wire
 * attributes.
 */
export const toSdkInput = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(toSdkInput);
  if (!isRecord(value)) return value;

  const entries = Object.entries(value);
  const first = entries[0];
  if (entries.length === 1 && first) {
    const [tag, tagged] = first;
    if (tag === "B" && typeof tagged === "string") return { B: fromBase64(tagged) };
    if (tag === "BS" && isStringArray(tagged)) return { BS: tagged.map(fromBase64) };
  }

  return Object.fromEntries(
    entries.map(([name, member]): [string, unknown] => [name, toSdkInput(member)]),
  );
};

/** Rewrites an SDK output for the JSON protocol: bytes become base64 text. */
export const fromSdkOutput = (value: unknown): unknown => {
  if (value instanceof Uint8Array) return toBase64(value);
  if (Array.isArray(value)) return value.map(fromSdkOutput);
  if (!isRecord(value)) return value;

  return Object.fromEntries(
    Object.entries(value).map(([name, member]): [string, unknown] => [
      name,
      fromSdkOutput(member),
    ]),
  );
};

/**
 * Creates a transport over the raw AWS SDK v3 DynamoDB client.
 *
 * The SDK output is returned as JSON text with `$metadata` dropped, which is
 * the body the service itself sends.
 *
 * @param client - An instance of `DynamoDBClient` from `@aws-sdk/client-dynamodb`
 * @param commands - The command constructors from `@aws-sdk/client-dynamodb`
 * @returns A frozen {@link Transport}
 *
 * @example
 * ```ts
 * import {
 *   DynamoDBClient, GetItemCommand, PutItemCommand, DeleteItemCommand,
 *   UpdateItemCommand, BatchWriteItemCommand, BatchGetItemCommand,
 * } from "@aws-sdk/client-dynamodb";
 *
 * const transport = createSDKv3Transport(new DynamoDBClient({ region: "eu-west-1" }), {
 *   GetItemCommand, PutItemCommand, DeleteItemCommand,
 *   UpdateItemCommand, BatchWriteItemCommand, BatchGetItemCommand,
 * });
 * ```
 */
export const createSDKv3Transport = (
  client: DynamoDBClientV3,
  commands: SDKv3Commands,
): Transport =>
  Object.freeze({
    send: async (operation: DynamoOperation, payload: RequestPayload) => {
      const Command = commands[COMMAND_FOR[operation]];
      const output = await client.send(new Command(toSdkInput(payload)));

      const members = isRecord(output)
        ? Object.entries(output).filter(([name]) => name !== "$metadata")
        : [];
      return JSON.stringify(fromSdkOutput(Object.fromEntries(members)));
    },
  } satisfies Transport);
