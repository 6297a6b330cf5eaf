/**
 * JSON value shapes (payloads persisted in SQLite and sent over the wire)
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };
