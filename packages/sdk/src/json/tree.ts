/**
 * In-memory JSON document tree
 *
 * Numbers keep their source text so integers beyond 2^53 and spellings such
 * as `2.0` survive a parse/serialize cycle unchanged. Objects keep member
 * insertion order.
 */

export interface JsonNull {
  kind: "null";
}

export interface JsonBoolean {
  kind: "boolean";
  value: boolean;
}

export interface JsonNumber {
  kind: "number";
  raw: string;
}

export interface JsonString {
  kind: "string";
  value: string;
}

export interface JsonArray {
  kind: "array";
  items: JsonNode[];
}

export interface JsonObject {
  kind: "object";
  members: Map<string, JsonNode>;
}

export type JsonScalar = JsonNull | JsonBoolean | JsonNumber | JsonString;
export type JsonContainer = JsonArray | JsonObject;
export type JsonNode = JsonScalar | JsonContainer;

export function jsonObject(): JsonObject {
  return { kind: "object", members: new Map() };
}

export function jsonArray(items: JsonNode[] = []): JsonArray {
  return { kind: "array", items };
}

export function jsonNumber(raw: string): JsonNumber {
  return { kind: "number", raw };
}

export function isContainer(node: JsonNode): node is JsonContainer {
  return node.kind === "array" || node.kind === "object";
}

export function isScalar(node: JsonNode): node is JsonScalar {
  return !isContainer(node);
}

/**
 * Scalar equality as used for uniqueness checks. Numbers compare by their
 * source text, so `1` and `1.0` are distinct values.
 */
export function scalarEquals(a: JsonScalar, b: JsonScalar): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
      return b.kind === "boolean" && a.value === b.value;
    case "number":
      return b.kind === "number" && a.raw === b.raw;
    case "string":
      return b.kind === "string" && a.value === b.value;
  }
}
