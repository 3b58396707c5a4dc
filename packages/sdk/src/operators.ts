/**
 * Per-opcode lookup and mutation algorithms
 *
 * Every handler works on a parsed tree and either returns its fragment (if
 * any) or throws a SubdocStatusError. Values are parsed and all checks made
 * before the tree is changed, so a failed operation leaves it untouched.
 */

import { JsonSyntaxError, SubdocStatusError, pathInvalid } from "./errors.js";
import { parseJson, parseJsonList } from "./json/parse.js";
import { serializeJson } from "./json/serialize.js";
import { depthAt } from "./json/depth.js";
import {
  isScalar,
  jsonArray,
  jsonNumber,
  scalarEquals,
  type JsonArray,
  type JsonNode,
} from "./json/tree.js";
import { assertContainerRoot, materializeParent, navigate, type Location } from "./navigator.js";
import { parsePath, type ParsedPath } from "./path.js";
import { MAX_DOCUMENT_DEPTH, Status } from "./protocol.js";
import type { Datatype, LookupSpec, MutationSpec } from "./types.js";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export interface OperatorLimits {
  maxDepth: number;
}

const DEFAULT_LIMITS: OperatorLimits = { maxDepth: MAX_DOCUMENT_DEPTH };

/**
 * Parse stored bytes into a tree
 * @throws SubdocStatusError(DocNotJson) for raw documents and unparsable bytes
 */
export function parseDocument(value: Buffer, datatype: Datatype): JsonNode {
  if (datatype !== "json") {
    throw new SubdocStatusError(Status.DocNotJson, "Document is not JSON");
  }
  try {
    return parseJson(value.toString("utf8"));
  } catch (err) {
    if (err instanceof JsonSyntaxError) {
      throw new SubdocStatusError(Status.DocNotJson, "Document is not valid JSON", {
        cause: err,
      });
    }
    throw err;
  }
}

function parseFragment(text: string): JsonNode {
  try {
    return parseJson(text);
  } catch (err) {
    if (err instanceof JsonSyntaxError) {
      throw new SubdocStatusError(Status.ValueCantInsert, `Value is not valid JSON: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
}

function parseFragmentList(text: string): JsonNode[] {
  try {
    return parseJsonList(text);
  } catch (err) {
    if (err instanceof JsonSyntaxError) {
      throw new SubdocStatusError(
        Status.ValueCantInsert,
        `Value is not a comma-separated list of JSON values: ${err.message}`,
        { cause: err }
      );
    }
    throw err;
  }
}

function checkDepth(level: number, values: readonly JsonNode[], limits: OperatorLimits): void {
  if (depthAt(level, values, limits.maxDepth) > limits.maxDepth) {
    throw new SubdocStatusError(
      Status.ValueTooDeep,
      `Value would exceed the maximum document depth of ${limits.maxDepth}`
    );
  }
}

function existing(location: Location): JsonNode {
  if (location.node === undefined) {
    throw new SubdocStatusError(Status.PathNotFound, "Path not found");
  }
  return location.node;
}

function requireNonEmpty(path: ParsedPath, source: string): void {
  if (path.length === 0) throw pathInvalid(source, "operation cannot address the document root");
}

/** Write `value` into the slot a location names, replacing what is there */
function place(location: Location, value: JsonNode): void {
  switch (location.kind) {
    case "member":
      materializeParent(location).members.set(location.key, value);
      return;
    case "element":
      location.parent.items[location.index] = value;
      return;
    case "root":
      throw new SubdocStatusError(Status.PathInvalid, "Cannot replace the document root");
  }
}

/**
 * Run GET or EXISTS. Returns the fragment for GET.
 */
export function executeLookup(root: JsonNode, spec: LookupSpec): string | undefined {
  const path = parsePath(spec.path);
  const node = existing(navigate(root, path));
  switch (spec.opcode) {
    case "get":
      return serializeJson(node);
    case "exists":
      return undefined;
  }
}

/**
 * Apply one mutation to `root` in place. Returns the fragment for COUNTER.
 */
export function executeMutation(
  root: JsonNode,
  spec: MutationSpec,
  limits: OperatorLimits = DEFAULT_LIMITS
): string | undefined {
  const path = parsePath(spec.path);
  const value = spec.value ?? "";
  const mkdirP = spec.flags?.mkdirP ?? false;

  switch (spec.opcode) {
    case "dict_add":
      return dictStore(root, path, spec.path, value, mkdirP, false, limits);
    case "dict_upsert":
      return dictStore(root, path, spec.path, value, mkdirP, true, limits);
    case "delete":
      return remove(root, path, spec.path);
    case "replace":
      return replace(root, path, spec.path, value, limits);
    case "array_push_last":
      return push(root, path, value, mkdirP, "last", limits);
    case "array_push_first":
      return push(root, path, value, mkdirP, "first", limits);
    case "array_insert":
      return insert(root, path, spec.path, value, limits);
    case "array_add_unique":
      return addUnique(root, path, value, mkdirP, limits);
    case "counter":
      return counter(root, path, spec.path, value, mkdirP, limits);
    default: {
      const unknown: never = spec.opcode;
      throw new SubdocStatusError(Status.Invalid, `Unknown opcode: ${String(unknown)}`);
    }
  }
}

function dictStore(
  root: JsonNode,
  path: ParsedPath,
  source: string,
  fragment: string,
  mkdirP: boolean,
  overwrite: boolean,
  limits: OperatorLimits
): undefined {
  requireNonEmpty(path, source);
  const value = parseFragment(fragment);
  if (path.at(-1)?.kind === "index") {
    assertContainerRoot(root);
    throw new SubdocStatusError(
      Status.PathMismatch,
      "Dictionary operations need an object key as the last path component"
    );
  }

  const location = navigate(root, path, { createLeaf: true, mkdirP });
  if (location.node !== undefined && !overwrite) {
    throw new SubdocStatusError(Status.PathExists, `Path already exists: ${source}`);
  }
  checkDepth(location.level, [value], limits);
  place(location, value);
  return undefined;
}

function remove(root: JsonNode, path: ParsedPath, source: string): undefined {
  requireNonEmpty(path, source);
  const location = navigate(root, path);
  switch (location.kind) {
    case "member":
      location.parent.members.delete(location.key);
      break;
    case "element":
      location.parent.items.splice(location.index, 1);
      break;
    case "root":
      throw pathInvalid(source, "cannot delete the document root");
  }
  return undefined;
}

function replace(
  root: JsonNode,
  path: ParsedPath,
  source: string,
  fragment: string,
  limits: OperatorLimits
): undefined {
  requireNonEmpty(path, source);
  const value = parseFragment(fragment);
  const location = navigate(root, path);
  existing(location);
  checkDepth(location.level, [value], limits);
  place(location, value);
  return undefined;
}

/**
 * Locate the array a push-style operation targets. A missing final key is
 * answered with a fresh array (attached via `attach`) when mkdirP is set.
 */
function targetArray(
  root: JsonNode,
  path: ParsedPath,
  mkdirP: boolean
): { array: JsonArray; level: number; attach?: () => void } {
  const location = navigate(root, path, { createLeaf: mkdirP, mkdirP });
  if (location.node === undefined) {
    const array = jsonArray();
    return { array, level: location.level, attach: () => place(location, array) };
  }
  if (location.node.kind !== "array") {
    throw new SubdocStatusError(
      Status.PathMismatch,
      `Expected array at path, found ${location.node.kind}`
    );
  }
  return { array: location.node, level: location.level };
}

function push(
  root: JsonNode,
  path: ParsedPath,
  fragment: string,
  mkdirP: boolean,
  end: "first" | "last",
  limits: OperatorLimits
): undefined {
  const values = parseFragmentList(fragment);
  const target = targetArray(root, path, mkdirP);
  checkDepth(target.level + 1, values, limits);
  target.attach?.();
  if (end === "last") {
    target.array.items.push(...values);
  } else {
    target.array.items.unshift(...values);
  }
  return undefined;
}

function insert(
  root: JsonNode,
  path: ParsedPath,
  source: string,
  fragment: string,
  limits: OperatorLimits
): undefined {
  const leaf = path.at(-1);
  if (!leaf || leaf.kind !== "index") {
    throw pathInvalid(source, "insert position must end in an array index");
  }
  if (leaf.last) {
    throw pathInvalid(source, "insert position cannot be [-1]");
  }
  const value = parseFragment(fragment);
  const location = navigate(root, path, { appendSlot: true });
  if (location.kind !== "element") {
    throw new SubdocStatusError(Status.PathMismatch, `Expected array at path: ${source}`);
  }
  checkDepth(location.level, [value], limits);
  location.parent.items.splice(location.index, 0, value);
  return undefined;
}

function addUnique(
  root: JsonNode,
  path: ParsedPath,
  fragment: string,
  mkdirP: boolean,
  limits: OperatorLimits
): undefined {
  const value = parseFragment(fragment);
  if (!isScalar(value)) {
    throw new SubdocStatusError(
      Status.PathMismatch,
      `Only scalar values can be added uniquely, got ${value.kind}`
    );
  }

  const target = targetArray(root, path, mkdirP);
  for (const item of target.array.items) {
    if (!isScalar(item)) {
      throw new SubdocStatusError(
        Status.PathMismatch,
        "Array contains non-scalar elements; uniqueness cannot be checked"
      );
    }
    if (scalarEquals(item, value)) {
      throw new SubdocStatusError(Status.PathExists, "Value already present in array");
    }
  }
  checkDepth(target.level + 1, [value], limits);
  target.attach?.();
  target.array.items.push(value);
  return undefined;
}

/**
 * Parse a counter delta: optional minus sign and digits only
 */
export function parseDelta(text: string): bigint {
  if (!/^-?[0-9]+$/.test(text)) {
    throw new SubdocStatusError(Status.DeltaInvalid, `Delta is not an integer: "${text}"`);
  }
  const delta = BigInt(text);
  if (delta < INT64_MIN || delta > INT64_MAX) {
    throw new SubdocStatusError(Status.DeltaInvalid, `Delta out of range: ${text}`);
  }
  if (delta === 0n) {
    throw new SubdocStatusError(Status.DeltaInvalid, "Delta must not be zero");
  }
  return delta;
}

function readCounter(node: JsonNode): bigint {
  if (node.kind !== "number" || !/^-?[0-9]+$/.test(node.raw)) {
    throw new SubdocStatusError(
      Status.PathMismatch,
      `Counter target is not an integer (${node.kind === "number" ? node.raw : node.kind})`
    );
  }
  const current = BigInt(node.raw);
  if (current < INT64_MIN || current > INT64_MAX) {
    throw new SubdocStatusError(
      Status.NumRange,
      `Counter value ${node.raw} is outside the signed 64-bit range`
    );
  }
  return current;
}

function counter(
  root: JsonNode,
  path: ParsedPath,
  source: string,
  fragment: string,
  mkdirP: boolean,
  limits: OperatorLimits
): string {
  requireNonEmpty(path, source);
  const delta = parseDelta(fragment);
  const location = navigate(root, path, { createLeaf: true, mkdirP });
  const current = location.node === undefined ? 0n : readCounter(location.node);

  const next = current + delta;
  if (next < INT64_MIN || next > INT64_MAX) {
    throw new SubdocStatusError(
      Status.ValueCantInsert,
      `Counter would overflow: ${current} + ${delta}`
    );
  }

  const rendered = next.toString();
  const node = jsonNumber(rendered);
  checkDepth(location.level, [node], limits);
  place(location, node);
  return rendered;
}
