/**
 * Resolves a parsed path against a document tree
 *
 * The navigator never modifies the tree. When a creating operation may
 * synthesize missing object ancestors, the location lists them in `missing`
 * and the operator materializes them once it is known to succeed.
 */

import { SubdocStatusError } from "./errors.js";
import { formatPath, type ParsedPath, type PathComponent } from "./path.js";
import { Status } from "./protocol.js";
import {
  isContainer,
  jsonObject,
  type JsonArray,
  type JsonContainer,
  type JsonNode,
  type JsonObject,
} from "./json/tree.js";

export interface NavigateOptions {
  /** The leaf may be absent (an object key about to be created) */
  createLeaf?: boolean;
  /** Missing object ancestors may be synthesized */
  mkdirP?: boolean;
  /** An index equal to the array length addresses an append slot */
  appendSlot?: boolean;
}

export type Location =
  | { kind: "root"; node: JsonNode; level: 1 }
  | {
      kind: "member";
      parent: JsonObject;
      key: string;
      node: JsonNode | undefined;
      /** Keys of object ancestors to create between `parent` and `key` */
      missing: string[];
      level: number;
    }
  | {
      kind: "element";
      parent: JsonArray;
      index: number;
      node: JsonNode | undefined;
      level: number;
    };

function notFound(path: ParsedPath, upTo: number): SubdocStatusError {
  return new SubdocStatusError(
    Status.PathNotFound,
    `Path not found: ${formatPath(path.slice(0, upTo + 1))}`
  );
}

function mismatch(path: ParsedPath, upTo: number, found: JsonNode): SubdocStatusError {
  const expected = path[upTo]?.kind === "index" ? "array" : "object";
  return new SubdocStatusError(
    Status.PathMismatch,
    `Expected ${expected} at ${formatPath(path.slice(0, upTo)) || "document root"}, found ${found.kind}`
  );
}

/**
 * A non-empty path can only address into a container document
 */
export function assertContainerRoot(root: JsonNode): asserts root is JsonContainer {
  if (!isContainer(root)) {
    throw new SubdocStatusError(
      Status.DocNotJson,
      `Document root is a ${root.kind}; only objects and arrays can be addressed`
    );
  }
}

type Step = { found: JsonNode } | { absent: true; index?: number };

function step(current: JsonNode, component: PathComponent, path: ParsedPath, at: number): Step {
  if (component.kind === "key") {
    if (current.kind !== "object") throw mismatch(path, at, current);
    const child = current.members.get(component.name);
    return child === undefined ? { absent: true } : { found: child };
  }

  if (current.kind !== "array") throw mismatch(path, at, current);
  const index = component.last ? current.items.length - 1 : component.index;
  const child = index >= 0 ? current.items[index] : undefined;
  return child === undefined ? { absent: true, index } : { found: child };
}

/**
 * Resolve `path` against `root`
 * @throws SubdocStatusError with DocNotJson, PathMismatch or PathNotFound
 */
export function navigate(
  root: JsonNode,
  path: ParsedPath,
  options: NavigateOptions = {}
): Location {
  const leaf = path.at(-1);
  if (!leaf) return { kind: "root", node: root, level: 1 };
  assertContainerRoot(root);

  const leafAt = path.length - 1;
  let current: JsonNode = root;

  for (let i = 0; i < leafAt; i++) {
    const component = path[i];
    if (!component) break;
    const next = step(current, component, path, i);
    if ("found" in next) {
      current = next.found;
      continue;
    }
    if (current.kind === "object" && options.createLeaf && options.mkdirP) {
      return synthesize(current, path, i);
    }
    throw notFound(path, i);
  }

  const next = step(current, leaf, path, leafAt);
  const level = path.length + 1;

  if (current.kind === "object" && leaf.kind === "key") {
    if ("absent" in next && !options.createLeaf) throw notFound(path, leafAt);
    return {
      kind: "member",
      parent: current,
      key: leaf.name,
      node: "found" in next ? next.found : undefined,
      missing: [],
      level,
    };
  }

  if (current.kind === "array" && leaf.kind === "index") {
    if ("found" in next) {
      const index = leaf.last ? current.items.length - 1 : leaf.index;
      return { kind: "element", parent: current, index, node: next.found, level };
    }
    if (options.appendSlot && !leaf.last && leaf.index === current.items.length) {
      return { kind: "element", parent: current, index: leaf.index, node: undefined, level };
    }
    throw notFound(path, leafAt);
  }

  // step() has already rejected every other container/component pairing
  throw mismatch(path, leafAt, current);
}

/**
 * Build a member location below the deepest existing object when the
 * remainder of the path is made of object keys only
 */
function synthesize(parent: JsonObject, path: ParsedPath, from: number): Location {
  const keys: string[] = [];
  for (let i = from; i < path.length; i++) {
    const component = path[i];
    // Array ancestors are never created
    if (!component || component.kind !== "key") throw notFound(path, i);
    keys.push(component.name);
  }
  const key = keys.pop();
  if (key === undefined) throw notFound(path, from);
  return {
    kind: "member",
    parent,
    key,
    node: undefined,
    missing: keys,
    level: path.length + 1,
  };
}

/**
 * Create the missing ancestors of a member location and return the object
 * that receives the leaf key
 */
export function materializeParent(location: Extract<Location, { kind: "member" }>): JsonObject {
  let parent = location.parent;
  for (const key of location.missing) {
    const created = jsonObject();
    parent.members.set(key, created);
    parent = created;
  }
  return parent;
}
