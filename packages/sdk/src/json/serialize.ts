/**
 * Compact JSON rendering of a document tree
 */

import type { JsonArray, JsonNode, JsonScalar } from "./tree.js";

type Frame =
  | { kind: "array"; node: JsonArray; index: number }
  | { kind: "object"; entries: Array<[string, JsonNode]>; index: number };

function renderScalar(node: JsonScalar): string {
  switch (node.kind) {
    case "null":
      return "null";
    case "boolean":
      return node.value ? "true" : "false";
    case "number":
      return node.raw;
    case "string":
      return JSON.stringify(node.value);
  }
}

/**
 * Render a node without whitespace. Iterative, like the parser.
 */
export function serializeJson(root: JsonNode): string {
  const out: string[] = [];
  const stack: Frame[] = [];
  let pending: JsonNode | undefined = root;

  while (true) {
    if (pending) {
      const node: JsonNode = pending;
      pending = undefined;
      if (node.kind === "array") {
        out.push("[");
        stack.push({ kind: "array", node, index: 0 });
      } else if (node.kind === "object") {
        out.push("{");
        stack.push({ kind: "object", entries: [...node.members], index: 0 });
      } else {
        out.push(renderScalar(node));
      }
    }

    const frame = stack.at(-1);
    if (!frame) break;

    if (frame.kind === "array") {
      const item = frame.node.items[frame.index];
      if (item === undefined) {
        out.push("]");
        stack.pop();
        continue;
      }
      if (frame.index > 0) out.push(",");
      frame.index++;
      pending = item;
    } else {
      const entry = frame.entries[frame.index];
      if (entry === undefined) {
        out.push("}");
        stack.pop();
        continue;
      }
      if (frame.index > 0) out.push(",");
      frame.index++;
      out.push(JSON.stringify(entry[0]), ":");
      pending = entry[1];
    }
  }

  return out.join("");
}
