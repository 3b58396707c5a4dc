/**
 * JSON text to tree
 *
 * Containers are tracked on an explicit stack rather than by recursion, so
 * nesting depth is bounded by memory and never by the call stack.
 */

import { JsonSyntaxError } from "../errors.js";
import type { JsonArray, JsonNode, JsonObject } from "./tree.js";

type Frame =
  | { kind: "array"; node: JsonArray }
  | { kind: "object"; node: JsonObject; key: string };

const NUMBER_PATTERN = /-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?/y;

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

class Scanner {
  pos = 0;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const ch = this.text.charCodeAt(this.pos);
      // space, tab, line feed, carriage return
      if (ch !== 0x20 && ch !== 0x09 && ch !== 0x0a && ch !== 0x0d) return;
      this.pos++;
    }
  }

  expect(ch: string): void {
    this.skipWhitespace();
    if (this.peek() !== ch) {
      throw this.fail(`expected "${ch}"`);
    }
    this.pos++;
  }

  fail(reason: string): JsonSyntaxError {
    const found = this.done ? "end of input" : `"${this.peek()}"`;
    return new JsonSyntaxError(this.pos, `${reason}, found ${found}`);
  }

  readString(): string {
    // opening quote already checked by the caller
    this.pos++;
    let out = "";
    let chunkStart = this.pos;
    while (true) {
      if (this.done) throw this.fail("unterminated string");
      const code = this.text.charCodeAt(this.pos);
      if (code === 0x22) {
        out += this.text.slice(chunkStart, this.pos);
        this.pos++;
        return out;
      }
      if (code < 0x20) throw this.fail("control character in string");
      if (code !== 0x5c) {
        this.pos++;
        continue;
      }
      out += this.text.slice(chunkStart, this.pos);
      const escape = this.text.charAt(this.pos + 1);
      if (escape === "u") {
        const hex = this.text.slice(this.pos + 2, this.pos + 6);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          this.pos++;
          throw this.fail("invalid unicode escape");
        }
        out += String.fromCharCode(parseInt(hex, 16));
        this.pos += 6;
      } else {
        const decoded = ESCAPES[escape];
        if (decoded === undefined) {
          this.pos++;
          throw this.fail("invalid escape");
        }
        out += decoded;
        this.pos += 2;
      }
      chunkStart = this.pos;
    }
  }

  readKey(): string {
    this.skipWhitespace();
    if (this.peek() !== '"') throw this.fail("expected object key");
    const key = this.readString();
    this.expect(":");
    return key;
  }

  readScalar(): JsonNode {
    const ch = this.peek();
    if (ch === '"') {
      return { kind: "string", value: this.readString() };
    }
    if (ch === "-" || (ch >= "0" && ch <= "9")) {
      NUMBER_PATTERN.lastIndex = this.pos;
      const match = NUMBER_PATTERN.exec(this.text);
      if (!match) throw this.fail("invalid number");
      this.pos += match[0].length;
      return { kind: "number", raw: match[0] };
    }
    for (const [word, node] of LITERALS) {
      if (this.text.startsWith(word, this.pos)) {
        this.pos += word.length;
        return node();
      }
    }
    throw this.fail("unexpected token");
  }

  /**
   * Read one complete value starting at the current position
   */
  readValue(): JsonNode {
    const stack: Frame[] = [];

    while (true) {
      this.skipWhitespace();
      let node: JsonNode;
      const ch = this.peek();

      if (ch === "{") {
        this.pos++;
        const obj: JsonObject = { kind: "object", members: new Map() };
        this.skipWhitespace();
        if (this.peek() === "}") {
          this.pos++;
          node = obj;
        } else {
          stack.push({ kind: "object", node: obj, key: this.readKey() });
          continue;
        }
      } else if (ch === "[") {
        this.pos++;
        const arr: JsonArray = { kind: "array", items: [] };
        this.skipWhitespace();
        if (this.peek() === "]") {
          this.pos++;
          node = arr;
        } else {
          stack.push({ kind: "array", node: arr });
          continue;
        }
      } else {
        node = this.readScalar();
      }

      // Attach the finished value, closing every container it completes
      while (true) {
        const frame = stack.at(-1);
        if (!frame) return node;

        if (frame.kind === "array") {
          frame.node.items.push(node);
        } else {
          frame.node.members.set(frame.key, node);
        }

        this.skipWhitespace();
        const next = this.peek();
        if (next === ",") {
          this.pos++;
          if (frame.kind === "object") frame.key = this.readKey();
          break;
        }
        if ((frame.kind === "array" && next === "]") || (frame.kind === "object" && next === "}")) {
          this.pos++;
          stack.pop();
          node = frame.node;
          continue;
        }
        throw this.fail(frame.kind === "array" ? 'expected "," or "]"' : 'expected "," or "}"');
      }
    }
  }
}

const LITERALS: ReadonlyArray<readonly [string, () => JsonNode]> = [
  ["true", () => ({ kind: "boolean", value: true })],
  ["false", () => ({ kind: "boolean", value: false })],
  ["null", () => ({ kind: "null" })],
];

/**
 * Parse a complete JSON text holding exactly one value
 * @throws JsonSyntaxError when the text is not a single well-formed value
 */
export function parseJson(text: string): JsonNode {
  const scanner = new Scanner(text);
  const value = scanner.readValue();
  scanner.skipWhitespace();
  if (!scanner.done) throw scanner.fail("unexpected trailing characters");
  return value;
}

/**
 * Parse one or more comma-separated JSON values, as carried by array push
 * fragments (`1,2,"three"`)
 * @throws JsonSyntaxError on malformed input, including a trailing comma
 */
export function parseJsonList(text: string): JsonNode[] {
  const scanner = new Scanner(text);
  const values: JsonNode[] = [];
  while (true) {
    values.push(scanner.readValue());
    scanner.skipWhitespace();
    if (scanner.done) return values;
    if (scanner.peek() !== ",") throw scanner.fail('expected ","');
    scanner.pos++;
  }
}
