/**
 * Path expressions
 *
 * Grammar:
 *   path      := "" | component ( component )*
 *   component := key | "." key | "[" index "]"
 *   index     := digits | "-1"
 *
 * A key is a maximal run of characters other than "." and "[". Only the
 * first component may be a key without a leading ".".
 */

import { SubdocStatusError, pathInvalid } from "./errors.js";
import { MAX_PATH_COMPONENTS, MAX_PATH_LENGTH, Status } from "./protocol.js";

export type PathComponent =
  | { kind: "key"; name: string }
  | { kind: "index"; index: number; last: boolean };

export type ParsedPath = readonly PathComponent[];

/**
 * Parse a path into components
 * @throws SubdocStatusError with Invalid (too long), PathTooBig (too many
 *   components) or PathInvalid (malformed)
 */
export function parsePath(path: string): ParsedPath {
  if (Buffer.byteLength(path, "utf8") > MAX_PATH_LENGTH) {
    throw new SubdocStatusError(
      Status.Invalid,
      `Path exceeds ${MAX_PATH_LENGTH} bytes`
    );
  }

  const components: PathComponent[] = [];
  let pos = 0;

  while (pos < path.length) {
    const ch = path.charAt(pos);

    if (ch === "[") {
      const close = path.indexOf("]", pos + 1);
      if (close < 0) throw pathInvalid(path, "unmatched '['");
      components.push(parseIndex(path, path.slice(pos + 1, close)));
      pos = close + 1;
    } else {
      if (ch === ".") {
        if (components.length === 0) throw pathInvalid(path, "leading '.'");
        pos++;
      } else if (components.length > 0) {
        throw pathInvalid(path, `expected '.' or '[' at offset ${pos}`);
      }
      const end = keyEnd(path, pos);
      if (end === pos) throw pathInvalid(path, `empty key at offset ${pos}`);
      components.push({ kind: "key", name: path.slice(pos, end) });
      pos = end;
    }

    // The document root occupies one component slot
    if (components.length + 1 > MAX_PATH_COMPONENTS) {
      throw new SubdocStatusError(
        Status.PathTooBig,
        `Path has more than ${MAX_PATH_COMPONENTS - 1} components`
      );
    }
  }

  return components;
}

function keyEnd(path: string, start: number): number {
  let end = start;
  while (end < path.length) {
    const ch = path.charAt(end);
    if (ch === "." || ch === "[") break;
    end++;
  }
  return end;
}

function parseIndex(path: string, text: string): PathComponent {
  if (text === "-1") {
    return { kind: "index", index: -1, last: true };
  }
  if (/^-[0-9]+$/.test(text)) {
    throw pathInvalid(path, `negative index [${text}]; only [-1] is allowed`);
  }
  if (!/^[0-9]+$/.test(text)) {
    throw pathInvalid(path, `invalid array index [${text}]`);
  }
  return { kind: "index", index: Number(text), last: false };
}

export function lastComponent(path: ParsedPath): PathComponent | undefined {
  return path[path.length - 1];
}

/**
 * Render components back into path syntax
 */
export function formatPath(path: ParsedPath): string {
  let out = "";
  for (const component of path) {
    if (component.kind === "index") {
      out += component.last ? "[-1]" : `[${component.index}]`;
    } else {
      out += out === "" ? component.name : `.${component.name}`;
    }
  }
  return out;
}
