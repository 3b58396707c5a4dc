/**
 * Output rendering helpers
 */

import { statusName, type StatusCode } from "@subdoc/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout; bigint values are written as decimal strings
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const replacer = (_key: string, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value;
  const json = options?.raw
    ? JSON.stringify(data, replacer)
    : JSON.stringify(data, replacer, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Status code as its name, falling back to hex for codes without one
 */
export function renderStatus(status: StatusCode): string {
  return statusName(status) ?? `0x${status.toString(16)}`;
}

/**
 * Format bytes to human-readable string
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";

  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const magnitude = Math.floor(Math.log(bytes) / Math.log(k));
  const i = Math.min(Math.max(magnitude, 0), sizes.length - 1);
  const value = bytes / Math.pow(k, i);

  return `${value.toFixed(2)} ${sizes[i]}`;
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
