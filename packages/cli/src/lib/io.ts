/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";

/**
 * Read from stdin with size limit (default 20MB, the largest document a
 * store accepts)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 20 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * Resolve document or spec text from --file, an inline option, or stdin
 */
export async function readInput(
  sources: { file?: string; inline?: string; inlineName: string }
): Promise<string> {
  if (sources.file !== undefined && sources.inline !== undefined) {
    throw new InvalidArgumentError(
      `Cannot use both --file and ${sources.inlineName}; choose one or use stdin`
    );
  }

  if (sources.file !== undefined) {
    return await fs.readFile(sources.file, "utf8");
  }
  if (sources.inline !== undefined) {
    return sources.inline;
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError(
      `No input provided. Use --file, ${sources.inlineName}, or pipe input to stdin`
    );
  }
  let stdin: string;
  try {
    stdin = await readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : "Failed to read from stdin");
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return stdin;
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}
