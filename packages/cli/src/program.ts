/**
 * Command definitions for the subdoc CLI
 */

import { readFileSync } from "node:fs";
import { createInterface } from "node:readline/promises";
import { Command, InvalidArgumentError, type OutputConfiguration } from "commander";
import {
  LookupSpecListSchema,
  MutationSpecListSchema,
  Status,
  type MutationOpcode,
  type StatsSnapshot,
} from "@subdoc/sdk";
import { openCliStore, type CliStore } from "./lib/store.js";
import { isVerbose, resolveMaxAttempts, resolveRoot } from "./lib/env.js";
import { parseCas, parseMutationOpcode, parseNonNegativeInt, parseSpecs } from "./lib/arg.js";
import { isStdinTTY, readInput } from "./lib/io.js";
import { colorize, formatBytes, printJson, printLines, renderStatus } from "./lib/render.js";
import { CliError, assertSuccess, exitCodeForStatus } from "./lib/errors.js";
import { emitMetric, statsDelta, withTiming } from "./lib/telemetry.js";

interface GlobalOptions {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
  maxAttempts?: number;
}

interface PutOptions {
  file?: string;
  data?: string;
  raw?: boolean;
  flags?: number;
  expiry?: number;
}

interface MutateOptions {
  mkdirP?: boolean;
  cas?: bigint;
  expiry?: number;
}

interface SpecInputOptions {
  spec?: string;
  file?: string;
}

function readVersion(): string {
  try {
    const text = readFileSync(new URL("../package.json", import.meta.url), "utf8");
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
      return String(parsed.version);
    }
  } catch {
    // Bundled or relocated builds have no package.json beside them
  }
  return "0.0.0";
}

function parseExpiry(value: string): number {
  return parseNonNegativeInt(value, "--expiry");
}

function parseAttempts(value: string): number {
  const attempts = parseNonNegativeInt(value, "--max-attempts", 1000);
  if (attempts < 1) {
    throw new InvalidArgumentError("--max-attempts must be at least 1");
  }
  return attempts;
}

/**
 * Build the CLI program. Errors surface as thrown exceptions so the caller
 * decides how to exit.
 */
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
      ...output,
    })
    .exitOverride();

  program
    .name("subdoc")
    .description("Path-addressed lookups and mutations on JSON documents")
    .version(readVersion())
    .option("--root <path>", "Data directory root")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .option("--max-attempts <n>", "CAS retry bound per command", parseAttempts);

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const open = (): CliStore => {
    const opts = globals();
    return openCliStore(resolveRoot(opts.root), {
      maxAttempts: resolveMaxAttempts(opts.maxAttempts),
    });
  };

  const verbose = (): boolean => globals().verbose === true || isVerbose();

  /** Report engine counters a command moved, in verbose mode */
  const reportStats = (command: string, store: CliStore, before: StatsSnapshot): void => {
    emitMetric(`cli.${command}.stats`, statsDelta(before, store.counters()), verbose());
  };

  // Put command
  program
    .command("put <key>")
    .description("Store a whole document, replacing any existing one")
    .option("--file <path>", "Read document from file")
    .option("--data <text>", "Inline document")
    .option("--raw", "Store as raw bytes rather than JSON")
    .option("--flags <n>", "Client flags", (val) => parseNonNegativeInt(val, "--flags"))
    .option("--expiry <seconds>", "Relative seconds or absolute epoch time", parseExpiry)
    .action(async (key: string, options: PutOptions) => {
      await withTiming(
        "cli.put",
        async () => {
          const text = await readInput({
            file: options.file,
            inline: options.data,
            inlineName: "--data",
          });
          const store = open();
          const cas = await store.put(key, text, {
            datatype: options.raw ? "raw" : "json",
            flags: options.flags,
            expiry: options.expiry,
          });

          if (!globals().quiet) {
            console.log(`Stored ${key} (cas ${cas})`);
          }
        },
        verbose()
      );
    });

  // Cat command
  program
    .command("cat <key>")
    .description("Print a whole document")
    .option("--meta", "Print CAS, flags, expiry and datatype instead of the body")
    .action(async (key: string, options: { meta?: boolean }) => {
      await withTiming(
        "cli.cat",
        async () => {
          const document = await open().get(key);
          if (!document) {
            throw new CliError(`Document not found: ${key}`, { exitCode: 2 });
          }

          if (options.meta) {
            printJson({
              key: document.key,
              cas: document.cas,
              flags: document.flags,
              expiry: document.expiry,
              datatype: document.datatype,
              bytes: document.value.length,
            });
          } else {
            process.stdout.write(document.value);
            if (document.value.at(-1) !== 0x0a) process.stdout.write("\n");
          }
        },
        verbose()
      );
    });

  // Remove command
  program
    .command("rm <key>")
    .description("Remove a document")
    .option("--force", "Force removal without confirmation")
    .action(async (key: string, options: { force?: boolean }) => {
      await withTiming(
        "cli.rm",
        async () => {
          // Require confirmation unless --force
          if (!options.force) {
            if (isStdinTTY()) {
              const rl = createInterface({
                input: process.stdin,
                output: process.stderr,
              });
              const answer = (await rl.question(`Remove ${key}? (y/N) `)).trim().toLowerCase();
              rl.close();

              if (answer !== "y") {
                throw new CliError("Aborted by user", { exitCode: 1 });
              }
            } else {
              // Non-TTY requires --force
              throw new InvalidArgumentError("Use --force to confirm removal in non-interactive mode");
            }
          }

          const removed = await open().remove(key);
          if (!removed) {
            throw new CliError(`Document not found: ${key}`, { exitCode: 2 });
          }

          if (!globals().quiet) {
            console.log(`Removed ${key}`);
          }
        },
        verbose()
      );
    });

  // List command
  program
    .command("ls")
    .description("List document keys")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withTiming(
        "cli.ls",
        async () => {
          const keys = await open().list();
          if (options.json) {
            printJson(keys);
          } else {
            printLines(keys);
          }
        },
        verbose()
      );
    });

  // Get command
  program
    .command("get <key> [path]")
    .description("Print the fragment at a path (the whole document when omitted)")
    .action(async (key: string, path: string | undefined) => {
      await withTiming(
        "cli.get",
        async () => {
          const store = open();
          const before = store.counters();
          const response = await store.engine.lookup({
            kind: "lookup",
            opcode: "get",
            key,
            path: path ?? "",
          });
          reportStats("get", store, before);
          assertSuccess(response);
          console.log(response.fragment ?? "");
        },
        verbose()
      );
    });

  // Exists command
  program
    .command("exists <key> <path>")
    .description("Check that a path exists")
    .action(async (key: string, path: string) => {
      await withTiming(
        "cli.exists",
        async () => {
          const store = open();
          const before = store.counters();
          const response = await store.engine.lookup({ kind: "lookup", opcode: "exists", key, path });
          reportStats("exists", store, before);
          assertSuccess(response);
          console.log("true");
        },
        verbose()
      );
    });

  // Mutate command
  program
    .command("mutate <op> <key> <path> [value]")
    .description(
      "Apply one mutation: dict_add, dict_upsert, delete, replace, array_push_last, " +
        "array_push_first, array_insert, array_add_unique or counter"
    )
    .option("--mkdir-p", "Create missing parents")
    .option("--cas <cas>", "Only apply if the document CAS matches", parseCas)
    .option("--expiry <seconds>", "New expiry for the document", parseExpiry)
    .action(
      async (op: string, key: string, path: string, value: string | undefined, options: MutateOptions) => {
        await withTiming(
          "cli.mutate",
          async () => {
            const opcode: MutationOpcode = parseMutationOpcode(op);
            const store = open();
            const before = store.counters();
            const response = await store.engine.mutate({
              kind: "mutation",
              opcode,
              key,
              path,
              value,
              flags: options.mkdirP ? { mkdirP: true } : undefined,
              cas: options.cas,
              expiry: options.expiry,
            });
            reportStats("mutate", store, before);
            assertSuccess(response);

            if (!globals().quiet) {
              printJson({
                status: renderStatus(response.status),
                cas: response.cas,
                ...(response.fragment === undefined ? {} : { fragment: response.fragment }),
              });
            }
          },
          verbose()
        );
      }
    );

  // Multi-lookup command
  program
    .command("multi-lookup <key>")
    .description("Run up to 16 lookups against one document snapshot")
    .option("--spec <json>", 'Inline spec list, e.g. [{"opcode":"get","path":"a"}]')
    .option("--file <path>", "Read spec list from file")
    .action(async (key: string, options: SpecInputOptions) => {
      await withTiming(
        "cli.multi_lookup",
        async () => {
          const text = await readInput({ file: options.file, inline: options.spec, inlineName: "--spec" });
          const specs = parseSpecs(LookupSpecListSchema, text, options.spec === undefined ? "input" : "--spec");

          const store = open();
          const before = store.counters();
          const response = await store.engine.multiLookup({ kind: "multi_lookup", key, specs });
          reportStats("multi_lookup", store, before);

          if (response.status !== Status.Success && response.status !== Status.MultiPathFailure) {
            assertSuccess(response);
          }

          printJson({
            status: renderStatus(response.status),
            cas: response.cas,
            results: response.results.map((result) => ({
              status: renderStatus(result.status),
              ...(result.fragment === undefined ? {} : { fragment: result.fragment }),
            })),
          });

          if (response.status === Status.MultiPathFailure) {
            throw new CliError("One or more lookups failed", {
              exitCode: exitCodeForStatus(response.status),
            });
          }
        },
        verbose()
      );
    });

  // Multi-mutate command
  program
    .command("multi-mutate <key>")
    .description("Apply up to 16 mutations atomically")
    .option("--spec <json>", 'Inline spec list, e.g. [{"opcode":"counter","path":"n","value":"1"}]')
    .option("--file <path>", "Read spec list from file")
    .option("--cas <cas>", "Only apply if the document CAS matches", parseCas)
    .option("--expiry <seconds>", "New expiry for the document", parseExpiry)
    .action(async (key: string, options: SpecInputOptions & Omit<MutateOptions, "mkdirP">) => {
      await withTiming(
        "cli.multi_mutation",
        async () => {
          const text = await readInput({ file: options.file, inline: options.spec, inlineName: "--spec" });
          const specs = parseSpecs(MutationSpecListSchema, text, options.spec === undefined ? "input" : "--spec");

          const store = open();
          const before = store.counters();
          const response = await store.engine.multiMutation({
            kind: "multi_mutation",
            key,
            specs,
            cas: options.cas,
            expiry: options.expiry,
          });
          reportStats("multi_mutation", store, before);

          if (response.failure) {
            throw new CliError(
              `${renderStatus(response.failure.status)}: ${response.message ?? `spec ${response.failure.index} failed`}`,
              { exitCode: exitCodeForStatus(response.status) }
            );
          }
          assertSuccess(response);

          if (!globals().quiet) {
            printJson({
              status: renderStatus(response.status),
              cas: response.cas,
              results: response.results.map((result) => ({
                index: result.index,
                status: renderStatus(result.status),
                fragment: result.fragment,
              })),
            });
          }
        },
        verbose()
      );
    });

  // Stats command
  program
    .command("stats")
    .description("Show document count and total size")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming(
        "cli.stats",
        async () => {
          const stats = await open().stats();

          if (options.json) {
            printJson(stats);
          } else {
            console.log(`Documents: ${stats.count}`);
            console.log(`Total size: ${formatBytes(stats.bytes)}`);
          }
        },
        verbose()
      );
    });

  return program;
}
