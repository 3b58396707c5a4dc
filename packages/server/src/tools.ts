/**
 * MCP tool implementations for subdocument access
 * All tools return a content array with a text item and a json item; the
 * json item always carries the subdoc status name
 */

import { LOOKUP_OPCODES, MUTATION_OPCODES, Status, statusName, type StatusCode } from "@subdoc/sdk";
import {
  DocGetInputSchema,
  DocPutInputSchema,
  SubdocExistsInputSchema,
  SubdocGetInputSchema,
  SubdocMultiLookupInputSchema,
  SubdocMultiMutationInputSchema,
  SubdocMutateInputSchema,
} from "./schemas.js";
import type { SubdocService } from "./service/subdoc.js";
import { logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export type ToolJson = { status: string } & Record<string, unknown>;

export interface ToolResult {
  content: [{ type: "text"; text: string }, { type: "json"; json: ToolJson }];
  isError?: boolean;
}

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

export type ToolName =
  | "subdoc_get"
  | "subdoc_exists"
  | "subdoc_mutate"
  | "subdoc_multi_lookup"
  | "subdoc_multi_mutation"
  | "doc_get"
  | "doc_put";

/** Tools that never modify a document */
export const READ_ONLY_TOOLS: readonly ToolName[] = [
  "subdoc_get",
  "subdoc_exists",
  "subdoc_multi_lookup",
  "doc_get",
];

/**
 * Per-tool time limit. Writes have none: a store under way cannot be
 * abandoned, so the caller always receives its outcome.
 */
export const TOOL_TIMEOUTS_MS: Readonly<Record<ToolName, number | undefined>> = {
  subdoc_get: 2000,
  subdoc_exists: 2000,
  subdoc_multi_lookup: 2000,
  doc_get: 2000,
  subdoc_mutate: undefined,
  subdoc_multi_mutation: undefined,
  doc_put: undefined,
};

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(timeoutMs: number) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

export interface ToolPayload {
  text: string;
  json: ToolJson;
}

function renderStatus(status: StatusCode): string {
  return statusName(status) ?? `0x${status.toString(16)}`;
}

function errorCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "UNKNOWN";
}

/**
 * Status, CAS and failure message shared by every subdoc response
 */
function summarize(response: { status: StatusCode; cas?: bigint; message?: string }): ToolJson {
  return {
    status: renderStatus(response.status),
    ...(response.cas === undefined ? {} : { cas: response.cas.toString() }),
    ...(response.message === undefined ? {} : { message: response.message }),
  };
}

function failureText(response: { status: StatusCode; message?: string }): string {
  const name = renderStatus(response.status);
  return response.message ? `${name}: ${response.message}` : name;
}

/**
 * Run a tool body with logging and metrics, racing it against the tool's
 * time limit when it has one
 */
export async function executeTool(
  toolName: ToolName,
  handler: () => Promise<ToolPayload>,
  timeoutMs: number | undefined = TOOL_TIMEOUTS_MS[toolName]
): Promise<ToolResult> {
  const startTime = Date.now();
  let failed = false;
  let error: unknown;
  let status: string | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const running = handler();
    const payload =
      timeoutMs === undefined
        ? await running
        : await Promise.race([
            running,
            new Promise<never>((_, reject) => {
              timeoutId = setTimeout(() => reject(new ToolTimeoutError(timeoutMs)), timeoutMs);
            }),
          ]);
    status = payload.json.status;

    const result: ToolResult = {
      content: [
        { type: "text", text: payload.text },
        { type: "json", json: payload.json },
      ],
    };
    if (status !== "Success") result.isError = true;
    return result;
  } catch (err) {
    failed = true;
    error = err;
    throw err;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    if (failed) {
      logger.toolCall(toolName, duration, { err: error });
      recordToolExecution(toolName, duration, { errCode: errorCode(error) });
    } else {
      logger.toolCall(toolName, duration, { status });
      recordToolExecution(toolName, duration, { status });
    }
  }
}

/**
 * Build the tool handlers over one service instance
 */
export function createToolHandlers(service: SubdocService): Record<ToolName, ToolHandler> {
  /**
   * subdoc_get: Fragment at a path
   */
  async function subdocGet(args: unknown): Promise<ToolResult> {
    const { key, path } = SubdocGetInputSchema.parse(args);

    return executeTool("subdoc_get", async () => {
      const response = await service.lookup({ kind: "lookup", opcode: "get", key, path });
      if (response.status !== Status.Success) {
        return { text: failureText(response), json: summarize(response) };
      }
      const fragment = response.fragment ?? "";
      return { text: fragment, json: { ...summarize(response), fragment } };
    });
  }

  /**
   * subdoc_exists: Whether a path exists
   */
  async function subdocExists(args: unknown): Promise<ToolResult> {
    const { key, path } = SubdocExistsInputSchema.parse(args);

    return executeTool("subdoc_exists", async () => {
      const response = await service.lookup({ kind: "lookup", opcode: "exists", key, path });
      if (response.status !== Status.Success) {
        return { text: failureText(response), json: summarize(response) };
      }
      return { text: `Path ${path} exists in ${key}`, json: summarize(response) };
    });
  }

  /**
   * subdoc_mutate: One mutation under the CAS retry loop
   */
  async function subdocMutate(args: unknown): Promise<ToolResult> {
    const input = SubdocMutateInputSchema.parse(args);

    return executeTool("subdoc_mutate", async () => {
      const response = await service.mutate({
        kind: "mutation",
        opcode: input.opcode,
        key: input.key,
        path: input.path,
        value: input.value,
        flags: input.mkdirP ? { mkdirP: true } : undefined,
        cas: input.cas,
        expiry: input.expiry,
      });
      if (response.status !== Status.Success) {
        return { text: failureText(response), json: summarize(response) };
      }

      const json = summarize(response);
      if (response.token) {
        json.seqno = response.token.seqno.toString();
        json.vbucketUuid = response.token.vbucketUuid.toString();
      }
      if (response.fragment !== undefined) json.fragment = response.fragment;
      return {
        text:
          response.fragment === undefined
            ? `Applied ${input.opcode} at ${input.path} in ${input.key}`
            : `Applied ${input.opcode} at ${input.path} in ${input.key}: ${response.fragment}`,
        json,
      };
    });
  }

  /**
   * subdoc_multi_lookup: Several lookups against one snapshot
   */
  async function subdocMultiLookup(args: unknown): Promise<ToolResult> {
    const { key, specs } = SubdocMultiLookupInputSchema.parse(args);

    return executeTool("subdoc_multi_lookup", async () => {
      const response = await service.multiLookup({ kind: "multi_lookup", key, specs });
      const results = response.results.map((result) => ({
        status: renderStatus(result.status),
        ...(result.fragment === undefined ? {} : { fragment: result.fragment }),
      }));
      const failed = results.filter((result) => result.status !== "Success").length;

      let text: string;
      if (response.status === Status.Success) {
        text = `${results.length} lookup(s) succeeded on ${key}`;
      } else if (response.status === Status.MultiPathFailure) {
        text = `${failed} of ${results.length} lookup(s) failed on ${key}`;
      } else {
        text = failureText(response);
      }
      return { text, json: { ...summarize(response), results } };
    });
  }

  /**
   * subdoc_multi_mutation: Several mutations applied atomically
   */
  async function subdocMultiMutation(args: unknown): Promise<ToolResult> {
    const input = SubdocMultiMutationInputSchema.parse(args);

    return executeTool("subdoc_multi_mutation", async () => {
      const response = await service.multiMutation({
        kind: "multi_mutation",
        key: input.key,
        specs: input.specs,
        cas: input.cas,
        expiry: input.expiry,
      });

      const json: ToolJson = {
        ...summarize(response),
        results: response.results.map((result) => ({
          index: result.index,
          status: renderStatus(result.status),
          fragment: result.fragment,
        })),
      };
      if (response.failure) {
        json.failure = {
          index: response.failure.index,
          status: renderStatus(response.failure.status),
        };
      }

      return {
        text:
          response.status === Status.Success
            ? `Applied ${input.specs.length} mutation(s) to ${input.key}`
            : failureText(response),
        json,
      };
    });
  }

  /**
   * doc_get: Whole document with its metadata
   */
  async function docGet(args: unknown): Promise<ToolResult> {
    const { key } = DocGetInputSchema.parse(args);

    return executeTool("doc_get", async () => {
      const document = await service.getDocument(key);
      if (!document) {
        return {
          text: `Document ${key} not found`,
          json: { status: renderStatus(Status.KeyNotFound) },
        };
      }

      return {
        text: `Found document ${key}`,
        json: {
          status: renderStatus(Status.Success),
          cas: document.cas.toString(),
          flags: document.flags,
          expiry: document.expiry,
          datatype: document.datatype,
          value:
            document.datatype === "json"
              ? document.value.toString("utf8")
              : document.value.toString("base64"),
        },
      };
    });
  }

  /**
   * doc_put: Store a whole document unconditionally
   */
  async function docPut(args: unknown): Promise<ToolResult> {
    const { key, value, raw, flags, expiry } = DocPutInputSchema.parse(args);

    return executeTool("doc_put", async () => {
      const cas = await service.putDocument(key, value, { raw, flags, expiry });
      return {
        text: `Stored ${key}`,
        json: { status: renderStatus(Status.Success), cas: cas.toString() },
      };
    });
  }

  return {
    subdoc_get: subdocGet,
    subdoc_exists: subdocExists,
    subdoc_mutate: subdocMutate,
    subdoc_multi_lookup: subdocMultiLookup,
    subdoc_multi_mutation: subdocMultiMutation,
    doc_get: docGet,
    doc_put: docPut,
  };
}

const keyProperty = {
  type: "string",
  description: "Document key (letters, digits, '_', '-', '.')",
};

const pathProperty = {
  type: "string",
  description: "Path into the document, e.g. 'a.b[0]' or 'list[-1]'; '' is the root",
};

const casProperty = {
  type: "string",
  description: "Only apply if the document CAS equals this decimal value",
};

const expiryProperty = {
  type: "number",
  description: "New expiry: seconds from now (up to 30 days) or an absolute epoch time",
};

const specItems = (opcodes: readonly string[]) => ({
  type: "object",
  properties: {
    opcode: { type: "string", enum: opcodes },
    path: pathProperty,
    value: { type: "string", description: "JSON fragment" },
    flags: {
      type: "object",
      properties: { mkdirP: { type: "boolean" } },
    },
  },
  required: ["opcode", "path"],
});

/**
 * Tool definitions for MCP server
 * Maps tool names to their schemas and handlers
 */
export const toolDefinitions: ReadonlyArray<{
  name: ToolName;
  description: string;
  inputSchema: { type: "object"; properties: Record<string, unknown>; required: string[] };
}> = [
  {
    name: "subdoc_get",
    description: "Return the JSON fragment at a path in a document",
    inputSchema: {
      type: "object",
      properties: { key: keyProperty, path: pathProperty },
      required: ["key", "path"],
    },
  },
  {
    name: "subdoc_exists",
    description: "Check whether a path exists in a document",
    inputSchema: {
      type: "object",
      properties: { key: keyProperty, path: pathProperty },
      required: ["key", "path"],
    },
  },
  {
    name: "subdoc_mutate",
    description:
      "Apply one path mutation, retried automatically when another writer gets there first",
    inputSchema: {
      type: "object",
      properties: {
        key: keyProperty,
        opcode: { type: "string", enum: MUTATION_OPCODES },
        path: pathProperty,
        value: {
          type: "string",
          description:
            "JSON fragment; comma-separated values for array pushes, an integer delta for counter, omitted for delete",
        },
        mkdirP: { type: "boolean", description: "Create missing parent objects" },
        cas: casProperty,
        expiry: expiryProperty,
      },
      required: ["key", "opcode", "path"],
    },
  },
  {
    name: "subdoc_multi_lookup",
    description: "Run up to 16 lookups against a single snapshot of a document",
    inputSchema: {
      type: "object",
      properties: {
        key: keyProperty,
        specs: { type: "array", items: specItems(LOOKUP_OPCODES) },
      },
      required: ["key", "specs"],
    },
  },
  {
    name: "subdoc_multi_mutation",
    description: "Apply up to 16 mutations to a document atomically; all or nothing",
    inputSchema: {
      type: "object",
      properties: {
        key: keyProperty,
        specs: { type: "array", items: specItems(MUTATION_OPCODES) },
        cas: casProperty,
        expiry: expiryProperty,
      },
      required: ["key", "specs"],
    },
  },
  {
    name: "doc_get",
    description: "Retrieve a whole document with its CAS, flags and expiry",
    inputSchema: {
      type: "object",
      properties: { key: keyProperty },
      required: ["key"],
    },
  },
  {
    name: "doc_put",
    description: "Store a whole document, replacing any existing one",
    inputSchema: {
      type: "object",
      properties: {
        key: keyProperty,
        value: { type: "string", description: "Document text (base64 when raw)" },
        raw: { type: "boolean", description: "Store as raw bytes rather than JSON" },
        flags: { type: "number", description: "Opaque client flags" },
        expiry: expiryProperty,
      },
      required: ["key", "value"],
    },
  },
];
