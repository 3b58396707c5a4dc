/**
 * Translation between tool results or errors and MCP protocol shapes
 */

import { ErrorCode, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { SubdocError } from "@subdoc/sdk";
import { z } from "zod";
import { DocumentTooLargeError } from "./service/subdoc.js";
import { ToolTimeoutError, type ToolResult } from "./tools.js";

/**
 * MCP content has no json item type, so the json item travels as a second
 * text item holding its serialized form
 */
export function toCallToolResult(result: ToolResult): CallToolResult {
  const [text, json] = result.content;
  return {
    content: [
      { type: "text", text: text.text },
      { type: "text", text: JSON.stringify(json.json) },
    ],
    ...(result.isError ? { isError: true } : {}),
  };
}

/**
 * Map validation errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    // Zod validation errors -> Invalid params
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ")}`,
    };
  }

  if (error instanceof ToolTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof DocumentTooLargeError) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof SubdocError) {
    // Bad input the schemas cannot see, such as a document that is not JSON
    if (error.code === "INVALID_KEY" || error.code === "JSON_SYNTAX") {
      return { code: ErrorCode.InvalidParams, message: error.message };
    }
    return { code: ErrorCode.InternalError, message: `${error.code}: ${error.message}` };
  }

  if (error instanceof Error) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  // Unknown error type
  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}
