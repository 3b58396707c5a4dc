/**
 * Multi-path commands over a single document snapshot
 */

import { SubdocStatusError } from "./errors.js";
import { serializeJson } from "./json/serialize.js";
import type { JsonNode } from "./json/tree.js";
import { executeLookup, executeMutation, parseDocument, type OperatorLimits } from "./operators.js";
import { Status, type StatusCode } from "./protocol.js";
import type { LookupSpec, MutationSpec, OperationResult, StoredDocument } from "./types.js";

/**
 * Narrow a caught value to a status error; anything else is rethrown
 */
export function asStatusError(err: unknown): SubdocStatusError {
  if (err instanceof SubdocStatusError) return err;
  throw err;
}

/**
 * Run every lookup against one parsed snapshot. Never short-circuits; a
 * document that is not JSON fails every spec with DocNotJson.
 */
export function runMultiLookup(document: StoredDocument, specs: readonly LookupSpec[]): OperationResult[] {
  let root: JsonNode;
  try {
    root = parseDocument(document.value, document.datatype);
  } catch (err) {
    const { status } = asStatusError(err);
    return specs.map(() => ({ status }));
  }

  return specs.map((spec): OperationResult => {
    try {
      const fragment = executeLookup(root, spec);
      return fragment === undefined
        ? { status: Status.Success }
        : { status: Status.Success, fragment };
    } catch (err) {
      return { status: asStatusError(err).status };
    }
  });
}

export interface BatchSuccess {
  ok: true;
  /** Serialized document after every spec applied */
  value: Buffer;
  /** Total size of the value fragments supplied */
  insertedBytes: number;
  results: Array<{ index: number; status: StatusCode; fragment: string }>;
}

export interface BatchFailure {
  ok: false;
  index: number;
  status: StatusCode;
  message: string;
}

/**
 * Apply mutations in order to one working tree. The first failure aborts
 * the batch and nothing of it survives.
 */
export function runMultiMutation(
  document: StoredDocument,
  specs: readonly MutationSpec[],
  limits: OperatorLimits
): BatchSuccess | BatchFailure {
  let root: JsonNode;
  try {
    root = parseDocument(document.value, document.datatype);
  } catch (err) {
    const { status, message } = asStatusError(err);
    return { ok: false, index: 0, status, message };
  }

  const results: BatchSuccess["results"] = [];
  let insertedBytes = 0;

  for (const [index, spec] of specs.entries()) {
    try {
      const fragment = executeMutation(root, spec, limits);
      if (fragment !== undefined) {
        results.push({ index, status: Status.Success, fragment });
      }
      insertedBytes += Buffer.byteLength(spec.value ?? "", "utf8");
    } catch (err) {
      const { status, message } = asStatusError(err);
      return { ok: false, index, status, message };
    }
  }

  return {
    ok: true,
    value: Buffer.from(serializeJson(root), "utf8"),
    insertedBytes,
    results,
  };
}
