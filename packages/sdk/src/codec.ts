/**
 * Binary encoding of subdoc request and response bodies
 *
 * Framing (the fixed packet header) belongs to the transport: it hands over
 * the opcode, the extras, key and value sections and the CAS, and that is
 * what these functions read and produce. All integers are big-endian.
 *
 * Single path request:   extras { pathLen u16, flags u8, [expiry u32] }
 *                        key, value = path ++ fragment
 * Multi-lookup request:  value = { opcode u8, flags u8, pathLen u16, path }*
 * Multi-mutation request:
 *                        extras = [expiry u32]
 *                        value = { opcode u8, flags u8, pathLen u16, valueLen u32, path, fragment }*
 * Multi-lookup response: value = { status u16, length u32, fragment }*
 * Multi-mutation response:
 *                        success: { index u8, status u16, length u32, fragment }*
 *                        failure: { index u8, status u16 }
 * Mutation responses carry { vbucketUuid u64, seqno u64 } extras when the
 * session asked for sequence numbers.
 */

import { CodecError, SubdocStatusError } from "./errors.js";
import {
  FLAG_MKDIR_P,
  KNOWN_FLAG_BITS,
  OPCODE_BYTES,
  Status,
  isLookupOpcode,
  isMutationOpcode,
  isStatusCode,
  opcodeFromByte,
  type StatusCode,
  type WireOpcodeName,
} from "./protocol.js";
import type {
  MultiLookupResponse,
  MultiMutationResponse,
  MutationToken,
  OperationResult,
  SubdocCommand,
  SubdocFlags,
  SubdocResponse,
} from "./types.js";

/**
 * Header-level fields of a request, as delivered by the transport
 */
export interface RequestFrame {
  opcode: number;
  extras: Buffer;
  key: Buffer;
  value: Buffer;
  cas: bigint;
}

/**
 * Header-level fields of a response; the opcode echoes the request's
 */
export interface ResponseFrame {
  status: number;
  extras: Buffer;
  value: Buffer;
  cas: bigint;
}

/**
 * Per-connection features that change the response encoding
 */
export interface ResponseContext {
  mutationSeqno: boolean;
}

export const MUTATION_EXTRAS_LENGTH = 16;

export class ByteReader {
  #buffer: Buffer;
  #offset = 0;

  constructor(buffer: Buffer) {
    this.#buffer = buffer;
  }

  get remaining(): number {
    return this.#buffer.length - this.#offset;
  }

  get offset(): number {
    return this.#offset;
  }

  #need(length: number, what: string): void {
    if (this.remaining < length) {
      throw new CodecError(
        `Truncated ${what}: need ${length} bytes at offset ${this.#offset}, have ${this.remaining}`
      );
    }
  }

  u8(what = "u8"): number {
    this.#need(1, what);
    const value = this.#buffer.readUInt8(this.#offset);
    this.#offset += 1;
    return value;
  }

  u16(what = "u16"): number {
    this.#need(2, what);
    const value = this.#buffer.readUInt16BE(this.#offset);
    this.#offset += 2;
    return value;
  }

  u32(what = "u32"): number {
    this.#need(4, what);
    const value = this.#buffer.readUInt32BE(this.#offset);
    this.#offset += 4;
    return value;
  }

  u64(what = "u64"): bigint {
    this.#need(8, what);
    const value = this.#buffer.readBigUInt64BE(this.#offset);
    this.#offset += 8;
    return value;
  }

  bytes(length: number, what = "bytes"): Buffer {
    this.#need(length, what);
    const value = this.#buffer.subarray(this.#offset, this.#offset + length);
    this.#offset += length;
    return value;
  }

  rest(): Buffer {
    return this.bytes(this.remaining);
  }

  expectEnd(what: string): void {
    if (this.remaining !== 0) {
      throw new CodecError(`${this.remaining} unexpected trailing bytes after ${what}`);
    }
  }
}

export class ByteWriter {
  #chunks: Buffer[] = [];

  u8(value: number): this {
    return this.#fixed(value, 1, 0xff, (chunk) => chunk.writeUInt8(value));
  }

  u16(value: number): this {
    return this.#fixed(value, 2, 0xffff, (chunk) => chunk.writeUInt16BE(value));
  }

  u32(value: number): this {
    return this.#fixed(value, 4, 0xffffffff, (chunk) => chunk.writeUInt32BE(value));
  }

  u64(value: bigint): this {
    if (value < 0n || value > 0xffffffffffffffffn) {
      throw new CodecError(`Value ${value} does not fit in 8 bytes`);
    }
    const chunk = Buffer.alloc(8);
    chunk.writeBigUInt64BE(value);
    this.#chunks.push(chunk);
    return this;
  }

  bytes(value: Buffer): this {
    this.#chunks.push(value);
    return this;
  }

  finish(): Buffer {
    return Buffer.concat(this.#chunks);
  }

  #fixed(value: number, size: number, max: number, write: (chunk: Buffer) => void): this {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new CodecError(`Value ${value} does not fit in ${size} byte(s)`);
    }
    const chunk = Buffer.alloc(size);
    write(chunk);
    this.#chunks.push(chunk);
    return this;
  }
}

function utf8(text: string): Buffer {
  return Buffer.from(text, "utf8");
}

function encodeFlags(flags: SubdocFlags | undefined): number {
  return flags?.mkdirP ? FLAG_MKDIR_P : 0;
}

function decodeFlags(byte: number): SubdocFlags {
  if ((byte & ~KNOWN_FLAG_BITS) !== 0) {
    throw new CodecError(`Unknown subdoc flag bits 0x${byte.toString(16)}`);
  }
  return (byte & FLAG_MKDIR_P) !== 0 ? { mkdirP: true } : {};
}

function readStatus(reader: ByteReader): StatusCode {
  const status = reader.u16("status");
  if (!isStatusCode(status)) {
    throw new CodecError(`Unknown status 0x${status.toString(16)}`);
  }
  return status;
}

function wireOpcode(frameOpcode: number): WireOpcodeName {
  const name = opcodeFromByte(frameOpcode);
  if (!name) throw new CodecError(`Unknown opcode 0x${frameOpcode.toString(16)}`);
  return name;
}

/**
 * Encode a command into request sections
 */
export function encodeCommand(command: SubdocCommand): RequestFrame {
  const key = utf8(command.key);

  switch (command.kind) {
    case "lookup":
    case "mutation": {
      const path = utf8(command.path);
      const extras = new ByteWriter().u16(path.length).u8(encodeFlags(command.flags));
      if (command.expiry !== undefined) extras.u32(command.expiry);
      return {
        opcode: OPCODE_BYTES[command.opcode],
        extras: extras.finish(),
        key,
        value: Buffer.concat([path, utf8(command.value ?? "")]),
        cas: command.kind === "mutation" ? command.cas ?? 0n : 0n,
      };
    }
    case "multi_lookup": {
      const body = new ByteWriter();
      for (const spec of command.specs) {
        const path = utf8(spec.path);
        body.u8(OPCODE_BYTES[spec.opcode]).u8(encodeFlags(spec.flags)).u16(path.length).bytes(path);
      }
      return { opcode: OPCODE_BYTES.multi_lookup, extras: Buffer.alloc(0), key, value: body.finish(), cas: 0n };
    }
    case "multi_mutation": {
      const body = new ByteWriter();
      for (const spec of command.specs) {
        const path = utf8(spec.path);
        const value = utf8(spec.value ?? "");
        body
          .u8(OPCODE_BYTES[spec.opcode])
          .u8(encodeFlags(spec.flags))
          .u16(path.length)
          .u32(value.length)
          .bytes(path)
          .bytes(value);
      }
      const extras =
        command.expiry === undefined ? Buffer.alloc(0) : new ByteWriter().u32(command.expiry).finish();
      return {
        opcode: OPCODE_BYTES.multi_mutation,
        extras,
        key,
        value: body.finish(),
        cas: command.cas ?? 0n,
      };
    }
  }
}

/**
 * Decode request sections into a command
 * @throws CodecError on unknown opcodes, bad flag bits or truncated bodies;
 *   SubdocStatusError(InvalidCombo) for a spec of the wrong family
 */
export function decodeCommand(frame: RequestFrame): SubdocCommand {
  const opcode = wireOpcode(frame.opcode);
  const key = frame.key.toString("utf8");

  if (opcode === "multi_lookup") {
    if (frame.extras.length !== 0) throw new CodecError("Multi-lookup takes no extras");
    const reader = new ByteReader(frame.value);
    const specs: Extract<SubdocCommand, { kind: "multi_lookup" }>["specs"] = [];
    while (reader.remaining > 0) {
      const spec = wireOpcode(reader.u8("spec opcode"));
      const flags = decodeFlags(reader.u8("spec flags"));
      const path = reader.bytes(reader.u16("path length"), "path").toString("utf8");
      if (!isLookupOpcode(spec)) {
        throw new SubdocStatusError(Status.InvalidCombo, `${spec} cannot appear in a multi-lookup`);
      }
      specs.push({ opcode: spec, path, flags });
    }
    return { kind: "multi_lookup", key, specs };
  }

  if (opcode === "multi_mutation") {
    let expiry: number | undefined;
    if (frame.extras.length === 4) {
      expiry = frame.extras.readUInt32BE(0);
    } else if (frame.extras.length !== 0) {
      throw new CodecError(`Invalid multi-mutation extras length ${frame.extras.length}`);
    }
    const reader = new ByteReader(frame.value);
    const specs: Extract<SubdocCommand, { kind: "multi_mutation" }>["specs"] = [];
    while (reader.remaining > 0) {
      const spec = wireOpcode(reader.u8("spec opcode"));
      const flags = decodeFlags(reader.u8("spec flags"));
      const pathLength = reader.u16("path length");
      const valueLength = reader.u32("value length");
      const path = reader.bytes(pathLength, "path").toString("utf8");
      const value = reader.bytes(valueLength, "value").toString("utf8");
      if (!isMutationOpcode(spec)) {
        throw new SubdocStatusError(Status.InvalidCombo, `${spec} cannot appear in a multi-mutation`);
      }
      specs.push({ opcode: spec, path, value, flags });
    }
    return {
      kind: "multi_mutation",
      key,
      specs,
      ...(frame.cas === 0n ? {} : { cas: frame.cas }),
      ...(expiry === undefined ? {} : { expiry }),
    };
  }

  if (frame.extras.length !== 3 && frame.extras.length !== 7) {
    throw new CodecError(`Invalid subdoc extras length ${frame.extras.length}`);
  }
  const extras = new ByteReader(frame.extras);
  const pathLength = extras.u16("path length");
  const flags = decodeFlags(extras.u8("flags"));
  const expiry = extras.remaining === 4 ? extras.u32("expiry") : undefined;

  const body = new ByteReader(frame.value);
  const path = body.bytes(pathLength, "path").toString("utf8");
  const value = body.rest().toString("utf8");

  if (isLookupOpcode(opcode)) {
    return {
      kind: "lookup",
      opcode,
      key,
      path,
      flags,
      ...(expiry === undefined ? {} : { expiry }),
      ...(value === "" ? {} : { value }),
    };
  }
  return {
    kind: "mutation",
    opcode,
    key,
    path,
    value,
    flags,
    ...(frame.cas === 0n ? {} : { cas: frame.cas }),
    ...(expiry === undefined ? {} : { expiry }),
  };
}

function encodeToken(token: MutationToken | undefined, context: ResponseContext): Buffer {
  if (!context.mutationSeqno || !token) return Buffer.alloc(0);
  return new ByteWriter().u64(token.vbucketUuid).u64(token.seqno).finish();
}

/**
 * Encode a response into response sections
 */
export function encodeResponse(response: SubdocResponse, context: ResponseContext): ResponseFrame {
  const cas = response.cas ?? 0n;
  const message = utf8(response.message ?? "");

  switch (response.kind) {
    case "lookup":
      return {
        status: response.status,
        extras: Buffer.alloc(0),
        value: response.status === Status.Success ? utf8(response.fragment ?? "") : message,
        cas,
      };
    case "mutation":
      return {
        status: response.status,
        extras: response.status === Status.Success ? encodeToken(response.token, context) : Buffer.alloc(0),
        value: response.status === Status.Success ? utf8(response.fragment ?? "") : message,
        cas,
      };
    case "multi_lookup": {
      if (response.results.length === 0) {
        return { status: response.status, extras: Buffer.alloc(0), value: message, cas };
      }
      const body = new ByteWriter();
      for (const result of response.results) {
        const fragment = utf8(result.fragment ?? "");
        body.u16(result.status).u32(fragment.length).bytes(fragment);
      }
      return { status: response.status, extras: Buffer.alloc(0), value: body.finish(), cas };
    }
    case "multi_mutation": {
      if (response.failure) {
        return {
          status: response.status,
          extras: Buffer.alloc(0),
          value: new ByteWriter().u8(response.failure.index).u16(response.failure.status).finish(),
          cas,
        };
      }
      if (response.status !== Status.Success) {
        return { status: response.status, extras: Buffer.alloc(0), value: message, cas };
      }
      const body = new ByteWriter();
      for (const result of response.results) {
        const fragment = utf8(result.fragment);
        body.u8(result.index).u16(result.status).u32(fragment.length).bytes(fragment);
      }
      return {
        status: response.status,
        extras: encodeToken(response.token, context),
        value: body.finish(),
        cas,
      };
    }
  }
}

function decodeToken(extras: Buffer): MutationToken | undefined {
  if (extras.length === 0) return undefined;
  if (extras.length !== MUTATION_EXTRAS_LENGTH) {
    throw new CodecError(`Invalid mutation extras length ${extras.length}`);
  }
  const reader = new ByteReader(extras);
  return { vbucketUuid: reader.u64("vbucket uuid"), seqno: reader.u64("seqno") };
}

function decodeMultiLookup(frame: ResponseFrame, status: StatusCode): MultiLookupResponse {
  const cas = frame.cas === 0n ? {} : { cas: frame.cas };
  if (status !== Status.Success && status !== Status.MultiPathFailure) {
    return { kind: "multi_lookup", status, results: [], message: frame.value.toString("utf8"), ...cas };
  }
  const reader = new ByteReader(frame.value);
  const results: OperationResult[] = [];
  while (reader.remaining > 0) {
    const specStatus = readStatus(reader);
    const fragment = reader.bytes(reader.u32("result length"), "result").toString("utf8");
    results.push(specStatus === Status.Success && fragment.length > 0 ? { status: specStatus, fragment } : { status: specStatus });
  }
  return { kind: "multi_lookup", status, results, ...cas };
}

function decodeMultiMutation(frame: ResponseFrame, status: StatusCode): MultiMutationResponse {
  const cas = frame.cas === 0n ? {} : { cas: frame.cas };
  if (status === Status.MultiPathFailure) {
    const reader = new ByteReader(frame.value);
    const index = reader.u8("failure index");
    const failed = readStatus(reader);
    reader.expectEnd("multi-mutation failure");
    return { kind: "multi_mutation", status, results: [], failure: { index, status: failed }, ...cas };
  }
  if (status !== Status.Success) {
    return { kind: "multi_mutation", status, results: [], message: frame.value.toString("utf8"), ...cas };
  }
  const reader = new ByteReader(frame.value);
  const results: MultiMutationResponse["results"] = [];
  while (reader.remaining > 0) {
    const index = reader.u8("spec index");
    const specStatus = readStatus(reader);
    const fragment = reader.bytes(reader.u32("result length"), "result").toString("utf8");
    results.push({ index, status: specStatus, fragment });
  }
  const token = decodeToken(frame.extras);
  return { kind: "multi_mutation", status, results, ...cas, ...(token ? { token } : {}) };
}

/**
 * Decode response sections; the request opcode selects the body layout
 * @throws CodecError on unknown statuses or truncated bodies
 */
export function decodeResponse(requestOpcode: number, frame: ResponseFrame): SubdocResponse {
  const opcode = wireOpcode(requestOpcode);
  if (!isStatusCode(frame.status)) {
    throw new CodecError(`Unknown status 0x${frame.status.toString(16)}`);
  }
  const status = frame.status;

  if (opcode === "multi_lookup") return decodeMultiLookup(frame, status);
  if (opcode === "multi_mutation") return decodeMultiMutation(frame, status);

  const text = frame.value.toString("utf8");
  const cas = frame.cas === 0n ? {} : { cas: frame.cas };
  const body =
    status === Status.Success
      ? text === "" ? {} : { fragment: text }
      : { message: text };

  if (isLookupOpcode(opcode)) {
    return { kind: "lookup", status, ...body, ...cas };
  }
  const token = status === Status.Success ? decodeToken(frame.extras) : undefined;
  return { kind: "mutation", status, ...body, ...cas, ...(token ? { token } : {}) };
}
