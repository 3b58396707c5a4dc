/**
 * One client connection's view of the engine
 *
 * Commands submitted to a session are answered in submission order even
 * though the engine may interleave them with other sessions' commands at
 * fetch and store boundaries.
 */

import {
  decodeCommand,
  encodeResponse,
  type RequestFrame,
  type ResponseContext,
  type ResponseFrame,
} from "./codec.js";
import type { SubdocEngine } from "./engine.js";
import { CodecError, SessionClosedError, SubdocStatusError } from "./errors.js";
import { Status, type StatusCode } from "./protocol.js";
import type { SubdocCommand, SubdocResponse } from "./types.js";

export type SessionFeatures = ResponseContext;

function rejection(status: StatusCode, message: string): ResponseFrame {
  return { status, extras: Buffer.alloc(0), value: Buffer.from(message, "utf8"), cas: 0n };
}

export class SubdocSession {
  readonly #engine: SubdocEngine;
  readonly #features: SessionFeatures;
  #tail: Promise<void> = Promise.resolve();
  #closed = false;

  constructor(engine: SubdocEngine, features: Partial<SessionFeatures> = {}) {
    this.#engine = engine;
    this.#features = { mutationSeqno: features.mutationSeqno ?? false };
  }

  get features(): Readonly<SessionFeatures> {
    return this.#features;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Queue a command behind every command submitted before it
   * @throws SessionClosedError if the session closes before the answer is ready;
   *   the command itself still runs to completion
   */
  submit(command: SubdocCommand): Promise<SubdocResponse> {
    return this.#enqueue(() => this.#engine.execute(command));
  }

  /**
   * Decode, execute and encode one request using this session's features.
   * Undecodable requests are answered with Invalid (InvalidCombo for a spec
   * of the wrong family), in their queue position.
   */
  submitFrame(frame: RequestFrame): Promise<ResponseFrame> {
    return this.#enqueue(async (): Promise<ResponseFrame> => {
      let command: SubdocCommand;
      try {
        command = decodeCommand(frame);
      } catch (err) {
        if (err instanceof CodecError) return rejection(Status.Invalid, err.message);
        if (err instanceof SubdocStatusError) return rejection(err.status, err.message);
        throw err;
      }
      return encodeResponse(await this.#engine.execute(command), this.#features);
    });
  }

  #enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (this.#closed) return Promise.reject(new SessionClosedError());

    const run = this.#tail.then(async () => {
      const result = await task();
      if (this.#closed) throw new SessionClosedError();
      return result;
    });
    // A failed command must not hold up the ones queued behind it
    this.#tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Stop accepting commands. Commands already queued still execute.
   */
  close(): void {
    this.#closed = true;
  }

  /**
   * Resolves once every queued command has settled
   */
  async drain(): Promise<void> {
    await this.#tail;
  }
}
