/**
 * Subdocument command counters
 *
 * The engine reports into a StatsSink; SubdocStats is the in-process
 * implementation used by default.
 */

export const STAT_NAMES = [
  "cmd_subdoc_lookup",
  "bytes_subdoc_lookup_total",
  "bytes_subdoc_lookup_extracted",
  "cmd_subdoc_mutation",
  "bytes_subdoc_mutation_total",
  "bytes_subdoc_mutation_inserted",
  "subdoc_cas_retries",
  "subdoc_tmpfail",
] as const;

export type StatName = (typeof STAT_NAMES)[number];

export type StatsSnapshot = Record<StatName, number>;

export interface StatsSink {
  /**
   * One lookup command completed against a document
   * @param documentBytes - size of the whole document
   * @param extractedBytes - size of the fragment(s) returned
   */
  recordLookup(documentBytes: number, extractedBytes: number): void;

  /**
   * One mutation command was stored
   * @param documentBytes - size of the new document
   * @param insertedBytes - size of the value fragment(s) supplied
   */
  recordMutation(documentBytes: number, insertedBytes: number): void;

  recordRetry(): void;

  recordTemporaryFailure(): void;
}

function emptySnapshot(): StatsSnapshot {
  return {
    cmd_subdoc_lookup: 0,
    bytes_subdoc_lookup_total: 0,
    bytes_subdoc_lookup_extracted: 0,
    cmd_subdoc_mutation: 0,
    bytes_subdoc_mutation_total: 0,
    bytes_subdoc_mutation_inserted: 0,
    subdoc_cas_retries: 0,
    subdoc_tmpfail: 0,
  };
}

export class SubdocStats implements StatsSink {
  #counters: StatsSnapshot = emptySnapshot();

  recordLookup(documentBytes: number, extractedBytes: number): void {
    this.#counters.cmd_subdoc_lookup++;
    this.#counters.bytes_subdoc_lookup_total += documentBytes;
    this.#counters.bytes_subdoc_lookup_extracted += extractedBytes;
  }

  recordMutation(documentBytes: number, insertedBytes: number): void {
    this.#counters.cmd_subdoc_mutation++;
    this.#counters.bytes_subdoc_mutation_total += documentBytes;
    this.#counters.bytes_subdoc_mutation_inserted += insertedBytes;
  }

  recordRetry(): void {
    this.#counters.subdoc_cas_retries++;
  }

  recordTemporaryFailure(): void {
    this.#counters.subdoc_tmpfail++;
  }

  get(name: StatName): number {
    return this.#counters[name];
  }

  /**
   * Copy of every counter
   */
  snapshot(): StatsSnapshot {
    return { ...this.#counters };
  }

  reset(): void {
    this.#counters = emptySnapshot();
  }
}
