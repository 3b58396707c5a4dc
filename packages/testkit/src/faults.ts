/**
 * KvStore wrapper that injects failures on a script
 *
 * Each scripted fault is consumed by the next call of its kind; calls with
 * nothing scripted go to the wrapped store. Every call is recorded so tests
 * can assert how many fetch/store cycles an operation took.
 */

import type {
  CasStoreOptions,
  FetchOutcome,
  KvStore,
  StoreOutcome,
} from "@subdoc/sdk";

export type FetchFault = "not-owner" | "not-found";
export type StoreFault = "conflict" | "not-owner" | "not-found";

export interface CallRecord {
  op: "get" | "casStore";
  key: string;
  injected?: FetchFault | StoreFault;
}

export class FaultInjectingStore implements KvStore {
  readonly #inner: KvStore;
  #fetchFaults: FetchFault[] = [];
  #storeFaults: StoreFault[] = [];
  readonly calls: CallRecord[] = [];

  constructor(inner: KvStore) {
    this.#inner = inner;
  }

  /**
   * Make the next `count` conditional stores report a fault
   */
  failStores(fault: StoreFault, count = 1): this {
    for (let i = 0; i < count; i++) this.#storeFaults.push(fault);
    return this;
  }

  /**
   * Make the next `count` fetches report a fault
   */
  failFetches(fault: FetchFault, count = 1): this {
    for (let i = 0; i < count; i++) this.#fetchFaults.push(fault);
    return this;
  }

  reset(): void {
    this.#fetchFaults = [];
    this.#storeFaults = [];
    this.calls.length = 0;
  }

  count(op: CallRecord["op"]): number {
    return this.calls.filter((call) => call.op === op).length;
  }

  async get(key: string): Promise<FetchOutcome> {
    const fault = this.#fetchFaults.shift();
    if (fault) {
      this.calls.push({ op: "get", key, injected: fault });
      return { status: fault };
    }
    this.calls.push({ op: "get", key });
    return this.#inner.get(key);
  }

  async casStore(
    key: string,
    value: Buffer,
    expectedCas: bigint,
    options: CasStoreOptions
  ): Promise<StoreOutcome> {
    const fault = this.#storeFaults.shift();
    if (fault) {
      this.calls.push({ op: "casStore", key, injected: fault });
      return { status: fault };
    }
    this.calls.push({ op: "casStore", key });
    return this.#inner.casStore(key, value, expectedCas, options);
  }
}
