import { describe, it, expect } from "vitest";
import { MemoryKvStore } from "./memory.js";

describe("MemoryKvStore", () => {
  it("should report missing keys", async () => {
    const store = new MemoryKvStore();
    expect(await store.get("nope")).toEqual({ status: "not-found" });
  });

  it("should hand out increasing CAS values", async () => {
    const store = new MemoryKvStore();
    const first = store.set("a", "{}");
    const second = store.set("b", "{}");
    expect(second > first).toBe(true);

    const fetched = await store.get("b");
    expect(fetched.status === "found" && fetched.document.cas).toBe(second);
  });

  it("should store only when the CAS matches", async () => {
    const store = new MemoryKvStore();
    const cas = store.set("doc", "{}");
    const options = { flags: 0, expiry: 0, datatype: "json" } as const;

    expect(await store.casStore("doc", Buffer.from("[1]"), cas + 1n, options)).toEqual({
      status: "conflict",
    });
    const stored = await store.casStore("doc", Buffer.from("[2]"), cas, options);

    expect(stored).toMatchObject({ status: "stored", token: { seqno: 2n } });
    expect(store.read("doc")).toBe("[2]");
  });

  it("should report a compare-and-swap on a missing key", async () => {
    const store = new MemoryKvStore();
    expect(
      await store.casStore("doc", Buffer.from("{}"), 1n, { flags: 0, expiry: 0, datatype: "json" })
    ).toEqual({ status: "not-found" });
  });

  it("should expire documents against its clock", async () => {
    let now = 1_000_000;
    const store = new MemoryKvStore({ now: () => now });
    store.set("doc", "{}", { expiry: 10 });

    expect((await store.get("doc")).status).toBe("found");
    now += 10_000;
    expect((await store.get("doc")).status).toBe("not-found");
    expect(store.size).toBe(0);
  });

  it("should report keys it does not own", async () => {
    const store = new MemoryKvStore({ owns: (key) => !key.startsWith("remote") });
    store.set("remote-1", "{}");

    expect(await store.get("remote-1")).toEqual({ status: "not-owner" });
    expect(
      await store.casStore("remote-1", Buffer.from("{}"), 1n, { flags: 0, expiry: 0, datatype: "json" })
    ).toEqual({ status: "not-owner" });
  });

  it("should copy documents on the way out", async () => {
    const store = new MemoryKvStore();
    store.set("doc", "{}");
    const fetched = await store.get("doc");
    if (fetched.status !== "found") throw new Error("expected document");

    fetched.document.flags = 99;
    expect(store.peek("doc")?.flags).toBe(0);
  });
});
