import { describe, it, expect } from "vitest";
import { SubdocStats, STAT_NAMES } from "./stats.js";

describe("SubdocStats", () => {
  it("should start at zero for every counter", () => {
    const stats = new SubdocStats();
    const snapshot = stats.snapshot();
    expect(Object.keys(snapshot).sort()).toEqual([...STAT_NAMES].sort());
    expect(Object.values(snapshot).every((value) => value === 0)).toBe(true);
  });

  it("should accumulate lookups", () => {
    const stats = new SubdocStats();
    stats.recordLookup(30, 2);
    stats.recordLookup(10, 0);

    expect(stats.get("cmd_subdoc_lookup")).toBe(2);
    expect(stats.get("bytes_subdoc_lookup_total")).toBe(40);
    expect(stats.get("bytes_subdoc_lookup_extracted")).toBe(2);
  });

  it("should accumulate mutations", () => {
    const stats = new SubdocStats();
    stats.recordMutation(11, 5);

    expect(stats.get("cmd_subdoc_mutation")).toBe(1);
    expect(stats.get("bytes_subdoc_mutation_total")).toBe(11);
    expect(stats.get("bytes_subdoc_mutation_inserted")).toBe(5);
  });

  it("should count retries and temporary failures", () => {
    const stats = new SubdocStats();
    stats.recordRetry();
    stats.recordRetry();
    stats.recordTemporaryFailure();

    expect(stats.get("subdoc_cas_retries")).toBe(2);
    expect(stats.get("subdoc_tmpfail")).toBe(1);
  });

  it("should return detached snapshots", () => {
    const stats = new SubdocStats();
    const snapshot = stats.snapshot();
    stats.recordRetry();
    expect(snapshot.subdoc_cas_retries).toBe(0);
  });

  it("should reset every counter", () => {
    const stats = new SubdocStats();
    stats.recordLookup(1, 1);
    stats.reset();
    expect(stats.get("cmd_subdoc_lookup")).toBe(0);
  });
});
