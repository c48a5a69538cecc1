// tests/unit/state-matcher.test.ts - Listing lookup by id

import { describe, test, expect } from "vitest";
import { findById } from "../../control/src/provider/match";

describe("findById", () => {
  const keys = [
    { id: "sshkey-1", name: "laptop" },
    { id: "sshkey-2", name: "ci" },
    { id: "sshkey-2", name: "duplicate" },
  ];

  test("returns the record with the matching id", () => {
    expect(findById(keys, "sshkey-1")?.name).toBe("laptop");
  });

  test("first record wins when ids repeat", () => {
    expect(findById(keys, "sshkey-2")?.name).toBe("ci");
  });

  test("undefined when nothing matches", () => {
    expect(findById(keys, "sshkey-9")).toBeUndefined();
    expect(findById([], "sshkey-1")).toBeUndefined();
  });

  test("matches the id exactly", () => {
    expect(findById(keys, "SSHKEY-1")).toBeUndefined();
    expect(findById(keys, "sshkey-")).toBeUndefined();
  });
});
