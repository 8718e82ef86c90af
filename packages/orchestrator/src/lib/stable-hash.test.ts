import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { canonicalJson, stableHash } from "./stable-hash.js";

describe("canonicalJson", () => {
  it("sorts keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: 3 } })).toBe(
      '{"a":{"c":3,"d":[2,{"y":0,"z":1}]},"b":1}',
    );
  });

  it("drops undefined properties like JSON.stringify", () => {
    expect(canonicalJson({ a: undefined, b: null })).toBe('{"b":null}');
  });
});

describe("stableHash", () => {
  it("is the sha256 of the canonical JSON of its arguments", () => {
    const expected = createHash("sha256").update('["run-1",{"a":1,"b":2}]').digest("hex");
    expect(stableHash("run-1", { b: 2, a: 1 })).toBe(expected);
  });

  it("ignores key order", () => {
    expect(stableHash({ sharpe: 1, winRate: 0.5 })).toBe(stableHash({ winRate: 0.5, sharpe: 1 }));
  });

  it("distinguishes different values", () => {
    expect(stableHash({ sharpe: 1 })).not.toBe(stableHash({ sharpe: 1.0001 }));
  });
});
