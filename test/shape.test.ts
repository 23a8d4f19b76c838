import { describe, it, expect } from "vitest";
import {
  lookupDim,
  resolvePending,
  resolveShape,
  solveMissingAxis,
} from "../src/core/shape.js";
import { AmbiguousShapeError, UnresolvableShapeError } from "../src/core/errors.js";
import type { DecodedValue, Dim, FloatArray, Namespace, PendingLedger } from "../src/core/types.js";

function flat(...values: number[]): FloatArray {
  return { dtype: "f8", shape: [values.length], data: Float64Array.from(values) };
}

describe("resolveShape", () => {
  it("should substitute named axes from the namespace", () => {
    const ns: Namespace = new Map<string, DecodedValue>([
      ["S", 2],
      ["N", 1],
    ]);
    expect(resolveShape("forces", [3, "S", "N"], ns)).toEqual({ shape: [3, 2, 1], missing: null });
  });

  it("should mark a single unknown axis", () => {
    const ns: Namespace = new Map<string, DecodedValue>([["S", 2]]);
    expect(resolveShape("forces", [3, "S", "N"], ns)).toEqual({ shape: [3, 2, -1], missing: "N" });
  });

  it("should reject two unknown axes", () => {
    expect(() => resolveShape("forces", [3, "S", "N"], new Map())).toThrow(AmbiguousShapeError);
  });

  it("should count a repeated unknown name once per axis", () => {
    expect(() => resolveShape("matrix", ["n", "n"], new Map())).toThrow(AmbiguousShapeError);
  });
});

describe("lookupDim", () => {
  it("should only accept non-negative integers", () => {
    const ns: Namespace = new Map<string, number | string>([
      ["a", 4],
      ["b", 1.5],
      ["c", -1],
      ["d", "four"],
    ]);
    expect(lookupDim(ns, "a")).toBe(4);
    expect(lookupDim(ns, "b")).toBeUndefined();
    expect(lookupDim(ns, "c")).toBeUndefined();
    expect(lookupDim(ns, "d")).toBeUndefined();
    expect(lookupDim(ns, "e")).toBeUndefined();
  });
});

describe("solveMissingAxis", () => {
  it("should infer the axis and store it", () => {
    const ns: Namespace = new Map<string, DecodedValue>([["S", 2]]);
    const shape = solveMissingAxis("forces", { shape: [3, 2, -1], missing: "N" }, 12, ns);
    expect(shape).toEqual([3, 2, 2]);
    expect(ns.get("N")).toBe(2);
  });

  it("should reject an inexact division", () => {
    const ns: Namespace = new Map();
    expect(() => solveMissingAxis("forces", { shape: [3, -1], missing: "N" }, 7, ns)).toThrow(
      UnresolvableShapeError
    );
    expect(ns.has("N")).toBe(false);
  });
});

describe("resolvePending", () => {
  it("should solve fields across passes from one anchor", () => {
    const ns: Namespace = new Map<string, DecodedValue>([
      ["pairs", flat(1, 2, 3, 4, 5, 6, 7, 8)],
      ["vectors", flat(1, 2, 3, 4, 5, 6)],
    ]);
    // "pairs" is blocked until "vectors" fixes n
    const ledger: PendingLedger = new Map<string, readonly Dim[]>([
      ["pairs", ["n", "m"]],
      ["vectors", [3, "n"]],
    ]);

    resolvePending(ns, ledger);

    expect(ledger.size).toBe(0);
    expect(ns.get("n")).toBe(2);
    expect(ns.get("m")).toBe(4);
    expect(ns.get("vectors")).toMatchObject({ shape: [3, 2] });
    expect(ns.get("pairs")).toMatchObject({ shape: [2, 4] });
  });

  it("should fail when every field has two unknown names", () => {
    const ns: Namespace = new Map<string, DecodedValue>([
      ["a", flat(1, 2, 3, 4, 5, 6)],
      ["b", flat(1, 2, 3, 4, 5, 6)],
    ]);
    const ledger: PendingLedger = new Map<string, readonly Dim[]>([
      ["a", ["n", "m"]],
      ["b", ["m", "n"]],
    ]);

    expect(() => resolvePending(ns, ledger)).toThrow(UnresolvableShapeError);
    try {
      resolvePending(ns, ledger);
    } catch (err) {
      if (err instanceof UnresolvableShapeError) {
        expect(err.pending).toEqual({ a: ["n", "m"], b: ["m", "n"] });
      }
    }
  });

  it("should solve a square matrix with one unknown side", () => {
    const ns: Namespace = new Map<string, DecodedValue>([["matrix", flat(1, 2, 3, 4, 5, 6, 7, 8, 9)]]);
    const ledger: PendingLedger = new Map<string, readonly Dim[]>([["matrix", ["n", "n"]]]);

    resolvePending(ns, ledger);

    expect(ns.get("n")).toBe(3);
    expect(ns.get("matrix")).toMatchObject({ shape: [3, 3] });
  });

  it("should reshape fields whose axes became known", () => {
    const ns: Namespace = new Map<string, FloatArray | number>([
      ["n", 2],
      ["grid", flat(1, 2, 3, 4)],
    ]);
    const ledger: PendingLedger = new Map<string, readonly Dim[]>([["grid", ["n", 2]]]);

    resolvePending(ns, ledger);
    expect(ns.get("grid")).toMatchObject({ shape: [2, 2] });
  });

  it("should reject a field whose length does not fit", () => {
    const ns: Namespace = new Map<string, DecodedValue>([["vectors", flat(1, 2, 3, 4, 5, 6, 7)]]);
    const ledger: PendingLedger = new Map<string, readonly Dim[]>([["vectors", [3, "n"]]]);
    expect(() => resolvePending(ns, ledger)).toThrow(UnresolvableShapeError);
  });

  it("should turn one-dimensional string arrays into lists", () => {
    const ns: Namespace = new Map<string, DecodedValue>([
      ["symbols", { dtype: "str" as const, shape: [2], data: ["Si", "O"] }],
    ]);
    const ledger: PendingLedger = new Map<string, readonly Dim[]>([["symbols", ["nspecies"]]]);

    resolvePending(ns, ledger);
    expect(ns.get("symbols")).toEqual(["Si", "O"]);
    expect(ns.get("nspecies")).toBe(2);
  });
});
