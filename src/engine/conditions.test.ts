import { describe, it, expect } from "vitest";
import { ConditionSyntaxError, evaluateCondition, lookupPath, parseCondition, resolveKey } from "./conditions.js";

describe("Conditions", () => {
  it("empty condition returns true", () => {
    expect(evaluateCondition("", {})).toBe(true);
    expect(evaluateCondition("   ", { status: "x" })).toBe(true);
    expect(evaluateCondition(undefined, {})).toBe(true);
  });

  it("key=value compares the resolved string", () => {
    expect(evaluateCondition("status=done", { status: "done" })).toBe(true);
    expect(evaluateCondition("status=done", { status: "pending" })).toBe(false);
    expect(evaluateCondition("count=3", { count: 3 })).toBe(true);
  });

  it("key!=value matches anything else", () => {
    expect(evaluateCondition("status!=done", { status: "pending" })).toBe(true);
    expect(evaluateCondition("status!=done", { status: "done" })).toBe(false);
  });

  it("missing keys compare as empty string", () => {
    expect(evaluateCondition("missing=", {})).toBe(true);
    expect(evaluateCondition("missing=something", {})).toBe(false);
  });

  it("bare key is a truthy check", () => {
    expect(evaluateCondition("approved", { approved: true })).toBe(true);
    expect(evaluateCondition("approved", { approved: false })).toBe(false);
    expect(evaluateCondition("approved", { approved: null })).toBe(false);
    expect(evaluateCondition("approved", {})).toBe(false);
    expect(evaluateCondition("approved", { approved: "false" })).toBe(false);
    expect(evaluateCondition("approved", { approved: 0 })).toBe(true);
  });

  it("booleans compare by their string form", () => {
    expect(evaluateCondition("approved = false", { approved: false })).toBe(true);
    expect(evaluateCondition("approved != false", { approved: false })).toBe(false);
    expect(evaluateCondition("approved = true", { approved: true })).toBe(true);
    expect(evaluateCondition("approved =", { approved: false })).toBe(false);
  });

  it("dotted keys walk nested objects", () => {
    const data = { review: { score: 5, notes: { final: "ok" } } };
    expect(evaluateCondition("review.score=5", data)).toBe(true);
    expect(evaluateCondition("review.notes.final=ok", data)).toBe(true);
    expect(evaluateCondition("review.missing.deeper=", data)).toBe(true);
  });

  it("a literal dotted key wins over the nested path", () => {
    expect(evaluateCondition("a.b=flat", { "a.b": "flat", a: { b: "nested" } })).toBe(true);
  });

  it("output. and data. prefixes are optional", () => {
    expect(evaluateCondition("output.status=ok", { status: "ok" })).toBe(true);
    expect(evaluateCondition("data.status=ok", { status: "ok" })).toBe(true);
    expect(evaluateCondition("output.status=ok", { output: { status: "no" }, status: "ok" })).toBe(false);
  });

  it("&& conjunction requires all clauses", () => {
    const data = { a: "1", b: "2" };
    expect(evaluateCondition("a=1 && b=2", data)).toBe(true);
    expect(evaluateCondition("a=1 && b=3", data)).toBe(false);
    expect(evaluateCondition("a=0 && b=2", data)).toBe(false);
  });

  it("keeps everything after the first = as the value", () => {
    expect(evaluateCondition("expr=a=b", { expr: "a=b" })).toBe(true);
  });

  it("does not resolve inherited properties", () => {
    expect(evaluateCondition("constructor", {})).toBe(false);
    expect(evaluateCondition("toString=", {})).toBe(true);
  });
});

describe("parseCondition", () => {
  it("parses clauses with operators", () => {
    expect(parseCondition("a != b && c=d && ready")).toEqual([
      { key: "a", operator: "!=", value: "b" },
      { key: "c", operator: "=", value: "d" },
      { key: "ready", operator: "truthy", value: "" },
    ]);
  });

  it("returns no clauses for an empty string", () => {
    expect(parseCondition("  ")).toEqual([]);
  });

  it("rejects empty clauses", () => {
    expect(() => parseCondition("a=1 &&")).toThrow(ConditionSyntaxError);
    expect(() => parseCondition("&& a=1")).toThrow('Empty clause in condition "&& a=1"');
  });

  it("rejects missing or spaced keys", () => {
    expect(() => parseCondition("=1")).toThrow('Invalid key in clause "=1"');
    expect(() => parseCondition("my key=1")).toThrow(ConditionSyntaxError);
  });
});

describe("resolveKey", () => {
  it("stringifies objects and arrays as JSON", () => {
    expect(resolveKey("tags", { tags: ["a", "b"] })).toBe('["a","b"]');
    expect(resolveKey("meta", { meta: { x: 1 } })).toBe('{"x":1}');
  });

  it("maps null and undefined to empty", () => {
    expect(resolveKey("f", { f: false })).toBe("false");
    expect(resolveKey("n", { n: null })).toBe("");
    expect(resolveKey("u", {})).toBe("");
    expect(resolveKey("z", { z: 0 })).toBe("0");
  });
});

describe("lookupPath", () => {
  it("returns undefined through non-objects", () => {
    expect(lookupPath({ a: "text" }, "a.length")).toBeUndefined();
    expect(lookupPath({ a: null }, "a.b")).toBeUndefined();
  });

  it("returns nested values unchanged", () => {
    const inner = { b: [1, 2] };
    expect(lookupPath({ a: inner }, "a")).toBe(inner);
    expect(lookupPath({ a: inner }, "a.b")).toEqual([1, 2]);
  });
});
