/**
 * Condition expression language.
 * Minimal boolean expressions for connection guards, conditional nodes and
 * script steps, evaluated against a data map.
 */

import type { DataMap } from "./types.js";

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export type Clause = {
  key: string;
  operator: "=" | "!=" | "truthy";
  value: string;
};

export class ConditionSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConditionSyntaxError";
  }
}

export function parseCondition(condition: string): Clause[] {
  if (!condition.trim()) return [];
  const parts = condition.split("&&").map((s) => s.trim());
  if (parts.some((p) => p === "")) {
    throw new ConditionSyntaxError(`Empty clause in condition "${condition}"`);
  }
  return parts.map(parseClause);
}

function parseClause(clause: string): Clause {
  if (clause.includes("!=")) {
    const [key, ...rest] = clause.split("!=");
    return checked({ key: key.trim(), operator: "!=", value: rest.join("!=").trim() }, clause);
  }
  if (clause.includes("=")) {
    const [key, ...rest] = clause.split("=");
    return checked({ key: key.trim(), operator: "=", value: rest.join("=").trim() }, clause);
  }
  return checked({ key: clause.trim(), operator: "truthy", value: "" }, clause);
}

function checked(parsed: Clause, source: string): Clause {
  if (!parsed.key || /\s/.test(parsed.key)) {
    throw new ConditionSyntaxError(`Invalid key in clause "${source}"`);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** Look up a key directly, then as a dotted path into nested objects. */
export function lookupPath(data: DataMap, path: string): unknown {
  if (Object.hasOwn(data, path)) return data[path];
  let current: unknown = data;
  for (const segment of path.split(".")) {
    if (current === null || typeof current !== "object") return undefined;
    if (!Object.hasOwn(current, segment)) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/** Resolve a dotted key against the data map. `output.` and `data.` prefixes are optional. */
export function resolveKey(key: string, data: DataMap): string {
  let val = lookupPath(data, key);
  if (val === undefined) {
    for (const prefix of ["output.", "data."]) {
      if (key.startsWith(prefix)) {
        val = lookupPath(data, key.slice(prefix.length));
        break;
      }
    }
  }
  if (val === undefined || val === null) return "";
  if (typeof val === "object") return JSON.stringify(val);
  return String(val);
}

function evaluateClause(clause: Clause, data: DataMap): boolean {
  const resolved = resolveKey(clause.key, data);
  switch (clause.operator) {
    case "=":
      return resolved === clause.value;
    case "!=":
      return resolved !== clause.value;
    case "truthy":
      return resolved !== "" && resolved !== "false";
  }
}

/**
 * Evaluate a condition expression against a data map.
 * Returns true if all clauses are satisfied.
 * Empty condition always returns true.
 */
export function evaluateCondition(condition: string | undefined, data: DataMap): boolean {
  if (!condition || !condition.trim()) return true;
  return parseCondition(condition).every((c) => evaluateClause(c, data));
}
