/**
 * State Graph — Attribute Trees
 *
 * Resource attributes are a tree of scalars, lists, sets and maps. Sets are
 * unordered: they are deduplicated by canonical encoding and always visited
 * in canonical order, so nothing downstream depends on insertion order.
 */

import { AttributePathError, StateDocumentError } from "./errors.js";

export type AttributeValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "null" }
  | { kind: "list"; items: AttributeValue[] }
  | { kind: "set"; items: AttributeValue[] }
  | { kind: "map"; entries: AttributeMap };

export type AttributeMap = Map<string, AttributeValue>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Object key that marks a set in the JSON encoding: `{ "$set": [...] }`. */
export const SET_MARKER = "$set";

// ── Construction ────────────────────────────────────────────────

export const attr = {
  string: (value: string): AttributeValue => ({ kind: "string", value }),
  number: (value: number): AttributeValue => ({ kind: "number", value }),
  bool: (value: boolean): AttributeValue => ({ kind: "bool", value }),
  null: (): AttributeValue => ({ kind: "null" }),
  list: (...items: AttributeValue[]): AttributeValue => ({ kind: "list", items }),
  set: (...items: AttributeValue[]): AttributeValue => ({ kind: "set", items: canonicalSet(items) }),
  map: (entries: Record<string, AttributeValue>): AttributeValue => ({
    kind: "map",
    entries: new Map(Object.entries(entries)),
  }),
};

/** Build a record's top-level attribute map. */
export function attributeMap(entries: Record<string, AttributeValue> = {}): AttributeMap {
  return new Map(Object.entries(entries));
}

// ── Canonical encoding ──────────────────────────────────────────

export function canonicalEncode(v: AttributeValue): string {
  switch (v.kind) {
    case "string":
      return JSON.stringify(v.value);
    case "number":
      return String(v.value);
    case "bool":
      return v.value ? "true" : "false";
    case "null":
      return "null";
    case "list":
      return `[${v.items.map(canonicalEncode).join(",")}]`;
    case "set":
      return `<${v.items.map(canonicalEncode).sort().join(",")}>`;
    case "map": {
      const keys = [...v.entries.keys()].sort();
      return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalEncode(v.entries.get(k) ?? { kind: "null" })}`).join(",")}}`;
    }
  }
}

function canonicalSet(items: AttributeValue[]): AttributeValue[] {
  const byKey = new Map<string, AttributeValue>();
  for (const item of items) {
    const key = canonicalEncode(item);
    if (!byKey.has(key)) byKey.set(key, item);
  }
  return [...byKey.keys()].sort().map((k) => byKey.get(k) ?? { kind: "null" });
}

export function attributesEqual(a: AttributeValue, b: AttributeValue): boolean {
  return canonicalEncode(a) === canonicalEncode(b);
}

// ── Copying ─────────────────────────────────────────────────────

export function cloneAttribute(v: AttributeValue): AttributeValue {
  switch (v.kind) {
    case "list":
      return { kind: "list", items: v.items.map(cloneAttribute) };
    case "set":
      return { kind: "set", items: v.items.map(cloneAttribute) };
    case "map":
      return { kind: "map", entries: cloneAttributeMap(v.entries) };
    default:
      return { ...v };
  }
}

export function cloneAttributeMap(m: AttributeMap): AttributeMap {
  const out: AttributeMap = new Map();
  for (const [k, v] of m) out.set(k, cloneAttribute(v));
  return out;
}

// ── JSON codec ──────────────────────────────────────────────────

function isSetEncoding(v: { [key: string]: JsonValue }): v is { [SET_MARKER]: JsonValue[] } {
  const keys = Object.keys(v);
  return keys.length === 1 && keys[0] === SET_MARKER && Array.isArray(v[SET_MARKER]);
}

export function attributeFromJson(v: JsonValue): AttributeValue {
  if (v === null) return { kind: "null" };
  if (typeof v === "string") return { kind: "string", value: v };
  if (typeof v === "number") return { kind: "number", value: v };
  if (typeof v === "boolean") return { kind: "bool", value: v };
  if (Array.isArray(v)) return { kind: "list", items: v.map(attributeFromJson) };
  if (isSetEncoding(v)) return { kind: "set", items: canonicalSet(v[SET_MARKER].map(attributeFromJson)) };
  return { kind: "map", entries: attributesFromJson(v) };
}

export function attributesFromJson(obj: { [key: string]: JsonValue }): AttributeMap {
  const out: AttributeMap = new Map();
  for (const [k, v] of Object.entries(obj)) out.set(k, attributeFromJson(v));
  return out;
}

export function attributeToJson(v: AttributeValue): JsonValue {
  switch (v.kind) {
    case "string":
    case "number":
    case "bool":
      return v.value;
    case "null":
      return null;
    case "list":
      return v.items.map(attributeToJson);
    case "set":
      return { [SET_MARKER]: canonicalSet(v.items).map(attributeToJson) };
    case "map":
      return attributesToJson(v.entries);
  }
}

export function attributesToJson(m: AttributeMap): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [k, v] of m) {
    if (k === SET_MARKER && m.size === 1 && v.kind === "list") {
      throw new StateDocumentError("attributes", [`map key "${SET_MARKER}" is reserved for sets`]);
    }
    out[k] = attributeToJson(v);
  }
  return out;
}

// ── Flattening ──────────────────────────────────────────────────

function scalarString(v: AttributeValue & { kind: "string" | "number" | "bool" }): string {
  return typeof v.value === "string" ? v.value : String(v.value);
}

/**
 * Return every non-empty scalar found at a dotted attribute path. Lists and
 * sets fan out over their members; a map reached with no path left yields all
 * of its leaves.
 */
export function flatten(attrs: AttributeMap, path: string): string[] {
  if (path === "") throw new AttributePathError(path, "empty path");
  const segments = path.split(".");
  const out: string[] = [];
  walk({ kind: "map", entries: attrs }, segments, 0, path, out);
  return out;
}

function walk(v: AttributeValue, segments: string[], i: number, path: string, out: string[]): void {
  switch (v.kind) {
    case "string":
    case "number":
    case "bool": {
      if (i < segments.length) {
        throw new AttributePathError(path, `"${segments.slice(0, i).join(".")}" is not a container`);
      }
      const s = scalarString(v);
      if (s !== "") out.push(s);
      return;
    }
    case "null":
      return;
    case "list":
      for (const item of v.items) walk(item, segments, i, path, out);
      return;
    case "set":
      for (const item of canonicalSet(v.items)) walk(item, segments, i, path, out);
      return;
    case "map": {
      if (i === segments.length) {
        for (const child of v.entries.values()) walk(child, segments, i, path, out);
        return;
      }
      const segment = segments[i];
      if (segment === "") throw new AttributePathError(path, "empty path segment");
      const child = v.entries.get(segment);
      if (child) walk(child, segments, i + 1, path, out);
      return;
    }
  }
}
