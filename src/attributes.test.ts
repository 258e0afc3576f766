/**
 * Attribute Trees — Unit Tests
 */

import { describe, it, expect } from "vitest";
import {
  attr,
  attributeFromJson,
  attributeMap,
  attributesFromJson,
  attributesToJson,
  canonicalEncode,
  cloneAttributeMap,
  flatten,
  type AttributeValue,
} from "./attributes.js";
import { AttributePathError, StateDocumentError } from "./errors.js";

describe("flatten", () => {
  const attrs = attributeMap({
    id: attr.string("i-123"),
    empty: attr.string(""),
    port: attr.number(443),
    enabled: attr.bool(true),
    nothing: attr.null(),
    groups: attr.list(attr.string("g1"), attr.string(""), attr.string("g2")),
    tags: attr.map({ env: attr.string("prod"), team: attr.string("ops") }),
    rules: attr.list(
      attr.map({ key: attr.string("k1"), cidrs: attr.set(attr.string("10.0.0.0/8"), attr.string("10.1.0.0/16")) }),
      attr.map({ key: attr.string("k2") }),
    ),
  });

  it("returns a single scalar", () => {
    expect(flatten(attrs, "id")).toEqual(["i-123"]);
  });

  it("stringifies numbers and booleans", () => {
    expect(flatten(attrs, "port")).toEqual(["443"]);
    expect(flatten(attrs, "enabled")).toEqual(["true"]);
  });

  it("skips empty strings, nulls and missing keys", () => {
    expect(flatten(attrs, "empty")).toEqual([]);
    expect(flatten(attrs, "nothing")).toEqual([]);
    expect(flatten(attrs, "missing")).toEqual([]);
    expect(flatten(attrs, "tags.missing")).toEqual([]);
  });

  it("fans out over lists", () => {
    expect(flatten(attrs, "groups")).toEqual(["g1", "g2"]);
  });

  it("walks nested maps inside lists", () => {
    expect(flatten(attrs, "rules.key")).toEqual(["k1", "k2"]);
    expect(flatten(attrs, "rules.cidrs")).toEqual(["10.0.0.0/8", "10.1.0.0/16"]);
  });

  it("yields every leaf of a map reached without a remaining path", () => {
    expect(flatten(attrs, "tags")).toEqual(["prod", "ops"]);
  });

  it("visits set members in the same order regardless of insertion order", () => {
    const a = attributeMap({ s: attr.set(attr.string("b"), attr.string("a"), attr.string("c")) });
    const b = attributeMap({ s: { kind: "set", items: [attr.string("c"), attr.string("a"), attr.string("b")] } });
    expect(flatten(a, "s")).toEqual(["a", "b", "c"]);
    expect(flatten(b, "s")).toEqual(["a", "b", "c"]);
  });

  it("rejects paths that continue past a scalar", () => {
    expect(() => flatten(attrs, "id.more")).toThrow(AttributePathError);
    expect(() => flatten(attrs, "groups.x")).toThrow(AttributePathError);
  });

  it("rejects empty paths and segments", () => {
    expect(() => flatten(attrs, "")).toThrow(AttributePathError);
    expect(() => flatten(attrs, "tags..env")).toThrow(AttributePathError);
  });
});

describe("sets", () => {
  it("deduplicates members by value", () => {
    const s = attr.set(attr.string("x"), attr.string("x"), attr.number(1));
    expect(s).toEqual({ kind: "set", items: [attr.string("x"), attr.number(1)] });
  });

  it("encodes canonically regardless of order", () => {
    const a = attr.map({ a: attr.string("1"), b: attr.set(attr.string("p"), attr.string("q")) });
    const b: AttributeValue = {
      kind: "map",
      entries: new Map<string, AttributeValue>([
        ["b", { kind: "set", items: [attr.string("q"), attr.string("p")] }],
        ["a", attr.string("1")],
      ]),
    };
    expect(canonicalEncode(a)).toBe(canonicalEncode(b));
  });
});

describe("JSON codec", () => {
  it("decodes plain JSON with set markers", () => {
    const decoded = attributesFromJson({
      name: "web",
      count: 2,
      on: false,
      none: null,
      list: ["a", "b"],
      set: { $set: ["z", "y", "z"] },
      nested: { inner: ["x"] },
    });
    expect(decoded).toEqual(
      attributeMap({
        name: attr.string("web"),
        count: attr.number(2),
        on: attr.bool(false),
        none: attr.null(),
        list: attr.list(attr.string("a"), attr.string("b")),
        set: { kind: "set", items: [attr.string("y"), attr.string("z")] },
        nested: attr.map({ inner: attr.list(attr.string("x")) }),
      }),
    );
  });

  it("encodes sets with the marker in canonical order", () => {
    const encoded = attributesToJson(attributeMap({ s: { kind: "set", items: [attr.string("b"), attr.string("a")] } }));
    expect(encoded).toEqual({ s: { $set: ["a", "b"] } });
  });

  it("treats a marker object with a non-array value as a map", () => {
    expect(attributeFromJson({ $set: "x" })).toEqual(attr.map({ $set: attr.string("x") }));
  });

  it("refuses to encode a map that would read back as a set", () => {
    const ambiguous = attributeMap({ $set: attr.list(attr.string("x")) });
    expect(() => attributesToJson(ambiguous)).toThrow(StateDocumentError);
  });

  it("preserves map insertion order", () => {
    const encoded = attributesToJson(attributesFromJson({ z: "1", a: "2", m: "3" }));
    expect(Object.keys(encoded)).toEqual(["z", "a", "m"]);
  });
});

describe("cloneAttributeMap", () => {
  it("copies deeply", () => {
    const original = attributeMap({ l: attr.list(attr.string("a")) });
    const copy = cloneAttributeMap(original);
    const list = copy.get("l");
    if (list?.kind !== "list") throw new Error("expected list");
    list.items.push(attr.string("b"));
    expect(flatten(original, "l")).toEqual(["a"]);
    expect(flatten(copy, "l")).toEqual(["a", "b"]);
  });
});
