/**
 * Dependency Inference — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { attr, attributeMap, type AttributeValue } from "./attributes.js";
import { inferDependencies, mergeDepMaps, uniqueSorted, type DepMap } from "./deps.js";
import { AmbiguousSourceError, DuplicateRuleError } from "./errors.js";
import { createLogger, MemoryTransport } from "./logging.js";
import { createResource, newStateGraph, type StateGraph } from "./state.js";

function put(
  graph: StateGraph,
  key: string,
  attributes: Record<string, AttributeValue>,
  dependencies: string[] = [],
  path: string[] = ["root"],
): void {
  graph.setResource(path, key, createResource(key, { attributes: attributeMap(attributes), dependencies }));
}

function deps(graph: StateGraph, key: string, path: string[] = ["root"]): string[] | undefined {
  return graph.getResource(path, key)?.dependencies;
}

const widgetRules: DepMap = {
  widget: [{ destAttr: "ref", srcType: "gadget", srcAttr: "id" }],
};

describe("inferDependencies", () => {
  it("links a destination to the source whose attribute it references", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.g1", { id: attr.string("g1") });
    put(graph, "widget.w1", { ref: attr.string("g1") });

    const summary = inferDependencies(graph, widgetRules);

    expect(deps(graph, "widget.w1")).toEqual(["gadget.g1"]);
    expect(deps(graph, "gadget.g1")).toEqual([]);
    expect(summary).toEqual({ updated: 1, added: 1, skipped: [] });
  });

  it("fans out over list values and keeps existing edges", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.g1", { id: attr.string("g1") });
    put(graph, "gadget.g2", { id: attr.string("g2") });
    put(graph, "gadget.other", { id: attr.string("g9") });
    put(
      graph,
      "widget.w1",
      { ref: attr.list(attr.string("g2"), attr.string("g1"), attr.string("g3")) },
      ["zzz.existing", "gadget.g1"],
    );

    const summary = inferDependencies(graph, widgetRules);

    expect(deps(graph, "widget.w1")).toEqual(["gadget.g1", "gadget.g2", "zzz.existing"]);
    expect(summary).toEqual({ updated: 1, added: 1, skipped: [] });
  });

  it("follows nested paths through maps and sets", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "subnet.a", { id: attr.string("subnet-a") });
    put(graph, "subnet.b", { id: attr.string("subnet-b") });
    put(graph, "instance.web", {
      network: attr.map({ subnets: attr.set(attr.string("subnet-b"), attr.string("subnet-a")) }),
    });

    inferDependencies(graph, {
      instance: [{ destAttr: "network.subnets", srcType: "subnet", srcAttr: "id" }],
    });

    expect(deps(graph, "instance.web")).toEqual(["subnet.a", "subnet.b"]);
  });

  it("applies every spec of a type", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.g1", { id: attr.string("g1") });
    put(graph, "doohickey.d1", { arn: attr.string("arn:d1") });
    put(graph, "widget.w1", { ref: attr.string("g1"), owner: attr.string("arn:d1") });

    const summary = inferDependencies(graph, {
      widget: [
        { destAttr: "ref", srcType: "gadget", srcAttr: "id" },
        { destAttr: "owner", srcType: "doohickey", srcAttr: "arn" },
      ],
    });

    expect(deps(graph, "widget.w1")).toEqual(["doohickey.d1", "gadget.g1"]);
    expect(summary.added).toBe(2);
  });

  it("never links a resource to itself", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "node.a", { id: attr.string("a"), parent: attr.string("a") });
    put(graph, "node.b", { id: attr.string("b"), parent: attr.string("a") });

    inferDependencies(graph, { node: [{ destAttr: "parent", srcType: "node", srcAttr: "id" }] });

    expect(deps(graph, "node.a")).toEqual([]);
    expect(deps(graph, "node.b")).toEqual(["node.a"]);
  });

  it("matches only within a module", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.g1", { id: attr.string("g1") }, [], ["root", "net"]);
    put(graph, "widget.w1", { ref: attr.string("g1") });
    put(graph, "widget.w1", { ref: attr.string("g1") }, [], ["root", "net"]);

    inferDependencies(graph, widgetRules);

    expect(deps(graph, "widget.w1")).toEqual([]);
    expect(deps(graph, "widget.w1", ["root", "net"])).toEqual(["gadget.g1"]);
  });

  it("matches numeric attributes by their string form", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.g1", { id: attr.number(42) });
    put(graph, "widget.w1", { ref: attr.string("42") });

    inferDependencies(graph, widgetRules);

    expect(deps(graph, "widget.w1")).toEqual(["gadget.g1"]);
  });

  it("deduplicates and sorts destination edges even without matches", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "widget.w1", { ref: attr.string("nothing") }, ["b.b", "a.a", "a.a"]);

    const summary = inferDependencies(graph, widgetRules);

    expect(deps(graph, "widget.w1")).toEqual(["a.a", "b.b"]);
    expect(summary).toEqual({ updated: 0, added: 0, skipped: [] });
  });

  it("aborts on an ambiguous source and leaves the graph untouched", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.g1", { id: attr.string("g1") });
    put(graph, "gadget.multi", { id: attr.list(attr.string("m1"), attr.string("m2")) });
    put(graph, "widget.w1", { ref: attr.string("g1") }, ["b.b", "a.a"]);
    const before = graph.clone();

    expect(() => inferDependencies(graph, widgetRules)).toThrow(AmbiguousSourceError);
    expect(graph).toEqual(before);
  });

  it("skips ambiguous specs when asked to and logs a warning", () => {
    const transport = new MemoryTransport();
    const logger = createLogger("test", { level: "warn", transports: [transport] });
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.multi", { id: attr.list(attr.string("m1"), attr.string("m2")) });
    put(graph, "doohickey.d1", { arn: attr.string("arn:d1") });
    put(graph, "widget.w1", { ref: attr.string("m1"), owner: attr.string("arn:d1") });

    const summary = inferDependencies(
      graph,
      {
        widget: [
          { destAttr: "ref", srcType: "gadget", srcAttr: "id" },
          { destAttr: "owner", srcType: "doohickey", srcAttr: "arn" },
        ],
      },
      { onAmbiguousSource: "skip", logger },
    );

    expect(deps(graph, "widget.w1")).toEqual(["doohickey.d1"]);
    expect(summary.skipped).toHaveLength(1);
    expect(summary.skipped[0]).toMatchObject({
      module: ["root"],
      key: "widget.w1",
      spec: { destAttr: "ref", srcType: "gadget", srcAttr: "id" },
    });
    expect(summary.skipped[0].error).toBeInstanceOf(AmbiguousSourceError);
    expect(transport.messages("warn")).toEqual(["skipping ambiguous dependency spec"]);
  });

  it("does not consult sources when the destination has no value", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.multi", { id: attr.list(attr.string("m1"), attr.string("m2")) });
    put(graph, "widget.w1", { ref: attr.string("") });

    expect(inferDependencies(graph, widgetRules)).toEqual({ updated: 0, added: 0, skipped: [] });
  });

  it("ignores types without rules", () => {
    const graph = newStateGraph({ lineage: "test-lineage" });
    put(graph, "gadget.g1", { id: attr.string("g1") }, ["z.z", "a.a"]);

    inferDependencies(graph, widgetRules);

    expect(deps(graph, "gadget.g1")).toEqual(["z.z", "a.a"]);
  });
});

describe("mergeDepMaps", () => {
  it("copies rules for new types", () => {
    const merged = mergeDepMaps({ widget: widgetRules.widget }, { node: [] });
    expect(Object.keys(merged)).toEqual(["widget", "node"]);
  });

  it("rejects a type defined twice", () => {
    expect(() => mergeDepMaps({ ...widgetRules }, { widget: [] })).toThrow(DuplicateRuleError);
  });
});

describe("uniqueSorted", () => {
  it("removes duplicates and sorts", () => {
    expect(uniqueSorted(["b", "a", "b", "c", "a"])).toEqual(["a", "b", "c"]);
  });
});
