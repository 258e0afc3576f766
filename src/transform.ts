/**
 * State Graph — Transform Engine
 *
 * Renames, moves, merges and deletes resources by address. Work happens in
 * phases (index, remap, resolve placement, swap, rewire) and the graph is
 * only touched once every address has been decoded and every collision
 * check has passed, so a thrown error leaves the state exactly as it was.
 */

import {
  canonicalAddress,
  formatAddress,
  modulePathKey,
  parseStateKey,
  toAddress,
  toKey,
  type NameNormalizer,
} from "./address.js";
import type { DiffModule, InstanceDiff, StateDiff } from "./diff.js";
import { AddressCollisionError, InvalidTransformError, StateInvariantError } from "./errors.js";
import type { Logger } from "./logging.js";
import type { ModuleState, ResourceRecord, StateGraph } from "./state.js";

/**
 * Source address → destination address. An empty destination deletes the
 * resource. Mapping A onto the address of an unmapped resource B replaces B
 * with A; resources that depended on B then depend on A.
 */
export type StateTransform = Record<string, string>;

export interface TransformSummary {
  kept: number;
  moved: number;
  replaced: number;
  deleted: number;
}

export interface TransformOptions {
  logger?: Logger;
}

// =============================================================================
// Remap core (shared by state and diff transforms)
// =============================================================================

interface Container<T> {
  path: string[];
  resources: Map<string, T>;
}

type NodeFate<T> =
  | { kind: "kept" }
  | { kind: "moved"; address: string }
  | { kind: "deleted" }
  | { kind: "superseded"; by: RemapNode<T> };

interface RemapNode<T> {
  address: string;
  home: Container<T>;
  key: string;
  value: T;
  fate: NodeFate<T>;
  /** Final placement, filled in for survivors before the swap. */
  target?: { container: Container<T>; key: string };
}

interface RemapIndex<T> {
  nodes: RemapNode<T>[];
  byContainer: Map<Container<T>, Map<string, RemapNode<T>>>;
}

/** Canonicalize transform sources; destinations are decoded only when used. */
function canonicalizeTransform(transform: StateTransform): Map<string, string> {
  const out = new Map<string, string>();
  for (const [src, dst] of Object.entries(transform)) {
    const key = canonicalAddress(src);
    const prev = out.get(key);
    if (prev !== undefined && prev !== dst) {
      throw new InvalidTransformError(`conflicting entries for "${key}": "${prev}" and "${dst}"`);
    }
    out.set(key, dst);
  }
  return out;
}

function indexContainers<T>(containers: Container<T>[]): RemapIndex<T> {
  const nodes: RemapNode<T>[] = [];
  const byAddress = new Map<string, RemapNode<T>>();
  const byContainer = new Map<Container<T>, Map<string, RemapNode<T>>>();

  for (const container of containers) {
    const byKey = new Map<string, RemapNode<T>>();
    for (const [key, value] of container.resources) {
      const address = toAddress(container.path, key);
      if (byAddress.has(address)) {
        throw new StateInvariantError(`duplicate resource address "${address}"`);
      }
      const node: RemapNode<T> = { address, home: container, key, value, fate: { kind: "kept" } };
      nodes.push(node);
      byAddress.set(address, node);
      byKey.set(key, node);
    }
    byContainer.set(container, byKey);
  }
  return { nodes, byContainer };
}

/** Assign a fate to every node and return survivors keyed by final address. */
function remapNodes<T>(nodes: RemapNode<T>[], transform: Map<string, string>): Map<string, RemapNode<T>> {
  const final = new Map<string, RemapNode<T>>();

  for (const node of nodes) {
    const target = transform.get(node.address);

    if (target === undefined) {
      const claimant = final.get(node.address);
      if (claimant) {
        node.fate = { kind: "superseded", by: claimant };
      } else {
        final.set(node.address, node);
      }
      continue;
    }

    if (target === "") {
      node.fate = { kind: "deleted" };
      continue;
    }

    const destination = canonicalAddress(target);
    const occupant = final.get(destination);
    if (occupant) {
      if (occupant.fate.kind !== "kept") {
        throw new AddressCollisionError(destination, [occupant.address, node.address]);
      }
      occupant.fate = { kind: "superseded", by: node };
    }
    node.fate = { kind: "moved", address: destination };
    final.set(destination, node);
  }
  return final;
}

/**
 * Decide where every survivor lands. Missing destination containers are
 * created in a staging list that the caller installs during the swap.
 */
function resolvePlacement<T>(
  final: Map<string, RemapNode<T>>,
  lookup: (path: string[]) => Container<T> | undefined,
): Container<T>[] {
  const staged = new Map<string, Container<T>>();
  const taken = new Set<string>();

  for (const node of final.values()) {
    let container = node.home;
    let key = node.key;
    if (node.fate.kind === "moved") {
      const decoded = toKey(node.fate.address);
      const pathKey = modulePathKey(decoded.path);
      const existing = lookup(decoded.path);
      if (existing) {
        container = existing;
      } else {
        let pending = staged.get(pathKey);
        if (!pending) {
          pending = { path: decoded.path, resources: new Map() };
          staged.set(pathKey, pending);
        }
        container = pending;
      }
      key = decoded.key;
    }
    const slot = `${modulePathKey(container.path)}\u0000${key}`;
    if (taken.has(slot)) {
      throw new StateInvariantError(`resource state key collision: "${key}"`);
    }
    taken.add(slot);
    node.target = { container, key };
  }
  return [...staged.values()];
}

/** Empty every container, install staged ones, and place the survivors. */
function swap<T>(
  containers: Container<T>[],
  staged: Container<T>[],
  final: Map<string, RemapNode<T>>,
  install: (container: Container<T>) => void,
  onPlace?: (node: RemapNode<T>) => void,
): void {
  for (const c of containers) c.resources.clear();
  for (const c of staged) install(c);
  for (const node of final.values()) {
    if (!node.target) throw new StateInvariantError(`unplaced resource "${node.address}"`);
    node.target.container.resources.set(node.target.key, node.value);
    onPlace?.(node);
  }
}

function summarize<T>(nodes: RemapNode<T>[]): TransformSummary {
  const summary: TransformSummary = { kept: 0, moved: 0, replaced: 0, deleted: 0 };
  for (const n of nodes) {
    switch (n.fate.kind) {
      case "kept":
        summary.kept++;
        break;
      case "moved":
        if (n.fate.address === n.address) summary.kept++;
        else summary.moved++;
        break;
      case "superseded":
        summary.replaced++;
        break;
      case "deleted":
        summary.deleted++;
        break;
    }
  }
  return summary;
}

// =============================================================================
// State transform
// =============================================================================

/**
 * Apply a transform to the state in place. Dependencies are rewritten for
 * the new keys as long as they stay within one module; dangling edges are
 * dropped even by an empty transform. Transform entries that name missing
 * resources are ignored.
 */
export function applyTransform(
  graph: StateGraph,
  transform: StateTransform,
  options: TransformOptions = {},
): TransformSummary {
  const mapping = canonicalizeTransform(transform);
  const modules: ModuleState[] = [...graph.modules];
  const { nodes, byContainer } = indexContainers<ResourceRecord>(modules);

  // Resolve dependency keys to sibling nodes; unknown keys stay dangling
  const deps = new Map<RemapNode<ResourceRecord>, Array<RemapNode<ResourceRecord> | undefined>>();
  for (const node of nodes) {
    const siblings = byContainer.get(node.home);
    deps.set(node, node.value.dependencies.map((k) => siblings?.get(k)));
  }

  const final = remapNodes(nodes, mapping);
  const staged = resolvePlacement<ResourceRecord>(final, (path) => graph.moduleByPath(path));

  swap<ResourceRecord>(
    modules,
    staged,
    final,
    (c) => graph.addModuleState(c),
    (node) => {
      if (node.fate.kind === "moved" && node.target) {
        Object.assign(node.value, parseStateKey(node.target.key));
      }
    },
  );

  for (const node of final.values()) {
    node.value.dependencies = rewireDependencies(node, deps.get(node) ?? []);
  }

  const summary = summarize(nodes);
  options.logger?.debug("state transform applied", { ...summary });
  return summary;
}

/**
 * Rebuild one survivor's dependency list. Superseded dependencies follow a
 * single replacement hop; anything that did not survive, lives in another
 * module, or is the resource itself is dropped.
 */
function rewireDependencies(
  node: RemapNode<ResourceRecord>,
  links: Array<RemapNode<ResourceRecord> | undefined>,
): string[] {
  const keys = new Set<string>();
  const own = node.target;
  if (!own) return [];

  for (const link of links) {
    if (!link) continue;
    const dep = link.fate.kind === "superseded" ? link.fate.by : link;
    if (dep.fate.kind !== "kept" && dep.fate.kind !== "moved") continue;
    const placed = dep.target;
    if (!placed || placed.container !== own.container) continue;
    if (placed.key === "" || placed.key === own.key) continue;
    keys.add(placed.key);
  }
  return [...keys].sort();
}

// =============================================================================
// Diff transform
// =============================================================================

/** Apply the same address remapping to a diff. Dependencies do not apply. */
export function applyTransformToDiff(
  diff: StateDiff,
  transform: StateTransform,
  options: TransformOptions = {},
): TransformSummary {
  const total = diff.modules.reduce((n, m) => n + m.resources.size, 0);
  if (Object.keys(transform).length === 0) return { kept: total, moved: 0, replaced: 0, deleted: 0 };

  const mapping = canonicalizeTransform(transform);
  const modules: DiffModule[] = [...diff.modules];
  const { nodes } = indexContainers<InstanceDiff>(modules);
  const final = remapNodes(nodes, mapping);
  const lookup = (path: string[]): DiffModule | undefined => {
    const key = modulePathKey(path);
    return diff.modules.find((m) => modulePathKey(m.path) === key);
  };
  const staged = resolvePlacement<InstanceDiff>(final, lookup);

  swap<InstanceDiff>(modules, staged, final, (c) => {
    diff.modules.push(c);
  });

  const summary = summarize(nodes);
  options.logger?.debug("diff transform applied", { ...summary });
  return summary;
}

// =============================================================================
// Inverse & key normalization
// =============================================================================

/**
 * Return the reverse mapping, or undefined when none exists: the transform
 * deletes something, or maps two sources to one destination.
 */
export function inverseTransform(transform: StateTransform): StateTransform | undefined {
  const inverse = new Map<string, string>();
  for (const [src, dst] of canonicalizeTransform(transform)) {
    if (dst === "") return undefined;
    const destination = canonicalAddress(dst);
    if (inverse.has(destination)) return undefined;
    inverse.set(destination, src);
  }
  return Object.fromEntries(inverse);
}

/**
 * Build a transform that renames managed resources after their provider and
 * remote id. Returns undefined when every name is already normalized.
 */
export function normalizeStateKeys(graph: StateGraph, normalize: NameNormalizer): StateTransform | undefined {
  const transform: StateTransform = {};
  for (const { module, key, record } of graph.resources()) {
    if (record.mode !== "managed" || record.provider === undefined || record.id === undefined) continue;
    const name = normalize(`${record.provider}_${record.id}`);
    if (record.name === name) continue;
    const decoded = parseStateKey(key);
    transform[toAddress(module.path, key)] = formatAddress({ ...decoded, path: module.path, name });
  }
  return Object.keys(transform).length > 0 ? transform : undefined;
}
