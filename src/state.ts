/**
 * State Graph — Model
 *
 * In-memory state: an ordered list of modules, each holding resource records
 * keyed by module-local state key. Dependency edges are state keys of
 * resources in the same module.
 */

import { randomUUID } from "node:crypto";
import {
  compareModulePaths,
  formatModulePath,
  formatStateKey,
  modulePathKey,
  normalizeModulePath,
  parseStateKey,
  type ModulePath,
  type ResourceKey,
} from "./address.js";
import { cloneAttributeMap, type AttributeMap } from "./attributes.js";
import { StateInvariantError } from "./errors.js";

export const STATE_FORMAT = "stategraph";
export const STATE_VERSION = 1;

export interface ResourceRecord extends ResourceKey {
  /** Provider that owns the resource, e.g. "provider.aws". */
  provider?: string;
  /** Remote primary id. */
  id?: string;
  attributes: AttributeMap;
  /** State keys of resources in the same module. */
  dependencies: string[];
}

export interface ModuleState {
  path: string[];
  resources: Map<string, ResourceRecord>;
}

export interface ResourceEntry {
  module: ModuleState;
  key: string;
  record: ResourceRecord;
}

export interface ResourceInit {
  provider?: string;
  id?: string;
  attributes?: AttributeMap;
  dependencies?: string[];
}

/** Build a record whose identity fields are decoded from its state key. */
export function createResource(key: string, init: ResourceInit = {}): ResourceRecord {
  const record: ResourceRecord = {
    ...parseStateKey(key),
    attributes: init.attributes ?? new Map(),
    dependencies: init.dependencies ?? [],
  };
  if (init.provider !== undefined) record.provider = init.provider;
  if (init.id !== undefined) record.id = init.id;
  return record;
}

export function cloneResource(r: ResourceRecord): ResourceRecord {
  return { ...r, attributes: cloneAttributeMap(r.attributes), dependencies: [...r.dependencies] };
}

// =============================================================================
// StateGraph
// =============================================================================

export class StateGraph {
  readonly version = STATE_VERSION;
  lineage: string;
  serial: number;
  readonly modules: ModuleState[] = [];

  constructor(options: { lineage: string; serial?: number }) {
    this.lineage = options.lineage;
    this.serial = options.serial ?? 0;
  }

  rootModule(): ModuleState {
    return this.addModule([]);
  }

  moduleByPath(path: ModulePath): ModuleState | undefined {
    const key = modulePathKey(path);
    return this.modules.find((m) => modulePathKey(m.path) === key);
  }

  /** Return the module at path, creating an empty one if needed. */
  addModule(path: ModulePath): ModuleState {
    const existing = this.moduleByPath(path);
    if (existing) return existing;
    const module: ModuleState = { path: normalizeModulePath(path), resources: new Map() };
    this.insertModule(module);
    return module;
  }

  /** Install a module built elsewhere. Its path must not be taken. */
  addModuleState(module: ModuleState): void {
    if (this.moduleByPath(module.path)) {
      throw new StateInvariantError(`module "${formatModulePath(module.path)}" already exists`);
    }
    module.path = normalizeModulePath(module.path);
    this.insertModule(module);
  }

  private insertModule(module: ModuleState): void {
    this.modules.push(module);
    this.modules.sort((a, b) => compareModulePaths(a.path, b.path));
  }

  getResource(path: ModulePath, key: string): ResourceRecord | undefined {
    return this.moduleByPath(path)?.resources.get(key);
  }

  /**
   * Insert or replace a record. The key is authoritative: the record's
   * identity fields must agree with it.
   */
  setResource(path: ModulePath, key: string, record: ResourceRecord): void {
    const decoded = parseStateKey(key);
    if (formatStateKey(record) !== formatStateKey(decoded)) {
      throw new StateInvariantError(`record identity "${formatStateKey(record)}" does not match key "${key}"`);
    }
    this.addModule(path).resources.set(key, record);
  }

  removeResource(path: ModulePath, key: string): boolean {
    return this.moduleByPath(path)?.resources.delete(key) ?? false;
  }

  /** Drop every resource of a module but keep the module itself. */
  clearResources(module: ModuleState): void {
    module.resources.clear();
  }

  *resources(): IterableIterator<ResourceEntry> {
    for (const module of this.modules) {
      for (const [key, record] of module.resources) {
        yield { module, key, record };
      }
    }
  }

  resourceCount(): number {
    let n = 0;
    for (const m of this.modules) n += m.resources.size;
    return n;
  }

  clone(): StateGraph {
    const copy = new StateGraph({ lineage: this.lineage, serial: this.serial });
    for (const m of this.modules) {
      const resources = new Map<string, ResourceRecord>();
      for (const [k, r] of m.resources) resources.set(k, cloneResource(r));
      copy.modules.push({ path: [...m.path], resources });
    }
    return copy;
  }
}

/** Create an empty state with a root module and a fresh lineage. */
export function newStateGraph(options: { lineage?: string } = {}): StateGraph {
  const graph = new StateGraph({ lineage: options.lineage ?? randomUUID() });
  graph.rootModule();
  return graph;
}

// =============================================================================
// Whole-state helpers
// =============================================================================

/** a += b. Resources already present in a are kept as they are. */
export function addState(a: StateGraph, b: StateGraph): StateGraph {
  for (const bm of b.modules) {
    const am = a.addModule(bm.path);
    for (const [k, r] of bm.resources) {
      if (!am.resources.has(k)) am.resources.set(k, cloneResource(r));
    }
  }
  return a;
}

/** a -= b, by state key. */
export function subState(a: StateGraph, b: StateGraph): StateGraph {
  for (const bm of b.modules) {
    const am = a.moduleByPath(bm.path);
    if (!am) continue;
    for (const k of bm.resources.keys()) am.resources.delete(k);
  }
  return a;
}

export function clearDependencies(graph: StateGraph): void {
  for (const { record } of graph.resources()) record.dependencies = [];
}
