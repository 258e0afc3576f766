/**
 * State Graph — Document I/O
 *
 * Reads and writes the persisted JSON artifacts. A file name of "" or "-"
 * means stdin/stdout.
 */

import * as fs from "node:fs";
import type { z } from "zod";
import {
  compareModulePaths,
  formatModulePath,
  modulePathKey,
  normalizeModulePath,
  parseStateKey,
  type ModulePath,
} from "./address.js";
import { attributesFromJson, attributesToJson } from "./attributes.js";
import type { DepMap } from "./deps.js";
import type { InstanceDiff, StateDiff } from "./diff.js";
import { StateDocumentError } from "./errors.js";
import {
  depMapSchema,
  diffDocumentSchema,
  formatIssues,
  stateDocumentSchema,
  transformSchema,
  type DiffDocument,
  type ResourceDocument,
  type StateDocument,
} from "./schema.js";
import { STATE_FORMAT, STATE_VERSION, StateGraph, type ResourceRecord } from "./state.js";
import type { StateTransform } from "./transform.js";

export const DEFAULT_STDIN_LIMIT = 64 * 1024 * 1024;

export interface ReadOptions {
  stdinLimitBytes?: number;
}

export function isStdio(file: string): boolean {
  return file === "" || file === "-";
}

// =============================================================================
// Raw I/O
// =============================================================================

export function readText(file: string, options: ReadOptions = {}): string {
  if (!isStdio(file)) return fs.readFileSync(file, "utf-8");
  const limit = options.stdinLimitBytes ?? DEFAULT_STDIN_LIMIT;
  const buf = fs.readFileSync(0);
  if (buf.length > limit) {
    throw new StateDocumentError("stdin", [`input exceeds ${limit} bytes`]);
  }
  return buf.toString("utf-8");
}

export function writeText(file: string, text: string): void {
  if (isStdio(file)) {
    process.stdout.write(text);
    return;
  }
  fs.writeFileSync(file, text, "utf-8");
}

/** Parse JSON text and validate it against a schema. */
export function parseDocument<S extends z.ZodTypeAny>(schema: S, text: string, source: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StateDocumentError(source, [err instanceof Error ? err.message : String(err)]);
  }
  const result = schema.safeParse(raw);
  if (!result.success) throw new StateDocumentError(source, formatIssues(result.error));
  return result.data;
}

function sourceName(file: string): string {
  return isStdio(file) ? "stdin" : `"${file}"`;
}

// =============================================================================
// State
// =============================================================================

function recordFromDocument(key: string, doc: ResourceDocument): ResourceRecord {
  const record: ResourceRecord = {
    ...parseStateKey(key),
    attributes: attributesFromJson(doc.attributes),
    dependencies: [...doc.dependencies],
  };
  if (doc.provider !== undefined) record.provider = doc.provider;
  if (doc.id !== undefined) record.id = doc.id;
  return record;
}

function recordToDocument(record: ResourceRecord): ResourceDocument {
  const doc: ResourceDocument = {
    attributes: attributesToJson(record.attributes),
    dependencies: [...record.dependencies],
  };
  if (record.provider !== undefined) doc.provider = record.provider;
  if (record.id !== undefined) doc.id = record.id;
  return doc;
}

/** Throw if two module entries of a document name the same path. */
function rejectDuplicateModules(paths: ModulePath[], source: string): void {
  const seen = new Set<string>();
  for (const path of paths) {
    const key = modulePathKey(path);
    if (seen.has(key)) throw new StateDocumentError(source, [`duplicate module "${formatModulePath(path)}"`]);
    seen.add(key);
  }
}

export function stateFromDocument(doc: StateDocument, source = "state"): StateGraph {
  rejectDuplicateModules(doc.modules.map((m) => m.path), source);
  const graph = new StateGraph({ lineage: doc.lineage, serial: doc.serial });
  for (const m of doc.modules) {
    const module = graph.addModule(m.path);
    for (const [key, r] of Object.entries(m.resources)) {
      module.resources.set(key, recordFromDocument(key, r));
    }
  }
  graph.rootModule();
  return graph;
}

export function stateToDocument(graph: StateGraph): StateDocument {
  return {
    format: STATE_FORMAT,
    version: STATE_VERSION,
    lineage: graph.lineage,
    serial: graph.serial,
    modules: graph.modules.map((m) => {
      const resources: Record<string, ResourceDocument> = {};
      for (const key of [...m.resources.keys()].sort()) {
        const record = m.resources.get(key);
        if (record) resources[key] = recordToDocument(record);
      }
      return { path: [...m.path], resources };
    }),
  };
}

export function parseState(text: string, source = "state"): StateGraph {
  return stateFromDocument(parseDocument(stateDocumentSchema, text, source), source);
}

export function serializeState(graph: StateGraph): string {
  return JSON.stringify(stateToDocument(graph), null, 2) + "\n";
}

export function readStateFile(file: string, options: ReadOptions = {}): StateGraph {
  return parseState(readText(file, options), sourceName(file));
}

export function writeStateFile(file: string, graph: StateGraph): void {
  writeText(file, serializeState(graph));
}

// =============================================================================
// Diff
// =============================================================================

export function diffFromDocument(doc: DiffDocument, source = "diff"): StateDiff {
  rejectDuplicateModules(doc.modules.map((m) => m.path), source);
  const diff: StateDiff = { modules: [] };
  for (const m of doc.modules) {
    const resources = new Map<string, InstanceDiff>();
    for (const [key, d] of Object.entries(m.resources)) {
      parseStateKey(key);
      resources.set(key, d);
    }
    diff.modules.push({ path: normalizeModulePath(m.path), resources });
  }
  return diff;
}

export function diffToDocument(diff: StateDiff): DiffDocument {
  const modules = [...diff.modules].sort((a, b) => compareModulePaths(a.path, b.path));
  return {
    modules: modules.map((m) => {
      const resources: Record<string, InstanceDiff> = {};
      for (const key of [...m.resources.keys()].sort()) {
        const d = m.resources.get(key);
        if (d) resources[key] = d;
      }
      return { path: [...m.path], resources };
    }),
  };
}

export function readDiffFile(file: string, options: ReadOptions = {}): StateDiff {
  const source = sourceName(file);
  return diffFromDocument(parseDocument(diffDocumentSchema, readText(file, options), source), source);
}

export function writeDiffFile(file: string, diff: StateDiff): void {
  writeText(file, JSON.stringify(diffToDocument(diff), null, 2) + "\n");
}

// =============================================================================
// Rule inputs
// =============================================================================

export function readTransformFile(file: string, options: ReadOptions = {}): StateTransform {
  return parseDocument(transformSchema, readText(file, options), sourceName(file));
}

export function readDepMapFile(file: string, options: ReadOptions = {}): DepMap {
  return parseDocument(depMapSchema, readText(file, options), sourceName(file));
}
