/**
 * State Graph — Dependency Inference
 *
 * Reconstructs dependency edges by matching attribute values across
 * resources of different types, driven by a rule table. Edges are only ever
 * added; all matches are computed before any dependency list is written.
 */

import { flatten } from "./attributes.js";
import { AmbiguousSourceError, DuplicateRuleError } from "./errors.js";
import type { Logger } from "./logging.js";
import type { ResourceRecord, StateGraph } from "./state.js";

/**
 * The value of `destAttr` is normally written as a reference to
 * `srcType.<name>.srcAttr`. A destination depends on every source of
 * `srcType` whose single `srcAttr` value appears among its own values.
 */
export interface DepSpec {
  destAttr: string;
  srcType: string;
  srcAttr: string;
}

/** Resource type → ordered dependency specs for that type. */
export type DepMap = Record<string, DepSpec[]>;

export type AmbiguousSourcePolicy = "abort" | "skip";

export interface InferOptions {
  /** "abort" (default) throws AmbiguousSourceError; "skip" drops the spec. */
  onAmbiguousSource?: AmbiguousSourcePolicy;
  logger?: Logger;
}

export interface SkippedSpec {
  module: string[];
  key: string;
  spec: DepSpec;
  error: AmbiguousSourceError;
}

export interface InferenceSummary {
  /** Number of resources that gained at least one dependency. */
  updated: number;
  /** Number of new edges. */
  added: number;
  skipped: SkippedSpec[];
}

/** Copy every entry of source into target. A type may only be defined once. */
export function mergeDepMaps(target: DepMap, source: DepMap): DepMap {
  for (const [type, specs] of Object.entries(source)) {
    if (Object.hasOwn(target, type)) throw new DuplicateRuleError(type);
    target[type] = specs;
  }
  return target;
}

export function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

interface Candidate {
  key: string;
  record: ResourceRecord;
}

/**
 * Add inferred dependencies to every resource of a type that has rules.
 * With the default policy an ambiguous source aborts the whole pass and
 * leaves the graph untouched.
 */
export function inferDependencies(graph: StateGraph, rules: DepMap, options: InferOptions = {}): InferenceSummary {
  const policy = options.onAmbiguousSource ?? "abort";
  const pending = new Map<ResourceRecord, string[]>();
  const skipped: SkippedSpec[] = [];

  for (const module of graph.modules) {
    const byType = new Map<string, Candidate[]>();
    for (const [key, record] of module.resources) {
      const list = byType.get(record.type);
      if (list) list.push({ key, record });
      else byType.set(record.type, [{ key, record }]);
    }

    for (const [type, destinations] of byType) {
      const specs = Object.hasOwn(rules, type) ? rules[type] : undefined;
      if (!specs || specs.length === 0) continue;

      for (const dest of destinations) {
        const found: string[] = [];
        for (const spec of specs) {
          try {
            found.push(...matchSources(dest, spec, byType.get(spec.srcType) ?? []));
          } catch (err) {
            if (!(err instanceof AmbiguousSourceError) || policy === "abort") throw err;
            skipped.push({ module: [...module.path], key: dest.key, spec, error: err });
            options.logger?.warn("skipping ambiguous dependency spec", {
              resource: dest.key,
              destAttr: spec.destAttr,
              srcType: spec.srcType,
              srcAttr: spec.srcAttr,
            });
          }
        }
        pending.set(dest.record, found);
      }
    }
  }

  let updated = 0;
  let added = 0;
  for (const [record, found] of pending) {
    const before = new Set(record.dependencies);
    const merged = uniqueSorted([...record.dependencies, ...found]);
    const gained = merged.filter((k) => !before.has(k)).length;
    record.dependencies = merged;
    if (gained > 0) {
      updated++;
      added += gained;
    }
  }

  options.logger?.debug("dependency inference complete", { updated, added, skipped: skipped.length });
  return { updated, added, skipped };
}

/** Keys of every source whose single value matches one of dest's values. */
function matchSources(dest: Candidate, spec: DepSpec, sources: Candidate[]): string[] {
  if (sources.length === 0) return [];
  const values = flatten(dest.record.attributes, spec.destAttr);
  if (values.length === 0) return [];
  const wanted = new Set(values);

  const keys: string[] = [];
  for (const src of sources) {
    if (src.key === dest.key) continue;
    const srcValues = flatten(src.record.attributes, spec.srcAttr);
    if (srcValues.length > 1) {
      throw new AmbiguousSourceError(spec.srcType, spec.srcAttr, src.key, srcValues);
    }
    if (srcValues.length === 1 && wanted.has(srcValues[0])) keys.push(src.key);
  }
  return keys;
}
