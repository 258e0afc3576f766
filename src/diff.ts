/**
 * State Graph — Diff Model
 *
 * A changeset keyed by module path and state key, the same addressing scheme
 * the state uses. Computing diffs belongs to the planner; this module only
 * models, normalizes and explains them.
 */

import { compareModulePaths, normalizeModulePath, toAddress, type ModulePath } from "./address.js";

export interface AttributeDiff {
  old: string;
  new: string;
  newComputed?: boolean;
  requiresNew?: boolean;
  sensitive?: boolean;
}

export interface InstanceDiff {
  destroy?: boolean;
  attributes: Record<string, AttributeDiff>;
}

export interface DiffModule {
  path: string[];
  resources: Map<string, InstanceDiff>;
}

export interface StateDiff {
  modules: DiffModule[];
}

export type ChangeType = "none" | "create" | "update" | "destroy" | "destroyCreate";

export function newStateDiff(): StateDiff {
  return { modules: [] };
}

/** Return the module at path, creating an empty one if needed. */
export function addDiffModule(diff: StateDiff, path: ModulePath): DiffModule {
  const normalized = normalizeModulePath(path);
  const existing = diff.modules.find((m) => compareModulePaths(m.path, normalized) === 0);
  if (existing) return existing;
  const module: DiffModule = { path: normalized, resources: new Map() };
  diff.modules.push(module);
  return module;
}

export function changeType(d: InstanceDiff): ChangeType {
  const attrs = Object.values(d.attributes);
  if (!d.destroy && attrs.length === 0) return "none";
  const requiresNew = attrs.some((a) => a.requiresNew === true);
  if (requiresNew && d.destroy) return "destroyCreate";
  if (d.destroy) return "destroy";
  if (requiresNew) return "create";
  return "update";
}

/** Drop modules without changes and sort the rest by path. */
export function normalizeDiff(diff: StateDiff): StateDiff {
  diff.modules = diff.modules
    .filter((m) => [...m.resources.values()].some((d) => changeType(d) !== "none"))
    .sort((a, b) => compareModulePaths(a.path, b.path));
  return diff;
}

// ── Explanation ─────────────────────────────────────────────────

type ExplainedType = "create" | "destroy" | "update";

const SECTIONS: Record<ExplainedType, { order: number; label: string }> = {
  create: { order: 1, label: "MISSING RESOURCE" },
  destroy: { order: 2, label: "EXTRA RESOURCE" },
  update: { order: 3, label: "ATTRIBUTE MISMATCH" },
};

/**
 * Describe the differences between actual state and desired configuration:
 * missing resources, extra resources, then attribute mismatches.
 */
export function explainDiff(diff: StateDiff): string {
  const entries: Array<{ address: string; type: ExplainedType; diff: InstanceDiff }> = [];
  for (const m of diff.modules) {
    for (const [key, d] of m.resources) {
      const t = changeType(d);
      if (t === "none") continue;
      entries.push({ address: toAddress(m.path, key), type: t === "destroyCreate" ? "update" : t, diff: d });
    }
  }
  entries.sort((a, b) => {
    const oa = SECTIONS[a.type].order;
    const ob = SECTIONS[b.type].order;
    if (oa !== ob) return oa - ob;
    return a.address < b.address ? -1 : a.address > b.address ? 1 : 0;
  });

  const lines: string[] = [];
  let current: ExplainedType | null = null;
  for (const e of entries) {
    if (e.type !== current) {
      if (current !== null) lines.push("");
      lines.push(`${SECTIONS[e.type].label}:`);
      current = e.type;
    } else if (current === "update") {
      lines.push("");
    }
    lines.push(`- ${e.address}`);
    if (e.type === "update") lines.push(...explainAttributes(e.diff));
  }
  return lines.join("\n");
}

function explainAttributes(d: InstanceDiff): string[] {
  const keys = Object.keys(d.attributes)
    .filter((k) => {
      const a = d.attributes[k];
      return a.new !== a.old && !(a.newComputed && a.old !== "");
    })
    .sort();
  const width = keys.reduce((w, k) => Math.max(w, k.length), 0);
  return keys.map((k) => {
    const a = d.attributes[k];
    let have = JSON.stringify(a.old);
    let want = a.newComputed ? JSON.stringify("<computed>") : JSON.stringify(a.new);
    if (a.sensitive) {
      have = JSON.stringify("<sensitive>");
      want = JSON.stringify("<sensitive>, value mismatch");
    }
    return `  ${k.padEnd(width)} = ${have} (expected: ${want})`;
  });
}
