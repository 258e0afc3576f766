/**
 * State Graph — Identity & Addressing
 *
 * Converts between module-local state keys ("data.aws_ami.base.0") and
 * canonical resource addresses ("module.net.data.aws_ami.base[0]").
 */

import { AddressParseError, IncompleteAddressError, InvalidNameError, KeyParseError } from "./errors.js";

export type ResourceMode = "managed" | "data";

/** Module path; the canonical root path is ["root"]. */
export type ModulePath = readonly string[];

/** Decoded state key. `index` is -1 for resources without count. */
export interface ResourceKey {
  mode: ResourceMode;
  type: string;
  name: string;
  index: number;
}

export interface ResourceAddress extends ResourceKey {
  path: string[];
}

export const ROOT_MODULE = "root";

const INDEX_RE = /^(0|[1-9]\d*)$/;
const BRACKET_RE = /[[\]]/;
const NAME_WITH_INDEX_RE = /^([^[\]]*)(?:\[([^[\]]*)\])?$/;

// ── Module paths ────────────────────────────────────────────────

/** Normalize a module path so that it always starts with "root". */
export function normalizeModulePath(path: ModulePath): string[] {
  if (path.length === 0) return [ROOT_MODULE];
  if (path[0] !== ROOT_MODULE) return [ROOT_MODULE, ...path];
  return [...path];
}

/** Stable string identity of a module path, usable as a Map key. */
export function modulePathKey(path: ModulePath): string {
  return normalizeModulePath(path).join("\u0000");
}

/** Dotted rendering of a module path for messages. */
export function formatModulePath(path: ModulePath): string {
  return normalizeModulePath(path).join(".");
}

export function isRootModule(path: ModulePath): boolean {
  return normalizeModulePath(path).length === 1;
}

/** Sort order for module paths: root first, then segment-wise, shorter first. */
export function compareModulePaths(a: ModulePath, b: ModulePath): number {
  const pa = normalizeModulePath(a);
  const pb = normalizeModulePath(b);
  const ra = pa.length === 1;
  const rb = pb.length === 1;
  if (ra || rb) return ra === rb ? 0 : ra ? -1 : 1;
  const n = Math.min(pa.length, pb.length);
  for (let i = 0; i < n; i++) {
    if (pa[i] !== pb[i]) return pa[i] < pb[i] ? -1 : 1;
  }
  return pa.length - pb.length;
}

// ── State keys ──────────────────────────────────────────────────

function parseIndex(raw: string): number | null {
  if (!INDEX_RE.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : null;
}

export function parseStateKey(key: string): ResourceKey {
  let parts = key.split(".");
  let mode: ResourceMode = "managed";
  if (parts[0] === "data") {
    mode = "data";
    parts = parts.slice(1);
  }
  if (parts.length < 2 || parts.length > 3) {
    throw new KeyParseError(key, "expected [data.]TYPE.NAME[.INDEX]");
  }
  const [type, name, rawIndex] = parts;
  if (!type) throw new KeyParseError(key, "empty resource type");
  if (!name) throw new KeyParseError(key, "empty resource name");
  if (BRACKET_RE.test(type) || BRACKET_RE.test(name)) {
    throw new KeyParseError(key, "brackets are not allowed in type or name");
  }
  if (mode === "managed" && type === "module") {
    throw new KeyParseError(key, `"module" is not a resource type`);
  }

  let index = -1;
  if (rawIndex !== undefined) {
    const parsed = parseIndex(rawIndex);
    if (parsed === null) throw new KeyParseError(key, `invalid index "${rawIndex}"`);
    index = parsed;
  }
  return { mode, type, name, index };
}

export function formatStateKey(k: ResourceKey): string {
  const base = `${k.type}.${k.name}`;
  const key = k.index >= 0 ? `${base}.${k.index}` : base;
  return k.mode === "data" ? `data.${key}` : key;
}

// ── Addresses ───────────────────────────────────────────────────

export function parseAddress(address: string): ResourceAddress {
  const parts = address.split(".");
  const path = [ROOT_MODULE];
  let i = 0;

  // An explicit root qualifier is accepted and dropped
  if (parts[0] === "module" && parts[1] === ROOT_MODULE) i = 2;

  while (parts[i] === "module") {
    const name = parts[i + 1];
    if (!name) throw new AddressParseError(address, "empty module name");
    if (BRACKET_RE.test(name)) throw new AddressParseError(address, "indexed modules are not supported");
    path.push(name);
    i += 2;
  }

  let mode: ResourceMode = "managed";
  if (parts[i] === "data") {
    mode = "data";
    i++;
  }

  const rest = parts.slice(i);
  if (rest.length > 2) throw new AddressParseError(address, "unexpected trailing segments");
  const type = rest[0] ?? "";
  if (BRACKET_RE.test(type)) throw new AddressParseError(address, "invalid resource type");
  const match = NAME_WITH_INDEX_RE.exec(rest[1] ?? "");
  if (!match) throw new AddressParseError(address, "invalid resource name");
  const name = match[1] ?? "";

  let index = -1;
  if (match[2] !== undefined) {
    const parsed = parseIndex(match[2]);
    if (parsed === null) throw new AddressParseError(address, `invalid index "${match[2]}"`);
    index = parsed;
  }
  if (!type || !name) throw new IncompleteAddressError(address);

  return { path, mode, type, name, index };
}

export function formatAddress(a: ResourceAddress): string {
  const segments: string[] = [];
  for (const m of normalizeModulePath(a.path).slice(1)) {
    segments.push("module", m);
  }
  if (a.mode === "data") segments.push("data");
  segments.push(a.type);
  segments.push(a.index >= 0 ? `${a.name}[${a.index}]` : a.name);
  return segments.join(".");
}

/** Rewrite any accepted spelling of an address into its canonical form. */
export function canonicalAddress(address: string): string {
  return formatAddress(parseAddress(address));
}

/** Convert a module path and state key into a canonical address. */
export function toAddress(path: ModulePath, key: string): string {
  return formatAddress({ path: normalizeModulePath(path), ...parseStateKey(key) });
}

/** Convert an address back into its module path and state key. */
export function toKey(address: string): { path: string[]; key: string } {
  const { path, ...key } = parseAddress(address);
  return { path, key: formatStateKey(key) };
}

// ── Name normalization ──────────────────────────────────────────

export type NameNormalizer = (value: string) => string;

/**
 * Create a function that turns an arbitrary string into a valid resource
 * name. Each normalizer owns its compiled pattern.
 */
export function createNameNormalizer(): NameNormalizer {
  const pattern = /^[^0-9A-Za-z][^0-9A-Za-z-]*|[^0-9A-Za-z-]+/g;
  return (value: string) => {
    if (value === "") throw new InvalidNameError("cannot normalize an empty name");
    return value.replace(pattern, "_");
  };
}
