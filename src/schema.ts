/**
 * State Graph — Document Schemas
 *
 * Zod schemas for everything read from disk: state documents, diffs,
 * transforms and dependency rule tables.
 */

import { z } from "zod";
import type { JsonValue } from "./attributes.js";
import { STATE_FORMAT, STATE_VERSION } from "./state.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const modulePathSchema = z.array(
  z
    .string()
    .min(1)
    .regex(/^[^.[\]]+$/, "module names may not contain dots or brackets"),
);

// ── State ───────────────────────────────────────────────────────

export const resourceDocumentSchema = z.object({
  provider: z.string().optional(),
  id: z.string().optional(),
  attributes: z.record(z.string(), jsonValueSchema).default({}),
  dependencies: z.array(z.string()).default([]),
});

export const moduleDocumentSchema = z.object({
  path: modulePathSchema,
  resources: z.record(z.string(), resourceDocumentSchema).default({}),
});

export const stateDocumentSchema = z.object({
  format: z.literal(STATE_FORMAT),
  version: z.literal(STATE_VERSION),
  lineage: z.string().min(1),
  serial: z.number().int().nonnegative().default(0),
  modules: z.array(moduleDocumentSchema).default([]),
});

export type ResourceDocument = z.infer<typeof resourceDocumentSchema>;
export type ModuleDocument = z.infer<typeof moduleDocumentSchema>;
export type StateDocument = z.infer<typeof stateDocumentSchema>;

// ── Diff ────────────────────────────────────────────────────────

export const attributeDiffSchema = z.object({
  old: z.string().default(""),
  new: z.string().default(""),
  newComputed: z.boolean().optional(),
  requiresNew: z.boolean().optional(),
  sensitive: z.boolean().optional(),
});

export const instanceDiffSchema = z.object({
  destroy: z.boolean().optional(),
  attributes: z.record(z.string(), attributeDiffSchema).default({}),
});

export const diffDocumentSchema = z.object({
  modules: z
    .array(
      z.object({
        path: modulePathSchema,
        resources: z.record(z.string(), instanceDiffSchema).default({}),
      }),
    )
    .default([]),
});

export type DiffDocument = z.infer<typeof diffDocumentSchema>;

// ── Rule inputs ─────────────────────────────────────────────────

export const transformSchema = z.record(z.string(), z.string());

export const depSpecSchema = z.object({
  destAttr: z.string().min(1),
  srcType: z.string().min(1),
  srcAttr: z.string().min(1),
});

export const depMapSchema = z.record(z.string(), z.array(depSpecSchema));

/** Render zod issues as "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
