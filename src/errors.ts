/**
 * State Graph — Errors
 *
 * Every failure raised by the engines is a StateGraphError with a stable code.
 */

export type StateGraphErrorCode =
  | "KEY_PARSE"
  | "ADDRESS_PARSE"
  | "INCOMPLETE_ADDRESS"
  | "ADDRESS_COLLISION"
  | "INVALID_TRANSFORM"
  | "STATE_INVARIANT"
  | "AMBIGUOUS_SOURCE"
  | "ATTRIBUTE_PATH"
  | "DUPLICATE_RULE"
  | "INVALID_NAME"
  | "STATE_DOCUMENT"
  | "CONFIG";

export class StateGraphError extends Error {
  readonly code: StateGraphErrorCode;

  constructor(code: StateGraphErrorCode, message: string) {
    super(message);
    this.name = "StateGraphError";
    this.code = code;
  }
}

/** Malformed module-local state key. */
export class KeyParseError extends StateGraphError {
  readonly key: string;

  constructor(key: string, reason: string) {
    super("KEY_PARSE", `malformed resource state key "${key}": ${reason}`);
    this.name = "KeyParseError";
    this.key = key;
  }
}

export class AddressParseError extends StateGraphError {
  readonly address: string;

  constructor(address: string, reason: string) {
    super("ADDRESS_PARSE", `malformed resource address "${address}": ${reason}`);
    this.name = "AddressParseError";
    this.address = address;
  }
}

/** Address without a resource type or name (e.g. a bare module address). */
export class IncompleteAddressError extends StateGraphError {
  readonly address: string;

  constructor(address: string) {
    super("INCOMPLETE_ADDRESS", `incomplete resource address "${address}"`);
    this.name = "IncompleteAddressError";
    this.address = address;
  }
}

export class AddressCollisionError extends StateGraphError {
  readonly address: string;
  readonly sources: string[];

  constructor(address: string, sources: string[]) {
    super(
      "ADDRESS_COLLISION",
      `address collision for "${address}" (mapped from ${sources.map((s) => `"${s}"`).join(", ")})`,
    );
    this.name = "AddressCollisionError";
    this.address = address;
    this.sources = sources;
  }
}

export class InvalidTransformError extends StateGraphError {
  constructor(message: string) {
    super("INVALID_TRANSFORM", message);
    this.name = "InvalidTransformError";
  }
}

/**
 * The input graph violates an invariant the engines rely on. Indicates a
 * corrupted state, never a user mistake in a transform or rule table.
 */
export class StateInvariantError extends StateGraphError {
  constructor(message: string) {
    super("STATE_INVARIANT", message);
    this.name = "StateInvariantError";
  }
}

export class AmbiguousSourceError extends StateGraphError {
  readonly srcType: string;
  readonly srcAttr: string;
  readonly sourceKey: string;
  readonly values: string[];

  constructor(srcType: string, srcAttr: string, sourceKey: string, values: string[]) {
    super(
      "AMBIGUOUS_SOURCE",
      `multiple source values for ${srcType}.${srcAttr} in "${sourceKey}": ${values.join(", ")}`,
    );
    this.name = "AmbiguousSourceError";
    this.srcType = srcType;
    this.srcAttr = srcAttr;
    this.sourceKey = sourceKey;
    this.values = values;
  }
}

export class AttributePathError extends StateGraphError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("ATTRIBUTE_PATH", `invalid attribute path "${path}": ${reason}`);
    this.name = "AttributePathError";
    this.path = path;
  }
}

export class DuplicateRuleError extends StateGraphError {
  readonly resourceType: string;

  constructor(resourceType: string) {
    super("DUPLICATE_RULE", `duplicate dependency rules for resource type "${resourceType}"`);
    this.name = "DuplicateRuleError";
    this.resourceType = resourceType;
  }
}

export class InvalidNameError extends StateGraphError {
  constructor(message: string) {
    super("INVALID_NAME", message);
    this.name = "InvalidNameError";
  }
}

export class StateDocumentError extends StateGraphError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super("STATE_DOCUMENT", `invalid document ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "StateDocumentError";
    this.issues = issues;
  }
}

export class ConfigError extends StateGraphError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG", issues.length > 0 ? `${message}:\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Render an error for terminal output. */
export function formatError(err: unknown): string {
  if (err instanceof StateGraphError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
