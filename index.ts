/**
 * stategraph — Library Entry Point
 */

export * from "./src/address.js";
export * from "./src/attributes.js";
export * from "./src/config.js";
export * from "./src/deps.js";
export * from "./src/diff.js";
export * from "./src/errors.js";
export * from "./src/logging.js";
export * from "./src/schema.js";
export * from "./src/state.js";
export * from "./src/state-file.js";
export * from "./src/transform.js";
export { createStateGraphCli } from "./src/cli.js";
