/**
 * Commands - Re-exports
 */

export * from "./install.js";
export * from "./update.js";
export * from "./test.js";
export * from "./activate.js";
export * from "./shell.js";
export * from "./tree.js";
export * from "./clean.js";
