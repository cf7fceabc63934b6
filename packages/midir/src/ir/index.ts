/**
 * Midir Ir (intermediate representation) module
 *
 * Typed SSA form used between source lowering and target code
 * generation.
 */

export * from "./spec/index.js";
export { Vartable } from "./vartable.js";
export { Error, ErrorCode, ErrorMessages } from "./errors.js";
export * as Analysis from "./analysis/index.js";
