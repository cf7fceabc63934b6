/**
 * Ir analysis exports
 */

export { Formatter } from "./formatter.js";
export { Validator, assertWellFormed } from "./validator.js";
