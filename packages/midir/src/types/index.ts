/**
 * Source type system
 *
 * These are the types the well-typed AST hands to Ir lowering. They are
 * kept apart from the Ir so that lowering is the only place that knows
 * about both.
 */

export { Type } from "./definitions.js";
