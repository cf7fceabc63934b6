/**
 * Ir optimizations
 */

import type * as Ir from "#ir";

import { ConstantFoldingStep } from "./steps/constant-folding.js";

export { ConstantFoldingStep, foldExpression } from "./steps/constant-folding.js";

export function foldFunction(func: Ir.Function): Ir.Function {
  return new ConstantFoldingStep().run(func);
}
