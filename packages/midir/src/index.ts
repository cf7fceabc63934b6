export const VERSION = "0.1.0";

export * as Ir from "#ir";

// Re-export source type system
export { Type } from "#types";

// Re-export target platforms
export { Target } from "#target";

// Re-export lowering
export {
  fromSourceType,
  enumWidth,
  FunctionBuilder,
  Error as IrgenError,
  ErrorCode as IrgenErrorCode,
} from "#irgen";

// Re-export optimizer functionality
export { ConstantFoldingStep, foldExpression, foldFunction } from "#optimizer";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";
