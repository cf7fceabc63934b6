/**
 * Lowering into Ir
 */

export { fromSourceType, enumWidth } from "./type.js";
export { FunctionBuilder } from "./builder.js";
export { Error, ErrorCode, ErrorMessages } from "./errors.js";
