/**
 * Ir-specific errors and error codes
 */

import { MidirError } from "#errors";
import type { IrLocation } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  UNKNOWN_VARIABLE = "IR001",
  UNDEFINED_VARIABLE = "IR002",
  DUPLICATE_DEFINITION = "IR003",
  EMPTY_BLOCK = "IR004",
  MISSING_TERMINATOR = "IR005",
  MISPLACED_TERMINATOR = "IR006",
  MISPLACED_PHI = "IR007",
  UNKNOWN_BLOCK = "IR008",
  INVALID_PHI_INPUT = "IR009",
  INCOMPLETE_PHI = "IR010",
  UNREACHABLE_BLOCK = "IR011",
  UNSUPPORTED_PRINT = "IR012",
  DUPLICATE_PHI_INPUT = "IR013",
  INTERNAL_ERROR = "IR999",
}

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.UNKNOWN_VARIABLE]: "Variable not found in the variable table",
  [ErrorCode.UNDEFINED_VARIABLE]: "Variable is used but never defined",
  [ErrorCode.DUPLICATE_DEFINITION]: "Variable is defined more than once",
  [ErrorCode.EMPTY_BLOCK]: "Block has no instructions",
  [ErrorCode.MISSING_TERMINATOR]: "Block does not end with a terminator",
  [ErrorCode.MISPLACED_TERMINATOR]: "Terminator is not the last instruction",
  [ErrorCode.MISPLACED_PHI]: "Phi follows a non-phi instruction",
  [ErrorCode.UNKNOWN_BLOCK]: "Reference to a block that does not exist",
  [ErrorCode.INVALID_PHI_INPUT]: "Phi input names a block that is not a predecessor",
  [ErrorCode.INCOMPLETE_PHI]: "Phi has no input for a predecessor",
  [ErrorCode.UNREACHABLE_BLOCK]: "Block is unreachable from the entry block",
  [ErrorCode.UNSUPPORTED_PRINT]: "Cannot print this Ir node",
  [ErrorCode.DUPLICATE_PHI_INPUT]: "Phi has more than one input for a predecessor",
  [ErrorCode.INTERNAL_ERROR]: "Internal Ir error",
};

export class Error extends MidirError {
  constructor(
    code: ErrorCode,
    message?: string,
    location?: IrLocation,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, severity);
  }
}
