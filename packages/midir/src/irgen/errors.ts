/**
 * Errors raised while lowering into Ir
 */

import { MidirError } from "#errors";
import type { IrLocation } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  UNREPRESENTABLE_TYPE = "IRGEN001",
  INVALID_EMIT = "IRGEN002",
  UNKNOWN_BLOCK = "IRGEN003",
  NO_CURRENT_BLOCK = "IRGEN004",
}

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.UNREPRESENTABLE_TYPE]: "Type has no Ir representation",
  [ErrorCode.INVALID_EMIT]: "Instruction cannot be emitted here",
  [ErrorCode.UNKNOWN_BLOCK]: "Block was not created by this builder",
  [ErrorCode.NO_CURRENT_BLOCK]: "No block is selected for emission",
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
