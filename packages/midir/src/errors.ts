/**
 * Base error type and diagnostic rendering
 */

import { Severity } from "#result";
import type { Result } from "#result";

/**
 * Where in the Ir a diagnostic applies
 */
export interface IrLocation {
  /** Function name */
  function?: string;
  /** Block id */
  block?: number;
  /** Instruction index within the block */
  instruction?: number;
}

export class MidirError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly location?: IrLocation,
    public readonly severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export function formatLocation(location: IrLocation): string {
  const parts: string[] = [];
  if (location.function !== undefined) {
    parts.push(location.function);
  }
  if (location.block !== undefined) {
    parts.push(`block#${location.block}`);
  }
  if (location.instruction !== undefined) {
    parts.push(`${location.instruction}`);
  }
  return parts.join(":");
}

/**
 * Render every message of a result, errors first, one per line
 */
export function formatMessages(result: Result<unknown, MidirError>): string {
  const lines: string[] = [];
  for (const severity of [Severity.Error, Severity.Warning]) {
    for (const message of result.messages[severity] ?? []) {
      const where = message.location ? formatLocation(message.location) : "";
      lines.push(
        where
          ? `${severity}[${message.code}] ${where}: ${message.message}`
          : `${severity}[${message.code}] ${message.message}`,
      );
    }
  }
  return lines.join("\n");
}

/**
 * Compile-time exhaustiveness check for switch statements over unions
 */
export function assertExhausted(value: never): never {
  const unexpected: unknown = value;
  const description =
    typeof unexpected === "object" && unexpected !== null && "kind" in unexpected
      ? `kind ${String(unexpected.kind)}`
      : String(unexpected);
  throw new MidirError(`Unexpected value: ${description}`, "INTERNAL_ERROR");
}
