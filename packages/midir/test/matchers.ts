import { expect } from "vitest";

import { MidirError } from "#errors";
import { Severity } from "#result";

interface ExpectedMessage {
  severity: Severity;
  code?: string;
  /** Substring of the full message */
  message?: string;
}

interface CustomMatchers<R = unknown> {
  toHaveMessage(expected: ExpectedMessage): R;
}

declare module "vitest" {
  interface Assertion<T = any> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}

expect.extend({
  toHaveMessage(received: unknown, expected: ExpectedMessage) {
    const messages = messagesOf(received, expected.severity);
    const matches = messages.filter(
      (message) =>
        (expected.code === undefined || message.code === expected.code) &&
        (expected.message === undefined ||
          message.message.includes(expected.message)),
    );

    const found = messages
      .map((message) => `  [${message.code}] ${message.message}`)
      .join("\n");
    return {
      pass: matches.length > 0,
      message: () =>
        `expected ${expected.severity} message ${JSON.stringify({
          code: expected.code,
          message: expected.message,
        })}${this.isNot ? " not" : ""} to be reported, found:\n${found || "  (none)"}`,
    };
  },
});

function messagesOf(received: unknown, severity: Severity): MidirError[] {
  if (
    typeof received !== "object" ||
    received === null ||
    !("messages" in received) ||
    typeof received.messages !== "object" ||
    received.messages === null
  ) {
    return [];
  }
  const bySeverity: Record<string, unknown> = { ...received.messages };
  const list = bySeverity[severity];
  return Array.isArray(list)
    ? list.filter((item): item is MidirError => item instanceof MidirError)
    : [];
}
