/**
 * Result type shared by every stage that can report diagnostics
 */

import type { MidirError } from "#errors";

export enum Severity {
  Error = "error",
  Warning = "warning",
}

/**
 * Diagnostics grouped by severity; absent keys mean no messages
 */
export type MessagesBySeverity<E extends MidirError = MidirError> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends MidirError = MidirError> =
  | { success: true; value: T; messages: MessagesBySeverity<E> }
  | { success: false; messages: MessagesBySeverity<E> };

export const Result = {
  ok<T>(value: T): Result<T, never> {
    return { success: true, value, messages: {} };
  },

  okWith<T, E extends MidirError>(
    value: T,
    messages: MessagesBySeverity<E>,
  ): Result<T, E> {
    return { success: true, value, messages: prune(messages) };
  },

  err<E extends MidirError>(error: E | E[]): Result<never, E> {
    const errors = Array.isArray(error) ? error : [error];
    const messages: MessagesBySeverity<E> = {};
    for (const each of errors) {
      (messages[each.severity] ??= []).push(each);
    }
    return { success: false, messages };
  },

  errWith<E extends MidirError>(
    messages: MessagesBySeverity<E>,
  ): Result<never, E> {
    return { success: false, messages: prune(messages) };
  },

  map<T, U, E extends MidirError>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: fn(result.value), messages: result.messages };
  },

  errors<E extends MidirError>(result: Result<unknown, E>): E[] {
    return result.messages[Severity.Error] ?? [];
  },

  warnings<E extends MidirError>(result: Result<unknown, E>): E[] {
    return result.messages[Severity.Warning] ?? [];
  },

  hasErrors(result: Result<unknown, MidirError>): boolean {
    return Result.errors(result).length > 0;
  },
};

function prune<E extends MidirError>(
  messages: MessagesBySeverity<E>,
): MessagesBySeverity<E> {
  const pruned: MessagesBySeverity<E> = {};
  for (const severity of [Severity.Error, Severity.Warning]) {
    const list = messages[severity];
    if (list && list.length > 0) {
      pruned[severity] = list;
    }
  }
  return pruned;
}
