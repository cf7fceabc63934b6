import { describe, it, expect } from "vitest";

import { MidirError, formatMessages } from "./errors.js";
import { Result, Severity } from "./result.js";

describe("formatMessages", () => {
  it("renders errors before warnings with their location", () => {
    const result = Result.err([
      new MidirError(
        "unused block",
        "W1",
        { function: "f", block: 2 },
        Severity.Warning,
      ),
      new MidirError("bad phi", "E1", {
        function: "f",
        block: 1,
        instruction: 0,
      }),
      new MidirError("no location", "E2"),
    ]);

    expect(formatMessages(result).split("\n")).toEqual([
      "error[E1] f:block#1:0: bad phi",
      "error[E2] no location",
      "warning[W1] f:block#2: unused block",
    ]);
  });
});

describe("Result", () => {
  it("drops empty severities", () => {
    const result = Result.okWith(1, {
      [Severity.Error]: [],
      [Severity.Warning]: [],
    });
    expect(result).toEqual({ success: true, value: 1, messages: {} });
  });

  it("maps values and keeps messages", () => {
    const warning = new MidirError("careful", "W1", undefined, Severity.Warning);
    const mapped = Result.map(
      Result.okWith(2, { [Severity.Warning]: [warning] }),
      (n) => n * 3,
    );
    expect(mapped.success && mapped.value).toBe(6);
    expect(Result.warnings(mapped)).toEqual([warning]);
    expect(Result.hasErrors(mapped)).toBe(false);
  });

  it("leaves failures unmapped", () => {
    const failure: Result<number> = Result.err(new MidirError("broken", "E1"));
    const mapped = Result.map(failure, (n) => n + 1);
    expect(mapped.success).toBe(false);
    expect(Result.hasErrors(mapped)).toBe(true);
  });
});
