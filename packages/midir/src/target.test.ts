import { describe, it, expect } from "vitest";

import { Target } from "./target.js";

describe("Target", () => {
  it("provides platform presets", () => {
    expect(Target.evm).toEqual({
      name: "evm",
      addressLength: 20,
      valueLength: 16,
      selectorLength: 4,
    });
    expect(Target.solana.selectorLength).toBe(8);
    expect(Target.polkadot.addressLength).toBe(32);
  });

  it("accepts custom targets within a word", () => {
    const custom = {
      name: "test",
      addressLength: 24,
      valueLength: 32,
      selectorLength: 1,
    };
    expect(Target.define(custom)).toEqual(custom);
    expect(Target.define(custom)).not.toBe(custom);
  });

  it("rejects lengths outside 1..32", () => {
    expect(() =>
      Target.define({ ...Target.evm, name: "wide", valueLength: 33 }),
    ).toThrow(
      "Target wide: valueLength must be an integer between 1 and 32, got 33",
    );
    expect(() =>
      Target.define({ ...Target.evm, name: "odd", addressLength: 1.5 }),
    ).toThrow("addressLength");
  });
});
