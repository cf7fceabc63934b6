/**
 * Target platform parameters, fixed once per compilation unit
 */

import { MidirError } from "#errors";

export interface Target {
  name: string;
  /** Address width in bytes */
  addressLength: number;
  /** Width of a native token value in bytes */
  valueLength: number;
  /** Width of a function selector in bytes */
  selectorLength: number;
}

export namespace Target {
  export const evm: Target = {
    name: "evm",
    addressLength: 20,
    valueLength: 16,
    selectorLength: 4,
  };

  export const polkadot: Target = {
    name: "polkadot",
    addressLength: 32,
    valueLength: 16,
    selectorLength: 4,
  };

  export const solana: Target = {
    name: "solana",
    addressLength: 32,
    valueLength: 8,
    selectorLength: 8,
  };

  /**
   * Build a custom target; every length must fit in a 32-byte word
   */
  export function define(target: Target): Target {
    const lengths = {
      addressLength: target.addressLength,
      valueLength: target.valueLength,
      selectorLength: target.selectorLength,
    };
    for (const [field, length] of Object.entries(lengths)) {
      if (!Number.isInteger(length) || length < 1 || length > 32) {
        throw new MidirError(
          `Target ${target.name}: ${field} must be an integer between 1 and 32, got ${length}`,
          "INVALID_TARGET",
        );
      }
    }
    return { ...target };
  }
}
