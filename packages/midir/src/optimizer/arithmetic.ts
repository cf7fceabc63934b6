/**
 * Fixed-width integer arithmetic on bigint values
 */

import type * as Ir from "#ir";

export interface IntegerType {
  signed: boolean;
  width: number;
}

export function integerType(type: Ir.Type): IntegerType | undefined {
  switch (type.kind) {
    case "int":
      return { signed: true, width: type.width };
    case "uint":
      return { signed: false, width: type.width };
    default:
      return undefined;
  }
}

export function toUnsigned(value: bigint, width: number): bigint {
  return BigInt.asUintN(width, value);
}

export function toSigned(value: bigint, width: number): bigint {
  return BigInt.asIntN(width, value);
}

/**
 * Wrap a value into the range of the given type
 */
export function wrap(value: bigint, type: IntegerType): bigint {
  return type.signed
    ? toSigned(value, type.width)
    : toUnsigned(value, type.width);
}

export function inRange(value: bigint, type: IntegerType): boolean {
  return wrap(value, type) === value;
}

/**
 * Exact power for non-negative base and exponent, or undefined once the
 * result is known to exceed `limit`
 */
export function boundedPow(
  base: bigint,
  exponent: bigint,
  limit: bigint,
): bigint | undefined {
  let result = 1n;
  let square = base;
  let remaining = exponent;
  while (remaining > 0n) {
    if (remaining & 1n) {
      result *= square;
      if (result > limit) return undefined;
    }
    remaining >>= 1n;
    if (remaining > 0n) {
      square *= square;
      if (square > limit) return undefined;
    }
  }
  return result;
}

export function modPow(base: bigint, exponent: bigint, width: number): bigint {
  let result = 1n;
  let square = toUnsigned(base, width);
  let remaining = exponent;
  while (remaining > 0n) {
    if (remaining & 1n) {
      result = toUnsigned(result * square, width);
    }
    remaining >>= 1n;
    square = toUnsigned(square * square, width);
  }
  return result;
}
