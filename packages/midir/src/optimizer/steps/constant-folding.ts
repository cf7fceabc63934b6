import { keccak256 } from "ethereum-cryptography/keccak";
import { concatBytes, equalsBytes } from "ethereum-cryptography/utils";

import * as Ir from "#ir";

import {
  type IntegerType,
  boundedPow,
  inRange,
  integerType,
  modPow,
  toSigned,
  toUnsigned,
  wrap,
} from "../arithmetic.js";

type Literal = Extract<Ir.Operand, { kind: "number" | "bool" }>;

export class ConstantFoldingStep {
  name = "constant-folding";

  /**
   * Fold every `set` of the function, substituting identities already
   * known to be literals. Returns a new function sharing the vartable.
   */
  run(func: Ir.Function): Ir.Function {
    const constants = new Map<number, Literal>();
    const blocks = new Map<number, Ir.Block>();

    for (const [id, block] of func.blocks) {
      const instructions = block.instructions.map((inst) => {
        if (inst.kind !== "set") {
          return inst;
        }

        const expression = foldExpression(
          substitute(inst.expression, constants),
        );
        const literal = asLiteral(expression);
        if (literal) {
          constants.set(inst.result, literal);
        }
        return { ...inst, expression };
      });
      blocks.set(id, { ...block, instructions });
    }

    return { ...func, blocks };
  }
}

/**
 * Evaluate an expression whose inputs are literals; anything else is
 * returned unchanged
 */
export function foldExpression(expr: Ir.Expression): Ir.Expression {
  switch (expr.kind) {
    case "binary":
      return foldBinary(expr) ?? expr;
    case "unary":
      return foldUnary(expr) ?? expr;
    case "sign_ext":
    case "zero_ext":
    case "trunc":
      return foldWidthChange(expr) ?? expr;
    case "keccak256":
      return foldKeccak(expr) ?? expr;
    case "string_compare":
      if (
        expr.left.kind === "compile_time" &&
        expr.right.kind === "compile_time"
      ) {
        return Ir.Expression.bool(
          equalsBytes(expr.left.bytes, expr.right.bytes),
        );
      }
      return expr;
    case "string_concat":
      if (
        expr.left.kind === "compile_time" &&
        expr.right.kind === "compile_time"
      ) {
        const bytes = concatBytes(expr.left.bytes, expr.right.bytes);
        return Ir.Expression.allocDynamicBytes(
          Ir.Type.ptr(Ir.Type.vector(Ir.Type.bytes(1))),
          Ir.Operand.number(bytes.length, Ir.Type.uint(32)),
          bytes,
        );
      }
      return expr;
    default:
      return expr;
  }
}

function foldBinary(expr: Ir.Expression.Binary): Ir.Expression | undefined {
  const { left, right, operator } = expr;

  if (left.kind === "bool" && right.kind === "bool") {
    switch (operator.kind) {
      case "eq":
        return Ir.Expression.bool(left.value === right.value);
      case "neq":
        return Ir.Expression.bool(left.value !== right.value);
      case "bit_and":
        return Ir.Expression.bool(left.value && right.value);
      case "bit_or":
        return Ir.Expression.bool(left.value || right.value);
      case "bit_xor":
        return Ir.Expression.bool(left.value !== right.value);
      default:
        return undefined;
    }
  }

  if (left.kind !== "number" || right.kind !== "number") {
    return undefined;
  }
  const type = integerType(left.type);
  if (!type || !Ir.Type.equals(left.type, right.type)) {
    return undefined;
  }

  const comparison = compare(operator, left.value, right.value, type);
  if (comparison !== undefined) {
    return Ir.Expression.bool(comparison);
  }

  const result = evaluate(operator, left.value, right.value, type);
  return result === undefined
    ? undefined
    : Ir.Expression.number(result, left.type);
}

function compare(
  operator: Ir.BinaryOperator,
  left: bigint,
  right: bigint,
  { width }: IntegerType,
): boolean | undefined {
  const [sl, sr] = [toSigned(left, width), toSigned(right, width)];
  const [ul, ur] = [toUnsigned(left, width), toUnsigned(right, width)];
  switch (operator.kind) {
    case "eq":
      return ul === ur;
    case "neq":
      return ul !== ur;
    case "slt":
      return sl < sr;
    case "ult":
      return ul < ur;
    case "slte":
      return sl <= sr;
    case "ulte":
      return ul <= ur;
    case "sgt":
      return sl > sr;
    case "ugt":
      return ul > ur;
    case "sgte":
      return sl >= sr;
    case "ugte":
      return ul >= ur;
    default:
      return undefined;
  }
}

function evaluate(
  operator: Ir.BinaryOperator,
  left: bigint,
  right: bigint,
  type: IntegerType,
): bigint | undefined {
  const { width } = type;
  const [ul, ur] = [toUnsigned(left, width), toUnsigned(right, width)];
  const [sl, sr] = [toSigned(left, width), toSigned(right, width)];
  // Out-of-range literals are read modulo their width, as in `compare`
  const [l, r] = [wrap(left, type), wrap(right, type)];

  // Overflowing operators trap at run time, so an out-of-range result
  // must stay unfolded
  const checked = (exact: bigint): bigint | undefined =>
    "overflowing" in operator && operator.overflowing && !inRange(exact, type)
      ? undefined
      : wrap(exact, type);

  switch (operator.kind) {
    case "add":
      return checked(l + r);
    case "sub":
      return checked(l - r);
    case "mul":
      return checked(l * r);
    case "pow":
      return foldPow(operator.overflowing, l, r, type);
    case "udiv":
      return ur === 0n ? undefined : wrap(ul / ur, type);
    case "sdiv":
      return sr === 0n ? undefined : wrap(sl / sr, type);
    case "umod":
      return ur === 0n ? undefined : wrap(ul % ur, type);
    case "smod":
      return sr === 0n ? undefined : wrap(sl % sr, type);
    case "bit_and":
      return wrap(ul & ur, type);
    case "bit_or":
      return wrap(ul | ur, type);
    case "bit_xor":
      return wrap(ul ^ ur, type);
    case "shl":
      return ur >= BigInt(width) ? 0n : wrap(ul << ur, type);
    case "ushr":
      return ur >= BigInt(width) ? 0n : wrap(ul >> ur, type);
    case "sshr":
      return wrap(sl >> (ur >= BigInt(width) ? BigInt(width) : ur), type);
    default:
      return undefined;
  }
}

function foldPow(
  overflowing: boolean,
  base: bigint,
  exponent: bigint,
  type: IntegerType,
): bigint | undefined {
  if (!overflowing) {
    const exact = modPow(base, toUnsigned(exponent, type.width), type.width);
    return wrap(exact, type);
  }
  if (base < 0n || exponent < 0n) {
    return undefined;
  }
  const limit = type.signed
    ? (1n << BigInt(type.width - 1)) - 1n
    : (1n << BigInt(type.width)) - 1n;
  return boundedPow(base, exponent, limit);
}

function foldUnary(expr: Ir.Expression.Unary): Ir.Expression | undefined {
  const { operand, operator } = expr;
  switch (operator.kind) {
    case "not":
      return operand.kind === "bool"
        ? Ir.Expression.bool(!operand.value)
        : undefined;
    case "neg": {
      if (operand.kind !== "number") return undefined;
      const type = integerType(operand.type);
      if (!type) return undefined;
      const exact = -wrap(operand.value, type);
      if (operator.overflowing && !inRange(exact, type)) return undefined;
      return Ir.Expression.number(wrap(exact, type), operand.type);
    }
    case "bit_not": {
      if (operand.kind !== "number") return undefined;
      const type = integerType(operand.type);
      if (!type) return undefined;
      const inverted = ~toUnsigned(operand.value, type.width);
      return Ir.Expression.number(wrap(inverted, type), operand.type);
    }
  }
}

function foldWidthChange(
  expr: Ir.Expression.SignExt | Ir.Expression.ZeroExt | Ir.Expression.Trunc,
): Ir.Expression | undefined {
  const { operand, to } = expr;
  if (operand.kind !== "number") return undefined;
  const from = integerType(operand.type);
  const target = integerType(to);
  if (!from || !target) return undefined;

  const value =
    expr.kind === "sign_ext"
      ? toSigned(operand.value, from.width)
      : toUnsigned(operand.value, from.width);
  return Ir.Expression.number(wrap(value, target), to);
}

/**
 * Hash literal arguments, each encoded big-endian at its type's width
 */
function foldKeccak(expr: Ir.Expression.Keccak256): Ir.Expression | undefined {
  const chunks: Uint8Array[] = [];
  for (const arg of expr.args) {
    const encoded = encodeLiteral(arg);
    if (!encoded) return undefined;
    chunks.push(encoded);
  }
  return Ir.Expression.bytes(
    Ir.Type.bytes(32),
    keccak256(concatBytes(...chunks)),
  );
}

function encodeLiteral(operand: Ir.Operand): Uint8Array | undefined {
  if (operand.kind === "bool") {
    return Uint8Array.of(operand.value ? 1 : 0);
  }
  if (operand.kind !== "number") return undefined;
  const type = integerType(operand.type);
  if (!type || type.width % 8 !== 0) return undefined;

  const bytes = new Uint8Array(type.width / 8);
  let value = toUnsigned(operand.value, type.width);
  for (let i = bytes.length - 1; i >= 0; i--) {
    bytes[i] = Number(value & 0xffn);
    value >>= 8n;
  }
  return bytes;
}

function asLiteral(expr: Ir.Expression): Literal | undefined {
  switch (expr.kind) {
    case "number":
      return { kind: "number", type: expr.type, value: expr.value };
    case "bool":
      return { kind: "bool", value: expr.value };
    default:
      return undefined;
  }
}

// Only the operand positions the folder evaluates
function substitute(
  expr: Ir.Expression,
  constants: Map<number, Literal>,
): Ir.Expression {
  const replace = (operand: Ir.Operand): Ir.Operand =>
    operand.kind === "id" ? (constants.get(operand.id) ?? operand) : operand;

  switch (expr.kind) {
    case "binary":
      return { ...expr, left: replace(expr.left), right: replace(expr.right) };
    case "unary":
    case "sign_ext":
    case "zero_ext":
    case "trunc":
      return { ...expr, operand: replace(expr.operand) };
    case "keccak256":
      return { ...expr, args: expr.args.map(replace) };
    default:
      return expr;
  }
}
