import type { Type } from "./type.js";
import type { Operand, StringLocation } from "./value.js";

/**
 * Pure, value-producing computations. Evaluating an expression reads its
 * operands and nothing else.
 */
export type Expression =
  // Arithmetic and logic
  | Expression.Binary
  | Expression.Unary
  // Literals
  | Expression.NumberLiteral
  | Expression.BoolLiteral
  | Expression.BytesLiteral
  | Expression.ArrayLiteral
  | Expression.ConstArrayLiteral
  | Expression.StructLiteral
  // Identity and addressing
  | Expression.Id
  | Expression.GetRef
  | Expression.Load
  | Expression.StructMember
  | Expression.Subscript
  | Expression.AdvancePointer
  // Conversions
  | Expression.Cast
  | Expression.BytesCast
  | Expression.SignExt
  | Expression.ZeroExt
  | Expression.Trunc
  // Allocation
  | Expression.AllocDynamicBytes
  // Hashing and strings
  | Expression.Keccak256
  | Expression.StringCompare
  | Expression.StringConcat
  // Storage, formatting and context
  | Expression.StorageArrayLength
  | Expression.FormatString
  | Expression.FunctionArg
  | Expression.InternalFunctionCfg
  | Expression.ReturnData;

export type BinaryOperator =
  | { kind: "add" | "sub" | "mul" | "pow"; overflowing: boolean }
  | {
      kind:
        | "udiv"
        | "sdiv"
        | "umod"
        | "smod"
        // Comparison
        | "eq"
        | "neq"
        | "slt"
        | "ult"
        | "slte"
        | "ulte"
        | "sgt"
        | "ugt"
        | "sgte"
        | "ugte"
        // Bitwise
        | "bit_and"
        | "bit_or"
        | "bit_xor"
        | "shl"
        | "sshr"
        | "ushr";
    };

export namespace BinaryOperator {
  export type Kind = BinaryOperator["kind"];

  export const add = (overflowing = false): BinaryOperator => ({
    kind: "add",
    overflowing,
  });
  export const sub = (overflowing = false): BinaryOperator => ({
    kind: "sub",
    overflowing,
  });
  export const mul = (overflowing = false): BinaryOperator => ({
    kind: "mul",
    overflowing,
  });
  export const pow = (overflowing = false): BinaryOperator => ({
    kind: "pow",
    overflowing,
  });

  export const of = (
    kind: Exclude<Kind, "add" | "sub" | "mul" | "pow">,
  ): BinaryOperator => ({ kind });
}

export type UnaryOperator =
  | { kind: "not" }
  | { kind: "neg"; overflowing: boolean }
  | { kind: "bit_not" };

export namespace UnaryOperator {
  export const not: UnaryOperator = { kind: "not" };
  export const bitNot: UnaryOperator = { kind: "bit_not" };
  export const neg = (overflowing = false): UnaryOperator => ({
    kind: "neg",
    overflowing,
  });
}

/** Display specifier of a format-string argument */
export type FormatArg = "default" | "binary" | "hex";

export namespace Expression {
  export interface Binary {
    kind: "binary";
    operator: BinaryOperator;
    left: Operand;
    right: Operand;
  }

  export const binary = (
    operator: BinaryOperator,
    left: Operand,
    right: Operand,
  ): Binary => ({ kind: "binary", operator, left, right });

  export interface Unary {
    kind: "unary";
    operator: UnaryOperator;
    operand: Operand;
  }

  export const unary = (operator: UnaryOperator, operand: Operand): Unary => ({
    kind: "unary",
    operator,
    operand,
  });

  export interface NumberLiteral {
    kind: "number";
    type: Type;
    value: bigint;
  }

  export const number = (value: bigint | number, type: Type): NumberLiteral => ({
    kind: "number",
    type,
    value: BigInt(value),
  });

  export interface BoolLiteral {
    kind: "bool";
    value: boolean;
  }

  export const bool = (value: boolean): BoolLiteral => ({ kind: "bool", value });

  export interface BytesLiteral {
    kind: "bytes";
    type: Type;
    value: Uint8Array;
  }

  export const bytes = (type: Type, value: Uint8Array): BytesLiteral => ({
    kind: "bytes",
    type,
    value,
  });

  // Constructed at run time from its element operands
  export interface ArrayLiteral {
    kind: "array";
    type: Type;
    values: Operand[];
  }

  export const array = (type: Type, values: Operand[]): ArrayLiteral => ({
    kind: "array",
    type,
    values,
  });

  // Fully constant; later stages may place it in static data
  export interface ConstArrayLiteral {
    kind: "const_array";
    type: Type;
    values: Operand[];
  }

  export const constArray = (
    type: Type,
    values: Operand[],
  ): ConstArrayLiteral => ({ kind: "const_array", type, values });

  export interface StructLiteral {
    kind: "struct";
    values: Operand[];
  }

  export const struct = (values: Operand[]): StructLiteral => ({
    kind: "struct",
    values,
  });

  export interface Id {
    kind: "id";
    id: number;
  }

  export const id = (id: number): Id => ({ kind: "id", id });

  // Address-of
  export interface GetRef {
    kind: "get_ref";
    operand: Operand;
  }

  export const getRef = (operand: Operand): GetRef => ({
    kind: "get_ref",
    operand,
  });

  export interface Load {
    kind: "load";
    operand: Operand;
  }

  export const load = (operand: Operand): Load => ({ kind: "load", operand });

  export interface StructMember {
    kind: "struct_member";
    operand: Operand;
    member: number;
  }

  export const structMember = (
    operand: Operand,
    member: number,
  ): StructMember => ({ kind: "struct_member", operand, member });

  export interface Subscript {
    kind: "subscript";
    array: Operand;
    index: Operand;
  }

  export const subscript = (array: Operand, index: Operand): Subscript => ({
    kind: "subscript",
    array,
    index,
  });

  // Raw pointer arithmetic, offset in bytes
  export interface AdvancePointer {
    kind: "advance_pointer";
    pointer: Operand;
    offset: Operand;
  }

  export const advancePointer = (
    pointer: Operand,
    offset: Operand,
  ): AdvancePointer => ({ kind: "advance_pointer", pointer, offset });

  export interface Cast {
    kind: "cast";
    operand: Operand;
    to: Type;
  }

  export const cast = (operand: Operand, to: Type): Cast => ({
    kind: "cast",
    operand,
    to,
  });

  // Fixed-width bytes <-> dynamic bytes; changes representation
  export interface BytesCast {
    kind: "bytes_cast";
    operand: Operand;
    to: Type;
  }

  export const bytesCast = (operand: Operand, to: Type): BytesCast => ({
    kind: "bytes_cast",
    operand,
    to,
  });

  export interface SignExt {
    kind: "sign_ext";
    operand: Operand;
    to: Type;
  }

  export const signExt = (operand: Operand, to: Type): SignExt => ({
    kind: "sign_ext",
    operand,
    to,
  });

  export interface ZeroExt {
    kind: "zero_ext";
    operand: Operand;
    to: Type;
  }

  export const zeroExt = (operand: Operand, to: Type): ZeroExt => ({
    kind: "zero_ext",
    operand,
    to,
  });

  // Out-of-range values are undefined here; lowering inserts the checks
  export interface Trunc {
    kind: "trunc";
    operand: Operand;
    to: Type;
  }

  export const trunc = (operand: Operand, to: Type): Trunc => ({
    kind: "trunc",
    operand,
    to,
  });

  export interface AllocDynamicBytes {
    kind: "alloc_dynamic_bytes";
    /** Pointer to the allocated element type */
    type: Type;
    size: Operand;
    /** Compile-time contents copied into the new buffer */
    initializer?: Uint8Array;
  }

  export const allocDynamicBytes = (
    type: Type,
    size: Operand,
    initializer?: Uint8Array,
  ): AllocDynamicBytes =>
    initializer === undefined
      ? { kind: "alloc_dynamic_bytes", type, size }
      : { kind: "alloc_dynamic_bytes", type, size, initializer };

  export interface Keccak256 {
    kind: "keccak256";
    args: Operand[];
  }

  export const keccak256 = (args: Operand[]): Keccak256 => ({
    kind: "keccak256",
    args,
  });

  export interface StringCompare {
    kind: "string_compare";
    left: StringLocation;
    right: StringLocation;
  }

  export const stringCompare = (
    left: StringLocation,
    right: StringLocation,
  ): StringCompare => ({ kind: "string_compare", left, right });

  export interface StringConcat {
    kind: "string_concat";
    left: StringLocation;
    right: StringLocation;
  }

  export const stringConcat = (
    left: StringLocation,
    right: StringLocation,
  ): StringConcat => ({ kind: "string_concat", left, right });

  export interface StorageArrayLength {
    kind: "storage_array_length";
    array: Operand;
  }

  export const storageArrayLength = (array: Operand): StorageArrayLength => ({
    kind: "storage_array_length",
    array,
  });

  export interface FormatString {
    kind: "format_string";
    args: [FormatArg, Operand][];
  }

  export const formatString = (args: [FormatArg, Operand][]): FormatString => ({
    kind: "format_string",
    args,
  });

  export interface FunctionArg {
    kind: "function_arg";
    index: number;
  }

  export const functionArg = (index: number): FunctionArg => ({
    kind: "function_arg",
    index,
  });

  // Another function used as a first-class value
  export interface InternalFunctionCfg {
    kind: "internal_function_cfg";
    function: number;
  }

  export const internalFunctionCfg = (fn: number): InternalFunctionCfg => ({
    kind: "internal_function_cfg",
    function: fn,
  });

  // Data returned by the most recent external call
  export interface ReturnData {
    kind: "return_data";
  }

  export const returnData: ReturnData = { kind: "return_data" };

  /**
   * Every operand the expression reads, in field order
   */
  export function operands(expr: Expression): Operand[] {
    switch (expr.kind) {
      case "binary":
        return [expr.left, expr.right];
      case "unary":
      case "get_ref":
      case "load":
      case "struct_member":
      case "cast":
      case "bytes_cast":
      case "sign_ext":
      case "zero_ext":
      case "trunc":
        return [expr.operand];
      case "array":
      case "const_array":
      case "struct":
        return [...expr.values];
      case "subscript":
        return [expr.array, expr.index];
      case "advance_pointer":
        return [expr.pointer, expr.offset];
      case "alloc_dynamic_bytes":
        return [expr.size];
      case "keccak256":
        return [...expr.args];
      case "string_compare":
      case "string_concat":
        return [expr.left, expr.right].flatMap((side) =>
          side.kind === "run_time" ? [side.operand] : [],
        );
      case "storage_array_length":
        return [expr.array];
      case "format_string":
        return expr.args.map(([, operand]) => operand);
      case "id":
        return [{ kind: "id", id: expr.id }];
      case "number":
      case "bool":
      case "bytes":
      case "function_arg":
      case "internal_function_cfg":
      case "return_data":
        return [];
    }
  }
}
