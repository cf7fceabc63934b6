import * as Ir from "#ir";
import { Type as SourceType } from "#types";
import type { Target } from "#target";
import type { IrLocation } from "#errors";

import { Error as IrgenError, ErrorCode } from "./errors.js";

/**
 * Lower a source type to its Ir representation for the given target.
 * The mapping is total apart from failed types, which can only reach
 * here through an earlier bug; `location` is attached to that error.
 */
export function fromSourceType(
  type: SourceType,
  target: Target,
  location?: IrLocation,
): Ir.Type {
  if (SourceType.isFailure(type)) {
    throw new IrgenError(
      ErrorCode.UNREPRESENTABLE_TYPE,
      `${type.toString()} (kind ${type.kind})`,
      location,
    );
  }

  if (SourceType.isElementary(type)) {
    return fromElementary(type, target);
  }

  if (SourceType.isArray(type)) {
    const { element, dimensions } = flattenArray(type, target, location);
    return Ir.Type.ptr(Ir.Type.array(element, dimensions));
  }

  if (SourceType.isMapping(type)) {
    return Ir.Type.mapping(
      fromSourceType(type.keyType, target, location),
      fromSourceType(type.valueType, target, location),
    );
  }

  if (SourceType.isStruct(type)) {
    return Ir.Type.ptr(Ir.Type.struct(structTag(type)));
  }

  if (SourceType.isFunction(type)) {
    if (type.visibility === "external") {
      return Ir.Type.ptr(Ir.Type.struct({ kind: "external_function" }));
    }
    return Ir.Type.ptr(
      Ir.Type.fn(
        type.parameterTypes.map((param) =>
          fromSourceType(param, target, location),
        ),
        type.returnTypes.map((ret) => fromSourceType(ret, target, location)),
      ),
    );
  }

  if (SourceType.isEnum(type)) {
    return Ir.Type.uint(enumWidth(type.variants.length));
  }

  if (SourceType.isContract(type)) {
    return Ir.Type.bytes(target.addressLength);
  }

  if (SourceType.isUserDefined(type)) {
    return fromSourceType(type.underlying, target, location);
  }

  if (SourceType.isReference(type)) {
    const referent = fromSourceType(type.referent, target, location);
    return type.location === "storage"
      ? Ir.Type.storagePtr(referent, type.immutable)
      : Ir.Type.ptr(referent);
  }

  if (SourceType.isSlice(type)) {
    return Ir.Type.ptr(
      Ir.Type.slice(fromSourceType(type.elementType, target, location)),
    );
  }

  throw new IrgenError(
    ErrorCode.UNREPRESENTABLE_TYPE,
    `unrecognized type ${type.toString()}`,
    location,
  );
}

function fromElementary(type: SourceType.Elementary, target: Target): Ir.Type {
  switch (type.kind) {
    case "bool":
      return Ir.Type.bool;
    case "uint":
      return Ir.Type.uint(type.bits ?? 256);
    case "int":
      return Ir.Type.int(type.bits ?? 256);
    case "bytes":
      // Fixed-size bytes are inline; dynamic bytes share the string layout
      return type.bits === undefined
        ? dynamicBytes()
        : Ir.Type.bytes(type.bits / 8);
    case "string":
      return dynamicBytes();
    case "address":
      return Ir.Type.bytes(target.addressLength);
    case "value":
      return Ir.Type.uint(target.valueLength * 8);
    case "function_selector":
      return Ir.Type.uint(target.selectorLength * 8);
    case "buffer_pointer":
      return Ir.Type.ptr(Ir.Type.bytes(1));
  }
}

const dynamicBytes = (): Ir.Type => Ir.Type.ptr(Ir.Type.vector(Ir.Type.bytes(1)));

// Nested arrays collapse into one multi-dimensional array, innermost first
function flattenArray(
  type: SourceType.Array,
  target: Target,
  location: IrLocation | undefined,
): { element: Ir.Type; dimensions: Ir.Type.ArrayLength[] } {
  const own = arrayLength(type.size);
  if (SourceType.isArray(type.elementType)) {
    const inner = flattenArray(type.elementType, target, location);
    return { element: inner.element, dimensions: [...inner.dimensions, own] };
  }
  return {
    element: fromSourceType(type.elementType, target, location),
    dimensions: [own],
  };
}

function arrayLength(size: number | "any" | undefined): Ir.Type.ArrayLength {
  if (size === undefined) {
    return Ir.Type.ArrayLength.dynamic;
  }
  if (size === "any") {
    return Ir.Type.ArrayLength.anyFixed;
  }
  return Ir.Type.ArrayLength.fixed(size);
}

function structTag(type: SourceType.Struct): Ir.Type.StructTag {
  return type.builtin === undefined
    ? { kind: "user_defined", id: type.id }
    : { kind: type.builtin };
}

/**
 * Smallest multiple of 8 bits that can number every variant
 */
export function enumWidth(variants: number): number {
  let width = 8;
  while (BigInt(variants) > 1n << BigInt(width)) {
    width += 8;
  }
  return width;
}
