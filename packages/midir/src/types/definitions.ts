/**
 * Source-level type definitions, as produced by semantic analysis
 */

export interface Type {
  kind: Type.Kind;
  toString(): string;
  equals(other: Type): boolean;
}

export namespace Type {
  export type Kind =
    | Type.Elementary.Kind
    | Type.Array.Kind
    | Type.Mapping.Kind
    | Type.Struct.Kind
    | Type.Function.Kind
    | Type.Enum.Kind
    | Type.Contract.Kind
    | Type.UserDefined.Kind
    | Type.Reference.Kind
    | Type.Slice.Kind
    | Type.Failure.Kind;

  // Elementary types
  export class Elementary implements Type {
    constructor(
      public kind: Type.Elementary.Kind,
      public bits?: number,
    ) {}

    toString(): string {
      if (this.kind === "uint" || this.kind === "int") {
        return `${this.kind}${this.bits ?? 256}`;
      }
      if (this.kind === "bytes" && this.bits !== undefined) {
        return `bytes${this.bits / 8}`;
      }
      return this.kind;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Elementary &&
        other.kind === this.kind &&
        other.bits === this.bits
      );
    }
  }

  export const isElementary = (type: Type): type is Type.Elementary =>
    type instanceof Type.Elementary;

  export namespace Elementary {
    export type Kind =
      | "uint"
      | "int"
      | "address"
      | "bool"
      | "bytes"
      | "string"
      | "value"
      | "function_selector"
      | "buffer_pointer";

    export const uint = (bits: number = 256) => new Type.Elementary("uint", bits);
    export const int = (bits: number = 256) => new Type.Elementary("int", bits);
    /** Fixed-size bytes, `size` in bytes */
    export const fixedBytes = (size: number) =>
      new Type.Elementary("bytes", size * 8);

    export const bool = new Type.Elementary("bool");
    export const address = new Type.Elementary("address");
    export const string = new Type.Elementary("string");
    export const bytes = new Type.Elementary("bytes"); // Dynamic bytes
    export const value = new Type.Elementary("value");
    export const functionSelector = new Type.Elementary("function_selector");
    export const bufferPointer = new Type.Elementary("buffer_pointer");
  }

  export class Array implements Type {
    kind = "array" as const;

    constructor(
      public elementType: Type,
      public size?: number | "any", // undefined for dynamic arrays
    ) {}

    toString(): string {
      return this.size !== undefined
        ? `array<${this.elementType.toString()}, ${this.size}>`
        : `array<${this.elementType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Array &&
        this.elementType.equals(other.elementType) &&
        this.size === other.size
      );
    }
  }

  export const isArray = (type: Type): type is Type.Array =>
    type instanceof Type.Array;

  export namespace Array {
    export type Kind = "array";
  }

  export class Mapping implements Type {
    kind = "mapping" as const;

    constructor(
      public keyType: Type,
      public valueType: Type,
    ) {}

    toString(): string {
      return `mapping<${this.keyType.toString()}, ${this.valueType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Mapping &&
        this.keyType.equals(other.keyType) &&
        this.valueType.equals(other.valueType)
      );
    }
  }

  export const isMapping = (type: Type): type is Type.Mapping =>
    type instanceof Type.Mapping;

  export namespace Mapping {
    export type Kind = "mapping";
  }

  export class Struct implements Type {
    kind = "struct" as const;

    constructor(
      public name: string,
      public fields: Map<string, Type>,
      /** Index of the struct among the unit's declared structs */
      public id: number,
      public builtin?: Type.Struct.Builtin,
    ) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Struct &&
        other.id === this.id &&
        other.name === this.name &&
        other.builtin === this.builtin
      );
    }
  }

  export const isStruct = (type: Type): type is Type.Struct =>
    type instanceof Type.Struct;

  export namespace Struct {
    export type Kind = "struct";

    /** Platform-reserved structures */
    export type Builtin =
      | "account_info"
      | "account_meta"
      | "parameters"
      | "external_function";
  }

  export class Function implements Type {
    kind = "function" as const;

    constructor(
      public name: string,
      public parameterTypes: Type[],
      public returnTypes: Type[],
      public visibility: "internal" | "external" = "internal",
    ) {}

    toString(): string {
      const params = this.parameterTypes.map((t) => t.toString()).join(", ");
      const rets = this.returnTypes.map((t) => t.toString()).join(", ");
      const ret = this.returnTypes.length > 0 ? ` returns (${rets})` : "";
      return `function(${params}) ${this.visibility}${ret}`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Function &&
        other.visibility === this.visibility &&
        sameTypes(this.parameterTypes, other.parameterTypes) &&
        sameTypes(this.returnTypes, other.returnTypes)
      );
    }
  }

  export const isFunction = (type: Type): type is Type.Function =>
    type instanceof Type.Function;

  export namespace Function {
    export type Kind = "function";
  }

  export class Enum implements Type {
    kind = "enum" as const;

    constructor(
      public name: string,
      public variants: string[],
    ) {}

    toString(): string {
      return `enum ${this.name}`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Enum &&
        other.name === this.name &&
        other.variants.length === this.variants.length &&
        other.variants.every((variant, i) => variant === this.variants[i])
      );
    }
  }

  export const isEnum = (type: Type): type is Type.Enum =>
    type instanceof Type.Enum;

  export namespace Enum {
    export type Kind = "enum";
  }

  // A contract used as a type is a reference to a deployed instance
  export class Contract implements Type {
    kind = "contract" as const;

    constructor(public name: string) {}

    toString(): string {
      return `contract ${this.name}`;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Contract && other.name === this.name;
    }
  }

  export const isContract = (type: Type): type is Type.Contract =>
    type instanceof Type.Contract;

  export namespace Contract {
    export type Kind = "contract";
  }

  // User-defined value type wrapping an elementary type
  export class UserDefined implements Type {
    kind = "user_defined" as const;

    constructor(
      public name: string,
      public underlying: Type,
    ) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.UserDefined &&
        other.name === this.name &&
        this.underlying.equals(other.underlying)
      );
    }
  }

  export const isUserDefined = (type: Type): type is Type.UserDefined =>
    type instanceof Type.UserDefined;

  export namespace UserDefined {
    export type Kind = "user_defined";
  }

  export class Reference implements Type {
    kind = "reference" as const;

    constructor(
      public referent: Type,
      public location: "memory" | "storage",
      public immutable: boolean = false,
    ) {}

    toString(): string {
      const qualifier = this.immutable ? " immutable" : "";
      return `${this.referent.toString()} ${this.location}${qualifier}`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Reference &&
        other.location === this.location &&
        other.immutable === this.immutable &&
        this.referent.equals(other.referent)
      );
    }
  }

  export const isReference = (type: Type): type is Type.Reference =>
    type instanceof Type.Reference;

  export namespace Reference {
    export type Kind = "reference";
  }

  // Data pointer plus length, e.g. a calldata range
  export class Slice implements Type {
    kind = "slice" as const;

    constructor(public elementType: Type) {}

    toString(): string {
      return `slice<${this.elementType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Slice &&
        this.elementType.equals(other.elementType)
      );
    }
  }

  export const isSlice = (type: Type): type is Type.Slice =>
    type instanceof Type.Slice;

  export namespace Slice {
    export type Kind = "slice";
  }

  // Error type for type checking failures
  export class Failure implements Type {
    kind = "fail" as const;

    constructor(public message: string) {}

    toString(): string {
      return `<error: ${this.message}>`;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Failure;
    }
  }

  export const isFailure = (type: Type): type is Type.Failure =>
    type instanceof Type.Failure;

  export namespace Failure {
    export type Kind = "fail";
  }

  function sameTypes(left: Type[], right: Type[]): boolean {
    return (
      left.length === right.length &&
      left.every((type, i) => type.equals(right[i]))
    );
  }
}
