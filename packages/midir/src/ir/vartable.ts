import type { IrLocation } from "#errors";

import type { Type } from "./spec/type.js";
import { Error as IrError, ErrorCode } from "./errors.js";

/**
 * Append-only table of SSA identities. An identity is its index; it is
 * assigned once, typed once and never reused.
 */
export class Vartable {
  private readonly vars: Vartable.Variable[] = [];

  /**
   * Allocate a fresh identity of the given type
   */
  declare(type: Type, name?: string): number {
    const id = this.vars.length;
    this.vars.push(name === undefined ? { type } : { type, name });
    return id;
  }

  has(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.vars.length;
  }

  /**
   * Type of a declared identity; `location` is attached to the error
   * thrown for an unknown one
   */
  typeOf(id: number, location?: IrLocation): Type {
    return this.lookup(id, location).type;
  }

  nameOf(id: number, location?: IrLocation): string | undefined {
    return this.lookup(id, location).name;
  }

  get size(): number {
    return this.vars.length;
  }

  *entries(): IterableIterator<[number, Vartable.Variable]> {
    for (let id = 0; id < this.vars.length; id++) {
      yield [id, this.vars[id]];
    }
  }

  private lookup(id: number, location?: IrLocation): Vartable.Variable {
    const variable = this.has(id) ? this.vars[id] : undefined;
    if (variable === undefined) {
      throw new IrError(ErrorCode.UNKNOWN_VARIABLE, `%${id}`, location);
    }
    return variable;
  }
}

export namespace Vartable {
  export interface Variable {
    readonly type: Type;
    /** Source name, for debugging */
    readonly name?: string;
  }
}
