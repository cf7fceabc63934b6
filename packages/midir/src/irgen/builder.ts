import * as Ir from "#ir";
import type { Type as SourceType } from "#types";
import type { Target } from "#target";
import type { IrLocation } from "#errors";
import { Result } from "#result";

import { Error as IrgenError, ErrorCode } from "./errors.js";
import { fromSourceType } from "./type.js";

/**
 * Incrementally builds one Ir function.
 *
 * Blocks are numbered in creation order and the first block created is
 * the entry. Emission keeps each block in phis / body / terminator order
 * and refuses anything that would break it.
 */
export class FunctionBuilder {
  readonly vartable = new Ir.Vartable();
  readonly params: Ir.Type[];
  readonly returns: Ir.Type[];

  private readonly blocks = new Map<number, Ir.Block>();
  private current: number | undefined;

  constructor(private readonly options: FunctionBuilder.Options) {
    const location = this.location();
    this.params = (options.params ?? []).map((type) =>
      fromSourceType(type, options.target, location),
    );
    this.returns = (options.returns ?? []).map((type) =>
      fromSourceType(type, options.target, location),
    );
  }

  get target(): Target {
    return this.options.target;
  }

  get currentBlock(): number | undefined {
    return this.current;
  }

  declare(type: Ir.Type, name?: string): number {
    return this.vartable.declare(type, name);
  }

  /**
   * Declare a variable of a source type, lowered for this target
   */
  declareSource(type: SourceType, name?: string): number {
    return this.vartable.declare(
      fromSourceType(type, this.target, this.location()),
      name,
    );
  }

  typeOf(id: number): Ir.Type {
    return this.vartable.typeOf(id, this.location());
  }

  createBlock(name?: string): number {
    const id = this.blocks.size;
    this.blocks.set(
      id,
      name === undefined ? { id, instructions: [] } : { id, name, instructions: [] },
    );
    return id;
  }

  switchToBlock(id: number): void {
    if (!this.blocks.has(id)) {
      throw new IrgenError(
        ErrorCode.UNKNOWN_BLOCK,
        `block#${id}`,
        this.location(),
      );
    }
    this.current = id;
  }

  isTerminated(id: number | undefined = this.current): boolean {
    const block = id === undefined ? undefined : this.blocks.get(id);
    return block !== undefined && Ir.Block.terminator(block) !== undefined;
  }

  emit(inst: Ir.Instruction): void {
    const block =
      this.current === undefined ? undefined : this.blocks.get(this.current);
    if (block === undefined) {
      throw new IrgenError(
        ErrorCode.NO_CURRENT_BLOCK,
        inst.kind,
        this.location(),
      );
    }

    const location = {
      function: this.options.name,
      block: block.id,
      instruction: block.instructions.length,
    };
    if (Ir.Block.terminator(block) !== undefined) {
      throw new IrgenError(
        ErrorCode.INVALID_EMIT,
        `${inst.kind} after terminator`,
        location,
      );
    }
    const last = block.instructions[block.instructions.length - 1];
    if (
      Ir.Instruction.isPhi(inst) &&
      last !== undefined &&
      !Ir.Instruction.isPhi(last)
    ) {
      throw new IrgenError(
        ErrorCode.INVALID_EMIT,
        `phi %${inst.result} after ${last.kind}`,
        location,
      );
    }

    block.instructions.push(inst);
  }

  /**
   * Bind a fresh variable to an expression and return its identity
   */
  set(expression: Ir.Expression, type: Ir.Type, name?: string): number {
    const result = this.declare(type, name);
    this.emit({ kind: "set", result, expression });
    return result;
  }

  phi(type: Ir.Type, inputs: Ir.PhiInput[], name?: string): number {
    const result = this.declare(type, name);
    this.emit({ kind: "phi", result, inputs });
    return result;
  }

  // Function and selected block, for errors raised while building
  private location(): IrLocation {
    return this.current === undefined
      ? { function: this.options.name }
      : { function: this.options.name, block: this.current };
  }

  /**
   * Assemble the function and check it is well-formed
   */
  finish(): Result<Ir.Function, Ir.Error> {
    const func: Ir.Function = {
      id: this.options.id,
      name: this.options.name,
      params: this.params,
      returns: this.returns,
      entry: 0,
      blocks: new Map(this.blocks),
      vartable: this.vartable,
    };

    const validation = new Ir.Analysis.Validator().validate(func);
    return Result.map(validation, () => func);
  }
}

export namespace FunctionBuilder {
  export interface Options {
    target: Target;
    /** Function number within the compiled unit */
    id: number;
    name: string;
    params?: SourceType[];
    returns?: SourceType[];
  }
}
