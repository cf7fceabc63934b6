/**
 * Ir validator - checks block layout, SSA form and references
 */

import type { IrLocation } from "#errors";
import { Result, Severity } from "#result";
import * as Ir from "#ir/spec";

import { Error as IrError, ErrorCode } from "../errors.js";

export class Validator {
  private messages: IrError[] = [];
  private location: IrLocation = {};

  /**
   * Check one function, or every function of a module
   */
  validate(target: Ir.Function | Ir.Module): Result<void, IrError> {
    this.messages = [];
    this.location = {};

    if ("functions" in target) {
      for (const func of target.functions.values()) {
        this.validateFunction(func);
      }
    } else {
      this.validateFunction(target);
    }

    const errors = this.messages.filter((m) => m.severity === Severity.Error);
    const warnings = this.messages.filter(
      (m) => m.severity === Severity.Warning,
    );
    const messages = {
      [Severity.Error]: errors,
      [Severity.Warning]: warnings,
    };
    return errors.length > 0
      ? Result.errWith(messages)
      : Result.okWith(undefined, messages);
  }

  private validateFunction(func: Ir.Function): void {
    this.location = { function: func.name };

    if (!func.blocks.has(func.entry)) {
      this.error(ErrorCode.UNKNOWN_BLOCK, `entry block#${func.entry}`);
      return;
    }

    const predecessors = this.collectPredecessors(func);
    const defined = new Set<number>();

    for (const [id, block] of func.blocks) {
      this.location = { function: func.name, block: id };
      if (block.id !== id) {
        this.error(
          ErrorCode.INTERNAL_ERROR,
          `block#${block.id} is stored under id ${id}`,
        );
      }
      this.validateLayout(block);
      this.validateDefinitions(func, block, defined);
      this.validatePhis(block, predecessors.get(id) ?? new Set());
    }

    for (const [id, block] of func.blocks) {
      this.location = { function: func.name, block: id };
      this.validateUses(func, block, defined);
    }

    this.location = { function: func.name };
    const reachable = this.reachableFrom(func);
    for (const id of func.blocks.keys()) {
      if (!reachable.has(id)) {
        this.location = { function: func.name, block: id };
        this.warning(ErrorCode.UNREACHABLE_BLOCK, `block#${id}`);
      }
    }
  }

  // phis, then non-terminators, then exactly one terminator
  private validateLayout(block: Ir.Block): void {
    if (block.instructions.length === 0) {
      this.error(ErrorCode.EMPTY_BLOCK);
      return;
    }

    let seenNonPhi = false;
    block.instructions.forEach((inst, index) => {
      const last = index === block.instructions.length - 1;
      this.at(index);

      if (Ir.Instruction.isPhi(inst)) {
        if (seenNonPhi) {
          this.error(ErrorCode.MISPLACED_PHI, `%${inst.result}`);
        }
        return;
      }
      seenNonPhi = true;

      if (Ir.Instruction.isTerminator(inst) && !last) {
        this.error(ErrorCode.MISPLACED_TERMINATOR, inst.kind);
      }
      if (!Ir.Instruction.isTerminator(inst) && last) {
        this.error(ErrorCode.MISSING_TERMINATOR, `ends with ${inst.kind}`);
      }
    });
    this.at(undefined);

    const last = block.instructions[block.instructions.length - 1];
    if (last !== undefined && Ir.Instruction.isPhi(last)) {
      this.error(ErrorCode.MISSING_TERMINATOR, "ends with phi");
    }
  }

  private validateDefinitions(
    func: Ir.Function,
    block: Ir.Block,
    defined: Set<number>,
  ): void {
    block.instructions.forEach((inst, index) => {
      this.at(index);
      for (const id of Ir.Instruction.definitions(inst)) {
        if (!func.vartable.has(id)) {
          this.error(ErrorCode.UNKNOWN_VARIABLE, `%${id}`);
        }
        if (defined.has(id)) {
          this.error(ErrorCode.DUPLICATE_DEFINITION, `%${id}`);
        }
        defined.add(id);
      }
    });
    this.at(undefined);
  }

  private validateUses(
    func: Ir.Function,
    block: Ir.Block,
    defined: Set<number>,
  ): void {
    block.instructions.forEach((inst, index) => {
      this.at(index);
      for (const operand of Ir.Instruction.operands(inst)) {
        const id = Ir.Operand.variable(operand);
        if (id === undefined) continue;
        if (!func.vartable.has(id)) {
          this.error(ErrorCode.UNKNOWN_VARIABLE, `%${id}`);
        } else if (!defined.has(id)) {
          this.error(ErrorCode.UNDEFINED_VARIABLE, `%${id}`);
        }
      }

      if (Ir.Instruction.isTerminator(inst)) {
        for (const target of Ir.Instruction.successors(inst)) {
          if (!func.blocks.has(target)) {
            this.error(ErrorCode.UNKNOWN_BLOCK, `block#${target}`);
          }
        }
      }
    });
    this.at(undefined);
  }

  private validatePhis(block: Ir.Block, predecessors: Set<number>): void {
    const phis = Ir.Block.phis(block);
    phis.forEach((phi, index) => {
      this.at(index);
      const covered = new Set<number>();
      for (const input of phi.inputs) {
        if (!predecessors.has(input.block)) {
          this.error(
            ErrorCode.INVALID_PHI_INPUT,
            `%${phi.result} from block#${input.block}`,
          );
        } else if (covered.has(input.block)) {
          this.error(
            ErrorCode.DUPLICATE_PHI_INPUT,
            `%${phi.result} from block#${input.block}`,
          );
        }
        covered.add(input.block);
      }
      for (const pred of predecessors) {
        if (!covered.has(pred)) {
          this.warning(
            ErrorCode.INCOMPLETE_PHI,
            `%${phi.result} has no input from block#${pred}`,
          );
        }
      }
    });
    this.at(undefined);
  }

  private collectPredecessors(func: Ir.Function): Map<number, Set<number>> {
    const predecessors = new Map<number, Set<number>>();
    for (const [id, block] of func.blocks) {
      for (const succ of Ir.Block.successors(block)) {
        const preds = predecessors.get(succ) ?? new Set<number>();
        preds.add(id);
        predecessors.set(succ, preds);
      }
    }
    return predecessors;
  }

  private reachableFrom(func: Ir.Function): Set<number> {
    const reachable = new Set<number>();
    const worklist = [func.entry];
    let next = worklist.pop();
    while (next !== undefined) {
      const block = func.blocks.get(next);
      if (!reachable.has(next) && block) {
        reachable.add(next);
        worklist.push(...Ir.Block.successors(block));
      }
      next = worklist.pop();
    }
    return reachable;
  }

  private at(instruction: number | undefined): void {
    const { function: fn, block } = this.location;
    this.location =
      instruction === undefined
        ? { function: fn, block }
        : { function: fn, block, instruction };
  }

  private error(code: ErrorCode, detail?: string): void {
    this.messages.push(new IrError(code, detail, { ...this.location }));
  }

  private warning(code: ErrorCode, detail?: string): void {
    this.messages.push(
      new IrError(code, detail, { ...this.location }, Severity.Warning),
    );
  }
}

/**
 * Throw the first error of a failed validation
 */
export function assertWellFormed(target: Ir.Function | Ir.Module): void {
  const result = new Validator().validate(target);
  if (!result.success) {
    const [first] = Result.errors(result);
    if (first) {
      throw first;
    }
  }
}
