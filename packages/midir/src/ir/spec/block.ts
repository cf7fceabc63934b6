import { Instruction } from "./instruction.js";

/**
 * Basic block - phis, then straight-line instructions, then exactly one
 * terminator
 */
export interface Block {
  /** Unique block ID within its function */
  id: number;
  /** Label for printing (e.g. "entry", "endif") */
  name?: string;
  instructions: Instruction[];
}

export namespace Block {
  export function phis(block: Block): Instruction.Phi[] {
    const phis: Instruction.Phi[] = [];
    for (const inst of block.instructions) {
      if (!Instruction.isPhi(inst)) {
        break;
      }
      phis.push(inst);
    }
    return phis;
  }

  /**
   * The block's last instruction, if it is a terminator
   */
  export function terminator(block: Block): Instruction.Terminator | undefined {
    const last = block.instructions[block.instructions.length - 1];
    return last !== undefined && Instruction.isTerminator(last)
      ? last
      : undefined;
  }

  export function successors(block: Block): number[] {
    const term = terminator(block);
    return term ? Instruction.successors(term) : [];
  }
}
