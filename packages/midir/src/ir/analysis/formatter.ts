/**
 * Ir formatter for canonical text output
 *
 * The text is compared byte-for-byte by tests and tooling, so every
 * variant has exactly one rendering. Byte casts print as
 * `(cast_bytes x as T)`, apart from integer casts `(cast x as T)`, so the
 * two never share a line of output.
 */

import { bytesToHex } from "ethereum-cryptography/utils";

import { assertExhausted } from "#errors";
import type { IrLocation } from "#errors";
import * as Ir from "#ir/spec";

import { Error as IrError, ErrorCode } from "../errors.js";

export class Formatter {
  private indent = 0;
  private output: string[] = [];
  private location: IrLocation = {};

  format(module: Ir.Module): string {
    return this.render(() => {
      this.line(`module ${module.name} (${module.target.name}) {`);
      this.indent++;

      const functions = [...module.functions.values()];
      functions.forEach((func, index) => {
        if (index > 0) {
          this.line("");
        }
        this.writeFunction(func);
      });

      this.indent--;
      this.line("}");
    });
  }

  formatFunction(func: Ir.Function): string {
    return this.render(() => this.writeFunction(func));
  }

  formatBlock(block: Ir.Block): string {
    return this.render(() => this.writeBlock(block));
  }

  formatType(type: Ir.Type): string {
    switch (type.kind) {
      case "bool":
        return "bool";
      case "int":
      case "uint":
      case "bytes":
        return `${type.kind}${type.width}`;
      case "ptr":
        return `ptr<${this.formatType(type.pointee)}>`;
      case "storage_ptr":
        return type.immutable
          ? `const_storage_ptr<${this.formatType(type.pointee)}>`
          : `storage_ptr<${this.formatType(type.pointee)}>`;
      case "function": {
        const params = type.params.map((p) => this.formatType(p)).join(", ");
        const returns = type.returns.map((r) => this.formatType(r)).join(", ");
        return `fn(${params}) -> (${returns})`;
      }
      case "mapping":
        return `mapping<${this.formatType(type.key)} -> ${this.formatType(type.value)}>`;
      case "array":
        return (
          this.formatType(type.element) +
          type.dimensions.map((dim) => this.formatDimension(dim)).join("")
        );
      case "struct":
        return `struct.${this.formatStructTag(type.tag)}`;
      case "slice":
        return `slice<${this.formatType(type.element)}>`;
      default:
        return assertExhausted(type);
    }
  }

  formatOperand(operand: Ir.Operand): string {
    switch (operand.kind) {
      case "id":
        return `%${operand.id}`;
      case "number":
        return `${this.formatType(operand.type)}(${operand.value})`;
      case "bool":
        return `${operand.value}`;
      default:
        return assertExhausted(operand);
    }
  }

  formatExpression(expr: Ir.Expression): string {
    switch (expr.kind) {
      case "binary":
        return `${this.formatOperand(expr.left)} ${this.formatBinaryOp(expr.operator)} ${this.formatOperand(expr.right)}`;
      case "unary":
        return `${this.formatUnaryOp(expr.operator)}${this.formatOperand(expr.operand)}`;
      case "number":
        return `${this.formatType(expr.type)}(${expr.value})`;
      case "bool":
        return `${expr.value}`;
      case "bytes": {
        const hex = Array.from(expr.value, (byte) => hexByte(byte)).join("_");
        return `${this.formatType(expr.type)} hex"${hex}"`;
      }
      case "array":
        return `${this.formatType(expr.type)} [${this.formatOperands(expr.values)}]`;
      case "const_array":
        return `const ${this.formatType(expr.type)} [${this.formatOperands(expr.values)}]`;
      case "struct":
        return `struct { ${this.formatOperands(expr.values)} }`;
      case "id":
        return `%${expr.id}`;
      case "get_ref":
        return `&${this.formatOperand(expr.operand)}`;
      case "load":
        return `*${this.formatOperand(expr.operand)}`;
      case "struct_member":
        return `${this.formatOperand(expr.operand)}->${expr.member}`;
      case "subscript":
        return `${this.formatOperand(expr.array)}[${this.formatOperand(expr.index)}]`;
      case "advance_pointer":
        return `ptr_add(${this.formatOperand(expr.pointer)}, ${this.formatOperand(expr.offset)})`;
      case "cast":
        return `(cast ${this.formatOperand(expr.operand)} as ${this.formatType(expr.to)})`;
      case "bytes_cast":
        return `(cast_bytes ${this.formatOperand(expr.operand)} as ${this.formatType(expr.to)})`;
      case "sign_ext":
        return `(sext ${this.formatOperand(expr.operand)} to ${this.formatType(expr.to)})`;
      case "zero_ext":
        return `(zext ${this.formatOperand(expr.operand)} to ${this.formatType(expr.to)})`;
      case "trunc":
        return `(trunc ${this.formatOperand(expr.operand)} to ${this.formatType(expr.to)})`;
      case "alloc_dynamic_bytes":
        return this.formatAlloc(expr);
      case "keccak256":
        return `keccak256(${this.formatOperands(expr.args)})`;
      case "string_compare":
        return `strcmp(${this.formatStringLocation(expr.left)}, ${this.formatStringLocation(expr.right)})`;
      case "string_concat":
        return `strcat(${this.formatStringLocation(expr.left)}, ${this.formatStringLocation(expr.right)})`;
      case "storage_array_length":
        return `storage_arr_len(${this.formatOperand(expr.array)})`;
      case "format_string": {
        const args = expr.args.map(([spec, operand]) => {
          const text = this.formatOperand(operand);
          switch (spec) {
            case "default":
              return text;
            case "binary":
              return `:b ${text}`;
            case "hex":
              return `:x ${text}`;
            default:
              return assertExhausted(spec);
          }
        });
        return `fmt_str(${args.join(", ")})`;
      }
      case "function_arg":
        return `arg#${expr.index}`;
      case "internal_function_cfg":
        return `function#${expr.function}`;
      case "return_data":
        return "(extern_call_ret_data)";
      default:
        return assertExhausted(expr);
    }
  }

  formatInstruction(inst: Ir.Instruction): string {
    switch (inst.kind) {
      case "nop":
        return "nop;";
      case "set":
        return `%${inst.result} = ${this.formatExpression(inst.expression)};`;
      case "store":
        return `store ${this.formatOperand(inst.data)} to ${this.formatOperand(inst.dest)};`;
      case "load_storage":
        return `%${inst.result} = load_storage ${this.formatOperand(inst.storage)};`;
      case "clear_storage":
        return `clear_storage ${this.formatOperand(inst.storage)};`;
      case "set_storage":
        return `set_storage ${this.formatOperand(inst.storage)} ${this.formatOperand(inst.value)};`;
      case "set_storage_bytes":
        return `set_storage_bytes ${this.formatOperand(inst.storage)} offset:${this.formatOperand(inst.offset)} value:${this.formatOperand(inst.value)};`;
      case "push_storage":
        return `%${inst.result} = push_storage ${this.formatOperand(inst.storage)} ${this.formatOptional(inst.value)};`;
      case "pop_storage":
        return inst.result === undefined
          ? `pop_storage ${this.formatOperand(inst.storage)};`
          : `%${inst.result} = pop_storage ${this.formatOperand(inst.storage)};`;
      case "push_memory":
        return `%${inst.result} = push_mem %${inst.array} ${this.formatOperand(inst.value)};`;
      case "pop_memory":
        return `%${inst.result} = pop_mem %${inst.array};`;
      case "mem_copy":
        return `memcopy ${this.formatOperand(inst.source)} to ${this.formatOperand(inst.dest)} for ${this.formatOperand(inst.bytes)} bytes;`;
      case "write_buffer":
        return `write_buf ${this.formatOperand(inst.buffer)} offset:${this.formatOperand(inst.offset)} value:${this.formatOperand(inst.value)};`;
      case "print":
        return `print ${this.formatOperand(inst.operand)};`;
      case "emit_event":
        return `emit event#${inst.event} to topics[${this.formatOperands(inst.topics)}], data: ${this.formatOperand(inst.data)};`;
      case "call":
        return `${this.formatResults(inst.results)}call ${this.formatCallTarget(inst.callee)}(${this.formatOperands(inst.args)});`;
      case "external_call":
        return this.formatExternalCall(inst);
      case "constructor":
        return this.formatConstructor(inst);
      case "value_transfer":
        return `${this.formatResults(inst.success === undefined ? [] : [inst.success])}transfer ${this.formatOperand(inst.value)} to ${this.formatOperand(inst.address)};`;
      case "self_destruct":
        return `self_destruct ${this.formatOperand(inst.recipient)};`;
      case "branch":
        return `br block#${inst.block};`;
      case "branch_cond":
        return `cbr ${this.formatOperand(inst.condition)} block#${inst.trueBlock} else block#${inst.falseBlock};`;
      case "switch": {
        const cases = inst.cases
          .map(([value, block]) => `${this.formatOperand(value)} => block#${block}`)
          .join(", ");
        return `switch ${this.formatOperand(inst.condition)} cases: [${cases}] default: block#${inst.defaultBlock};`;
      }
      case "return":
        return inst.values.length === 0
          ? "return;"
          : `return ${this.formatOperands(inst.values)};`;
      case "return_data":
        return `return_data ${this.formatOperand(inst.data)} of length ${this.formatOperand(inst.length)};`;
      case "return_code":
        return `return_code "${Ir.Instruction.ReturnCode.descriptions[inst.code]}";`;
      case "assert_failure":
        return inst.encodedArgs === undefined
          ? "assert_failure;"
          : `assert_failure ${this.formatOperand(inst.encodedArgs)};`;
      case "unimplemented":
        return inst.reachable
          ? "unimplemented: reachable;"
          : "unimplemented: unreachable;";
      case "phi": {
        const inputs = inst.inputs
          .map((input) => `[${this.formatOperand(input.operand)}, block#${input.block}]`)
          .join(", ");
        return `%${inst.result} = phi ${inputs};`;
      }
      default:
        return assertExhausted(inst);
    }
  }

  private writeFunction(func: Ir.Function): void {
    this.location = { function: func.name };

    const params = func.params.map((p) => this.formatType(p)).join(", ");
    const returns = func.returns.map((r) => this.formatType(r)).join(", ");
    this.line(`function#${func.id} ${func.name}(${params}) -> (${returns}) {`);
    this.indent++;

    if (func.vartable.size > 0) {
      this.line("vars {");
      this.indent++;
      for (const [id, variable] of func.vartable.entries()) {
        const name = variable.name === undefined ? "" : ` ${variable.name}`;
        this.line(`%${id}: ${this.formatType(variable.type)}${name}`);
      }
      this.indent--;
      this.line("}");
    }

    for (const blockId of this.topologicalSort(func)) {
      const block = func.blocks.get(blockId);
      if (block) {
        this.writeBlock(block);
      }
    }

    this.indent--;
    this.line("}");
  }

  private writeBlock(block: Ir.Block): void {
    this.location = { ...this.location, block: block.id };

    const label = block.name === undefined ? "" : ` ${block.name}`;
    this.line(`block#${block.id}${label}:`);
    this.indent++;
    block.instructions.forEach((inst, index) => {
      this.location = { ...this.location, instruction: index };
      this.line(this.formatInstruction(inst));
    });
    this.indent--;

    const { function: fn } = this.location;
    this.location = fn === undefined ? {} : { function: fn };
  }

  private formatExternalCall(inst: Ir.Instruction.ExternalCall): string {
    const contractFunction = inst.contractFunction
      ? `contract_function:(${inst.contractFunction.contract}, ${inst.contractFunction.function})`
      : "_";
    const slots = [
      `[${inst.callType}]`,
      this.formatLabelled("address", inst.address),
      `payload:${this.formatOperand(inst.payload)}`,
      `value:${this.formatOperand(inst.value)}`,
      `gas:${this.formatOperand(inst.gas)}`,
      this.formatLabelled("accounts", inst.accounts),
      this.formatLabelled("seeds", inst.seeds),
      contractFunction,
      this.formatLabelled("flags", inst.flags),
    ];
    const results = inst.success === undefined ? [] : [inst.success];
    return `${this.formatResults(results)}call_ext ${slots.join(" ")};`;
  }

  private formatConstructor(inst: Ir.Instruction.Constructor): string {
    const results =
      inst.success === undefined ? [inst.result] : [inst.result, inst.success];
    const constructorNo =
      inst.constructorId === undefined ? "_" : `${inst.constructorId}`;
    const slots = [
      `constructor(no: ${constructorNo}, contract_no:${inst.contractId})`,
      this.formatLabelled("salt", inst.salt),
      this.formatLabelled("value", inst.value),
      `gas:${this.formatOperand(inst.gas)}`,
      this.formatLabelled("address", inst.address),
      this.formatLabelled("seeds", inst.seeds),
      `encoded-buffer:${this.formatOperand(inst.encodedArgs)}`,
      this.formatLabelled("accounts", inst.accounts),
    ];
    return `${this.formatResults(results)}${slots.join(" ")};`;
  }

  private formatAlloc(expr: Ir.Expression.AllocDynamicBytes): string {
    if (expr.type.kind !== "ptr") {
      throw new IrError(
        ErrorCode.UNSUPPORTED_PRINT,
        `alloc_dynamic_bytes of non-pointer type ${this.formatType(expr.type)}`,
        { ...this.location },
      );
    }

    const alloc = `alloc ${this.formatType(expr.type.pointee)}[${this.formatOperand(expr.size)}]`;
    if (expr.initializer === undefined) {
      return alloc;
    }
    const bytes = Array.from(expr.initializer, (byte) => hexByte(byte));
    return `${alloc} {${bytes.join(", ")}}`;
  }

  private formatStringLocation(location: Ir.StringLocation): string {
    switch (location.kind) {
      case "compile_time":
        return `"[${Array.from(location.bytes).join(", ")}]"`;
      case "run_time":
        return this.formatOperand(location.operand);
      default:
        return assertExhausted(location);
    }
  }

  private formatCallTarget(target: Ir.Instruction.CallTarget): string {
    switch (target.kind) {
      case "static":
        return `function#${target.function}`;
      case "builtin":
        return `builtin#${target.builtin}`;
      case "dynamic":
        return this.formatOperand(target.callee);
      default:
        return assertExhausted(target);
    }
  }

  private formatBinaryOp(op: Ir.BinaryOperator): string {
    switch (op.kind) {
      case "add":
        return op.overflowing ? "(of)+" : "+";
      case "sub":
        return op.overflowing ? "(of)-" : "-";
      case "mul":
        return op.overflowing ? "(of)*" : "*";
      case "pow":
        return op.overflowing ? "(of)**" : "**";
      case "udiv":
        return "(u)/";
      case "sdiv":
        return "(s)/";
      case "umod":
        return "(u)%";
      case "smod":
        return "(s)%";
      case "eq":
        return "==";
      case "neq":
        return "!=";
      case "slt":
        return "(s)<";
      case "ult":
        return "(u)<";
      case "slte":
        return "(s)<=";
      case "ulte":
        return "(u)<=";
      case "sgt":
        return "(s)>";
      case "ugt":
        return "(u)>";
      case "sgte":
        return "(s)>=";
      case "ugte":
        return "(u)>=";
      case "bit_and":
        return "&";
      case "bit_or":
        return "|";
      case "bit_xor":
        return "^";
      case "shl":
        return "<<";
      case "sshr":
        return "(s)>>";
      case "ushr":
        return "(u)>>";
      default:
        return assertExhausted(op);
    }
  }

  private formatUnaryOp(op: Ir.UnaryOperator): string {
    switch (op.kind) {
      case "not":
        return "!";
      case "neg":
        return op.overflowing ? "(of)-" : "-";
      case "bit_not":
        return "~";
      default:
        return assertExhausted(op);
    }
  }

  private formatDimension(dim: Ir.Type.ArrayLength): string {
    switch (dim.kind) {
      case "fixed":
        return `[${dim.length}]`;
      case "dynamic":
        return "[]";
      case "any_fixed":
        return "[?]";
      default:
        return assertExhausted(dim);
    }
  }

  private formatStructTag(tag: Ir.Type.StructTag): string {
    switch (tag.kind) {
      case "user_defined":
        return `${tag.id}`;
      case "account_info":
        return "SolAccountInfo";
      case "account_meta":
        return "SolAccountMeta";
      case "parameters":
        return "SolParameters";
      case "external_function":
        return "ExternalFunction";
      case "vector":
        return `vector<${this.formatType(tag.element)}>`;
      default:
        return assertExhausted(tag);
    }
  }

  private formatOperands(operands: Ir.Operand[]): string {
    return operands.map((operand) => this.formatOperand(operand)).join(", ");
  }

  // Absent optional slots keep their position as a bare `_`
  private formatOptional(operand: Ir.Operand | undefined): string {
    return operand === undefined ? "_" : this.formatOperand(operand);
  }

  private formatLabelled(label: string, operand: Ir.Operand | undefined): string {
    return operand === undefined ? "_" : `${label}:${this.formatOperand(operand)}`;
  }

  private formatResults(results: number[]): string {
    return results.length === 0
      ? ""
      : `${results.map((id) => `%${id}`).join(", ")} = `;
  }

  private topologicalSort(func: Ir.Function): number[] {
    const visited = new Set<number>();
    const result: number[] = [];

    // Post-order walk, last successor first so the reversed order keeps
    // fallthrough targets in field order
    const stack: { id: number; pending: number[] }[] = [];
    const enter = (blockId: number): void => {
      if (visited.has(blockId)) return;
      visited.add(blockId);

      const block = func.blocks.get(blockId);
      if (!block) return;
      stack.push({ id: blockId, pending: Ir.Block.successors(block) });
    };

    enter(func.entry);
    let frame = stack[stack.length - 1];
    while (frame !== undefined) {
      const next = frame.pending.pop();
      if (next === undefined) {
        stack.pop();
        result.push(frame.id);
      } else {
        enter(next);
      }
      frame = stack[stack.length - 1];
    }

    const unreachable: number[] = [];
    for (const blockId of func.blocks.keys()) {
      if (!visited.has(blockId)) {
        unreachable.push(blockId);
        visited.add(blockId);
      }
    }

    return [...result.reverse(), ...unreachable];
  }

  // Each entry point starts from a clean state, and leaves one behind
  // even when printing throws
  private render(write: () => void): string {
    this.output = [];
    this.indent = 0;
    this.location = {};
    try {
      write();
      return this.output.join("\n");
    } finally {
      this.location = {};
    }
  }

  private line(text: string): void {
    this.output.push(text === "" ? "" : "  ".repeat(this.indent) + text);
  }
}

function hexByte(byte: number): string {
  return bytesToHex(Uint8Array.of(byte));
}
