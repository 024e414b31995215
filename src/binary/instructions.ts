import type { ValueType } from "./module.js";
import { Opcode, memoryAccess, numericSignature, valueTypeFromByte } from "./opcodes.js";
import { ByteReader } from "./reader.js";

export const MAX_FUNCTION_LOCALS = 50000;

export interface Instruction {
  op: Opcode;
  /** Absolute offset of the opcode byte. */
  offset: number;
  /** Index, branch depth, constant value or memarg offset, depending on `op`. */
  imm: number;
  /** Memarg alignment exponent. */
  imm2: number;
  wide?: bigint;
  /** Result types of block, loop and if. */
  results?: readonly ValueType[];
  /** br_table targets, default target last. */
  targets?: readonly number[];
  elseAt?: number;
  endAt?: number;
}

export interface FunctionCode {
  /** Declared locals, parameters excluded. */
  locals: ValueType[];
  instructions: Instruction[];
}

function readValueType(r: ByteReader): ValueType {
  const offset = r.pos;
  const t = valueTypeFromByte(r.u8());
  if (!t) throw r.error("invalid value type", offset);
  return t;
}

function readBlockType(r: ByteReader): ValueType[] {
  const offset = r.pos;
  const byte = r.u8();
  if (byte === 0x40) return [];
  const t = valueTypeFromByte(byte);
  if (!t) throw r.error(`unsupported block type 0x${byte.toString(16)}`, offset);
  return [t];
}

function readZeroByte(r: ByteReader): void {
  const offset = r.pos;
  if (r.u8() !== 0) throw r.error("zero byte expected", offset);
}

/**
 * Decode one function body (local declarations plus expression) into a flat
 * instruction list. Structured control is matched here: every block, loop and
 * if records the index of its `end`, an if records its `else`, and an else
 * records the `end` it shares with its if.
 */
export function parseFunctionBody(bytes: Uint8Array, start: number, end: number): FunctionCode {
  const r = new ByteReader(bytes, start, end);
  const locals: ValueType[] = [];

  const groups = r.varU32();
  for (let g = 0; g < groups; g++) {
    const countOffset = r.pos;
    const count = r.varU32();
    if (locals.length + count > MAX_FUNCTION_LOCALS) {
      throw r.error("too many locals", countOffset);
    }
    const type = readValueType(r);
    for (let i = 0; i < count; i++) locals.push(type);
  }

  const instructions: Instruction[] = [];
  const open: { index: number; elseIndex: number }[] = [];
  let closed = false;

  while (!r.atEnd()) {
    if (closed) throw r.error("operators remaining after end of function");
    const offset = r.pos;
    const op = r.u8();
    const ins: Instruction = { op, offset, imm: 0, imm2: 0 };

    switch (op) {
      case Opcode.Block:
      case Opcode.Loop:
      case Opcode.If:
        ins.results = readBlockType(r);
        open.push({ index: instructions.length, elseIndex: -1 });
        break;
      case Opcode.Else: {
        const top = open[open.length - 1];
        if (!top || instructions[top.index].op !== Opcode.If || top.elseIndex >= 0) {
          throw r.error("else does not match an if", offset);
        }
        top.elseIndex = instructions.length;
        instructions[top.index].elseAt = instructions.length;
        break;
      }
      case Opcode.End: {
        const top = open.pop();
        if (top) {
          instructions[top.index].endAt = instructions.length;
          if (top.elseIndex >= 0) instructions[top.elseIndex].endAt = instructions.length;
        } else {
          closed = true;
        }
        break;
      }
      case Opcode.Br:
      case Opcode.BrIf:
      case Opcode.Call:
      case Opcode.LocalGet:
      case Opcode.LocalSet:
      case Opcode.LocalTee:
      case Opcode.GlobalGet:
      case Opcode.GlobalSet:
        ins.imm = r.varU32();
        break;
      case Opcode.BrTable: {
        const count = r.varU32();
        if (count > r.remaining) throw r.error("br_table length exceeds body", offset);
        const targets: number[] = [];
        for (let i = 0; i <= count; i++) targets.push(r.varU32());
        ins.targets = targets;
        break;
      }
      case Opcode.CallIndirect:
        ins.imm = r.varU32();
        readZeroByte(r);
        break;
      case Opcode.MemorySize:
      case Opcode.MemoryGrow:
        readZeroByte(r);
        break;
      case Opcode.I32Const:
        ins.imm = r.varS32();
        break;
      case Opcode.I64Const:
        ins.wide = r.varS64();
        break;
      case Opcode.F32Const:
        ins.imm = r.f32();
        break;
      case Opcode.F64Const:
        ins.imm = r.f64();
        break;
      case Opcode.Unreachable:
      case Opcode.Nop:
      case Opcode.Return:
      case Opcode.Drop:
      case Opcode.Select:
        break;
      default:
        if (memoryAccess(op)) {
          ins.imm2 = r.varU32();
          ins.imm = r.varU32();
        } else if (!numericSignature(op)) {
          throw r.error(`invalid opcode 0x${op.toString(16).padStart(2, "0")}`, offset);
        }
    }
    instructions.push(ins);
  }

  if (!closed) throw r.error("function body must end with end opcode");
  return { locals, instructions };
}
