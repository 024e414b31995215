import type { FunctionCode, Instruction } from "../binary/instructions.js";
import type { ValueType, WasmFunction } from "../binary/module.js";
import { signaturesEqual } from "../binary/module.js";
import { Opcode, memoryAccess, numericSignature, opcodeName, type MemoryAccess } from "../binary/opcodes.js";
import { createEnvironment, type ExecutionEnvironment, type ModuleInstance } from "../runtime/instance.js";
import { verifyFunction } from "../validation/verifier.js";
import { evalNumeric } from "./numeric.js";
import { Trap, type TrapReason } from "./trap.js";
import { defaultValue, f32, f64, i32, i64, type WasmValue } from "./values.js";

export type ThreadState = "stopped" | "running" | "paused" | "finished" | "trapped";

interface Label {
  arity: number;
  /** Operand stack height when the label was entered. */
  height: number;
  /** Instruction index a branch to this label continues at. */
  target: number;
}

interface Frame {
  fn: WasmFunction;
  code: FunctionCode;
  locals: WasmValue[];
  pc: number;
  labels: Label[];
  height: number;
}

/**
 * A single thread of execution over one module instance. Each `run()` call
 * executes at most `stepBound` instructions; a thread that hits the bound is
 * left `paused` and may be resumed by calling `run()` again.
 */
export class Thread {
  private stack: WasmValue[] = [];
  private frames: Frame[] = [];
  private current: ThreadState = "stopped";
  private trap: Trap | null = null;
  private result: WasmValue | undefined = undefined;
  private steps = 0;
  private offset = -1;

  constructor(private readonly interpreter: Interpreter) {}

  get state(): ThreadState {
    return this.current;
  }

  get lastTrap(): Trap | null {
    return this.trap;
  }

  get trapReason(): TrapReason | null {
    return this.trap?.reason ?? null;
  }

  get trapMessage(): string | null {
    return this.trap?.message ?? null;
  }

  /** Module offset of the instruction that trapped, or -1. */
  get trapOffset(): number {
    return this.trap?.offset ?? -1;
  }

  get stepsExecuted(): number {
    return this.steps;
  }

  reset(): void {
    this.stack = [];
    this.frames = [];
    this.current = "stopped";
    this.trap = null;
    this.result = undefined;
    this.steps = 0;
    this.offset = -1;
  }

  /** Queue a call to `funcIndex`. Argument checking is the caller's job. */
  pushFrame(funcIndex: number, args: readonly WasmValue[]): void {
    if (this.current !== "stopped") throw new Error(`cannot push a frame onto a ${this.current} thread`);
    const fn = this.interpreter.instance.module.functions[funcIndex];
    if (!fn) throw new Error(`function index ${funcIndex} out of range`);
    if (fn.imported) throw new Error(`function ${funcIndex} is imported`);
    this.enter(fn, [...args]);
  }

  /** Value left by the finished call, undefined for a void function. */
  getReturnValue(): WasmValue | undefined {
    return this.result;
  }

  run(): ThreadState {
    if (this.current !== "stopped" && this.current !== "paused") return this.current;
    this.current = "running";
    let budget = this.interpreter.instance.context.stepBound;
    try {
      while (this.frames.length > 0) {
        if (budget === 0) {
          this.current = "paused";
          return this.current;
        }
        budget--;
        this.steps++;
        this.step(this.frames[this.frames.length - 1]);
      }
    } catch (e) {
      if (e instanceof Trap) {
        this.trap = e.offset >= 0 ? e : new Trap(e.reason, this.offset);
        this.current = "trapped";
        return this.current;
      }
      throw e;
    }
    this.result = this.stack.length > 0 ? this.stack[this.stack.length - 1] : undefined;
    this.current = "finished";
    return this.current;
  }

  private enter(fn: WasmFunction, args: WasmValue[]): void {
    if (this.frames.length >= this.interpreter.instance.context.maxCallDepth) {
      throw new Trap("call-stack-exhausted", this.offset);
    }
    const code = this.interpreter.codeFor(fn);
    const locals = args;
    for (const t of code.locals) locals.push(defaultValue(t));
    this.frames.push({ fn, code, locals, pc: 0, labels: [], height: this.stack.length });
  }

  private call(fn: WasmFunction): void {
    if (fn.imported) throw new Trap("unlinked-import", this.offset);
    const args = this.popN(fn.signature.params.length);
    this.enter(fn, args);
  }

  private pop(): WasmValue {
    const v = this.stack.pop();
    if (!v) throw new Error(`operand stack underflow at 0x${this.offset.toString(16)}`);
    return v;
  }

  private popN(n: number): WasmValue[] {
    if (this.stack.length < n) throw new Error(`operand stack underflow at 0x${this.offset.toString(16)}`);
    return this.stack.splice(this.stack.length - n, n);
  }

  private popI32(): number {
    const v = this.pop();
    if (v.type !== "i32") throw new Error(`expected i32 on the stack, got ${v.type}`);
    return v.value;
  }

  private branch(frame: Frame, depth: number): void {
    if (depth === frame.labels.length) {
      this.doReturn(frame);
      return;
    }
    const label = frame.labels[frame.labels.length - 1 - depth];
    const values = this.popN(label.arity);
    this.stack.length = label.height;
    this.stack.push(...values);
    frame.labels.length -= depth + 1;
    frame.pc = label.target;
  }

  private doReturn(frame: Frame): void {
    const values = this.popN(frame.fn.signature.results.length);
    this.stack.length = frame.height;
    this.stack.push(...values);
    this.frames.pop();
  }

  private step(frame: Frame): void {
    const ins = frame.code.instructions[frame.pc];
    if (!ins) throw new Error(`fell off the end of function ${frame.fn.index}`);
    this.offset = ins.offset;
    frame.pc++;
    const instance = this.interpreter.instance;

    switch (ins.op) {
      case Opcode.Unreachable:
        throw new Trap("unreachable", ins.offset);
      case Opcode.Nop:
        return;
      case Opcode.Block:
        frame.labels.push({ arity: ins.results?.length ?? 0, height: this.stack.length, target: endOf(ins) + 1 });
        return;
      case Opcode.Loop:
        frame.labels.push({ arity: 0, height: this.stack.length, target: frame.pc - 1 });
        return;
      case Opcode.If: {
        const condition = this.popI32();
        const label = { arity: ins.results?.length ?? 0, height: this.stack.length, target: endOf(ins) + 1 };
        if (condition !== 0) {
          frame.labels.push(label);
        } else if (ins.elseAt !== undefined) {
          frame.labels.push(label);
          frame.pc = ins.elseAt + 1;
        } else {
          frame.pc = label.target;
        }
        return;
      }
      case Opcode.Else:
        frame.labels.pop();
        frame.pc = endOf(ins) + 1;
        return;
      case Opcode.End:
        if (frame.labels.length > 0) {
          frame.labels.pop();
        } else {
          this.doReturn(frame);
        }
        return;
      case Opcode.Br:
        this.branch(frame, ins.imm);
        return;
      case Opcode.BrIf:
        if (this.popI32() !== 0) this.branch(frame, ins.imm);
        return;
      case Opcode.BrTable: {
        const targets = ins.targets ?? [0];
        const index = this.popI32() >>> 0;
        this.branch(frame, index < targets.length - 1 ? targets[index] : targets[targets.length - 1]);
        return;
      }
      case Opcode.Return:
        this.doReturn(frame);
        return;
      case Opcode.Call: {
        const callee = instance.module.functions[ins.imm];
        if (!callee) throw new Error(`call to missing function ${ins.imm}`);
        this.call(callee);
        return;
      }
      case Opcode.CallIndirect: {
        const slot = this.popI32() >>> 0;
        const target = slot < instance.table.length ? instance.table[slot] : null;
        if (target === null) throw new Trap("undefined-element", ins.offset);
        const callee = instance.module.functions[target];
        const expected = instance.module.types[ins.imm];
        if (!callee || !expected || !signaturesEqual(callee.signature, expected)) {
          throw new Trap("indirect-call-signature-mismatch", ins.offset);
        }
        this.call(callee);
        return;
      }
      case Opcode.Drop:
        this.pop();
        return;
      case Opcode.Select: {
        const condition = this.popI32();
        const b = this.pop();
        const a = this.pop();
        this.stack.push(condition !== 0 ? a : b);
        return;
      }
      case Opcode.LocalGet:
        this.stack.push(frame.locals[ins.imm]);
        return;
      case Opcode.LocalSet:
        frame.locals[ins.imm] = this.pop();
        return;
      case Opcode.LocalTee:
        frame.locals[ins.imm] = this.stack[this.stack.length - 1];
        return;
      case Opcode.GlobalGet:
        this.stack.push(instance.globals.get(ins.imm));
        return;
      case Opcode.GlobalSet:
        instance.globals.set(ins.imm, this.pop());
        return;
      case Opcode.MemorySize:
        this.stack.push(i32(instance.memory.pages));
        return;
      case Opcode.MemoryGrow:
        this.stack.push(i32(instance.memory.grow(this.popI32() >>> 0)));
        return;
      case Opcode.I32Const:
        this.stack.push(i32(ins.imm));
        return;
      case Opcode.I64Const:
        this.stack.push(i64(ins.wide ?? 0n));
        return;
      case Opcode.F32Const:
        this.stack.push(f32(ins.imm));
        return;
      case Opcode.F64Const:
        this.stack.push(f64(ins.imm));
        return;
    }

    const access = memoryAccess(ins.op);
    if (access) {
      if (access.store) {
        this.store(ins, access);
      } else {
        this.stack.push(this.load(ins, access));
      }
      return;
    }

    const signature = numericSignature(ins.op);
    if (!signature) throw new Error(`cannot execute ${opcodeName(ins.op)}`);
    const operands = this.popN(signature.params.length);
    this.stack.push(evalNumeric(ins.op, operands, this.interpreter.asmJs));
  }

  /** Effective address, or -1 when the access is out of bounds. */
  private address(ins: Instruction, width: number): number {
    const base = this.popI32() >>> 0;
    const ea = base + ins.imm;
    return this.interpreter.instance.memory.inBounds(ea, width) ? ea : -1;
  }

  private load(ins: Instruction, access: MemoryAccess): WasmValue {
    const ea = this.address(ins, access.width);
    if (ea < 0) {
      if (this.interpreter.asmJs) return outOfBoundsRead(access.type);
      throw new Trap("memory-out-of-bounds", ins.offset);
    }
    const view = this.interpreter.instance.memory.view();
    switch (access.type) {
      case "f32":
        return f32(view.getFloat32(ea, true));
      case "f64":
        return f64(view.getFloat64(ea, true));
      case "i32":
        return i32(readInt(view, ea, access.width, access.signed));
      case "i64":
        if (access.width === 8) return i64(view.getBigInt64(ea, true));
        return i64(BigInt(readInt(view, ea, access.width, access.signed)));
    }
  }

  private store(ins: Instruction, access: MemoryAccess): void {
    const value = this.pop();
    const ea = this.address(ins, access.width);
    if (ea < 0) {
      if (this.interpreter.asmJs) return;
      throw new Trap("memory-out-of-bounds", ins.offset);
    }
    const view = this.interpreter.instance.memory.view();
    switch (value.type) {
      case "f32":
        view.setFloat32(ea, value.value, true);
        return;
      case "f64":
        view.setFloat64(ea, value.value, true);
        return;
      case "i32":
        writeInt(view, ea, access.width, value.value);
        return;
      case "i64":
        if (access.width === 8) {
          view.setBigInt64(ea, value.value, true);
        } else {
          writeInt(view, ea, access.width, Number(BigInt.asIntN(32, value.value)));
        }
        return;
    }
  }
}

/** asm.js heap reads past the end: integers read 0, floats NaN. */
function outOfBoundsRead(type: ValueType): WasmValue {
  if (type === "f32") return f32(NaN);
  if (type === "f64") return f64(NaN);
  return defaultValue(type);
}

function endOf(ins: Instruction): number {
  if (ins.endAt === undefined) throw new Error(`unmatched ${opcodeName(ins.op)} at 0x${ins.offset.toString(16)}`);
  return ins.endAt;
}

function readInt(view: DataView, ea: number, width: number, signed: boolean): number {
  switch (width) {
    case 1: return signed ? view.getInt8(ea) : view.getUint8(ea);
    case 2: return signed ? view.getInt16(ea, true) : view.getUint16(ea, true);
    default: return signed ? view.getInt32(ea, true) : view.getUint32(ea, true);
  }
}

function writeInt(view: DataView, ea: number, width: number, value: number): void {
  switch (width) {
    case 1: view.setUint8(ea, value & 0xff); return;
    case 2: view.setUint16(ea, value & 0xffff, true); return;
    default: view.setInt32(ea, value, true);
  }
}

/**
 * Bytecode interpreter bound to one module instance. Function bodies are
 * decoded and verified the first time they are called and cached after.
 */
export class Interpreter {
  readonly environment: ExecutionEnvironment;
  readonly asmJs: boolean;
  private readonly threads: Thread[];
  private readonly code = new Map<number, FunctionCode>();

  constructor(readonly instance: ModuleInstance) {
    this.environment = createEnvironment(instance.module, instance);
    this.asmJs = instance.module.origin === "asm-js";
    this.threads = [new Thread(this)];
  }

  get threadCount(): number {
    return this.threads.length;
  }

  getThread(id: number): Thread {
    const thread = this.threads[id];
    if (!thread) throw new Error(`no thread #${id}`);
    return thread;
  }

  /** Seed the cache with a body the caller already verified. */
  addVerifiedCode(funcIndex: number, code: FunctionCode): void {
    this.code.set(funcIndex, code);
  }

  codeFor(fn: WasmFunction): FunctionCode {
    const cached = this.code.get(fn.index);
    if (cached) return cached;
    const verified = verifyFunction(this.environment, fn);
    if (!verified.ok) {
      this.instance.context.logger.debug(`function ${fn.index}: ${verified.faults[0].message}`);
      throw new Trap("invalid-code", verified.faults[0].offset ?? -1);
    }
    this.code.set(fn.index, verified.value);
    return verified.value;
  }
}
