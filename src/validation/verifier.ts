import type { FunctionBody } from "../binary/body.js";
import { sliceFunctionBody } from "../binary/body.js";
import type { FunctionCode, Instruction } from "../binary/instructions.js";
import { parseFunctionBody } from "../binary/instructions.js";
import type { FuncSignature, ValueType, WasmFunction } from "../binary/module.js";
import { Opcode, memoryAccess, numericSignature, opcodeName } from "../binary/opcodes.js";
import { DecodeError } from "../binary/reader.js";
import type { Result } from "../errors/fault.js";
import { fault, fail, ok } from "../errors/fault.js";
import type { ExecutionEnvironment } from "../runtime/instance.js";

type StackType = ValueType | "unknown";

interface ControlFrame {
  op: Opcode;
  results: readonly ValueType[];
  height: number;
  unreachable: boolean;
}

class VerifyError extends Error {
  constructor(message: string, readonly offset: number) {
    super(message);
    this.name = "VerifyError";
  }
}

/**
 * Operand-stack and control-stack typing for one function body, following
 * the standard WebAssembly validation algorithm.
 */
class FunctionVerifier {
  private vals: StackType[] = [];
  private ctrls: ControlFrame[] = [];
  private localTypes: ValueType[] = [];
  private at = 0;

  constructor(
    private readonly env: ExecutionEnvironment,
    private readonly signature: FuncSignature,
  ) {}

  verify(code: FunctionCode): void {
    this.localTypes = [...this.signature.params, ...code.locals];
    this.ctrls.push({ op: Opcode.Block, results: this.signature.results, height: 0, unreachable: false });
    for (const ins of code.instructions) {
      this.at = ins.offset;
      this.step(ins);
    }
  }

  private fail(message: string): never {
    throw new VerifyError(message, this.at);
  }

  private push(t: StackType): void {
    this.vals.push(t);
  }

  private pop(): StackType {
    const frame = this.top();
    if (this.vals.length === frame.height) {
      if (frame.unreachable) return "unknown";
      this.fail("not enough values on the stack");
    }
    const t = this.vals.pop();
    return t ?? "unknown";
  }

  private popExpect(expected: StackType): StackType {
    const actual = this.pop();
    if (actual !== expected && actual !== "unknown" && expected !== "unknown") {
      this.fail(`type mismatch: expected ${expected}, got ${actual}`);
    }
    return actual === "unknown" ? expected : actual;
  }

  private popAll(types: readonly ValueType[]): void {
    for (let i = types.length - 1; i >= 0; i--) this.popExpect(types[i]);
  }

  private pushAll(types: readonly ValueType[]): void {
    for (const t of types) this.push(t);
  }

  private top(): ControlFrame {
    return this.ctrls[this.ctrls.length - 1];
  }

  private pushCtrl(op: Opcode, results: readonly ValueType[]): void {
    this.ctrls.push({ op, results, height: this.vals.length, unreachable: false });
  }

  private popCtrl(): ControlFrame {
    const frame = this.top();
    this.popAll(frame.results);
    if (this.vals.length !== frame.height) this.fail("values remaining on the stack at end of block");
    this.ctrls.pop();
    return frame;
  }

  private markUnreachable(): void {
    const frame = this.top();
    this.vals.length = frame.height;
    frame.unreachable = true;
  }

  private label(depth: number): readonly ValueType[] {
    if (depth >= this.ctrls.length) this.fail(`invalid branch depth ${depth}`);
    const frame = this.ctrls[this.ctrls.length - 1 - depth];
    return frame.op === Opcode.Loop ? [] : frame.results;
  }

  private localType(index: number): ValueType {
    if (index >= this.localTypes.length) this.fail(`invalid local index ${index}`);
    return this.localTypes[index];
  }

  private requireMemory(): void {
    if (!this.env.module.memory) this.fail("memory instruction with no memory");
  }

  private step(ins: Instruction): void {
    const module = this.env.module;
    switch (ins.op) {
      case Opcode.Unreachable:
        this.markUnreachable();
        return;
      case Opcode.Nop:
        return;
      case Opcode.Block:
      case Opcode.Loop:
        this.pushCtrl(ins.op, ins.results ?? []);
        return;
      case Opcode.If:
        this.popExpect("i32");
        this.pushCtrl(Opcode.If, ins.results ?? []);
        return;
      case Opcode.Else: {
        const frame = this.popCtrl();
        if (frame.op !== Opcode.If) this.fail("else does not match an if");
        this.pushCtrl(Opcode.Else, frame.results);
        return;
      }
      case Opcode.End: {
        const frame = this.popCtrl();
        if (frame.op === Opcode.If && frame.results.length > 0) {
          this.fail("if without else cannot produce a value");
        }
        this.pushAll(frame.results);
        return;
      }
      case Opcode.Br:
        this.popAll(this.label(ins.imm));
        this.markUnreachable();
        return;
      case Opcode.BrIf: {
        this.popExpect("i32");
        const types = this.label(ins.imm);
        this.popAll(types);
        this.pushAll(types);
        return;
      }
      case Opcode.BrTable: {
        this.popExpect("i32");
        const targets = ins.targets ?? [];
        const defaultTypes = this.label(targets[targets.length - 1]);
        for (const depth of targets) {
          const types = this.label(depth);
          if (types.length !== defaultTypes.length || types.some((t, i) => t !== defaultTypes[i])) {
            this.fail("br_table targets have inconsistent types");
          }
        }
        this.popAll(defaultTypes);
        this.markUnreachable();
        return;
      }
      case Opcode.Return:
        this.popAll(this.signature.results);
        this.markUnreachable();
        return;
      case Opcode.Call: {
        const callee = module.functions[ins.imm];
        if (!callee) this.fail(`invalid function index ${ins.imm}`);
        this.popAll(callee.signature.params);
        this.pushAll(callee.signature.results);
        return;
      }
      case Opcode.CallIndirect: {
        if (!module.table) this.fail("call_indirect with no table");
        const sig = module.types[ins.imm];
        if (!sig) this.fail(`invalid signature index ${ins.imm}`);
        this.popExpect("i32");
        this.popAll(sig.params);
        this.pushAll(sig.results);
        return;
      }
      case Opcode.Drop:
        this.pop();
        return;
      case Opcode.Select: {
        this.popExpect("i32");
        const a = this.pop();
        const b = this.popExpect(a);
        this.push(a === "unknown" ? b : a);
        return;
      }
      case Opcode.LocalGet:
        this.push(this.localType(ins.imm));
        return;
      case Opcode.LocalSet:
        this.popExpect(this.localType(ins.imm));
        return;
      case Opcode.LocalTee: {
        const t = this.localType(ins.imm);
        this.popExpect(t);
        this.push(t);
        return;
      }
      case Opcode.GlobalGet: {
        const g = module.globals[ins.imm];
        if (!g) this.fail(`invalid global index ${ins.imm}`);
        this.push(g.type);
        return;
      }
      case Opcode.GlobalSet: {
        const g = module.globals[ins.imm];
        if (!g) this.fail(`invalid global index ${ins.imm}`);
        if (!g.mutable) this.fail(`global ${ins.imm} is immutable`);
        this.popExpect(g.type);
        return;
      }
      case Opcode.MemorySize:
        this.requireMemory();
        this.push("i32");
        return;
      case Opcode.MemoryGrow:
        this.requireMemory();
        this.popExpect("i32");
        this.push("i32");
        return;
      case Opcode.I32Const:
        this.push("i32");
        return;
      case Opcode.I64Const:
        this.push("i64");
        return;
      case Opcode.F32Const:
        this.push("f32");
        return;
      case Opcode.F64Const:
        this.push("f64");
        return;
    }

    const access = memoryAccess(ins.op);
    if (access) {
      this.requireMemory();
      if (2 ** ins.imm2 > access.width) this.fail("alignment must not be larger than natural");
      if (access.store) {
        this.popExpect(access.type);
        this.popExpect("i32");
      } else {
        this.popExpect("i32");
        this.push(access.type);
      }
      return;
    }

    const numeric = numericSignature(ins.op);
    if (!numeric) this.fail(`unexpected opcode ${opcodeName(ins.op)}`);
    this.popAll(numeric.params);
    this.pushAll(numeric.results);
  }
}

/**
 * Decode and type-check one function body. Yields the decoded code so the
 * caller can run it without decoding twice.
 */
export function verifyFunctionBody(
  env: ExecutionEnvironment,
  signature: FuncSignature,
  body: FunctionBody,
): Result<FunctionCode> {
  try {
    const code = parseFunctionBody(body.buffer, body.start, body.end);
    new FunctionVerifier(env, signature).verify(code);
    return ok(code);
  } catch (e) {
    if (e instanceof VerifyError || e instanceof DecodeError) {
      return fail(fault("verify", e.message, e.offset));
    }
    throw e;
  }
}

export function verifyFunction(env: ExecutionEnvironment, fn: WasmFunction): Result<FunctionCode> {
  const body = sliceFunctionBody(env.module.bytes, fn.codeStart, fn.codeEnd);
  if (!body.ok) return body;
  return verifyFunctionBody(env, fn.signature, body.value);
}
