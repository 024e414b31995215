import { describe, it, expect, vi, afterEach } from "vitest";
import { silentLogger } from "../../src/config/logger.js";
import {
  HARNESS_FAILURE,
  TRAP_SENTINEL,
  callExportedFunction,
  checkPreconditions,
  compileAndRun,
  decodeForTesting,
  getMinModuleMemSize,
  instantiateForTesting,
  interpret,
  runModule,
} from "../../src/harness/harness.js";
import { Thread } from "../../src/interpreter/interpreter.js";
import { i32 } from "../../src/interpreter/values.js";
import { I32, ModuleBytes, constantModule, decode, decodeWat } from "../helpers/wasm-fixtures.js";

const quiet = { logger: silentLogger };

function moduleWithImport(withExport: boolean): Uint8Array {
  const b = new ModuleBytes();
  const t = b.type([], [I32]);
  b.importFunction("env", "f", t);
  const f = b.func(t, [0x41, 0x01]);
  if (withExport) b.exportFunction("main", f);
  return b.build();
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("constants", () => {
  it("uses 0xdeadbeef as the trap sentinel", () => {
    expect(TRAP_SENTINEL).toBe(-559038737);
    expect(HARNESS_FAILURE).toBe(-1);
  });
});

describe("decodeForTesting", () => {
  it("prefixes decode failures", () => {
    const result = decodeForTesting(Uint8Array.from([0x00, 0x61, 0x73, 0x6e, 0x01, 0x00, 0x00, 0x00]), "wasm");
    expect(result).toEqual({
      ok: false,
      faults: [{ kind: "decode", message: "module decode failed: invalid magic number", offset: 0 }],
    });
  });

  it("does not verify function bodies", () => {
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    const f = b.func(t, [0x42, 0x01]);
    expect(decodeForTesting(b.exportFunction("main", f).build(), "wasm").ok).toBe(true);
  });

  it("is deterministic", () => {
    const bytes = constantModule(3);
    const a = decodeForTesting(bytes, "wasm");
    const b = decodeForTesting(bytes, "wasm");
    if (!a.ok || !b.ok) throw new Error("decode failed");
    expect(b.value.functions.length).toBe(a.value.functions.length);
    expect(b.value.exports.map((e) => e.name)).toEqual(a.value.exports.map((e) => e.name));
  });
});

describe("checkPreconditions", () => {
  it("reports imports and missing exports together", () => {
    const result = checkPreconditions(decode(moduleWithImport(false)));
    expect(result).toEqual({
      ok: false,
      faults: [
        { kind: "precondition", message: "module has imports" },
        { kind: "precondition", message: "module has no exports" },
      ],
    });
  });

  it("passes a self-contained module", () => {
    expect(checkPreconditions(decode(constantModule(1))).ok).toBe(true);
  });
});

describe("instantiateForTesting", () => {
  it("refuses a module with imports before compiling", () => {
    const result = instantiateForTesting(decode(moduleWithImport(true)));
    expect(result).toEqual({ ok: false, faults: [{ kind: "precondition", message: "module has imports" }] });
  });

  it("refuses a module without exports", () => {
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    b.func(t, [0x41, 0x01]);
    const result = instantiateForTesting(decode(b.build()));
    expect(result).toEqual({ ok: false, faults: [{ kind: "precondition", message: "module has no exports" }] });
  });

  it("reports host compilation failures", () => {
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    const f = b.func(t, [0x42, 0x01]);
    const result = instantiateForTesting(decode(b.exportFunction("main", f).build()));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.faults[0].kind).toBe("compile");
    expect(result.faults[0].message).toBe("module compilation failed");
  });

  it("reports a trapping start function as an instantiation failure", () => {
    const b = new ModuleBytes();
    const v = b.type([], []);
    const t = b.type([], [I32]);
    const s = b.func(v, [0x00]);
    const f = b.func(t, [0x41, 0x01]);
    const result = instantiateForTesting(decode(b.exportFunction("main", f).start(s).build()));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.faults[0].kind).toBe("instantiate");
  });

  it("returns the instance for wasm and the exports for asm.js", () => {
    const wasm = instantiateForTesting(decode(constantModule(1)));
    const asm = instantiateForTesting(decode(constantModule(1, "caller"), "asm-js"));
    if (!wasm.ok || !asm.ok) throw new Error("instantiation failed");
    expect(wasm.value).toBeInstanceOf(WebAssembly.Instance);
    expect(Object.getOwnPropertyDescriptor(asm.value, "caller")).toBeDefined();
  });
});

describe("compileAndRun", () => {
  it("returns the constant from main", () => {
    expect(compileAndRun(constantModule(1234), {}, quiet)).toEqual({ status: "finished", value: 1234 });
  });

  it("calls caller for asm.js", () => {
    expect(compileAndRun(constantModule(-9, "caller"), { asmJs: true }, quiet)).toEqual({
      status: "finished",
      value: -9,
    });
  });

  it("fails with -1 when the entry point is missing", () => {
    const outcome = compileAndRun(constantModule(5, "other"), {}, quiet);
    expect(outcome.value).toBe(-1);
    expect(outcome).toEqual({ status: "failed", value: -1, faults: [{ kind: "export", message: "no such export 'main'" }] });
  });

  it("fails with -1 on undecodable bytes", () => {
    const outcome = compileAndRun(Uint8Array.from([1, 2, 3]), {}, quiet);
    expect(outcome.value).toBe(-1);
    expect(outcome.status).toBe("failed");
  });

  it("fails with -1 for a module with imports", () => {
    const outcome = compileAndRun(moduleWithImport(true), {}, quiet);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "precondition", message: "module has imports" }],
    });
  });
});

describe("callExportedFunction", () => {
  it("returns the value of a host export", () => {
    const instance = instantiateForTesting(decode(constantModule(77)));
    if (!instance.ok) throw new Error("instantiation failed");
    expect(callExportedFunction(instance.value, "main", [])).toEqual({ status: "finished", value: 77 });
  });

  it("does not invoke anything for a missing export", () => {
    const main = vi.fn(() => 1);
    const outcome = callExportedFunction({ exports: { main } }, "absent", []);
    expect(outcome).toEqual({ status: "failed", value: -1, faults: [{ kind: "export", message: "no such export 'absent'" }] });
    expect(main).not.toHaveBeenCalled();
  });

  it("ignores inherited properties", () => {
    const caller = vi.fn(() => 1);
    const outcome = callExportedFunction(Object.create({ caller }), "caller", [], { asmJs: true });
    expect(outcome.status).toBe("failed");
    expect(caller).not.toHaveBeenCalled();
  });

  it("rejects a non-function export", () => {
    const outcome = callExportedFunction({ exports: { main: 5 } }, "main", []);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "export", message: "export 'main' is not a function" }],
    });
  });

  it("rejects a non-number return value", () => {
    const outcome = callExportedFunction({ exports: { main: () => "seven" } }, "main", []);
    expect(outcome.value).toBe(-1);
    if (outcome.status !== "failed") throw new Error("expected failure");
    expect(outcome.faults[0].message).toBe("return value should be number");
    expect(outcome.faults[0].help).toBe("'main' returned string");
  });

  it("treats a thrown error as a null invocation", () => {
    const outcome = callExportedFunction({ exports: { main: () => { throw new Error("boom"); } } }, "main", []);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "export", message: "invocation was null", help: "boom" }],
    });
  });

  it("coerces numbers to int32 and passes arguments with an undefined receiver", () => {
    let receiver: unknown = "unset";
    const main = vi.fn(function (this: unknown, a: unknown, b: unknown) {
      receiver = this;
      return Number(a) + Number(b) + 0.5;
    });
    const outcome = callExportedFunction({ caller: main }, "caller", [2147483647, 1], { asmJs: true });
    expect(outcome).toEqual({ status: "finished", value: -2147483648 });
    expect(main).toHaveBeenCalledWith(2147483647, 1);
    expect(receiver).toBeUndefined();
  });

  it("requires an exports object for wasm instances", () => {
    const outcome = callExportedFunction({}, "main", []);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "export", message: "instance has no exports object" }],
    });
  });
});

describe("interpret", () => {
  it("returns the constant from the interpreter", () => {
    expect(interpret(decode(constantModule(4321)), 0, [], quiet)).toEqual({ status: "finished", value: 4321 });
  });

  it("yields the trap sentinel without a fault", () => {
    const module = decodeWat(`(module (memory 1) (func (export "main") (result i32) (i32.load (i32.const 70000))))`);
    const outcome = interpret(module, 0, [], quiet);
    expect(outcome.status).toBe("trapped");
    expect(outcome.value).toBe(TRAP_SENTINEL);
    expect("faults" in outcome).toBe(false);
  });

  it("never runs a function that fails verification", () => {
    const run = vi.spyOn(Thread.prototype, "run");
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    const f = b.func(t, [0x41, 0x01, 0x42, 0x01, 0x6a]);
    const module = decode(b.exportFunction("main", f).build());
    const outcome = interpret(module, f, [], quiet);
    expect(outcome.value).toBe(-1);
    if (outcome.status !== "failed") throw new Error("expected failure");
    expect(outcome.faults).toEqual([
      {
        kind: "verify",
        message: "function did not verify",
        offset: module.functions[f].codeStart + 5,
        help: "type mismatch: expected i32, got i64",
      },
    ]);
    expect(run).not.toHaveBeenCalled();
  });

  it("rejects an out-of-range function index", () => {
    const outcome = interpret(decode(constantModule(1)), 3, [], quiet);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "precondition", message: "function index 3 out of range" }],
    });
  });

  it("applies preconditions before anything else", () => {
    const outcome = interpret(decode(moduleWithImport(true)), 1, [], quiet);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "precondition", message: "module has imports" }],
    });
  });

  it("checks argument count and types", () => {
    const module = decodeWat(`(module (func (export "main") (param i32) (result i32) (local.get 0)))`);
    const missing = interpret(module, 0, [], quiet);
    if (missing.status !== "failed") throw new Error("expected failure");
    expect(missing.faults[0].kind).toBe("argument");
    expect(missing.faults[0].message).toBe("function 0 expects 1 argument(s), got 0");
    expect(interpret(module, 0, [i32(8)], quiet).value).toBe(8);
  });

  it("fails instantiation when a data segment does not fit", () => {
    const b = new ModuleBytes().withMemory(1);
    const t = b.type([], [I32]);
    const f = b.func(t, [0x41, 0x01]);
    const module = decode(b.exportFunction("main", f).dataSegment(65535, [1, 2]).build());
    const outcome = interpret(module, f, [], quiet);
    if (outcome.status !== "failed") throw new Error("expected failure");
    expect(outcome.faults[0]).toEqual({
      kind: "instantiate",
      message: "data segment at 65535 does not fit in memory of 65536 bytes",
    });
  });
});

describe("runModule", () => {
  const wat = `(module
    (func $double (export "double") (param i32) (result i32) (i32.mul (local.get 0) (i32.const 2)))
    (func $hidden (result i32) (i32.const 3)))`;

  it("runs by name and index on both paths", () => {
    const module = decodeWat(wat);
    expect(runModule(module, "double", { kind: "compiled", args: [21] }, quiet).value).toBe(42);
    expect(runModule(module, 0, { kind: "compiled", args: [5] }, quiet).value).toBe(10);
    expect(runModule(module, "double", { kind: "interpreted", args: [i32(21)] }, quiet).value).toBe(42);
    expect(runModule(module, 1, { kind: "interpreted" }, quiet).value).toBe(3);
  });

  it("needs an export for the compiled path", () => {
    const outcome = runModule(decodeWat(wat), 1, { kind: "compiled" }, quiet);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "export", message: "function 1 is not exported" }],
    });
  });

  it("resolves names through the export table on the interpreted path", () => {
    const outcome = runModule(decodeWat(wat), "hidden", { kind: "interpreted" }, quiet);
    expect(outcome).toEqual({
      status: "failed",
      value: -1,
      faults: [{ kind: "export", message: "no such export 'hidden'" }],
    });
  });
});

describe("getMinModuleMemSize", () => {
  it("is the initial page count times the page size", () => {
    expect(getMinModuleMemSize(decodeWat(`(module (memory 2) (func (export "main") (result i32) (i32.const 0)))`))).toBe(131072);
    expect(getMinModuleMemSize(decode(constantModule(0)))).toBe(0);
  });
});
