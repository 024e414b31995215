import { describe, it, expect } from "vitest";
import { decodeModule } from "../../src/binary/decoder.js";
import { HEADER, I32, I64, ModuleBytes, constantModule, section } from "../helpers/wasm-fixtures.js";

function decodeFails(bytes: number[] | Uint8Array): { message: string; offset?: number } {
  const result = decodeModule(Uint8Array.from(bytes), "wasm");
  if (result.ok) throw new Error("expected decoding to fail");
  expect(result.faults).toHaveLength(1);
  expect(result.faults[0].kind).toBe("decode");
  return result.faults[0];
}

describe("decodeModule", () => {
  it("decodes a module with one exported function", () => {
    const result = decodeModule(constantModule(42), "wasm");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const m = result.value;
    expect(m.origin).toBe("wasm");
    expect(m.types).toEqual([{ params: [], results: ["i32"] }]);
    expect(m.exports).toEqual([{ name: "main", kind: "function", index: 0 }]);
    expect(m.functions).toHaveLength(1);
    expect(m.functions[0]).toMatchObject({ index: 0, imported: false, codeStart: 33, codeEnd: 37 });
    expect(m.memory).toBeNull();
    expect(m.minMemPages).toBe(0);
  });

  it("keeps its own copy of the input bytes", () => {
    const input = constantModule(42);
    const result = decodeModule(input, "wasm");
    if (!result.ok) throw new Error("decode failed");
    input[35] = 7;
    expect(result.value.bytes[35]).toBe(42);
    expect(result.value.bytes).not.toBe(input);
  });

  it("records the origin without changing the structure", () => {
    const wasm = decodeModule(constantModule(1), "wasm");
    const asm = decodeModule(constantModule(1), "asm-js");
    if (!wasm.ok || !asm.ok) throw new Error("decode failed");
    expect(asm.value.origin).toBe("asm-js");
    expect(asm.value.functions).toEqual(wasm.value.functions);
  });

  it("places imported functions first in the index space", () => {
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    b.importFunction("env", "f", t);
    const f = b.func(t, [0x41, 0x01]);
    const result = decodeModule(b.exportFunction("main", f).build(), "wasm");
    if (!result.ok) throw new Error("decode failed");
    expect(f).toBe(1);
    expect(result.value.imports).toEqual([{ module: "env", field: "f", kind: "function", sigIndex: 0 }]);
    expect(result.value.functions.map((fn) => fn.imported)).toEqual([true, false]);
  });

  it("reads memory limits and data segments", () => {
    const b = new ModuleBytes().withMemory(2, 4);
    const t = b.type([], [I32]);
    b.func(t, [0x41, 0x00]);
    const result = decodeModule(b.exportFunction("main", 0).dataSegment(16, [1, 2, 3]).build(), "wasm");
    if (!result.ok) throw new Error("decode failed");
    expect(result.value.memory).toEqual({ min: 2, max: 4 });
    expect(result.value.minMemPages).toBe(2);
    expect(result.value.maxMemPages).toBe(4);
    expect(result.value.data).toHaveLength(1);
    expect(result.value.data[0].offset).toEqual({ kind: "i32.const", value: 16 });
    expect(Array.from(result.value.data[0].bytes)).toEqual([1, 2, 3]);
  });

  it("skips custom sections", () => {
    const result = decodeModule(Uint8Array.from([...HEADER, 0x00, 0x05, 0x04, 0x6e, 0x61, 0x6d, 0x65]), "wasm");
    expect(result.ok).toBe(true);
  });

  it("rejects a bad magic number", () => {
    expect(decodeFails([0x00, 0x61, 0x73, 0x6e, 0x01, 0x00, 0x00, 0x00])).toEqual({
      kind: "decode",
      message: "invalid magic number",
      offset: 0,
    });
  });

  it("rejects an unsupported version", () => {
    const f = decodeFails([0x00, 0x61, 0x73, 0x6d, 0x02, 0x00, 0x00, 0x00]);
    expect(f.message).toBe("unsupported version");
    expect(f.offset).toBe(4);
  });

  it("rejects a truncated header", () => {
    expect(decodeFails([0x00, 0x61]).message).toBe("module is too short for a header");
  });

  it("rejects sections out of order", () => {
    const f = decodeFails([...HEADER, ...section(7, [0]), ...section(1, [0])]);
    expect(f.message).toBe("unexpected section Type");
    expect(f.offset).toBe(11);
  });

  it("rejects a duplicate section", () => {
    const f = decodeFails([...HEADER, ...section(1, [0]), ...section(1, [0])]);
    expect(f.message).toBe("unexpected section Type");
    expect(f.offset).toBe(11);
  });

  it("rejects a section with trailing bytes", () => {
    const f = decodeFails([...HEADER, 0x01, 0x05, 0x01, 0x60, 0x00, 0x00, 0x00]);
    expect(f.message).toBe("section Type has trailing bytes");
    expect(f.offset).toBe(14);
  });

  it("rejects a section larger than the module", () => {
    const f = decodeFails([...HEADER, 0x01, 0x0a, 0x00]);
    expect(f.message).toBe("section 1 size exceeds module");
    expect(f.offset).toBe(8);
  });

  it("rejects a function section without code", () => {
    const bytes = [...HEADER, ...section(1, [1, 0x60, 0, 0]), ...section(3, [1, 0])];
    expect(decodeFails(bytes).message).toBe("function and code section have inconsistent lengths");
  });

  it("rejects duplicate export names", () => {
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    const f = b.func(t, [0x41, 0x00]);
    const bytes = b.exportFunction("main", f).exportFunction("main", f).build();
    expect(decodeFails(bytes).message).toBe("duplicate export name 'main'");
  });

  it("rejects an export index out of range", () => {
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    b.func(t, [0x41, 0x00]);
    expect(decodeFails(b.exportFunction("main", 3).build()).message).toBe("function export index 3 out of range");
  });

  it("rejects passive data segments", () => {
    const bytes = [...HEADER, ...section(5, [1, 0x00, 0x01]), ...section(11, [1, 0x01, 0x01, 0xaa])];
    expect(decodeFails(bytes)).toEqual({
      kind: "decode",
      message: "passive data segments are not supported",
      offset: 16,
    });
  });

  it("rejects the data count section", () => {
    const f = decodeFails([...HEADER, ...section(12, [0])]);
    expect(f.message).toBe("bulk memory is not supported");
    expect(f.offset).toBe(8);
  });

  it("rejects memory limits with max below min", () => {
    const b = new ModuleBytes().withMemory(3, 1);
    const t = b.type([], [I32]);
    b.func(t, [0x41, 0x00]);
    expect(decodeFails(b.exportFunction("main", 0).build()).message).toBe("memory maximum is less than minimum");
  });

  it("leaves function bodies unverified by default", () => {
    const b = new ModuleBytes();
    const t = b.type([], [I32]);
    const f = b.func(t, [0x41, 0x01, 0x42, 0x01, 0x6a]);
    const bytes = b.exportFunction("main", f).build();
    expect(decodeModule(bytes, "wasm").ok).toBe(true);

    const verified = decodeModule(bytes, "wasm", { verifyFunctions: true });
    expect(verified.ok).toBe(false);
    if (verified.ok) return;
    expect(verified.faults[0].kind).toBe("decode");
    expect(verified.faults[0].message).toBe("type mismatch: expected i32, got i64");
  });

  it("is deterministic for the same bytes", () => {
    const b = new ModuleBytes();
    const t = b.type([I64], [I32]);
    b.func(t, [0x20, 0x00, 0xa7]);
    const bytes = b.exportFunction("wrap", 0).build();
    const first = decodeModule(bytes, "wasm");
    const second = decodeModule(bytes, "wasm");
    if (!first.ok || !second.ok) throw new Error("decode failed");
    expect(second.value.functions.length).toBe(first.value.functions.length);
    expect(second.value.exports.map((e) => e.name)).toEqual(first.value.exports.map((e) => e.name));
    expect(second.value.types).toEqual(first.value.types);
  });
});
