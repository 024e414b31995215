import type { Fault, Result } from "../errors/fault.js";
import { fault, fail, ok } from "../errors/fault.js";
import type {
  ConstExpr, DataSegment, ElementSegment, ExportDescriptor, ExternalKind, FuncSignature,
  ImportDescriptor, Limits, Module, ModuleOrigin, ValueType, WasmFunction, WasmGlobal,
} from "./module.js";
import { MAX_MEMORY_PAGES } from "./module.js";
import { Opcode, valueTypeFromByte } from "./opcodes.js";
import { ByteReader, DecodeError } from "./reader.js";
import { verifyFunction } from "../validation/verifier.js";

const WASM_MAGIC = 0x6d736100; // "\0asm" read little-endian
const WASM_VERSION = 1;

const MAX_TABLE_SIZE = 10_000_000;

enum SectionId {
  Custom = 0,
  Type = 1,
  Import = 2,
  Function = 3,
  Table = 4,
  Memory = 5,
  Global = 6,
  Export = 7,
  Start = 8,
  Element = 9,
  Code = 10,
  Data = 11,
  DataCount = 12,
}

// Canonical position of each known section; data count sits between element and code.
const SECTION_ORDER: Record<number, number> = {
  [SectionId.Type]: 1,
  [SectionId.Import]: 2,
  [SectionId.Function]: 3,
  [SectionId.Table]: 4,
  [SectionId.Memory]: 5,
  [SectionId.Global]: 6,
  [SectionId.Export]: 7,
  [SectionId.Start]: 8,
  [SectionId.Element]: 9,
  [SectionId.DataCount]: 10,
  [SectionId.Code]: 11,
  [SectionId.Data]: 12,
};

const EXTERNAL_KINDS: readonly ExternalKind[] = ["function", "table", "memory", "global"];

export interface DecodeOptions {
  /** Verify every function body while decoding. Off by default. */
  verifyFunctions?: boolean;
}

/**
 * Mutable state of one decode; frozen into a `Module` when every section
 * has been read.
 */
class ModuleBuilder {
  types: FuncSignature[] = [];
  functions: WasmFunction[] = [];
  imports: ImportDescriptor[] = [];
  exports: ExportDescriptor[] = [];
  globals: WasmGlobal[] = [];
  memory: Limits | null = null;
  table: Limits | null = null;
  elements: ElementSegment[] = [];
  data: DataSegment[] = [];
  startFunction: number | null = null;
  declaredFunctions = 0;
  bodiesSeen = false;

  constructor(readonly origin: ModuleOrigin, readonly bytes: Uint8Array) {}

  build(): Module {
    return {
      origin: this.origin,
      bytes: this.bytes,
      types: this.types,
      functions: this.functions,
      imports: this.imports,
      exports: this.exports,
      globals: this.globals,
      memory: this.memory,
      minMemPages: this.memory?.min ?? 0,
      maxMemPages: this.memory?.max ?? MAX_MEMORY_PAGES,
      table: this.table,
      elements: this.elements,
      data: this.data,
      startFunction: this.startFunction,
    };
  }
}

/**
 * Decode a binary module. The module keeps its own copy of `input`, so the
 * caller's buffer is never referenced after this returns.
 */
export function decodeModule(
  input: Uint8Array,
  origin: ModuleOrigin,
  options: DecodeOptions = {},
): Result<Module> {
  const bytes = input.slice();
  const builder = new ModuleBuilder(origin, bytes);
  try {
    decodeSections(new ByteReader(bytes), builder);
  } catch (e) {
    if (e instanceof DecodeError) {
      return fail(fault("decode", e.message, e.offset));
    }
    throw e;
  }

  const module = builder.build();
  if (options.verifyFunctions) {
    for (const fn of module.functions) {
      if (fn.imported) continue;
      const verified = verifyFunction({ module, instance: null, origin }, fn);
      if (!verified.ok) {
        return fail(...verified.faults.map((f): Fault => ({ ...f, kind: "decode" })));
      }
    }
  }
  return ok(module);
}

function decodeSections(r: ByteReader, m: ModuleBuilder): void {
  if (r.remaining < 8) throw r.error("module is too short for a header");
  if (r.u32le() !== WASM_MAGIC) throw r.error("invalid magic number", 0);
  if (r.u32le() !== WASM_VERSION) throw r.error("unsupported version", 4);

  let lastOrder = 0;
  while (!r.atEnd()) {
    const idOffset = r.pos;
    const id = r.u8();
    const size = r.varU32();
    if (size > r.remaining) throw r.error(`section ${id} size exceeds module`, idOffset);
    const sectionEnd = r.pos + size;
    const s = new ByteReader(r.bytes, r.pos, sectionEnd);

    if (id !== SectionId.Custom) {
      const order = SECTION_ORDER[id];
      if (order === undefined) throw r.error(`unknown section id ${id}`, idOffset);
      if (order <= lastOrder) throw r.error(`unexpected section ${SectionId[id]}`, idOffset);
      lastOrder = order;
    }

    switch (id) {
      case SectionId.Custom: s.name(); s.skip(s.remaining); break;
      case SectionId.Type: decodeTypes(s, m); break;
      case SectionId.Import: decodeImports(s, m); break;
      case SectionId.Function: decodeFunctions(s, m); break;
      case SectionId.Table: decodeTables(s, m); break;
      case SectionId.Memory: decodeMemories(s, m); break;
      case SectionId.Global: decodeGlobals(s, m); break;
      case SectionId.Export: decodeExports(s, m); break;
      case SectionId.Start: decodeStart(s, m); break;
      case SectionId.Element: decodeElements(s, m); break;
      case SectionId.DataCount: throw r.error("bulk memory is not supported", idOffset);
      case SectionId.Code: decodeCode(s, m); break;
      case SectionId.Data: decodeData(s, m); break;
    }

    if (!s.atEnd()) throw s.error(`section ${SectionId[id]} has trailing bytes`);
    r.skip(size);
  }

  const defined = m.functions.length - m.imports.filter((i) => i.kind === "function").length;
  if (m.declaredFunctions !== defined || (defined > 0 && !m.bodiesSeen)) {
    throw r.error("function and code section have inconsistent lengths");
  }
}

function readLimits(r: ByteReader, ceiling: number, what: string): Limits {
  const flagOffset = r.pos;
  const flags = r.u8();
  if (flags !== 0 && flags !== 1) throw r.error(`invalid ${what} limits flags`, flagOffset);
  const minOffset = r.pos;
  const min = r.varU32();
  if (min > ceiling) throw r.error(`${what} size must be at most ${ceiling}`, minOffset);
  if (flags === 0) return { min, max: null };
  const maxOffset = r.pos;
  const max = r.varU32();
  if (max > ceiling) throw r.error(`${what} size must be at most ${ceiling}`, maxOffset);
  if (max < min) throw r.error(`${what} maximum is less than minimum`, maxOffset);
  return { min, max };
}

function readValueType(r: ByteReader): ValueType {
  const offset = r.pos;
  const t = valueTypeFromByte(r.u8());
  if (!t) throw r.error("invalid value type", offset);
  return t;
}

function readTableType(r: ByteReader): Limits {
  const offset = r.pos;
  if (r.u8() !== 0x70) throw r.error("only funcref tables are supported", offset);
  return readLimits(r, MAX_TABLE_SIZE, "table");
}

function readGlobalType(r: ByteReader): { type: ValueType; mutable: boolean } {
  const type = readValueType(r);
  const offset = r.pos;
  const mut = r.u8();
  if (mut > 1) throw r.error("invalid mutability", offset);
  return { type, mutable: mut === 1 };
}

function readConstExpr(r: ByteReader, m: ModuleBuilder, expected: ValueType): ConstExpr {
  const offset = r.pos;
  const op = r.u8();
  let expr: ConstExpr;
  let type: ValueType;
  switch (op) {
    case Opcode.I32Const: expr = { kind: "i32.const", value: r.varS32() }; type = "i32"; break;
    case Opcode.I64Const: expr = { kind: "i64.const", value: r.varS64() }; type = "i64"; break;
    case Opcode.F32Const: expr = { kind: "f32.const", value: r.f32() }; type = "f32"; break;
    case Opcode.F64Const: expr = { kind: "f64.const", value: r.f64() }; type = "f64"; break;
    case Opcode.GlobalGet: {
      const index = r.varU32();
      const global = m.globals[index];
      if (!global || !global.imported) {
        throw r.error(`constant expression may only read imported globals (index ${index})`, offset);
      }
      if (global.mutable) throw r.error("constant expression reads a mutable global", offset);
      expr = { kind: "global.get", index };
      type = global.type;
      break;
    }
    default:
      throw r.error(`invalid opcode 0x${op.toString(16)} in constant expression`, offset);
  }
  if (type !== expected) throw r.error(`constant expression has type ${type}, expected ${expected}`, offset);
  const endOffset = r.pos;
  if (r.u8() !== Opcode.End) throw r.error("constant expression must end with end opcode", endOffset);
  return expr;
}

function readSignatureIndex(r: ByteReader, m: ModuleBuilder): number {
  const offset = r.pos;
  const index = r.varU32();
  if (index >= m.types.length) throw r.error(`signature index ${index} out of range`, offset);
  return index;
}

function decodeTypes(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    const formOffset = r.pos;
    if (r.u8() !== 0x60) throw r.error("invalid function type form", formOffset);
    const params: ValueType[] = [];
    const paramCount = r.varU32();
    for (let p = 0; p < paramCount; p++) params.push(readValueType(r));
    const results: ValueType[] = [];
    const resultOffset = r.pos;
    const resultCount = r.varU32();
    if (resultCount > 1) throw r.error("multiple return values are not supported", resultOffset);
    for (let p = 0; p < resultCount; p++) results.push(readValueType(r));
    m.types.push({ params, results });
  }
}

function decodeImports(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    const moduleName = r.name();
    const field = r.name();
    const kindOffset = r.pos;
    const kind = r.u8();
    switch (kind) {
      case 0: {
        const sigIndex = readSignatureIndex(r, m);
        m.imports.push({ module: moduleName, field, kind: "function", sigIndex });
        m.functions.push({
          index: m.functions.length,
          sigIndex,
          signature: m.types[sigIndex],
          imported: true,
          codeStart: 0,
          codeEnd: 0,
        });
        break;
      }
      case 1: {
        if (m.table) throw r.error("at most one table is supported", kindOffset);
        const limits = readTableType(r);
        m.table = limits;
        m.imports.push({ module: moduleName, field, kind: "table", limits });
        break;
      }
      case 2: {
        if (m.memory) throw r.error("at most one memory is supported", kindOffset);
        const limits = readLimits(r, MAX_MEMORY_PAGES, "memory");
        m.memory = limits;
        m.imports.push({ module: moduleName, field, kind: "memory", limits });
        break;
      }
      case 3: {
        const { type, mutable } = readGlobalType(r);
        m.globals.push({ type, mutable, imported: true, init: null });
        m.imports.push({ module: moduleName, field, kind: "global", type, mutable });
        break;
      }
      default:
        throw r.error(`invalid import kind ${kind}`, kindOffset);
    }
  }
}

function decodeFunctions(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    const sigIndex = readSignatureIndex(r, m);
    m.functions.push({
      index: m.functions.length,
      sigIndex,
      signature: m.types[sigIndex],
      imported: false,
      codeStart: 0,
      codeEnd: 0,
    });
  }
  m.declaredFunctions = count;
}

function decodeTables(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    if (m.table) throw r.error("at most one table is supported");
    m.table = readTableType(r);
  }
}

function decodeMemories(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    if (m.memory) throw r.error("at most one memory is supported");
    m.memory = readLimits(r, MAX_MEMORY_PAGES, "memory");
  }
}

function decodeGlobals(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    const { type, mutable } = readGlobalType(r);
    const init = readConstExpr(r, m, type);
    m.globals.push({ type, mutable, imported: false, init });
  }
}

function exportLimit(m: ModuleBuilder, kind: ExternalKind): number {
  switch (kind) {
    case "function": return m.functions.length;
    case "table": return m.table ? 1 : 0;
    case "memory": return m.memory ? 1 : 0;
    case "global": return m.globals.length;
  }
}

function decodeExports(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  const seen = new Set<string>();
  for (let i = 0; i < count; i++) {
    const nameOffset = r.pos;
    const name = r.name();
    if (seen.has(name)) throw r.error(`duplicate export name '${name}'`, nameOffset);
    seen.add(name);
    const kindOffset = r.pos;
    const kind = EXTERNAL_KINDS[r.u8()];
    if (!kind) throw r.error("invalid export kind", kindOffset);
    const indexOffset = r.pos;
    const index = r.varU32();
    if (index >= exportLimit(m, kind)) {
      throw r.error(`${kind} export index ${index} out of range`, indexOffset);
    }
    m.exports.push({ name, kind, index });
  }
}

function decodeStart(r: ByteReader, m: ModuleBuilder): void {
  const offset = r.pos;
  const index = r.varU32();
  const fn = m.functions[index];
  if (!fn) throw r.error(`start function index ${index} out of range`, offset);
  if (fn.signature.params.length > 0 || fn.signature.results.length > 0) {
    throw r.error("start function must take no arguments and return nothing", offset);
  }
  m.startFunction = index;
}

function decodeElements(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    const flagsOffset = r.pos;
    const flags = r.varU32();
    if (flags !== 0) throw r.error(`unsupported element segment flags ${flags}`, flagsOffset);
    if (!m.table) throw r.error("element segment without a table", flagsOffset);
    const offset = readConstExpr(r, m, "i32");
    const functionIndices: number[] = [];
    const n = r.varU32();
    for (let j = 0; j < n; j++) {
      const indexOffset = r.pos;
      const index = r.varU32();
      if (index >= m.functions.length) throw r.error(`element function index ${index} out of range`, indexOffset);
      functionIndices.push(index);
    }
    m.elements.push({ tableIndex: 0, offset, functionIndices });
  }
}

function decodeCode(r: ByteReader, m: ModuleBuilder): void {
  const countOffset = r.pos;
  const count = r.varU32();
  if (count !== m.declaredFunctions) {
    throw r.error("function and code section have inconsistent lengths", countOffset);
  }
  const firstDefined = m.functions.length - m.declaredFunctions;
  for (let i = 0; i < count; i++) {
    const sizeOffset = r.pos;
    const size = r.varU32();
    if (size === 0 || size > r.remaining) throw r.error("invalid function body size", sizeOffset);
    const fn = m.functions[firstDefined + i];
    fn.codeStart = r.pos;
    fn.codeEnd = r.pos + size;
    r.skip(size);
  }
  m.bodiesSeen = true;
}

function decodeData(r: ByteReader, m: ModuleBuilder): void {
  const count = r.varU32();
  for (let i = 0; i < count; i++) {
    const flagsOffset = r.pos;
    const flags = r.varU32();
    let offset: ConstExpr;
    switch (flags) {
      case 0:
        if (!m.memory) throw r.error("data segment without a memory", flagsOffset);
        offset = readConstExpr(r, m, "i32");
        break;
      case 1:
        throw r.error("passive data segments are not supported", flagsOffset);
      case 2: {
        const memOffset = r.pos;
        if (r.varU32() !== 0) throw r.error("memory index must be 0", memOffset);
        if (!m.memory) throw r.error("data segment without a memory", flagsOffset);
        offset = readConstExpr(r, m, "i32");
        break;
      }
      default:
        throw r.error(`invalid data segment flags ${flags}`, flagsOffset);
    }
    const length = r.varU32();
    m.data.push({ offset, bytes: r.take(length) });
  }
}
