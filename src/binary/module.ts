export type ValueType = "i32" | "i64" | "f32" | "f64";

export type ModuleOrigin = "wasm" | "asm-js";

export type ExternalKind = "function" | "table" | "memory" | "global";

export const PAGE_SIZE = 65536;
export const MAX_MEMORY_PAGES = 65536;

export interface FuncSignature {
  params: readonly ValueType[];
  results: readonly ValueType[];
}

export interface Limits {
  min: number;
  max: number | null;
}

export type ConstExpr =
  | { kind: "i32.const"; value: number }
  | { kind: "i64.const"; value: bigint }
  | { kind: "f32.const"; value: number }
  | { kind: "f64.const"; value: number }
  | { kind: "global.get"; index: number };

export interface WasmFunction {
  index: number;
  sigIndex: number;
  signature: FuncSignature;
  imported: boolean;
  /** Body start (local declarations included), absolute into `Module.bytes`. */
  codeStart: number;
  codeEnd: number;
}

export type ImportDescriptor =
  | { module: string; field: string; kind: "function"; sigIndex: number }
  | { module: string; field: string; kind: "table"; limits: Limits }
  | { module: string; field: string; kind: "memory"; limits: Limits }
  | { module: string; field: string; kind: "global"; type: ValueType; mutable: boolean };

export interface ExportDescriptor {
  name: string;
  kind: ExternalKind;
  index: number;
}

export interface WasmGlobal {
  type: ValueType;
  mutable: boolean;
  imported: boolean;
  /** Null for imported globals. */
  init: ConstExpr | null;
}

export interface ElementSegment {
  tableIndex: number;
  offset: ConstExpr;
  functionIndices: readonly number[];
}

export interface DataSegment {
  offset: ConstExpr;
  /** View into `Module.bytes`. */
  bytes: Uint8Array;
}

export interface Module {
  readonly origin: ModuleOrigin;
  /** The module's own copy of the encoded bytes; body offsets point into it. */
  readonly bytes: Uint8Array;
  readonly types: readonly FuncSignature[];
  readonly functions: readonly WasmFunction[];
  readonly imports: readonly ImportDescriptor[];
  readonly exports: readonly ExportDescriptor[];
  readonly globals: readonly WasmGlobal[];
  readonly memory: Limits | null;
  readonly minMemPages: number;
  readonly maxMemPages: number;
  readonly table: Limits | null;
  readonly elements: readonly ElementSegment[];
  readonly data: readonly DataSegment[];
  readonly startFunction: number | null;
}

export function signatureToString(sig: FuncSignature): string {
  return `(${sig.params.join(", ")}) -> (${sig.results.join(", ")})`;
}

export function signaturesEqual(a: FuncSignature, b: FuncSignature): boolean {
  if (a.params.length !== b.params.length || a.results.length !== b.results.length) return false;
  for (let i = 0; i < a.params.length; i++) {
    if (a.params[i] !== b.params[i]) return false;
  }
  for (let i = 0; i < a.results.length; i++) {
    if (a.results[i] !== b.results[i]) return false;
  }
  return true;
}

export function findExport(module: Module, name: string): ExportDescriptor | undefined {
  return module.exports.find((e) => e.name === name);
}
