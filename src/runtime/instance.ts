import type { Module, ModuleOrigin } from "../binary/module.js";
import { PAGE_SIZE } from "../binary/module.js";
import type { HarnessConfig } from "../config/config.js";
import type { Result } from "../errors/fault.js";
import { fault, fail, ok } from "../errors/fault.js";
import { defaultValue, evalConstExpr, type WasmValue } from "../interpreter/values.js";
import { LinearMemory } from "./memory.js";

export function getMinModuleMemSize(module: Module): number {
  return PAGE_SIZE * module.minMemPages;
}

/**
 * Global storage, filled from the module's initializers the first time any
 * global is read or written.
 */
export class GlobalStore {
  private values: WasmValue[] | null = null;

  constructor(private readonly module: Module) {}

  get materialized(): boolean {
    return this.values !== null;
  }

  private storage(): WasmValue[] {
    if (!this.values) {
      const values: WasmValue[] = [];
      for (const g of this.module.globals) {
        values.push(g.init ? evalConstExpr(g.init, values) : defaultValue(g.type));
      }
      this.values = values;
    }
    return this.values;
  }

  get(index: number): WasmValue {
    return this.storage()[index];
  }

  set(index: number, value: WasmValue): void {
    this.storage()[index] = value;
  }
}

export interface ModuleInstance {
  readonly module: Module;
  readonly memSize: number;
  readonly memory: LinearMemory;
  readonly globals: GlobalStore;
  /** Function index per table slot; null for an empty slot. */
  readonly table: (number | null)[];
  readonly context: HarnessConfig;
}

/** Shared frame of reference for the verifier and the interpreter. */
export interface ExecutionEnvironment {
  readonly module: Module;
  /** Null when verifying without executing. */
  readonly instance: ModuleInstance | null;
  readonly origin: ModuleOrigin;
}

export function createEnvironment(module: Module, instance: ModuleInstance | null): ExecutionEnvironment {
  return { module, instance, origin: module.origin };
}

/**
 * Build a per-call instance. Memory and globals are not materialized here;
 * segment bounds are still checked up front so a bad segment fails the
 * instantiation rather than the first memory access.
 */
export function createModuleInstance(module: Module, context: HarnessConfig): Result<ModuleInstance> {
  const memSize = getMinModuleMemSize(module);
  const globals = new GlobalStore(module);
  const segmentGlobals: WasmValue[] = module.globals.map((g) => defaultValue(g.type));

  const placements: { offset: number; bytes: Uint8Array }[] = [];
  for (const segment of module.data) {
    const base = evalConstExpr(segment.offset, segmentGlobals);
    const offset = base.type === "i32" ? base.value >>> 0 : 0;
    if (offset + segment.bytes.length > memSize) {
      return fail(fault("instantiate", `data segment at ${offset} does not fit in memory of ${memSize} bytes`));
    }
    placements.push({ offset, bytes: segment.bytes });
  }

  const table: (number | null)[] = new Array<number | null>(module.table?.min ?? 0).fill(null);
  for (const segment of module.elements) {
    const base = evalConstExpr(segment.offset, segmentGlobals);
    const offset = base.type === "i32" ? base.value >>> 0 : 0;
    if (offset + segment.functionIndices.length > table.length) {
      return fail(fault("instantiate", `element segment at ${offset} does not fit in table of ${table.length} slots`));
    }
    segment.functionIndices.forEach((fn, i) => {
      table[offset + i] = fn;
    });
  }

  const memory = new LinearMemory(module.minMemPages, module.maxMemPages, (bytes) => {
    for (const p of placements) bytes.set(p.bytes, p.offset);
  });

  return ok({ module, memSize, memory, globals, table, context });
}
