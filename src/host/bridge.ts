import type { Module } from "../binary/module.js";
import type { Result } from "../errors/fault.js";
import { errorMessage, fault, fail, ok } from "../errors/fault.js";

/**
 * What instantiation hands back: a `WebAssembly.Instance` for wasm modules,
 * the exports object itself for asm.js modules.
 */
export type HostInstance = object;

export type HostFunction = (...args: unknown[]) => unknown;

export function compileModule(module: Module): Result<WebAssembly.Module> {
  try {
    return ok(new WebAssembly.Module(new Uint8Array(module.bytes)));
  } catch (e) {
    return fail(fault("compile", "module compilation failed", undefined, errorMessage(e)));
  }
}

export function instantiate(compiled: WebAssembly.Module): Result<WebAssembly.Instance> {
  try {
    return ok(new WebAssembly.Instance(compiled));
  } catch (e) {
    return fail(fault("instantiate", "module instantiation failed", undefined, errorMessage(e)));
  }
}

function isHostFunction(value: unknown): value is HostFunction {
  return typeof value === "function";
}

/** The object exports are looked up on. */
export function exportSurface(instance: HostInstance, asmJs: boolean): Result<object> {
  if (asmJs) return ok(instance);
  const exports: unknown = Reflect.get(instance, "exports");
  if (typeof exports !== "object" || exports === null) {
    return fail(fault("export", "instance has no exports object"));
  }
  return ok(exports);
}

/** Own-property lookup only; inherited members never count as exports. */
export function getExport(surface: object, name: string): Result<HostFunction> {
  const descriptor = Object.getOwnPropertyDescriptor(surface, name);
  if (!descriptor) return fail(fault("export", `no such export '${name}'`));
  const value: unknown = descriptor.value;
  if (!isHostFunction(value)) return fail(fault("export", `export '${name}' is not a function`));
  return ok(value);
}

/** Call with an undefined receiver. A thrown error is a null result. */
export function invoke(fn: HostFunction, args: readonly unknown[]): Result<unknown> {
  try {
    return ok(Reflect.apply(fn, undefined, args));
  } catch (e) {
    return fail(fault("export", "invocation was null", undefined, errorMessage(e)));
  }
}
