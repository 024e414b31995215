import { sliceFunctionBody } from "../binary/body.js";
import { decodeModule } from "../binary/decoder.js";
import type { Module, ModuleOrigin, WasmFunction } from "../binary/module.js";
import { findExport, signatureToString } from "../binary/module.js";
import { resolveConfig, type HarnessConfig } from "../config/config.js";
import type { Result } from "../errors/fault.js";
import { fault, fail, ok } from "../errors/fault.js";
import {
  compileModule,
  exportSurface,
  getExport,
  instantiate,
  invoke,
  type HostInstance,
} from "../host/bridge.js";
import { Interpreter } from "../interpreter/interpreter.js";
import { formatValue, toInt32, type WasmValue } from "../interpreter/values.js";
import { createModuleInstance } from "../runtime/instance.js";
import { verifyFunctionBody } from "../validation/verifier.js";
import { failed, finished, trapped, type ExecutionOutcome } from "./outcome.js";
import { checkPreconditions } from "./preconditions.js";

export { getMinModuleMemSize } from "../runtime/instance.js";
export { HARNESS_FAILURE, TRAP_SENTINEL, type ExecutionOutcome } from "./outcome.js";
export { checkPreconditions } from "./preconditions.js";
export type { HostInstance } from "../host/bridge.js";

export type ExecutionMode =
  | { kind: "compiled"; asmJs?: boolean; args?: readonly unknown[] }
  | { kind: "interpreted"; args?: readonly WasmValue[] };

export interface CompileAndRunOptions {
  asmJs?: boolean;
}

export interface CallOptions {
  asmJs?: boolean;
}

/** Decode without verifying function bodies. */
export function decodeForTesting(bytes: Uint8Array, origin: ModuleOrigin): Result<Module> {
  const decoded = decodeModule(bytes, origin, { verifyFunctions: false });
  if (decoded.ok) return decoded;
  return fail(...decoded.faults.map((f) => ({ ...f, message: `module decode failed: ${f.message}` })));
}

/**
 * Compile and instantiate through the host with no imports. asm.js modules
 * hand back their exports object, wasm modules the instance.
 */
export function instantiateForTesting(module: Module): Result<HostInstance> {
  const checked = checkPreconditions(module);
  if (!checked.ok) return checked;
  const compiled = compileModule(module);
  if (!compiled.ok) return compiled;
  const instance = instantiate(compiled.value);
  if (!instance.ok) return instance;
  return ok(module.origin === "asm-js" ? instance.value.exports : instance.value);
}

export function callExportedFunction(
  instance: HostInstance,
  name: string,
  args: readonly unknown[],
  options: CallOptions = {},
): ExecutionOutcome {
  const surface = exportSurface(instance, options.asmJs ?? false);
  if (!surface.ok) return failed(surface.faults);
  const fn = getExport(surface.value, name);
  if (!fn.ok) return failed(fn.faults);
  const returned = invoke(fn.value, args);
  if (!returned.ok) return failed(returned.faults);
  if (typeof returned.value !== "number") {
    return failed([fault("export", "return value should be number", undefined, `'${name}' returned ${typeof returned.value}`)]);
  }
  return finished(returned.value | 0);
}

/** Decode, instantiate and call `caller` (asm.js) or `main` (wasm) with no arguments. */
export function compileAndRun(
  bytes: Uint8Array,
  options: CompileAndRunOptions = {},
  config: Partial<HarnessConfig> = {},
): ExecutionOutcome {
  const { logger } = resolveConfig(config);
  const asmJs = options.asmJs ?? false;
  const decoded = decodeForTesting(bytes, asmJs ? "asm-js" : "wasm");
  if (!decoded.ok) return failed(decoded.faults);
  const instance = instantiateForTesting(decoded.value);
  if (!instance.ok) return failed(instance.faults);
  const entry = asmJs ? "caller" : "main";
  logger.debug(`calling '${entry}' through the host`);
  return callExportedFunction(instance.value, entry, [], { asmJs });
}

function resolveFunction(module: Module, functionIndex: number): Result<WasmFunction> {
  if (!Number.isInteger(functionIndex) || functionIndex < 0 || functionIndex >= module.functions.length) {
    return fail(fault("precondition", `function index ${functionIndex} out of range`));
  }
  const fn = module.functions[functionIndex];
  if (fn.imported) return fail(fault("precondition", `function ${functionIndex} is imported`));
  return ok(fn);
}

function checkArguments(fn: WasmFunction, args: readonly WasmValue[]): Result<readonly WasmValue[]> {
  const params = fn.signature.params;
  if (args.length !== params.length) {
    return fail(fault(
      "argument",
      `function ${fn.index} expects ${params.length} argument(s), got ${args.length}`,
      undefined,
      `signature is ${signatureToString(fn.signature)}`,
    ));
  }
  for (let i = 0; i < params.length; i++) {
    if (args[i].type !== params[i]) {
      return fail(fault("argument", `argument ${i} should be ${params[i]}, got ${args[i].type} ${formatValue(args[i])}`));
    }
  }
  return ok(args);
}

/**
 * Run one defined function on a fresh instance and interpreter thread.
 * The entry body is verified before anything executes.
 */
export function interpret(
  module: Module,
  functionIndex: number,
  args: readonly WasmValue[],
  config: Partial<HarnessConfig> = {},
): ExecutionOutcome {
  const context = resolveConfig(config);
  const checked = checkPreconditions(module);
  if (!checked.ok) return failed(checked.faults);
  const resolved = resolveFunction(module, functionIndex);
  if (!resolved.ok) return failed(resolved.faults);
  const fn = resolved.value;
  const argsChecked = checkArguments(fn, args);
  if (!argsChecked.ok) return failed(argsChecked.faults);

  const instance = createModuleInstance(module, context);
  if (!instance.ok) return failed(instance.faults);
  const interpreter = new Interpreter(instance.value);

  const body = sliceFunctionBody(module.bytes, fn.codeStart, fn.codeEnd);
  if (!body.ok) return failed(body.faults);
  const verified = verifyFunctionBody(interpreter.environment, fn.signature, body.value);
  if (!verified.ok) {
    const [first] = verified.faults;
    return failed([fault("verify", "function did not verify", first.offset, first.message)]);
  }
  interpreter.addVerifiedCode(fn.index, verified.value);

  const thread = interpreter.getThread(0);
  thread.reset();
  thread.pushFrame(fn.index, argsChecked.value);
  const state = thread.run();
  context.logger.debug(`function ${fn.index}: ${state} after ${thread.stepsExecuted} steps`);

  const trap = thread.lastTrap;
  if (state === "trapped" && trap) return trapped(trap.reason, trap.message, trap.offset);
  if (state !== "finished") {
    return failed([fault(
      "step-bound",
      "interpreter did not finish execution within its step bound",
      undefined,
      `step bound is ${context.stepBound}`,
    )]);
  }
  const value = thread.getReturnValue();
  if (!value) return failed([fault("export", "return value should be number", undefined, `function ${fn.index} returns nothing`)]);
  return finished(toInt32(value));
}

function exportedFunctionName(module: Module, functionIndex: number): string | undefined {
  return module.exports.find((e) => e.kind === "function" && e.index === functionIndex)?.name;
}

/**
 * Run an entry point, named by export or by function index, on either path.
 */
export function runModule(
  module: Module,
  entry: string | number,
  mode: ExecutionMode,
  config: Partial<HarnessConfig> = {},
): ExecutionOutcome {
  switch (mode.kind) {
    case "compiled": {
      const name = typeof entry === "string" ? entry : exportedFunctionName(module, entry);
      if (name === undefined) return failed([fault("export", `function ${entry} is not exported`)]);
      const instance = instantiateForTesting(module);
      if (!instance.ok) return failed(instance.faults);
      return callExportedFunction(instance.value, name, mode.args ?? [], {
        asmJs: mode.asmJs ?? module.origin === "asm-js",
      });
    }
    case "interpreted": {
      if (typeof entry === "number") return interpret(module, entry, mode.args ?? [], config);
      const exported = findExport(module, entry);
      if (!exported || exported.kind !== "function") {
        return failed([fault("export", `no such export '${entry}'`)]);
      }
      return interpret(module, exported.index, mode.args ?? [], config);
    }
  }
}
