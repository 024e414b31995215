import type { Result } from "../errors/fault.js";
import { fault, fail, ok } from "../errors/fault.js";

/**
 * A function body as a window onto the module buffer: `view` shares memory
 * with `buffer`, and `start`/`end` stay absolute so positions reported while
 * reading the body are module offsets.
 */
export interface FunctionBody {
  readonly buffer: Uint8Array;
  readonly start: number;
  readonly end: number;
  readonly view: Uint8Array;
}

export function sliceFunctionBody(buffer: Uint8Array, start: number, end: number): Result<FunctionBody> {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > buffer.length || start >= end) {
    return fail(fault("verify", `function body range [${start}, ${end}) is outside the module (${buffer.length} bytes)`));
  }
  return ok({ buffer, start, end, view: buffer.subarray(start, end) });
}
