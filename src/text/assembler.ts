import binaryen from "binaryen";
import type { Result } from "../errors/fault.js";
import { errorMessage, fault, fail, ok } from "../errors/fault.js";

const FEATURES = binaryen.Features.MVP | binaryen.Features.SignExt | binaryen.Features.MutableGlobals;

/**
 * Assemble WebAssembly text into module bytes. Parse and validation failures
 * are decode faults naming `filename`.
 */
export function assembleText(source: string, filename = "<input>"): Result<Uint8Array> {
  let mod: binaryen.Module;
  try {
    mod = binaryen.parseText(source);
  } catch (e) {
    return fail(fault("decode", `${filename}: could not parse module text`, undefined, errorMessage(e)));
  }
  try {
    mod.setFeatures(FEATURES);
    if (!mod.validate()) {
      return fail(fault("decode", `${filename}: module text did not validate`));
    }
    return ok(mod.emitBinary());
  } finally {
    mod.dispose();
  }
}
