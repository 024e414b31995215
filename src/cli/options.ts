import { readFile } from "node:fs/promises";
import type { Module, ValueType } from "../binary/module.js";
import { findExport, signatureToString } from "../binary/module.js";
import type { Result } from "../errors/fault.js";
import { fault, fail, ok } from "../errors/fault.js";
import { getMinModuleMemSize } from "../harness/harness.js";
import { parseValue, type WasmValue } from "../interpreter/values.js";
import { assembleText } from "../text/assembler.js";

/** Module bytes from a `.wasm` file, or assembled from a `.wat` file. */
export async function loadModuleBytes(file: string): Promise<Result<Uint8Array>> {
  if (file.endsWith(".wat")) {
    return assembleText(await readFile(file, "utf-8"), file);
  }
  return ok(new Uint8Array(await readFile(file)));
}

/** A decimal string names a function index, anything else an export. */
export function parseEntry(text: string): string | number {
  return /^\d+$/.test(text) ? Number(text) : text;
}

/** Host call arguments: numbers, or bigints written with a trailing `n`. */
export function parseHostArgs(texts: readonly string[]): Result<(number | bigint)[]> {
  const values: (number | bigint)[] = [];
  for (const text of texts) {
    if (/^-?\d+n$/.test(text)) {
      values.push(BigInt(text.slice(0, -1)));
      continue;
    }
    const n = Number(text);
    if (text.trim() === "" || Number.isNaN(n)) return fail(fault("argument", `'${text}' is not a number`));
    values.push(n);
  }
  return ok(values);
}

function paramTypes(module: Module, entry: string | number): readonly ValueType[] | undefined {
  const index = typeof entry === "number" ? entry : findExport(module, entry)?.index;
  if (index === undefined) return undefined;
  return module.functions[index]?.signature.params;
}

/**
 * Interpreter arguments typed against the entry's parameters. Arguments past
 * the parameter list are read as i32 so the arity check reports them.
 */
export function parseInterpreterArgs(
  module: Module,
  entry: string | number,
  texts: readonly string[],
): Result<WasmValue[]> {
  const params = paramTypes(module, entry) ?? [];
  const values: WasmValue[] = [];
  for (let i = 0; i < texts.length; i++) {
    const type = i < params.length ? params[i] : "i32";
    const value = parseValue(type, texts[i]);
    if (!value) return fail(fault("argument", `argument ${i} '${texts[i]}' is not a valid ${type}`));
    values.push(value);
  }
  return ok(values);
}

export function describeModule(module: Module): string[] {
  const lines: string[] = [];
  lines.push(`origin: ${module.origin}`);
  if (module.memory) {
    const max = module.memory.max === null ? "" : `, max ${module.memory.max}`;
    lines.push(`memory: ${module.minMemPages} page(s)${max}, ${getMinModuleMemSize(module)} bytes`);
  } else {
    lines.push("memory: none");
  }
  lines.push(`imports: ${module.imports.length}`);
  for (const imp of module.imports) lines.push(`  ${imp.module}.${imp.field} (${imp.kind})`);
  lines.push(`exports: ${module.exports.length}`);
  for (const exp of module.exports) lines.push(`  ${exp.name} -> ${exp.kind} ${exp.index}`);
  lines.push(`functions: ${module.functions.length}`);
  for (const fn of module.functions) {
    const where = fn.imported ? "imported" : `body 0x${fn.codeStart.toString(16)}..0x${fn.codeEnd.toString(16)}`;
    lines.push(`  [${fn.index}] ${signatureToString(fn.signature)} ${where}`);
  }
  return lines;
}
