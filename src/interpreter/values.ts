import type { ConstExpr, ValueType } from "../binary/module.js";

export type WasmValue =
  | { type: "i32"; value: number }
  | { type: "i64"; value: bigint }
  | { type: "f32"; value: number }
  | { type: "f64"; value: number };

export const i32 = (value: number): WasmValue => ({ type: "i32", value: value | 0 });
export const i64 = (value: bigint): WasmValue => ({ type: "i64", value: BigInt.asIntN(64, value) });
export const f32 = (value: number): WasmValue => ({ type: "f32", value: Math.fround(value) });
export const f64 = (value: number): WasmValue => ({ type: "f64", value });

export function defaultValue(type: ValueType): WasmValue {
  switch (type) {
    case "i32": return i32(0);
    case "i64": return i64(0n);
    case "f32": return f32(0);
    case "f64": return f64(0);
  }
}

/**
 * Coerce any value to a 32-bit signed integer: i64 keeps its low 32 bits,
 * floats go through ToInt32.
 */
export function toInt32(v: WasmValue): number {
  switch (v.type) {
    case "i32": return v.value;
    case "i64": return Number(BigInt.asIntN(32, v.value));
    case "f32":
    case "f64":
      return v.value | 0;
  }
}

export function evalConstExpr(expr: ConstExpr, globals: readonly WasmValue[]): WasmValue {
  switch (expr.kind) {
    case "i32.const": return i32(expr.value);
    case "i64.const": return i64(expr.value);
    case "f32.const": return f32(expr.value);
    case "f64.const": return f64(expr.value);
    case "global.get": return globals[expr.index];
  }
}

/**
 * Parse a command-line style literal into a value of the given type.
 * Returns undefined when the text is not a valid literal.
 */
export function parseValue(type: ValueType, text: string): WasmValue | undefined {
  const trimmed = text.trim();
  if (trimmed === "") return undefined;
  if (type === "i64") {
    try {
      return i64(BigInt(trimmed.replace(/n$/, "")));
    } catch {
      return undefined;
    }
  }
  const n = Number(trimmed);
  if (Number.isNaN(n) && trimmed.toLowerCase() !== "nan") return undefined;
  switch (type) {
    case "i32": return Number.isInteger(n) ? i32(n) : undefined;
    case "f32": return f32(n);
    case "f64": return f64(n);
  }
}

export function formatValue(v: WasmValue): string {
  return v.type === "i64" ? `${v.value}n` : String(v.value);
}
