import type { ValueType } from "./module.js";

export enum Opcode {
  // Control
  Unreachable = 0x00,
  Nop = 0x01,
  Block = 0x02,
  Loop = 0x03,
  If = 0x04,
  Else = 0x05,
  End = 0x0b,
  Br = 0x0c,
  BrIf = 0x0d,
  BrTable = 0x0e,
  Return = 0x0f,
  Call = 0x10,
  CallIndirect = 0x11,

  // Parametric
  Drop = 0x1a,
  Select = 0x1b,

  // Variables
  LocalGet = 0x20,
  LocalSet = 0x21,
  LocalTee = 0x22,
  GlobalGet = 0x23,
  GlobalSet = 0x24,

  // Memory
  I32Load = 0x28,
  I64Load = 0x29,
  F32Load = 0x2a,
  F64Load = 0x2b,
  I32Load8S = 0x2c,
  I32Load8U = 0x2d,
  I32Load16S = 0x2e,
  I32Load16U = 0x2f,
  I64Load8S = 0x30,
  I64Load8U = 0x31,
  I64Load16S = 0x32,
  I64Load16U = 0x33,
  I64Load32S = 0x34,
  I64Load32U = 0x35,
  I32Store = 0x36,
  I64Store = 0x37,
  F32Store = 0x38,
  F64Store = 0x39,
  I32Store8 = 0x3a,
  I32Store16 = 0x3b,
  I64Store8 = 0x3c,
  I64Store16 = 0x3d,
  I64Store32 = 0x3e,
  MemorySize = 0x3f,
  MemoryGrow = 0x40,

  // Constants
  I32Const = 0x41,
  I64Const = 0x42,
  F32Const = 0x43,
  F64Const = 0x44,

  // i32 comparisons
  I32Eqz = 0x45,
  I32Eq = 0x46,
  I32Ne = 0x47,
  I32LtS = 0x48,
  I32LtU = 0x49,
  I32GtS = 0x4a,
  I32GtU = 0x4b,
  I32LeS = 0x4c,
  I32LeU = 0x4d,
  I32GeS = 0x4e,
  I32GeU = 0x4f,

  // i64 comparisons
  I64Eqz = 0x50,
  I64Eq = 0x51,
  I64Ne = 0x52,
  I64LtS = 0x53,
  I64LtU = 0x54,
  I64GtS = 0x55,
  I64GtU = 0x56,
  I64LeS = 0x57,
  I64LeU = 0x58,
  I64GeS = 0x59,
  I64GeU = 0x5a,

  // float comparisons
  F32Eq = 0x5b,
  F32Ne = 0x5c,
  F32Lt = 0x5d,
  F32Gt = 0x5e,
  F32Le = 0x5f,
  F32Ge = 0x60,
  F64Eq = 0x61,
  F64Ne = 0x62,
  F64Lt = 0x63,
  F64Gt = 0x64,
  F64Le = 0x65,
  F64Ge = 0x66,

  // i32 arithmetic
  I32Clz = 0x67,
  I32Ctz = 0x68,
  I32Popcnt = 0x69,
  I32Add = 0x6a,
  I32Sub = 0x6b,
  I32Mul = 0x6c,
  I32DivS = 0x6d,
  I32DivU = 0x6e,
  I32RemS = 0x6f,
  I32RemU = 0x70,
  I32And = 0x71,
  I32Or = 0x72,
  I32Xor = 0x73,
  I32Shl = 0x74,
  I32ShrS = 0x75,
  I32ShrU = 0x76,
  I32Rotl = 0x77,
  I32Rotr = 0x78,

  // i64 arithmetic
  I64Clz = 0x79,
  I64Ctz = 0x7a,
  I64Popcnt = 0x7b,
  I64Add = 0x7c,
  I64Sub = 0x7d,
  I64Mul = 0x7e,
  I64DivS = 0x7f,
  I64DivU = 0x80,
  I64RemS = 0x81,
  I64RemU = 0x82,
  I64And = 0x83,
  I64Or = 0x84,
  I64Xor = 0x85,
  I64Shl = 0x86,
  I64ShrS = 0x87,
  I64ShrU = 0x88,
  I64Rotl = 0x89,
  I64Rotr = 0x8a,

  // f32 arithmetic
  F32Abs = 0x8b,
  F32Neg = 0x8c,
  F32Ceil = 0x8d,
  F32Floor = 0x8e,
  F32Trunc = 0x8f,
  F32Nearest = 0x90,
  F32Sqrt = 0x91,
  F32Add = 0x92,
  F32Sub = 0x93,
  F32Mul = 0x94,
  F32Div = 0x95,
  F32Min = 0x96,
  F32Max = 0x97,
  F32Copysign = 0x98,

  // f64 arithmetic
  F64Abs = 0x99,
  F64Neg = 0x9a,
  F64Ceil = 0x9b,
  F64Floor = 0x9c,
  F64Trunc = 0x9d,
  F64Nearest = 0x9e,
  F64Sqrt = 0x9f,
  F64Add = 0xa0,
  F64Sub = 0xa1,
  F64Mul = 0xa2,
  F64Div = 0xa3,
  F64Min = 0xa4,
  F64Max = 0xa5,
  F64Copysign = 0xa6,

  // Conversions
  I32WrapI64 = 0xa7,
  I32TruncF32S = 0xa8,
  I32TruncF32U = 0xa9,
  I32TruncF64S = 0xaa,
  I32TruncF64U = 0xab,
  I64ExtendI32S = 0xac,
  I64ExtendI32U = 0xad,
  I64TruncF32S = 0xae,
  I64TruncF32U = 0xaf,
  I64TruncF64S = 0xb0,
  I64TruncF64U = 0xb1,
  F32ConvertI32S = 0xb2,
  F32ConvertI32U = 0xb3,
  F32ConvertI64S = 0xb4,
  F32ConvertI64U = 0xb5,
  F32DemoteF64 = 0xb6,
  F64ConvertI32S = 0xb7,
  F64ConvertI32U = 0xb8,
  F64ConvertI64S = 0xb9,
  F64ConvertI64U = 0xba,
  F64PromoteF32 = 0xbb,
  I32ReinterpretF32 = 0xbc,
  I64ReinterpretF64 = 0xbd,
  F32ReinterpretI32 = 0xbe,
  F64ReinterpretI64 = 0xbf,

  // Sign extension
  I32Extend8S = 0xc0,
  I32Extend16S = 0xc1,
  I64Extend8S = 0xc2,
  I64Extend16S = 0xc3,
  I64Extend32S = 0xc4,
}

export interface OperatorSignature {
  params: readonly ValueType[];
  results: readonly ValueType[];
}

function sig(params: ValueType[], results: ValueType[]): OperatorSignature {
  return { params, results };
}

const CONVERSIONS: ReadonlyMap<number, OperatorSignature> = new Map<number, OperatorSignature>([
  [Opcode.I32WrapI64, sig(["i64"], ["i32"])],
  [Opcode.I32TruncF32S, sig(["f32"], ["i32"])],
  [Opcode.I32TruncF32U, sig(["f32"], ["i32"])],
  [Opcode.I32TruncF64S, sig(["f64"], ["i32"])],
  [Opcode.I32TruncF64U, sig(["f64"], ["i32"])],
  [Opcode.I64ExtendI32S, sig(["i32"], ["i64"])],
  [Opcode.I64ExtendI32U, sig(["i32"], ["i64"])],
  [Opcode.I64TruncF32S, sig(["f32"], ["i64"])],
  [Opcode.I64TruncF32U, sig(["f32"], ["i64"])],
  [Opcode.I64TruncF64S, sig(["f64"], ["i64"])],
  [Opcode.I64TruncF64U, sig(["f64"], ["i64"])],
  [Opcode.F32ConvertI32S, sig(["i32"], ["f32"])],
  [Opcode.F32ConvertI32U, sig(["i32"], ["f32"])],
  [Opcode.F32ConvertI64S, sig(["i64"], ["f32"])],
  [Opcode.F32ConvertI64U, sig(["i64"], ["f32"])],
  [Opcode.F32DemoteF64, sig(["f64"], ["f32"])],
  [Opcode.F64ConvertI32S, sig(["i32"], ["f64"])],
  [Opcode.F64ConvertI32U, sig(["i32"], ["f64"])],
  [Opcode.F64ConvertI64S, sig(["i64"], ["f64"])],
  [Opcode.F64ConvertI64U, sig(["i64"], ["f64"])],
  [Opcode.F64PromoteF32, sig(["f32"], ["f64"])],
  [Opcode.I32ReinterpretF32, sig(["f32"], ["i32"])],
  [Opcode.I64ReinterpretF64, sig(["f64"], ["i64"])],
  [Opcode.F32ReinterpretI32, sig(["i32"], ["f32"])],
  [Opcode.F64ReinterpretI64, sig(["i64"], ["f64"])],
]);

/**
 * Operand and result types of the stack-only numeric operators
 * (0x45..0xc4). Returns undefined for every other opcode.
 */
export function numericSignature(op: number): OperatorSignature | undefined {
  if (op === Opcode.I32Eqz) return sig(["i32"], ["i32"]);
  if (op >= Opcode.I32Eq && op <= Opcode.I32GeU) return sig(["i32", "i32"], ["i32"]);
  if (op === Opcode.I64Eqz) return sig(["i64"], ["i32"]);
  if (op >= Opcode.I64Eq && op <= Opcode.I64GeU) return sig(["i64", "i64"], ["i32"]);
  if (op >= Opcode.F32Eq && op <= Opcode.F32Ge) return sig(["f32", "f32"], ["i32"]);
  if (op >= Opcode.F64Eq && op <= Opcode.F64Ge) return sig(["f64", "f64"], ["i32"]);
  if (op >= Opcode.I32Clz && op <= Opcode.I32Popcnt) return sig(["i32"], ["i32"]);
  if (op >= Opcode.I32Add && op <= Opcode.I32Rotr) return sig(["i32", "i32"], ["i32"]);
  if (op >= Opcode.I64Clz && op <= Opcode.I64Popcnt) return sig(["i64"], ["i64"]);
  if (op >= Opcode.I64Add && op <= Opcode.I64Rotr) return sig(["i64", "i64"], ["i64"]);
  if (op >= Opcode.F32Abs && op <= Opcode.F32Sqrt) return sig(["f32"], ["f32"]);
  if (op >= Opcode.F32Add && op <= Opcode.F32Copysign) return sig(["f32", "f32"], ["f32"]);
  if (op >= Opcode.F64Abs && op <= Opcode.F64Sqrt) return sig(["f64"], ["f64"]);
  if (op >= Opcode.F64Add && op <= Opcode.F64Copysign) return sig(["f64", "f64"], ["f64"]);
  const conversion = CONVERSIONS.get(op);
  if (conversion) return conversion;
  if (op === Opcode.I32Extend8S || op === Opcode.I32Extend16S) return sig(["i32"], ["i32"]);
  if (op >= Opcode.I64Extend8S && op <= Opcode.I64Extend32S) return sig(["i64"], ["i64"]);
  return undefined;
}

export interface MemoryAccess {
  type: ValueType;
  /** Access width in bytes. */
  width: number;
  signed: boolean;
  store: boolean;
}

const MEMORY_ACCESS: ReadonlyMap<number, MemoryAccess> = new Map<number, MemoryAccess>([
  [Opcode.I32Load, { type: "i32", width: 4, signed: false, store: false }],
  [Opcode.I64Load, { type: "i64", width: 8, signed: false, store: false }],
  [Opcode.F32Load, { type: "f32", width: 4, signed: false, store: false }],
  [Opcode.F64Load, { type: "f64", width: 8, signed: false, store: false }],
  [Opcode.I32Load8S, { type: "i32", width: 1, signed: true, store: false }],
  [Opcode.I32Load8U, { type: "i32", width: 1, signed: false, store: false }],
  [Opcode.I32Load16S, { type: "i32", width: 2, signed: true, store: false }],
  [Opcode.I32Load16U, { type: "i32", width: 2, signed: false, store: false }],
  [Opcode.I64Load8S, { type: "i64", width: 1, signed: true, store: false }],
  [Opcode.I64Load8U, { type: "i64", width: 1, signed: false, store: false }],
  [Opcode.I64Load16S, { type: "i64", width: 2, signed: true, store: false }],
  [Opcode.I64Load16U, { type: "i64", width: 2, signed: false, store: false }],
  [Opcode.I64Load32S, { type: "i64", width: 4, signed: true, store: false }],
  [Opcode.I64Load32U, { type: "i64", width: 4, signed: false, store: false }],
  [Opcode.I32Store, { type: "i32", width: 4, signed: false, store: true }],
  [Opcode.I64Store, { type: "i64", width: 8, signed: false, store: true }],
  [Opcode.F32Store, { type: "f32", width: 4, signed: false, store: true }],
  [Opcode.F64Store, { type: "f64", width: 8, signed: false, store: true }],
  [Opcode.I32Store8, { type: "i32", width: 1, signed: false, store: true }],
  [Opcode.I32Store16, { type: "i32", width: 2, signed: false, store: true }],
  [Opcode.I64Store8, { type: "i64", width: 1, signed: false, store: true }],
  [Opcode.I64Store16, { type: "i64", width: 2, signed: false, store: true }],
  [Opcode.I64Store32, { type: "i64", width: 4, signed: false, store: true }],
]);

export function memoryAccess(op: number): MemoryAccess | undefined {
  return MEMORY_ACCESS.get(op);
}

export function opcodeName(op: number): string {
  const name = Opcode[op];
  return name ?? `0x${op.toString(16).padStart(2, "0")}`;
}

export function valueTypeFromByte(byte: number): ValueType | undefined {
  switch (byte) {
    case 0x7f: return "i32";
    case 0x7e: return "i64";
    case 0x7d: return "f32";
    case 0x7c: return "f64";
    default: return undefined;
  }
}
