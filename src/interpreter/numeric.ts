import { Opcode } from "../binary/opcodes.js";
import { Trap } from "./trap.js";
import { f32, f64, i32, i64, type WasmValue } from "./values.js";

const INT32_MIN = -0x80000000;
const INT64_MIN = -(2n ** 63n);
const TWO_POW_63 = 2 ** 63;
const TWO_POW_64 = 2 ** 64;

const scratch = new DataView(new ArrayBuffer(8));

/**
 * Numeric operator semantics. With `asmJs` set, i32 division and float to
 * integer truncation follow asm.js: no traps, results wrap or become 0.
 */
export function evalNumeric(op: number, operands: readonly WasmValue[], asmJs: boolean): WasmValue {
  const [a, b] = operands;
  switch (operands.length) {
    case 1:
      return unary(op, a, asmJs);
    case 2:
      return binary(op, a, b, asmJs);
    default:
      throw new Error(`numeric operator ${op} takes 1 or 2 operands, got ${operands.length}`);
  }
}

function num(v: WasmValue): number {
  if (v.type === "i64") throw new Error("expected a 32-bit or float operand, got i64");
  return v.value;
}

function big(v: WasmValue): bigint {
  if (v.type !== "i64") throw new Error(`expected an i64 operand, got ${v.type}`);
  return v.value;
}

const u64 = (x: bigint) => BigInt.asUintN(64, x);
const bool = (c: boolean) => i32(c ? 1 : 0);

function popcnt32(x: number): number {
  let n = x >>> 0;
  let count = 0;
  while (n !== 0) {
    count += n & 1;
    n >>>= 1;
  }
  return count;
}

function ctz32(x: number): number {
  return x === 0 ? 32 : 31 - Math.clz32(x & -x);
}

function nearest(x: number): number {
  if (!Number.isFinite(x) || x === 0) return x;
  if (Math.abs(x - Math.trunc(x)) === 0.5) return 2 * Math.round(x / 2);
  return Math.round(x);
}

function signBit(x: number): boolean {
  scratch.setFloat64(0, x);
  return (scratch.getUint8(0) & 0x80) !== 0;
}

function copysign(x: number, y: number): number {
  return signBit(y) ? -Math.abs(x) : Math.abs(x);
}

function floatUnary(op: number, x: number): number {
  switch (op) {
    case Opcode.F32Abs: case Opcode.F64Abs: return Math.abs(x);
    case Opcode.F32Neg: case Opcode.F64Neg: return -x;
    case Opcode.F32Ceil: case Opcode.F64Ceil: return Math.ceil(x);
    case Opcode.F32Floor: case Opcode.F64Floor: return Math.floor(x);
    case Opcode.F32Trunc: case Opcode.F64Trunc: return Math.trunc(x);
    case Opcode.F32Nearest: case Opcode.F64Nearest: return nearest(x);
    case Opcode.F32Sqrt: case Opcode.F64Sqrt: return Math.sqrt(x);
  }
  throw new Error(`not a float unary operator: ${op}`);
}

function floatBinary(op: number, x: number, y: number): number {
  switch (op) {
    case Opcode.F32Add: case Opcode.F64Add: return x + y;
    case Opcode.F32Sub: case Opcode.F64Sub: return x - y;
    case Opcode.F32Mul: case Opcode.F64Mul: return x * y;
    case Opcode.F32Div: case Opcode.F64Div: return x / y;
    case Opcode.F32Min: case Opcode.F64Min: return Math.min(x, y);
    case Opcode.F32Max: case Opcode.F64Max: return Math.max(x, y);
    case Opcode.F32Copysign: case Opcode.F64Copysign: return copysign(x, y);
  }
  throw new Error(`not a float binary operator: ${op}`);
}

function truncToI32(x: number, signed: boolean, asmJs: boolean): number {
  if (asmJs) return x | 0;
  if (Number.isNaN(x)) throw new Trap("invalid-conversion");
  const t = Math.trunc(x);
  const inRange = signed ? t >= INT32_MIN && t <= 0x7fffffff : t >= 0 && t <= 0xffffffff;
  if (!inRange) throw new Trap("integer-overflow");
  return t | 0;
}

function truncToI64(x: number, signed: boolean, asmJs: boolean): bigint {
  if (asmJs) return Number.isFinite(x) ? BigInt.asIntN(64, BigInt(Math.trunc(x))) : 0n;
  if (Number.isNaN(x)) throw new Trap("invalid-conversion");
  const t = Math.trunc(x);
  const inRange = signed ? t >= -TWO_POW_63 && t < TWO_POW_63 : t >= 0 && t < TWO_POW_64;
  if (!inRange) throw new Trap("integer-overflow");
  return BigInt.asIntN(64, BigInt(t));
}

function unary(op: number, a: WasmValue, asmJs: boolean): WasmValue {
  switch (op) {
    case Opcode.I32Eqz: return bool(num(a) === 0);
    case Opcode.I64Eqz: return bool(big(a) === 0n);
    case Opcode.I32Clz: return i32(Math.clz32(num(a)));
    case Opcode.I32Ctz: return i32(ctz32(num(a)));
    case Opcode.I32Popcnt: return i32(popcnt32(num(a)));
    case Opcode.I64Clz: {
      const x = u64(big(a));
      const hi = Number(x >> 32n);
      return i64(BigInt(hi !== 0 ? Math.clz32(hi) : 32 + Math.clz32(Number(x & 0xffffffffn))));
    }
    case Opcode.I64Ctz: {
      const x = u64(big(a));
      const lo = Number(x & 0xffffffffn);
      return i64(BigInt(lo !== 0 ? ctz32(lo) : 32 + ctz32(Number(x >> 32n))));
    }
    case Opcode.I64Popcnt: {
      const x = u64(big(a));
      return i64(BigInt(popcnt32(Number(x >> 32n)) + popcnt32(Number(x & 0xffffffffn))));
    }
    case Opcode.I32WrapI64: return i32(Number(BigInt.asIntN(32, big(a))));
    case Opcode.I32TruncF32S: case Opcode.I32TruncF64S: return i32(truncToI32(num(a), true, asmJs));
    case Opcode.I32TruncF32U: case Opcode.I32TruncF64U: return i32(truncToI32(num(a), false, asmJs));
    case Opcode.I64ExtendI32S: return i64(BigInt(num(a)));
    case Opcode.I64ExtendI32U: return i64(BigInt(num(a) >>> 0));
    case Opcode.I64TruncF32S: case Opcode.I64TruncF64S: return i64(truncToI64(num(a), true, asmJs));
    case Opcode.I64TruncF32U: case Opcode.I64TruncF64U: return i64(truncToI64(num(a), false, asmJs));
    case Opcode.F32ConvertI32S: return f32(num(a));
    case Opcode.F32ConvertI32U: return f32(num(a) >>> 0);
    case Opcode.F32ConvertI64S: return f32(Number(big(a)));
    case Opcode.F32ConvertI64U: return f32(Number(u64(big(a))));
    case Opcode.F32DemoteF64: return f32(num(a));
    case Opcode.F64ConvertI32S: return f64(num(a));
    case Opcode.F64ConvertI32U: return f64(num(a) >>> 0);
    case Opcode.F64ConvertI64S: return f64(Number(big(a)));
    case Opcode.F64ConvertI64U: return f64(Number(u64(big(a))));
    case Opcode.F64PromoteF32: return f64(num(a));
    case Opcode.I32ReinterpretF32:
      scratch.setFloat32(0, num(a));
      return i32(scratch.getInt32(0));
    case Opcode.I64ReinterpretF64:
      scratch.setFloat64(0, num(a));
      return i64(scratch.getBigInt64(0));
    case Opcode.F32ReinterpretI32:
      scratch.setInt32(0, num(a));
      return f32(scratch.getFloat32(0));
    case Opcode.F64ReinterpretI64:
      scratch.setBigInt64(0, big(a));
      return f64(scratch.getFloat64(0));
    case Opcode.I32Extend8S: return i32((num(a) << 24) >> 24);
    case Opcode.I32Extend16S: return i32((num(a) << 16) >> 16);
    case Opcode.I64Extend8S: return i64(BigInt.asIntN(8, big(a)));
    case Opcode.I64Extend16S: return i64(BigInt.asIntN(16, big(a)));
    case Opcode.I64Extend32S: return i64(BigInt.asIntN(32, big(a)));
  }
  if (op >= Opcode.F32Abs && op <= Opcode.F32Sqrt) return f32(floatUnary(op, num(a)));
  if (op >= Opcode.F64Abs && op <= Opcode.F64Sqrt) return f64(floatUnary(op, num(a)));
  throw new Error(`not a unary numeric operator: ${op}`);
}

function binary(op: number, a: WasmValue, b: WasmValue, asmJs: boolean): WasmValue {
  if (op >= Opcode.I32Eq && op <= Opcode.I32GeU) return bool(compareI32(op, num(a), num(b)));
  if (op >= Opcode.I64Eq && op <= Opcode.I64GeU) return bool(compareI64(op, big(a), big(b)));
  if (op >= Opcode.F32Eq && op <= Opcode.F64Ge) return bool(compareFloat(op, num(a), num(b)));
  if (op >= Opcode.I32Add && op <= Opcode.I32Rotr) return i32(binaryI32(op, num(a), num(b), asmJs));
  if (op >= Opcode.I64Add && op <= Opcode.I64Rotr) return i64(binaryI64(op, big(a), big(b)));
  if (op >= Opcode.F32Add && op <= Opcode.F32Copysign) return f32(floatBinary(op, num(a), num(b)));
  if (op >= Opcode.F64Add && op <= Opcode.F64Copysign) return f64(floatBinary(op, num(a), num(b)));
  throw new Error(`not a binary numeric operator: ${op}`);
}

function compareI32(op: number, x: number, y: number): boolean {
  switch (op) {
    case Opcode.I32Eq: return x === y;
    case Opcode.I32Ne: return x !== y;
    case Opcode.I32LtS: return x < y;
    case Opcode.I32LtU: return x >>> 0 < y >>> 0;
    case Opcode.I32GtS: return x > y;
    case Opcode.I32GtU: return x >>> 0 > y >>> 0;
    case Opcode.I32LeS: return x <= y;
    case Opcode.I32LeU: return x >>> 0 <= y >>> 0;
    case Opcode.I32GeS: return x >= y;
    case Opcode.I32GeU: return x >>> 0 >= y >>> 0;
  }
  throw new Error(`not an i32 comparison: ${op}`);
}

function compareI64(op: number, x: bigint, y: bigint): boolean {
  switch (op) {
    case Opcode.I64Eq: return x === y;
    case Opcode.I64Ne: return x !== y;
    case Opcode.I64LtS: return x < y;
    case Opcode.I64LtU: return u64(x) < u64(y);
    case Opcode.I64GtS: return x > y;
    case Opcode.I64GtU: return u64(x) > u64(y);
    case Opcode.I64LeS: return x <= y;
    case Opcode.I64LeU: return u64(x) <= u64(y);
    case Opcode.I64GeS: return x >= y;
    case Opcode.I64GeU: return u64(x) >= u64(y);
  }
  throw new Error(`not an i64 comparison: ${op}`);
}

function compareFloat(op: number, x: number, y: number): boolean {
  switch (op) {
    case Opcode.F32Eq: case Opcode.F64Eq: return x === y;
    case Opcode.F32Ne: case Opcode.F64Ne: return x !== y;
    case Opcode.F32Lt: case Opcode.F64Lt: return x < y;
    case Opcode.F32Gt: case Opcode.F64Gt: return x > y;
    case Opcode.F32Le: case Opcode.F64Le: return x <= y;
    case Opcode.F32Ge: case Opcode.F64Ge: return x >= y;
  }
  throw new Error(`not a float comparison: ${op}`);
}

function binaryI32(op: number, x: number, y: number, asmJs: boolean): number {
  switch (op) {
    case Opcode.I32Add: return (x + y) | 0;
    case Opcode.I32Sub: return (x - y) | 0;
    case Opcode.I32Mul: return Math.imul(x, y);
    case Opcode.I32DivS:
      if (y === 0) {
        if (asmJs) return 0;
        throw new Trap("divide-by-zero");
      }
      if (x === INT32_MIN && y === -1) {
        if (asmJs) return INT32_MIN;
        throw new Trap("integer-overflow");
      }
      return (x / y) | 0;
    case Opcode.I32DivU:
      if (y === 0) {
        if (asmJs) return 0;
        throw new Trap("divide-by-zero");
      }
      return ((x >>> 0) / (y >>> 0)) | 0;
    case Opcode.I32RemS:
      if (y === 0) {
        if (asmJs) return 0;
        throw new Trap("divide-by-zero");
      }
      return y === -1 ? 0 : (x % y) | 0;
    case Opcode.I32RemU:
      if (y === 0) {
        if (asmJs) return 0;
        throw new Trap("divide-by-zero");
      }
      return ((x >>> 0) % (y >>> 0)) | 0;
    case Opcode.I32And: return x & y;
    case Opcode.I32Or: return x | y;
    case Opcode.I32Xor: return x ^ y;
    case Opcode.I32Shl: return x << (y & 31);
    case Opcode.I32ShrS: return x >> (y & 31);
    case Opcode.I32ShrU: return (x >>> (y & 31)) | 0;
    case Opcode.I32Rotl: {
      const k = y & 31;
      return (x << k) | (x >>> ((32 - k) & 31));
    }
    case Opcode.I32Rotr: {
      const k = y & 31;
      return (x >>> k) | (x << ((32 - k) & 31));
    }
  }
  throw new Error(`not an i32 binary operator: ${op}`);
}

function binaryI64(op: number, x: bigint, y: bigint): bigint {
  switch (op) {
    case Opcode.I64Add: return x + y;
    case Opcode.I64Sub: return x - y;
    case Opcode.I64Mul: return x * y;
    case Opcode.I64DivS:
      if (y === 0n) throw new Trap("divide-by-zero");
      if (x === INT64_MIN && y === -1n) throw new Trap("integer-overflow");
      return x / y;
    case Opcode.I64DivU:
      if (y === 0n) throw new Trap("divide-by-zero");
      return u64(x) / u64(y);
    case Opcode.I64RemS:
      if (y === 0n) throw new Trap("divide-by-zero");
      return x % y;
    case Opcode.I64RemU:
      if (y === 0n) throw new Trap("divide-by-zero");
      return u64(x) % u64(y);
    case Opcode.I64And: return x & y;
    case Opcode.I64Or: return x | y;
    case Opcode.I64Xor: return x ^ y;
    case Opcode.I64Shl: return x << (u64(y) & 63n);
    case Opcode.I64ShrS: return x >> (u64(y) & 63n);
    case Opcode.I64ShrU: return u64(x) >> (u64(y) & 63n);
    case Opcode.I64Rotl: {
      const k = u64(y) & 63n;
      return (u64(x) << k) | (u64(x) >> ((64n - k) & 63n));
    }
    case Opcode.I64Rotr: {
      const k = u64(y) & 63n;
      return (u64(x) >> k) | (u64(x) << ((64n - k) & 63n));
    }
  }
  throw new Error(`not an i64 binary operator: ${op}`);
}
