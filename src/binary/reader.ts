export class DecodeError extends Error {
  constructor(message: string, readonly offset: number) {
    super(message);
    this.name = "DecodeError";
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Bounded cursor over module bytes. Offsets are absolute into `bytes`, so a
 * reader over one section reports positions the same way as one over the
 * whole module.
 */
export class ByteReader {
  private readonly view: DataView;
  private cursor: number;

  constructor(
    readonly bytes: Uint8Array,
    start: number = 0,
    readonly end: number = bytes.length,
  ) {
    if (start < 0 || end > bytes.length || start > end) {
      throw new RangeError(`Invalid reader bounds [${start}, ${end}) for ${bytes.length} bytes`);
    }
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.cursor = start;
  }

  get pos(): number {
    return this.cursor;
  }

  get remaining(): number {
    return this.end - this.cursor;
  }

  atEnd(): boolean {
    return this.cursor >= this.end;
  }

  error(message: string, offset: number = this.cursor): DecodeError {
    return new DecodeError(message, offset);
  }

  private need(n: number, what: string): void {
    if (this.cursor + n > this.end) {
      throw this.error(`unexpected end of input while reading ${what}`);
    }
  }

  u8(): number {
    this.need(1, "byte");
    return this.bytes[this.cursor++];
  }

  peek(): number {
    this.need(1, "byte");
    return this.bytes[this.cursor];
  }

  u32le(): number {
    this.need(4, "u32");
    const v = this.view.getUint32(this.cursor, true);
    this.cursor += 4;
    return v;
  }

  skip(n: number): void {
    this.need(n, `${n} bytes`);
    this.cursor += n;
  }

  take(n: number): Uint8Array {
    this.need(n, `${n} bytes`);
    const slice = this.bytes.subarray(this.cursor, this.cursor + n);
    this.cursor += n;
    return slice;
  }

  varU32(): number {
    const start = this.cursor;
    let result = 0;
    let shift = 0;
    for (let i = 0; ; i++) {
      const b = this.u8();
      if (i === 4 && (b & 0xf0) !== 0) {
        throw this.error("invalid LEB128 u32", start);
      }
      result += (b & 0x7f) * 2 ** shift;
      if ((b & 0x80) === 0) return result;
      shift += 7;
    }
  }

  varS32(): number {
    const start = this.cursor;
    let result = 0;
    let shift = 0;
    let b = 0;
    for (let i = 0; ; i++) {
      b = this.u8();
      if (i === 4) {
        const signBits = b & 0x70;
        const valid = (b & 0x80) === 0 && ((b & 0x08) !== 0 ? signBits === 0x70 : signBits === 0);
        if (!valid) throw this.error("invalid LEB128 s32", start);
      }
      result |= (b & 0x7f) << shift;
      shift += 7;
      if ((b & 0x80) === 0) break;
    }
    if (shift < 32 && (b & 0x40) !== 0) {
      result |= ~0 << shift;
    }
    return result | 0;
  }

  varS64(): bigint {
    const start = this.cursor;
    let result = 0n;
    let shift = 0n;
    let b = 0;
    for (let i = 0; ; i++) {
      b = this.u8();
      if (i === 9) {
        const rest = b & 0x7e;
        const valid = (b & 0x80) === 0 && ((b & 0x01) !== 0 ? rest === 0x7e : rest === 0);
        if (!valid) throw this.error("invalid LEB128 s64", start);
      }
      result |= BigInt(b & 0x7f) << shift;
      shift += 7n;
      if ((b & 0x80) === 0) break;
    }
    if (shift < 64n && (b & 0x40) !== 0) {
      result |= -1n << shift;
    }
    return BigInt.asIntN(64, result);
  }

  f32(): number {
    this.need(4, "f32");
    const v = this.view.getFloat32(this.cursor, true);
    this.cursor += 4;
    return v;
  }

  f64(): number {
    this.need(8, "f64");
    const v = this.view.getFloat64(this.cursor, true);
    this.cursor += 8;
    return v;
  }

  name(): string {
    const start = this.cursor;
    const length = this.varU32();
    const raw = this.take(length);
    try {
      return utf8.decode(raw);
    } catch {
      throw this.error("invalid UTF-8 in name", start);
    }
  }
}
