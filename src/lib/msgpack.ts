import { decode, encode } from "@msgpack/msgpack";
import { raise } from "../diagnostics/index.js";

const te = new TextEncoder();
const td = new TextDecoder();

export type MessageKind =
  | "nil"
  | "boolean"
  | "integer"
  | "float"
  | "string"
  | "binary"
  | "array"
  | "map"
  | "extension";

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

export class Packer {
  private buf: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialCapacity = 128) {
    this.buf = new Uint8Array(Math.max(initialCapacity, 16));
    this.view = new DataView(this.buf.buffer);
  }

  private ensure(n: number) {
    if (this.offset + n <= this.buf.length) return;
    let size = this.buf.length * 2;
    while (size < this.offset + n) size *= 2;
    const next = new Uint8Array(size);
    next.set(this.buf.subarray(0, this.offset));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }
  private u8(b: number) {
    this.ensure(1);
    this.buf[this.offset++] = b;
  }
  private i8(n: number) {
    this.ensure(1);
    this.view.setInt8(this.offset, n);
    this.offset += 1;
  }
  private u16(n: number) {
    this.ensure(2);
    this.view.setUint16(this.offset, n);
    this.offset += 2;
  }
  private i16(n: number) {
    this.ensure(2);
    this.view.setInt16(this.offset, n);
    this.offset += 2;
  }
  private u32(n: number) {
    this.ensure(4);
    this.view.setUint32(this.offset, n);
    this.offset += 4;
  }
  private i32(n: number) {
    this.ensure(4);
    this.view.setInt32(this.offset, n);
    this.offset += 4;
  }
  private f64(n: number) {
    this.ensure(8);
    this.view.setFloat64(this.offset, n);
    this.offset += 8;
  }
  private bytes(bytes: Uint8Array) {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  get length(): number {
    return this.offset;
  }

  packNull(): void {
    this.u8(0xc0);
  }

  packBoolean(value: boolean): void {
    this.u8(value ? 0xc3 : 0xc2);
  }

  packInteger(value: number): void {
    if (!Number.isInteger(value)) {
      this.packFloat(value);
    } else if (value >= 0 && value <= 0x7f) {
      this.u8(value);
    } else if (value >= -32 && value < 0) {
      this.u8(0xe0 | (value + 32));
    } else if (value > 0 && value <= 0xff) {
      this.u8(0xcc);
      this.u8(value);
    } else if (value > 0 && value <= 0xffff) {
      this.u8(0xcd);
      this.u16(value);
    } else if (value > 0 && value <= 0xffffffff) {
      this.u8(0xce);
      this.u32(value);
    } else if (value >= -128 && value <= 127) {
      this.u8(0xd0);
      this.i8(value);
    } else if (value >= -32768 && value <= 32767) {
      this.u8(0xd1);
      this.i16(value);
    } else if (value >= -2147483648 && value <= 2147483647) {
      this.u8(0xd2);
      this.i32(value);
    } else {
      this.packFloat(value);
    }
  }

  packFloat(value: number): void {
    this.u8(0xcb);
    this.f64(value);
  }

  packString(value: string): void {
    const encoded = te.encode(value);
    const len = encoded.length;
    if (len < 32) {
      this.u8(0xa0 | len);
    } else if (len < 256) {
      this.u8(0xd9);
      this.u8(len);
    } else if (len < 65536) {
      this.u8(0xda);
      this.u16(len);
    } else {
      this.u8(0xdb);
      this.u32(len);
    }
    this.bytes(encoded);
  }

  packBinary(value: Uint8Array): void {
    const len = value.length;
    if (len < 256) {
      this.u8(0xc4);
      this.u8(len);
    } else if (len < 65536) {
      this.u8(0xc5);
      this.u16(len);
    } else {
      this.u8(0xc6);
      this.u32(len);
    }
    this.bytes(value);
  }

  packArrayHeader(length: number): void {
    if (length < 16) {
      this.u8(0x90 | length);
    } else if (length < 65536) {
      this.u8(0xdc);
      this.u16(length);
    } else {
      this.u8(0xdd);
      this.u32(length);
    }
  }

  packMapHeader(length: number): void {
    if (length < 16) {
      this.u8(0x80 | length);
    } else if (length < 65536) {
      this.u8(0xde);
      this.u16(length);
    } else {
      this.u8(0xdf);
      this.u32(length);
    }
  }

  /**
   * Packs a value of no declared type. Containers are walked so that `Map`
   * instances at any depth become MessagePack maps; leaves go to the stock
   * encoder.
   */
  packAny(value: unknown): void {
    if (value instanceof Map) {
      this.packMapHeader(value.size);
      for (const [key, item] of value) {
        this.packAny(key);
        this.packAny(item);
      }
      return;
    }
    if (Array.isArray(value)) {
      const items: readonly unknown[] = value;
      this.packArrayHeader(items.length);
      for (const item of items) this.packAny(item);
      return;
    }
    if (isPlainObject(value)) {
      const entries = Object.entries(value);
      this.packMapHeader(entries.length);
      for (const [key, item] of entries) {
        this.packString(key);
        this.packAny(item);
      }
      return;
    }
    this.bytes(encode(value));
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.offset);
  }
}

const describeByte = (b: number): string => `0x${b.toString(16)}`;

export class Unpacker {
  private view: DataView;
  private offset = 0;

  constructor(private buf: Uint8Array) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  private need(n: number) {
    if (this.offset + n > this.buf.length) {
      raise({
        code: "MP0001",
        params: { kind: "truncated", needed: n, available: this.remaining },
      });
    }
  }
  private peekByte(): number {
    this.need(1);
    return this.view.getUint8(this.offset);
  }
  private u8() {
    this.need(1);
    return this.view.getUint8(this.offset++);
  }
  private i8() {
    this.need(1);
    const v = this.view.getInt8(this.offset);
    this.offset += 1;
    return v;
  }
  private u16() {
    this.need(2);
    const v = this.view.getUint16(this.offset);
    this.offset += 2;
    return v;
  }
  private i16() {
    this.need(2);
    const v = this.view.getInt16(this.offset);
    this.offset += 2;
    return v;
  }
  private u32() {
    this.need(4);
    const v = this.view.getUint32(this.offset);
    this.offset += 4;
    return v;
  }
  private i32() {
    this.need(4);
    const v = this.view.getInt32(this.offset);
    this.offset += 4;
    return v;
  }
  private u64() {
    this.need(8);
    const v = Number(this.view.getBigUint64(this.offset));
    this.offset += 8;
    return v;
  }
  private i64() {
    this.need(8);
    const v = Number(this.view.getBigInt64(this.offset));
    this.offset += 8;
    return v;
  }
  private f32() {
    this.need(4);
    const v = this.view.getFloat32(this.offset);
    this.offset += 4;
    return v;
  }
  private f64() {
    this.need(8);
    const v = this.view.getFloat64(this.offset);
    this.offset += 8;
    return v;
  }
  private bytes(len: number) {
    this.need(len);
    const b = this.buf.slice(this.offset, this.offset + len);
    this.offset += len;
    return b;
  }
  private str(len: number) {
    return td.decode(this.bytes(len));
  }

  private unexpected(expected: string, b: number): never {
    return raise({
      code: "MP0001",
      params: { kind: "unexpected-token", expected, actual: describeByte(b) },
    });
  }

  peekKind(): MessageKind {
    const b = this.peekByte();
    if (b <= 0x7f || b >= 0xe0) return "integer";
    if (b >= 0xa0 && b <= 0xbf) return "string";
    if (b >= 0x90 && b <= 0x9f) return "array";
    if (b >= 0x80 && b <= 0x8f) return "map";
    switch (b) {
      case 0xc0:
        return "nil";
      case 0xc2:
      case 0xc3:
        return "boolean";
      case 0xc4:
      case 0xc5:
      case 0xc6:
        return "binary";
      case 0xca:
      case 0xcb:
        return "float";
      case 0xcc:
      case 0xcd:
      case 0xce:
      case 0xcf:
      case 0xd0:
      case 0xd1:
      case 0xd2:
      case 0xd3:
        return "integer";
      case 0xd9:
      case 0xda:
      case 0xdb:
        return "string";
      case 0xdc:
      case 0xdd:
        return "array";
      case 0xde:
      case 0xdf:
        return "map";
      default:
        return "extension";
    }
  }

  /** Consumes a nil when one is next. */
  tryReadNil(): boolean {
    if (this.peekByte() !== 0xc0) return false;
    this.offset += 1;
    return true;
  }

  readBoolean(): boolean {
    const b = this.u8();
    if (b === 0xc3) return true;
    if (b === 0xc2) return false;
    return this.unexpected("boolean", b);
  }

  readInteger(): number {
    const b = this.u8();
    if (b <= 0x7f) return b;
    if (b >= 0xe0) return b - 0x100;
    switch (b) {
      case 0xcc:
        return this.u8();
      case 0xcd:
        return this.u16();
      case 0xce:
        return this.u32();
      case 0xcf:
        return this.u64();
      case 0xd0:
        return this.i8();
      case 0xd1:
        return this.i16();
      case 0xd2:
        return this.i32();
      case 0xd3:
        return this.i64();
      case 0xcb: {
        const v = this.f64();
        if (Number.isInteger(v)) return v;
        return this.unexpected("integer", b);
      }
      default:
        return this.unexpected("integer", b);
    }
  }

  readFloat(): number {
    const b = this.peekByte();
    if (b === 0xcb) {
      this.offset += 1;
      return this.f64();
    }
    if (b === 0xca) {
      this.offset += 1;
      return this.f32();
    }
    return this.readInteger();
  }

  readString(): string {
    const b = this.u8();
    if (b >= 0xa0 && b <= 0xbf) return this.str(b & 0x1f);
    switch (b) {
      case 0xd9:
        return this.str(this.u8());
      case 0xda:
        return this.str(this.u16());
      case 0xdb:
        return this.str(this.u32());
      default:
        return this.unexpected("string", b);
    }
  }

  readBinary(): Uint8Array {
    const b = this.u8();
    switch (b) {
      case 0xc4:
        return this.bytes(this.u8());
      case 0xc5:
        return this.bytes(this.u16());
      case 0xc6:
        return this.bytes(this.u32());
      default:
        return this.unexpected("binary", b);
    }
  }

  readArrayHeader(): number {
    const b = this.u8();
    if (b >= 0x90 && b <= 0x9f) return b & 0x0f;
    if (b === 0xdc) return this.u16();
    if (b === 0xdd) return this.u32();
    return this.unexpected("array", b);
  }

  readMapHeader(): number {
    const b = this.u8();
    if (b >= 0x80 && b <= 0x8f) return b & 0x0f;
    if (b === 0xde) return this.u16();
    if (b === 0xdf) return this.u32();
    return this.unexpected("map", b);
  }

  /** Reads one value of no declared type with the stock decoder. */
  readAny(): unknown {
    const start = this.offset;
    this.skip();
    try {
      return decode(this.buf.subarray(start, this.offset));
    } catch (error) {
      return raise({
        code: "MP0001",
        params: {
          kind: "undecodable",
          reason: error instanceof Error ? error.message : String(error),
        },
        cause: error,
      });
    }
  }

  /** Skips one complete value, including nested items. */
  skip(): void {
    switch (this.peekKind()) {
      case "nil":
        this.offset += 1;
        return;
      case "boolean":
        this.readBoolean();
        return;
      case "integer":
        this.readInteger();
        return;
      case "float":
        this.readFloat();
        return;
      case "string":
        this.readString();
        return;
      case "binary":
        this.readBinary();
        return;
      case "array": {
        const len = this.readArrayHeader();
        for (let i = 0; i < len; i++) this.skip();
        return;
      }
      case "map": {
        const len = this.readMapHeader();
        for (let i = 0; i < len * 2; i++) this.skip();
        return;
      }
      case "extension":
        this.skipExtension();
        return;
    }
  }

  private skipExtension(): void {
    const b = this.u8();
    let size: number;
    switch (b) {
      case 0xd4:
        size = 1;
        break;
      case 0xd5:
        size = 2;
        break;
      case 0xd6:
        size = 4;
        break;
      case 0xd7:
        size = 8;
        break;
      case 0xd8:
        size = 16;
        break;
      case 0xc7:
        size = this.u8();
        break;
      case 0xc8:
        size = this.u16();
        break;
      case 0xc9:
        size = this.u32();
        break;
      default:
        return this.unexpected("a value", b);
    }
    // type byte, then the payload
    this.need(size + 1);
    this.offset += size + 1;
  }
}
