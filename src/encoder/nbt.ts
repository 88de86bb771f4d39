import { gunzipSync, gzipSync } from 'node:zlib';

// Big-endian (Java edition) named binary tags.

export type NbtTagType =
  | 'end'
  | 'byte'
  | 'short'
  | 'int'
  | 'long'
  | 'float'
  | 'double'
  | 'byteArray'
  | 'string'
  | 'list'
  | 'compound'
  | 'intArray'
  | 'longArray';

export type NbtCompound = { [name: string]: NbtTag };

export type NbtTag =
  | { type: 'byte'; value: number }
  | { type: 'short'; value: number }
  | { type: 'int'; value: number }
  | { type: 'long'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'double'; value: number }
  | { type: 'byteArray'; value: Uint8Array }
  | { type: 'string'; value: string }
  | { type: 'list'; elementType: NbtTagType; value: NbtTag[] }
  | { type: 'compound'; value: NbtCompound }
  | { type: 'intArray'; value: number[] }
  | { type: 'longArray'; value: bigint[] };

export type NamedCompound = Readonly<{ name: string; value: NbtCompound }>;

const TAG_IDS: Readonly<Record<NbtTagType, number>> = {
  end: 0,
  byte: 1,
  short: 2,
  int: 3,
  long: 4,
  float: 5,
  double: 6,
  byteArray: 7,
  string: 8,
  list: 9,
  compound: 10,
  intArray: 11,
  longArray: 12,
};

const TAG_TYPES: readonly NbtTagType[] = [
  'end', 'byte', 'short', 'int', 'long', 'float', 'double',
  'byteArray', 'string', 'list', 'compound', 'intArray', 'longArray',
];

export const nbt = {
  byte: (value: number): NbtTag => ({ type: 'byte', value }),
  short: (value: number): NbtTag => ({ type: 'short', value }),
  int: (value: number): NbtTag => ({ type: 'int', value }),
  string: (value: string): NbtTag => ({ type: 'string', value }),
  byteArray: (value: Uint8Array): NbtTag => ({ type: 'byteArray', value }),
  intArray: (value: number[]): NbtTag => ({ type: 'intArray', value }),
  compound: (value: NbtCompound): NbtTag => ({ type: 'compound', value }),
  list: (elementType: NbtTagType, value: NbtTag[]): NbtTag => ({ type: 'list', elementType, value }),
};

class NbtWriter {
  private readonly parts: Buffer[] = [];

  private fixed(size: number, write: (buf: Buffer) => void): void {
    const buf = Buffer.alloc(size);
    write(buf);
    this.parts.push(buf);
  }

  u8(value: number): void {
    this.fixed(1, b => b.writeUInt8(value));
  }

  i8(value: number): void {
    this.fixed(1, b => b.writeInt8(value));
  }

  i16(value: number): void {
    this.fixed(2, b => b.writeInt16BE(value));
  }

  i32(value: number): void {
    this.fixed(4, b => b.writeInt32BE(value));
  }

  i64(value: bigint): void {
    this.fixed(8, b => b.writeBigInt64BE(value));
  }

  f32(value: number): void {
    this.fixed(4, b => b.writeFloatBE(value));
  }

  f64(value: number): void {
    this.fixed(8, b => b.writeDoubleBE(value));
  }

  str(value: string): void {
    const bytes = Buffer.from(value, 'utf8');
    if (bytes.length > 0xffff) throw new Error(`NBT string too long (${bytes.length} bytes)`);
    this.fixed(2, b => b.writeUInt16BE(bytes.length));
    this.parts.push(bytes);
  }

  raw(bytes: Uint8Array): void {
    this.parts.push(Buffer.from(bytes));
  }

  payload(tag: NbtTag): void {
    switch (tag.type) {
      case 'byte':
        return this.i8(tag.value);
      case 'short':
        return this.i16(tag.value);
      case 'int':
        return this.i32(tag.value);
      case 'long':
        return this.i64(tag.value);
      case 'float':
        return this.f32(tag.value);
      case 'double':
        return this.f64(tag.value);
      case 'byteArray':
        this.i32(tag.value.length);
        return this.raw(tag.value);
      case 'string':
        return this.str(tag.value);
      case 'list':
        this.u8(tag.value.length === 0 ? TAG_IDS.end : TAG_IDS[tag.elementType]);
        this.i32(tag.value.length);
        for (const item of tag.value) {
          if (item.type !== tag.elementType) {
            throw new Error(`NBT list of ${tag.elementType} holds a ${item.type}`);
          }
          this.payload(item);
        }
        return;
      case 'compound':
        for (const [name, child] of Object.entries(tag.value)) {
          this.u8(TAG_IDS[child.type]);
          this.str(name);
          this.payload(child);
        }
        return this.u8(TAG_IDS.end);
      case 'intArray':
        this.i32(tag.value.length);
        for (const v of tag.value) this.i32(v);
        return;
      case 'longArray':
        this.i32(tag.value.length);
        for (const v of tag.value) this.i64(v);
        return;
    }
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.parts);
  }
}

class NbtReader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  private need(size: number): number {
    const at = this.offset;
    if (at + size > this.buf.length) throw new Error('Unexpected end of NBT data');
    this.offset += size;
    return at;
  }

  u8(): number {
    return this.buf.readUInt8(this.need(1));
  }

  str(): string {
    const len = this.buf.readUInt16BE(this.need(2));
    const at = this.need(len);
    return this.buf.toString('utf8', at, at + len);
  }

  tagType(id: number): NbtTagType {
    const type = TAG_TYPES[id];
    if (!type) throw new Error(`Unknown NBT tag id ${id}`);
    return type;
  }

  payload(type: NbtTagType): NbtTag {
    switch (type) {
      case 'byte':
        return { type, value: this.buf.readInt8(this.need(1)) };
      case 'short':
        return { type, value: this.buf.readInt16BE(this.need(2)) };
      case 'int':
        return { type, value: this.buf.readInt32BE(this.need(4)) };
      case 'long':
        return { type, value: this.buf.readBigInt64BE(this.need(8)) };
      case 'float':
        return { type, value: this.buf.readFloatBE(this.need(4)) };
      case 'double':
        return { type, value: this.buf.readDoubleBE(this.need(8)) };
      case 'byteArray': {
        const len = this.buf.readInt32BE(this.need(4));
        const at = this.need(len);
        return { type, value: new Uint8Array(this.buf.subarray(at, at + len)) };
      }
      case 'string':
        return { type, value: this.str() };
      case 'list': {
        const elementType = this.tagType(this.u8());
        const len = this.buf.readInt32BE(this.need(4));
        const value: NbtTag[] = [];
        for (let i = 0; i < len; i += 1) value.push(this.payload(elementType));
        return { type, elementType, value };
      }
      case 'compound': {
        const value: NbtCompound = {};
        for (;;) {
          const childType = this.tagType(this.u8());
          if (childType === 'end') break;
          const name = this.str();
          value[name] = this.payload(childType);
        }
        return { type, value };
      }
      case 'intArray': {
        const len = this.buf.readInt32BE(this.need(4));
        const value: number[] = [];
        for (let i = 0; i < len; i += 1) value.push(this.buf.readInt32BE(this.need(4)));
        return { type, value };
      }
      case 'longArray': {
        const len = this.buf.readInt32BE(this.need(4));
        const value: bigint[] = [];
        for (let i = 0; i < len; i += 1) value.push(this.buf.readBigInt64BE(this.need(8)));
        return { type, value };
      }
      case 'end':
        throw new Error('TAG_End has no payload');
    }
  }
}

export function writeNbt(root: NamedCompound): Buffer {
  const writer = new NbtWriter();
  writer.u8(TAG_IDS.compound);
  writer.str(root.name);
  writer.payload({ type: 'compound', value: root.value });
  return writer.toBuffer();
}

export function readNbt(data: Buffer): NamedCompound {
  const reader = new NbtReader(data);
  if (reader.u8() !== TAG_IDS.compound) throw new Error('NBT root is not a compound');
  const name = reader.str();
  const root = reader.payload('compound');
  if (root.type !== 'compound') throw new Error('NBT root is not a compound');
  return { name, value: root.value };
}

export function writeNbtGzip(root: NamedCompound): Buffer {
  return gzipSync(writeNbt(root));
}

/** Accepts gzip-compressed or raw NBT. */
export function readNbtAuto(data: Buffer): NamedCompound {
  const gzipped = data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
  return readNbt(gzipped ? gunzipSync(data) : data);
}
