import { DungeonDecodeError } from "./errors.js";

export type FieldWidth = 1 | 2 | 4;

// Little-endian integer, offset relative to some base.
export type FieldSpec = Readonly<{
  offset: number;
  width: FieldWidth;
}>;

export class ByteSource {
  private readonly buf: Buffer;

  public constructor(bytes: Uint8Array) {
    this.buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  public get length(): number {
    return this.buf.length;
  }

  public readU8(offset: number): number {
    this.ensure(offset, 1);
    return this.buf.readUInt8(offset);
  }

  public readU16LE(offset: number): number {
    this.ensure(offset, 2);
    return this.buf.readUInt16LE(offset);
  }

  public readU32LE(offset: number): number {
    this.ensure(offset, 4);
    return this.buf.readUInt32LE(offset);
  }

  public contains(offset: number, n: number): boolean {
    return Number.isInteger(offset) && offset >= 0 && offset + n <= this.buf.length;
  }

  private ensure(offset: number, n: number): void {
    if (!this.contains(offset, n)) {
      throw new DungeonDecodeError(
        "OutOfBounds",
        offset,
        `need ${n} bytes, buffer length is ${this.buf.length}`,
      );
    }
  }
}

export function readField(src: ByteSource, base: number, field: FieldSpec): number {
  const at = base + field.offset;
  switch (field.width) {
    case 1:
      return src.readU8(at);
    case 2:
      return src.readU16LE(at);
    case 4:
      return src.readU32LE(at);
  }
}
