import { UnexpectedEndError } from "./errors";
import { type Format, classifyFormat } from "./format";

/**
 * Reader is a byte cursor over an encoded buffer.
 *
 * All multi-byte values are big-endian. Every read checks the remaining
 * length first and fails with {@link UnexpectedEndError} without moving the
 * cursor.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the total buffer length.
   */
  get length(): number {
    return this.end;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new UnexpectedEndError(needed, this.remaining);
    }
  }

  /**
   * Classifies the next prefix byte without consuming it.
   */
  peekFormat(): Format {
    const position = this.pos;
    const format = this.takeFormat();
    this.pos = position;
    return format;
  }

  /**
   * Consumes and classifies the next prefix byte.
   */
  takeFormat(): Format {
    return classifyFormat(this.readU8());
  }

  /**
   * Consumes exactly `length` bytes and returns them as a fresh copy.
   */
  takeBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.slice(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  readU8(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  readU16(): number {
    this.checkAvailable(2);
    const value = this.view.getUint16(this.pos);
    this.pos += 2;
    return value;
  }

  readU32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos);
    this.pos += 4;
    return value;
  }

  readU64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos);
    this.pos += 8;
    return value;
  }

  readI8(): number {
    this.checkAvailable(1);
    const value = this.view.getInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readI16(): number {
    this.checkAvailable(2);
    const value = this.view.getInt16(this.pos);
    this.pos += 2;
    return value;
  }

  readI32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos);
    this.pos += 4;
    return value;
  }

  readI64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readF32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readF64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a one-byte length prefix.
   */
  readLengthU8(): number {
    return this.readU8();
  }

  /**
   * Reads a two-byte length prefix.
   */
  readLengthU16(): number {
    return this.readU16();
  }

  /**
   * Reads a four-byte length prefix.
   */
  readLengthU32(): number {
    return this.readU32();
  }
}
