import { EncodeError } from "./errors";
import {
  FIXARRAY_MAX_LENGTH,
  FIXMAP_MAX_LENGTH,
  FIXSTR_MAX_LENGTH,
  type Format,
  FormatType,
  formatToByte,
} from "./format";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

const MAX_LENGTH = 0xffffffff;

/**
 * Writer appends big-endian primitives and format headers to a growable buffer.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the written bytes. The view is invalidated by further writes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a format prefix byte.
   */
  writeFormat(format: Format): void {
    this.writeU8(formatToByte(format));
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  writeU8(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  writeU16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value);
    this.pos += 2;
  }

  writeU32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value);
    this.pos += 4;
  }

  writeU64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value);
    this.pos += 8;
  }

  writeI8(value: number): void {
    this.ensureCapacity(1);
    this.view.setInt8(this.pos, value);
    this.pos += 1;
  }

  writeI16(value: number): void {
    this.ensureCapacity(2);
    this.view.setInt16(this.pos, value);
    this.pos += 2;
  }

  writeI32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value);
    this.pos += 4;
  }

  writeI64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeF32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeF64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value);
    this.pos += 8;
  }

  /**
   * Writes the header of a UTF-8 string of `length` bytes.
   */
  writeStringLength(length: number): void {
    checkLength(length);
    if (length <= FIXSTR_MAX_LENGTH) {
      this.writeFormat({ type: FormatType.FixStr, length });
    } else if (length <= 0xff) {
      this.writeFormat({ type: FormatType.Str8 });
      this.writeU8(length);
    } else if (length <= 0xffff) {
      this.writeFormat({ type: FormatType.Str16 });
      this.writeU16(length);
    } else {
      this.writeFormat({ type: FormatType.Str32 });
      this.writeU32(length);
    }
  }

  /**
   * Writes the header of a non-empty byte blob.
   */
  writeBinLength(length: number): void {
    checkLength(length);
    if (length <= 0xff) {
      this.writeFormat({ type: FormatType.Bin8 });
      this.writeU8(length);
    } else if (length <= 0xffff) {
      this.writeFormat({ type: FormatType.Bin16 });
      this.writeU16(length);
    } else {
      this.writeFormat({ type: FormatType.Bin32 });
      this.writeU32(length);
    }
  }

  writeArrayLength(length: number): void {
    checkLength(length);
    if (length <= FIXARRAY_MAX_LENGTH) {
      this.writeFormat({ type: FormatType.FixArray, length });
    } else if (length <= 0xffff) {
      this.writeFormat({ type: FormatType.Array16 });
      this.writeU16(length);
    } else {
      this.writeFormat({ type: FormatType.Array32 });
      this.writeU32(length);
    }
  }

  writeMapLength(length: number): void {
    checkLength(length);
    if (length <= FIXMAP_MAX_LENGTH) {
      this.writeFormat({ type: FormatType.FixMap, length });
    } else if (length <= 0xffff) {
      this.writeFormat({ type: FormatType.Map16 });
      this.writeU16(length);
    } else {
      this.writeFormat({ type: FormatType.Map32 });
      this.writeU32(length);
    }
  }

  /**
   * Writes an explicit-length extension header. FixExt headers are never
   * written; readers accept them.
   */
  writeExtLength(length: number): void {
    checkLength(length);
    if (length <= 0xff) {
      this.writeFormat({ type: FormatType.Ext8 });
      this.writeU8(length);
    } else if (length <= 0xffff) {
      this.writeFormat({ type: FormatType.Ext16 });
      this.writeU16(length);
    } else {
      this.writeFormat({ type: FormatType.Ext32 });
      this.writeU32(length);
    }
  }
}

function checkLength(length: number): void {
  if (!Number.isInteger(length) || length < 0 || length > MAX_LENGTH) {
    throw new EncodeError(`Length ${length} cannot be represented in 32 bits`);
  }
}
