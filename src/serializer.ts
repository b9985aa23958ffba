import { EncodeError, ValueOutOfRangeError } from "./errors";
import { ExtensionType, FormatType, NEGATIVE_FIXINT_MIN, POSITIVE_FIXINT_MAX } from "./format";
import type { Value } from "./value";
import { Writer } from "./writer";

const textEncoder = new TextEncoder();

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export const MAX_U64 = 0xffffffffffffffffn;
export const MIN_I64 = -0x8000000000000000n;
export const MAX_I64 = 0x7fffffffffffffffn;

/**
 * Options for Serializer configuration.
 */
export interface SerializerOptions {
  /** Initial output buffer capacity. Default: 256 */
  initialCapacity?: number;
}

/**
 * Writes one value into a serializer.
 */
export type Encoder<T> = (serializer: Serializer, value: T) => void;

/**
 * Serializer turns data-model calls into the shortest wire form.
 *
 * Aggregates are opened with {@link beginSeq}, {@link beginStruct} or
 * {@link beginMap}. When the element count is not known up front, element
 * bodies are buffered in a nested serializer and appended to this one, after
 * the header, when the aggregate ends.
 */
export class Serializer {
  readonly writer: Writer;
  private readonly options: SerializerOptions;

  constructor(options: SerializerOptions = {}) {
    this.options = options;
    this.writer = new Writer(options.initialCapacity);
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.writer.bytes();
  }

  get position(): number {
    return this.writer.position;
  }

  /**
   * Creates an empty serializer with the same options, used for aggregate bodies.
   */
  nested(): Serializer {
    return new Serializer(this.options);
  }

  writeNil(): void {
    this.writer.writeFormat({ type: FormatType.Nil });
  }

  writeUnit(): void {
    this.writeNil();
  }

  writeBool(value: boolean): void {
    this.writer.writeFormat({ type: value ? FormatType.True : FormatType.False });
  }

  writeU8(value: number): void {
    this.writeUnsigned(checkInteger(value, 8, false));
  }

  writeU16(value: number): void {
    this.writeUnsigned(checkInteger(value, 16, false));
  }

  writeU32(value: number): void {
    this.writeUnsigned(checkInteger(value, 32, false));
  }

  /**
   * Writes an unsigned 64-bit integer. Numbers must be safe integers.
   */
  writeU64(value: bigint | number): void {
    const v = toBigInt(value, false);
    if (v < 0n || v > MAX_U64) {
      throw new ValueOutOfRangeError(value, 64, false);
    }
    this.writeUnsignedBig(v);
  }

  writeI8(value: number): void {
    this.writeSigned(checkInteger(value, 8, true));
  }

  writeI16(value: number): void {
    this.writeSigned(checkInteger(value, 16, true));
  }

  writeI32(value: number): void {
    this.writeSigned(checkInteger(value, 32, true));
  }

  /**
   * Writes a signed 64-bit integer. Numbers must be safe integers.
   */
  writeI64(value: bigint | number): void {
    const v = toBigInt(value, true);
    if (v < MIN_I64 || v > MAX_I64) {
      throw new ValueOutOfRangeError(value, 64, true);
    }
    if (v >= 0n) {
      this.writeUnsignedBig(v);
    } else if (v >= -0x80000000n) {
      this.writeSigned(Number(v));
    } else {
      this.writer.writeFormat({ type: FormatType.Int64 });
      this.writer.writeI64(v);
    }
  }

  /**
   * Writes a single-precision float. The value is rounded to single
   * precision first.
   */
  writeF32(value: number): void {
    this.writer.writeFormat({ type: FormatType.Float32 });
    this.writer.writeF32(value);
  }

  /**
   * Writes a double, narrowed to Float32 when that loses nothing.
   */
  writeF64(value: number): void {
    // NaN never compares equal, so it always takes the Float64 form
    if (Math.fround(value) === value) {
      this.writer.writeFormat({ type: FormatType.Float32 });
      this.writer.writeF32(value);
    } else {
      this.writer.writeFormat({ type: FormatType.Float64 });
      this.writer.writeF64(value);
    }
  }

  /**
   * Writes a UTF-8 string.
   * @throws EncodeError if the string holds an unpaired surrogate
   */
  writeString(value: string): void {
    if (LONE_SURROGATE.test(value)) {
      throw new EncodeError("String contains a lone surrogate and is not valid UTF-16");
    }
    const bytes = textEncoder.encode(value);
    this.writer.writeStringLength(bytes.length);
    this.writer.writeBytes(bytes);
  }

  /**
   * Writes a string holding exactly one code point.
   */
  writeChar(value: string): void {
    const codePoints = Array.from(value);
    if (codePoints.length !== 1) {
      throw new EncodeError(`Expected a single character, got '${value}'`);
    }
    this.writeString(value);
  }

  /**
   * Writes a byte blob. An empty blob is written as nil.
   */
  writeBytes(value: Uint8Array): void {
    if (value.length === 0) {
      this.writeNil();
      return;
    }
    this.writer.writeBinLength(value.length);
    this.writer.writeBytes(value);
  }

  /**
   * Writes nil for an absent value, otherwise the value itself.
   */
  writeOptional<T>(value: T | null | undefined, write: Encoder<T>): void {
    if (value === null || value === undefined) {
      this.writeNil();
      return;
    }
    write(this, value);
  }

  /**
   * Writes a unit enum variant as its declared index.
   */
  writeUnitVariant(index: number): void {
    this.writeU32(index);
  }

  /**
   * Writes a variant carrying data as a one-field structure keyed by the
   * variant name.
   */
  writeVariant(name: string, writeBody: (serializer: Serializer) => void): void {
    this.writer.writeMapLength(1);
    this.writeString(name);
    writeBody(this);
  }

  beginSeq(length?: number): SeqSerializer {
    return new SeqSerializer(this, length);
  }

  beginStruct(fieldCount?: number): StructSerializer {
    return new StructSerializer(this, fieldCount);
  }

  /**
   * Opens a generic map. The body is always buffered because the extension
   * envelope needs its byte length.
   */
  beginMap(length?: number): MapSerializer {
    return new MapSerializer(this, length);
  }

  writeArray<T>(items: readonly T[], writeItem: Encoder<T>): void {
    const seq = this.beginSeq(items.length);
    for (const item of items) {
      seq.element((serializer) => writeItem(serializer, item));
    }
    seq.end();
  }

  writeMap<K, V>(entries: Iterable<readonly [K, V]>, writeKey: Encoder<K>, writeValue: Encoder<V>): void {
    const map = this.beginMap();
    for (const [key, value] of entries) {
      map.entry(
        (serializer) => writeKey(serializer, key),
        (serializer) => writeValue(serializer, value)
      );
    }
    map.end();
  }

  /**
   * Writes a self-described value so that `readAny` returns the same
   * JavaScript type. Integral numbers within 32 bits take the integer table
   * and all other numbers the float table. A bigint always takes the Uint64
   * or Int64 form, whatever its magnitude.
   */
  writeAny(value: Value): void {
    if (value === null) {
      this.writeNil();
    } else if (typeof value === "boolean") {
      this.writeBool(value);
    } else if (typeof value === "number") {
      if (isAnyInteger(value)) {
        this.writeI64(value);
      } else {
        this.writeF64(value);
      }
    } else if (typeof value === "bigint") {
      this.writeTaggedBigInt(value);
    } else if (typeof value === "string") {
      this.writeString(value);
    } else if (value instanceof Uint8Array) {
      this.writeBytes(value);
    } else if (Array.isArray(value)) {
      this.writeArray(value, (serializer, item) => serializer.writeAny(item));
    } else if (value instanceof Map) {
      this.writeMap(
        value,
        (serializer, key) => serializer.writeAny(key),
        (serializer, item) => serializer.writeAny(item)
      );
    } else {
      const fields = Object.entries(value);
      const struct = this.beginStruct(fields.length);
      for (const [name, item] of fields) {
        struct.field(name, (serializer) => serializer.writeAny(item));
      }
      struct.end();
    }
  }

  private writeTaggedBigInt(value: bigint): void {
    if (value >= 0n) {
      if (value > MAX_U64) {
        throw new ValueOutOfRangeError(value, 64, false);
      }
      this.writer.writeFormat({ type: FormatType.Uint64 });
      this.writer.writeU64(value);
    } else {
      if (value < MIN_I64) {
        throw new ValueOutOfRangeError(value, 64, true);
      }
      this.writer.writeFormat({ type: FormatType.Int64 });
      this.writer.writeI64(value);
    }
  }

  private writeUnsigned(value: number): void {
    if (value <= POSITIVE_FIXINT_MAX) {
      this.writer.writeFormat({ type: FormatType.PositiveFixInt, value });
    } else if (value <= 0xff) {
      this.writer.writeFormat({ type: FormatType.Uint8 });
      this.writer.writeU8(value);
    } else if (value <= 0xffff) {
      this.writer.writeFormat({ type: FormatType.Uint16 });
      this.writer.writeU16(value);
    } else {
      this.writer.writeFormat({ type: FormatType.Uint32 });
      this.writer.writeU32(value);
    }
  }

  private writeUnsignedBig(value: bigint): void {
    if (value <= 0xffffffffn) {
      this.writeUnsigned(Number(value));
    } else {
      this.writer.writeFormat({ type: FormatType.Uint64 });
      this.writer.writeU64(value);
    }
  }

  private writeSigned(value: number): void {
    if (value >= 0) {
      this.writeUnsigned(value);
    } else if (value >= NEGATIVE_FIXINT_MIN) {
      this.writer.writeFormat({ type: FormatType.NegativeFixInt, value });
    } else if (value >= -0x80) {
      this.writer.writeFormat({ type: FormatType.Int8 });
      this.writer.writeI8(value);
    } else if (value >= -0x8000) {
      this.writer.writeFormat({ type: FormatType.Int16 });
      this.writer.writeI16(value);
    } else {
      this.writer.writeFormat({ type: FormatType.Int32 });
      this.writer.writeI32(value);
    }
  }
}

/**
 * Shared bookkeeping of an open aggregate: where its body goes and how many
 * elements it has received.
 */
class AggregateSerializer {
  protected readonly parent: Serializer;
  protected readonly declared: number | undefined;
  protected readonly body: Serializer;
  protected count = 0;
  private ended = false;
  private readonly label: string;

  constructor(label: string, parent: Serializer, declared: number | undefined, buffered: boolean) {
    this.label = label;
    this.parent = parent;
    this.declared = declared;
    this.body = buffered ? parent.nested() : parent;
  }

  protected next(): Serializer {
    if (this.ended) {
      throw new EncodeError(`${this.label} already ended`);
    }
    if (this.declared !== undefined && this.count >= this.declared) {
      throw new EncodeError(`${this.label} declared ${this.declared} entries, got more`);
    }
    this.count++;
    return this.body;
  }

  protected finish(): void {
    if (this.ended) {
      throw new EncodeError(`${this.label} already ended`);
    }
    this.ended = true;
    if (this.declared !== undefined && this.count !== this.declared) {
      throw new EncodeError(`${this.label} declared ${this.declared} entries but ${this.count} were written`);
    }
  }
}

/**
 * Open array. Elements are written in call order.
 */
export class SeqSerializer extends AggregateSerializer {
  constructor(parent: Serializer, length?: number) {
    super("Sequence", parent, length, length === undefined);
    if (length !== undefined) {
      parent.writer.writeArrayLength(length);
    }
  }

  /**
   * Writes one element.
   */
  element(write: (serializer: Serializer) => void): void {
    write(this.next());
  }

  end(): void {
    this.finish();
    if (this.declared === undefined) {
      this.parent.writer.writeArrayLength(this.count);
      this.parent.writer.writeBytes(this.body.bytes());
    }
  }
}

/**
 * Open structure: a bare map of field names to values, with no envelope.
 */
export class StructSerializer extends AggregateSerializer {
  constructor(parent: Serializer, fieldCount?: number) {
    super("Structure", parent, fieldCount, fieldCount === undefined);
    if (fieldCount !== undefined) {
      parent.writer.writeMapLength(fieldCount);
    }
  }

  field(name: string, write: (serializer: Serializer) => void): void {
    const body = this.next();
    body.writeString(name);
    write(body);
  }

  end(): void {
    this.finish();
    if (this.declared === undefined) {
      this.parent.writer.writeMapLength(this.count);
      this.parent.writer.writeBytes(this.body.bytes());
    }
  }
}

/**
 * Open generic map, wrapped in a GenericMap extension envelope on end.
 */
export class MapSerializer extends AggregateSerializer {
  constructor(parent: Serializer, length?: number) {
    super("Map", parent, length, true);
  }

  entry(writeKey: (serializer: Serializer) => void, writeValue: (serializer: Serializer) => void): void {
    const body = this.next();
    writeKey(body);
    writeValue(body);
  }

  end(): void {
    this.finish();
    const inner = this.parent.nested();
    inner.writer.writeMapLength(this.count);
    inner.writer.writeBytes(this.body.bytes());

    const envelope = inner.bytes();
    this.parent.writer.writeExtLength(envelope.length);
    this.parent.writer.writeU8(ExtensionType.GenericMap);
    this.parent.writer.writeBytes(envelope);
  }
}

function checkInteger(value: number, bits: 8 | 16 | 32, signed: boolean): number {
  if (!Number.isInteger(value)) {
    throw new EncodeError(`Expected an integer for a ${bits}-bit value, got ${value}`);
  }
  const min = signed ? -(2 ** (bits - 1)) : 0;
  const max = signed ? 2 ** (bits - 1) - 1 : 2 ** bits - 1;
  if (value < min || value > max) {
    throw new ValueOutOfRangeError(value, bits, signed);
  }
  return value;
}

// -0 has no integer form; it goes through the float table to keep its sign
function isAnyInteger(value: number): boolean {
  return Number.isInteger(value) && !Object.is(value, -0) && value >= -0x80000000 && value <= 0xffffffff;
}

function toBigInt(value: bigint | number, signed: boolean): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    if (Number.isInteger(value)) {
      throw new EncodeError(`${value} is not a safe integer; pass a bigint for 64-bit values`);
    }
    throw new EncodeError(`Expected an integer for a ${signed ? "signed" : "unsigned"} 64-bit value, got ${value}`);
  }
  return BigInt(value);
}
