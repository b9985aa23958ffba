import {
  DecodeError,
  type ExpectedKind,
  IntegerOverflowError,
  LengthLimitExceededError,
  TrailingCharactersError,
  UnexpectedFormatError,
} from "./errors";
import {
  ExtensionType,
  type Format,
  FormatType,
  describeFormat,
  fixExtLength,
  isIntegerFormat,
  isStringFormat,
} from "./format";
import { Reader } from "./reader";
import { MAX_I64 } from "./serializer";
import type { Value } from "./value";

// ignoreBOM keeps a leading U+FEFF as part of the string.
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Default maximum length prefix (64 MB). */
export const DEFAULT_MAX_LENGTH = 64 * 1024 * 1024;

/** Default maximum number of open arrays, maps and structures. */
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Options for Deserializer configuration.
 */
export interface DeserializerOptions {
  /** Maximum accepted string, blob, array, map or extension length. Default: 64 MB */
  maxLength?: number;
  /** Maximum nesting of arrays, maps and structures. Default: 512 */
  maxDepth?: number;
}

/**
 * Reads one value out of a deserializer.
 */
export type Decoder<T> = (deserializer: Deserializer) => T;

const UNSIGNED_MAX: Record<8 | 16 | 32, bigint> = {
  8: 0xffn,
  16: 0xffffn,
  32: 0xffffffffn,
};

const SIGNED_RANGE: Record<8 | 16 | 32, readonly [bigint, bigint]> = {
  8: [-0x80n, 0x7fn],
  16: [-0x8000n, 0x7fffn],
  32: [-0x80000000n, 0x7fffffffn],
};

/**
 * Deserializer reads data-model values from a buffer as a caller asks for them.
 *
 * The caller decides the shape of each value; the deserializer checks the
 * next format against that shape and coerces between integer formats where
 * the value fits.
 *
 * @example
 * ```typescript
 * const de = new Deserializer(bytes);
 * const seq = de.readSeq();
 * const items: number[] = [];
 * for (let r = seq.nextElement((d) => d.readU32()); !r.done; r = seq.nextElement((d) => d.readU32())) {
 *   items.push(r.value);
 * }
 * de.end();
 * ```
 */
export class Deserializer {
  readonly reader: Reader;
  private readonly maxLength: number;
  private readonly maxDepth: number;
  private depth = 0;

  constructor(data: Uint8Array, options: DeserializerOptions = {}) {
    this.reader = new Reader(data);
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  get position(): number {
    return this.reader.position;
  }

  /**
   * Classifies the next value without consuming it.
   */
  peekFormat(): Format {
    return this.reader.peekFormat();
  }

  /**
   * Checks that the whole buffer has been consumed.
   * @throws TrailingCharactersError if bytes remain
   */
  end(): void {
    if (this.reader.hasMore) {
      throw new TrailingCharactersError(this.reader.position, this.reader.length);
    }
  }

  readBool(): boolean {
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.True:
        return true;
      case FormatType.False:
        return false;
      default:
        throw mismatch("ExpectedBoolean", "bool", format);
    }
  }

  readU8(): number {
    return Number(checkUnsigned(this.parseUnsigned(), 8));
  }

  readU16(): number {
    return Number(checkUnsigned(this.parseUnsigned(), 16));
  }

  readU32(): number {
    return Number(checkUnsigned(this.parseUnsigned(), 32));
  }

  readU64(): bigint {
    return this.parseUnsigned();
  }

  /**
   * Reads an unsigned 64-bit integer as a JavaScript number.
   *
   * WARNING: JavaScript numbers can only safely represent integers
   * up to Number.MAX_SAFE_INTEGER (2^53-1). Values larger than this
   * will lose precision.
   *
   * For values that may exceed 2^53-1, use readU64() instead which
   * returns a bigint with full 64-bit precision.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readU64AsNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.parseUnsigned();
    if (warnOnPrecisionLoss && value > BigInt(Number.MAX_SAFE_INTEGER)) {
      console.warn(
        `tagwire: uint64 value ${value} exceeds safe integer range ` +
        `(max ${Number.MAX_SAFE_INTEGER}), precision may be lost. ` +
        `Use readU64() for full precision.`
      );
    }
    return Number(value);
  }

  readI8(): number {
    return Number(checkSigned(this.parseSigned(), 8));
  }

  readI16(): number {
    return Number(checkSigned(this.parseSigned(), 16));
  }

  readI32(): number {
    return Number(checkSigned(this.parseSigned(), 32));
  }

  readI64(): bigint {
    return this.parseSigned();
  }

  /**
   * Reads a signed 64-bit integer as a JavaScript number.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readI64AsNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.parseSigned();
    if (warnOnPrecisionLoss) {
      if (value > BigInt(Number.MAX_SAFE_INTEGER) ||
          value < BigInt(Number.MIN_SAFE_INTEGER)) {
        console.warn(
          `tagwire: int64 value ${value} exceeds safe integer range ` +
          `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
          `precision may be lost. Use readI64() for full precision.`
        );
      }
    }
    return Number(value);
  }

  readF32(): number {
    const format = this.reader.takeFormat();
    if (format.type === FormatType.Float32) {
      return this.reader.readF32();
    }
    throw mismatch("ExpectedFloat", "float32", format);
  }

  /**
   * Reads a double. Float32 values are widened.
   */
  readF64(): number {
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.Float64:
        return this.reader.readF64();
      case FormatType.Float32:
        return this.reader.readF32();
      default:
        throw mismatch("ExpectedFloat", "float64", format);
    }
  }

  /**
   * Reads a UTF-8 string. Nil reads as the empty string.
   */
  readString(): string {
    const bytes = this.reader.takeBytes(this.readStringLength());
    try {
      return textDecoder.decode(bytes);
    } catch (e) {
      throw new DecodeError(`Invalid UTF-8 string: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  /**
   * Reads a field or variant name.
   */
  readIdentifier(): string {
    return this.readString();
  }

  /**
   * Reads a string of exactly one code point.
   */
  readChar(): string {
    const value = this.readString();
    if (Array.from(value).length !== 1) {
      throw new UnexpectedFormatError("ExpectedChar", `Expected char, found string: '${value}'`);
    }
    return value;
  }

  /**
   * Reads a byte blob. Nil reads as an empty blob.
   */
  readBytes(): Uint8Array {
    return this.reader.takeBytes(this.readBytesLength());
  }

  /**
   * Reads nil as `undefined`, anything else through `decodeSome`.
   */
  readOption<T>(decodeSome: Decoder<T>): T | undefined {
    if (this.reader.peekFormat().type === FormatType.Nil) {
      this.reader.takeFormat();
      return undefined;
    }
    return decodeSome(this);
  }

  readUnit(): void {
    const format = this.reader.takeFormat();
    if (format.type !== FormatType.Nil) {
      throw mismatch("ExpectedNull", "nil", format);
    }
  }

  /**
   * Opens an array. Nil reads as an empty array.
   */
  readSeq(): SeqAccess {
    const length = this.readArrayLength();
    return new SeqAccess(this, length, this.enter());
  }

  /**
   * Opens a structure: a bare map keyed by field name. Nil reads as an
   * empty structure.
   */
  readStruct(): StructAccess {
    const length = this.readMapLength();
    return new StructAccess(this, length, this.enter());
  }

  /**
   * Opens a generic map wrapped in a GenericMap extension envelope.
   */
  readMap(): MapAccess {
    this.readExtensionHeader();
    const length = this.readMapLength();
    return new MapAccess(this, length, this.enter());
  }

  readArray<T>(decodeItem: Decoder<T>): T[] {
    const seq = this.readSeq();
    const items: T[] = [];
    for (let next = seq.nextElement(decodeItem); !next.done; next = seq.nextElement(decodeItem)) {
      items.push(next.value);
    }
    return items;
  }

  /**
   * Reads a unit variant, written either as its index or as its name.
   */
  readEnum<V extends string>(variants: readonly V[]): V {
    const format = this.reader.peekFormat();
    if (isIntegerFormat(format)) {
      const index = this.parseUnsigned();
      if (index >= BigInt(variants.length)) {
        throw new UnexpectedFormatError(
          "ExpectedUInteger",
          `Expected enum variant as an unsigned integer below ${variants.length}. Found ${index}.`
        );
      }
      return variants[Number(index)];
    }
    if (isStringFormat(format)) {
      const name = this.readString();
      const variant = variants.find((v) => v === name);
      if (variant === undefined) {
        throw new UnexpectedFormatError("ExpectedEnum", `Unknown enum variant '${name}'`);
      }
      return variant;
    }
    this.reader.takeFormat();
    throw new DecodeError(`Expected valid enum variant, ${describeFormat(format)}`);
  }

  /**
   * Reads the header of a variant carrying data and returns its name. The
   * variant body is read next.
   */
  readVariant<V extends string>(variants: readonly V[]): V {
    const format = this.reader.takeFormat();
    if (format.type !== FormatType.FixMap || format.length !== 1) {
      throw mismatch("ExpectedEnum", "variant", format);
    }
    return this.readEnum(variants);
  }

  /**
   * Reads the next value using the format on the wire to pick its shape.
   *
   * Bare maps are read as structures, GenericMap envelopes as `Map`s. A bare
   * map with a key that is not a string is read as a `Map` too.
   */
  readAny(): Value {
    const format = this.reader.peekFormat();
    switch (format.type) {
      case FormatType.Nil:
        this.reader.takeFormat();
        return null;
      case FormatType.True:
      case FormatType.False:
        return this.readBool();
      case FormatType.PositiveFixInt:
      case FormatType.Uint8:
        return this.readU8();
      case FormatType.Uint16:
        return this.readU16();
      case FormatType.Uint32:
        return this.readU32();
      case FormatType.Uint64:
        return this.readU64();
      case FormatType.NegativeFixInt:
      case FormatType.Int8:
        return this.readI8();
      case FormatType.Int16:
        return this.readI16();
      case FormatType.Int32:
        return this.readI32();
      case FormatType.Int64:
        return this.readI64();
      case FormatType.Float32:
      case FormatType.Float64:
        return this.readF64();
      case FormatType.FixStr:
      case FormatType.Str8:
      case FormatType.Str16:
      case FormatType.Str32:
        return this.readString();
      case FormatType.Bin8:
      case FormatType.Bin16:
      case FormatType.Bin32:
        return this.readBytes();
      case FormatType.FixArray:
      case FormatType.Array16:
      case FormatType.Array32:
        return this.readArray((d) => d.readAny());
      case FormatType.FixMap:
      case FormatType.Map16:
      case FormatType.Map32:
        return this.readAnyStruct();
      case FormatType.FixExt1:
      case FormatType.FixExt2:
      case FormatType.FixExt4:
      case FormatType.FixExt8:
      case FormatType.FixExt16:
      case FormatType.Ext8:
      case FormatType.Ext16:
      case FormatType.Ext32:
        return this.readAnyMap();
      case FormatType.Reserved:
        throw new DecodeError(`Cannot decode a value of reserved format. ${describeFormat(format)}`);
    }
  }

  private readAnyStruct(): { [field: string]: Value } | Map<Value, Value> {
    const struct = this.readStruct();
    const entries: [Value, Value][] = [];
    for (let key = struct.nextKey((d) => d.readAny()); !key.done; key = struct.nextKey((d) => d.readAny())) {
      entries.push([key.value, struct.nextValue((d) => d.readAny())]);
    }
    if (!entries.every(([key]) => typeof key === "string")) {
      return new Map(entries);
    }
    const fields: { [field: string]: Value } = {};
    for (const [name, value] of entries) {
      // defineProperty keeps a "__proto__" field an ordinary property
      Object.defineProperty(fields, String(name), {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return fields;
  }

  private readAnyMap(): Map<Value, Value> {
    const map = this.readMap();
    const entries = new Map<Value, Value>();
    for (let key = map.nextKey((d) => d.readAny()); !key.done; key = map.nextKey((d) => d.readAny())) {
      entries.set(key.value, map.nextValue((d) => d.readAny()));
    }
    return entries;
  }

  /**
   * Opens one level of nesting. The returned callback closes it.
   */
  private enter(): () => void {
    if (this.depth >= this.maxDepth) {
      throw new DecodeError(`Nesting depth exceeds maximum of ${this.maxDepth}`);
    }
    this.depth++;
    return () => {
      this.depth--;
    };
  }

  private checkLength(length: number): number {
    if (length > this.maxLength) {
      throw new LengthLimitExceededError(length, this.maxLength);
    }
    return length;
  }

  /**
   * Consumes a nil in place of a length, returning true if one was there.
   */
  private takeNil(): boolean {
    if (this.reader.peekFormat().type === FormatType.Nil) {
      this.reader.takeFormat();
      return true;
    }
    return false;
  }

  private readArrayLength(): number {
    if (this.takeNil()) {
      return 0;
    }
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.FixArray:
        return format.length;
      case FormatType.Array16:
        return this.checkLength(this.reader.readLengthU16());
      case FormatType.Array32:
        return this.checkLength(this.reader.readLengthU32());
      default:
        throw mismatch("ExpectedArray", "array", format);
    }
  }

  private readMapLength(): number {
    if (this.takeNil()) {
      return 0;
    }
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.FixMap:
        return format.length;
      case FormatType.Map16:
        return this.checkLength(this.reader.readLengthU16());
      case FormatType.Map32:
        return this.checkLength(this.reader.readLengthU32());
      default:
        throw mismatch("ExpectedMap", "map", format);
    }
  }

  private readStringLength(): number {
    if (this.takeNil()) {
      return 0;
    }
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.FixStr:
        return format.length;
      // Older writers emitted short strings with a fixarray prefix
      case FormatType.FixArray:
        return format.length;
      case FormatType.Str8:
        return this.checkLength(this.reader.readLengthU8());
      case FormatType.Str16:
        return this.checkLength(this.reader.readLengthU16());
      case FormatType.Str32:
        return this.checkLength(this.reader.readLengthU32());
      default:
        throw mismatch("ExpectedString", "string", format);
    }
  }

  private readBytesLength(): number {
    if (this.takeNil()) {
      return 0;
    }
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.Bin8:
        return this.checkLength(this.reader.readLengthU8());
      case FormatType.Bin16:
        return this.checkLength(this.reader.readLengthU16());
      case FormatType.Bin32:
        return this.checkLength(this.reader.readLengthU32());
      default:
        throw mismatch("ExpectedBytes", "bytes", format);
    }
  }

  /**
   * Reads an extension header and its type byte, which must be GenericMap.
   * Returns the declared payload length.
   */
  private readExtensionHeader(): number {
    const format = this.reader.takeFormat();
    let length = fixExtLength(format);
    if (length === undefined) {
      switch (format.type) {
        case FormatType.Ext8:
          length = this.reader.readLengthU8();
          break;
        case FormatType.Ext16:
          length = this.reader.readLengthU16();
          break;
        case FormatType.Ext32:
          length = this.reader.readLengthU32();
          break;
        default:
          throw mismatch("ExpectedExt", "ext generic map", format);
      }
    }
    this.checkLength(length);

    const extType = this.reader.readU8();
    if (extType !== ExtensionType.GenericMap) {
      throw new UnexpectedFormatError(
        "ExpectedExt",
        `Extension must be of type 'ext generic map'. Found ${extType}`
      );
    }
    return length;
  }

  private parseUnsigned(): bigint {
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.PositiveFixInt:
        return BigInt(format.value);
      case FormatType.NegativeFixInt:
        throw negativeUnsigned(format);
      case FormatType.Uint8:
        return BigInt(this.reader.readU8());
      case FormatType.Uint16:
        return BigInt(this.reader.readU16());
      case FormatType.Uint32:
        return BigInt(this.reader.readU32());
      case FormatType.Uint64:
        return this.reader.readU64();
      case FormatType.Int8:
        return nonNegative(BigInt(this.reader.readI8()), format);
      case FormatType.Int16:
        return nonNegative(BigInt(this.reader.readI16()), format);
      case FormatType.Int32:
        return nonNegative(BigInt(this.reader.readI32()), format);
      case FormatType.Int64:
        return nonNegative(this.reader.readI64(), format);
      default:
        throw mismatch("ExpectedUInteger", "uint", format);
    }
  }

  private parseSigned(): bigint {
    const format = this.reader.takeFormat();
    switch (format.type) {
      case FormatType.PositiveFixInt:
      case FormatType.NegativeFixInt:
        return BigInt(format.value);
      case FormatType.Int8:
        return BigInt(this.reader.readI8());
      case FormatType.Int16:
        return BigInt(this.reader.readI16());
      case FormatType.Int32:
        return BigInt(this.reader.readI32());
      case FormatType.Int64:
        return this.reader.readI64();
      case FormatType.Uint8:
        return BigInt(this.reader.readU8());
      case FormatType.Uint16:
        return BigInt(this.reader.readU16());
      case FormatType.Uint32:
        return BigInt(this.reader.readU32());
      case FormatType.Uint64: {
        const value = this.reader.readU64();
        if (value > MAX_I64) {
          throw new IntegerOverflowError(value, 64, true);
        }
        return value;
      }
      default:
        throw mismatch("ExpectedInteger", "int", format);
    }
  }
}

/**
 * Element cursor of an open array.
 */
export class SeqAccess {
  private readonly deserializer: Deserializer;
  private left: number;
  private onEnd: (() => void) | undefined;

  /**
   * @param onEnd - Called once, when the last element has been read
   */
  constructor(deserializer: Deserializer, length: number, onEnd?: () => void) {
    this.deserializer = deserializer;
    this.left = length;
    this.onEnd = onEnd;
  }

  /**
   * Number of elements not yet read.
   */
  get remaining(): number {
    return this.left;
  }

  nextElement<T>(decode: Decoder<T>): IteratorResult<T, undefined> {
    if (this.left === 0) {
      this.onEnd?.();
      this.onEnd = undefined;
      return { done: true, value: undefined };
    }
    this.left--;
    return { done: false, value: decode(this.deserializer) };
  }
}

/**
 * Key/value cursor of an open map or structure. Each key must be followed
 * by exactly one value.
 */
class EntryAccess {
  protected readonly deserializer: Deserializer;
  private left: number;
  private awaitingValue = false;
  private onEnd: (() => void) | undefined;

  constructor(deserializer: Deserializer, length: number, onEnd?: () => void) {
    this.deserializer = deserializer;
    this.left = length;
    this.onEnd = onEnd;
  }

  /**
   * Number of entries whose value has not been read yet.
   */
  get remaining(): number {
    return this.left;
  }

  nextKey<K>(decode: Decoder<K>): IteratorResult<K, undefined> {
    if (this.awaitingValue) {
      throw new DecodeError("Map key read twice without reading its value");
    }
    if (this.left === 0) {
      this.onEnd?.();
      this.onEnd = undefined;
      return { done: true, value: undefined };
    }
    this.awaitingValue = true;
    return { done: false, value: decode(this.deserializer) };
  }

  nextValue<V>(decode: Decoder<V>): V {
    if (!this.awaitingValue) {
      throw new DecodeError("Map value read before its key");
    }
    this.awaitingValue = false;
    this.left--;
    return decode(this.deserializer);
  }
}

/**
 * Entry cursor of a generic map.
 */
export class MapAccess extends EntryAccess {}

/**
 * Field cursor of a structure. Field names are strings.
 */
export class StructAccess extends EntryAccess {
  nextField(): IteratorResult<string, undefined> {
    return this.nextKey((d) => d.readIdentifier());
  }

  value<V>(decode: Decoder<V>): V {
    return this.nextValue(decode);
  }
}

function mismatch(kind: ExpectedKind, expected: string, found: Format): UnexpectedFormatError {
  return new UnexpectedFormatError(kind, `Property must be of type '${expected}'. ${describeFormat(found)}`);
}

function negativeUnsigned(found: Format): UnexpectedFormatError {
  return new UnexpectedFormatError("ExpectedUInteger", `unsigned integer cannot be negative. ${describeFormat(found)}`);
}

function nonNegative(value: bigint, format: Format): bigint {
  if (value < 0n) {
    throw negativeUnsigned(format);
  }
  return value;
}

function checkUnsigned(value: bigint, bits: 8 | 16 | 32): bigint {
  if (value > UNSIGNED_MAX[bits]) {
    throw new IntegerOverflowError(value, bits, false);
  }
  return value;
}

function checkSigned(value: bigint, bits: 8 | 16 | 32): bigint {
  const [min, max] = SIGNED_RANGE[bits];
  if (value < min || value > max) {
    throw new IntegerOverflowError(value, bits, true);
  }
  return value;
}
