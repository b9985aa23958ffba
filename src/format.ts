import { EncodeError } from "./errors";

/**
 * One-byte format tags of the tagwire encoding.
 *
 * Every value on the wire starts with a prefix byte that names its format.
 * The "fix" families embed a small value or length in the low bits of the
 * prefix; every other format is followed by a fixed-width payload or a
 * big-endian length prefix.
 */
export enum FormatType {
  Nil,
  Reserved,
  False,
  True,
  /** 0x00..0x7f, value embedded in the prefix */
  PositiveFixInt,
  /** 0xe0..0xff, value embedded in the prefix */
  NegativeFixInt,
  Uint8,
  Uint16,
  Uint32,
  Uint64,
  Int8,
  Int16,
  Int32,
  Int64,
  Float32,
  Float64,
  /** 0xa0..0xbf, byte length embedded in the prefix */
  FixStr,
  Str8,
  Str16,
  Str32,
  Bin8,
  Bin16,
  Bin32,
  /** 0x90..0x9f, element count embedded in the prefix */
  FixArray,
  Array16,
  Array32,
  /** 0x80..0x8f, entry count embedded in the prefix */
  FixMap,
  Map16,
  Map32,
  FixExt1,
  FixExt2,
  FixExt4,
  FixExt8,
  FixExt16,
  Ext8,
  Ext16,
  Ext32,
}

type FixIntType = FormatType.PositiveFixInt | FormatType.NegativeFixInt;
type FixLengthType = FormatType.FixStr | FormatType.FixArray | FormatType.FixMap;

/**
 * Classified prefix byte. Fix formats carry their embedded parameter.
 */
export type Format =
  | { type: FixIntType; value: number }
  | { type: FixLengthType; length: number }
  | { type: Exclude<FormatType, FixIntType | FixLengthType> };

/**
 * Extension type byte written after an extension header.
 */
export enum ExtensionType {
  /** Key/value map whose key set is not known to the reader. */
  GenericMap = 1,
}

/**
 * Formats of the prefix bytes 0xc0..0xdf, in byte order.
 */
const MARKER_FORMATS: readonly Exclude<FormatType, FixIntType | FixLengthType>[] = [
  FormatType.Nil,
  FormatType.Reserved,
  FormatType.False,
  FormatType.True,
  FormatType.Bin8,
  FormatType.Bin16,
  FormatType.Bin32,
  FormatType.Ext8,
  FormatType.Ext16,
  FormatType.Ext32,
  FormatType.Float32,
  FormatType.Float64,
  FormatType.Uint8,
  FormatType.Uint16,
  FormatType.Uint32,
  FormatType.Uint64,
  FormatType.Int8,
  FormatType.Int16,
  FormatType.Int32,
  FormatType.Int64,
  FormatType.FixExt1,
  FormatType.FixExt2,
  FormatType.FixExt4,
  FormatType.FixExt8,
  FormatType.FixExt16,
  FormatType.Str8,
  FormatType.Str16,
  FormatType.Str32,
  FormatType.Array16,
  FormatType.Array32,
  FormatType.Map16,
  FormatType.Map32,
];

const MARKER_BASE = 0xc0;

const MARKER_BYTES = new Map<FormatType, number>(
  MARKER_FORMATS.map((type, i) => [type, MARKER_BASE + i])
);

export const POSITIVE_FIXINT_MAX = 0x7f;
export const NEGATIVE_FIXINT_MIN = -32;
export const FIXSTR_MAX_LENGTH = 31;
export const FIXARRAY_MAX_LENGTH = 15;
export const FIXMAP_MAX_LENGTH = 15;

/**
 * Classifies a prefix byte.
 */
export function classifyFormat(byte: number): Format {
  if (byte <= 0x7f) {
    return { type: FormatType.PositiveFixInt, value: byte };
  }
  if (byte <= 0x8f) {
    return { type: FormatType.FixMap, length: byte & 0x0f };
  }
  if (byte <= 0x9f) {
    return { type: FormatType.FixArray, length: byte & 0x0f };
  }
  if (byte <= 0xbf) {
    return { type: FormatType.FixStr, length: byte & 0x1f };
  }
  if (byte >= 0xe0) {
    // Two's complement of the whole byte
    return { type: FormatType.NegativeFixInt, value: byte - 0x100 };
  }
  return { type: MARKER_FORMATS[byte - MARKER_BASE] };
}

/**
 * Returns the prefix byte for a format.
 * @throws EncodeError if a fix format carries a parameter outside its range
 */
export function formatToByte(format: Format): number {
  switch (format.type) {
    case FormatType.PositiveFixInt:
      checkParameter(format.value, 0, POSITIVE_FIXINT_MAX, "positive fixint");
      return format.value;
    case FormatType.NegativeFixInt:
      checkParameter(format.value, NEGATIVE_FIXINT_MIN, -1, "negative fixint");
      return format.value & 0xff;
    case FormatType.FixMap:
      checkParameter(format.length, 0, FIXMAP_MAX_LENGTH, "fixmap length");
      return 0x80 | format.length;
    case FormatType.FixArray:
      checkParameter(format.length, 0, FIXARRAY_MAX_LENGTH, "fixarray length");
      return 0x90 | format.length;
    case FormatType.FixStr:
      checkParameter(format.length, 0, FIXSTR_MAX_LENGTH, "fixstr length");
      return 0xa0 | format.length;
    default: {
      const byte = MARKER_BYTES.get(format.type);
      if (byte === undefined) {
        throw new EncodeError(`No prefix byte for format ${FormatType[format.type]}`);
      }
      return byte;
    }
  }
}

function checkParameter(value: number, min: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new EncodeError(`${what} ${value} is outside [${min}, ${max}]`);
  }
}

/**
 * Payload length implied by a FixExt header, or undefined for other formats.
 */
export function fixExtLength(format: Format): number | undefined {
  switch (format.type) {
    case FormatType.FixExt1:
      return 1;
    case FormatType.FixExt2:
      return 2;
    case FormatType.FixExt4:
      return 4;
    case FormatType.FixExt8:
      return 8;
    case FormatType.FixExt16:
      return 16;
    default:
      return undefined;
  }
}

export function isIntegerFormat(format: Format): boolean {
  switch (format.type) {
    case FormatType.PositiveFixInt:
    case FormatType.NegativeFixInt:
    case FormatType.Uint8:
    case FormatType.Uint16:
    case FormatType.Uint32:
    case FormatType.Uint64:
    case FormatType.Int8:
    case FormatType.Int16:
    case FormatType.Int32:
    case FormatType.Int64:
      return true;
    default:
      return false;
  }
}

export function isStringFormat(format: Format): boolean {
  switch (format.type) {
    case FormatType.FixStr:
    case FormatType.Str8:
    case FormatType.Str16:
    case FormatType.Str32:
      return true;
    default:
      return false;
  }
}

export function isMapFormat(format: Format): boolean {
  switch (format.type) {
    case FormatType.FixMap:
    case FormatType.Map16:
    case FormatType.Map32:
      return true;
    default:
      return false;
  }
}

/**
 * Describes an observed format for error messages, e.g. "Found 'uint8'.".
 */
export function describeFormat(format: Format): string {
  return `Found '${formatName(format)}'.`;
}

function formatName(format: Format): string {
  switch (format.type) {
    case FormatType.Nil:
      return "nil";
    case FormatType.Reserved:
      return "reserved";
    case FormatType.False:
    case FormatType.True:
      return "bool";
    case FormatType.PositiveFixInt:
    case FormatType.NegativeFixInt:
      return "int";
    case FormatType.FixStr:
    case FormatType.Str8:
    case FormatType.Str16:
    case FormatType.Str32:
      return "string";
    case FormatType.FixArray:
    case FormatType.Array16:
    case FormatType.Array32:
      return "array";
    case FormatType.FixMap:
    case FormatType.Map16:
    case FormatType.Map32:
      return "map";
    case FormatType.Bin8:
    case FormatType.Bin16:
    case FormatType.Bin32:
    case FormatType.Ext8:
    case FormatType.Ext16:
    case FormatType.Ext32:
    case FormatType.FixExt1:
    case FormatType.FixExt2:
    case FormatType.FixExt4:
    case FormatType.FixExt8:
    case FormatType.FixExt16:
      return FormatType[format.type].toUpperCase();
    default:
      // Uint8 -> "uint8", Float64 -> "float64"
      return FormatType[format.type].toLowerCase();
  }
}
