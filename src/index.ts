/**
 * tagwire - tag-prefixed binary encoding for TypeScript
 *
 * Every value is a one-byte format tag followed by its payload, always in
 * the shortest form that holds it. Structures are bare maps keyed by field
 * name; generic maps are wrapped in an extension envelope so the two can be
 * told apart.
 *
 * @example
 * ```typescript
 * import { encode, decode, t } from 'tagwire';
 *
 * const User = t.struct({ id: t.u32, name: t.string, tags: t.array(t.string) });
 *
 * const data = encode({ id: 7, name: "ada", tags: [] }, User);
 * const user = decode(data, User);
 * ```
 */

import { Deserializer, type DeserializerOptions } from "./deserializer";
import { Serializer, type SerializerOptions } from "./serializer";
import type { Shape } from "./shape";

// Format tags
export {
  FormatType,
  ExtensionType,
  POSITIVE_FIXINT_MAX,
  NEGATIVE_FIXINT_MIN,
  FIXSTR_MAX_LENGTH,
  FIXARRAY_MAX_LENGTH,
  FIXMAP_MAX_LENGTH,
  classifyFormat,
  formatToByte,
  describeFormat,
} from "./format";
export type { Format } from "./format";

// Errors
export {
  CodecError,
  EncodeError,
  DecodeError,
  ValueOutOfRangeError,
  UnexpectedEndError,
  TrailingCharactersError,
  UnexpectedFormatError,
  IntegerOverflowError,
  LengthLimitExceededError,
} from "./errors";
export type { ErrorKind, ExpectedKind } from "./errors";

// Primitive I/O
export { Writer } from "./writer";
export { Reader } from "./reader";

// Drivers
export {
  Serializer,
  SeqSerializer,
  StructSerializer,
  MapSerializer,
  MAX_U64,
  MIN_I64,
  MAX_I64,
} from "./serializer";
export type { SerializerOptions, Encoder } from "./serializer";
export {
  Deserializer,
  SeqAccess,
  MapAccess,
  StructAccess,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_LENGTH,
} from "./deserializer";
export type { DeserializerOptions, Decoder } from "./deserializer";
export type { Value } from "./value";

// Shapes
export * as t from "./shape";
export type { Shape, Infer, FieldShapes, VariantOf } from "./shape";

// Wrappers
export { bigIntString, parseBigInt } from "./wrappers/bigint";
export { bigNumberString, parseBigNumber } from "./wrappers/bignumber";
export { jsonString, parseJson } from "./wrappers/json";
export type { JsonValue } from "./wrappers/json";

/**
 * Library version.
 */
export const VERSION = "0.3.0";

/**
 * Encodes one value to a fresh byte array.
 */
export function encode<T>(value: T, shape: Shape<T>, options?: SerializerOptions): Uint8Array {
  const serializer = new Serializer(options);
  shape.encode(serializer, value);
  return serializer.bytes().slice();
}

/**
 * Decodes one value and checks that the whole buffer was consumed.
 * @throws TrailingCharactersError if bytes remain after the value
 */
export function decode<T>(data: Uint8Array, shape: Shape<T>, options?: DeserializerOptions): T {
  const deserializer = new Deserializer(data, options);
  const value = shape.decode(deserializer);
  deserializer.end();
  return value;
}
