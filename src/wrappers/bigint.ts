import { DecodeError } from "../errors";
import type { Shape } from "../shape";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Arbitrary-precision integer written as its decimal string.
 */
export const bigIntString: Shape<bigint> = {
  encode: (s, v) => s.writeString(v.toString()),
  decode: (d) => parseBigInt(d.readString()),
};

/**
 * Parses a decimal integer string with an optional sign.
 * @throws DecodeError if the text is not an integer
 */
export function parseBigInt(text: string): bigint {
  if (!INTEGER_PATTERN.test(text)) {
    throw new DecodeError(`Error parsing BigInt: '${text}' is not an integer`);
  }
  return BigInt(text);
}
