import { BigNumber } from "bignumber.js";
import { DecodeError, EncodeError } from "../errors";
import type { Shape } from "../shape";

const DECIMAL_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Arbitrary-precision decimal written as its plain decimal string, without
 * an exponent.
 */
export const bigNumberString: Shape<BigNumber> = {
  encode: (s, v) => {
    if (!v.isFinite()) {
      throw new EncodeError(`Cannot encode BigNumber ${v.toString()}: value is not finite`);
    }
    s.writeString(v.toFixed());
  },
  decode: (d) => parseBigNumber(d.readString()),
};

/**
 * Parses a decimal string with an optional minus sign, fraction and
 * exponent.
 * @throws DecodeError if the text is not a decimal number
 */
export function parseBigNumber(text: string): BigNumber {
  if (!DECIMAL_PATTERN.test(text)) {
    throw new DecodeError(`Error parsing BigNumber: '${text}' is not a decimal number`);
  }
  return new BigNumber(text);
}
