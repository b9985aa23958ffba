import { DecodeError, EncodeError } from "../errors";
import type { Shape } from "../shape";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * JSON value written as its `JSON.stringify` text.
 */
export const jsonString: Shape<JsonValue> = {
  encode: (s, v) => s.writeString(stringifyJson(v)),
  decode: (d) => parseJson(d.readString()),
};

function stringifyJson(value: JsonValue): string {
  const text: string | undefined = JSON.stringify(value);
  if (text === undefined) {
    throw new EncodeError("Error serializing JSON: value has no JSON representation");
  }
  return text;
}

/**
 * @throws DecodeError if the text is not valid JSON
 */
export function parseJson(text: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (e) {
    throw new DecodeError(`Error parsing JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}
