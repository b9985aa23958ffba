import { DecodeError, EncodeError } from "./errors";
import type { Deserializer } from "./deserializer";
import { isMapFormat } from "./format";
import type { Serializer } from "./serializer";
import type { Value } from "./value";

/**
 * Describes how values of type T are walked through the serializer and
 * pulled back out of the deserializer.
 */
export interface Shape<T> {
  encode(serializer: Serializer, value: T): void;
  decode(deserializer: Deserializer): T;
  /**
   * Value used when a structure field of this shape is missing on the wire.
   * Shapes without it make the field required.
   */
  absent?(): T;
}

/**
 * Extracts the value type of a shape.
 */
export type Infer<S> = S extends Shape<infer T> ? T : never;

export const nil: Shape<null> = {
  encode: (s) => s.writeNil(),
  decode: (d) => {
    d.readUnit();
    return null;
  },
  absent: () => null,
};

export const unit: Shape<undefined> = {
  encode: (s) => s.writeUnit(),
  decode: (d) => {
    d.readUnit();
    return undefined;
  },
  absent: () => undefined,
};

export const bool: Shape<boolean> = {
  encode: (s, v) => s.writeBool(v),
  decode: (d) => d.readBool(),
};

export const u8: Shape<number> = {
  encode: (s, v) => s.writeU8(v),
  decode: (d) => d.readU8(),
};

export const u16: Shape<number> = {
  encode: (s, v) => s.writeU16(v),
  decode: (d) => d.readU16(),
};

export const u32: Shape<number> = {
  encode: (s, v) => s.writeU32(v),
  decode: (d) => d.readU32(),
};

export const u64: Shape<bigint> = {
  encode: (s, v) => s.writeU64(v),
  decode: (d) => d.readU64(),
};

export const i8: Shape<number> = {
  encode: (s, v) => s.writeI8(v),
  decode: (d) => d.readI8(),
};

export const i16: Shape<number> = {
  encode: (s, v) => s.writeI16(v),
  decode: (d) => d.readI16(),
};

export const i32: Shape<number> = {
  encode: (s, v) => s.writeI32(v),
  decode: (d) => d.readI32(),
};

export const i64: Shape<bigint> = {
  encode: (s, v) => s.writeI64(v),
  decode: (d) => d.readI64(),
};

export const f32: Shape<number> = {
  encode: (s, v) => s.writeF32(v),
  decode: (d) => d.readF32(),
};

export const f64: Shape<number> = {
  encode: (s, v) => s.writeF64(v),
  decode: (d) => d.readF64(),
};

export const char: Shape<string> = {
  encode: (s, v) => s.writeChar(v),
  decode: (d) => d.readChar(),
};

export const string: Shape<string> = {
  encode: (s, v) => s.writeString(v),
  decode: (d) => d.readString(),
};

export const bytes: Shape<Uint8Array> = {
  encode: (s, v) => s.writeBytes(v),
  decode: (d) => d.readBytes(),
};

/**
 * Self-described value: the wire format picks the shape on decode.
 */
export const any: Shape<Value> = {
  encode: (s, v) => s.writeAny(v),
  decode: (d) => d.readAny(),
};

/**
 * Nil for `undefined`, otherwise the inner shape. Optional structure fields
 * may be left out on the wire.
 */
export function option<T>(inner: Shape<T>): Shape<T | undefined> {
  return {
    encode: (s, v) => s.writeOptional(v, (ser, some) => inner.encode(ser, some)),
    decode: (d) => d.readOption((de) => inner.decode(de)),
    absent: () => undefined,
  };
}

export function array<T>(inner: Shape<T>): Shape<T[]> {
  return {
    encode: (s, v) => s.writeArray(v, (ser, item) => inner.encode(ser, item)),
    decode: (d) => d.readArray((de) => inner.decode(de)),
  };
}

/**
 * Generic map with keys of any shape, wrapped in the extension envelope.
 */
export function map<K, V>(key: Shape<K>, value: Shape<V>): Shape<Map<K, V>> {
  return {
    encode: (s, v) =>
      s.writeMap(
        v,
        (ser, k) => key.encode(ser, k),
        (ser, item) => value.encode(ser, item)
      ),
    decode: (d) => {
      const access = d.readMap();
      const result = new Map<K, V>();
      for (let k = access.nextKey((de) => key.decode(de)); !k.done; k = access.nextKey((de) => key.decode(de))) {
        result.set(k.value, access.nextValue((de) => value.decode(de)));
      }
      return result;
    },
  };
}

/**
 * Generic map with string keys, read into a plain object.
 */
export function record<V>(value: Shape<V>): Shape<Record<string, V>> {
  return {
    encode: (s, v) =>
      s.writeMap(
        Object.entries(v),
        (ser, k) => ser.writeString(k),
        (ser, item) => value.encode(ser, item)
      ),
    decode: (d) => {
      const access = d.readMap();
      const entries: [string, V][] = [];
      for (let k = access.nextKey((de) => de.readString()); !k.done; k = access.nextKey((de) => de.readString())) {
        entries.push([k.value, access.nextValue((de) => value.decode(de))]);
      }
      return Object.fromEntries(entries);
    },
  };
}

export type FieldShapes<T> = { [K in keyof T]: Shape<T[K]> };

/**
 * Structure with a declared field list, written as a bare map of field
 * names to values.
 *
 * Fields are written in declaration order. On decode, fields may come in
 * any order; unknown fields are skipped and missing fields take the value
 * of their shape's `absent()`, if it has one.
 *
 * @example
 * ```typescript
 * const Point = struct({ x: i32, y: i32, label: option(string) });
 * type Point = Infer<typeof Point>;
 * ```
 */
export function struct<T extends object>(fields: FieldShapes<T>): Shape<T> {
  const names = Object.keys(fields).filter((name): name is Extract<keyof T, string> => hasOwn(fields, name));

  return {
    encode: (s, v) => {
      const st = s.beginStruct(names.length);
      for (const name of names) {
        const shape = fields[name];
        st.field(name, (ser) => shape.encode(ser, v[name]));
      }
      st.end();
    },
    decode: (d) => {
      const access = d.readStruct();
      const result: Partial<T> = {};
      for (let f = access.nextField(); !f.done; f = access.nextField()) {
        const name = f.value;
        if (isFieldName(fields, name)) {
          const shape = fields[name];
          result[name] = access.value((de) => shape.decode(de));
        } else {
          access.value((de) => de.readAny());
        }
      }
      for (const name of names) {
        if (hasOwn(result, name)) {
          continue;
        }
        const shape = fields[name];
        if (shape.absent === undefined) {
          throw new DecodeError(`Missing required field: '${name}'`);
        }
        result[name] = shape.absent();
      }
      if (!isComplete(result, names)) {
        throw new DecodeError("Structure is incomplete");
      }
      return result;
    },
  };
}

function hasOwn(target: unknown, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, name);
}

function isFieldName<T extends object>(fields: FieldShapes<T>, name: string): name is Extract<keyof T, string> {
  return hasOwn(fields, name);
}

function isComplete<T extends object>(value: Partial<T>, names: readonly string[]): value is T {
  return names.every((name) => hasOwn(value, name));
}

/**
 * Unit enum. Variants are written as their index in `variants`, and read
 * back from either the index or the name.
 */
export function enumeration<V extends string>(variants: readonly V[]): Shape<V> {
  return {
    encode: (s, v) => s.writeUnitVariant(variantIndex(variants, v)),
    decode: (d) => d.readEnum(variants),
  };
}

/**
 * Tagged value of a variant shape.
 */
export type VariantOf<C> = { [K in keyof C & string]: { kind: K; value: C[K] } }[keyof C & string];

/**
 * Enum whose variants may carry data. A case whose shape is {@link unit} is
 * a unit variant and is written as its index alone; any other case is
 * written as a one-entry map from its name to its body.
 *
 * @example
 * ```typescript
 * const Figure = variant({ empty: unit, circle: f64, rect: struct({ w: f64, h: f64 }) });
 * const circle: Infer<typeof Figure> = { kind: "circle", value: 1.5 };
 * encode(circle, Figure);
 * ```
 */
export function variant<C extends object>(cases: FieldShapes<C>): Shape<VariantOf<C>> {
  const names = Object.keys(cases).filter((name): name is keyof C & string => hasOwn(cases, name));

  return {
    encode: (s, v) => {
      const index = variantIndex(names, v.kind);
      const shape = cases[v.kind];
      if (isUnitShape(shape)) {
        s.writeUnitVariant(index);
      } else {
        s.writeVariant(v.kind, (ser) => shape.encode(ser, v.value));
      }
    },
    decode: (d) => {
      if (isMapFormat(d.peekFormat())) {
        const kind = d.readVariant(names);
        return tagged<C, typeof kind>(kind, cases[kind].decode(d));
      }
      const kind = d.readEnum(names);
      const shape = cases[kind];
      if (!isUnitShape(shape) || shape.absent === undefined) {
        throw new DecodeError(`Variant '${kind}' carries data but was written without a body`);
      }
      return tagged<C, typeof kind>(kind, shape.absent());
    },
  };
}

function tagged<C, K extends keyof C & string>(kind: K, value: C[K]): VariantOf<C> {
  return { kind, value };
}

function isUnitShape(shape: object): boolean {
  return shape === unit;
}

function variantIndex(variants: readonly string[], name: string): number {
  const index = variants.indexOf(name);
  if (index < 0) {
    throw new EncodeError(`Unknown enum variant '${name}'`);
  }
  return index;
}
