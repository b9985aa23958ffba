import { describe, it, expect } from 'vitest';
import { Serializer } from './serializer';
import { EncodeError, ValueOutOfRangeError } from './errors';

function written(write: (serializer: Serializer) => void): number[] {
  const serializer = new Serializer();
  write(serializer);
  return Array.from(serializer.bytes());
}

describe('Serializer', () => {
  describe('unsigned integers', () => {
    it('picks the shortest form', () => {
      expect(written((s) => s.writeU64(0))).toEqual([0x00]);
      expect(written((s) => s.writeU64(127))).toEqual([0x7f]);
      expect(written((s) => s.writeU64(128))).toEqual([0xcc, 0x80]);
      expect(written((s) => s.writeU64(255))).toEqual([0xcc, 0xff]);
      expect(written((s) => s.writeU64(256))).toEqual([0xcd, 0x01, 0x00]);
      expect(written((s) => s.writeU64(65535))).toEqual([0xcd, 0xff, 0xff]);
      expect(written((s) => s.writeU64(65536))).toEqual([0xce, 0x00, 0x01, 0x00, 0x00]);
      expect(written((s) => s.writeU64(0xffffffff))).toEqual([0xce, 0xff, 0xff, 0xff, 0xff]);
      expect(written((s) => s.writeU64(0x100000000n))).toEqual([0xcf, 0, 0, 0, 1, 0, 0, 0, 0]);
    });

    it('narrows regardless of the declared width', () => {
      expect(written((s) => s.writeU32(5))).toEqual([0x05]);
      expect(written((s) => s.writeU16(200))).toEqual([0xcc, 0xc8]);
    });

    it('rejects values outside the width', () => {
      expect(() => written((s) => s.writeU8(300))).toThrow(ValueOutOfRangeError);
      expect(() => written((s) => s.writeU8(300))).toThrow('unsigned integer overflow: value = 300; bits = 8');
      expect(() => written((s) => s.writeU16(-1))).toThrow('unsigned integer overflow: value = -1; bits = 16');
      expect(() => written((s) => s.writeU64(-1n))).toThrow('unsigned integer overflow: value = -1; bits = 64');
    });

    it('rejects non-integers', () => {
      expect(() => written((s) => s.writeU32(1.5))).toThrow(EncodeError);
      expect(() => written((s) => s.writeU64(2 ** 53))).toThrow(
        '9007199254740992 is not a safe integer; pass a bigint for 64-bit values'
      );
    });
  });

  describe('signed integers', () => {
    it('picks the shortest form', () => {
      expect(written((s) => s.writeI64(-1))).toEqual([0xff]);
      expect(written((s) => s.writeI64(-32))).toEqual([0xe0]);
      expect(written((s) => s.writeI64(-33))).toEqual([0xd0, 0xdf]);
      expect(written((s) => s.writeI64(-128))).toEqual([0xd0, 0x80]);
      expect(written((s) => s.writeI64(-129))).toEqual([0xd1, 0xff, 0x7f]);
      expect(written((s) => s.writeI64(-32768))).toEqual([0xd1, 0x80, 0x00]);
      expect(written((s) => s.writeI64(-32769))).toEqual([0xd2, 0xff, 0xff, 0x7f, 0xff]);
      expect(written((s) => s.writeI64(-2147483648))).toEqual([0xd2, 0x80, 0x00, 0x00, 0x00]);
      expect(written((s) => s.writeI64(-2147483649n))).toEqual([0xd3, 0xff, 0xff, 0xff, 0xff, 0x7f, 0xff, 0xff, 0xff]);
    });

    it('writes non-negative values with the unsigned table', () => {
      expect(written((s) => s.writeI32(200))).toEqual([0xcc, 0xc8]);
      expect(written((s) => s.writeI8(7))).toEqual([0x07]);
      expect(written((s) => s.writeI64(0x7fffffffffffffffn))).toEqual([0xcf, 0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
    });

    it('rejects values outside the width', () => {
      expect(() => written((s) => s.writeI8(-129))).toThrow('integer overflow: value = -129; bits = 8');
      expect(() => written((s) => s.writeI32(2147483648))).toThrow('integer overflow: value = 2147483648; bits = 32');
      expect(() => written((s) => s.writeI64(0x8000000000000000n))).toThrow(ValueOutOfRangeError);
    });
  });

  describe('floats', () => {
    it('narrows doubles that survive single precision', () => {
      expect(written((s) => s.writeF64(1.5))).toEqual([0xca, 0x3f, 0xc0, 0x00, 0x00]);
      expect(written((s) => s.writeF64(0.1))).toEqual([0xcb, 0x3f, 0xb9, 0x99, 0x99, 0x99, 0x99, 0x99, 0x9a]);
    });

    it('writes NaN as a double', () => {
      expect(written((s) => s.writeF64(NaN))[0]).toBe(0xcb);
    });

    it('always writes single precision for writeF32', () => {
      const bytes = written((s) => s.writeF32(0.1));
      expect(bytes[0]).toBe(0xca);
      expect(bytes.length).toBe(5);
    });
  });

  describe('strings and bytes', () => {
    it('writes UTF-8 with the shortest header', () => {
      expect(written((s) => s.writeString(''))).toEqual([0xa0]);
      expect(written((s) => s.writeString('é'))).toEqual([0xa2, 0xc3, 0xa9]);
      expect(written((s) => s.writeString('a'.repeat(31)))[0]).toBe(0xbf);
      const long = written((s) => s.writeString('a'.repeat(32)));
      expect(long.slice(0, 2)).toEqual([0xd9, 0x20]);
      expect(long.length).toBe(34);
    });

    it('writes characters of one code point', () => {
      expect(written((s) => s.writeChar('😀'))).toEqual([0xa4, 0xf0, 0x9f, 0x98, 0x80]);
      expect(() => written((s) => s.writeChar('ab'))).toThrow("Expected a single character, got 'ab'");
      expect(() => written((s) => s.writeChar(''))).toThrow(EncodeError);
    });

    it('rejects unpaired surrogates', () => {
      expect(() => written((s) => s.writeString('\uD800'))).toThrow(
        'String contains a lone surrogate and is not valid UTF-16'
      );
      expect(() => written((s) => s.writeString('a\uDC00b'))).toThrow(EncodeError);
      expect(() => written((s) => s.writeString('\uDE00\uD83D'))).toThrow(EncodeError);
      expect(() => written((s) => s.writeChar('\uD800'))).toThrow(EncodeError);
      expect(written((s) => s.writeString('\uD83D\uDE00'))).toEqual([0xa4, 0xf0, 0x9f, 0x98, 0x80]);
    });

    it('writes an empty blob as nil', () => {
      expect(written((s) => s.writeBytes(new Uint8Array()))).toEqual([0xc0]);
      expect(written((s) => s.writeBytes(new Uint8Array([1, 2])))).toEqual([0xc4, 0x02, 0x01, 0x02]);
    });
  });

  describe('scalars', () => {
    it('writes nil, unit and booleans', () => {
      expect(written((s) => s.writeNil())).toEqual([0xc0]);
      expect(written((s) => s.writeUnit())).toEqual([0xc0]);
      expect(written((s) => s.writeBool(true))).toEqual([0xc3]);
      expect(written((s) => s.writeBool(false))).toEqual([0xc2]);
    });

    it('writes optionals', () => {
      expect(written((s) => s.writeOptional(undefined, (ser, v: number) => ser.writeU8(v)))).toEqual([0xc0]);
      expect(written((s) => s.writeOptional(null, (ser, v: number) => ser.writeU8(v)))).toEqual([0xc0]);
      expect(written((s) => s.writeOptional(5, (ser, v) => ser.writeU8(v)))).toEqual([0x05]);
    });

    it('writes enum variants', () => {
      expect(written((s) => s.writeUnitVariant(2))).toEqual([0x02]);
      expect(written((s) => s.writeVariant('b', (ser) => ser.writeString('x')))).toEqual([0x81, 0xa1, 0x62, 0xa1, 0x78]);
    });
  });

  describe('sequences', () => {
    it('buffers elements when the length is not known', () => {
      const bytes = written((s) => {
        const seq = s.beginSeq();
        for (let i = 1; i <= 3; i++) {
          seq.element((ser) => ser.writeU8(i));
        }
        seq.end();
      });
      expect(bytes).toEqual([0x93, 0x01, 0x02, 0x03]);
    });

    it('writes a 16-bit header for long sequences', () => {
      const bytes = written((s) => {
        const seq = s.beginSeq();
        for (let i = 0; i < 16; i++) {
          seq.element((ser) => ser.writeU8(i));
        }
        seq.end();
      });
      expect(bytes.slice(0, 4)).toEqual([0xdc, 0x00, 0x10, 0x00]);
      expect(bytes.length).toBe(19);
    });

    it('checks a declared length', () => {
      const s = new Serializer();
      const short = s.beginSeq(2);
      short.element((ser) => ser.writeU8(1));
      expect(() => short.end()).toThrow('Sequence declared 2 entries but 1 were written');

      const long = new Serializer().beginSeq(1);
      long.element((ser) => ser.writeU8(1));
      expect(() => long.element((ser) => ser.writeU8(2))).toThrow('Sequence declared 1 entries, got more');
    });

    it('cannot be ended twice', () => {
      const seq = new Serializer().beginSeq();
      seq.end();
      expect(() => seq.end()).toThrow('Sequence already ended');
    });

    it('nests buffered aggregates', () => {
      const bytes = written((s) => {
        const seq = s.beginSeq();
        seq.element((ser) => {
          const st = ser.beginStruct();
          st.field('x', (f) => f.writeU8(5));
          st.end();
        });
        seq.end();
      });
      expect(bytes).toEqual([0x91, 0x81, 0xa1, 0x78, 0x05]);
    });
  });

  describe('structures', () => {
    it('writes a bare map of field names', () => {
      const bytes = written((s) => {
        const st = s.beginStruct();
        st.field('a', (ser) => ser.writeU8(1));
        st.field('b', (ser) => ser.writeU8(2));
        st.end();
      });
      expect(bytes).toEqual([0x82, 0xa1, 0x61, 0x01, 0xa1, 0x62, 0x02]);
    });

    it('writes the header up front when the field count is declared', () => {
      const s = new Serializer();
      const st = s.beginStruct(1);
      expect(Array.from(s.bytes())).toEqual([0x81]);
      st.field('a', (ser) => ser.writeBool(true));
      st.end();
      expect(Array.from(s.bytes())).toEqual([0x81, 0xa1, 0x61, 0xc3]);
    });
  });

  describe('generic maps', () => {
    it('wraps the map in a GenericMap envelope', () => {
      const bytes = written((s) =>
        s.writeMap(
          new Map([[1, 'a']]),
          (ser, k) => ser.writeU8(k),
          (ser, v) => ser.writeString(v)
        )
      );
      expect(bytes).toEqual([0xc7, 0x04, 0x01, 0x81, 0x01, 0xa1, 0x61]);
    });

    it('wraps an empty map', () => {
      const bytes = written((s) => s.beginMap().end());
      expect(bytes).toEqual([0xc7, 0x01, 0x01, 0x80]);
    });

    it('sizes the envelope by the inner body', () => {
      const entries: [number, null][] = [];
      for (let i = 0; i < 300; i++) {
        entries.push([i, null]);
      }
      const bytes = written((s) =>
        s.writeMap(
          entries,
          (ser, k) => ser.writeU16(k),
          (ser) => ser.writeNil()
        )
      );
      // 3 header + 128 + 256 + 132 key bytes + 300 nils = 819
      expect(bytes.slice(0, 7)).toEqual([0xc8, 0x03, 0x33, 0x01, 0xde, 0x01, 0x2c]);
      expect(bytes.length).toBe(4 + 819);
    });

    it('checks a declared entry count', () => {
      const map = new Serializer().beginMap(2);
      map.entry(
        (ser) => ser.writeU8(1),
        (ser) => ser.writeU8(2)
      );
      expect(() => map.end()).toThrow('Map declared 2 entries but 1 were written');
    });
  });

  describe('writeAny', () => {
    it('writes self-described values', () => {
      expect(written((s) => s.writeAny(null))).toEqual([0xc0]);
      expect(written((s) => s.writeAny(true))).toEqual([0xc3]);
      expect(written((s) => s.writeAny(-1))).toEqual([0xff]);
      expect(written((s) => s.writeAny(1.5))).toEqual([0xca, 0x3f, 0xc0, 0x00, 0x00]);
      expect(written((s) => s.writeAny(2n ** 63n))).toEqual([0xcf, 0x80, 0, 0, 0, 0, 0, 0, 0]);
      expect(written((s) => s.writeAny([1, 'a']))).toEqual([0x92, 0x01, 0xa1, 0x61]);
    });

    it('writes every bigint with a 64-bit tag', () => {
      expect(written((s) => s.writeAny(5n))).toEqual([0xcf, 0, 0, 0, 0, 0, 0, 0, 0x05]);
      expect(written((s) => s.writeAny(-5n))).toEqual([0xd3, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfb]);
      expect(() => written((s) => s.writeAny(2n ** 64n))).toThrow(ValueOutOfRangeError);
      expect(() => written((s) => s.writeAny(-(2n ** 63n) - 1n))).toThrow(ValueOutOfRangeError);
    });

    it('writes numbers beyond 32 bits and negative zero as floats', () => {
      expect(written((s) => s.writeAny(0xffffffff))).toEqual([0xce, 0xff, 0xff, 0xff, 0xff]);
      expect(written((s) => s.writeAny(2 ** 32))).toEqual([0xca, 0x4f, 0x80, 0x00, 0x00]);
      expect(written((s) => s.writeAny(2 ** 40))).toEqual([0xca, 0x53, 0x80, 0x00, 0x00]);
      expect(written((s) => s.writeAny(-0))).toEqual([0xca, 0x80, 0x00, 0x00, 0x00]);
      expect(written((s) => s.writeAny(0))).toEqual([0x00]);
    });

    it('writes objects as structures and Maps as generic maps', () => {
      expect(written((s) => s.writeAny({ a: 1 }))).toEqual([0x81, 0xa1, 0x61, 0x01]);
      expect(written((s) => s.writeAny(new Map([['a', 1]])))).toEqual([0xc7, 0x04, 0x01, 0x81, 0xa1, 0x61, 0x01]);
    });
  });
});
