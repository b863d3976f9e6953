/**
 * @tagimage/core — binary codec
 *
 * decode(), encode(), encodeText(), verifyUpdates() and TagReader against one
 * mixed layout:
 *
 *   EnableIn     bool    word 0 bit 0
 *   Mode         sint8   4
 *   Step         int16   6
 *   Setpoint     dint32  8
 *   Gain         real32  12
 *   Total        lint64  16
 *   Flags[0..2]  bool    word 0 bits 1..3
 *   Gains[0..1]  Pair    24, 28, 32, 36
 *
 * totalByteSize 40.
 */

import { describe, it, expect } from 'vitest';
import {
  FieldNotFoundError,
  ImageTooSmallError,
  TagReader,
  ValueParseError,
  ValueRangeError,
  assign,
  decode,
  encode,
  encodeText,
  unwrap,
  verifyUpdates,
} from '../src/index';
import { PAIR, catalogOf, failure, field } from './helpers';

const layout = unwrap(assign(catalogOf([PAIR]), [
  field('EnableIn', 'BOOL'),
  field('Mode',     'SINT'),
  field('Step',     'INT'),
  field('Setpoint', 'DINT'),
  field('Gain',     'REAL'),
  field('Total',    'LINT'),
  field('Flags',    'BOOL', 3),
  field('Gains',    'Pair', 2),
]));

const SIZE = 40;

function patterned(): Uint8Array {
  return Uint8Array.from({ length: SIZE }, (_, i) => (i * 37 + 11) & 0xff);
}

// ─── Layout sanity ────────────────────────────────────────────────────────────

describe('codec fixture', () => {
  it('has the documented size', () => {
    expect(layout.totalByteSize).toBe(SIZE);
    expect(layout.fields).toHaveLength(13);
  });
});

// ─── decode ───────────────────────────────────────────────────────────────────

describe('decode', () => {
  it('decodes a zero image to zero values', () => {
    expect(unwrap(decode(layout, new Uint8Array(SIZE)))).toEqual({
      'EnableIn':    false,
      'Mode':        0,
      'Step':        0,
      'Setpoint':    0,
      'Gain':        0,
      'Total':       0n,
      'Flags[0]':    false,
      'Flags[1]':    false,
      'Flags[2]':    false,
      'Gains[0].Kp': 0,
      'Gains[0].Ki': 0,
      'Gains[1].Kp': 0,
      'Gains[1].Ki': 0,
    });
  });

  it('sign-extends SINT and INT', () => {
    const image = new Uint8Array(SIZE);
    image[4] = 0xff;
    image[7] = 0x80;
    const values = unwrap(decode(layout, image));
    expect(values['Mode']).toBe(-1);
    expect(values['Step']).toBe(-32768);
  });

  it('reads multi-byte values little-endian', () => {
    const image = new Uint8Array(SIZE);
    image.set([0x78, 0x56, 0x34, 0x12], 8);
    expect(unwrap(decode(layout, image))['Setpoint']).toBe(0x12345678);
  });

  it('extracts each bool from its bit of the host word', () => {
    const image = new Uint8Array(SIZE);
    image[0] = 0b0101;
    const values = unwrap(decode(layout, image));
    expect(values['EnableIn']).toBe(true);
    expect(values['Flags[0]']).toBe(false);
    expect(values['Flags[1]']).toBe(true);
    expect(values['Flags[2]']).toBe(false);
  });

  it('decodes only the requested fields', () => {
    const values = unwrap(decode(layout, new Uint8Array(SIZE), { fields: ['Gain', 'Flags[1]'] }));
    expect(values).toEqual({ 'Gain': 0, 'Flags[1]': false });
  });

  it('fails on an unknown requested field', () => {
    const e = failure(decode(layout, new Uint8Array(SIZE), { fields: ['Nope'] }));
    expect(e).toBeInstanceOf(FieldNotFoundError);
  });

  it('fails on an image shorter than the layout', () => {
    const e = failure(decode(layout, new Uint8Array(SIZE - 1)));
    expect(e).toBeInstanceOf(ImageTooSmallError);
    if (!(e instanceof ImageTooSmallError)) return;
    expect(e.byteLength).toBe(39);
    expect(e.requiredBytes).toBe(40);
  });

  it('accepts a longer image and ignores the tail', () => {
    const image = new Uint8Array(SIZE + 8).fill(0xff, SIZE);
    expect(unwrap(decode(layout, image))['Gains[1].Ki']).toBe(0);
  });
});

// ─── encode ───────────────────────────────────────────────────────────────────

describe('encode', () => {
  it('round-trips the extremes of each kind', () => {
    const { image, errors } = unwrap(encode(layout, new Uint8Array(SIZE), {
      'EnableIn':    true,
      'Mode':        -128,
      'Step':        32767,
      'Setpoint':    -2147483648,
      'Gain':        1.5,
      'Total':       -(1n << 63n),
      'Gains[1].Ki': 0.1,
    }));
    expect(errors).toEqual([]);

    const values = unwrap(decode(layout, image));
    expect(values['EnableIn']).toBe(true);
    expect(values['Mode']).toBe(-128);
    expect(values['Step']).toBe(32767);
    expect(values['Setpoint']).toBe(-2147483648);
    expect(values['Gain']).toBe(1.5);
    expect(values['Total']).toBe(-(1n << 63n));
    expect(values['Gains[1].Ki']).toBe(Math.fround(0.1));
  });

  it('accepts bigint for 32-bit integers and safe numbers for LINT', () => {
    const { image } = unwrap(encode(layout, new Uint8Array(SIZE), { Setpoint: 5n, Total: 12 }));
    const values = unwrap(decode(layout, image));
    expect(values['Setpoint']).toBe(5);
    expect(values['Total']).toBe(12n);
  });

  it('reads numeric bools back as booleans and LINT numbers as bigint', () => {
    const updates = { 'EnableIn': 1, 'Flags[0]': 0, 'Total': 12 };
    const { image } = unwrap(encode(layout, patterned(), updates));
    const values = unwrap(decode(layout, image, { fields: ['EnableIn', 'Flags[0]', 'Total'] }));

    expect(values).toEqual({ 'EnableIn': true, 'Flags[0]': false, 'Total': 12n });
    expect(unwrap(verifyUpdates(layout, image, updates))).toEqual([]);
  });

  it('stores NaN in a REAL', () => {
    const { image } = unwrap(encode(layout, new Uint8Array(SIZE), { Gain: Number.NaN }));
    expect(unwrap(decode(layout, image))['Gain']).toBeNaN();
  });

  it('changes only the bytes of the updated field', () => {
    const before = patterned();
    const { image } = unwrap(encode(layout, before, { Setpoint: 7 }));

    expect(Array.from(image.subarray(8, 12))).toEqual([7, 0, 0, 0]);
    for (let i = 0; i < SIZE; i++) {
      if (i >= 8 && i < 12) continue;
      expect(image[i]).toBe(before[i]);
    }
  });

  it('keeps the other 31 bits of a bool host word', () => {
    const before = new Uint8Array(SIZE);
    before.fill(0xff, 0, 4);
    const { image } = unwrap(encode(layout, before, { 'Flags[1]': false }));
    expect(Array.from(image.subarray(0, 4))).toEqual([0xfb, 0xff, 0xff, 0xff]);
  });

  it('sets bools without touching their neighbours', () => {
    const { image } = unwrap(encode(layout, new Uint8Array(SIZE), { 'Flags[2]': true, 'EnableIn': 1 }));
    expect(image[0]).toBe(0b1001);
  });

  it('copies by default and leaves the input untouched', () => {
    const input = new Uint8Array(SIZE);
    const { image } = unwrap(encode(layout, input, { Setpoint: 1 }));
    expect(image).not.toBe(input);
    expect(input[8]).toBe(0);
    expect(image[8]).toBe(1);
  });

  it('writes into the caller image with inPlace', () => {
    const input = new Uint8Array(SIZE);
    const { image } = unwrap(encode(layout, input, { Setpoint: 1 }, { inPlace: true }));
    expect(image).toBe(input);
    expect(input[8]).toBe(1);
  });

  it('honours the byteOffset of a subarray image', () => {
    const backing = new Uint8Array(SIZE + 8);
    unwrap(encode(layout, backing.subarray(8), { Setpoint: 1 }, { inPlace: true }));
    expect(backing[16]).toBe(1);
    expect(backing[8]).toBe(0);
  });

  it('reports out-of-range values and writes nothing for them', () => {
    const input = patterned();
    const { image, errors } = unwrap(encode(layout, input, {
      Step:     1.5,
      Setpoint: 2 ** 31,
      Total:    1n << 63n,
      Gain:     1e39,
      EnableIn: 2,
      Mode:     true,
    }));

    expect(errors.map(e => e instanceof ValueRangeError)).toEqual([true, true, true, true, true, true]);
    expect(errors.map(e => e instanceof ValueRangeError ? e.fieldPath : '')).toEqual([
      'Step', 'Setpoint', 'Total', 'Gain', 'EnableIn', 'Mode',
    ]);
    expect(Array.from(image)).toEqual(Array.from(input));
  });

  it('describes a range failure with the field, kind and offset', () => {
    const { errors } = unwrap(encode(layout, new Uint8Array(SIZE), { Mode: 128 }));
    const e = errors[0];
    expect(e).toBeInstanceOf(ValueRangeError);
    if (!(e instanceof ValueRangeError)) return;
    expect(e.kind).toBe('sint8');
    expect(e.byteOffset).toBe(4);
    expect(e.value).toBe(128);
    expect(e.message).toBe("Value 128 cannot be stored in field 'Mode' (sint8 at byte 4).");
  });

  it('reports unknown paths and still applies the other updates', () => {
    const { image, errors } = unwrap(encode(layout, new Uint8Array(SIZE), { Missing: 1, Setpoint: 9 }));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(FieldNotFoundError);
    expect(errors[0]?.message).toBe("Field 'Missing' is not part of the layout.");
    expect(unwrap(decode(layout, image))['Setpoint']).toBe(9);
  });

  it('fails as a whole on an image shorter than the layout', () => {
    expect(failure(encode(layout, new Uint8Array(8), { Setpoint: 1 }))).toBeInstanceOf(ImageTooSmallError);
  });
});

// ─── encodeText ───────────────────────────────────────────────────────────────

describe('encodeText', () => {
  it('parses text per field kind', () => {
    const { image, errors } = unwrap(encodeText(layout, new Uint8Array(SIZE), {
      Setpoint: '-7',
      Gain:     ' 2.5 ',
      EnableIn: 'TRUE',
      Total:    '-9223372036854775808',
    }));
    expect(errors).toEqual([]);

    const values = unwrap(decode(layout, image));
    expect(values['Setpoint']).toBe(-7);
    expect(values['Gain']).toBe(2.5);
    expect(values['EnableIn']).toBe(true);
    expect(values['Total']).toBe(-(1n << 63n));
  });

  it('shares the size check and in-place write of encode()', () => {
    expect(failure(encodeText(layout, new Uint8Array(SIZE - 1), { Setpoint: '1' })))
      .toBeInstanceOf(ImageTooSmallError);

    const input = new Uint8Array(SIZE);
    const { image } = unwrap(encodeText(layout, input, { Setpoint: '1' }, { inPlace: true }));
    expect(image).toBe(input);
    expect(input[8]).toBe(1);
  });

  it('reports parse, lookup and range failures in update order', () => {
    const { image, errors } = unwrap(encodeText(layout, new Uint8Array(SIZE), {
      Mode:     'abc',
      Nope:     '1',
      Step:     '40000',
      Setpoint: '3',
    }));

    expect(errors).toHaveLength(3);
    expect(errors[0]).toBeInstanceOf(ValueParseError);
    expect(errors[0]?.message).toBe("Text 'abc' is not a valid sint8 value for field 'Mode'.");
    expect(errors[1]).toBeInstanceOf(FieldNotFoundError);
    expect(errors[2]).toBeInstanceOf(ValueRangeError);
    expect(unwrap(decode(layout, image))['Setpoint']).toBe(3);
  });
});

// ─── verifyUpdates ────────────────────────────────────────────────────────────

describe('verifyUpdates', () => {
  const updates = { Gain: 0.1, Setpoint: 5, EnableIn: true, Total: 3 };

  it('finds no mismatch after encoding the same values', () => {
    const { image } = unwrap(encode(layout, new Uint8Array(SIZE), updates));
    expect(unwrap(verifyUpdates(layout, image, updates))).toEqual([]);
  });

  it('lists each field that differs', () => {
    expect(unwrap(verifyUpdates(layout, new Uint8Array(SIZE), updates))).toEqual([
      { path: 'Gain',     expected: 0.1,  actual: 0 },
      { path: 'Setpoint', expected: 5,    actual: 0 },
      { path: 'EnableIn', expected: true, actual: false },
      { path: 'Total',    expected: 3,    actual: 0n },
    ]);
  });

  it('fails on an unknown path', () => {
    expect(failure(verifyUpdates(layout, new Uint8Array(SIZE), { Nope: 1 })))
      .toBeInstanceOf(FieldNotFoundError);
  });
});

// ─── TagReader ────────────────────────────────────────────────────────────────

describe('TagReader', () => {
  const reader = new TagReader(layout);
  const { image } = unwrap(encode(layout, new Uint8Array(SIZE), {
    'Mode':        -3,
    'Step':        300,
    'Setpoint':    123456,
    'Gain':        3.14,
    'Total':       1n << 40n,
    'Flags[1]':    true,
    'Gains[1].Kp': -0.5,
  }));

  it('reads each kind through its typed accessor', () => {
    expect(reader.getSint(image, 'Mode')).toBe(-3);
    expect(reader.getInt(image, 'Step')).toBe(300);
    expect(reader.getDint(image, 'Setpoint')).toBe(123456);
    expect(reader.getReal(image, 'Gain')).toBe(Math.fround(3.14));
    expect(reader.getLint(image, 'Total')).toBe(1n << 40n);
    expect(reader.getBool(image, 'Flags[1]')).toBe(true);
    expect(reader.getBool(image, 'Flags[0]')).toBe(false);
    expect(reader.getReal(image, 'Gains[1].Kp')).toBe(-0.5);
    expect(reader.get(image, 'Setpoint')).toBe(123456);
  });

  it('returns null for unknown paths, other kinds and short images', () => {
    expect(reader.getDint(image, 'Nope')).toBeNull();
    expect(reader.getBool(image, 'Setpoint')).toBeNull();
    expect(reader.getDint(image, 'Gain')).toBeNull();
    expect(reader.getDint(image.subarray(0, 12), 'Setpoint')).toBeNull();
    expect(reader.get(image, 'Nope')).toBeNull();
  });

  it('exposes paths and placements', () => {
    expect(reader.paths[0]).toBe('EnableIn');
    expect(reader.paths).toHaveLength(13);
    expect(reader.has('Gains[0].Ki')).toBe(true);
    expect(reader.has('Gains[2].Ki')).toBe(false);
    expect(reader.field('Gains[1].Kp')?.byteOffset).toBe(32);
    expect(reader.field('Nope')).toBeNull();
  });
});
