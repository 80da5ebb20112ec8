import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  add16, add8, addSpSigned, bit, ccf, cpl, daa, dec8, inc8, rotateA, scf, shift, sub8,
} from '@core/cpu/alu';
import { FLAG_C, FLAG_H, FLAG_N, FLAG_Z } from '@core/cpu/types';

const byte = fc.integer({ min: 0, max: 255 });

describe('8-bit add/sub flags at boundaries', () => {
  it('ADD half carry from bit 3', () => {
    expect(add8(0x0F, 0x01, 0)).toEqual({ value: 0x10, f: FLAG_H });
  });

  it('ADD wrap to zero sets Z, H and C', () => {
    expect(add8(0xFF, 0x01, 0)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_H | FLAG_C });
  });

  it('ADC folds the incoming carry into both H and C', () => {
    expect(add8(0xFF, 0x00, FLAG_C, true)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_H | FLAG_C });
    expect(add8(0x0E, 0x01, FLAG_C, true)).toEqual({ value: 0x10, f: FLAG_H });
  });

  it('SUB borrow from bit 4 sets H', () => {
    expect(sub8(0x10, 0x01, 0)).toEqual({ value: 0x0F, f: FLAG_N | FLAG_H });
  });

  it('SUB below zero sets C', () => {
    expect(sub8(0x00, 0x01, 0)).toEqual({ value: 0xFF, f: FLAG_N | FLAG_H | FLAG_C });
  });

  it('SBC subtracts the incoming carry', () => {
    expect(sub8(0x00, 0x00, FLAG_C, true)).toEqual({ value: 0xFF, f: FLAG_N | FLAG_H | FLAG_C });
    expect(sub8(0x05, 0x04, FLAG_C, true)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_N });
  });

  it('ADD matches the arithmetic model for every input', () => {
    fc.assert(fc.property(byte, byte, (a, b) => {
      const r = add8(a, b, 0);
      expect(r.value).toBe((a + b) & 0xFF);
      expect((r.f & FLAG_C) !== 0).toBe(a + b > 0xFF);
      expect((r.f & FLAG_H) !== 0).toBe((a & 0xF) + (b & 0xF) > 0xF);
      expect((r.f & FLAG_Z) !== 0).toBe(((a + b) & 0xFF) === 0);
      expect(r.f & (FLAG_N | 0x0F)).toBe(0);
    }));
  });

  it('SUB matches the arithmetic model for every input', () => {
    fc.assert(fc.property(byte, byte, (a, b) => {
      const r = sub8(a, b, 0);
      expect(r.value).toBe((a - b) & 0xFF);
      expect((r.f & FLAG_C) !== 0).toBe(b > a);
      expect((r.f & FLAG_H) !== 0).toBe((b & 0xF) > (a & 0xF));
      expect((r.f & FLAG_N) !== 0).toBe(true);
      expect(r.f & 0x0F).toBe(0);
    }));
  });
});

describe('INC/DEC', () => {
  it('INC keeps C and sets H on nibble overflow', () => {
    expect(inc8(0xFF, FLAG_C)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_H | FLAG_C });
    expect(inc8(0x0F, 0)).toEqual({ value: 0x10, f: FLAG_H });
  });

  it('DEC sets N and H on nibble borrow', () => {
    expect(dec8(0x01, 0)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_N });
    expect(dec8(0x10, FLAG_C)).toEqual({ value: 0x0F, f: FLAG_N | FLAG_H | FLAG_C });
  });
});

describe('16-bit arithmetic', () => {
  it('ADD HL,rr takes H from bit 11 and C from bit 15 and keeps Z', () => {
    expect(add16(0x0FFF, 0x0001, FLAG_Z)).toEqual({ value: 0x1000, f: FLAG_Z | FLAG_H });
    expect(add16(0xFFFF, 0x0001, 0)).toEqual({ value: 0x0000, f: FLAG_H | FLAG_C });
    expect(add16(0x00FF, 0x0001, FLAG_N)).toEqual({ value: 0x0100, f: 0 });
  });

  it('SP+e8 takes H and C from the low byte and clears Z and N', () => {
    expect(addSpSigned(0xFFF8, 0x08)).toEqual({ value: 0x0000, f: FLAG_H | FLAG_C });
    expect(addSpSigned(0x0005, 0xFF)).toEqual({ value: 0x0004, f: FLAG_H | FLAG_C });
    expect(addSpSigned(0x1000, 0x80)).toEqual({ value: 0x0F80, f: 0 });
  });
});

describe('DAA', () => {
  const bcd = (n: number): number => ((Math.floor(n / 10) << 4) | (n % 10));
  const decimal = fc.integer({ min: 0, max: 99 });

  it('corrects every BCD addition', () => {
    fc.assert(fc.property(decimal, decimal, (x, y) => {
      const sum = add8(bcd(x), bcd(y), 0);
      const r = daa(sum.value, sum.f);
      expect(r.value).toBe(bcd((x + y) % 100));
      expect((r.f & FLAG_C) !== 0).toBe(x + y >= 100);
      expect((r.f & FLAG_Z) !== 0).toBe((x + y) % 100 === 0);
      expect(r.f & FLAG_H).toBe(0);
    }));
  });

  it('corrects every BCD subtraction', () => {
    fc.assert(fc.property(decimal, decimal, (x, y) => {
      const diff = sub8(bcd(x), bcd(y), 0);
      const r = daa(diff.value, diff.f);
      expect(r.value).toBe(bcd((x - y + 100) % 100));
      expect((r.f & FLAG_C) !== 0).toBe(x < y);
      expect((r.f & FLAG_N) !== 0).toBe(true);
    }));
  });

  it('0x9A with no flags becomes 0x00 with carry', () => {
    expect(daa(0x9A, 0)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_C });
  });
});

describe('flag ops, shifts and BIT', () => {
  it('CPL, SCF and CCF', () => {
    expect(cpl(0x35, FLAG_Z | FLAG_C)).toEqual({ value: 0xCA, f: FLAG_Z | FLAG_N | FLAG_H | FLAG_C });
    expect(scf(FLAG_Z | FLAG_N | FLAG_H)).toBe(FLAG_Z | FLAG_C);
    expect(ccf(FLAG_C)).toBe(0);
    expect(ccf(FLAG_Z | FLAG_H)).toBe(FLAG_Z | FLAG_C);
  });

  it('CB shifts set C from the bit shifted out', () => {
    expect(shift('rlc', 0x80, 0)).toEqual({ value: 0x01, f: FLAG_C });
    expect(shift('rl', 0x80, 0)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_C });
    expect(shift('rr', 0x01, FLAG_C)).toEqual({ value: 0x80, f: FLAG_C });
    expect(shift('sra', 0x81, 0)).toEqual({ value: 0xC0, f: FLAG_C });
    expect(shift('srl', 0x01, 0)).toEqual({ value: 0x00, f: FLAG_Z | FLAG_C });
    expect(shift('swap', 0xF0, FLAG_C)).toEqual({ value: 0x0F, f: 0 });
  });

  it('accumulator rotates always clear Z', () => {
    expect(rotateA('rl', 0x80, 0)).toEqual({ value: 0x00, f: FLAG_C });
    expect(rotateA('rrc', 0x00, FLAG_Z)).toEqual({ value: 0x00, f: 0 });
  });

  it('BIT sets Z for a clear bit and keeps C', () => {
    expect(bit(7, 0x7F, FLAG_C)).toBe(FLAG_Z | FLAG_H | FLAG_C);
    expect(bit(0, 0x01, 0)).toBe(FLAG_H);
  });
});
