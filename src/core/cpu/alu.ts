import { FLAG_C, FLAG_H, FLAG_N, FLAG_Z, type Byte, type Word } from './types';

// Pure arithmetic/logic. Each op takes the current F and returns { value, f }.

export interface AluResult {
  value: number;
  f: Byte;
}

const z = (v: number): number => ((v & 0xFF) === 0 ? FLAG_Z : 0);
const carryIn = (f: Byte): number => ((f & FLAG_C) !== 0 ? 1 : 0);

export function add8(a: Byte, b: Byte, f: Byte, useCarry = false): AluResult {
  const c = useCarry ? carryIn(f) : 0;
  const sum = a + b + c;
  const value = sum & 0xFF;
  return {
    value,
    f: z(value) | (((a & 0x0F) + (b & 0x0F) + c) > 0x0F ? FLAG_H : 0) | (sum > 0xFF ? FLAG_C : 0),
  };
}

export function sub8(a: Byte, b: Byte, f: Byte, useCarry = false): AluResult {
  const c = useCarry ? carryIn(f) : 0;
  const diff = a - b - c;
  const value = diff & 0xFF;
  return {
    value,
    f: z(value) | FLAG_N | (((a & 0x0F) - (b & 0x0F) - c) < 0 ? FLAG_H : 0) | (diff < 0 ? FLAG_C : 0),
  };
}

export const and8 = (a: Byte, b: Byte): AluResult => {
  const value = a & b;
  return { value, f: z(value) | FLAG_H };
};

export const xor8 = (a: Byte, b: Byte): AluResult => {
  const value = (a ^ b) & 0xFF;
  return { value, f: z(value) };
};

export const or8 = (a: Byte, b: Byte): AluResult => {
  const value = (a | b) & 0xFF;
  return { value, f: z(value) };
};

// INC/DEC r leave C alone
export function inc8(v: Byte, f: Byte): AluResult {
  const value = (v + 1) & 0xFF;
  return { value, f: z(value) | ((v & 0x0F) === 0x0F ? FLAG_H : 0) | (f & FLAG_C) };
}

export function dec8(v: Byte, f: Byte): AluResult {
  const value = (v - 1) & 0xFF;
  return { value, f: z(value) | FLAG_N | ((v & 0x0F) === 0 ? FLAG_H : 0) | (f & FLAG_C) };
}

// ADD HL,rr: H from bit 11, C from bit 15, Z untouched
export function add16(hl: Word, rr: Word, f: Byte): AluResult {
  const sum = hl + rr;
  return {
    value: sum & 0xFFFF,
    f: (f & FLAG_Z) | (((hl & 0x0FFF) + (rr & 0x0FFF)) > 0x0FFF ? FLAG_H : 0) | (sum > 0xFFFF ? FLAG_C : 0),
  };
}

// ADD SP,e8 / LD HL,SP+e8: signed offset, flags from the unsigned low-byte add
export function addSpSigned(sp: Word, e8: Byte): AluResult {
  const offset = e8 < 0x80 ? e8 : e8 - 0x100;
  return {
    value: (sp + offset) & 0xFFFF,
    f: (((sp & 0x0F) + (e8 & 0x0F)) > 0x0F ? FLAG_H : 0) | (((sp & 0xFF) + e8) > 0xFF ? FLAG_C : 0),
  };
}

export function daa(a: Byte, f: Byte): AluResult {
  let value = a;
  let carry = (f & FLAG_C) !== 0;
  if ((f & FLAG_N) === 0) {
    if (carry || value > 0x99) { value += 0x60; carry = true; }
    if ((f & FLAG_H) !== 0 || (value & 0x0F) > 0x09) value += 0x06;
  } else {
    if (carry) value -= 0x60;
    if ((f & FLAG_H) !== 0) value -= 0x06;
  }
  value &= 0xFF;
  return { value, f: z(value) | (f & FLAG_N) | (carry ? FLAG_C : 0) };
}

export const cpl = (a: Byte, f: Byte): AluResult => ({ value: (~a) & 0xFF, f: (f & (FLAG_Z | FLAG_C)) | FLAG_N | FLAG_H });
export const scf = (f: Byte): Byte => (f & FLAG_Z) | FLAG_C;
export const ccf = (f: Byte): Byte => (f & FLAG_Z) | ((f & FLAG_C) ^ FLAG_C);

// CB-page shifts/rotates. Z from result, N=H=0, C from the bit shifted out.
export type ShiftOp = 'rlc' | 'rrc' | 'rl' | 'rr' | 'sla' | 'sra' | 'swap' | 'srl';

export function shift(op: ShiftOp, v: Byte, f: Byte): AluResult {
  let value: number;
  let c: number;
  switch (op) {
    case 'rlc': c = v >> 7; value = ((v << 1) | c) & 0xFF; break;
    case 'rrc': c = v & 1; value = ((v >> 1) | (c << 7)) & 0xFF; break;
    case 'rl': c = v >> 7; value = ((v << 1) | carryIn(f)) & 0xFF; break;
    case 'rr': c = v & 1; value = ((v >> 1) | (carryIn(f) << 7)) & 0xFF; break;
    case 'sla': c = v >> 7; value = (v << 1) & 0xFF; break;
    case 'sra': c = v & 1; value = ((v >> 1) | (v & 0x80)) & 0xFF; break;
    case 'swap': c = 0; value = ((v << 4) | (v >> 4)) & 0xFF; break;
    case 'srl': c = v & 1; value = v >> 1; break;
  }
  return { value, f: z(value) | (c ? FLAG_C : 0) };
}

// RLCA/RRCA/RLA/RRA: same as the CB forms but Z is always cleared
export function rotateA(op: 'rlc' | 'rrc' | 'rl' | 'rr', a: Byte, f: Byte): AluResult {
  const r = shift(op, a, f);
  return { value: r.value, f: r.f & FLAG_C };
}

export const bit = (n: number, v: Byte, f: Byte): Byte => (((v >> n) & 1) === 0 ? FLAG_Z : 0) | FLAG_H | (f & FLAG_C);
