export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface CPUState {
  a: Byte;
  f: Byte; // ZNHC---- (low nibble always 0)
  b: Byte;
  c: Byte;
  d: Byte;
  e: Byte;
  h: Byte;
  l: Byte;
  sp: Word;
  pc: Word;
  cycles: number; // T-cycles since power-on
}

// Flag bits in F
export const FLAG_Z = 0x80;
export const FLAG_N = 0x40;
export const FLAG_H = 0x20;
export const FLAG_C = 0x10;

// Register state the boot ROM leaves behind on a DMG
export const postBootState = (): CPUState => ({
  a: 0x01, f: 0xB0, b: 0x00, c: 0x13, d: 0x00, e: 0xD8, h: 0x01, l: 0x4D,
  sp: 0xFFFE, pc: 0x0100, cycles: 0,
});
