import type { Byte } from '@core/cpu/types';

// Four fixed shades, lightest first, as RGBA
export const SHADES: ReadonlyArray<readonly [number, number, number, number]> = [
  [0xE0, 0xF8, 0xD0, 0xFF],
  [0x88, 0xC0, 0x70, 0xFF],
  [0x34, 0x68, 0x56, 0xFF],
  [0x08, 0x18, 0x20, 0xFF],
];

// BGP/OBP0/OBP1: two bits per color id, id 0 in bits 1..0
export const shadeOf = (palette: Byte, colorId: number): number => (palette >> ((colorId & 3) * 2)) & 3;
