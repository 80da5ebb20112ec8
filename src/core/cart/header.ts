import type { Byte } from '@core/cpu/types';
import { CartridgeError } from '@core/errors';

export const ROM_WINDOW_SIZE = 0x8000;
export const HEADER_END = 0x150;

// Cartridge types that need no bank controller: ROM only, ROM+RAM, ROM+RAM+battery
export const ROM_ONLY_TYPES: ReadonlySet<number> = new Set([0x00, 0x08, 0x09]);

// RAM size code ($0149) -> bytes
const RAM_SIZES: Readonly<Record<number, number>> = { 0: 0, 1: 0x800, 2: 0x2000, 3: 0x8000, 4: 0x20000, 5: 0x10000 };

export interface CartHeader {
  title: string;
  type: Byte;
  romSizeCode: Byte;
  ramSizeCode: Byte;
  ramSize: number;
  headerChecksum: Byte;
  computedChecksum: Byte;
  checksumValid: boolean;
}

export interface CartImage {
  rom: Uint8Array; // always ROM_WINDOW_SIZE bytes, zero padded
  header: CartHeader;
}

// x = x - rom[i] - 1 over $0134..$014C
export function headerChecksum(rom: Uint8Array): Byte {
  let x = 0;
  for (let i = 0x0134; i <= 0x014C; i++) x = (x - rom[i] - 1) & 0xFF;
  return x;
}

function readTitle(rom: Uint8Array): string {
  let s = '';
  for (let i = 0x0134; i <= 0x0143; i++) {
    const c = rom[i];
    if (c === 0) break;
    // $0143 doubles as the color flag on later carts
    if (i === 0x0143 && (c & 0x80) !== 0) break;
    s += String.fromCharCode(c);
  }
  return s.trim();
}

export function parseCartridge(buffer: Uint8Array): CartImage {
  if (buffer.length === 0) throw new CartridgeError('Empty cartridge image');
  if (buffer.length < HEADER_END) {
    throw new CartridgeError(`Cartridge image too short: ${buffer.length} bytes, header needs ${HEADER_END}`);
  }
  if (buffer.length > ROM_WINDOW_SIZE) {
    throw new CartridgeError(`Cartridge image is ${buffer.length} bytes; only ${ROM_WINDOW_SIZE} fit without a bank controller`);
  }
  const rom = new Uint8Array(ROM_WINDOW_SIZE);
  rom.set(buffer);

  const type = rom[0x0147];
  const ramSizeCode = rom[0x0149];
  const computed = headerChecksum(rom);
  let ramSize = RAM_SIZES[ramSizeCode] ?? 0;
  // ROM+RAM carts occasionally declare size 0
  if (ramSize === 0 && (type === 0x08 || type === 0x09)) ramSize = 0x2000;

  return {
    rom,
    header: {
      title: readTitle(rom),
      type,
      romSizeCode: rom[0x0148],
      ramSizeCode,
      ramSize,
      headerChecksum: rom[0x014D],
      computedChecksum: computed,
      checksumValid: computed === rom[0x014D],
    },
  };
}
