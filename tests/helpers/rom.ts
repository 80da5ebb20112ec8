import { headerChecksum } from '@core/cart/header';

export interface RomOptions {
  title?: string;
  type?: number;
  ramSizeCode?: number;
  badChecksum?: boolean;
}

export const CODE_START = 0x0150;

/**
 * 32 KiB image with a valid header: entry point `NOP; JP $0150`, `code` at $0150.
 */
export function buildRom(code: number[], opts: RomOptions = {}): Uint8Array {
  const rom = new Uint8Array(0x8000);
  rom.set([0x00, 0xC3, CODE_START & 0xFF, CODE_START >> 8], 0x0100);
  const title = opts.title ?? 'TESTROM';
  for (let i = 0; i < Math.min(title.length, 15); i++) rom[0x0134 + i] = title.charCodeAt(i);
  rom[0x0147] = opts.type ?? 0x00;
  rom[0x0149] = opts.ramSizeCode ?? 0x00;
  rom.set(code, CODE_START);
  const sum = headerChecksum(rom);
  rom[0x014D] = opts.badChecksum ? (sum + 1) & 0xFF : sum;
  return rom;
}

// Writes `text` to SB one byte at a time, then spins
export function serialPrinter(text: string): number[] {
  const msg = [...text].map((c) => c.charCodeAt(0));
  const msgAddr = CODE_START + 13;
  return [
    0x21, msgAddr & 0xFF, msgAddr >> 8, // LD HL,msg
    0x2A, //                               loop: LD A,(HL+)
    0xB7, //                               OR A
    0x28, 0x04, //                         JR Z,done
    0xE0, 0x01, //                         LDH ($FF01),A
    0x18, 0xF8, //                         JR loop
    0x18, 0xFE, //                         done: JR done
    ...msg, 0x00,
  ];
}
