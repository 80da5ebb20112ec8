import type { Byte, Word } from '@core/cpu/types';
import { createLogger, hex2 } from '@utils/log';
import { ROM_ONLY_TYPES, type CartImage } from './header';

const log = createLogger('cart');

// External RAM window is 8 KiB; larger declared sizes would need banking
const EXT_RAM_WINDOW = 0x2000;

/**
 * Fixed-window cartridge: ROM at $0000-$7FFF, optional RAM at $A000-$BFFF.
 * Bank controller writes to the ROM range are ignored.
 */
export class Cartridge {
  private ram: Uint8Array | null;

  constructor(public readonly image: CartImage) {
    const { header } = image;
    if (!ROM_ONLY_TYPES.has(header.type)) {
      log.warn(`cartridge type $${hex2(header.type)} needs a bank controller; only the first 32 KiB is mapped`);
    }
    if (!header.checksumValid) {
      log.warn(`header checksum mismatch: stored $${hex2(header.headerChecksum)}, computed $${hex2(header.computedChecksum)}`);
    }
    this.ram = header.ramSize > 0 ? new Uint8Array(Math.min(header.ramSize, EXT_RAM_WINDOW)) : null;
    log.info(`loaded "${header.title}" type=$${hex2(header.type)} ram=${header.ramSize}`);
  }

  get hasRam(): boolean { return this.ram !== null; }

  readRom(addr: Word): Byte {
    return this.image.rom[addr & 0x7FFF];
  }

  writeRom(addr: Word, value: Byte): void {
    log.trace(`ignored write $${hex2(value)} to ROM $${addr.toString(16)}`);
  }

  readRam(addr: Word): Byte {
    if (!this.ram) return 0xFF;
    return this.ram[(addr - 0xA000) % this.ram.length];
  }

  writeRam(addr: Word, value: Byte): void {
    if (!this.ram) return;
    this.ram[(addr - 0xA000) % this.ram.length] = value & 0xFF;
  }
}
