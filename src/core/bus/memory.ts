import type { Byte, Word } from '@core/cpu/types';
import type { Cartridge } from '@core/cart/cartridge';
import type { InterruptController } from '@core/interrupts/interrupts';
import type { Joypad } from '@core/io/joypad';
import type { Serial } from '@core/io/serial';
import type { PPU } from '@core/ppu/ppu';
import type { Timer } from '@core/timer/timer';

export interface BusDevice {
  read(addr: Word): Byte;
  write(addr: Word, value: Byte): void;
}

export interface BusDevices {
  cart: Cartridge;
  ppu: PPU;
  timer: Timer;
  interrupts: InterruptController;
  serial: Serial;
  joypad: Joypad;
}

// Region boundaries
export const VRAM_START = 0x8000;
export const EXT_RAM_START = 0xA000;
export const WRAM_START = 0xC000;
export const ECHO_START = 0xE000;
export const OAM_START = 0xFE00;
export const UNUSABLE_START = 0xFEA0;
export const IO_START = 0xFF00;
export const HRAM_START = 0xFF80;
export const IE_ADDR = 0xFFFF;
export const ECHO_OFFSET = 0x2000;

// Value returned for unmapped and write-only locations
export const OPEN_BUS = 0xFF;

/**
 * The CPU's 64 KiB view. Owns WRAM and HRAM; everything else is dispatched to the
 * component that owns it.
 */
export class MemoryBus implements BusDevice {
  private wram = new Uint8Array(0x2000);
  private hram = new Uint8Array(0x7F);

  constructor(private readonly dev: BusDevices) {}

  read(addr: Word): Byte {
    addr &= 0xFFFF;
    if (addr < VRAM_START) return this.dev.cart.readRom(addr);
    if (addr < EXT_RAM_START) return this.dev.ppu.cpuReadVram(addr);
    if (addr < WRAM_START) return this.dev.cart.readRam(addr);
    if (addr < ECHO_START) return this.wram[addr - WRAM_START];
    if (addr < OAM_START) return this.wram[addr - ECHO_OFFSET - WRAM_START];
    if (addr < UNUSABLE_START) return this.dev.ppu.cpuReadOam(addr);
    if (addr < IO_START) return OPEN_BUS;
    if (addr < HRAM_START) return this.readIO(addr);
    if (addr < IE_ADDR) return this.hram[addr - HRAM_START];
    return this.dev.interrupts.readIE();
  }

  write(addr: Word, value: Byte): void {
    addr &= 0xFFFF; value &= 0xFF;
    if (addr < VRAM_START) { this.dev.cart.writeRom(addr, value); return; }
    if (addr < EXT_RAM_START) { this.dev.ppu.cpuWriteVram(addr, value); return; }
    if (addr < WRAM_START) { this.dev.cart.writeRam(addr, value); return; }
    if (addr < ECHO_START) { this.wram[addr - WRAM_START] = value; return; }
    if (addr < OAM_START) { this.wram[addr - ECHO_OFFSET - WRAM_START] = value; return; }
    if (addr < UNUSABLE_START) { this.dev.ppu.cpuWriteOam(addr, value); return; }
    if (addr < IO_START) return;
    if (addr < HRAM_START) { this.writeIO(addr, value); return; }
    if (addr < IE_ADDR) { this.hram[addr - HRAM_START] = value; return; }
    this.dev.interrupts.writeIE(value);
  }

  // DMA reads bypass the PPU lock; sources at $E000+ see WRAM like the echo region
  private dmaRead = (addr: Word): Byte => {
    if (addr >= ECHO_START) return this.wram[(addr - ECHO_OFFSET - WRAM_START) & 0x1FFF];
    if (addr >= VRAM_START && addr < EXT_RAM_START) return this.dev.ppu.vram[addr - VRAM_START];
    return this.read(addr);
  };

  private readIO(addr: Word): Byte {
    switch (addr) {
      case 0xFF00: return this.dev.joypad.read();
      case 0xFF01:
      case 0xFF02: return this.dev.serial.read(addr);
      case 0xFF04:
      case 0xFF05:
      case 0xFF06:
      case 0xFF07: return this.dev.timer.read(addr);
      case 0xFF0F: return this.dev.interrupts.readIF();
      default:
        if (addr >= 0xFF40 && addr <= 0xFF4B) return this.dev.ppu.readRegister(addr);
        // Sound and unassigned registers
        return OPEN_BUS;
    }
  }

  private writeIO(addr: Word, value: Byte): void {
    switch (addr) {
      case 0xFF00: this.dev.joypad.write(value); break;
      case 0xFF01:
      case 0xFF02: this.dev.serial.write(addr, value); break;
      case 0xFF04:
      case 0xFF05:
      case 0xFF06:
      case 0xFF07: this.dev.timer.write(addr, value); break;
      case 0xFF0F: this.dev.interrupts.writeIF(value); break;
      case 0xFF46: this.dev.ppu.oamDMA(this.dmaRead, value); break;
      default:
        if (addr >= 0xFF40 && addr <= 0xFF4B) this.dev.ppu.writeRegister(addr, value);
        break;
    }
  }
}
