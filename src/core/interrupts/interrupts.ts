import type { Byte, Word } from '@core/cpu/types';

export enum Interrupt {
  VBlank = 0,
  Stat = 1,
  Timer = 2,
  Serial = 3,
  Joypad = 4,
}

// Service order is bit order: lowest set bit wins
export const INTERRUPT_VECTORS: Readonly<Record<Interrupt, Word>> = {
  [Interrupt.VBlank]: 0x0040,
  [Interrupt.Stat]: 0x0048,
  [Interrupt.Timer]: 0x0050,
  [Interrupt.Serial]: 0x0058,
  [Interrupt.Joypad]: 0x0060,
};

const MASK = 0x1F;

/**
 * Request (IF, $FF0F) and enable (IE, $FFFF) registers. Passive: peripherals call
 * request(), only the CPU acknowledges. IME is owned by the CPU.
 */
export class InterruptController {
  private flags = 0;
  private enabled = 0;

  request(source: Interrupt): void {
    this.flags |= 1 << source;
  }

  acknowledge(source: Interrupt): void {
    this.flags &= ~(1 << source) & MASK;
  }

  // Requested and enabled, regardless of IME
  pending(): Byte {
    return this.flags & this.enabled & MASK;
  }

  highestPending(): Interrupt | null {
    const p = this.pending();
    if (p === 0) return null;
    for (let bit = Interrupt.VBlank; bit <= Interrupt.Joypad; bit++) {
      if (p & (1 << bit)) return bit;
    }
    return null;
  }

  readIF(): Byte { return 0xE0 | this.flags; }
  writeIF(value: Byte): void { this.flags = value & MASK; }

  // IE keeps all 8 bits as written; only the low 5 take part in dispatch
  readIE(): Byte { return this.enabled; }
  writeIE(value: Byte): void { this.enabled = value & 0xFF; }
}
