import type { Byte } from '@core/cpu/types';
import { Interrupt, InterruptController } from '@core/interrupts/interrupts';
import { createLogger, envFlag, hex2 } from '@utils/log';

const log = createLogger('serial');

// 8 bits at 8192 Hz on the internal clock
export const SERIAL_TRANSFER_CYCLES = 8 * 512;

export type SerialListener = (byte: Byte) => void;

/**
 * SB ($FF01) / SC ($FF02). Every SB write is reported to listeners; an internal-clock
 * transfer started through SC completes after SERIAL_TRANSFER_CYCLES with no link
 * partner attached, so $FF is shifted in.
 */
export class Serial {
  private sb = 0;
  private sc = 0;
  private remaining = 0;
  private listeners: SerialListener[] = [];
  private readonly trace = envFlag('TRACE_SERIAL');

  constructor(private readonly interrupts: InterruptController) {}

  onByte(listener: SerialListener): () => void {
    this.listeners.push(listener);
    return () => { this.listeners = this.listeners.filter((l) => l !== listener); };
  }

  get transferring(): boolean { return this.remaining > 0; }

  tick(cycles: number): void {
    if (this.remaining <= 0) return;
    this.remaining -= cycles;
    if (this.remaining <= 0) {
      this.remaining = 0;
      this.sb = 0xFF;
      this.sc &= 0x7F;
      this.interrupts.request(Interrupt.Serial);
    }
  }

  read(addr: number): Byte {
    if (addr === 0xFF01) return this.sb;
    if (addr === 0xFF02) return 0x7E | this.sc;
    return 0xFF;
  }

  write(addr: number, value: Byte): void {
    value &= 0xFF;
    if (addr === 0xFF01) {
      this.sb = value;
      if (this.trace) log.info(`SB <= $${hex2(value)} '${String.fromCharCode(value)}'`);
      for (const l of this.listeners) l(value);
      return;
    }
    if (addr === 0xFF02) {
      this.sc = value & 0x81;
      // External clock never completes without a partner
      if ((value & 0x81) === 0x81) this.remaining = SERIAL_TRANSFER_CYCLES;
      else this.remaining = 0;
    }
  }
}
