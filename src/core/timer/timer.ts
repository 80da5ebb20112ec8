import type { Byte } from '@core/cpu/types';
import { Interrupt, InterruptController } from '@core/interrupts/interrupts';

// System-counter bit whose falling edge clocks TIMA, indexed by TAC & 3
const TAC_BITS = [9, 3, 5, 7] as const;

// Counter value the boot ROM leaves behind (DIV reads $AB)
export const POST_BOOT_COUNTER = 0xABCC;

/**
 * DIV/TIMA/TMA/TAC. The 16-bit system counter advances every T-cycle; work is done
 * in 4-cycle (M-cycle) steps since every CPU cost is a multiple of 4.
 */
export class Timer {
  private counter = 0;
  private tima = 0;
  private tma = 0;
  private tac = 0;
  // M-cycles left until an overflowed TIMA reloads from TMA (0 = none)
  private reloadDelay = 0;
  private residue = 0;

  constructor(private readonly interrupts: InterruptController) {}

  reset(counter = 0): void {
    this.counter = counter & 0xFFFF;
    this.tima = 0; this.tma = 0; this.tac = 0;
    this.reloadDelay = 0;
    this.residue = 0;
  }

  get systemCounter(): number { return this.counter; }

  tick(cycles: number): void {
    let n = cycles + this.residue;
    while (n >= 4) {
      n -= 4;
      this.stepMCycle();
    }
    this.residue = n;
  }

  private stepMCycle(): void {
    if (this.reloadDelay > 0) {
      this.reloadDelay--;
      if (this.reloadDelay === 0) {
        this.tima = this.tma;
        this.interrupts.request(Interrupt.Timer);
      }
    }
    this.setCounter((this.counter + 4) & 0xFFFF);
  }

  // Any change of the counter or TAC can produce a falling edge on the timer input
  private input(counter: number, tac: number): boolean {
    if ((tac & 0x04) === 0) return false;
    return ((counter >> TAC_BITS[tac & 3]) & 1) !== 0;
  }

  private setCounter(next: number): void {
    const before = this.input(this.counter, this.tac);
    this.counter = next;
    if (before && !this.input(next, this.tac)) this.incrementTima();
  }

  private incrementTima(): void {
    if (this.tima === 0xFF) {
      // Reads $00 for one M-cycle, then TMA is loaded and the interrupt raised
      this.tima = 0x00;
      this.reloadDelay = 1;
    } else {
      this.tima = (this.tima + 1) & 0xFF;
    }
  }

  read(addr: number): Byte {
    switch (addr) {
      case 0xFF04: return (this.counter >> 8) & 0xFF;
      case 0xFF05: return this.tima;
      case 0xFF06: return this.tma;
      case 0xFF07: return 0xF8 | this.tac;
      default: return 0xFF;
    }
  }

  write(addr: number, value: Byte): void {
    value &= 0xFF;
    switch (addr) {
      case 0xFF04:
        this.setCounter(0);
        break;
      case 0xFF05:
        // Writing during the reload window cancels the pending reload
        this.reloadDelay = 0;
        this.tima = value;
        break;
      case 0xFF06:
        this.tma = value;
        break;
      case 0xFF07: {
        const before = this.input(this.counter, this.tac);
        this.tac = value & 0x07;
        if (before && !this.input(this.counter, this.tac)) this.incrementTima();
        break;
      }
      default:
        break;
    }
  }
}
