import type { Byte } from '@core/cpu/types';
import { Interrupt, InterruptController } from '@core/interrupts/interrupts';

export type Button = 'a' | 'b' | 'select' | 'start' | 'right' | 'left' | 'up' | 'down';

// Group (P15 action / P14 direction) and line bit for each button
const LINES: Readonly<Record<Button, { action: boolean; bit: number }>> = {
  a: { action: true, bit: 0 },
  b: { action: true, bit: 1 },
  select: { action: true, bit: 2 },
  start: { action: true, bit: 3 },
  right: { action: false, bit: 0 },
  left: { action: false, bit: 1 },
  up: { action: false, bit: 2 },
  down: { action: false, bit: 3 },
};

// P1 ($FF00). Everything is active-low: a 0 bit means selected or pressed.
export class Joypad {
  private select = 0x30;
  private action = 0x0F;
  private direction = 0x0F;

  constructor(private readonly interrupts: InterruptController) {}

  read(): Byte {
    let nibble = 0x0F;
    if ((this.select & 0x20) === 0) nibble &= this.action;
    if ((this.select & 0x10) === 0) nibble &= this.direction;
    return 0xC0 | this.select | nibble;
  }

  write(value: Byte): void {
    this.select = value & 0x30;
  }

  press(button: Button): void {
    const before = this.read() & 0x0F;
    const { action, bit } = LINES[button];
    if (action) this.action &= ~(1 << bit) & 0x0F;
    else this.direction &= ~(1 << bit) & 0x0F;
    // High-to-low on any selected line
    const after = this.read() & 0x0F;
    if ((before & ~after) !== 0) this.interrupts.request(Interrupt.Joypad);
  }

  release(button: Button): void {
    const { action, bit } = LINES[button];
    if (action) this.action |= 1 << bit;
    else this.direction |= 1 << bit;
  }

  isPressed(button: Button): boolean {
    const { action, bit } = LINES[button];
    return ((action ? this.action : this.direction) & (1 << bit)) === 0;
  }
}
