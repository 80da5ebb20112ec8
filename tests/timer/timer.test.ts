import { describe, it, expect } from 'vitest';
import { Timer, POST_BOOT_COUNTER } from '@core/timer/timer';
import { InterruptController } from '@core/interrupts/interrupts';

const timerIF = (ic: InterruptController): number => ic.readIF() & 0x04;

function setup(tac?: number) {
  const interrupts = new InterruptController();
  const timer = new Timer(interrupts);
  timer.reset(0);
  if (tac !== undefined) timer.write(0xFF07, tac);
  return { timer, interrupts };
}

describe('DIV', () => {
  it('is the upper byte of the system counter', () => {
    const { timer } = setup();
    timer.tick(252);
    expect(timer.read(0xFF04)).toBe(0x00);
    timer.tick(4);
    expect(timer.read(0xFF04)).toBe(0x01);
  });

  it('carries sub-M-cycle remainders across ticks', () => {
    const { timer } = setup();
    timer.tick(2);
    timer.tick(2);
    expect(timer.systemCounter).toBe(4);
  });

  it('reads $AB after boot', () => {
    const { timer } = setup();
    timer.reset(POST_BOOT_COUNTER);
    expect(timer.read(0xFF04)).toBe(0xAB);
  });

  it('a write clears the whole counter', () => {
    const { timer } = setup();
    timer.tick(1000);
    timer.write(0xFF04, 0x55);
    expect(timer.systemCounter).toBe(0);
  });
});

describe('TIMA', () => {
  it('increments on the falling edge of the selected bit', () => {
    const { timer } = setup(0x05); // enabled, bit 3: every 16 cycles
    timer.tick(12);
    expect(timer.read(0xFF05)).toBe(0);
    timer.tick(4);
    expect(timer.read(0xFF05)).toBe(1);
    timer.tick(16 * 9);
    expect(timer.read(0xFF05)).toBe(10);
  });

  it('does not count while TAC bit 2 is clear', () => {
    const { timer } = setup(0x01);
    timer.tick(1024);
    expect(timer.read(0xFF05)).toBe(0);
  });

  it('reads $00 for one M-cycle after overflow, then reloads TMA and interrupts', () => {
    const { timer, interrupts } = setup(0x05);
    timer.write(0xFF06, 0xAB);
    timer.write(0xFF05, 0xFF);
    timer.tick(16);
    expect(timer.read(0xFF05)).toBe(0x00);
    expect(timerIF(interrupts)).toBe(0);
    timer.tick(4);
    expect(timer.read(0xFF05)).toBe(0xAB);
    expect(timerIF(interrupts)).toBe(0x04);
  });

  it('a TIMA write during the reload window cancels the reload', () => {
    const { timer, interrupts } = setup(0x05);
    timer.write(0xFF06, 0xAB);
    timer.write(0xFF05, 0xFF);
    timer.tick(16);
    timer.write(0xFF05, 0x10);
    timer.tick(4);
    expect(timer.read(0xFF05)).toBe(0x10);
    expect(timerIF(interrupts)).toBe(0);
  });

  it('a DIV write while the selected bit is high counts as a falling edge', () => {
    const { timer } = setup(0x05);
    timer.tick(8);
    expect(timer.read(0xFF05)).toBe(0);
    timer.write(0xFF04, 0);
    expect(timer.read(0xFF05)).toBe(1);
  });

  it('disabling the timer while the selected bit is high counts as a falling edge', () => {
    const { timer } = setup(0x05);
    timer.tick(8);
    timer.write(0xFF07, 0x01);
    expect(timer.read(0xFF05)).toBe(1);
  });

  it('TAC reads back the unused bits as 1', () => {
    const { timer } = setup(0x05);
    expect(timer.read(0xFF07)).toBe(0xFD);
  });
});
