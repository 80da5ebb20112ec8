import { describe, it, expect } from 'vitest';
import { DEFAULT_FRAMES, UsageError, parseArgs, parseNum } from '@host/cli/args';
import { DEFAULT_MAX_CYCLES } from '@core/harness/headless';

describe('parseNum', () => {
  it.each([
    ['1000', 1000],
    ['0x10', 16],
    ['0XfF', 255],
    ['120_000_000', 120_000_000],
    [' 42 ', 42],
  ])('parses %s', (raw, expected) => {
    expect(parseNum(raw, 'n')).toBe(expected);
  });

  it.each(['0', '-5', '1.5', 'abc', '0x', ''])('rejects %j', (raw) => {
    expect(() => parseNum(raw, 'n')).toThrow(UsageError);
  });

  it('names the flag in the message', () => {
    expect(() => parseNum('x', 'frames')).toThrow("--frames: expected a positive integer, got 'x'");
  });
});

describe('parseArgs', () => {
  it('applies defaults', () => {
    expect(parseArgs(['game.gb'], {})).toEqual({
      rom: 'game.gb',
      serial: false,
      headless: false,
      maxCycles: DEFAULT_MAX_CYCLES,
      frames: DEFAULT_FRAMES,
      snapshot: null,
      doctor: null,
    });
  });

  it('accepts flags before or after the ROM, with separate or inline values', () => {
    const opts = parseArgs(['--headless', 'test.gb', '--max-cycles=0x100', '--serial', '--snapshot', 'out.png', '--doctor=trace.log'], {});
    expect(opts).toMatchObject({ rom: 'test.gb', headless: true, serial: true, maxCycles: 256, snapshot: 'out.png', doctor: 'trace.log' });
  });

  it('falls back to DMG_MAX_CYCLES', () => {
    expect(parseArgs(['a.gb'], { DMG_MAX_CYCLES: '5000' }).maxCycles).toBe(5000);
    expect(parseArgs(['a.gb'], { DMG_MAX_CYCLES: '' }).maxCycles).toBe(DEFAULT_MAX_CYCLES);
    expect(parseArgs(['a.gb', '--max-cycles', '7'], { DMG_MAX_CYCLES: '5000' }).maxCycles).toBe(7);
  });

  it('rejects a bad DMG_MAX_CYCLES', () => {
    expect(() => parseArgs(['a.gb'], { DMG_MAX_CYCLES: 'lots' })).toThrow(UsageError);
  });

  it.each([
    [[], 'missing ROM path'],
    [['a.gb', 'b.gb'], "unexpected argument 'b.gb'"],
    [['a.gb', '--fast'], 'unknown option --fast'],
    [['a.gb', '--frames'], '--frames needs a value'],
    [['a.gb', '--snapshot='], '--snapshot needs a value'],
    [['a.gb', '--serial=yes'], '--serial takes no value'],
    [['a.gb', '--frames', '0'], "--frames: expected a positive integer, got '0'"],
  ])('rejects %j', (argv, message) => {
    expect(() => parseArgs(argv, {})).toThrow(message);
  });
});
