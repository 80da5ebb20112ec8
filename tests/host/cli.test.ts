import { describe, it, expect } from 'vitest';
import { EXIT, runCli, type CliIO } from '@host/cli/run';
import { decodePng } from '@host/cli/png';
import { buildRom, serialPrinter } from '../helpers/rom';

const SPIN = [0x18, 0xFE];

interface Captured {
  stdout: string;
  stderr: string;
  written: Map<string, Uint8Array>;
  logs: Map<string, string[]>;
  closed: string[];
}

function memoryIO(files: Record<string, Uint8Array>): { io: CliIO; out: Captured } {
  const out: Captured = {
    stdout: '',
    stderr: '',
    written: new Map<string, Uint8Array>(),
    logs: new Map<string, string[]>(),
    closed: [],
  };
  const io: CliIO = {
    stdout: (text) => { out.stdout += text; },
    stderr: (text) => { out.stderr += text; },
    readFile: (file) => {
      const data = files[file];
      if (!data) throw new Error(`ENOENT: no such file '${file}'`);
      return data;
    },
    writeFile: (file, data) => { out.written.set(file, data); },
    openLog: (file) => {
      const lines: string[] = [];
      out.logs.set(file, lines);
      return { write: (line) => { lines.push(line); }, close: () => { out.closed.push(file); } };
    },
  };
  return { io, out };
}

describe('runCli --headless', () => {
  it('exits 0 on Passed and echoes serial with --serial', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom(serialPrinter('Passed\n')) });
    expect(runCli(['rom.gb', '--headless', '--serial'], io, {})).toBe(EXIT.pass);
    expect(out.stdout).toBe('Passed\n');
    expect(out.stderr).toMatch(/^PASS after \d+ cycles, 0 frames\n$/);
  });

  it('keeps serial quiet without --serial', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom(serialPrinter('Passed\n')) });
    runCli(['rom.gb', '--headless'], io, {});
    expect(out.stdout).toBe('');
  });

  it('exits 1 on Failed', () => {
    const { io } = memoryIO({ 'rom.gb': buildRom(serialPrinter('Failed\n')) });
    expect(runCli(['rom.gb', '--headless'], io, {})).toBe(EXIT.fail);
  });

  it('exits 3 when the cycle budget runs out', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom(SPIN) });
    expect(runCli(['rom.gb', '--headless'], io, { DMG_MAX_CYCLES: '500' })).toBe(EXIT.timeout);
    expect(out.stderr).toMatch(/^TIMEOUT after \d+ cycles, 0 frames: no verdict within 500 cycles\n$/);
  });

  it('exits 4 on an illegal opcode', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom([0xD3]) });
    expect(runCli(['rom.gb', '--headless'], io, {})).toBe(EXIT.fatal);
    expect(out.stderr).toBe('ERROR after 20 cycles, 0 frames: Illegal opcode $D3 at $0150\n');
  });

  it('writes a doctor log and closes it', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom(SPIN) });
    runCli(['rom.gb', '--headless', '--max-cycles', '100', '--doctor', 'trace.log'], io, {});
    const lines = out.logs.get('trace.log') ?? [];
    expect(lines[0]).toBe('A:01 F:B0 B:00 C:13 D:00 E:D8 H:01 L:4D SP:FFFE PC:0100 PCMEM:00,C3,50,01');
    expect(out.closed).toEqual(['trace.log']);
  });

  it('writes a snapshot of the final frame', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom(SPIN) });
    runCli(['rom.gb', '--headless', '--max-cycles', '1000', '--snapshot', 'shot.png'], io, {});
    const png = out.written.get('shot.png');
    expect(png).toBeDefined();
    if (png) expect([decodePng(png).width, decodePng(png).height]).toEqual([160, 144]);
  });
});

describe('runCli frame mode', () => {
  it('runs the requested frames and snapshots the last one', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom(SPIN) });
    expect(runCli(['rom.gb', '--frames', '2', '--snapshot', 'out/frame.png'], io, {})).toBe(EXIT.pass);
    const png = out.written.get('out/frame.png');
    if (!png) throw new Error('snapshot not written');
    const img = decodePng(png);
    expect(Array.from(img.data.subarray(0, 4))).toEqual([0xE0, 0xF8, 0xD0, 0xFF]);
  });

  it('exits 4 when emulation stops', () => {
    const { io, out } = memoryIO({ 'rom.gb': buildRom([0xD3]) });
    expect(runCli(['rom.gb', '--frames', '1'], io, {})).toBe(EXIT.fatal);
    expect(out.stderr).toBe('emulation stopped: Illegal opcode $D3 at $0150\n');
  });
});

describe('runCli errors', () => {
  it('exits 2 with usage on bad arguments', () => {
    const { io, out } = memoryIO({});
    expect(runCli(['--fast'], io, {})).toBe(EXIT.usage);
    expect(out.stderr.startsWith('unknown option --fast\nUsage:\n')).toBe(true);
  });

  it('exits 2 when the ROM cannot be read', () => {
    const { io, out } = memoryIO({});
    expect(runCli(['missing.gb'], io, {})).toBe(EXIT.usage);
    expect(out.stderr).toBe("cannot read missing.gb: ENOENT: no such file 'missing.gb'\n");
  });

  it('exits 2 when the ROM is too short', () => {
    const { io, out } = memoryIO({ 'tiny.gb': new Uint8Array(10) });
    expect(runCli(['tiny.gb'], io, {})).toBe(EXIT.usage);
    expect(out.stderr).toBe('Cartridge image too short: 10 bytes, header needs 336\n');
  });
});
