import fs from 'node:fs';
import path from 'node:path';
import { DMGSystem } from '@core/system/system';
import { parseCartridge } from '@core/cart/header';
import { runHeadless, type RunResult } from '@core/harness/headless';
import { doctorTracer } from '@core/debug/trace';
import { CartridgeError, EmulatorError } from '@core/errors';
import { createLogger } from '@utils/log';
import { parseArgs, UsageError, USAGE, type CliOptions } from './args';
import { encodePng } from './png';

const log = createLogger('dmg');

export const EXIT = {
  pass: 0,
  fail: 1,
  usage: 2,
  timeout: 3,
  fatal: 4,
} as const;

export interface LineSink {
  write(line: string): void;
  close(): void;
}

// Everything the CLI touches outside the core, so tests can run it in memory
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(file: string): Uint8Array;
  writeFile(file: string, data: Uint8Array): void;
  openLog(file: string): LineSink;
}

export const nodeIO: CliIO = {
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); },
  readFile: (file) => new Uint8Array(fs.readFileSync(file)),
  writeFile: (file, data) => {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    fs.writeFileSync(file, data);
  },
  openLog: (file) => {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    const fd = fs.openSync(file, 'w');
    return {
      write: (line) => { fs.writeSync(fd, line + '\n'); },
      close: () => { fs.closeSync(fd); },
    };
  },
};

const verdictExit = (reason: RunResult['reason']): number => {
  switch (reason) {
    case 'pass': return EXIT.pass;
    case 'fail': return EXIT.fail;
    case 'timeout': return EXIT.timeout;
    default: return EXIT.fatal;
  }
};

function writeSnapshot(io: CliIO, file: string, rgba: Uint8Array): void {
  io.writeFile(file, encodePng(rgba));
  log.info(`wrote ${file}`);
}

function runTestMode(opts: CliOptions, rom: Uint8Array, io: CliIO, doctor: LineSink | null): number {
  const res = runHeadless(rom, {
    maxCycles: opts.maxCycles,
    serialEcho: opts.serial ? (ch) => io.stdout(ch) : undefined,
    doctor: doctor ? (line) => doctor.write(line) : undefined,
  });
  if (opts.serial && res.serial.length > 0 && !res.serial.endsWith('\n')) io.stdout('\n');
  if (opts.snapshot) writeSnapshot(io, opts.snapshot, res.frame);
  const detail = res.message ? `: ${res.message}` : '';
  io.stderr(`${res.reason.toUpperCase()} after ${res.cycles} cycles, ${res.frames} frames${detail}\n`);
  return verdictExit(res.reason);
}

function runFrameMode(opts: CliOptions, rom: Uint8Array, io: CliIO, doctor: LineSink | null): number {
  const sys = new DMGSystem(parseCartridge(rom), { doctor: doctor !== null });
  if (doctor) sys.setTrace(doctorTracer((line) => doctor.write(line)));
  if (opts.serial) sys.onSerial((byte) => io.stdout(String.fromCharCode(byte)));
  try {
    for (let i = 0; i < opts.frames; i++) sys.runFrame();
  } catch (e) {
    if (e instanceof EmulatorError) {
      io.stderr(`emulation stopped: ${e.message}\n`);
      return EXIT.fatal;
    }
    throw e;
  }
  if (opts.snapshot) writeSnapshot(io, opts.snapshot, sys.ppu.frameBuffer);
  log.info(`ran ${opts.frames} frames, ${sys.cycles} cycles`);
  return EXIT.pass;
}

export function runCli(argv: readonly string[], io: CliIO = nodeIO, env: NodeJS.ProcessEnv = process.env): number {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv, env);
  } catch (e) {
    if (e instanceof UsageError) {
      io.stderr(`${e.message}\n${USAGE}\n`);
      return EXIT.usage;
    }
    throw e;
  }

  let rom: Uint8Array;
  try {
    rom = io.readFile(opts.rom);
    // Validate before anything runs so load problems map to the usage/load exit code
    parseCartridge(rom);
  } catch (e) {
    const msg = e instanceof CartridgeError ? e.message : `cannot read ${opts.rom}: ${e instanceof Error ? e.message : String(e)}`;
    io.stderr(`${msg}\n`);
    return EXIT.usage;
  }

  const doctor = opts.doctor ? io.openLog(opts.doctor) : null;
  try {
    return opts.headless ? runTestMode(opts, rom, io, doctor) : runFrameMode(opts, rom, io, doctor);
  } finally {
    if (doctor) doctor.close();
  }
}
