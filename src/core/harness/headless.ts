import { DMGSystem } from '@core/system/system';
import { parseCartridge } from '@core/cart/header';
import { EmulatorError } from '@core/errors';
import { doctorTracer } from '@core/debug/trace';
import { crc32 } from '@utils/crc32';
import { createLogger } from '@utils/log';

const log = createLogger('harness');

// About 28.6 seconds of emulated time
export const DEFAULT_MAX_CYCLES = 120_000_000;

export const PASS_MARKER = 'Passed';
export const FAIL_MARKER = 'Failed';

export interface HeadlessOptions {
  maxCycles?: number;
  // Receives serial output as it is produced, one character per call
  serialEcho?: (text: string) => void;
  // Receives one doctor log line per instruction; pins LY reads
  doctor?: (line: string) => void;
}

export interface RunResult {
  cycles: number;
  reason: 'pass' | 'fail' | 'timeout' | 'error';
  serial: string;
  frames: number;
  // RGBA framebuffer when the run ended, and its CRC32
  frame: Uint8Array;
  frameCrc: number;
  message?: string;
}

/**
 * Run a test cartridge until its serial output reports a verdict. Cartridge
 * errors propagate; errors raised while running end the run with reason 'error'.
 */
export function runHeadless(romBytes: Uint8Array, opts: HeadlessOptions = {}): RunResult {
  const maxCycles = opts.maxCycles ?? DEFAULT_MAX_CYCLES;
  const sys = new DMGSystem(parseCartridge(romBytes), { doctor: opts.doctor !== undefined });
  if (opts.doctor) sys.setTrace(doctorTracer(opts.doctor));

  let serial = '';
  const outcome: { verdict: 'pass' | 'fail' | null } = { verdict: null };
  sys.onSerial((byte) => {
    const ch = String.fromCharCode(byte);
    serial += ch;
    if (opts.serialEcho) opts.serialEcho(ch);
    if (outcome.verdict === null) {
      if (serial.includes(PASS_MARKER)) outcome.verdict = 'pass';
      else if (serial.includes(FAIL_MARKER)) outcome.verdict = 'fail';
    }
  });


  const result = (reason: RunResult['reason'], message?: string): RunResult => {
    const frame = sys.ppu.frameBuffer.slice();
    const r: RunResult = { cycles: sys.cycles, reason, serial, frames: sys.ppu.frame, frame, frameCrc: crc32(frame) };
    if (message !== undefined) r.message = message;
    return r;
  };

  try {
    while (sys.cycles < maxCycles) {
      sys.stepInstruction();
      const { verdict } = outcome;
      if (verdict !== null) {
        log.info(`${verdict} after ${sys.cycles} cycles`);
        return result(verdict);
      }
    }
  } catch (e) {
    if (e instanceof EmulatorError) {
      log.error(e.message);
      return result('error', e.message);
    }
    throw e;
  }
  log.warn(`timeout after ${sys.cycles} cycles`);
  return result('timeout', `no verdict within ${maxCycles} cycles`);
}
