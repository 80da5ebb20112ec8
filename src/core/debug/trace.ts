import type { CPU, TraceHook } from '@core/cpu/cpu';
import type { DMGSystem } from '@core/system/system';
import { EmulatorError } from '@core/errors';
import { hex2, hex4 } from '@utils/log';

/**
 * One line of CPU state before an instruction executes, in the layout used by
 * per-instruction reference logs:
 * `A:01 F:B0 B:00 C:13 D:00 E:D8 H:01 L:4D SP:FFFE PC:0100 PCMEM:00,C3,13,02`
 */
export function formatDoctorLine(cpu: CPU): string {
  const s = cpu.state;
  const mem: string[] = [];
  for (let i = 0; i < 4; i++) mem.push(hex2(cpu.read((s.pc + i) & 0xFFFF)));
  return `A:${hex2(s.a)} F:${hex2(s.f)} B:${hex2(s.b)} C:${hex2(s.c)} D:${hex2(s.d)} E:${hex2(s.e)} `
    + `H:${hex2(s.h)} L:${hex2(s.l)} SP:${hex4(s.sp)} PC:${hex4(s.pc)} PCMEM:${mem.join(',')}`;
}

export const doctorTracer = (sink: (line: string) => void): TraceHook => (cpu) => sink(formatDoctorLine(cpu));

export interface DoctorRun {
  lines: string[];
  cycles: number;
  // Set when an emulator error ended the run early
  error?: string;
}

/**
 * Step `sys` until `limit` doctor lines are collected or `maxCycles` have run.
 * A halted CPU with nothing enabled produces no lines, hence the cycle bound.
 */
export function collectDoctorLines(sys: DMGSystem, limit: number, maxCycles: number): DoctorRun {
  const lines: string[] = [];
  sys.setTrace(doctorTracer((line) => lines.push(line)));
  try {
    while (lines.length < limit && sys.cycles < maxCycles) sys.stepInstruction();
  } catch (e) {
    if (!(e instanceof EmulatorError)) throw e;
    return { lines, cycles: sys.cycles, error: e.message };
  } finally {
    sys.setTrace(null);
  }
  return { lines, cycles: sys.cycles };
}

export interface LogMismatch {
  line: number; // 1-based
  expected: string;
  actual: string;
}

/**
 * First line where two doctor logs differ, or null when one is a prefix of the other.
 * Blank lines and surrounding whitespace are ignored.
 */
export function compareDoctorLogs(actual: string, expected: string): LogMismatch | null {
  const split = (text: string): string[] => text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
  const a = split(actual);
  const e = split(expected);
  const n = Math.min(a.length, e.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== e[i]) return { line: i + 1, expected: e[i], actual: a[i] };
  }
  return null;
}
