import { DEFAULT_MAX_CYCLES } from '@core/harness/headless';

export interface CliOptions {
  rom: string;
  serial: boolean;
  headless: boolean;
  maxCycles: number;
  frames: number;
  snapshot: string | null;
  doctor: string | null;
}

export const DEFAULT_FRAMES = 60;

export const USAGE = `Usage:
  dmg <rom.gb> [--serial] [--headless] [--max-cycles N] [--frames N] [--snapshot out.png] [--doctor out.log]

  --serial          echo serial output to stdout
  --headless        run until the ROM reports Passed/Failed over serial; exit code carries the verdict
  --max-cycles N    cycle budget for --headless (default ${DEFAULT_MAX_CYCLES}, env DMG_MAX_CYCLES)
  --frames N        frames to run without --headless (default ${DEFAULT_FRAMES})
  --snapshot PATH   write the last frame as PNG
  --doctor PATH     write one CPU state line per instruction (LY reads pinned to $90)

Exit codes: 0 pass, 1 fail, 2 usage or load error, 3 timeout, 4 emulation error`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// Decimal, 0x-prefixed hex, or underscores as digit separators
export function parseNum(val: string | undefined, name: string): number {
  if (val === undefined) throw new UsageError(`--${name} needs a value`);
  const s = val.trim().replace(/_/g, '');
  const n = /^0x[0-9a-f]+$/i.test(s) ? parseInt(s.slice(2), 16) : /^\d+$/.test(s) ? Number(s) : NaN;
  if (!Number.isSafeInteger(n) || n <= 0) throw new UsageError(`--${name}: expected a positive integer, got '${val}'`);
  return n;
}

const VALUE_FLAGS = new Set(['max-cycles', 'frames', 'snapshot', 'doctor']);
const BOOL_FLAGS = new Set(['serial', 'headless']);

export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const values = new Map<string, string>();
  const bools = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) { positional.push(a); continue; }
    const eq = a.indexOf('=');
    const key = eq >= 0 ? a.slice(2, eq) : a.slice(2);
    if (BOOL_FLAGS.has(key)) {
      if (eq >= 0) throw new UsageError(`--${key} takes no value`);
      bools.add(key);
    } else if (VALUE_FLAGS.has(key)) {
      const v = eq >= 0 ? a.slice(eq + 1) : argv[++i];
      if (v === undefined || v.length === 0) throw new UsageError(`--${key} needs a value`);
      values.set(key, v);
    } else {
      throw new UsageError(`unknown option --${key}`);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(positional.length === 0 ? 'missing ROM path' : `unexpected argument '${positional[1]}'`);
  }

  const maxRaw = values.get('max-cycles') ?? (env.DMG_MAX_CYCLES || undefined);
  return {
    rom: positional[0],
    serial: bools.has('serial'),
    headless: bools.has('headless'),
    maxCycles: maxRaw === undefined ? DEFAULT_MAX_CYCLES : parseNum(maxRaw, 'max-cycles'),
    frames: values.has('frames') ? parseNum(values.get('frames'), 'frames') : DEFAULT_FRAMES,
    snapshot: values.get('snapshot') ?? null,
    doctor: values.get('doctor') ?? null,
  };
}
