#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { DMGSystem } from '@core/system/system'
import { collectDoctorLines, compareDoctorLogs } from '@core/debug/trace'
import { disasmAt, formatDisasmLine } from '@utils/disasm'
import { DEFAULT_MAX_CYCLES } from '@core/harness/headless'

// Run a ROM in doctor mode and report the first line that differs from a reference log.
// ROM=path/to/test.gb LOG=path/to/reference.log [MAX_LINES=N] [MAX_CYCLES=N] tsx scripts/compare-doctor-log.ts

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function parseArgs() {
  let rom = getEnv('ROM') || path.resolve('roms/cpu_instrs.gb')
  let log = getEnv('LOG') || path.resolve('roms/cpu_instrs.log')
  let max = parseInt(getEnv('MAX_LINES') || '0', 10)
  let maxCycles = parseInt(getEnv('MAX_CYCLES') || String(DEFAULT_MAX_CYCLES), 10)
  for (const a of process.argv.slice(2)) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--log=')) log = a.slice(6)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a.startsWith('--max-cycles=')) maxCycles = parseInt(a.slice(13), 10)
  }
  return {
    rom, log,
    max: Number.isFinite(max) && max > 0 ? max : 0,
    maxCycles: Number.isFinite(maxCycles) && maxCycles > 0 ? maxCycles : DEFAULT_MAX_CYCLES,
  }
}

function main(): number {
  const args = parseArgs()
  if (!fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom}`); return 2 }
  if (!fs.existsSync(args.log)) { console.error(`Log not found: ${args.log}`); return 2 }

  const expected = fs.readFileSync(args.log, 'utf-8').split(/\r?\n/).filter((l) => l.trim().length > 0)
  const limit = args.max > 0 ? Math.min(args.max, expected.length) : expected.length
  const sys = DMGSystem.fromBytes(new Uint8Array(fs.readFileSync(args.rom)), { doctor: true })

  const run = collectDoctorLines(sys, limit, args.maxCycles)
  const actual = run.lines
  if (run.error) console.error(`emulation stopped after ${actual.length} lines: ${run.error}`)

  const mismatch = compareDoctorLogs(actual.slice(0, limit).join('\n'), expected.slice(0, limit).join('\n'))
  if (!mismatch) {
    if (actual.length < limit) {
      console.log(`Stopped after ${actual.length} of ${limit} lines (${run.cycles} cycles); all produced lines match`)
      return 1
    }
    console.log(`OK: ${limit} lines match`)
    return 0
  }
  console.log(`Mismatch at line ${mismatch.line}`)
  console.log(`  expected: ${mismatch.expected}`)
  console.log(`  actual:   ${mismatch.actual}`)
  // Context: the instructions leading up to the divergence
  const from = Math.max(0, mismatch.line - 6)
  for (let i = from; i < mismatch.line - 1; i++) console.log(`  ${actual[i]}`)
  const pc = parseInt(/PC:([0-9A-F]{4})/.exec(mismatch.actual)?.[1] ?? '0', 16)
  console.log(`  at ${formatDisasmLine(pc, disasmAt((a) => sys.bus.read(a), pc))}`)
  return 1
}

process.exitCode = main()
