import type { Byte, Word, CPUState } from './types';
import { postBootState } from './types';
import type { BusDevice } from '@core/bus/memory';
import { INTERRUPT_VECTORS, type InterruptController } from '@core/interrupts/interrupts';
import { IllegalOpcodeError } from '@core/errors';
import { CB_OPCODES, OPCODES, PREFIX_CB, type Instruction } from './opcodes';

// Cost of pushing PC and jumping to a vector
export const INTERRUPT_DISPATCH_CYCLES = 20;
// A halted CPU burns one M-cycle per step
export const HALT_IDLE_CYCLES = 4;

export type TraceHook = (cpu: CPU) => void;

/**
 * SM83 core. step() runs one unit of work (interrupt dispatch plus the instruction
 * at the vector, one instruction, or one idle halt M-cycle) and returns its T-cycles.
 */
export class CPU {
  state: CPUState;
  ime = false;
  halted = false;
  // EI takes effect after the following instruction
  private imePending = false;
  // Next fetch does not advance PC (HALT with IME=0 and an interrupt already pending)
  private haltBug = false;
  private operandAddr = 0;
  private traceHook: TraceHook | null = null;
  private stopHook: (() => void) | null = null;

  constructor(private readonly bus: BusDevice, private readonly interrupts: InterruptController) {
    this.state = postBootState();
  }

  // Called before each instruction fetch with the pre-execution state
  setTraceHook(fn: TraceHook | null): void { this.traceHook = fn; }
  // STOP side effect owned by the system (DIV reset)
  setStopHook(fn: (() => void) | null): void { this.stopHook = fn; }

  reset(state: CPUState = postBootState()): void {
    this.state = { ...state };
    this.ime = false;
    this.imePending = false;
    this.halted = false;
    this.haltBug = false;
  }

  // Register pairs
  get af(): Word { return (this.state.a << 8) | this.state.f; }
  set af(v: Word) { this.state.a = (v >> 8) & 0xFF; this.state.f = v & 0xF0; }
  get bc(): Word { return (this.state.b << 8) | this.state.c; }
  set bc(v: Word) { this.state.b = (v >> 8) & 0xFF; this.state.c = v & 0xFF; }
  get de(): Word { return (this.state.d << 8) | this.state.e; }
  set de(v: Word) { this.state.d = (v >> 8) & 0xFF; this.state.e = v & 0xFF; }
  get hl(): Word { return (this.state.h << 8) | this.state.l; }
  set hl(v: Word) { this.state.h = (v >> 8) & 0xFF; this.state.l = v & 0xFF; }

  // Bus access
  read(addr: Word): Byte { return this.bus.read(addr & 0xFFFF) & 0xFF; }
  write(addr: Word, value: Byte): void { this.bus.write(addr & 0xFFFF, value & 0xFF); }

  imm8(): Byte { return this.read(this.operandAddr); }
  imm16(): Word { return this.read(this.operandAddr) | (this.read(this.operandAddr + 1) << 8); }

  push(v: Word): void {
    const s = this.state;
    s.sp = (s.sp - 1) & 0xFFFF; this.write(s.sp, (v >> 8) & 0xFF);
    s.sp = (s.sp - 1) & 0xFFFF; this.write(s.sp, v & 0xFF);
  }

  pop(): Word {
    const s = this.state;
    const lo = this.read(s.sp); s.sp = (s.sp + 1) & 0xFFFF;
    const hi = this.read(s.sp); s.sp = (s.sp + 1) & 0xFFFF;
    return (hi << 8) | lo;
  }

  // Operand index: B C D E H L (HL) A
  getR8(i: number): Byte {
    const s = this.state;
    switch (i) {
      case 0: return s.b;
      case 1: return s.c;
      case 2: return s.d;
      case 3: return s.e;
      case 4: return s.h;
      case 5: return s.l;
      case 6: return this.read(this.hl);
      default: return s.a;
    }
  }

  setR8(i: number, v: Byte): void {
    const s = this.state;
    v &= 0xFF;
    switch (i) {
      case 0: s.b = v; break;
      case 1: s.c = v; break;
      case 2: s.d = v; break;
      case 3: s.e = v; break;
      case 4: s.h = v; break;
      case 5: s.l = v; break;
      case 6: this.write(this.hl, v); break;
      default: s.a = v; break;
    }
  }

  // BC DE HL SP
  getR16(i: number): Word {
    switch (i) {
      case 0: return this.bc;
      case 1: return this.de;
      case 2: return this.hl;
      default: return this.state.sp;
    }
  }

  setR16(i: number, v: Word): void {
    v &= 0xFFFF;
    switch (i) {
      case 0: this.bc = v; break;
      case 1: this.de = v; break;
      case 2: this.hl = v; break;
      default: this.state.sp = v; break;
    }
  }

  // BC DE HL AF
  getR16Stack(i: number): Word { return i === 3 ? this.af : this.getR16(i); }
  setR16Stack(i: number, v: Word): void {
    if (i === 3) this.af = v;
    else this.setR16(i, v);
  }

  // NZ Z NC C
  condition(i: number): boolean {
    const f = this.state.f;
    switch (i) {
      case 0: return (f & 0x80) === 0;
      case 1: return (f & 0x80) !== 0;
      case 2: return (f & 0x10) === 0;
      default: return (f & 0x10) !== 0;
    }
  }

  enableInterrupts(immediate: boolean): void {
    if (immediate) { this.ime = true; this.imePending = false; }
    else if (!this.ime) this.imePending = true;
  }

  disableInterrupts(): void {
    this.ime = false;
    this.imePending = false;
  }

  halt(): void {
    if (!this.ime && this.interrupts.pending() !== 0) this.haltBug = true;
    else this.halted = true;
  }

  stop(): void {
    if (this.stopHook) this.stopHook();
  }

  step(): number {
    let cycles = 0;
    if (this.halted) {
      if (this.interrupts.pending() === 0) {
        this.state.cycles += HALT_IDLE_CYCLES;
        return HALT_IDLE_CYCLES;
      }
      // Any requested-and-enabled interrupt wakes the CPU, whatever IME says
      this.halted = false;
    }
    if (this.ime && this.interrupts.pending() !== 0) cycles += this.dispatchInterrupt();
    cycles += this.execute();
    this.state.cycles += cycles;
    return cycles;
  }

  private dispatchInterrupt(): number {
    const source = this.interrupts.highestPending();
    if (source === null) return 0;
    this.ime = false;
    this.imePending = false;
    this.interrupts.acknowledge(source);
    // EI; HALT with a request already pending: the handler returns to the HALT
    const ret = this.haltBug ? (this.state.pc - 1) & 0xFFFF : this.state.pc;
    this.haltBug = false;
    this.push(ret);
    this.state.pc = INTERRUPT_VECTORS[source];
    return INTERRUPT_DISPATCH_CYCLES;
  }

  private execute(): number {
    if (this.traceHook) this.traceHook(this);
    const pc = this.state.pc;
    const bug = this.haltBug;
    this.haltBug = false;
    const enableAfter = this.imePending;

    const opcode = this.read(pc);
    let ins: Instruction;
    let operand = bug ? pc : (pc + 1) & 0xFFFF;
    if (opcode === PREFIX_CB) {
      ins = CB_OPCODES[this.read(operand)];
      operand = (operand + 1) & 0xFFFF;
    } else {
      const entry = OPCODES[opcode];
      if (!entry) throw new IllegalOpcodeError(pc, opcode);
      ins = entry;
    }
    this.operandAddr = operand;
    this.state.pc = (pc + ins.length - (bug ? 1 : 0)) & 0xFFFF;

    const taken = ins.exec(this) === true;

    // EI from the previous instruction arms IME now, unless DI cancelled it
    if (enableAfter && this.imePending) {
      this.ime = true;
      this.imePending = false;
    }
    return taken && ins.cyclesTaken !== undefined ? ins.cyclesTaken : ins.cycles;
  }
}
