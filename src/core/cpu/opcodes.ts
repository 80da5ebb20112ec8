import type { CPU } from './cpu';
import {
  add16, add8, addSpSigned, and8, bit, ccf, cpl, daa, dec8, inc8, or8, rotateA, scf, shift, sub8, xor8,
  type AluResult, type ShiftOp,
} from './alu';

/**
 * One decoded instruction. Cycles are T-cycles; cyclesTaken is the cost when a
 * conditional branch is taken (exec returns true). Operand placeholders in the
 * mnemonic: n8/n16 immediates, a8 ($FF00+n), a16 address, e8 signed offset.
 */
export interface Instruction {
  readonly mnemonic: string;
  readonly length: 1 | 2 | 3;
  readonly cycles: number;
  readonly cyclesTaken?: number;
  exec(cpu: CPU): boolean | void;
}

// Operand encodings shared by the decoder and the disassembler
export const R8 = ['B', 'C', 'D', 'E', 'H', 'L', '(HL)', 'A'] as const;
export const R16 = ['BC', 'DE', 'HL', 'SP'] as const;
export const R16_STACK = ['BC', 'DE', 'HL', 'AF'] as const;
export const CONDITIONS = ['NZ', 'Z', 'NC', 'C'] as const;
const ALU_OPS = ['ADD', 'ADC', 'SUB', 'SBC', 'AND', 'XOR', 'OR', 'CP'] as const;
const SHIFT_OPS: readonly ShiftOp[] = ['rlc', 'rrc', 'rl', 'rr', 'sla', 'sra', 'swap', 'srl'];

const HL_INDIRECT = 6;

export const PREFIX_CB = 0xCB;
export const ILLEGAL_OPCODES: readonly number[] = [0xD3, 0xDB, 0xDD, 0xE3, 0xE4, 0xEB, 0xEC, 0xED, 0xF4, 0xFC, 0xFD];

function alu(cpu: CPU, op: number, v: number): void {
  const s = cpu.state;
  let r: AluResult;
  switch (op) {
    case 0: r = add8(s.a, v, s.f); break;
    case 1: r = add8(s.a, v, s.f, true); break;
    case 2: r = sub8(s.a, v, s.f); break;
    case 3: r = sub8(s.a, v, s.f, true); break;
    case 4: r = and8(s.a, v); break;
    case 5: r = xor8(s.a, v); break;
    case 6: r = or8(s.a, v); break;
    default:
      // CP: flags only
      s.f = sub8(s.a, v, s.f).f;
      return;
  }
  s.a = r.value;
  s.f = r.f;
}

const signed8 = (v: number): number => (v < 0x80 ? v : v - 0x100);

function buildBase(): Array<Instruction | null> {
  const t: Array<Instruction | null> = new Array<Instruction | null>(256).fill(null);
  const def = (op: number, mnemonic: string, length: 1 | 2 | 3, cycles: number, exec: Instruction['exec'], cyclesTaken?: number): void => {
    t[op] = cyclesTaken === undefined ? { mnemonic, length, cycles, exec } : { mnemonic, length, cycles, cyclesTaken, exec };
  };

  def(0x00, 'NOP', 1, 4, () => {});
  def(0x08, 'LD (a16),SP', 3, 20, (cpu) => {
    const addr = cpu.imm16();
    cpu.write(addr, cpu.state.sp & 0xFF);
    cpu.write((addr + 1) & 0xFFFF, cpu.state.sp >> 8);
  });
  def(0x10, 'STOP', 2, 4, (cpu) => cpu.stop());
  def(0x18, 'JR e8', 2, 12, (cpu) => { const e = signed8(cpu.imm8()); cpu.state.pc = (cpu.state.pc + e) & 0xFFFF; });
  def(0x76, 'HALT', 1, 4, (cpu) => cpu.halt());

  // 16-bit loads and arithmetic
  for (let i = 0; i < 4; i++) {
    const rr = R16[i];
    def(0x01 | (i << 4), `LD ${rr},n16`, 3, 12, (cpu) => cpu.setR16(i, cpu.imm16()));
    def(0x03 | (i << 4), `INC ${rr}`, 1, 8, (cpu) => cpu.setR16(i, cpu.getR16(i) + 1));
    def(0x0B | (i << 4), `DEC ${rr}`, 1, 8, (cpu) => cpu.setR16(i, cpu.getR16(i) - 1));
    def(0x09 | (i << 4), `ADD HL,${rr}`, 1, 8, (cpu) => {
      const r = add16(cpu.hl, cpu.getR16(i), cpu.state.f);
      cpu.hl = r.value;
      cpu.state.f = r.f;
    });
  }

  // Indirect A loads through BC, DE and HL with post-increment/decrement
  const indirect: ReadonlyArray<readonly [string, (cpu: CPU) => number]> = [
    ['(BC)', (cpu) => cpu.bc],
    ['(DE)', (cpu) => cpu.de],
    ['(HL+)', (cpu) => { const a = cpu.hl; cpu.hl = a + 1; return a; }],
    ['(HL-)', (cpu) => { const a = cpu.hl; cpu.hl = a - 1; return a; }],
  ];
  indirect.forEach(([name, addr], i) => {
    def(0x02 | (i << 4), `LD ${name},A`, 1, 8, (cpu) => cpu.write(addr(cpu), cpu.state.a));
    def(0x0A | (i << 4), `LD A,${name}`, 1, 8, (cpu) => { cpu.state.a = cpu.read(addr(cpu)); });
  });

  // 8-bit INC/DEC/LD r,n8
  for (let r = 0; r < 8; r++) {
    const mem = r === HL_INDIRECT;
    def(0x04 | (r << 3), `INC ${R8[r]}`, 1, mem ? 12 : 4, (cpu) => {
      const res = inc8(cpu.getR8(r), cpu.state.f);
      cpu.setR8(r, res.value);
      cpu.state.f = res.f;
    });
    def(0x05 | (r << 3), `DEC ${R8[r]}`, 1, mem ? 12 : 4, (cpu) => {
      const res = dec8(cpu.getR8(r), cpu.state.f);
      cpu.setR8(r, res.value);
      cpu.state.f = res.f;
    });
    def(0x06 | (r << 3), `LD ${R8[r]},n8`, 2, mem ? 12 : 8, (cpu) => cpu.setR8(r, cpu.imm8()));
  }

  // Accumulator rotates and flag ops
  const rotates: ReadonlyArray<readonly [number, string, 'rlc' | 'rrc' | 'rl' | 'rr']> = [
    [0x07, 'RLCA', 'rlc'], [0x0F, 'RRCA', 'rrc'], [0x17, 'RLA', 'rl'], [0x1F, 'RRA', 'rr'],
  ];
  for (const [op, name, kind] of rotates) {
    def(op, name, 1, 4, (cpu) => {
      const r = rotateA(kind, cpu.state.a, cpu.state.f);
      cpu.state.a = r.value;
      cpu.state.f = r.f;
    });
  }
  def(0x27, 'DAA', 1, 4, (cpu) => { const r = daa(cpu.state.a, cpu.state.f); cpu.state.a = r.value; cpu.state.f = r.f; });
  def(0x2F, 'CPL', 1, 4, (cpu) => { const r = cpl(cpu.state.a, cpu.state.f); cpu.state.a = r.value; cpu.state.f = r.f; });
  def(0x37, 'SCF', 1, 4, (cpu) => { cpu.state.f = scf(cpu.state.f); });
  def(0x3F, 'CCF', 1, 4, (cpu) => { cpu.state.f = ccf(cpu.state.f); });

  // Relative jumps
  for (let c = 0; c < 4; c++) {
    def(0x20 | (c << 3), `JR ${CONDITIONS[c]},e8`, 2, 8, (cpu) => {
      const e = signed8(cpu.imm8());
      if (!cpu.condition(c)) return false;
      cpu.state.pc = (cpu.state.pc + e) & 0xFFFF;
      return true;
    }, 12);
  }

  // LD r,r' ($76 is HALT)
  for (let op = 0x40; op < 0x80; op++) {
    if (op === 0x76) continue;
    const dst = (op >> 3) & 7;
    const src = op & 7;
    const mem = dst === HL_INDIRECT || src === HL_INDIRECT;
    def(op, `LD ${R8[dst]},${R8[src]}`, 1, mem ? 8 : 4, (cpu) => cpu.setR8(dst, cpu.getR8(src)));
  }

  // ALU A,r and ALU A,n8
  for (let k = 0; k < 8; k++) {
    for (let r = 0; r < 8; r++) {
      def(0x80 | (k << 3) | r, `${ALU_OPS[k]} A,${R8[r]}`, 1, r === HL_INDIRECT ? 8 : 4, (cpu) => alu(cpu, k, cpu.getR8(r)));
    }
    def(0xC6 | (k << 3), `${ALU_OPS[k]} A,n8`, 2, 8, (cpu) => alu(cpu, k, cpu.imm8()));
  }

  // Conditional control flow
  for (let c = 0; c < 4; c++) {
    const cc = CONDITIONS[c];
    def(0xC0 | (c << 3), `RET ${cc}`, 1, 8, (cpu) => {
      if (!cpu.condition(c)) return false;
      cpu.state.pc = cpu.pop();
      return true;
    }, 20);
    def(0xC2 | (c << 3), `JP ${cc},a16`, 3, 12, (cpu) => {
      const target = cpu.imm16();
      if (!cpu.condition(c)) return false;
      cpu.state.pc = target;
      return true;
    }, 16);
    def(0xC4 | (c << 3), `CALL ${cc},a16`, 3, 12, (cpu) => {
      const target = cpu.imm16();
      if (!cpu.condition(c)) return false;
      cpu.push(cpu.state.pc);
      cpu.state.pc = target;
      return true;
    }, 24);
  }

  for (let i = 0; i < 4; i++) {
    def(0xC1 | (i << 4), `POP ${R16_STACK[i]}`, 1, 12, (cpu) => cpu.setR16Stack(i, cpu.pop()));
    def(0xC5 | (i << 4), `PUSH ${R16_STACK[i]}`, 1, 16, (cpu) => cpu.push(cpu.getR16Stack(i)));
  }

  for (let n = 0; n < 8; n++) {
    const vector = n << 3;
    def(0xC7 | (n << 3), `RST $${vector.toString(16).toUpperCase().padStart(2, '0')}`, 1, 16, (cpu) => {
      cpu.push(cpu.state.pc);
      cpu.state.pc = vector;
    });
  }

  def(0xC3, 'JP a16', 3, 16, (cpu) => { cpu.state.pc = cpu.imm16(); });
  def(0xE9, 'JP HL', 1, 4, (cpu) => { cpu.state.pc = cpu.hl; });
  def(0xCD, 'CALL a16', 3, 24, (cpu) => {
    const target = cpu.imm16();
    cpu.push(cpu.state.pc);
    cpu.state.pc = target;
  });
  def(0xC9, 'RET', 1, 16, (cpu) => { cpu.state.pc = cpu.pop(); });
  def(0xD9, 'RETI', 1, 16, (cpu) => { cpu.state.pc = cpu.pop(); cpu.enableInterrupts(true); });

  // High-page and absolute A loads
  def(0xE0, 'LDH (a8),A', 2, 12, (cpu) => cpu.write(0xFF00 | cpu.imm8(), cpu.state.a));
  def(0xF0, 'LDH A,(a8)', 2, 12, (cpu) => { cpu.state.a = cpu.read(0xFF00 | cpu.imm8()); });
  def(0xE2, 'LD (C),A', 1, 8, (cpu) => cpu.write(0xFF00 | cpu.state.c, cpu.state.a));
  def(0xF2, 'LD A,(C)', 1, 8, (cpu) => { cpu.state.a = cpu.read(0xFF00 | cpu.state.c); });
  def(0xEA, 'LD (a16),A', 3, 16, (cpu) => cpu.write(cpu.imm16(), cpu.state.a));
  def(0xFA, 'LD A,(a16)', 3, 16, (cpu) => { cpu.state.a = cpu.read(cpu.imm16()); });

  // Stack pointer arithmetic
  def(0xE8, 'ADD SP,e8', 2, 16, (cpu) => {
    const r = addSpSigned(cpu.state.sp, cpu.imm8());
    cpu.state.sp = r.value;
    cpu.state.f = r.f;
  });
  def(0xF8, 'LD HL,SP+e8', 2, 12, (cpu) => {
    const r = addSpSigned(cpu.state.sp, cpu.imm8());
    cpu.hl = r.value;
    cpu.state.f = r.f;
  });
  def(0xF9, 'LD SP,HL', 1, 8, (cpu) => { cpu.state.sp = cpu.hl; });

  def(0xF3, 'DI', 1, 4, (cpu) => cpu.disableInterrupts());
  def(0xFB, 'EI', 1, 4, (cpu) => cpu.enableInterrupts(false));

  return t;
}

function buildCB(): Instruction[] {
  const t: Instruction[] = [];
  for (let op = 0; op < 256; op++) {
    const r = op & 7;
    const n = (op >> 3) & 7;
    const mem = r === HL_INDIRECT;
    const reg = R8[r];
    switch (op >> 6) {
      case 0: {
        const kind = SHIFT_OPS[n];
        t.push({
          mnemonic: `${kind.toUpperCase()} ${reg}`, length: 2, cycles: mem ? 16 : 8,
          exec: (cpu) => {
            const res = shift(kind, cpu.getR8(r), cpu.state.f);
            cpu.setR8(r, res.value);
            cpu.state.f = res.f;
          },
        });
        break;
      }
      case 1:
        t.push({
          mnemonic: `BIT ${n},${reg}`, length: 2, cycles: mem ? 12 : 8,
          exec: (cpu) => { cpu.state.f = bit(n, cpu.getR8(r), cpu.state.f); },
        });
        break;
      case 2:
        t.push({
          mnemonic: `RES ${n},${reg}`, length: 2, cycles: mem ? 16 : 8,
          exec: (cpu) => cpu.setR8(r, cpu.getR8(r) & ~(1 << n)),
        });
        break;
      default:
        t.push({
          mnemonic: `SET ${n},${reg}`, length: 2, cycles: mem ? 16 : 8,
          exec: (cpu) => cpu.setR8(r, cpu.getR8(r) | (1 << n)),
        });
        break;
    }
  }
  return t;
}

// $CB and the illegal opcodes have no entry; $CB is decoded through CB_OPCODES
export const OPCODES: ReadonlyArray<Instruction | null> = buildBase();
export const CB_OPCODES: readonly Instruction[] = buildCB();
