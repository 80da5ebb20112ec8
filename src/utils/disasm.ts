import type { Byte, Word } from "@core/cpu/types";
import { CB_OPCODES, OPCODES, PREFIX_CB } from "@core/cpu/opcodes";
import { hex2, hex4 } from "./log";

export type ReadByteFn = (addr: Word) => Byte;

export interface DisasmResult {
  bytes: number[];
  mnemonic: string;
  operand: string;
  len: number;
}

// Substitute operand placeholders of the opcode table's mnemonics with real values
function formatOperand(template: string, pc: Word, len: number, b1: Byte, b2: Byte): string {
  return template
    .replace("n16", "$" + hex4(b1 | (b2 << 8)))
    .replace("a16", "$" + hex4(b1 | (b2 << 8)))
    .replace("n8", "$" + hex2(b1))
    .replace("a8", "$FF" + hex2(b1))
    .replace("SP+e8", "SP" + (b1 < 0x80 ? "+" : "-") + (b1 < 0x80 ? b1 : 0x100 - b1))
    .replace("e8", () => {
      // Relative jumps print the absolute target; ADD SP,e8 prints the signed value
      if (template.startsWith("SP,")) return String(b1 < 0x80 ? b1 : b1 - 0x100);
      const off = b1 < 0x80 ? b1 : b1 - 0x100;
      return "$" + hex4(pc + len + off);
    });
}

function split(mnemonic: string): [string, string] {
  const sp = mnemonic.indexOf(" ");
  return sp < 0 ? [mnemonic, ""] : [mnemonic.slice(0, sp), mnemonic.slice(sp + 1)];
}

export function disasmAt(read: ReadByteFn, pc: Word): DisasmResult {
  const op = read(pc & 0xFFFF) & 0xFF;
  const b1 = read((pc + 1) & 0xFFFF) & 0xFF;
  const b2 = read((pc + 2) & 0xFFFF) & 0xFF;
  if (op === PREFIX_CB) {
    const [mnemonic, operand] = split(CB_OPCODES[b1].mnemonic);
    return { bytes: [op, b1], mnemonic, operand, len: 2 };
  }
  const info = OPCODES[op];
  if (!info) return { bytes: [op], mnemonic: "DB", operand: "$" + hex2(op), len: 1 };
  const bytes = info.length === 1 ? [op] : info.length === 2 ? [op, b1] : [op, b1, b2];
  const [mnemonic, template] = split(info.mnemonic);
  return { bytes, mnemonic, operand: formatOperand(template, pc, info.length, b1, b2), len: info.length };
}

// "0150  CD 00 20  CALL $2000"
export function formatDisasmLine(pc: Word, res: DisasmResult): string {
  const bytesStr = res.bytes.map((b) => hex2(b)).join(" ").padEnd(9, " ");
  return `${hex4(pc)}  ${bytesStr} ${(res.mnemonic + (res.operand ? " " + res.operand : "")).trim()}`;
}
