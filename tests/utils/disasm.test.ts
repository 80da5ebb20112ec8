import { describe, it, expect } from 'vitest';
import { disasmAt, formatDisasmLine } from '@utils/disasm';

function reader(bytes: number[], at = 0x0150) {
  const mem = new Uint8Array(0x10000);
  mem.set(bytes, at);
  return (addr: number) => mem[addr];
}

describe('disasmAt', () => {
  it('decodes absolute jumps', () => {
    expect(disasmAt(reader([0xC3, 0x50, 0x01]), 0x0150)).toEqual({ bytes: [0xC3, 0x50, 0x01], mnemonic: 'JP', operand: '$0150', len: 3 });
  });

  it('prints relative jump targets as addresses', () => {
    expect(disasmAt(reader([0x18, 0xFE]), 0x0150).operand).toBe('$0150');
    expect(disasmAt(reader([0x20, 0xFE]), 0x0150).operand).toBe('NZ,$0150');
    expect(disasmAt(reader([0x18, 0x10]), 0x0150).operand).toBe('$0162');
  });

  it('prints stack offsets as signed decimals', () => {
    expect(disasmAt(reader([0xF8, 0xFE]), 0x0150).operand).toBe('HL,SP-2');
    expect(disasmAt(reader([0xE8, 0x05]), 0x0150).operand).toBe('SP,5');
    expect(disasmAt(reader([0xE8, 0xF0]), 0x0150).operand).toBe('SP,-16');
  });

  it('expands high-page and immediate operands', () => {
    expect(disasmAt(reader([0xE0, 0x44]), 0x0150).operand).toBe('($FF44),A');
    expect(disasmAt(reader([0x3E, 0x7F]), 0x0150).operand).toBe('A,$7F');
    expect(disasmAt(reader([0x01, 0x34, 0x12]), 0x0150).operand).toBe('BC,$1234');
  });

  it('decodes CB-prefixed instructions as two bytes', () => {
    expect(disasmAt(reader([0xCB, 0x7C]), 0x0150)).toEqual({ bytes: [0xCB, 0x7C], mnemonic: 'BIT', operand: '7,H', len: 2 });
  });

  it('shows illegal opcodes as data', () => {
    expect(disasmAt(reader([0xD3]), 0x0150)).toEqual({ bytes: [0xD3], mnemonic: 'DB', operand: '$D3', len: 1 });
  });
});

describe('formatDisasmLine', () => {
  it('lays out address, bytes and text', () => {
    expect(formatDisasmLine(0x0150, disasmAt(reader([0xC3, 0x50, 0x01]), 0x0150))).toBe('0150  C3 50 01  JP $0150');
    expect(formatDisasmLine(0x0150, disasmAt(reader([0x00]), 0x0150))).toBe('0150  00' + ' '.repeat(8) + 'NOP');
  });
});
