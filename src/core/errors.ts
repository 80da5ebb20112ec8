import type { Byte, Word } from '@core/cpu/types';

const hex = (v: number, w: number): string => v.toString(16).toUpperCase().padStart(w, '0');

export class EmulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Malformed or unsupported cartridge image. Raised at load time.
export class CartridgeError extends EmulatorError {}

export class IllegalOpcodeError extends EmulatorError {
  constructor(public readonly address: Word, public readonly opcode: Byte, public readonly prefixed = false) {
    super(`Illegal opcode $${prefixed ? 'CB' : ''}${hex(opcode, 2)} at $${hex(address, 4)}`);
  }
}
