import { lookupOpcode } from './constants';
import { readI32, decodeString } from './encoding';
import type { Opcode } from './types';

export type DecodedOperand =
  | { kind: 'none' }
  | { kind: 'int'; value: number }
  | { kind: 'byte'; value: number }
  | { kind: 'string'; value: string };

export interface DisassembledInstruction {
  address: number;
  /** Null for a byte outside the opcode table. */
  opcode: Opcode | null;
  mnemonic: string;
  operand: DecodedOperand;
  /** Bytes covered, opcode included. */
  size: number;
  /** The raw opcode byte. */
  raw: number;
  /** Set when the buffer ends inside the operand. */
  truncated?: boolean;
}

const NONE: DecodedOperand = { kind: 'none' };

/**
 * Decode a bytecode buffer in one linear pass.
 * Invalid opcode bytes are reported and skipped one byte at a time; a
 * string without a terminator runs to the end of the buffer. The input
 * is only read.
 */
export function disassemble(code: Uint8Array): DisassembledInstruction[] {
  const out: DisassembledInstruction[] = [];
  let pc = 0;

  while (pc < code.length) {
    const address = pc;
    const raw = code[pc++];
    const info = lookupOpcode(raw);

    if (!info) {
      out.push({ address, opcode: null, mnemonic: '???', operand: NONE, size: 1, raw });
      continue;
    }

    const base = { address, opcode: info.opcode, mnemonic: info.mnemonic, raw };

    switch (info.operandSize) {
      case 0:
        out.push({ ...base, operand: NONE, size: 1 });
        break;

      case 1:
        if (pc + 1 > code.length) {
          out.push({ ...base, operand: NONE, size: code.length - address, truncated: true });
          return out;
        }
        out.push({ ...base, operand: { kind: 'byte', value: code[pc] }, size: 2 });
        pc += 1;
        break;

      case 4:
        if (pc + 4 > code.length) {
          out.push({ ...base, operand: NONE, size: code.length - address, truncated: true });
          return out;
        }
        out.push({ ...base, operand: { kind: 'int', value: readI32(code, pc) }, size: 5 });
        pc += 4;
        break;

      case 'string': {
        let end = code.indexOf(0, pc);
        if (end < 0) end = code.length;
        const value = decodeString(code.subarray(pc, end));
        pc = Math.min(end + 1, code.length);
        out.push({ ...base, operand: { kind: 'string', value }, size: pc - address });
        break;
      }
    }
  }

  return out;
}

/** Quote a string operand the way the assembler would accept it back. */
export function quoteString(value: string): string {
  const body = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r');
  return `"${body}"`;
}

export function formatOperand(operand: DecodedOperand): string {
  switch (operand.kind) {
    case 'none': return '';
    case 'int':
    case 'byte': return String(operand.value);
    case 'string': return quoteString(operand.value);
  }
}

/**
 * One listing line.
 *
 * Examples:
 *   "0000     PUSH         10"
 *   "0005     PRINT_STR    \"hi\\n\""
 *   "0011     ???          (invalid: 0xFF)"
 */
export function formatInstruction(ins: DisassembledInstruction): string {
  const addr = String(ins.address).padStart(4, '0');
  if (ins.opcode === null) {
    return `${addr}     ${'???'.padEnd(12)} (invalid: 0x${ins.raw.toString(16).toUpperCase().padStart(2, '0')})`;
  }
  const operand = ins.truncated ? '(truncated)' : formatOperand(ins.operand);
  return `${addr}     ${ins.mnemonic.padEnd(12)} ${operand}`.trimEnd();
}

/** Full listing with header and footer, as printed by the driver. */
export function disassembleToText(code: Uint8Array): string[] {
  const lines = [
    '=== Disassembly ===',
    'Address  Opcode       Operand',
    '-------  -----------  ----------',
  ];
  for (const ins of disassemble(code)) {
    lines.push(formatInstruction(ins));
  }
  lines.push('===================');
  return lines;
}
