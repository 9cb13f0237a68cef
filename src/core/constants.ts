import { Opcode } from './types';
import type { OpcodeInfo, OperandSize, FaultKind } from './types';

export const STACK_SIZE = 256;
export const CALL_STACK_SIZE = 64;
export const LOCALS_SIZE = 16;
export const GLOBALS_SIZE = 256;
export const CODE_SIZE = 4096;
export const MAX_LABELS = 256;

// Mnemonic and operand size, indexed by opcode byte
const TABLE: [string, OperandSize][] = [
  ['NOP', 0],
  ['PUSH', 4],
  ['POP', 0],
  ['DUP', 0],
  ['SWAP', 0],
  ['OVER', 0],
  ['ADD', 0],
  ['SUB', 0],
  ['MUL', 0],
  ['DIV', 0],
  ['MOD', 0],
  ['NEG', 0],
  ['INC', 0],
  ['DEC', 0],
  ['EQ', 0],
  ['NE', 0],
  ['LT', 0],
  ['LE', 0],
  ['GT', 0],
  ['GE', 0],
  ['AND', 0],
  ['OR', 0],
  ['NOT', 0],
  ['BAND', 0],
  ['BOR', 0],
  ['BNOT', 0],
  ['XOR', 0],
  ['SHL', 0],
  ['SHR', 0],
  ['JMP', 4],
  ['JZ', 4],
  ['JNZ', 4],
  ['CALL', 4],
  ['RET', 0],
  ['LOAD_LOCAL', 1],
  ['STORE_LOCAL', 1],
  ['LOAD_GLOBAL', 4],
  ['STORE_GLOBAL', 4],
  ['PRINT', 0],
  ['PRINT_CHAR', 0],
  ['PRINT_STR', 'string'],
  ['READ', 0],
  ['HALT', 0],
  ['DEBUG', 0],
];

const OPCODE_VALUES: Opcode[] = Object.values(Opcode);

export const OPCODE_INFO: readonly OpcodeInfo[] = OPCODE_VALUES.map(opcode => ({
  opcode,
  mnemonic: TABLE[opcode][0],
  operandSize: TABLE[opcode][1],
}));

export const OPCODE_COUNT = OPCODE_INFO.length;

export const OPCODE_MAP: Map<string, Opcode> = new Map(
  OPCODE_INFO.map(info => [info.mnemonic, info.opcode])
);

export function isOpcode(byte: number): byte is Opcode {
  return Number.isInteger(byte) && byte >= 0 && byte < OPCODE_COUNT;
}

/** Table entry for an opcode byte, or null for an invalid opcode. */
export function lookupOpcode(byte: number): OpcodeInfo | null {
  return isOpcode(byte) ? OPCODE_INFO[byte] : null;
}

/** Case-insensitive mnemonic lookup. */
export function findOpcode(mnemonic: string): Opcode | null {
  return OPCODE_MAP.get(mnemonic.toUpperCase()) ?? null;
}

/**
 * Encoded size of an instruction in bytes, opcode included.
 * String operands need the payload length (terminator excluded).
 */
export function encodedSize(info: OpcodeInfo, payloadLength: number = 0): number {
  if (info.operandSize === 'string') return 1 + payloadLength + 1;
  return 1 + info.operandSize;
}

export const FAULT_MESSAGES: Record<FaultKind, string> = {
  stack_overflow: 'Stack overflow',
  stack_underflow: 'Stack underflow',
  call_stack_overflow: 'Call stack overflow',
  call_stack_underflow: 'Call stack underflow',
  invalid_opcode: 'Invalid opcode',
  division_by_zero: 'Division by zero',
  out_of_bounds: 'Array index out of bounds',
  invalid_address: 'Invalid memory address',
};
