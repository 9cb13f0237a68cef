import { lookupOpcode } from './constants';
import { readI32, readCString, decodeString } from './encoding';
import type { Word32 } from './types';

const DUMP_LIMIT = 10;

/**
 * Stack dump as printed by DEBUG and by the tracer.
 *
 * Examples:
 *   formatStackDump([])        → "  Stack [0]: (empty)"
 *   formatStackDump([1, 2])    → "  Stack [2]: 1 2 "
 */
export function formatStackDump(stack: Word32[]): string {
  if (stack.length === 0) return `  Stack [0]: (empty)`;
  let out = `  Stack [${stack.length}]: `;
  for (const value of stack.slice(0, DUMP_LIMIT)) out += `${value} `;
  if (stack.length > DUMP_LIMIT) out += '... ';
  return out;
}

/**
 * Trace prefix for the instruction at `addr`: address, mnemonic and the
 * operand still sitting in the code stream. The tracer appends the stack
 * dump once the instruction has executed.
 *
 *   "[0003] PUSH         10         "
 */
export function formatTracePrefix(code: Uint8Array, addr: number): string {
  const byte = code[addr];
  const info = lookupOpcode(byte);
  const head = `[${String(addr).padStart(4, '0')}] `;
  if (!info) return `${head}${'???'.padEnd(12)} ${`0x${byte.toString(16).padStart(2, '0')}`.padEnd(10)} `;

  const operandAddr = addr + 1;
  let operand: string;
  if (info.operandSize === 4 && operandAddr + 4 <= code.length) {
    operand = `${String(readI32(code, operandAddr)).padEnd(10)} `;
  } else if (info.operandSize === 1 && operandAddr < code.length) {
    operand = `${String(code[operandAddr]).padEnd(10)} `;
  } else if (info.operandSize === 'string') {
    const str = readCString(code, operandAddr);
    const text = str ? decodeString(str.bytes) : decodeString(code.subarray(operandAddr));
    operand = `${JSON.stringify(text)} `;
  } else {
    operand = `${''.padEnd(10)} `;
  }
  return `${head}${info.mnemonic.padEnd(12)} ${operand}`;
}
