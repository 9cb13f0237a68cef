/**
 * Bytecode layout: one opcode byte followed by its operand.
 * Integer operands are little-endian; the string operand is raw UTF-8
 * bytes ending in a zero byte.
 */
import { CODE_SIZE } from './constants';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const INT32_MIN = -0x80000000;
export const UINT32_MAX = 0xFFFFFFFF;

export function readU32(code: Uint8Array, offset: number): number {
  return (
    code[offset]
    | (code[offset + 1] << 8)
    | (code[offset + 2] << 16)
    | (code[offset + 3] << 24)
  ) >>> 0;
}

export function readI32(code: Uint8Array, offset: number): number {
  return readU32(code, offset) | 0;
}

/**
 * Payload bytes of the NUL-terminated string at `offset`, and the offset
 * just past the terminator. Null when the buffer ends before a terminator.
 */
export function readCString(code: Uint8Array, offset: number): { bytes: Uint8Array; next: number } | null {
  const end = code.indexOf(0, offset);
  if (end < 0) return null;
  return { bytes: code.subarray(offset, end), next: end + 1 };
}

export function encodeString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeString(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/** Fits a 4-byte operand: anything from INT32_MIN to UINT32_MAX. */
export function fitsU32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= UINT32_MAX;
}

export function fitsU8(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xFF;
}

/**
 * Append-only bytecode buffer with a hard capacity.
 * Every emit returns false once the capacity would be exceeded; nothing
 * past the capacity is written.
 */
export class BytecodeWriter {
  private buffer: Uint8Array;
  private length = 0;
  readonly capacity: number;

  constructor(capacity: number = CODE_SIZE) {
    this.capacity = capacity;
    this.buffer = new Uint8Array(Math.min(capacity, 256));
  }

  get size(): number {
    return this.length;
  }

  private reserve(count: number): boolean {
    if (this.length + count > this.capacity) return false;
    if (this.length + count > this.buffer.length) {
      const grown = new Uint8Array(Math.min(this.capacity, Math.max(this.buffer.length * 2, this.length + count)));
      grown.set(this.buffer.subarray(0, this.length));
      this.buffer = grown;
    }
    return true;
  }

  emitByte(value: number): boolean {
    if (!this.reserve(1)) return false;
    this.buffer[this.length++] = value & 0xFF;
    return true;
  }

  emitU32(value: number): boolean {
    if (!this.reserve(4)) return false;
    const v = value >>> 0;
    this.buffer[this.length++] = v & 0xFF;
    this.buffer[this.length++] = (v >>> 8) & 0xFF;
    this.buffer[this.length++] = (v >>> 16) & 0xFF;
    this.buffer[this.length++] = (v >>> 24) & 0xFF;
    return true;
  }

  /** Payload must not contain a zero byte. */
  emitString(payload: Uint8Array): boolean {
    if (payload.includes(0)) {
      throw new Error('String operand contains a NUL byte');
    }
    if (!this.reserve(payload.length + 1)) return false;
    this.buffer.set(payload, this.length);
    this.length += payload.length;
    this.buffer[this.length++] = 0;
    return true;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}
