/**
 * Host collaborators of the VM: where PRINT* text goes, where READ gets
 * its integers, and where traces, DEBUG dumps and fault reports are written.
 */
import { decodeString } from './encoding';

/** Receives raw output bytes; PRINT and PRINT_STR text arrives as UTF-8. */
export interface OutputSink {
  write: (bytes: Uint8Array) => void;
}

export interface InputSource {
  /** Next integer, or null when none is available. */
  readInt: () => number | null;
}

export interface DiagnosticSink {
  log: (text: string) => void;
  error: (text: string) => void;
}

export class BufferOutput implements OutputSink {
  private chunks: Uint8Array[] = [];

  write(bytes: Uint8Array): void {
    this.chunks.push(Uint8Array.from(bytes));
  }

  get bytes(): Uint8Array {
    const out = new Uint8Array(this.chunks.reduce((n, c) => n + c.length, 0));
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  /** Everything written so far, decoded as UTF-8. */
  get text(): string {
    return decodeString(this.bytes);
  }

  clear(): void {
    this.chunks = [];
  }
}

export class BufferDiagnostics implements DiagnosticSink {
  readonly logs: string[] = [];
  readonly errors: string[] = [];

  log(text: string): void {
    this.logs.push(text);
  }

  error(text: string): void {
    this.errors.push(text);
  }
}

export class QueueInput implements InputSource {
  private readonly values: number[];

  constructor(values: number[]) {
    this.values = [...values];
  }

  readInt(): number | null {
    return this.values.shift() ?? null;
  }
}

export const EMPTY_INPUT: InputSource = { readInt: () => null };

export const NULL_OUTPUT: OutputSink = { write: () => {} };

export const NULL_DIAGNOSTICS: DiagnosticSink = { log: () => {}, error: () => {} };

// Leading integer of a whitespace-separated token, scanf("%d") style
const INT_PREFIX = /^[+-]?\d+/;

/**
 * Skip leading whitespace and take the integer at the front of `text`,
 * wrapped to 32 bits. Null when the next token does not start with one.
 */
export function scanInt(text: string): { value: number; rest: string } | null {
  const trimmed = text.trimStart();
  const match = INT_PREFIX.exec(trimmed);
  if (!match) return null;
  return { value: Number.parseInt(match[0], 10) | 0, rest: trimmed.substring(match[0].length) };
}
