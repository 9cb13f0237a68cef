/**
 * Two-pass assembler: assembly text → bytecode.
 *
 * Pass 1 walks the tokenized lines and assigns every label the byte offset
 * it will occupy. Pass 2 walks them again from offset 0 and emits the
 * final bytes, resolving label operands against the frozen pass-1 table,
 * so forward and backward references come out identical.
 */
import { tokenize } from './tokenizer';
import type { SourceLine, Instruction } from './tokenizer';
import { CODE_SIZE, MAX_LABELS, encodedSize } from '../constants';
import { BytecodeWriter, fitsU8 } from '../encoding';
import { AssemblyErrorKind } from '../types';
import type { AssembleResult, AssemblyError } from '../types';

/** Mutable state of one assembly run; never outlives assemble(). */
interface AssemblerContext {
  labels: Map<string, number>;
  offset: number;
}

type PassResult<T> = { ok: true; value: T } | { ok: false; error: AssemblyError };

function fail(src: SourceLine, kind: AssemblyErrorKind, col: number, message: string): { ok: false; error: AssemblyError } {
  return { ok: false, error: { kind, line: src.line, col, message, text: src.text } };
}

function instructionSize(ins: Instruction): number {
  const payload = ins.operand?.kind === 'string' ? ins.operand.bytes.length : 0;
  return encodedSize(ins.info, payload);
}

/** Collect label addresses and the total program size. */
export function pass1(lines: SourceLine[]): PassResult<{ labels: ReadonlyMap<string, number>; size: number }> {
  const ctx: AssemblerContext = { labels: new Map(), offset: 0 };

  for (const src of lines) {
    if (src.label) {
      const { name, col } = src.label;
      if (ctx.labels.has(name)) {
        return fail(src, AssemblyErrorKind.DUPLICATE_LABEL, col, `Duplicate label '${name}'`);
      }
      if (ctx.labels.size >= MAX_LABELS) {
        return fail(src, AssemblyErrorKind.TOO_MANY_LABELS, col, `Too many labels (limit ${MAX_LABELS})`);
      }
      ctx.labels.set(name, ctx.offset);
    }

    if (src.instruction) {
      ctx.offset += instructionSize(src.instruction);
      if (ctx.offset > CODE_SIZE) {
        return fail(src, AssemblyErrorKind.CODE_OVERFLOW, src.instruction.col, `Code buffer overflow (limit ${CODE_SIZE} bytes)`);
      }
    }
  }

  return { ok: true, value: { labels: ctx.labels, size: ctx.offset } };
}

/** Emit bytecode with every label operand resolved. */
export function pass2(lines: SourceLine[], labels: ReadonlyMap<string, number>): PassResult<Uint8Array> {
  const writer = new BytecodeWriter(CODE_SIZE);

  for (const src of lines) {
    const ins = src.instruction;
    if (!ins) continue;

    let emitted = writer.emitByte(ins.info.opcode);
    const operand = ins.operand;

    if (operand?.kind === 'string') {
      emitted = emitted && writer.emitString(operand.bytes);
    } else if (operand) {
      let value: number;
      if (operand.kind === 'label') {
        const addr = labels.get(operand.name);
        if (addr === undefined) {
          return fail(src, AssemblyErrorKind.UNDEFINED_LABEL, ins.operandCol, `Undefined label '${operand.name}'`);
        }
        value = addr;
      } else {
        value = operand.value;
      }

      if (ins.info.operandSize === 1) {
        if (!fitsU8(value)) {
          return fail(src, AssemblyErrorKind.INVALID_OPERAND, ins.operandCol, `Operand out of range: ${value}`);
        }
        emitted = emitted && writer.emitByte(value);
      } else {
        emitted = emitted && writer.emitU32(value);
      }
    }

    if (!emitted) {
      return fail(src, AssemblyErrorKind.CODE_OVERFLOW, ins.col, `Code buffer overflow (limit ${CODE_SIZE} bytes)`);
    }
  }

  return { ok: true, value: writer.toBytes() };
}

export function assemble(source: string): AssembleResult {
  const tokens = tokenize(source);
  if (!tokens.ok) return tokens;

  const first = pass1(tokens.lines);
  if (!first.ok) return first;
  const labels = first.value.labels;

  const second = pass2(tokens.lines, labels);
  if (!second.ok) return second;
  const code = second.value;

  if (code.length !== first.value.size) {
    return {
      ok: false,
      error: {
        kind: AssemblyErrorKind.INTERNAL,
        line: 0,
        col: 0,
        message: `Pass size mismatch: pass 1 computed ${first.value.size} bytes, pass 2 emitted ${code.length}`,
        text: '',
      },
    };
  }

  return { ok: true, code, symbols: new Map(labels), size: code.length };
}

/**
 * One-line rendering of an assembly error.
 *
 *   formatAssemblyError(err) → "Error line 3: Unknown instruction 'PUHS'"
 */
export function formatAssemblyError(error: AssemblyError): string {
  return `Error line ${error.line}: ${error.message}`;
}
