import { describe, it, expect } from 'vitest';
import { tokenize, parseIntLiteral, findComment } from './tokenizer';
import type { SourceLine, TokenizeResult } from './tokenizer';
import { decodeString } from '../encoding';
import { AssemblyErrorKind } from '../types';
import type { AssemblyError } from '../types';

function lines(source: string): SourceLine[] {
  const result = tokenize(source);
  if (!result.ok) throw new Error(result.error.message);
  return result.lines;
}

function errorOf(result: TokenizeResult): AssemblyError {
  if (result.ok) throw new Error('expected a tokenizer error');
  return result.error;
}

describe('parseIntLiteral', () => {
  it.each([
    ['42', 42],
    ['+42', 42],
    ['-7', -7],
    ['0', 0],
    ['0x1F', 31],
    ['0XfF', 255],
    ['-0x10', -16],
    ['017', 15],
  ])('%s = %i', (text, value) => {
    expect(parseIntLiteral(text)).toBe(value);
  });

  it.each(['08', '1a', '0x', '', '--1', 'ten'])('rejects %j', (text) => {
    expect(parseIntLiteral(text)).toBeNull();
  });
});

describe('findComment', () => {
  it('finds the marker outside strings', () => {
    expect(findComment('PUSH 1 ; one')).toBe(7);
    expect(findComment('PRINT_STR "a;b" ; c')).toBe(16);
  });

  it('skips escaped quotes inside strings', () => {
    expect(findComment('PRINT_STR "a\\";" ;x')).toBe(17);
  });

  it('returns -1 without a comment', () => {
    expect(findComment('HALT')).toBe(-1);
  });
});

describe('tokenize', () => {
  it('splits a line into label, mnemonic and operand', () => {
    const [src] = lines('start: PUSH 10 ; comment');
    expect(src.label).toEqual({ name: 'start', col: 1 });
    expect(src.instruction?.info.mnemonic).toBe('PUSH');
    expect(src.instruction?.operand).toEqual({ kind: 'number', value: 10 });
    expect(src.instruction?.col).toBe(8);
    expect(src.instruction?.operandCol).toBe(13);
  });

  it('keeps blank and comment-only lines with their numbers', () => {
    const result = lines('\n  ; only a comment\nHALT');
    expect(result).toHaveLength(3);
    expect(result[0].instruction).toBeNull();
    expect(result[1].instruction).toBeNull();
    expect(result[2].line).toBe(3);
    expect(result[2].instruction?.info.mnemonic).toBe('HALT');
  });

  it('accepts a label alone on its line', () => {
    const [src] = lines('  loop:  ');
    expect(src.label).toEqual({ name: 'loop', col: 3 });
    expect(src.instruction).toBeNull();
  });

  it('does not take a colon inside a string for a label', () => {
    const [src] = lines('PRINT_STR "a:b"');
    expect(src.label).toBeNull();
    expect(src.instruction?.info.mnemonic).toBe('PRINT_STR');
  });

  it('matches mnemonics case-insensitively', () => {
    expect(lines('push 1')[0].instruction?.info.mnemonic).toBe('PUSH');
  });

  it('strips carriage returns', () => {
    const result = lines('PUSH 1\r\nHALT\r');
    expect(result[0].text).toBe('PUSH 1');
    expect(result[1].instruction?.info.mnemonic).toBe('HALT');
  });

  it('classifies label operands', () => {
    expect(lines('JMP done')[0].instruction?.operand).toEqual({ kind: 'label', name: 'done' });
  });

  it('decodes string escapes', () => {
    const operand = lines('PRINT_STR "a\\tb\\\\ \\"q\\" \\x"')[0].instruction?.operand;
    expect(operand?.kind).toBe('string');
    if (operand?.kind === 'string') {
      expect(decodeString(operand.bytes)).toBe('a\tb\\ "q" x');
    }
  });

  it('encodes strings as UTF-8', () => {
    const operand = lines('PRINT_STR "é"')[0].instruction?.operand;
    expect(operand).toEqual({ kind: 'string', bytes: Uint8Array.of(0xC3, 0xA9) });
  });
});

describe('tokenize errors', () => {
  it('reports an unknown mnemonic with its position', () => {
    expect(errorOf(tokenize('NOP\n\n  PUHS 1'))).toEqual({
      kind: AssemblyErrorKind.UNKNOWN_MNEMONIC,
      line: 3,
      col: 3,
      message: "Unknown instruction 'PUHS'",
      text: '  PUHS 1',
    });
  });

  it('rejects an operand on an operand-less instruction', () => {
    const error = errorOf(tokenize('add 5'));
    expect(error.kind).toBe(AssemblyErrorKind.INVALID_OPERAND);
    expect(error.message).toBe('ADD takes no operand');
    expect(error.col).toBe(5);
  });

  it('requires an operand where one is expected', () => {
    const error = errorOf(tokenize('PUSH'));
    expect(error.kind).toBe(AssemblyErrorKind.MISSING_OPERAND);
    expect(error.message).toBe('PUSH requires an operand');
  });

  it('reports an unterminated string at its opening quote', () => {
    const error = errorOf(tokenize('PRINT_STR "abc'));
    expect(error.kind).toBe(AssemblyErrorKind.UNTERMINATED_STRING);
    expect(error.col).toBe(11);
  });

  it.each([
    ['PRINT_STR abc', 'Expected quoted string'],
    ['PRINT_STR "a" b', 'Unexpected text after string'],
    ['PRINT_STR "a\0b"', 'String contains a NUL character'],
    ['PRINT_STR "a\\\0b"', 'String contains a NUL character'],
    ['LOAD_LOCAL 256', 'Operand out of range: 256'],
    ['LOAD_LOCAL -1', 'Operand out of range: -1'],
    ['PUSH 0x100000000', 'Operand out of range: 0x100000000'],
    ['PUSH -2147483649', 'Operand out of range: -2147483649'],
    ['PUSH foo-bar', "Invalid operand 'foo-bar'"],
  ])('%j → %s', (source, message) => {
    const error = errorOf(tokenize(source));
    expect(error.kind).toBe(AssemblyErrorKind.INVALID_OPERAND);
    expect(error.message).toBe(message);
  });
});
