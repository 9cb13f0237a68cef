/**
 * Line tokenizer for the assembly language.
 *
 *   label:  MNEMONIC operand   ; comment
 *
 * Every source line becomes one SourceLine holding an optional label
 * definition and an optional instruction with its operand already
 * classified. Nothing here knows label addresses; that is pass 1's job.
 */
import { findOpcode, OPCODE_INFO } from '../constants';
import { encodeString, fitsU8, fitsU32 } from '../encoding';
import { AssemblyErrorKind } from '../types';
import type { AssemblyError, OpcodeInfo } from '../types';

export const COMMENT_CHAR = ';';

export type Operand =
  | { kind: 'number'; value: number }
  | { kind: 'label'; name: string }
  | { kind: 'string'; bytes: Uint8Array };

export interface Instruction {
  info: OpcodeInfo;
  operand: Operand | null;
  col: number;
  operandCol: number;
}

export interface SourceLine {
  line: number;
  text: string;
  label: { name: string; col: number } | null;
  instruction: Instruction | null;
}

export type TokenizeResult =
  | { ok: true; lines: SourceLine[] }
  | { ok: false; error: AssemblyError };

// [+-] then hex, octal (leading 0) or decimal
const INT_LITERAL = /^([+-]?)(0[xX][0-9a-fA-F]+|0[0-7]*|[1-9][0-9]*)$/;
const LABEL_NAME = /^\w+$/;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  '"': '"',
};

class LineError {
  constructor(
    readonly kind: AssemblyErrorKind,
    readonly col: number,
    readonly message: string,
  ) {}
}

/** Index of the comment marker outside any quoted string, or -1. */
export function findComment(text: string): number {
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === COMMENT_CHAR) {
      return i;
    }
  }
  return -1;
}

export function parseIntLiteral(text: string): number | null {
  const match = INT_LITERAL.exec(text);
  if (!match) return null;
  const [, sign, digits] = match;
  let value: number;
  if (digits.length > 2 && (digits[1] === 'x' || digits[1] === 'X')) {
    value = Number.parseInt(digits.substring(2), 16);
  } else if (digits.length > 1 && digits[0] === '0') {
    value = Number.parseInt(digits.substring(1), 8);
  } else {
    value = Number.parseInt(digits, 10);
  }
  return sign === '-' ? -value : value;
}

/**
 * Body of a quoted string starting at `text[0] === '"'`, escapes applied.
 * Returns the decoded text and the index after the closing quote.
 */
function scanString(text: string, col: number): { value: string; end: number } {
  let value = '';
  for (let i = 1; i < text.length; i++) {
    let ch = text[i];
    if (ch === '"') return { value, end: i + 1 };
    if (ch === '\\' && i + 1 < text.length) {
      i++;
      ch = ESCAPES[text[i]] ?? text[i];
    }
    if (ch === '\0') {
      throw new LineError(AssemblyErrorKind.INVALID_OPERAND, col + i, 'String contains a NUL character');
    }
    value += ch;
  }
  throw new LineError(AssemblyErrorKind.UNTERMINATED_STRING, col, 'Unterminated string');
}

function parseOperand(info: OpcodeInfo, text: string, col: number): Operand | null {
  const size = info.operandSize;

  if (size === 0) {
    if (text.length > 0) {
      throw new LineError(AssemblyErrorKind.INVALID_OPERAND, col, `${info.mnemonic} takes no operand`);
    }
    return null;
  }

  if (text.length === 0) {
    throw new LineError(AssemblyErrorKind.MISSING_OPERAND, col, `${info.mnemonic} requires an operand`);
  }

  if (size === 'string') {
    if (text[0] !== '"') {
      throw new LineError(AssemblyErrorKind.INVALID_OPERAND, col, 'Expected quoted string');
    }
    const { value, end } = scanString(text, col);
    if (text.substring(end).trim().length > 0) {
      throw new LineError(AssemblyErrorKind.INVALID_OPERAND, col + end, 'Unexpected text after string');
    }
    return { kind: 'string', bytes: encodeString(value) };
  }

  const value = parseIntLiteral(text);
  if (value !== null) {
    const fits = size === 1 ? fitsU8(value) : fitsU32(value);
    if (!fits) {
      throw new LineError(AssemblyErrorKind.INVALID_OPERAND, col, `Operand out of range: ${text}`);
    }
    return { kind: 'number', value };
  }
  if (LABEL_NAME.test(text)) {
    return { kind: 'label', name: text };
  }
  throw new LineError(AssemblyErrorKind.INVALID_OPERAND, col, `Invalid operand '${text}'`);
}

function tokenizeLine(text: string, lineNum: number): SourceLine {
  const result: SourceLine = { line: lineNum, text, label: null, instruction: null };

  const commentAt = findComment(text);
  const code = commentAt >= 0 ? text.substring(0, commentAt) : text;

  let pos = code.length - code.trimStart().length;
  if (pos === code.length) return result;

  // Label: the colon must come before any quote and everything before it
  // must be a name character
  const colon = code.indexOf(':', pos);
  const quote = code.indexOf('"', pos);
  if (colon > pos && (quote < 0 || colon < quote)) {
    const name = code.substring(pos, colon);
    if (LABEL_NAME.test(name)) {
      result.label = { name, col: pos + 1 };
      pos = colon + 1;
      while (pos < code.length && /\s/.test(code[pos])) pos++;
      if (pos >= code.length) return result;
    }
  }

  let end = pos;
  while (end < code.length && !/\s/.test(code[end])) end++;
  const mnemonic = code.substring(pos, end);

  let operandStart = end;
  while (operandStart < code.length && /\s/.test(code[operandStart])) operandStart++;
  const operandText = code.substring(operandStart).trimEnd();

  const opcode = findOpcode(mnemonic);
  if (opcode === null) {
    throw new LineError(AssemblyErrorKind.UNKNOWN_MNEMONIC, pos + 1, `Unknown instruction '${mnemonic}'`);
  }
  const info = OPCODE_INFO[opcode];

  result.instruction = {
    info,
    operand: parseOperand(info, operandText, operandStart + 1),
    col: pos + 1,
    operandCol: operandStart + 1,
  };
  return result;
}

export function tokenize(source: string): TokenizeResult {
  const lines: SourceLine[] = [];
  const rawLines = source.split('\n');

  for (let i = 0; i < rawLines.length; i++) {
    const text = rawLines[i].endsWith('\r') ? rawLines[i].slice(0, -1) : rawLines[i];
    try {
      lines.push(tokenizeLine(text, i + 1));
    } catch (err) {
      if (err instanceof LineError) {
        return {
          ok: false,
          error: { kind: err.kind, line: i + 1, col: err.col, message: err.message, text },
        };
      }
      throw err;
    }
  }

  return { ok: true, lines };
}
