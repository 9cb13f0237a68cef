// 32-bit signed value as held on the operand stack and in variables
export type Word32 = number;

export const Opcode = {
  NOP: 0,
  PUSH: 1,
  POP: 2,
  DUP: 3,
  SWAP: 4,
  OVER: 5,
  ADD: 6,
  SUB: 7,
  MUL: 8,
  DIV: 9,
  MOD: 10,
  NEG: 11,
  INC: 12,
  DEC: 13,
  EQ: 14,
  NE: 15,
  LT: 16,
  LE: 17,
  GT: 18,
  GE: 19,
  AND: 20,
  OR: 21,
  NOT: 22,
  BAND: 23,
  BOR: 24,
  BNOT: 25,
  XOR: 26,
  SHL: 27,
  SHR: 28,
  JMP: 29,
  JZ: 30,
  JNZ: 31,
  CALL: 32,
  RET: 33,
  LOAD_LOCAL: 34,
  STORE_LOCAL: 35,
  LOAD_GLOBAL: 36,
  STORE_GLOBAL: 37,
  PRINT: 38,
  PRINT_CHAR: 39,
  PRINT_STR: 40,
  READ: 41,
  HALT: 42,
  DEBUG: 43,
} as const;
export type Opcode = typeof Opcode[keyof typeof Opcode];

/** Operand encoding: fixed byte count, or a NUL-terminated string. */
export type OperandSize = 0 | 1 | 4 | 'string';

export interface OpcodeInfo {
  opcode: Opcode;
  mnemonic: string;
  operandSize: OperandSize;
}

export const VmStatus = {
  IDLE: 'idle',
  RUNNING: 'running',
  HALTED: 'halted',
  FAULTED: 'faulted',
} as const;
export type VmStatus = typeof VmStatus[keyof typeof VmStatus];

export const FaultKind = {
  STACK_OVERFLOW: 'stack_overflow',
  STACK_UNDERFLOW: 'stack_underflow',
  CALL_STACK_OVERFLOW: 'call_stack_overflow',
  CALL_STACK_UNDERFLOW: 'call_stack_underflow',
  INVALID_OPCODE: 'invalid_opcode',
  DIVISION_BY_ZERO: 'division_by_zero',
  OUT_OF_BOUNDS: 'out_of_bounds',
  INVALID_ADDRESS: 'invalid_address',
} as const;
export type FaultKind = typeof FaultKind[keyof typeof FaultKind];

export interface VmFault {
  kind: FaultKind;
  message: string;
  /** Program counter at the time of the fault (already past the fetched bytes). */
  pc: number;
  sp: number;
  /** Index of the active frame, -1 when none. */
  fp: number;
  /** Address of the instruction that faulted. */
  address: number;
  opcode: number;
}

export interface FrameSnapshot {
  returnAddress: number;
  stackBase: number;
  locals: Word32[];
}

export interface VmSnapshot {
  status: VmStatus;
  pc: number;
  sp: number;
  fp: number;
  stack: Word32[];          // bottom to top
  globals: Word32[];
  frames: FrameSnapshot[];  // outermost first
  instructionCount: number;
  fault: VmFault | null;
}

export interface RunResult {
  status: VmStatus;
  fault: VmFault | null;
  instructionCount: number;
  stack: Word32[];
}

export const AssemblyErrorKind = {
  UNKNOWN_MNEMONIC: 'unknown_mnemonic',
  MISSING_OPERAND: 'missing_operand',
  INVALID_OPERAND: 'invalid_operand',
  UNTERMINATED_STRING: 'unterminated_string',
  DUPLICATE_LABEL: 'duplicate_label',
  UNDEFINED_LABEL: 'undefined_label',
  TOO_MANY_LABELS: 'too_many_labels',
  CODE_OVERFLOW: 'code_overflow',
  INTERNAL: 'internal',
} as const;
export type AssemblyErrorKind = typeof AssemblyErrorKind[keyof typeof AssemblyErrorKind];

export interface AssemblyError {
  kind: AssemblyErrorKind;
  line: number;
  col: number;
  message: string;
  /** The offending source line, untrimmed. */
  text: string;
}

export type AssembleResult =
  | { ok: true; code: Uint8Array; symbols: Map<string, number>; size: number }
  | { ok: false; error: AssemblyError };
