/**
 * Bytecode execution engine.
 *
 * One instance owns one program and all of its run state: operand stack,
 * call frames, globals and program counter. Nothing is shared between
 * instances. Faults stop the engine and leave the state inspectable through
 * getSnapshot(); they are never thrown.
 */
import { OperandStack, FrameStack, createFrame } from './stack';
import {
  STACK_SIZE, CALL_STACK_SIZE, LOCALS_SIZE, GLOBALS_SIZE,
  FAULT_MESSAGES, lookupOpcode,
} from './constants';
import { readU32, readI32, readCString, encodeString } from './encoding';
import { formatStackDump, formatTracePrefix } from './trace';
import { EMPTY_INPUT, NULL_OUTPUT, NULL_DIAGNOSTICS } from './io';
import type { OutputSink, InputSource, DiagnosticSink } from './io';
import { Opcode, VmStatus, FaultKind } from './types';
import type { Word32, VmFault, VmSnapshot, RunResult } from './types';

export interface VmOptions {
  /** Log one line per executed instruction to the diagnostic sink. */
  trace?: boolean;
  output?: OutputSink;
  input?: InputSource;
  /** Traces, DEBUG dumps and fault reports. Discarded when omitted. */
  diagnostics?: DiagnosticSink;
}

const toI32 = (n: number): Word32 => n | 0;
const truth = (b: boolean): Word32 => (b ? 1 : 0);

export class VirtualMachine {
  private readonly code: Uint8Array;
  private readonly stack = new OperandStack(STACK_SIZE);
  private readonly frames = new FrameStack(CALL_STACK_SIZE);
  private readonly globals = new Int32Array(GLOBALS_SIZE);

  private pc = 0;
  private state: VmStatus = VmStatus.IDLE;
  private fault: VmFault | null = null;
  private instructionCount = 0;

  // Instruction being executed, for fault reports
  private instrAddr = 0;
  private instrOpcode = 0;

  private readonly trace: boolean;
  private readonly output: OutputSink;
  private readonly input: InputSource;
  private readonly diagnostics: DiagnosticSink;

  constructor(code: Uint8Array, options: VmOptions = {}) {
    // Private copy: the program is never mutated during a run
    this.code = Uint8Array.from(code);
    this.trace = options.trace ?? false;
    this.output = options.output ?? NULL_OUTPUT;
    this.input = options.input ?? EMPTY_INPUT;
    this.diagnostics = options.diagnostics ?? NULL_DIAGNOSTICS;
  }

  get status(): VmStatus {
    return this.state;
  }

  get running(): boolean {
    return this.state === VmStatus.RUNNING;
  }

  get codeSize(): number {
    return this.code.length;
  }

  reset(): void {
    this.stack.reset();
    this.frames.reset();
    this.globals.fill(0);
    this.pc = 0;
    this.state = VmStatus.IDLE;
    this.fault = null;
    this.instructionCount = 0;
  }

  /**
   * Run from address 0 until HALT, a return from the outermost routine,
   * the end of the code, or a fault.
   */
  run(): RunResult {
    this.reset();
    while (this.step()) {
      // step() does the work
    }
    return {
      status: this.state,
      fault: this.fault,
      instructionCount: this.instructionCount,
      stack: this.stack.toArray(),
    };
  }

  /**
   * Execute one instruction. An idle machine starts at the current PC.
   * Returns true while the machine is still running.
   */
  step(): boolean {
    if (this.state === VmStatus.IDLE) this.state = VmStatus.RUNNING;
    if (this.state !== VmStatus.RUNNING) return false;
    if (this.pc >= this.code.length) {
      this.state = VmStatus.HALTED;
      return false;
    }

    const addr = this.pc;
    const byte = this.code[this.pc++];
    this.instrAddr = addr;
    this.instrOpcode = byte;
    const prefix = this.trace ? formatTracePrefix(this.code, addr) : '';

    const info = lookupOpcode(byte);
    if (info) {
      this.execute(info.opcode);
    } else {
      this.raise(FaultKind.INVALID_OPCODE);
    }

    if (this.trace) {
      this.diagnostics.log(this.running ? prefix + formatStackDump(this.stack.toArray()) : prefix.trimEnd());
    }
    this.instructionCount++;
    return this.running;
  }

  getSnapshot(): VmSnapshot {
    return {
      status: this.state,
      pc: this.pc,
      sp: this.stack.depth,
      fp: this.frames.depth - 1,
      stack: this.stack.toArray(),
      globals: Array.from(this.globals),
      frames: this.frames.toArray().map(f => ({
        returnAddress: f.returnAddress,
        stackBase: f.stackBase,
        locals: Array.from(f.locals),
      })),
      instructionCount: this.instructionCount,
      fault: this.fault,
    };
  }

  // ========================================================================
  // Faults
  // ========================================================================

  private raise(kind: FaultKind): void {
    const message = FAULT_MESSAGES[kind];
    this.fault = {
      kind,
      message,
      pc: this.pc,
      sp: this.stack.depth,
      fp: this.frames.depth - 1,
      address: this.instrAddr,
      opcode: this.instrOpcode,
    };
    this.state = VmStatus.FAULTED;
    this.diagnostics.error(`VM fault at PC=${this.fault.pc}: ${message}`);
    this.diagnostics.error(`Stack pointer: ${this.fault.sp}, Frame pointer: ${this.fault.fp}`);
  }

  // ========================================================================
  // Stack and operand helpers (null/false once a fault was raised)
  // ========================================================================

  private push(value: Word32): boolean {
    const fault = this.stack.push(toI32(value));
    if (fault) {
      this.raise(fault);
      return false;
    }
    return true;
  }

  private pop(): Word32 | null {
    const read = this.stack.pop();
    if (!read.ok) {
      this.raise(read.fault);
      return null;
    }
    return read.value;
  }

  private peek(offset: number): Word32 | null {
    const read = this.stack.peek(offset);
    if (!read.ok) {
      this.raise(read.fault);
      return null;
    }
    return read.value;
  }

  /** Pops b then a. */
  private popPair(): [Word32, Word32] | null {
    const b = this.pop();
    if (b === null) return null;
    const a = this.pop();
    if (a === null) return null;
    return [a, b];
  }

  private binary(op: (a: Word32, b: Word32) => Word32): void {
    const pair = this.popPair();
    if (pair) this.push(op(pair[0], pair[1]));
  }

  private unary(op: (a: Word32) => Word32): void {
    const a = this.pop();
    if (a !== null) this.push(op(a));
  }

  private divide(op: (a: Word32, b: Word32) => Word32): void {
    const pair = this.popPair();
    if (!pair) return;
    if (pair[1] === 0) {
      this.raise(FaultKind.DIVISION_BY_ZERO);
      return;
    }
    this.push(op(pair[0], pair[1]));
  }

  private readOperandU32(): number | null {
    if (this.pc + 4 > this.code.length) {
      this.raise(FaultKind.INVALID_ADDRESS);
      return null;
    }
    const value = readU32(this.code, this.pc);
    this.pc += 4;
    return value;
  }

  private readOperandI32(): Word32 | null {
    if (this.pc + 4 > this.code.length) {
      this.raise(FaultKind.INVALID_ADDRESS);
      return null;
    }
    const value = readI32(this.code, this.pc);
    this.pc += 4;
    return value;
  }

  private readOperandByte(): number | null {
    if (this.pc >= this.code.length) {
      this.raise(FaultKind.INVALID_ADDRESS);
      return null;
    }
    return this.code[this.pc++];
  }

  /** A target equal to the code size ends the run like falling off the end. */
  private jump(target: number): void {
    if (target > this.code.length) {
      this.raise(FaultKind.INVALID_ADDRESS);
      return;
    }
    this.pc = target;
  }

  // ========================================================================
  // Dispatch
  // ========================================================================

  private execute(opcode: Opcode): void {
    switch (opcode) {
      case Opcode.NOP:
        return;

      case Opcode.PUSH: {
        const value = this.readOperandI32();
        if (value !== null) this.push(value);
        return;
      }

      case Opcode.POP:
        this.pop();
        return;

      case Opcode.DUP: {
        const a = this.peek(0);
        if (a !== null) this.push(a);
        return;
      }

      case Opcode.SWAP: {
        const pair = this.popPair();
        if (pair && this.push(pair[1])) this.push(pair[0]);
        return;
      }

      case Opcode.OVER: {
        const a = this.peek(1);
        if (a !== null) this.push(a);
        return;
      }

      // Arithmetic wraps modulo 2^32
      case Opcode.ADD: return this.binary((a, b) => a + b);
      case Opcode.SUB: return this.binary((a, b) => a - b);
      case Opcode.MUL: return this.binary((a, b) => Math.imul(a, b));
      case Opcode.DIV: return this.divide((a, b) => Math.trunc(a / b));
      case Opcode.MOD: return this.divide((a, b) => a % b);
      case Opcode.NEG: return this.unary(a => -a);
      case Opcode.INC: return this.unary(a => a + 1);
      case Opcode.DEC: return this.unary(a => a - 1);

      case Opcode.EQ: return this.binary((a, b) => truth(a === b));
      case Opcode.NE: return this.binary((a, b) => truth(a !== b));
      case Opcode.LT: return this.binary((a, b) => truth(a < b));
      case Opcode.LE: return this.binary((a, b) => truth(a <= b));
      case Opcode.GT: return this.binary((a, b) => truth(a > b));
      case Opcode.GE: return this.binary((a, b) => truth(a >= b));

      case Opcode.AND: return this.binary((a, b) => truth(a !== 0 && b !== 0));
      case Opcode.OR: return this.binary((a, b) => truth(a !== 0 || b !== 0));
      case Opcode.NOT: return this.unary(a => truth(a === 0));
      case Opcode.BAND: return this.binary((a, b) => a & b);
      case Opcode.BOR: return this.binary((a, b) => a | b);
      case Opcode.BNOT: return this.unary(a => ~a);
      case Opcode.XOR: return this.binary((a, b) => a ^ b);
      // Shift counts are taken modulo 32
      case Opcode.SHL: return this.binary((a, b) => a << b);
      case Opcode.SHR: return this.binary((a, b) => a >>> b);

      case Opcode.JMP: {
        const target = this.readOperandU32();
        if (target !== null) this.jump(target);
        return;
      }

      case Opcode.JZ:
      case Opcode.JNZ: {
        const target = this.readOperandU32();
        if (target === null) return;
        const cond = this.pop();
        if (cond === null) return;
        if ((cond === 0) === (opcode === Opcode.JZ)) this.jump(target);
        return;
      }

      case Opcode.CALL: {
        const target = this.readOperandU32();
        if (target === null) return;
        if (target > this.code.length) {
          this.raise(FaultKind.INVALID_ADDRESS);
          return;
        }
        const fault = this.frames.push(createFrame(this.pc, this.stack.depth));
        if (fault) {
          this.raise(fault);
          return;
        }
        this.pc = target;
        return;
      }

      case Opcode.RET: {
        // Returning from the outermost routine ends the program
        if (this.frames.depth === 0) {
          this.state = VmStatus.HALTED;
          return;
        }
        const popped = this.frames.pop();
        if (!popped.ok) {
          this.raise(popped.fault);
          return;
        }
        this.pc = popped.frame.returnAddress;
        return;
      }

      case Opcode.LOAD_LOCAL: {
        const index = this.readOperandByte();
        if (index === null) return;
        if (index >= LOCALS_SIZE) {
          this.raise(FaultKind.OUT_OF_BOUNDS);
          return;
        }
        // Top-level code has no frame: locals alias the globals
        const frame = this.frames.current();
        this.push(frame ? frame.locals[index] : this.globals[index]);
        return;
      }

      case Opcode.STORE_LOCAL: {
        const index = this.readOperandByte();
        if (index === null) return;
        if (index >= LOCALS_SIZE) {
          this.raise(FaultKind.OUT_OF_BOUNDS);
          return;
        }
        const value = this.pop();
        if (value === null) return;
        const frame = this.frames.current();
        if (frame) frame.locals[index] = value;
        else this.globals[index] = value;
        return;
      }

      case Opcode.LOAD_GLOBAL: {
        const index = this.readOperandU32();
        if (index === null) return;
        if (index >= GLOBALS_SIZE) {
          this.raise(FaultKind.OUT_OF_BOUNDS);
          return;
        }
        this.push(this.globals[index]);
        return;
      }

      case Opcode.STORE_GLOBAL: {
        const index = this.readOperandU32();
        if (index === null) return;
        if (index >= GLOBALS_SIZE) {
          this.raise(FaultKind.OUT_OF_BOUNDS);
          return;
        }
        const value = this.pop();
        if (value !== null) this.globals[index] = value;
        return;
      }

      case Opcode.PRINT: {
        const a = this.pop();
        if (a !== null) this.output.write(encodeString(`${a}\n`));
        return;
      }

      case Opcode.PRINT_CHAR: {
        const a = this.pop();
        if (a !== null) this.output.write(Uint8Array.of(a & 0xFF));
        return;
      }

      case Opcode.PRINT_STR: {
        const str = readCString(this.code, this.pc);
        if (!str) {
          this.raise(FaultKind.INVALID_ADDRESS);
          return;
        }
        this.output.write(str.bytes.slice());
        this.pc = str.next;
        return;
      }

      case Opcode.READ:
        this.push(this.input.readInt() ?? 0);
        return;

      case Opcode.HALT:
        this.state = VmStatus.HALTED;
        return;

      case Opcode.DEBUG:
        this.diagnostics.log(formatStackDump(this.stack.toArray()));
        return;

      default: {
        const unhandled: never = opcode;
        throw new Error(`Unhandled opcode ${String(unhandled)}`);
      }
    }
  }
}

/** Run a program in a fresh machine. */
export function runProgram(code: Uint8Array, options: VmOptions = {}): { result: RunResult; vm: VirtualMachine } {
  const vm = new VirtualMachine(code, options);
  const result = vm.run();
  return { result, vm };
}
