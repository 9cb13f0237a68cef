/**
 * Fixed-capacity stacks for the VM. Unlike a circular hardware stack these
 * never wrap: every accessor bounds-checks and hands back a fault kind
 * instead of touching memory outside the buffer.
 */
import { FaultKind } from './types';
import type { Word32 } from './types';
import { LOCALS_SIZE } from './constants';

export type StackRead =
  | { ok: true; value: Word32 }
  | { ok: false; fault: FaultKind };

export class OperandStack {
  private sp = 0;
  private readonly body: Int32Array;
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
    this.body = new Int32Array(capacity);
  }

  /** Index of the next free slot. */
  get depth(): number {
    return this.sp;
  }

  push(value: Word32): FaultKind | null {
    if (this.sp >= this.capacity) return FaultKind.STACK_OVERFLOW;
    this.body[this.sp++] = value;
    return null;
  }

  pop(): StackRead {
    if (this.sp <= 0) return { ok: false, fault: FaultKind.STACK_UNDERFLOW };
    return { ok: true, value: this.body[--this.sp] };
  }

  /** Value `offset` entries below the top (0 = top). */
  peek(offset: number = 0): StackRead {
    const index = this.sp - 1 - offset;
    if (offset < 0 || index < 0) return { ok: false, fault: FaultKind.STACK_UNDERFLOW };
    return { ok: true, value: this.body[index] };
  }

  /** Values from bottom to top. */
  toArray(): Word32[] {
    return Array.from(this.body.subarray(0, this.sp));
  }

  reset(): void {
    this.sp = 0;
    this.body.fill(0);
  }
}

export interface CallFrame {
  returnAddress: number;
  locals: Int32Array;
  /** Operand-stack depth when the frame was pushed. */
  stackBase: number;
}

export function createFrame(returnAddress: number, stackBase: number): CallFrame {
  return { returnAddress, stackBase, locals: new Int32Array(LOCALS_SIZE) };
}

export type FramePop =
  | { ok: true; frame: CallFrame }
  | { ok: false; fault: FaultKind };

export class FrameStack {
  private readonly frames: CallFrame[] = [];
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  get depth(): number {
    return this.frames.length;
  }

  push(frame: CallFrame): FaultKind | null {
    if (this.frames.length >= this.capacity) return FaultKind.CALL_STACK_OVERFLOW;
    this.frames.push(frame);
    return null;
  }

  pop(): FramePop {
    const frame = this.frames.pop();
    if (!frame) return { ok: false, fault: FaultKind.CALL_STACK_UNDERFLOW };
    return { ok: true, frame };
  }

  /** Innermost frame, or null at top level. */
  current(): CallFrame | null {
    return this.frames.length > 0 ? this.frames[this.frames.length - 1] : null;
  }

  /** Outermost first. */
  toArray(): CallFrame[] {
    return [...this.frames];
  }

  reset(): void {
    this.frames.length = 0;
  }
}
