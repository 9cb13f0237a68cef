import { describe, it, expect } from 'vitest';
import { OperandStack, FrameStack, createFrame } from './stack';
import { FaultKind } from './types';

describe('OperandStack', () => {
  it('pushes and pops in LIFO order', () => {
    const stack = new OperandStack(4);
    stack.push(1);
    stack.push(2);
    expect(stack.toArray()).toEqual([1, 2]);
    expect(stack.pop()).toEqual({ ok: true, value: 2 });
    expect(stack.depth).toBe(1);
  });

  it('reports overflow without writing', () => {
    const stack = new OperandStack(2);
    expect(stack.push(1)).toBeNull();
    expect(stack.push(2)).toBeNull();
    expect(stack.push(3)).toBe(FaultKind.STACK_OVERFLOW);
    expect(stack.toArray()).toEqual([1, 2]);
  });

  it('reports underflow on pop and peek', () => {
    const stack = new OperandStack(2);
    expect(stack.pop()).toEqual({ ok: false, fault: FaultKind.STACK_UNDERFLOW });
    stack.push(5);
    expect(stack.peek()).toEqual({ ok: true, value: 5 });
    expect(stack.peek(1)).toEqual({ ok: false, fault: FaultKind.STACK_UNDERFLOW });
  });
});

describe('FrameStack', () => {
  it('tracks the innermost frame', () => {
    const frames = new FrameStack(2);
    expect(frames.current()).toBeNull();
    frames.push(createFrame(10, 0));
    frames.push(createFrame(20, 3));
    expect(frames.current()?.returnAddress).toBe(20);
    expect(frames.toArray().map(f => f.stackBase)).toEqual([0, 3]);
  });

  it('creates frames with zeroed locals', () => {
    expect(Array.from(createFrame(0, 0).locals)).toEqual(new Array(16).fill(0));
  });

  it('reports overflow and underflow', () => {
    const frames = new FrameStack(1);
    expect(frames.push(createFrame(1, 0))).toBeNull();
    expect(frames.push(createFrame(2, 0))).toBe(FaultKind.CALL_STACK_OVERFLOW);
    expect(frames.pop().ok).toBe(true);
    expect(frames.pop()).toEqual({ ok: false, fault: FaultKind.CALL_STACK_UNDERFLOW });
  });
});
