/**
 * Operand stack tests
 */

import { describe, it, expect } from 'vitest';
import { OperandStack, DEFAULT_STACK_CAPACITY } from './stack.js';
import { makeInteger, makeText } from './value.js';
import { faultOf } from './testing.js';

describe('OperandStack', () => {
  it('should start empty with the default capacity', () => {
    const stack = new OperandStack();

    expect(stack.depth).toBe(0);
    expect(stack.capacity).toBe(DEFAULT_STACK_CAPACITY);
    expect(DEFAULT_STACK_CAPACITY).toBe(1024);
  });

  it('should pop in last-in-first-out order', () => {
    const stack = new OperandStack();
    const one = makeInteger(1);
    const two = makeInteger(2);
    stack.push(one);
    stack.push(two);

    expect(stack.pop()).toBe(two);
    expect(stack.pop()).toBe(one);
    expect(stack.depth).toBe(0);
  });

  it('should peek without removing', () => {
    const stack = new OperandStack();
    const value = makeText('top');
    stack.push(value);

    expect(stack.peek()).toBe(value);
    expect(stack.depth).toBe(1);
  });

  it('should peek below the top', () => {
    const stack = new OperandStack();
    const bottom = makeInteger(1);
    const top = makeInteger(2);
    stack.push(bottom);
    stack.push(top);

    expect(stack.peekAt(0)).toBe(top);
    expect(stack.peekAt(1)).toBe(bottom);
    expect(faultOf(() => stack.peekAt(2))?.message).toBe('stack holds only 2 values');
  });

  it('should fault on pop and peek of an empty stack', () => {
    const stack = new OperandStack();

    expect(faultOf(() => stack.pop())?.kind).toBe('StackUnderflow');
    expect(faultOf(() => stack.peek('dup'))?.message).toBe('dup: stack is empty');
  });

  it('should fault on push past capacity', () => {
    const stack = new OperandStack(2);
    stack.push(makeInteger(1));
    stack.push(makeInteger(2));

    const fault = faultOf(() => stack.push(makeInteger(3)));
    expect(fault?.kind).toBe('StackOverflow');
    expect(fault?.message).toBe('stack is full (2 values)');
    expect(stack.depth).toBe(2);
  });

  it('should check depth and headroom', () => {
    const stack = new OperandStack(3);
    stack.push(makeInteger(1));

    expect(() => stack.require(1)).not.toThrow();
    expect(faultOf(() => stack.require(2, 'swap'))?.message).toBe('swap: needs 2 values, stack holds 1');
    expect(() => stack.reserve(2)).not.toThrow();
    expect(faultOf(() => stack.reserve(3))?.kind).toBe('StackOverflow');
  });

  it('should list contents bottom to top and clear', () => {
    const stack = new OperandStack();
    const a = makeInteger(1);
    const b = makeInteger(2);
    stack.push(a);
    stack.push(b);

    expect(stack.toArray()).toEqual([a, b]);

    stack.clear();
    expect(stack.depth).toBe(0);
    expect(stack.toArray()).toEqual([]);
  });

  it('should reject a capacity below one', () => {
    expect(faultOf(() => new OperandStack(0))?.kind).toBe('InvalidOperand');
  });
});
