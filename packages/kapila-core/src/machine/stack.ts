/**
 * Operand stack - fixed-capacity LIFO of values
 */

import { RuntimeFault } from './errors.js';
import type { Value } from './value.js';

export const DEFAULT_STACK_CAPACITY = 1024;

export class OperandStack {
  /** Stack pointer - points to next free slot */
  private sp: number = 0;

  private readonly slots: Array<Value | undefined>;

  constructor(public readonly capacity: number = DEFAULT_STACK_CAPACITY) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RuntimeFault('InvalidOperand', `invalid stack capacity ${capacity}`);
    }
    this.slots = new Array<Value | undefined>(capacity).fill(undefined);
  }

  get depth(): number {
    return this.sp;
  }

  push(value: Value, operation: string | null = null): void {
    if (this.sp >= this.capacity) {
      throw new RuntimeFault('StackOverflow', `stack is full (${this.capacity} values)`, operation);
    }
    this.slots[this.sp++] = value;
  }

  pop(operation: string | null = null): Value {
    const value = this.slot(this.sp - 1, operation);
    this.slots[--this.sp] = undefined;
    return value;
  }

  peek(operation: string | null = null): Value {
    return this.slot(this.sp - 1, operation);
  }

  /**
   * Value `n` slots below the top; `peekAt(0)` is the top
   */
  peekAt(n: number, operation: string | null = null): Value {
    return this.slot(this.sp - 1 - n, operation);
  }

  /**
   * Fail unless at least `n` values are present
   */
  require(n: number, operation: string | null = null): void {
    if (this.sp < n) {
      throw new RuntimeFault('StackUnderflow', `needs ${n} values, stack holds ${this.sp}`, operation);
    }
  }

  /**
   * Fail unless `n` more values fit
   */
  reserve(n: number, operation: string | null = null): void {
    if (this.sp + n > this.capacity) {
      throw new RuntimeFault('StackOverflow', `stack is full (${this.capacity} values)`, operation);
    }
  }

  clear(): void {
    this.slots.fill(undefined, 0, this.sp);
    this.sp = 0;
  }

  /** Contents from bottom to top */
  toArray(): Value[] {
    const result: Value[] = [];
    for (let i = 0; i < this.sp; i++) {
      result.push(this.slot(i, null));
    }
    return result;
  }

  private slot(index: number, operation: string | null): Value {
    const value = index >= 0 && index < this.sp ? this.slots[index] : undefined;
    if (value === undefined) {
      const message = this.sp === 0 ? 'stack is empty' : `stack holds only ${this.sp} values`;
      throw new RuntimeFault('StackUnderflow', message, operation);
    }
    return value;
  }
}
