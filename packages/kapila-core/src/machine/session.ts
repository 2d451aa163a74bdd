/**
 * Session - one init-to-finalize lifetime of the machine
 *
 * The session owns the operand stack and the allocation tracker. Every
 * primitive receives it, so independent sessions never share state.
 */

import { RuntimeFault } from './errors.js';
import type { Insn } from './insn.js';
import { OK, defaulted, type Outcome } from './outcome.js';
import { getPrimitive } from './primitives.js';
import { DEFAULT_STACK_CAPACITY, OperandStack } from './stack.js';
import { AllocationTracker } from './tracker.js';
import {
  type Value,
  ListValue,
  SharedList,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeText,
} from './value.js';

export interface OutputSink {
  write(chunk: string): void;
}

/**
 * lenient: bad operands to text, list and I/O operations push a default.
 * strict: they raise an OperandRejected fault and leave the stack alone.
 */
export type OperandPolicy = 'lenient' | 'strict';

export interface SessionOptions {
  stackCapacity?: number;
  /** Maximum number of live tracked buffers */
  allocationLimit?: number;
  output?: OutputSink;
  operandPolicy?: OperandPolicy;
  /** Called whenever an operation falls back to a default */
  onDefault?: (operation: string, reason: string) => void;
}

const stdoutSink: OutputSink = {
  write(chunk: string): void {
    process.stdout.write(chunk);
  },
};

export class Session {
  readonly stack: OperandStack;
  readonly tracker: AllocationTracker;
  readonly output: OutputSink;
  readonly operandPolicy: OperandPolicy;
  private readonly onDefault: ((operation: string, reason: string) => void) | null;

  /** Outcome of the most recent primitive invocation */
  lastOutcome: Outcome | null = null;

  private open = false;

  constructor(options: SessionOptions = {}) {
    this.stack = new OperandStack(options.stackCapacity ?? DEFAULT_STACK_CAPACITY);
    this.tracker = new AllocationTracker(options.allocationLimit);
    this.output = options.output ?? stdoutSink;
    this.operandPolicy = options.operandPolicy ?? 'lenient';
    this.onDefault = options.onDefault ?? null;
    this.init();
  }

  get isOpen(): boolean {
    return this.open;
  }

  get depth(): number {
    return this.stack.depth;
  }

  /**
   * Reset stack and tracker and open the session
   */
  init(): void {
    this.tracker.releaseAll();
    this.stack.clear();
    this.lastOutcome = null;
    this.open = true;
  }

  /**
   * Release every tracked allocation, clear the stack and close the session.
   *
   * @returns Number of buffers released
   */
  finalize(): number {
    const released = this.tracker.releaseAll();
    this.stack.clear();
    this.lastOutcome = null;
    this.open = false;
    return released;
  }

  push(value: Value): void {
    this.ensureOpen();
    this.stack.push(value);
  }

  pushInteger(value: number | bigint): void {
    this.push(makeInteger(value));
  }

  pushFloat(value: number): void {
    this.push(makeFloat(value));
  }

  pushBoolean(value: boolean): void {
    this.push(makeBoolean(value));
  }

  /** Push a borrowed text literal */
  pushText(literal: string): void {
    this.push(makeText(literal));
  }

  /**
   * Push a reference to `list`, or to a new empty list
   */
  pushList(list?: SharedList): ListValue {
    this.ensureOpen();
    this.stack.reserve(1);
    const value = new ListValue(list ?? this.newList());
    this.stack.push(value);
    return value;
  }

  newList(): SharedList {
    this.ensureOpen();
    return SharedList.create(this.tracker);
  }

  pop(): Value {
    this.ensureOpen();
    return this.stack.pop();
  }

  peek(): Value {
    this.ensureOpen();
    return this.stack.peek();
  }

  /**
   * Run one primitive by canonical name, symbol alias or vocabulary word
   */
  invoke(name: string): Outcome {
    this.ensureOpen(name);
    const primitive = getPrimitive(name);
    if (!primitive) {
      throw new RuntimeFault('UnknownOperation', `unknown operation '${name}'`);
    }

    if (process.env.DEBUG_KAPILA) {
      console.error(`[invoke] ${name} -> ${primitive.name}, depth=${this.stack.depth}`);
    }

    const outcome = primitive.run(this);
    this.lastOutcome = outcome;
    return outcome;
  }

  /**
   * Execute an instruction chain to completion
   */
  run(insn: Insn | null): void {
    this.ensureOpen();
    while (insn) {
      insn = insn.execute(this);
    }
  }

  /**
   * Operands of an operation, bottom to top, left on the stack
   */
  operands(count: number, operation: string): Value[] {
    this.stack.require(count, operation);
    const values: Value[] = [];
    for (let i = count - 1; i >= 0; i--) {
      values.push(this.stack.peekAt(i, operation));
    }
    return values;
  }

  /**
   * Replace the top `consumed` values with `results`. Checks capacity
   * first so an overflow leaves the stack untouched.
   */
  complete(operation: string, consumed: number, ...results: Value[]): Outcome {
    this.stack.require(consumed, operation);
    this.stack.reserve(results.length - consumed, operation);
    for (let i = 0; i < consumed; i++) {
      this.stack.pop(operation);
    }
    for (const result of results) {
      this.stack.push(result, operation);
    }
    return OK;
  }

  /**
   * Silent-failure exit: drop the operands and push `fallback`, or raise
   * under the strict operand policy.
   */
  fallback(
    operation: string,
    consumed: number,
    reason: string,
    fallback: Value | (() => Value) | null
  ): Outcome {
    if (this.operandPolicy === 'strict') {
      throw new RuntimeFault('OperandRejected', reason, operation);
    }
    if (fallback === null) {
      this.complete(operation, consumed);
    } else {
      this.complete(operation, consumed, typeof fallback === 'function' ? fallback() : fallback);
    }

    if (process.env.DEBUG_KAPILA) {
      console.error(`[fallback] ${operation}: ${reason}`);
    }
    this.onDefault?.(operation, reason);
    return defaulted(reason);
  }

  write(chunk: string): void {
    this.output.write(chunk);
  }

  private ensureOpen(operation: string | null = null): void {
    if (!this.open) {
      throw new RuntimeFault('SessionClosed', 'session is not initialized', operation);
    }
  }
}
