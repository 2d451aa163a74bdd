/**
 * Instruction chain
 *
 * A driver hands the machine an already-resolved sequence of steps. Each
 * instruction does its work and returns the next one, forming a linked
 * chain that `Session.run` follows until it reaches null.
 */

import type { Session } from './session.js';
import type { Value } from './value.js';

export abstract class Insn {
  /**
   * @returns The next instruction to execute, or null if done
   */
  abstract execute(session: Session): Insn | null;
}

/**
 * Push a constant value onto the stack
 */
export class ConstantInsn extends Insn {
  constructor(
    private readonly value: Value,
    private readonly next: Insn | null
  ) {
    super();
  }

  execute(session: Session): Insn | null {
    session.push(this.value);
    return this.next;
  }
}

/**
 * Invoke a primitive by name or alias
 */
export class PrimitiveCallInsn extends Insn {
  constructor(
    public readonly name: string,
    private readonly next: Insn | null
  ) {
    super();
  }

  execute(session: Session): Insn | null {
    session.invoke(this.name);
    return this.next;
  }
}

export type Step = { op: string } | { value: Value };

/**
 * Link steps into a chain, first step first
 */
export function buildChain(steps: readonly Step[]): Insn | null {
  let next: Insn | null = null;
  for (let i = steps.length - 1; i >= 0; i--) {
    const step = steps[i];
    next = 'op' in step ? new PrimitiveCallInsn(step.op, next) : new ConstantInsn(step.value, next);
  }
  return next;
}
