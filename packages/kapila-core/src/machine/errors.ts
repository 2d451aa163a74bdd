/**
 * Runtime faults - contract violations that abort the current operation
 */

export type FaultKind =
  | 'StackUnderflow'
  | 'StackOverflow'
  | 'OutOfMemory'
  | 'TypeMismatch'
  | 'DivisionByZero'
  | 'UnknownOperation'
  | 'SessionClosed'
  | 'UseAfterRelease'
  | 'InvalidOperand'
  | 'OperandRejected';

/**
 * Raised for every condition the machine refuses to continue past.
 * The stack is left as it was before the failing operation.
 */
export class RuntimeFault extends Error {
  constructor(
    public readonly kind: FaultKind,
    message: string,
    public readonly operation: string | null = null
  ) {
    super(operation ? `${operation}: ${message}` : message);
    this.name = 'RuntimeFault';
  }
}

export function isRuntimeFault(error: unknown): error is RuntimeFault {
  return error instanceof RuntimeFault;
}
