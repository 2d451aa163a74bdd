/**
 * Result of one primitive invocation.
 *
 * `defaulted` means the operation could not do its job with the operands
 * it was given and pushed a benign default instead.
 */
export type Outcome =
  | { status: 'ok' }
  | { status: 'defaulted'; reason: string };

export const OK: Outcome = { status: 'ok' };

export function defaulted(reason: string): Outcome {
  return { status: 'defaulted', reason };
}
