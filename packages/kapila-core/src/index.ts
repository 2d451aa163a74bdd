/**
 * Kapila Core - stack machine for the Kapila concatenative language
 *
 * This is the core library containing:
 * - Value model (integer, float, boolean, text, list)
 * - Allocation tracker and operand stack
 * - Primitive operations and vocabulary aliases
 * - Session lifecycle and instruction chains
 */

export { RuntimeFault, isRuntimeFault, type FaultKind } from './machine/errors.js';
export { OK, defaulted, type Outcome } from './machine/outcome.js';
export {
  type Value,
  type ValueKind,
  type TextOwnership,
  IntegerValue,
  FloatValue,
  BooleanValue,
  TextValue,
  ListValue,
  SharedList,
  INITIAL_LIST_CAPACITY,
  makeInteger,
  makeFloat,
  makeBoolean,
  makeText,
  wrapInteger,
  isNumeric,
} from './machine/value.js';
export { AllocationTracker, TrackedBuffer, type ByteBuffer, type SlotBuffer } from './machine/tracker.js';
export { OperandStack, DEFAULT_STACK_CAPACITY } from './machine/stack.js';
export {
  getPrimitive,
  primitiveNames,
  listPrimitives,
  valuesEqual,
  PRIMITIVE_ALIASES,
  type Primitive,
  type PrimitiveCategory,
  type PrimitiveFunction,
} from './machine/primitives.js';
export { VOCABULARY, vocabularyTarget, wordsFor } from './machine/vocabulary.js';
export { formatFloat, renderValue, TRUE_TOKEN, FALSE_TOKEN } from './machine/format.js';
export { Insn, ConstantInsn, PrimitiveCallInsn, buildChain, type Step } from './machine/insn.js';
export {
  Session,
  type SessionOptions,
  type OperandPolicy,
  type OutputSink,
} from './machine/session.js';
