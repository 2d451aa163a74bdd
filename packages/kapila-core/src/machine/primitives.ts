/**
 * Primitive operations - the fixed instruction set of the machine
 *
 * Every primitive reads its operands in `left right` stack order (the right
 * operand is on top), checks them, and only then replaces them with its
 * results. A fault therefore leaves the stack exactly as it was.
 *
 * Arithmetic, comparison and logic treat bad operand types as faults.
 * Text, list and I/O operations fall back to a benign default instead and
 * report it through their Outcome.
 */

import * as fs from 'fs';

import { RuntimeFault } from './errors.js';
import { renderValue } from './format.js';
import { OK, type Outcome } from './outcome.js';
import type { Session } from './session.js';
import { bytesEqual, compareBytes, scalarSpan } from './utf8.js';
import {
  type FloatValue,
  type IntegerValue,
  type Value,
  ListValue,
  SharedList,
  TextValue,
  emptyText,
  isNumeric,
  makeBoolean,
  makeFloat,
  makeInteger,
  wrapInteger,
} from './value.js';
import { vocabularyTarget } from './vocabulary.js';

export type PrimitiveFunction = (session: Session) => Outcome;

export type PrimitiveCategory =
  | 'arithmetic'
  | 'comparison'
  | 'logic'
  | 'stack'
  | 'text'
  | 'list'
  | 'io';

export interface Primitive {
  name: string;
  category: PrimitiveCategory;
  /** Values consumed from the stack */
  arity: number;
  run: PrimitiveFunction;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Arithmetic

interface NumericRule {
  integer: (left: bigint, right: bigint) => bigint;
  float: (left: number, right: number) => number;
}

function numericOperands(session: Session, name: string): [IntegerValue | FloatValue, IntegerValue | FloatValue] {
  const [left, right] = session.operands(2, name);
  if (!isNumeric(left) || !isNumeric(right)) {
    throw new RuntimeFault('TypeMismatch', `expects two numbers, got ${left.kind} and ${right.kind}`, name);
  }
  return [left, right];
}

/**
 * Float if either side is Float, Integer otherwise
 */
function arithmetic(name: string, rule: NumericRule): PrimitiveFunction {
  return (session: Session): Outcome => {
    const [left, right] = numericOperands(session, name);
    if (left.kind === 'float' || right.kind === 'float') {
      return session.complete(name, 2, makeFloat(rule.float(left.numericValue(), right.numericValue())));
    }
    return session.complete(name, 2, wrapInteger(rule.integer(left.value, right.value)));
  };
}

const addPrimitive = arithmetic('add', {
  integer: (a, b) => a + b,
  float: (a, b) => a + b,
});

const subPrimitive = arithmetic('sub', {
  integer: (a, b) => a - b,
  float: (a, b) => a - b,
});

const mulPrimitive = arithmetic('mul', {
  integer: (a, b) => a * b,
  float: (a, b) => a * b,
});

/**
 * Division is always carried out in Float; a zero divisor gives
 * infinity or NaN.
 */
const divPrimitive: PrimitiveFunction = (session) => {
  const [left, right] = numericOperands(session, 'div');
  return session.complete('div', 2, makeFloat(left.numericValue() / right.numericValue()));
};

/**
 * Integer remainder, sign of the dividend
 */
const modPrimitive: PrimitiveFunction = (session) => {
  const [left, right] = session.operands(2, 'mod');
  const dividend = left.asInteger();
  const divisor = right.asInteger();
  if (!dividend || !divisor) {
    throw new RuntimeFault('TypeMismatch', `expects two integers, got ${left.kind} and ${right.kind}`, 'mod');
  }
  if (divisor.value === 0n) {
    throw new RuntimeFault('DivisionByZero', 'modulo by zero', 'mod');
  }
  return session.complete('mod', 2, wrapInteger(dividend.value % divisor.value));
};

// Comparison

/**
 * Sign of `left - right`; NaN when the numbers are unordered
 */
function order(left: Value, right: Value, name: string): number {
  if (isNumeric(left) && isNumeric(right)) {
    const a = left.numericValue();
    const b = right.numericValue();
    if (a < b) return -1;
    if (a > b) return 1;
    return a === b ? 0 : Number.NaN;
  }
  if (left.kind === 'text' && right.kind === 'text') {
    return Math.sign(compareBytes(left.view(), right.view()));
  }
  if (left.kind === 'boolean' && right.kind === 'boolean') {
    return Number(left.value) - Number(right.value);
  }
  throw new RuntimeFault('TypeMismatch', `cannot order ${left.kind} against ${right.kind}`, name);
}

function comparison(name: string, test: (sign: number) => boolean): PrimitiveFunction {
  return (session: Session): Outcome => {
    const [left, right] = session.operands(2, name);
    return session.complete(name, 2, makeBoolean(test(order(left, right, name))));
  };
}

export function valuesEqual(left: Value, right: Value): boolean {
  if (isNumeric(left) && isNumeric(right)) {
    return left.numericValue() === right.numericValue();
  }
  if (left.kind === 'text' && right.kind === 'text') {
    return bytesEqual(left.view(), right.view());
  }
  if (left.kind === 'boolean' && right.kind === 'boolean') {
    return left.value === right.value;
  }
  if (left.kind === 'list' && right.kind === 'list') {
    return left.aliases(right);
  }
  return false;
}

const equalPrimitive: PrimitiveFunction = (session) => {
  const [left, right] = session.operands(2, 'equal');
  return session.complete('equal', 2, makeBoolean(valuesEqual(left, right)));
};

const notEqualPrimitive: PrimitiveFunction = (session) => {
  const [left, right] = session.operands(2, 'not-equal');
  return session.complete('not-equal', 2, makeBoolean(!valuesEqual(left, right)));
};

// Logic

function booleanOperand(value: Value, name: string): boolean {
  const b = value.asBoolean();
  if (!b) {
    throw new RuntimeFault('TypeMismatch', `expects a boolean, got ${value.kind}`, name);
  }
  return b.value;
}

const andPrimitive: PrimitiveFunction = (session) => {
  const [left, right] = session.operands(2, 'and');
  const a = booleanOperand(left, 'and');
  const b = booleanOperand(right, 'and');
  return session.complete('and', 2, makeBoolean(a && b));
};

const orPrimitive: PrimitiveFunction = (session) => {
  const [left, right] = session.operands(2, 'or');
  const a = booleanOperand(left, 'or');
  const b = booleanOperand(right, 'or');
  return session.complete('or', 2, makeBoolean(a || b));
};

const notPrimitive: PrimitiveFunction = (session) => {
  const [value] = session.operands(1, 'not');
  return session.complete('not', 1, makeBoolean(!booleanOperand(value, 'not')));
};

const truePrimitive: PrimitiveFunction = (session) => session.complete('true', 0, makeBoolean(true));

const falsePrimitive: PrimitiveFunction = (session) => session.complete('false', 0, makeBoolean(false));

// Stack manipulation

const dupPrimitive: PrimitiveFunction = (session) => {
  const [a] = session.operands(1, 'dup');
  return session.complete('dup', 1, a, a);
};

const dropPrimitive: PrimitiveFunction = (session) => session.complete('drop', 1);

const swapPrimitive: PrimitiveFunction = (session) => {
  const [a, b] = session.operands(2, 'swap');
  return session.complete('swap', 2, b, a);
};

const overPrimitive: PrimitiveFunction = (session) => {
  const [a, b] = session.operands(2, 'over');
  return session.complete('over', 2, a, b, a);
};

const rotPrimitive: PrimitiveFunction = (session) => {
  const [a, b, c] = session.operands(3, 'rot');
  return session.complete('rot', 3, b, c, a);
};

// Text

const textLengthPrimitive: PrimitiveFunction = (session) => {
  const [value] = session.operands(1, 'text-length');
  const text = value.asText();
  if (!text) {
    return session.fallback('text-length', 1, `expects text, got ${value.kind}`, makeInteger(0));
  }
  return session.complete('text-length', 1, makeInteger(text.length));
};

/**
 * New owned buffer of both byte sequences plus a terminator
 */
const concatenatePrimitive: PrimitiveFunction = (session) => {
  const [left, right] = session.operands(2, 'concatenate');
  const head = left.asText();
  const tail = right.asText();
  if (!head || !tail) {
    return session.fallback('concatenate', 2, `expects two texts, got ${left.kind} and ${right.kind}`, emptyText);
  }

  const length = head.byteLength + tail.byteLength;
  const buffer = session.tracker.allocateBytes(length + 1);
  buffer.data.set(head.view(), 0);
  buffer.data.set(tail.view(), head.byteLength);
  return session.complete('concatenate', 2, TextValue.owned(buffer, length));
};

/**
 * One-scalar text at a logical index
 */
const charAtPrimitive: PrimitiveFunction = (session) => {
  const [target, position] = session.operands(2, 'char-at');
  const text = target.asText();
  const index = position.asInteger();
  if (!text || !index) {
    return session.fallback('char-at', 2, `expects text and integer, got ${target.kind} and ${position.kind}`, emptyText);
  }

  const span = index.value <= BigInt(Number.MAX_SAFE_INTEGER) ? scalarSpan(text.view(), Number(index.value)) : null;
  if (!span) {
    return session.fallback('char-at', 2, `index ${index.value} out of range`, emptyText);
  }
  const scalar = session.tracker.duplicateText(text.view().subarray(span.start, span.end));
  return session.complete('char-at', 2, scalar);
};

// Lists

const listNewPrimitive: PrimitiveFunction = (session) => {
  session.stack.reserve(1, 'list-new');
  return session.complete('list-new', 0, new ListValue(SharedList.create(session.tracker)));
};

/**
 * Append in place and push the same list back; every alias sees the item
 */
const listPushPrimitive: PrimitiveFunction = (session) => {
  const [target, item] = session.operands(2, 'list-push');
  const list = target.asList();
  if (!list) {
    return session.fallback('list-push', 2, `expects a list, got ${target.kind}`, null);
  }
  list.list.append(item);
  return session.complete('list-push', 2, list);
};

const lengthPrimitive: PrimitiveFunction = (session) => {
  const [value] = session.operands(1, 'length');
  const list = value.asList();
  if (list) {
    return session.complete('length', 1, makeInteger(list.list.length));
  }
  const text = value.asText();
  if (text) {
    return session.complete('length', 1, makeInteger(text.length));
  }
  return session.fallback('length', 1, `expects a list or text, got ${value.kind}`, makeInteger(0));
};

const indexPrimitive: PrimitiveFunction = (session) => {
  const [target, position] = session.operands(2, 'index');
  const list = target.asList();
  const index = position.asInteger();
  if (!list || !index) {
    return session.fallback('index', 2, `expects list and integer, got ${target.kind} and ${position.kind}`, makeInteger(0));
  }

  const item = index.value >= 0n && index.value < BigInt(list.list.length) ? list.list.at(Number(index.value)) : null;
  if (!item) {
    return session.fallback('index', 2, `index ${index.value} out of range`, makeInteger(0));
  }
  return session.complete('index', 2, item);
};

const firstPrimitive: PrimitiveFunction = (session) => {
  const [target] = session.operands(1, 'first');
  const list = target.asList();
  if (!list) {
    return session.fallback('first', 1, `expects a list, got ${target.kind}`, makeInteger(0));
  }
  const item = list.list.at(0);
  if (!item) {
    return session.fallback('first', 1, 'list is empty', makeInteger(0));
  }
  return session.complete('first', 1, item);
};

/**
 * Copy of everything after the first element, in fresh storage
 */
const restPrimitive: PrimitiveFunction = (session) => {
  const [target] = session.operands(1, 'rest');
  const list = target.asList();
  const fresh = (): ListValue => new ListValue(SharedList.create(session.tracker));
  if (!list) {
    return session.fallback('rest', 1, `expects a list, got ${target.kind}`, fresh);
  }

  const result = fresh();
  const items = list.list.items();
  for (let i = 1; i < items.length; i++) {
    result.list.append(items[i]);
  }
  return session.complete('rest', 1, result);
};

// I/O

/**
 * Render the top value before popping it, so a value that cannot be read
 * stays on the stack.
 */
function printTop(session: Session, name: string, terminator: string): Outcome {
  const [value] = session.operands(1, name);
  const text = renderValue(value);
  session.complete(name, 1);
  session.write(text + terminator);
  return OK;
}

const printPrimitive: PrimitiveFunction = (session) => printTop(session, 'print', '');

const printlnPrimitive: PrimitiveFunction = (session) => printTop(session, 'println', '\n');

const showStackPrimitive: PrimitiveFunction = (session) => {
  const contents = session.stack.toArray().map((value) => renderValue(value));
  session.write(`Stack: [${contents.join(' ')}]\n`);
  return OK;
};

/**
 * Whole file into one owned, terminated buffer. The descriptor is closed
 * on every path.
 */
const readFilePrimitive: PrimitiveFunction = (session) => {
  const [target] = session.operands(1, 'read-file');
  const pathText = target.asText();
  if (!pathText) {
    return session.fallback('read-file', 1, `expects a path, got ${target.kind}`, emptyText);
  }

  const filePath = pathText.toString();
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (error) {
    return session.fallback('read-file', 1, `cannot open ${filePath}: ${errorMessage(error)}`, emptyText);
  }

  let content: TextValue;
  try {
    const size = fs.fstatSync(fd).size;
    const buffer = session.tracker.allocateBytes(size + 1);
    let offset = 0;
    while (offset < size) {
      const count = fs.readSync(fd, buffer.data, offset, size - offset, offset);
      if (count === 0) break;
      offset += count;
    }
    content = TextValue.owned(buffer, offset);
  } catch (error) {
    if (error instanceof RuntimeFault) throw error;
    return session.fallback('read-file', 1, `cannot read ${filePath}: ${errorMessage(error)}`, emptyText);
  } finally {
    fs.closeSync(fd);
  }
  return session.complete('read-file', 1, content);
};

/**
 * Every content byte is written, zero bytes included
 */
const writeFilePrimitive: PrimitiveFunction = (session) => {
  const [target, body] = session.operands(2, 'write-file');
  const pathText = target.asText();
  const content = body.asText();
  if (!pathText || !content) {
    return session.fallback('write-file', 2, `expects path and text, got ${target.kind} and ${body.kind}`, makeBoolean(false));
  }

  const filePath = pathText.toString();
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'w');
  } catch (error) {
    return session.fallback('write-file', 2, `cannot open ${filePath}: ${errorMessage(error)}`, makeBoolean(false));
  }

  try {
    const bytes = content.view();
    let offset = 0;
    while (offset < bytes.length) {
      offset += fs.writeSync(fd, bytes, offset, bytes.length - offset);
    }
  } catch (error) {
    if (error instanceof RuntimeFault) throw error;
    return session.fallback('write-file', 2, `cannot write ${filePath}: ${errorMessage(error)}`, makeBoolean(false));
  } finally {
    fs.closeSync(fd);
  }
  return session.complete('write-file', 2, makeBoolean(true));
};

// Registry

function primitive(name: string, category: PrimitiveCategory, arity: number, run: PrimitiveFunction): Primitive {
  return { name, category, arity, run };
}

const standardPrimitives: ReadonlyMap<string, Primitive> = new Map(
  [
    primitive('add', 'arithmetic', 2, addPrimitive),
    primitive('sub', 'arithmetic', 2, subPrimitive),
    primitive('mul', 'arithmetic', 2, mulPrimitive),
    primitive('div', 'arithmetic', 2, divPrimitive),
    primitive('mod', 'arithmetic', 2, modPrimitive),

    primitive('less', 'comparison', 2, comparison('less', (s) => s < 0)),
    primitive('greater', 'comparison', 2, comparison('greater', (s) => s > 0)),
    primitive('less-equal', 'comparison', 2, comparison('less-equal', (s) => s <= 0)),
    primitive('greater-equal', 'comparison', 2, comparison('greater-equal', (s) => s >= 0)),
    primitive('equal', 'comparison', 2, equalPrimitive),
    primitive('not-equal', 'comparison', 2, notEqualPrimitive),

    primitive('and', 'logic', 2, andPrimitive),
    primitive('or', 'logic', 2, orPrimitive),
    primitive('not', 'logic', 1, notPrimitive),
    primitive('true', 'logic', 0, truePrimitive),
    primitive('false', 'logic', 0, falsePrimitive),

    primitive('dup', 'stack', 1, dupPrimitive),
    primitive('drop', 'stack', 1, dropPrimitive),
    primitive('swap', 'stack', 2, swapPrimitive),
    primitive('over', 'stack', 2, overPrimitive),
    primitive('rot', 'stack', 3, rotPrimitive),

    primitive('text-length', 'text', 1, textLengthPrimitive),
    primitive('concatenate', 'text', 2, concatenatePrimitive),
    primitive('char-at', 'text', 2, charAtPrimitive),

    primitive('list-new', 'list', 0, listNewPrimitive),
    primitive('list-push', 'list', 2, listPushPrimitive),
    primitive('length', 'list', 1, lengthPrimitive),
    primitive('index', 'list', 2, indexPrimitive),
    primitive('first', 'list', 1, firstPrimitive),
    primitive('rest', 'list', 1, restPrimitive),

    primitive('print', 'io', 1, printPrimitive),
    primitive('println', 'io', 1, printlnPrimitive),
    primitive('show-stack', 'io', 0, showStackPrimitive),
    primitive('read-file', 'io', 1, readFilePrimitive),
    primitive('write-file', 'io', 2, writeFilePrimitive),
  ].map((p): [string, Primitive] => [p.name, p])
);

/** Symbol and short-form spellings */
export const PRIMITIVE_ALIASES: ReadonlyMap<string, string> = new Map([
  ['+', 'add'],
  ['-', 'sub'],
  ['*', 'mul'],
  ['/', 'div'],
  ['%', 'mod'],
  ['<', 'less'],
  ['>', 'greater'],
  ['<=', 'less-equal'],
  ['≤', 'less-equal'],
  ['>=', 'greater-equal'],
  ['≥', 'greater-equal'],
  ['=', 'equal'],
  ['!=', 'not-equal'],
  ['≠', 'not-equal'],
  [',', 'concatenate'],
  ['concat', 'concatenate'],
  ['at', 'char-at'],
  ['append', 'list-push'],
  ['nth', 'index'],
  ['.s', 'show-stack'],
]);

/**
 * Look up a primitive by canonical name, alias or vocabulary word
 */
export function getPrimitive(name: string): Primitive | undefined {
  const canonical = standardPrimitives.get(name);
  if (canonical) {
    return canonical;
  }
  const alias = PRIMITIVE_ALIASES.get(name) ?? vocabularyTarget(name);
  return alias === undefined ? undefined : standardPrimitives.get(alias);
}

export function primitiveNames(): string[] {
  return [...standardPrimitives.keys()];
}

export function listPrimitives(): Primitive[] {
  return [...standardPrimitives.values()];
}
