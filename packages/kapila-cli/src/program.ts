/**
 * JSON instruction programs
 *
 * A program is an array of already-resolved steps: operation names and
 * literal values. Nothing here tokenizes source text; the front end that
 * produced the program has done that.
 *
 *   ["list-new", { "int": 1 }, "list-push", { "text": "ಕನ್ನಡ" }, "length", "println"]
 */

import * as fs from 'fs';
import {
  type SessionOptions,
  type Step,
  type Value,
  Session,
  buildChain,
  getPrimitive,
  isRuntimeFault,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeText,
  renderValue,
} from 'kapila-core';

export class ProgramError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProgramError';
  }
}

const INTEGER_PATTERN = /^-?\d+$/;

function isRecord(entry: unknown): entry is Record<string, unknown> {
  return typeof entry === 'object' && entry !== null && !Array.isArray(entry);
}

function parseInteger(raw: unknown, where: string): Value {
  try {
    if (typeof raw === 'number') {
      return makeInteger(raw);
    }
    if (typeof raw === 'string' && INTEGER_PATTERN.test(raw)) {
      return makeInteger(BigInt(raw));
    }
  } catch (error) {
    if (isRuntimeFault(error)) {
      throw new ProgramError(`${where}: ${error.message}`);
    }
    throw error;
  }
  throw new ProgramError(`${where}: "int" must be an integer or a string of digits`);
}

/**
 * Steps that leave exactly one value on the stack
 */
function literalSteps(entry: unknown, where: string): Step[] {
  if (!isRecord(entry)) {
    throw new ProgramError(`${where}: expected a literal object`);
  }

  const keys = Object.keys(entry);
  if (keys.length !== 1) {
    throw new ProgramError(`${where}: a step must have exactly one key, found ${keys.length}`);
  }

  const [key] = keys;
  const raw = entry[key];
  switch (key) {
    case 'int':
      return [{ value: parseInteger(raw, where) }];
    case 'float':
      if (typeof raw !== 'number') {
        throw new ProgramError(`${where}: "float" must be a number`);
      }
      return [{ value: makeFloat(raw) }];
    case 'bool':
      if (typeof raw !== 'boolean') {
        throw new ProgramError(`${where}: "bool" must be true or false`);
      }
      return [{ value: makeBoolean(raw) }];
    case 'text':
      if (typeof raw !== 'string') {
        throw new ProgramError(`${where}: "text" must be a string`);
      }
      return [{ value: makeText(raw) }];
    case 'list': {
      if (!Array.isArray(raw)) {
        throw new ProgramError(`${where}: "list" must be an array`);
      }
      const steps: Step[] = [{ op: 'list-new' }];
      raw.forEach((item: unknown, i: number) => {
        steps.push(...literalSteps(item, `${where}.list[${i}]`), { op: 'list-push' });
      });
      return steps;
    }
    default:
      throw new ProgramError(`${where}: unknown step kind "${key}"`);
  }
}

function entrySteps(entry: unknown, where: string): Step[] {
  const name = typeof entry === 'string' ? entry : isRecord(entry) && 'op' in entry ? entry.op : undefined;
  if (name === undefined) {
    return literalSteps(entry, where);
  }
  if (typeof name !== 'string') {
    throw new ProgramError(`${where}: "op" must be a string`);
  }
  if (isRecord(entry) && Object.keys(entry).length !== 1) {
    throw new ProgramError(`${where}: an "op" step takes no other keys`);
  }
  if (!getPrimitive(name)) {
    throw new ProgramError(`${where}: unknown operation '${name}'`);
  }
  return [{ op: name }];
}

/**
 * Validate a parsed JSON document and flatten it into steps
 */
export function parseProgram(document: unknown): Step[] {
  if (!Array.isArray(document)) {
    throw new ProgramError('program must be a JSON array');
  }
  const steps: Step[] = [];
  document.forEach((entry: unknown, i: number) => {
    steps.push(...entrySteps(entry, `entry ${i}`));
  });
  return steps;
}

export function loadProgram(filePath: string): Step[] {
  const content = fs.readFileSync(filePath, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProgramError(`${filePath} is not valid JSON: ${reason}`);
  }
  return parseProgram(document);
}

export interface RunReport {
  /** Values left on the stack, rendered bottom to top */
  remaining: string[];
  /** Operations that fell back to a default */
  defaults: Array<{ operation: string; reason: string }>;
  /** Buffers released when the session was finalized */
  released: number;
}

/**
 * Run steps in a fresh session and finalize it, even when a fault aborts
 * the run. Remaining values are rendered before their storage is released.
 */
export function runProgram(steps: readonly Step[], options: SessionOptions = {}): RunReport {
  const defaults: RunReport['defaults'] = [];
  const session = new Session({
    ...options,
    onDefault: (operation, reason) => {
      defaults.push({ operation, reason });
      options.onDefault?.(operation, reason);
    },
  });

  let remaining: string[] = [];
  let released = 0;
  try {
    session.run(buildChain(steps));
    remaining = session.stack.toArray().map((value) => renderValue(value));
  } finally {
    released = session.finalize();
  }
  return { remaining, defaults, released };
}
