/**
 * Textual rendering of values for print and show-stack
 */

import type { ListValue, SharedList, Value } from './value.js';

export const TRUE_TOKEN = 'ಸರಿ';
export const FALSE_TOKEN = 'ತಪ್ಪು';

const GENERAL_PRECISION = 6;

function trimFraction(digits: string): string {
  return digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits;
}

/**
 * Compact general float format: six significant digits, fixed notation
 * for exponents in [-4, 6), scientific otherwise, trailing zeros dropped.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Number.POSITIVE_INFINITY) return 'inf';
  if (value === Number.NEGATIVE_INFINITY) return '-inf';
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';

  const [mantissa, exponentText] = value.toExponential(GENERAL_PRECISION - 1).split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= GENERAL_PRECISION) {
    const sign = exponent < 0 ? '-' : '+';
    const magnitude = String(Math.abs(exponent)).padStart(2, '0');
    return `${trimFraction(mantissa)}e${sign}${magnitude}`;
  }
  return trimFraction(value.toFixed(GENERAL_PRECISION - 1 - exponent));
}

export function formatBoolean(value: boolean): string {
  return value ? TRUE_TOKEN : FALSE_TOKEN;
}

type RenderTask =
  | { value: Value }
  | { literal: string }
  | { close: SharedList };

function renderScalar(value: Exclude<Value, ListValue>): string {
  switch (value.kind) {
    case 'integer':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'boolean':
      return formatBoolean(value.value);
    case 'text':
      return value.toString();
  }
}

/**
 * Render without touching the stack. Nested lists are walked with an
 * explicit work list, so nesting depth is bounded by memory only. A list
 * that contains itself renders the inner reference as `[...]`.
 */
export function renderValue(value: Value): string {
  const parts: string[] = [];
  const active = new Set<SharedList>();
  const work: RenderTask[] = [{ value }];

  for (let task = work.pop(); task !== undefined; task = work.pop()) {
    if ('literal' in task) {
      parts.push(task.literal);
      continue;
    }
    if ('close' in task) {
      active.delete(task.close);
      parts.push(']');
      continue;
    }

    const current = task.value;
    if (current.kind !== 'list') {
      parts.push(renderScalar(current));
      continue;
    }
    const list = current.list;
    if (active.has(list)) {
      parts.push('[...]');
      continue;
    }

    active.add(list);
    parts.push('[');
    work.push({ close: list });
    const items = list.items();
    for (let i = items.length - 1; i >= 0; i--) {
      work.push({ value: items[i] });
      if (i > 0) work.push({ literal: ' ' });
    }
  }
  return parts.join('');
}
