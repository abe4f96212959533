/**
 * Construction and evaluation of conditional requirement entries.
 */

import type { BuildContext, ContextKey, Expression, Predicate } from '../core/types.js';
import { CONTEXT_KEYS } from '../core/types.js';
import { UnknownContextKeyError, UnsetContextKeyError } from '../core/errors.js';

export function literal(value: string): Expression {
  return { kind: 'literal', value };
}

/**
 * A conditional entry. Every key the predicate reads must be a context key.
 */
export function when(predicate: Predicate, value: string): Expression {
  checkKeys(predicate);
  return { kind: 'conditional', when: predicate, value };
}

export function equals(key: string, value: string): Predicate {
  return { kind: 'equals', key, value };
}

export function and(...operands: Predicate[]): Predicate {
  return { kind: 'and', operands };
}

export function or(...operands: Predicate[]): Predicate {
  return { kind: 'or', operands };
}

export function not(operand: Predicate): Predicate {
  return { kind: 'not', operand };
}

/**
 * Plain strings in declarations are literals.
 */
export function toExpression(entry: string | Expression): Expression {
  return typeof entry === 'string' ? literal(entry) : entry;
}

export function isContextKey(key: string): key is ContextKey {
  return CONTEXT_KEYS.some((entry) => entry === key);
}

/**
 * Structural identity used for de-duplication before evaluation.
 */
export function expressionKey(expression: Expression): string {
  if (expression.kind === 'literal') return `=${expression.value}`;
  return `?${predicateKey(expression.when)}:${expression.value}`;
}

function predicateKey(predicate: Predicate): string {
  switch (predicate.kind) {
    case 'equals':
      return `${predicate.key}==${JSON.stringify(predicate.value)}`;
    case 'and':
      return `and(${predicate.operands.map(predicateKey).join(',')})`;
    case 'or':
      return `or(${predicate.operands.map(predicateKey).join(',')})`;
    case 'not':
      return `not(${predicateKey(predicate.operand)})`;
  }
}

/**
 * Keys read by a predicate, in first-use order.
 */
export function predicateKeys(predicate: Predicate): string[] {
  const keys = new Set<string>();
  const pending: Predicate[] = [predicate];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    switch (current.kind) {
      case 'equals':
        keys.add(current.key);
        break;
      case 'and':
      case 'or':
        pending.push(...[...current.operands].reverse());
        break;
      case 'not':
        pending.push(current.operand);
        break;
    }
  }

  return [...keys];
}

/**
 * Throws for the first key outside the context, whether or not its branch would be decided.
 */
export function checkKeys(predicate: Predicate): void {
  const unknown = predicateKeys(predicate).find((key) => !isContextKey(key));
  if (unknown !== undefined) {
    throw new UnknownContextKeyError(unknown);
  }
}

function lookup(context: BuildContext, key: string): string {
  if (!isContextKey(key)) {
    throw new UnknownContextKeyError(key);
  }
  const value = context[key];
  if (value === undefined) {
    throw new UnsetContextKeyError(key);
  }
  return value;
}

function decide(predicate: Predicate, context: BuildContext): boolean {
  switch (predicate.kind) {
    case 'equals':
      return lookup(context, predicate.key) === predicate.value;
    case 'and':
      return predicate.operands.every((operand) => decide(operand, context));
    case 'or':
      return predicate.operands.some((operand) => decide(operand, context));
    case 'not':
      return !decide(predicate.operand, context);
  }
}

/**
 * Decide a predicate against a context. Empty `and` holds, empty `or` does not.
 * Unknown keys fail up front; unset keys fail only when a branch reads them.
 */
export function test(predicate: Predicate, context: BuildContext): boolean {
  checkKeys(predicate);
  return decide(predicate, context);
}

/**
 * The entry's payload when it applies under `context`, otherwise undefined.
 */
export function evaluate(expression: Expression, context: BuildContext): string | undefined {
  if (expression.kind === 'literal') return expression.value;
  return test(expression.when, context) ? expression.value : undefined;
}

/**
 * Evaluate entries in order, dropping those that do not apply and repeated values.
 */
export function evaluateAll(entries: readonly Expression[], context: BuildContext): string[] {
  const seen = new Set<string>();
  const values: string[] = [];

  for (const entry of entries) {
    const value = evaluate(entry, context);
    if (value === undefined || seen.has(value)) continue;
    seen.add(value);
    values.push(value);
  }

  return values;
}
