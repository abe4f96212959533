/**
 * Parser for the textual condition form used in manifests:
 *
 *   configuration == Release && !(platform == Windows || compiler != MSVC)
 *
 * `&&` binds tighter than `||`; `!=` is shorthand for a negated `==`.
 */

import type { Predicate } from '../core/types.js';
import { ExpressionSyntaxError } from '../core/errors.js';

type TokenType = 'word' | 'string' | 'and' | 'or' | 'not' | 'eq' | 'neq' | 'lparen' | 'rparen' | 'end';

interface Token {
  type: TokenType;
  text: string;
  pos: number;
}

const WORD = /[A-Za-z0-9_.+-]/;
const BARE_VALUE = /^[A-Za-z0-9_.+-]+$/;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    const pair = source.slice(i, i + 2);

    if (/\s/.test(ch)) {
      i++;
    } else if (pair === '&&' || pair === '||' || pair === '==' || pair === '!=') {
      const type: TokenType =
        pair === '&&' ? 'and' : pair === '||' ? 'or' : pair === '==' ? 'eq' : 'neq';
      tokens.push({ type, text: pair, pos: i });
      i += 2;
    } else if (ch === '!') {
      tokens.push({ type: 'not', text: ch, pos: i });
      i++;
    } else if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', text: ch, pos: i });
      i++;
    } else if (ch === '"') {
      const start = i;
      let text = '';
      i++;
      while (i < source.length && source[i] !== '"') {
        if (source[i] === '\\' && i + 1 < source.length) i++;
        text += source[i];
        i++;
      }
      if (i >= source.length) {
        throw new ExpressionSyntaxError(source, start, 'unterminated string');
      }
      i++;
      tokens.push({ type: 'string', text, pos: start });
    } else if (WORD.test(ch)) {
      const start = i;
      while (i < source.length && WORD.test(source[i])) i++;
      tokens.push({ type: 'word', text: source.slice(start, i), pos: start });
    } else {
      throw new ExpressionSyntaxError(source, i, `unexpected character '${ch}'`);
    }
  }

  tokens.push({ type: 'end', text: '', pos: source.length });
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[]
  ) {}

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'end') this.index++;
    return token;
  }

  private fail(token: Token, reason: string): never {
    throw new ExpressionSyntaxError(this.source, token.pos, reason);
  }

  parse(): Predicate {
    if (this.peek().type === 'end') {
      this.fail(this.peek(), 'empty condition');
    }
    const predicate = this.parseOr();
    const rest = this.peek();
    if (rest.type !== 'end') {
      this.fail(rest, `unexpected '${rest.text}'`);
    }
    return predicate;
  }

  private parseOr(): Predicate {
    const operands = [this.parseAnd()];
    while (this.peek().type === 'or') {
      this.next();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { kind: 'or', operands };
  }

  private parseAnd(): Predicate {
    const operands = [this.parseUnary()];
    while (this.peek().type === 'and') {
      this.next();
      operands.push(this.parseUnary());
    }
    return operands.length === 1 ? operands[0] : { kind: 'and', operands };
  }

  private parseUnary(): Predicate {
    if (this.peek().type === 'not') {
      this.next();
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Predicate {
    const token = this.next();

    if (token.type === 'lparen') {
      const inner = this.parseOr();
      const close = this.next();
      if (close.type !== 'rparen') {
        this.fail(close, "expected ')'");
      }
      return inner;
    }

    if (token.type !== 'word') {
      this.fail(token, token.type === 'end' ? 'unexpected end of condition' : `expected a context key, got '${token.text}'`);
    }

    const operator = this.next();
    if (operator.type !== 'eq' && operator.type !== 'neq') {
      this.fail(operator, `expected '==' or '!=' after '${token.text}'`);
    }

    const value = this.next();
    if (value.type !== 'word' && value.type !== 'string') {
      this.fail(value, `expected a value after '${operator.text}'`);
    }

    const comparison: Predicate = { kind: 'equals', key: token.text, value: value.text };
    return operator.type === 'neq' ? { kind: 'not', operand: comparison } : comparison;
  }
}

/**
 * Parse a condition string into a predicate. Context keys are checked by `when` and on
 * evaluation.
 */
export function parseCondition(source: string): Predicate {
  return new Parser(source, tokenize(source)).parse();
}

function formatValue(value: string): string {
  return BARE_VALUE.test(value) ? value : JSON.stringify(value);
}

/**
 * Render a predicate in the textual form.
 */
export function formatCondition(predicate: Predicate): string {
  switch (predicate.kind) {
    case 'equals':
      return `${predicate.key} == ${formatValue(predicate.value)}`;
    case 'not':
      if (predicate.operand.kind === 'equals') {
        return `${predicate.operand.key} != ${formatValue(predicate.operand.value)}`;
      }
      return `!(${formatCondition(predicate.operand)})`;
    case 'and':
      if (predicate.operands.length === 0) return 'true';
      return predicate.operands
        .map((operand) =>
          operand.kind === 'or' && operand.operands.length > 1
            ? `(${formatCondition(operand)})`
            : formatCondition(operand)
        )
        .join(' && ');
    case 'or':
      if (predicate.operands.length === 0) return 'false';
      return predicate.operands.map(formatCondition).join(' || ');
  }
}
