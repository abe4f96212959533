/**
 * Tests for the condition parser and formatter.
 */

import { describe, it, expect } from 'vitest';
import { formatCondition, parseCondition } from '../../src/expr/parse.js';
import { and, equals, not, or } from '../../src/expr/evaluate.js';
import { ExpressionSyntaxError } from '../../src/core/errors.js';

describe('parseCondition', () => {
  it('should parse a single comparison', () => {
    expect(parseCondition('configuration == Release')).toEqual(
      equals('configuration', 'Release')
    );
  });

  it('should read != as a negated comparison', () => {
    expect(parseCondition('compiler != MSVC')).toEqual(not(equals('compiler', 'MSVC')));
  });

  it('should bind && tighter than ||', () => {
    expect(parseCondition('platform == Linux || platform == Darwin && compiler == Clang')).toEqual(
      or(
        equals('platform', 'Linux'),
        and(equals('platform', 'Darwin'), equals('compiler', 'Clang'))
      )
    );
  });

  it('should honour parentheses and negation', () => {
    expect(parseCondition('!(configuration == Debug || configuration == RelWithDebInfo)')).toEqual(
      not(or(equals('configuration', 'Debug'), equals('configuration', 'RelWithDebInfo')))
    );
  });

  it('should accept quoted values and no whitespace', () => {
    expect(parseCondition('platform=="Windows Store"&&compiler==MSVC')).toEqual(
      and(equals('platform', 'Windows Store'), equals('compiler', 'MSVC'))
    );
  });

  it('should leave key checking to evaluation', () => {
    expect(parseCondition('arch == arm64')).toEqual(equals('arch', 'arm64'));
  });

  it('should report the column of a missing operator', () => {
    try {
      parseCondition('configuration Release');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExpressionSyntaxError);
      if (error instanceof ExpressionSyntaxError) {
        expect(error.position).toBe(14);
        expect(error.message).toBe(
          "Invalid condition 'configuration Release' at column 15: expected '==' or '!=' after 'configuration'"
        );
      }
    }
  });

  it('should reject empty, unbalanced and trailing input', () => {
    expect(() => parseCondition('   ')).toThrow('empty condition');
    expect(() => parseCondition('(platform == Linux')).toThrow("expected ')'");
    expect(() => parseCondition('platform == Linux )')).toThrow("unexpected ')'");
    expect(() => parseCondition('platform == "Linux')).toThrow('unterminated string');
    expect(() => parseCondition('platform = Linux')).toThrow("unexpected character '='");
    expect(() => parseCondition('platform ==')).toThrow("expected a value after '=='");
  });
});

describe('formatCondition', () => {
  it('should render the textual form', () => {
    const predicate = and(
      or(equals('platform', 'Linux'), equals('platform', 'Darwin')),
      not(equals('compiler', 'MSVC')),
      not(and(equals('configuration', 'Debug'), equals('platform', 'Windows Store')))
    );

    expect(formatCondition(predicate)).toBe(
      '(platform == Linux || platform == Darwin) && compiler != MSVC && ' +
        '!(configuration == Debug && platform == "Windows Store")'
    );
  });

  it('should parse back to the same predicate', () => {
    const source = '(platform == Linux || platform == Darwin) && compiler != MSVC';

    expect(parseCondition(formatCondition(parseCondition(source)))).toEqual(parseCondition(source));
  });
});
