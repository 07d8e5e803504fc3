/**
 * Boolean expressions used by `{% if %}` and `{% elif %}` tags.
 *
 * Grammar, lowest precedence first:
 *
 *   or_expr  := and_expr ('or' and_expr)*
 *   and_expr := not_expr ('and' not_expr)*
 *   not_expr := 'not' not_expr | primary
 *   primary  := 'true' | 'false' | identifier | '(' or_expr ')'
 */

import { TemplateError } from '../../utils/error-handler.js';

export type Expression =
  | { type: 'literal'; value: boolean }
  | { type: 'variable'; name: string }
  | { type: 'not'; operand: Expression }
  | { type: 'and' | 'or'; left: Expression; right: Expression };

const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TOKEN_REGEX = /\s*(\(|\)|[A-Za-z_][A-Za-z0-9_]*)/y;
const KEYWORDS = new Set(['and', 'or', 'not', 'true', 'false']);

export function isIdentifier(text: string): boolean {
  return IDENTIFIER_REGEX.test(text) && !KEYWORDS.has(text);
}

function splitExpression(source: string, fail: (message: string) => never): string[] {
  const parts: string[] = [];
  const scanner = new RegExp(TOKEN_REGEX.source, 'y');
  let cursor = 0;

  while (cursor < source.length) {
    if (source.slice(cursor).trim().length === 0) break;

    scanner.lastIndex = cursor;
    const match = scanner.exec(source);
    if (!match) {
      return fail(`Unexpected character '${source.slice(cursor).trim().charAt(0)}' in expression '${source}'`);
    }
    parts.push(match[1]);
    cursor = scanner.lastIndex;
  }

  return parts;
}

export function parseExpression(source: string, templateName: string, line: number): Expression {
  const fail = (message: string): never => {
    throw new TemplateError(message, templateName, line);
  };

  const parts = splitExpression(source, fail);
  let position = 0;

  const peek = (): string | undefined => parts[position];

  const parseOr = (): Expression => {
    let left = parseAnd();
    while (peek() === 'or') {
      position++;
      left = { type: 'or', left, right: parseAnd() };
    }
    return left;
  };

  const parseAnd = (): Expression => {
    let left = parseNot();
    while (peek() === 'and') {
      position++;
      left = { type: 'and', left, right: parseNot() };
    }
    return left;
  };

  const parseNot = (): Expression => {
    if (peek() === 'not') {
      position++;
      return { type: 'not', operand: parseNot() };
    }
    return parsePrimary();
  };

  const parsePrimary = (): Expression => {
    const part = peek();
    if (part === undefined) {
      return fail(`Unexpected end of expression '${source}'`);
    }
    position++;

    if (part === '(') {
      const inner = parseOr();
      if (peek() !== ')') {
        return fail(`Missing ')' in expression '${source}'`);
      }
      position++;
      return inner;
    }
    if (part === 'true' || part === 'false') {
      return { type: 'literal', value: part === 'true' };
    }
    if (!isIdentifier(part)) {
      return fail(`Unexpected '${part}' in expression '${source}'`);
    }
    return { type: 'variable', name: part };
  };

  const expression = parseOr();
  if (position < parts.length) {
    fail(`Unexpected '${parts[position]}' in expression '${source}'`);
  }

  return expression;
}
