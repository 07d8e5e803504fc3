/**
 * Template Lexer
 *
 * Splits template source into text, substitution (`{{ }}`) and block
 * (`{% %}`) tokens and applies whitespace control.
 */

import { TemplateError } from '../../utils/error-handler.js';

export type TagToken = {
  type: 'output' | 'block';
  expression: string;
  line: number;
  trimLeft: boolean;
  trimRight: boolean;
};

export type TextToken = {
  type: 'text';
  value: string;
  line: number;
};

export type Token = TextToken | TagToken;

// A `{{` directly followed by another `{` is literal, so `${{{ key }}}` keeps
// its shell `${` prefix.
const TAG_OPEN_SOURCE = '\\{\\{(?!\\{)|\\{%';
const BLANK_REGEX = /^[ \t\r]*$/;

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}

export function tokenize(source: string, templateName: string): Token[] {
  const tokens: Token[] = [];
  const open = new RegExp(TAG_OPEN_SOURCE, 'g');
  let cursor = 0;
  let line = 1;
  let match: RegExpExecArray | null;

  while ((match = open.exec(source)) !== null) {
    const start = match.index;
    if (start > cursor) {
      const value = source.slice(cursor, start);
      tokens.push({ type: 'text', value, line });
      line += countNewlines(value);
    }

    const isOutput = match[0] === '{{';
    const end = source.indexOf(isOutput ? '}}' : '%}', start + 2);
    if (end === -1) {
      throw new TemplateError(`Unterminated '${match[0]}' tag`, templateName, line);
    }

    let inner = source.slice(start + 2, end);
    const trimLeft = inner.startsWith('-');
    if (trimLeft) inner = inner.slice(1);
    const trimRight = inner.endsWith('-');
    if (trimRight) inner = inner.slice(0, -1);

    tokens.push({
      type: isOutput ? 'output' : 'block',
      expression: inner.trim(),
      line,
      trimLeft,
      trimRight,
    });

    line += countNewlines(source.slice(start, end + 2));
    cursor = end + 2;
    open.lastIndex = cursor;
  }

  if (cursor < source.length) {
    tokens.push({ type: 'text', value: source.slice(cursor), line });
  }

  return applyWhitespaceControl(tokens);
}

/**
 * Remove the line of every block tag that stands alone on it, then apply the
 * explicit `-` trim markers.
 */
function applyWhitespaceControl(tokens: Token[]): Token[] {
  const sliceStart = new Map<number, number>();
  const sliceEnd = new Map<number, number>();

  tokens.forEach((token, i) => {
    if (token.type !== 'block') return;

    const prev = i > 0 ? tokens[i - 1] : undefined;
    const next = i < tokens.length - 1 ? tokens[i + 1] : undefined;
    if ((prev && prev.type !== 'text') || (next && next.type !== 'text')) return;

    const before = prev?.value ?? '';
    const after = next?.value ?? '';
    const lastNewline = before.lastIndexOf('\n');
    const firstNewline = after.indexOf('\n');

    const startsLine =
      BLANK_REGEX.test(before.slice(lastNewline + 1)) && (lastNewline >= 0 || i <= 1);
    const endsLine =
      BLANK_REGEX.test(firstNewline === -1 ? after : after.slice(0, firstNewline)) &&
      (firstNewline >= 0 || i >= tokens.length - 2);
    if (!startsLine || !endsLine) return;

    if (prev) sliceEnd.set(i - 1, lastNewline + 1);
    if (next) sliceStart.set(i + 1, firstNewline === -1 ? after.length : firstNewline + 1);
  });

  const result: Token[] = tokens.map((token, i) => {
    if (token.type !== 'text') return token;
    const start = sliceStart.get(i) ?? 0;
    const end = Math.max(start, sliceEnd.get(i) ?? token.value.length);
    return { ...token, value: token.value.slice(start, end) };
  });

  result.forEach((token, i) => {
    if (token.type === 'text') return;
    const prev = result[i - 1];
    const next = result[i + 1];
    if (token.trimLeft && prev?.type === 'text') {
      result[i - 1] = { ...prev, value: prev.value.trimEnd() };
    }
    if (token.trimRight && next?.type === 'text') {
      result[i + 1] = { ...next, value: next.value.trimStart() };
    }
  });

  return result.filter((token) => token.type !== 'text' || token.value.length > 0);
}
