/**
 * Template Lexer
 * @module template/lexer
 *
 * Two passes: scanSegments splits a template into text and `{{ }}` actions
 * (applying `{{-`/`-}}` trimming and dropping comments), and tokenizeAction
 * breaks one action body into tokens.
 */

import { TemplateSyntaxError } from '../errors/index.js';

// ============================================================================
// Segments
// ============================================================================

export type Segment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'action'; readonly body: string; readonly line: number };

const LEFT_DELIM = '{{';
const RIGHT_DELIM = '}}';
const TRIM_SPACE = /[ \t\r\n]/;

function isTrimSpace(ch: string | undefined): boolean {
  return ch !== undefined && TRIM_SPACE.test(ch);
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

interface RawAction {
  body: string | null;
  trimLeft: boolean;
  trimRight: boolean;
  end: number;
}

/**
 * Find the closing delimiter of an action, skipping over quoted strings
 */
function scanAction(source: string, start: number, file: string, line: number): RawAction | null {
  let quote: string | null = null;

  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (quote !== null) {
      if (ch === '\\' && quote === '"') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === '`') {
      quote = ch;
      continue;
    }
    if (source.startsWith(RIGHT_DELIM, i)) {
      const trimRight = source[i - 1] === '-' && isTrimSpace(source[i - 2]) && i - 2 >= start;
      const bodyEnd = trimRight ? i - 2 : i;
      return {
        body: source.slice(start, bodyEnd),
        trimLeft: false,
        trimRight,
        end: i + RIGHT_DELIM.length,
      };
    }
  }

  if (quote !== null) {
    throw new TemplateSyntaxError('unterminated quoted string in action', { file, line });
  }
  return null;
}

/**
 * `{{/* ... *\/}}`, optionally with trim markers on either side
 */
function scanComment(source: string, start: number, file: string, line: number): RawAction {
  const close = source.indexOf('*/', start + 2);
  if (close === -1) {
    throw new TemplateSyntaxError('unclosed comment', { file, line });
  }
  const after = close + 2;
  if (source.startsWith(RIGHT_DELIM, after)) {
    return { body: null, trimLeft: false, trimRight: false, end: after + RIGHT_DELIM.length };
  }
  if (isTrimSpace(source[after]) && source.startsWith(`-${RIGHT_DELIM}`, after + 1)) {
    return { body: null, trimLeft: false, trimRight: true, end: after + 1 + 1 + RIGHT_DELIM.length };
  }
  throw new TemplateSyntaxError('comment ends before closing delimiter', { file, line });
}

/**
 * Split template source into text and action segments.
 * Throws TemplateSyntaxError for unclosed actions and comments.
 */
export function scanSegments(source: string, file: string): Segment[] {
  const segments: Segment[] = [];
  let pos = 0;
  let line = 1;
  let trimNext = false;

  const pushText = (text: string): void => {
    const value = trimNext ? text.replace(/^[ \t\r\n]+/, '') : text;
    trimNext = false;
    if (value !== '') {
      segments.push({ kind: 'text', text: value });
    }
  };

  const trimPrevious = (): void => {
    const last = segments[segments.length - 1];
    if (last?.kind === 'text') {
      const trimmed = last.text.replace(/[ \t\r\n]+$/, '');
      segments.pop();
      if (trimmed !== '') {
        segments.push({ kind: 'text', text: trimmed });
      }
    }
  };

  while (pos < source.length) {
    const open = source.indexOf(LEFT_DELIM, pos);
    if (open === -1) {
      pushText(source.slice(pos));
      break;
    }

    const text = source.slice(pos, open);
    pushText(text);
    line += countNewlines(text);

    const trimLeft = source[open + 2] === '-' && isTrimSpace(source[open + 3]);
    const innerStart = open + LEFT_DELIM.length + (trimLeft ? 2 : 0);

    const raw = source.startsWith('/*', innerStart)
      ? scanComment(source, innerStart, file, line)
      : scanAction(source, innerStart, file, line);
    if (raw === null) {
      throw new TemplateSyntaxError('unclosed action', { file, line });
    }

    if (trimLeft) {
      trimPrevious();
    }
    if (raw.body !== null) {
      segments.push({ kind: 'action', body: raw.body, line });
    }
    trimNext = raw.trimRight;

    line += countNewlines(source.slice(open, raw.end));
    pos = raw.end;
  }

  return segments;
}

// ============================================================================
// Tokens
// ============================================================================

export type TokenType =
  | 'field'
  | 'dot'
  | 'variable'
  | 'string'
  | 'number'
  | 'ident'
  | 'pipe'
  | 'lparen'
  | 'rparen'
  | 'declare'
  | 'assign'
  | 'comma';

export interface Token {
  readonly type: TokenType;
  /** Source text; for strings, the decoded value */
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly line: number;
}

const TOKEN_PATTERNS: ReadonlyArray<readonly [TokenType, RegExp]> = [
  ['declare', /:=/y],
  ['field', /(?:\.[A-Za-z_][A-Za-z0-9_]*)+/y],
  ['dot', /\./y],
  ['variable', /\$[A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/y],
  ['number', /-?\d+(?:\.\d+)?(?![A-Za-z0-9_])/y],
  ['ident', /[A-Za-z_][A-Za-z0-9_]*/y],
  ['pipe', /\|/y],
  ['lparen', /\(/y],
  ['rparen', /\)/y],
  ['assign', /=/y],
  ['comma', /,/y],
];

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
};

function readQuoted(body: string, start: number, file: string, line: number): { value: string; end: number } {
  let value = '';
  for (let i = start + 1; i < body.length; i++) {
    const ch = body[i];
    if (ch === '"') {
      return { value, end: i + 1 };
    }
    if (ch === '\\') {
      const next = body[i + 1];
      if (next === undefined) break;
      value += ESCAPES[next] ?? next;
      i++;
      continue;
    }
    if (ch === '\n') break;
    value += ch;
  }
  throw new TemplateSyntaxError('unterminated quoted string', { file, line });
}

function readRaw(body: string, start: number, file: string, line: number): { value: string; end: number } {
  const close = body.indexOf('`', start + 1);
  if (close === -1) {
    throw new TemplateSyntaxError('unterminated raw quoted string', { file, line });
  }
  return { value: body.slice(start + 1, close), end: close + 1 };
}

/**
 * Tokenize the body of one action
 */
export function tokenizeAction(body: string, file: string, actionLine: number): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = actionLine;

  while (pos < body.length) {
    const ch = body[pos];
    if (ch === '\n') {
      line++;
      pos++;
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      pos++;
      continue;
    }

    if (ch === '"' || ch === '`') {
      const { value, end } = ch === '"'
        ? readQuoted(body, pos, file, line)
        : readRaw(body, pos, file, line);
      tokens.push({ type: 'string', text: value, start: pos, end, line });
      line += countNewlines(body.slice(pos, end));
      pos = end;
      continue;
    }

    let matched = false;
    for (const [type, pattern] of TOKEN_PATTERNS) {
      pattern.lastIndex = pos;
      const match = pattern.exec(body);
      if (match) {
        tokens.push({ type, text: match[0], start: pos, end: pos + match[0].length, line });
        pos += match[0].length;
        matched = true;
        break;
      }
    }

    if (!matched) {
      throw new TemplateSyntaxError(`unexpected "${ch}" in action`, { file, line });
    }
  }

  return tokens;
}
