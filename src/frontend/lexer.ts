import type { Token, TokenKind } from './ast.js';

/**
 * Lexical error tokens, surfaced by {@link filterTokens}.
 */
export interface LexError {
  kind: 'InvalidToken' | 'InvalidInteger';
  token: Token;
}

export type FilterResult = { kind: 'ok'; tokens: Token[] } | { kind: 'error'; error: LexError };

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return /^\p{Alphabetic}$/u.test(ch);
}

function isAlphanumeric(ch: string): boolean {
  return /^[\p{Alphabetic}\p{N}]$/u.test(ch);
}

/** The whole code point at `i`, one or two UTF-16 units long. */
function charAt(text: string, i: number): string {
  const cp = text.codePointAt(i);
  return cp === undefined ? '' : String.fromCodePoint(cp);
}

function token(kind: TokenKind, offset: number, length: number): Token {
  return { kind, span: { offset, length } };
}

/**
 * Split source text into tokens in a single left-to-right scan.
 *
 * Never fails: unrecognized characters and malformed numbers come back as `InvalidToken` / `InvalidInteger`
 * tokens so the caller can decide how to report them.
 */
export function lex(text: string): Token[] {
  const out: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = charAt(text, i);
    const start = i;

    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }
    if (ch === '\n') {
      out.push(token('Newline', start, 1));
      i++;
      continue;
    }
    if (ch === ',') {
      out.push(token('Comma', start, 1));
      i++;
      continue;
    }
    if (ch === ';') {
      const end = text.indexOf('\n', i);
      i = end < 0 ? text.length : end;
      out.push(token('Comment', start, i - start));
      continue;
    }

    if (isDigit(ch)) {
      let valid = true;
      i++;
      while (i < text.length) {
        const c = charAt(text, i);
        if (isDigit(c)) {
          i++;
        } else if (isLetter(c)) {
          valid = false;
          i += c.length;
        } else {
          break;
        }
      }
      out.push(token(valid ? 'Integer' : 'InvalidInteger', start, i - start));
      continue;
    }

    if (isLetter(ch)) {
      let kind: TokenKind = 'Identifier';
      i += ch.length;
      while (i < text.length) {
        const c = charAt(text, i);
        if (isAlphanumeric(c) || c === '_' || c === '-') {
          i += c.length;
          continue;
        }
        if (c === ':') {
          kind = 'Label';
          i++;
        }
        break;
      }
      out.push(token(kind, start, i - start));
      continue;
    }

    out.push(token('InvalidToken', start, ch.length));
    i += ch.length;
  }

  return out;
}

/**
 * Drop comments and stop at the first lexical error token.
 */
export function filterTokens(tokens: readonly Token[]): FilterResult {
  const kept: Token[] = [];
  for (const t of tokens) {
    if (t.kind === 'InvalidToken' || t.kind === 'InvalidInteger') {
      return { kind: 'error', error: { kind: t.kind, token: t } };
    }
    if (t.kind === 'Comment') continue;
    kept.push(t);
  }
  return { kind: 'ok', tokens: kept };
}
