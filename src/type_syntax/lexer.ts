/***
 *
 * Lexer - Splits declared type text into tokens.
 *
 * `>>` is always produced as two `>` tokens so nested generic argument
 * lists close one level at a time. Columns are 1-based.
 *
 ***/

import { TYPE_SYNTAX_ERROR, TypeSyntaxError } from "./error";

export enum TOKEN {
  IDENT = "IDENT",
  LIFETIME = "LIFETIME",
  LITERAL = "LITERAL",
  PUNCT = "PUNCT",
  EOF = "EOF",
}

export interface Token {
  readonly kind: TOKEN;
  readonly text: string;
  readonly column: number;
}

// Longest match first
const PUNCTUATION = [
  "::", "->",
  "<", ">", ",", "&", "*", "(", ")", "[", "]", ";", "+", "=", "!", "{", "}", "-", "?", ":",
] as const;

const is_ident_start = (c: string): boolean => /[A-Za-z_]/.test(c);
const is_ident_part = (c: string): boolean => /[A-Za-z0-9_]/.test(c);
const is_digit = (c: string): boolean => c >= "0" && c <= "9";
const is_space = (c: string): boolean => /\s/.test(c);

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const c = source[i];

    if (is_space(c)) {
      i++;
      continue;
    }

    const start = i;

    if (is_ident_start(c)) {
      while (i < source.length && is_ident_part(source[i])) i++;
      tokens.push({ kind: TOKEN.IDENT, text: source.slice(start, i), column: start + 1 });
      continue;
    }

    if (is_digit(c)) {
      // Numeric literals keep their suffix: 4, 1_000, 8usize, 0xFF
      while (i < source.length && is_ident_part(source[i])) i++;
      tokens.push({ kind: TOKEN.LITERAL, text: source.slice(start, i), column: start + 1 });
      continue;
    }

    if (c === '"') {
      i++;
      while (i < source.length && source[i] !== '"') {
        if (source[i] === "\\") i++;
        i++;
      }
      if (i >= source.length) {
        throw new TypeSyntaxError(
          TYPE_SYNTAX_ERROR.UNEXPECTED_END,
          "unterminated string literal",
          source,
          start + 1,
        );
      }
      i++;
      tokens.push({ kind: TOKEN.LITERAL, text: source.slice(start, i), column: start + 1 });
      continue;
    }

    if (c === "'") {
      // 'a is a lifetime, 'a' is a char literal
      i++;
      if (i < source.length && is_ident_start(source[i])) {
        while (i < source.length && is_ident_part(source[i])) i++;
        if (source[i] === "'") {
          i++;
          tokens.push({ kind: TOKEN.LITERAL, text: source.slice(start, i), column: start + 1 });
        } else {
          tokens.push({ kind: TOKEN.LIFETIME, text: source.slice(start, i), column: start + 1 });
        }
        continue;
      }
      if (i + 1 < source.length && source[i + 1] === "'") {
        i += 2;
        tokens.push({ kind: TOKEN.LITERAL, text: source.slice(start, i), column: start + 1 });
        continue;
      }
      throw new TypeSyntaxError(
        TYPE_SYNTAX_ERROR.UNEXPECTED_CHARACTER,
        `unexpected character "'" at column ${start + 1}`,
        source,
        start + 1,
      );
    }

    const punct = PUNCTUATION.find((p) => source.startsWith(p, i));
    if (punct === undefined) {
      throw new TypeSyntaxError(
        TYPE_SYNTAX_ERROR.UNEXPECTED_CHARACTER,
        `unexpected character "${c}" at column ${start + 1}`,
        source,
        start + 1,
      );
    }
    i += punct.length;
    tokens.push({ kind: TOKEN.PUNCT, text: punct, column: start + 1 });
  }

  tokens.push({ kind: TOKEN.EOF, text: "", column: source.length + 1 });
  return tokens;
}
