/***
 *
 * Parser - Recursive descent over the token stream produced by tokenize().
 *
 * Grammar (informal):
 *
 *   type        := type_no_bounds ('+' bound)*        bare trait object when '+' follows a path
 *   type_no_bounds
 *               := '&' LIFETIME? 'mut'? type_no_bounds
 *                | '*' ('const' | 'mut') type_no_bounds
 *                | '(' ')' | '(' type ')' | '(' type ',' (type ',')* type? ')'
 *                | '[' type ']' | '[' type ';' expr ']'
 *                | '!' | '_' | 'dyn' bounds | 'impl' bounds
 *                | 'fn' '(' types ')' ('->' type_no_bounds)?
 *                | '<' type ('as' path)? '>' '::' path
 *                | path
 *   path        := '::'? segment ('::' segment | '::' angle_args)*
 *   segment     := IDENT (angle_args | paren_args)?
 *   angle_args  := '<' (arg (',' arg)* ','?)? '>'
 *   arg         := LIFETIME | const | IDENT '=' type | type
 *
 ***/

import { TOKEN, tokenize, type Token } from "./lexer";
import { TYPE_SYNTAX_ERROR, TypeSyntaxError } from "./error";
import type {
  GenericArgument,
  Path,
  PathArguments,
  PathSegment,
  TypeExpr,
  TypeParamBound,
} from "./type_expr";

// Bracket pairs tracked while skipping over raw expressions (`[T; N]`, `{ N }`)
const OPENERS: Readonly<Record<string, string>> = { "(": ")", "[": "]", "{": "}" };

class Parser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[],
  ) {}

  public parse(): TypeExpr {
    const type = this.type();
    const tok = this.peek();
    if (tok.kind !== TOKEN.EOF) {
      throw new TypeSyntaxError(
        TYPE_SYNTAX_ERROR.TRAILING_INPUT,
        `unexpected "${tok.text}" after type at column ${tok.column}`,
        this.source,
        tok.column,
      );
    }
    return type;
  }

  //=========================================================
  // Types
  //=========================================================

  private type(): TypeExpr {
    const first = this.type_no_bounds();
    if (!this.is_punct("+") || first.kind !== "path" || first.qself !== null) {
      return first;
    }
    const bounds: TypeParamBound[] = [{ kind: "trait", maybe: false, path: first.path }];
    while (this.eat_punct("+")) bounds.push(this.bound());
    return { kind: "trait_object", dyn: false, bounds };
  }

  private type_no_bounds(): TypeExpr {
    const tok = this.peek();

    if (tok.kind === TOKEN.PUNCT) {
      switch (tok.text) {
        case "&":
          return this.reference();
        case "*":
          return this.pointer();
        case "(":
          return this.tuple_or_paren();
        case "[":
          return this.array_or_slice();
        case "!":
          this.next();
          return { kind: "never" };
        case "<":
          return this.qualified_path();
        case "::":
          return { kind: "path", qself: null, path: this.path() };
      }
    }

    if (tok.kind === TOKEN.IDENT) {
      switch (tok.text) {
        case "_":
          this.next();
          return { kind: "infer" };
        case "dyn":
          this.next();
          return { kind: "trait_object", dyn: true, bounds: this.bounds() };
        case "impl":
          this.next();
          return { kind: "impl_trait", bounds: this.bounds() };
        case "fn":
          return this.bare_fn();
        default:
          return { kind: "path", qself: null, path: this.path() };
      }
    }

    throw this.unexpected(tok, "a type");
  }

  private reference(): TypeExpr {
    this.expect_punct("&");
    const lifetime = this.peek().kind === TOKEN.LIFETIME ? this.next().text : null;
    const mutable = this.eat_ident("mut");
    return { kind: "reference", lifetime, mutable, elem: this.type_no_bounds() };
  }

  private pointer(): TypeExpr {
    this.expect_punct("*");
    const tok = this.next();
    if (tok.kind !== TOKEN.IDENT || (tok.text !== "const" && tok.text !== "mut")) {
      throw this.unexpected(tok, '"const" or "mut"');
    }
    return { kind: "pointer", mutable: tok.text === "mut", elem: this.type_no_bounds() };
  }

  private tuple_or_paren(): TypeExpr {
    this.expect_punct("(");
    if (this.eat_punct(")")) return { kind: "tuple", elems: [] };

    const first = this.type();
    if (this.eat_punct(")")) return { kind: "paren", elem: first };

    const elems: TypeExpr[] = [first];
    this.expect_punct(",");
    while (!this.is_punct(")")) {
      elems.push(this.type());
      if (!this.eat_punct(",")) break;
    }
    this.expect_punct(")");
    return { kind: "tuple", elems };
  }

  private array_or_slice(): TypeExpr {
    this.expect_punct("[");
    const elem = this.type();
    if (this.eat_punct(";")) {
      const len = this.raw_until("]");
      this.expect_punct("]");
      return { kind: "array", elem, len };
    }
    this.expect_punct("]");
    return { kind: "slice", elem };
  }

  private bare_fn(): TypeExpr {
    this.expect_ident("fn");
    const inputs = this.paren_types();
    const output = this.eat_punct("->") ? this.type_no_bounds() : null;
    return { kind: "bare_fn", inputs, output };
  }

  private qualified_path(): TypeExpr {
    this.expect_punct("<");
    const type = this.type();
    const as_trait = this.eat_ident("as") ? this.path() : null;
    this.expect_punct(">");
    this.expect_punct("::");
    const rest = this.path_segments();
    return {
      kind: "path",
      qself: { type, as_trait },
      path: { leading_colon: false, segments: rest },
    };
  }

  //=========================================================
  // Paths
  //=========================================================

  private path(): Path {
    const leading_colon = this.eat_punct("::");
    return { leading_colon, segments: this.path_segments() };
  }

  private path_segments(): PathSegment[] {
    const segments: PathSegment[] = [this.segment()];
    while (this.is_punct("::")) {
      this.next();
      if (this.is_punct("<")) {
        // Turbofish: Name::<T> attaches to the segment before it
        const last = segments[segments.length - 1];
        if (last.arguments.kind !== "none") throw this.unexpected(this.peek(), "a path segment");
        segments[segments.length - 1] = {
          ident: last.ident,
          arguments: { kind: "angle_bracketed", colon2: true, args: this.angle_args() },
        };
        continue;
      }
      segments.push(this.segment());
    }
    return segments;
  }

  private segment(): PathSegment {
    const tok = this.next();
    if (tok.kind !== TOKEN.IDENT) throw this.unexpected(tok, "an identifier");

    let args: PathArguments = { kind: "none" };
    if (this.is_punct("<")) {
      args = { kind: "angle_bracketed", colon2: false, args: this.angle_args() };
    } else if (this.is_punct("(")) {
      const inputs = this.paren_types();
      const output = this.eat_punct("->") ? this.type_no_bounds() : null;
      args = { kind: "parenthesized", inputs, output };
    }
    return { ident: tok.text, arguments: args };
  }

  private angle_args(): GenericArgument[] {
    this.expect_punct("<");
    const args: GenericArgument[] = [];
    while (!this.is_punct(">")) {
      args.push(this.generic_argument());
      if (!this.eat_punct(",")) break;
    }
    this.expect_punct(">");
    return args;
  }

  private generic_argument(): GenericArgument {
    const tok = this.peek();

    if (tok.kind === TOKEN.LIFETIME) {
      this.next();
      return { kind: "lifetime", name: tok.text };
    }
    if (tok.kind === TOKEN.LITERAL) {
      this.next();
      return { kind: "const", value: tok.text };
    }
    if (tok.kind === TOKEN.PUNCT && tok.text === "-") {
      this.next();
      const lit = this.next();
      if (lit.kind !== TOKEN.LITERAL) throw this.unexpected(lit, "a literal");
      return { kind: "const", value: `-${lit.text}` };
    }
    if (tok.kind === TOKEN.PUNCT && tok.text === "{") {
      this.next();
      const value = this.raw_until("}");
      this.expect_punct("}");
      return { kind: "const", value: `{ ${value} }` };
    }
    if (tok.kind === TOKEN.IDENT && (tok.text === "true" || tok.text === "false")) {
      this.next();
      return { kind: "const", value: tok.text };
    }
    if (tok.kind === TOKEN.IDENT) {
      const after = this.peek(1);
      if (after.kind === TOKEN.PUNCT && after.text === "=") {
        this.next();
        this.next();
        return { kind: "binding", ident: tok.text, type: this.type() };
      }
    }
    return { kind: "type", type: this.type() };
  }

  private paren_types(): TypeExpr[] {
    this.expect_punct("(");
    const types: TypeExpr[] = [];
    while (!this.is_punct(")")) {
      types.push(this.type());
      if (!this.eat_punct(",")) break;
    }
    this.expect_punct(")");
    return types;
  }

  private bounds(): TypeParamBound[] {
    const bounds: TypeParamBound[] = [this.bound()];
    while (this.eat_punct("+")) bounds.push(this.bound());
    return bounds;
  }

  private bound(): TypeParamBound {
    const tok = this.peek();
    if (tok.kind === TOKEN.LIFETIME) {
      this.next();
      return { kind: "lifetime", name: tok.text };
    }
    const maybe = this.eat_punct("?");
    return { kind: "trait", maybe, path: this.path() };
  }

  //=========================================================
  // Token helpers
  //=========================================================

  private peek(offset = 0): Token {
    const i = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[i];
  }

  private next(): Token {
    const tok = this.peek();
    if (tok.kind !== TOKEN.EOF) this.pos++;
    return tok;
  }

  private is_punct(text: string): boolean {
    const tok = this.peek();
    return tok.kind === TOKEN.PUNCT && tok.text === text;
  }

  private eat_punct(text: string): boolean {
    if (!this.is_punct(text)) return false;
    this.pos++;
    return true;
  }

  private expect_punct(text: string): void {
    if (!this.eat_punct(text)) throw this.unexpected(this.peek(), `"${text}"`);
  }

  private eat_ident(text: string): boolean {
    const tok = this.peek();
    if (tok.kind !== TOKEN.IDENT || tok.text !== text) return false;
    this.pos++;
    return true;
  }

  private expect_ident(text: string): void {
    if (!this.eat_ident(text)) throw this.unexpected(this.peek(), `"${text}"`);
  }

  /**
   * Consume tokens up to (not including) an unnested `close` and return
   * the source text they cover with whitespace collapsed.
   */
  private raw_until(close: string): string {
    const stack: string[] = [];
    const start = this.peek();

    for (;;) {
      const tok = this.peek();
      if (tok.kind === TOKEN.EOF) throw this.unexpected(tok, `"${close}"`);
      if (tok.kind === TOKEN.PUNCT) {
        if (stack.length === 0 && tok.text === close) break;
        const opener = OPENERS[tok.text];
        if (opener !== undefined) {
          stack.push(opener);
        } else if (stack.length > 0 && stack[stack.length - 1] === tok.text) {
          stack.pop();
        }
      }
      this.next();
    }

    const end = this.peek();
    const text = this.source
      .slice(start.column - 1, end.column - 1)
      .trim()
      .replace(/\s+/g, " ");
    if (text.length === 0) throw this.unexpected(end, "an expression");
    return text;
  }

  private unexpected(tok: Token, expected: string): TypeSyntaxError {
    if (tok.kind === TOKEN.EOF) {
      return new TypeSyntaxError(
        TYPE_SYNTAX_ERROR.UNEXPECTED_END,
        `expected ${expected} at column ${tok.column}, found end of input`,
        this.source,
        tok.column,
      );
    }
    return new TypeSyntaxError(
      TYPE_SYNTAX_ERROR.UNEXPECTED_TOKEN,
      `expected ${expected} at column ${tok.column}, found "${tok.text}"`,
      this.source,
      tok.column,
    );
  }
}

/** Parse a declared type. Throws TypeSyntaxError on malformed input. */
export function parse_type(source: string): TypeExpr {
  return new Parser(source, tokenize(source)).parse();
}
