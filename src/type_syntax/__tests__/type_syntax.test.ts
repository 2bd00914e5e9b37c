import { describe, expect, it } from "vitest";
import {
  parse_type,
  path_type,
  print_type,
  tokenize,
  TOKEN,
  TYPE_SYNTAX_ERROR,
  TypeSyntaxError,
} from "../index";

const canonical = (source: string): string => print_type(parse_type(source));

function syntax_error(source: string): TypeSyntaxError {
  try {
    parse_type(source);
  } catch (error) {
    if (error instanceof TypeSyntaxError) return error;
    throw error;
  }
  throw new Error(`expected "${source}" to be rejected`);
}

describe("tokenize", () => {
  it("splits >> into two closing brackets", () => {
    const tokens = tokenize("Vec<Vec<u8>>");
    expect(tokens.map((t) => t.text)).toEqual([
      "Vec", "<", "Vec", "<", "u8", ">", ">", "",
    ]);
  });

  it("tells lifetimes from char literals", () => {
    const [lifetime, , literal] = tokenize("'a, 'b'");
    expect(lifetime).toEqual({ kind: TOKEN.LIFETIME, text: "'a", column: 1 });
    expect(literal).toEqual({ kind: TOKEN.LITERAL, text: "'b'", column: 5 });
  });

  it("reports 1-based columns", () => {
    const tokens = tokenize("  a::b");
    expect(tokens.map((t) => t.column)).toEqual([3, 4, 6, 7]);
  });
});

describe("parse_type", () => {
  //=========================================================
  // Paths
  //=========================================================

  it("parses a plain identifier as a single-segment path", () => {
    expect(parse_type("Position")).toEqual(path_type("Position"));
  });

  it("parses generic arguments", () => {
    expect(parse_type("Option<Animation>")).toEqual(
      path_type("Option", [path_type("Animation")]),
    );
  });

  it("keeps a leading :: on the path", () => {
    const type = parse_type("::std::option::Option<u8>");
    expect(type.kind).toBe("path");
    if (type.kind !== "path") return;
    expect(type.path.leading_colon).toBe(true);
    expect(type.path.segments.map((s) => s.ident)).toEqual(["std", "option", "Option"]);
  });

  it("attaches a turbofish to the segment before it", () => {
    const type = parse_type("Option::<u8>");
    if (type.kind !== "path") throw new Error("expected a path");
    expect(type.path.segments).toHaveLength(1);
    const [segment] = type.path.segments;
    expect(segment.ident).toBe("Option");
    expect(segment.arguments.kind).toBe("angle_bracketed");
    if (segment.arguments.kind !== "angle_bracketed") return;
    expect(segment.arguments.colon2).toBe(true);
  });

  it("distinguishes lifetime, const and binding arguments", () => {
    const type = parse_type("Thing<'a, 3, Item = u8, u16>");
    if (type.kind !== "path") throw new Error("expected a path");
    const args = type.path.segments[0].arguments;
    if (args.kind !== "angle_bracketed") throw new Error("expected angle brackets");
    expect(args.args.map((a) => a.kind)).toEqual(["lifetime", "const", "binding", "type"]);
  });

  it("parses a qualified self path", () => {
    const type = parse_type("<T as Iterator>::Item");
    if (type.kind !== "path") throw new Error("expected a path");
    expect(type.qself).not.toBeNull();
    expect(type.path.segments.map((s) => s.ident)).toEqual(["Item"]);
  });

  //=========================================================
  // Other type forms
  //=========================================================

  it("parses each non-path form to its own kind", () => {
    expect(parse_type("&'a mut T").kind).toBe("reference");
    expect(parse_type("*const u8").kind).toBe("pointer");
    expect(parse_type("()").kind).toBe("tuple");
    expect(parse_type("(A,)").kind).toBe("tuple");
    expect(parse_type("(A)").kind).toBe("paren");
    expect(parse_type("[u8; 4]").kind).toBe("array");
    expect(parse_type("[u8]").kind).toBe("slice");
    expect(parse_type("dyn Any").kind).toBe("trait_object");
    expect(parse_type("Any + Send").kind).toBe("trait_object");
    expect(parse_type("impl Iterator").kind).toBe("impl_trait");
    expect(parse_type("fn(u8) -> u8").kind).toBe("bare_fn");
    expect(parse_type("!").kind).toBe("never");
    expect(parse_type("_").kind).toBe("infer");
  });

  it("keeps the raw text of an array length", () => {
    const type = parse_type("[u8; N * 2]");
    if (type.kind !== "array") throw new Error("expected an array");
    expect(type.len).toBe("N * 2");
  });

  //=========================================================
  // Errors
  //=========================================================

  it("rejects unterminated generic arguments at end of input", () => {
    const error = syntax_error("Option<");
    expect(error.category).toBe(TYPE_SYNTAX_ERROR.UNEXPECTED_END);
    expect(error.column).toBe(8);
    expect(error.message).toBe("expected a type at column 8, found end of input");
  });

  it("rejects trailing input after a complete type", () => {
    const error = syntax_error("Vec<u8> extra");
    expect(error.category).toBe(TYPE_SYNTAX_ERROR.TRAILING_INPUT);
    expect(error.message).toBe('unexpected "extra" after type at column 9');
  });

  it("rejects characters outside the type grammar", () => {
    const error = syntax_error("Vec<u8$>");
    expect(error.category).toBe(TYPE_SYNTAX_ERROR.UNEXPECTED_CHARACTER);
    expect(error.column).toBe(7);
  });

  it("rejects a pointer without const or mut", () => {
    const error = syntax_error("*u8");
    expect(error.category).toBe(TYPE_SYNTAX_ERROR.UNEXPECTED_TOKEN);
    expect(error.message).toBe('expected "const" or "mut" at column 2, found "u8"');
  });

  it("rejects empty input", () => {
    const error = syntax_error("");
    expect(error.category).toBe(TYPE_SYNTAX_ERROR.UNEXPECTED_END);
    expect(error.column).toBe(1);
  });

  it("is not operational and carries the source", () => {
    const error = syntax_error("Option<");
    expect(error.is_operational).toBe(false);
    expect(error.context).toEqual({ source: "Option<", column: 8 });
  });
});

describe("print_type", () => {
  it("normalizes whitespace", () => {
    expect(canonical("Vec< u8 >")).toBe("Vec<u8>");
    expect(canonical("HashMap<String,Vec<Option<u32>>>")).toBe(
      "HashMap<String, Vec<Option<u32>>>",
    );
  });

  it("prints every form canonically", () => {
    expect(canonical("&'a  mut T")).toBe("&'a mut T");
    expect(canonical("&T")).toBe("&T");
    expect(canonical("*mut u8")).toBe("*mut u8");
    expect(canonical("( )")).toBe("()");
    expect(canonical("(A ,)")).toBe("(A,)");
    expect(canonical("(A,B)")).toBe("(A, B)");
    expect(canonical("( T )")).toBe("(T)");
    expect(canonical("[u8;4]")).toBe("[u8; 4]");
    expect(canonical("[ u8 ]")).toBe("[u8]");
    expect(canonical("Option :: < T >")).toBe("Option::<T>");
    expect(canonical("< T as Iterator >::Item")).toBe("<T as Iterator>::Item");
    expect(canonical("dyn Fn(u32)->bool+Send")).toBe("dyn Fn(u32) -> bool + Send");
    expect(canonical("Box<dyn Any+'static>")).toBe("Box<dyn Any + 'static>");
    expect(canonical("impl Iterator<Item=u32>")).toBe("impl Iterator<Item = u32>");
    expect(canonical("fn(u8,u16)->u32")).toBe("fn(u8, u16) -> u32");
    expect(canonical("Matrix<3, -1, {N}>")).toBe("Matrix<3, -1, { N }>");
    expect(canonical("Flag<true>")).toBe("Flag<true>");
    expect(canonical("T + ?Sized")).toBe("T + ?Sized");
  });

  it("reparses its own output to the same tree", () => {
    const sources = [
      "std::collections::HashMap<&'static str, [Option<u8>; 16]>",
      "<Vec<T> as IntoIterator>::IntoIter",
      "Box<dyn Fn(&mut World) -> Option<(A,)> + Send>",
      "Cow<'a, [u8]>",
    ];
    for (const source of sources) {
      const type = parse_type(source);
      expect(parse_type(print_type(type))).toEqual(type);
    }
  });
});
