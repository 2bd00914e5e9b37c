import { AppError } from "utils/error";

export enum TYPE_SYNTAX_ERROR {
  UNEXPECTED_CHARACTER = "UNEXPECTED_CHARACTER",
  UNEXPECTED_TOKEN = "UNEXPECTED_TOKEN",
  UNEXPECTED_END = "UNEXPECTED_END",
  TRAILING_INPUT = "TRAILING_INPUT",
}

export class TypeSyntaxError extends AppError {
  constructor(
    public readonly category: TYPE_SYNTAX_ERROR,
    message: string,
    public readonly source: string,
    public readonly column: number,
  ) {
    super(message, false, { source, column });
  }
}
