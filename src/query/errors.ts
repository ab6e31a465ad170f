export type QueryErrorKind =
  | "LexerError"
  | "ParseError"
  | "ArgumentError"
  | "TypeError"
  | "UnknownFunctionError"
  | "RuntimeError";

export class QueryError extends Error {
  constructor(
    readonly kind: QueryErrorKind,
    message: string,
  ) {
    super(`${kind}: ${message}`);
    this.name = "QueryError";
  }
}
