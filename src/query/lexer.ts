import { QueryError } from "./errors.js";

export type TokenType =
  | "EOF"
  | "UnquotedIdentifier"
  | "QuotedIdentifier"
  | "RawString"
  | "Literal"
  | "Number"
  | "Dot"
  | "Star"
  | "Comma"
  | "Colon"
  | "Current"
  | "Expref"
  | "Pipe"
  | "Or"
  | "And"
  | "Not"
  | "Eq"
  | "Ne"
  | "Lt"
  | "Lte"
  | "Gt"
  | "Gte"
  | "Lparen"
  | "Rparen"
  | "Lbrace"
  | "Rbrace"
  | "Lbracket"
  | "Rbracket"
  | "Filter"
  | "Flatten";

export interface Token {
  type: TokenType;
  value: unknown;
  start: number;
}

const SINGLE_CHAR: Record<string, TokenType> = {
  ".": "Dot",
  "*": "Star",
  ",": "Comma",
  ":": "Colon",
  "@": "Current",
  "(": "Lparen",
  ")": "Rparen",
  "{": "Lbrace",
  "}": "Rbrace",
  "]": "Rbracket",
};

const IDENT_START_RE = /[A-Za-z_]/;
const IDENT_RE = /[A-Za-z0-9_]/;
const DIGIT_RE = /[0-9]/;
const WHITESPACE_RE = /[ \t\n\r]/;

// Reads up to the matching unescaped `close`, returning the raw inner text.
function readDelimited(expr: string, start: number, close: string): { inner: string; end: number } {
  let i = start + 1;
  while (i < expr.length && expr[i] !== close) {
    if (expr[i] === "\\" && i + 1 < expr.length) i++;
    i++;
  }
  if (i >= expr.length) {
    throw new QueryError("LexerError", `Unterminated ${close} starting at position ${start}`);
  }
  return { inner: expr.slice(start + 1, i), end: i + 1 };
}

function parseJsonLiteral(inner: string, start: number): unknown {
  const text = inner.replace(/\\`/g, "`").trim();
  try {
    return JSON.parse(text);
  } catch {
    // Legacy form: `foo` is shorthand for the string "foo".
    try {
      return JSON.parse(`"${text}"`);
    } catch {
      throw new QueryError("LexerError", `Invalid JSON literal at position ${start}: ${inner}`);
    }
  }
}

export function tokenize(expr: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expr.length) {
    const ch = expr[i];
    const next = expr[i + 1] ?? "";
    const start = i;

    if (WHITESPACE_RE.test(ch)) {
      i++;
    } else if (IDENT_START_RE.test(ch)) {
      while (i < expr.length && IDENT_RE.test(expr[i])) i++;
      tokens.push({ type: "UnquotedIdentifier", value: expr.slice(start, i), start });
    } else if (ch in SINGLE_CHAR) {
      tokens.push({ type: SINGLE_CHAR[ch], value: ch, start });
      i++;
    } else if (DIGIT_RE.test(ch) || (ch === "-" && DIGIT_RE.test(next))) {
      i++;
      while (i < expr.length && DIGIT_RE.test(expr[i])) i++;
      tokens.push({ type: "Number", value: Number(expr.slice(start, i)), start });
    } else if (ch === "[") {
      if (next === "?") {
        tokens.push({ type: "Filter", value: "[?", start });
        i += 2;
      } else if (next === "]") {
        tokens.push({ type: "Flatten", value: "[]", start });
        i += 2;
      } else {
        tokens.push({ type: "Lbracket", value: "[", start });
        i++;
      }
    } else if (ch === "'") {
      const { inner, end } = readDelimited(expr, i, "'");
      tokens.push({ type: "RawString", value: inner.replace(/\\'/g, "'"), start });
      i = end;
    } else if (ch === '"') {
      const { inner, end } = readDelimited(expr, i, '"');
      let name: unknown;
      try {
        name = JSON.parse(`"${inner}"`);
      } catch {
        throw new QueryError("LexerError", `Invalid quoted identifier at position ${start}`);
      }
      tokens.push({ type: "QuotedIdentifier", value: name, start });
      i = end;
    } else if (ch === "`") {
      const { inner, end } = readDelimited(expr, i, "`");
      tokens.push({ type: "Literal", value: parseJsonLiteral(inner, start), start });
      i = end;
    } else if (ch === "|") {
      const or = next === "|";
      tokens.push({ type: or ? "Or" : "Pipe", value: or ? "||" : "|", start });
      i += or ? 2 : 1;
    } else if (ch === "&") {
      const and = next === "&";
      tokens.push({ type: and ? "And" : "Expref", value: and ? "&&" : "&", start });
      i += and ? 2 : 1;
    } else if (ch === "!") {
      const ne = next === "=";
      tokens.push({ type: ne ? "Ne" : "Not", value: ne ? "!=" : "!", start });
      i += ne ? 2 : 1;
    } else if (ch === "<" || ch === ">") {
      const orEqual = next === "=";
      const type: TokenType = ch === "<" ? (orEqual ? "Lte" : "Lt") : orEqual ? "Gte" : "Gt";
      tokens.push({ type, value: orEqual ? `${ch}=` : ch, start });
      i += orEqual ? 2 : 1;
    } else if (ch === "=" && next === "=") {
      tokens.push({ type: "Eq", value: "==", start });
      i += 2;
    } else {
      throw new QueryError("LexerError", `Unexpected character "${ch}" at position ${start}`);
    }
  }

  tokens.push({ type: "EOF", value: null, start: expr.length });
  return tokens;
}
