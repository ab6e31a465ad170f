import type { AstNode, ComparatorOp } from "./ast.js";
import { QueryError } from "./errors.js";
import { tokenize } from "./lexer.js";
import type { Token, TokenType } from "./lexer.js";

const BINDING_POWER: Partial<Record<TokenType, number>> = {
  Pipe: 1,
  Or: 2,
  And: 3,
  Eq: 5,
  Ne: 5,
  Lt: 5,
  Lte: 5,
  Gt: 5,
  Gte: 5,
  Flatten: 9,
  Star: 20,
  Filter: 21,
  Dot: 40,
  Not: 45,
  Lbrace: 50,
  Lbracket: 55,
  Lparen: 60,
};

// Projections stop at anything binding looser than this.
const PROJECTION_STOP = 10;

const COMPARATORS = new Set<TokenType>(["Eq", "Ne", "Lt", "Lte", "Gt", "Gte"]);

function bindingPower(type: TokenType): number {
  return BINDING_POWER[type] ?? 0;
}

function isComparator(type: TokenType): type is ComparatorOp {
  return COMPARATORS.has(type);
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): AstNode {
    const ast = this.expression(0);
    const trailing = this.lookaheadToken(0);
    if (trailing.type !== "EOF") {
      throw this.unexpected(trailing);
    }
    return ast;
  }

  private lookahead(n: number): TokenType {
    return this.lookaheadToken(n).type;
  }

  private lookaheadToken(n: number): Token {
    return this.tokens[Math.min(this.index + n, this.tokens.length - 1)];
  }

  private advance(): void {
    this.index++;
  }

  private match(type: TokenType): void {
    const token = this.lookaheadToken(0);
    if (token.type !== type) {
      throw new QueryError("ParseError", `Expected ${type}, got ${token.type} at position ${token.start}`);
    }
    this.advance();
  }

  private unexpected(token: Token): QueryError {
    const what = token.type === "EOF" ? "end of expression" : `token ${token.type}`;
    return new QueryError("ParseError", `Unexpected ${what} at position ${token.start}`);
  }

  private expression(rbp: number): AstNode {
    const token = this.lookaheadToken(0);
    this.advance();
    let left = this.nud(token);
    while (rbp < bindingPower(this.lookahead(0))) {
      const current = this.lookaheadToken(0);
      this.advance();
      left = this.led(current, left);
    }
    return left;
  }

  private nud(token: Token): AstNode {
    switch (token.type) {
      case "Literal":
        return { type: "Literal", value: token.value };
      case "RawString":
        return { type: "Literal", value: token.value };
      case "UnquotedIdentifier":
        return { type: "Field", name: String(token.value) };
      case "QuotedIdentifier":
        if (this.lookahead(0) === "Lparen") {
          throw new QueryError("ParseError", `Quoted identifier cannot name a function at position ${token.start}`);
        }
        return { type: "Field", name: String(token.value) };
      case "Not":
        return { type: "Not", child: this.expression(bindingPower("Not")) };
      case "Star": {
        const right =
          this.lookahead(0) === "Rbracket" ? { type: "Identity" as const } : this.projectionRhs(bindingPower("Star"));
        return { type: "ValueProjection", left: { type: "Identity" }, right };
      }
      case "Filter":
        return this.led(token, { type: "Identity" });
      case "Lbrace":
        return this.multiSelectHash();
      case "Flatten":
        return {
          type: "Projection",
          left: { type: "Flatten", child: { type: "Identity" } },
          right: this.projectionRhs(bindingPower("Flatten")),
        };
      case "Lbracket":
        if (this.lookahead(0) === "Number" || this.lookahead(0) === "Colon") {
          return this.projectIfSlice({ type: "Identity" }, this.indexExpression());
        }
        if (this.lookahead(0) === "Star" && this.lookahead(1) === "Rbracket") {
          this.advance();
          this.advance();
          return {
            type: "Projection",
            left: { type: "Identity" },
            right: this.projectionRhs(bindingPower("Star")),
          };
        }
        return this.multiSelectList();
      case "Current":
        return { type: "Current" };
      case "Expref":
        return { type: "ExpressionReference", child: this.expression(bindingPower("Expref")) };
      case "Lparen": {
        const inner = this.expression(0);
        this.match("Rparen");
        return inner;
      }
      default:
        throw this.unexpected(token);
    }
  }

  private led(token: Token, left: AstNode): AstNode {
    switch (token.type) {
      case "Dot": {
        const rbp = bindingPower("Dot");
        if (this.lookahead(0) !== "Star") {
          return { type: "Subexpression", left, right: this.dotRhs(rbp) };
        }
        this.advance();
        return { type: "ValueProjection", left, right: this.projectionRhs(rbp) };
      }
      case "Pipe":
        return { type: "Pipe", left, right: this.expression(bindingPower("Pipe")) };
      case "Or":
        return { type: "Or", left, right: this.expression(bindingPower("Or")) };
      case "And":
        return { type: "And", left, right: this.expression(bindingPower("And")) };
      case "Lparen": {
        if (left.type !== "Field") {
          throw new QueryError("ParseError", `Function call without a name at position ${token.start}`);
        }
        const args: AstNode[] = [];
        while (this.lookahead(0) !== "Rparen") {
          args.push(this.expression(0));
          if (this.lookahead(0) === "Comma") this.match("Comma");
          else if (this.lookahead(0) !== "Rparen") throw this.unexpected(this.lookaheadToken(0));
        }
        this.match("Rparen");
        return { type: "Function", name: left.name, args };
      }
      case "Filter": {
        const condition = this.expression(0);
        this.match("Rbracket");
        const right =
          this.lookahead(0) === "Flatten" ? { type: "Identity" as const } : this.projectionRhs(bindingPower("Filter"));
        return { type: "FilterProjection", left, right, condition };
      }
      case "Flatten":
        return {
          type: "Projection",
          left: { type: "Flatten", child: left },
          right: this.projectionRhs(bindingPower("Flatten")),
        };
      case "Lbracket": {
        if (this.lookahead(0) === "Number" || this.lookahead(0) === "Colon") {
          return this.projectIfSlice(left, this.indexExpression());
        }
        this.match("Star");
        this.match("Rbracket");
        return { type: "Projection", left, right: this.projectionRhs(bindingPower("Star")) };
      }
      default:
        if (isComparator(token.type)) {
          return { type: "Comparator", op: token.type, left, right: this.expression(bindingPower(token.type)) };
        }
        throw this.unexpected(token);
    }
  }

  private indexExpression(): AstNode {
    if (this.lookahead(0) === "Colon" || this.lookahead(1) === "Colon") {
      return this.sliceExpression();
    }
    const token = this.lookaheadToken(0);
    this.advance();
    this.match("Rbracket");
    return { type: "Index", value: Number(token.value) };
  }

  private sliceExpression(): AstNode {
    const parts: (number | null)[] = [null, null, null];
    let position = 0;
    while (this.lookahead(0) !== "Rbracket" && position < 3) {
      const token = this.lookaheadToken(0);
      if (token.type === "Colon") {
        position++;
      } else if (token.type === "Number") {
        parts[position] = Number(token.value);
      } else {
        throw this.unexpected(token);
      }
      this.advance();
    }
    this.match("Rbracket");
    return { type: "Slice", start: parts[0], stop: parts[1], step: parts[2] };
  }

  private projectIfSlice(left: AstNode, right: AstNode): AstNode {
    const indexed: AstNode = { type: "IndexExpression", left, right };
    if (right.type === "Slice") {
      return { type: "Projection", left: indexed, right: this.projectionRhs(bindingPower("Star")) };
    }
    return indexed;
  }

  private dotRhs(rbp: number): AstNode {
    const next = this.lookahead(0);
    if (next === "UnquotedIdentifier" || next === "QuotedIdentifier" || next === "Star") {
      return this.expression(rbp);
    }
    if (next === "Lbracket") {
      this.match("Lbracket");
      return this.multiSelectList();
    }
    if (next === "Lbrace") {
      this.match("Lbrace");
      return this.multiSelectHash();
    }
    throw this.unexpected(this.lookaheadToken(0));
  }

  private projectionRhs(rbp: number): AstNode {
    const next = this.lookahead(0);
    if (bindingPower(next) < PROJECTION_STOP) {
      return { type: "Identity" };
    }
    if (next === "Lbracket" || next === "Filter") {
      return this.expression(rbp);
    }
    if (next === "Dot") {
      this.match("Dot");
      return this.dotRhs(rbp);
    }
    throw this.unexpected(this.lookaheadToken(0));
  }

  private multiSelectList(): AstNode {
    const children: AstNode[] = [];
    while (this.lookahead(0) !== "Rbracket") {
      children.push(this.expression(0));
      if (this.lookahead(0) === "Comma") {
        this.match("Comma");
        if (this.lookahead(0) === "Rbracket") throw this.unexpected(this.lookaheadToken(0));
      } else if (this.lookahead(0) !== "Rbracket") {
        throw this.unexpected(this.lookaheadToken(0));
      }
    }
    this.match("Rbracket");
    return { type: "MultiSelectList", children };
  }

  private multiSelectHash(): AstNode {
    const pairs: { key: string; value: AstNode }[] = [];
    for (;;) {
      const keyToken = this.lookaheadToken(0);
      if (keyToken.type !== "UnquotedIdentifier" && keyToken.type !== "QuotedIdentifier") {
        throw new QueryError("ParseError", `Expected a key name, got ${keyToken.type} at position ${keyToken.start}`);
      }
      this.advance();
      this.match("Colon");
      pairs.push({ key: String(keyToken.value), value: this.expression(0) });
      if (this.lookahead(0) === "Comma") {
        this.match("Comma");
      } else {
        this.match("Rbrace");
        break;
      }
    }
    return { type: "MultiSelectHash", pairs };
  }
}

export function compile(expression: string): AstNode {
  return new Parser(tokenize(expression)).parse();
}
