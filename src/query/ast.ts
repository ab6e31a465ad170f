export type ComparatorOp = "Eq" | "Ne" | "Lt" | "Lte" | "Gt" | "Gte";

export type AstNode =
  | { type: "Identity" }
  | { type: "Current" }
  | { type: "Field"; name: string }
  | { type: "Literal"; value: unknown }
  | { type: "Subexpression"; left: AstNode; right: AstNode }
  | { type: "IndexExpression"; left: AstNode; right: AstNode }
  | { type: "Index"; value: number }
  | { type: "Slice"; start: number | null; stop: number | null; step: number | null }
  | { type: "Projection"; left: AstNode; right: AstNode }
  | { type: "ValueProjection"; left: AstNode; right: AstNode }
  | { type: "FilterProjection"; left: AstNode; right: AstNode; condition: AstNode }
  | { type: "Flatten"; child: AstNode }
  | { type: "MultiSelectList"; children: AstNode[] }
  | { type: "MultiSelectHash"; pairs: { key: string; value: AstNode }[] }
  | { type: "Comparator"; op: ComparatorOp; left: AstNode; right: AstNode }
  | { type: "Or"; left: AstNode; right: AstNode }
  | { type: "And"; left: AstNode; right: AstNode }
  | { type: "Not"; child: AstNode }
  | { type: "Pipe"; left: AstNode; right: AstNode }
  | { type: "Function"; name: string; args: AstNode[] }
  | { type: "ExpressionReference"; child: AstNode };
