import type {
  AriaChild,
  AriaCheckedState,
  AriaName,
  AriaTemplateNode,
  AriaTree,
  ParseError,
  ParseResult,
} from "../types.js";
import { extractItemList } from "./extract.js";
import { isStructuredSnapshot, parseStructuredSnapshot } from "./structured.js";

// Grammar, one item per line:
//   - role "name" [attr, key=value] [more]:
//   - role /regex/:
//   - text: literal
//   - /prop: value
// Nesting comes from indentation alone.

interface SourceLine {
  number: number;
  indent: number;
  content: string;
}

type LineItem =
  | { kind: "node"; node: AriaTemplateNode }
  | { kind: "text"; text: string }
  | { kind: "prop"; key: string; value: string }
  | { kind: "error"; message: string };

const ROLE_RE = /^[A-Za-z][\w-]*/;
const TEXT_RE = /^text:(?:\s+(.*))?$/;
const PROP_RE = /^\/([A-Za-z_][\w-]*):(?:\s+(.*))?$/;
const ATTRIBUTE_RE = /^([A-Za-z_][\w-]*)(?:=(.*))?$/s;
const INTEGER_RE = /^-?\d+$/;

function preview(text: string): string {
  return text.length > 40 ? `${text.slice(0, 40)}...` : text;
}

function decodeQuoted(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(raw);
    return typeof decoded === "string" ? decoded : raw.slice(1, -1);
  } catch {
    // Invalid escapes: keep the contents verbatim.
    return raw.slice(1, -1);
  }
}

function unquote(text: string): string {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"') ? decodeQuoted(text) : text;
}

class LineScanner {
  pos = 0;

  constructor(readonly text: string) {}

  done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text[this.pos] ?? "";
  }

  rest(): string {
    return this.text.slice(this.pos);
  }

  skipSpaces(): void {
    while (this.peek() === " " || this.peek() === "\t") this.pos++;
  }

  consume(re: RegExp): string | null {
    const match = this.rest().match(re);
    if (!match) return null;
    this.pos += match[0].length;
    return match[0];
  }

  // Reads from the opening delimiter through the first unescaped closing one.
  readDelimited(close: string): string | null {
    const start = this.pos;
    for (let i = start + 1; i < this.text.length; i++) {
      const ch = this.text[i];
      if (ch === "\\") {
        i++;
      } else if (ch === close) {
        this.pos = i + 1;
        return this.text.slice(start, i + 1);
      }
    }
    return null;
  }

  // Reads a [...] group; brackets inside quoted values do not close it.
  readBracketGroup(): string | null {
    let quoted = false;
    for (let i = this.pos + 1; i < this.text.length; i++) {
      const ch = this.text[i];
      if (quoted && ch === "\\") {
        i++;
      } else if (ch === '"') {
        quoted = !quoted;
      } else if (ch === "]" && !quoted) {
        const inner = this.text.slice(this.pos + 1, i);
        this.pos = i + 1;
        return inner;
      }
    }
    return null;
  }
}

function readName(scanner: LineScanner): AriaName | string | undefined {
  const open = scanner.peek();
  if (open === '"') {
    const raw = scanner.readDelimited('"');
    if (raw === null) return "Unterminated quoted name";
    return { value: decodeQuoted(raw), isRegex: false };
  }
  if (open === "/") {
    const raw = scanner.readDelimited("/");
    if (raw === null) return "Unterminated regex name";
    return { value: raw.slice(1, -1), isRegex: true };
  }
  return undefined;
}

function literalName(text: string): AriaName {
  if (text.length >= 2 && text.startsWith("/") && text.endsWith("/")) {
    return { value: text.slice(1, -1), isRegex: true };
  }
  return { value: unquote(text), isRegex: false };
}

function splitAttributes(group: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quoted = false;
  for (let i = 0; i < group.length; i++) {
    const ch = group[i];
    if (quoted && ch === "\\") {
      current += ch + (group[i + 1] ?? "");
      i++;
      continue;
    }
    if (ch === '"') quoted = !quoted;
    if (!quoted && (ch === "," || ch === " " || ch === "\t")) {
      if (current) tokens.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (current) tokens.push(current);
  return tokens;
}

function parseCheckedState(value: string): AriaCheckedState | undefined {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "mixed") return "mixed";
  return undefined;
}

function parseFlag(value: string): boolean | undefined {
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

function applyAttribute(node: AriaTemplateNode, key: string, value: string | undefined): string | undefined {
  switch (key) {
    case "ref":
      if (!value) return 'Attribute "ref" requires a value';
      node.ref = value;
      return undefined;
    case "checked":
    case "pressed": {
      const state = value === undefined ? true : parseCheckedState(value);
      if (state === undefined) return `Invalid ${key} value "${value}", expected true, false or mixed`;
      node[key] = state;
      return undefined;
    }
    case "disabled":
    case "expanded":
    case "active":
    case "selected": {
      const flag = value === undefined ? true : parseFlag(value);
      if (flag === undefined) return `Invalid ${key} value "${value}", expected true or false`;
      node[key] = flag;
      return undefined;
    }
    case "level":
      if (value === undefined || !INTEGER_RE.test(value)) {
        return `Invalid level "${value ?? ""}", expected an integer`;
      }
      node.level = Number(value);
      return undefined;
    default:
      node.props[key] = value ?? "true";
      return undefined;
  }
}

function parseAttributeGroup(node: AriaTemplateNode, group: string): string | undefined {
  for (const token of splitAttributes(group)) {
    const match = token.match(ATTRIBUTE_RE);
    if (!match) return `Malformed attribute "${token}"`;
    const value = match[2] === undefined ? undefined : unquote(match[2]);
    const error = applyAttribute(node, match[1], value);
    if (error) return error;
  }
  return undefined;
}

function parseNodeLine(body: string): LineItem {
  const scanner = new LineScanner(body);
  const role = scanner.consume(ROLE_RE);
  if (!role) return { kind: "error", message: `Expected a role, got "${preview(body)}"` };

  const node: AriaTemplateNode = { kind: "node", role, props: {}, children: [] };

  scanner.skipSpaces();
  const name = readName(scanner);
  if (typeof name === "string") return { kind: "error", message: name };
  if (name) node.name = name;

  scanner.skipSpaces();
  while (scanner.peek() === "[") {
    const group = scanner.readBracketGroup();
    if (group === null) return { kind: "error", message: "Unterminated attribute list" };
    const error = parseAttributeGroup(node, group);
    if (error) return { kind: "error", message: error };
    scanner.skipSpaces();
  }

  if (scanner.peek() === ":") {
    scanner.pos++;
    const inline = scanner.rest().trim();
    scanner.pos = body.length;
    if (inline) {
      if (node.name) {
        node.children.push(unquote(inline));
      } else {
        node.name = literalName(inline);
      }
    }
  }

  if (!scanner.done()) {
    return { kind: "error", message: `Unexpected "${preview(scanner.rest())}" after role "${role}"` };
  }
  return { kind: "node", node };
}

function parseLine(content: string): LineItem {
  let body: string;
  if (content.startsWith("- ")) {
    body = content.slice(2).trimStart();
  } else if (TEXT_RE.test(content)) {
    body = content;
  } else if (content === "-") {
    return { kind: "error", message: "Empty list item" };
  } else {
    return { kind: "error", message: `Expected "- " list item, got "${preview(content)}"` };
  }

  const text = body.match(TEXT_RE);
  if (text) return { kind: "text", text: unquote(text[1] ?? "") };

  const prop = body.match(PROP_RE);
  if (prop) return { kind: "prop", key: prop[1], value: unquote(prop[2] ?? "") };

  return parseNodeLine(body);
}

function toSourceLines(text: string, lineOffset: number): SourceLine[] {
  const lines: SourceLine[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const content = raw.trim();
    if (!content) return;
    lines.push({
      number: lineOffset + i + 1,
      indent: raw.length - raw.trimStart().length,
      content,
    });
  });
  return lines;
}

function rejectNested(lines: SourceLine[], index: number, blockEnd: number, what: string, errors: ParseError[]): void {
  if (blockEnd > index + 1) {
    errors.push({ line: lines[index + 1].number, message: `${what} entries cannot have children` });
  }
}

// Parses lines[start, end) as siblings. A line's block is every following
// line indented deeper than it; an unparseable line drops its whole block.
function parseBlock(
  lines: SourceLine[],
  start: number,
  end: number,
  parent: AriaTemplateNode | undefined,
  errors: ParseError[],
): AriaChild[] {
  const children: AriaChild[] = [];
  let i = start;
  while (i < end) {
    const line = lines[i];
    let blockEnd = i + 1;
    while (blockEnd < end && lines[blockEnd].indent > line.indent) blockEnd++;

    const item = parseLine(line.content);
    switch (item.kind) {
      case "node":
        item.node.children.push(...parseBlock(lines, i + 1, blockEnd, item.node, errors));
        children.push(item.node);
        break;
      case "text":
        children.push(item.text);
        rejectNested(lines, i, blockEnd, "Text", errors);
        break;
      case "prop":
        if (!parent) {
          errors.push({ line: line.number, message: `Property "/${item.key}" must be nested under a node` });
        } else {
          parent.props[item.key] = item.value;
          rejectNested(lines, i, blockEnd, "Property", errors);
        }
        break;
      case "error":
        errors.push({ line: line.number, message: item.message });
        break;
    }
    i = blockEnd;
  }
  return children;
}

/**
 * Parse an aria snapshot into a tree plus structural errors. Never throws:
 * malformed lines are reported and skipped together with the lines nested
 * under them. Blank input yields no tree and no errors.
 *
 * Text with a root-level `- role: ...` item is read as YAML written by the
 * serializer and formatter. A tree made only of root text leaves cannot be
 * told apart from ordinary snapshot lines once written out that way, so
 * `- hello` comes back as a node with role `hello`.
 */
export function parseAriaSnapshot(input: string): ParseResult {
  if (input.trim() === "") return { tree: undefined, errors: [] };

  const { text, lineOffset } = extractItemList(input);
  if (isStructuredSnapshot(text)) return parseStructuredSnapshot(text, lineOffset);

  const lines = toSourceLines(text, lineOffset);
  const errors: ParseError[] = [];
  const tree: AriaTree = parseBlock(lines, 0, lines.length, undefined, errors);
  return { tree, errors };
}
