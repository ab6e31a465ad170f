export interface ExtractedList {
  text: string;
  // Number of input lines dropped before `text` starts.
  lineOffset: number;
}

const FENCE_RE = /^\s*```\s*([\w-]*)\s*$/;
const LIST_FENCE_LABELS = new Set(["yaml", "yml", ""]);

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function isListItem(line: string): boolean {
  const trimmed = line.trimStart();
  return trimmed.startsWith("- ") || trimmed === "-";
}

function fromFence(lines: string[]): ExtractedList | null {
  for (let i = 0; i < lines.length; i++) {
    const open = lines[i].match(FENCE_RE);
    if (!open) continue;

    const label = open[1].toLowerCase();
    let close = i + 1;
    while (close < lines.length && !FENCE_RE.test(lines[close])) close++;

    if (LIST_FENCE_LABELS.has(label)) {
      const body = lines.slice(i + 1, close);
      while (body.length > 0 && body[body.length - 1].trim() === "") body.pop();
      if (body.length > 0) {
        return { text: body.join("\n"), lineOffset: i + 1 };
      }
    }
    // Skip past the closing fence so it is not taken for an opening one.
    i = close;
  }
  return null;
}

function fromListRun(lines: string[]): ExtractedList | null {
  const start = lines.findIndex(isListItem);
  if (start < 0) return null;

  const base = indentOf(lines[start]);
  let end = start + 1;
  while (end < lines.length) {
    const line = lines[end];
    if (line.trim() === "") {
      end++;
      continue;
    }
    if (FENCE_RE.test(line)) break;
    const indent = indentOf(line);
    if (indent > base || (indent === base && isListItem(line))) {
      end++;
      continue;
    }
    break;
  }

  const run = lines.slice(start, end);
  while (run.length > 0 && run[run.length - 1].trim() === "") run.pop();
  return { text: run.join("\n"), lineOffset: start };
}

/**
 * Locate the item list inside decorated snapshot text.
 *
 * Plain lists pass through untouched. Otherwise the first fenced block
 * labelled `yaml`, `yml` or left unlabelled wins, and failing that the first
 * contiguous run of `- ` items after any narrative preamble. Text with no list
 * at all is returned as-is.
 */
export function extractItemList(input: string): ExtractedList {
  if (input.trimStart().startsWith("- ")) {
    return { text: input, lineOffset: 0 };
  }

  const lines = input.split(/\r?\n/);
  return fromFence(lines) ?? fromListRun(lines) ?? { text: input, lineOffset: 0 };
}
