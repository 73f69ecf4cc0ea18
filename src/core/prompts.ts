/**
 * Fixed instruction sent with every document. The model gets the document as
 * the user message and this text as the system prompt.
 */
export const ENHANCE_INSTRUCTIONS = `You improve a user's working notes in place. Take the document you are given and:

1. Correct spelling and obvious typos where they occur. Do not reword correct text.
2. Do not remove, shorten or reorder content.
3. Add brief clarifications where they help understanding. Put a clarification on the same line in [square brackets]; put supplemental information in (parentheses) as a bullet or sub-bullet under the line it belongs to.
4. Preserve the original formatting exactly: headings, indentation, bullet markers, numbering and line breaks.
5. Reply with the full improved document only. No code fences, no preamble, no apologies, no closing remarks.`;

export interface EnhancementRequest {
  instructions: string;
  sourceText: string;
}

export function buildEnhancementRequest(sourceText: string): EnhancementRequest {
  return { instructions: ENHANCE_INSTRUCTIONS, sourceText };
}

const FENCE_OPEN = /^\s*(```+|~~~+)[\w+-]*\s*$/;
const PREAMBLE = /^(okay|ok|sure|certainly|of course|here is|here's)\b.*(:|markdown|notes|document|version)\W*$/i;

function firstContentIndex(lines: string[]): number {
  return lines.findIndex((line) => line.trim() !== "");
}

function lastContentIndex(lines: string[]): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if ((lines[i] ?? "").trim() !== "") return i;
  }
  return -1;
}

/**
 * Drops one fence pair that wraps the whole response. Fences inside the
 * document, or a wrapper the source itself had, are content.
 */
function unwrapFence(lines: string[], sourceLines: string[]): string[] {
  const first = firstContentIndex(lines);
  const last = lastContentIndex(lines);
  if (first < 0 || last <= first) return lines;

  const opener = FENCE_OPEN.exec(lines[first] ?? "");
  const marker = opener?.[1];
  if (!marker || (lines[last] ?? "").trim() !== marker) return lines;

  const sourceFirst = sourceLines[firstContentIndex(sourceLines)];
  if (sourceFirst !== undefined && sourceFirst.trim() === (lines[first] ?? "").trim()) return lines;

  return [...lines.slice(0, first), ...lines.slice(first + 1, last), ...lines.slice(last + 1)];
}

/**
 * Normalize model output into the document text: drops a wrapping code fence,
 * a chatty first line the user never wrote, and runs of identical non-blank
 * lines. A trailing newline on the source is kept.
 */
export function cleanEnhancedText(raw: string, sourceText = ""): string {
  const sourceLines = sourceText.split(/\r?\n/);
  let lines = raw.trimEnd().split(/\r?\n/);

  const dropLeadingBlanks = () => {
    while (lines.length > 0 && (lines[0] ?? "").trim() === "") lines.shift();
  };
  dropLeadingBlanks();

  const head = (lines[0] ?? "").trim();
  const userWroteIt = sourceLines.some((line) => line.trim() === head);
  if (lines.length > 1 && PREAMBLE.test(head) && !userWroteIt) {
    lines.shift();
    dropLeadingBlanks();
  }

  lines = unwrapFence(lines, sourceLines);
  dropLeadingBlanks();

  const out: string[] = [];
  for (const line of lines) {
    const prev = out[out.length - 1];
    if (prev !== undefined && line.trim() !== "" && line === prev) continue;
    out.push(line);
  }

  const text = out.join("\n").trimEnd();
  return text && /\r?\n$/.test(sourceText) ? `${text}\n` : text;
}
