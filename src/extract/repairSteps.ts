// Pure string -> string repairs for JSON that models emit. Each step is total:
// it never throws and returns its input untouched when it has nothing to fix.

export type RepairStepName =
  | "strip_code_fence"
  | "close_unbalanced_quote"
  | "close_unbalanced_brackets"
  | "remove_trailing_commas"
  | "quote_single_quoted_keys"
  | "strip_comments"
  | "remove_invalid_escapes";

export type RepairStep = { name: RepairStepName; apply: (text: string) => string };

type Segment = { inString: boolean; text: string };

/** Splits text into double-quoted string literals and everything between them. */
export function splitStringLiterals(text: string): Segment[] {
  const segments: Segment[] = [];
  let start = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escapeNext) {
        escapeNext = false;
      } else if (ch === "\\") {
        escapeNext = true;
      } else if (ch === '"') {
        segments.push({ inString: true, text: text.slice(start, i + 1) });
        start = i + 1;
        inString = false;
      }
    } else if (ch === '"') {
      if (i > start) segments.push({ inString: false, text: text.slice(start, i) });
      start = i;
      inString = true;
    }
  }
  if (start < text.length) segments.push({ inString, text: text.slice(start) });
  return segments;
}

function mapOutsideStrings(text: string, fn: (chunk: string) => string): string {
  return splitStringLiterals(text)
    .map((s) => (s.inString ? s.text : fn(s.text)))
    .join("");
}

export function stripCodeFence(text: string): string {
  let t = text.trim();
  if (t.startsWith("```")) {
    t = t.replace(/^```[\w-]*[ \t]*\r?\n?/, "");
  }
  t = t.replace(/\r?\n?```[ \t]*$/, "");
  return t.replace(/^`+/, "").replace(/`+$/, "").trim();
}

function unescapedQuoteIndexes(text: string): number[] {
  const out: number[] = [];
  let backslashes = 0;
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "\\") {
      backslashes += 1;
      continue;
    }
    if (ch === '"' && backslashes % 2 === 0) out.push(i);
    backslashes = 0;
  }
  return out;
}

export function closeUnbalancedQuote(text: string): string {
  const quotes = unescapedQuoteIndexes(text);
  if (quotes.length % 2 === 0) return text;

  const last = quotes[quotes.length - 1];
  const rest = text.slice(last + 1);
  const at = rest.search(/[,}\]\n]/);
  if (at === -1) return `${text}"`;
  const insertAt = last + 1 + at;
  return `${text.slice(0, insertAt)}"${text.slice(insertAt)}`;
}

export function closeUnbalancedBrackets(text: string): string {
  let braces = 0;
  let brackets = 0;
  for (const segment of splitStringLiterals(text)) {
    if (segment.inString) continue;
    for (const ch of segment.text) {
      if (ch === "{") braces += 1;
      else if (ch === "}") braces -= 1;
      else if (ch === "[") brackets += 1;
      else if (ch === "]") brackets -= 1;
    }
  }
  return `${text}${"}".repeat(Math.max(0, braces))}${"]".repeat(Math.max(0, brackets))}`;
}

export function removeTrailingCommas(text: string): string {
  return mapOutsideStrings(text, (chunk) => chunk.replace(/,(\s*[}\]])/g, "$1"));
}

export function quoteSingleQuotedKeys(text: string): string {
  return mapOutsideStrings(text, (chunk) => chunk.replace(/'([^'\n]+)'(\s*):/g, '"$1"$2:'));
}

export function stripComments(text: string): string {
  let out = "";
  for (const segment of splitStringLiterals(text)) {
    if (segment.inString) {
      out += segment.text;
      continue;
    }
    const chunk = segment.text;
    let i = 0;
    while (i < chunk.length) {
      if (chunk.startsWith("//", i)) {
        const nl = chunk.indexOf("\n", i);
        i = nl === -1 ? chunk.length : nl;
      } else if (chunk.startsWith("/*", i)) {
        const end = chunk.indexOf("*/", i + 2);
        i = end === -1 ? chunk.length : end + 2;
      } else {
        out += chunk[i];
        i += 1;
      }
    }
  }
  return out;
}

const VALID_ESCAPES = new Set(['"', "\\", "/", "b", "f", "n", "r", "t", "u"]);

// Only the escape character is judged; "\u" keeps whatever follows it, and "\U" is dropped like any other.
export function removeInvalidEscapes(text: string): string {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch !== "\\") {
      out += ch;
      i += 1;
      continue;
    }
    const next = text[i + 1];
    if (next === undefined) break;
    out += VALID_ESCAPES.has(next) ? `\\${next}` : next;
    i += 2;
  }
  return out;
}

export const REPAIR_STEPS: readonly RepairStep[] = [
  { name: "strip_code_fence", apply: stripCodeFence },
  { name: "close_unbalanced_quote", apply: closeUnbalancedQuote },
  { name: "close_unbalanced_brackets", apply: closeUnbalancedBrackets },
  { name: "remove_trailing_commas", apply: removeTrailingCommas },
  { name: "quote_single_quoted_keys", apply: quoteSingleQuotedKeys },
  { name: "strip_comments", apply: stripComments },
  { name: "remove_invalid_escapes", apply: removeInvalidEscapes },
];

export function repairJsonText(text: string, steps: readonly RepairStep[] = REPAIR_STEPS): string {
  return steps.reduce((acc, step) => step.apply(acc), text);
}
