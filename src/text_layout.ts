/**
 * Purpose: Estimate rendered text width and wrap titles to a line budget.
 * Intent: Give the renderer font-independent, deterministic wrapping.
 */

/** Average glyph advance as a fraction of the font size. */
export const GLYPH_WIDTH_FACTOR = 0.6;

export const ELLIPSIS = "…";

export function estimateTextWidth(text: string, fontSize: number): number {
  return [...text].length * fontSize * GLYPH_WIDTH_FACTOR;
}

export function charsForWidth(widthPx: number, fontSize: number): number {
  return Math.max(1, Math.floor(widthPx / (fontSize * GLYPH_WIDTH_FACTOR)));
}

function splitLongWord(word: string, maxChars: number): string[] {
  const chars = [...word];
  const out: string[] = [];
  for (let i = 0; i < chars.length; i += maxChars) out.push(chars.slice(i, i + maxChars).join(""));
  return out;
}

function truncate(text: string, maxChars: number): string {
  const chars = [...text];
  if (chars.length <= maxChars) return text;
  return chars.slice(0, Math.max(0, maxChars - 1)).join("").trimEnd() + ELLIPSIS;
}

/**
 * Greedy word wrap into at most `maxLines` lines of `maxChars` characters.
 * Text left over after the last line is folded into it and cut with an ellipsis.
 */
export function wrapText(text: string, maxChars: number, maxLines = 2): string[] {
  const limit = Math.max(1, Math.floor(maxChars));
  const words = text
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .flatMap((w) => ([...w].length > limit ? splitLongWord(w, limit) : [w]));
  if (words.length === 0) return [];

  const lines: string[] = [];
  let current = "";
  let i = 0;
  for (; i < words.length; i++) {
    const word = words[i] ?? "";
    const candidate = current ? `${current} ${word}` : word;
    if ([...candidate].length <= limit) {
      current = candidate;
      continue;
    }
    if (lines.length >= maxLines - 1) break;
    lines.push(current);
    current = word;
  }

  if (i < words.length) {
    lines.push(truncate([current, ...words.slice(i)].join(" "), limit));
  } else if (current) {
    lines.push(current);
  }
  return lines;
}
