// JS \s plus the C0 information separators and NEL, without the BOM.
export const SPACE_CHARS = String.raw`\t\n\v\f\r \x1c-\x1f\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000`;
export const SPACE_CLASS = `[${SPACE_CHARS}]`;

const WORD_RE = /[A-Za-z0-9']+/g;
const SPACE_RUN_RE = new RegExp(`${SPACE_CLASS}+`, "g");
const EDGE_SPACE_RE = new RegExp(`^${SPACE_CLASS}+|${SPACE_CLASS}+$`, "g");
const SENTENCE_BREAK_RE = new RegExp(`[.!?]+(?:${SPACE_CLASS}|$)`);
const PARAGRAPH_BREAK_RE = new RegExp(`\\n${SPACE_CLASS}*\\n`);

export function trimSpace(text: string): string {
  return text.replace(EDGE_SPACE_RE, "");
}

/**
 * Canonical form used for counting: smart quotes become ASCII, whitespace
 * runs (newlines included) collapse to one space, ends are trimmed.
 * Idempotent.
 */
export function normalizeText(raw: string): string {
  return trimSpace(
    raw
      .replace(/’/g, "'")
      .replace(/[“”]/g, '"')
      .replace(SPACE_RUN_RE, " ")
  );
}

export function tokenizeWords(text: string): string[] {
  const m = text.match(WORD_RE);
  return m ? m.map((w) => w.toLowerCase()) : [];
}

// Punctuation heuristic only; "Dr. Smith" counts as two sentences.
export function splitSentences(text: string): string[] {
  return trimSpace(text)
    .split(SENTENCE_BREAK_RE)
    .map(trimSpace)
    .filter(Boolean);
}

/** Blank-line separated blocks of the raw (unnormalized) content. */
export function splitParagraphs(raw: string): string[] {
  return raw
    .split(PARAGRAPH_BREAK_RE)
    .map(trimSpace)
    .filter(Boolean);
}

export function countWhitespaceWords(text: string): number {
  return text.split(SPACE_RUN_RE).filter(Boolean).length;
}

// Code points, so an emoji counts once.
export function charLength(text: string): number {
  return Array.from(text).length;
}
