import { SPACE_CHARS, SPACE_CLASS } from "./text.js";
import type { HeadingCounts, HeadingKey } from "./types.js";

export const HEADING_KEYS: readonly HeadingKey[] = ["h1", "h2", "h3", "h4", "h5", "h6"];

const MARKDOWN_HEADING_RE = new RegExp(`^${SPACE_CLASS}*(#{1,6})${SPACE_CLASS}+[^${SPACE_CHARS}]`);
const LINE_BREAK_RE = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

function emptyCounts(): HeadingCounts {
  return { h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 };
}

function keyForLevel(level: number): HeadingKey | undefined {
  return HEADING_KEYS[level - 1];
}

/**
 * Counts headings per level in the raw content. Markdown `#` lines and
 * `<hN` tags are both counted and summed, so a document mixing the two
 * syntaxes gets one total per level.
 */
export function extractHeadings(raw: string): HeadingCounts {
  const counts = emptyCounts();

  for (const line of raw.split(LINE_BREAK_RE)) {
    const m = MARKDOWN_HEADING_RE.exec(line);
    if (!m) continue;
    const key = keyForLevel(m[1].length);
    if (key) counts[key] += 1;
  }

  HEADING_KEYS.forEach((key, i) => {
    // opening tag only; "<h2 class=x>" counts, "<h20>" does not
    const tagRe = new RegExp(String.raw`<h${i + 1}\b`, "gi");
    counts[key] += (raw.match(tagRe) ?? []).length;
  });

  return counts;
}
