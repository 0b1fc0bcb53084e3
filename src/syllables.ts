const VOWELS = new Set(["a", "e", "i", "o", "u", "y"]);

// Approximate syllable counting for Flesch readability.
export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^a-z]/g, "");
  if (!w) return 0;

  let syllables = 0;
  let prevVowel = false;
  for (const ch of w) {
    const isVowel = VOWELS.has(ch);
    if (isVowel && !prevVowel) syllables += 1;
    prevVowel = isVowel;
  }

  // silent e, but keep "-le" (simple) and "-ye" (goodbye)
  if (w.endsWith("e") && syllables > 1 && !w.endsWith("le") && !w.endsWith("ye")) {
    syllables -= 1;
  }

  return Math.max(1, syllables);
}
