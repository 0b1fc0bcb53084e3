import { countSyllables } from "./syllables.js";
import type { ReadabilityLevel } from "./types.js";

const LEVEL_BANDS: ReadonlyArray<readonly [min: number, level: ReadabilityLevel]> = [
  [90, "Very easy"],
  [80, "Easy"],
  [70, "Fairly easy"],
  [60, "Standard"],
  [50, "Fairly difficult"],
  [30, "Difficult"]
];

// digits past the rounding position used to tell an exact tie from a near one
const TIE_CHECK_DIGITS = 30;

/**
 * Rounds to `digits` decimals using the exact binary value, sending exact
 * ties to the even digit (10.125 -> 10.12, 0.375 -> 0.38).
 */
export function roundTo(value: number, digits: number): number {
  const away = Number(value.toFixed(digits));
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return away;

  // toFixed is exact up to 100 fraction digits
  const [intPart, frac = ""] = Math.abs(value).toFixed(digits + TIE_CHECK_DIGITS).split(".");
  const kept = frac.slice(0, digits);
  if (!/^50*$/.test(frac.slice(digits))) return away;

  // toFixed sends ties away from zero; that is already even when the kept digit is odd
  const lastDigit = Number((intPart + kept).slice(-1));
  if (lastDigit % 2 === 1) return away;

  const truncated = Number(`${intPart}.${kept || "0"}`);
  return value < 0 && truncated !== 0 ? -truncated : truncated;
}

/**
 * Flesch Reading Ease, rounded to one decimal:
 * 206.835 - 1.015 * (words / sentences) - 84.6 * (syllables / words)
 *
 * Not clamped; short or odd inputs can land outside 0..100.
 */
export function fleschReadingEase(words: string[], sentences: string[]): number {
  if (words.length === 0 || sentences.length === 0) return 0;

  const syllables = words.reduce((sum, w) => sum + countSyllables(w), 0);
  const wps = words.length / Math.max(1, sentences.length);
  const spw = syllables / Math.max(1, words.length);

  return roundTo(206.835 - 1.015 * wps - 84.6 * spw, 1);
}

export function scoreBand(score: number): ReadabilityLevel {
  for (const [min, level] of LEVEL_BANDS) {
    if (score >= min) return level;
  }
  return "Very difficult";
}
