import { roundTo } from "./readability.js";
import { trimSpace } from "./text.js";
import type { KeywordFlags, KeywordReport, TermCount } from "./types.js";

const TOP_TERM_CANDIDATES = 25;
const TOP_TERM_LIMIT = 15;
const DENSITY_LOW_PERCENT = 0.5;
const DENSITY_HIGH_PERCENT = 3.0;

/**
 * Token counts that remember first-seen order, so equal counts rank
 * by which term appeared first.
 */
export class FrequencyMap {
  private readonly counts = new Map<string, number>();

  constructor(tokens: Iterable<string> = []) {
    for (const t of tokens) this.add(t);
  }

  add(token: string): void {
    this.counts.set(token, (this.counts.get(token) ?? 0) + 1);
  }

  get(token: string): number {
    return this.counts.get(token) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  mostCommon(limit: number): TermCount[] {
    // Array#sort is stable, so insertion order breaks ties.
    return Array.from(this.counts.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, Math.max(0, limit));
  }
}

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function parseRelatedKeywords(related: string): string[] {
  return related
    .split(",")
    .map((r) => trimSpace(r).toLowerCase())
    .filter(Boolean);
}

/** Whole-word, case-insensitive matches of a (possibly multi-word) phrase. */
export function countPhrase(words: string[], phrase: string): number {
  if (!phrase) return 0;
  const re = new RegExp(String.raw`\b${escapeRegExp(phrase)}\b`, "gi");
  return (words.join(" ").match(re) ?? []).length;
}

function isTopTermCandidate([term]: TermCount): boolean {
  return term.length > 2 && !/^\d+$/.test(term);
}

export function keywordMetrics(
  words: string[],
  target: string,
  related: string
): { report: KeywordReport; flags: KeywordFlags } {
  const totalWords = words.length;
  const freq = new FrequencyMap(words);

  const targetClean = trimSpace(target).toLowerCase();
  const relatedList = parseRelatedKeywords(related);

  const targetCount = countPhrase(words, targetClean);
  const density = totalWords > 0 ? (targetCount / totalWords) * 100 : 0;

  // related terms are single-token lookups, unlike the phrase match above
  const relatedCounts = Object.fromEntries(relatedList.map((r) => [r, freq.get(r)]));

  const topTerms = freq
    .mostCommon(TOP_TERM_CANDIDATES)
    .filter(isTopTermCandidate)
    .slice(0, TOP_TERM_LIMIT);

  const hasTarget = targetClean.length > 0;

  return {
    report: {
      target_keyword: targetClean,
      target_count: targetCount,
      target_density_percent: roundTo(density, 2),
      related_keywords: relatedList,
      related_counts: relatedCounts,
      top_terms: topTerms
    },
    flags: {
      has_target: hasTarget && targetCount > 0,
      density_low: hasTarget && density < DENSITY_LOW_PERCENT,
      density_high: hasTarget && density > DENSITY_HIGH_PERCENT
    }
  };
}
