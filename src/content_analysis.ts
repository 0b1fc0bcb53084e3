import { extractHeadings } from "./headings.js";
import { keywordMetrics } from "./keywords.js";
import { fleschReadingEase, roundTo, scoreBand } from "./readability.js";
import { makeSuggestions } from "./suggestions.js";
import { charLength, normalizeText, splitParagraphs, splitSentences, tokenizeWords } from "./text.js";
import type { AnalysisResult, AnalyzeRequest } from "./types.js";

export type Analyzer = (request: AnalyzeRequest) => AnalysisResult;

/**
 * Runs the whole pipeline over one draft. Pure and synchronous; missing or
 * null fields count as empty strings and the request is never mutated.
 */
export function analyzeDocument(request: AnalyzeRequest): AnalysisResult {
  const rawText = request.content ?? "";
  const targetKeyword = request.target_keyword ?? "";
  const related = request.related_keywords ?? "";
  const metaTitle = request.meta_title ?? "";
  const metaDescription = request.meta_description ?? "";

  const text = normalizeText(rawText);
  const words = tokenizeWords(text);
  const sentences = splitSentences(text);

  const wordCount = words.length;
  const sentenceCount = sentences.length;

  const flesch = fleschReadingEase(words, sentences);
  const headings = extractHeadings(rawText);
  const { report: keywords, flags } = keywordMetrics(words, targetKeyword, related);

  const suggestions = makeSuggestions({
    rawText,
    words,
    sentences,
    headings,
    keywords,
    flags,
    metaTitle,
    metaDescription
  });

  return {
    stats: {
      word_count: wordCount,
      character_count: charLength(text),
      sentence_count: sentenceCount,
      paragraph_count: splitParagraphs(rawText).length
    },
    keywords,
    headings,
    readability: {
      flesch_reading_ease: flesch,
      level: scoreBand(flesch),
      avg_words_per_sentence: roundTo(wordCount / Math.max(1, sentenceCount), 2)
    },
    suggestions
  };
}
