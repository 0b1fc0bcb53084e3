export type HeadingKey = "h1" | "h2" | "h3" | "h4" | "h5" | "h6";

export type HeadingCounts = Record<HeadingKey, number>;

export type ReadabilityLevel =
  | "Very easy"
  | "Easy"
  | "Fairly easy"
  | "Standard"
  | "Fairly difficult"
  | "Difficult"
  | "Very difficult";

/**
 * Fields of an analysis request. Every field may be missing or null;
 * both read as the empty string.
 */
export type AnalyzeRequest = {
  content?: string | null;
  target_keyword?: string | null;
  related_keywords?: string | null;
  meta_title?: string | null;
  meta_description?: string | null;
};

export type TextStats = {
  word_count: number;
  character_count: number;
  sentence_count: number;
  paragraph_count: number;
};

export type TermCount = [term: string, count: number];

export type KeywordReport = {
  target_keyword: string;
  target_count: number;
  target_density_percent: number;
  related_keywords: string[];
  related_counts: Record<string, number>;
  top_terms: TermCount[];
};

export type KeywordFlags = {
  has_target: boolean;
  density_low: boolean;
  density_high: boolean;
};

export type ReadabilityReport = {
  flesch_reading_ease: number;
  level: ReadabilityLevel;
  avg_words_per_sentence: number;
};

export type AnalysisResult = {
  stats: TextStats;
  keywords: KeywordReport;
  headings: HeadingCounts;
  readability: ReadabilityReport;
  suggestions: string[];
};
