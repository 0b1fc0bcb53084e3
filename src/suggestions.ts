import { charLength, countWhitespaceWords, splitParagraphs, trimSpace } from "./text.js";
import type { HeadingCounts, KeywordFlags, KeywordReport } from "./types.js";

export type SuggestionContext = {
  rawText: string;
  words: string[];
  sentences: string[];
  headings: HeadingCounts;
  keywords: KeywordReport;
  flags: KeywordFlags;
  metaTitle: string;
  metaDescription: string;
};

export type SuggestionRule = {
  id: string;
  applies: (ctx: SuggestionContext) => boolean;
  message: string;
};

export const MESSAGES = {
  tooShort: "Add more depth. Aim for at least 300 to 800 words for most posts.",
  tooLong: "Consider trimming or adding subheadings. Very long posts need strong structure.",
  longSentences: "Shorten sentences. Average sentence length is a bit high.",
  missingH1: "Add one clear H1 title (or a top-level heading) to define the page topic.",
  multipleH1: "Use only one H1. Convert extra H1s into H2s.",
  missingH2: "Add H2 subheadings to break up sections and improve scan-ability.",
  missingH3: "Add some H3 subheadings for details inside each section.",
  keywordNotFound: "Include your target keyword at least once, ideally in the first 100 words.",
  densityLow: "Target keyword density looks low. Add it naturally 1 to 3 times.",
  densityHigh: "Target keyword density looks high. Reduce repetition and use synonyms.",
  missingKeyword: "Add a target keyword to get keyword density and placement feedback.",
  missingTitle: "Add a meta title. Keep it clear and specific.",
  shortTitle: "Meta title may be short. Many titles perform well around 45 to 60 characters.",
  longTitle: "Meta title may be long. Consider shortening to about 60 characters.",
  titleKeyword: "Try including the target keyword in the meta title, if it fits naturally.",
  missingDescription: "Add a meta description. Summarize the value in 1 to 2 sentences.",
  shortDescription:
    "Meta description may be short. Many descriptions perform well around 120 to 160 characters.",
  longDescription: "Meta description may be long. Consider trimming to about 160 characters.",
  descriptionKeyword:
    "Try including the target keyword in the meta description, if it fits naturally.",
  longParagraphs: "Break up long paragraphs. Aim for tighter blocks so it’s easier to read."
} as const;

const MIN_WORDS = 300;
const MAX_WORDS = 2000;
const H3_WORD_THRESHOLD = 700;
const MAX_AVG_SENTENCE_WORDS = 22;
const MAX_PARAGRAPH_WORDS = 110;

const TITLE_LENGTH = { min: 35, max: 65 };
const DESCRIPTION_LENGTH = { min: 90, max: 170 };

function target(ctx: SuggestionContext): string {
  return ctx.keywords.target_keyword;
}

function missesKeyword(field: string, keyword: string): boolean {
  return keyword.length > 0 && !field.toLowerCase().includes(keyword);
}

function metaRules(
  name: "title" | "description",
  read: (ctx: SuggestionContext) => string,
  bounds: { min: number; max: number },
  messages: { missing: string; short: string; long: string; keyword: string }
): SuggestionRule[] {
  const field = (ctx: SuggestionContext) => trimSpace(read(ctx));
  return [
    { id: `meta_${name}_missing`, applies: (ctx) => !field(ctx), message: messages.missing },
    {
      id: `meta_${name}_short`,
      applies: (ctx) => !!field(ctx) && charLength(field(ctx)) < bounds.min,
      message: messages.short
    },
    {
      id: `meta_${name}_long`,
      applies: (ctx) => !!field(ctx) && charLength(field(ctx)) > bounds.max,
      message: messages.long
    },
    {
      id: `meta_${name}_keyword`,
      applies: (ctx) => !!field(ctx) && missesKeyword(field(ctx), target(ctx)),
      message: messages.keyword
    }
  ];
}

/**
 * Evaluated top to bottom; each rule adds at most one message and the
 * output keeps this order. Rules sharing a group (h1, keyword, meta fields)
 * are written so that exclusive cases cannot both fire.
 */
export const SUGGESTION_RULES: readonly SuggestionRule[] = [
  { id: "length_short", applies: (ctx) => ctx.words.length < MIN_WORDS, message: MESSAGES.tooShort },
  { id: "length_long", applies: (ctx) => ctx.words.length > MAX_WORDS, message: MESSAGES.tooLong },
  {
    id: "sentence_length",
    applies: (ctx) =>
      ctx.sentences.length > 0 && ctx.words.length / ctx.sentences.length > MAX_AVG_SENTENCE_WORDS,
    message: MESSAGES.longSentences
  },

  { id: "h1_missing", applies: (ctx) => ctx.headings.h1 === 0, message: MESSAGES.missingH1 },
  { id: "h1_multiple", applies: (ctx) => ctx.headings.h1 > 1, message: MESSAGES.multipleH1 },
  { id: "h2_missing", applies: (ctx) => ctx.headings.h2 === 0, message: MESSAGES.missingH2 },
  {
    id: "h3_missing",
    applies: (ctx) => ctx.headings.h3 === 0 && ctx.words.length >= H3_WORD_THRESHOLD,
    message: MESSAGES.missingH3
  },

  {
    id: "keyword_not_found",
    applies: (ctx) => !!target(ctx) && !ctx.flags.has_target,
    message: MESSAGES.keywordNotFound
  },
  {
    id: "keyword_density_low",
    applies: (ctx) => !!target(ctx) && ctx.flags.density_low,
    message: MESSAGES.densityLow
  },
  {
    id: "keyword_density_high",
    applies: (ctx) => !!target(ctx) && ctx.flags.density_high,
    message: MESSAGES.densityHigh
  },
  { id: "keyword_missing", applies: (ctx) => !target(ctx), message: MESSAGES.missingKeyword },

  ...metaRules("title", (ctx) => ctx.metaTitle, TITLE_LENGTH, {
    missing: MESSAGES.missingTitle,
    short: MESSAGES.shortTitle,
    long: MESSAGES.longTitle,
    keyword: MESSAGES.titleKeyword
  }),
  ...metaRules("description", (ctx) => ctx.metaDescription, DESCRIPTION_LENGTH, {
    missing: MESSAGES.missingDescription,
    short: MESSAGES.shortDescription,
    long: MESSAGES.longDescription,
    keyword: MESSAGES.descriptionKeyword
  }),

  {
    id: "long_paragraphs",
    applies: (ctx) =>
      splitParagraphs(ctx.rawText).some((p) => countWhitespaceWords(p) > MAX_PARAGRAPH_WORDS),
    message: MESSAGES.longParagraphs
  }
];

export function makeSuggestions(
  ctx: SuggestionContext,
  rules: readonly SuggestionRule[] = SUGGESTION_RULES
): string[] {
  return rules.filter((rule) => rule.applies(ctx)).map((rule) => rule.message);
}
