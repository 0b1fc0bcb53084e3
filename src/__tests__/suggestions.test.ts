import { describe, it, expect } from "vitest";
import { MESSAGES, SUGGESTION_RULES, makeSuggestions, type SuggestionContext } from "../suggestions.js";

function words(n: number): string[] {
  return Array<string>(n).fill("word");
}

// A context that triggers no rule; tests override one concern at a time.
function cleanContext(overrides: Partial<SuggestionContext> = {}): SuggestionContext {
  return {
    rawText: "Short paragraph.",
    words: words(500),
    sentences: Array<string>(50).fill("s"),
    headings: { h1: 1, h2: 2, h3: 0, h4: 0, h5: 0, h6: 0 },
    keywords: {
      target_keyword: "seo",
      target_count: 5,
      target_density_percent: 1,
      related_keywords: [],
      related_counts: {},
      top_terms: []
    },
    flags: { has_target: true, density_low: false, density_high: false },
    metaTitle: "SEO basics for writers who publish every week",
    metaDescription:
      "A practical walk through SEO basics for writers: headings, keyword placement and meta tags that help readers.",
    ...overrides
  };
}

function withTarget(target: string, ctx: SuggestionContext): SuggestionContext {
  return { ...ctx, keywords: { ...ctx.keywords, target_keyword: target } };
}

describe("makeSuggestions", () => {
  it("returns an empty list when nothing needs attention", () => {
    expect(makeSuggestions(cleanContext())).toEqual([]);
  });

  it("keeps rule ids unique", () => {
    const ids = SUGGESTION_RULES.map((r) => r.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  describe("length", () => {
    it("asks for depth under 300 words", () => {
      const out = makeSuggestions(cleanContext({ words: words(299), sentences: words(30) }));
      expect(out).toEqual([MESSAGES.tooShort]);
    });

    it("asks for structure over 2000 words", () => {
      const out = makeSuggestions(
        cleanContext({
          words: words(2001),
          sentences: words(200),
          headings: { h1: 1, h2: 4, h3: 3, h4: 0, h5: 0, h6: 0 }
        })
      );
      expect(out).toEqual([MESSAGES.tooLong]);
    });

    it("is silent at exactly 300 and 2000 words", () => {
      expect(makeSuggestions(cleanContext({ words: words(300), sentences: words(30) }))).toEqual([]);
      const long = cleanContext({
        words: words(2000),
        sentences: words(200),
        headings: { h1: 1, h2: 4, h3: 3, h4: 0, h5: 0, h6: 0 }
      });
      expect(makeSuggestions(long)).toEqual([]);
    });
  });

  it("flags average sentence length above 22 words", () => {
    expect(makeSuggestions(cleanContext({ words: words(300), sentences: words(13) }))).toEqual([
      MESSAGES.longSentences
    ]);
    expect(makeSuggestions(cleanContext({ words: words(300), sentences: words(14) }))).toEqual([]);
  });

  describe("headings", () => {
    it("asks for a single H1", () => {
      const none = cleanContext({ headings: { h1: 0, h2: 2, h3: 0, h4: 0, h5: 0, h6: 0 } });
      const many = cleanContext({ headings: { h1: 2, h2: 2, h3: 0, h4: 0, h5: 0, h6: 0 } });
      expect(makeSuggestions(none)).toEqual([MESSAGES.missingH1]);
      expect(makeSuggestions(many)).toEqual([MESSAGES.multipleH1]);
    });

    it("asks for H2s", () => {
      const ctx = cleanContext({ headings: { h1: 1, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 } });
      expect(makeSuggestions(ctx)).toEqual([MESSAGES.missingH2]);
    });

    it("asks for H3s only from 700 words", () => {
      expect(makeSuggestions(cleanContext({ words: words(700), sentences: words(70) }))).toEqual([
        MESSAGES.missingH3
      ]);
      expect(makeSuggestions(cleanContext({ words: words(699), sentences: words(70) }))).toEqual([]);
    });
  });

  describe("keyword", () => {
    it("asks for a target keyword when none is set", () => {
      const ctx = withTarget("", cleanContext({
        flags: { has_target: false, density_low: false, density_high: false },
        metaTitle: "A title that is long enough to pass the check",
        metaDescription: "x".repeat(120)
      }));
      expect(makeSuggestions(ctx)).toEqual([MESSAGES.missingKeyword]);
    });

    it("evaluates the flags independently", () => {
      const ctx = cleanContext({ flags: { has_target: false, density_low: true, density_high: false } });
      expect(makeSuggestions(ctx)).toEqual([MESSAGES.keywordNotFound, MESSAGES.densityLow]);
    });

    it("warns about high density", () => {
      const ctx = cleanContext({ flags: { has_target: true, density_low: false, density_high: true } });
      expect(makeSuggestions(ctx)).toEqual([MESSAGES.densityHigh]);
    });
  });

  describe("meta title", () => {
    const noKeyword = (title: string) => withTarget("", cleanContext({
      flags: { has_target: false, density_low: false, density_high: false },
      metaTitle: title,
      metaDescription: "x".repeat(120)
    }));
    const titleMessages = (title: string) =>
      makeSuggestions(noKeyword(title)).filter((m) => m !== MESSAGES.missingKeyword);

    it("asks for a title when empty or blank", () => {
      expect(titleMessages("")).toEqual([MESSAGES.missingTitle]);
      expect(titleMessages("   ")).toEqual([MESSAGES.missingTitle]);
    });

    it("warns below 35 characters", () => {
      expect(titleMessages("t".repeat(34))).toEqual([MESSAGES.shortTitle]);
      expect(titleMessages("t".repeat(35))).toEqual([]);
    });

    it("warns above 65 characters", () => {
      expect(titleMessages("t".repeat(65))).toEqual([]);
      expect(titleMessages("t".repeat(66))).toEqual([MESSAGES.longTitle]);
    });

    it("measures the trimmed title", () => {
      expect(titleMessages(`  ${"t".repeat(65)}  `)).toEqual([]);
    });

    it("asks to include the keyword, ignoring case", () => {
      const missing = cleanContext({ metaTitle: "Writing tips for people who publish every week" });
      expect(makeSuggestions(missing)).toEqual([MESSAGES.titleKeyword]);
      const present = cleanContext({ metaTitle: "Writing tips with SEO for people who publish" });
      expect(makeSuggestions(present)).toEqual([]);
    });
  });

  describe("meta description", () => {
    it("applies 90 and 170 character bounds", () => {
      const desc = (n: number) => `seo ${"d".repeat(n - 4)}`;
      expect(makeSuggestions(cleanContext({ metaDescription: desc(89) }))).toEqual([MESSAGES.shortDescription]);
      expect(makeSuggestions(cleanContext({ metaDescription: desc(90) }))).toEqual([]);
      expect(makeSuggestions(cleanContext({ metaDescription: desc(170) }))).toEqual([]);
      expect(makeSuggestions(cleanContext({ metaDescription: desc(171) }))).toEqual([MESSAGES.longDescription]);
    });

    it("asks for a description and for the keyword in it", () => {
      expect(makeSuggestions(cleanContext({ metaDescription: "" }))).toEqual([MESSAGES.missingDescription]);
      expect(makeSuggestions(cleanContext({ metaDescription: "d".repeat(120) }))).toEqual([
        MESSAGES.descriptionKeyword
      ]);
    });

    it("can fire length and keyword messages together", () => {
      expect(makeSuggestions(cleanContext({ metaDescription: "too short" }))).toEqual([
        MESSAGES.shortDescription,
        MESSAGES.descriptionKeyword
      ]);
    });
  });

  describe("paragraphs", () => {
    const paragraph = (n: number) => Array<string>(n).fill("word").join(" ");

    it("reports long paragraphs once", () => {
      const rawText = [paragraph(111), paragraph(5), paragraph(200)].join("\n\n");
      expect(makeSuggestions(cleanContext({ rawText }))).toEqual([MESSAGES.longParagraphs]);
    });

    it("allows 110 words per paragraph", () => {
      const rawText = [paragraph(110), paragraph(110)].join("\n   \n");
      expect(makeSuggestions(cleanContext({ rawText }))).toEqual([]);
    });
  });

  it("keeps the rule order when several fire", () => {
    const ctx = withTarget("", cleanContext({
      words: words(50),
      sentences: words(1),
      headings: { h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 },
      flags: { has_target: false, density_low: false, density_high: false },
      metaTitle: "",
      metaDescription: "",
      rawText: Array<string>(120).fill("w").join(" ")
    }));
    expect(makeSuggestions(ctx)).toEqual([
      MESSAGES.tooShort,
      MESSAGES.longSentences,
      MESSAGES.missingH1,
      MESSAGES.missingH2,
      MESSAGES.missingKeyword,
      MESSAGES.missingTitle,
      MESSAGES.missingDescription,
      MESSAGES.longParagraphs
    ]);
  });
});
