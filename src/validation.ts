import { z } from "zod";

const OptionalText = z.string().nullish();

export function buildAnalyzeRequestSchema(maxContentChars: number) {
  return z.object({
    content: z
      .string()
      .max(maxContentChars, `content must be at most ${maxContentChars} characters`)
      .nullish(),
    target_keyword: OptionalText,
    related_keywords: OptionalText,
    meta_title: OptionalText,
    meta_description: OptionalText
  });
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
