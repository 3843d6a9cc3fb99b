/**
 * Zod schemas: article input files, plus one oracle output schema per task.
 *
 * @module briefing/schemas
 */

import { z } from "zod";
import { ARTICLE_CATEGORIES, INITIAL_CONFIDENCE_LEVELS } from "./types";

export const ExtractionOutputSchema = z.object({
  claims: z.array(
    z.object({
      articleId: z.string(),
      text: z.string(),
      confidence: z.enum(INITIAL_CONFIDENCE_LEVELS),
      topic: z.string(),
    }),
  ),
});
export type ExtractionOutput = z.infer<typeof ExtractionOutputSchema>;

export const TopicNormalizationOutputSchema = z.object({
  mappings: z.array(
    z.object({
      rawTopic: z.string(),
      canonicalTopic: z.string(),
    }),
  ),
});

export const ContestationOutputSchema = z.object({
  contested: z.boolean(),
  contestedClaimIds: z.array(z.string()),
  rationale: z.string(),
});

export const SynthesisOutputSchema = z.object({
  headline: z.string(),
  summary: z.string(),
  keyPoints: z.array(
    z.object({
      text: z.string(),
      citations: z.array(z.string()),
    }),
  ),
});
export type SynthesisOutput = z.infer<typeof SynthesisOutputSchema>;

export const PublisherResolutionOutputSchema = z.object({
  publisher: z.string(),
});

// Article input, as handed over by the ingestion collaborator
export const ArticleInputSchema = z.object({
  id: z.string().min(1),
  publisher: z.string().optional(),
  category: z.enum(ARTICLE_CATEGORIES),
  body: z.string(),
  publishedAt: z.string(),
  title: z.string().optional(),
  url: z.string().optional(),
  senderIdentifier: z.string().optional(),
});

export const ArticleInputListSchema = z.array(ArticleInputSchema);
