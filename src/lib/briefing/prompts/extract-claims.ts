/**
 * Prompt template for claim extraction (one batch of articles per call).
 */

export const EXTRACT_CLAIMS_SYSTEM_PROMPT = `You are a careful analytical assistant.
Your job is to extract factual claims from news sources.
Do not speculate or add facts.`;

export function getExtractClaimsPrompt(variables: {
  articles: Array<{ id: string; publisher: string; title?: string; body: string }>;
  batchNumber: number;
  totalBatches: number;
  analyzerInstructions: string;
}): string {
  const { articles, batchNumber, totalBatches, analyzerInstructions } = variables;

  const sources = articles
    .map((a) => {
      const heading = a.title ? `${a.title}\n` : "";
      return `[${a.id}] (${a.publisher})\n${heading}${a.body}`;
    })
    .join("\n\n");

  const customFocus = analyzerInstructions.trim()
    ? `\n## CUSTOM FOCUS\n${analyzerInstructions}\n`
    : "";

  return `## SOURCES (Batch ${batchNumber}/${totalBatches})

${sources}

## INSTRUCTIONS
- Extract the most important factual claims.
- Base claims strictly on the sources.
- For articleId, use the EXACT id from the square brackets (e.g. for [rss:abc123] use "rss:abc123"). Every claim names exactly one source article.
- Assign a short, stable topic (snake_case) to each claim.
- Claims about the same real-world topic or event MUST share the same topic.
- Topics may be imperfect; they are normalized later.

## CONFIDENCE
- reported: the source states it directly
- inferred: follows from what the source states
- speculative: the source presents it as possibility, rumour or forecast
${customFocus}`;
}
