/**
 * Prompt template for the editorial briefing.
 */

export const SYNTHESIZE_BRIEFING_SYSTEM_PROMPT = `You are an editorial analyst producing concise executive briefings.
You MUST base all statements strictly on the provided claims.
Do NOT introduce new facts.
Prefer synthesis over enumeration.
Be conservative when claims are contested.`;

export function getSynthesizeBriefingPrompt(variables: {
  claimLines: string[];
  maxKeyPoints: number;
  reviewerFocus: string;
}): string {
  const { claimLines, maxKeyPoints, reviewerFocus } = variables;
  const customFocus = reviewerFocus.trim() ? `\n## CUSTOM FOCUS\n${reviewerFocus}\n` : "";

  return `## VERIFIED CLAIMS
${claimLines.join("\n")}

## TASK
- Write a short headline.
- Write a 2-3 sentence executive summary.
- Provide at most ${maxKeyPoints} key points.
- Collapse redundant claims.
- If most claims are contested, emphasize uncertainty.

## REQUIREMENTS
1. Rank key points by importance and impact, not recency.
2. Avoid over-representing a single publisher; prefer claims corroborated by several.
3. Treat contested claims conservatively and say they are disputed.
4. Every key point lists in citations the publisher names it relies on, copied from [Sources: ...]. Never cite anything else.
${customFocus}`;
}
