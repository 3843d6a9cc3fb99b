/**
 * Prompt template for contestation detection within one topic.
 */

export const DETECT_CONTESTATION_SYSTEM_PROMPT = `You compare factual claims reported by different sources about the same topic.
Decide whether any claims contradict each other.
Differences in emphasis, detail or wording are NOT contradictions.`;

export function getDetectContestationPrompt(variables: {
  topic: string;
  claims: Array<{ id: string; text: string; publisher: string }>;
}): string {
  const claimLines = variables.claims
    .map((c) => `- [${c.id}] ${c.text} (${c.publisher})`)
    .join("\n");

  return `## TOPIC
${variables.topic}

## CLAIMS
${claimLines}

## INSTRUCTIONS
- Set contested to true only if at least two claims cannot both be true.
- List in contestedClaimIds the EXACT ids (from the square brackets) of every claim involved in a contradiction.
- Give a one-sentence rationale.`;
}
