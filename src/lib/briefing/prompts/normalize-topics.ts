/**
 * Prompt template for topic normalization.
 */

export const NORMALIZE_TOPICS_SYSTEM_PROMPT = `You are organizing topic identifiers.
Your job is to merge or rename topic identifiers that refer to the same real-world topic.
Do NOT invent new topics unless necessary.
Be conservative.`;

export function getNormalizeTopicsPrompt(variables: { topics: string[] }): string {
  return `## TOPIC IDS
${JSON.stringify(variables.topics, null, 2)}

## INSTRUCTIONS
- If two or more topic ids refer to the same real-world topic, map them to ONE canonical topic id.
- Use short, stable snake_case names.
- If a topic id is already good, map it to itself.
- Do NOT merge topics unless they clearly overlap.
- Return one mapping per input topic id, with rawTopic exactly as given.`;
}
