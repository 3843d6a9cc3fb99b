/**
 * Prompt template for publisher resolution from a sender identifier.
 */

export const RESOLVE_PUBLISHER_SYSTEM_PROMPT = `You identify the publication or organization behind a newsletter or feed.
Answer with the publisher's common name only.`;

export function getResolvePublisherPrompt(variables: {
  identifier: string;
  guess: string;
  sample: string;
}): string {
  return `## SENDER
${variables.identifier}

## BEST GUESS
${variables.guess}

## SAMPLE TEXT
${variables.sample}

## INSTRUCTIONS
- Return the publication's proper name (e.g. "The Batch", "Import AI", "Stratechery").
- If unsure, return the best guess unchanged.`;
}
