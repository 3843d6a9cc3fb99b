/**
 * Publisher resolver
 *
 * Turns a sender identifier (an e-mail `From` header or a feed key) into a
 * publisher name. Resolution order:
 * 1. cache (no oracle call)
 * 2. known sending domain
 * 3. non-generic display name
 * 4. one oracle call, seeded with a readable guess and sample text
 *
 * Oracle failures fall back to the guess without caching, so a later run
 * can try again.
 *
 * @module briefing/publisher-resolver
 */

import knownPublishers from "./known-publishers.json";
import type { OracleClient } from "./oracle";
import type { KeyValueStore, ResolutionMethod } from "./publisher-cache";
import {
  RESOLVE_PUBLISHER_SYSTEM_PROMPT,
  getResolvePublisherPrompt,
} from "./prompts/resolve-publisher";
import { PublisherResolutionOutputSchema } from "./schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface PublisherResolution {
  publisher: string;
  method: ResolutionMethod | "cache" | "fallback";
  cacheKey: string;
}

export interface PublisherResolverOptions {
  oracle: OracleClient;
  store: KeyValueStore;
  maxOutputTokens: number;
  signal?: AbortSignal;
}

const KNOWN_PUBLISHERS: Record<string, string> = knownPublishers;

const SAMPLE_CHARS = 500;
const MAX_PUBLISHER_CHARS = 100;

const GENERIC_DISPLAY_NAMES = new Set([
  "via",
  "no-reply",
  "noreply",
  "newsletter",
  "info",
  "hello",
  "team",
  "news",
  "updates",
  "digest",
]);

const GENERIC_LOCAL_PARTS = new Set([
  "noreply",
  "no-reply",
  "newsletter",
  "info",
  "hello",
  "news",
  "team",
  "updates",
  "contact",
]);

// ============================================================================
// DETERMINISTIC EXTRACTION
// ============================================================================

/**
 * "AI Weekly <newsletter@aiweekly.com>" → "newsletter@aiweekly.com"
 */
export function extractEmailAddress(identifier: string): string | null {
  const bracketed = identifier.match(/<([^>]+)>/);
  if (bracketed && bracketed[1].includes("@")) return bracketed[1].trim();
  const plain = identifier.match(/[\w.+-]+@[\w.-]+/);
  return plain ? plain[0].trim() : null;
}

export function deriveCacheKey(identifier: string): string {
  const email = extractEmailAddress(identifier);
  return (email ?? identifier).trim().toLowerCase();
}

/**
 * "AI Weekly <newsletter@aiweekly.com>" → "AI Weekly"; generic names → null.
 */
export function extractDisplayName(identifier: string): string | null {
  const match = identifier.trim().match(/^(.+?)\s*<(.+?)>$/);
  if (!match) return null;
  const displayName = match[1].trim().replace(/^["']+|["']+$/g, "").trim();
  if (!displayName || GENERIC_DISPLAY_NAMES.has(displayName.toLowerCase())) return null;
  return displayName;
}

function titleCase(text: string): string {
  return text
    .split(/[.\-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

function hostnameOf(identifier: string): string | null {
  const email = extractEmailAddress(identifier);
  if (email) return email.split("@")[1].toLowerCase();
  try {
    return new URL(identifier.trim()).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function siteLabel(hostname: string): string {
  const labels = hostname.replace(/^www\./, "").split(".");
  return labels.length >= 2 ? labels[labels.length - 2] : labels[0];
}

export function lookupKnownDomain(identifier: string): string | null {
  const host = hostnameOf(identifier);
  if (!host) return null;
  const bare = host.replace(/^www\./, "");
  for (const [domain, publisher] of Object.entries(KNOWN_PUBLISHERS)) {
    if (bare === domain || bare.endsWith(`.${domain}`)) return publisher;
  }
  return null;
}

/**
 * Best-effort readable name from the identifier alone.
 * "jack.clark@example.com" → "Jack Clark"; "newsletter@aiweekly.com" → "Aiweekly".
 */
export function readableGuess(identifier: string): string {
  const email = extractEmailAddress(identifier);
  if (email) {
    const [localPart, domain] = email.split("@");
    if (GENERIC_LOCAL_PARTS.has(localPart.toLowerCase())) {
      return titleCase(siteLabel(domain)) || "Unknown Publisher";
    }
    return titleCase(localPart) || "Unknown Publisher";
  }

  const host = hostnameOf(identifier);
  if (host) return titleCase(siteLabel(host)) || "Unknown Publisher";

  const key = identifier.trim().split(/[:/]/).filter(Boolean).pop() ?? "";
  return titleCase(key) || "Unknown Publisher";
}

// ============================================================================
// RESOLVER
// ============================================================================

export class PublisherResolver {
  private readonly inFlight = new Map<string, Promise<PublisherResolution>>();

  constructor(private readonly options: PublisherResolverOptions) {}

  /**
   * Resolve a sender identifier. Concurrent calls for the same identifier
   * share one lookup.
   */
  resolve(senderIdentifier: string, sampleText: string = ""): Promise<PublisherResolution> {
    const cacheKey = deriveCacheKey(senderIdentifier);
    const pending = this.inFlight.get(cacheKey);
    if (pending) return pending;

    const lookup = this.lookup(senderIdentifier, cacheKey, sampleText).finally(() => {
      this.inFlight.delete(cacheKey);
    });
    this.inFlight.set(cacheKey, lookup);
    return lookup;
  }

  private async lookup(
    identifier: string,
    cacheKey: string,
    sampleText: string,
  ): Promise<PublisherResolution> {
    const { store } = this.options;

    const cached = await store.get(cacheKey);
    if (cached !== null) {
      return { publisher: cached, method: "cache", cacheKey };
    }

    const known = lookupKnownDomain(identifier);
    if (known) {
      await store.set(cacheKey, known, "known_domain");
      return { publisher: known, method: "known_domain", cacheKey };
    }

    const displayName = extractDisplayName(identifier);
    if (displayName) {
      await store.set(cacheKey, displayName, "display_name");
      return { publisher: displayName, method: "display_name", cacheKey };
    }

    const guess = readableGuess(identifier);
    let answer: string;
    try {
      const completion = await this.options.oracle.complete({
        task: "publisher_resolution",
        system: RESOLVE_PUBLISHER_SYSTEM_PROMPT,
        prompt: getResolvePublisherPrompt({
          identifier,
          guess,
          sample: sampleText.slice(0, SAMPLE_CHARS),
        }),
        schema: PublisherResolutionOutputSchema,
        maxOutputTokens: this.options.maxOutputTokens,
        signal: this.options.signal,
      });
      answer = completion.output.publisher.trim();
    } catch (err) {
      console.warn(
        `[PublisherResolver] Oracle lookup failed for ${cacheKey}, using guess "${guess}":`,
        err instanceof Error ? err.message : String(err),
      );
      return { publisher: guess, method: "fallback", cacheKey };
    }

    const publisher = answer && answer.length <= MAX_PUBLISHER_CHARS ? answer : guess;
    await store.set(cacheKey, publisher, "oracle");
    return { publisher, method: "oracle", cacheKey };
  }
}
