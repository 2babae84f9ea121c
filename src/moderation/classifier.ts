import type { Classification, FilterRules } from "./types.js";

const CAPS_MIN_LENGTH = 10;
const CAPS_RATIO = 0.7;
const MAX_MESSAGE_LENGTH = 500;
const REPEATED_CHAR = /(.)\1{5,}/u;
const UPPERCASE = /\p{Lu}/u;

interface CompiledPattern {
  readonly source: string;
  readonly regex: RegExp;
}

/**
 * Lexical message scorer. Every rule is evaluated; a message can collect
 * several reasons. Rules are swapped in place by `setRules`.
 */
export class ContentClassifier {
  private words: string[] = [];
  private patterns: CompiledPattern[] = [];

  constructor(rules: FilterRules) {
    this.setRules(rules);
  }

  setRules(rules: FilterRules): void {
    this.words = rules.words.filter((w) => w.trim() !== "");
    this.patterns = rules.patterns.map((source) => ({
      source,
      regex: new RegExp(source, "i"),
    }));
  }

  classify(text: string): Classification {
    const reasons = new Set<string>();
    const lower = text.toLowerCase();

    for (const word of this.words) {
      if (lower.includes(word.toLowerCase())) {
        reasons.add(`inappropriate_language:${word}`);
      }
    }

    for (const { source, regex } of this.patterns) {
      if (regex.test(lower)) {
        reasons.add(`pattern_match:${source}`);
      }
    }

    const chars = Array.from(text);
    if (chars.length >= CAPS_MIN_LENGTH) {
      const upper = chars.filter((c) => UPPERCASE.test(c)).length;
      if (upper / chars.length > CAPS_RATIO) {
        reasons.add("excessive_caps");
      }
    }

    if (chars.length > MAX_MESSAGE_LENGTH) {
      reasons.add("message_too_long");
    }

    if (REPEATED_CHAR.test(text)) {
      reasons.add("excessive_repetition");
    }

    return { flagged: reasons.size > 0, reasons: [...reasons] };
  }
}

/**
 * Reduces internal tags to their category so the matched word or pattern
 * never reaches the sender.
 */
export function publicFlags(reasons: readonly string[]): string[] {
  return [...new Set(reasons.map((r) => r.split(":", 1)[0]))];
}
