/**
 * Default ethics collaborator. The analyzers only see the EthicsMatcher
 * interface, so a different classifier can be passed in instead.
 */

import { courseText } from "./normalize.js";
import type { EthicsMatcher } from "../analyzer.types.js";

const ETHICS_PATTERNS: RegExp[] = [
  /\bethic(s|al|ally)?\b/,
  /\bmoral(s|ity)?\b/,
  /\bbias(es|ed)?\b/,
  /\bfairness\b/,
  /\bprivacy\b/,
  /\bresponsible (ai|computing|innovation|research)\b/,
  /\baccountability\b/,
  /\btransparency\b/,
  /\bsocietal impacts?\b/,
  /\bsocial responsibility\b/,
  /\bhuman values\b/,
];

export class KeywordEthicsMatcher implements EthicsMatcher {
  private readonly patterns: readonly RegExp[];

  constructor(patterns: readonly RegExp[] = ETHICS_PATTERNS) {
    this.patterns = patterns;
  }

  static build(): KeywordEthicsMatcher {
    return new KeywordEthicsMatcher();
  }

  isMatch(title: string, description: string): boolean {
    const text = courseText(title, description);
    if (!text) return false;
    return this.patterns.some((pattern) => pattern.test(text));
  }
}
