/**
 * backend/src/shared/security/static-token-validator.ts
 *
 * WHY:
 * - Concrete TokenValidator over a fixed set of tokens read from config.
 *
 * HOW TO USE:
 * - const validator = StaticTokenValidator.fromConfig(config.auth)
 * - validator.isValid(token)
 *
 * RULES:
 * - Comparison is exact (ordinal, case-sensitive) after trimming.
 * - Empty / whitespace-only entries are discarded, duplicates collapse.
 */

import type { TokenValidator } from './token-validator';

export class StaticTokenValidator implements TokenValidator {
  private readonly tokens: ReadonlySet<string>;

  constructor(candidates: Iterable<string>) {
    const tokens = new Set<string>();
    for (const candidate of candidates) {
      const trimmed = candidate.trim();
      if (trimmed) tokens.add(trimmed);
    }
    this.tokens = tokens;
  }

  static fromConfig(auth: { token: string | null; tokens: readonly string[] }): StaticTokenValidator {
    const candidates = auth.token === null ? [...auth.tokens] : [...auth.tokens, auth.token];
    return new StaticTokenValidator(candidates);
  }

  get hasConfiguredTokens(): boolean {
    return this.tokens.size > 0;
  }

  isValid(token: string | null | undefined): boolean {
    if (!token) return false;

    const trimmed = token.trim();
    if (!trimmed) return false;

    return this.tokens.has(trimmed);
  }
}
