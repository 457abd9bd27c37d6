/**
 * backend/src/shared/security/token-validator.ts
 *
 * WHY:
 * - API access is gated by a shared bearer token (no user sessions).
 * - Callers depend on an abstraction (DIP) so the HTTP layer never knows
 *   where accepted tokens come from.
 *
 * RULES:
 * - Immutable after construction: safe to share across all requests.
 */

export interface TokenValidator {
  /** False means every protected request will be rejected. */
  readonly hasConfiguredTokens: boolean;

  isValid(token: string | null | undefined): boolean;
}
