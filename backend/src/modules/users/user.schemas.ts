/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Values come out trimmed; services never re-trim.
 * - One message per field (the first failing rule wins).
 */

import { z } from 'zod';
import type { FieldErrors } from '../../shared/http/errors';

/** Exactly one '@', neither first nor last (e.g. `user@localhost` is accepted). */
const EMAIL_SHAPE = /^[^@]+@[^@]+$/;

const emailField = z
  .string({
    required_error: 'Email is required.',
    invalid_type_error: 'Email is required.',
  })
  .trim()
  .min(1, 'Email is required.')
  .regex(EMAIL_SHAPE, 'Email must be a valid email address.');

const fullNameField = z
  .string({
    required_error: 'Full name is required.',
    invalid_type_error: 'Full name is required.',
  })
  .trim()
  .min(1, 'Full name is required.')
  .min(2, 'Full name must be at least 2 characters long.');

const userBodySchema = z.object(
  {
    email: emailField,
    fullName: fullNameField,
  },
  {
    required_error: 'Request body is required.',
    invalid_type_error: 'Request body must be a JSON object.',
  },
);

export const createUserSchema = userBodySchema;
export const updateUserSchema = userBodySchema;

export const userIdParamsSchema = z.object({
  id: z.string().uuid(),
});

/**
 * Flattens Zod issues into `{ field: [message] }`.
 * Issues without a path (e.g. missing body) are reported under `body`.
 */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const out: FieldErrors = {};

  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    if (!out[field]) out[field] = [issue.message];
  }

  return out;
}
