/**
 * Response validation helper.
 */

import type { z } from 'zod';
import { InvalidResponseError } from '../errors/types.js';

/**
 * Validate a decoded response body against a schema.
 *
 * @throws {InvalidResponseError} Listing every issue found
 */
export function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  what: string
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidResponseError(`Invalid ${what} in response: ${issues.join(', ')}`, {
      issues,
    });
  }
  return result.data;
}
