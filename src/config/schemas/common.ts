/**
 * Shared schema helpers
 */

import { z } from 'zod';

/**
 * Environment overrides arrive as scalars ("8080" is parsed to 8080), so a
 * string field may receive a number or boolean. Stringify those before the
 * string schema runs; leave everything else untouched so a missing field still
 * reports "Required".
 */
export function text<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
    schema
  );
}

export const positiveInt = () => z.number().int().positive();
