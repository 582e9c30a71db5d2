import { AuthServiceError } from '../src/utils/errors.js';

/**
 * Await a promise expected to reject with an AuthServiceError and return it.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<AuthServiceError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AuthServiceError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

/**
 * Internal rejection reason recorded in `details.reason`.
 */
export async function reasonOf(promise: Promise<unknown>): Promise<unknown> {
  const error = await rejectionOf(promise);
  return error.details?.reason;
}

/**
 * `Set-Cookie` header lines of a supertest response.
 */
export function setCookies(res: { headers: Record<string, unknown> }): string[] {
  const raw = res.headers['set-cookie'];
  return Array.isArray(raw) ? raw.filter((line): line is string => typeof line === 'string') : [];
}
