import crypto from 'crypto';
import { errorMessage } from './errors';

/**
 * Constant-time string comparison to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

/**
 * Message safe to return to a client. Production responses never carry
 * internal error text.
 */
export function sanitizeError(error: unknown, isProduction: boolean = false): { message: string } {
  if (isProduction) {
    return { message: 'An error occurred. Please try again later.' };
  }
  return { message: errorMessage(error) || 'An error occurred' };
}
