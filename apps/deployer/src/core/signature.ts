import { createHmac, timingSafeEqual } from 'crypto';

import { fail, succeed, type Outcome } from './outcome.js';

const PREFIX = 'sha256=';

export const computeSignature = (secret: Buffer, payload: Buffer): string =>
  createHmac('sha256', secret).update(payload).digest('hex');

const normalizeHeader = (header: string | string[] | undefined): string => {
  const value = Array.isArray(header) ? header[0] ?? '' : header ?? '';
  const trimmed = value.trim();
  return trimmed.startsWith(PREFIX) ? trimmed.slice(PREFIX.length) : trimmed;
};

/**
 * Checks an `X-Signature` header against the HMAC of the bytes that were
 * actually received. Never re-serialize a parsed body before calling this.
 */
export const verifySignature = (
  secret: Buffer,
  header: string | string[] | undefined,
  payload: Buffer,
): Outcome<true> => {
  const provided = normalizeHeader(header);
  if (!provided) {
    return fail('unauthorized', 'missing signature');
  }

  const expectedBuffer = Buffer.from(computeSignature(secret, payload), 'utf8');
  const providedBuffer = Buffer.from(provided, 'utf8');

  if (expectedBuffer.length !== providedBuffer.length || !timingSafeEqual(expectedBuffer, providedBuffer)) {
    return fail('unauthorized', 'invalid signature');
  }

  return succeed(true);
};
