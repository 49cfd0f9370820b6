import { createHmac, randomUUID, timingSafeEqual } from 'node:crypto';
import { InvalidInputError } from '../errors.js';

const sign = (sessionId: string, secret: string): string =>
  createHmac('sha256', secret).update(sessionId).digest('base64url');

export const issueSessionToken = (secret: string, sessionId: string = randomUUID()): string =>
  `${sessionId}.${sign(sessionId, secret)}`;

/** Returns the session id carried by a token signed with `secret`. */
export const verifySessionToken = (token: string | undefined, secret: string): string => {
  if (!token) {
    throw new InvalidInputError('Missing session token');
  }

  const separator = token.lastIndexOf('.');
  if (separator <= 0) {
    throw new InvalidInputError('Malformed session token');
  }

  const sessionId = token.slice(0, separator);
  const provided = Buffer.from(token.slice(separator + 1));
  const expected = Buffer.from(sign(sessionId, secret));

  if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
    throw new InvalidInputError('Invalid session token');
  }

  return sessionId;
};
