import type { IncomingHttpHeaders } from 'node:http';
import { AuthenticationMissingError } from '../errors/index.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Read the caller's PAT from `Authorization: Bearer <token>`.
 * The token is returned to the caller and never kept anywhere else.
 */
export function extractBearerToken(headers: IncomingHttpHeaders): string {
  const header = headers.authorization;
  if (header === undefined || header.trim() === '') {
    throw new AuthenticationMissingError();
  }

  const match = BEARER_PATTERN.exec(header.trim());
  if (!match) {
    throw new AuthenticationMissingError(true);
  }

  return match[1];
}
