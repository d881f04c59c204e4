import { createHash, timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { CredentialInvalidError, CredentialMissingError } from '../common/Errors';
import { getLogger } from '../common/Logger';

const log = getLogger('auth');

const BEARER_PREFIX = 'Bearer ';

export type AuthDecision =
  | { readonly admitted: true }
  | { readonly admitted: false; readonly reason: 'missing' | 'invalid' };

/**
 * Pull the token out of an Authorization header value. Both
 * `Bearer <token>` and a bare `<token>` are accepted.
 */
export function extractToken(header: string): string {
  if (header.length > BEARER_PREFIX.length && header.startsWith(BEARER_PREFIX)) {
    return header.slice(BEARER_PREFIX.length);
  }
  return header;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Decide whether a request carrying `header` may proceed. An empty secret
 * turns the gate off.
 */
export function evaluateCredential(secret: string, header: string | undefined): AuthDecision {
  if (secret.length === 0) {
    return { admitted: true };
  }

  if (header === undefined || header.length === 0) {
    return { admitted: false, reason: 'missing' };
  }

  const token = extractToken(header);
  if (!timingSafeEqual(digest(token), digest(secret))) {
    return { admitted: false, reason: 'invalid' };
  }

  return { admitted: true };
}

export function createAuthGate(secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const decision = evaluateCredential(secret, req.headers.authorization);

    if (decision.admitted) {
      next();
      return;
    }

    log.warn({ reason: decision.reason, method: req.method, path: req.path }, 'Request rejected by authorization gate');
    next(decision.reason === 'missing' ? new CredentialMissingError() : new CredentialInvalidError());
  };
}
