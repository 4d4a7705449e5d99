/**
 * Admin authentication
 * Accepts `Authorization: Bearer <secret>` or `X-Admin-Key: <secret>`
 */
import crypto from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { AppError, UnauthorizedError } from '../utils/errors';
import logger from '../utils/logger';

function providedSecret(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
    return authHeader.slice('Bearer '.length).trim();
  }
  const keyHeader = req.headers['x-admin-key'];
  return typeof keyHeader === 'string' ? keyHeader.trim() : undefined;
}

/**
 * Constant-time comparison; lengths are compared on digests so the secret
 * length does not leak either
 */
export function secretsMatch(provided: string, secret: string): boolean {
  const a = crypto.createHash('sha256').update(provided, 'utf8').digest();
  const b = crypto.createHash('sha256').update(secret, 'utf8').digest();
  return crypto.timingSafeEqual(a, b) && provided.length === secret.length;
}

export function createRequireAdmin(adminSecret: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!adminSecret) {
      logger.error('Admin route called but ADMIN_SECRET is not configured', { path: req.path });
      next(new AppError('Admin access is not configured', 'ADMIN_NOT_CONFIGURED', 503));
      return;
    }

    const provided = providedSecret(req);
    if (!provided || !secretsMatch(provided, adminSecret)) {
      logger.warn('Failed admin authentication attempt', {
        ip: req.ip,
        path: req.path,
        method: req.method,
        hasCredentials: provided !== undefined
      });
      next(new UnauthorizedError());
      return;
    }

    logger.info('Admin access granted', { ip: req.ip, path: req.path });
    next();
  };
}

export default createRequireAdmin;
