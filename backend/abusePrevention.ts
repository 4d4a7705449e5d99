/**
 * Requester identification
 * Source IP and a weak browser fingerprint for the blocklist and rate limiter
 */
import crypto from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import type { RequesterIdentity } from './services/gatekeeper';

declare global {
  namespace Express {
    interface Request {
      requester?: RequesterIdentity;
    }
  }
}

/**
 * Fingerprint from stable request headers
 * Changes with the browser, not with the IP
 */
export function generateBrowserFingerprint(req: Request): string {
  const headers = req.headers;
  const fingerprint = {
    userAgent: headers['user-agent'] || 'unknown',
    acceptLanguage: headers['accept-language'] || 'unknown',
    acceptEncoding: headers['accept-encoding'] || 'unknown',
    accept: headers['accept'] || 'unknown',
    dnt: headers['dnt'] || 'unknown'
  };

  const fingerprintString = JSON.stringify(fingerprint);
  return crypto.createHash('sha256').update(fingerprintString).digest('hex').substring(0, 16);
}

/**
 * Client IP as resolved by express `trust proxy`
 * Forwarding headers are only honoured for the configured proxy hops
 */
export function extractClientIP(req: Request): string {
  const ip = req.ip || req.socket.remoteAddress || 'unknown';
  // IPv4 clients on a dual-stack socket
  return ip.startsWith('::ffff:') && ip.includes('.') ? ip.slice(7) : ip;
}

export function getRequester(req: Request): RequesterIdentity {
  return req.requester ?? { ip: extractClientIP(req), fingerprint: generateBrowserFingerprint(req) };
}

/**
 * Attach the requester identity once per request
 */
export function requesterMiddleware(req: Request, _res: Response, next: NextFunction): void {
  req.requester = { ip: extractClientIP(req), fingerprint: generateBrowserFingerprint(req) };
  next();
}

export default requesterMiddleware;
