/**
 * Express application
 * Middleware order: request id and tracking, security headers, rate limit,
 * body parsing, sanitization, requester identity, routes, errors
 */
import express, { type Express, type RequestHandler } from 'express';
import helmet from 'helmet';
import { requesterMiddleware } from './abusePrevention';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestIdMiddleware } from './middleware/requestId';
import createApiRoutes, { type ApiDependencies } from './routes';
import { requestTrackingMiddleware } from './services/gracefulShutdown';
import { createValidateInput } from './utils/validation';

export interface AppOptions extends ApiDependencies {
  /** Body limit for the routes that carry attachments */
  uploadBodyLimit: string;
  trustProxy: number;
  generalLimiter?: RequestHandler;
  /** Serve UPLOAD_DIR under `uploadUrlPrefix` */
  staticUploads?: { dir: string; urlPrefix: string };
  isDevelopment?: boolean;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', options.trustProxy);

  app.use(requestIdMiddleware);
  app.use(requestTrackingMiddleware());

  const frameAncestors = options.isDevelopment ? ["'self'", 'https:', 'http:'] : ["'self'"];
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'blob:'],
        mediaSrc: ["'self'", 'blob:'],
        objectSrc: ["'none'"],
        frameAncestors
      }
    },
    crossOriginResourcePolicy: { policy: 'same-origin' }
  }));

  if (options.generalLimiter) {
    app.use('/api', options.generalLimiter);
  }

  // Attachments arrive base64 encoded inside JSON
  const uploadJson = express.json({ limit: options.uploadBodyLimit, strict: true, type: 'application/json' });
  app.use('/api/checkin', uploadJson);
  app.use('/api/archive/preview', uploadJson);
  app.use(express.json({ limit: '1mb', strict: true, type: 'application/json' }));

  app.use(createValidateInput());
  app.use(requesterMiddleware);

  if (options.staticUploads) {
    app.use(options.staticUploads.urlPrefix, express.static(options.staticUploads.dir, {
      dotfiles: 'deny',
      index: false,
      maxAge: '7d'
    }));
  }

  app.use('/api', createApiRoutes(options));
  app.use('/api', notFoundHandler);

  app.use(errorHandler);

  return app;
}

export default createApp;
