/**
 * Check-in Routes
 * Public submission, listing and archive endpoints
 */
import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { getRequester } from '../abusePrevention';
import { type CheckinService, toPublicSubmission } from '../services/checkin';
import type { Gatekeeper } from '../services/gatekeeper';
import type { ModerationService } from '../services/moderation';
import { InvalidInputError } from '../utils/errors';
import { classifyAttachments } from '../utils/upload';
import { isRecord, parseListOptions, parsePagination } from '../utils/validation';

// Types
interface Dependencies {
  checkin: CheckinService;
  gatekeeper: Gatekeeper;
  moderation: ModerationService;
  rateLimiter?: RequestHandler;
}

const passThrough: RequestHandler = (_req, _res, next) => next();

/**
 * RFC 6266 filename with an ASCII fallback
 */
function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export function createCheckinRoutes(deps: Dependencies) {
  const router = Router();
  const { checkin, gatekeeper, moderation } = deps;
  const limiter = deps.rateLimiter ?? passThrough;

  /**
   * Submit a check-in
   * POST /api/checkin
   * 201 when published immediately, 202 when held for review
   */
  router.post('/checkin', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await checkin.submit({
        ...getRequester(req),
        body: isRecord(req.body) ? req.body : {}
      });
      const published = record.status === 'approved';
      res.status(published ? 201 : 202).json({
        success: true,
        status: record.status,
        message: published ? 'Check-in published' : 'Check-in received and awaiting review',
        data: toPublicSubmission(record)
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Published check-ins, newest first unless sorted by likes
   * GET /api/checkins?page=&limit=&sort=&order=&nickname=&q=&minLength=&excludeDefault=
   */
  router.get('/checkins', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await gatekeeper.admitRequester(getRequester(req));
      const result = await moderation.listPublic(parsePagination(req.query), parseListOptions(req.query));
      res.json({
        success: true,
        data: result.items.map(toPublicSubmission),
        total: result.total,
        page: result.page,
        limit: result.limit,
        pages: result.pages
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Thumbnails and counts for an archive before it is submitted
   * POST /api/archive/preview  { files: [{ name, data }] }
   */
  router.post('/archive/preview', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await gatekeeper.admitRequester(getRequester(req));
      const body = isRecord(req.body) ? req.body : {};
      const attachments = classifyAttachments(body.files);
      if (attachments.type !== 'archive') {
        throw new InvalidInputError('files', 'An archive file is required');
      }
      const preview = await checkin.previewArchive(attachments.archive);
      res.json({ success: true, data: preview });
    } catch (error) {
      next(error);
    }
  });

  /**
   * One image of a published archive at preview size
   * GET /api/checkins/:id/archive/image?path=
   */
  router.get('/checkins/:id/archive/image', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await gatekeeper.admitRequester(getRequester(req));
      const entryPath = req.query.path;
      if (typeof entryPath !== 'string' || entryPath === '') {
        throw new InvalidInputError('path', 'Image path is required');
      }
      const image = await checkin.fullImage(req.params.id, entryPath);
      res.json({ success: true, data: { path: entryPath, image } });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Original archive bytes under the uploaded filename
   * GET /api/checkins/:id/archive/download
   */
  router.get('/checkins/:id/archive/download', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await gatekeeper.admitRequester(getRequester(req));
      const download = await checkin.download(req.params.id);
      res.setHeader('Content-Type', download.contentType);
      res.setHeader('Content-Disposition', contentDisposition(download.filename));
      res.setHeader('Content-Length', String(download.data.length));
      res.send(download.data);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export default createCheckinRoutes;
