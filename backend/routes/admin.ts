/**
 * Admin Routes
 * Moderation queue, decisions and statistics. Every route requires the
 * admin secret.
 */
import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { MODERATION_STATUSES, type ModerationStatus, type SubmissionRecord } from '../models/Submission';
import type { BatchResult, ModerationService } from '../services/moderation';
import { InvalidInputError } from '../utils/errors';
import logger from '../utils/logger';
import { isRecord, parsePagination } from '../utils/validation';

// Types
interface Dependencies {
  moderation: ModerationService;
  requireAdmin: RequestHandler;
  authLimiter?: RequestHandler;
}

export interface AdminSubmission extends Omit<SubmissionRecord, 'submissionId' | 'archivePath'> {
  id: string;
}

const MAX_BATCH_SIZE = 500;

export function toAdminSubmission(record: SubmissionRecord): AdminSubmission {
  const { submissionId, archivePath: _archivePath, ...rest } = record;
  return { id: submissionId, ...rest };
}

function parseStatusFilter(value: unknown): ModerationStatus | undefined {
  if (value === undefined || value === 'all') return undefined;
  const status = MODERATION_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new InvalidInputError('status', `Status must be one of: ${MODERATION_STATUSES.join(', ')}, all`);
  }
  return status;
}

function parseIds(body: unknown): string[] {
  const ids = isRecord(body) ? body.ids : undefined;
  if (!Array.isArray(ids) || ids.length === 0) {
    throw new InvalidInputError('ids', 'A non-empty list of ids is required');
  }
  if (ids.length > MAX_BATCH_SIZE) {
    throw new InvalidInputError('ids', `At most ${MAX_BATCH_SIZE} ids per batch`);
  }
  const valid = ids.filter((id): id is string => typeof id === 'string' && id.trim() !== '');
  if (valid.length !== ids.length) {
    throw new InvalidInputError('ids', 'Every id must be a non-empty string');
  }
  return [...new Set(valid)];
}

function batchMessage(verb: string, result: BatchResult): string {
  return `${verb} ${result.succeeded}/${result.requested} submissions`;
}

export function createAdminRoutes(deps: Dependencies) {
  const router = Router();
  const { moderation, requireAdmin } = deps;

  if (deps.authLimiter) {
    router.use(deps.authLimiter);
  }
  router.use(requireAdmin);

  /**
   * Counts per status
   * GET /api/admin/stats
   */
  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await moderation.stats() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Review queue
   * GET /api/admin/pending?page=&limit=
   */
  router.get('/pending', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await moderation.listByStatus('pending', parsePagination(req.query));
      res.json({
        success: true,
        data: { ...result, items: result.items.map(toAdminSubmission) }
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Every submission, optionally filtered
   * GET /api/admin/all?status=pending|approved|banned|all
   */
  router.get('/all', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = parseStatusFilter(req.query.status);
      const result = await moderation.listByStatus(status, parsePagination(req.query));
      res.json({
        success: true,
        data: { ...result, items: result.items.map(toAdminSubmission) }
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/approve/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await moderation.approve(req.params.id);
      res.json({ success: true, message: `Approved ${record.submissionId}`, data: toAdminSubmission(record) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/reject/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await moderation.reject(req.params.id);
      res.json({ success: true, message: `Rejected ${record.submissionId}`, data: toAdminSubmission(record) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Reject and blocklist the submitter
   * POST /api/admin/ban/:id
   */
  router.post('/ban/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await moderation.ban(req.params.id);
      logger.warn('Submitter banned', { submissionId: record.submissionId, region: record.region });
      res.json({ success: true, message: `Banned ${record.submissionId}`, data: toAdminSubmission(record) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/batch/approve', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await moderation.batchApprove(parseIds(req.body));
      res.json({ success: true, message: batchMessage('Approved', result), data: result });
    } catch (error) {
      next(error);
    }
  });

  router.post('/batch/reject', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await moderation.batchReject(parseIds(req.body));
      res.json({ success: true, message: batchMessage('Rejected', result), data: result });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export default createAdminRoutes;
