/**
 * Like Routes
 * Requesters are identified by client IP, as for the write limiter
 */
import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { getRequester } from '../abusePrevention';
import type { Gatekeeper } from '../services/gatekeeper';
import type { LikeService } from '../services/likes';

// Types
interface Dependencies {
  likes: LikeService;
  gatekeeper: Gatekeeper;
  rateLimiter?: RequestHandler;
}

const passThrough: RequestHandler = (_req, _res, next) => next();

export function createLikeRoutes(deps: Dependencies) {
  const router = Router();
  const { likes, gatekeeper } = deps;
  const limiter = deps.rateLimiter ?? passThrough;

  /**
   * Like a published check-in once
   * POST /api/like/:id
   */
  router.post('/like/:id', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const requester = getRequester(req);
      await gatekeeper.admitRequester(requester);
      const result = await likes.like(req.params.id, requester.ip);
      res.json({ success: true, message: 'Liked', data: result });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Check-ins the requester has liked
   * GET /api/likes
   */
  router.get('/likes', limiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const requester = getRequester(req);
      await gatekeeper.admitRequester(requester);
      res.json({ success: true, data: await likes.likedIds(requester.ip) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export default createLikeRoutes;
