/**
 * API Routes Index
 * Central router for all API endpoints
 */
import { Router, type RequestHandler } from 'express';
import createAdminRoutes from './admin';
import createCheckinRoutes from './checkins';
import createHealthRoutes from './health';
import createLikeRoutes from './likes';
import type { BlocklistStore } from '../services/blocklist';
import type { CheckinService } from '../services/checkin';
import type { KeywordList } from '../services/contentScanner';
import type { Gatekeeper } from '../services/gatekeeper';
import type { LikeService } from '../services/likes';
import type { ModerationService } from '../services/moderation';

export interface ApiDependencies {
  checkin: CheckinService;
  gatekeeper: Gatekeeper;
  moderation: ModerationService;
  likes: LikeService;
  blocklist: BlocklistStore;
  keywords?: KeywordList;
  requireAdmin: RequestHandler;
  authLimiter?: RequestHandler;
  databaseState?: () => number;
}

/**
 * Create and configure all API routes
 */
export function createApiRoutes(deps: ApiDependencies) {
  const router = Router();

  router.use('/', createHealthRoutes(deps));
  router.use('/', createCheckinRoutes(deps));
  router.use('/', createLikeRoutes(deps));
  router.use('/admin', createAdminRoutes(deps));

  return router;
}

export default createApiRoutes;
