/**
 * Health Routes
 * Liveness plus the state of the database and the loaded list files
 */
import { Router, type Request, type Response } from 'express';
import mongoose from 'mongoose';
import type { BlocklistStore } from '../services/blocklist';
import type { KeywordList } from '../services/contentScanner';

// Types
interface Dependencies {
  blocklist: BlocklistStore;
  keywords?: KeywordList;
  /** Overrides the mongoose connection state; tests run without a database */
  databaseState?: () => number;
}

const DB_STATES = ['disconnected', 'connected', 'connecting', 'disconnecting'];

export const createHealthRoutes = (deps: Dependencies) => {
  const router = Router();
  const databaseState = deps.databaseState ?? (() => mongoose.connection.readyState);

  /**
   * Health check endpoint
   * GET /api/health
   */
  router.get('/health', (_req: Request, res: Response) => {
    const state = databaseState();
    const healthy = state === 1;
    res.status(healthy ? 200 : 503).json({
      success: healthy,
      status: healthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      database: DB_STATES[state] ?? 'unknown',
      blocklistEntries: deps.blocklist.size,
      ...(deps.keywords ? { spamKeywords: deps.keywords.size } : {})
    });
  });

  return router;
};

export default createHealthRoutes;
