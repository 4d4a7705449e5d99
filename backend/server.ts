/**
 * Server entry point
 * Builds the pipeline services, loads the list files and starts listening
 */
import config from './config/env';
import { closeDatabase, connectDatabase } from './config/database';
import { DUPLICATE_CONTENT, HONEYPOT, LIKE_RATE_LIMIT, WRITE_RATE_LIMIT } from './config/constants';
import { createApp } from './app';
import { createRequireAdmin } from './middleware/auth';
import { createAdminAuthLimiter, createGeneralLimiter } from './middleware/rateLimiter';
import { BlocklistStore } from './services/blocklist';
import { CheckinService } from './services/checkin';
import { ContentScanner, KeywordList } from './services/contentScanner';
import { DuplicateDetector } from './services/duplicateDetector';
import { Gatekeeper } from './services/gatekeeper';
import { setupGracefulShutdown } from './services/gracefulShutdown';
import { HoneypotDetector } from './services/honeypot';
import { IpRegionClassifier } from './services/ipRegion';
import { MongoLikeRepository } from './services/likeRepository';
import { LikeService } from './services/likes';
import { ModerationService } from './services/moderation';
import { SlidingWindowLimiter } from './services/slidingWindowLimiter';
import { MongoSubmissionRepository } from './services/submissionRepository';
import { getErrorMessage } from './utils/errors';
import logger from './utils/logger';

// Idle rate-limit buckets are dropped on this interval
const LIMITER_PRUNE_INTERVAL_MS = 60 * 1000;

async function startServer(): Promise<void> {
  try {
    const connected = await connectDatabase();
    if (!connected) {
      logger.warn('Starting without a database connection; submissions will fail until it connects');
    }

    const blocklist = new BlocklistStore(config.BLOCKLIST_FILE);
    const keywords = new KeywordList(config.SPAM_KEYWORDS_FILE);
    await Promise.all([blocklist.load(), keywords.load()]);
    blocklist.watch();
    keywords.watch();
    logger.info('List files loaded', { blocklist: blocklist.size, spamKeywords: keywords.size });

    const limiter = new SlidingWindowLimiter(WRITE_RATE_LIMIT);
    const duplicates = new DuplicateDetector(DUPLICATE_CONTENT);
    const regions = new IpRegionClassifier({
      ...(config.GEOIP_DB_PATH ? { geoDbPath: config.GEOIP_DB_PATH } : {}),
      blockedRegions: config.BLOCKED_REGIONS
    });

    const gatekeeper = new Gatekeeper({
      blocklist,
      regions,
      limiter,
      honeypot: new HoneypotDetector(HONEYPOT),
      duplicates,
      scanner: new ContentScanner({ keywords })
    });
    const submissions = new MongoSubmissionRepository();
    const moderation = new ModerationService(submissions, blocklist);
    const likeLimiter = new SlidingWindowLimiter(LIKE_RATE_LIMIT);
    const likes = new LikeService({ submissions, likes: new MongoLikeRepository(), limiter: likeLimiter });
    const checkin = new CheckinService({
      gatekeeper,
      moderation,
      duplicates,
      uploadDir: config.UPLOAD_DIR,
      uploadUrlPrefix: config.UPLOAD_URL_PREFIX,
      archiveDir: config.ARCHIVE_DIR,
      archiveTimeoutMs: config.ARCHIVE_TIMEOUT_MS
    });

    if (!config.ADMIN_SECRET) {
      logger.warn('ADMIN_SECRET not set; admin routes will refuse every request');
    }

    const app = createApp({
      checkin,
      gatekeeper,
      moderation,
      likes,
      blocklist,
      keywords,
      requireAdmin: createRequireAdmin(config.ADMIN_SECRET),
      authLimiter: createAdminAuthLimiter(),
      generalLimiter: createGeneralLimiter(),
      uploadBodyLimit: config.JSON_BODY_LIMIT,
      trustProxy: config.TRUST_PROXY,
      ...(config.SERVE_UPLOADS ? { staticUploads: { dir: config.UPLOAD_DIR, urlPrefix: config.UPLOAD_URL_PREFIX } } : {}),
      isDevelopment: config.isDevelopment
    });

    const pruneTimer = setInterval(() => {
      limiter.prune();
      likeLimiter.prune();
    }, LIMITER_PRUNE_INTERVAL_MS);
    pruneTimer.unref();

    const HOST = config.HOST || '0.0.0.0';
    const server = app.listen(config.PORT, HOST, () => {
      logger.info(`Check-in API running on port ${config.PORT}`, { host: HOST, environment: config.NODE_ENV });
    });

    server.keepAliveTimeout = 65000;
    server.headersTimeout = 66000;

    setupGracefulShutdown(server, [
      { name: 'limiter prune timer', run: () => clearInterval(pruneTimer) },
      { name: 'list file watchers', run: () => { blocklist.unwatch(); keywords.unwatch(); } },
      { name: 'database', run: closeDatabase }
    ]);
  } catch (error) {
    logger.error('Failed to start server', { error: getErrorMessage(error) });
    process.exit(1);
  }
}

void startServer();
