/**
 * Likes on published check-ins
 * One like per requester and submission, throttled per requester by its own
 * sliding window.
 */
import type { LikeRepository } from './likeRepository';
import type { SlidingWindowLimiter } from './slidingWindowLimiter';
import type { SubmissionRepository } from './submissionRepository';
import { type Clock, systemClock } from '../utils/clock';
import { ConflictError, NotFoundError, RateLimitError } from '../utils/errors';
import logger from '../utils/logger';

export interface LikeServiceDeps {
  submissions: SubmissionRepository;
  likes: LikeRepository;
  limiter: SlidingWindowLimiter;
  clock?: Clock;
}

export interface LikeResult {
  id: string;
  likeCount: number;
}

export class AlreadyLikedError extends ConflictError {
  constructor() {
    super('You have already liked this check-in');
    this.code = 'ALREADY_LIKED';
  }
}

export class LikeService {
  private readonly clock: Clock;

  constructor(private readonly deps: LikeServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async like(submissionId: string, identifier: string): Promise<LikeResult> {
    const admit = this.deps.limiter.admit(identifier, 'write');
    if (!admit.allowed) {
      throw new RateLimitError(`Too many likes, please retry in ${admit.retryAfterSeconds} seconds`, admit.retryAfterSeconds);
    }

    const record = await this.deps.submissions.findById(submissionId);
    if (!record || record.status !== 'approved') {
      throw new NotFoundError('Submission');
    }

    const added = await this.deps.likes.add(submissionId, identifier, new Date(this.clock.now()));
    if (!added) {
      throw new AlreadyLikedError();
    }

    // Unpublished between the lookup and the increment
    const updated = await this.deps.submissions.incrementLikes(submissionId);
    if (!updated) {
      logger.warn('Like recorded for a submission that is no longer published', { submissionId });
      throw new NotFoundError('Submission');
    }
    return { id: submissionId, likeCount: updated.likeCount };
  }

  likedIds(identifier: string): Promise<string[]> {
    return this.deps.likes.likedIds(identifier);
  }
}

export default LikeService;
