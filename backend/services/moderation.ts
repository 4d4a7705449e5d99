/**
 * Moderation State Machine
 *
 *   created -> approved | pending
 *   pending -> approved            (approve)
 *   pending | approved -> banned   (reject, ban)
 *
 * `banned` is terminal. Reject and ban both keep the record under status
 * `banned` with reason `rejected` or `banned`; ban also blocklists the
 * submitter.
 */
import net from 'net';
import { v4 as uuidv4 } from 'uuid';
import type { BlocklistStore } from './blocklist';
import { isLocalAddress } from './ipRegion';
import type { ListFilter, ListResult, ListSort, StatusCounts, SubmissionRepository } from './submissionRepository';
import type { ModerationReason, ModerationStatus, SubmissionRecord } from '../models/Submission';
import { type Clock, systemClock } from '../utils/clock';
import { InvalidTransitionError, NotFoundError, getErrorMessage, isAppError } from '../utils/errors';
import logger from '../utils/logger';

export type ModerationAction = 'approve' | 'reject' | 'ban';

interface TransitionRule {
  from: readonly ModerationStatus[];
  to: ModerationStatus;
  reason: ModerationReason;
}

export const TRANSITIONS: Record<ModerationAction, TransitionRule> = {
  approve: { from: ['pending'], to: 'approved', reason: 'approved' },
  reject: { from: ['pending', 'approved'], to: 'banned', reason: 'rejected' },
  ban: { from: ['pending', 'approved'], to: 'banned', reason: 'banned' }
};

export interface NewSubmission extends Omit<SubmissionRecord, 'submissionId' | 'status' | 'moderationReason' | 'moderatedAt' | 'likeCount' | 'createdAt'> {
  status: 'approved' | 'pending';
  moderationReason: ModerationReason;
}

export interface BatchResult {
  requested: number;
  succeeded: number;
  failed: string[];
}

export interface Page {
  page: number;
  limit: number;
}

export interface PagedSubmissions extends ListResult {
  page: number;
  limit: number;
  pages: number;
}

export interface ListOptions {
  filter?: ListFilter;
  sort?: ListSort;
}

export interface ModerationStats extends StatusCounts {
  total: number;
}

export class ModerationService {
  constructor(
    private readonly repository: SubmissionRepository,
    private readonly blocklist: BlocklistStore,
    private readonly clock: Clock = systemClock
  ) {}

  async create(submission: NewSubmission): Promise<SubmissionRecord> {
    const now = new Date(this.clock.now());
    const record = await this.repository.create({
      ...submission,
      submissionId: uuidv4(),
      likeCount: 0,
      createdAt: now,
      // Auto-approval counts as a moderation decision
      ...(submission.status === 'approved' ? { moderatedAt: now } : {})
    });
    logger.info('Submission created', {
      submissionId: record.submissionId,
      status: record.status,
      reason: record.moderationReason
    });
    return record;
  }

  approve(submissionId: string): Promise<SubmissionRecord> {
    return this.apply(submissionId, 'approve');
  }

  reject(submissionId: string): Promise<SubmissionRecord> {
    return this.apply(submissionId, 'reject');
  }

  /**
   * Ban the submission and blocklist its submitter: a public IP when one was
   * recorded, otherwise the fingerprint
   */
  async ban(submissionId: string): Promise<SubmissionRecord> {
    const record = await this.apply(submissionId, 'ban');
    const identifier = banIdentifier(record);
    if (identifier) {
      await this.blocklist.add(identifier);
    } else {
      logger.warn('Banned submission has no blockable identifier', { submissionId });
    }
    return record;
  }

  batchApprove(ids: readonly string[]): Promise<BatchResult> {
    return this.batch(ids, id => this.approve(id));
  }

  batchReject(ids: readonly string[]): Promise<BatchResult> {
    return this.batch(ids, id => this.reject(id));
  }

  /**
   * Default public listing: approved only
   */
  listPublic(page: Page, options: ListOptions = {}): Promise<PagedSubmissions> {
    return this.list('approved', page, options);
  }

  /**
   * Admin listing; every status when `status` is omitted
   */
  listByStatus(status: ModerationStatus | undefined, page: Page): Promise<PagedSubmissions> {
    return this.list(status, page);
  }

  async stats(): Promise<ModerationStats> {
    const counts = await this.repository.countByStatus();
    return { ...counts, total: counts.pending + counts.approved + counts.banned };
  }

  async get(submissionId: string): Promise<SubmissionRecord> {
    const record = await this.repository.findById(submissionId);
    if (!record) throw new NotFoundError('Submission');
    return record;
  }

  private async apply(submissionId: string, action: ModerationAction): Promise<SubmissionRecord> {
    const rule = TRANSITIONS[action];
    const updated = await this.repository.transition(submissionId, rule.from, {
      status: rule.to,
      moderationReason: rule.reason,
      moderatedAt: new Date(this.clock.now())
    });

    if (!updated) {
      // Either missing or in a state the action cannot leave
      const current = await this.repository.findById(submissionId);
      if (!current) throw new NotFoundError('Submission');
      throw new InvalidTransitionError(current.status, action);
    }

    logger.info('Submission moderated', { submissionId, action, status: updated.status });
    return updated;
  }

  private async list(status: ModerationStatus | undefined, page: Page, options: ListOptions = {}): Promise<PagedSubmissions> {
    const result = await this.repository.list({
      ...(status ? { status } : {}),
      ...options,
      skip: (page.page - 1) * page.limit,
      limit: page.limit
    });
    return {
      ...result,
      page: page.page,
      limit: page.limit,
      pages: Math.ceil(result.total / page.limit)
    };
  }

  private async batch(ids: readonly string[], run: (id: string) => Promise<SubmissionRecord>): Promise<BatchResult> {
    const failed: string[] = [];
    let succeeded = 0;
    for (const id of ids) {
      try {
        await run(id);
        succeeded++;
      } catch (error) {
        if (!isAppError(error) || !error.isOperational) throw error;
        logger.debug('Batch moderation skipped submission', { submissionId: id, error: getErrorMessage(error) });
        failed.push(id);
      }
    }
    return { requested: ids.length, succeeded, failed };
  }
}

export function banIdentifier(record: SubmissionRecord): string | undefined {
  const ip = record.ipAddress;
  if (ip && net.isIP(ip) !== 0 && !isLocalAddress(ip)) return ip;
  return record.fingerprint || undefined;
}

export default ModerationService;
