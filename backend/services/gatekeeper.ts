/**
 * Submission Gatekeeper
 * Runs every pre-persistence check in a fixed order and either throws the
 * first denial or returns the normalized submission with its initial
 * moderation status.
 *
 * Order: blocklist, region, rate limit, honeypot, field validation,
 * duplicate content, content scan.
 */
import type { BlocklistStore } from './blocklist';
import type { ContentScanner, ScanResult } from './contentScanner';
import type { DuplicateDetector } from './duplicateDetector';
import type { HoneypotDetector } from './honeypot';
import type { IpRegionClassifier } from './ipRegion';
import type { SlidingWindowLimiter } from './slidingWindowLimiter';
import type { ModerationReason } from '../models/Submission';
import {
  BlockedError,
  RateLimitError,
  RegionBlockedError,
  SubmissionRejectedError
} from '../utils/errors';
import { createContextLogger } from '../utils/logger';
import { classifyAttachments, type ClassifiedAttachments } from '../utils/upload';
import { normalizeSubmissionFields, type SubmissionFields } from '../utils/validation';

export interface RequesterIdentity {
  ip: string;
  fingerprint?: string;
}

export interface GateInput extends RequesterIdentity {
  body: Record<string, unknown>;
}

export interface GateVerdict {
  fields: SubmissionFields;
  attachments: ClassifiedAttachments;
  region: string;
  initialStatus: 'approved' | 'pending';
  moderationReason: ModerationReason;
}

export interface GatekeeperDeps {
  blocklist: BlocklistStore;
  regions: IpRegionClassifier;
  limiter: SlidingWindowLimiter;
  honeypot: HoneypotDetector;
  duplicates: DuplicateDetector;
  scanner: ContentScanner;
}

const HONEYPOT_MESSAGES = {
  honeypot_filled: 'Request rejected',
  too_fast: 'Submitted too quickly, please try again',
  stale_form: 'Form has expired, please reload the page'
} as const;

export class Gatekeeper {
  constructor(private readonly deps: GatekeeperDeps) {}

  /**
   * Blocklist and region checks; the whole of the read path
   */
  async admitRequester(identity: RequesterIdentity): Promise<string> {
    const log = createContextLogger({ ip: identity.ip });

    if (this.deps.blocklist.hasAny([identity.ip, identity.fingerprint])) {
      log.warn('Blocklisted requester denied');
      throw new BlockedError();
    }

    const region = await this.deps.regions.classify(identity.ip);
    if (this.deps.regions.isBlockedRegion(region)) {
      log.warn('Region blocked', { region });
      throw new RegionBlockedError(region);
    }
    return region;
  }

  async check(input: GateInput): Promise<GateVerdict> {
    const log = createContextLogger({ ip: input.ip });
    const region = await this.admitRequester(input);

    const admit = this.deps.limiter.admit(input.ip, 'write');
    if (!admit.allowed) {
      throw new RateLimitError(
        `Too many submissions, please retry in ${admit.retryAfterSeconds} seconds`,
        admit.retryAfterSeconds
      );
    }

    const bot = this.deps.honeypot.check(input.body.website, input.body.issuedAt);
    if (!bot.allowed) {
      log.warn('Bot check failed', { reason: bot.reason });
      throw new SubmissionRejectedError(HONEYPOT_MESSAGES[bot.reason], 'BOT_DETECTED');
    }

    const fields = normalizeSubmissionFields(input.body);
    const attachments = classifyAttachments(input.body.files, input.body.previewImages);

    if (!this.deps.duplicates.check(fields.content)) {
      log.info('Duplicate content denied');
      throw new SubmissionRejectedError('Duplicate content, please do not resubmit', 'DUPLICATE_CONTENT');
    }

    let flaggedNickname = false;
    const scans: ScanResult[] = [
      this.deps.scanner.scan(fields.content, 'content'),
      this.deps.scanner.scan(fields.nickname, 'nickname'),
      ...(fields.url !== undefined ? [this.deps.scanner.scan(fields.url, 'url')] : [])
    ];
    for (const scan of scans) {
      if (scan.safe) continue;
      if (scan.category === 'nickname') {
        flaggedNickname = true;
        continue;
      }
      log.warn('Content scan denied submission', { category: scan.category, rule: scan.rule });
      this.deps.duplicates.forget(fields.content);
      throw new SubmissionRejectedError(scan.reason, 'CONTENT_REJECTED');
    }

    const hasMedia = attachments.type === 'archive' || attachments.media.length > 0;
    const hasContact = fields.email !== undefined || fields.qq !== undefined || fields.url !== undefined;
    const moderationReason: ModerationReason = flaggedNickname
      ? 'flagged_nickname'
      : hasContact
        ? 'contact_info'
        : !hasMedia
          ? 'no_media'
          : 'auto_approved';

    return {
      fields,
      attachments,
      region,
      initialStatus: moderationReason === 'auto_approved' ? 'approved' : 'pending',
      moderationReason
    };
  }
}

export default Gatekeeper;
