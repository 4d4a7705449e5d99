/**
 * Sliding-window write limiter with escalating temporary ban
 *
 * State lives in this process only. Several server instances each keep their
 * own windows, so the limit is best effort and not linearizable across a
 * fleet; a restart forgets every window and ban.
 */
import { WRITE_RATE_LIMIT, type SlidingWindowConfig } from '../config/constants';
import { type Clock, systemClock } from '../utils/clock';
import logger from '../utils/logger';

export type ActionKind = 'read' | 'write';

export type AdmitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterSeconds: number; reason: 'banned' | 'limit_reached' };

interface WindowEvent {
  at: number;
  kind: ActionKind;
}

export class SlidingWindowLimiter {
  private readonly config: SlidingWindowConfig;
  private readonly clock: Clock;
  private readonly windows = new Map<string, WindowEvent[]>();
  private readonly bans = new Map<string, number>();

  constructor(config: Partial<SlidingWindowConfig> = {}, clock: Clock = systemClock) {
    this.config = { ...WRITE_RATE_LIMIT, ...config };
    this.clock = clock;
  }

  /**
   * Decide whether `identifier` may perform an action of `kind` now.
   * Reads always pass. Every call runs synchronously, so the check and the
   * update of one identifier's bucket cannot interleave with another request.
   */
  admit(identifier: string, kind: ActionKind): AdmitDecision {
    if (kind !== 'write') {
      return { allowed: true };
    }

    const now = this.clock.now();

    const bannedUntil = this.bans.get(identifier);
    if (bannedUntil !== undefined) {
      if (now < bannedUntil) {
        return {
          allowed: false,
          reason: 'banned',
          retryAfterSeconds: Math.ceil((bannedUntil - now) / 1000)
        };
      }
      // Natural expiry is the only thing that resets the window
      this.bans.delete(identifier);
      this.windows.delete(identifier);
    }

    const events = this.pruneWindow(identifier, now);
    const writeCount = events.filter(event => event.kind === 'write').length;

    if (writeCount >= this.config.maxWrites) {
      this.bans.set(identifier, now + this.config.banDurationMs);
      logger.warn('Write rate limit reached, temporary ban applied', {
        identifier,
        writes: writeCount,
        banSeconds: Math.ceil(this.config.banDurationMs / 1000)
      });
      return {
        allowed: false,
        reason: 'limit_reached',
        retryAfterSeconds: Math.ceil(this.config.banDurationMs / 1000)
      };
    }

    events.push({ at: now, kind });
    this.windows.set(identifier, events);
    return { allowed: true };
  }

  /**
   * Remaining ban in seconds, or 0 when not banned
   */
  banRemaining(identifier: string): number {
    const bannedUntil = this.bans.get(identifier);
    if (bannedUntil === undefined) return 0;
    return Math.max(0, Math.ceil((bannedUntil - this.clock.now()) / 1000));
  }

  /**
   * Drop idle identifiers and expired bans (call periodically to bound memory)
   */
  prune(): void {
    const now = this.clock.now();
    for (const [identifier, bannedUntil] of this.bans) {
      if (now >= bannedUntil) {
        this.bans.delete(identifier);
        this.windows.delete(identifier);
      }
    }
    for (const identifier of [...this.windows.keys()]) {
      if (this.bans.has(identifier)) continue;
      const events = this.pruneWindow(identifier, now);
      if (events.length === 0) {
        this.windows.delete(identifier);
      }
    }
  }

  get trackedIdentifiers(): number {
    return this.windows.size;
  }

  private pruneWindow(identifier: string, now: number): WindowEvent[] {
    const events = this.windows.get(identifier) ?? [];
    const live = events.filter(event => now - event.at < this.config.windowMs);
    if (live.length > 0) {
      this.windows.set(identifier, live);
    }
    return live;
  }
}

export default SlidingWindowLimiter;
