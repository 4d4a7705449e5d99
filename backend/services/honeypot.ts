/**
 * Bot detection: decoy field and form timing
 */
import { HONEYPOT, type HoneypotConfig } from '../config/constants';
import { type Clock, systemClock } from '../utils/clock';

export type HoneypotVerdict =
  | { allowed: true }
  | { allowed: false; reason: 'honeypot_filled' | 'too_fast' | 'stale_form' };

/**
 * Epoch milliseconds from a number or numeric string; null when unusable
 */
export function parseIssuedAt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export class HoneypotDetector {
  private readonly config: HoneypotConfig;
  private readonly clock: Clock;

  constructor(config: Partial<HoneypotConfig> = {}, clock: Clock = systemClock) {
    this.config = { ...HONEYPOT, ...config };
    this.clock = clock;
  }

  check(honeypotValue: unknown, issuedAt: unknown): HoneypotVerdict {
    if (typeof honeypotValue === 'string' ? honeypotValue.trim() !== '' : honeypotValue != null) {
      return { allowed: false, reason: 'honeypot_filled' };
    }

    // A missing or malformed timestamp skips the timing check
    const issued = parseIssuedAt(issuedAt);
    if (issued === null) {
      return { allowed: true };
    }

    const elapsed = this.clock.now() - issued;
    if (elapsed < this.config.minElapsedMs) {
      return { allowed: false, reason: 'too_fast' };
    }
    if (elapsed > this.config.maxElapsedMs) {
      return { allowed: false, reason: 'stale_form' };
    }
    return { allowed: true };
  }
}

export default HoneypotDetector;
