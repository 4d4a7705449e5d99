/**
 * Duplicate content detection
 * Remembers the SHA-256 of each admitted post for a fixed window.
 */
import crypto from 'crypto';
import { TTLCache } from './cache';
import { DUPLICATE_CONTENT, type DuplicateConfig } from '../config/constants';
import { type Clock, systemClock } from '../utils/clock';

export function contentFingerprint(content: string): string {
  return crypto.createHash('sha256').update(content.trim(), 'utf8').digest('hex');
}

export class DuplicateDetector {
  private readonly seen: TTLCache<string, number>;
  private readonly clock: Clock;

  constructor(config: Partial<DuplicateConfig> = {}, clock: Clock = systemClock) {
    const { windowMs, maxEntries } = { ...DUPLICATE_CONTENT, ...config };
    this.seen = new TTLCache<string, number>(windowMs, maxEntries, clock);
    this.clock = clock;
  }

  /**
   * True when the content is new (and records it), false for a repeat inside
   * the window. A repeat does not extend the window.
   */
  check(content: string): boolean {
    const hash = contentFingerprint(content);
    this.seen.cleanup();
    if (this.seen.has(hash)) {
      return false;
    }
    this.seen.set(hash, this.clock.now());
    return true;
  }

  /**
   * Undo a recorded fingerprint when the submission fails later in the pipeline
   */
  forget(content: string): void {
    this.seen.delete(contentFingerprint(content));
  }

  get size(): number {
    return this.seen.size;
  }
}

export default DuplicateDetector;
