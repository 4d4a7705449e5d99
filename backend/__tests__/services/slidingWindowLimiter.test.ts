/**
 * Sliding window write limiter tests
 */
import { describe, it, expect, beforeEach } from '@jest/globals';
import { SlidingWindowLimiter } from '../../services/slidingWindowLimiter';
import { FakeClock } from '../helpers/fakeClock';

describe('SlidingWindowLimiter', () => {
  let clock: FakeClock;
  let limiter: SlidingWindowLimiter;

  beforeEach(() => {
    clock = new FakeClock();
    limiter = new SlidingWindowLimiter({ windowMs: 60_000, maxWrites: 3, banDurationMs: 300_000 }, clock);
  });

  it('should always admit reads', () => {
    for (let i = 0; i < 20; i++) {
      expect(limiter.admit('1.2.3.4', 'read')).toEqual({ allowed: true });
    }
    expect(limiter.trackedIdentifiers).toBe(0);
  });

  it('should admit writes up to the threshold', () => {
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
  });

  it('should ban once the threshold is exceeded and report the full ban', () => {
    for (let i = 0; i < 3; i++) limiter.admit('1.2.3.4', 'write');

    expect(limiter.admit('1.2.3.4', 'write')).toEqual({
      allowed: false,
      reason: 'limit_reached',
      retryAfterSeconds: 300
    });
  });

  it('should keep denying with the remaining time until the ban expires', () => {
    for (let i = 0; i < 4; i++) limiter.admit('1.2.3.4', 'write');

    clock.advance(100_000);
    expect(limiter.admit('1.2.3.4', 'write')).toEqual({
      allowed: false,
      reason: 'banned',
      retryAfterSeconds: 200
    });
    expect(limiter.banRemaining('1.2.3.4')).toBe(200);

    clock.advance(199_999);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(false);

    clock.advance(1);
    expect(limiter.admit('1.2.3.4', 'write')).toEqual({ allowed: true });
    expect(limiter.banRemaining('1.2.3.4')).toBe(0);
  });

  it('should reset the window after a ban expires', () => {
    for (let i = 0; i < 4; i++) limiter.admit('1.2.3.4', 'write');
    clock.advance(300_000);

    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(false);
  });

  it('should forget writes older than the window', () => {
    limiter.admit('1.2.3.4', 'write');
    limiter.admit('1.2.3.4', 'write');
    clock.advance(60_000);

    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(true);
    expect(limiter.admit('1.2.3.4', 'write').allowed).toBe(false);
  });

  it('should track identifiers independently', () => {
    for (let i = 0; i < 4; i++) limiter.admit('1.2.3.4', 'write');

    expect(limiter.admit('5.6.7.8', 'write')).toEqual({ allowed: true });
  });

  it('should drop idle identifiers and expired bans on prune', () => {
    limiter.admit('1.2.3.4', 'write');
    for (let i = 0; i < 4; i++) limiter.admit('5.6.7.8', 'write');
    expect(limiter.trackedIdentifiers).toBe(2);

    clock.advance(60_000);
    limiter.prune();
    expect(limiter.trackedIdentifiers).toBe(1);

    clock.advance(240_000);
    limiter.prune();
    expect(limiter.trackedIdentifiers).toBe(0);
    expect(limiter.banRemaining('5.6.7.8')).toBe(0);
  });
});
