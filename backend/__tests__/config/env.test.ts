/**
 * Environment parsing tests
 */
import { describe, it, expect } from '@jest/globals';
import { config, parseList, parsePositiveInt } from '../../config/env';

describe('parseList', () => {
  it('should split and trim comma separated values', () => {
    expect(parseList(' cn, ru ,,kp ', [])).toEqual(['cn', 'ru', 'kp']);
  });

  it('should fall back when unset or blank', () => {
    expect(parseList(undefined, ['CN'])).toEqual(['CN']);
    expect(parseList('   ', ['CN'])).toEqual(['CN']);
  });
});

describe('parsePositiveInt', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('15000', 1)).toBe(15000);
  });

  it('should fall back on anything else', () => {
    expect(parsePositiveInt(undefined, 7)).toBe(7);
    expect(parsePositiveInt('0', 7)).toBe(7);
    expect(parsePositiveInt('-5', 7)).toBe(7);
    expect(parsePositiveInt('soon', 7)).toBe(7);
  });
});

describe('config', () => {
  it('should run in test mode under jest', () => {
    expect(config.isTest).toBe(true);
    expect(config.isDevelopment).toBe(false);
  });
});
