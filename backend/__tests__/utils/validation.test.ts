/**
 * Validation utility tests
 */
import { describe, it, expect } from '@jest/globals';
import { InvalidInputError } from '../../utils/errors';
import {
  deepSanitize,
  isSingleEmoji,
  isValidEmail,
  isValidHttpUrl,
  isValidNickname,
  isValidQQ,
  normalizeSubmissionFields,
  parseListOptions,
  parsePagination
} from '../../utils/validation';

describe('Validation Utilities', () => {
  describe('isValidEmail', () => {
    it('should accept ordinary addresses', () => {
      expect(isValidEmail('someone@example.com')).toBe(true);
      expect(isValidEmail('first.last+tag@mail.example.org')).toBe(true);
    });

    it('should reject malformed addresses', () => {
      expect(isValidEmail('no-at-sign')).toBe(false);
      expect(isValidEmail('a@b')).toBe(false);
      expect(isValidEmail('a@-bad.com')).toBe(false);
      expect(isValidEmail(42)).toBe(false);
    });

    it('should reject overlong addresses', () => {
      expect(isValidEmail(`${'a'.repeat(250)}@example.com`)).toBe(false);
    });
  });

  describe('isValidHttpUrl', () => {
    it('should accept http and https urls', () => {
      expect(isValidHttpUrl('https://example.com')).toBe(true);
      expect(isValidHttpUrl('http://blog.example.com:8080/posts?id=1#top')).toBe(true);
    });

    it('should reject other schemes and spaces', () => {
      expect(isValidHttpUrl('ftp://example.com')).toBe(false);
      expect(isValidHttpUrl('javascript:alert(1)')).toBe(false);
      expect(isValidHttpUrl('https://example.com/a b')).toBe(false);
    });
  });

  describe('isValidQQ', () => {
    it('should accept 5 to 11 digits', () => {
      expect(isValidQQ('12345')).toBe(true);
      expect(isValidQQ('12345678901')).toBe(true);
    });

    it('should reject other values', () => {
      expect(isValidQQ('1234')).toBe(false);
      expect(isValidQQ('123456789012')).toBe(false);
      expect(isValidQQ('12a45')).toBe(false);
    });
  });

  describe('isValidNickname', () => {
    it('should accept up to 20 plain characters', () => {
      expect(isValidNickname('Runner 42')).toBe(true);
      expect(isValidNickname('x'.repeat(20))).toBe(true);
    });

    it('should reject markup characters and overlong names', () => {
      expect(isValidNickname('<b>me</b>')).toBe(false);
      expect(isValidNickname('a/b')).toBe(false);
      expect(isValidNickname('x'.repeat(21))).toBe(false);
      expect(isValidNickname('')).toBe(false);
    });
  });

  describe('isSingleEmoji', () => {
    it('should accept emoji including modified and joined sequences', () => {
      expect(isSingleEmoji('🥰')).toBe(true);
      expect(isSingleEmoji('👍🏽')).toBe(true);
      expect(isSingleEmoji('👨‍👩‍👧')).toBe(true);
    });

    it('should reject text', () => {
      expect(isSingleEmoji('ab')).toBe(false);
      expect(isSingleEmoji('1')).toBe(false);
      expect(isSingleEmoji('🥰 hi')).toBe(false);
      expect(isSingleEmoji('')).toBe(false);
    });
  });

  describe('normalizeSubmissionFields', () => {
    it('should trim content and fill defaults', () => {
      expect(normalizeSubmissionFields({ content: '  hello  ', nickname: '   ', email: '' })).toEqual({
        content: 'hello',
        nickname: 'Anonymous',
        avatar: '🥰'
      });
    });

    it('should keep valid optional fields', () => {
      expect(normalizeSubmissionFields({
        content: 'hi',
        nickname: 'Mia',
        avatar: '🐱',
        email: 'mia@example.com',
        qq: '123456',
        url: 'https://mia.example.com'
      })).toEqual({
        content: 'hi',
        nickname: 'Mia',
        avatar: '🐱',
        email: 'mia@example.com',
        qq: '123456',
        url: 'https://mia.example.com'
      });
    });

    it('should name the offending field', () => {
      const cases: Array<[Record<string, unknown>, string]> = [
        [{}, 'content'],
        [{ content: 'x'.repeat(10001) }, 'content'],
        [{ content: 'hi', nickname: '<script>' }, 'nickname'],
        [{ content: 'hi', avatar: 'smile' }, 'avatar'],
        [{ content: 'hi', email: 'nope' }, 'email'],
        [{ content: 'hi', qq: 'abc' }, 'qq'],
        [{ content: 'hi', url: 'example.com' }, 'url']
      ];

      for (const [body, field] of cases) {
        let caught: unknown;
        try {
          normalizeSubmissionFields(body);
        } catch (error) {
          caught = error;
        }
        expect(caught).toBeInstanceOf(InvalidInputError);
        if (caught instanceof InvalidInputError) {
          expect(caught.field).toBe(field);
        }
      }
    });
  });

  describe('parsePagination', () => {
    it('should default missing values', () => {
      expect(parsePagination({})).toEqual({ page: 1, limit: 20 });
    });

    it('should parse and cap values', () => {
      expect(parsePagination({ page: '3', limit: '50' })).toEqual({ page: 3, limit: 50 });
      expect(parsePagination({ page: '2', limit: '1000' })).toEqual({ page: 2, limit: 100 });
    });

    it('should fall back on invalid values', () => {
      expect(parsePagination({ page: '-1', limit: 'abc' })).toEqual({ page: 1, limit: 20 });
      expect(parsePagination({ page: ['2'], limit: '0' })).toEqual({ page: 1, limit: 20 });
    });
  });

  describe('deepSanitize', () => {
    it('should drop operator and prototype keys at any depth', () => {
      const input: unknown = JSON.parse('{"content":"hi","$where":"1","nested":{"$gt":"","__proto__":{"admin":true},"ok":1},"list":[{"$ne":1,"v":2}]}');

      expect(deepSanitize(input)).toEqual({
        content: 'hi',
        nested: { ok: 1 },
        list: [{ v: 2 }]
      });
    });

    it('should pass primitives through', () => {
      expect(deepSanitize('text')).toBe('text');
      expect(deepSanitize(null)).toBeNull();
    });
  });

  describe('parseListOptions', () => {
    it('should default to newest first without filters', () => {
      expect(parseListOptions({})).toEqual({ filter: {}, sort: { field: 'createdAt', order: 'desc' } });
    });

    it('should read sort, order and filters', () => {
      expect(parseListOptions({
        sort: 'likes',
        order: 'asc',
        nickname: '  owl ',
        q: 'run',
        minLength: '10',
        excludeDefault: 'true'
      })).toEqual({
        filter: { nickname: 'owl', keyword: 'run', minLength: 10, excludeNickname: 'Anonymous' },
        sort: { field: 'likeCount', order: 'asc' }
      });
    });

    it('should ignore values it does not understand', () => {
      expect(parseListOptions({
        sort: 'random',
        order: 'sideways',
        nickname: ['a', 'b'],
        q: '   ',
        minLength: '-3',
        excludeDefault: 'no'
      })).toEqual({ filter: {}, sort: { field: 'createdAt', order: 'desc' } });
    });

    it('should cap search terms', () => {
      expect(parseListOptions({ q: 'x'.repeat(150) }).filter?.keyword).toHaveLength(100);
    });
  });
});
