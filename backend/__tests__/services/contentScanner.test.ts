/**
 * Content safety scanner tests
 */
import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import os from 'os';
import path from 'path';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { ContentScanner, KeywordList, compileNicknameTemplates } from '../../services/contentScanner';

describe('ContentScanner', () => {
  let tmpDir: string;
  let keywords: KeywordList;
  let scanner: ContentScanner;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'scanner-'));
    const file = path.join(tmpDir, 'keywords.txt');
    await writeFile(file, '# spam\nFree Bitcoin\n\ncasino bonus\n');
    keywords = new KeywordList(file);
    await keywords.load();
    scanner = new ContentScanner({ keywords });
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe('clean input', () => {
    it('should pass ordinary text', () => {
      expect(scanner.scan('Checked in at the gym today, 5km run!')).toEqual({ safe: true });
    });

    it('should pass comparisons that are not tags', () => {
      expect(scanner.scan('3 < 5 and 7 > 2')).toEqual({ safe: true });
    });
  });

  describe('markup', () => {
    it('should flag script tags', () => {
      expect(scanner.scan('<script>alert(1)</script>')).toEqual({
        safe: false,
        category: 'markup',
        reason: 'Submission contains disallowed markup',
        rule: 'tag opener'
      });
    });

    it('should flag script schemes', () => {
      const result = scanner.scan('visit javascript:alert(1)');
      expect(result.safe).toBe(false);
      if (!result.safe) expect(result.rule).toBe('script scheme');
    });

    it('should flag event handler attributes without a tag', () => {
      const result = scanner.scan('x onerror=alert(1)');
      expect(result.safe).toBe(false);
      if (!result.safe) expect(result.rule).toBe('event handler attribute');
    });

    it('should flag markup in urls too', () => {
      const result = scanner.scan('javascript:alert(document.cookie)', 'url');
      expect(result.safe).toBe(false);
      if (!result.safe) expect(result.category).toBe('markup');
    });
  });

  describe('query injection', () => {
    it.each([
      ["' OR '1'='1", 'quoted tautology'],
      ['id=5 or 1=1', 'numeric tautology'],
      ['1; DROP TABLE users', 'stacked statement'],
      ['a UNION SELECT password FROM users', 'union select'],
      ["admin'--", 'comment after quote']
    ])('should flag %s', (input, rule) => {
      expect(scanner.scan(input)).toEqual({
        safe: false,
        category: 'query',
        reason: 'Submission contains disallowed content',
        rule
      });
    });

    it('should not apply query patterns to urls', () => {
      expect(scanner.scan("https://example.com/?q=a'#frag", 'url')).toEqual({ safe: true });
      expect(scanner.scan("https://example.com/?q=a'#frag", 'content').safe).toBe(false);
    });
  });

  describe('spam keywords', () => {
    it('should deny loaded keywords case-insensitively without revealing them', () => {
      const result = scanner.scan('Get FREE BITCOIN now');
      expect(result).toEqual({
        safe: false,
        category: 'keyword',
        reason: 'Submission contains disallowed content',
        rule: 'spam keyword'
      });
      if (!result.safe) {
        expect(result.reason.toLowerCase()).not.toContain('bitcoin');
      }
    });

    it('should pick up list changes on reload', async () => {
      const file = path.join(tmpDir, 'reload.txt');
      await writeFile(file, 'first phrase\n');
      const list = new KeywordList(file);
      await list.load();
      const reloading = new ContentScanner({ keywords: list });
      expect(reloading.scan('second phrase here')).toEqual({ safe: true });

      await writeFile(file, 'first phrase\nsecond phrase\n');
      await list.load();
      expect(reloading.scan('second phrase here').safe).toBe(false);
      expect(list.size).toBe(2);
    });
  });

  describe('nickname templates', () => {
    it.each(['truthteller', 'TruthTeller_42', 'patriotvoice2024', 'freenewsdaily.7'])('should flag %s', nickname => {
      expect(scanner.scan(nickname, 'nickname')).toEqual({
        safe: false,
        category: 'nickname',
        reason: 'Nickname requires review',
        rule: `nickname template ${nickname.replace(/[_.-]?\d*$/, '').toLowerCase()}`
      });
    });

    it('should only match the whole nickname', () => {
      expect(scanner.scan('not a truthteller', 'nickname')).toEqual({ safe: true });
    });

    it('should not apply templates to content', () => {
      expect(scanner.scan('truthteller')).toEqual({ safe: true });
    });

    it('should escape template phrases', () => {
      const [compiled] = compileNicknameTemplates(['a.b']);
      expect(compiled.pattern.test('a.b12')).toBe(true);
      expect(compiled.pattern.test('axb')).toBe(false);
    });
  });

  it('should only scan up to the configured length', () => {
    const capped = new ContentScanner({ maxScanLength: 20 });
    expect(capped.scan(`${'a'.repeat(30)}<script>`)).toEqual({ safe: true });
    expect(capped.scan(`${'a'.repeat(5)}<script>`).safe).toBe(false);
  });
});
