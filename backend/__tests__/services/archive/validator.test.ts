/**
 * Archive safety validator tests
 */
import { describe, it, expect } from '@jest/globals';
import { ArchiveValidator, detectArchiveFormat, isArchiveFilename } from '../../../services/archive/validator';
import { buildSevenZip } from '../../helpers/sevenZip';
import { buildZip } from '../../helpers/zip';

describe('detectArchiveFormat', () => {
  it('should use the extension first', () => {
    expect(detectArchiveFormat('photos.ZIP')).toBe('zip');
    expect(detectArchiveFormat('photos.7z')).toBe('7z');
  });

  it('should fall back to magic bytes', () => {
    expect(detectArchiveFormat('upload', buildZip([{ name: 'a.txt', data: 'a' }]))).toBe('zip');
    expect(detectArchiveFormat('upload', Buffer.from([0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c, 0x00]))).toBe('7z');
    expect(detectArchiveFormat('upload', Buffer.from('plain text'))).toBeNull();
  });

  it('should recognise archive filenames', () => {
    expect(isArchiveFilename('set.zip')).toBe(true);
    expect(isArchiveFilename('set.tar')).toBe(false);
  });
});

describe('ArchiveValidator', () => {
  const validator = new ArchiveValidator();

  it('should accept a plain archive and report its entries', async () => {
    const bytes = buildZip([
      { name: 'photos/' },
      { name: 'photos/01.png', data: 'not really a png' },
      { name: 'notes.txt', data: 'hello' }
    ]);
    const verdict = await validator.validate(bytes, 'zip');

    expect(verdict.ok).toBe(true);
    if (verdict.ok) {
      expect(verdict.archive.entryCount).toBe(3);
      expect(verdict.archive.declaredSize).toBe(21);
    }
  });

  it('should reject an archive containing payload.exe however many images it has', async () => {
    const bytes = buildZip([
      { name: '01.jpg', data: 'a' },
      { name: '02.jpg', data: 'b' },
      { name: '03.jpg', data: 'c' },
      { name: 'deep/inside/payload.exe', data: 'MZ' }
    ]);

    await expect(validator.validate(bytes, 'zip')).resolves.toEqual({
      ok: false,
      code: 'DANGEROUS_ENTRY',
      reason: 'Archive contains disallowed file types: payload.exe'
    });
  });

  it('should list at most five dangerous names', async () => {
    const names = ['a.exe', 'b.bat', 'c.js', 'd.lnk', 'e.vbs', 'f.docm', 'g.hta'];
    const bytes = buildZip(names.map(name => ({ name, data: 'x' })));

    await expect(validator.validate(bytes, 'zip')).resolves.toEqual({
      ok: false,
      code: 'DANGEROUS_ENTRY',
      reason: 'Archive contains disallowed file types: a.exe, b.bat, c.js, d.lnk, e.vbs and 2 more'
    });
  });

  it('should match dangerous extensions case-insensitively', async () => {
    const verdict = await validator.validate(buildZip([{ name: 'SETUP.EXE', data: 'x' }]), 'zip');
    expect(verdict.ok).toBe(false);
  });

  it('should reject when declared sizes exceed the expansion limit', async () => {
    const bytes = buildZip([
      { name: 'a.png', data: 'tiny', declaredSize: 300 * 1024 * 1024 },
      { name: 'b.png', data: 'tiny', declaredSize: 300 * 1024 * 1024 }
    ]);

    await expect(validator.validate(bytes, 'zip')).resolves.toEqual({
      ok: false,
      code: 'ARCHIVE_TOO_LARGE',
      reason: 'Archive expands beyond the 500MB limit'
    });
  });

  it('should count declared sizes of entries named like directories', async () => {
    const bytes = buildZip([
      { name: 'a.png', data: 'tiny' },
      { name: 'big/', data: 'x', declaredSize: 300 * 1024 * 1024 },
      { name: 'bigger/', data: 'x', declaredSize: 300 * 1024 * 1024 }
    ]);

    await expect(validator.validate(bytes, 'zip')).resolves.toEqual({
      ok: false,
      code: 'ARCHIVE_TOO_LARGE',
      reason: 'Archive expands beyond the 500MB limit'
    });
  });

  it('should see through trailing dots and spaces on dangerous names', async () => {
    const bytes = buildZip([
      { name: 'photo.png', data: 'x' },
      { name: 'payload.exe.', data: 'MZ' },
      { name: 'run.bat ', data: 'echo' }
    ]);

    await expect(validator.validate(bytes, 'zip')).resolves.toEqual({
      ok: false,
      code: 'DANGEROUS_ENTRY',
      reason: 'Archive contains disallowed file types: payload.exe., run.bat '
    });
  });

  it('should reject too many entries', async () => {
    const small = new ArchiveValidator({ MAX_ENTRIES: 3 });
    const bytes = buildZip(['1.txt', '2.txt', '3.txt', '4.txt'].map(name => ({ name, data: name })));

    await expect(small.validate(bytes, 'zip')).resolves.toEqual({
      ok: false,
      code: 'TOO_MANY_ENTRIES',
      reason: 'Archive contains too many files (limit 3)'
    });
  });

  it('should reject oversized uploads before reading them', async () => {
    const small = new ArchiveValidator({ MAX_UPLOAD_SIZE: 10 });
    const verdict = await small.validate(buildZip([{ name: 'a.txt', data: 'a' }]), 'zip');
    expect(verdict).toEqual({ ok: false, code: 'ARCHIVE_TOO_LARGE', reason: 'Archive is too large' });
  });

  it('should report garbage as a corrupt archive', async () => {
    const verdict = await validator.validate(Buffer.from('PK\u0003\u0004 this is not a zip at all'), 'zip');
    expect(verdict).toEqual({ ok: false, code: 'CORRUPT_ARCHIVE', reason: 'Archive is corrupt or unreadable' });
  });

  it('should report a truncated archive as corrupt', async () => {
    const bytes = buildZip([{ name: 'a.txt', data: 'hello world' }]);
    const verdict = await validator.validate(bytes.subarray(0, bytes.length - 30), 'zip');
    expect(verdict.ok).toBe(false);
    if (!verdict.ok) expect(verdict.code).toBe('CORRUPT_ARCHIVE');
  });

  it('should reject unsupported formats', async () => {
    await expect(validator.validate(Buffer.from('x'), null)).resolves.toEqual({
      ok: false,
      code: 'UNSUPPORTED_ARCHIVE',
      reason: 'Unsupported archive format'
    });
  });

  describe('7z archives', () => {
    it('should accept a 7z archive and report its entries', async () => {
      const bytes = await buildSevenZip([
        { name: '01.png', data: 'not really a png' },
        { name: 'notes.txt', data: 'hello' }
      ]);
      const verdict = await validator.validate(bytes, '7z');

      expect(verdict.ok).toBe(true);
      if (verdict.ok) {
        expect(verdict.archive.format).toBe('7z');
        expect(verdict.archive.entryCount).toBe(2);
        expect(verdict.archive.declaredSize).toBe(21);
      }
    });

    it('should reject dangerous entries inside a 7z archive', async () => {
      const bytes = await buildSevenZip([
        { name: '01.png', data: 'x' },
        { name: 'tools/setup.exe', data: 'MZ' }
      ]);

      await expect(validator.validate(bytes, '7z')).resolves.toEqual({
        ok: false,
        code: 'DANGEROUS_ENTRY',
        reason: 'Archive contains disallowed file types: setup.exe'
      });
    });

    it('should report garbage as a corrupt archive', async () => {
      await expect(validator.validate(Buffer.from('7z but not really'), '7z')).resolves.toEqual({
        ok: false,
        code: 'CORRUPT_ARCHIVE',
        reason: 'Archive is corrupt or unreadable'
      });
    });

    it('should not open a zip named as 7z', async () => {
      const verdict = await validator.validate(buildZip([{ name: 'a.txt', data: 'a' }]), '7z');
      expect(verdict).toMatchObject({ ok: false, code: 'CORRUPT_ARCHIVE' });
    });
  });
});
