/**
 * Preview selection tests
 */
import { describe, it, expect } from '@jest/globals';
import { selectPreviews } from '../../../services/archive/previewSelection';
import { entryBaseName, entryExtension, entryStem } from '../../../services/archive/entryPath';

describe('selectPreviews', () => {
  it('should order numbered images by their number', () => {
    expect(selectPreviews(['b2.jpg', 'a1.jpg', 'c10.jpg'], 2)).toEqual(['a1.jpg', 'b2.jpg']);
  });

  it('should fall back to lexicographic order without digits', () => {
    expect(selectPreviews(['zeta.jpg', 'alpha.jpg'], 1)).toEqual(['alpha.jpg']);
  });

  it('should return every image when there are not more than requested', () => {
    expect(selectPreviews(['z.png', 'a.png'], 3)).toEqual(['z.png', 'a.png']);
  });

  it('should prefer numbered images over unnumbered ones', () => {
    expect(selectPreviews(['cover.jpg', 'page3.jpg', 'back.jpg', 'page1.jpg'], 2)).toEqual(['page1.jpg', 'page3.jpg']);
  });

  it('should use only the file name when reading numbers', () => {
    expect(selectPreviews(['vol9/b.jpg', 'vol1/c5.jpg', 'vol2/a7.jpg'], 2)).toEqual(['vol1/c5.jpg', 'vol2/a7.jpg']);
  });

  it('should keep archive order for equal numbers', () => {
    expect(selectPreviews(['x01.jpg', 'a1.jpg', 'b0002.jpg', 'c3.jpg'], 2)).toEqual(['x01.jpg', 'a1.jpg']);
  });

  it('should compare long digit runs exactly', () => {
    expect(selectPreviews(['p99999999999999999999.jpg', 'p99999999999999999998.jpg', 'p1.jpg'], 2))
      .toEqual(['p1.jpg', 'p99999999999999999998.jpg']);
  });
});

describe('entry paths', () => {
  it('should take the last component for either separator', () => {
    expect(entryBaseName('dir/sub/photo.JPG')).toBe('photo.JPG');
    expect(entryBaseName('dir\\sub\\photo.png')).toBe('photo.png');
    expect(entryBaseName('../../etc/passwd')).toBe('passwd');
  });

  it('should lower-case extensions and strip them from stems', () => {
    expect(entryExtension('a/B.JPEG')).toBe('.jpeg');
    expect(entryStem('a/page12.png')).toBe('page12');
  });

  it('should ignore trailing dots and spaces when reading extensions', () => {
    expect(entryExtension('payload.exe.')).toBe('.exe');
    expect(entryExtension('dir/run.BAT . ')).toBe('.bat');
    expect(entryExtension('notes.')).toBe('');
  });
});
