/**
 * Archive Safety Validator
 * Structural screening of an uploaded archive before anything is extracted:
 * container format, entry count, dangerous entry types and the declared
 * (not decompressed) total size.
 */
import { ARCHIVE_EXTENSIONS, ARCHIVE_LIMITS, DANGEROUS_EXTENSIONS, type ArchiveLimits } from '../../config/constants';
import { getErrorMessage } from '../../utils/errors';
import logger from '../../utils/logger';
import { entryBaseName, entryExtension } from './entryPath';
import { ZipArchiveReader, type ArchiveFormat, type ArchiveReader } from './reader';
import { SevenZipArchiveReader } from './sevenZip';

export type { ArchiveFormat } from './reader';

export type ArchiveRejectionCode =
  | 'UNSUPPORTED_ARCHIVE'
  | 'ARCHIVE_TOO_LARGE'
  | 'TOO_MANY_ENTRIES'
  | 'DANGEROUS_ENTRY'
  | 'CORRUPT_ARCHIVE';

/**
 * An archive that passed validation, with a reader over its listing.
 * The extractor only accepts this shape.
 */
export interface ValidatedArchive {
  readonly format: ArchiveFormat;
  readonly bytes: Buffer;
  readonly reader: ArchiveReader;
  readonly entryCount: number;
  readonly declaredSize: number;
}

export type ArchiveVerdict =
  | { ok: true; archive: ValidatedArchive }
  | { ok: false; code: ArchiveRejectionCode; reason: string };

const MAX_LISTED_DANGEROUS = 5;

const ZIP_MAGIC = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  // Empty archive: end of central directory only
  Buffer.from([0x50, 0x4b, 0x05, 0x06])
];
const SEVEN_ZIP_MAGIC = Buffer.from([0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c]);

/**
 * Container format from the filename, falling back to magic bytes
 */
export function detectArchiveFormat(filename: string, bytes?: Buffer): ArchiveFormat | null {
  const ext = entryExtension(filename);
  if (ARCHIVE_EXTENSIONS.has(ext)) {
    return ext === '.zip' ? 'zip' : '7z';
  }
  if (!bytes) return null;
  if (ZIP_MAGIC.some(magic => bytes.subarray(0, magic.length).equals(magic))) return 'zip';
  if (bytes.subarray(0, SEVEN_ZIP_MAGIC.length).equals(SEVEN_ZIP_MAGIC)) return '7z';
  return null;
}

export function isArchiveFilename(filename: string): boolean {
  return ARCHIVE_EXTENSIONS.has(entryExtension(filename));
}

function reject(code: ArchiveRejectionCode, reason: string): ArchiveVerdict {
  return { ok: false, code, reason };
}

export class ArchiveValidator {
  private readonly limits: ArchiveLimits;

  constructor(limits: Partial<ArchiveLimits> = {}) {
    this.limits = { ...ARCHIVE_LIMITS, ...limits };
  }

  async validate(bytes: Buffer, format: ArchiveFormat | null): Promise<ArchiveVerdict> {
    if (format === null) {
      return reject('UNSUPPORTED_ARCHIVE', 'Unsupported archive format');
    }

    if (bytes.length > this.limits.MAX_UPLOAD_SIZE) {
      return reject('ARCHIVE_TOO_LARGE', 'Archive is too large');
    }

    let reader: ArchiveReader;
    try {
      reader = format === 'zip' ? await ZipArchiveReader.open(bytes) : await SevenZipArchiveReader.open(bytes);
    } catch (error) {
      logger.warn('Archive could not be read', { format, error: getErrorMessage(error) });
      return reject('CORRUPT_ARCHIVE', 'Archive is corrupt or unreadable');
    }

    const entries = reader.entries;
    if (entries.length > this.limits.MAX_ENTRIES) {
      return reject('TOO_MANY_ENTRIES', `Archive contains too many files (limit ${this.limits.MAX_ENTRIES})`);
    }

    const dangerous: string[] = [];
    let declaredSize = 0;
    for (const entry of entries) {
      // Every entry counts, whatever its name claims it is
      declaredSize += entry.size;
      if (!entry.isDirectory && DANGEROUS_EXTENSIONS.has(entryExtension(entry.path))) {
        dangerous.push(entryBaseName(entry.path));
      }
    }

    if (dangerous.length > 0) {
      const shown = dangerous.slice(0, MAX_LISTED_DANGEROUS).join(', ');
      const more = dangerous.length > MAX_LISTED_DANGEROUS ? ` and ${dangerous.length - MAX_LISTED_DANGEROUS} more` : '';
      return reject('DANGEROUS_ENTRY', `Archive contains disallowed file types: ${shown}${more}`);
    }

    if (declaredSize > this.limits.MAX_DECLARED_SIZE) {
      const limitMb = Math.round(this.limits.MAX_DECLARED_SIZE / 1024 / 1024);
      return reject('ARCHIVE_TOO_LARGE', `Archive expands beyond the ${limitMb}MB limit`);
    }

    return {
      ok: true,
      archive: { format, bytes, reader, entryCount: entries.length, declaredSize }
    };
  }
}

export default ArchiveValidator;
