/**
 * Attachment decoding for check-in submissions
 * Attachments arrive as data URIs with their original filenames
 */
import path from 'path';
import { ARCHIVE_EXTENSIONS, ARCHIVE_LIMITS, FIELD_LIMITS, MEDIA_EXTENSIONS } from '../config/constants';
import { InvalidInputError } from './errors';

export type MediaKind = 'image' | 'video';

// Types
interface MagicValidationResult {
  valid: boolean;
  detectedType?: string;
}

export interface MediaAttachment {
  kind: MediaKind;
  filename: string;
  extension: string;
  data: Buffer;
}

export interface ArchiveAttachment {
  filename: string;
  data: Buffer;
  /** Image entries chosen by the submitter as the stored previews */
  previewImages?: string[];
}

export type ClassifiedAttachments =
  | { type: 'media'; media: MediaAttachment[] }
  | { type: 'archive'; archive: ArchiveAttachment };

interface RawAttachment {
  name: string;
  data: string;
}

const DATA_URI_PREFIX = /^data:(?:[a-z0-9.+-]+\/[a-z0-9.+-]+)?(?:;[a-z0-9-]+=[a-z0-9.+-]+)*;base64,/i;

/**
 * Decode a base64 data URI; null when it is not one
 */
export function decodeDataUri(uri: string): Buffer | null {
  const match = DATA_URI_PREFIX.exec(uri);
  if (!match) return null;
  const payload = uri.slice(match[0].length);
  if (!/^[A-Za-z0-9+/\r\n]*={0,2}\s*$/.test(payload)) return null;
  return Buffer.from(payload, 'base64');
}

/**
 * Validate file magic bytes to prevent disguised uploads
 */
export function validateMagicBytes(buffer: Buffer, type: MediaKind): MagicValidationResult {
  if (!buffer || buffer.length < 12) {
    return { valid: false };
  }

  if (type === 'image') {
    // Check JPEG
    if (buffer[0] === 0xFF && buffer[1] === 0xD8 && buffer[2] === 0xFF) {
      return { valid: true, detectedType: 'jpeg' };
    }
    // Check PNG
    if (buffer[0] === 0x89 && buffer[1] === 0x50 && buffer[2] === 0x4E && buffer[3] === 0x47) {
      return { valid: true, detectedType: 'png' };
    }
    // Check GIF
    if (buffer[0] === 0x47 && buffer[1] === 0x49 && buffer[2] === 0x46 && buffer[3] === 0x38) {
      return { valid: true, detectedType: 'gif' };
    }
    // Check WebP (RIFF....WEBP)
    if (buffer[0] === 0x52 && buffer[1] === 0x49 && buffer[2] === 0x46 && buffer[3] === 0x46 &&
        buffer[8] === 0x57 && buffer[9] === 0x45 && buffer[10] === 0x42 && buffer[11] === 0x50) {
      return { valid: true, detectedType: 'webp' };
    }
    return { valid: false };
  }

  // ftyp box at offset 4 (MP4/MOV)
  if (buffer[4] === 0x66 && buffer[5] === 0x74 && buffer[6] === 0x79 && buffer[7] === 0x70) {
    return { valid: true, detectedType: 'mp4' };
  }
  // moov or wide box (older MOV/MP4)
  if ((buffer[4] === 0x6D && buffer[5] === 0x6F && buffer[6] === 0x6F && buffer[7] === 0x76) ||
      (buffer[4] === 0x77 && buffer[5] === 0x69 && buffer[6] === 0x64 && buffer[7] === 0x65)) {
    return { valid: true, detectedType: 'mov' };
  }
  // EBML header (WebM)
  if (buffer[0] === 0x1A && buffer[1] === 0x45 && buffer[2] === 0xDF && buffer[3] === 0xA3) {
    return { valid: true, detectedType: 'webm' };
  }
  // RIFF....AVI
  if (buffer[0] === 0x52 && buffer[1] === 0x49 && buffer[2] === 0x46 && buffer[3] === 0x46 &&
      buffer[8] === 0x41 && buffer[9] === 0x56 && buffer[10] === 0x49) {
    return { valid: true, detectedType: 'avi' };
  }
  return { valid: false };
}

const IMAGE_MEDIA: ReadonlySet<string> = new Set(MEDIA_EXTENSIONS.image);
const VIDEO_MEDIA: ReadonlySet<string> = new Set(MEDIA_EXTENSIONS.video);

export function getMediaKind(filename: string): MediaKind | null {
  const ext = path.extname(filename).toLowerCase();
  if (IMAGE_MEDIA.has(ext)) return 'image';
  if (VIDEO_MEDIA.has(ext)) return 'video';
  return null;
}

function isRawAttachment(value: unknown): value is RawAttachment {
  return typeof value === 'object' && value !== null &&
    'name' in value && typeof value.name === 'string' &&
    'data' in value && typeof value.data === 'string';
}

/**
 * Submitter-chosen archive previews; absent or empty means automatic selection
 */
export function parsePreviewSelection(raw: unknown): string[] | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!Array.isArray(raw) || !raw.every((item): item is string => typeof item === 'string' && item !== '')) {
    throw new InvalidInputError('previewImages', 'Preview images must be a list of archive entry paths');
  }
  const unique = [...new Set(raw)];
  if (unique.length > FIELD_LIMITS.MAX_MEDIA_FILES) {
    throw new InvalidInputError('previewImages', `At most ${FIELD_LIMITS.MAX_MEDIA_FILES} preview images can be chosen`);
  }
  return unique.length > 0 ? unique : undefined;
}

/**
 * Either up to MAX_MEDIA_FILES images/videos, or exactly one archive
 * with an optional preview selection
 */
export function classifyAttachments(raw: unknown, previewImages?: unknown): ClassifiedAttachments {
  if (raw === undefined || raw === null) {
    return { type: 'media', media: [] };
  }
  if (!Array.isArray(raw) || !raw.every(isRawAttachment)) {
    throw new InvalidInputError('files', 'Attachments must be a list of { name, data } objects');
  }

  const attachments = raw.filter(file => file.name.trim() !== '');
  const archives = attachments.filter(file => ARCHIVE_EXTENSIONS.has(path.extname(file.name).toLowerCase()));

  if (archives.length > 0) {
    if (attachments.length > 1) {
      throw new InvalidInputError('files', 'An archive must be uploaded on its own');
    }
    const [file] = archives;
    const data = decodeDataUri(file.data);
    if (!data) {
      throw new InvalidInputError('files', 'Attachment data is not a valid data URI');
    }
    if (data.length > ARCHIVE_LIMITS.MAX_UPLOAD_SIZE) {
      throw new InvalidInputError('files', `Archive exceeds ${ARCHIVE_LIMITS.MAX_UPLOAD_SIZE / 1024 / 1024}MB`);
    }
    const selection = parsePreviewSelection(previewImages);
    return {
      type: 'archive',
      archive: { filename: path.basename(file.name), data, ...(selection ? { previewImages: selection } : {}) }
    };
  }

  if (attachments.length > FIELD_LIMITS.MAX_MEDIA_FILES) {
    throw new InvalidInputError('files', `At most ${FIELD_LIMITS.MAX_MEDIA_FILES} files can be attached`);
  }

  const media = attachments.map((file): MediaAttachment => {
    const kind = getMediaKind(file.name);
    if (!kind) {
      throw new InvalidInputError('files', 'Unsupported file format');
    }
    const data = decodeDataUri(file.data);
    if (!data) {
      throw new InvalidInputError('files', 'Attachment data is not a valid data URI');
    }
    if (data.length > FIELD_LIMITS.MEDIA_MAX_SIZE) {
      throw new InvalidInputError('files', `Files must be at most ${FIELD_LIMITS.MEDIA_MAX_SIZE / 1024 / 1024}MB`);
    }
    if (!validateMagicBytes(data, kind).valid) {
      throw new InvalidInputError('files', 'File content does not match its type');
    }
    return {
      kind,
      filename: path.basename(file.name),
      extension: path.extname(file.name).toLowerCase(),
      data
    };
  });

  return { type: 'media', media };
}

export default {
  decodeDataUri,
  validateMagicBytes,
  getMediaKind,
  parsePreviewSelection,
  classifyAttachments
};
