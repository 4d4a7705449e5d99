/**
 * Check-in service
 * Runs a submission through the gatekeeper, stores its attachments and seeds
 * moderation. Also serves the archive preview, full-image and download
 * operations.
 */
import path from 'path';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { ArchiveExtractor, type ArchiveMetadata, type PreviewImage } from './archive/extractor';
import { selectPreviews } from './archive/previewSelection';
import { type ArchiveFormat, ArchiveValidator, detectArchiveFormat, type ValidatedArchive } from './archive/validator';
import type { DuplicateDetector } from './duplicateDetector';
import type { GateInput, Gatekeeper } from './gatekeeper';
import type { ModerationService } from './moderation';
import { ARCHIVE_LIMITS } from '../config/constants';
import type { SubmissionFileType, SubmissionRecord } from '../models/Submission';
import { type Clock, systemClock } from '../utils/clock';
import {
  ArchiveRejectedError,
  InvalidInputError,
  NotFoundError,
  StorageError,
  TimeoutError,
  getErrorMessage,
  isAppError
} from '../utils/errors';
import logger from '../utils/logger';
import { type TimeoutOptions, withTimeout } from '../utils/timeout';
import type { ArchiveAttachment, ClassifiedAttachments, MediaAttachment } from '../utils/upload';

export interface CheckinServiceOptions {
  gatekeeper: Gatekeeper;
  moderation: ModerationService;
  duplicates: DuplicateDetector;
  validator?: ArchiveValidator;
  /** Publicly served media and archive previews */
  uploadDir: string;
  uploadUrlPrefix: string;
  /** Original archives; never served directly */
  archiveDir: string;
  archiveTimeoutMs?: number;
  clock?: Clock;
}

export interface PublicSubmission {
  id: string;
  content: string;
  mediaFiles: string[];
  fileType: SubmissionFileType;
  archiveMetadata?: ArchiveMetadata;
  nickname: string;
  avatar: string;
  url?: string;
  likeCount: number;
  createdAt: Date;
}

export interface ArchivePreview {
  filename: string;
  size: number;
  totalFiles: number;
  imageCount: number;
  images: PreviewImage[];
  /** Entries that would become the stored previews */
  suggested: string[];
}

export interface ArchiveDownload {
  filename: string;
  contentType: string;
  data: Buffer;
}

const ARCHIVE_CONTENT_TYPES: Record<ArchiveFormat, string> = {
  zip: 'application/zip',
  '7z': 'application/x-7z-compressed'
};

interface StoredAttachments {
  fileType: SubmissionFileType;
  mediaFiles: string[];
  archiveMetadata?: ArchiveMetadata;
  archivePath?: string;
  /** Everything written, removed again if the submission fails */
  written: string[];
}

export function toPublicSubmission(record: SubmissionRecord): PublicSubmission {
  return {
    id: record.submissionId,
    content: record.content,
    mediaFiles: record.mediaFiles,
    fileType: record.fileType,
    ...(record.archiveMetadata ? { archiveMetadata: record.archiveMetadata } : {}),
    nickname: record.nickname,
    avatar: record.avatar,
    ...(record.url ? { url: record.url } : {}),
    likeCount: record.likeCount,
    createdAt: record.createdAt
  };
}

export class CheckinService {
  private readonly validator: ArchiveValidator;
  private readonly archiveTimeoutMs: number;
  private readonly clock: Clock;

  constructor(private readonly options: CheckinServiceOptions) {
    this.validator = options.validator ?? new ArchiveValidator();
    this.archiveTimeoutMs = options.archiveTimeoutMs ?? ARCHIVE_LIMITS.TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
  }

  async submit(input: GateInput): Promise<SubmissionRecord> {
    const verdict = await this.options.gatekeeper.check(input);

    let stored: StoredAttachments | undefined;
    try {
      stored = await this.storeAttachments(verdict.attachments);
      return await this.options.moderation.create({
        ...verdict.fields,
        fileType: stored.fileType,
        mediaFiles: stored.mediaFiles,
        ...(stored.archiveMetadata ? { archiveMetadata: stored.archiveMetadata } : {}),
        ...(stored.archivePath ? { archivePath: stored.archivePath } : {}),
        ipAddress: input.ip,
        region: verdict.region,
        ...(input.fingerprint ? { fingerprint: input.fingerprint } : {}),
        status: verdict.initialStatus,
        moderationReason: verdict.moderationReason
      });
    } catch (error) {
      // A failed submission may be retried as-is
      this.options.duplicates.forget(verdict.fields.content);
      if (stored) {
        await this.removeFiles(stored.written);
      }
      throw error;
    }
  }

  /**
   * Thumbnails of an uploaded archive without storing anything
   */
  async previewArchive(file: ArchiveAttachment): Promise<ArchivePreview> {
    const archive = await this.validate(file);
    return this.runArchiveTask(async signal => {
      const extractor = new ArchiveExtractor(archive, file.filename);
      const imagePaths = extractor.listImages();
      const images = await extractor.thumbnails(imagePaths, ARCHIVE_LIMITS.MAX_THUMBNAILS, signal);
      return {
        filename: file.filename,
        size: file.data.length,
        totalFiles: extractor.totalEntries,
        imageCount: imagePaths.length,
        images,
        suggested: selectPreviews(imagePaths, ARCHIVE_LIMITS.AUTO_PREVIEW_COUNT)
      };
    });
  }

  /**
   * Larger rendering of one image inside a published submission's archive
   */
  async fullImage(submissionId: string, entryPath: string): Promise<string> {
    const { record, data } = await this.loadPublishedArchive(submissionId);
    const filename = record.archiveMetadata?.filename ?? path.basename(record.archivePath ?? 'archive.zip');
    const archive = await this.validate({ filename, data });

    const rendered = await this.runArchiveTask(async signal => {
      const extractor = new ArchiveExtractor(archive, filename);
      if (!extractor.listImages().includes(entryPath)) {
        throw new NotFoundError('Image');
      }
      return extractor.preview(entryPath, ARCHIVE_LIMITS.PREVIEW_MAX_DIM, signal);
    });

    if (rendered === null) {
      throw new ArchiveRejectedError('Image could not be decoded', 'IMAGE_DECODE_FAILED');
    }
    return rendered;
  }

  async download(submissionId: string): Promise<ArchiveDownload> {
    const { record, data } = await this.loadPublishedArchive(submissionId);
    const format = detectArchiveFormat(record.archivePath ?? '', data) ?? 'zip';
    return {
      filename: record.archiveMetadata?.filename ?? path.basename(record.archivePath ?? `${record.submissionId}.${format}`),
      contentType: ARCHIVE_CONTENT_TYPES[format],
      data
    };
  }

  private async loadPublishedArchive(submissionId: string): Promise<{ record: SubmissionRecord; data: Buffer }> {
    const record = await this.options.moderation.get(submissionId);
    if (record.status !== 'approved' || record.fileType !== 'archive' || !record.archivePath) {
      throw new NotFoundError('Archive');
    }

    const archiveRoot = path.resolve(this.options.archiveDir);
    const archiveFile = path.resolve(archiveRoot, record.archivePath);
    if (!archiveFile.startsWith(archiveRoot + path.sep)) {
      throw new NotFoundError('Archive');
    }

    try {
      return { record, data: await readFile(archiveFile) };
    } catch (error) {
      logger.error('Stored archive unreadable', { submissionId, error: getErrorMessage(error) });
      throw new NotFoundError('Archive');
    }
  }

  private async validate(file: ArchiveAttachment): Promise<ValidatedArchive> {
    const verdict = await this.validator.validate(file.data, detectArchiveFormat(file.filename, file.data));
    if (!verdict.ok) {
      logger.warn('Archive rejected', { code: verdict.code, filename: file.filename });
      throw new ArchiveRejectedError(verdict.reason, verdict.code);
    }
    return verdict.archive;
  }

  private async runArchiveTask<T>(run: (signal: AbortSignal) => Promise<T>, options?: TimeoutOptions): Promise<T> {
    try {
      return await withTimeout(this.archiveTimeoutMs, 'Archive processing', run, options);
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.warn('Archive processing timed out', { timeoutMs: this.archiveTimeoutMs });
        throw new ArchiveRejectedError('Archive took too long to process', 'ARCHIVE_TIMEOUT');
      }
      throw error;
    }
  }

  private async storeAttachments(attachments: ClassifiedAttachments): Promise<StoredAttachments> {
    const month = this.monthDirectory();
    const stored: StoredAttachments = { fileType: attachments.type, mediaFiles: [], written: [] };

    try {
      if (attachments.type === 'archive') {
        await this.storeArchive(attachments.archive, month, stored);
      } else {
        await this.storeMedia(attachments.media, month, stored);
      }
    } catch (error) {
      await this.removeFiles(stored.written);
      if (isAppError(error)) throw error;
      logger.error('Attachment storage failed', { error: getErrorMessage(error) });
      throw new StorageError('Failed to store attachments');
    }
    return stored;
  }

  private async storeMedia(media: readonly MediaAttachment[], month: string, stored: StoredAttachments): Promise<void> {
    if (media.length === 0) return;
    const dir = path.join(this.options.uploadDir, month);
    await mkdir(dir, { recursive: true });

    for (const file of media) {
      const name = `${uuidv4()}${file.extension}`;
      const target = path.join(dir, name);
      await writeFile(target, file.data);
      stored.written.push(target);
      stored.mediaFiles.push(`${this.options.uploadUrlPrefix}/${month}/${name}`);
    }
  }

  private async storeArchive(file: ArchiveAttachment, month: string, stored: StoredAttachments): Promise<void> {
    const archive = await this.validate(file);
    const extractor = new ArchiveExtractor(archive, file.filename);
    if (file.previewImages) {
      const images = new Set(extractor.listImages());
      if (!file.previewImages.every(entryPath => images.has(entryPath))) {
        throw new InvalidInputError('previewImages', 'Preview images must be images inside the archive');
      }
    }
    const id = uuidv4();

    const previewRelative = `${month}/previews/${id}`;
    const previewDir = path.join(this.options.uploadDir, month, 'previews', id);
    stored.written.push(previewDir);

    // Rollback removes previewDir, so a timed-out extraction must stop writing first
    const previews = await this.runArchiveTask(
      signal => extractor.extractPreviews(
        previewDir,
        `${this.options.uploadUrlPrefix}/${previewRelative}`,
        file.previewImages ? { selected: file.previewImages } : { count: ARCHIVE_LIMITS.AUTO_PREVIEW_COUNT },
        signal
      ),
      { awaitSettled: true }
    );

    const archiveRelative = `${month}/${id}.${archive.format}`;
    const archiveFile = path.join(this.options.archiveDir, archiveRelative);
    await mkdir(path.dirname(archiveFile), { recursive: true });
    await writeFile(archiveFile, file.data);
    stored.written.push(archiveFile);

    stored.archiveMetadata = previews.metadata;
    stored.archivePath = archiveRelative;
  }

  private async removeFiles(files: readonly string[]): Promise<void> {
    const results = await Promise.allSettled(files.map(file => rm(file, { recursive: true, force: true })));
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error('Rollback could not remove file', { error: getErrorMessage(result.reason) });
      }
    }
  }

  private monthDirectory(): string {
    const now = new Date(this.clock.now());
    return `${now.getUTCFullYear()}-${String(now.getUTCMonth() + 1).padStart(2, '0')}`;
  }
}

export default CheckinService;
