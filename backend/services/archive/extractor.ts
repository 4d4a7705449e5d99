/**
 * Archive Content Extractor
 * Reads entries from a validated archive: image listing, bounded extraction,
 * inline thumbnails and the preview files stored with a submission.
 */
import path from 'path';
import { mkdir, writeFile, rm } from 'fs/promises';
import sharp from 'sharp';
import { ARCHIVE_LIMITS, IMAGE_EXTENSIONS, type ArchiveLimits } from '../../config/constants';
import { AppError, ArchiveRejectedError, NotFoundError, getErrorMessage } from '../../utils/errors';
import logger from '../../utils/logger';
import { entryBaseName, entryExtension } from './entryPath';
import { selectPreviews } from './previewSelection';
import { entryTooLarge, throwIfAborted, type ArchiveEntryInfo, type EntryReadResult } from './reader';
import type { ValidatedArchive } from './validator';

export interface ArchiveMetadata {
  filename: string;
  size: number;
  totalFiles: number;
  imageCount: number;
  previewImages: string[];
}

export interface ExtractedEntry {
  /** Base filename only; never contains a directory component */
  name: string;
  data: Buffer;
}

export interface PreviewImage {
  path: string;
  name: string;
  thumbnail: string | null;
  rank: number;
}

export interface ExtractedPreviews {
  metadata: ArchiveMetadata;
  /** Absolute paths of the files written, for rollback */
  writtenFiles: string[];
}

export interface PreviewOptions {
  /** Automatic selection size */
  count?: number;
  /** Caller-chosen image entries, used in the given order instead of the automatic choice */
  selected?: readonly string[];
}

interface RenderOptions {
  maxDim: number;
  quality: number;
}

function toEntryError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  return new ArchiveRejectedError(`Archive entry could not be read: ${getErrorMessage(error)}`, 'CORRUPT_ARCHIVE');
}

export class ArchiveExtractor {
  private readonly entries: Map<string, ArchiveEntryInfo>;
  private readonly limits: ArchiveLimits;

  constructor(
    private readonly archive: ValidatedArchive,
    readonly filename: string,
    limits: Partial<ArchiveLimits> = {}
  ) {
    this.limits = { ...ARCHIVE_LIMITS, ...limits };
    this.entries = new Map(archive.reader.entries.map(entry => [entry.path, entry]));
  }

  get totalEntries(): number {
    return this.archive.entryCount;
  }

  /**
   * Image entries in archive order, directories excluded
   */
  listImages(): string[] {
    return this.archive.reader.entries
      .filter(entry => !entry.isDirectory)
      .map(entry => entry.path)
      .filter(entryPath => IMAGE_EXTENSIONS.has(entryExtension(entryPath)));
  }

  async extractEntry(entryPath: string, signal?: AbortSignal): Promise<ExtractedEntry> {
    throwIfAborted(signal);
    const entry = this.entries.get(entryPath);
    if (!entry || entry.isDirectory) {
      throw new NotFoundError('Archive entry');
    }
    if (entry.size > this.limits.MAX_ENTRY_SIZE) {
      throw entryTooLarge();
    }

    for await (const result of this.archive.reader.readEntries([entryPath], this.limits.MAX_ENTRY_SIZE, signal)) {
      if ('error' in result) throw toEntryError(result.error);
      return { name: entryBaseName(entryPath), data: result.data };
    }
    throw new NotFoundError('Archive entry');
  }

  async thumbnail(entryPath: string, maxDim: number = this.limits.THUMBNAIL_MAX_DIM, signal?: AbortSignal): Promise<string | null> {
    const [rendered] = await this.renderAll([entryPath], { maxDim, quality: 85 }, signal);
    return rendered ?? null;
  }

  /**
   * Larger rendering of one entry; images already within `maxDim` keep their size
   */
  async preview(entryPath: string, maxDim: number = this.limits.PREVIEW_MAX_DIM, signal?: AbortSignal): Promise<string | null> {
    const [rendered] = await this.renderAll([entryPath], { maxDim, quality: 90 }, signal);
    return rendered ?? null;
  }

  async thumbnails(
    entryPaths: readonly string[],
    maxCount: number = this.limits.MAX_THUMBNAILS,
    signal?: AbortSignal
  ): Promise<PreviewImage[]> {
    const chosen = entryPaths.slice(0, maxCount);
    const rendered = await this.renderAll(chosen, { maxDim: this.limits.THUMBNAIL_MAX_DIM, quality: 85 }, signal);
    return chosen.map((entryPath, index) => ({
      path: entryPath,
      name: entryBaseName(entryPath),
      thumbnail: rendered[index] ?? null,
      rank: index + 1
    }));
  }

  metadata(previewImages: string[] = []): ArchiveMetadata {
    return {
      filename: this.filename,
      size: this.archive.bytes.length,
      totalFiles: this.archive.entryCount,
      imageCount: this.listImages().length,
      previewImages
    };
  }

  /**
   * Write the preview images to `outputDir` as preview_<k><ext>.
   * Entries that fail to extract or do not decode as images are skipped.
   */
  async extractPreviews(
    outputDir: string,
    urlPrefix: string,
    options: PreviewOptions = {},
    signal?: AbortSignal
  ): Promise<ExtractedPreviews> {
    const selected = options.selected
      ? [...options.selected]
      : selectPreviews(this.listImages(), options.count ?? this.limits.AUTO_PREVIEW_COUNT);
    const urls: string[] = [];
    const writtenFiles: string[] = [];

    await mkdir(outputDir, { recursive: true });

    try {
      let index = 0;
      for await (const result of this.readImages(selected, signal)) {
        index++;
        if ('error' in result) {
          logger.debug('Skipping archive preview entry', { entry: entryBaseName(result.path), error: getErrorMessage(result.error) });
          continue;
        }
        try {
          await sharp(result.data).metadata();
        } catch (error) {
          logger.debug('Skipping archive preview entry', { entry: entryBaseName(result.path), error: getErrorMessage(error) });
          continue;
        }

        const previewName = `preview_${index}${entryExtension(result.path)}`;
        const target = path.join(outputDir, previewName);
        await writeFile(target, result.data);
        writtenFiles.push(target);
        urls.push(`${urlPrefix}/${previewName}`);
      }
    } catch (error) {
      await Promise.all(writtenFiles.map(file => rm(file, { force: true })));
      throw error;
    }

    return { metadata: this.metadata(urls), writtenFiles };
  }

  /**
   * Image entries through the reader; entries over the size limit or missing
   * come back as per-entry errors
   */
  private async *readImages(entryPaths: readonly string[], signal?: AbortSignal): AsyncGenerator<EntryReadResult> {
    for await (const result of this.archive.reader.readEntries(entryPaths, this.limits.MAX_ENTRY_SIZE, signal)) {
      throwIfAborted(signal);
      yield result;
    }
  }

  private async renderAll(entryPaths: readonly string[], options: RenderOptions, signal?: AbortSignal): Promise<Array<string | null>> {
    const rendered: Array<string | null> = [];
    for await (const result of this.readImages(entryPaths, signal)) {
      if ('error' in result) {
        logger.debug('Archive image could not be read', { entry: entryBaseName(result.path), error: getErrorMessage(result.error) });
        rendered.push(null);
        continue;
      }
      rendered.push(await this.render(result.path, result.data, options));
    }
    return rendered;
  }

  private async render(entryPath: string, data: Buffer, options: RenderOptions): Promise<string | null> {
    try {
      const output = await sharp(data)
        .rotate()
        .resize(options.maxDim, options.maxDim, { fit: 'inside', withoutEnlargement: true })
        .flatten({ background: '#ffffff' })
        .jpeg({ quality: options.quality })
        .toBuffer();
      return `data:image/jpeg;base64,${output.toString('base64')}`;
    } catch (error) {
      logger.debug('Archive image could not be rendered', { entry: entryBaseName(entryPath), error: getErrorMessage(error) });
      return null;
    }
  }
}

export default ArchiveExtractor;
