/**
 * Archive readers
 * The validator and extractor see an archive only through this interface,
 * so zip and 7z containers share one listing and extraction path.
 */
import type { Readable } from 'stream';
import { Open, type CentralDirectory, type File as ZipEntry } from 'unzipper';
import { ArchiveRejectedError, NotFoundError, TimeoutError } from '../../utils/errors';

export type ArchiveFormat = 'zip' | '7z';

export interface ArchiveEntryInfo {
  /** Path inside the archive, exactly as listed */
  path: string;
  /** Declared uncompressed size */
  size: number;
  isDirectory: boolean;
}

export type EntryReadResult =
  | { path: string; data: Buffer }
  | { path: string; error: unknown };

export interface ArchiveReader {
  readonly format: ArchiveFormat;
  readonly entries: readonly ArchiveEntryInfo[];
  /**
   * Read file entries in order. Each entry fails on its own (unknown path,
   * more than `limit` bytes, unreadable data); an aborted signal stops the
   * whole read with TimeoutError.
   */
  readEntries(entryPaths: readonly string[], limit: number, signal?: AbortSignal): AsyncGenerator<EntryReadResult>;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TimeoutError('Archive processing');
  }
}

export function entryTooLarge(): ArchiveRejectedError {
  return new ArchiveRejectedError('Archive entry is too large', 'ENTRY_TOO_LARGE');
}

/**
 * Collect a stream, failing once it yields more than `limit` bytes
 */
export function collectBounded(stream: Readable, limit: number, signal?: AbortSignal): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;

    const onAbort = (): void => {
      stream.destroy();
      reject(new TimeoutError('Archive processing'));
    };
    const cleanup = (): void => signal?.removeEventListener('abort', onAbort);

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    stream.on('data', (chunk: Buffer) => {
      total += chunk.length;
      if (total > limit) {
        cleanup();
        stream.destroy();
        reject(new ArchiveRejectedError('Archive entry is larger than declared', 'ENTRY_SIZE_MISMATCH'));
        return;
      }
      chunks.push(chunk);
    });
    stream.once('end', () => {
      cleanup();
      resolve(Buffer.concat(chunks, total));
    });
    stream.once('error', (error: Error) => {
      cleanup();
      reject(new ArchiveRejectedError(`Archive entry could not be read: ${error.message}`, 'CORRUPT_ARCHIVE'));
    });
  });
}

export class ZipArchiveReader implements ArchiveReader {
  readonly format = 'zip' as const;
  readonly entries: readonly ArchiveEntryInfo[];
  private readonly files: Map<string, ZipEntry>;

  private constructor(directory: CentralDirectory) {
    this.files = new Map(directory.files.map(file => [file.path, file]));
    this.entries = directory.files.map(file => ({
      path: file.path,
      size: file.uncompressedSize,
      isDirectory: file.type === 'Directory'
    }));
  }

  /**
   * Parse the central directory only; nothing is inflated here
   */
  static async open(bytes: Buffer): Promise<ZipArchiveReader> {
    return new ZipArchiveReader(await Open.buffer(bytes));
  }

  async *readEntries(entryPaths: readonly string[], limit: number, signal?: AbortSignal): AsyncGenerator<EntryReadResult> {
    for (const entryPath of entryPaths) {
      throwIfAborted(signal);
      const file = this.files.get(entryPath);
      if (!file || file.type !== 'File') {
        yield { path: entryPath, error: new NotFoundError('Archive entry') };
        continue;
      }
      if (file.uncompressedSize > limit) {
        yield { path: entryPath, error: entryTooLarge() };
        continue;
      }
      try {
        const data = await collectBounded(file.stream(), file.uncompressedSize, signal);
        yield { path: entryPath, data };
      } catch (error) {
        if (error instanceof TimeoutError) throw error;
        yield { path: entryPath, error };
      }
    }
  }
}
