/**
 * Newline-delimited list files
 * Shared by the blocklist and the spam keyword list: one entry per line,
 * blank lines and `#` comments ignored, reloaded when the file changes.
 */
import fs from 'fs';
import { readFile } from 'fs/promises';
import { StorageError, getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

const WATCH_INTERVAL_MS = 2000;

export function parseListFile(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

// fs errors may come from another realm (Jest's vm contexts), so no instanceof
export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class WatchedListFile {
  protected entries = new Set<string>();
  private watching = false;

  constructor(
    readonly filePath: string,
    private readonly normalize: (entry: string) => string = entry => entry
  ) {}

  /**
   * Replace the in-memory set with the file's contents.
   * A missing file is an empty list.
   */
  async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.entries = new Set();
        return;
      }
      throw new StorageError(`Failed to read ${this.filePath}: ${getErrorMessage(error)}`);
    }
    this.entries = new Set(parseListFile(text).map(this.normalize));
  }

  /**
   * Reload on modification. The watcher does not keep the process alive.
   */
  watch(): void {
    if (this.watching) return;
    this.watching = true;
    fs.watchFile(this.filePath, { persistent: false, interval: WATCH_INTERVAL_MS }, (current, previous) => {
      if (current.mtimeMs === previous.mtimeMs) return;
      this.load()
        .then(() => logger.info('List file reloaded', { file: this.filePath, entries: this.entries.size }))
        .catch((error: unknown) => logger.error('List file reload failed', { file: this.filePath, error: getErrorMessage(error) }));
    });
  }

  unwatch(): void {
    if (!this.watching) return;
    fs.unwatchFile(this.filePath);
    this.watching = false;
  }

  get size(): number {
    return this.entries.size;
  }

  values(): string[] {
    return [...this.entries];
  }
}

export default WatchedListFile;
