/**
 * Blocklist Store
 * Append-only flat file of blocked IPs and fingerprints, held in memory for lookup.
 * Entries never expire.
 */
import path from 'path';
import { appendFile, mkdir } from 'fs/promises';
import { WatchedListFile } from './listFile';
import { isLocalAddress } from './ipRegion';
import { StorageError, ValidationError, getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

const MAX_IDENTIFIER_LENGTH = 256;

export class BlocklistStore extends WatchedListFile {
  private writeChain: Promise<void> = Promise.resolve();

  has(identifier: string): boolean {
    return this.entries.has(identifier.trim());
  }

  /**
   * Whether any of the given identifiers is blocked (empty values skipped)
   */
  hasAny(identifiers: ReadonlyArray<string | undefined>): boolean {
    return identifiers.some(id => id !== undefined && id.length > 0 && this.has(id));
  }

  /**
   * Append one identifier. Writes are serialized and each is a single
   * append, so the file is never rewritten and never interleaves lines.
   * Returns false when the identifier was already present.
   */
  async add(identifier: string): Promise<boolean> {
    const entry = identifier.trim();
    assertBlockable(entry);

    const write = this.writeChain.then(async () => {
      if (this.entries.has(entry)) return false;
      try {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, `${entry}\n`, 'utf8');
      } catch (error) {
        logger.error('Blocklist append failed', { error: getErrorMessage(error) });
        throw new StorageError('Failed to update blocklist');
      }
      this.entries.add(entry);
      logger.warn('Identifier added to blocklist', { identifier: entry });
      return true;
    });

    // Keep the chain alive after a failed append
    this.writeChain = write.then(() => undefined, () => undefined);
    return write;
  }
}

function assertBlockable(entry: string): void {
  if (entry.length === 0 || entry.length > MAX_IDENTIFIER_LENGTH) {
    throw new ValidationError('Invalid blocklist identifier', 'identifier');
  }
  if (/[\r\n]/.test(entry) || entry.startsWith('#')) {
    throw new ValidationError('Invalid blocklist identifier', 'identifier');
  }
  if (isLocalAddress(entry)) {
    throw new ValidationError('Local addresses cannot be blocked', 'identifier');
  }
}

export default BlocklistStore;
