/**
 * 7z archives through the WebAssembly build of 7-Zip
 * Every operation runs in a fresh module instance with its own in-memory
 * filesystem; nothing is written to the host disk.
 */
import SevenZip from '7z-wasm';
import { ArchiveRejectedError, NotFoundError, getErrorMessage } from '../../utils/errors';
import logger from '../../utils/logger';
import { entryTooLarge, throwIfAborted, type ArchiveEntryInfo, type ArchiveReader, type EntryReadResult } from './reader';

type SevenZipInstance = Awaited<ReturnType<typeof SevenZip>>;

const ARCHIVE_FILE = '/input.7z';
const OUTPUT_DIR = '/output';
// Only genuine 7z containers; 7-Zip would otherwise open zip, rar or iso under a .7z name
const FORMAT = '-t7z';
// An empty password stops 7-Zip from prompting on stdin for encrypted archives
const NO_PASSWORD = '-p';
// Declared bytes decoded per module instance
const BATCH_BYTES = 64 * 1024 * 1024;

interface LoadedSevenZip {
  sevenZip: SevenZipInstance;
  output: string[];
}

async function loadSevenZip(bytes: Buffer): Promise<LoadedSevenZip> {
  const output: string[] = [];
  const sevenZip = await SevenZip({
    print: (line: string) => {
      output.push(line);
    },
    printErr: (line: string) => {
      output.push(line);
    }
  });
  sevenZip.FS.writeFile(ARCHIVE_FILE, bytes);
  return { sevenZip, output };
}

/**
 * Run one 7-Zip command. A failing command may still have produced output,
 * so the caller inspects the result either way.
 */
function runCommand(sevenZip: SevenZipInstance, args: string[]): void {
  try {
    sevenZip.callMain(args);
  } catch (error) {
    logger.debug('7-Zip command failed', { command: args[0], error: getErrorMessage(error) });
  }
}

/**
 * Entries from `7z l -slt` output: `Key = Value` blocks separated by blank
 * lines, after the `----------` line that ends the archive header block.
 * Returns null when the listing never reached the entries.
 */
export function parseTechnicalListing(lines: readonly string[]): ArchiveEntryInfo[] | null {
  const start = lines.findIndex(line => line.trim() === '----------');
  if (start === -1) return null;

  const blocks: Array<Map<string, string>> = [];
  let block = new Map<string, string>();
  for (const line of lines.slice(start + 1)) {
    if (line.trim() === '') {
      if (block.size > 0) blocks.push(block);
      block = new Map();
      continue;
    }
    const separator = line.indexOf(' = ');
    if (separator === -1) continue;
    block.set(line.slice(0, separator).trim(), line.slice(separator + 3));
  }
  if (block.size > 0) blocks.push(block);

  const entries: ArchiveEntryInfo[] = [];
  for (const entry of blocks) {
    const entryPath = entry.get('Path');
    if (entryPath === undefined) continue;
    const size = Number.parseInt(entry.get('Size') ?? '', 10);
    entries.push({
      path: entryPath,
      size: Number.isFinite(size) ? size : 0,
      isDirectory: isDirectoryListing(entry)
    });
  }
  return entries;
}

/**
 * `Attributes` is the Windows attribute letters (D for a directory),
 * optionally followed by a Unix mode string such as `drwxr-xr-x`
 */
function isDirectoryListing(entry: Map<string, string>): boolean {
  if (entry.get('Folder') === '+') return true;
  const [windows = '', unix = ''] = (entry.get('Attributes') ?? '').split(' ');
  return windows.includes('D') || unix.startsWith('d');
}

export class SevenZipArchiveReader implements ArchiveReader {
  readonly format = '7z' as const;
  private readonly files: Map<string, ArchiveEntryInfo>;

  private constructor(
    private readonly bytes: Buffer,
    readonly entries: readonly ArchiveEntryInfo[]
  ) {
    this.files = new Map(entries.filter(entry => !entry.isDirectory).map(entry => [entry.path, entry]));
  }

  static async open(bytes: Buffer): Promise<SevenZipArchiveReader> {
    const { sevenZip, output } = await loadSevenZip(bytes);
    runCommand(sevenZip, ['l', '-slt', FORMAT, NO_PASSWORD, ARCHIVE_FILE]);

    const entries = parseTechnicalListing(output);
    if (entries === null) {
      const errors = output.filter(line => /error/i.test(line));
      throw new Error(errors.length > 0 ? errors.join('; ') : 'Archive could not be listed');
    }
    if (!output.some(line => line.trim() === 'Type = 7z')) {
      throw new Error('Archive is not a 7z container');
    }
    return new SevenZipArchiveReader(bytes, entries);
  }

  async *readEntries(entryPaths: readonly string[], limit: number, signal?: AbortSignal): AsyncGenerator<EntryReadResult> {
    for (const batch of this.batches(entryPaths, limit)) {
      throwIfAborted(signal);
      const extracted = await this.extract(batch.filter(entryPath => this.readable(entryPath, limit)));

      for (const entryPath of batch) {
        throwIfAborted(signal);
        const file = this.files.get(entryPath);
        if (!file) {
          yield { path: entryPath, error: new NotFoundError('Archive entry') };
        } else if (file.size > limit) {
          yield { path: entryPath, error: entryTooLarge() };
        } else {
          yield extracted.get(entryPath) ?? {
            path: entryPath,
            error: new ArchiveRejectedError('Archive entry could not be read', 'CORRUPT_ARCHIVE')
          };
        }
      }
    }
  }

  private readable(entryPath: string, limit: number): boolean {
    const file = this.files.get(entryPath);
    return file !== undefined && file.size <= limit;
  }

  /**
   * Consecutive runs of paths whose declared sizes fit one instance.
   * Solid archives decode a block once for every entry of the run.
   */
  private batches(entryPaths: readonly string[], limit: number): string[][] {
    const batches: string[][] = [];
    let current: string[] = [];
    let currentBytes = 0;
    for (const entryPath of entryPaths) {
      const size = this.readable(entryPath, limit) ? this.files.get(entryPath)?.size ?? 0 : 0;
      if (current.length > 0 && currentBytes + size > BATCH_BYTES) {
        batches.push(current);
        current = [];
        currentBytes = 0;
      }
      current.push(entryPath);
      currentBytes += size;
    }
    if (current.length > 0) batches.push(current);
    return batches;
  }

  private async extract(entryPaths: readonly string[]): Promise<Map<string, EntryReadResult>> {
    const results = new Map<string, EntryReadResult>();
    if (entryPaths.length === 0) return results;

    const { sevenZip } = await loadSevenZip(this.bytes);
    // -spd: names are literal, never wildcards; `--` ends switch and @listfile parsing
    runCommand(sevenZip, ['x', FORMAT, NO_PASSWORD, '-y', '-spd', `-o${OUTPUT_DIR}`, ARCHIVE_FILE, '--', ...entryPaths]);

    for (const entryPath of entryPaths) {
      const declared = this.files.get(entryPath)?.size ?? 0;
      let data: Buffer;
      try {
        data = Buffer.from(sevenZip.FS.readFile(`${OUTPUT_DIR}/${entryPath}`));
      } catch {
        // Not written: bad data, wrong password or a name 7-Zip rewrote
        continue;
      }
      results.set(entryPath, data.length > declared
        ? { path: entryPath, error: new ArchiveRejectedError('Archive entry is larger than declared', 'ENTRY_SIZE_MISMATCH') }
        : { path: entryPath, data });
    }
    return results;
  }
}

export default SevenZipArchiveReader;
