/**
 * IP Range Classifier
 * Maps an address to a country code, `local` or `unknown`.
 * Uses a MaxMind country database when one is configured, otherwise a static
 * table of sorted, disjoint IPv4 ranges.
 */
import maxmind, { type CountryResponse, type Reader } from 'maxmind';
import rangeTable from '../data/region-ranges.json';
import { DEFAULT_BLOCKED_REGIONS } from '../config/constants';
import { getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

export const LOCAL_REGION = 'local';
export const UNKNOWN_REGION = 'unknown';

export interface IpRange {
  start: number;
  end: number;
  region: string;
}

export interface IpRegionOptions {
  geoDbPath?: string;
  ranges?: IpRange[];
  blockedRegions?: readonly string[];
}

const PRIVATE_IPV4_PATTERNS = [
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^127\./
];

const PRIVATE_IPV6_PATTERNS = [
  /^::1$/,
  /^f[cd][0-9a-f]{2}:/i,
  /^fe[89ab][0-9a-f]:/i
];

function stripMappedPrefix(ip: string): string {
  return ip.toLowerCase().startsWith('::ffff:') ? ip.slice(7) : ip;
}

/**
 * Private, loopback and link-local addresses. These are never geo-classified
 * and never blockable.
 */
export function isLocalAddress(ip: string): boolean {
  const address = stripMappedPrefix(ip.trim());
  if (address.toLowerCase() === 'localhost') return true;
  if (address.includes(':')) {
    return PRIVATE_IPV6_PATTERNS.some(pattern => pattern.test(address));
  }
  return ipv4ToInt(address) !== null && PRIVATE_IPV4_PATTERNS.some(pattern => pattern.test(address));
}

/**
 * Dotted-quad to unsigned integer, or null when malformed
 */
export function ipv4ToInt(ip: string): number | null {
  const parts = ip.split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    const octet = Number(part);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

/**
 * Parse and check a range table: every bound valid, start <= end,
 * ascending and non-overlapping
 */
export function buildRangeTable(entries: ReadonlyArray<{ start: string; end: string; region: string }>): IpRange[] {
  const ranges: IpRange[] = [];
  for (const entry of entries) {
    const start = ipv4ToInt(entry.start);
    const end = ipv4ToInt(entry.end);
    if (start === null || end === null || start > end) {
      throw new Error(`Invalid IP range ${entry.start}-${entry.end}`);
    }
    const previous = ranges[ranges.length - 1];
    if (previous && start <= previous.end) {
      throw new Error(`IP range ${entry.start}-${entry.end} is out of order or overlaps`);
    }
    ranges.push({ start, end, region: entry.region.toUpperCase() });
  }
  return ranges;
}

export function findRange(ranges: readonly IpRange[], value: number): IpRange | undefined {
  let low = 0;
  let high = ranges.length - 1;
  while (low <= high) {
    const mid = (low + high) >>> 1;
    const range = ranges[mid];
    if (value < range.start) {
      high = mid - 1;
    } else if (value > range.end) {
      low = mid + 1;
    } else {
      return range;
    }
  }
  return undefined;
}

export class IpRegionClassifier {
  private readonly ranges: IpRange[];
  private readonly blockedRegions: Set<string>;
  private readonly geoDbPath?: string;
  private readerPromise?: Promise<Reader<CountryResponse> | null>;

  constructor(options: IpRegionOptions = {}) {
    this.ranges = options.ranges ?? buildRangeTable(rangeTable.ranges);
    this.blockedRegions = new Set((options.blockedRegions ?? DEFAULT_BLOCKED_REGIONS).map(r => r.toUpperCase()));
    this.geoDbPath = options.geoDbPath;
  }

  async classify(ip: string): Promise<string> {
    const address = ip.trim();
    if (!address) return UNKNOWN_REGION;
    if (isLocalAddress(address)) return LOCAL_REGION;

    const reader = await this.getReader();
    if (!reader) {
      return this.classifyWithRanges(address);
    }

    const candidate = stripMappedPrefix(address);
    if (!maxmind.validate(candidate)) return UNKNOWN_REGION;
    try {
      return reader.get(candidate)?.country?.iso_code ?? UNKNOWN_REGION;
    } catch (error) {
      logger.debug('GeoIP lookup failed', { error: getErrorMessage(error) });
      return UNKNOWN_REGION;
    }
  }

  /**
   * Static-table lookup only (IPv4)
   */
  classifyWithRanges(ip: string): string {
    const address = stripMappedPrefix(ip.trim());
    if (isLocalAddress(address)) return LOCAL_REGION;
    const value = ipv4ToInt(address);
    if (value === null) return UNKNOWN_REGION;
    return findRange(this.ranges, value)?.region ?? UNKNOWN_REGION;
  }

  isBlockedRegion(region: string): boolean {
    if (region === LOCAL_REGION || region === UNKNOWN_REGION) return false;
    return this.blockedRegions.has(region.toUpperCase());
  }

  private getReader(): Promise<Reader<CountryResponse> | null> {
    const dbPath = this.geoDbPath;
    if (!dbPath) return Promise.resolve(null);

    if (!this.readerPromise) {
      this.readerPromise = maxmind.open<CountryResponse>(dbPath).then(
        reader => {
          logger.info('GeoIP database loaded', { path: dbPath });
          return reader;
        },
        (error: unknown) => {
          logger.warn('GeoIP database unavailable, using static ranges', { error: getErrorMessage(error) });
          return null;
        }
      );
    }
    return this.readerPromise;
  }
}

export default IpRegionClassifier;
