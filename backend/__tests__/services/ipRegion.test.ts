/**
 * IP range classifier tests
 */
import { describe, it, expect } from '@jest/globals';
import {
  IpRegionClassifier,
  LOCAL_REGION,
  UNKNOWN_REGION,
  buildRangeTable,
  findRange,
  ipv4ToInt,
  isLocalAddress
} from '../../services/ipRegion';

describe('ipv4ToInt', () => {
  it('should convert dotted quads', () => {
    expect(ipv4ToInt('1.2.3.4')).toBe(16909060);
    expect(ipv4ToInt('255.255.255.255')).toBe(4294967295);
  });

  it.each(['256.1.1.1', '1.2.3', '1.2.3.4.5', 'a.b.c.d', '1.2.3.-4', ''])('should reject %j', ip => {
    expect(ipv4ToInt(ip)).toBeNull();
  });
});

describe('isLocalAddress', () => {
  it.each(['10.0.0.1', '172.16.5.4', '172.31.255.255', '192.168.1.1', '127.0.0.1', '::1', 'fd00::1', 'fe80::1', '::ffff:192.168.0.1', 'localhost'])(
    'should treat %s as local',
    ip => {
      expect(isLocalAddress(ip)).toBe(true);
    }
  );

  it.each(['8.8.8.8', '172.32.0.1', '2001:db8::1', '203.0.113.5'])('should treat %s as public', ip => {
    expect(isLocalAddress(ip)).toBe(false);
  });
});

describe('buildRangeTable', () => {
  it('should reject overlapping ranges', () => {
    expect(() => buildRangeTable([
      { start: '1.0.0.0', end: '1.0.0.255', region: 'AU' },
      { start: '1.0.0.128', end: '1.0.1.255', region: 'AU' }
    ])).toThrow('out of order or overlaps');
  });

  it('should reject inverted ranges', () => {
    expect(() => buildRangeTable([{ start: '1.0.0.9', end: '1.0.0.1', region: 'AU' }])).toThrow('Invalid IP range');
  });

  it('should find the containing range by binary search', () => {
    const ranges = buildRangeTable([
      { start: '1.0.0.0', end: '1.0.0.255', region: 'au' },
      { start: '5.0.0.0', end: '5.0.255.255', region: 'de' },
      { start: '9.0.0.0', end: '9.0.0.0', region: 'us' }
    ]);
    expect(findRange(ranges, 16777216)?.region).toBe('AU');
    expect(findRange(ranges, 83886335)?.region).toBe('DE');
    expect(findRange(ranges, 150994944)?.region).toBe('US');
    expect(findRange(ranges, 100)).toBeUndefined();
  });
});

describe('IpRegionClassifier', () => {
  const classifier = new IpRegionClassifier({
    ranges: buildRangeTable([
      { start: '1.0.0.0', end: '1.0.0.255', region: 'AU' },
      { start: '5.0.0.0', end: '5.0.255.255', region: 'XX' }
    ]),
    blockedRegions: ['xx']
  });

  it('should classify addresses inside a range', async () => {
    await expect(classifier.classify('1.0.0.7')).resolves.toBe('AU');
    await expect(classifier.classify('::ffff:1.0.0.7')).resolves.toBe('AU');
  });

  it('should classify private addresses as local', async () => {
    await expect(classifier.classify('192.168.1.1')).resolves.toBe(LOCAL_REGION);
  });

  it('should return unknown outside every range or for malformed input', async () => {
    await expect(classifier.classify('8.8.8.8')).resolves.toBe(UNKNOWN_REGION);
    await expect(classifier.classify('not-an-ip')).resolves.toBe(UNKNOWN_REGION);
    await expect(classifier.classify('')).resolves.toBe(UNKNOWN_REGION);
  });

  it('should block configured regions only', () => {
    expect(classifier.isBlockedRegion('XX')).toBe(true);
    expect(classifier.isBlockedRegion('AU')).toBe(false);
    expect(classifier.isBlockedRegion(LOCAL_REGION)).toBe(false);
    expect(classifier.isBlockedRegion(UNKNOWN_REGION)).toBe(false);
  });

  it('should use the bundled table by default', async () => {
    const defaults = new IpRegionClassifier();
    const region = await defaults.classify('1.2.3.4');
    expect(region).toBe('CN');
    expect(defaults.isBlockedRegion(region)).toBe(true);
  });

  it('should fall back to the table when the geo database cannot be opened', async () => {
    const missingDb = new IpRegionClassifier({ geoDbPath: '/nonexistent/GeoLite2-Country.mmdb' });
    await expect(missingDb.classify('1.2.3.4')).resolves.toBe('CN');
    await expect(missingDb.classify('8.8.8.8')).resolves.toBe(UNKNOWN_REGION);
  });
});
