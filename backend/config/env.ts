/**
 * Environment configuration
 * Loads and validates environment variables
 */
import dotenv from 'dotenv';
import path from 'path';
import { ARCHIVE_LIMITS, DEFAULT_BLOCKED_REGIONS } from './constants';

// Load environment variables from backend.env (local development only)
// In production, env vars are set directly by the deployment platform
if (process.env.NODE_ENV !== 'production') {
  const envPath = path.join(__dirname, '..', '..', 'backend.env');
  dotenv.config({ path: envPath });
}

// ADMIN_SECRET must be at least 32 characters (trim to handle copy-paste whitespace)
if (process.env.ADMIN_SECRET) {
  process.env.ADMIN_SECRET = process.env.ADMIN_SECRET.trim();
  if (process.env.ADMIN_SECRET.length < 32) {
    console.error('SECURITY ERROR: ADMIN_SECRET must be at least 32 characters long');
    if (process.env.NODE_ENV === 'production') {
      process.exit(1);
    }
  }
}

/**
 * Parse a comma separated list, dropping blanks
 */
export function parseList(value: string | undefined, fallback: readonly string[]): string[] {
  if (!value || value.trim() === '') return [...fallback];
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Parse a positive integer, falling back on anything else
 */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Export validated env vars
export interface Config {
  PORT: number;
  NODE_ENV: string;
  HOST?: string;
  TRUST_PROXY: number;
  MONGODB_URI?: string;
  ADMIN_SECRET?: string;
  DATA_DIR: string;
  UPLOAD_DIR: string;
  UPLOAD_URL_PREFIX: string;
  ARCHIVE_DIR: string;
  SERVE_UPLOADS: boolean;
  BLOCKLIST_FILE: string;
  SPAM_KEYWORDS_FILE: string;
  GEOIP_DB_PATH?: string;
  BLOCKED_REGIONS: string[];
  ARCHIVE_TIMEOUT_MS: number;
  JSON_BODY_LIMIT: string;
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;
}

const dataDir = process.env.DATA_DIR || path.join(__dirname, '..', 'data');

export const config: Config = {
  // Server
  PORT: parsePositiveInt(process.env.PORT, 8000),
  NODE_ENV: process.env.NODE_ENV || 'development',
  HOST: process.env.HOST,
  // Reverse proxy hops whose X-Forwarded-For is trusted; 0 uses the socket address
  TRUST_PROXY: process.env.TRUST_PROXY === '0' ? 0 : parsePositiveInt(process.env.TRUST_PROXY, 1),

  // Database
  MONGODB_URI: process.env.MONGODB_URI,

  // Security
  ADMIN_SECRET: process.env.ADMIN_SECRET,

  // Storage
  DATA_DIR: dataDir,
  UPLOAD_DIR: process.env.UPLOAD_DIR || path.join(__dirname, '..', 'uploads'),
  UPLOAD_URL_PREFIX: process.env.UPLOAD_URL_PREFIX || '/static/uploads',
  ARCHIVE_DIR: process.env.ARCHIVE_DIR || path.join(dataDir, 'archives'),
  // Off when a reverse proxy serves UPLOAD_DIR
  SERVE_UPLOADS: process.env.SERVE_UPLOADS !== 'false',
  BLOCKLIST_FILE: process.env.BLOCKLIST_FILE || path.join(dataDir, 'blocklist.txt'),
  SPAM_KEYWORDS_FILE: process.env.SPAM_KEYWORDS_FILE || path.join(dataDir, 'spam-keywords.txt'),

  // Region classification
  GEOIP_DB_PATH: process.env.GEOIP_DB_PATH,
  BLOCKED_REGIONS: parseList(process.env.BLOCKED_REGIONS, DEFAULT_BLOCKED_REGIONS).map(r => r.toUpperCase()),

  // Archive handling
  ARCHIVE_TIMEOUT_MS: parsePositiveInt(process.env.ARCHIVE_TIMEOUT_MS, ARCHIVE_LIMITS.TIMEOUT_MS),

  // Archives arrive base64 encoded inside JSON, so leave headroom over MAX_UPLOAD_SIZE
  JSON_BODY_LIMIT: process.env.JSON_BODY_LIMIT || '150mb',

  isProduction: process.env.NODE_ENV === 'production',
  isDevelopment: process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test',
  isTest: process.env.NODE_ENV === 'test'
};

export default config;
