/**
 * Application constants
 * Centralized thresholds for the submission pipeline
 */

// Types
export interface SlidingWindowConfig {
  windowMs: number;
  maxWrites: number;
  banDurationMs: number;
}

export interface DuplicateConfig {
  windowMs: number;
  maxEntries: number;
}

export interface HoneypotConfig {
  minElapsedMs: number;
  maxElapsedMs: number;
}

export interface ArchiveLimits {
  MAX_ENTRIES: number;
  MAX_DECLARED_SIZE: number;
  MAX_ENTRY_SIZE: number;
  MAX_UPLOAD_SIZE: number;
  THUMBNAIL_MAX_DIM: number;
  PREVIEW_MAX_DIM: number;
  MAX_THUMBNAILS: number;
  AUTO_PREVIEW_COUNT: number;
  TIMEOUT_MS: number;
}

export interface FieldLimits {
  CONTENT_MAX_LENGTH: number;
  NICKNAME_MAX_LENGTH: number;
  EMAIL_MAX_LENGTH: number;
  URL_MAX_LENGTH: number;
  SCAN_MAX_LENGTH: number;
  MAX_MEDIA_FILES: number;
  MEDIA_MAX_SIZE: number;
}

// Write throttling: 10 writes per trailing minute, then a 5 minute ban
export const WRITE_RATE_LIMIT: SlidingWindowConfig = {
  windowMs: 60 * 1000,
  maxWrites: 10,
  banDurationMs: 5 * 60 * 1000
};

// Likes: 30 per trailing minute, then a 1 minute pause
export const LIKE_RATE_LIMIT: SlidingWindowConfig = {
  windowMs: 60 * 1000,
  maxWrites: 30,
  banDurationMs: 60 * 1000
};

// Coarse per-IP cap across the whole API, in front of the write limiter
export const GENERAL_RATE_LIMIT = {
  windowMs: 15 * 60 * 1000,
  max: 600
} as const;

// Admin key guessing
export const ADMIN_AUTH_RATE_LIMIT = {
  windowMs: 15 * 60 * 1000,
  max: 20
} as const;

export const DUPLICATE_CONTENT: DuplicateConfig = {
  windowMs: 5 * 60 * 1000,
  maxEntries: 50000
};

export const HONEYPOT: HoneypotConfig = {
  minElapsedMs: 3 * 1000,
  maxElapsedMs: 60 * 60 * 1000
};

export const ARCHIVE_LIMITS: ArchiveLimits = {
  MAX_ENTRIES: 10000,
  MAX_DECLARED_SIZE: 500 * 1024 * 1024,
  MAX_ENTRY_SIZE: 50 * 1024 * 1024,
  MAX_UPLOAD_SIZE: 100 * 1024 * 1024,
  THUMBNAIL_MAX_DIM: 200,
  PREVIEW_MAX_DIM: 800,
  MAX_THUMBNAILS: 50,
  AUTO_PREVIEW_COUNT: 3,
  TIMEOUT_MS: 15 * 1000
};

export const FIELD_LIMITS: FieldLimits = {
  CONTENT_MAX_LENGTH: 10000,
  NICKNAME_MAX_LENGTH: 20,
  EMAIL_MAX_LENGTH: 254,
  URL_MAX_LENGTH: 2048,
  SCAN_MAX_LENGTH: 10000,
  MAX_MEDIA_FILES: 9,
  MEDIA_MAX_SIZE: 20 * 1024 * 1024
};

export const DEFAULT_NICKNAME = 'Anonymous';
export const DEFAULT_AVATAR = '🥰';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp'
]);

export const MEDIA_EXTENSIONS = {
  image: ['.jpg', '.jpeg', '.png', '.gif', '.webp'],
  video: ['.mp4', '.webm', '.mov', '.avi']
} as const;

export const ARCHIVE_EXTENSIONS: ReadonlySet<string> = new Set(['.zip', '.7z']);

// Entries that can carry executable or script payloads
export const DANGEROUS_EXTENSIONS: ReadonlySet<string> = new Set([
  // Executables
  '.exe', '.bat', '.cmd', '.com', '.msi', '.scr', '.pif',
  '.app', '.dmg', '.pkg',
  '.sh', '.bin', '.run',
  // Scripts
  '.js', '.vbs', '.vbe', '.jse', '.ws', '.wsf', '.wsc', '.wsh',
  '.ps1', '.psm1', '.psd1',
  '.py', '.pyw', '.pyc', '.pyo',
  '.rb', '.pl', '.php',
  // Macro-enabled office documents
  '.docm', '.xlsm', '.pptm', '.dotm', '.xltm', '.potm',
  // Java
  '.jar', '.class',
  // System libraries and drivers
  '.dll', '.sys', '.drv',
  // Shortcuts and registry
  '.lnk', '.url', '.reg',
  // Script-capable markup
  '.hta', '.html', '.htm', '.svg'
]);

// Nickname templates used by known propaganda bots: phrase + optional digits
export const DEFAULT_NICKNAME_TEMPLATES: readonly string[] = [
  'truthteller',
  'freenewsdaily',
  'patriotvoice',
  'wakeupsheeple',
  'cryptoairdrop'
];

export const DEFAULT_BLOCKED_REGIONS: readonly string[] = ['CN'];

export default {
  WRITE_RATE_LIMIT,
  LIKE_RATE_LIMIT,
  GENERAL_RATE_LIMIT,
  ADMIN_AUTH_RATE_LIMIT,
  DUPLICATE_CONTENT,
  HONEYPOT,
  ARCHIVE_LIMITS,
  FIELD_LIMITS,
  DEFAULT_NICKNAME,
  DEFAULT_AVATAR,
  IMAGE_EXTENSIONS,
  MEDIA_EXTENSIONS,
  ARCHIVE_EXTENSIONS,
  DANGEROUS_EXTENSIONS,
  DEFAULT_NICKNAME_TEMPLATES,
  DEFAULT_BLOCKED_REGIONS
};
