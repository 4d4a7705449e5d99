/**
 * Shared validation utilities
 * Field checks for check-in submissions and request body sanitization
 */
import type { Request, Response, NextFunction } from 'express';
import { DEFAULT_AVATAR, DEFAULT_NICKNAME, FIELD_LIMITS } from '../config/constants';
import type { ListOptions } from '../services/moderation';
import type { ListFilter } from '../services/submissionRepository';
import { InvalidInputError } from './errors';
import logger from './logger';

export interface SubmissionFields {
  content: string;
  nickname: string;
  avatar: string;
  email?: string;
  qq?: string;
  url?: string;
}

/**
 * Trimmed string, or undefined when absent or blank
 */
export function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Validate email format
 */
export function isValidEmail(email: unknown): boolean {
  if (!email || typeof email !== 'string') return false;
  if (email.length > FIELD_LIMITS.EMAIL_MAX_LENGTH) return false;
  const emailRegex = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*\.[a-zA-Z]{2,}$/;
  return emailRegex.test(email);
}

/**
 * http(s) URL with a hostname, optional port and path
 */
export function isValidHttpUrl(url: unknown): boolean {
  if (!url || typeof url !== 'string') return false;
  if (url.length > FIELD_LIMITS.URL_MAX_LENGTH) return false;
  const urlRegex = /^https?:\/\/[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*(?::\d{1,5})?(?:[/?#]\S*)?$/;
  return urlRegex.test(url);
}

export function isValidQQ(qq: unknown): boolean {
  return typeof qq === 'string' && /^\d{5,11}$/.test(qq);
}

const FORBIDDEN_NICKNAME_CHARS = /[<>&"'\\/\n\r\t]/;

export function isValidNickname(nickname: unknown): boolean {
  if (typeof nickname !== 'string') return false;
  if (nickname.length === 0 || nickname.length > FIELD_LIMITS.NICKNAME_MAX_LENGTH) return false;
  return !FORBIDDEN_NICKNAME_CHARS.test(nickname);
}

/**
 * One emoji, including ZWJ sequences and modifiers (at most 10 UTF-16 units)
 */
export function isSingleEmoji(value: unknown): boolean {
  if (typeof value !== 'string' || value.length === 0 || value.length > 10) return false;
  if (!/^(?:\p{Extended_Pictographic}|\p{Emoji_Component}|\u200d|\ufe0f)+$/u.test(value)) return false;
  return /\p{Extended_Pictographic}/u.test(value);
}

/**
 * Validate and normalize the text fields of a submission.
 * Blank optional fields are dropped; nickname and avatar fall back to defaults.
 */
export function normalizeSubmissionFields(body: Record<string, unknown>): SubmissionFields {
  if (typeof body.content !== 'string' || body.content.trim() === '') {
    throw new InvalidInputError('content', 'Content is required');
  }
  const content = body.content.trim();
  if (content.length > FIELD_LIMITS.CONTENT_MAX_LENGTH) {
    throw new InvalidInputError('content', `Content must be at most ${FIELD_LIMITS.CONTENT_MAX_LENGTH} characters`);
  }

  const nickname = optionalString(body.nickname) ?? DEFAULT_NICKNAME;
  if (!isValidNickname(nickname)) {
    throw new InvalidInputError('nickname', `Nickname must be at most ${FIELD_LIMITS.NICKNAME_MAX_LENGTH} characters without special characters`);
  }

  const avatar = optionalString(body.avatar) ?? DEFAULT_AVATAR;
  if (!isSingleEmoji(avatar)) {
    throw new InvalidInputError('avatar', 'Avatar must be a single emoji');
  }

  const email = optionalString(body.email);
  if (email !== undefined && !isValidEmail(email)) {
    throw new InvalidInputError('email', 'Invalid email address');
  }

  const qq = optionalString(body.qq);
  if (qq !== undefined && !isValidQQ(qq)) {
    throw new InvalidInputError('qq', 'QQ id must be 5 to 11 digits');
  }

  const url = optionalString(body.url);
  if (url !== undefined && !isValidHttpUrl(url)) {
    throw new InvalidInputError('url', 'URL must start with http:// or https://');
  }

  return {
    content,
    nickname,
    avatar,
    ...(email !== undefined ? { email } : {}),
    ...(qq !== undefined ? { qq } : {}),
    ...(url !== undefined ? { url } : {})
  };
}

export interface Pagination {
  page: number;
  limit: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/**
 * `?page=&limit=` with defaults; out-of-range values are clamped
 */
export function parsePagination(query: Record<string, unknown>): Pagination {
  const page = typeof query.page === 'string' ? parseInt(query.page, 10) : NaN;
  const limit = typeof query.limit === 'string' ? parseInt(query.limit, 10) : NaN;
  return {
    page: Number.isFinite(page) && page > 0 ? page : 1,
    limit: Number.isFinite(limit) && limit > 0 ? Math.min(limit, MAX_PAGE_SIZE) : DEFAULT_PAGE_SIZE
  };
}

const SEARCH_MAX_LENGTH = 100;

/**
 * Public listing filters and order:
 * `?sort=time|likes&order=asc|desc&nickname=&q=&minLength=&excludeDefault=true`.
 * Unknown values fall back to newest first without filtering.
 */
export function parseListOptions(query: Record<string, unknown>): ListOptions {
  const filter: ListFilter = {};

  const nickname = optionalString(query.nickname);
  if (nickname !== undefined) filter.nickname = nickname.slice(0, SEARCH_MAX_LENGTH);

  const keyword = optionalString(query.q);
  if (keyword !== undefined) filter.keyword = keyword.slice(0, SEARCH_MAX_LENGTH);

  const minLength = typeof query.minLength === 'string' ? parseInt(query.minLength, 10) : NaN;
  if (Number.isFinite(minLength) && minLength > 0) filter.minLength = minLength;

  if (query.excludeDefault === 'true' || query.excludeDefault === '1') {
    filter.excludeNickname = DEFAULT_NICKNAME;
  }

  return {
    filter,
    sort: {
      field: query.sort === 'likes' ? 'likeCount' : 'createdAt',
      order: query.order === 'asc' ? 'asc' : 'desc'
    }
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * MongoDB operators and prototype pollution keys never reach a handler
 */
const PROTOTYPE_POLLUTION_KEYS = ['__proto__', 'constructor', 'prototype'];

export function deepSanitize(obj: unknown, depth: number = 0): unknown {
  if (depth > 10) {
    return typeof obj === 'object' && obj !== null && !Array.isArray(obj) ? {} : obj;
  }

  if (obj === null || obj === undefined) return obj;

  if (Array.isArray(obj)) {
    return obj.map(item => deepSanitize(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (key.startsWith('$')) {
        logger.warn('NoSQL injection attempt blocked', { key, depth });
        continue;
      }
      if (PROTOTYPE_POLLUTION_KEYS.includes(key)) {
        logger.warn('Prototype pollution attempt blocked', { key, depth });
        continue;
      }
      sanitized[key] = deepSanitize(value, depth + 1);
    }
    return sanitized;
  }

  return obj;
}

/**
 * Create input validation middleware
 */
export function createValidateInput() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (req.body && typeof req.body === 'object') {
      req.body = deepSanitize(req.body);
    }
    next();
  };
}

export default {
  optionalString,
  isValidEmail,
  isValidHttpUrl,
  isValidQQ,
  isValidNickname,
  isSingleEmoji,
  normalizeSubmissionFields,
  parsePagination,
  parseListOptions,
  isRecord,
  deepSanitize,
  createValidateInput
};
