/**
 * Log Sanitization Utility
 * Prevents secrets and submitter contact details from being logged
 */

// Fields that should be redacted in logs
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'authorization',
  'adminSecret',
  'admin_secret',
  'cookie',
  'email',
  'qq',
  'honeypot'
];

// Patterns to detect and redact (no /g flag: .test() must stay stateless)
const SENSITIVE_PATTERNS = [
  /secret\s*[:=]\s*['"]?[^'",\s}]+['"]?/i,
  /authorization\s*[:=]\s*['"]?[^'",\s}]+['"]?/i,
  /Bearer\s+\S+/i,
  /mongodb(\+srv)?:\/\/[^@\s]+@\S+/i
];

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

const MAX_STRING_LENGTH = 100;

/**
 * Redact sensitive values in an object
 */
export function sanitizeLogObject(obj: unknown, depth: number = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    if (SENSITIVE_PATTERNS.some(pattern => pattern.test(obj))) {
      return '[REDACTED]';
    }
    if (EMAIL_PATTERN.test(obj)) {
      return sanitizeLogMessage(obj);
    }
    // Data URIs and long submitted text never go to the log verbatim
    if (obj.length > MAX_STRING_LENGTH) {
      return obj.substring(0, MAX_STRING_LENGTH) + '...';
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => sanitizeLogObject(item, depth + 1));
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: sanitizeLogMessage(obj.message) };
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_FIELDS.some(field => lowerKey.includes(field.toLowerCase()));
      sanitized[key] = isSensitive ? '[REDACTED]' : sanitizeLogObject(value, depth + 1);
    }
    return sanitized;
  }

  return obj;
}

/**
 * Mask an email address for logging (show first 2 chars + domain)
 * e.g., "user@example.com" -> "us***@example.com"
 */
export function maskEmail(email: string): string {
  const atIndex = email.indexOf('@');
  if (atIndex <= 0) return '[REDACTED_EMAIL]';
  const localPart = email.substring(0, atIndex);
  const domain = email.substring(atIndex);
  if (localPart.length <= 2) return localPart + '***' + domain;
  return localPart.substring(0, 2) + '***' + domain;
}

/**
 * Sanitize a log message string
 */
export function sanitizeLogMessage(message: string): string {
  let sanitized = message.replace(new RegExp(EMAIL_PATTERN.source, 'g'), match => maskEmail(match));

  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(new RegExp(pattern.source, 'gi'), match => {
      const field = match.split(/[:=\s]/)[0]?.trim();
      return field ? `${field}=[REDACTED]` : '[REDACTED]';
    });
  }

  return sanitized;
}

export default {
  sanitizeLogObject,
  sanitizeLogMessage,
  maskEmail
};
