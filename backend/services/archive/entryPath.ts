/**
 * Helpers for attacker-controlled archive entry paths
 */
import path from 'path';

/**
 * Final path component; both separators count since zips from Windows use `\`
 */
export function entryBaseName(entryPath: string): string {
  const parts = entryPath.split(/[\\/]/).filter(part => part.length > 0);
  return parts[parts.length - 1] ?? '';
}

/**
 * Lower-cased extension. Windows drops trailing dots and spaces when it
 * creates a file, so `payload.exe. ` counts as `.exe`.
 */
export function entryExtension(entryPath: string): string {
  return path.extname(entryBaseName(entryPath).replace(/[. ]+$/, '')).toLowerCase();
}

export function entryStem(entryPath: string): string {
  const base = entryBaseName(entryPath);
  return base.slice(0, base.length - path.extname(base).length);
}
