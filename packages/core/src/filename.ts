/**
 * File Naming
 *
 * Sanitization of untrusted file names and synthesis of the
 * timestamped names used inside a workspace.
 *
 * @module @sheetbox/core/filename
 */

import type { UploadKind } from './sandbox-types.js';

const MAX_NAME_LENGTH = 100;
const MAX_EXTENSION_LENGTH = 16;
const FALLBACK_NAME = 'file';

const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;
const DISALLOWED_CHARS = /[^\p{L}\p{N}\s._-]/gu;
const TIMESTAMP_PREFIX = /^(\d{14})_(.+)$/;

/**
 * Split a file name into stem and extension (extension keeps its dot).
 * Dot-files and names without a dot have no extension.
 */
export function splitExtension(name: string): { stem: string; ext: string } {
  const idx = name.lastIndexOf('.');
  if (idx <= 0 || name.length - idx > MAX_EXTENSION_LENGTH) {
    return { stem: name, ext: '' };
  }
  return { stem: name.slice(0, idx), ext: name.slice(idx) };
}

/**
 * Reduce an untrusted name to a single safe path segment.
 *
 * Only the last segment of the input survives, so `../../etc/passwd`
 * becomes `passwd`. Control characters and anything other than letters,
 * digits, whitespace, `.`, `_` and `-` are removed, leading dots are
 * stripped, and the result is capped at 100 characters with the
 * extension preserved.
 */
export function sanitizeFilename(name: string): string {
  const lastSegment = name.split(/[\\/]/).pop() ?? '';

  let safe = lastSegment
    .replace(CONTROL_CHARS, '')
    .replace(DISALLOWED_CHARS, '')
    .replace(/\s+/g, ' ')
    .replace(/^[.\s]+/, '')
    .replace(/[.\s]+$/, '');

  if (safe.length === 0) {
    return FALLBACK_NAME;
  }

  if (safe.length > MAX_NAME_LENGTH) {
    const { stem, ext } = splitExtension(safe);
    safe = stem.slice(0, MAX_NAME_LENGTH - ext.length) + ext;
  }

  return safe;
}

/**
 * Format a date as a 14-digit UTC timestamp: `YYYYMMDDHHmmss`.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/**
 * Build the stored name for a redirected save or an upload:
 * `{timestamp}_{sanitizedName}`.
 */
export function synthesizeStoredName(requested: string, now: Date): string {
  return `${formatTimestamp(now)}_${sanitizeFilename(requested)}`;
}

/**
 * Insert a numeric suffix before the extension: `a.xlsx` → `a_2.xlsx`.
 */
export function withCollisionSuffix(name: string, counter: number): string {
  if (counter <= 0) {
    return name;
  }
  const { stem, ext } = splitExtension(name);
  return `${stem}_${counter}${ext}`;
}

/**
 * Strip the timestamp prefix from a stored name, if it has one.
 */
export function displayNameOf(storedName: string): string {
  const match = TIMESTAMP_PREFIX.exec(storedName);
  return match ? match[2] : storedName;
}

const UPLOAD_KINDS: Record<string, UploadKind> = {
  '.xlsx': 'excel',
  '.xls': 'excel',
  '.xlsm': 'excel',
  '.xlsb': 'excel',
  '.csv': 'csv',
  '.txt': 'text',
  '.md': 'text',
  '.pdf': 'pdf',
  '.doc': 'word',
  '.docx': 'word',
};

/**
 * Classify an uploaded file by its extension.
 */
export function classifyUpload(name: string): UploadKind {
  const { ext } = splitExtension(name);
  return UPLOAD_KINDS[ext.toLowerCase()] ?? 'other';
}
