/**
 * Session Identity
 *
 * Derives a session id from weak client signals without a login.
 *
 * The id is a hash over the user-agent string, the host platform tag and
 * the current UTC hour, so the same browser gets the same id for the
 * rest of the hour. Two clients with identical signals in the same hour
 * share an id; callers that need a stronger separation pass a random
 * client-held token instead, which also keeps the id stable across hours.
 */

import { createHash, randomBytes } from 'crypto';
import { formatTimestamp, type SessionId } from '@sheetbox/core';

export const SESSION_ID_PREFIX = 'user_';
export const SESSION_ID_PATTERN = /^user_[0-9a-f]{16}$/;

const HASH_PREFIX_LENGTH = 16;

/**
 * Signals supplied by the client. Every field is untrusted.
 */
export interface ClientSignature {
  userAgent?: string;
  platform?: string;
  /** Opaque client-held random token; replaces the weak signals when present */
  clientToken?: string;
}

/**
 * True when `value` has the shape `user_` + 16 lowercase hex characters.
 */
export function isSessionId(value: unknown): value is SessionId {
  return typeof value === 'string' && SESSION_ID_PATTERN.test(value);
}

/**
 * UTC hour bucket: `YYYYMMDDHH`.
 */
export function hourBucket(now: Date): string {
  return formatTimestamp(now).slice(0, 10);
}

function hashToId(material: string): SessionId {
  const digest = createHash('sha256').update(material, 'utf8').digest('hex');
  return SESSION_ID_PREFIX + digest.slice(0, HASH_PREFIX_LENGTH);
}

/**
 * Derive a session id. Pure: the same inputs and hour give the same id.
 */
export function deriveSessionId(signature: ClientSignature, now: Date = new Date()): SessionId {
  const token = signature.clientToken?.trim();
  if (token) {
    return hashToId(`token|${token}`);
  }
  const userAgent = signature.userAgent ?? '';
  const platform = signature.platform ?? '';
  return hashToId(`${userAgent}|${platform}|${hourBucket(now)}`);
}

/**
 * Return `existingId` when it is well formed, otherwise derive a fresh id.
 */
export function deriveOrAccept(
  signature: ClientSignature,
  existingId?: string,
  now: Date = new Date()
): SessionId {
  if (isSessionId(existingId)) {
    return existingId;
  }
  return deriveSessionId(signature, now);
}

/**
 * Generate a random client token for the strong identity layer.
 */
export function generateClientToken(): string {
  return randomBytes(16).toString('hex');
}
