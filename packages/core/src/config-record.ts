/**
 * Config Record
 *
 * Per-session model settings and credential material, with the two
 * serialization schemas derived from it: the full record (server side
 * only) and the redacted view that is allowed to reach a client.
 *
 * @module @sheetbox/core/config-record
 */

import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

/**
 * Full record persisted at `{workspace}/config.json`.
 */
export const ConfigRecordSchema = z.object({
  /** Model identifier used by the analysis collaborator */
  modelChoice: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
  /** Sensitive: API key or token. Never leaves the server. */
  credentialMaterial: z.string(),
  /** Optional endpoint override for the analysis provider */
  baseUrl: z.string().url().optional(),
});

export type ConfigRecord = z.infer<typeof ConfigRecordSchema>;

/**
 * Client-visible view. Carries a fixed-length preview instead of the credential.
 */
export const RedactedConfigRecordSchema = z.object({
  modelChoice: z.string(),
  temperature: z.number(),
  maxTokens: z.number().int(),
  baseUrl: z.string().optional(),
  hasCredential: z.boolean(),
  credentialPreview: z.string(),
  cachedAt: z.string(),
  cacheType: z.literal('client-safe'),
}).strict();

export type RedactedConfigRecord = z.infer<typeof RedactedConfigRecordSchema>;

export const DEFAULT_CONFIG_RECORD: Readonly<ConfigRecord> = Object.freeze({
  modelChoice: 'gpt-3.5-turbo',
  temperature: 0.7,
  maxTokens: 3000,
  credentialMaterial: '',
});

// ============================================================================
// Redaction
// ============================================================================

/** Length of every non-empty credential preview */
export const CREDENTIAL_PREVIEW_LENGTH = 12;

/** Credentials shorter than this are masked entirely */
const MIN_PARTIAL_PREVIEW_LENGTH = 16;

/**
 * Mask a credential to a fixed-length preview.
 *
 * Long credentials keep their first and last four characters; shorter ones
 * are fully masked. An empty credential yields an empty preview.
 */
export function maskCredential(value: string): string {
  if (value.length === 0) {
    return '';
  }
  if (value.length < MIN_PARTIAL_PREVIEW_LENGTH) {
    return '*'.repeat(CREDENTIAL_PREVIEW_LENGTH);
  }
  return value.slice(0, 4) + '*'.repeat(CREDENTIAL_PREVIEW_LENGTH - 8) + value.slice(-4);
}

/**
 * Derive the client-visible view of a record.
 *
 * Fields are picked explicitly; the source record is only read.
 */
export function redactConfigRecord(
  record: Readonly<ConfigRecord>,
  now: Date = new Date()
): RedactedConfigRecord {
  const view: RedactedConfigRecord = {
    modelChoice: record.modelChoice,
    temperature: record.temperature,
    maxTokens: record.maxTokens,
    hasCredential: record.credentialMaterial.length > 0,
    credentialPreview: maskCredential(record.credentialMaterial),
    cachedAt: now.toISOString(),
    cacheType: 'client-safe',
  };
  if (record.baseUrl !== undefined) {
    view.baseUrl = record.baseUrl;
  }
  return view;
}

/**
 * Format zod issues as an indented list, one per path.
 */
export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}
