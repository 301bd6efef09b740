/**
 * Request body field readers shared by the page routes.
 *
 * Bodies arrive either as JSON or as URL-encoded forms, so structured fields
 * (section preferences, enhancements, reference files) may be real values or
 * JSON strings.
 */

import type { EnhancementSelection } from '../services/catalog/index.js';
import type { ReferenceFile } from '../services/reference/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, safeSnippet } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

export type RequestFields = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The request body as a field map ({} for anything else). */
export function requestFields(body: unknown): RequestFields {
  return isRecord(body) ? body : {};
}

/** A non-blank string field, or undefined. */
export function stringField(fields: RequestFields, key: string): string | undefined {
  const value = fields[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

/**
 * A structured field that may have been sent as a JSON string.
 * Unparseable JSON is logged and treated as absent.
 */
export function jsonField(fields: RequestFields, key: string): unknown {
  const value = fields[key];
  if (typeof value !== 'string') {
    return value;
  }
  if (!value.trim()) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    logger.warn('request_field_invalid_json', {
      field: key,
      error: errorMessage(error),
      snippet: safeSnippet(value, 40),
    });
    return undefined;
  }
}

export function parseEnhancementSelections(value: unknown): EnhancementSelection[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const selections: EnhancementSelection[] = [];
  for (const item of value) {
    if (typeof item === 'string' || isRecord(item)) {
      selections.push(item);
    }
  }
  return selections;
}

/**
 * Uploaded files as `{ filename, data }` where data is base64 or a data URL.
 * Malformed entries are skipped.
 */
export function parseReferenceFiles(value: unknown): ReferenceFile[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const files: ReferenceFile[] = [];
  for (const item of value) {
    if (isRecord(item) && typeof item.filename === 'string' && typeof item.data === 'string') {
      files.push({ filename: item.filename, data: item.data });
    } else {
      logger.warn('reference_file_skipped', { reason: 'expected { filename, data }' });
    }
  }
  return files;
}
