/**
 * @fileoverview Uploaded reference files.
 *
 * Files arrive as `{ filename, data }` where `data` is base64 or a data URL.
 * Text-like files are quoted into the prompt, images are summarized there and
 * also kept as data URLs so `{{image: label}}` placeholders can use them.
 */

import path from 'path';
import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'reference' });

export interface ReferenceFile {
  filename: string;
  /** Base64 content, optionally as a `data:<mime>;base64,` URL */
  data: string;
}

const TEXT_EXTENSIONS = new Set(['.txt', '.md']);
const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif']);
const WORD_EXTENSIONS = new Set(['.doc', '.docx']);

const TEXT_LIMIT = 2000;
const PDF_TEXT_LIMIT = 3000;
const IMAGE_BASE64_PREVIEW = 500;

const DATA_URL_PREFIX = /^data:[^;,]*(?:;[^;,]*)*;base64,/i;
const UNPRINTABLE = /[^\p{L}\p{M}\p{N}\p{P}\p{S} \n\t]/gu;

/**
 * Reduce an uploaded filename to a safe basename: ASCII letters, digits,
 * `.`, `_` and `-`, whitespace turned into `_`, no leading dots.
 */
export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  return base
    .normalize('NFKD')
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

/** Decode base64 or data-URL content. */
export function decodeFileData(data: string): Buffer {
  return Buffer.from(data.replace(DATA_URL_PREFIX, ''), 'base64');
}

function extensionOf(filename: string): string {
  return path.extname(filename).toLowerCase();
}

/** Printable text out of a PDF's raw bytes, whitespace collapsed. */
export function extractPdfText(bytes: Buffer): string {
  return bytes
    .toString('utf-8')
    .replace(/\uFFFD/g, '')
    .replace(UNPRINTABLE, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ')
    .slice(0, PDF_TEXT_LIMIT);
}

function describeFile(index: number, filename: string, bytes: Buffer): string {
  const extension = extensionOf(filename);

  if (TEXT_EXTENSIONS.has(extension)) {
    return `[File ${index}: ${filename}]\n${bytes.toString('utf-8').replace(/\uFFFD/g, '').slice(0, TEXT_LIMIT)}`;
  }

  if (extension === '.pdf') {
    const text = extractPdfText(bytes);
    if (text) {
      return `[File ${index}: PDF '${filename}']\nRESUME/DOCUMENT CONTENT:\n${text}`;
    }
    return (
      `[File ${index}: PDF '${filename}'] - Resume/document uploaded. ` +
      'Please describe key details (name, email, phone, experience, skills) in the prompt.'
    );
  }

  if (IMAGE_EXTENSIONS.has(extension)) {
    const preview = bytes.toString('base64').slice(0, IMAGE_BASE64_PREVIEW);
    return (
      `[File ${index}: Image '${filename}' - ${bytes.length} bytes]\n` +
      `Image data (base64): ${preview}...\n` +
      'Use this profile/product image in the website design. Include it as a visual element.'
    );
  }

  if (WORD_EXTENSIONS.has(extension)) {
    return `[File ${index}: Word document '${filename}'] - Document uploaded. Please describe its content in the prompt.`;
  }

  return `[File ${index}: '${filename}'] - File uploaded. Please describe its content in the prompt.`;
}

/**
 * Prompt context for uploaded reference files, numbered from 1 by upload
 * position. Returns null when there is nothing usable.
 */
export function processReferenceFiles(files: ReferenceFile[] | undefined): string | null {
  if (!files || files.length === 0) {
    return null;
  }

  const entries: string[] = [];
  files.forEach((file, position) => {
    const filename = sanitizeFilename(file.filename);
    if (!filename) return;
    entries.push(describeFile(position + 1, filename, decodeFileData(file.data)));
  });

  logger.debug('reference_files_processed', { received: files.length, used: entries.length });
  return entries.length > 0 ? entries.join('\n') : null;
}

/**
 * Data URLs for the image uploads, keyed by placeholder label.
 *
 * The image at upload position n is stored as `image-<n>`, except that the
 * first upload becomes `profile` when no profile image exists yet.
 */
export function collectUploadedImages(
  files: ReferenceFile[] | undefined,
  existing: Record<string, string> = {}
): Record<string, string> {
  const images: Record<string, string> = { ...existing };
  if (!files) {
    return images;
  }

  files.forEach((file, position) => {
    const filename = sanitizeFilename(file.filename);
    const extension = extensionOf(filename);
    if (!filename || !IMAGE_EXTENSIONS.has(extension)) return;

    const mime = extension === '.jpg' || extension === '.jpeg' ? 'image/jpeg' : `image/${extension.slice(1)}`;
    const base64 = decodeFileData(file.data).toString('base64');
    const index = position + 1;
    const label = index === 1 && !('profile' in images) ? 'profile' : `image-${index}`;
    images[label] = `data:${mime};base64,${base64}`;
  });

  return images;
}
