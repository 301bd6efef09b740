/**
 * @fileoverview Writes generated pages to disk.
 *
 * Each session's current page is kept at `{baseDir}/{sessionId}.html` so it
 * can be opened directly from the file path returned to the client.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import config from '../../config.js';
import { ValidationError } from '../../utils/errors.js';

const SESSION_ID_PATTERN = /^[A-Za-z0-9-]+$/;

/**
 * Page file writer.
 *
 * @example
 * ```ts
 * const writer = new PageWriter('/tmp/pages');
 * const { filePath } = await writer.write(sessionId, '<html>...</html>');
 * const html = await writer.read(sessionId);
 * ```
 */
export class PageWriter {
  constructor(private readonly baseDir: string = config.output.dir) {}

  private pathFor(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new ValidationError('Invalid session id', { sessionId });
    }
    return join(this.baseDir, `${sessionId}.html`);
  }

  /**
   * Write (or overwrite) the page for a session.
   */
  async write(sessionId: string, html: string): Promise<{ filePath: string }> {
    const filePath = this.pathFor(sessionId);
    await mkdir(this.baseDir, { recursive: true });
    await writeFile(filePath, html, 'utf-8');
    return { filePath };
  }

  /**
   * Read a session's page, or null when none was written.
   */
  async read(sessionId: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(sessionId), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}

let writer: PageWriter | null = null;

export function getPageWriter(): PageWriter {
  if (!writer) {
    writer = new PageWriter();
  }
  return writer;
}

/**
 * Replace the shared writer (tests) or clear it.
 */
export function setPageWriter(next: PageWriter | null): void {
  writer = next;
}
