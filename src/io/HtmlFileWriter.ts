/**
 * HtmlFileWriter
 *
 * Renders an element tree or a document and writes it to disk.
 * A content hash of the rendered text is compared against the file
 * already there, so regenerating an unchanged page leaves it untouched.
 *
 * @since 2026-10-19
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Renderable, RenderOptions } from '../html/types.js';
import type { WriteHtmlOptions, WriteHtmlResult } from './types.js';

/**
 * Render `source` and write it to `filePath`, creating parent directories
 */
export async function writeHtmlFile(
  filePath: string,
  source: Renderable,
  options: WriteHtmlOptions = {}
): Promise<WriteHtmlResult> {
  const renderOptions: RenderOptions = { indentWidth: options.indentWidth };
  const html = source.renderToString(renderOptions);
  const hash = contentHash(html);
  const file = path.resolve(filePath);
  const bytes = Buffer.byteLength(html, 'utf8');

  if (!options.force) {
    const previous = await readIfExists(file);
    if (previous !== null && contentHash(previous) === hash) {
      if (!options.quiet) {
        console.log(`⏭️  Unchanged ${file}`);
      }
      return { file, hash, bytes, written: false };
    }
  }

  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, html, 'utf8');
  if (!options.quiet) {
    console.log(`📄 Wrote ${file} (${bytes} bytes)`);
  }
  return { file, hash, bytes, written: true };
}

/**
 * Hash used for change detection
 */
export function contentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
