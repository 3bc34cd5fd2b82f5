/**
 * Types for writing rendered HTML to disk
 */

import type { RenderOptions } from '../html/types.js';

/**
 * Options for writeHtmlFile
 */
export interface WriteHtmlOptions extends RenderOptions {
  /** Write even when the file already holds the same content */
  force?: boolean;

  /** Do not log written/skipped files */
  quiet?: boolean;
}

export interface WriteHtmlResult {
  /** Absolute path of the target file */
  file: string;

  /** Content hash of the rendered HTML */
  hash: string;

  /** Size of the rendered HTML in UTF-8 bytes */
  bytes: number;

  /** False when the file already had this content */
  written: boolean;
}
