import type { RenderOptions } from './types.js';

/** Spaces per nesting level */
export const INDENT_WIDTH = 2;

/** Emitted by Document before the root element */
export const DOCTYPE = '<!DOCTYPE html>';

export interface ResolvedRenderOptions {
  indentWidth: number;
}

/**
 * Fill in defaults and reject widths that cannot be turned into spaces
 */
export function resolveRenderOptions(options: RenderOptions = {}): ResolvedRenderOptions {
  const indentWidth = options.indentWidth ?? INDENT_WIDTH;
  if (!Number.isSafeInteger(indentWidth) || indentWidth < 0) {
    throw new RangeError(`indentWidth must be a non-negative integer, got ${indentWidth}`);
  }
  return { indentWidth };
}
