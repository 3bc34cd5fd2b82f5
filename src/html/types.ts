/**
 * Types for the HTML builder
 *
 * - Element kinds: flavor tags used to gate composition
 * - RenderSink / RenderOptions: where and how a tree is serialized
 *
 * @since 2026-10-19
 */

/**
 * Anything text can be written to while rendering.
 * A Node.js Writable stream satisfies this interface.
 */
export interface RenderSink {
  write(chunk: string): unknown;
}

/**
 * Options for rendering
 */
export interface RenderOptions {
  /** Spaces added per nesting level (defaults to INDENT_WIDTH) */
  indentWidth?: number;
}

/**
 * Something that renders to a complete string (Element, Document)
 */
export interface Renderable {
  renderToString(options?: RenderOptions): string;
}

/**
 * Attribute values: strings are stored as-is, numbers by their decimal form
 */
export type AttributeValue = string | number;

/**
 * Options accepted when constructing an element
 */
export interface ElementOptions {
  /** Always render a closing tag, even when empty (<td></td>) */
  forceClosingTag?: boolean;
}

/** Kinds accepted by <head> */
export type HeadChildKind = 'title' | 'style' | 'script' | 'meta' | 'link' | 'base';

/** Kinds accepted by <table> */
export type TableChildKind = 'row';

/** Kinds accepted by <tr> */
export type RowChildKind = 'cell' | 'header-cell';

/** Kind of anonymous text leaves */
export type TextKind = 'text';

/** Kind of elements built with the generic element() factory */
export type GenericKind = 'element';
