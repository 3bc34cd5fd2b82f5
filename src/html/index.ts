/**
 * HTML builder core
 *
 * - Element: universal node, builder API and renderer
 * - GatedElement: containers restricted to a closed set of child kinds
 * - Document: <html> root with <head> and <body>
 *
 * @since 2026-10-19
 */

export { Element, element, text } from './Element.js';
export {
  GatedElement,
  head,
  table,
  row,
  HEAD_CHILDREN,
  TABLE_CHILDREN,
  ROW_CHILDREN,
} from './GatedElement.js';
export type { AcceptedChild, Head, Table, Row } from './GatedElement.js';
export { Document, body } from './Document.js';
export { StringSink } from './StringSink.js';
export { CompositionError } from './errors.js';
export { INDENT_WIDTH, DOCTYPE, resolveRenderOptions } from './config.js';
export type { ResolvedRenderOptions } from './config.js';
export type {
  AttributeValue,
  ElementOptions,
  GenericKind,
  HeadChildKind,
  Renderable,
  RenderOptions,
  RenderSink,
  RowChildKind,
  TableChildKind,
  TextKind,
} from './types.js';
