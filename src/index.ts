/**
 * fluent-html-builder
 *
 * Build HTML as a tree of chained calls and render it to indented markup.
 *
 * ## API:
 * - Element, element, text - the universal node and its builder/renderer
 * - Document - <html> root with mandatory <head> and <body>
 * - head, table, row - containers restricted to specific child kinds
 * - title, paragraph, cell, input, ... - element presets
 * - writeHtmlFile - render and write to disk, skipping unchanged files
 */

// Core: node model, renderer, gated containers
export * from './html/index.js';

// Element presets
export * from './elements/index.js';

// File output
export * from './io/index.js';
