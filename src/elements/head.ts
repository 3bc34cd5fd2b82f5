/**
 * Elements accepted by <head>
 */

import { Element } from '../html/Element.js';

export function title(content: string): Element<'title'> {
  return new Element('title', 'title', content);
}

/** Inline CSS */
export function style(css: string): Element<'style'> {
  return new Element('style', 'style', css);
}

/**
 * <script>, either external (src) or inline (content)
 */
export function script(src?: string, content = ''): Element<'script'> {
  const node = new Element('script', 'script', content);
  if (src !== undefined) {
    node.setAttribute('src', src);
  }
  return node;
}

/**
 * <meta charset="…"> with one argument, <meta name="…" content="…"> with two
 */
export function meta(charset: string): Element<'meta'>;
export function meta(name: string, content: string): Element<'meta'>;
export function meta(nameOrCharset: string, content?: string): Element<'meta'> {
  const node = new Element('meta', 'meta');
  if (content === undefined) {
    return node.setAttribute('charset', nameOrCharset);
  }
  return node.setAttribute('name', nameOrCharset).setAttribute('content', content);
}

/**
 * <link> to an external resource (stylesheet, icon, …)
 */
export function rel(relation: string, href: string, type?: string): Element<'link'> {
  const node = new Element('link', 'link').setAttribute('rel', relation).setAttribute('href', href);
  if (type !== undefined) {
    node.setAttribute('type', type);
  }
  return node;
}

/**
 * <base>; content is optional and written inline
 */
export function base(href: string, target?: string, content = ''): Element<'base'> {
  const node = new Element('base', 'base', content).setAttribute('href', href);
  if (target !== undefined) {
    node.setAttribute('target', target);
  }
  return node;
}
