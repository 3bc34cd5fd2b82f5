/**
 * Semantic sectioning elements
 */

import { Element } from '../html/Element.js';

export function header(): Element<'header'> {
  return new Element('header', 'header');
}

export function footer(): Element<'footer'> {
  return new Element('footer', 'footer');
}

export function section(): Element<'section'> {
  return new Element('section', 'section');
}

export function article(): Element<'article'> {
  return new Element('article', 'article');
}

export function nav(): Element<'nav'> {
  return new Element('nav', 'nav');
}

export function aside(): Element<'aside'> {
  return new Element('aside', 'aside');
}

export function main(): Element<'main'> {
  return new Element('main', 'main');
}

export function figure(): Element<'figure'> {
  return new Element('figure', 'figure');
}

export function figcaption(content: string): Element<'figcaption'> {
  return new Element('figcaption', 'figcaption', content);
}

/**
 * <details>, collapsible section to use with summary().
 *
 * @param open - value of the open attribute; pass '' for a bare `open`
 */
export function details(open?: string): Element<'details'> {
  const node = new Element('details', 'details');
  if (open !== undefined) {
    node.setAttribute('open', open);
  }
  return node;
}

/** Visible heading of a <details> */
export function summary(content: string): Element<'summary'> {
  return new Element('summary', 'summary', content);
}
