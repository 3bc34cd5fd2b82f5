/**
 * Text-level and block elements
 */

import { Element } from '../html/Element.js';

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export function paragraph(content = ''): Element<'paragraph'> {
  return new Element('paragraph', 'p', content);
}

/** <h1> … <h6> */
export function heading(level: HeadingLevel, content: string): Element<'heading'> {
  return new Element('heading', `h${level}`, content);
}

export function bold(content: string): Element<'bold'> {
  return new Element('bold', 'b', content);
}

export function italic(content: string): Element<'italic'> {
  return new Element('italic', 'i', content);
}

export function strong(content: string): Element<'strong'> {
  return new Element('strong', 'strong', content);
}

export function span(content = ''): Element<'span'> {
  return new Element('span', 'span', content);
}

export function div(content = ''): Element<'div'> {
  return new Element('div', 'div', content);
}

export function mark(content: string): Element<'mark'> {
  return new Element('mark', 'mark', content);
}

export function time(content: string, datetime: string): Element<'time'> {
  return new Element('time', 'time', content).setAttribute('datetime', datetime);
}

/** <br/> */
export function lineBreak(): Element<'line-break'> {
  return new Element('line-break', 'br');
}

/** <a href="…"> */
export function anchor(content: string, href: string): Element<'anchor'> {
  return new Element('anchor', 'a', content).setAttribute('href', href);
}

/**
 * <img>; width and height are left out when 0
 */
export function image(src: string, alt: string, width = 0, height = 0): Element<'image'> {
  const node = new Element('image', 'img').setAttribute('src', src).setAttribute('alt', alt);
  if (width > 0) {
    node.setAttribute('width', width);
  }
  if (height > 0) {
    node.setAttribute('height', height);
  }
  return node;
}

/** <ol> when ordered, <ul> otherwise */
export function list(ordered = false): Element<'list'> {
  return new Element('list', ordered ? 'ol' : 'ul');
}

export function listItem(content = ''): Element<'list-item'> {
  return new Element('list-item', 'li', content);
}
