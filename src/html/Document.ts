/**
 * Document - the <html> root with its mandatory <head> and <body>
 *
 * Both containers are created up front, in that order, so a document can
 * never be rendered without them. The root is sealed once both are in, so
 * even through `head.parent` it takes no third child: content goes into
 * `head` or `body` (`append` is a shortcut for the body).
 *
 * @since 2026-10-19
 */

import { DOCTYPE, resolveRenderOptions } from './config.js';
import { Element } from './Element.js';
import { head } from './GatedElement.js';
import { StringSink } from './StringSink.js';
import type { Head } from './GatedElement.js';
import type { RenderOptions, RenderSink } from './types.js';

/** <body> */
export function body(): Element<'body'> {
  return new Element('body', 'body');
}

export class Document {
  readonly head: Head;
  readonly body: Element<'body'>;
  private readonly root: Element<'html'>;

  constructor(title?: string) {
    this.head = head();
    this.body = body();
    this.root = new Element('html', 'html').append(this.head).append(this.body).seal();

    if (title !== undefined) {
      this.head.append(new Element('title', 'title', title));
    }
  }

  /** Set the lang attribute of <html> */
  lang(value: string): this {
    this.root.setAttribute('lang', value);
    return this;
  }

  /** Append to <body> */
  append(child: Element | string): this {
    this.body.append(child);
    return this;
  }

  render(sink: RenderSink, options: RenderOptions = {}): void {
    // Validate before anything reaches the sink
    resolveRenderOptions(options);
    sink.write(DOCTYPE + '\n');
    this.root.render(sink, 0, options);
  }

  renderToString(options: RenderOptions = {}): string {
    const sink = new StringSink();
    this.render(sink, options);
    return sink.toString();
  }

  toString(): string {
    return this.renderToString();
  }
}
