/**
 * Element - the universal node of the HTML tree
 *
 * One class covers every node: the <html> root, containers, void
 * elements, and anonymous text leaves (empty tag name). Builder calls
 * return the element itself so a whole tree reads as one expression:
 *
 *   element('div')
 *     .cls('card')
 *     .append(paragraph('Hello'))
 *     .renderToString();
 *
 * Attribute values and content are written verbatim. Callers must not
 * pass markup-significant characters (<, >, &, ") unless they mean it.
 *
 * @since 2026-10-19
 */

import { resolveRenderOptions } from './config.js';
import { CompositionError } from './errors.js';
import { StringSink } from './StringSink.js';
import type {
  AttributeValue,
  ElementOptions,
  GenericKind,
  RenderOptions,
  RenderSink,
  TextKind,
} from './types.js';

export class Element<K extends string = string> {
  readonly kind: K;
  readonly tagName: string;

  private readonly textContent: string;
  private readonly closeAlways: boolean;
  private readonly attributes = new Map<string, string>();
  private readonly children: Element[] = [];
  private owner: Element | null = null;
  private sealed = false;

  constructor(kind: K, tagName: string, content = '', options: ElementOptions = {}) {
    this.kind = kind;
    this.tagName = tagName;
    this.textContent = content;
    this.closeAlways = options.forceClosingTag ?? false;
  }

  /** Inline content, written right after the opening tag */
  get content(): string {
    return this.textContent;
  }

  get forceClosingTag(): boolean {
    return this.closeAlways;
  }

  /** Text leaves have no tag, no attributes and no children */
  get isText(): boolean {
    return this.tagName === '';
  }

  get childNodes(): readonly Element[] {
    return this.children;
  }

  /** The element this one was appended to (null for roots) */
  get parent(): Element | null {
    return this.owner;
  }

  getAttribute(name: string): string | undefined {
    return this.attributes.get(name);
  }

  /**
   * Attributes in render order: sorted by name, not by insertion
   */
  attributeEntries(): [string, string][] {
    return [...this.attributes].sort(([a], [b]) => compareCodePoints(a, b));
  }

  /**
   * Set (or overwrite) an attribute.
   * An empty value renders the name alone (boolean attributes like "checked").
   */
  setAttribute(name: string, value: AttributeValue): this {
    if (this.isText) {
      throw new CompositionError(
        `Text nodes cannot carry attributes (tried to set "${name}")`,
        'setAttribute',
        { attribute: name }
      );
    }
    this.attributes.set(name, typeof value === 'number' ? formatNumber(name, value) : value);
    return this;
  }

  id(value: string): this {
    return this.setAttribute('id', value);
  }

  cls(value: string): this {
    return this.setAttribute('class', value);
  }

  title(value: string): this {
    return this.setAttribute('title', value);
  }

  style(value: string): this {
    return this.setAttribute('style', value);
  }

  /**
   * Append a child element, or a string as an anonymous text leaf.
   * The child is owned by this element from now on.
   */
  append(child: Element | string): this {
    return this.attach(typeof child === 'string' ? text(child) : child);
  }

  /**
   * Refuse any further children. Attributes can still be set.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Serialize this element and its subtree into the sink
   */
  render(sink: RenderSink, indentLevel = 0, options: RenderOptions = {}): void {
    const { indentWidth } = resolveRenderOptions(options);
    this.renderNode(sink, indentLevel, indentWidth);
  }

  renderToString(options: RenderOptions = {}): string {
    const sink = new StringSink();
    this.render(sink, 0, options);
    return sink.toString();
  }

  toString(): string {
    return this.renderToString();
  }

  /**
   * Take ownership of a child, rejecting anything that would break the
   * single-parent tree.
   */
  protected attach(child: Element): this {
    if (this.isText) {
      throw new CompositionError('Text nodes cannot have children', 'append', {
        child: child.kind,
      });
    }
    if (this.sealed) {
      throw new CompositionError(
        `<${this.tagName}> takes no more children`,
        'append',
        { parent: this.kind, child: child.kind }
      );
    }
    if (child.owner !== null) {
      throw new CompositionError(
        `<${child.tagName || child.kind}> already belongs to <${child.owner.tagName}>`,
        'append',
        { parent: this.kind, child: child.kind }
      );
    }
    for (let node: Element | null = this; node !== null; node = node.owner) {
      if (node === child) {
        throw new CompositionError(
          `Appending <${child.tagName}> to <${this.tagName}> would create a cycle`,
          'append',
          { parent: this.kind, child: child.kind }
        );
      }
    }

    child.owner = this;
    this.children.push(child);
    return this;
  }

  private renderNode(sink: RenderSink, indent: number, indentWidth: number): void {
    this.renderOpen(sink, indent);
    this.renderContent(sink, indent, indentWidth);
    this.renderClose(sink, indent);
  }

  private renderOpen(sink: RenderSink, indent: number): void {
    if (this.isText) return;

    let open = ' '.repeat(indent) + '<' + this.tagName;
    for (const [name, value] of this.attributeEntries()) {
      open += value === '' ? ` ${name}` : ` ${name}="${value}"`;
    }

    if (this.textContent !== '' || this.closeAlways) {
      open += '>';
    } else if (this.children.length > 0) {
      open += '>\n';
    } else {
      open += '/>\n';
    }
    sink.write(open);
  }

  private renderContent(sink: RenderSink, indent: number, indentWidth: number): void {
    if (this.isText) {
      sink.write(' '.repeat(indent) + this.textContent + '\n');
      return;
    }

    sink.write(this.textContent);
    for (const child of this.children) {
      child.renderNode(sink, indent + indentWidth, indentWidth);
    }
  }

  private renderClose(sink: RenderSink, indent: number): void {
    if (this.isText) return;

    const hasChildren = this.children.length > 0;
    if (hasChildren) {
      sink.write(' '.repeat(indent));
    }
    if (this.textContent !== '' || hasChildren || this.closeAlways) {
      sink.write(`</${this.tagName}>\n`);
    }
  }
}

/**
 * Create a generic element
 */
export function element(
  tagName: string,
  content = '',
  options: ElementOptions = {}
): Element<GenericKind> {
  return new Element('element', tagName, content, options);
}

/**
 * Create an anonymous text leaf, rendered on its own indented line
 */
export function text(content: string): Element<TextKind> {
  return new Element('text', '', content);
}

function formatNumber(name: string, value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Attribute "${name}" expects a non-negative integer, got ${value}`);
  }
  return String(value);
}

/** Unicode code point order (same as UTF-8 byte order) */
function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}
