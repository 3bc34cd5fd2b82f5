/**
 * GatedElement - a container that only accepts a closed set of child kinds
 *
 * The accepted kinds are part of the static type, so appending anything
 * else is a compile error. At run time each child must also have the tag
 * its kind stands for, and kinds that are containers themselves must be
 * real GatedElements, so an element built with a borrowed kind is refused.
 */

import { Element } from './Element.js';
import { CompositionError } from './errors.js';
import type { ElementOptions, HeadChildKind, RowChildKind, TableChildKind } from './types.js';

/**
 * What a container expects from a child of a given kind
 */
export interface AcceptedChild {
  /** Tag the child must render */
  tagName: string;

  /** The child must always render a closing tag */
  forceClosingTag?: boolean;

  /** The child must be a GatedElement itself */
  gated?: boolean;
}

export class GatedElement<K extends string, C extends string> extends Element<K> {
  private readonly accepted: ReadonlyMap<string, AcceptedChild>;

  constructor(
    kind: K,
    tagName: string,
    accepts: Record<C, AcceptedChild>,
    options: ElementOptions = {}
  ) {
    super(kind, tagName, '', options);
    this.accepted = new Map<string, AcceptedChild>(Object.entries(accepts));
  }

  /** Kinds this container takes, in declaration order */
  get acceptedKinds(): string[] {
    return [...this.accepted.keys()];
  }

  append(child: Element<C>): this {
    const rule = child instanceof Element ? this.accepted.get(child.kind) : undefined;
    if (!(child instanceof Element) || rule === undefined) {
      const rejected = child instanceof Element ? child.kind : typeof child;
      throw new CompositionError(
        `<${this.tagName}> only accepts ${this.acceptedKinds.join(', ')} (got ${rejected})`,
        'append',
        { parent: this.kind, child: rejected, accepted: this.acceptedKinds }
      );
    }

    const forged =
      child.tagName !== rule.tagName ||
      (rule.forceClosingTag === true && !child.forceClosingTag) ||
      (rule.gated === true && !(child instanceof GatedElement));
    if (forged) {
      throw new CompositionError(
        `<${this.tagName}> expects ${child.kind} to be a <${rule.tagName}> from its factory (got <${child.tagName}>)`,
        'append',
        { parent: this.kind, child: child.kind, tagName: child.tagName }
      );
    }
    return this.attach(child);
  }
}

export type Head = GatedElement<'head', HeadChildKind>;
export type Table = GatedElement<'table', TableChildKind>;
export type Row = GatedElement<'row', RowChildKind>;

export const HEAD_CHILDREN: Readonly<Record<HeadChildKind, AcceptedChild>> = {
  title: { tagName: 'title' },
  style: { tagName: 'style' },
  script: { tagName: 'script' },
  meta: { tagName: 'meta' },
  link: { tagName: 'link' },
  base: { tagName: 'base' },
};

export const TABLE_CHILDREN: Readonly<Record<TableChildKind, AcceptedChild>> = {
  row: { tagName: 'tr', gated: true },
};

export const ROW_CHILDREN: Readonly<Record<RowChildKind, AcceptedChild>> = {
  cell: { tagName: 'td', forceClosingTag: true },
  'header-cell': { tagName: 'th', forceClosingTag: true },
};

/** <head>: title, style, script, meta, link and base only */
export function head(): Head {
  return new GatedElement<'head', HeadChildKind>('head', 'head', HEAD_CHILDREN);
}

/** <table>: rows only */
export function table(): Table {
  return new GatedElement<'table', TableChildKind>('table', 'table', TABLE_CHILDREN);
}

/** <tr>: td and th cells only */
export function row(): Row {
  return new GatedElement<'row', RowChildKind>('row', 'tr', ROW_CHILDREN);
}
