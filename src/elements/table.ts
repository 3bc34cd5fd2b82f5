/**
 * Table cells
 *
 * <table> and <tr> themselves are gated containers, see html/GatedElement.
 * Cells always render a closing tag: an empty cell is <td></td>, never <td/>.
 */

import { Element } from '../html/Element.js';
import type { RowChildKind } from '../html/types.js';

export class Cell<K extends RowChildKind = RowChildKind> extends Element<K> {
  constructor(kind: K, tagName: 'td' | 'th', content = '') {
    super(kind, tagName, content, { forceClosingTag: true });
  }

  /** Ignored when 0 */
  rowSpan(rows: number): this {
    if (rows > 0) {
      this.setAttribute('rowspan', rows);
    }
    return this;
  }

  /** Ignored when 0 */
  colSpan(columns: number): this {
    if (columns > 0) {
      this.setAttribute('colspan', columns);
    }
    return this;
  }
}

/** <td> */
export function cell(content = ''): Cell<'cell'> {
  return new Cell('cell', 'td', content);
}

/** <th> */
export function headerCell(content = ''): Cell<'header-cell'> {
  return new Cell('header-cell', 'th', content);
}
