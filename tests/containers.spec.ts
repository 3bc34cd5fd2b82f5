/**
 * Tests for type-gated containers (<head>, <table>, <tr>)
 */
import { describe, it, expect, expectTypeOf } from 'vitest';
import { Element } from '../src/html/Element.js';
import { CompositionError } from '../src/html/errors.js';
import { head, row, table } from '../src/html/GatedElement.js';
import type { Head, Row, Table } from '../src/html/GatedElement.js';
import type { HeadChildKind, RowChildKind, TableChildKind } from '../src/html/types.js';
import { base, meta, rel, script, style, title } from '../src/elements/head.js';
import { cell, headerCell } from '../src/elements/table.js';
import { paragraph } from '../src/elements/text.js';

describe('head', () => {
  it('accepts title, style, script, meta, link and base', () => {
    const node = head()
      .append(meta('utf-8'))
      .append(title('T'))
      .append(style('body {}'))
      .append(script('app.js'))
      .append(rel('icon', 'favicon.ico'))
      .append(base('/'));

    expect(node.renderToString()).toBe(
      '<head>\n' +
        '  <meta charset="utf-8"/>\n' +
        '  <title>T</title>\n' +
        '  <style>body {}</style>\n' +
        '  <script src="app.js"/>\n' +
        '  <link href="favicon.ico" rel="icon"/>\n' +
        '  <base href="/"/>\n' +
        '</head>\n'
    );
  });

  it('restricts append to head children at compile time', () => {
    expectTypeOf<Parameters<Head['append']>[0]>().toEqualTypeOf<Element<HeadChildKind>>();
  });

  it('rejects other elements at run time', () => {
    const loose: Element = head();

    expect(() => loose.append(paragraph('x'))).toThrow(CompositionError);
  });

  it('rejects raw text at run time', () => {
    const loose: Element = head();

    expect(() => loose.append('text')).toThrow(
      '<head> only accepts title, style, script, meta, link, base (got string)'
    );
  });

  it('describes the rejected child', () => {
    const loose: Element = head();

    try {
      loose.append(paragraph('x'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CompositionError);
      if (error instanceof CompositionError) {
        expect(error.operation).toBe('append');
        expect(error.context).toEqual({
          parent: 'head',
          child: 'paragraph',
          accepted: ['title', 'style', 'script', 'meta', 'link', 'base'],
        });
      }
    }
  });

  it('leaves the container untouched after a rejection', () => {
    const node = head();
    const loose: Element = node;

    expect(() => loose.append(paragraph('x'))).toThrow(CompositionError);
    expect(node.childNodes).toHaveLength(0);
    expect(node.renderToString()).toBe('<head/>\n');
  });
});

describe('table and row', () => {
  it('renders rows of header and data cells', () => {
    const grid = table()
      .append(row().append(headerCell('Name')).append(headerCell('Score')))
      .append(row().append(cell('Ada')).append(cell()));

    expect(grid.renderToString()).toBe(
      '<table>\n' +
        '  <tr>\n' +
        '    <th>Name</th>\n' +
        '    <th>Score</th>\n' +
        '  </tr>\n' +
        '  <tr>\n' +
        '    <td>Ada</td>\n' +
        '    <td></td>\n' +
        '  </tr>\n' +
        '</table>\n'
    );
  });

  it('self-closes empty tables and rows', () => {
    expect(table().renderToString()).toBe('<table/>\n');
    expect(table().append(row()).renderToString()).toBe('<table>\n  <tr/>\n</table>\n');
  });

  it('restricts append at compile time', () => {
    expectTypeOf<Parameters<Table['append']>[0]>().toEqualTypeOf<Element<TableChildKind>>();
    expectTypeOf<Parameters<Row['append']>[0]>().toEqualTypeOf<Element<RowChildKind>>();
  });

  it('rejects cells placed directly in a table', () => {
    const loose: Element = table();

    expect(() => loose.append(cell('x'))).toThrow(
      '<table> only accepts row (got cell)'
    );
  });

  it('rejects anything but cells in a row', () => {
    const loose: Element = row();

    expect(() => loose.append(paragraph('x'))).toThrow(
      '<tr> only accepts cell, header-cell (got paragraph)'
    );
  });

  it('rejects a plain element posing as a row', () => {
    const fake = new Element('row', 'tr').append(paragraph('x'));

    expect(() => table().append(fake)).toThrow(
      '<table> expects row to be a <tr> from its factory (got <tr>)'
    );
  });

  it('rejects a row kind with the wrong tag', () => {
    const grid = table();

    expect(() => grid.append(new Element('row', 'div'))).toThrow(CompositionError);
    expect(grid.renderToString()).toBe('<table/>\n');
  });

  it('rejects cells that would self-close or carry the wrong tag', () => {
    expect(() => row().append(new Element('cell', 'td'))).toThrow(CompositionError);
    expect(() => row().append(new Element('cell', 'th', '', { forceClosingTag: true }))).toThrow(
      '<tr> expects cell to be a <td> from its factory (got <th>)'
    );
  });

  it('rejects head children whose tag does not match their kind', () => {
    expect(() => head().append(new Element('title', 'div', 'x'))).toThrow(CompositionError);
  });

  it('lists the accepted kinds', () => {
    expect(row().acceptedKinds).toEqual(['cell', 'header-cell']);
    expect(table().acceptedKinds).toEqual(['row']);
  });

  it('spans cells across rows and columns, ignoring zero', () => {
    expect(cell('x').rowSpan(2).colSpan(0).renderToString()).toBe('<td rowspan="2">x</td>\n');
    expect(headerCell('h').colSpan(3).renderToString()).toBe('<th colspan="3">h</th>\n');
  });
});
