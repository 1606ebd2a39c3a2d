/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { randomBytes } from 'crypto';
import { describe, it, expect, vi } from 'vitest';
import { flatten, synthesizeId, SYNTHESIZED_ID_LENGTH } from './linearizer';
import { IdentityCollisionError } from '../common/errors';
import { parseXml } from '../parser/xml-parser';
import { textOf } from '../parser/tree';
import type { TreeNode } from '../parser/types';
import { quietLogger } from '../test/helpers';

vi.mock('crypto', async (importOriginal) => {
  const actual = await importOriginal<typeof import('crypto')>();
  return { ...actual, randomBytes: vi.fn(actual.randomBytes) };
});

const PRODUCT = `
<Product id="12345">
  <Name>Sample Product</Name>
  <Price>30.00</Price>
  <Product id="67890"><Name>Another</Name></Product>
  <Product id="54321"><Name>Third</Name></Product>
</Product>`;

const byName = (nodes: TreeNode[], name: string) => nodes.find((n) => textOf(n, 'Name') === name);

describe('flatten', () => {
  it('detaches self-nested children and links them to their parent', () => {
    const { nodes, assignedIds } = flatten(parseXml(PRODUCT), { matchTag: 'Product' }, quietLogger);
    expect(nodes).toHaveLength(3);
    expect(nodes[0].attributes).toEqual({ id: '12345' });
    expect(nodes[0].children.map((c) => c.tag)).toEqual(['Name', 'Price']);
    expect(nodes.slice(1).map((n) => n.attributes)).toEqual([
      { id: '67890', parent_id: '12345' },
      { id: '54321', parent_id: '12345' },
    ]);
    expect(nodes.every((n) => n.parent === undefined)).toBe(true);
    expect(assignedIds.size).toBe(0);
  });

  it('leaves the input tree untouched', () => {
    const root = parseXml(PRODUCT);
    flatten(root, { matchTag: 'Product' }, quietLogger);
    expect(root.children.map((c) => c.tag)).toEqual(['Name', 'Price', 'Product', 'Product']);
  });

  it('emits deeper levels before the element that contains them', () => {
    const root = parseXml(
      '<Product><Name>A</Name><Product><Name>B</Name><Product><Name>C</Name></Product></Product></Product>'
    );
    const { nodes, assignedIds } = flatten(root, { matchTag: 'Product' }, quietLogger);
    expect(nodes.map((n) => textOf(n, 'Name'))).toEqual(['A', 'C', 'B']);

    const a = byName(nodes, 'A');
    const b = byName(nodes, 'B');
    const c = byName(nodes, 'C');
    expect(a?.attributes.id).toHaveLength(SYNTHESIZED_ID_LENGTH);
    expect(a?.attributes.parent_id).toBeUndefined();
    expect(b?.attributes.parent_id).toBe(a?.attributes.id);
    expect(c?.attributes.parent_id).toBe(b?.attributes.id);
    expect(new Set([a, b, c].map((n) => n?.attributes.id)).size).toBe(3);

    expect(assignedIds.size).toBe(3);
    expect(assignedIds.get(root)).toBe(a?.attributes.id);
    expect(root.attributes.id).toBeUndefined();
  });

  it('writes synthesized ids back only when annotateSource is set', () => {
    const root = parseXml('<Product><Product/></Product>');
    const first = flatten(root, { matchTag: 'Product', annotateSource: true }, quietLogger);
    expect(root.attributes.id).toBe(first.nodes[0].attributes.id);
    expect(root.children[0].attributes.id).toBe(first.nodes[1].attributes.id);

    const second = flatten(root, { matchTag: 'Product' }, quietLogger);
    expect(second.assignedIds.size).toBe(0);
    expect(second.nodes.map((n) => n.attributes)).toEqual(first.nodes.map((n) => n.attributes));
  });

  it('treats an empty id as missing', () => {
    const { nodes, assignedIds } = flatten(parseXml('<Product id=""/>'), { matchTag: 'Product' }, quietLogger);
    expect(nodes[0].attributes.id).toHaveLength(SYNTHESIZED_ID_LENGTH);
    expect(assignedIds.size).toBe(1);
  });

  it('keeps other tags in place, including matchTag elements below them', () => {
    const root = parseXml(
      '<Product id="1"><Details><Product id="2"><Name>inner</Name></Product></Details><Product id="3"/></Product>'
    );
    const { nodes } = flatten(root, { matchTag: 'Product' }, quietLogger);
    expect(nodes).toHaveLength(2);
    expect(nodes[0].children.map((c) => c.tag)).toEqual(['Details']);
    const inner = nodes[0].children[0].children[0];
    expect(inner.attributes).toEqual({ id: '2', parent_id: '1' });
    expect(textOf(inner, 'Name')).toBe('inner');
    expect(nodes[1].attributes).toEqual({ id: '3', parent_id: '1' });
  });

  it('emits the root first even when it is not the match tag', () => {
    const root = parseXml('<catalog><Product id="1"><Product id="2"/></Product></catalog>');
    const { nodes } = flatten(root, { matchTag: 'Product' }, quietLogger);
    expect(nodes.map((n) => n.tag)).toEqual(['catalog', 'Product']);
    expect(nodes[0].children[0].children).toEqual([]);
    expect(nodes[1].attributes).toEqual({ id: '2', parent_id: '1' });
  });

  it('honours custom marker attributes', () => {
    const root = parseXml('<Node key="r"><Node key="c"/></Node>');
    const { nodes } = flatten(root, { matchTag: 'Node', idAttr: 'key', parentAttr: 'up' }, quietLogger);
    expect(nodes[1].attributes).toEqual({ key: 'c', up: 'r' });
  });

  it('drops a stale parent marker on the outermost element', () => {
    const { nodes } = flatten(parseXml('<Product id="1" parent_id="9"/>'), { matchTag: 'Product' }, quietLogger);
    expect(nodes[0].attributes).toEqual({ id: '1' });
  });

  it('rejects duplicate ids when asked to', () => {
    const root = parseXml('<Product id="1"><Product id="1"/></Product>');
    expect(flatten(root, { matchTag: 'Product' }, quietLogger).nodes).toHaveLength(2);
    expect(() => flatten(root, { matchTag: 'Product', duplicateIds: 'error' }, quietLogger)).toThrow(
      IdentityCollisionError
    );
  });
});

describe('synthesizeId', () => {
  it('returns fixed-length hex tokens', () => {
    expect(synthesizeId()).toMatch(/^[0-9a-f]{8}$/);
  });
});

describe('synthesized id collisions', () => {
  it('draws again until the token is free', () => {
    const token = (hex: string) => () => Buffer.from(hex, 'hex');
    vi.mocked(randomBytes)
      .mockClear()
      .mockImplementationOnce(token('0000abcd'))
      .mockImplementationOnce(token('0000abcd'))
      .mockImplementationOnce(token('00001234'))
      .mockImplementationOnce(token('00001234'))
      .mockImplementationOnce(token('00005678'));

    const root = parseXml('<p id="0000abcd"><p/><p/></p>');
    const { nodes, assignedIds } = flatten(root, { matchTag: 'p' }, quietLogger);

    expect(nodes.map((n) => n.attributes.id)).toEqual(['0000abcd', '00001234', '00005678']);
    expect([...assignedIds.values()]).toEqual(['00001234', '00005678']);
    expect(randomBytes).toHaveBeenCalledTimes(5);
  });
});
