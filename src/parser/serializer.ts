/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XMLBuilder } from 'fast-xml-parser';
import xmlFormat from 'xml-formatter';
import type { SerializeOptions, TreeNode } from './types';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const ATTR_PREFIX = '@_';
const TEXT_KEY = '#text';
const ATTRS_KEY = ':@';

/** fast-xml-parser "preserveOrder" shape: one single-key object per element or text run. */
type OrderedItem = { [key: string]: OrderedItem[] | Record<string, string> | string };

function toOrdered(node: TreeNode): OrderedItem {
  const children: OrderedItem[] = [];
  if (node.text !== undefined) children.push({ [TEXT_KEY]: node.text });
  for (const child of node.children) children.push(toOrdered(child));
  const item: OrderedItem = { [node.tag]: children };
  const attrs = Object.entries(node.attributes);
  if (attrs.length > 0) {
    item[ATTRS_KEY] = Object.fromEntries(attrs.map(([k, v]) => [ATTR_PREFIX + k, v]));
  }
  return item;
}

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  suppressEmptyNode: true,
  format: false,
});

/**
 * Serialize a subtree as an indented document. Text and attribute values are entity-escaped.
 */
export function serializeXml(node: TreeNode, options: SerializeOptions = {}): string {
  const compact: string = builder.build([toOrdered(node)]);
  const body = xmlFormat(compact, {
    indentation: options.indentation ?? '  ',
    collapseContent: true,
    lineSeparator: '\n',
  });
  return options.declaration === false ? `${body}\n` : `${XML_DECLARATION}\n${body}\n`;
}
