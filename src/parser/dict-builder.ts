/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { TreeNode } from './types';

export const DICT_ATTRIBUTES_KEY = '@attributes';
export const DICT_TEXT_KEY = '@text';

export interface DictEntry {
  [DICT_ATTRIBUTES_KEY]?: Record<string, string>;
  [DICT_TEXT_KEY]?: string;
  [tag: string]: DictEntry | DictEntry[] | Record<string, string> | string | undefined;
}

/**
 * Dictionary form of a node:
 * - attributes (if any) under '@attributes', non-empty text under '@text'.
 * - one key per child tag; a tag seen more than once becomes an array in document order.
 */
export function toDict(node: TreeNode): DictEntry {
  const entry: DictEntry = {};
  if (Object.keys(node.attributes).length > 0) entry[DICT_ATTRIBUTES_KEY] = { ...node.attributes };
  if (node.text) entry[DICT_TEXT_KEY] = node.text;

  const byTag = new Map<string, DictEntry[]>();
  for (const child of node.children) {
    const list = byTag.get(child.tag) ?? [];
    list.push(toDict(child));
    byTag.set(child.tag, list);
  }
  for (const [tag, list] of byTag) {
    // defineProperty, so a child named __proto__ stays an own key
    Object.defineProperty(entry, tag, {
      value: list.length > 1 ? list : list[0],
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return entry;
}
