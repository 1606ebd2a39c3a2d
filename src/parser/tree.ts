/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { StructuralError } from '../common/errors';
import type { TreeNode } from './types';

export function createNode(
  tag: string,
  attributes: Record<string, string> = {},
  text?: string
): TreeNode {
  const node: TreeNode = { tag, attributes: { ...attributes }, children: [], parent: undefined };
  if (text !== undefined && text !== '') node.text = text;
  return node;
}

/**
 * Remove a node from its parent's child list. No-op for roots.
 */
export function detach(node: TreeNode): TreeNode {
  const parent = node.parent;
  if (parent) {
    const idx = parent.children.indexOf(node);
    if (idx >= 0) parent.children.splice(idx, 1);
    node.parent = undefined;
  }
  return node;
}

/**
 * Append `child` to `parent`, moving it out of any list it currently sits in.
 */
export function appendChild(parent: TreeNode, child: TreeNode): TreeNode {
  for (let p: TreeNode | undefined = parent; p; p = p.parent) {
    if (p === child) throw new StructuralError(`Cannot append <${child.tag}> below itself`);
  }
  detach(child);
  parent.children.push(child);
  child.parent = parent;
  return child;
}

/** Same tag, attributes and text; no children, no parent. */
export function cloneShallow(node: TreeNode): TreeNode {
  return createNode(node.tag, node.attributes, node.text);
}

export function findChild(node: TreeNode, tag: string): TreeNode | undefined {
  return node.children.find((c) => c.tag === tag);
}

export function findChildren(node: TreeNode, tag: string): TreeNode[] {
  return node.children.filter((c) => c.tag === tag);
}

/** Text of the first direct child with the given tag. */
export function textOf(node: TreeNode, tag: string): string | undefined {
  return findChild(node, tag)?.text;
}

/**
 * Pre-order walk (node itself first). Iterative so deep documents do not exhaust the stack.
 */
export function* descendants(node: TreeNode): Generator<TreeNode> {
  const stack: TreeNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    yield current;
    for (let i = current.children.length - 1; i >= 0; i--) stack.push(current.children[i]);
  }
}

/** Number of nodes in the subtree rooted at `node`. */
export function subtreeSize(node: TreeNode): number {
  let count = 0;
  for (const _ of descendants(node)) count++;
  return count;
}
