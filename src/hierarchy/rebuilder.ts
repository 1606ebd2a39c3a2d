/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { scopedLogger } from '../common/console-logger';
import { resolveHierarchyOptions } from '../common/config';
import { IdentityCollisionError, OrphanError, StructuralError } from '../common/errors';
import { appendChild, createNode, descendants } from '../parser/tree';
import type { TreeNode } from '../parser/types';
import type { HierarchyInput } from './linearizer';

/**
 * Re-nest a flat sequence produced by flatten(). Nodes are moved in place.
 *
 * A node whose `parentAttr` resolves is appended to that parent, in sequence order. A
 * `matchTag` node without `parentAttr` is top-level and goes into a single synthetic
 * `rootTag` container. A node whose `parentAttr` does not resolve is an orphan: it is
 * dropped (logged) by default, or raises OrphanError with `orphans: 'error'`.
 * Anything else (e.g. a pruned root of another tag) is not part of the result.
 *
 * Identities are looked up on every sequence member and on every `matchTag` element inside one.
 */
export function rebuild(nodes: TreeNode[], options: HierarchyInput, logger?: Logger): TreeNode {
  const opts = resolveHierarchyOptions(options);
  const log = scopedLogger(logger, 'hierarchy');
  const { matchTag, idAttr, parentAttr } = opts;

  const byId = new Map<string, TreeNode>();
  const index = (node: TreeNode) => {
    const id = node.attributes[idAttr];
    if (!id) return;
    const known = byId.get(id);
    if (known && known !== node && opts.duplicateIds === 'error') throw new IdentityCollisionError(id);
    byId.set(id, node);
  };
  for (const node of nodes) {
    for (const inner of descendants(node)) {
      if (inner === node || inner.tag === matchTag) index(inner);
    }
  }

  let root: TreeNode | undefined;
  let orphans = 0;
  for (const node of nodes) {
    const parentId = node.attributes[parentAttr];
    if (parentId) {
      const parent = byId.get(parentId);
      if (parent) {
        appendChild(parent, node);
      } else if (opts.orphans === 'error') {
        throw new OrphanError(parentId);
      } else {
        orphans++;
        log.warn(`dropping <${node.tag}>: parent "${parentId}" not found`);
      }
    } else if (node.tag === matchTag) {
      if (!root) root = createNode(opts.rootTag);
      appendChild(root, node);
    }
  }

  if (!root) throw new StructuralError(`No top-level <${matchTag}> element found`);
  if (orphans > 0) log.info(`${orphans} orphaned element(s) dropped`);
  return root;
}
