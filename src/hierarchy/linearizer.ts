/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { randomBytes } from 'crypto';

import type { Logger } from '../common/logger';
import { scopedLogger } from '../common/console-logger';
import { resolveHierarchyOptions } from '../common/config';
import type { HierarchyOptions } from '../common/config';
import { IdentityCollisionError } from '../common/errors';
import { appendChild, cloneShallow, descendants } from '../parser/tree';
import type { TreeNode } from '../parser/types';

export type HierarchyInput = Partial<HierarchyOptions> & { matchTag: string };

export interface FlattenResult {
  /** Pruned copy of the root first, then every detached copy in the order its subtree completed. */
  nodes: TreeNode[];
  /** Identities synthesized for input nodes that had none, keyed by the input node. */
  assignedIds: Map<TreeNode, string>;
}

/** Length of synthesized identities in hex characters. */
export const SYNTHESIZED_ID_LENGTH = 8;

/** Random hex token. Not globally unique; flatten re-draws on collision within a run. */
export function synthesizeId(): string {
  return randomBytes(SYNTHESIZED_ID_LENGTH / 2).toString('hex');
}

/**
 * Turn `matchTag` elements nested directly inside `matchTag` elements into a flat sequence.
 *
 * The input is copied, never restructured. A child is detached from its parent only when both
 * carry `matchTag`; a `matchTag` element below some other tag stays where it is. Every
 * `matchTag` copy carries `idAttr` (existing value kept, otherwise synthesized) and, unless it is
 * the outermost one on its path, `parentAttr` naming the nearest enclosing `matchTag` element.
 *
 * Synthesized ids are only written onto the input when `annotateSource` is set; they are
 * always returned in `assignedIds`.
 */
export function flatten(root: TreeNode, options: HierarchyInput, logger?: Logger): FlattenResult {
  const opts = resolveHierarchyOptions(options);
  const log = scopedLogger(logger, 'hierarchy');
  const { matchTag, idAttr, parentAttr } = opts;

  const taken = new Set<string>();
  for (const node of descendants(root)) {
    const id = node.tag === matchTag ? node.attributes[idAttr] : undefined;
    if (!id) continue;
    if (taken.has(id) && opts.duplicateIds === 'error') throw new IdentityCollisionError(id);
    taken.add(id);
  }

  const assignedIds = new Map<TreeNode, string>();
  const identify = (node: TreeNode): string => {
    const existing = node.attributes[idAttr];
    if (existing) return existing;
    let id = synthesizeId();
    while (taken.has(id)) id = synthesizeId();
    taken.add(id);
    assignedIds.set(node, id);
    if (opts.annotateSource) node.attributes[idAttr] = id;
    return id;
  };

  const detachedCopies: TreeNode[] = [];

  const visit = (node: TreeNode, enclosingId: string | undefined): TreeNode => {
    const copy = cloneShallow(node);
    const isMatch = node.tag === matchTag;
    let ownId: string | undefined;
    if (isMatch) {
      ownId = identify(node);
      copy.attributes[idAttr] = ownId;
      if (enclosingId !== undefined) copy.attributes[parentAttr] = enclosingId;
      else delete copy.attributes[parentAttr];
    }

    const detached: TreeNode[] = [];
    for (const child of node.children) {
      if (isMatch && child.tag === matchTag) detached.push(child);
      else appendChild(copy, visit(child, isMatch ? ownId : enclosingId));
    }
    for (const child of detached) {
      const flat = visit(child, ownId);
      detachedCopies.push(flat);
    }
    return copy;
  };

  const nodes = [visit(root, undefined), ...detachedCopies];
  log.debug(`flattened <${matchTag}> into ${nodes.length} element(s), ${assignedIds.size} id(s) synthesized`);
  return { nodes, assignedIds };
}
