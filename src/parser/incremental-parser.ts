/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { SaxReader, settleText } from './xml-parser';
import { appendChild, createNode, detach, subtreeSize } from './tree';
import type { ParseOptions, TreeNode } from './types';

/**
 * Push parser that surfaces completed `matchTag` subtrees while the document is still being read.
 *
 * Open elements form a spine from the document root down to the current position. Elements
 * inside a match are built in full (attributes, text, children); elements outside a match only
 * keep tag and attributes and are dropped as soon as they close. A completed match stays attached
 * to the spine until the caller takes it with take() and releases it with prune(), so memory is
 * bounded by the spine depth plus whatever the caller has not pruned yet.
 *
 * A matchTag element nested inside an open match belongs to the outer match and is not surfaced
 * on its own.
 */
export class IncrementalTreeParser {
  private readonly reader: SaxReader;
  private readonly stack: TreeNode[] = [];
  private completed: TreeNode[] = [];
  private root: TreeNode | undefined = undefined;
  /** Stack index of the open outermost match, -1 outside matches. */
  private matchDepth = -1;
  private matches = 0;

  constructor(
    private readonly matchTag: string,
    options: ParseOptions = {}
  ) {
    this.reader = new SaxReader(
      {
        open: (tag, attributes) => this.onOpen(tag, attributes),
        close: () => this.onClose(),
        text: (text) => this.onText(text),
      },
      options
    );
  }

  /** Number of matches completed so far. */
  get matchCount(): number {
    return this.matches;
  }

  /** Nodes still reachable from the document root (spine, unpruned matches, open match). */
  get retainedSize(): number {
    return this.root ? subtreeSize(this.root) : 0;
  }

  write(text: string): void {
    this.reader.write(text);
  }

  close(): void {
    this.reader.close();
  }

  /** Drain completed matches in document order. */
  take(): TreeNode[] {
    const taken = this.completed;
    this.completed = [];
    return taken;
  }

  /** Release a taken match from the retained spine. */
  prune(node: TreeNode): void {
    detach(node);
  }

  /** Drop everything retained; the parser cannot be used afterwards. */
  release(): void {
    this.stack.length = 0;
    this.completed = [];
    this.root = undefined;
  }

  private onOpen(tag: string, attributes: Record<string, string>): void {
    const node = createNode(tag, attributes);
    const parent = this.stack[this.stack.length - 1];
    if (parent) appendChild(parent, node);
    else this.root = node;
    this.stack.push(node);
    if (this.matchDepth < 0 && tag === this.matchTag) this.matchDepth = this.stack.length - 1;
  }

  private onClose(): void {
    const node = this.stack.pop();
    if (!node) return;
    settleText(node);
    const depth = this.stack.length;
    if (depth === this.matchDepth) {
      this.matchDepth = -1;
      this.matches++;
      this.completed.push(node);
    } else if (this.matchDepth < 0 && node.parent) {
      detach(node);
    }
  }

  private onText(text: string): void {
    if (this.matchDepth < 0) return;
    const node = this.stack[this.stack.length - 1];
    if (node) node.text = (node.text ?? '') + text;
  }
}
