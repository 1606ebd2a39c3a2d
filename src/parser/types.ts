/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Ordered tree shared by the streaming partitioner and the hierarchy transforms.
*/

export interface TreeNode {
  /** Tag name as written in the source (prefix kept unless parsed with localNames). */
  tag: string;
  /** Attributes in insertion order. */
  attributes: Record<string, string>;
  /** Concatenated direct text content, trimmed; undefined when the element has none. */
  text?: string;
  /** Child elements in document order. */
  children: TreeNode[];
  /** Owner of the child list this node sits in, or undefined for a root or detached node. */
  parent: TreeNode | undefined;
}

export interface ParseOptions {
  /** Strip namespace prefixes from tag names ('ns:item' → 'item'). */
  localNames?: boolean;
  /** Identifies the document in syntax errors. */
  sourceId?: string;
  /** Character encoding of a file read from disk; by default taken from its declaration. */
  encoding?: string;
}

export interface SerializeOptions {
  /** Prefix output with the XML declaration (default true). */
  declaration?: boolean;
  /** Indentation unit (default two spaces). */
  indentation?: string;
}
