/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as sax from 'sax';
import { NotFoundError, XmlSyntaxError, errnoCode } from '../common/errors';
import { decodeDocument } from './encoding';
import { appendChild, createNode } from './tree';
import type { ParseOptions, TreeNode } from './types';

export interface SaxHandlers {
  open(tag: string, attributes: Record<string, string>): void;
  close(tag: string): void;
  text(text: string): void;
}

export function localName(tag: string): string {
  const colonIdx = tag.indexOf(':');
  return colonIdx >= 0 ? tag.slice(colonIdx + 1) : tag;
}

function toAttributes(raw: sax.Tag['attributes'] | sax.QualifiedTag['attributes']): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    attrs[k] = typeof v === 'string' ? v : v.value;
  }
  return attrs;
}

/**
 * Trim the text collected for an element once it closes; whitespace-only text is dropped.
 */
export function settleText(node: TreeNode): void {
  if (node.text === undefined) return;
  const text = node.text.trim();
  if (text) node.text = text;
  else delete node.text;
}

/**
 * Strict sax parser. Text and CDATA are handed over raw, in whatever pieces sax flushes them;
 * handlers collect them per element and call settleText() on close. The first error is kept
 * and thrown as XmlSyntaxError from write()/close(); callbacks sax still fires after an error
 * are ignored.
 */
export class SaxReader {
  private readonly parser: sax.SAXParser;
  private failure: XmlSyntaxError | undefined;

  constructor(handlers: SaxHandlers, options: ParseOptions = {}) {
    const name = (tag: string) => (options.localNames ? localName(tag) : tag);
    this.failure = undefined;
    this.parser = sax.parser(true, { trim: false });
    this.parser.onerror = (err: Error) => {
      if (this.failure) return;
      const reason = err.message.split('\n')[0];
      this.failure = new XmlSyntaxError(reason, options.sourceId, this.parser.line + 1, this.parser.column + 1);
    };
    this.parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
      if (!this.failure) handlers.open(name(tag.name), toAttributes(tag.attributes));
    };
    this.parser.onclosetag = (tag: string) => {
      if (!this.failure) handlers.close(name(tag));
    };
    this.parser.ontext = (text: string) => {
      if (!this.failure) handlers.text(text);
    };
    this.parser.oncdata = (cdata: string) => {
      if (!this.failure) handlers.text(cdata);
    };
  }

  /** Current 1-based position, for errors raised by handlers. */
  get position(): { line: number; column: number } {
    return { line: this.parser.line + 1, column: this.parser.column + 1 };
  }

  write(chunk: string): void {
    this.check();
    this.parser.write(chunk);
    this.check();
  }

  close(): void {
    this.check();
    this.parser.close();
    this.check();
  }

  private check(): void {
    if (this.failure) throw this.failure;
  }
}

class TreeBuilder implements SaxHandlers {
  root: TreeNode | undefined = undefined;
  private readonly stack: TreeNode[] = [];

  constructor(private readonly onSecondRoot: () => never) {}

  open(tag: string, attributes: Record<string, string>): void {
    const node = createNode(tag, attributes);
    const parent = this.stack[this.stack.length - 1];
    if (parent) appendChild(parent, node);
    else if (this.root) this.onSecondRoot();
    else this.root = node;
    this.stack.push(node);
  }

  close(): void {
    const node = this.stack.pop();
    if (node) settleText(node);
  }

  text(text: string): void {
    const node = this.stack[this.stack.length - 1];
    if (node) node.text = (node.text ?? '') + text;
  }
}

/**
 * Parse a complete document into a tree. Text is concatenated per element and trimmed once.
 */
export function parseXml(text: string, options: ParseOptions = {}): TreeNode {
  const fail = (reason: string): never => {
    const { line, column } = reader.position;
    throw new XmlSyntaxError(reason, options.sourceId, line, column);
  };
  const builder = new TreeBuilder(() => fail('more than one root element'));
  const reader = new SaxReader(builder, options);

  reader.write(text);
  reader.close();

  return builder.root ?? fail('no root element');
}

/**
 * Read a file and parse it; the path doubles as sourceId in errors.
 */
export function parseXmlFile(filePath: string, options: ParseOptions = {}): TreeNode {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') throw new NotFoundError(`File not found: ${filePath}`, err);
    throw err;
  }
  const parseOptions = { sourceId: filePath, ...options };
  return parseXml(decodeDocument(bytes, options.encoding, parseOptions.sourceId), parseOptions);
}
