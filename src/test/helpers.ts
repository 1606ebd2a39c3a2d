/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Shared fixtures for unit tests: temporary directories, in-memory sources and ZIP archives.
*/

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import * as yazl from 'yazl';

import { ConsoleLogger } from '../common/console-logger';
import type { TreeNode } from '../parser/types';
import type { SourceDescriptor } from '../source/tree-source';

/** Logger that only lets errors through, so test output stays readable. */
export const quietLogger = new ConsoleLogger('error');

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'xml-partition-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(dir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf8');
  }
}

/**
 * Write a ZIP archive. Names ending in '/' become directory entries.
 */
export function writeZip(file: string, entries: Record<string, string>): Promise<void> {
  return new Promise((resolve, reject) => {
    const zip = new yazl.ZipFile();
    for (const [name, content] of Object.entries(entries)) {
      if (name.endsWith('/')) zip.addEmptyDirectory(name);
      else zip.addBuffer(Buffer.from(content, 'utf8'), name);
    }
    const out = fs.createWriteStream(file);
    out.on('close', () => resolve());
    out.on('error', reject);
    zip.outputStream.pipe(out);
    zip.end();
  });
}

/** `<root>` with one `<item id=…><name>…</name></item>` per id. */
export function itemsDocument(ids: string[]): string {
  const items = ids.map((id) => `<item id="${id}"><name>${id}</name></item>`).join('');
  return `<?xml version="1.0"?><root>${items}</root>`;
}

export interface MemorySource extends SourceDescriptor {
  /** Streams handed out by open(), for checking they were released. */
  streams: Readable[];
}

/**
 * Source backed by a string or bytes, delivered in pieces of `pieceSize` characters or bytes.
 */
export function memorySource(id: string, content: string | Buffer, pieceSize = 16): MemorySource {
  const streams: Readable[] = [];
  return {
    id,
    path: id,
    streams,
    open: async () => {
      const pieces: Array<string | Buffer> = [];
      for (let i = 0; i < content.length; i += pieceSize) {
        pieces.push(typeof content === 'string' ? content.slice(i, i + pieceSize) : content.subarray(i, i + pieceSize));
      }
      const stream = Readable.from(pieces);
      streams.push(stream);
      return stream;
    },
  };
}

/** Tag, attributes (minus `ignore`), text and children, for structural comparison. */
export interface Shape {
  tag: string;
  attributes: Record<string, string>;
  text?: string;
  children: Shape[];
}

export function shapeOf(node: TreeNode, ignore: string[] = []): Shape {
  const attributes: Record<string, string> = {};
  for (const [k, v] of Object.entries(node.attributes)) {
    if (!ignore.includes(k)) attributes[k] = v;
  }
  const shape: Shape = { tag: node.tag, attributes, children: node.children.map((c) => shapeOf(c, ignore)) };
  if (node.text !== undefined) shape.text = node.text;
  return shape;
}
