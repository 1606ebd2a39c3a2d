/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as iconv from 'iconv-lite';
import { XmlSyntaxError } from '../common/errors';

type Decoder = ReturnType<typeof iconv.getDecoder>;

/** Bytes buffered while looking for a byte order mark or an XML declaration. */
export const PRESCAN_BYTES = 1024;

const DECLARED_ENCODING = /^<\?xml\s[^>]*?\bencoding\s*=\s*["']([A-Za-z][\w.:-]*)["']/;

/**
 * Encoding of a document from its first bytes: byte order mark, then the `encoding`
 * of the XML declaration, UTF-8 otherwise.
 */
export function sniffEncoding(head: Buffer): string {
  if (head[0] === 0xef && head[1] === 0xbb && head[2] === 0xbf) return 'utf-8';
  if (head[0] === 0xff && head[1] === 0xfe) return 'utf-16le';
  if (head[0] === 0xfe && head[1] === 0xff) return 'utf-16be';
  const match = DECLARED_ENCODING.exec(head.toString('latin1'));
  return match ? match[1].toLowerCase() : 'utf-8';
}

export function isKnownEncoding(label: string): boolean {
  return iconv.encodingExists(label);
}

/**
 * Streaming byte-to-text decoder for one document. With an explicit encoding, decoding starts
 * right away; otherwise bytes are held back until the end of the XML declaration (the first
 * '>') or PRESCAN_BYTES have arrived, and the encoding is sniffed from them.
 */
export class DocumentDecoder {
  private decoder: Decoder | undefined;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private label: string | undefined;

  constructor(
    encoding: string | undefined,
    private readonly sourceId?: string
  ) {
    if (encoding !== undefined) this.decoder = this.open(encoding);
  }

  /** Encoding in use; undefined until it has been decided. */
  get encoding(): string | undefined {
    return this.label;
  }

  write(bytes: Buffer): string {
    if (this.decoder) return this.decoder.write(bytes);
    this.pending.push(bytes);
    this.pendingBytes += bytes.length;
    if (this.pendingBytes < PRESCAN_BYTES && !bytes.includes(0x3e)) return '';
    return this.start();
  }

  end(): string {
    const head = this.decoder ? '' : this.start();
    return head + (this.decoder?.end() ?? '');
  }

  private start(): string {
    const head = Buffer.concat(this.pending);
    this.pending = [];
    this.pendingBytes = 0;
    const decoder = this.open(sniffEncoding(head));
    this.decoder = decoder;
    return decoder.write(head);
  }

  private open(label: string): Decoder {
    if (!isKnownEncoding(label)) throw new XmlSyntaxError(`unsupported encoding "${label}"`, this.sourceId, 1, 1);
    this.label = label;
    return iconv.getDecoder(label);
  }
}

/** Decode a whole document held in memory. */
export function decodeDocument(bytes: Buffer, encoding?: string, sourceId?: string): string {
  const decoder = new DocumentDecoder(encoding, sourceId);
  return decoder.write(bytes) + decoder.end();
}
