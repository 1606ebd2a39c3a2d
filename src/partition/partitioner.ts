/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { scopedLogger } from '../common/console-logger';
import { resolvePartitionOptions } from '../common/config';
import type { PartitionOptions } from '../common/config';
import { XmlSyntaxError } from '../common/errors';
import { DocumentDecoder } from '../parser/encoding';
import { IncrementalTreeParser } from '../parser/incremental-parser';
import { appendChild, createNode } from '../parser/tree';
import type { TreeNode } from '../parser/types';
import type { SourceDescriptor } from '../source/tree-source';

/**
 * One bounded group of matches wrapped in a synthetic container.
 */
export interface Chunk {
  /** Zero-based, counted across every source of the run. */
  index: number;
  /** Container whose children are the grouped matches in encounter order. */
  node: TreeNode;
  /** Number of matches in the container. */
  size: number;
  /** Ids of the sources that contributed matches, in order. */
  sources: string[];
}

export type PartitionInput = Partial<PartitionOptions> & { matchTag: string };

/**
 * Walk the sources one after another and emit a Chunk every `chunkSize` matches.
 * The last chunk holds the remainder and is the only one allowed to be smaller.
 *
 * Bytes are decoded with `encoding` when given, otherwise with the encoding the document
 * declares (UTF-8 by default). Each source's stream and parser are released when the source
 * ends, fails, or the consumer stops iterating. A malformed source raises XmlSyntaxError naming it;
 * with `sourceErrors: 'skip'` the run moves on to the next source instead, keeping
 * every match that closed before the error.
 */
export async function* partition(
  sources: AsyncIterable<SourceDescriptor> | Iterable<SourceDescriptor>,
  options: PartitionInput,
  logger?: Logger
): AsyncGenerator<Chunk> {
  const opts = resolvePartitionOptions(options);
  const log = scopedLogger(logger, 'partition');

  let group: TreeNode[] = [];
  let contributors: string[] = [];
  let nextIndex = 0;

  const seal = (): Chunk => {
    const node = createNode(opts.chunkTag);
    for (const match of group) appendChild(node, match);
    const chunk: Chunk = { index: nextIndex++, node, size: group.length, sources: contributors };
    log.debug(`chunk ${chunk.index}: ${chunk.size} <${opts.matchTag}> element(s)`);
    group = [];
    contributors = [];
    return chunk;
  };

  function* absorb(parser: IncrementalTreeParser, sourceId: string): Generator<Chunk> {
    for (const match of parser.take()) {
      parser.prune(match);
      group.push(match);
      if (!contributors.includes(sourceId)) contributors.push(sourceId);
      if (group.length >= opts.chunkSize) yield seal();
    }
  }

  for await (const source of sources) {
    log.debug(`reading ${source.id}`);
    const parser = new IncrementalTreeParser(opts.matchTag, { sourceId: source.id });
    const decoder = new DocumentDecoder(opts.encoding, source.id);
    const stream = await source.open();
    try {
      for await (const data of stream) {
        parser.write(Buffer.isBuffer(data) ? decoder.write(data) : String(data));
        yield* absorb(parser, source.id);
      }
      parser.write(decoder.end());
      parser.close();
      yield* absorb(parser, source.id);
      log.debug(`${source.id}: ${parser.matchCount} match(es)`);
    } catch (err) {
      if (!(err instanceof XmlSyntaxError) || opts.sourceErrors === 'abort') throw err;
      log.warn(`skipping rest of ${source.id}: ${err.message}`);
      yield* absorb(parser, source.id);
    } finally {
      stream.destroy();
      parser.release();
    }
  }

  if (group.length > 0) yield seal();
}
