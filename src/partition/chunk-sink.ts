/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as path from 'path';

import type { Logger } from '../common/logger';
import { scopedLogger } from '../common/console-logger';
import { resolveSinkOptions } from '../common/config';
import type { SinkOptions } from '../common/config';
import { OutputExistsError, errnoCode } from '../common/errors';
import { serializeXml } from '../parser/serializer';
import type { Chunk } from './partitioner';

export interface ChunkSink {
  emit(chunk: Chunk): Promise<void>;
}

/**
 * Push mode: every chunk becomes its own document `<prefix><zero-padded index><extension>`
 * in the output directory, which is created on first use. Files are written exclusively
 * unless `overwrite` is set.
 */
export class DirectorySink implements ChunkSink {
  readonly written: string[] = [];
  private readonly opts: SinkOptions;
  private readonly logger: Logger;
  private prepared = false;

  constructor(options: Partial<SinkOptions> & { outputDir: string }, logger?: Logger) {
    this.opts = resolveSinkOptions(options);
    this.logger = scopedLogger(logger, 'sink');
  }

  fileName(index: number): string {
    return `${this.opts.prefix}${String(index).padStart(this.opts.digits, '0')}${this.opts.extension}`;
  }

  async emit(chunk: Chunk): Promise<void> {
    if (!this.prepared) {
      await fs.promises.mkdir(this.opts.outputDir, { recursive: true });
      this.prepared = true;
    }
    const file = path.join(this.opts.outputDir, this.fileName(chunk.index));
    try {
      await fs.promises.writeFile(file, serializeXml(chunk.node), {
        encoding: 'utf8',
        flag: this.opts.overwrite ? 'w' : 'wx',
      });
    } catch (err) {
      if (errnoCode(err) === 'EEXIST') throw new OutputExistsError(file, err);
      throw err;
    }
    this.written.push(file);
    this.logger.debug(`wrote ${file} (${chunk.size} element(s))`);
  }
}

/**
 * Hand every chunk of a pull-mode run to a sink, in order. Returns the number of chunks.
 */
export async function drainInto(chunks: AsyncIterable<Chunk>, sink: ChunkSink): Promise<number> {
  let count = 0;
  for await (const chunk of chunks) {
    await sink.emit(chunk);
    count++;
  }
  return count;
}
