/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { resolvePartitionOptions, resolveSourceOptions } from '../common/config';
import type { PartitionOptions, SinkOptions, SourceOptions } from '../common/config';
import { openSources } from '../source/tree-source';
import { DirectorySink, drainInto } from './chunk-sink';
import { partition } from './partitioner';
import type { Chunk, PartitionInput } from './partitioner';

export type SplitterOptions = PartitionInput & Partial<SourceOptions>;

/**
 * Split a document, a directory of documents or a ZIP archive into chunks of `chunkSize`
 * `matchTag` elements, numbered across the whole location.
 */
export class XmlSplitter {
  readonly partitionOptions: PartitionOptions;
  readonly sourceOptions: SourceOptions;
  private readonly logger: Logger;

  constructor(options: SplitterOptions, logger?: Logger) {
    this.partitionOptions = resolvePartitionOptions(options);
    this.sourceOptions = resolveSourceOptions(options);
    this.logger = logger ? logger.clone() : new ConsoleLogger();
    this.logger.setContext('splitter');
  }

  get matchTag(): string {
    return this.partitionOptions.matchTag;
  }

  get chunkSize(): number {
    return this.partitionOptions.chunkSize;
  }

  /** Pull mode. */
  chunks(location: string): AsyncGenerator<Chunk> {
    return partition(openSources(location, this.sourceOptions, this.logger), this.partitionOptions, this.logger);
  }

  /**
   * Push mode: write every chunk into `outputDir` and return the file paths in order.
   */
  async split(
    location: string,
    outputDir: string,
    sinkOptions: Partial<Omit<SinkOptions, 'outputDir'>> = {}
  ): Promise<string[]> {
    const sink = new DirectorySink({ ...sinkOptions, outputDir }, this.logger);
    const count = await drainInto(this.chunks(location), sink);
    this.logger.info(`${location}: ${count} chunk(s) written to ${outputDir}`);
    return sink.written;
  }
}
