/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type { Logger, LogLevel } from './common/logger';
export { ConsoleLogger } from './common/console-logger';
export {
  XmlPartitionError,
  NotFoundError,
  InvalidInputError,
  CorruptInputError,
  XmlSyntaxError,
  StructuralError,
  ConfigurationError,
  OutputExistsError,
  IdentityCollisionError,
  OrphanError,
} from './common/errors';
export type { ErrorCode } from './common/errors';
export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_SINK_OPTIONS,
  DEFAULT_SOURCE_OPTIONS,
  resolveHierarchyOptions,
  resolvePartitionOptions,
  resolveSinkOptions,
  resolveSourceOptions,
} from './common/config';
export type {
  DuplicateIdPolicy,
  HierarchyOptions,
  OrphanPolicy,
  PartitionOptions,
  SinkOptions,
  SourceErrorPolicy,
  SourceOptions,
} from './common/config';

export type { TreeNode, ParseOptions, SerializeOptions } from './parser/types';
export {
  appendChild,
  cloneShallow,
  createNode,
  descendants,
  detach,
  findChild,
  findChildren,
  subtreeSize,
  textOf,
} from './parser/tree';
export { parseXml, parseXmlFile } from './parser/xml-parser';
export { IncrementalTreeParser } from './parser/incremental-parser';
export { serializeXml, XML_DECLARATION } from './parser/serializer';
export { toDict } from './parser/dict-builder';
export { DocumentDecoder, decodeDocument, sniffEncoding } from './parser/encoding';
export type { DictEntry } from './parser/dict-builder';

export { openSources, listDirectory, resolveLocation } from './source/tree-source';
export type { LocationKind, ResolvedLocation, SourceDescriptor } from './source/tree-source';

export { partition } from './partition/partitioner';
export type { Chunk, PartitionInput } from './partition/partitioner';
export { DirectorySink, drainInto } from './partition/chunk-sink';
export type { ChunkSink } from './partition/chunk-sink';
export { XmlSplitter } from './partition/splitter';
export type { SplitterOptions } from './partition/splitter';

export { flatten, synthesizeId, SYNTHESIZED_ID_LENGTH } from './hierarchy/linearizer';
export type { FlattenResult, HierarchyInput } from './hierarchy/linearizer';
export { rebuild } from './hierarchy/rebuilder';
