/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Option defaults and validation for sources, partitioning, chunk output and
  hierarchy transforms. Each resolve* function is called once at entry.
*/

import { ConfigurationError } from './errors';
import { isKnownEncoding } from '../parser/encoding';

export type SourceErrorPolicy = 'abort' | 'skip';
export type OrphanPolicy = 'drop' | 'error';
export type DuplicateIdPolicy = 'allow' | 'error';

export interface SourceOptions {
  /** Glob matched against file names inside a directory. */
  pattern: string;
  /** Descend into sub-directories. */
  recursive: boolean;
  /** Extension of documents (single files and archive entries). */
  extension: string;
  /** Extensions recognised as ZIP archives. */
  archiveExtensions: string[];
}

export interface PartitionOptions {
  matchTag: string;
  chunkSize: number;
  /** Tag of the synthetic container wrapping each chunk. */
  chunkTag: string;
  /** What happens to the run when one source is malformed. */
  sourceErrors: SourceErrorPolicy;
  /** Character encoding of every source; undefined reads it from each document. */
  encoding: string | undefined;
}

export interface SinkOptions {
  outputDir: string;
  prefix: string;
  extension: string;
  /** Width of the zero-padded chunk index. */
  digits: number;
  overwrite: boolean;
}

export interface HierarchyOptions {
  matchTag: string;
  idAttr: string;
  parentAttr: string;
  /** Tag of the synthetic container created by rebuild. */
  rootTag: string;
  orphans: OrphanPolicy;
  duplicateIds: DuplicateIdPolicy;
  /** Write synthesized ids back onto the input tree. */
  annotateSource: boolean;
}

export const DEFAULT_SOURCE_OPTIONS: Readonly<SourceOptions> = {
  pattern: '*.xml',
  recursive: false,
  extension: '.xml',
  archiveExtensions: ['.zip'],
};

export const DEFAULT_CHUNK_SIZE = 1000;

export const DEFAULT_SINK_OPTIONS: Readonly<Omit<SinkOptions, 'outputDir'>> = {
  prefix: 'chunk_',
  extension: '.xml',
  digits: 4,
  overwrite: false,
};

function requireName(value: string | undefined, option: string): string {
  if (value === undefined || value.trim() === '')
    throw new ConfigurationError(`Option "${option}" must be a non-empty string`);
  return value;
}

function requireOneOf<T extends string>(value: T, allowed: readonly T[], option: string): T {
  if (!allowed.includes(value))
    throw new ConfigurationError(`Option "${option}" must be one of ${allowed.join(', ')}; got "${value}"`);
  return value;
}

function resolveEncoding(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (!isKnownEncoding(value)) throw new ConfigurationError(`Option "encoding" names an unknown encoding: "${value}"`);
  return value;
}

function normalizeExtension(ext: string, option: string): string {
  const trimmed = requireName(ext, option).trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function resolveSourceOptions(options: Partial<SourceOptions> = {}): SourceOptions {
  const archiveExtensions = options.archiveExtensions ?? DEFAULT_SOURCE_OPTIONS.archiveExtensions;
  return {
    pattern: requireName(options.pattern ?? DEFAULT_SOURCE_OPTIONS.pattern, 'pattern'),
    recursive: options.recursive ?? DEFAULT_SOURCE_OPTIONS.recursive,
    extension: normalizeExtension(options.extension ?? DEFAULT_SOURCE_OPTIONS.extension, 'extension'),
    archiveExtensions: archiveExtensions.map((ext) => normalizeExtension(ext, 'archiveExtensions')),
  };
}

export function resolvePartitionOptions(
  options: Partial<PartitionOptions> & { matchTag: string }
): PartitionOptions {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1)
    throw new ConfigurationError(`Option "chunkSize" must be an integer >= 1; got ${chunkSize}`);
  return {
    matchTag: requireName(options.matchTag, 'matchTag'),
    chunkSize,
    chunkTag: requireName(options.chunkTag ?? 'chunk', 'chunkTag'),
    sourceErrors: requireOneOf(options.sourceErrors ?? 'abort', ['abort', 'skip'], 'sourceErrors'),
    encoding: resolveEncoding(options.encoding),
  };
}

export function resolveSinkOptions(options: Partial<SinkOptions> & { outputDir: string }): SinkOptions {
  const digits = options.digits ?? DEFAULT_SINK_OPTIONS.digits;
  if (!Number.isInteger(digits) || digits < 1)
    throw new ConfigurationError(`Option "digits" must be an integer >= 1; got ${digits}`);
  return {
    outputDir: requireName(options.outputDir, 'outputDir'),
    prefix: options.prefix ?? DEFAULT_SINK_OPTIONS.prefix,
    extension: normalizeExtension(options.extension ?? DEFAULT_SINK_OPTIONS.extension, 'extension'),
    digits,
    overwrite: options.overwrite ?? DEFAULT_SINK_OPTIONS.overwrite,
  };
}

export function resolveHierarchyOptions(
  options: Partial<HierarchyOptions> & { matchTag: string }
): HierarchyOptions {
  const resolved: HierarchyOptions = {
    matchTag: requireName(options.matchTag, 'matchTag'),
    idAttr: requireName(options.idAttr ?? 'id', 'idAttr'),
    parentAttr: requireName(options.parentAttr ?? 'parent_id', 'parentAttr'),
    rootTag: requireName(options.rootTag ?? 'root', 'rootTag'),
    orphans: requireOneOf(options.orphans ?? 'drop', ['drop', 'error'], 'orphans'),
    duplicateIds: requireOneOf(options.duplicateIds ?? 'allow', ['allow', 'error'], 'duplicateIds'),
    annotateSource: options.annotateSource ?? false,
  };
  if (resolved.idAttr === resolved.parentAttr)
    throw new ConfigurationError('Options "idAttr" and "parentAttr" must differ');
  return resolved;
}
