/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Where documents come from: a single file, every matching file in a directory,
  or every document entry inside a ZIP archive.
*/

import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { minimatch } from 'minimatch';

import type { Logger } from '../common/logger';
import { scopedLogger } from '../common/console-logger';
import { resolveSourceOptions } from '../common/config';
import type { SourceOptions } from '../common/config';
import { InvalidInputError, NotFoundError, errnoCode } from '../common/errors';
import { closeArchive, listArchiveEntries, openArchive, openArchiveEntry } from './archive';

export type LocationKind = 'document' | 'directory' | 'archive';

export interface ResolvedLocation {
  kind: LocationKind;
  path: string;
}

/**
 * One document to read. Consumed once; open() must be called before the
 * enumeration advances, since an archive is closed once its entries are drawn.
 */
export interface SourceDescriptor {
  /** File path, or "<archive>!<entry>" for archive entries. */
  id: string;
  /** File path, or entry name inside the archive. */
  path: string;
  /** Enclosing archive, if any. */
  archive?: string;
  /** Raw bytes of the document; decoding is up to the reader. */
  open(): Promise<Readable>;
}

function extensionOf(file: string): string {
  return path.extname(file).toLowerCase();
}

/**
 * Decide once what a location is.
 */
export async function resolveLocation(
  location: string,
  options: Partial<SourceOptions> = {}
): Promise<ResolvedLocation> {
  const opts = resolveSourceOptions(options);
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(location);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') throw new NotFoundError(`Path not found: ${location}`, err);
    throw err;
  }
  if (stat.isDirectory()) return { kind: 'directory', path: location };
  if (stat.isFile()) {
    const ext = extensionOf(location);
    if (opts.archiveExtensions.includes(ext)) return { kind: 'archive', path: location };
    if (ext === opts.extension) return { kind: 'document', path: location };
  }
  throw new InvalidInputError(
    `Not a ${opts.extension} document, a directory or an archive (${opts.archiveExtensions.join(', ')}): ${location}`
  );
}

async function walk(dir: string, rel: string, recursive: boolean, out: string[]): Promise<void> {
  const entries = await fs.promises.readdir(path.join(dir, rel), { withFileTypes: true });
  for (const entry of entries) {
    const entryRel = rel ? path.join(rel, entry.name) : entry.name;
    if (entry.isDirectory()) {
      if (recursive) await walk(dir, entryRel, recursive, out);
    } else if (entry.isFile()) {
      out.push(entryRel);
    }
  }
}

/**
 * Files under `dir` whose name matches the glob pattern, sorted by relative path.
 * Patterns without a slash are matched against the file name at any depth.
 */
export async function listDirectory(dir: string, options: Partial<SourceOptions> = {}): Promise<string[]> {
  const opts = resolveSourceOptions(options);
  const files: string[] = [];
  await walk(dir, '', opts.recursive, files);
  const matched = files
    .filter((rel) => minimatch(rel.split(path.sep).join('/'), opts.pattern, { matchBase: true }))
    .sort();
  if (matched.length === 0) {
    throw new NotFoundError(
      `No files matching "${opts.pattern}" in ${dir} (${opts.recursive ? 'recursive' : 'top level only'})`
    );
  }
  return matched.map((rel) => path.join(dir, rel));
}

function fileSource(file: string): SourceDescriptor {
  return {
    id: file,
    path: file,
    open: async () => fs.createReadStream(file),
  };
}

async function* archiveSources(
  archivePath: string,
  opts: SourceOptions,
  logger: Logger
): AsyncGenerator<SourceDescriptor> {
  const zipfile = await openArchive(archivePath);
  try {
    const entries = await listArchiveEntries(zipfile, archivePath, opts.extension);
    if (entries.length === 0) throw new NotFoundError(`No ${opts.extension} entries in archive ${archivePath}`);
    logger.debug(`${entries.length} document(s) in ${archivePath}`);
    for (const entry of entries) {
      yield {
        id: `${archivePath}!${entry.fileName}`,
        path: entry.fileName,
        archive: archivePath,
        open: () => openArchiveEntry(zipfile, entry, archivePath),
      };
    }
  } finally {
    closeArchive(zipfile);
    logger.debug(`closed ${archivePath}`);
  }
}

/**
 * Lazily enumerate the documents at a location. Sources come strictly one after another;
 * an archive stays open while its entries are drawn and is closed when enumeration ends,
 * fails, or is abandoned.
 */
export async function* openSources(
  location: string,
  options: Partial<SourceOptions> = {},
  logger?: Logger
): AsyncGenerator<SourceDescriptor> {
  const log = scopedLogger(logger, 'source');
  const opts = resolveSourceOptions(options);
  const resolved = await resolveLocation(location, opts);
  log.debug(`${location} is a ${resolved.kind}`);

  switch (resolved.kind) {
    case 'document':
      yield fileSource(resolved.path);
      break;
    case 'directory':
      for (const file of await listDirectory(resolved.path, opts)) yield fileSource(file);
      break;
    case 'archive':
      yield* archiveSources(resolved.path, opts, log);
      break;
  }
}
