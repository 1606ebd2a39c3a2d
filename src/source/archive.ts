/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as path from 'path';
import type { Readable } from 'stream';
import * as yauzl from 'yauzl';
import { CorruptInputError } from '../common/errors';

const RESERVED_SEGMENTS = ['__MACOSX'];

/**
 * Document entries only: no directories, no metadata folders, no hidden files.
 */
export function isDocumentEntry(fileName: string, extension: string): boolean {
  if (fileName.endsWith('/')) return false;
  const segments = fileName.split('/');
  if (segments.some((seg) => RESERVED_SEGMENTS.includes(seg))) return false;
  const base = segments[segments.length - 1];
  if (base.startsWith('.')) return false;
  return path.extname(base).toLowerCase() === extension;
}

export function openArchive(archivePath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(new CorruptInputError(`Cannot open archive ${archivePath}: ${err ? err.message : 'no handle'}`, err));
        return;
      }
      resolve(zipfile);
    });
  });
}

/**
 * Read the central directory and keep document entries in archive order.
 */
export function listArchiveEntries(
  zipfile: yauzl.ZipFile,
  archivePath: string,
  extension: string
): Promise<yauzl.Entry[]> {
  return new Promise((resolve, reject) => {
    const entries: yauzl.Entry[] = [];
    const onEntry = (entry: yauzl.Entry) => {
      if (isDocumentEntry(entry.fileName, extension)) entries.push(entry);
      zipfile.readEntry();
    };
    const onEnd = () => {
      cleanup();
      resolve(entries);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new CorruptInputError(`Cannot read archive ${archivePath}: ${err.message}`, err));
    };
    const cleanup = () => {
      zipfile.removeListener('entry', onEntry);
      zipfile.removeListener('end', onEnd);
      zipfile.removeListener('error', onError);
    };
    zipfile.on('entry', onEntry);
    zipfile.on('end', onEnd);
    zipfile.on('error', onError);
    zipfile.readEntry();
  });
}

export function openArchiveEntry(
  zipfile: yauzl.ZipFile,
  entry: yauzl.Entry,
  archivePath: string
): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(new CorruptInputError(`Cannot read ${entry.fileName} in ${archivePath}: ${err ? err.message : 'no stream'}`, err));
        return;
      }
      resolve(stream);
    });
  });
}

export function closeArchive(zipfile: yauzl.ZipFile): void {
  if (zipfile.isOpen) zipfile.close();
}
