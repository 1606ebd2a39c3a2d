/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import {
  resolveHierarchyOptions,
  resolvePartitionOptions,
  resolveSinkOptions,
  resolveSourceOptions,
} from './config';
import { ConfigurationError } from './errors';

describe('config', () => {
  describe('resolvePartitionOptions', () => {
    it('applies defaults', () => {
      expect(resolvePartitionOptions({ matchTag: 'item' })).toEqual({
        matchTag: 'item',
        chunkSize: 1000,
        chunkTag: 'chunk',
        sourceErrors: 'abort',
        encoding: undefined,
      });
    });
    it('accepts known encodings and rejects unknown ones', () => {
      expect(resolvePartitionOptions({ matchTag: 'item', encoding: 'ISO-8859-1' }).encoding).toBe('ISO-8859-1');
      expect(() => resolvePartitionOptions({ matchTag: 'item', encoding: 'x-unknown-42' })).toThrow(
        'Option "encoding" names an unknown encoding: "x-unknown-42"'
      );
    });
    it('rejects chunk sizes below one or fractional', () => {
      expect(() => resolvePartitionOptions({ matchTag: 'item', chunkSize: 0 })).toThrow(ConfigurationError);
      expect(() => resolvePartitionOptions({ matchTag: 'item', chunkSize: 1.5 })).toThrow(ConfigurationError);
    });
    it('requires a match tag', () => {
      expect(() => resolvePartitionOptions({ matchTag: ' ' })).toThrow('matchTag');
    });
  });

  describe('resolveSourceOptions', () => {
    it('applies defaults', () => {
      expect(resolveSourceOptions()).toEqual({
        pattern: '*.xml',
        recursive: false,
        extension: '.xml',
        archiveExtensions: ['.zip'],
      });
    });
    it('normalizes extensions', () => {
      expect(resolveSourceOptions({ extension: 'XML', archiveExtensions: ['ZIP', '.jar'] })).toMatchObject({
        extension: '.xml',
        archiveExtensions: ['.zip', '.jar'],
      });
    });
  });

  describe('resolveSinkOptions', () => {
    it('applies defaults', () => {
      expect(resolveSinkOptions({ outputDir: 'out' })).toEqual({
        outputDir: 'out',
        prefix: 'chunk_',
        extension: '.xml',
        digits: 4,
        overwrite: false,
      });
    });
  });

  describe('resolveHierarchyOptions', () => {
    it('applies defaults', () => {
      expect(resolveHierarchyOptions({ matchTag: 'Product' })).toEqual({
        matchTag: 'Product',
        idAttr: 'id',
        parentAttr: 'parent_id',
        rootTag: 'root',
        orphans: 'drop',
        duplicateIds: 'allow',
        annotateSource: false,
      });
    });
    it('rejects identical marker attributes', () => {
      expect(() => resolveHierarchyOptions({ matchTag: 'P', idAttr: 'x', parentAttr: 'x' })).toThrow(
        ConfigurationError
      );
    });
  });
});
