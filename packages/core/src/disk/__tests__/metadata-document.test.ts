/**
 * Tests for metadata document persistence
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { cacheMetadata, createMockLogger, createTempDir, removeTempDir } from '@tiercache/test-utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { loadMetadataDocument, persistMetadataDocument, temporaryPathFor } from '../metadata-document.js';

describe('metadata document', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await createTempDir();
    file = path.join(dir, 'metadata.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should treat a missing document as empty without logging', () => {
    const logger = createMockLogger();

    expect(loadMetadataDocument(file, logger)).toEqual({});
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should write a document that loads back unchanged', async () => {
    const logger = createMockLogger();
    const document = {
      one: cacheMetadata().withValidator('"abc"').withByteSize(12).build(),
      two: cacheMetadata().atSize(64, 48).build(),
    };

    expect(await persistMetadataDocument(file, document, logger)).toBe(true);

    expect(loadMetadataDocument(file, logger)).toEqual(document);
    expect(fs.existsSync(temporaryPathFor(file))).toBe(false);
  });

  it('should report and log a failed write without throwing', async () => {
    const logger = createMockLogger();
    const unwritable = path.join(dir, 'missing-dir', 'metadata.json');

    expect(await persistMetadataDocument(unwritable, {}, logger)).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(fs.existsSync(unwritable)).toBe(false);
  });

  it('should keep the previous document when a write fails', async () => {
    const logger = createMockLogger();
    const original = { one: cacheMetadata().build() };
    await persistMetadataDocument(file, original, logger);
    fs.mkdirSync(temporaryPathFor(file));

    expect(await persistMetadataDocument(file, {}, logger)).toBe(false);
    expect(loadMetadataDocument(file, logger)).toEqual(original);
  });
});
