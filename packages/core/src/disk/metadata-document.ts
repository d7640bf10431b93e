/**
 * Metadata document persistence
 *
 * The whole key → metadata mapping is one JSON document, rewritten in full
 * after every mutating disk operation. Writes go to a temporary file that is
 * renamed over the target, so a crash mid-write leaves the previous document
 * intact.
 */

import * as fs from 'node:fs';

import { MetadataCorruptError, MetadataPersistError, toError } from '../errors.js';
import type { CacheLogger } from '../logger.js';
import { type MetadataDocument, metadataDocumentSchema } from '../metadata.js';

/**
 * Path of the temporary file used while persisting
 */
export function temporaryPathFor(filePath: string): string {
  return `${filePath}.tmp`;
}

/**
 * Read and decode the metadata document
 *
 * A missing document is an empty cache. An unreadable or invalid one is
 * logged and also treated as empty (cold start).
 */
export function loadMetadataDocument(filePath: string, logger: CacheLogger): MetadataDocument {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const error = new MetadataCorruptError(filePath, 'not readable as JSON', toError(err));
    logger.warn(error.message, { code: error.code });
    return {};
  }

  const result = metadataDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const reason = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch';
    const error = new MetadataCorruptError(filePath, reason);
    logger.warn(error.message, { code: error.code });
    return {};
  }

  return result.data;
}

/**
 * Write the metadata document atomically
 *
 * @returns false when the write failed (the failure is logged, not thrown)
 */
export async function persistMetadataDocument(
  filePath: string,
  document: MetadataDocument,
  logger: CacheLogger,
): Promise<boolean> {
  const temporaryPath = temporaryPathFor(filePath);

  try {
    await fs.promises.writeFile(temporaryPath, JSON.stringify(document), 'utf-8');
    await fs.promises.rename(temporaryPath, filePath);
    return true;
  } catch (err) {
    const error = new MetadataPersistError(filePath, toError(err));
    logger.error(error.message, { code: error.code });
    await fs.promises.rm(temporaryPath, { force: true }).catch((cleanupErr: unknown) => {
      logger.debug('Failed to remove temporary metadata file', {
        path: temporaryPath,
        error: toError(cleanupErr).message,
      });
    });
    return false;
  }
}
