/**
 * Disk tier exports
 */

export { DiskTier, isSafeDiskKey, type DiskTierOptions, type DiskEntry } from './disk-tier.js';

export {
  CACHE_DIRECTORY_NAME,
  OBJECTS_DIRECTORY_NAME,
  METADATA_FILE_NAME,
  type StoragePaths,
  resolveBaseDirectory,
  resolveStoragePaths,
  describeLocation,
} from './storage-location.js';

export { loadMetadataDocument, persistMetadataDocument, temporaryPathFor } from './metadata-document.js';
