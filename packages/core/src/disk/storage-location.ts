/**
 * Storage location resolution
 *
 * Maps a StorageLocation onto the concrete directories the disk tier uses:
 *
 *   <base>/objects/        payload files, one per cache key
 *   <base>/metadata.json   metadata document
 */

import * as os from 'node:os';
import * as path from 'node:path';

import type { StorageLocation } from '../config/schema.js';
import { StoragePathUnavailableError } from '../errors.js';

export const CACHE_DIRECTORY_NAME = 'tiercache';
export const OBJECTS_DIRECTORY_NAME = 'objects';
export const METADATA_FILE_NAME = 'metadata.json';

/**
 * Concrete paths used by the disk tier
 */
export interface StoragePaths {
  baseDirectory: string;
  objectsDirectory: string;
  metadataFile: string;
}

type Env = Record<string, string | undefined>;

function defaultBaseDirectory(env: Env): string | undefined {
  const xdg = env['XDG_CACHE_HOME'];
  if (xdg && path.isAbsolute(xdg)) {
    return path.join(xdg, CACHE_DIRECTORY_NAME);
  }
  const home = os.homedir();
  return home ? path.join(home, '.cache', CACHE_DIRECTORY_NAME) : undefined;
}

/**
 * Resolve the base directory for a location, or undefined when none exists
 */
export function resolveBaseDirectory(location: StorageLocation, env: Env = process.env): string | undefined {
  switch (location.kind) {
    case 'default':
      return defaultBaseDirectory(env);
    case 'shared': {
      const identifier = location.identifier.trim();
      if (!identifier || identifier.includes('/') || identifier.includes('\\') || identifier === '..') {
        return undefined;
      }
      const sharedRoot = env['TIERCACHE_SHARED_ROOT'] || os.tmpdir();
      return path.join(sharedRoot, identifier, CACHE_DIRECTORY_NAME);
    }
    case 'custom':
      return location.path ? path.resolve(location.path) : undefined;
  }
}

/**
 * Resolve all disk tier paths for a location
 *
 * @throws StoragePathUnavailableError when no base directory can be resolved
 */
export function resolveStoragePaths(location: StorageLocation, env: Env = process.env): StoragePaths {
  const baseDirectory = resolveBaseDirectory(location, env);
  if (!baseDirectory) {
    throw new StoragePathUnavailableError(describeLocation(location));
  }
  return {
    baseDirectory,
    objectsDirectory: path.join(baseDirectory, OBJECTS_DIRECTORY_NAME),
    metadataFile: path.join(baseDirectory, METADATA_FILE_NAME),
  };
}

/**
 * Human-readable description of a location
 */
export function describeLocation(location: StorageLocation): string {
  switch (location.kind) {
    case 'default':
      return 'default cache directory';
    case 'shared':
      return `shared container '${location.identifier}'`;
    case 'custom':
      return location.path || '(empty path)';
  }
}
