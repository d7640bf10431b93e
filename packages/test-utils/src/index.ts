/**
 * @tiercache/test-utils
 *
 * Shared test utilities for tiercache packages
 */

// Fixtures
export { createTempDir, removeTempDir } from './fixtures/temp-dir.js';

// Mocks
export { createMockCodec, bytesOf, textOf, type MockCodec, type MockCodecConfig } from './mocks/mock-codec.js';

export {
  createMockFetcher,
  freshResult,
  failedResult,
  NOT_MODIFIED,
  type MockFetcher,
  type MockFetcherConfig,
} from './mocks/mock-fetcher.js';

export { createMockLogger, loggedMessages, type MockLogger } from './mocks/mock-logger.js';

export { createPressureSignal, type ManualPressureSignal } from './mocks/mock-pressure.js';

// Builders
export { CacheMetadataBuilder, cacheMetadata, TEST_EPOCH } from './builders/metadata-builder.js';
