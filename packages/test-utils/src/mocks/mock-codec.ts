/**
 * Mock object codec for testing
 *
 * Objects are the raw bytes themselves, so tests can compare payloads directly.
 */

import type { TargetDimensions } from '@tiercache/types';
import { vi, type Mock } from 'vitest';

export interface MockCodecConfig {
  /** Number of initial decode calls that fail (return undefined) */
  failDecodes?: number;
  /** Primary encoding returns undefined */
  failPrimary?: boolean;
  /** Fallback encoding returns undefined */
  failFallback?: boolean;
  /** Failures throw instead of returning undefined */
  throwOnFailure?: boolean;
}

export interface MockCodec {
  decode: Mock<(bytes: Uint8Array, target: TargetDimensions) => Promise<Uint8Array | undefined>>;
  encodePrimary: Mock<(object: Uint8Array) => Promise<Uint8Array | undefined>>;
  encodeFallback: Mock<(object: Uint8Array) => Promise<Uint8Array | undefined>>;
  estimatedCost: Mock<(object: Uint8Array) => number>;
}

/**
 * Create a byte codec whose failures are scripted
 */
export function createMockCodec(config: MockCodecConfig = {}): MockCodec {
  let remainingDecodeFailures = config.failDecodes ?? 0;

  const fail = (what: string): undefined => {
    if (config.throwOnFailure) {
      throw new Error(`Mock codec: ${what} failed`);
    }
    return undefined;
  };

  return {
    decode: vi.fn(async (bytes: Uint8Array, _target: TargetDimensions) => {
      if (remainingDecodeFailures > 0) {
        remainingDecodeFailures--;
        return fail('decode');
      }
      return bytes.slice();
    }),
    encodePrimary: vi.fn(async (object: Uint8Array) => (config.failPrimary ? fail('primary encode') : object.slice())),
    encodeFallback: vi.fn(async (object: Uint8Array) =>
      config.failFallback ? fail('fallback encode') : object.slice(),
    ),
    estimatedCost: vi.fn((object: Uint8Array) => object.byteLength),
  };
}

/**
 * Bytes of a UTF-8 string
 */
export function bytesOf(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * UTF-8 text of some bytes
 */
export function textOf(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}
