/**
 * Binary passthrough codec
 *
 * For callers that cache raw bytes: the object is the payload itself.
 */

import type { ObjectCodec, TargetDimensions } from '@tiercache/types';

export class BinaryCodec implements ObjectCodec<Uint8Array> {
  decode(bytes: Uint8Array, _target: TargetDimensions): Uint8Array {
    return bytes;
  }

  encodePrimary(object: Uint8Array): Uint8Array {
    return object;
  }

  encodeFallback(object: Uint8Array): Uint8Array {
    return object;
  }

  estimatedCost(object: Uint8Array): number {
    return object.byteLength;
  }
}

export const binaryCodec = new BinaryCodec();
