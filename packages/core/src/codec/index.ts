export { BinaryCodec, binaryCodec } from './binary-codec.js';
