import type { AssembledImage, BinArtifact } from './types.js';

/**
 * Create a flat binary artifact: the full 64-byte image, zero fill included.
 */
export function writeBin(image: AssembledImage): BinArtifact {
  return { kind: 'bin', bytes: Uint8Array.from(image.bytes) };
}
