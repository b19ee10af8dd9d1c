/**
 * glTF Transform Helpers
 *
 * Preprocessing from @gltf-transform/functions applied to a document
 * before its skins are read.
 */

import { Document } from '@gltf-transform/core';
import { dequantize, resample } from '@gltf-transform/functions';
import type { GltfPreprocessOptions } from '../../schemas';
import { Logger } from '../../utils/logger';

/**
 * Applies the enabled transforms in place.
 *
 * - dequantize: KHR_mesh_quantization attributes become float32, so
 *   positions and weights read as plain floats.
 * - resample: drops redundant animation keys, which keeps baked clips small.
 */
export async function preprocessGltfDocument(
  document: Document,
  options: GltfPreprocessOptions,
  logger: Logger
): Promise<void> {
  if (options.dequantize) {
    logger.debug('Applying glTF transform', { operation: 'dequantize' });
    await document.transform(dequantize());
  }

  if (options.resample) {
    logger.debug('Applying glTF transform', { operation: 'resample' });
    await document.transform(resample());
  }
}
