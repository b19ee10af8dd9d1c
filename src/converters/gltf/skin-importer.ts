/**
 * glTF Skin Importer
 *
 * Loads skinned models from a GLB buffer or a .glb/.gltf file.
 */

import { Document } from '@gltf-transform/core';
import type { SkinnedModel } from '../../core/skinned-model';
import { BaseSkinningError, SkinningErrorFactory } from '../../errors';
import type { SkinningConfig } from '../../schemas';
import { Logger, LoggerFactory } from '../../utils/logger';
import { GltfParserFactory } from '../parsers/gltf-parser-factory';
import { preprocessGltfDocument } from '../helpers/gltf-transform-helpers';
import { readSkinnedModels } from './skin-reader';

/**
 * Import Stage Names
 */
const IMPORT_PIPELINE_STAGES = {
  START: 'import_start',
  PARSING: 'gltf_parsing',
  PREPROCESS: 'gltf_preprocess',
  SKINS: 'skin_reading',
  COMPLETE: 'import_complete',
} as const;

/**
 * Parses the input with the parser the factory picks for it.
 */
export async function parseGltfDocument(input: ArrayBuffer | string, logger: Logger): Promise<Document> {
  const parser = GltfParserFactory.createParser(input);
  logger.info(`Using ${parser.getType()} parser`, { stage: IMPORT_PIPELINE_STAGES.PARSING });

  try {
    return await parser.parse(input);
  } catch (error) {
    if (error instanceof BaseSkinningError) {
      throw error;
    }
    throw SkinningErrorFactory.importError(
      `Failed to parse glTF: ${error instanceof Error ? error.message : String(error)}`,
      IMPORT_PIPELINE_STAGES.PARSING,
      { cause: error }
    );
  }
}

export async function importSkinnedModels(
  input: ArrayBuffer | string,
  config: SkinningConfig,
  logger: Logger = LoggerFactory.forImport(config.logLevel)
): Promise<SkinnedModel[]> {
  logger.logStage(IMPORT_PIPELINE_STAGES.START, {
    inputType: typeof input === 'string' ? 'file' : 'buffer',
    size: typeof input === 'string' ? undefined : input.byteLength,
  });

  return logger.withTiming('import_skinned_models', async () => {
    const document = await parseGltfDocument(input, logger);

    logger.logStage(IMPORT_PIPELINE_STAGES.PREPROCESS, { options: config.preprocess });
    await preprocessGltfDocument(document, config.preprocess, logger);

    logger.logStage(IMPORT_PIPELINE_STAGES.SKINS);
    const models = readSkinnedModels(document, {
      influences: {
        maxInfluences: config.maxInfluences,
        normalizeWeights: config.normalizeWeights,
        weightThreshold: config.weightThreshold,
      },
      logger,
    });

    logger.logStage(IMPORT_PIPELINE_STAGES.COMPLETE, { models: models.length });
    return models;
  });
}
