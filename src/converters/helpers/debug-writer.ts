/**
 * Debug Output Writer
 *
 * Writes a posed frame and the exported model for inspection.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEBUG_FILE_NAMES } from '../../constants/config';
import { SkinningErrorFactory } from '../../errors';
import { LoggerFactory } from '../../utils/logger';

/**
 * Debug Output Content
 */
export interface DebugOutputContent {
  /** JSON-serializable description of the posed frame */
  pose: Record<string, unknown>;
  glb?: Uint8Array;
}

/**
 * Ensures a directory exists, creating it if necessary
 */
function ensureDirectoryExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Writes debug output to the specified directory.
 * Returns the paths written.
 */
export async function writeDebugOutput(debugDir: string, content: DebugOutputContent): Promise<string[]> {
  const logger = LoggerFactory.forDebug();
  const written: string[] = [];

  try {
    ensureDirectoryExists(debugDir);

    const posePath = path.join(debugDir, DEBUG_FILE_NAMES.POSE);
    const json = JSON.stringify(content.pose, null, 2);
    await fs.promises.writeFile(posePath, json);
    logger.info(`Written ${posePath}`, { fileSize: json.length });
    written.push(posePath);

    if (content.glb) {
      const glbPath = path.join(debugDir, DEBUG_FILE_NAMES.MODEL);
      await fs.promises.writeFile(glbPath, content.glb);
      logger.info(`Written ${glbPath}`, { fileSize: content.glb.byteLength });
      written.push(glbPath);
    }
  } catch (error) {
    throw SkinningErrorFactory.fileSystemError(
      `Failed to write debug output: ${error instanceof Error ? error.message : String(error)}`,
      debugDir,
      'write',
      { cause: error }
    );
  }

  return written;
}
