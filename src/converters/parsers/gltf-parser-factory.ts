/**
 * glTF Parser Factory
 *
 * Factory pattern for selecting the parser for an input: GLB bytes from an
 * ArrayBuffer, or a .glb/.gltf file on disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Document, NodeIO } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import { FILE_EXTENSIONS } from '../../constants/config';
import { SkinningErrorFactory } from '../../errors';

/**
 * Parser interface
 */
export interface IGltfParser {
  parse(input: ArrayBuffer | string): Promise<Document>;
  getType(): string;
}

function createIO(): NodeIO {
  return new NodeIO().registerExtensions(ALL_EXTENSIONS);
}

/**
 * GLB Parser - handles binary GLB data from an ArrayBuffer
 */
class GlbParser implements IGltfParser {
  private io = createIO();

  async parse(input: ArrayBuffer | string): Promise<Document> {
    if (typeof input === 'string') {
      throw SkinningErrorFactory.importError('GlbParser expects ArrayBuffer, received string path', 'parsing');
    }
    return this.io.readBinary(new Uint8Array(input));
  }

  getType(): string {
    return 'GLB';
  }
}

/**
 * File Parser - handles .glb and .gltf paths, including external .bin resources
 */
class GltfFileParser implements IGltfParser {
  private io = createIO();

  async parse(input: ArrayBuffer | string): Promise<Document> {
    if (typeof input !== 'string') {
      throw SkinningErrorFactory.importError('GltfFileParser expects file path string, received ArrayBuffer', 'parsing');
    }
    return this.io.read(input);
  }

  getType(): string {
    return 'GLTF';
  }
}

/**
 * Parser factory
 */
export const GltfParserFactory = {
  /**
   * Picks a parser for the input, checking that file paths exist and carry
   * a glTF extension.
   */
  createParser(input: ArrayBuffer | string): IGltfParser {
    if (typeof input !== 'string') {
      return new GlbParser();
    }

    const filePath = path.resolve(input);
    if (!fs.existsSync(filePath)) {
      throw SkinningErrorFactory.fileSystemError(`File not found: ${filePath}`, filePath, 'read');
    }

    const extension = path.extname(filePath).toLowerCase();
    if (extension !== FILE_EXTENSIONS.GLB && extension !== FILE_EXTENSIONS.GLTF) {
      throw SkinningErrorFactory.importError(`Unsupported file format: ${extension}`, 'unsupported_format', { filePath });
    }

    return new GltfFileParser();
  },
};
