/**
 * glTF skin import and export
 */

export { importSkinnedModels, parseGltfDocument } from './skin-importer';
export { readSkinnedModels, readSkeleton, readSkinnedPrimitive, readClips, readAccessor, IMPORT_STAGES } from './skin-reader';
export { writeSkinnedModel, exportGlb } from './skin-writer';
