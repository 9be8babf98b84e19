export {
  chunksFromDocument,
  chunksToDocument,
  getChunkValues,
  normalizeChunkKey,
  PipelineChunk,
} from './chunks.js';
export { getResolverDefaults } from './config.js';
export type { ResolverDefaults } from './config.js';
export {
  loadPipelineChunks,
  loadResolvedToolContract,
  loadToolContract,
  writePipelineChunks,
  writeResolvedToolContract,
  writeToolContract,
} from './contract-io.js';
export { engineEvents } from './events.js';
export {
  createStandardFileTypeRegistry,
  FileTypeRegistry,
  fileTypes,
  StandardFileTypes,
} from './file-types.js';
export {
  createOption,
  optionFromSchema,
  optionToSchema,
  validateOptionValue,
} from './options.js';
export {
  resolvedToolContractFromDocument,
  resolvedToolContractToDocument,
} from './resolved-contract.js';
export {
  resolveAnyToolContract,
  resolveGatherToolContract,
  resolveScatterToolContract,
  resolveToolContract,
} from './resolver.js';
export type {
  AnyResolveRequest,
  GatherResolveRequest,
  ResolveContext,
  ResolveRequest,
  ScatterResolveRequest,
} from './resolver.js';
export { literal, USE_MAXIMUM } from './symbols.js';
export {
  createDriver,
  ToolContractBuilder,
  toolContractFromDocument,
  toolContractToDocument,
} from './tool-contract.js';
export type { CliArgument, ToolContractBuilderConfig } from './tool-contract.js';
