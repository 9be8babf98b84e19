import { randomUUID } from 'node:crypto';
import path from 'node:path';

import {
  IncompatibleInputsError,
  MalformedContractError,
  UnsupportedResourceError,
} from '../lib/errors.js';
import {
  type GatherTask,
  type OptionSchema,
  type OptionValue,
  type OutputFileType,
  RESOURCE_TYPES,
  type ResolvedGatherTask,
  type ResolvedResource,
  type ResolvedScatterTask,
  type ResolvedStandardTask,
  type ResolvedToolContract,
  type ResourceType,
  type ScatterTask,
  type ToolContract,
  type ToolContractTask,
} from '../lib/types.js';

import { normalizeChunkKey } from './chunks.js';
import { engineEvents } from './events.js';
import { type FileTypeRegistry, fileTypes } from './file-types.js';
import { validateOptionValue } from './options.js';
import { assertPositiveInteger, resolveIntOrMax } from './symbols.js';

export interface ResolveRequest {
  /** Concrete input paths, one per declared input file type, in order. */
  inputFiles: readonly string[];
  outputDir: string;
  tmpDir: string;
  maxNproc: number;
  /** Option overrides keyed by option id. */
  options?: Readonly<Record<string, unknown>>;
}

export interface ScatterResolveRequest extends ResolveRequest {
  maxNchunks: number;
  chunkKeys?: readonly string[];
}

export interface GatherResolveRequest extends ResolveRequest {
  chunkKey?: string;
}

export interface AnyResolveRequest extends ResolveRequest {
  maxNchunks: number;
  chunkKeys?: readonly string[];
  chunkKey?: string;
}

export interface ResolveContext {
  registry?: FileTypeRegistry;
  /** Unique token used in temp and log resource names. */
  createId?: () => string;
}

interface ResolvedCore {
  outputFiles: readonly string[];
  options: Readonly<Record<string, OptionValue>>;
  nproc: number;
  resources: readonly ResolvedResource[];
}

const RESOURCE_PREFIXES: Record<ResourceType, string> = {
  [RESOURCE_TYPES.tmpDir]: 'tmpdir',
  [RESOURCE_TYPES.tmpFile]: 'tmpfile',
  [RESOURCE_TYPES.logFile]: 'task',
};

function splitDefaultName(name: string): [base: string, ext: string] {
  const dot = name.indexOf('.');
  if (dot <= 0) {
    return [name, ''];
  }
  return [name.slice(0, dot), name.slice(dot + 1)];
}

function joinFileName(base: string, ext: string): string {
  return ext.length > 0 ? `${base}.${ext}` : base;
}

function numberedFileName(base: string, ext: string, n: number): string {
  return joinFileName(n === 0 ? base : `${base}-${String(n)}`, ext);
}

function outputBaseAndExt(
  output: OutputFileType,
  registry: FileTypeRegistry
): [base: string, ext: string] {
  const fileType = registry.lookup(output.fileTypeId);
  const { defaultName } = output;
  if (defaultName === undefined) {
    return [fileType.baseName, fileType.ext];
  }
  if (typeof defaultName === 'string') {
    return splitDefaultName(defaultName);
  }
  return [defaultName[0], defaultName[1]];
}

function resolveUnderDir(outputDir: string, fileName: string): string {
  const root = path.resolve(outputDir);
  const resolved = path.resolve(root, fileName);
  const relative = path.relative(root, resolved);
  if (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new MalformedContractError(
      `Output file name '${fileName}' does not resolve inside ${root}`
    );
  }
  return resolved;
}

/**
 * Output paths in declared order. The first use of a file name keeps it as
 * is; later uses get `-1`, `-2`, ... before the extension, skipping any name
 * already handed out in this call.
 */
function resolveOutputFiles(
  outputs: readonly OutputFileType[],
  outputDir: string,
  registry: FileTypeRegistry
): string[] {
  const emitted = new Set<string>();
  const counters = new Map<string, number>();

  return outputs.map((output) => {
    const [base, ext] = outputBaseAndExt(output, registry);
    const plain = joinFileName(base, ext);
    let occurrence = counters.get(plain) ?? 0;
    let candidate = numberedFileName(base, ext, occurrence);
    while (emitted.has(candidate)) {
      occurrence += 1;
      candidate = numberedFileName(base, ext, occurrence);
    }
    counters.set(plain, occurrence + 1);
    emitted.add(candidate);
    return resolveUnderDir(outputDir, candidate);
  });
}

function resolveOptions(
  options: readonly OptionSchema[],
  overrides: Readonly<Record<string, unknown>>
): Record<string, OptionValue> {
  const resolved: Record<string, OptionValue> = {};
  for (const option of options) {
    const value = Object.hasOwn(overrides, option.id)
      ? overrides[option.id]
      : option.default;
    resolved[option.id] = validateOptionValue(option, value);
  }
  return resolved;
}

function isResourceType(value: string): value is ResourceType {
  return Object.hasOwn(RESOURCE_PREFIXES, value);
}

function resolveResources(
  resourceTypes: readonly string[],
  outputDir: string,
  tmpDir: string,
  createId: () => string
): ResolvedResource[] {
  return resourceTypes.map((resourceType) => {
    if (!isResourceType(resourceType)) {
      throw new UnsupportedResourceError(resourceType);
    }
    const name = `${RESOURCE_PREFIXES[resourceType]}-${createId()}`;
    const resolvedPath =
      resourceType === RESOURCE_TYPES.logFile
        ? path.resolve(outputDir, `${name}.log`)
        : path.resolve(tmpDir, name);
    return Object.freeze({ resourceType, path: resolvedPath });
  });
}

function resolveCore(
  task: ToolContractTask,
  request: ResolveRequest,
  context: ResolveContext
): ResolvedCore {
  const registry = context.registry ?? fileTypes;
  const createId = context.createId ?? randomUUID;

  if (request.inputFiles.length !== task.inputFileTypes.length) {
    throw new IncompatibleInputsError(
      request.inputFiles.length,
      task.inputFileTypes.length
    );
  }

  const maxNproc = assertPositiveInteger(request.maxNproc, 'maxNproc');
  const outputFiles = resolveOutputFiles(
    task.outputFileTypes,
    request.outputDir,
    registry
  );
  const options = resolveOptions(task.options, request.options ?? {});
  const nproc = resolveIntOrMax(task.nproc, maxNproc);
  const resources = resolveResources(
    task.resourceTypes,
    request.outputDir,
    request.tmpDir,
    createId
  );

  return {
    outputFiles: Object.freeze(outputFiles),
    options: Object.freeze(options),
    nproc,
    resources: Object.freeze(resources),
  };
}

function finish<T extends ResolvedToolContract['task']>(
  task: T,
  contract: ToolContract
): ResolvedToolContract<T> {
  engineEvents.emit('contract:resolved', {
    taskId: task.taskId,
    taskType: task.taskType,
    outputFiles: task.outputFiles.length,
    nproc: task.nproc,
  });
  return Object.freeze({ task: Object.freeze(task), driver: contract.driver });
}

export function resolveToolContract(
  contract: ToolContract,
  request: ResolveRequest,
  context: ResolveContext = {}
): ResolvedToolContract<ResolvedStandardTask> {
  const { task } = contract;
  const core = resolveCore(task, request, context);
  return finish<ResolvedStandardTask>(
    {
      taskId: task.taskId,
      taskType: 'standard',
      isDistributed: task.isDistributed,
      inputFiles: Object.freeze([...request.inputFiles]),
      ...core,
    },
    contract
  );
}

export function resolveScatterToolContract(
  contract: ToolContract<ScatterTask>,
  request: ScatterResolveRequest,
  context: ResolveContext = {}
): ResolvedToolContract<ResolvedScatterTask> {
  const { task } = contract;
  const core = resolveCore(task, request, context);
  const maxNchunks = resolveIntOrMax(
    task.maxNchunks,
    assertPositiveInteger(request.maxNchunks, 'maxNchunks')
  );
  const chunkKeys = (request.chunkKeys ?? task.chunkKeys).map((key) =>
    normalizeChunkKey(key)
  );

  return finish<ResolvedScatterTask>(
    {
      taskId: task.taskId,
      taskType: 'scattered',
      isDistributed: task.isDistributed,
      inputFiles: Object.freeze([...request.inputFiles]),
      ...core,
      maxNchunks,
      chunkKeys: Object.freeze(chunkKeys),
    },
    contract
  );
}

export function resolveGatherToolContract(
  contract: ToolContract<GatherTask>,
  request: GatherResolveRequest,
  context: ResolveContext = {}
): ResolvedToolContract<ResolvedGatherTask> {
  const { task } = contract;
  const core = resolveCore(task, request, context);

  return finish<ResolvedGatherTask>(
    {
      taskId: task.taskId,
      taskType: 'gathered',
      isDistributed: task.isDistributed,
      inputFiles: Object.freeze([...request.inputFiles]),
      ...core,
      chunkKey: normalizeChunkKey(request.chunkKey ?? task.chunkKey),
    },
    contract
  );
}

function isScatterContract(
  contract: ToolContract
): contract is ToolContract<ScatterTask> {
  return contract.task.taskType === 'scattered';
}

function isGatherContract(
  contract: ToolContract
): contract is ToolContract<GatherTask> {
  return contract.task.taskType === 'gathered';
}

/** Dispatch on the contract's task type. */
export function resolveAnyToolContract(
  contract: ToolContract,
  request: AnyResolveRequest,
  context: ResolveContext = {}
): ResolvedToolContract {
  if (isScatterContract(contract)) {
    return resolveScatterToolContract(contract, request, context);
  }
  if (isGatherContract(contract)) {
    return resolveGatherToolContract(contract, request, context);
  }
  return resolveToolContract(contract, request, context);
}
