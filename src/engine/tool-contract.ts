import {
  type OutputTypeDocument,
  parseDocument,
  type ToolContractDocument,
  ToolContractDocumentSchema,
} from '../schemas/documents.js';

import { MalformedContractError } from '../lib/errors.js';
import {
  type DefaultName,
  type FileType,
  type GatherTask,
  type InputFileType,
  type IntOrMax,
  type OptionSchema,
  type OptionValueType,
  type OutputFileType,
  type ScatterTask,
  type StandardTask,
  SYMBOLS,
  type TaskType,
  type ToolContract,
  type ToolContractTask,
  type ToolDriver,
} from '../lib/types.js';
import { isPlainDefaultName, validateTaskId } from '../lib/validators.js';

import { normalizeChunkKey } from './chunks.js';
import {
  createOption,
  type OptionDefinition,
  optionFromSchema,
  optionToSchema,
} from './options.js';
import { encodeIntOrMax, parseIntOrMax, USE_MAXIMUM } from './symbols.js';

export const CONTRACT_DOCUMENT_COMMENT = 'Created by tool-contract-resolver';

interface TaskMetadata {
  taskId: string;
  name: string;
  description: string;
  version: string;
  driver: ToolDriver;
  isDistributed?: boolean;
  nproc?: IntOrMax;
  resourceTypes?: readonly string[];
}

export type ToolContractBuilderConfig =
  | (TaskMetadata & { taskType?: 'standard' })
  | (TaskMetadata & {
      taskType: 'scattered';
      chunkKeys: readonly string[];
      maxNchunks?: IntOrMax;
    })
  | (TaskMetadata & { taskType: 'gathered'; chunkKey: string });

/** Argument descriptor handed to a command line wrapper around the tool. */
export interface CliArgument {
  readonly flag: string;
  readonly optionId: string;
  readonly type: OptionValueType;
  readonly default: OptionSchema['default'];
  readonly choices?: readonly OptionSchema['default'][];
  readonly help: string;
}

function toFlag(shortName: string): string {
  return `--${shortName}`;
}

function shortNameOf(optionId: string): string {
  return optionId.slice(optionId.lastIndexOf('.') + 1);
}

function freezeList<T>(items: readonly T[]): readonly T[] {
  return Object.freeze([...items]);
}

export function createDriver(
  exe: string,
  env: Readonly<Record<string, string>> = {}
): ToolDriver {
  return Object.freeze({ exe, env: Object.freeze({ ...env }) });
}

/**
 * Append-only builder for a tool contract. Every option call records the
 * option schema for the contract and the matching command line argument.
 */
export class ToolContractBuilder {
  private readonly config: ToolContractBuilderConfig;
  private readonly inputFileTypes: InputFileType[] = [];
  private readonly outputFileTypes: OutputFileType[] = [];
  private readonly options: OptionSchema[] = [];
  private readonly cliArguments: CliArgument[] = [];

  constructor(config: ToolContractBuilderConfig) {
    validateTaskId(config.taskId);
    this.config = config;
  }

  get taskId(): string {
    return this.config.taskId;
  }

  addInputFileType(
    fileType: Pick<FileType, 'fileTypeId'>,
    label: string,
    name: string,
    description: string
  ): this {
    this.inputFileTypes.push(
      Object.freeze({
        fileTypeId: fileType.fileTypeId,
        label,
        displayName: name,
        description,
      })
    );
    return this;
  }

  addOutputFileType(
    fileType: Pick<FileType, 'fileTypeId'>,
    label: string,
    name: string,
    description: string,
    defaultName?: DefaultName
  ): this {
    if (defaultName !== undefined && !isPlainDefaultName(defaultName)) {
      throw new MalformedContractError(
        `Output '${label}' default name ${JSON.stringify(defaultName)} must be a file name without path separators`
      );
    }
    this.outputFileTypes.push(
      Object.freeze({
        fileTypeId: fileType.fileTypeId,
        label,
        displayName: name,
        description,
        ...(defaultName !== undefined ? { defaultName } : {}),
      })
    );
    return this;
  }

  addInt(
    optionId: string,
    shortName: string,
    defaultValue: number,
    name: string,
    description: string
  ): this {
    return this.addOption(shortName, {
      id: optionId,
      name,
      description,
      type: 'integer',
      default: defaultValue,
    });
  }

  addFloat(
    optionId: string,
    shortName: string,
    defaultValue: number,
    name: string,
    description: string
  ): this {
    return this.addOption(shortName, {
      id: optionId,
      name,
      description,
      type: 'number',
      default: defaultValue,
    });
  }

  addStr(
    optionId: string,
    shortName: string,
    defaultValue: string,
    name: string,
    description: string
  ): this {
    return this.addOption(shortName, {
      id: optionId,
      name,
      description,
      type: 'string',
      default: defaultValue,
    });
  }

  addBoolean(
    optionId: string,
    shortName: string,
    defaultValue: boolean,
    name: string,
    description: string
  ): this {
    return this.addOption(shortName, {
      id: optionId,
      name,
      description,
      type: 'boolean',
      default: defaultValue,
    });
  }

  addChoiceInt(
    optionId: string,
    shortName: string,
    choices: readonly number[],
    defaultValue: number,
    name: string,
    description: string
  ): this {
    return this.addOption(shortName, {
      id: optionId,
      name,
      description,
      type: 'integer',
      default: defaultValue,
      choices,
    });
  }

  addChoiceFloat(
    optionId: string,
    shortName: string,
    choices: readonly number[],
    defaultValue: number,
    name: string,
    description: string
  ): this {
    return this.addOption(shortName, {
      id: optionId,
      name,
      description,
      type: 'number',
      default: defaultValue,
      choices,
    });
  }

  addChoiceStr(
    optionId: string,
    shortName: string,
    choices: readonly string[],
    defaultValue: string,
    name: string,
    description: string
  ): this {
    return this.addOption(shortName, {
      id: optionId,
      name,
      description,
      type: 'string',
      default: defaultValue,
      choices,
    });
  }

  /**
   * Append an already validated option. The command line flag defaults to the
   * last segment of the option id.
   */
  addOptionSchema(
    option: OptionSchema,
    shortName = shortNameOf(option.id)
  ): this {
    this.options.push(option);
    this.cliArguments.push(
      Object.freeze({
        flag: toFlag(shortName),
        optionId: option.id,
        type: option.type,
        default: option.default,
        ...(option.variant === 'choice' ? { choices: option.choices } : {}),
        help: option.description,
      })
    );
    return this;
  }

  toCliArguments(): readonly CliArgument[] {
    return freezeList(this.cliArguments);
  }

  build(): ToolContract {
    return Object.freeze({
      task: this.buildTask(),
      driver: this.config.driver,
    });
  }

  private addOption(shortName: string, definition: OptionDefinition): this {
    return this.addOptionSchema(createOption(definition), shortName);
  }

  private buildTask(): ToolContractTask {
    const { config } = this;
    const base = {
      taskId: config.taskId,
      name: config.name,
      description: config.description,
      version: config.version,
      isDistributed: config.isDistributed ?? true,
      inputFileTypes: freezeList(this.inputFileTypes),
      outputFileTypes: freezeList(this.outputFileTypes),
      options: freezeList(this.options),
      nproc: config.nproc ?? USE_MAXIMUM,
      resourceTypes: freezeList(config.resourceTypes ?? []),
    };

    switch (config.taskType) {
      case 'scattered': {
        const task: ScatterTask = {
          ...base,
          taskType: 'scattered',
          chunkKeys: freezeList(
            config.chunkKeys.map((key) => normalizeChunkKey(key))
          ),
          maxNchunks: config.maxNchunks ?? USE_MAXIMUM,
        };
        return Object.freeze(task);
      }
      case 'gathered': {
        const task: GatherTask = {
          ...base,
          taskType: 'gathered',
          chunkKey: normalizeChunkKey(config.chunkKey),
        };
        return Object.freeze(task);
      }
      case undefined:
      case 'standard': {
        const task: StandardTask = { ...base, taskType: 'standard' };
        return Object.freeze(task);
      }
    }
  }
}

function defaultNameToDocument(
  defaultName: DefaultName | undefined
): OutputTypeDocument['default_name'] {
  if (defaultName === undefined) {
    return null;
  }
  return typeof defaultName === 'string'
    ? defaultName
    : [defaultName[0], defaultName[1]];
}

function defaultNameFromDocument(
  raw: OutputTypeDocument['default_name']
): DefaultName | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  if (typeof raw === 'string') {
    return raw;
  }
  return Object.freeze([raw[0], raw[1]] as const);
}

function assertHasFileTypes(task: ToolContractTask): void {
  if (task.inputFileTypes.length === 0) {
    throw new MalformedContractError(
      `Tool contract ${task.taskId} declares no input file types`
    );
  }
  if (task.outputFileTypes.length === 0) {
    throw new MalformedContractError(
      `Tool contract ${task.taskId} declares no output file types`
    );
  }
}

export function toolContractToDocument(
  contract: ToolContract
): ToolContractDocument {
  const { task, driver } = contract;
  assertHasFileTypes(task);

  return {
    version: task.version,
    tool_contract_id: task.taskId,
    driver: { exe: driver.exe, env: { ...driver.env } },
    tool_contract: {
      _comment: CONTRACT_DOCUMENT_COMMENT,
      tool_contract_id: task.taskId,
      name: task.name,
      description: task.description,
      task_type: task.taskType,
      is_distributed: task.isDistributed,
      input_types: task.inputFileTypes.map((input) => ({
        file_type_id: input.fileTypeId,
        id: input.label,
        title: input.displayName,
        description: input.description,
      })),
      output_types: task.outputFileTypes.map((output) => ({
        file_type_id: output.fileTypeId,
        id: output.label,
        title: output.displayName,
        description: output.description,
        default_name: defaultNameToDocument(output.defaultName),
      })),
      schema_options: task.options.map(optionToSchema),
      nproc: encodeIntOrMax(task.nproc, SYMBOLS.maxNproc),
      resource_types: [...task.resourceTypes],
      ...(task.taskType === 'scattered'
        ? {
            chunk_keys: [...task.chunkKeys],
            nchunks: encodeIntOrMax(task.maxNchunks, SYMBOLS.maxNchunks),
          }
        : {}),
      ...(task.taskType === 'gathered' ? { chunk_key: task.chunkKey } : {}),
    },
  };
}

function readTaskTypeConfig(
  body: ToolContractDocument['tool_contract'],
  taskType: TaskType
):
  | { taskType: 'standard' }
  | { taskType: 'scattered'; chunkKeys: readonly string[]; maxNchunks: IntOrMax }
  | { taskType: 'gathered'; chunkKey: string } {
  switch (taskType) {
    case 'standard':
      return { taskType };
    case 'scattered':
      return {
        taskType,
        chunkKeys: body.chunk_keys ?? [],
        maxNchunks:
          body.nchunks === undefined
            ? USE_MAXIMUM
            : parseIntOrMax(body.nchunks, SYMBOLS.maxNchunks),
      };
    case 'gathered':
      if (body.chunk_key === undefined) {
        throw new MalformedContractError(
          'Gathered tool contract is missing chunk_key'
        );
      }
      return { taskType, chunkKey: body.chunk_key };
  }
}

export function toolContractFromDocument(raw: unknown): ToolContract {
  const document = parseDocument(
    ToolContractDocumentSchema,
    raw,
    'tool contract document'
  );
  const body = document.tool_contract;

  if (
    body.tool_contract_id !== undefined &&
    body.tool_contract_id !== document.tool_contract_id
  ) {
    throw new MalformedContractError(
      `Tool contract id mismatch: ${document.tool_contract_id} vs ${body.tool_contract_id}`
    );
  }

  const builder = new ToolContractBuilder({
    taskId: document.tool_contract_id,
    name: body.name,
    description: body.description,
    version: document.version,
    driver: createDriver(document.driver.exe, document.driver.env),
    isDistributed: body.is_distributed,
    nproc: parseIntOrMax(body.nproc, SYMBOLS.maxNproc),
    resourceTypes: body.resource_types,
    ...readTaskTypeConfig(body, body.task_type),
  });

  for (const input of body.input_types) {
    builder.addInputFileType(
      { fileTypeId: input.file_type_id },
      input.id,
      input.title,
      input.description
    );
  }
  for (const output of body.output_types) {
    builder.addOutputFileType(
      { fileTypeId: output.file_type_id },
      output.id,
      output.title,
      output.description,
      defaultNameFromDocument(output.default_name)
    );
  }
  for (const option of body.schema_options) {
    builder.addOptionSchema(optionFromSchema(option));
  }

  return builder.build();
}
