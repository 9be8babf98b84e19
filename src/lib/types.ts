export const OPTION_VALUE_TYPES = [
  'integer',
  'number',
  'string',
  'boolean',
] as const;
export type OptionValueType = (typeof OPTION_VALUE_TYPES)[number];
export type OptionValue = number | string | boolean;

export const TASK_TYPES = ['standard', 'scattered', 'gathered'] as const;
export type TaskType = (typeof TASK_TYPES)[number];

/** Resource tags a contract may request; anything else fails resolution. */
export const RESOURCE_TYPES = {
  tmpDir: '$tmpdir',
  tmpFile: '$tmpfile',
  logFile: '$logfile',
} as const;
export type ResourceType = (typeof RESOURCE_TYPES)[keyof typeof RESOURCE_TYPES];

export const SYMBOLS = {
  maxNproc: '$max_nproc',
  maxNchunks: '$max_nchunks',
} as const;
export type MaxSymbol = (typeof SYMBOLS)[keyof typeof SYMBOLS];

export const CHUNK_KEY_PREFIX = '$chunk.';

export type IntOrMax =
  | { readonly kind: 'literal'; readonly value: number }
  | { readonly kind: 'max' };

export type ChunkValue = string | number | boolean | null;

export interface FileType {
  readonly fileTypeId: string;
  readonly baseName: string;
  readonly ext: string;
  readonly mimeType: string;
}

interface OptionSchemaBase {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly type: OptionValueType;
  readonly default: OptionValue;
}

export interface PlainOptionSchema extends OptionSchemaBase {
  readonly variant: 'plain';
}

export interface ChoiceOptionSchema extends OptionSchemaBase {
  readonly variant: 'choice';
  readonly choices: readonly OptionValue[];
}

export type OptionSchema = PlainOptionSchema | ChoiceOptionSchema;

export interface InputFileType {
  readonly fileTypeId: string;
  readonly label: string;
  readonly displayName: string;
  readonly description: string;
}

export type DefaultName = string | readonly [base: string, ext: string];

export interface OutputFileType extends InputFileType {
  readonly defaultName?: DefaultName;
}

export interface ToolDriver {
  readonly exe: string;
  readonly env: Readonly<Record<string, string>>;
}

interface TaskBase {
  readonly taskId: string;
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly isDistributed: boolean;
  readonly inputFileTypes: readonly InputFileType[];
  readonly outputFileTypes: readonly OutputFileType[];
  readonly options: readonly OptionSchema[];
  readonly nproc: IntOrMax;
  /** Requested resource tags, see RESOURCE_TYPES. */
  readonly resourceTypes: readonly string[];
}

export interface StandardTask extends TaskBase {
  readonly taskType: 'standard';
}

export interface ScatterTask extends TaskBase {
  readonly taskType: 'scattered';
  readonly chunkKeys: readonly string[];
  readonly maxNchunks: IntOrMax;
}

export interface GatherTask extends TaskBase {
  readonly taskType: 'gathered';
  readonly chunkKey: string;
}

export type ToolContractTask = StandardTask | ScatterTask | GatherTask;

export interface ToolContract<T extends ToolContractTask = ToolContractTask> {
  readonly task: T;
  readonly driver: ToolDriver;
}

export interface ResolvedResource {
  readonly resourceType: ResourceType;
  readonly path: string;
}

interface ResolvedTaskBase {
  readonly taskId: string;
  readonly isDistributed: boolean;
  readonly inputFiles: readonly string[];
  readonly outputFiles: readonly string[];
  readonly options: Readonly<Record<string, OptionValue>>;
  readonly nproc: number;
  readonly resources: readonly ResolvedResource[];
}

export interface ResolvedStandardTask extends ResolvedTaskBase {
  readonly taskType: 'standard';
}

export interface ResolvedScatterTask extends ResolvedTaskBase {
  readonly taskType: 'scattered';
  readonly maxNchunks: number;
  readonly chunkKeys: readonly string[];
}

export interface ResolvedGatherTask extends ResolvedTaskBase {
  readonly taskType: 'gathered';
  readonly chunkKey: string;
}

export type ResolvedToolContractTask =
  | ResolvedStandardTask
  | ResolvedScatterTask
  | ResolvedGatherTask;

export interface ResolvedToolContract<
  T extends ResolvedToolContractTask = ResolvedToolContractTask,
> {
  readonly task: T;
  readonly driver: ToolDriver;
}
