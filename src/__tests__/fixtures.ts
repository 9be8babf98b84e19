import {
  createDriver,
  literal,
  StandardFileTypes,
  ToolContractBuilder,
} from '../engine/index.js';
import type {
  GatherTask,
  ScatterTask,
  StandardTask,
  ToolContract,
} from '../lib/types.js';

export const FILTER_TASK_ID = 'demo.tasks.filter_reads';
export const SCATTER_TASK_ID = 'demo.tasks.scatter_fasta';
export const GATHER_TASK_ID = 'demo.tasks.gather_fasta';

export const MIN_LENGTH_ID = 'demo.task_options.min_length';
export const MODE_ID = 'demo.task_options.mode';

export function createFilterBuilder(): ToolContractBuilder {
  return new ToolContractBuilder({
    taskId: FILTER_TASK_ID,
    name: 'Filter reads',
    description: 'Drop reads shorter than a threshold',
    version: '1.2.0',
    driver: createDriver('demo-filter --resolved-tool-contract', {
      DEMO_MODE: 'test',
    }),
    nproc: literal(4),
    resourceTypes: ['$tmpdir', '$logfile'],
  })
    .addInputFileType(
      StandardFileTypes.fasta,
      'fasta_in',
      'Reads',
      'Reads to filter'
    )
    .addOutputFileType(
      StandardFileTypes.fasta,
      'fasta_out',
      'Filtered reads',
      'Reads that passed'
    )
    .addOutputFileType(
      StandardFileTypes.report,
      'report',
      'Filter report',
      'Counts of kept and dropped reads'
    )
    .addInt(MIN_LENGTH_ID, 'min-length', 50, 'Min length', 'Minimum read length')
    .addChoiceStr(MODE_ID, 'mode', ['fast', 'exact'], 'fast', 'Mode', 'Run mode');
}

export function createFilterContract(): ToolContract<StandardTask> {
  const contract = createFilterBuilder().build();
  if (contract.task.taskType !== 'standard') {
    throw new Error('expected a standard task');
  }
  return { task: contract.task, driver: contract.driver };
}

export function createScatterContract(): ToolContract<ScatterTask> {
  const contract = new ToolContractBuilder({
    taskId: SCATTER_TASK_ID,
    name: 'Scatter FASTA',
    description: 'Split a FASTA file into chunks',
    version: '0.1.0',
    driver: createDriver('demo-scatter'),
    taskType: 'scattered',
    chunkKeys: ['$chunk.fasta_id'],
    maxNchunks: literal(10),
    nproc: literal(1),
  })
    .addInputFileType(StandardFileTypes.fasta, 'fasta_in', 'Reads', 'Reads')
    .addOutputFileType(
      StandardFileTypes.chunk,
      'chunk_json',
      'Chunks',
      'Chunk document'
    )
    .build();
  if (contract.task.taskType !== 'scattered') {
    throw new Error('expected a scattered task');
  }
  return { task: contract.task, driver: contract.driver };
}

export function createGatherContract(): ToolContract<GatherTask> {
  const contract = new ToolContractBuilder({
    taskId: GATHER_TASK_ID,
    name: 'Gather FASTA',
    description: 'Concatenate chunked FASTA files',
    version: '0.1.0',
    driver: createDriver('demo-gather'),
    taskType: 'gathered',
    chunkKey: '$chunk.fasta_id',
  })
    .addInputFileType(StandardFileTypes.chunk, 'chunk_json', 'Chunks', 'Chunks')
    .addOutputFileType(
      StandardFileTypes.fasta,
      'fasta_out',
      'Gathered reads',
      'All reads',
      'gathered.fasta'
    )
    .build();
  if (contract.task.taskType !== 'gathered') {
    throw new Error('expected a gathered task');
  }
  return { task: contract.task, driver: contract.driver };
}

/** Deterministic ids for temp and log resource names. */
export function createSequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}${String(next)}`;
  };
}
