import {
  parseDocument,
  type ResolvedToolContractDocument,
  ResolvedToolContractDocumentSchema,
} from '../schemas/documents.js';

import { MalformedContractError } from '../lib/errors.js';
import type {
  ResolvedToolContract,
  ResolvedToolContractTask,
} from '../lib/types.js';

import { createDriver } from './tool-contract.js';

export function resolvedToolContractToDocument(
  contract: ResolvedToolContract
): ResolvedToolContractDocument {
  const { task, driver } = contract;
  return {
    driver: { exe: driver.exe, env: { ...driver.env } },
    resolved_tool_contract: {
      tool_contract_id: task.taskId,
      task_type: task.taskType,
      is_distributed: task.isDistributed,
      input_files: [...task.inputFiles],
      output_files: [...task.outputFiles],
      options: { ...task.options },
      nproc: task.nproc,
      resources: task.resources.map((resource) => ({
        resource_type: resource.resourceType,
        path: resource.path,
      })),
      ...(task.taskType === 'scattered'
        ? { max_nchunks: task.maxNchunks, chunk_keys: [...task.chunkKeys] }
        : {}),
      ...(task.taskType === 'gathered' ? { chunk_key: task.chunkKey } : {}),
    },
  };
}

function readTask(
  body: ResolvedToolContractDocument['resolved_tool_contract']
): ResolvedToolContractTask {
  const base = {
    taskId: body.tool_contract_id,
    isDistributed: body.is_distributed,
    inputFiles: Object.freeze([...body.input_files]),
    outputFiles: Object.freeze([...body.output_files]),
    options: Object.freeze({ ...body.options }),
    nproc: body.nproc,
    resources: Object.freeze(
      body.resources.map((resource) =>
        Object.freeze({
          resourceType: resource.resource_type,
          path: resource.path,
        })
      )
    ),
  };

  switch (body.task_type) {
    case 'standard':
      return { ...base, taskType: 'standard' };
    case 'scattered':
      if (body.max_nchunks === undefined) {
        throw new MalformedContractError(
          `Resolved scatter contract ${body.tool_contract_id} is missing max_nchunks`
        );
      }
      return {
        ...base,
        taskType: 'scattered',
        maxNchunks: body.max_nchunks,
        chunkKeys: Object.freeze([...(body.chunk_keys ?? [])]),
      };
    case 'gathered':
      if (body.chunk_key === undefined) {
        throw new MalformedContractError(
          `Resolved gather contract ${body.tool_contract_id} is missing chunk_key`
        );
      }
      return { ...base, taskType: 'gathered', chunkKey: body.chunk_key };
  }
}

export function resolvedToolContractFromDocument(
  raw: unknown
): ResolvedToolContract {
  const document = parseDocument(
    ResolvedToolContractDocumentSchema,
    raw,
    'resolved tool contract document'
  );
  return Object.freeze({
    task: Object.freeze(readTask(document.resolved_tool_contract)),
    driver: createDriver(document.driver.exe, document.driver.env),
  });
}
