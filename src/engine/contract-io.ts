import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { getErrorMessage, InvalidDocumentError } from '../lib/errors.js';
import type { ResolvedToolContract, ToolContract } from '../lib/types.js';

import {
  chunksFromDocument,
  chunksToDocument,
  type PipelineChunk,
} from './chunks.js';
import {
  resolvedToolContractFromDocument,
  resolvedToolContractToDocument,
} from './resolved-contract.js';
import {
  toolContractFromDocument,
  toolContractToDocument,
} from './tool-contract.js';

function serializeJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, 'utf8');
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new InvalidDocumentError(
      `Unable to parse JSON from ${filePath}: ${getErrorMessage(err)}`
    );
  }
}

export async function writeJsonFile(
  filePath: string,
  data: unknown
): Promise<string> {
  const target = path.resolve(filePath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, serializeJson(data), 'utf8');
  return target;
}

export async function loadToolContract(filePath: string): Promise<ToolContract> {
  return toolContractFromDocument(await readJsonFile(filePath));
}

export function writeToolContract(
  contract: ToolContract,
  filePath: string
): Promise<string> {
  return writeJsonFile(filePath, toolContractToDocument(contract));
}

export async function loadResolvedToolContract(
  filePath: string
): Promise<ResolvedToolContract> {
  return resolvedToolContractFromDocument(await readJsonFile(filePath));
}

export function writeResolvedToolContract(
  contract: ResolvedToolContract,
  filePath: string
): Promise<string> {
  return writeJsonFile(filePath, resolvedToolContractToDocument(contract));
}

export async function loadPipelineChunks(
  filePath: string
): Promise<PipelineChunk[]> {
  return chunksFromDocument(await readJsonFile(filePath));
}

export function writePipelineChunks(
  chunks: readonly PipelineChunk[],
  filePath: string,
  comment?: string
): Promise<string> {
  return writeJsonFile(filePath, chunksToDocument(chunks, comment));
}
