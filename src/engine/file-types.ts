import { readFileSync } from 'node:fs';

import { FileTypeCatalogSchema, parseDocument } from '../schemas/documents.js';

import { FileTypeNotFoundError } from '../lib/errors.js';
import type { FileType } from '../lib/types.js';

import { engineEvents } from './events.js';

const CATALOG_URL = new URL('../../data/file-types.json', import.meta.url);

const COMPARED_ATTRIBUTES = ['baseName', 'ext', 'mimeType'] as const;

/**
 * Maps globally unique file type ids to their descriptors.
 *
 * The first registration of an id wins. Registering the same id again with
 * different attributes emits a `file-type:conflict` event per differing
 * attribute and hands back the instance that was registered first.
 */
export class FileTypeRegistry {
  private readonly entries = new Map<string, FileType>();

  register(
    fileTypeId: string,
    baseName: string,
    ext: string,
    mimeType: string
  ): FileType {
    const existing = this.entries.get(fileTypeId);
    const requested: FileType = Object.freeze({
      fileTypeId,
      baseName,
      ext,
      mimeType,
    });

    if (!existing) {
      this.entries.set(fileTypeId, requested);
      return requested;
    }

    for (const attribute of COMPARED_ATTRIBUTES) {
      if (existing[attribute] !== requested[attribute]) {
        engineEvents.emit('file-type:conflict', {
          fileTypeId,
          attribute,
          registered: existing[attribute],
          requested: requested[attribute],
        });
      }
    }
    return existing;
  }

  lookup(fileTypeId: string): FileType {
    const fileType = this.entries.get(fileTypeId);
    if (!fileType) {
      throw new FileTypeNotFoundError(fileTypeId);
    }
    return fileType;
  }

  get(fileTypeId: string): FileType | undefined {
    return this.entries.get(fileTypeId);
  }

  has(fileTypeId: string): boolean {
    return this.entries.has(fileTypeId);
  }

  list(): FileType[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}

export function loadFileTypeCatalog(
  registry: FileTypeRegistry,
  raw: unknown
): FileTypeRegistry {
  const catalog = parseDocument(FileTypeCatalogSchema, raw, 'file type catalog');
  for (const entry of catalog) {
    registry.register(
      entry.file_type_id,
      entry.base_name,
      entry.ext,
      entry.mime_type
    );
  }
  return registry;
}

export function createStandardFileTypeRegistry(): FileTypeRegistry {
  const raw = JSON.parse(readFileSync(CATALOG_URL, 'utf8')) as unknown;
  return loadFileTypeCatalog(new FileTypeRegistry(), raw);
}

/** Process-wide registry pre-loaded with the standard catalogue. */
export const fileTypes = createStandardFileTypeRegistry();

export const StandardFileTypes = {
  txt: fileTypes.lookup('PacBio.FileTypes.txt'),
  log: fileTypes.lookup('PacBio.FileTypes.log'),
  json: fileTypes.lookup('PacBio.FileTypes.json'),
  csv: fileTypes.lookup('PacBio.FileTypes.csv'),
  report: fileTypes.lookup('PacBio.FileTypes.JsonReport'),
  chunk: fileTypes.lookup('PacBio.FileTypes.CHUNK'),
  fasta: fileTypes.lookup('PacBio.FileTypes.Fasta'),
  fastq: fileTypes.lookup('PacBio.FileTypes.Fastq'),
  bam: fileTypes.lookup('PacBio.FileTypes.bam'),
  fofn: fileTypes.lookup('PacBio.FileTypes.generic_fofn'),
} as const;
