/**
 * Reads documents from JSON, NDJSON and CSV files.
 * @module documents/loader
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import { toError } from '../errors/base.js';
import { InvalidArgumentError, InvalidDocumentError } from '../errors/types.js';
import { defaultCodec, type JsonCodec } from '../transport/codec.js';
import type { Document } from '../types/document.js';

/**
 * File formats documents can be loaded from
 */
export type DocumentFileType = 'json' | 'ndjson' | 'csv';

/**
 * File formats the engine accepts as a raw request body
 */
export type RawDocumentFileType = Exclude<DocumentFileType, 'json'>;

export const DOCUMENT_FILE_TYPES: readonly DocumentFileType[] = ['json', 'ndjson', 'csv'];

/** Request content type per raw file format */
export const RAW_CONTENT_TYPES: Record<RawDocumentFileType, string> = {
  csv: 'text/csv',
  ndjson: 'application/x-ndjson',
};

export interface LoadDocumentsOptions {
  /** Single ASCII character; csv files only. Defaults to a comma. */
  csvDelimiter?: string;
  /** Decodes json and ndjson content */
  codec?: JsonCodec;
}

export interface LoadDirectoryOptions extends LoadDocumentsOptions {
  /** Only files with this extension are read. Defaults to json. */
  documentType?: DocumentFileType;
}

/**
 * Documents read from one file
 */
export interface DocumentFile {
  path: string;
  documents: Document[];
}

const csvRowsSchema = z.array(z.record(z.string()));
const encoder = new TextEncoder();
const decoder = new TextDecoder();

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Format of a document file, from its extension.
 *
 * @throws {InvalidArgumentError} For any extension other than .json, .ndjson or .csv
 */
export function documentFileType(path: string): DocumentFileType {
  const extension = extname(path).slice(1).toLowerCase();
  const type = DOCUMENT_FILE_TYPES.find((t) => t === extension);
  if (!type) {
    throw new InvalidArgumentError('File must be a json, ndjson, or csv file', { path });
  }
  return type;
}

/**
 * @throws {InvalidArgumentError} Unless the delimiter is one ASCII character
 */
export function validateCsvDelimiter(delimiter: string): void {
  if (delimiter.length !== 1 || delimiter.charCodeAt(0) > 127) {
    throw new InvalidArgumentError('csvDelimiter must be a single ascii character', { delimiter });
  }
}

/**
 * Parse file content into documents. CSV needs a header row; every value
 * is read as a string.
 *
 * @throws {InvalidDocumentError} If the content is malformed or is not a list of objects
 */
export function parseDocuments(
  content: Uint8Array,
  type: DocumentFileType,
  options: LoadDocumentsOptions = {}
): Document[] {
  const codec = options.codec ?? defaultCodec;

  if (options.csvDelimiter !== undefined) {
    if (type !== 'csv') {
      throw new InvalidArgumentError('csvDelimiter can only be used with csv files');
    }
    validateCsvDelimiter(options.csvDelimiter);
  }

  switch (type) {
    case 'csv':
      return parseCsvDocuments(decoder.decode(content), options.csvDelimiter);
    case 'ndjson':
      return decoder
        .decode(content)
        .split(/\r?\n/)
        .map((line, i) => ({ line: line.trim(), lineNumber: i + 1 }))
        .filter(({ line }) => line !== '')
        .map(({ line, lineNumber }) => {
          const value = decodeJson(codec, encoder.encode(line), `line ${lineNumber}`);
          if (!isDocument(value)) {
            throw new InvalidDocumentError(`Line ${lineNumber} is not a JSON object`, {
              details: { lineNumber },
            });
          }
          return value;
        });
    case 'json': {
      const value = decodeJson(codec, content, 'file');
      if (!Array.isArray(value)) {
        throw new InvalidDocumentError('Documents must be in a list');
      }
      const documents: Document[] = [];
      value.forEach((item: unknown, index) => {
        if (!isDocument(item)) {
          throw new InvalidDocumentError(`Document at index ${index} is not a JSON object`, {
            details: { index },
          });
        }
        documents.push(item);
      });
      return documents;
    }
  }
}

function decodeJson(codec: JsonCodec, bytes: Uint8Array, where: string): unknown {
  try {
    return codec.deserialize(bytes);
  } catch (error) {
    const cause = toError(error);
    throw new InvalidDocumentError(`Invalid JSON in ${where}: ${cause.message}`, { cause });
  }
}

function parseCsvDocuments(text: string, delimiter: string | undefined): Document[] {
  let rows: unknown;
  try {
    rows = parseCsv(text, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      delimiter: delimiter ?? ',',
    });
  } catch (error) {
    const cause = toError(error);
    throw new InvalidDocumentError(`Invalid CSV: ${cause.message}`, { cause });
  }
  const result = csvRowsSchema.safeParse(rows);
  if (!result.success) {
    throw new InvalidDocumentError('CSV rows could not be read as documents');
  }
  return result.data;
}

/**
 * Read one document file; the format comes from the extension.
 *
 * @throws {InvalidArgumentError} If the file is missing or has an unsupported extension
 * @throws {InvalidDocumentError} If the content cannot be parsed
 */
export async function loadDocumentsFromFile(
  path: string,
  options: LoadDocumentsOptions = {}
): Promise<Document[]> {
  const type = documentFileType(path);
  return parseDocuments(await readDocumentFile(path), type, options);
}

/**
 * Read every file of one format in a directory, in file name order.
 *
 * @throws {InvalidArgumentError} If the directory is missing or holds no matching file
 */
export async function loadDocumentsFromDirectory(
  directory: string,
  options: LoadDirectoryOptions = {}
): Promise<DocumentFile[]> {
  const documentType = options.documentType ?? 'json';

  let names: string[];
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === `.${documentType}`)
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isMissing(error)) {
      throw new InvalidArgumentError(`No directory found at ${directory}`, { directory });
    }
    throw error;
  }

  if (names.length === 0) {
    throw new InvalidArgumentError(`No ${documentType} files found in ${directory}`, {
      directory,
      documentType,
    });
  }

  const files: DocumentFile[] = [];
  for (const name of names) {
    const path = join(directory, name);
    files.push({ path, documents: await loadDocumentsFromFile(path, options) });
  }
  return files;
}

/**
 * Read a csv or ndjson file to send as-is.
 *
 * @throws {InvalidArgumentError} If the file is missing, is not csv or ndjson, or a
 * delimiter is given for a non-csv file
 */
export async function loadRawDocumentFile(
  path: string,
  csvDelimiter?: string
): Promise<{ type: RawDocumentFileType; content: Uint8Array }> {
  const type = documentFileType(path);
  if (type === 'json') {
    throw new InvalidArgumentError('Only csv and ndjson files can be sent as raw files', { path });
  }
  if (csvDelimiter !== undefined) {
    if (type !== 'csv') {
      throw new InvalidArgumentError('csvDelimiter can only be used with csv files');
    }
    validateCsvDelimiter(csvDelimiter);
  }
  return { type, content: await readDocumentFile(path) };
}

async function readDocumentFile(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    if (isMissing(error)) {
      throw new InvalidArgumentError(`No file found at ${path}`, { path });
    }
    throw error;
  }
}
