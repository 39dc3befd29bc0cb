/**
 * Document submission module.
 * @module documents
 */

export { MutationSubmitter, type SubmitterDefaults } from './submitter.js';
export type { SendBatch, SubmitOptions, SubmitAndWaitOptions } from './types.js';
export {
  DOCUMENT_FILE_TYPES,
  RAW_CONTENT_TYPES,
  documentFileType,
  validateCsvDelimiter,
  parseDocuments,
  loadDocumentsFromFile,
  loadDocumentsFromDirectory,
  loadRawDocumentFile,
  type DocumentFileType,
  type RawDocumentFileType,
  type LoadDocumentsOptions,
  type LoadDirectoryOptions,
  type DocumentFile,
} from './loader.js';
