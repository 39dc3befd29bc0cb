export { SearchClient, type SearchClientInit, type IndexOptions } from './client.js';
export {
  SearchIndex,
  type IndexContext,
  type IndexRequestOptions,
  type DocumentRequestOptions,
  type DocumentBatchOptions,
  type DocumentWaitOptions,
  type DocumentFileOptions,
  type DocumentDirectoryOptions,
  type DocumentFileRequestOptions,
  type DocumentFileBatchOptions,
  type DocumentDirectoryRequestOptions,
  type DocumentDirectoryBatchOptions,
  type RawDocumentFileOptions,
} from './search-index.js';
export { createClient, createClientFromEnv, withClient } from './factory.js';
export { indexReturnedDocuments, type IndexReturnedDocumentsOptions } from './wrap.js';
