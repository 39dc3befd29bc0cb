/**
 * Index-scoped document operations.
 * @module client/search-index
 */

import { BatchingPolicy } from '../batch/types.js';
import type { SearchClientConfig } from '../config/types.js';
import {
  loadDocumentsFromDirectory,
  loadDocumentsFromFile,
  loadRawDocumentFile,
  RAW_CONTENT_TYPES,
  type DocumentFileType,
  type LoadDocumentsOptions,
} from '../documents/loader.js';
import type { MutationSubmitter } from '../documents/submitter.js';
import type { SubmitAndWaitOptions, SubmitOptions } from '../documents/types.js';
import { InvalidArgumentError } from '../errors/types.js';
import type { Logger } from '../observability/types.js';
import type { PluginRunner } from '../plugins/runner.js';
import type { DocumentFilter, IndexPlugins, Plugin, PluginOperation } from '../plugins/types.js';
import type { JsonCodec } from '../transport/codec.js';
import type { HttpMethod, HttpTransport, QueryParams } from '../transport/types.js';
import {
  parseDocument,
  parseDocumentsPage,
  parseSearchResults,
  type Document,
  type DocumentId,
  type DocumentsPage,
  type DocumentsQuery,
  type DocumentWriteOptions,
  type GetDocumentOptions,
  type SearchParams,
  type SearchResults,
} from '../types/document.js';
import { parseTaskInfo, type Task, type TaskInfo } from '../types/task.js';

/**
 * Shared client state handed to each index
 */
export interface IndexContext {
  transport: HttpTransport;
  submitter: MutationSubmitter;
  runner: PluginRunner;
  config: SearchClientConfig;
  codec: JsonCodec;
  logger: Logger;
  /** Throws once the owning client is closed */
  ensureOpen: () => void;
}

/**
 * Options for a single request
 */
export interface IndexRequestOptions {
  signal?: AbortSignal;
  /** Decides whether concurrent hooks run for this call */
  dispatch?: SubmitOptions['dispatch'];
}

/**
 * Options for one document addition or replacement request
 */
export interface DocumentRequestOptions extends DocumentWriteOptions, IndexRequestOptions {
  codec?: JsonCodec;
  /** Gzip the request body */
  compress?: boolean;
}

/**
 * Options for a batched document addition or replacement
 */
export interface DocumentBatchOptions extends DocumentRequestOptions, SubmitOptions {}

/**
 * Options for a batched addition or replacement that waits for its tasks
 */
export interface DocumentWaitOptions extends DocumentRequestOptions, SubmitAndWaitOptions {}

/**
 * Options for reading documents from a file
 */
export interface DocumentFileOptions {
  /** Single ASCII character; csv files only. Defaults to a comma. */
  csvDelimiter?: string;
}

/**
 * Options for reading every file of one format in a directory
 */
export interface DocumentDirectoryOptions extends DocumentFileOptions {
  /** Extension of the files to read. Defaults to json. */
  documentType?: DocumentFileType;
  /** Send the documents of all files together rather than per file. Defaults to true. */
  combineDocuments?: boolean;
}

export interface DocumentFileRequestOptions extends DocumentRequestOptions, DocumentFileOptions {}

export interface DocumentFileBatchOptions extends DocumentBatchOptions, DocumentFileOptions {}

export interface DocumentDirectoryRequestOptions extends DocumentRequestOptions, DocumentDirectoryOptions {}

export interface DocumentDirectoryBatchOptions extends DocumentBatchOptions, DocumentDirectoryOptions {}

/**
 * Options for sending a csv or ndjson file as the request body
 */
export interface RawDocumentFileOptions
  extends DocumentWriteOptions,
    IndexRequestOptions,
    DocumentFileOptions {
  /** Gzip the request body */
  compress?: boolean;
}

type DocumentWriteOperation = Extract<PluginOperation, 'addDocuments' | 'updateDocuments'>;

/**
 * Operations on one index.
 *
 * @example
 * ```typescript
 * const movies = client.index('movies');
 * const tasks = await movies.addDocumentsAndWait(documents, {
 *   batching: BatchingPolicy.fixed(500),
 * });
 * ```
 */
export class SearchIndex {
  private readonly basePath: string;

  constructor(
    readonly uid: string,
    private readonly context: IndexContext,
    private readonly plugins: IndexPlugins = {}
  ) {
    this.basePath = `indexes/${encodeURIComponent(uid)}`;
  }

  // ==========================================================================
  // Add / replace
  // ==========================================================================

  /**
   * Add or replace documents in one request.
   */
  async addDocuments(documents: Document[], options: DocumentRequestOptions = {}): Promise<TaskInfo> {
    return this.writeDocuments('addDocuments', 'POST', documents, options);
  }

  /**
   * Add or replace documents in batches; defaults to fixed batches of the
   * configured batch size.
   *
   * @returns One TaskInfo per batch, in batch order
   */
  async addDocumentsInBatches(
    documents: Document[],
    options: DocumentBatchOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeInBatches('addDocuments', 'POST', documents, options);
  }

  /**
   * Add or replace documents and wait for every resulting task.
   *
   * @throws {TasksFailedError} If any task ends `failed` or `canceled`
   */
  async addDocumentsAndWait(documents: Document[], options: DocumentWaitOptions = {}): Promise<Task[]> {
    this.context.ensureOpen();
    return this.context.submitter.submitAndWait(
      documents,
      (batch) => this.writeDocuments('addDocuments', 'POST', batch.items, options),
      { ...this.submitOptions(options, BatchingPolicy.none()), wait: options.wait }
    );
  }

  // ==========================================================================
  // Add / replace from files
  // ==========================================================================

  /**
   * Add or replace the documents of a json, ndjson or csv file in one request.
   * The format comes from the file extension; csv values are sent as strings.
   *
   * @throws {InvalidArgumentError} If the file is missing or not a supported format
   * @throws {InvalidDocumentError} If the content cannot be parsed into documents
   */
  async addDocumentsFromFile(path: string, options: DocumentFileRequestOptions = {}): Promise<TaskInfo> {
    return this.writeFromFile('addDocuments', 'POST', path, options);
  }

  /**
   * Add or replace the documents of a file in batches.
   */
  async addDocumentsFromFileInBatches(
    path: string,
    options: DocumentFileBatchOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeFromFileInBatches('addDocuments', 'POST', path, options);
  }

  /**
   * Add or replace the documents of every file of one format in a directory.
   * Files are read in name order.
   *
   * @returns One TaskInfo when documents are combined, otherwise one per file
   */
  async addDocumentsFromDirectory(
    directory: string,
    options: DocumentDirectoryRequestOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeFromDirectory('addDocuments', 'POST', directory, options);
  }

  /**
   * Add or replace the documents of a directory in batches.
   */
  async addDocumentsFromDirectoryInBatches(
    directory: string,
    options: DocumentDirectoryBatchOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeFromDirectoryInBatches('addDocuments', 'POST', directory, options);
  }

  /**
   * Send a csv or ndjson file as the request body without parsing it.
   * Plugins do not run for raw files.
   */
  async addDocumentsFromRawFile(path: string, options: RawDocumentFileOptions = {}): Promise<TaskInfo> {
    return this.writeRawFile('POST', path, options);
  }

  // ==========================================================================
  // Add / update (partial)
  // ==========================================================================

  /**
   * Add documents or update fields of existing ones in one request.
   */
  async updateDocuments(documents: Document[], options: DocumentRequestOptions = {}): Promise<TaskInfo> {
    return this.writeDocuments('updateDocuments', 'PUT', documents, options);
  }

  /**
   * Add or update documents in batches.
   */
  async updateDocumentsInBatches(
    documents: Document[],
    options: DocumentBatchOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeInBatches('updateDocuments', 'PUT', documents, options);
  }

  /**
   * Add or update documents and wait for every resulting task.
   */
  async updateDocumentsAndWait(
    documents: Document[],
    options: DocumentWaitOptions = {}
  ): Promise<Task[]> {
    this.context.ensureOpen();
    return this.context.submitter.submitAndWait(
      documents,
      (batch) => this.writeDocuments('updateDocuments', 'PUT', batch.items, options),
      { ...this.submitOptions(options, BatchingPolicy.none()), wait: options.wait }
    );
  }

  // ==========================================================================
  // Add / update from files
  // ==========================================================================

  /**
   * Add or update the documents of a json, ndjson or csv file in one request.
   */
  async updateDocumentsFromFile(path: string, options: DocumentFileRequestOptions = {}): Promise<TaskInfo> {
    return this.writeFromFile('updateDocuments', 'PUT', path, options);
  }

  async updateDocumentsFromFileInBatches(
    path: string,
    options: DocumentFileBatchOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeFromFileInBatches('updateDocuments', 'PUT', path, options);
  }

  async updateDocumentsFromDirectory(
    directory: string,
    options: DocumentDirectoryRequestOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeFromDirectory('updateDocuments', 'PUT', directory, options);
  }

  async updateDocumentsFromDirectoryInBatches(
    directory: string,
    options: DocumentDirectoryBatchOptions = {}
  ): Promise<TaskInfo[]> {
    return this.writeFromDirectoryInBatches('updateDocuments', 'PUT', directory, options);
  }

  async updateDocumentsFromRawFile(path: string, options: RawDocumentFileOptions = {}): Promise<TaskInfo> {
    return this.writeRawFile('PUT', path, options);
  }

  // ==========================================================================
  // Read
  // ==========================================================================

  /**
   * Fetch one document by primary key.
   */
  async getDocument(
    id: DocumentId,
    options: GetDocumentOptions & IndexRequestOptions = {}
  ): Promise<Document> {
    this.context.ensureOpen();
    const response = await this.context.transport.get(
      `${this.basePath}/documents/${encodeURIComponent(String(id))}`,
      {
        fields: options.fields?.length ? options.fields : undefined,
        retrieveVectors: options.retrieveVectors ? true : undefined,
      },
      { signal: options.signal, codec: this.context.codec }
    );
    return parseDocument(response.data);
  }

  /**
   * Fetch a page of documents. Selecting by ids or filter posts to the
   * fetch endpoint; otherwise the page is read with a GET.
   */
  async getDocuments(query: DocumentsQuery = {}, options: IndexRequestOptions = {}): Promise<DocumentsPage> {
    this.context.ensureOpen();
    const offset = query.offset ?? 0;
    const limit = query.limit ?? 20;
    const requestOptions = { signal: options.signal, codec: this.context.codec };

    if (query.filter === undefined && !query.ids?.length) {
      const response = await this.context.transport.get(
        `${this.basePath}/documents`,
        {
          offset,
          limit,
          fields: query.fields?.length ? query.fields : undefined,
          sort: query.sort?.length ? query.sort : undefined,
          retrieveVectors: query.retrieveVectors ? true : undefined,
        },
        requestOptions
      );
      return parseDocumentsPage(response.data);
    }

    const response = await this.context.transport.post(
      `${this.basePath}/documents/fetch`,
      {
        offset,
        limit,
        ids: query.ids,
        filter: query.filter,
        fields: query.fields,
        sort: query.sort,
        retrieveVectors: query.retrieveVectors,
      },
      undefined,
      requestOptions
    );
    return parseDocumentsPage(response.data);
  }

  // ==========================================================================
  // Delete
  // ==========================================================================

  /**
   * Delete one document by primary key.
   */
  async deleteDocument(id: DocumentId, options: IndexRequestOptions = {}): Promise<TaskInfo> {
    return this.hooked(this.plugins.deleteDocument, 'deleteDocument', id, options, async (docId) => {
      const response = await this.context.transport.delete(
        `${this.basePath}/documents/${encodeURIComponent(String(docId))}`,
        undefined,
        undefined,
        { signal: options.signal }
      );
      return parseTaskInfo(response.data);
    });
  }

  /**
   * Delete documents by primary key.
   */
  async deleteDocuments(ids: DocumentId[], options: IndexRequestOptions = {}): Promise<TaskInfo> {
    return this.hooked(this.plugins.deleteDocuments, 'deleteDocuments', ids, options, async (docIds) => {
      const response = await this.context.transport.post(
        `${this.basePath}/documents/delete-batch`,
        docIds,
        undefined,
        { signal: options.signal }
      );
      return parseTaskInfo(response.data);
    });
  }

  /**
   * Delete every document matching a filter expression.
   */
  async deleteDocumentsByFilter(
    filter: DocumentFilter,
    options: IndexRequestOptions = {}
  ): Promise<TaskInfo> {
    if (typeof filter === 'string' ? filter.trim() === '' : filter.length === 0) {
      throw new InvalidArgumentError('filter must not be empty');
    }
    return this.hooked(
      this.plugins.deleteDocumentsByFilter,
      'deleteDocumentsByFilter',
      filter,
      options,
      async (payload) => {
        const response = await this.context.transport.post(
          `${this.basePath}/documents/delete`,
          { filter: payload },
          undefined,
          { signal: options.signal }
        );
        return parseTaskInfo(response.data);
      }
    );
  }

  /**
   * Delete by several filters, one task per filter.
   *
   * @returns One TaskInfo per filter, in input order
   */
  async deleteDocumentsInBatchesByFilter(
    filters: DocumentFilter[],
    options: Omit<SubmitOptions, 'batching' | 'codec'> = {}
  ): Promise<TaskInfo[]> {
    this.context.ensureOpen();
    for (const filter of filters) {
      if (typeof filter === 'string' ? filter.trim() === '' : filter.length === 0) {
        throw new InvalidArgumentError('filter must not be empty');
      }
    }
    return this.context.submitter.submit(
      filters,
      async (batch) => {
        const [filter] = batch.items;
        return this.deleteDocumentsByFilter(filter, options);
      },
      { ...options, batching: BatchingPolicy.fixed(1) }
    );
  }

  /**
   * Delete every document in the index.
   */
  async deleteAllDocuments(options: IndexRequestOptions = {}): Promise<TaskInfo> {
    return this.hooked(this.plugins.deleteAllDocuments, 'deleteAllDocuments', null, options, async () => {
      const response = await this.context.transport.delete(
        `${this.basePath}/documents`,
        undefined,
        undefined,
        { signal: options.signal }
      );
      return parseTaskInfo(response.data);
    });
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /**
   * Search the index.
   */
  async search(
    query: string,
    params: SearchParams = {},
    options: IndexRequestOptions = {}
  ): Promise<SearchResults> {
    return this.hooked(
      this.plugins.search,
      'search',
      { query, params },
      options,
      async (request) => {
        const response = await this.context.transport.post(
          `${this.basePath}/search`,
          { ...request.params, q: request.query },
          undefined,
          { signal: options.signal, codec: this.context.codec }
        );
        return parseSearchResults(response.data);
      }
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async writeInBatches(
    operation: DocumentWriteOperation,
    method: HttpMethod,
    documents: Document[],
    options: DocumentBatchOptions
  ): Promise<TaskInfo[]> {
    this.context.ensureOpen();
    return this.context.submitter.submit(
      documents,
      (batch) => this.writeDocuments(operation, method, batch.items, options),
      this.submitOptions(options, this.defaultBatching())
    );
  }

  private async writeFromFile(
    operation: DocumentWriteOperation,
    method: HttpMethod,
    path: string,
    options: DocumentFileRequestOptions
  ): Promise<TaskInfo> {
    this.context.ensureOpen();
    const documents = await loadDocumentsFromFile(path, this.loadOptions(options));
    return this.writeDocuments(operation, method, documents, options);
  }

  private async writeFromFileInBatches(
    operation: DocumentWriteOperation,
    method: HttpMethod,
    path: string,
    options: DocumentFileBatchOptions
  ): Promise<TaskInfo[]> {
    this.context.ensureOpen();
    const documents = await loadDocumentsFromFile(path, this.loadOptions(options));
    return this.writeInBatches(operation, method, documents, options);
  }

  private async writeFromDirectory(
    operation: DocumentWriteOperation,
    method: HttpMethod,
    directory: string,
    options: DocumentDirectoryRequestOptions
  ): Promise<TaskInfo[]> {
    this.context.ensureOpen();
    const files = await loadDocumentsFromDirectory(directory, {
      ...this.loadOptions(options),
      documentType: options.documentType,
    });

    if (options.combineDocuments ?? true) {
      const documents = files.flatMap((file) => file.documents);
      return [await this.writeDocuments(operation, method, documents, options)];
    }

    const infos: TaskInfo[] = [];
    for (const file of files) {
      infos.push(await this.writeDocuments(operation, method, file.documents, options));
    }
    return infos;
  }

  private async writeFromDirectoryInBatches(
    operation: DocumentWriteOperation,
    method: HttpMethod,
    directory: string,
    options: DocumentDirectoryBatchOptions
  ): Promise<TaskInfo[]> {
    this.context.ensureOpen();
    const files = await loadDocumentsFromDirectory(directory, {
      ...this.loadOptions(options),
      documentType: options.documentType,
    });

    if (options.combineDocuments ?? true) {
      const documents = files.flatMap((file) => file.documents);
      return this.writeInBatches(operation, method, documents, options);
    }

    const infos: TaskInfo[] = [];
    for (const file of files) {
      infos.push(...(await this.writeInBatches(operation, method, file.documents, options)));
    }
    return infos;
  }

  private async writeRawFile(
    method: HttpMethod,
    path: string,
    options: RawDocumentFileOptions
  ): Promise<TaskInfo> {
    this.context.ensureOpen();
    const { type, content } = await loadRawDocumentFile(path, options.csvDelimiter);
    const response = await this.context.transport.request({
      method,
      path: `${this.basePath}/documents`,
      query: {
        primaryKey: options.primaryKey,
        csvDelimiter: options.csvDelimiter,
        customMetadata: options.customMetadata,
      },
      body: content,
      contentType: RAW_CONTENT_TYPES[type],
      compress: options.compress,
      signal: options.signal,
    });
    this.context.logger.debug('Document file accepted', {
      indexUid: this.uid,
      type,
      bytes: content.byteLength,
    });
    return parseTaskInfo(response.data);
  }

  private loadOptions(options: DocumentFileOptions & { codec?: JsonCodec }): LoadDocumentsOptions {
    return { csvDelimiter: options.csvDelimiter, codec: options.codec ?? this.context.codec };
  }

  private async writeDocuments(
    operation: DocumentWriteOperation,
    method: HttpMethod,
    documents: Document[],
    options: DocumentRequestOptions
  ): Promise<TaskInfo> {
    const query: QueryParams = {
      primaryKey: options.primaryKey,
      customMetadata: options.customMetadata,
    };

    return this.hooked(this.plugins[operation], operation, documents, options, async (payload) => {
      const response = await this.context.transport.request({
        method,
        path: `${this.basePath}/documents`,
        query,
        body: payload,
        codec: options.codec ?? this.context.codec,
        compress: options.compress,
        signal: options.signal,
      });
      this.context.logger.debug('Documents accepted', {
        operation,
        indexUid: this.uid,
        documents: payload.length,
      });
      return parseTaskInfo(response.data);
    });
  }

  private async hooked<P, R>(
    plugins: readonly Plugin<P, R>[] | undefined,
    operation: PluginOperation,
    payload: P,
    options: IndexRequestOptions,
    execute: (payload: P) => Promise<R>
  ): Promise<R> {
    this.context.ensureOpen();
    const dispatch = options.dispatch ?? this.context.config.dispatchMode;
    return this.context.runner.run({
      plugins,
      operation,
      indexUid: this.uid,
      payload,
      concurrent: dispatch === 'concurrent',
      execute,
    });
  }

  private defaultBatching(): BatchingPolicy {
    return BatchingPolicy.fixed(this.context.config.defaultBatchSize);
  }

  /**
   * Fill in the batching policy and codec. An auto policy without a ceiling
   * takes the configured maximum payload size.
   */
  private submitOptions(options: SubmitOptions, fallback: BatchingPolicy): SubmitOptions {
    const policy = options.batching ?? fallback;
    return {
      dispatch: options.dispatch,
      maxConcurrency: options.maxConcurrency,
      signal: options.signal,
      codec: options.codec ?? this.context.codec,
      batching:
        policy.mode === 'auto' && policy.maxPayloadSize === undefined
          ? BatchingPolicy.auto(this.context.config.maxPayloadSize)
          : policy,
    };
  }
}
