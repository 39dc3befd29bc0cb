/**
 * Document and search payload types.
 * @module types/document
 */

import { z } from 'zod';
import { parseWith } from './parse.js';

/**
 * A JSON object stored in an index. The shape is user-defined.
 */
export type Document = Record<string, unknown>;

/**
 * Primary key value of a document
 */
export type DocumentId = string | number;

/**
 * Options for document addition and replacement
 */
export interface DocumentWriteOptions {
  /** Primary key field; only honoured when the index has none yet */
  primaryKey?: string;
  /** Free-form string stored alongside the resulting task */
  customMetadata?: string;
}

/**
 * Search request parameters. Any engine parameter not listed here can be passed through.
 */
export interface SearchParams {
  offset?: number;
  limit?: number;
  page?: number;
  hitsPerPage?: number;
  filter?: string | Array<string | string[]>;
  facets?: string[];
  attributesToRetrieve?: string[];
  attributesToHighlight?: string[];
  attributesToCrop?: string[];
  cropLength?: number;
  sort?: string[];
  matchingStrategy?: 'last' | 'all' | 'frequency';
  showRankingScore?: boolean;
  [key: string]: unknown;
}

/**
 * Search response. Hits keep whatever fields the engine returns.
 */
export interface SearchResults {
  hits: Document[];
  query: string;
  processingTimeMs: number;
  offset?: number;
  limit?: number;
  estimatedTotalHits?: number;
  totalHits?: number;
  totalPages?: number;
  page?: number;
  hitsPerPage?: number;
  facetDistribution?: Record<string, Record<string, number>>;
}

const searchResultsSchema: z.ZodType<SearchResults, z.ZodTypeDef, unknown> = z
  .object({
    hits: z.array(z.record(z.unknown())),
    query: z.string(),
    processingTimeMs: z.number(),
    offset: z.number().optional(),
    limit: z.number().optional(),
    estimatedTotalHits: z.number().optional(),
    totalHits: z.number().optional(),
    totalPages: z.number().optional(),
    page: z.number().optional(),
    hitsPerPage: z.number().optional(),
    facetDistribution: z.record(z.record(z.number())).optional(),
  })
  .passthrough();

/**
 * Validate a search response
 */
export function parseSearchResults(data: unknown): SearchResults {
  return parseWith(searchResultsSchema, data, 'search results');
}

/**
 * Options for reading one document
 */
export interface GetDocumentOptions {
  /** Attributes to return; all when unset */
  fields?: string[];
  /** Include embedding vectors */
  retrieveVectors?: boolean;
}

/**
 * Query for a page of documents. With `ids` or `filter` the request is sent
 * as a POST to the fetch endpoint.
 */
export interface DocumentsQuery extends GetDocumentOptions {
  ids?: DocumentId[];
  offset?: number;
  limit?: number;
  filter?: string | Array<string | string[]>;
  sort?: string[];
}

/**
 * A page of documents
 */
export interface DocumentsPage {
  results: Document[];
  offset: number;
  limit: number;
  total: number;
}

const documentSchema = z.record(z.unknown());

const documentsPageSchema: z.ZodType<DocumentsPage, z.ZodTypeDef, unknown> = z.object({
  results: z.array(documentSchema),
  offset: z.number(),
  limit: z.number(),
  total: z.number(),
});

export function parseDocument(data: unknown): Document {
  return parseWith(documentSchema, data, 'document');
}

export function parseDocumentsPage(data: unknown): DocumentsPage {
  return parseWith(documentsPageSchema, data, 'documents page');
}
