import type { z } from "zod";

/** Zod schema describing one record of a collection. */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Default shape of a record when a collection has no schema. The system
 * fields are absent when a `fields` selection leaves them out.
 */
export interface RecordModel {
  id?: string;
  collectionId?: string;
  collectionName?: string;
  [field: string]: unknown;
}

/** Metadata returned by create and update. */
export interface RecordMeta {
  id: string;
  collectionId: string;
  collectionName: string;
  created: string;
  updated: string;
}

/** One page of a record listing. Totals are -1 when `skipTotal` was set. */
export interface ListResult<T = RecordModel> {
  page: number;
  perPage: number;
  totalItems: number;
  totalPages: number;
  items: T[];
}

/** Record of the authenticated user. */
export interface AuthRecord {
  id: string;
  collectionId: string;
  collectionName: string;
  created: string;
  updated: string;
  email: string;
  emailVisibility: boolean;
  verified: boolean;
  [field: string]: unknown;
}

/** An authenticated session: the bearer token and the record it belongs to. */
export interface AuthStore {
  token: string;
  record: AuthRecord;
}

/** Parameters for reading a single record. */
export interface GetOneOptions {
  /** Relations to expand, e.g. `"author,comments"`. */
  expand?: string;
  /** Comma separated list of fields to return. */
  fields?: string;
}

/** Filtering and shaping shared by every list query. */
export interface QueryOptions extends GetOneOptions {
  sort?: string;
  filter?: string;
}

/** Parameters for listing one page of records. */
export interface ListOptions extends QueryOptions {
  page?: number;
  perPage?: number;
  /** Skip counting the matches; `totalItems` and `totalPages` become -1. */
  skipTotal?: boolean;
}

/** Parameters for {@link Collection.getFirstListItem}. Paging is fixed. */
export type FirstListItemOptions = QueryOptions;

/** Parameters for {@link Collection.getFullList}. */
export interface FullListOptions extends QueryOptions {
  /** Records per request, clamped to 1..500 (default 500). */
  batchSize?: number;
}

export interface ImpersonateOptions {
  /** Lifetime of the issued token, in seconds. */
  duration?: number;
}

/** Request body accepted by create and update. */
export type RecordBody<T> = Partial<T> | Record<string, unknown>;

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

/** Sink for request diagnostics. `console` fits. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/** Client configuration options. */
export interface ClientOptions {
  /** Custom fetch implementation. */
  fetch?: typeof globalThis.fetch;
  /** Total request timeout in milliseconds (default 30000). */
  timeout?: number;
  /** Headers sent with every request. */
  headers?: Record<string, string>;
  logger?: Logger;
}
