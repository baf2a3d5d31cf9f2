export { PocketBase } from "./client";
export { Collection } from "./collection";
export { PocketBaseError, isPocketBaseError } from "./errors";
export { MAX_PER_PAGE, recordModelSchema } from "./schemas";
export type { EmptyFields, ErrorKind, FieldError, OperationFamily } from "./errors";
export type {
  AuthRecord,
  AuthStore,
  ClientOptions,
  FirstListItemOptions,
  FullListOptions,
  GetOneOptions,
  ImpersonateOptions,
  ListOptions,
  ListResult,
  Logger,
  QueryOptions,
  RecordBody,
  RecordMeta,
  RecordModel,
  RecordSchema,
} from "./types";
