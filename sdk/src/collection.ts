import { ZodError } from "zod";
import type { PocketBase, SendOptions } from "./client";
import { classifyResponse, PocketBaseError, type OperationFamily } from "./errors";
import {
  authStoreSchema,
  MAX_PER_PAGE,
  parseListResult,
  recordMetaSchema,
} from "./schemas";
import type {
  AuthStore,
  FirstListItemOptions,
  FullListOptions,
  GetOneOptions,
  HttpMethod,
  ImpersonateOptions,
  ListOptions,
  ListResult,
  RecordBody,
  RecordMeta,
  RecordSchema,
} from "./types";

type Decoder<R> = (payload: unknown) => R;

const decodeMeta: Decoder<RecordMeta> = (payload) => recordMetaSchema.parse(payload);
const decodeAuth: Decoder<AuthStore> = (payload) => authStoreSchema.parse(payload);

/**
 * Operations on one collection, created by {@link PocketBase.collection}.
 * Every method rejects with {@link PocketBaseError} on failure.
 */
export class Collection<T> {
  private readonly decodeRecord: Decoder<T>;
  private readonly decodeList: Decoder<ListResult<T>>;

  constructor(
    private readonly client: PocketBase,
    readonly name: string,
    schema: RecordSchema<T>,
  ) {
    this.decodeRecord = (payload) => schema.parse(payload);
    this.decodeList = (payload) => parseListResult(payload, schema);
  }

  /** Fetch a single record by id. */
  async getOne(id: string, options: GetOneOptions = {}): Promise<T> {
    const query = { expand: options.expand, fields: options.fields };
    return this.call("view", "GET", this.recordPath(id), { query }, this.decodeRecord);
  }

  /** Fetch one page of records. */
  async getList(options: ListOptions = {}): Promise<ListResult<T>> {
    const query = {
      page: options.page?.toString(),
      perPage: options.perPage?.toString(),
      sort: options.sort,
      filter: options.filter,
      expand: options.expand,
      fields: options.fields,
      skipTotal: options.skipTotal ? "true" : undefined,
    };
    return this.call("list", "GET", this.recordsPath(), { query }, this.decodeList);
  }

  /**
   * Fetch the first record matching the filter. Paging is always
   * `page=1&perPage=1&skipTotal=true`; an empty result is a `parse_error`.
   */
  async getFirstListItem(options: FirstListItemOptions = {}): Promise<T> {
    const query = {
      page: "1",
      perPage: "1",
      sort: options.sort,
      filter: options.filter,
      expand: options.expand,
      fields: options.fields,
      skipTotal: "true",
    };
    const list = await this.call("list", "GET", this.recordsPath(), { query }, this.decodeList);
    if (list.items.length === 0) {
      throw new PocketBaseError({
        kind: "parse_error",
        operation: "list",
        status: 200,
        message: "No record found.",
      });
    }
    return list.items[0];
  }

  /**
   * Fetch every record, one page after another. Stops at the first page
   * holding fewer than `batchSize` items, so a collection whose size is a
   * multiple of the batch costs one extra, empty request.
   */
  async getFullList(options: FullListOptions = {}): Promise<T[]> {
    const requested = Math.floor(options.batchSize ?? MAX_PER_PAGE);
    const batchSize = Number.isNaN(requested)
      ? MAX_PER_PAGE
      : Math.min(MAX_PER_PAGE, Math.max(1, requested));
    const records: T[] = [];

    for (let page = 1; ; page++) {
      const query = {
        page: String(page),
        perPage: String(batchSize),
        sort: options.sort,
        filter: options.filter,
        expand: options.expand,
        fields: options.fields,
        skipTotal: "true",
      };
      const list = await this.call("list", "GET", this.recordsPath(), { query }, this.decodeList);

      records.push(...list.items);
      if (list.items.length < batchSize) {
        return records;
      }
    }
  }

  /** Create a record from a JSON body. Use {@link Collection.createMultipart} for file uploads. */
  async create(body: RecordBody<T>): Promise<RecordMeta> {
    return this.call("create", "POST", this.recordsPath(), { json: body }, decodeMeta);
  }

  /** Create a record from multipart form data. */
  async createMultipart(form: FormData): Promise<RecordMeta> {
    return this.call("create", "POST", this.recordsPath(), { form }, decodeMeta);
  }

  /** Partially update a record. */
  async update(id: string, body: RecordBody<T>): Promise<RecordMeta> {
    return this.call("update", "PATCH", this.recordPath(id), { json: body }, decodeMeta);
  }

  /** Delete a record. An empty id is rejected without a request. */
  async delete(id: string): Promise<void> {
    if (id === "") {
      throw new PocketBaseError({
        kind: "bad_request",
        operation: "delete",
        message: "Record id cannot be empty",
      });
    }
    await this.exchange("delete", "DELETE", this.recordPath(id), {});
  }

  /** Log in with an email or username; replaces the client's session. */
  async authWithPassword(identity: string, password: string): Promise<AuthStore> {
    const json = { identity, password };
    const store = await this.call("auth", "POST", this.path("auth-with-password"), { json }, decodeAuth);
    this.client.updateAuthStore(store);
    return store;
  }

  /** Renew the session token; replaces the client's session. */
  async authRefresh(): Promise<AuthStore> {
    const store = await this.call("refresh", "POST", this.path("auth-refresh"), {}, decodeAuth);
    this.client.updateAuthStore(store);
    return store;
  }

  /** Renew another user's token. The client's own session is left as is. */
  async authRefreshForUser(token: string): Promise<AuthStore> {
    return this.call("refresh", "POST", this.path("auth-refresh"), { authToken: token }, decodeAuth);
  }

  /**
   * Obtain a session for another user. Needs superuser rights; resolves to a
   * new client holding that session and leaves this one untouched.
   */
  async impersonate(userId: string, options: ImpersonateOptions = {}): Promise<PocketBase> {
    let form: FormData | undefined;
    if (options.duration !== undefined) {
      form = new FormData();
      form.append("duration", String(options.duration));
    }
    const path = this.path(`impersonate/${encodeURIComponent(userId)}`);
    const store = await this.call("impersonate", "POST", path, { form }, decodeAuth);
    return this.client.fork(store);
  }

  /** Send a verification email to the given address. */
  async requestVerification(email: string): Promise<void> {
    await this.exchange("verification", "POST", this.path("request-verification"), {
      json: { email },
    });
  }

  private path(suffix: string): string {
    return `/api/collections/${this.name}/${suffix}`;
  }

  private recordsPath(): string {
    return this.path("records");
  }

  private recordPath(id: string): string {
    return this.path(`records/${encodeURIComponent(id)}`);
  }

  /** Run one exchange and throw the classified error on a non-2xx status. */
  private async exchange(
    operation: OperationFamily,
    method: HttpMethod,
    path: string,
    options: SendOptions,
  ): Promise<{ status: number; text: string }> {
    const { res, text } = await this.client.send(operation, method, path, options);

    if (!res.ok) {
      const error = classifyResponse(operation, res.status, res.statusText, text);
      this.client.logUnexpected(error);
      throw error;
    }
    return { status: res.status, text };
  }

  /** Like {@link Collection.exchange}, then decode the JSON body. */
  private async call<R>(
    operation: OperationFamily,
    method: HttpMethod,
    path: string,
    options: SendOptions,
    decode: Decoder<R>,
  ): Promise<R> {
    const { status, text } = await this.exchange(operation, method, path, options);

    try {
      return decode(text ? JSON.parse(text) : null);
    } catch (err) {
      if (!(err instanceof SyntaxError || err instanceof ZodError)) {
        throw err;
      }
      const detail =
        err instanceof ZodError
          ? err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ")
          : err.message;
      throw new PocketBaseError({
        kind: "parse_error",
        operation,
        status,
        message: `Could not parse response into the expected data structure: ${detail}`,
        cause: err,
      });
    }
  }
}
