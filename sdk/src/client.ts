import { Collection } from "./collection";
import { PocketBaseError, type OperationFamily } from "./errors";
import { recordModelSchema } from "./schemas";
import type {
  AuthStore,
  ClientOptions,
  HttpMethod,
  Logger,
  RecordModel,
  RecordSchema,
} from "./types";

const DEFAULT_TIMEOUT = 30_000;

const COLLECTION_NAME = /^[\p{L}\p{N}_]+$/u;

/** @internal */
export interface SendOptions {
  query?: Record<string, string | undefined>;
  json?: unknown;
  form?: FormData;
  /** Bearer token to send instead of the session's. */
  authToken?: string;
}

/** @internal A response together with its fully read body. */
export interface Exchange {
  res: Response;
  text: string;
}

/**
 * PocketBase records client.
 *
 * @example
 * ```ts
 * import { z } from "zod";
 * import { PocketBase } from "pocketbase-records";
 *
 * const pb = new PocketBase("http://localhost:8090");
 *
 * await pb.collection("users").authWithPassword("user@example.com", "password");
 *
 * const articles = pb.collection("articles", z.object({ id: z.string(), title: z.string() }));
 * const page = await articles.getList({ filter: "published=true", sort: "-created" });
 * ```
 */
export class PocketBase {
  private readonly _baseURL: string;
  private readonly _fetch: typeof globalThis.fetch;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger | undefined;
  private _authStore: AuthStore | null = null;

  constructor(baseURL: string, private readonly options: ClientOptions = {}) {
    // Strip trailing slash.
    const trimmed = baseURL.replace(/\/+$/, "");
    if (!/^https?:\/\//.test(trimmed)) {
      throw new TypeError(`Invalid base URL "${baseURL}": must start with http:// or https://`);
    }
    this._baseURL = trimmed;
    this._fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.headers = options.headers ?? {};
    this.logger = options.logger;
  }

  get baseURL(): string {
    return this._baseURL;
  }

  /** Current session, if authenticated. */
  get authStore(): AuthStore | null {
    return this._authStore;
  }

  /** Current bearer token, if authenticated. */
  get token(): string | null {
    return this._authStore?.token ?? null;
  }

  /**
   * Operations on one collection. Pass a zod schema to type and validate
   * its records; without one they decode as {@link RecordModel}.
   */
  collection(name: string): Collection<RecordModel>;
  collection<T>(name: string, schema: RecordSchema<T>): Collection<T>;
  collection<T>(name: string, schema?: RecordSchema<T>): Collection<T> | Collection<RecordModel> {
    if (!COLLECTION_NAME.test(name)) {
      throw new TypeError(
        name === ""
          ? "Collection name cannot be empty"
          : `Invalid collection name "${name}": only letters, digits and underscores are allowed`,
      );
    }
    return schema ? new Collection(this, name, schema) : new Collection(this, name, recordModelSchema);
  }

  /** @internal Replace the whole session. */
  updateAuthStore(store: AuthStore): void {
    this._authStore = store;
  }

  /** @internal A fresh client with the same configuration and the given session. */
  fork(store: AuthStore): PocketBase {
    const client = new PocketBase(this._baseURL, this.options);
    client.updateAuthStore(store);
    return client;
  }

  /**
   * @internal
   * Issue one HTTP exchange and read its body. A failed connection, or a
   * body that cannot be read to the end, surfaces as `unreachable`; HTTP
   * statuses are left to the caller.
   */
  async send(
    operation: OperationFamily,
    method: HttpMethod,
    path: string,
    options: SendOptions = {},
  ): Promise<Exchange> {
    const url = this.buildURL(path, options.query);
    const headers: Record<string, string> = {
      ...this.headers,
      Accept: "application/json",
    };

    const token = options.authToken ?? this.token;
    if (token) {
      headers["Authorization"] = `Bearer ${token}`;
    }

    let body: string | FormData | undefined;
    if (options.form) {
      // Content-Type with the multipart boundary is set by the runtime.
      body = options.form;
    } else if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    }

    this.logger?.debug(`${method} ${url}`, { operation });

    try {
      const res = await this._fetch(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeout),
      });
      this.logger?.debug(`${res.status} ${method} ${url}`, { operation });
      // The timeout signal stays armed while the body streams.
      const text = await res.text();
      return { res, text };
    } catch (err) {
      const timedOut = err instanceof Error && err.name === "TimeoutError";
      const message = timedOut
        ? `Request timed out after ${this.timeout}ms`
        : `Failed to reach ${this._baseURL}: ${err instanceof Error ? err.message : String(err)}`;
      this.logger?.warn(message, { operation, method, url });
      throw new PocketBaseError({ kind: "unreachable", operation, message, cause: err });
    }
  }

  /** @internal */
  logUnexpected(error: PocketBaseError): void {
    if (error.kind === "unexpected_response") {
      this.logger?.error(error.message, { operation: error.operation, status: error.status });
    }
  }

  private buildURL(path: string, query?: Record<string, string | undefined>): string {
    const qs = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) qs.set(key, value);
    }
    const suffix = qs.toString() ? `?${qs}` : "";
    return `${this._baseURL}${path}${suffix}`;
  }

  /** Keep the session out of `console.log` and `util.inspect` output. */
  [Symbol.for("nodejs.util.inspect.custom")](): object {
    return {
      baseURL: this._baseURL,
      authStore: this._authStore ? "***REDACTED***" : null,
    };
  }
}
