import { errorBodySchema, fieldErrorSchema, type ErrorBody } from "./schemas";

/** What went wrong, independent of which operation failed. */
export type ErrorKind =
  | "bad_request"
  | "invalid_credentials"
  | "empty_field"
  | "identity_must_be_email"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "too_many_requests"
  | "unreachable"
  | "parse_error"
  | "unexpected_response";

/** Groups of operations sharing one status table. */
export type OperationFamily =
  | "view"
  | "list"
  | "create"
  | "update"
  | "delete"
  | "auth"
  | "refresh"
  | "impersonate"
  | "verification";

/** One invalid field reported in a 400 body, e.g. `{ name: "title", code: "validation_required" }`. */
export interface FieldError {
  name: string;
  code: string;
  message: string;
}

/** Which credentials were blank on a failed password login. */
export interface EmptyFields {
  identity: boolean;
  password: boolean;
}

type StatusKind = "bad_request" | "unauthorized" | "forbidden" | "not_found" | "too_many_requests";

const STATUS_KINDS = {
  view: { 403: "forbidden", 404: "not_found", 429: "too_many_requests" },
  list: {
    400: "bad_request",
    401: "unauthorized",
    403: "forbidden",
    404: "not_found",
    429: "too_many_requests",
  },
  create: { 400: "bad_request", 403: "forbidden", 404: "not_found" },
  update: { 400: "bad_request", 403: "forbidden", 404: "not_found" },
  delete: { 400: "bad_request", 403: "forbidden", 404: "not_found" },
  // 400 on auth goes through credential analysis instead.
  auth: {},
  refresh: { 401: "unauthorized", 403: "forbidden", 404: "not_found" },
  impersonate: { 400: "bad_request", 401: "unauthorized", 403: "forbidden", 404: "not_found" },
  verification: { 400: "bad_request", 401: "unauthorized", 403: "forbidden", 404: "not_found" },
} satisfies Record<OperationFamily, Partial<Record<number, StatusKind>>>;

const DEFAULT_MESSAGES: Record<ErrorKind, string> = {
  bad_request: "Something went wrong while processing your request.",
  invalid_credentials: "Failed to authenticate: the identity or password is wrong.",
  empty_field: "Failed to authenticate: the identity or password is empty.",
  identity_must_be_email: "Failed to authenticate: the identity must be a valid email address.",
  unauthorized: "The request requires a valid authorization token.",
  forbidden: "The authorized record is not allowed to perform this action.",
  not_found: "The requested resource wasn't found.",
  too_many_requests: "Too many requests; wait before retrying.",
  unreachable: "The API could not be reached.",
  parse_error: "The response does not match the expected data structure.",
  unexpected_response: "The API returned an unexpected response.",
};

export interface PocketBaseErrorInit {
  kind: ErrorKind;
  operation: OperationFamily;
  status?: number | null;
  message?: string;
  fieldErrors?: FieldError[];
  emptyFields?: EmptyFields | null;
  cause?: unknown;
}

/** Error thrown by every collection operation. Switch on `kind` to handle it. */
export class PocketBaseError extends Error {
  readonly kind: ErrorKind;
  readonly operation: OperationFamily;
  /** HTTP status, or `null` when no response was received. */
  readonly status: number | null;
  readonly fieldErrors: readonly FieldError[];
  readonly emptyFields: EmptyFields | null;

  constructor(init: PocketBaseErrorInit) {
    super(init.message || DEFAULT_MESSAGES[init.kind], { cause: init.cause });
    this.name = "PocketBaseError";
    this.kind = init.kind;
    this.operation = init.operation;
    this.status = init.status ?? null;
    this.fieldErrors = init.fieldErrors ?? [];
    this.emptyFields = init.emptyFields ?? null;
  }
}

export function isPocketBaseError(value: unknown, kind?: ErrorKind): value is PocketBaseError {
  return value instanceof PocketBaseError && (kind === undefined || value.kind === kind);
}

/** Parse an error body, substituting a generic one when it is unreadable. */
export function readErrorBody(text: string): ErrorBody {
  let payload: unknown = null;
  try {
    payload = text ? JSON.parse(text) : null;
  } catch {
    // Not JSON; the fallback below applies.
  }
  const parsed = errorBodySchema.safeParse(payload);
  return parsed.success ? parsed.data : { data: {} };
}

export function fieldErrorsOf(body: ErrorBody): FieldError[] {
  const errors: FieldError[] = [];
  for (const [name, value] of Object.entries(body.data)) {
    const field = fieldErrorSchema.safeParse(value);
    if (field.success) {
      errors.push({ name, code: field.data.code, message: field.data.message });
    }
  }
  return errors;
}

function codeOf(value: unknown): string | undefined {
  const field = fieldErrorSchema.safeParse(value);
  return field.success ? field.data.code : undefined;
}

/** Tell apart the reasons the server rejects a password login with 400. */
export function classifyCredentialFailure(body: ErrorBody): PocketBaseError {
  const { data } = body;
  const fieldErrors = fieldErrorsOf(body);
  const fail = (kind: ErrorKind, emptyFields: EmptyFields | null = null) =>
    new PocketBaseError({ kind, operation: "auth", status: 400, fieldErrors, emptyFields });

  if (Object.keys(data).length === 0) {
    return fail("invalid_credentials");
  }

  const identityCode = codeOf(data.identity);
  if (identityCode === "validation_is_email") {
    return fail("identity_must_be_email");
  }
  if (identityCode === "validation_required") {
    return fail("empty_field", { identity: true, password: "password" in data });
  }
  if (identityCode === undefined && "password" in data) {
    return fail("empty_field", { identity: false, password: true });
  }
  return fail("invalid_credentials");
}

/** Map a non-2xx response onto the error kind its operation family defines. */
export function classifyResponse(
  operation: OperationFamily,
  status: number,
  statusText: string,
  text: string,
): PocketBaseError {
  const body = readErrorBody(text);

  if (operation === "auth" && status === 400) {
    return classifyCredentialFailure(body);
  }

  const table: Partial<Record<number, StatusKind>> = STATUS_KINDS[operation];
  const kind = table[status];
  if (kind === undefined) {
    return new PocketBaseError({
      kind: "unexpected_response",
      operation,
      status,
      message: `Unhandled status ${status} ${statusText}`.trimEnd(),
    });
  }

  const fieldErrors = kind === "bad_request" ? fieldErrorsOf(body) : [];
  return new PocketBaseError({ kind, operation, status, message: body.message, fieldErrors });
}
