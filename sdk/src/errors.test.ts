import { describe, it, expect } from "vitest";
import {
  classifyResponse,
  fieldErrorsOf,
  isPocketBaseError,
  PocketBaseError,
  readErrorBody,
} from "./errors";

describe("PocketBaseError", () => {
  it("falls back to a message for its kind", () => {
    const error = new PocketBaseError({ kind: "forbidden", operation: "view" });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("PocketBaseError");
    expect(error.message).toBe("The authorized record is not allowed to perform this action.");
    expect(error.status).toBeNull();
    expect(error.fieldErrors).toEqual([]);
    expect(error.emptyFields).toBeNull();
  });

  it("is recognized by isPocketBaseError", () => {
    const error = new PocketBaseError({ kind: "not_found", operation: "view", status: 404 });
    expect(isPocketBaseError(error)).toBe(true);
    expect(isPocketBaseError(error, "not_found")).toBe(true);
    expect(isPocketBaseError(error, "forbidden")).toBe(false);
    expect(isPocketBaseError(new Error("boom"))).toBe(false);
  });
});

describe("readErrorBody", () => {
  it("reads the server envelope", () => {
    const body = readErrorBody(JSON.stringify({ code: 400, message: "Invalid data.", data: { title: 1 } }));
    expect(body).toEqual({ message: "Invalid data.", data: { title: 1 } });
  });

  it("substitutes an empty body for text that is not JSON", () => {
    expect(readErrorBody("")).toEqual({ data: {} });
    expect(readErrorBody("<html>502 Bad Gateway</html>")).toEqual({ data: {} });
    expect(readErrorBody("[1, 2]")).toEqual({ data: {} });
  });

  it("tolerates wrongly typed members", () => {
    expect(readErrorBody(JSON.stringify({ message: 5, data: "nope" }))).toEqual({ data: {} });
  });
});

describe("fieldErrorsOf", () => {
  it("lists well-formed entries and skips the rest", () => {
    const errors = fieldErrorsOf({
      data: {
        title: { code: "validation_required", message: "Missing required value." },
        slug: "not an object",
        body: { code: "validation_length_out_of_range" },
      },
    });
    expect(errors).toEqual([
      { name: "title", code: "validation_required", message: "Missing required value." },
      { name: "body", code: "validation_length_out_of_range", message: "" },
    ]);
  });
});

describe("classifyResponse", () => {
  it("uses the default message when the body has none", () => {
    const error = classifyResponse("view", 404, "Not Found", "");
    expect(error.kind).toBe("not_found");
    expect(error.status).toBe(404);
    expect(error.message).toBe("The requested resource wasn't found.");
  });

  it("names statuses outside the operation's table", () => {
    const error = classifyResponse("delete", 418, "I'm a teapot", "");
    expect(error.kind).toBe("unexpected_response");
    expect(error.message).toBe("Unhandled status 418 I'm a teapot");
  });

  it("applies the table of the operation family", () => {
    expect(classifyResponse("list", 429, "", "").kind).toBe("too_many_requests");
    expect(classifyResponse("create", 429, "", "").kind).toBe("unexpected_response");
    expect(classifyResponse("refresh", 400, "", "").kind).toBe("unexpected_response");
    expect(classifyResponse("impersonate", 401, "", "").kind).toBe("unauthorized");
  });

  it("only attaches field errors to bad_request", () => {
    const text = JSON.stringify({ data: { title: { code: "validation_required", message: "Required." } } });
    expect(classifyResponse("update", 400, "", text).fieldErrors).toHaveLength(1);
    expect(classifyResponse("update", 403, "", text).fieldErrors).toEqual([]);
  });

  it("analyses 400 on password login", () => {
    const text = JSON.stringify({ data: { identity: { code: "validation_is_email", message: "Invalid email." } } });
    const error = classifyResponse("auth", 400, "Bad Request", text);
    expect(error.kind).toBe("identity_must_be_email");
    expect(error.operation).toBe("auth");
    expect(error.status).toBe(400);
  });
});
