import { z } from "zod";
import type { AuthStore, ListResult, RecordMeta, RecordModel, RecordSchema } from "./types";

/** Largest page the server will return. */
export const MAX_PER_PAGE = 500;

// System fields are optional: a `fields` selection can leave them out.
export const recordModelSchema: RecordSchema<RecordModel> = z
  .object({
    id: z.string().optional(),
    collectionId: z.string().optional(),
    collectionName: z.string().optional(),
  })
  .passthrough();

export const recordMetaSchema: RecordSchema<RecordMeta> = z.object({
  id: z.string(),
  collectionId: z.string(),
  collectionName: z.string(),
  created: z.string(),
  updated: z.string(),
});

const authRecordSchema = z
  .object({
    id: z.string(),
    collectionId: z.string(),
    collectionName: z.string(),
    created: z.string(),
    updated: z.string(),
    email: z.string(),
    emailVisibility: z.boolean(),
    verified: z.boolean(),
  })
  .passthrough();

export const authStoreSchema: RecordSchema<AuthStore> = z.object({
  token: z.string().min(1),
  record: authRecordSchema,
});

// Items stay opaque here; each one is decoded with the collection's schema.
const listEnvelopeSchema = z
  .object({
    page: z.number().int().min(1),
    perPage: z.number().int().min(0),
    totalItems: z.number().int(),
    totalPages: z.number().int(),
    items: z.array(z.unknown()),
  })
  .refine((list) => list.items.length <= list.perPage, {
    message: "Page holds more items than perPage",
    path: ["items"],
  });

/** Decode a list envelope. Throws `ZodError` on a shape mismatch. */
export function parseListResult<T>(payload: unknown, item: RecordSchema<T>): ListResult<T> {
  const envelope = listEnvelopeSchema.parse(payload);
  return {
    page: envelope.page,
    perPage: envelope.perPage,
    totalItems: envelope.totalItems,
    totalPages: envelope.totalPages,
    items: envelope.items.map((entry) => item.parse(entry)),
  };
}

/**
 * Error envelope: `{ code, message, data: { [field]: { code, message } } }`.
 * Read leniently; only a non-object payload fails.
 */
export const errorBodySchema = z.object({
  message: z.string().optional().catch(undefined),
  data: z.record(z.unknown()).catch({}),
});

export type ErrorBody = z.infer<typeof errorBodySchema>;

export const fieldErrorSchema = z.object({
  code: z.string(),
  message: z.string().catch(""),
});
