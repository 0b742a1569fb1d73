import { z } from 'zod';

import { RemoteError } from './errors.js';
import type { Entry } from './types.js';

const idField = z.union([
  z.string().regex(/^\d+$/),
  z.number().int().nonnegative().safe().transform((value) => String(value)),
]);

const numberField = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]);

const envelope = z.object({
  success: z.boolean().optional(),
  errorMsg: z.string().nullish(),
});

export const userFileSchema = z.object({
  id: idField,
  fileName: z.string(),
  isFolder: z.enum(['Y', 'N']),
  directoryId: idField,
  size: numberField.nullish(),
  md5: z.string().nullish(),
  updateTime: numberField.nullish(),
});

export type UserFile = z.infer<typeof userFileSchema>;

export const listResponseSchema = envelope.extend({
  userFileVOList: z
    .array(userFileSchema)
    .nullish()
    .transform((items) => items ?? []),
});

export const randomCodeResponseSchema = envelope.extend({
  randomCode: z.string().nullish(),
  timestamp: z.union([z.string(), z.number()]).nullish(),
});

export const loginResponseSchema = envelope.extend({
  token: z.string().nullish(),
});

export const urlResponseSchema = envelope.extend({
  url: z.string().nullish(),
});

export const pngResponseSchema = envelope.extend({
  pngPageVOList: z
    .array(z.object({ pageNo: numberField, url: z.string() }))
    .nullish()
    .transform((pages) => pages ?? []),
});

export const uploadApplyResponseSchema = envelope.extend({
  url: z.string().nullish(),
  s3Authorization: z.string().nullish(),
  xamzDate: z.string().nullish(),
});

export const statusResponseSchema = envelope;

/** Parses a response body, mapping shape mismatches to `RemoteError`. */
export function parseResponse<T extends z.ZodTypeAny>(schema: T, data: unknown, endpoint: string): z.output<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new RemoteError(`Unexpected response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Rejects envelopes the service flagged as failed. */
export function ensureSuccess(body: z.infer<typeof envelope>, fallback: string): void {
  if (body.success === false) {
    throw new RemoteError(body.errorMsg || fallback);
  }
}

export function toEntry(item: UserFile): Entry {
  switch (item.isFolder) {
    case 'Y':
      return { kind: 'directory', id: item.id, fileName: item.fileName, directoryId: item.directoryId };
    case 'N':
      return {
        kind: 'file',
        id: item.id,
        fileName: item.fileName,
        directoryId: item.directoryId,
        size: item.size ?? 0,
        md5: item.md5 ?? undefined,
        updatedAt: item.updateTime ?? undefined,
      };
  }
}
