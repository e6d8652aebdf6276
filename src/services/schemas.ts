/**
 * @module services/schemas
 * @fileoverview zod schemas for the API response envelope and the payload of
 * every endpoint the crawler calls.
 *
 * Raw records are validated loosely: only the fields the crawler reads are
 * declared, and unknown fields pass through. A payload that does not match is
 * turned into an {@link UnexpectedShapeError} by {@link parsePayload}.
 */

import { z } from "zod";
import { UnexpectedShapeError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Envelope
 * ──────────────────────────────────────────────────────────────────────────── */

export const ApiErrorSchema = z.object({
  error_code: z.number().int(),
  error_msg: z.string().default(""),
});

export const EnvelopeSchema = z.union([
  z.object({ error: ApiErrorSchema }),
  z
    .object({ response: z.unknown() })
    .refine((value) => value.response !== undefined, "missing response"),
]);

/* ────────────────────────────────────────────────────────────────────────────
 * Records
 * ──────────────────────────────────────────────────────────────────────────── */

/** Booleans arrive as `true`/`false` or as `0`/`1` depending on the method. */
const FlagSchema = z.union([z.boolean(), z.number()]).transform((value) => Boolean(value));

export const RawProfileSchema = z
  .object({
    id: z.number().int(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    screen_name: z.string().optional(),
    sex: z.number().int().optional(),
    home_town: z.string().optional(),
    city: z.object({ title: z.string().optional() }).passthrough().optional(),
    deactivated: z.string().optional(),
    is_closed: FlagSchema.optional(),
    can_access_closed: FlagSchema.optional(),
  })
  .passthrough();

export type RawProfile = z.infer<typeof RawProfileSchema>;

export const RawSubscriptionItemSchema = z
  .object({
    id: z.number().int(),
    is_closed: z.number().int().optional(),
  })
  .passthrough();

export type RawSubscriptionItem = z.infer<typeof RawSubscriptionItemSchema>;

export const RawGroupSchema = z
  .object({
    id: z.number().int(),
    name: z.string().optional(),
    members_count: z.number().int().optional(),
  })
  .passthrough();

export type RawGroup = z.infer<typeof RawGroupSchema>;

/* ────────────────────────────────────────────────────────────────────────────
 * Endpoint Payloads
 * ──────────────────────────────────────────────────────────────────────────── */

/** `users.get`: array of profiles. */
export const ProfileListSchema = z.array(RawProfileSchema);

/** `friends.get` with `fields`: paginated object of profiles. */
export const FriendsPageSchema = z.object({
  count: z.number().int().default(0),
  items: z.array(RawProfileSchema).default([]),
});

export type FriendsPage = z.infer<typeof FriendsPageSchema>;

/** `users.getSubscriptions` with `extended=1`. */
export const SubscriptionsPageSchema = z.object({
  count: z.number().int().default(0),
  items: z.array(RawSubscriptionItemSchema).default([]),
});

export type SubscriptionsPage = z.infer<typeof SubscriptionsPageSchema>;

/**
 * `groups.getById`: a plain array in 5.131; newer protocol versions wrap it
 * as `{ groups: [...] }`, which is unwrapped here.
 */
export const GroupListSchema = z.union([
  z.array(RawGroupSchema),
  z.object({ groups: z.array(RawGroupSchema) }).transform((value) => value.groups),
]);

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Validate an endpoint payload.
 *
 * @example
 * ```ts
 * const page = parsePayload("friends.get", FriendsPageSchema, payload);
 * if (!page.ok) logger.warn(page.error.message);
 * ```
 */
export function parsePayload<S extends z.ZodTypeAny>(
  method: string,
  schema: S,
  payload: unknown,
): Result<z.output<S>, UnexpectedShapeError> {
  const parsed = schema.safeParse(payload);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  return err(new UnexpectedShapeError(method, `${issue?.message ?? "invalid payload"}${where}`));
}
