/**
 * @fileoverview Typed endpoint calls on top of {@link ApiClient}.
 *
 * Each method returns a {@link Fetched} variant instead of throwing, so the
 * crawler branches explicitly on every outcome:
 *
 * | kind         | meaning                                                  |
 * |--------------|----------------------------------------------------------|
 * | `ok`         | payload validated against the endpoint schema            |
 * | `private`    | the API answered with the private-profile error code     |
 * | `unexpected` | the payload did not have the expected structure          |
 * | `failed`     | the call still failed after the whole retry budget       |
 *
 * Errors that are not API failures (programming errors) still throw.
 *
 * @module services/vk-api
 */

import { FatalApiError, UnexpectedShapeError } from "../utils/errors.js";
import type { ApiClient, ApiOutcome, ApiParams, CredentialMode } from "./api-client.js";
import {
  FriendsPageSchema,
  GroupListSchema,
  ProfileListSchema,
  SubscriptionsPageSchema,
  parsePayload,
  type FriendsPage,
  type RawGroup,
  type RawProfile,
  type SubscriptionsPage,
} from "./schemas.js";
import type { z } from "zod";

export type Fetched<T> =
  | { kind: "ok"; value: T }
  | { kind: "private" }
  | { kind: "unexpected"; error: UnexpectedShapeError }
  | { kind: "failed"; error: FatalApiError };

/** Profile fields requested for the crawled user and for every friend. */
export const PROFILE_FIELDS = "screen_name,sex,home_town,city,first_name,last_name";

/** Endpoint surface the crawler depends on. */
export interface VkGraphApi {
  getProfile(userRef: string | number): Promise<Fetched<RawProfile>>;
  getFriends(userId: number, limit: number): Promise<Fetched<FriendsPage>>;
  getSubscriptionsPage(userId: number, offset: number, count: number): Promise<Fetched<SubscriptionsPage>>;
  getGroupsById(groupIds: readonly number[]): Promise<Fetched<RawGroup[]>>;
}

export class VkApi implements VkGraphApi {
  constructor(private readonly client: ApiClient) {}

  /** `users.get` for a numeric id or a screen name. */
  async getProfile(userRef: string | number): Promise<Fetched<RawProfile>> {
    const result = await this.fetch(
      "users.get",
      { user_ids: userRef, fields: PROFILE_FIELDS },
      ProfileListSchema,
    );
    if (result.kind !== "ok") {
      return result;
    }

    const [profile] = result.value;
    if (!profile) {
      return {
        kind: "unexpected",
        error: new UnexpectedShapeError("users.get", `no profile returned for ${userRef}`),
      };
    }
    return { kind: "ok", value: profile };
  }

  /** `friends.get` with profile fields, capped at `limit` items. */
  async getFriends(userId: number, limit: number): Promise<Fetched<FriendsPage>> {
    return this.fetch(
      "friends.get",
      { user_id: userId, fields: PROFILE_FIELDS, count: limit },
      FriendsPageSchema,
    );
  }

  /** One page of `users.getSubscriptions`, groups only. */
  async getSubscriptionsPage(
    userId: number,
    offset: number,
    count: number,
  ): Promise<Fetched<SubscriptionsPage>> {
    return this.fetch(
      "users.getSubscriptions",
      { user_id: userId, extended: 1, offset, count, filter: "groups" },
      SubscriptionsPageSchema,
    );
  }

  /** `groups.getById` with the service credential. */
  async getGroupsById(groupIds: readonly number[]): Promise<Fetched<RawGroup[]>> {
    return this.fetch(
      "groups.getById",
      { group_ids: groupIds.join(","), fields: "members_count" },
      GroupListSchema,
      "service",
    );
  }

  private async fetch<S extends z.ZodTypeAny>(
    method: string,
    params: ApiParams,
    schema: S,
    mode: CredentialMode = "primary",
  ): Promise<Fetched<z.output<S>>> {
    let outcome: ApiOutcome;
    try {
      outcome = await this.client.call(method, params, mode);
    } catch (error) {
      if (error instanceof FatalApiError) {
        return { kind: "failed", error };
      }
      throw error;
    }

    if (outcome.kind === "private") {
      return outcome;
    }

    const parsed = parsePayload(method, schema, outcome.payload);
    return parsed.ok ? { kind: "ok", value: parsed.value } : { kind: "unexpected", error: parsed.error };
  }
}
