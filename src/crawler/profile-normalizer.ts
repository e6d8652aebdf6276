/**
 * @module crawler/profile-normalizer
 * @fileoverview Converts a raw API profile into the {@link User} record the
 * store persists.
 */

import type { RawProfile } from "../services/schemas.js";
import type { User } from "./types.js";

/**
 * Normalize a raw profile.
 *
 * - `name` is `"first last"` trimmed; missing parts count as empty.
 * - `home_town` falls back to `city.title` when absent or empty.
 * - A profile is private when it is deactivated, or closed without
 *   `can_access_closed`.
 *
 * @example
 * ```ts
 * normalizeProfile({ id: 7, first_name: "Ann", city: { title: "Omsk" } });
 * // => { id: 7, screen_name: "", name: "Ann", sex: 0, home_town: "Omsk", is_private: false }
 * ```
 */
export function normalizeProfile(raw: RawProfile): User {
  const name = `${raw.first_name ?? ""} ${raw.last_name ?? ""}`.trim();
  const homeTown = raw.home_town ? raw.home_town : (raw.city?.title ?? "");

  return {
    id: raw.id,
    screen_name: raw.screen_name ?? "",
    name,
    sex: raw.sex ?? 0,
    home_town: homeTown,
    is_private:
      raw.deactivated !== undefined ||
      (raw.is_closed === true && raw.can_access_closed !== true),
  };
}
