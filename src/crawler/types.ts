/**
 * Domain records written to the graph store.
 */

export interface User {
  id: number;
  screen_name: string;
  name: string;
  /** 0 unknown, 1 female, 2 male. */
  sex: number;
  home_town: string;
  /** Derived; decides whether the user is expanded. Not persisted. */
  is_private: boolean;
}

/**
 * Counts written with a user node. Omitted when the writer does not know
 * them (a friend seen only through another user's friend list).
 */
export interface UserCounts {
  friends_count: number;
  subscriptions_count: number;
}

export interface Group {
  id: number;
  name: string;
  members_count: number;
}
