/**
 * Types for saved user locations
 */

/** One saved location per user; both values are stored lower-cased */
export interface UserLocation {
  userId: string;
  location: string;
}

/**
 * Narrow interface over the durable `weather(nick, loc)` table.
 * Writes take effect on commit().
 */
export interface LocationStore {
  selectAll(): UserLocation[];
  insert(row: UserLocation): void;
  update(row: UserLocation): void;
  commit(): void;
}
