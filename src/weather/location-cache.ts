/**
 * In-memory copy of the saved locations table
 *
 * The map is rebuilt from the store after every write rather than patched, so
 * once set() returns the cache matches the table.
 */

import { logger } from '../domain/logger.js';
import type { LocationStore } from '../store/types.js';

export class LocationCache {
  private locations = new Map<string, string>();

  /**
   * Replace the whole map with the rows currently in the store
   */
  load(store: LocationStore): void {
    const next = new Map<string, string>();
    for (const row of store.selectAll()) {
      next.set(row.userId, row.location);
    }
    this.locations = next;
  }

  /**
   * Saved location for a user, matched case-insensitively
   */
  get(userId: string): string | undefined {
    return this.locations.get(userId.toLowerCase());
  }

  set(userId: string, location: string, store: LocationStore): void {
    const row = { userId: userId.toLowerCase(), location: location.toLowerCase() };

    if (this.locations.has(row.userId)) {
      store.update(row);
    } else {
      store.insert(row);
    }
    store.commit();
    this.load(store);

    logger.debug('Saved location updated', { nick: row.userId, location: row.location });
  }

  get size(): number {
    return this.locations.size;
  }
}
