/**
 * LocationDB - SQLite storage for each user's last-used weather location
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { logger } from '../domain/logger.js';
import type { LocationStore, UserLocation } from './types.js';

const LocationRowSchema = z.object({
  nick: z.string(),
  loc: z.string(),
});

interface QueuedWrite {
  op: 'insert' | 'update';
  row: UserLocation;
}

export class LocationDB implements LocationStore {
  private db: Database.Database;
  private dbPath: string;
  private writes: QueuedWrite[] = [];

  constructor(dbPath: string = './data/weather.db') {
    this.dbPath = dbPath;
    try {
      if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS weather (
          nick TEXT NOT NULL PRIMARY KEY,
          loc TEXT NOT NULL
        )
      `);
      logger.info('LocationDB initialized', { dbPath });
    } catch (error) {
      logger.error('Failed to open location database', { dbPath, error: String(error) });
      throw new Error(`Could not open location database at ${dbPath}: ${error}`);
    }
  }

  /**
   * Read every saved location
   */
  selectAll(): UserLocation[] {
    const rows = LocationRowSchema.array().parse(
      this.db.prepare('SELECT nick, loc FROM weather').all()
    );
    return rows.map(row => ({ userId: row.nick, location: row.loc }));
  }

  insert(row: UserLocation): void {
    this.writes.push({ op: 'insert', row: { ...row } });
  }

  update(row: UserLocation): void {
    this.writes.push({ op: 'update', row: { ...row } });
  }

  /**
   * Apply queued writes in a single transaction
   */
  commit(): void {
    const batch = this.writes;
    this.writes = [];

    const insertStmt = this.db.prepare('INSERT INTO weather (nick, loc) VALUES (?, ?)');
    const updateStmt = this.db.prepare('UPDATE weather SET loc = ? WHERE nick = ?');

    const apply = this.db.transaction((writes: QueuedWrite[]) => {
      for (const write of writes) {
        if (write.op === 'insert') {
          insertStmt.run(write.row.userId, write.row.location);
        } else {
          updateStmt.run(write.row.location, write.row.userId);
        }
      }
    });
    apply(batch);

    logger.debug('LocationDB committed', { writes: batch.length });
  }

  close(): void {
    this.db.close();
    logger.info('LocationDB connection closed', { dbPath: this.dbPath });
  }
}
