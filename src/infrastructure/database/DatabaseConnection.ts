import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * SQLite connection manager for the local conversation store
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/conversations.db') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_turns (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        thread_id TEXT,
        request_text TEXT NOT NULL,
        response_text TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_turn_user_ts ON conversation_turns(user_id, timestamp);
      CREATE INDEX IF NOT EXISTS idx_turn_user_thread_ts ON conversation_turns(user_id, thread_id, timestamp);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
