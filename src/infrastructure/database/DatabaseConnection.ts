import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = path.join('data', 'renders.db')) {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    // Enable WAL mode for better concurrency
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS renders (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL UNIQUE,
        owner_id TEXT NOT NULL,
        filename TEXT NOT NULL,
        download_name TEXT NOT NULL,
        file_path TEXT NOT NULL,
        file_size INTEGER,
        mimetype TEXT NOT NULL,
        quality TEXT NOT NULL,
        video_format TEXT NOT NULL,
        render_size INTEGER NOT NULL,
        axis TEXT NOT NULL,
        rotation_offset REAL DEFAULT 0,
        auto_orientation INTEGER DEFAULT 0,
        state TEXT NOT NULL DEFAULT 'running',
        progress REAL DEFAULT 0,
        message TEXT,
        created_at TIMESTAMP NOT NULL,
        started_at TIMESTAMP,
        finished_at TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_render_owner ON renders(owner_id);
      CREATE INDEX IF NOT EXISTS idx_render_owner_state ON renders(owner_id, state);
      CREATE INDEX IF NOT EXISTS idx_render_created ON renders(created_at);
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

  getStatistics(): {
    totalRenders: number;
    databaseSize: number;
    renderStats: {
      running: number;
      finished: number;
      error: number;
      cancelled: number;
    };
  } {
    const total = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM renders')
      .get();

    // Get database file size
    const databaseSize = this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)
      ? fs.statSync(this.dbPath).size
      : 0;

    const stats = this.db.prepare<[], {
      running: number | null;
      finished: number | null;
      error: number | null;
      cancelled: number | null;
    }>(`
      SELECT
        SUM(CASE WHEN state = 'running' THEN 1 ELSE 0 END) as running,
        SUM(CASE WHEN state = 'finished' THEN 1 ELSE 0 END) as finished,
        SUM(CASE WHEN state = 'error' THEN 1 ELSE 0 END) as error,
        SUM(CASE WHEN state = 'cancelled' THEN 1 ELSE 0 END) as cancelled
      FROM renders
    `).get();

    return {
      totalRenders: total?.count ?? 0,
      databaseSize,
      renderStats: {
        running: stats?.running ?? 0,
        finished: stats?.finished ?? 0,
        error: stats?.error ?? 0,
        cancelled: stats?.cancelled ?? 0,
      },
    };
  }
}
