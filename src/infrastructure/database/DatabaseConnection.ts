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

  /**
   * @param dbPath - File path relative to the working directory, or ':memory:'
   */
  constructor(dbPath: string = 'data/batch.db') {
    if (dbPath === IN_MEMORY) {
      this.dbPath = IN_MEMORY;
    } else {
      this.dbPath = path.resolve(process.cwd(), dbPath);

      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS batch_groups (
        id TEXT PRIMARY KEY,
        processor TEXT NOT NULL,
        total_items INTEGER NOT NULL,
        max_items_per_batch INTEGER NOT NULL,
        is_split INTEGER NOT NULL,
        job_ids TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_group_created ON batch_groups(created_at);

      CREATE TABLE IF NOT EXISTS batch_jobs (
        id TEXT PRIMARY KEY,
        group_id TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        attempt INTEGER NOT NULL DEFAULT 1,
        remote_id TEXT,
        status TEXT NOT NULL,
        remote_status TEXT,
        item_count INTEGER NOT NULL,
        completed_count INTEGER NOT NULL DEFAULT 0,
        failed_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        submitted_at TEXT,
        completed_at TEXT,
        chunk TEXT NOT NULL,
        errors TEXT NOT NULL,
        results TEXT,
        collected INTEGER NOT NULL DEFAULT 0,
        FOREIGN KEY (group_id) REFERENCES batch_groups(id)
      );

      CREATE INDEX IF NOT EXISTS idx_job_group ON batch_jobs(group_id);
      CREATE INDEX IF NOT EXISTS idx_job_status ON batch_jobs(status);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalGroups: number;
    totalJobs: number;
    jobsByStatus: Record<string, number>;
    databaseSize: number;
  } {
    const totalGroups =
      this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM batch_groups').get()?.count ?? 0;
    const rows = this.db
      .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) as count FROM batch_jobs GROUP BY status')
      .all();

    const jobsByStatus: Record<string, number> = {};
    let totalJobs = 0;
    for (const row of rows) {
      jobsByStatus[row.status] = row.count;
      totalJobs += row.count;
    }

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return { totalGroups, totalJobs, jobsByStatus, databaseSize };
  }
}
