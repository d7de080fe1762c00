import Database from "better-sqlite3";
import { join } from "node:path";

export type VaultFile = "active" | "archive" | "intel";

const ACTIVE_SCHEMA = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id        TEXT PRIMARY KEY,
  channel           TEXT NOT NULL,
  language          TEXT NOT NULL,
  locale            TEXT NOT NULL,
  scam_flags        INTEGER NOT NULL DEFAULT 0,
  is_confirmed_scam INTEGER NOT NULL DEFAULT 0,
  created_at        INTEGER NOT NULL,
  updated_at        INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_sessions_updated ON sessions(updated_at);

CREATE TABLE IF NOT EXISTS messages (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id   TEXT NOT NULL,
  sender       TEXT NOT NULL CHECK(sender IN ('scammer','user')),
  text         TEXT NOT NULL,
  timestamp    INTEGER NOT NULL,
  is_response  INTEGER NOT NULL DEFAULT 0,
  is_scam_flag INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, id);

CREATE TABLE IF NOT EXISTS intelligence (
  session_id          TEXT PRIMARY KEY,
  bank_accounts       TEXT NOT NULL DEFAULT '[]',
  upi_ids             TEXT NOT NULL DEFAULT '[]',
  phishing_links      TEXT NOT NULL DEFAULT '[]',
  phone_numbers       TEXT NOT NULL DEFAULT '[]',
  suspicious_keywords TEXT NOT NULL DEFAULT '[]',
  agent_notes         TEXT NOT NULL DEFAULT '',
  updated_at          INTEGER NOT NULL
);
`;

const ARCHIVE_SCHEMA = `
CREATE TABLE IF NOT EXISTS archived_sessions (
  session_id       TEXT PRIMARY KEY,
  channel          TEXT NOT NULL,
  language         TEXT NOT NULL,
  locale           TEXT NOT NULL,
  total_messages   INTEGER NOT NULL DEFAULT 0,
  is_scam          INTEGER NOT NULL DEFAULT 0,
  scam_flags_count INTEGER NOT NULL DEFAULT 0,
  created_at       INTEGER NOT NULL,
  completed_at     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_archived_completed ON archived_sessions(completed_at);

CREATE TABLE IF NOT EXISTS archived_messages (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id   TEXT NOT NULL,
  position     INTEGER NOT NULL,
  sender       TEXT NOT NULL,
  text         TEXT NOT NULL,
  timestamp    INTEGER NOT NULL,
  is_response  INTEGER NOT NULL DEFAULT 0,
  is_scam_flag INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_archived_messages_session
  ON archived_messages(session_id, position);
`;

const INTEL_SCHEMA = `
CREATE TABLE IF NOT EXISTS scam_intelligence (
  session_id               TEXT PRIMARY KEY,
  total_messages_exchanged INTEGER NOT NULL DEFAULT 0,
  bank_accounts            TEXT NOT NULL DEFAULT '[]',
  upi_ids                  TEXT NOT NULL DEFAULT '[]',
  phishing_links           TEXT NOT NULL DEFAULT '[]',
  phone_numbers            TEXT NOT NULL DEFAULT '[]',
  suspicious_keywords      TEXT NOT NULL DEFAULT '[]',
  agent_notes              TEXT NOT NULL DEFAULT '',
  pushed_to_external       INTEGER NOT NULL DEFAULT 0,
  created_at               INTEGER NOT NULL,
  pushed_at                INTEGER
);
CREATE INDEX IF NOT EXISTS idx_scam_intelligence_pending
  ON scam_intelligence(created_at) WHERE pushed_to_external = 0;
`;

const SCHEMAS: Record<VaultFile, string> = {
  active: ACTIVE_SCHEMA,
  archive: ARCHIVE_SCHEMA,
  intel: INTEL_SCHEMA,
};

/**
 * Owns the three SQLite files that back the session stores. Each file is
 * independent so the archive and intelligence ledgers survive an active
 * store reset.
 */
export class VaultDB {
  private readonly dbs: Record<VaultFile, Database.Database>;

  constructor(stateDir: string) {
    this.dbs = {
      active: this.open(join(stateDir, "active.db"), SCHEMAS.active),
      archive: this.open(join(stateDir, "archive.db"), SCHEMAS.archive),
      intel: this.open(join(stateDir, "intel.db"), SCHEMAS.intel),
    };
  }

  private open(file: string, schema: string): Database.Database {
    const db = new Database(file);
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    db.exec(schema);
    return db;
  }

  raw(file: VaultFile): Database.Database {
    return this.dbs[file];
  }

  isOpen(): boolean {
    return Object.values(this.dbs).every((db) => db.open);
  }

  close(): void {
    for (const db of Object.values(this.dbs)) {
      if (db.open) {
        db.close();
      }
    }
  }
}
