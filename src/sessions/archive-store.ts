import type { VaultDB } from "../vault/db.js";
import { guardStorage } from "./errors.js";
import type { ArchivedSession, Sender, Session, SessionMessage } from "./types.js";

interface ArchivedSessionRow {
  session_id: string;
  channel: string;
  language: string;
  locale: string;
  total_messages: number;
  is_scam: number;
  scam_flags_count: number;
  created_at: number;
  completed_at: number;
}

interface ArchivedMessageRow {
  session_id: string;
  sender: Sender;
  text: string;
  timestamp: number;
  is_response: number;
  is_scam_flag: number;
}

/** Ledger of every finalized session, benign or not. */
export class ArchiveStore {
  private readonly db;

  constructor(vaultDb: VaultDB) {
    this.db = vaultDb.raw("archive");
  }

  /** Replaces any earlier archive entry for the same id, messages included. */
  upsert(sessionId: string, session: Session, completedAt = Date.now()): void {
    guardStorage("archive.upsert", sessionId, () =>
      this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT OR REPLACE INTO archived_sessions
             (session_id, channel, language, locale, total_messages, is_scam, scam_flags_count, created_at, completed_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            sessionId,
            session.channel,
            session.language,
            session.locale,
            session.messages.length,
            session.isConfirmedScam ? 1 : 0,
            session.scamFlags,
            session.createdAt,
            completedAt,
          );

        this.db.prepare("DELETE FROM archived_messages WHERE session_id = ?").run(sessionId);
        const insert = this.db.prepare(
          `INSERT INTO archived_messages
           (session_id, position, sender, text, timestamp, is_response, is_scam_flag)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        );
        session.messages.forEach((message, position) => {
          insert.run(
            sessionId,
            position,
            message.sender,
            message.text,
            message.timestamp,
            message.isResponse ? 1 : 0,
            message.isScamFlag ? 1 : 0,
          );
        });
      })(),
    );
  }

  get(sessionId: string): ArchivedSession | null {
    return guardStorage("archive.get", sessionId, () => {
      const row = this.db
        .prepare("SELECT * FROM archived_sessions WHERE session_id = ?")
        .get(sessionId) as ArchivedSessionRow | undefined;
      return row ? this.toArchived(row) : null;
    });
  }

  /** Most recently completed first. */
  list(limit = 50, offset = 0): ArchivedSession[] {
    return guardStorage("archive.list", null, () => {
      const rows = this.db
        .prepare(
          "SELECT * FROM archived_sessions ORDER BY completed_at DESC, session_id ASC LIMIT ? OFFSET ?",
        )
        .all(limit, offset) as ArchivedSessionRow[];
      return rows.map((r) => this.toArchived(r));
    });
  }

  count(): number {
    const row = guardStorage("archive.count", null, () =>
      this.db.prepare("SELECT COUNT(*) AS cnt FROM archived_sessions").get() as { cnt: number },
    );
    return row.cnt;
  }

  private toArchived(row: ArchivedSessionRow): ArchivedSession {
    const messages = this.db
      .prepare("SELECT * FROM archived_messages WHERE session_id = ? ORDER BY position ASC")
      .all(row.session_id) as ArchivedMessageRow[];

    return {
      sessionId: row.session_id,
      channel: row.channel,
      language: row.language,
      locale: row.locale,
      totalMessages: row.total_messages,
      isScam: row.is_scam === 1,
      scamFlagsCount: row.scam_flags_count,
      createdAt: row.created_at,
      completedAt: row.completed_at,
      messages: messages.map((m) => this.toMessage(m)),
    };
  }

  private toMessage(row: ArchivedMessageRow): SessionMessage {
    return {
      sessionId: row.session_id,
      sender: row.sender,
      text: row.text,
      timestamp: row.timestamp,
      isResponse: row.is_response === 1,
      isScamFlag: row.is_scam_flag === 1,
    };
  }
}
