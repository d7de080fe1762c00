import { z } from "zod";
import type { VaultDB } from "../vault/db.js";
import type { SessionDefaults } from "../config/types.js";
import { guardStorage } from "./errors.js";
import { emptyEvidence, mergeIntelligence } from "./evidence.js";
import type {
  AppendMessageParams,
  Evidence,
  ExtractedIntelligence,
  ScamStatus,
  Sender,
  Session,
  SessionHeader,
  SessionMessage,
} from "./types.js";

export interface ActiveStoreOptions {
  readonly confirmThreshold: number;
  readonly defaults: SessionDefaults;
}

interface SessionRow {
  session_id: string;
  channel: string;
  language: string;
  locale: string;
  scam_flags: number;
  is_confirmed_scam: number;
  created_at: number;
  updated_at: number;
}

interface MessageRow {
  session_id: string;
  sender: Sender;
  text: string;
  timestamp: number;
  is_response: number;
  is_scam_flag: number;
}

export interface IntelligenceRow {
  bank_accounts: string;
  upi_ids: string;
  phishing_links: string;
  phone_numbers: string;
  suspicious_keywords: string;
  agent_notes: string;
}

/**
 * Working state of in-progress sessions. Every public method runs as a
 * single synchronous SQLite transaction, so calls never interleave.
 */
export class ActiveSessionStore {
  private readonly db;
  private readonly confirmThreshold: number;
  private readonly defaults: SessionDefaults;

  constructor(vaultDb: VaultDB, options: ActiveStoreOptions) {
    this.db = vaultDb.raw("active");
    this.confirmThreshold = options.confirmThreshold;
    this.defaults = options.defaults;
  }

  appendMessage(params: AppendMessageParams): void {
    const now = Date.now();
    const metadata = params.metadata ?? {};

    guardStorage("appendMessage", params.sessionId, () =>
      this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT INTO sessions (session_id, channel, language, locale, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?)
             ON CONFLICT(session_id) DO UPDATE SET updated_at = excluded.updated_at`,
          )
          .run(
            params.sessionId,
            metadata.channel || this.defaults.channel,
            metadata.language || this.defaults.language,
            metadata.locale || this.defaults.locale,
            now,
            now,
          );

        this.db
          .prepare(
            `INSERT INTO messages (session_id, sender, text, timestamp, is_response, is_scam_flag)
             VALUES (?, ?, ?, ?, ?, ?)`,
          )
          .run(
            params.sessionId,
            params.sender,
            params.text,
            now,
            params.isResponse ? 1 : 0,
            params.isScamFlag ? 1 : 0,
          );

        if (params.isScamFlag) {
          this.db
            .prepare(
              `UPDATE sessions
               SET scam_flags = scam_flags + 1,
                   is_confirmed_scam = CASE
                     WHEN is_confirmed_scam = 1 OR scam_flags + 1 >= ? THEN 1
                     ELSE 0
                   END
               WHERE session_id = ?`,
            )
            .run(this.confirmThreshold, params.sessionId);
        }
      })(),
    );
  }

  /** Unions evidence into an existing session; returns false when the session is absent. */
  mergeIntelligence(sessionId: string, incoming: ExtractedIntelligence): boolean {
    return guardStorage("mergeIntelligence", sessionId, () =>
      this.db.transaction(() => {
        const exists = this.db.prepare("SELECT 1 FROM sessions WHERE session_id = ?").get(sessionId);
        if (exists === undefined) return false;

        const merged = mergeIntelligence(this.readIntelligence(sessionId), incoming);
        const { evidence } = merged;
        this.db
          .prepare(
            `INSERT INTO intelligence
             (session_id, bank_accounts, upi_ids, phishing_links, phone_numbers, suspicious_keywords, agent_notes, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT(session_id) DO UPDATE SET
               bank_accounts = excluded.bank_accounts,
               upi_ids = excluded.upi_ids,
               phishing_links = excluded.phishing_links,
               phone_numbers = excluded.phone_numbers,
               suspicious_keywords = excluded.suspicious_keywords,
               agent_notes = excluded.agent_notes,
               updated_at = excluded.updated_at`,
          )
          .run(
            sessionId,
            JSON.stringify(evidence.bankAccounts),
            JSON.stringify(evidence.upiIds),
            JSON.stringify(evidence.phishingLinks),
            JSON.stringify(evidence.phoneNumbers),
            JSON.stringify(evidence.suspiciousKeywords),
            merged.agentNotes,
            Date.now(),
          );
        return true;
      })(),
    );
  }

  /** Zero defaults for unknown ids; not an existence check. */
  getScamStatus(sessionId: string): ScamStatus {
    const row = guardStorage("getScamStatus", sessionId, () =>
      this.db
        .prepare("SELECT scam_flags, is_confirmed_scam FROM sessions WHERE session_id = ?")
        .get(sessionId) as Pick<SessionRow, "scam_flags" | "is_confirmed_scam"> | undefined,
    );
    if (!row) return { scamFlags: 0, isConfirmedScam: false };
    return { scamFlags: row.scam_flags, isConfirmedScam: row.is_confirmed_scam === 1 };
  }

  getFullSession(sessionId: string): Session | null {
    return guardStorage("getFullSession", sessionId, () =>
      this.db.transaction((): Session | null => {
        const row = this.db
          .prepare("SELECT * FROM sessions WHERE session_id = ?")
          .get(sessionId) as SessionRow | undefined;
        if (!row) return null;

        const messages = this.db
          .prepare("SELECT * FROM messages WHERE session_id = ? ORDER BY id ASC")
          .all(sessionId) as MessageRow[];

        return {
          ...this.toHeader(row),
          messages: messages.map((m) => this.toMessage(m)),
          intelligence: this.readIntelligence(sessionId),
        };
      })(),
    );
  }

  has(sessionId: string): boolean {
    const row = guardStorage("has", sessionId, () =>
      this.db.prepare("SELECT 1 FROM sessions WHERE session_id = ?").get(sessionId),
    );
    return row !== undefined;
  }

  listSessions(limit = 50): SessionHeader[] {
    const rows = guardStorage("listSessions", null, () =>
      this.db
        .prepare("SELECT * FROM sessions ORDER BY updated_at DESC, session_id ASC LIMIT ?")
        .all(limit) as SessionRow[],
    );
    return rows.map((r) => this.toHeader(r));
  }

  /** Ids of sessions whose last activity is strictly before `cutoff`. */
  listIdleSince(cutoff: number): string[] {
    const rows = guardStorage("listIdleSince", null, () =>
      this.db
        .prepare("SELECT session_id FROM sessions WHERE updated_at < ? ORDER BY updated_at ASC, session_id ASC")
        .all(cutoff) as Pick<SessionRow, "session_id">[],
    );
    return rows.map((r) => r.session_id);
  }

  count(): number {
    const row = guardStorage("count", null, () =>
      this.db.prepare("SELECT COUNT(*) AS cnt FROM sessions").get() as { cnt: number },
    );
    return row.cnt;
  }

  clear(sessionId: string): boolean {
    return guardStorage("clear", sessionId, () =>
      this.db.transaction(() => {
        this.db.prepare("DELETE FROM messages WHERE session_id = ?").run(sessionId);
        this.db.prepare("DELETE FROM intelligence WHERE session_id = ?").run(sessionId);
        const result = this.db.prepare("DELETE FROM sessions WHERE session_id = ?").run(sessionId);
        return result.changes > 0;
      })(),
    );
  }

  clearAll(): number {
    return guardStorage("clearAll", null, () =>
      this.db.transaction(() => {
        this.db.prepare("DELETE FROM messages").run();
        this.db.prepare("DELETE FROM intelligence").run();
        return this.db.prepare("DELETE FROM sessions").run().changes;
      })(),
    );
  }

  // ── Row mappers ──

  private readIntelligence(sessionId: string): ExtractedIntelligence {
    const row = this.db
      .prepare("SELECT * FROM intelligence WHERE session_id = ?")
      .get(sessionId) as IntelligenceRow | undefined;
    if (!row) return { evidence: emptyEvidence(), agentNotes: "" };
    return { evidence: evidenceFromRow(row), agentNotes: row.agent_notes };
  }

  private toHeader(row: SessionRow): SessionHeader {
    return {
      sessionId: row.session_id,
      channel: row.channel,
      language: row.language,
      locale: row.locale,
      scamFlags: row.scam_flags,
      isConfirmedScam: row.is_confirmed_scam === 1,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private toMessage(row: MessageRow): SessionMessage {
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

const storedList = z.array(z.string());

/** Throws on a column that is not a JSON array of strings; callers wrap it as a StorageError. */
export function evidenceFromRow(row: IntelligenceRow): Evidence {
  return {
    bankAccounts: parseStoredList(row.bank_accounts),
    upiIds: parseStoredList(row.upi_ids),
    phishingLinks: parseStoredList(row.phishing_links),
    phoneNumbers: parseStoredList(row.phone_numbers),
    suspiciousKeywords: parseStoredList(row.suspicious_keywords),
  };
}

function parseStoredList(text: string): string[] {
  const parsed: unknown = JSON.parse(text);
  return storedList.parse(parsed);
}
