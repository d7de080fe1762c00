import type { VaultDB } from "../vault/db.js";
import { evidenceFromRow, type IntelligenceRow } from "./active-store.js";
import { guardStorage } from "./errors.js";
import type { ReportPayload, ScamIntelligenceRecord, Session } from "./types.js";

interface ScamIntelligenceRow extends IntelligenceRow {
  session_id: string;
  total_messages_exchanged: number;
  pushed_to_external: number;
  created_at: number;
  pushed_at: number | null;
}

/** Evidence snapshots of confirmed scam sessions, awaiting external reporting. */
export class ScamIntelStore {
  private readonly db;

  constructor(vaultDb: VaultDB) {
    this.db = vaultDb.raw("intel");
  }

  /** Replaces the whole record; a new snapshot starts out pending. */
  upsert(sessionId: string, session: Session): void {
    const { evidence, agentNotes } = session.intelligence;
    guardStorage("intel.upsert", sessionId, () =>
      this.db
        .prepare(
          `INSERT OR REPLACE INTO scam_intelligence
           (session_id, total_messages_exchanged, bank_accounts, upi_ids, phishing_links,
            phone_numbers, suspicious_keywords, agent_notes, pushed_to_external, created_at, pushed_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, ?, NULL)`,
        )
        .run(
          sessionId,
          session.messages.length,
          JSON.stringify(evidence.bankAccounts),
          JSON.stringify(evidence.upiIds),
          JSON.stringify(evidence.phishingLinks),
          JSON.stringify(evidence.phoneNumbers),
          JSON.stringify(evidence.suspiciousKeywords),
          agentNotes,
          Date.now(),
        ),
    );
  }

  get(sessionId: string): ScamIntelligenceRecord | null {
    return guardStorage("intel.get", sessionId, () => {
      const row = this.readRow(sessionId);
      return row ? this.toRecord(row) : null;
    });
  }

  getPayload(sessionId: string): ReportPayload | null {
    return guardStorage("intel.getPayload", sessionId, (): ReportPayload | null => {
      const row = this.readRow(sessionId);
      if (!row) return null;
      return {
        sessionId: row.session_id,
        scamDetected: true,
        totalMessagesExchanged: row.total_messages_exchanged,
        extractedIntelligence: evidenceFromRow(row),
        agentNotes: row.agent_notes,
      };
    });
  }

  /** One-way flag; a second call keeps the first push time. */
  markPushed(sessionId: string): boolean {
    const result = guardStorage("intel.markPushed", sessionId, () =>
      this.db
        .prepare(
          `UPDATE scam_intelligence
           SET pushed_to_external = 1, pushed_at = COALESCE(pushed_at, ?)
           WHERE session_id = ?`,
        )
        .run(Date.now(), sessionId),
    );
    return result.changes > 0;
  }

  listPending(): string[] {
    const rows = guardStorage("intel.listPending", null, () =>
      this.db
        .prepare(
          "SELECT session_id FROM scam_intelligence WHERE pushed_to_external = 0 ORDER BY created_at ASC, session_id ASC",
        )
        .all() as Pick<ScamIntelligenceRow, "session_id">[],
    );
    return rows.map((r) => r.session_id);
  }

  count(): number {
    const row = guardStorage("intel.count", null, () =>
      this.db.prepare("SELECT COUNT(*) AS cnt FROM scam_intelligence").get() as { cnt: number },
    );
    return row.cnt;
  }

  private readRow(sessionId: string): ScamIntelligenceRow | undefined {
    return this.db
      .prepare("SELECT * FROM scam_intelligence WHERE session_id = ?")
      .get(sessionId) as ScamIntelligenceRow | undefined;
  }

  private toRecord(row: ScamIntelligenceRow): ScamIntelligenceRecord {
    return {
      sessionId: row.session_id,
      totalMessagesExchanged: row.total_messages_exchanged,
      evidence: evidenceFromRow(row),
      agentNotes: row.agent_notes,
      pushedToExternal: row.pushed_to_external === 1,
      createdAt: row.created_at,
      pushedAt: row.pushed_at,
    };
  }
}
