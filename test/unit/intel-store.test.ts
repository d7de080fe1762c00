import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { VaultDB } from "../../src/vault/db.js";
import { ScamIntelStore } from "../../src/sessions/intel-store.js";
import { emptyEvidence } from "../../src/sessions/evidence.js";
import { StorageError } from "../../src/sessions/errors.js";
import type { Session } from "../../src/sessions/types.js";

function scamSession(sessionId: string, notes = "asked for OTP"): Session {
  return {
    sessionId,
    channel: "SMS",
    language: "English",
    locale: "IN",
    scamFlags: 2,
    isConfirmedScam: true,
    createdAt: 1_000,
    updatedAt: 2_000,
    messages: [
      {
        sessionId,
        sender: "scammer",
        text: "send OTP",
        timestamp: 1_000,
        isResponse: false,
        isScamFlag: true,
      },
    ],
    intelligence: {
      evidence: { ...emptyEvidence(), upiIds: ["fraud@ybl"], phoneNumbers: ["9876543210"] },
      agentNotes: notes,
    },
  };
}

describe("ScamIntelStore", () => {
  let dir: string;
  let db: VaultDB;
  let intel: ScamIntelStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "decoy-intel-"));
    db = new VaultDB(dir);
    intel = new ScamIntelStore(db);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("builds the report payload from the snapshot", () => {
    intel.upsert("s1", scamSession("s1"));
    expect(intel.getPayload("s1")).toEqual({
      sessionId: "s1",
      scamDetected: true,
      totalMessagesExchanged: 1,
      extractedIntelligence: {
        bankAccounts: [],
        upiIds: ["fraud@ybl"],
        phishingLinks: [],
        phoneNumbers: ["9876543210"],
        suspiciousKeywords: [],
      },
      agentNotes: "asked for OTP",
    });
  });

  it("returns null payload for unknown ids", () => {
    expect(intel.getPayload("missing")).toBeNull();
  });

  it("starts records as pending", () => {
    intel.upsert("a", scamSession("a"));
    intel.upsert("b", scamSession("b"));
    expect(intel.listPending()).toEqual(["a", "b"]);
    expect(intel.get("a")?.pushedToExternal).toBe(false);
    expect(intel.get("a")?.pushedAt).toBeNull();
  });

  it("marks pushed idempotently, keeping the first push time", async () => {
    intel.upsert("a", scamSession("a"));
    expect(intel.markPushed("a")).toBe(true);
    const firstPushedAt = intel.get("a")?.pushedAt;
    expect(firstPushedAt).toEqual(expect.any(Number));

    await new Promise((r) => setTimeout(r, 5));
    expect(intel.markPushed("a")).toBe(true);
    expect(intel.get("a")?.pushedAt).toBe(firstPushedAt);
    expect(intel.get("a")?.pushedToExternal).toBe(true);
    expect(intel.listPending()).toEqual([]);
  });

  it("reports false when marking an unknown id", () => {
    expect(intel.markPushed("missing")).toBe(false);
  });

  it("replaces the snapshot on upsert", () => {
    intel.upsert("a", scamSession("a", "first"));
    intel.upsert("a", scamSession("a", "second"));

    expect(intel.count()).toBe(1);
    expect(intel.get("a")?.agentNotes).toBe("second");
    expect(intel.listPending()).toEqual(["a"]);
  });

  it("puts a replaced snapshot back in the pending queue", () => {
    intel.upsert("a", scamSession("a", "first"));
    intel.markPushed("a");
    expect(intel.listPending()).toEqual([]);

    intel.upsert("a", scamSession("a", "second"));

    expect(intel.get("a")).toMatchObject({
      agentNotes: "second",
      pushedToExternal: false,
      pushedAt: null,
    });
    expect(intel.listPending()).toEqual(["a"]);
    expect(intel.getPayload("a")?.agentNotes).toBe("second");
  });

  it("raises StorageError for a corrupt evidence column", () => {
    intel.upsert("a", scamSession("a"));
    db.raw("intel")
      .prepare("UPDATE scam_intelligence SET upi_ids = ? WHERE session_id = ?")
      .run('["fraud@ybl"', "a");

    let caught: unknown;
    try {
      intel.getPayload("a");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StorageError);
    expect(caught).toMatchObject({ sessionId: "a", operation: "intel.getPayload" });
    expect(() => intel.get("a")).toThrow(StorageError);
  });
});
