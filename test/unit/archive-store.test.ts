import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { VaultDB } from "../../src/vault/db.js";
import { ArchiveStore } from "../../src/sessions/archive-store.js";
import { emptyEvidence } from "../../src/sessions/evidence.js";
import type { Session, SessionMessage } from "../../src/sessions/types.js";

function message(text: string, overrides: Partial<SessionMessage> = {}): SessionMessage {
  return {
    sessionId: "s1",
    sender: "scammer",
    text,
    timestamp: 1_000,
    isResponse: false,
    isScamFlag: false,
    ...overrides,
  };
}

function session(overrides: Partial<Session> = {}): Session {
  return {
    sessionId: "s1",
    channel: "SMS",
    language: "English",
    locale: "IN",
    scamFlags: 0,
    isConfirmedScam: false,
    createdAt: 1_000,
    updatedAt: 2_000,
    messages: [message("hi"), message("who is this?", { sender: "user", isResponse: true })],
    intelligence: { evidence: emptyEvidence(), agentNotes: "" },
    ...overrides,
  };
}

describe("ArchiveStore", () => {
  let dir: string;
  let db: VaultDB;
  let archive: ArchiveStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "decoy-archive-"));
    db = new VaultDB(dir);
    archive = new ArchiveStore(db);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("stores a snapshot with its ordered messages", () => {
    archive.upsert("s1", session({ scamFlags: 2, isConfirmedScam: true }), 5_000);
    const entry = archive.get("s1");
    expect(entry).toMatchObject({
      sessionId: "s1",
      channel: "SMS",
      totalMessages: 2,
      isScam: true,
      scamFlagsCount: 2,
      createdAt: 1_000,
      completedAt: 5_000,
    });
    expect(entry?.messages.map((m) => m.text)).toEqual(["hi", "who is this?"]);
    expect(entry?.messages[1]?.isResponse).toBe(true);
  });

  it("overwrites an earlier entry without duplicating messages", () => {
    archive.upsert("s1", session(), 5_000);
    archive.upsert("s1", session({ messages: [message("again")] }), 6_000);

    expect(archive.count()).toBe(1);
    const entry = archive.get("s1");
    expect(entry?.totalMessages).toBe(1);
    expect(entry?.completedAt).toBe(6_000);
    expect(entry?.messages.map((m) => m.text)).toEqual(["again"]);
  });

  it("lists most recently completed first with paging", () => {
    archive.upsert("a", session({ sessionId: "a" }), 1_000);
    archive.upsert("b", session({ sessionId: "b" }), 3_000);
    archive.upsert("c", session({ sessionId: "c" }), 2_000);

    expect(archive.list(10).map((e) => e.sessionId)).toEqual(["b", "c", "a"]);
    expect(archive.list(1, 1).map((e) => e.sessionId)).toEqual(["c"]);
  });

  it("returns null for unknown ids", () => {
    expect(archive.get("missing")).toBeNull();
  });
});
