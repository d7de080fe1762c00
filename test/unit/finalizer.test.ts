import { describe, it, expect, afterEach, vi } from "vitest";
import { HttpReporter } from "../../src/reporting/reporter.js";
import { emptyEvidence } from "../../src/sessions/evidence.js";
import { StorageError } from "../../src/sessions/errors.js";
import {
  captureLogger,
  FakeReporter,
  silentLogger,
  makeDecoyConfig,
  makeTestServices,
  type TestServices,
} from "../helpers/fixtures.js";

describe("FinalizationEngine", () => {
  let t: TestServices;

  afterEach(() => {
    t.cleanup();
  });

  function append(sessionId: string, text: string, isScamFlag = false) {
    t.active.appendMessage({ sessionId, sender: "scammer", text, isResponse: false, isScamFlag });
  }

  it("finalizes a confirmed scam end to end", async () => {
    t = makeTestServices({ config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }) });

    append("S1", "Hello, this is your bank");
    append("S1", "Your account is blocked, share OTP now", true);
    append("S1", "Hurry up");

    expect(t.active.getScamStatus("S1")).toEqual({ scamFlags: 1, isConfirmedScam: true });

    const result = await t.engine.finalize("S1", false);
    expect(result).toEqual({
      status: "finalized",
      sessionId: "S1",
      isScam: true,
      scamFlags: 1,
      totalMessages: 3,
      reported: null,
    });

    expect(t.active.getFullSession("S1")).toBeNull();
    expect(t.intel.count()).toBe(1);
    expect(t.intel.get("S1")?.totalMessagesExchanged).toBe(3);
    expect(t.intel.listPending()).toEqual(["S1"]);
    expect(t.archive.get("S1")).toMatchObject({ isScam: true, totalMessages: 3, scamFlagsCount: 1 });
  });

  it("archives a benign session without an intelligence record", async () => {
    t = makeTestServices();
    append("b1", "hi");
    append("b1", "how are you");

    const result = await t.engine.finalize("b1", true);
    expect(result).toMatchObject({ status: "finalized", isScam: false, reported: null });
    expect(t.archive.get("b1")?.isScam).toBe(false);
    expect(t.intel.get("b1")).toBeNull();
    expect(t.active.has("b1")).toBe(false);
  });

  it("returns not_found for unknown ids without side effects", async () => {
    t = makeTestServices();
    append("other", "hi");

    const result = await t.engine.finalize("missing", true);
    expect(result).toEqual({ status: "not_found", sessionId: "missing" });
    expect(t.archive.count()).toBe(0);
    expect(t.intel.count()).toBe(0);
    expect(t.active.count()).toBe(1);
  });

  it("snapshots the merged evidence into the intelligence record", async () => {
    t = makeTestServices({ config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }) });
    append("S2", "pay to fraud@ybl", true);
    t.active.mergeIntelligence("S2", {
      evidence: { ...emptyEvidence(), upiIds: ["fraud@ybl"] },
      agentNotes: "wants UPI payment",
    });

    await t.engine.finalize("S2", false);
    expect(t.intel.getPayload("S2")).toMatchObject({
      extractedIntelligence: { upiIds: ["fraud@ybl"] },
      agentNotes: "wants UPI payment",
    });
  });

  describe("reporting", () => {
    it("pushes confirmed scams and marks them pushed", async () => {
      const reporter = new FakeReporter(true);
      t = makeTestServices({
        config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }),
        reporter,
      });
      append("S1", "share OTP", true);

      const result = await t.engine.finalize("S1", true);
      expect(result).toMatchObject({ status: "finalized", reported: true });
      expect(reporter.pushed.map((p) => p.sessionId)).toEqual(["S1"]);
      expect(t.intel.get("S1")?.pushedToExternal).toBe(true);
      expect(t.metrics.get("reportsPushed")).toBe(1);
    });

    it("leaves the record pending when the push fails", async () => {
      const reporter = new FakeReporter(true, [false]);
      t = makeTestServices({
        config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }),
        reporter,
      });
      append("S1", "share OTP", true);

      const result = await t.engine.finalize("S1", true);
      expect(result).toMatchObject({ status: "finalized", reported: false });
      expect(t.intel.listPending()).toEqual(["S1"]);
      expect(t.active.has("S1")).toBe(false);
      expect(t.metrics.get("reportsFailed")).toBe(1);
    });

    it("leaves the record pending when the evaluator never answers", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(
          (_url: string, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              const signal = init?.signal;
              if (signal) signal.addEventListener("abort", () => reject(signal.reason));
            }),
        ),
      );
      const config = makeDecoyConfig({ sessions: { confirmThreshold: 1 } });
      const logger = silentLogger();
      t = makeTestServices({
        config,
        logger,
        reporter: new HttpReporter(
          { ...config.reporter, enabled: true, timeoutMs: 20, maxAttempts: 1 },
          logger,
        ),
      });
      append("S1", "share OTP", true);

      try {
        const result = await t.engine.finalize("S1", true);
        expect(result).toMatchObject({ status: "finalized", reported: false });
        expect(t.intel.listPending()).toEqual(["S1"]);
        expect(t.intel.get("S1")?.pushedToExternal).toBe(false);
      } finally {
        vi.unstubAllGlobals();
      }
    });

    it("reports a session again after it is recreated and finalized", async () => {
      const reporter = new FakeReporter(true);
      t = makeTestServices({
        config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }),
        reporter,
      });
      append("R", "pay old@upi", true);
      t.active.mergeIntelligence("R", {
        evidence: { ...emptyEvidence(), upiIds: ["old@upi"] },
        agentNotes: "",
      });
      expect(await t.engine.finalize("R", true)).toMatchObject({ reported: true });
      expect(t.intel.listPending()).toEqual([]);

      append("R", "pay new@upi", true);
      t.active.mergeIntelligence("R", {
        evidence: { ...emptyEvidence(), upiIds: ["new@upi"] },
        agentNotes: "",
      });
      await t.engine.finalize("R", false);

      expect(t.intel.listPending()).toEqual(["R"]);
      expect(t.intel.get("R")).toMatchObject({
        evidence: { upiIds: ["new@upi"] },
        pushedToExternal: false,
      });

      expect(await t.engine.pushPending()).toEqual({ enabled: true, total: 1, success: 1, failed: 0 });
      expect(reporter.pushed.map((p) => p.extractedIntelligence.upiIds)).toEqual([
        ["old@upi"],
        ["new@upi"],
      ]);
    });

    it("does not push when pushExternal is false", async () => {
      const reporter = new FakeReporter(true);
      t = makeTestServices({
        config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }),
        reporter,
      });
      append("S1", "share OTP", true);

      await t.engine.finalize("S1", false);
      expect(reporter.pushed).toEqual([]);
    });

    it("pushPending reports every pending record", async () => {
      const reporter = new FakeReporter(true, [true, false]);
      t = makeTestServices({
        config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }),
        reporter,
      });
      append("a", "otp", true);
      append("b", "otp", true);
      await t.engine.finalize("a", false);
      await t.engine.finalize("b", false);

      const stats = await t.engine.pushPending();
      expect(stats).toEqual({ enabled: true, total: 2, success: 1, failed: 1 });
      expect(t.intel.listPending()).toEqual(["b"]);
    });

    it("pushPending is a no-op when the reporter is disabled", async () => {
      t = makeTestServices({
        config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }),
        reporter: new FakeReporter(false),
      });
      append("a", "otp", true);
      await t.engine.finalize("a", false);

      expect(await t.engine.pushPending()).toEqual({ enabled: false });
      expect(t.intel.listPending()).toEqual(["a"]);
    });
  });

  describe("finalizeTimedOut", () => {
    it("finalizes only sessions idle past the timeout", async () => {
      t = makeTestServices({ config: makeDecoyConfig({ sessions: { timeoutMs: 300_000 } }) });
      append("old", "hi");
      const now = Date.now();
      append("fresh", "hi");
      t.vaultDb
        .raw("active")
        .prepare("UPDATE sessions SET updated_at = ? WHERE session_id = ?")
        .run(now - 300_001, "old");

      const count = await t.engine.finalizeTimedOut(now);
      expect(count).toBe(1);
      expect(t.active.has("old")).toBe(false);
      expect(t.active.has("fresh")).toBe(true);
      expect(t.archive.get("old")).not.toBeNull();
    });

    it("never pushes timed-out sessions", async () => {
      const reporter = new FakeReporter(true);
      t = makeTestServices({
        config: makeDecoyConfig({ sessions: { confirmThreshold: 1 } }),
        reporter,
      });
      append("S1", "otp", true);

      const count = await t.engine.finalizeTimedOut(Date.now() + 300_001);
      expect(count).toBe(1);
      expect(reporter.pushed).toEqual([]);
      expect(t.intel.listPending()).toEqual(["S1"]);
    });

    it("returns zero when nothing is idle", async () => {
      t = makeTestServices();
      append("s", "hi");
      expect(await t.engine.finalizeTimedOut()).toBe(0);
    });
  });

  it("logs and rethrows storage failures with the session id", async () => {
    const { logger, records } = captureLogger();
    t = makeTestServices({ logger });
    append("s", "hi");
    t.vaultDb.raw("archive").close();

    await expect(t.engine.finalize("s", false)).rejects.toBeInstanceOf(StorageError);
    expect(records()).toContainEqual(
      expect.objectContaining({
        component: "finalizer",
        sessionId: "s",
        msg: "Failed to finalize session",
      }),
    );
    expect(t.active.has("s")).toBe(true);
  });
});
