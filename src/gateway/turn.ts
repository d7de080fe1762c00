import { randomUUID } from "node:crypto";
import type { RiskAssessment, RiskScorer } from "../analysis/risk-scorer.js";
import type { GeneratedTurn, HistoryEntry, ReplyGenerator } from "../analysis/responder.js";
import type { SessionsConfig } from "../config/types.js";
import { componentLogger, type Logger } from "../logging/logger.js";
import type { ActiveSessionStore } from "../sessions/active-store.js";
import { emptyEvidence, normalizeEvidence, normalizeNotes } from "../sessions/evidence.js";
import type { ScamStatus, Sender, SessionMetadata } from "../sessions/types.js";
import type { GatewayMetrics } from "./metrics.js";

export interface TurnInput {
  readonly sessionId?: string;
  readonly text: string;
  readonly sender?: Sender;
  readonly history?: readonly HistoryEntry[];
  readonly metadata?: SessionMetadata;
}

export interface TurnResult {
  readonly sessionId: string;
  readonly reply: string;
  readonly scamStatus: ScamStatus;
  readonly assessment: RiskAssessment;
}

export interface TurnProcessorDeps {
  active: ActiveSessionStore;
  scorer: RiskScorer;
  generator: ReplyGenerator;
  logger: Logger;
  config: Pick<SessionsConfig, "flagConfidence" | "fallbackReply">;
  metrics?: GatewayMetrics;
}

const EMPTY_TEXT_PLACEHOLDER = "Hello";

/** Millisecond timestamp plus a random suffix, so ids minted in the same tick stay distinct. */
export function newSessionId(now = Date.now()): string {
  return `session_${now}_${randomUUID().slice(0, 8)}`;
}

export class TurnProcessor {
  private readonly active: ActiveSessionStore;
  private readonly scorer: RiskScorer;
  private readonly generator: ReplyGenerator;
  private readonly logger: Logger;
  private readonly flagConfidence: number;
  private readonly fallbackReply: string;
  private readonly metrics: GatewayMetrics | undefined;

  constructor(deps: TurnProcessorDeps) {
    this.active = deps.active;
    this.scorer = deps.scorer;
    this.generator = deps.generator;
    this.logger = componentLogger(deps.logger, "turns");
    this.flagConfidence = deps.config.flagConfidence;
    this.fallbackReply = deps.config.fallbackReply;
    this.metrics = deps.metrics;
  }

  async handle(input: TurnInput): Promise<TurnResult> {
    const sessionId = input.sessionId || newSessionId();
    const text = input.text.trim() ? input.text : EMPTY_TEXT_PLACEHOLDER;
    const history = input.history ?? [];

    const assessment = this.scorer.score(text);
    const flagged = assessment.confidence > this.flagConfidence;

    this.active.appendMessage({
      sessionId,
      sender: input.sender ?? "scammer",
      text,
      isResponse: false,
      isScamFlag: flagged,
      metadata: input.metadata,
    });
    this.metrics?.inc("turns");
    if (flagged) this.metrics?.inc("flaggedTurns");

    const generated = await this.generate(text, history, sessionId);
    const reply =
      typeof generated.reply === "string" && generated.reply.trim()
        ? generated.reply.trim()
        : this.fallbackReply;

    this.active.appendMessage({
      sessionId,
      sender: "user",
      text: reply,
      isResponse: true,
      isScamFlag: false,
      metadata: input.metadata,
    });
    this.active.mergeIntelligence(sessionId, {
      evidence: normalizeEvidence(generated.evidence),
      agentNotes: normalizeNotes(generated.agentNotes),
    });

    const scamStatus = this.active.getScamStatus(sessionId);
    this.logger.debug(
      { sessionId, confidence: assessment.confidence, flagged, ...scamStatus },
      "Turn processed",
    );
    return { sessionId, reply, scamStatus, assessment };
  }

  private async generate(
    text: string,
    history: readonly HistoryEntry[],
    sessionId: string,
  ): Promise<GeneratedTurn> {
    try {
      return await this.generator.generate(text, history, sessionId);
    } catch (err) {
      this.logger.warn({ err, sessionId }, "Reply generator failed, using fallback");
      return { reply: "", evidence: emptyEvidence(), agentNotes: "" };
    }
  }
}
