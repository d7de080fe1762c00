import replies from "./data/replies.json" with { type: "json" };
import type { Sender } from "../sessions/types.js";
import { evidenceCount } from "../sessions/evidence.js";
import { extractEvidence } from "./extractor.js";

export interface HistoryEntry {
  readonly sender: Sender;
  readonly text: string;
  readonly timestamp?: number;
}

/**
 * Raw generator output. Fields are untyped on purpose: callers normalize
 * them before anything reaches storage.
 */
export interface GeneratedTurn {
  readonly reply: unknown;
  readonly evidence: unknown;
  readonly agentNotes: unknown;
}

export interface ReplyGenerator {
  generate(
    currentMessage: string,
    history: readonly HistoryEntry[],
    sessionId: string,
  ): Promise<GeneratedTurn>;
}

export interface PatternResponderOptions {
  readonly replies?: readonly string[];
  /** Returns a float in [0, 1); defaults to Math.random. */
  readonly random?: () => number;
}

const FIELD_LABELS = [
  ["bankAccounts", "bank account"],
  ["upiIds", "UPI id"],
  ["phishingLinks", "link"],
  ["phoneNumbers", "phone number"],
] as const;

/** Stalls with canned replies while pulling evidence out of the scammer's text. */
export class PatternResponder implements ReplyGenerator {
  private readonly replies: readonly string[];
  private readonly random: () => number;

  constructor(options: PatternResponderOptions = {}) {
    this.replies = options.replies ?? replies;
    this.random = options.random ?? Math.random;
  }

  async generate(
    currentMessage: string,
    history: readonly HistoryEntry[],
    _sessionId: string,
  ): Promise<GeneratedTurn> {
    const scammerTexts = history.filter((h) => h.sender === "scammer").map((h) => h.text);
    const evidence = extractEvidence([...scammerTexts, currentMessage]);

    const shared = FIELD_LABELS.filter(([field]) => evidence[field].length > 0).map(
      ([, label]) => label,
    );

    const agentNotes =
      shared.length > 0
        ? `Scammer shared ${shared.join(", ")} details (${evidenceCount(evidence)} indicators)`
        : "";

    return { reply: this.pickReply(), evidence, agentNotes };
  }

  private pickReply(): string {
    if (this.replies.length === 0) return "";
    const index = Math.min(Math.floor(this.random() * this.replies.length), this.replies.length - 1);
    return this.replies[index] ?? "";
  }
}
