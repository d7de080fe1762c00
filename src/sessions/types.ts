export type Sender = "scammer" | "user";

export interface SessionMetadata {
  readonly channel?: string;
  readonly language?: string;
  readonly locale?: string;
}

export interface SessionHeader {
  readonly sessionId: string;
  readonly channel: string;
  readonly language: string;
  readonly locale: string;
  readonly scamFlags: number;
  readonly isConfirmedScam: boolean;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface SessionMessage {
  readonly sessionId: string;
  readonly sender: Sender;
  readonly text: string;
  readonly timestamp: number;
  readonly isResponse: boolean;
  readonly isScamFlag: boolean;
}

/** The five evidence sets, as carried on the wire and in snapshots. */
export interface Evidence {
  readonly bankAccounts: string[];
  readonly upiIds: string[];
  readonly phishingLinks: string[];
  readonly phoneNumbers: string[];
  readonly suspiciousKeywords: string[];
}

export type EvidenceField = keyof Evidence;

export const EVIDENCE_FIELDS: readonly EvidenceField[] = [
  "bankAccounts",
  "upiIds",
  "phishingLinks",
  "phoneNumbers",
  "suspiciousKeywords",
];

export interface ExtractedIntelligence {
  readonly evidence: Evidence;
  readonly agentNotes: string;
}

export interface Session extends SessionHeader {
  readonly messages: SessionMessage[];
  readonly intelligence: ExtractedIntelligence;
}

export interface ScamStatus {
  readonly scamFlags: number;
  readonly isConfirmedScam: boolean;
}

export interface AppendMessageParams {
  readonly sessionId: string;
  readonly sender: Sender;
  readonly text: string;
  readonly isResponse: boolean;
  readonly isScamFlag: boolean;
  readonly metadata?: SessionMetadata;
}

export interface ArchivedSession {
  readonly sessionId: string;
  readonly channel: string;
  readonly language: string;
  readonly locale: string;
  readonly totalMessages: number;
  readonly isScam: boolean;
  readonly scamFlagsCount: number;
  readonly createdAt: number;
  readonly completedAt: number;
  readonly messages: SessionMessage[];
}

export interface ScamIntelligenceRecord {
  readonly sessionId: string;
  readonly totalMessagesExchanged: number;
  readonly evidence: Evidence;
  readonly agentNotes: string;
  readonly pushedToExternal: boolean;
  readonly createdAt: number;
  readonly pushedAt: number | null;
}

/** Body posted to the external evaluator. */
export interface ReportPayload {
  readonly sessionId: string;
  readonly scamDetected: true;
  readonly totalMessagesExchanged: number;
  readonly extractedIntelligence: Evidence;
  readonly agentNotes: string;
}
