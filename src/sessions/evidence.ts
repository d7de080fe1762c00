import { z } from "zod";
import {
  EVIDENCE_FIELDS,
  type Evidence,
  type ExtractedIntelligence,
} from "./types.js";

function uniqueTrimmed(items: readonly unknown[]): string[] {
  const set = new Set<string>();
  for (const item of items) {
    if (typeof item !== "string") continue;
    const value = item.trim();
    if (value) set.add(value);
  }
  return [...set];
}

const evidenceListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((items) => uniqueTrimmed(items));

const evidenceSchema = z
  .object({
    bankAccounts: evidenceListSchema,
    upiIds: evidenceListSchema,
    phishingLinks: evidenceListSchema,
    phoneNumbers: evidenceListSchema,
    suspiciousKeywords: evidenceListSchema,
  })
  .catch(() => emptyEvidence());

const notesSchema = z
  .string()
  .catch("")
  .transform((notes) => notes.trim());

export function emptyEvidence(): Evidence {
  return {
    bankAccounts: [],
    upiIds: [],
    phishingLinks: [],
    phoneNumbers: [],
    suspiciousKeywords: [],
  };
}

/**
 * Coerce whatever a generator produced into evidence sets. Missing or
 * mistyped fields become empty; non-string entries are dropped.
 */
export function normalizeEvidence(raw: unknown): Evidence {
  return evidenceSchema.parse(raw);
}

export function normalizeNotes(raw: unknown): string {
  return notesSchema.parse(raw);
}

export function mergeEvidence(existing: Evidence, incoming: Evidence): Evidence {
  const merged = emptyEvidence();
  for (const field of EVIDENCE_FIELDS) {
    merged[field].push(...uniqueTrimmed([...existing[field], ...incoming[field]]));
  }
  return merged;
}

export function mergeIntelligence(
  existing: ExtractedIntelligence,
  incoming: ExtractedIntelligence,
): ExtractedIntelligence {
  return {
    evidence: mergeEvidence(existing.evidence, incoming.evidence),
    agentNotes: incoming.agentNotes.trim() ? incoming.agentNotes : existing.agentNotes,
  };
}

export function evidenceCount(evidence: Evidence): number {
  return EVIDENCE_FIELDS.reduce((total, field) => total + evidence[field].length, 0);
}
