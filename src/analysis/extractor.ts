import keywords from "./data/keywords.json" with { type: "json" };
import type { Evidence } from "../sessions/types.js";

const PHONE = /(?<!\d)(?:\+91[\s-]?)?[6-9]\d{9}(?!\d)/g;
const LINK = /https?:\/\/[^\s]+/gi;
const UPI =
  /[a-z0-9._-]{2,}@(?:upi|ybl|okhdfcbank|oksbi|okicici|okaxis|okpaytm|paytm|ibl|axl|sbi|hdfcbank|icici|kotak|baroda)\b/g;
const BANK_ACCOUNT = /\b\d{11,18}\b/g;

function unique(items: Iterable<string>): string[] {
  return [...new Set(items)];
}

function stripTrailingPunctuation(url: string): string {
  return url.replace(/[),.\]}!?]+$/, "");
}

/** Pull evidence out of free text. Values are deduplicated, in order of appearance. */
export function extractEvidence(texts: readonly string[]): Evidence {
  const combined = texts.join("\n");
  const lower = combined.toLowerCase();

  return {
    bankAccounts: unique(lower.match(BANK_ACCOUNT) ?? []),
    upiIds: unique(lower.match(UPI) ?? []),
    phishingLinks: unique((combined.match(LINK) ?? []).map(stripTrailingPunctuation)),
    phoneNumbers: unique(lower.match(PHONE) ?? []),
    suspiciousKeywords: keywords.suspicious.filter((kw) => lower.includes(kw)),
  };
}
