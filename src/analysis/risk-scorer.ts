import keywords from "./data/keywords.json" with { type: "json" };

export type RiskCategory = keyof typeof keywords.riskCategories;
export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";
export type ScamType =
  | "unknown"
  | "banking_fraud"
  | "lottery_scam"
  | "intimidation_scam"
  | "generic_scam";

export interface RiskAssessment {
  readonly scamType: ScamType;
  /** 0..1, two decimals. */
  readonly confidence: number;
  readonly detectedKeywords: Partial<Record<RiskCategory, string[]>>;
  readonly riskLevel: RiskLevel;
}

export interface RiskScorer {
  score(text: string): RiskAssessment;
}

const POINTS_PER_KEYWORD = 10;
const CATEGORIES: readonly RiskCategory[] = ["urgency", "banking", "money", "threat", "action"];

export class KeywordRiskScorer implements RiskScorer {
  constructor(
    private readonly categories: Record<RiskCategory, readonly string[]> = keywords.riskCategories,
  ) {}

  score(text: string): RiskAssessment {
    if (!text) {
      return { scamType: "unknown", confidence: 0, detectedKeywords: {}, riskLevel: "LOW" };
    }

    const lower = text.toLowerCase();
    const detected: Partial<Record<RiskCategory, string[]>> = {};
    let total = 0;

    for (const category of CATEGORIES) {
      const found = this.categories[category].filter((kw) => lower.includes(kw));
      if (found.length > 0) {
        detected[category] = found;
        total += found.length * POINTS_PER_KEYWORD;
      }
    }

    const confidence = Math.round(Math.min(total / 100, 1) * 100) / 100;
    return {
      scamType: classify(lower, detected, total),
      confidence,
      detectedKeywords: detected,
      riskLevel: confidence > 0.5 ? "HIGH" : confidence > 0.2 ? "MEDIUM" : "LOW",
    };
  }
}

function classify(
  lower: string,
  detected: Partial<Record<RiskCategory, string[]>>,
  total: number,
): ScamType {
  if (detected.banking || lower.includes("upi")) return "banking_fraud";
  if (["lottery", "prize", "won"].some((w) => lower.includes(w))) return "lottery_scam";
  if (detected.threat) return "intimidation_scam";
  if (total > 0) return "generic_scam";
  return "unknown";
}
