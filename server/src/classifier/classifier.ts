import { z } from "zod";
import defaultRulesJson from "./rules.json";

export const FALLBACK_CATEGORY = "Other";

export type CategoryRule = {
  category: string;
  keywords: string[];
};

const rulesSchema = z
  .array(
    z.object({
      category: z.string().trim().min(1),
      keywords: z.array(z.string().trim().min(1)).min(1),
    }),
  )
  .min(1);

export function parseRules(raw: unknown): CategoryRule[] {
  return rulesSchema.parse(raw);
}

/**
 * Keyword classifier: the first rule (in table order) with a keyword contained in the
 * description wins; matching is case-insensitive. Descriptions matching nothing fall back
 * to {@link FALLBACK_CATEGORY}.
 */
export class ExpenseClassifier {
  private readonly rules: ReadonlyArray<{ category: string; keywords: string[] }>;

  constructor(rules: CategoryRule[]) {
    this.rules = rules.map((r) => ({
      category: r.category,
      keywords: r.keywords.map((k) => k.toLowerCase()),
    }));
  }

  classify(description: string): string {
    const desc = description.trim().toLowerCase();
    if (!desc) return FALLBACK_CATEGORY;

    for (const rule of this.rules) {
      if (rule.keywords.some((k) => desc.includes(k))) return rule.category;
    }
    return FALLBACK_CATEGORY;
  }

  categories(): string[] {
    const out: string[] = [];
    for (const r of this.rules) {
      if (!out.includes(r.category)) out.push(r.category);
    }
    if (!out.includes(FALLBACK_CATEGORY)) out.push(FALLBACK_CATEGORY);
    return out;
  }
}

export function createDefaultClassifier(): ExpenseClassifier {
  return new ExpenseClassifier(parseRules(defaultRulesJson));
}
