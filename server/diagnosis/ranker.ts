import type { Category, CategoryResult, RecommendationEntry, Recommendations } from "./types";
import { CATEGORIES } from "./types";

export const PRIORITY_WEIGHTS: Readonly<Record<Category, number>> = Object.freeze({
  security: 1.5,
  accessibility: 1.3,
  seo: 1.2,
  performance: 1.0,
});

export const DEFAULT_RECOMMENDATION_LIMIT = 10;

export const NO_ISSUES_MESSAGE = "No critical issues found / 重大な問題は見つかりませんでした";

/** Lower scores rank first; the weight tilts ties between categories. */
export function calculatePriority(category: Category, score: number): number {
  return (100 - score) * PRIORITY_WEIGHTS[category];
}

export type RankingInput = Readonly<Record<Category, Pick<CategoryResult, "score" | "issues">>>;

export function rankRecommendations(
  result: RankingInput,
  limit: number = DEFAULT_RECOMMENDATION_LIMIT
): Recommendations {
  const pool: Omit<RecommendationEntry, "rank">[] = [];

  for (const category of CATEGORIES) {
    const { score, issues } = result[category];
    const priority = calculatePriority(category, score);
    for (const issue of issues) {
      pool.push({ category, issue, priority });
    }
  }

  if (pool.length === 0) {
    return { status: "no-issues", message: NO_ISSUES_MESSAGE };
  }

  // Array.prototype.sort is stable, so equal priorities keep category then discovery order.
  const entries = [...pool]
    .sort((a, b) => b.priority - a.priority)
    .slice(0, limit)
    .map((entry, index) => ({ rank: index + 1, ...entry }));

  return { status: "ranked", entries };
}
