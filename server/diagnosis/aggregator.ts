import type {
  AccessibilityDetails,
  Category,
  CategoryResult,
  DiagnosisResult,
  PerformanceDetails,
  SecurityDetails,
  SeoDetails,
} from "./types";
import { deepFreeze } from "./freeze";

export const CATEGORY_WEIGHTS: Readonly<Record<Category, number>> = Object.freeze({
  seo: 0.3,
  security: 0.3,
  performance: 0.2,
  accessibility: 0.2,
});

export interface CategoryResults {
  seo: CategoryResult<SeoDetails>;
  security: CategoryResult<SecurityDetails>;
  performance: CategoryResult<PerformanceDetails>;
  accessibility: CategoryResult<AccessibilityDetails>;
}

export function calculateOverallScore(scores: Record<Category, number>): number {
  const weighted =
    scores.seo * CATEGORY_WEIGHTS.seo +
    scores.security * CATEGORY_WEIGHTS.security +
    scores.performance * CATEGORY_WEIGHTS.performance +
    scores.accessibility * CATEGORY_WEIGHTS.accessibility;
  return Math.round(weighted * 10) / 10;
}

export function buildDiagnosisResult(url: string, timestamp: string, categories: CategoryResults): DiagnosisResult {
  const scores: Record<Category, number> = {
    seo: categories.seo.score,
    security: categories.security.score,
    performance: categories.performance.score,
    accessibility: categories.accessibility.score,
  };

  return deepFreeze({
    url,
    timestamp,
    seo: categories.seo,
    security: categories.security,
    performance: categories.performance,
    accessibility: categories.accessibility,
    overallScore: calculateOverallScore(scores),
    scores,
  });
}
