import type { Category, CategoryResult, CheckOutcome, FindingSeverity, IssueExplanation } from "./types";
import { explain, type ExplanationTopic } from "./localizer";

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export type RuleOutcome =
  | { status: "pass"; points: number; message: string }
  | { status: "fail"; points?: number; message: string }
  | { status: "skip" };

/**
 * One scoring sub-check. `maxPoints` is the best tier the rule can award and
 * is what `maxAchievablePoints` sums when auditing a category's rubric.
 */
export interface ScoringRule<TContext> {
  id: string;
  maxPoints: number;
  severity: FindingSeverity;
  explanation?: ExplanationTopic;
  evaluate(context: TContext): RuleOutcome;
}

export function pass(points: number, message: string): RuleOutcome {
  return { status: "pass", points, message };
}

export function fail(message: string, points = 0): RuleOutcome {
  return { status: "fail", points, message };
}

export const skip: RuleOutcome = { status: "skip" };

export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, Math.round(score)));
}

export function maxAchievablePoints<TContext>(rules: readonly ScoringRule<TContext>[]): number {
  return rules.reduce((sum, rule) => sum + rule.maxPoints, 0);
}

export function runRules<TContext, TDetails>(
  category: Category,
  rules: readonly ScoringRule<TContext>[],
  context: TContext,
  details: TDetails
): CategoryResult<TDetails> {
  const issues: string[] = [];
  const successes: string[] = [];
  const explanations: IssueExplanation[] = [];
  const checks: CheckOutcome[] = [];
  let total = 0;

  for (const rule of rules) {
    const outcome = rule.evaluate(context);
    if (outcome.status === "skip") continue;

    const points = outcome.points ?? 0;
    total += points;

    if (outcome.status === "pass") {
      successes.push(outcome.message);
    } else {
      issues.push(outcome.message);
      if (rule.explanation) {
        explanations.push({ issue: outcome.message, explanation: explain(rule.explanation) });
      }
    }

    checks.push({
      rule: rule.id,
      status: outcome.status,
      points,
      maxPoints: rule.maxPoints,
      severity: outcome.status === "pass" ? "pass" : rule.severity,
      message: outcome.message,
    });
  }

  return {
    category,
    score: clampScore(total),
    issues,
    successes,
    explanations,
    checks,
    details,
  };
}
