import { describe, it, expect } from "vitest";
import { clampScore, fail, maxAchievablePoints, pass, runRules, skip, type ScoringRule } from "../server/diagnosis/rules";
import { explain } from "../server/diagnosis/localizer";
import { SEO_RULES } from "../server/diagnosis/analyzers/seo";
import { SECURITY_RULES } from "../server/diagnosis/analyzers/security";
import { PERFORMANCE_RULES } from "../server/diagnosis/analyzers/performance";
import { ACCESSIBILITY_RULES } from "../server/diagnosis/analyzers/accessibility";

describe("clampScore", () => {
  it("rounds and keeps scores inside 0-100", () => {
    expect(clampScore(42.6)).toBe(43);
    expect(clampScore(100.4)).toBe(100);
    expect(clampScore(130)).toBe(100);
    expect(clampScore(-3)).toBe(0);
  });
});

describe("maxAchievablePoints", () => {
  it("sums the best tier of every rule per category", () => {
    expect(maxAchievablePoints(SEO_RULES)).toBe(95);
    expect(maxAchievablePoints(SECURITY_RULES)).toBe(100);
    expect(maxAchievablePoints(PERFORMANCE_RULES)).toBe(90);
    expect(maxAchievablePoints(ACCESSIBILITY_RULES)).toBe(95);
  });
});

describe("runRules", () => {
  const rule = (id: string, evaluate: ScoringRule<number>["evaluate"]): ScoringRule<number> => ({
    id,
    maxPoints: 60,
    severity: "med",
    evaluate,
  });

  it("routes pass results to successes and fail results to issues", () => {
    const result = runRules(
      "seo",
      [rule("a", () => pass(60, "A ok")), rule("b", () => fail("B missing", 10)), rule("c", () => skip)],
      0,
      null
    );

    expect(result.category).toBe("seo");
    expect(result.score).toBe(70);
    expect(result.successes).toEqual(["A ok"]);
    expect(result.issues).toEqual(["B missing"]);
    expect(result.checks.map((check) => [check.rule, check.status, check.points, check.severity])).toEqual([
      ["a", "pass", 60, "pass"],
      ["b", "fail", 10, "med"],
    ]);
  });

  it("clamps totals above the maximum and below zero", () => {
    const high = runRules("seo", [rule("a", () => pass(60, "A")), rule("b", () => pass(60, "B"))], 0, null);
    const low = runRules("seo", [rule("a", () => fail("A", -20))], 0, null);
    expect(high.score).toBe(100);
    expect(low.score).toBe(0);
  });

  it("attaches the explanation of a failing rule", () => {
    const explained: ScoringRule<number> = { ...rule("t", () => fail("Title tag not found")), explanation: "seo.title" };
    const result = runRules("seo", [explained], 0, null);
    expect(result.explanations).toEqual([{ issue: "Title tag not found", explanation: explain("seo.title") }]);
  });

  it("passes the context to every rule", () => {
    const result = runRules("performance", [rule("ctx", (value) => pass(value, `got ${value}`))], 25, { note: "x" });
    expect(result.successes).toEqual(["got 25"]);
    expect(result.score).toBe(25);
    expect(result.details).toEqual({ note: "x" });
  });
});
