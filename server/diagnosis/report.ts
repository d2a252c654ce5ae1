import type { Category, CategoryResult, DiagnosisResult, Locale } from "./types";
import { CATEGORIES } from "./types";
import { localizeFinding, translateFinding } from "./localizer";
import { rankRecommendations } from "./ranker";

const CATEGORY_TITLES: Record<Category, Record<Locale, string>> = {
  seo: { en: "SEO", ja: "SEO" },
  security: { en: "Security", ja: "セキュリティ" },
  performance: { en: "Performance", ja: "パフォーマンス" },
  accessibility: { en: "Accessibility", ja: "アクセシビリティ" },
};

const HEADINGS: Record<Locale, Record<"title" | "overall" | "issues" | "passed" | "details" | "priorities", string>> = {
  en: {
    title: "Website Diagnosis Report",
    overall: "Overall score",
    issues: "Issues to improve",
    passed: "Passed checks",
    details: "Why it matters",
    priorities: "Priority improvements",
  },
  ja: {
    title: "ウェブサイト診断レポート",
    overall: "総合スコア",
    issues: "改善が必要な項目",
    passed: "正常な項目",
    details: "詳しい説明",
    priorities: "優先改善項目",
  },
};

export type ScoreStatus = "excellent" | "good" | "average" | "poor";

const STATUS_LABELS: Record<ScoreStatus, Record<Locale, string>> = {
  excellent: { en: "Excellent", ja: "優秀" },
  good: { en: "Good", ja: "良好" },
  average: { en: "Average", ja: "平均" },
  poor: { en: "Poor", ja: "要改善" },
};

export function scoreStatus(score: number): ScoreStatus {
  if (score >= 80) return "excellent";
  if (score >= 60) return "good";
  if (score >= 40) return "average";
  return "poor";
}

function renderCategory(result: CategoryResult, locale: Locale): string[] {
  const headings = HEADINGS[locale];
  const status = STATUS_LABELS[scoreStatus(result.score)][locale];
  const lines = [`## ${CATEGORY_TITLES[result.category][locale]}: ${result.score}/100 (${status})`, ""];

  if (result.issues.length > 0) {
    lines.push(`### ${headings.issues}`, "");
    for (const issue of result.issues) {
      lines.push(`- ${translateFinding(issue, locale)}`);
    }
    lines.push("");
  }

  if (result.successes.length > 0) {
    lines.push(`### ${headings.passed}`, "");
    for (const success of result.successes) {
      lines.push(`- ${translateFinding(success, locale)}`);
    }
    lines.push("");
  }

  if (result.explanations.length > 0) {
    lines.push(`### ${headings.details}`, "");
    for (const { issue, explanation } of result.explanations) {
      const text = explanation[locale];
      lines.push(`- **${translateFinding(issue, locale)}**`);
      lines.push(`  - ${text.what}`, `  - ${text.why}`, `  - ${text.how}`);
      if (text.risk) lines.push(`  - ${text.risk}`);
    }
    lines.push("");
  }

  return lines;
}

/** Human-readable report in one language; the JSON result stays the source of truth. */
export function renderMarkdownReport(result: DiagnosisResult, locale: Locale = "ja"): string {
  const headings = HEADINGS[locale];
  const lines = [
    `# ${headings.title}`,
    "",
    `- URL: ${result.url}`,
    `- ${result.timestamp}`,
    `- ${headings.overall}: ${result.overallScore}/100`,
    "",
  ];

  for (const category of CATEGORIES) {
    lines.push(...renderCategory(result[category], locale));
  }

  lines.push(`## ${headings.priorities}`, "");
  const recommendations = rankRecommendations(result);
  if (recommendations.status === "no-issues") {
    lines.push(recommendations.message);
  } else {
    for (const entry of recommendations.entries) {
      const finding = localizeFinding(entry.issue);
      lines.push(`${entry.rank}. [${CATEGORY_TITLES[entry.category][locale]}] ${finding[locale]}`);
    }
  }

  return `${lines.join("\n")}\n`;
}
