import { z } from "zod";
import { normalizeTargetUrl } from "./url-utils";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export const TargetUrlSchema = z.string().trim().min(1).transform(normalizeTargetUrl).pipe(z.string().url());

export const DiagnosisConfigSchema = z.object({
  url: TargetUrlSchema,
  timeoutMs: z.number().int().positive().default(30000),
  tlsTimeoutMs: z.number().int().positive().default(10000),
  maxRedirects: z.number().int().min(0).max(10).default(5),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
  allowPrivateHosts: z.boolean().default(false),
});

export type DiagnosisConfig = z.infer<typeof DiagnosisConfigSchema>;
export type DiagnosisConfigInput = z.input<typeof DiagnosisConfigSchema>;

// ─── Snapshot ───────────────────────────────────────────────────────────────

export type HeaderMap = Readonly<Record<string, string>>;

export interface MetaTag {
  readonly name: string | null;
  readonly property: string | null;
  readonly content: string | null;
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface PageHeading {
  readonly level: HeadingLevel;
  readonly text: string;
}

export interface PageImage {
  readonly src: string | null;
  readonly alt: string | null;
}

export interface PageAnchor {
  readonly href: string | null;
  readonly text: string;
  readonly ariaLabel: string | null;
}

export type FormControlTag = "input" | "textarea" | "select";

export interface FormControl {
  readonly tag: FormControlTag;
  readonly id: string | null;
  readonly ariaLabel: string | null;
}

export interface AriaElement {
  readonly tag: string;
  readonly role: string | null;
  readonly ariaLabel: string | null;
  readonly tabindex: string | null;
}

export const LANDMARK_TAGS = ["header", "nav", "main", "footer", "aside", "section", "article"] as const;
export type LandmarkTag = (typeof LANDMARK_TAGS)[number];

export interface ResourceCounts {
  readonly scripts: number;
  readonly stylesheets: number;
  readonly images: number;
  readonly iframes: number;
}

export interface PageDocument {
  readonly lang: string | null;
  readonly title: string | null;
  readonly metaTags: readonly MetaTag[];
  readonly canonical: string | null;
  readonly headings: readonly PageHeading[];
  readonly images: readonly PageImage[];
  readonly anchors: readonly PageAnchor[];
  readonly formControls: readonly FormControl[];
  readonly labelTargets: readonly string[];
  readonly ariaElements: readonly AriaElement[];
  readonly landmarks: Readonly<Record<LandmarkTag, number>>;
  readonly resources: ResourceCounts;
  readonly jsonLd: readonly string[];
  readonly inlineStyleCount: number;
}

export interface PageSnapshot {
  readonly url: string;
  readonly finalUrl: string;
  readonly scheme: string;
  readonly domain: string;
  readonly fetchedAt: string;
  readonly durationSeconds: number;
  readonly byteSize: number;
  readonly statusCode: number;
  readonly headers: HeaderMap;
  readonly document: PageDocument;
}

// ─── Results ────────────────────────────────────────────────────────────────

export const CATEGORIES = ["seo", "security", "performance", "accessibility"] as const;
export type Category = (typeof CATEGORIES)[number];

export type FindingSeverity = "pass" | "low" | "med" | "high";

export type Locale = "ja" | "en";

export interface ExplanationText {
  what: string;
  why: string;
  how: string;
  risk?: string;
}

export type BilingualExplanation = Record<Locale, ExplanationText>;

export interface IssueExplanation {
  issue: string;
  explanation: BilingualExplanation;
}

export interface CheckOutcome {
  rule: string;
  status: "pass" | "fail";
  points: number;
  maxPoints: number;
  severity: FindingSeverity;
  message: string;
}

export interface CategoryResult<TDetails = unknown> {
  category: Category;
  score: number;
  issues: string[];
  successes: string[];
  explanations: IssueExplanation[];
  checks: CheckOutcome[];
  details: TDetails;
}

export interface SeoDetails {
  title: string | null;
  titleLength: number | null;
  metaDescription: string | null;
  metaDescriptionLength: number | null;
  headings: Record<`h${HeadingLevel}`, string[]>;
  totalImages: number;
  imagesWithAlt: number;
  openGraph: Record<string, string>;
  twitterCard: Record<string, string>;
  canonical: string | null;
  internalLinksCount: number;
  externalLinksCount: number;
  structuredDataCount: number;
}

export interface CertificateInfo {
  subject: string;
  issuer: string;
  validFrom: string;
  validTo: string;
}

export interface SecurityDetails {
  https: boolean;
  securityHeaders: Record<string, string | null>;
  certificate: CertificateInfo | null;
}

export interface PerformanceDetails {
  loadTimeSeconds: number;
  pageSizeBytes: number;
  pageSizeKb: number;
  resources: ResourceCounts;
  totalResources: number;
  compression: string | null;
  cacheControl: string | null;
}

export interface AccessibilityDetails {
  langAttribute: string | null;
  imagesWithoutAltCount: number;
  formInputsCount: number;
  inputsWithLabels: number;
  ariaRolesCount: number;
  ariaLabelsCount: number;
  landmarks: Record<LandmarkTag, number>;
  headingOrder: HeadingLevel[];
  emptyLinksCount: number;
  negativeTabindexCount: number;
  inlineStyleCount: number;
}

export interface DiagnosisResult {
  url: string;
  timestamp: string;
  seo: CategoryResult<SeoDetails>;
  security: CategoryResult<SecurityDetails>;
  performance: CategoryResult<PerformanceDetails>;
  accessibility: CategoryResult<AccessibilityDetails>;
  overallScore: number;
  scores: Record<Category, number>;
}

export interface RecommendationEntry {
  rank: number;
  category: Category;
  issue: string;
  priority: number;
}

export type Recommendations =
  | { status: "ranked"; entries: RecommendationEntry[] }
  | { status: "no-issues"; message: string };
