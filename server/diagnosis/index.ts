import type { DiagnosisConfigInput, DiagnosisResult, PageSnapshot } from "./types";
import { DiagnosisConfigSchema, TargetUrlSchema } from "./types";
import { FetchError } from "./errors";
import { fetchSnapshot, type SnapshotFetcher } from "./fetcher";
import { analyzeSeo } from "./analyzers/seo";
import { analyzeSecurity } from "./analyzers/security";
import { analyzePerformance } from "./analyzers/performance";
import { analyzeAccessibility } from "./analyzers/accessibility";
import { buildDiagnosisResult } from "./aggregator";
import type { TlsProbe } from "./tls-probe";
import { createLogger, type Logger } from "./logger";

export interface DiagnoseOptions extends Omit<DiagnosisConfigInput, "url"> {
  fetchSnapshot?: SnapshotFetcher;
  tlsProbe?: TlsProbe;
  logger?: Logger;
  now?: () => Date;
}

export interface AnalyzeOptions {
  tlsTimeoutMs?: number;
  tlsProbe?: TlsProbe;
  logger?: Logger;
  now?: () => Date;
}

const defaultLogger = createLogger("diagnosis");

/**
 * Scores an already captured snapshot. The analyzers share nothing but the
 * frozen snapshot, so they are awaited together.
 */
export async function diagnoseSnapshot(snapshot: PageSnapshot, options: AnalyzeOptions = {}): Promise<DiagnosisResult> {
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());

  const [seo, security, performance, accessibility] = await Promise.all([
    Promise.resolve(analyzeSeo(snapshot)),
    analyzeSecurity(snapshot, { tlsTimeoutMs: options.tlsTimeoutMs, tlsProbe: options.tlsProbe }),
    Promise.resolve(analyzePerformance(snapshot)),
    Promise.resolve(analyzeAccessibility(snapshot)),
  ]);

  const result = buildDiagnosisResult(snapshot.url, now().toISOString(), {
    seo,
    security,
    performance,
    accessibility,
  });

  logger.debug(
    `Scores for ${snapshot.url}: seo=${seo.score} security=${security.score} performance=${performance.score} accessibility=${accessibility.score}`
  );
  logger.info(`Diagnosis finished for ${snapshot.url}: overall ${result.overallScore}/100`);

  return result;
}

/**
 * Fetches `url` once and runs every analyzer against that snapshot.
 * Rejects with `FetchError` when the page cannot be captured, an unusable
 * target included. Invalid options (e.g. a negative timeout) throw `ZodError`.
 */
export async function diagnose(url: string, options: DiagnoseOptions = {}): Promise<DiagnosisResult> {
  const { fetchSnapshot: fetcher = fetchSnapshot, tlsProbe, logger = defaultLogger, now, ...settings } = options;

  const target = TargetUrlSchema.safeParse(url);
  if (!target.success) {
    throw new FetchError(url, "invalid-url", `Invalid target URL: ${url.trim() || "(empty)"}`, {
      cause: target.error,
    });
  }
  const config = DiagnosisConfigSchema.parse({ ...settings, url: target.data });

  logger.info(`Starting diagnosis: ${config.url}`);
  const snapshot = await fetcher(config);
  logger.debug(
    `Fetched ${snapshot.finalUrl} (${snapshot.statusCode}) in ${snapshot.durationSeconds.toFixed(3)}s, ${snapshot.byteSize} bytes`
  );

  return diagnoseSnapshot(snapshot, { tlsTimeoutMs: config.tlsTimeoutMs, tlsProbe, logger, now });
}

export { DiagnosisConfigSchema, CATEGORIES } from "./types";
export type {
  Category,
  CategoryResult,
  DiagnosisConfig,
  DiagnosisConfigInput,
  DiagnosisResult,
  Locale,
  PageSnapshot,
  RecommendationEntry,
  Recommendations,
} from "./types";
export { FetchError, SubCheckError } from "./errors";
export { fetchSnapshot } from "./fetcher";
export { buildSnapshot, extractDocument } from "./extractor";
export { calculateOverallScore, CATEGORY_WEIGHTS } from "./aggregator";
export { rankRecommendations, calculatePriority, PRIORITY_WEIGHTS } from "./ranker";
export { localizeFinding, translateFinding } from "./localizer";
export { renderMarkdownReport } from "./report";
export { createLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
