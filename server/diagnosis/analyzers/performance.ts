import type { CategoryResult, PageSnapshot, PerformanceDetails } from "../types";
import { headerValue } from "../extractor";
import { fail, pass, runRules, type ScoringRule } from "../rules";

const KIB = 1024;
const MIB = 1024 * 1024;

export const SUPPORTED_ENCODINGS = ["gzip", "br", "deflate"] as const;

export interface PerformanceContext {
  seconds: number;
  bytes: number;
  totalResources: number;
  encoding: string | null;
  cacheControl: string | null;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** KB with two decimals below 1 MiB, MB at or above. */
export function formatSize(bytes: number): string {
  return bytes < MIB ? `${round(bytes / KIB, 2)}KB` : `${round(bytes / MIB, 2)}MB`;
}

function isSupportedEncoding(encoding: string | null): boolean {
  if (!encoding) return false;
  const normalized = encoding.trim().toLowerCase();
  return SUPPORTED_ENCODINGS.some((candidate) => candidate === normalized);
}

export const PERFORMANCE_RULES: readonly ScoringRule<PerformanceContext>[] = [
  {
    id: "performance.load-time",
    maxPoints: 30,
    severity: "high",
    explanation: "performance.loadTime",
    evaluate: ({ seconds }) => {
      const shown = `(${round(seconds, 2)}s)`;
      if (seconds < 1) return pass(30, `Fast page load time ${shown}`);
      if (seconds < 2) return fail(`Page load time is slightly slow ${shown}`, 20);
      if (seconds < 3) return fail(`Page load time is slow ${shown}`, 10);
      return fail(`Page load time is very slow ${shown}`);
    },
  },
  {
    id: "performance.page-size",
    maxPoints: 20,
    severity: "med",
    explanation: "performance.pageSize",
    evaluate: ({ bytes }) => {
      const shown = `(${formatSize(bytes)})`;
      if (bytes < 500 * KIB) return pass(20, `Appropriate page size ${shown}`);
      if (bytes < MIB) return fail(`Page size is slightly large ${shown}`, 15);
      if (bytes < 3 * MIB) return fail(`Page size is large ${shown}`, 5);
      return fail(`Page size is very large ${shown}`);
    },
  },
  {
    id: "performance.resources",
    maxPoints: 15,
    severity: "low",
    evaluate: ({ totalResources }) => {
      if (totalResources < 30) return pass(15, `Appropriate number of resources (${totalResources})`);
      if (totalResources < 50) return pass(10, `Moderate number of resources (${totalResources})`);
      return fail(`Too many resources (total: ${totalResources})`);
    },
  },
  {
    id: "performance.compression",
    maxPoints: 15,
    severity: "med",
    explanation: "performance.compression",
    evaluate: ({ encoding }) =>
      isSupportedEncoding(encoding)
        ? pass(15, `Content compression enabled (${encoding})`)
        : fail("Content compression not enabled"),
  },
  {
    id: "performance.cache-control",
    maxPoints: 10,
    severity: "low",
    evaluate: ({ cacheControl }) =>
      cacheControl !== null ? pass(10, "Cache-Control header configured") : fail("Cache-Control header not set"),
  },
];

export function analyzePerformance(snapshot: PageSnapshot): CategoryResult<PerformanceDetails> {
  const { resources } = snapshot.document;
  const context: PerformanceContext = {
    seconds: snapshot.durationSeconds,
    bytes: snapshot.byteSize,
    totalResources: resources.scripts + resources.stylesheets + resources.images + resources.iframes,
    encoding: headerValue(snapshot.headers, "Content-Encoding"),
    cacheControl: headerValue(snapshot.headers, "Cache-Control"),
  };

  const details: PerformanceDetails = {
    loadTimeSeconds: round(context.seconds, 3),
    pageSizeBytes: context.bytes,
    pageSizeKb: round(context.bytes / KIB, 2),
    resources: { ...resources },
    totalResources: context.totalResources,
    compression: context.encoding,
    cacheControl: context.cacheControl,
  };

  return runRules("performance", PERFORMANCE_RULES, context, details);
}
