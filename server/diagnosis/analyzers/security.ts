import type { CategoryResult, PageSnapshot, SecurityDetails } from "../types";
import type { ExplanationTopic } from "../localizer";
import { headerValue } from "../extractor";
import { fail, pass, runRules, skip, type ScoringRule } from "../rules";
import { checkTls, probeCertificate, type TlsCheckResult, type TlsProbe } from "../tls-probe";

export interface SecurityHeaderCheck {
  name: string;
  points: number;
  explanation?: ExplanationTopic;
}

export const SECURITY_HEADERS: readonly SecurityHeaderCheck[] = [
  { name: "Strict-Transport-Security", points: 15, explanation: "security.hsts" },
  { name: "X-Frame-Options", points: 10, explanation: "security.xFrameOptions" },
  { name: "X-Content-Type-Options", points: 10 },
  { name: "X-XSS-Protection", points: 5 },
  { name: "Content-Security-Policy", points: 20, explanation: "security.csp" },
  { name: "Referrer-Policy", points: 5 },
  { name: "Permissions-Policy", points: 5 },
];

export interface SecurityContext {
  snapshot: PageSnapshot;
  tls: TlsCheckResult;
}

function headerRule(header: SecurityHeaderCheck): ScoringRule<SecurityContext> {
  return {
    id: `security.header.${header.name.toLowerCase()}`,
    maxPoints: header.points,
    severity: header.explanation ? "med" : "low",
    explanation: header.explanation,
    evaluate: ({ snapshot }) =>
      headerValue(snapshot.headers, header.name) !== null
        ? pass(header.points, `${header.name} header configured`)
        : fail(`${header.name} header not set`),
  };
}

export const SECURITY_RULES: readonly ScoringRule<SecurityContext>[] = [
  {
    id: "security.https",
    maxPoints: 30,
    severity: "high",
    explanation: "security.https",
    evaluate: ({ snapshot }) =>
      snapshot.scheme === "https" ? pass(30, "HTTPS enabled") : fail("HTTPS not enabled (security risk)"),
  },
  ...SECURITY_HEADERS.map(headerRule),
  {
    id: "security.tls-certificate",
    maxPoints: 0,
    severity: "high",
    evaluate: ({ tls }) => {
      switch (tls.status) {
        case "skipped":
          return skip;
        case "valid": {
          const { subject, issuer, validFrom, validTo } = tls.certificate;
          return pass(0, `Valid SSL certificate (subject: ${subject}; issuer: ${issuer}; valid ${validFrom} - ${validTo})`);
        }
        case "failed":
          return fail(`SSL certificate check failed: ${tls.reason}`);
      }
    },
  },
];

export interface SecurityAnalyzerOptions {
  tlsTimeoutMs?: number;
  tlsProbe?: TlsProbe;
}

export async function analyzeSecurity(
  snapshot: PageSnapshot,
  options: SecurityAnalyzerOptions = {}
): Promise<CategoryResult<SecurityDetails>> {
  const tls = await checkTls(snapshot, options.tlsTimeoutMs ?? 10000, options.tlsProbe ?? probeCertificate);

  const securityHeaders: Record<string, string | null> = {};
  for (const header of SECURITY_HEADERS) {
    securityHeaders[header.name] = headerValue(snapshot.headers, header.name);
  }

  const details: SecurityDetails = {
    https: snapshot.scheme === "https",
    securityHeaders,
    certificate: tls.status === "valid" ? tls.certificate : null,
  };

  return runRules("security", SECURITY_RULES, { snapshot, tls }, details);
}
