import { buildSnapshot, type SnapshotInput } from "../../server/diagnosis/extractor";
import type { CategoryResult, CertificateInfo, PageSnapshot } from "../../server/diagnosis/types";
import type { TlsProbe } from "../../server/diagnosis/tls-probe";

export const TITLE = "Example Workshop Tools | Handmade Quality Gear";
export const DESCRIPTION =
  "Example Workshop Tools makes handmade chisels, planes and saws for woodworkers. Browse the catalogue, read care guides and order spare parts online.";

export const FIXED_NOW = new Date("2024-05-01T00:00:00.000Z");

export const TEST_CERTIFICATE: CertificateInfo = {
  subject: "CN=example.com",
  issuer: "CN=Test CA, O=Test Authority",
  validFrom: "Jan  1 00:00:00 2024 GMT",
  validTo: "Jan  1 00:00:00 2025 GMT",
};

export const validProbe: TlsProbe = async () => TEST_CERTIFICATE;

export function htmlPage(head: string, body: string, lang: string | null = "en"): string {
  const langAttr = lang === null ? "" : ` lang="${lang}"`;
  return `<!DOCTYPE html><html${langAttr}><head>${head}</head><body>${body}</body></html>`;
}

/** Passes every SEO and accessibility rule that can award points. */
export const GOOD_PAGE = htmlPage(
  [
    '<meta charset="utf-8">',
    `<title>${TITLE}</title>`,
    `<meta name="description" content="${DESCRIPTION}">`,
    '<meta property="og:title" content="Example Workshop Tools">',
    '<meta name="twitter:card" content="summary">',
    '<link rel="canonical" href="https://example.com/">',
    '<script type="application/ld+json">{"@context":"https://schema.org","@type":"Organization","name":"Example"}</script>',
  ].join(""),
  [
    '<header><nav aria-label="Main"><a href="/about">About us</a></nav></header>',
    "<main>",
    "<h1>Handmade tools</h1>",
    '<img src="/logo.png" alt="Company logo">',
    "<h2>Catalogue</h2>",
    '<form><label for="q">Search</label><input id="q" type="search"></form>',
    "</main>",
  ].join("")
);

export const GOOD_HEADERS = {
  "Content-Encoding": "gzip",
  "Cache-Control": "max-age=600",
};

export const ALL_SECURITY_HEADERS = {
  "Strict-Transport-Security": "max-age=31536000",
  "X-Frame-Options": "DENY",
  "X-Content-Type-Options": "nosniff",
  "X-XSS-Protection": "1; mode=block",
  "Content-Security-Policy": "default-src 'self'",
  "Referrer-Policy": "no-referrer",
  "Permissions-Policy": "camera=()",
};

export function makeSnapshot(html: string, overrides: Partial<SnapshotInput> = {}): PageSnapshot {
  return buildSnapshot({
    url: "https://example.com/",
    html,
    headers: {},
    durationSeconds: 0.4,
    fetchedAt: FIXED_NOW.toISOString(),
    ...overrides,
  });
}

export function scored(score: number, issues: string[] = []): Pick<CategoryResult, "score" | "issues"> {
  return { score, issues };
}
