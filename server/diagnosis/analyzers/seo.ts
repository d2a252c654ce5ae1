import type { CategoryResult, MetaTag, PageSnapshot, SeoDetails } from "../types";
import { headingsByLevel } from "../extractor";
import { classifyLink } from "../url-utils";
import { fail, pass, runRules, skip, type ScoringRule } from "../rules";

export const TITLE_LENGTH = { min: 30, max: 60 } as const;
export const META_DESCRIPTION_LENGTH = { min: 120, max: 160 } as const;

export interface SeoContext {
  title: string | null;
  metaDescription: string | null;
  h1Count: number;
  h2Count: number;
  totalImages: number;
  imagesWithAlt: number;
  openGraph: Record<string, string>;
  twitterCard: Record<string, string>;
  canonical: string | null;
  internalLinks: number;
  externalLinks: number;
  structuredData: number;
}

/** Length in characters rather than UTF-16 code units. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function hasAltText(alt: string | null): boolean {
  return alt !== null && alt.trim() !== "";
}

function collectMeta(tags: readonly MetaTag[], pick: (tag: MetaTag) => string | null): Record<string, string> {
  const collected: Record<string, string> = {};
  for (const tag of tags) {
    const key = pick(tag);
    if (key) collected[key] = tag.content ?? "";
  }
  return collected;
}

function countParseableJsonLd(blocks: readonly string[]): number {
  let count = 0;
  for (const block of blocks) {
    try {
      JSON.parse(block);
      count++;
    } catch {
      continue;
    }
  }
  return count;
}

export function buildSeoContext(snapshot: PageSnapshot): SeoContext {
  const { document } = snapshot;

  const description = document.metaTags.find((tag) => tag.name?.toLowerCase() === "description");
  const metaDescription = description?.content?.trim() || null;

  let internalLinks = 0;
  let externalLinks = 0;
  for (const anchor of document.anchors) {
    if (anchor.href === null) continue;
    const scope = classifyLink(anchor.href, snapshot.finalUrl);
    if (scope === "internal") internalLinks++;
    else if (scope === "external") externalLinks++;
  }

  return {
    title: document.title,
    metaDescription,
    h1Count: document.headings.filter((h) => h.level === 1).length,
    h2Count: document.headings.filter((h) => h.level === 2).length,
    totalImages: document.images.length,
    imagesWithAlt: document.images.filter((img) => hasAltText(img.alt)).length,
    openGraph: collectMeta(document.metaTags, (tag) => (tag.property?.startsWith("og:") ? tag.property : null)),
    twitterCard: collectMeta(document.metaTags, (tag) => (tag.name?.startsWith("twitter:") ? tag.name : null)),
    canonical: document.canonical,
    internalLinks,
    externalLinks,
    structuredData: countParseableJsonLd(document.jsonLd),
  };
}

export const SEO_RULES: readonly ScoringRule<SeoContext>[] = [
  {
    id: "seo.title",
    maxPoints: 15,
    severity: "med",
    explanation: "seo.title",
    evaluate: ({ title }) => {
      if (!title) return fail("Title tag not found");
      const length = charLength(title);
      if (length >= TITLE_LENGTH.min && length <= TITLE_LENGTH.max) {
        return pass(15, `Title tag is configured (${length} chars)`);
      }
      return fail(
        `Title length is not optimal (current: ${length} chars, recommended: ${TITLE_LENGTH.min}-${TITLE_LENGTH.max} chars)`
      );
    },
  },
  {
    id: "seo.meta-description",
    maxPoints: 15,
    severity: "med",
    explanation: "seo.metaDescription",
    evaluate: ({ metaDescription }) => {
      if (!metaDescription) return fail("Meta description not found");
      const length = charLength(metaDescription);
      if (length >= META_DESCRIPTION_LENGTH.min && length <= META_DESCRIPTION_LENGTH.max) {
        return pass(15, `Meta description is configured (${length} chars)`);
      }
      return fail(
        `Meta description length is not optimal (current: ${length} chars, recommended: ${META_DESCRIPTION_LENGTH.min}-${META_DESCRIPTION_LENGTH.max} chars)`
      );
    },
  },
  {
    id: "seo.h1",
    maxPoints: 10,
    severity: "high",
    explanation: "seo.h1",
    evaluate: ({ h1Count }) => {
      if (h1Count === 1) return pass(10, "Single H1 tag found");
      if (h1Count === 0) return fail("H1 tag not found");
      return fail(`Multiple H1 tags found (${h1Count})`);
    },
  },
  {
    id: "seo.h2",
    maxPoints: 5,
    severity: "low",
    evaluate: ({ h2Count }) => (h2Count > 0 ? pass(5, `H2 tags found (${h2Count})`) : fail("H2 tag not found")),
  },
  {
    id: "seo.image-alt",
    maxPoints: 15,
    severity: "med",
    explanation: "seo.alt",
    evaluate: ({ totalImages, imagesWithAlt }) => {
      if (totalImages === 0) return skip;
      const ratio = imagesWithAlt / totalImages;
      const counts = `(${imagesWithAlt}/${totalImages})`;
      if (ratio >= 0.9) return pass(15, `Most images have alt attributes ${counts}`);
      if (ratio >= 0.7) return fail(`Some images missing alt attributes ${counts}`, 10);
      return fail(`Many images missing alt attributes ${counts}`);
    },
  },
  {
    id: "seo.open-graph",
    maxPoints: 10,
    severity: "low",
    evaluate: ({ openGraph }) =>
      Object.keys(openGraph).length > 0
        ? pass(10, "Open Graph tags configured")
        : fail("Open Graph tags not configured"),
  },
  {
    id: "seo.twitter-card",
    maxPoints: 5,
    severity: "low",
    evaluate: ({ twitterCard }) =>
      Object.keys(twitterCard).length > 0
        ? pass(5, "Twitter Card tags configured")
        : fail("Twitter Card tags not configured"),
  },
  {
    id: "seo.canonical",
    maxPoints: 5,
    severity: "low",
    evaluate: ({ canonical }) =>
      canonical !== null ? pass(5, "Canonical tag configured") : fail("Canonical tag not configured"),
  },
  {
    id: "seo.internal-links",
    maxPoints: 5,
    severity: "low",
    evaluate: ({ internalLinks }) =>
      internalLinks > 0 ? pass(5, `Internal links found (${internalLinks})`) : fail("Internal links not found"),
  },
  {
    id: "seo.structured-data",
    maxPoints: 10,
    severity: "low",
    evaluate: ({ structuredData }) =>
      structuredData > 0 ? pass(10, `Structured data found (${structuredData})`) : fail("Structured data not found"),
  },
];

export function analyzeSeo(snapshot: PageSnapshot): CategoryResult<SeoDetails> {
  const context = buildSeoContext(snapshot);

  const details: SeoDetails = {
    title: context.title,
    titleLength: context.title ? charLength(context.title) : null,
    metaDescription: context.metaDescription,
    metaDescriptionLength: context.metaDescription ? charLength(context.metaDescription) : null,
    headings: headingsByLevel(snapshot.document),
    totalImages: context.totalImages,
    imagesWithAlt: context.imagesWithAlt,
    openGraph: context.openGraph,
    twitterCard: context.twitterCard,
    canonical: context.canonical,
    internalLinksCount: context.internalLinks,
    externalLinksCount: context.externalLinks,
    structuredDataCount: context.structuredData,
  };

  return runRules("seo", SEO_RULES, context, details);
}
