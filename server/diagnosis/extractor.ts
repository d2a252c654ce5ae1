import * as cheerio from "cheerio";
import type {
  AriaElement,
  FormControl,
  FormControlTag,
  HeaderMap,
  HeadingLevel,
  LandmarkTag,
  MetaTag,
  PageAnchor,
  PageDocument,
  PageHeading,
  PageImage,
  PageSnapshot,
} from "./types";
import { deepFreeze } from "./freeze";

const FORM_CONTROL_TAGS: readonly FormControlTag[] = ["input", "textarea", "select"];

function orNull(value: string | undefined): string | null {
  return value === undefined ? null : value;
}

function lowerTag(tagName: string | undefined): string {
  return tagName ? tagName.toLowerCase() : "";
}

function isFormControlTag(tag: string): tag is FormControlTag {
  return FORM_CONTROL_TAGS.some((candidate) => candidate === tag);
}

function toHeadingLevel(tag: string): HeadingLevel | null {
  switch (tag) {
    case "h1":
      return 1;
    case "h2":
      return 2;
    case "h3":
      return 3;
    case "h4":
      return 4;
    case "h5":
      return 5;
    case "h6":
      return 6;
    default:
      return null;
  }
}

export function extractDocument(html: string): PageDocument {
  const $ = cheerio.load(html);

  const lang = $("html").first().attr("lang") || null;
  const title = $("title").first().text().trim() || null;

  const metaTags: MetaTag[] = [];
  $("meta").each((_, el) => {
    const $el = $(el);
    metaTags.push({
      name: orNull($el.attr("name")),
      property: orNull($el.attr("property")),
      content: orNull($el.attr("content")),
    });
  });

  const $canonical = $('link[rel="canonical"]').first();
  const canonical = $canonical.length ? ($canonical.attr("href") ?? "") : null;

  const headings: PageHeading[] = [];
  $("h1, h2, h3, h4, h5, h6").each((_, el) => {
    const $el = $(el);
    const level = toHeadingLevel(lowerTag($el.prop("tagName")));
    if (level) {
      headings.push({ level, text: $el.text().trim() });
    }
  });

  const images: PageImage[] = [];
  $("img").each((_, el) => {
    const $el = $(el);
    images.push({ src: orNull($el.attr("src")), alt: orNull($el.attr("alt")) });
  });

  const anchors: PageAnchor[] = [];
  $("a").each((_, el) => {
    const $el = $(el);
    anchors.push({
      href: orNull($el.attr("href")),
      text: $el.text().trim(),
      ariaLabel: orNull($el.attr("aria-label")),
    });
  });

  const formControls: FormControl[] = [];
  $(FORM_CONTROL_TAGS.join(", ")).each((_, el) => {
    const $el = $(el);
    const tag = lowerTag($el.prop("tagName"));
    if (isFormControlTag(tag)) {
      formControls.push({ tag, id: orNull($el.attr("id")), ariaLabel: orNull($el.attr("aria-label")) });
    }
  });

  const labelTargets: string[] = [];
  $("label[for]").each((_, el) => {
    const target = $(el).attr("for");
    if (target) labelTargets.push(target);
  });

  const ariaElements: AriaElement[] = [];
  $("[role], [aria-label], [tabindex]").each((_, el) => {
    const $el = $(el);
    ariaElements.push({
      tag: lowerTag($el.prop("tagName")),
      role: orNull($el.attr("role")),
      ariaLabel: orNull($el.attr("aria-label")),
      tabindex: orNull($el.attr("tabindex")),
    });
  });

  const landmarks: Record<LandmarkTag, number> = {
    header: $("header").length,
    nav: $("nav").length,
    main: $("main").length,
    footer: $("footer").length,
    aside: $("aside").length,
    section: $("section").length,
    article: $("article").length,
  };

  const jsonLd: string[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    jsonLd.push($(el).text());
  });

  return {
    lang,
    title,
    metaTags,
    canonical,
    headings,
    images,
    anchors,
    formControls,
    labelTargets,
    ariaElements,
    landmarks,
    resources: {
      scripts: $("script").length,
      stylesheets: $('link[rel="stylesheet"]').length,
      images: images.length,
      iframes: $("iframe").length,
    },
    jsonLd,
    inlineStyleCount: $("[style]").length,
  };
}

export function createHeaderMap(entries: Headers | Record<string, string>): HeaderMap {
  const pairs = entries instanceof Headers ? Array.from(entries.entries()) : Object.entries(entries);
  const map: Record<string, string> = {};
  for (const [name, value] of pairs) {
    map[name.toLowerCase()] = value;
  }
  return Object.freeze(map);
}

export function headerValue(headers: HeaderMap, name: string): string | null {
  const value = headers[name.toLowerCase()];
  return value === undefined || value === "" ? null : value;
}

export interface SnapshotInput {
  url: string;
  finalUrl?: string;
  html: string;
  headers: Headers | Record<string, string>;
  durationSeconds: number;
  byteSize?: number;
  statusCode?: number;
  fetchedAt?: string;
}

/** Builds the frozen snapshot every analyzer reads from. */
export function buildSnapshot(input: SnapshotInput): PageSnapshot {
  const parsed = new URL(input.url);
  return deepFreeze({
    url: input.url,
    finalUrl: input.finalUrl ?? input.url,
    scheme: parsed.protocol.replace(/:$/, ""),
    domain: parsed.hostname,
    fetchedAt: input.fetchedAt ?? new Date().toISOString(),
    durationSeconds: input.durationSeconds,
    byteSize: input.byteSize ?? Buffer.byteLength(input.html, "utf8"),
    statusCode: input.statusCode ?? 200,
    headers: createHeaderMap(input.headers),
    document: extractDocument(input.html),
  });
}

export function headingsByLevel(document: PageDocument): Record<`h${HeadingLevel}`, string[]> {
  const grouped: Record<`h${HeadingLevel}`, string[]> = { h1: [], h2: [], h3: [], h4: [], h5: [], h6: [] };
  for (const heading of document.headings) {
    grouped[`h${heading.level}`].push(heading.text);
  }
  return grouped;
}
