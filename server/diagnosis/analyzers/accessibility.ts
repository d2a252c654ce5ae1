import type { AccessibilityDetails, CategoryResult, HeadingLevel, LandmarkTag, PageSnapshot } from "../types";
import { fail, pass, runRules, skip, type ScoringRule } from "../rules";
import { hasAltText } from "./seo";

export interface HeadingJump {
  from: HeadingLevel;
  to: HeadingLevel;
}

export interface AccessibilityContext {
  lang: string | null;
  totalImages: number;
  imagesWithoutAlt: number;
  formControls: number;
  labeledControls: number;
  ariaRoles: number;
  ariaLabels: number;
  landmarks: Record<LandmarkTag, number>;
  headingOrder: HeadingLevel[];
  firstHeadingJump: HeadingJump | null;
  totalLinks: number;
  emptyLinks: number;
}

/** First place where the level increases by more than one, in document order. */
export function findHeadingJump(levels: readonly HeadingLevel[]): HeadingJump | null {
  for (let i = 1; i < levels.length; i++) {
    if (levels[i] - levels[i - 1] > 1) {
      return { from: levels[i - 1], to: levels[i] };
    }
  }
  return null;
}

export function buildAccessibilityContext(snapshot: PageSnapshot): AccessibilityContext {
  const { document } = snapshot;
  const labelTargets = new Set(document.labelTargets);

  const labeledControls = document.formControls.filter(
    (control) => (control.id !== null && labelTargets.has(control.id)) || Boolean(control.ariaLabel)
  ).length;

  const emptyLinks = document.anchors.filter((anchor) => !anchor.text && !anchor.ariaLabel).length;
  const headingOrder = document.headings.map((heading) => heading.level);

  return {
    lang: document.lang,
    totalImages: document.images.length,
    imagesWithoutAlt: document.images.filter((img) => !hasAltText(img.alt)).length,
    formControls: document.formControls.length,
    labeledControls,
    ariaRoles: document.ariaElements.filter((el) => el.role !== null).length,
    ariaLabels: document.ariaElements.filter((el) => el.ariaLabel !== null).length,
    landmarks: { ...document.landmarks },
    headingOrder,
    firstHeadingJump: findHeadingJump(headingOrder),
    totalLinks: document.anchors.length,
    emptyLinks,
  };
}

export const ACCESSIBILITY_RULES: readonly ScoringRule<AccessibilityContext>[] = [
  {
    id: "accessibility.lang",
    maxPoints: 15,
    severity: "med",
    explanation: "accessibility.lang",
    evaluate: ({ lang }) =>
      lang ? pass(15, `HTML lang attribute present (${lang})`) : fail("HTML element missing lang attribute"),
  },
  {
    id: "accessibility.image-alt",
    maxPoints: 20,
    severity: "high",
    evaluate: ({ totalImages, imagesWithoutAlt }) => {
      if (totalImages === 0) return skip;
      const ratio = (totalImages - imagesWithoutAlt) / totalImages;
      if (ratio === 1) return pass(20, "All images have alt attributes");
      if (ratio >= 0.8) return fail(`${imagesWithoutAlt} images missing alt attributes`, 15);
      return fail(`Many images missing alt attributes (${imagesWithoutAlt}/${totalImages})`);
    },
  },
  {
    id: "accessibility.form-labels",
    maxPoints: 15,
    severity: "high",
    evaluate: ({ formControls, labeledControls }) => {
      if (formControls === 0) return skip;
      const counts = `(${labeledControls}/${formControls})`;
      if (labeledControls === formControls) return pass(15, "All form elements have labels");
      if (labeledControls >= formControls * 0.7) return fail(`Some form elements missing labels ${counts}`, 10);
      return fail(`Many form elements missing labels ${counts}`);
    },
  },
  {
    id: "accessibility.aria",
    maxPoints: 10,
    severity: "low",
    evaluate: ({ ariaRoles, ariaLabels }) =>
      ariaRoles > 0 || ariaLabels > 0
        ? pass(10, `ARIA attributes used (${ariaRoles} roles, ${ariaLabels} labels)`)
        : skip,
  },
  {
    id: "accessibility.main-landmark",
    maxPoints: 10,
    severity: "med",
    explanation: "accessibility.mainLandmark",
    evaluate: ({ landmarks }) => (landmarks.main > 0 ? pass(10, "Main landmark found") : fail("Main landmark not found")),
  },
  {
    id: "accessibility.nav-landmark",
    maxPoints: 5,
    severity: "low",
    evaluate: ({ landmarks }) => (landmarks.nav > 0 ? pass(5, "Navigation landmark found") : skip),
  },
  {
    id: "accessibility.heading-hierarchy",
    maxPoints: 10,
    severity: "med",
    evaluate: ({ headingOrder, firstHeadingJump }) => {
      if (firstHeadingJump) {
        return fail(`Heading hierarchy issues (h${firstHeadingJump.to} after h${firstHeadingJump.from})`);
      }
      return headingOrder.length > 0 ? pass(10, "Proper heading hierarchy") : skip;
    },
  },
  {
    id: "accessibility.link-text",
    maxPoints: 10,
    severity: "med",
    evaluate: ({ totalLinks, emptyLinks }) => {
      if (emptyLinks > 0) return fail(`${emptyLinks} links without text`);
      return totalLinks > 0 ? pass(10, "All links have text") : skip;
    },
  },
];

export function analyzeAccessibility(snapshot: PageSnapshot): CategoryResult<AccessibilityDetails> {
  const context = buildAccessibilityContext(snapshot);
  const { ariaElements, inlineStyleCount } = snapshot.document;

  // Reported only; these do not feed the score.
  const negativeTabindexCount = ariaElements.filter((el) => el.tabindex !== null && Number(el.tabindex) < 0).length;

  const details: AccessibilityDetails = {
    langAttribute: context.lang,
    imagesWithoutAltCount: context.imagesWithoutAlt,
    formInputsCount: context.formControls,
    inputsWithLabels: context.labeledControls,
    ariaRolesCount: context.ariaRoles,
    ariaLabelsCount: context.ariaLabels,
    landmarks: context.landmarks,
    headingOrder: context.headingOrder,
    emptyLinksCount: context.emptyLinks,
    negativeTabindexCount,
    inlineStyleCount,
  };

  return runRules("accessibility", ACCESSIBILITY_RULES, context, details);
}
