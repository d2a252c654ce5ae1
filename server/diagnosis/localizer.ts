import { z } from "zod";
import explanationData from "./data/explanations.json";
import phraseData from "./data/phrases.json";
import type { BilingualExplanation, Locale } from "./types";

export type ExplanationTopic = keyof typeof explanationData;

const EXPLANATIONS: Readonly<Record<ExplanationTopic, BilingualExplanation>> = explanationData;

function isExplanationTopic(value: unknown): value is ExplanationTopic {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(EXPLANATIONS, value);
}

const PhraseEntrySchema = z.object({
  en: z.string().min(1),
  ja: z.string().min(1),
  topic: z.custom<ExplanationTopic>(isExplanationTopic, "Unknown explanation topic").optional(),
});

export type PhraseEntry = z.infer<typeof PhraseEntrySchema>;

/** Insertion order is the match order for fragment lookups. */
export const PHRASES: readonly PhraseEntry[] = z.array(PhraseEntrySchema).parse(phraseData);

export interface LocalizedFinding {
  original: string;
  en: string;
  ja: string;
  explanation?: BilingualExplanation;
}

interface PhraseMatch {
  entry: PhraseEntry;
  fragment: string;
}

export function explain(topic: ExplanationTopic): BilingualExplanation {
  return EXPLANATIONS[topic];
}

export function findPhrase(text: string, table: readonly PhraseEntry[] = PHRASES): PhraseMatch | null {
  for (const entry of table) {
    if (text === entry.en) return { entry, fragment: entry.en };
    if (text === entry.ja) return { entry, fragment: entry.ja };
  }

  for (const entry of table) {
    if (text.includes(entry.en)) return { entry, fragment: entry.en };
    if (text.includes(entry.ja)) return { entry, fragment: entry.ja };
  }

  return null;
}

/**
 * Renders a finding in the requested language. Only the matched fragment is
 * swapped, so counts and measurements in the rest of the text survive.
 * Unknown text comes back unchanged.
 */
export function translateFinding(
  text: string,
  locale: Locale,
  table: readonly PhraseEntry[] = PHRASES
): string {
  const match = findPhrase(text, table);
  if (!match) return text;
  return text.replace(match.fragment, match.entry[locale]);
}

export function localizeFinding(text: string, table: readonly PhraseEntry[] = PHRASES): LocalizedFinding {
  const match = findPhrase(text, table);
  if (!match) {
    return { original: text, en: text, ja: text };
  }

  const localized: LocalizedFinding = {
    original: text,
    en: text.replace(match.fragment, match.entry.en),
    ja: text.replace(match.fragment, match.entry.ja),
  };
  if (match.entry.topic) {
    localized.explanation = explain(match.entry.topic);
  }
  return localized;
}
