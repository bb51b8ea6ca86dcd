/**
 * Text Analysis Helpers
 *
 * Tokenization, stop-word filtering, language, category and topic
 * detection and entity extraction shared by the embedder, the intent
 * classifier, the context manager, the retrieval engine and the response
 * synthesizer. Word lists live in `data/lexicon.json`.
 */

import lexicon from '../data/lexicon.json';
import { DocumentCategory, LanguageCode, LANGUAGE_CODES, Topic, TOPICS } from '../../shared/types';

export type PhraseGroup = 'greetings' | 'farewells' | 'help' | 'identity' | 'anaphora';

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:[-.'][\p{L}\p{N}]+)*/gu;

/**
 * Regulation codes and other upper-case identifiers: `ETCS-12`, `EN 50126`,
 * `TSI`, `RAMS`.
 */
const ENTITY_PATTERN =
  /(?<![\p{L}\p{N}])\p{Lu}[\p{Lu}\p{N}]+(?:[-/]\p{Lu}[\p{Lu}\p{N}]*)*(?:[- ]?\p{N}+(?:[.-]\p{N}+)*)?(?![\p{L}\p{N}])/gu;

const STOPWORDS: ReadonlySet<string> = new Set([
  ...lexicon.stopwords.nb,
  ...lexicon.stopwords.en,
]);

const CATEGORY_KEYWORDS: Record<Exclude<DocumentCategory, 'other'>, ReadonlySet<string>> = {
  regulation: new Set(lexicon.categories.regulation),
  project: new Set(lexicon.categories.project),
};

const TOPIC_KEYWORDS: Record<Topic, ReadonlySet<string>> = {
  signalling: new Set(lexicon.topics.signalling),
  cost: new Set(lexicon.topics.cost),
  safety: new Set(lexicon.topics.safety),
  schedule: new Set(lexicon.topics.schedule),
  competence: new Set(lexicon.topics.competence),
  project: new Set(lexicon.topics.project),
};

const LANGUAGE_MARKERS: Record<LanguageCode, ReadonlySet<string>> = {
  nb: new Set(lexicon.languageMarkers.nb),
  en: new Set(lexicon.languageMarkers.en),
};

/**
 * Lower-cased word tokens. Hyphenated codes (`etcs-12`) and decimals stay whole.
 */
export function tokenize(text: string): string[] {
  return text.normalize('NFKC').toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export function isStopword(token: string): boolean {
  return STOPWORDS.has(token);
}

/**
 * Tokens with stop words of every supported language removed.
 */
export function contentTokens(text: string): string[] {
  return tokenize(text).filter((token) => !STOPWORDS.has(token));
}

/**
 * Guesses the language of a text from marker words and Norwegian letters.
 * Returns undefined when the evidence is tied.
 */
export function detectLanguage(text: string): LanguageCode | undefined {
  const tokens = tokenize(text);
  const scores: Record<LanguageCode, number> = { nb: 0, en: 0 };

  for (const token of tokens) {
    for (const language of LANGUAGE_CODES) {
      if (LANGUAGE_MARKERS[language].has(token)) {
        scores[language] += 1;
      }
    }
  }
  if (/[æøå]/i.test(text)) {
    scores.nb += 2;
  }

  if (scores.nb > scores.en) return 'nb';
  if (scores.en > scores.nb) return 'en';
  return undefined;
}

/**
 * Category whose keywords occur most often in the text, if any.
 */
export function detectCategory(text: string): DocumentCategory | undefined {
  let regulation = 0;
  let project = 0;
  for (const token of tokenize(text)) {
    if (CATEGORY_KEYWORDS.regulation.has(token)) regulation++;
    if (CATEGORY_KEYWORDS.project.has(token)) project++;
  }
  if (regulation === 0 && project === 0) return undefined;
  if (regulation === project) return undefined;
  return regulation > project ? 'regulation' : 'project';
}

/**
 * Topic of a text that is a single keyword and nothing else: "etcs",
 * "Kostnad?".
 */
export function singleKeywordTopic(text: string): Topic | undefined {
  const tokens = tokenize(text);
  const token = tokens[0];
  if (tokens.length !== 1 || token === undefined) return undefined;
  return TOPICS.find((topic) => TOPIC_KEYWORDS[topic].has(token));
}

/**
 * First topic, in `TOPICS` order, with a keyword anywhere in the text.
 * Parts of hyphenated tokens count, so `etcs-12` is about signalling.
 */
export function detectTopic(text: string): Topic | undefined {
  const words = new Set<string>();
  for (const token of tokenize(text)) {
    words.add(token);
    for (const part of token.split(/[-.']/)) {
      words.add(part);
    }
  }
  return TOPICS.find((topic) => [...words].some((word) => TOPIC_KEYWORDS[topic].has(word)));
}

/**
 * Upper-case identifiers in order of first appearance, without duplicates.
 */
export function extractEntities(text: string): string[] {
  const seen = new Set<string>();
  const entities: string[] = [];
  for (const match of text.matchAll(ENTITY_PATTERN)) {
    const entity = match[0];
    if (!seen.has(entity)) {
      seen.add(entity);
      entities.push(entity);
    }
  }
  return entities;
}

/**
 * Phrases of a lexicon group for every language, longest first so that
 * "ha det bra" is tried before "ha det".
 */
export function phrasesFor(group: PhraseGroup): string[] {
  const entry = lexicon[group];
  return [...entry.nb, ...entry.en].sort((a, b) => b.length - a.length);
}

/**
 * Lower-cases, strips punctuation and collapses whitespace.
 */
export function normalizeForMatching(text: string): string {
  return tokenize(text).join(' ');
}

/**
 * Removes phrases from the text, longest first, as whole words.
 * Returns the phrases found and the content tokens left over.
 */
export function consumePhrases(
  text: string,
  phrases: string[]
): { consumed: string[]; remainder: string[] } {
  const ordered = [...phrases].sort((a, b) => b.length - a.length);
  const consumed: string[] = [];
  let padded = ` ${normalizeForMatching(text)} `;
  for (const phrase of ordered) {
    const needle = ` ${phrase} `;
    if (!padded.includes(needle)) continue;
    consumed.push(phrase);
    while (padded.includes(needle)) {
      padded = padded.replace(needle, ' ');
    }
  }
  return { consumed, remainder: contentTokens(padded) };
}
