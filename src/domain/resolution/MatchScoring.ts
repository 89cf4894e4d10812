import { ElementDescriptor } from '../browser/ElementDescriptor';
import { MenuItemDescriptor } from '../browser/MenuItemDescriptor';
import { ElementCategory, tagMatchesCategory } from './ElementCategory';
import { tokenize } from './KeywordExtractor';

/** Minimum fuzzy score for the last-resort strategy to accept a candidate. */
export const FUZZY_ACCEPT_THRESHOLD = 0.4;

/** Minimum score for the menu resolver to accept an item. */
export const MENU_ACCEPT_THRESHOLD = 0.5;

/** Minimum score for an element to be returned by multi-element lookups. */
export const MULTI_MATCH_THRESHOLD = 0.3;

/**
 * Ceiling for menu items whose text is not the description itself,
 * so that only an exact text match ever scores 1.0.
 */
export const MENU_NON_EXACT_CEILING = 0.99;

const SHORT_TEXT_LENGTH = 50;

function keywordOverlap(keywords: readonly string[], haystack: string): number {
  const tokens = new Set(tokenize(haystack));
  return keywords.filter(kw => tokens.has(kw)).length;
}

/**
 * How well an enumerated element matches a description, in [0, 1].
 *
 *   0.5 × keyword overlap ratio
 * + 0.3 if the whole description appears in the searchable text
 * + 0.2 if the tag fits the inferred category
 * + 0.1 for short text with at least one keyword hit
 * + 0.1 if a keyword appears in the accessible name
 */
export function scoreElement(
  element: ElementDescriptor,
  description: string,
  keywords: readonly string[],
  category: ElementCategory
): number {
  if (keywords.length === 0) {
    return 0;
  }

  const searchable = element.searchableText();
  const accessibleName = (element.accessibleName ?? '').toLowerCase();
  const overlap = keywordOverlap(keywords, searchable);

  let score = 0.5 * (overlap / keywords.length);

  if (searchable.includes(description.toLowerCase())) {
    score += 0.3;
  }

  if (tagMatchesCategory(element.tag, category)) {
    score += 0.2;
  }

  if (element.text.length < SHORT_TEXT_LENGTH && overlap > 0) {
    score += 0.1;
  }

  if (keywords.some(kw => accessibleName.includes(kw))) {
    score += 0.1;
  }

  return Math.min(score, 1.0);
}

/**
 * How well a menu item matches a description, in [0, 1].
 * Exact (trimmed, case-folded) text equality short-circuits to 1.0.
 */
export function scoreMenuItem(
  item: MenuItemDescriptor,
  description: string,
  keywords: readonly string[]
): number {
  const text = item.text.trim().toLowerCase();
  const accessibleName = (item.accessibleName ?? '').toLowerCase();
  const desc = description.trim().toLowerCase();

  if (text === desc) {
    return 1.0;
  }

  let score = 0;

  if (desc.length > 0 && text.includes(desc)) {
    score += 0.7;
  }

  const overlap = keywords.length > 0 ? keywordOverlap(keywords, `${text} ${accessibleName}`) : 0;
  if (overlap > 0) {
    score += 0.3 * (overlap / keywords.length);
  }

  if (keywords.some(kw => text.startsWith(kw))) {
    score += 0.2;
  }

  if (text.length < SHORT_TEXT_LENGTH && overlap > 0) {
    score += 0.1;
  }

  return Math.min(score, MENU_NON_EXACT_CEILING);
}

/**
 * Highest-scoring candidate; ties keep the earliest. Returns null when nothing scores above zero.
 */
export function pickBest<T>(
  candidates: readonly T[],
  score: (candidate: T) => number
): { candidate: T; score: number } | null {
  let best: { candidate: T; score: number } | null = null;

  for (const candidate of candidates) {
    const value = score(candidate);
    if (value > (best?.score ?? 0)) {
      best = { candidate, score: value };
    }
  }

  return best;
}
