import { CATEGORY_RULES, ElementCategory, POSITION_HINTS, ViewportEdge } from './ElementCategory';

const STOPWORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
  'of', 'with', 'by', 'from', 'up', 'about', 'into', 'through', 'during',
  'option', 'button', 'field', 'input', 'menu', 'item',
]);

const MENU_INDICATORS: readonly string[] = [
  'option',
  'choice',
  'item',
  'in menu',
  'in dropdown',
  'from menu',
  'from dropdown',
  'menu item',
];

/**
 * Lowercased word tokens (`\w+`) of a string.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/\w+/g) ?? [];
}

/**
 * Meaningful keywords of a description.
 * Never empty for non-empty input: falls back to the whole description lowercased.
 */
export function extractKeywords(description: string): string[] {
  const keywords = tokenize(description).filter(w => !STOPWORDS.has(w) && w.length > 1);
  return keywords.length > 0 ? keywords : [description.trim().toLowerCase()];
}

export function inferCategory(description: string): ElementCategory {
  const lower = description.toLowerCase();

  for (const [category, patterns] of CATEGORY_RULES) {
    if (patterns.some(pattern => lower.includes(pattern))) {
      return category;
    }
  }

  return 'any';
}

export function looksLikeMenuItem(description: string): boolean {
  const lower = description.toLowerCase();
  return MENU_INDICATORS.some(indicator => lower.includes(indicator));
}

export function detectPositionHint(description: string): ViewportEdge | null {
  const lower = description.toLowerCase();
  const hit = POSITION_HINTS.find(([word]) => lower.includes(word));
  return hit ? hit[1] : null;
}
