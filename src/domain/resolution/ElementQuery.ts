import { ElementDescriptor } from '../browser/ElementDescriptor';
import { AriaRole } from './ElementCategory';

/**
 * How a text value is compared against element text or names.
 * - exact: whole string, case-sensitive
 * - exact-ignore-case: whole string, case-insensitive
 * - contains: case-insensitive substring
 */
export type TextMatchMode = 'exact' | 'exact-ignore-case' | 'contains';

export interface TextMatch {
  value: string;
  mode: TextMatchMode;
}

/**
 * Read-only lookups a page-query implementation must answer.
 * Attribute comparisons are always case-insensitive.
 */
export type ElementQuery =
  | { kind: 'text'; text: TextMatch }
  | { kind: 'attribute'; attribute: string; value: string; mode: 'equals' | 'contains' }
  | { kind: 'role'; role: AriaRole; name: TextMatch }
  | { kind: 'selector'; selector: string; hasText?: TextMatch }
  | { kind: 'id'; id: string };

const TEXT_SNIPPET_LENGTH = 30;

/**
 * Builds a query for an enumerated element, preferring the most specific handle:
 * id, accessible name, test id, tag with first class, tag containing text, bare tag.
 */
export function queryForDescriptor(element: ElementDescriptor): ElementQuery {
  if (element.id) {
    return { kind: 'id', id: element.id };
  }

  if (element.accessibleName) {
    return { kind: 'attribute', attribute: 'aria-label', value: element.accessibleName, mode: 'equals' };
  }

  if (element.testId) {
    return { kind: 'attribute', attribute: 'data-testid', value: element.testId, mode: 'equals' };
  }

  const [firstClass] = element.classes;
  if (firstClass) {
    return { kind: 'selector', selector: `${element.tag}.${firstClass}` };
  }

  if (element.text) {
    return {
      kind: 'selector',
      selector: element.tag,
      hasText: { value: element.text.substring(0, TEXT_SNIPPET_LENGTH), mode: 'contains' },
    };
  }

  return { kind: 'selector', selector: element.tag };
}

/**
 * Short label for logs and step records.
 */
export function describeQuery(query: ElementQuery): string {
  switch (query.kind) {
    case 'text':
      return `text(${query.text.mode})="${query.text.value}"`;
    case 'attribute':
      return `[${query.attribute}${query.mode === 'contains' ? '*=' : '='}"${query.value}" i]`;
    case 'role':
      return `role=${query.role}[name(${query.name.mode})="${query.name.value}"]`;
    case 'selector':
      return query.hasText
        ? `${query.selector} >> has-text(${query.hasText.mode})="${query.hasText.value}"`
        : query.selector;
    case 'id':
      return `#${query.id}`;
  }
}
