/**
 * Coarse element categories inferred from a description.
 */
export type ElementCategory =
  | 'button'
  | 'link'
  | 'input'
  | 'select'
  | 'checkbox'
  | 'menu'
  | 'menuitem'
  | 'modal'
  | 'any';

/**
 * ARIA roles the accessibility strategy searches, by category.
 */
export type AriaRole =
  | 'button'
  | 'link'
  | 'menuitem'
  | 'textbox'
  | 'searchbox'
  | 'combobox'
  | 'listbox'
  | 'checkbox'
  | 'menu'
  | 'navigation'
  | 'option'
  | 'dialog';

/**
 * Substring → category rules, checked in order; first hit wins.
 */
export const CATEGORY_RULES: ReadonlyArray<readonly [ElementCategory, readonly string[]]> = [
  ['button', ['button', 'btn', 'submit', 'click', 'press']],
  ['link', ['link', 'href', 'anchor', 'navigate']],
  ['input', ['input', 'field', 'textbox', 'enter', 'type', 'fill']],
  ['select', ['select', 'dropdown', 'choose', 'picker']],
  ['checkbox', ['checkbox', 'check', 'toggle']],
  ['menu', ['menu', 'dropdown', 'list']],
  ['menuitem', ['option', 'choice', 'item']],
  ['modal', ['modal', 'dialog', 'popup']],
];

export const CATEGORY_ROLES: Readonly<Record<ElementCategory, readonly AriaRole[]>> = {
  button: ['button', 'menuitem'],
  link: ['link', 'menuitem'],
  input: ['textbox', 'searchbox'],
  select: ['combobox', 'listbox'],
  checkbox: ['checkbox'],
  menu: ['menu', 'navigation'],
  menuitem: ['menuitem', 'option'],
  modal: ['dialog'],
  any: ['button', 'link', 'textbox', 'menuitem', 'combobox', 'option'],
};

export const CATEGORY_SELECTORS: Readonly<Record<ElementCategory, readonly string[]>> = {
  button: ['button', '[role="button"]', 'a.btn', 'input[type="submit"]'],
  link: ['a', '[role="link"]'],
  input: ['input', 'textarea', '[contenteditable="true"]', '[role="textbox"]'],
  select: ['select', '[role="combobox"]', '[role="listbox"]'],
  checkbox: ['input[type="checkbox"]', '[role="checkbox"]'],
  menu: ['[role="menu"]', 'nav', 'ul', 'ol'],
  menuitem: ['[role="menuitem"]', '[role="option"]', 'li', 'div[role="option"]'],
  modal: ['[role="dialog"]', 'dialog'],
  any: [
    'button',
    'a',
    'input',
    'textarea',
    'select',
    '[role="button"]',
    '[role="link"]',
    '[role="menuitem"]',
    '[role="option"]',
  ],
};

/**
 * Whether an element tag fits a category. Categories without a rule accept any tag.
 */
export function tagMatchesCategory(tag: string, category: ElementCategory): boolean {
  const t = tag.toLowerCase();

  switch (category) {
    case 'button':
      return t.includes('button');
    case 'link':
      return t === 'a';
    case 'input':
      return t === 'input' || t === 'textarea';
    case 'select':
      return t === 'select';
    case 'checkbox':
      return t === 'input';
    case 'menu':
      return ['nav', 'ul', 'ol', 'div'].includes(t);
    case 'modal':
      return t === 'div' || t === 'dialog';
    case 'menuitem':
    case 'any':
      return true;
  }
}

/**
 * Positional hint words and the viewport edge they point at.
 */
export type ViewportEdge = 'top' | 'bottom' | 'left' | 'right';

export const POSITION_HINTS: ReadonlyArray<readonly [string, ViewportEdge]> = [
  ['top', 'top'],
  ['bottom', 'bottom'],
  ['left', 'left'],
  ['right', 'right'],
  ['sidebar', 'left'],
  ['header', 'top'],
  ['footer', 'bottom'],
];

/**
 * Fraction of the viewport treated as "edge" by the positional strategy.
 */
export const EDGE_FRACTION = 0.2;
