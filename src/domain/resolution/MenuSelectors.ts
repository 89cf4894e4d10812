/**
 * Containers that count as an open transient menu.
 */
export const MENU_CONTAINER_SELECTORS: readonly string[] = [
  '[role="menu"]',
  '[role="listbox"]',
  '[class*="menu"]',
  '[class*="Menu"]',
  '[class*="dropdown"]',
  '[class*="Dropdown"]',
  '[class*="popover"]',
  '[class*="Popover"]',
  '[data-testid*="menu"]',
  '[data-testid*="dropdown"]',
];

/**
 * Items inside an open menu, most specific first.
 */
export const MENU_ITEM_SELECTORS: readonly string[] = [
  '[role="menuitem"]',
  '[role="option"]',
  '[class*="MenuItem"]',
  '[class*="menu-item"]',
  '[class*="DropdownItem"]',
  '[class*="dropdown-item"]',
  'li[role="presentation"] a',
  'li[role="presentation"] button',
  'li[role="presentation"] div',
];
